/**
 * @file src/session/windowed-session.ts
 * @summary Pagination by limit/offset queries against the store, for collections too
 * large to materialise. Records classified since the session started have left the
 * matching set, so each page's offset is pulled back by that count.
 *
 * @exports
 *   - effectiveOffset - offset for a page after local removals, clamped to 0
 *   - WindowedSession - PageSession issuing one store query per page
 */

import { log } from "../core/logger";
import type { Criteria } from "../types/criteria";
import type { PhotoRecord } from "../types/photo";
import type { SortOrder } from "../types/sort";
import type { RecordStore } from "../types/store";
import type { PageSession } from "./session";

export function effectiveOffset(page: number, pageSize: number, removed: number): number {
  const raw = page * pageSize - removed;
  if (raw < 0) {
    log.warn(`negative page offset clamped to 0 (page=${page}, pageSize=${pageSize}, removed=${removed})`);
    return 0;
  }
  return raw;
}

export class WindowedSession implements PageSession {
  readonly kind = "windowed";

  constructor(
    private store: RecordStore,
    readonly criteria: Criteria,
    readonly sort: SortOrder,
    readonly pageSize: number,
  ) {}

  async loadPage(page: number, removed: number, signal?: AbortSignal): Promise<PhotoRecord[]> {
    const offset = effectiveOffset(page, this.pageSize, removed);
    const records = await this.store.page(this.criteria, this.sort, this.pageSize, offset);
    signal?.throwIfAborted();
    return records;
  }

  // A short page means the query ran off the end of the matching set.
  hasMoreAfter(_page: number, lastPageLength: number): boolean {
    return lastPageLength >= this.pageSize;
  }
}
