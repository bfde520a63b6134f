/**
 * @file src/session/snapshot-session.ts
 * @summary Pagination over a materialised id list. The list is fetched once in
 * store-native (newest-first) order, reversed for oldest-first and put in seeded hash
 * order for random. A shorter list (a start-from-item allow-list) keeps the relative
 * order it had in the full session. The list length never changes for the session's
 * lifetime; classification only hides ids from the visible projection.
 *
 * @exports
 *   - orderIds - apply a sort order to a newest-first id list
 *   - SnapshotSession - PageSession over a frozen id list
 */

import type { Criteria } from "../types/criteria";
import type { PhotoRecord } from "../types/photo";
import type { SortOrder } from "../types/sort";
import type { RecordStore } from "../types/store";
import type { PageSession } from "./session";
import { seededShuffle } from "./shuffle";

export function orderIds(newestFirst: readonly string[], sort: SortOrder): string[] {
  switch (sort.kind) {
    case "date-asc":
      return newestFirst.slice().reverse();
    case "random":
      return seededShuffle(newestFirst, sort.seed);
    case "date-desc":
    default:
      return newestFirst.slice();
  }
}

export class SnapshotSession implements PageSession {
  readonly kind = "snapshot";
  readonly ids: readonly string[];

  private constructor(
    private store: RecordStore,
    readonly criteria: Criteria,
    readonly sort: SortOrder,
    readonly pageSize: number,
    ids: string[],
  ) {
    this.ids = Object.freeze(ids);
  }

  static async build(
    store: RecordStore,
    criteria: Criteria,
    sort: SortOrder,
    pageSize: number,
    signal?: AbortSignal,
  ): Promise<SnapshotSession> {
    const native = await store.allIds(criteria);
    signal?.throwIfAborted();
    return new SnapshotSession(store, criteria, sort, pageSize, orderIds(native, sort));
  }

  get size(): number {
    return this.ids.length;
  }

  /** Ids of page `page`, in session order. */
  slice(page: number): string[] {
    const start = Math.max(0, page) * this.pageSize;
    return this.ids.slice(start, Math.min(start + this.pageSize, this.ids.length));
  }

  async loadPage(page: number, _removed: number, signal?: AbortSignal): Promise<PhotoRecord[]> {
    const ids = this.slice(page);
    if (!ids.length) return [];

    const records = await this.store.byIds(ids);
    signal?.throwIfAborted();

    const byId = new Map<string, PhotoRecord>();
    for (const r of records) byId.set(r.id, r);

    const out: PhotoRecord[] = [];
    for (const id of ids) {
      const r = byId.get(id);
      if (r) out.push(r);
    }
    return out;
  }

  hasMoreAfter(page: number, _lastPageLength: number): boolean {
    return (page + 1) * this.pageSize < this.ids.length;
  }
}
