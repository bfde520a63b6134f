/**
 * @file src/session/session.ts
 * @summary Contract shared by the snapshot and windowed pagination sessions.
 *
 * @exports
 *   - PageSession - a built session the engine pages through
 */

import type { Criteria } from "../types/criteria";
import type { SessionStrategy } from "../types/engine";
import type { PhotoRecord } from "../types/photo";
import type { SortOrder } from "../types/sort";

export interface PageSession {
  readonly kind: SessionStrategy;
  readonly criteria: Criteria;
  readonly sort: SortOrder;
  readonly pageSize: number;
  /**
   * Fetch page `page`. `removed` is the number of records classified locally since the
   * session started; only the windowed session uses it.
   */
  loadPage(page: number, removed: number, signal?: AbortSignal): Promise<PhotoRecord[]>;
  /** Whether a page after `page` may hold records, given what `page` returned. */
  hasMoreAfter(page: number, lastPageLength: number): boolean;
}
