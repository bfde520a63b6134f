/**
 * @file src/types/store.ts
 * @summary The narrow record-store contract the engine consumes. Every query is
 * implicitly restricted to records whose status is "unsorted".
 *
 * @exports
 *   - RecordStore - count / page / allIds / byIds / status writes
 */

import type { Criteria } from "./criteria";
import type { PhotoRecord, PhotoStatus } from "./photo";
import type { SortOrder } from "./sort";

export type RecordStore = {
  count(criteria: Criteria): Promise<number>;
  page(criteria: Criteria, sort: SortOrder, limit: number, offset: number): Promise<PhotoRecord[]>;
  /** Every matching id in store-native order (newest first). */
  allIds(criteria: Criteria): Promise<string[]>;
  /** Records for the given ids, regardless of status. Order is not guaranteed. */
  byIds(ids: readonly string[]): Promise<PhotoRecord[]>;
  getStatus?(id: string): Promise<PhotoStatus | null>;
  setStatus(id: string, status: PhotoStatus): Promise<void>;
  setStatusBatch(ids: readonly string[], status: PhotoStatus): Promise<void>;
};
