/**
 * @file src/criteria/criteria-match.ts
 * @summary In-memory evaluation of a Criteria against a single record. The record store
 * renders the same predicate to SQL; this version is used to re-check hydrated records
 * and by callers that filter already-loaded lists. A `startAt` anchor is positional and
 * depends on the store's ordering, so it is not evaluated here.
 *
 * @exports
 *   - matchesCriteria - true when a record satisfies every constraint (status excluded)
 */

import type { Criteria } from "../types/criteria";
import type { PhotoRecord } from "../types/photo";

export function matchesCriteria(c: Criteria, record: Pick<PhotoRecord, "id" | "bucketId" | "takenAt">): boolean {
  if (c.matchNone) return false;
  if (c.ids && !c.ids.includes(record.id)) return false;
  if (c.includeBuckets && !c.includeBuckets.includes(record.bucketId)) return false;
  if (c.excludeBuckets && c.excludeBuckets.includes(record.bucketId)) return false;
  if (c.startDate !== null && record.takenAt < c.startDate) return false;
  if (c.endDate !== null && record.takenAt > c.endDate) return false;
  return true;
}
