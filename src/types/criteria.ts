/**
 * @file src/types/criteria.ts
 * @summary Filter inputs and the resolved Criteria predicate. Several independently
 * settable sources (global filter mode, in-page filter, persisted session filter,
 * explicit allow-list) are collapsed into one Criteria by the criteria resolver.
 *
 * @exports
 *   - FilterMode - global filter preference
 *   - SessionFilter - persisted, session-scoped custom filter
 *   - InPageFilter - ad-hoc album/date filter chosen on the current screen
 *   - SortAnchor - "from this photo onward" position bound in a given sort order
 *   - Criteria - canonical resolved predicate handed to the record store
 *   - CriteriaInputs - everything the resolver reads
 */

import type { SortOrder } from "./sort";

export type FilterMode = "all" | "camera-only" | "exclude-camera" | "custom";

export type SessionFilter = {
  albumIds?: string[] | null;
  startDate?: number | null;
  endDate?: number | null;
  /** Precise filters are used as given and take priority over the global mode. */
  preciseMode?: boolean;
  /** Explicit allow-list ("start sorting from this item onward"). */
  photoIds?: string[] | null;
};

export type InPageFilter = {
  albumIds?: string[] | null;
  startDate?: number | null;
  endDate?: number | null;
};

/**
 * Keeps the anchor photo and everything after it in `sort`. `takenAt` is captured with
 * the anchor so date bounds hold even once the anchor itself has been classified.
 */
export type SortAnchor = {
  id: string;
  takenAt: number;
  sort: SortOrder;
};

/**
 * Resolved predicate. `null` list fields mean "no constraint"; an empty list is
 * never stored. `matchNone` is the only way to express an empty result.
 */
export type Criteria = {
  includeBuckets: string[] | null;
  excludeBuckets: string[] | null;
  startDate: number | null;
  endDate: number | null;
  ids: string[] | null;
  startAt: SortAnchor | null;
  precise: boolean;
  matchNone: boolean;
};

export type CriteriaInputs = {
  filterMode: FilterMode;
  cameraBucketIds: readonly string[];
  sessionFilter: SessionFilter | null;
  inPageFilter: InPageFilter | null;
  /** Position bound layered onto whichever source wins. */
  startAt?: SortAnchor | null;
};
