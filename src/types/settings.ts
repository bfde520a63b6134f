/**
 * @file src/types/settings.ts
 * @summary Settings type definition. Describes the full shape of user-configurable
 * preferences grouped by feature area (filter, sorting, session, combo, undo) plus the
 * lifetime statistics persisted alongside them.
 * Only the type is defined here; the DEFAULT_SETTINGS constant lives in
 * src/core/default-settings.ts.
 *
 * @exports
 *   - TriageSettings - type describing the complete settings structure
 *   - LifetimeStatsData - cumulative counters that survive across sessions
 */

import type { FilterMode, SessionFilter } from "./criteria";
import type { SortOrderKind } from "./sort";

/**
 * Full settings structure.
 * Each top-level key groups settings by feature area.
 */
export type TriageSettings = {
  // Filter - which photos a session covers
  filter: {
    mode: FilterMode;
    /** Bucket ids of the device camera albums, used by camera-only / exclude-camera. */
    cameraBucketIds: string[];
    /** Persisted session-scoped filter; cleared when a precise session ends. */
    sessionFilter: SessionFilter | null;
  };

  // Sorting - order the queue is walked in
  sorting: {
    order: SortOrderKind;
    /** Seed for random order; kept until the user reshuffles. */
    randomSeed: number;
  };

  // Session - pagination and strategy selection
  session: {
    pageSize: number;
    /** Load the next page once fewer than this many visible photos remain. */
    preloadThreshold: number;
    /** Collections larger than this use windowed (limit/offset) pagination. */
    windowedThreshold: number;
    loadMoreDebounceMs: number;
    /** Consecutive background page failures tolerated before surfacing an error. */
    maxPageRetries: number;
  };

  // Combo - rapid-action streaks
  combo: {
    windowMs: number;
    /** Extra delay after the combo goes inactive before its count resets. */
    resetDelayMs: number;
  };

  undo: {
    /** How many actions can be undone in a row. */
    depth: number;
  };
};

export type LifetimeStatsData = {
  totalSorted: number;
  keep: number;
  trash: number;
  maybe: number;
  maxCombo: number;
};
