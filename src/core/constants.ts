/**
 * @file src/core/constants.ts
 * @summary Central constants for the triage engine: time units, the
 * reference timing values for combos and load-more debouncing, pagination sizes, and
 * combo level thresholds. Defaults built from these values live in default-settings.ts.
 *
 * @exports
 *   - MS_DAY - milliseconds in one day
 *   - COMBO_WINDOW_MS - max gap between actions that keeps a combo alive
 *   - COMBO_RESET_DELAY_MS - delay between a combo going inactive and its count resetting
 *   - LOAD_MORE_DEBOUNCE_MS - debounce for "load more" triggers
 *   - PAGE_SIZE - records per page
 *   - PRELOAD_THRESHOLD - visible-count below which the next page is fetched
 *   - WINDOWED_THRESHOLD - collection size above which windowed pagination is used
 *   - MAX_PAGE_RETRIES - background page failures tolerated before surfacing
 *   - COMBO_LEVEL_THRESHOLDS - minimum counts for each combo level
 */

// ── Time ────────────────────────────────────────────────────────────
/** Milliseconds in one day (24 × 60 × 60 × 1000). */
export const MS_DAY = 24 * 60 * 60 * 1000;

// ── Combo ───────────────────────────────────────────────────────────
export const COMBO_WINDOW_MS = 1500;
export const COMBO_RESET_DELAY_MS = 300;

/** Lowest count at which each level starts, checked highest first. */
export const COMBO_LEVEL_THRESHOLDS = {
  fire: 20,
  hot: 10,
  warm: 5,
  normal: 1,
} as const;

// ── Pagination ──────────────────────────────────────────────────────
export const PAGE_SIZE = 500;
export const PRELOAD_THRESHOLD = 50;
export const WINDOWED_THRESHOLD = 5000;
export const LOAD_MORE_DEBOUNCE_MS = 50;
export const MAX_PAGE_RETRIES = 3;
