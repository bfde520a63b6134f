/**
 * @file src/core/default-settings.ts
 * @summary Provides the factory-default values for every setting. Re-exports the
 * TriageSettings type from src/types/settings.ts so downstream code can import both the
 * type and the defaults from one location. Used to seed fresh installations and to
 * reset settings to factory defaults.
 *
 * @exports
 *   - TriageSettings (re-exported type) - full settings shape
 *   - DEFAULT_SETTINGS - constant object with factory-default values for all settings
 */

export type { TriageSettings } from "../types/settings";
import type { TriageSettings } from "../types/settings";
import {
  COMBO_RESET_DELAY_MS,
  COMBO_WINDOW_MS,
  LOAD_MORE_DEBOUNCE_MS,
  MAX_PAGE_RETRIES,
  PAGE_SIZE,
  PRELOAD_THRESHOLD,
  WINDOWED_THRESHOLD,
} from "./constants";

/** Factory-default values for every setting. */
export const DEFAULT_SETTINGS: TriageSettings = {
  filter: {
    mode: "all",
    cameraBucketIds: [],
    sessionFilter: null,
  },

  sorting: {
    order: "date-desc",
    randomSeed: 0,
  },

  session: {
    pageSize: PAGE_SIZE,
    preloadThreshold: PRELOAD_THRESHOLD,
    windowedThreshold: WINDOWED_THRESHOLD,
    loadMoreDebounceMs: LOAD_MORE_DEBOUNCE_MS,
    maxPageRetries: MAX_PAGE_RETRIES,
  },

  combo: {
    windowMs: COMBO_WINDOW_MS,
    resetDelayMs: COMBO_RESET_DELAY_MS,
  },

  undo: {
    depth: 1,
  },
};
