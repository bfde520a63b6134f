/**
 * @file src/settings/settings-normalisation.ts
 * @summary Normalises (validates/defaults) settings read from disk. Every expected key is
 * filled from DEFAULT_SETTINGS, numeric values are clamped to sane ranges, and unknown
 * enum values fall back to their defaults. Input is untrusted JSON, so nothing is
 * assumed about its shape.
 *
 * @exports
 *   - normaliseSessionFilter - sanitise a persisted session filter (null when empty)
 *   - normaliseSettings - build a complete TriageSettings from raw JSON
 *   - normaliseStats - build LifetimeStatsData from raw JSON
 */

import { DEFAULT_SETTINGS } from "../core/default-settings";
import { clampInt, cleanStringArray, isPlainObject } from "../core/utils";
import type { FilterMode, SessionFilter } from "../types/criteria";
import type { LifetimeStatsData, TriageSettings } from "../types/settings";
import type { SortOrderKind } from "../types/sort";

const MAX_SEED = 2147483646;

function toFilterMode(raw: unknown): FilterMode {
  if (raw === "all" || raw === "camera-only" || raw === "exclude-camera" || raw === "custom") return raw;
  return DEFAULT_SETTINGS.filter.mode;
}

function toSortOrderKind(raw: unknown): SortOrderKind {
  if (raw === "date-desc" || raw === "date-asc" || raw === "random") return raw;
  return DEFAULT_SETTINGS.sorting.order;
}

function toTimestamp(raw: unknown): number | null {
  if (typeof raw !== "number" || !Number.isFinite(raw)) return null;
  return Math.floor(raw);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = raw[key];
  return isPlainObject(v) ? v : {};
}

export function normaliseSessionFilter(raw: unknown): SessionFilter | null {
  if (!isPlainObject(raw)) return null;

  const albumIds = cleanStringArray(raw.albumIds);
  const photoIds = cleanStringArray(raw.photoIds);
  const startDate = toTimestamp(raw.startDate);
  const endDate = toTimestamp(raw.endDate);

  if (!albumIds.length && !photoIds.length && startDate === null && endDate === null) return null;

  return {
    albumIds: albumIds.length ? albumIds : null,
    startDate,
    endDate,
    preciseMode: raw.preciseMode === true,
    photoIds: photoIds.length ? photoIds : null,
  };
}

export function normaliseSettings(raw: unknown): TriageSettings {
  const root = isPlainObject(raw) ? raw : {};
  const d = DEFAULT_SETTINGS;

  const filter = section(root, "filter");
  const sorting = section(root, "sorting");
  const session = section(root, "session");
  const combo = section(root, "combo");
  const undo = section(root, "undo");

  const pageSize = clampInt(session.pageSize, 1, 5000, d.session.pageSize);

  return {
    filter: {
      mode: toFilterMode(filter.mode),
      cameraBucketIds: cleanStringArray(filter.cameraBucketIds),
      sessionFilter: normaliseSessionFilter(filter.sessionFilter),
    },
    sorting: {
      order: toSortOrderKind(sorting.order),
      randomSeed: clampInt(sorting.randomSeed, 0, MAX_SEED, d.sorting.randomSeed),
    },
    session: {
      pageSize,
      // Preloading more than a page ahead would fetch on every action.
      preloadThreshold: clampInt(session.preloadThreshold, 0, pageSize, Math.min(d.session.preloadThreshold, pageSize)),
      windowedThreshold: clampInt(session.windowedThreshold, 1, 10_000_000, d.session.windowedThreshold),
      loadMoreDebounceMs: clampInt(session.loadMoreDebounceMs, 0, 5000, d.session.loadMoreDebounceMs),
      maxPageRetries: clampInt(session.maxPageRetries, 1, 20, d.session.maxPageRetries),
    },
    combo: {
      windowMs: clampInt(combo.windowMs, 100, 10_000, d.combo.windowMs),
      resetDelayMs: clampInt(combo.resetDelayMs, 0, 5000, d.combo.resetDelayMs),
    },
    undo: {
      depth: clampInt(undo.depth, 1, 100, d.undo.depth),
    },
  };
}

export function normaliseStats(raw: unknown): LifetimeStatsData {
  const s = isPlainObject(raw) ? raw : {};
  const count = (v: unknown) => clampInt(v, 0, Number.MAX_SAFE_INTEGER, 0);
  return {
    totalSorted: count(s.totalSorted),
    keep: count(s.keep),
    trash: count(s.trash),
    maybe: count(s.maybe),
    maxCombo: count(s.maxCombo),
  };
}
