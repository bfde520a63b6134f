/**
 * @file src/engine/triage-state.ts
 * @summary Observable state container for the engine, a zustand vanilla store holding
 * immutable TriageState snapshots. The engine is the only writer; the UI subscribes.
 *
 * @exports
 *   - TriageStateStore - zustand StoreApi over TriageState
 *   - initialTriageState - fresh state for a new engine
 *   - createTriageStateStore - build the store
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { TriageState } from "../types/engine";
import type { SortOrder } from "../types/sort";

export type TriageStateStore = StoreApi<TriageState>;

export function initialTriageState(sortOrder: SortOrder): TriageState {
  return {
    photos: [],
    totalCount: 0,
    sortedCount: 0,
    counters: { keep: 0, trash: 0, maybe: 0 },
    sortedCountImmediate: 0,
    combo: { count: 0, maxCount: 0, lastActionAt: 0, active: false },
    comboLevel: "none",
    canUndo: false,
    lastUndo: null,
    isLoading: false,
    isReloading: false,
    isLoadingMore: false,
    hasMore: false,
    error: null,
    strategy: null,
    sortOrder,
    progress: 0,
    dailyTaskTarget: null,
    isDailyTaskComplete: false,
  };
}

export function createTriageStateStore(sortOrder: SortOrder): TriageStateStore {
  return createStore<TriageState>()(() => initialTriageState(sortOrder));
}
