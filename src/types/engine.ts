/**
 * @file src/types/engine.ts
 * @summary Types shared by the classification engine and the UI layer that observes it:
 * per-session counters, combo state, undo entries, side-effect collaborators, and the
 * immutable state snapshot published to subscribers.
 *
 * @exports
 *   - SessionStrategy - "snapshot" | "windowed"
 *   - SessionCounters - per-status counts for the current session
 *   - ComboLevel - visual intensity bucket for a combo count
 *   - ComboState - rapid-action streak state
 *   - UndoEntry - one reversible classification (single or batch)
 *   - TelemetryEvent - event passed to the telemetry collaborator
 *   - TriageEffects - fire-and-forget side-effect collaborators
 *   - TriageState - UI-facing aggregate
 */

import type { PhotoRecord, ClassifiedStatus, PhotoStatus } from "./photo";
import type { SortOrder } from "./sort";

export type SessionStrategy = "snapshot" | "windowed";

export type SessionCounters = {
  keep: number;
  trash: number;
  maybe: number;
};

export type ComboLevel = "none" | "normal" | "warm" | "hot" | "fire";

export type ComboState = {
  count: number;
  maxCount: number;
  /** Epoch ms of the last registered action; 0 when none. */
  lastActionAt: number;
  active: boolean;
};

export type UndoEntry = {
  kind: "single" | "batch";
  ids: string[];
  previousStatus: Record<string, PhotoStatus>;
  newStatus: ClassifiedStatus;
  at: number;
  /** Session generation the entry was recorded in. */
  generation: number;
};

export type TelemetryEvent =
  | { kind: "classify"; status: ClassifiedStatus; count: number; at: number; combo: number }
  | { kind: "undo"; status: ClassifiedStatus; count: number; at: number };

export type TriageEffects = {
  onClassified?(status: ClassifiedStatus, count: number): void | Promise<void>;
  onMaxCombo?(maxCombo: number): void | Promise<void>;
  recordTelemetry?(event: TelemetryEvent): void | Promise<void>;
  refreshWidgets?(): void | Promise<void>;
};

export type TriageState = {
  /** Visible projection: loaded photos minus locally removed ones. */
  photos: PhotoRecord[];
  totalCount: number;
  sortedCount: number;
  counters: SessionCounters;
  /** Incremented synchronously on every action, for display-latency hiding. */
  sortedCountImmediate: number;
  combo: ComboState;
  comboLevel: ComboLevel;
  canUndo: boolean;
  lastUndo: UndoEntry | null;
  isLoading: boolean;
  isReloading: boolean;
  isLoadingMore: boolean;
  hasMore: boolean;
  error: string | null;
  strategy: SessionStrategy | null;
  sortOrder: SortOrder;
  progress: number;
  dailyTaskTarget: number | null;
  isDailyTaskComplete: boolean;
};
