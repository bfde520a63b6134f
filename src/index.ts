/**
 * @file src/index.ts
 * @summary Public entry point: the engine, its collaborators, and the shared types.
 */

export { TriageEngine, type TriageEngineOptions } from "./engine/triage-engine";
export { createTriageStateStore, initialTriageState, type TriageStateStore } from "./engine/triage-state";
export { ActionProcessor, SessionTally, type ActionProcessorDeps } from "./engine/action-processor";
export { CountStabilizer } from "./engine/count-stabilizer";
export { RemovalTracker } from "./engine/removal-tracker";
export { StreakTracker, comboLevel, type StreakTrackerOptions } from "./engine/streak-tracker";
export { UndoStack, describeUndo } from "./engine/undo-stack";
export { WriteQueue } from "./engine/write-queue";

export { resolveCriteria, criteriaKey, EMPTY_CRITERIA } from "./criteria/criteria-resolver";
export { matchesCriteria } from "./criteria/criteria-match";

export { selectStrategy, type StrategyDecision } from "./session/strategy";
export { SnapshotSession, orderIds } from "./session/snapshot-session";
export { WindowedSession, effectiveOffset } from "./session/windowed-session";
export { seededShuffle, mulberry32, freshSeed } from "./session/shuffle";
export type { PageSession } from "./session/session";

export {
  TriageSettingsStore,
  FileSettingsAdapter,
  MemorySettingsAdapter,
  type SettingsAdapter,
} from "./settings/settings-store";
export { normaliseSettings, normaliseSessionFilter, normaliseStats } from "./settings/settings-normalisation";
export { LifetimeStats } from "./stats/lifetime-stats";

export { SqlRecordStore, getSqlJs } from "./store/sql-record-store";

export { TriageError, type TriageErrorCode } from "./core/errors";
export { log, type LogLevel } from "./core/logger";
export { DEFAULT_SETTINGS } from "./core/default-settings";

export type * from "./types";
