// src/types/index.ts
// ---------------------------------------------------------------------------
// Barrel re-export - import any shared type from "types" or "types/index".
// Organised by domain: photo → criteria → sort → store → engine → settings.
// ---------------------------------------------------------------------------

export type { PhotoStatus, ClassifiedStatus, PhotoRecord } from "./photo";
export type {
  FilterMode,
  SessionFilter,
  InPageFilter,
  Criteria,
  CriteriaInputs,
  SortAnchor,
} from "./criteria";
export type { SortOrder, SortOrderKind } from "./sort";
export type { RecordStore } from "./store";
export type {
  SessionStrategy,
  SessionCounters,
  ComboLevel,
  ComboState,
  UndoEntry,
  TelemetryEvent,
  TriageEffects,
  TriageState,
} from "./engine";
export type { TriageSettings, LifetimeStatsData } from "./settings";
