/**
 * @file src/engine/action-processor.ts
 * @summary Applies classifications optimistically and reconciles them with the store.
 * Every action first updates in-memory state synchronously (removal tracker, session
 * counters, streak, undo entry) and then enqueues the durable write. A failed write
 * reverses exactly what the action applied; a successful one notifies the side-effect
 * collaborators without awaiting them. Undo goes through the same write queue so it
 * always lands after the write it reverses.
 *
 * @exports
 *   - SessionTally - per-session counters plus the immediate counter
 *   - ActionProcessorDeps - collaborators and callbacks
 *   - ActionProcessor - classify / classifyBatch / undo
 */

import { TriageError } from "../core/errors";
import { log } from "../core/logger";
import type { SessionCounters, TelemetryEvent, TriageEffects, UndoEntry } from "../types/engine";
import type { ClassifiedStatus, PhotoStatus } from "../types/photo";
import type { RecordStore } from "../types/store";
import type { RemovalTracker } from "./removal-tracker";
import type { StreakTracker } from "./streak-tracker";
import type { UndoStack } from "./undo-stack";
import type { WriteQueue } from "./write-queue";

export class SessionTally {
  counters: SessionCounters = { keep: 0, trash: 0, maybe: 0 };
  immediate = 0;

  get sorted(): number {
    return this.counters.keep + this.counters.trash + this.counters.maybe;
  }

  add(status: ClassifiedStatus, n: number): void {
    this.counters = { ...this.counters, [status]: this.counters[status] + n };
    this.immediate += n;
  }

  /** Floors at zero. */
  subtract(status: ClassifiedStatus, n: number): void {
    this.counters = { ...this.counters, [status]: Math.max(0, this.counters[status] - n) };
    this.immediate = Math.max(0, this.immediate - n);
  }

  reset(): void {
    this.counters = { keep: 0, trash: 0, maybe: 0 };
    this.immediate = 0;
  }
}

export type ActionProcessorDeps = {
  store: RecordStore;
  removals: RemovalTracker;
  streak: StreakTracker;
  undo: UndoStack;
  queue: WriteQueue;
  tally: SessionTally;
  effects: TriageEffects;
  /** Current session generation. */
  generation: () => number;
  /** Status of a loaded record, if the engine holds it. */
  knownStatus: (id: string) => PhotoStatus | undefined;
  /** In-memory state changed; publish a new snapshot. */
  onChange: () => void;
  onError: (err: TriageError) => void;
  now?: () => number;
};

function fireEffect(label: string, fn: () => void | Promise<void>): void {
  void Promise.resolve()
    .then(fn)
    .catch((e: unknown) => log.swallow(label, e));
}

export class ActionProcessor {
  private readonly now: () => number;
  // Entries whose write failed after undo() had already popped them.
  private rolledBack = new WeakSet<UndoEntry>();

  constructor(private deps: ActionProcessorDeps) {
    this.now = deps.now ?? Date.now;
  }

  /** Classify one record. Returns the combo count produced by this action. */
  classify(id: string, status: ClassifiedStatus): number {
    const { removals, streak } = this.deps;
    if (!id) return 0;
    if (removals.has(id)) return streak.count;

    const known = this.deps.knownStatus(id);
    const entry = this.apply([id], status, "single", { [id]: known ?? "unsorted" });
    const combo = this.deps.streak.count;

    const { store, queue } = this.deps;
    void queue
      .enqueue(async () => {
        if (known === undefined && store.getStatus) {
          entry.previousStatus[id] = (await store.getStatus(id)) ?? "unsorted";
        }
        await store.setStatus(id, status);
      })
      .then(
        () => this.confirmed(entry, combo),
        (err: unknown) => this.rollback(entry, err),
      );

    return combo;
  }

  /**
   * Classify several records as one action: one undo entry and a single batched write.
   * Ids already removed, empty ids and duplicates are skipped. A failed write rolls
   * back every id in the batch.
   */
  classifyBatch(ids: readonly string[], status: ClassifiedStatus): number {
    const { removals, streak } = this.deps;
    const fresh: string[] = [];
    const seen = new Set<string>();
    for (const id of ids) {
      if (!id || seen.has(id) || removals.has(id)) continue;
      seen.add(id);
      fresh.push(id);
    }
    if (!fresh.length) return streak.count;

    const previous: Record<string, PhotoStatus> = {};
    const unknown: string[] = [];
    for (const id of fresh) {
      const known = this.deps.knownStatus(id);
      if (known === undefined) unknown.push(id);
      previous[id] = known ?? "unsorted";
    }

    const entry = this.apply(fresh, status, "batch", previous);
    const combo = streak.count;

    const { store, queue } = this.deps;
    void queue
      .enqueue(async () => {
        if (store.getStatus) {
          for (const id of unknown) entry.previousStatus[id] = (await store.getStatus(id)) ?? "unsorted";
        }
        await store.setStatusBatch(fresh, status);
      })
      .then(
        () => this.confirmed(entry, combo),
        (err: unknown) => this.rollback(entry, err),
      );

    return combo;
  }

  /**
   * Reverse the most recent action: restore each id's previous status in the store, then
   * make the ids visible again and take them off the session counters. No new undo entry
   * is recorded and lifetime counters are untouched. A failed write puts the entry back
   * beneath any action recorded while the undo was in flight.
   */
  async undo(): Promise<UndoEntry | null> {
    const { undo, queue, store } = this.deps;
    const entry = undo.pop();
    if (!entry) return null;
    this.deps.onChange();

    try {
      await queue.enqueue(async () => {
        for (const [status, ids] of groupByStatus(entry)) {
          if (ids.length === 1) await store.setStatus(ids[0], status);
          else await store.setStatusBatch(ids, status);
        }
      });
    } catch (err) {
      const error = new TriageError("undo-failed", err);
      log.error(error);
      if (!this.rolledBack.has(entry)) undo.restore(entry);
      this.deps.onError(error);
      this.deps.onChange();
      return null;
    }

    if (entry.generation === this.deps.generation() && !this.rolledBack.has(entry)) {
      this.deps.removals.deleteAll(entry.ids);
      this.deps.tally.subtract(entry.newStatus, entry.ids.length);
    }
    fireEffect("record undo telemetry", () =>
      this.deps.effects.recordTelemetry?.({
        kind: "undo",
        status: entry.newStatus,
        count: entry.ids.length,
        at: this.now(),
      }),
    );
    this.deps.onChange();
    return entry;
  }

  // Synchronous optimistic half of an action.
  private apply(
    ids: string[],
    status: ClassifiedStatus,
    kind: UndoEntry["kind"],
    previousStatus: Record<string, PhotoStatus>,
  ): UndoEntry {
    const at = this.now();
    this.deps.removals.addAll(ids);
    this.deps.tally.add(status, ids.length);
    this.deps.streak.registerAction(at);

    const entry: UndoEntry = {
      kind,
      ids,
      previousStatus,
      newStatus: status,
      at,
      generation: this.deps.generation(),
    };
    this.deps.undo.push(entry);
    this.deps.onChange();
    return entry;
  }

  private confirmed(entry: UndoEntry, combo: number): void {
    const { effects } = this.deps;
    const n = entry.ids.length;
    const maxCombo = this.deps.streak.maxCount;
    const event: TelemetryEvent = { kind: "classify", status: entry.newStatus, count: n, at: entry.at, combo };

    fireEffect("lifetime counters", () => effects.onClassified?.(entry.newStatus, n));
    fireEffect("max combo", () => effects.onMaxCombo?.(maxCombo));
    fireEffect("record telemetry", () => effects.recordTelemetry?.(event));
    fireEffect("refresh widgets", () => effects.refreshWidgets?.());
  }

  // A superseded session's state is gone; only the error is still reported.
  private rollback(entry: UndoEntry, err: unknown): void {
    const error = new TriageError("write-failed", err);
    log.error(error);
    this.rolledBack.add(entry);
    this.deps.undo.remove(entry);

    if (entry.generation === this.deps.generation()) {
      this.deps.removals.deleteAll(entry.ids);
      this.deps.tally.subtract(entry.newStatus, entry.ids.length);
    }
    this.deps.onError(error);
    this.deps.onChange();
  }
}

function groupByStatus(entry: UndoEntry): Array<[PhotoStatus, string[]]> {
  const groups = new Map<PhotoStatus, string[]>();
  for (const id of entry.ids) {
    const status = entry.previousStatus[id] ?? "unsorted";
    const list = groups.get(status);
    if (list) list.push(id);
    else groups.set(status, [id]);
  }
  return Array.from(groups.entries());
}
