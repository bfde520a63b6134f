/**
 * @file src/engine/triage-engine.ts
 * @summary The classification engine. Owns the current pagination session and every
 * piece of mutable session state (loaded records, removal tracker, counters, streak,
 * undo stack, count stabilizer) and publishes immutable snapshots to a zustand store
 * after each change.
 *
 * A session is built from the resolved criteria and sort order and replaced wholesale
 * whenever either changes. Each rebuild bumps a generation number and aborts the
 * previous build's fetches; any result carrying an older generation is discarded.
 * "Load more" triggers are debounced and page failures are retried silently up to
 * `session.maxPageRetries` times before being surfaced.
 *
 * @exports
 *   - TriageEngineOptions - construction options
 *   - TriageEngine - the engine
 */

import { TriageError } from "../core/errors";
import { log } from "../core/logger";
import { resolveCriteria } from "../criteria/criteria-resolver";
import type { TriageSettingsStore } from "../settings/settings-store";
import type { PageSession } from "../session/session";
import { SnapshotSession } from "../session/snapshot-session";
import { freshSeed } from "../session/shuffle";
import { selectStrategy } from "../session/strategy";
import { WindowedSession } from "../session/windowed-session";
import type { Criteria, FilterMode, InPageFilter, SessionFilter, SortAnchor } from "../types/criteria";
import type { TriageEffects, TriageState, UndoEntry } from "../types/engine";
import type { ClassifiedStatus, PhotoRecord } from "../types/photo";
import type { SortOrder } from "../types/sort";
import type { RecordStore } from "../types/store";
import { ActionProcessor, SessionTally } from "./action-processor";
import { CountStabilizer } from "./count-stabilizer";
import { RemovalTracker } from "./removal-tracker";
import { StreakTracker, comboLevel } from "./streak-tracker";
import { createTriageStateStore, type TriageStateStore } from "./triage-state";
import { UndoStack } from "./undo-stack";
import { WriteQueue } from "./write-queue";

export type TriageEngineOptions = {
  store: RecordStore;
  settings: TriageSettingsStore;
  effects?: TriageEffects;
  now?: () => number;
};

export class TriageEngine {
  readonly state: TriageStateStore;

  private store: RecordStore;
  private settings: TriageSettingsStore;

  private session: PageSession | null = null;
  private loaded: PhotoRecord[] = [];
  private loadedById = new Map<string, PhotoRecord>();
  private page = 0;
  private hasMore = false;
  private loadingMore = false;
  private pageFailures = 0;
  private rawCount = 0;

  private generation = 0;
  private abort: AbortController | null = null;
  private loadMoreTimer: ReturnType<typeof setTimeout> | null = null;

  private sort: SortOrder;
  private inPageFilter: InPageFilter | null = null;
  private startAt: SortAnchor | null = null;
  private dailyTarget: number | null = null;

  private removals = new RemovalTracker();
  private tally = new SessionTally();
  private stabilizer = new CountStabilizer();
  private queue = new WriteQueue();
  private undoStack: UndoStack;
  private streak: StreakTracker;
  private processor: ActionProcessor;

  constructor(opts: TriageEngineOptions) {
    this.store = opts.store;
    this.settings = opts.settings;
    this.sort = opts.settings.sortOrder;
    this.state = createTriageStateStore(this.sort);

    const cfg = opts.settings.settings;
    this.undoStack = new UndoStack(cfg.undo.depth);
    this.streak = new StreakTracker({
      windowMs: cfg.combo.windowMs,
      resetDelayMs: cfg.combo.resetDelayMs,
      now: opts.now,
      onChange: (combo) => this.state.setState({ combo, comboLevel: comboLevel(combo.count) }),
    });

    this.processor = new ActionProcessor({
      store: this.store,
      removals: this.removals,
      streak: this.streak,
      undo: this.undoStack,
      queue: this.queue,
      tally: this.tally,
      effects: opts.effects ?? {},
      generation: () => this.generation,
      knownStatus: (id) => this.loadedById.get(id)?.status,
      onChange: () => this.publish(),
      onError: (err) => this.state.setState({ error: err.userMessage }),
      now: opts.now,
    });
  }

  // ── Accessors ─────────────────────────────────────────────────────

  get snapshot(): TriageState {
    return this.state.getState();
  }

  subscribe(listener: (state: TriageState, prev: TriageState) => void): () => void {
    return this.state.subscribe(listener);
  }

  /** Criteria of the current session, if one is built. */
  get criteria(): Criteria | null {
    return this.session?.criteria ?? null;
  }

  // ── Session lifecycle ─────────────────────────────────────────────

  /**
   * Rebuild the session from current settings. Supersedes any build or page fetch in
   * flight. Queued writes are drained first so the new session never shows a record
   * whose classification has not landed yet.
   */
  async reload(): Promise<void> {
    const gen = ++this.generation;
    this.abort?.abort();
    const controller = new AbortController();
    this.abort = controller;
    this.cancelLoadMore();

    const hadSession = this.session !== null;
    this.resetSessionState();
    this.publish({ isLoading: true, isReloading: hadSession, error: null });

    const cfg = this.settings.settings.session;
    const criteria = resolveCriteria({
      filterMode: this.settings.filterMode,
      cameraBucketIds: this.settings.cameraBucketIds,
      sessionFilter: this.settings.sessionFilter,
      inPageFilter: this.inPageFilter,
      startAt: this.startAt,
    });
    const sort = this.sort;

    try {
      await this.queue.idle();
      controller.signal.throwIfAborted();

      const { strategy, count } = await selectStrategy(this.store, criteria, cfg.windowedThreshold);
      controller.signal.throwIfAborted();

      const session: PageSession =
        strategy === "snapshot"
          ? await SnapshotSession.build(this.store, criteria, sort, cfg.pageSize, controller.signal)
          : new WindowedSession(this.store, criteria, sort, cfg.pageSize);

      const first = await session.loadPage(0, 0, controller.signal);
      if (gen !== this.generation) return;

      this.session = session;
      this.page = 0;
      this.append(first);
      this.hasMore = session.hasMoreAfter(0, first.length);
      this.rawCount = count;
      log.debug(`session ${gen} ready: ${strategy}, ${count} unsorted, ${first.length} loaded`);
      this.publish({ isLoading: false, isReloading: false });
    } catch (e) {
      if (gen !== this.generation) return;
      const error = new TriageError("reload-failed", e);
      log.error(error);
      this.publish({ isLoading: false, isReloading: false, error: error.userMessage });
    }
  }

  /**
   * Schedule a page fetch when few visible photos remain past `visibleIndex`.
   * Calls within the debounce window coalesce into one fetch.
   */
  loadMoreIfNeeded(visibleIndex = 0): void {
    if (!this.session || !this.hasMore) return;
    const cfg = this.settings.settings.session;
    const remaining = this.removals.project(this.loaded).length - Math.max(0, visibleIndex);
    if (remaining > cfg.preloadThreshold) return;

    this.cancelLoadMore();
    this.loadMoreTimer = setTimeout(() => {
      this.loadMoreTimer = null;
      void this.loadMore();
    }, cfg.loadMoreDebounceMs);
  }

  /** Fetch the next page now. Failures are counted, not thrown. */
  async loadMore(): Promise<void> {
    const session = this.session;
    if (!session || !this.hasMore || this.loadingMore) return;

    const gen = this.generation;
    const signal = this.abort?.signal;
    const nextPage = ++this.page;
    this.loadingMore = true;
    this.publish();

    let records: PhotoRecord[];
    try {
      // Windowed offsets assume local removals have reached the store. Only loaded
      // records sit before the window; other removals do not shift it.
      if (session.kind === "windowed") await this.queue.idle();
      records = await session.loadPage(nextPage, this.removals.countIn(this.loadedById), signal);
    } catch (e) {
      if (gen !== this.generation) return;
      this.page--;
      this.loadingMore = false;
      this.pageFailures++;

      const maxRetries = this.settings.settings.session.maxPageRetries;
      if (this.pageFailures >= maxRetries) {
        const error = new TriageError("page-failed", e);
        log.error(error);
        this.pageFailures = 0;
        this.publish({ error: error.userMessage });
      } else {
        log.warn(`page ${nextPage} failed (${this.pageFailures}/${maxRetries}), will retry`, e);
        this.publish();
      }
      return;
    }
    if (gen !== this.generation) return;

    this.pageFailures = 0;
    const added = this.append(records);
    if (added < records.length) {
      log.debug(`page ${nextPage}: dropped ${records.length - added} already-loaded records`);
    }
    this.hasMore = session.hasMoreAfter(nextPage, records.length);
    this.loadingMore = false;
    this.publish();
  }

  // ── Actions ───────────────────────────────────────────────────────

  /** Classify one photo. Returns the combo count for immediate feedback. */
  classify(id: string, status: ClassifiedStatus): number {
    const combo = this.processor.classify(id, status);
    this.loadMoreIfNeeded();
    return combo;
  }

  classifyBatch(ids: readonly string[], status: ClassifiedStatus): number {
    const combo = this.processor.classifyBatch(ids, status);
    this.loadMoreIfNeeded();
    return combo;
  }

  /** Reverse the most recent action. Resolves to the undone entry, or null. */
  undo(): Promise<UndoEntry | null> {
    return this.processor.undo();
  }

  clearError(): void {
    this.state.setState({ error: null });
  }

  /** Resolves once every queued store write has settled. */
  whenIdle(): Promise<void> {
    return this.queue.idle();
  }

  // ── Sort order ────────────────────────────────────────────────────

  async setSortOrder(sort: SortOrder): Promise<void> {
    this.sort = sort;
    await this.settings.setSortOrder(sort);
    await this.reload();
  }

  /** Newest first → oldest first → random (new seed) → newest first. */
  async cycleSortOrder(): Promise<void> {
    const next: SortOrder =
      this.sort.kind === "date-desc"
        ? { kind: "date-asc" }
        : this.sort.kind === "date-asc"
          ? { kind: "random", seed: freshSeed() }
          : { kind: "date-desc" };
    await this.setSortOrder(next);
  }

  /** Switch to random order with a fresh seed. */
  async reshuffle(seed: number = freshSeed()): Promise<void> {
    await this.setSortOrder({ kind: "random", seed });
  }

  // ── Filters ───────────────────────────────────────────────────────

  async setFilterMode(mode: FilterMode): Promise<void> {
    this.startAt = null;
    await this.settings.setFilterMode(mode);
    await this.reload();
  }

  async setInPageFilter(filter: InPageFilter | null): Promise<void> {
    this.inPageFilter = filter;
    this.startAt = null;
    await this.reload();
  }

  async setSessionFilter(filter: SessionFilter | null): Promise<void> {
    this.startAt = null;
    await this.settings.setSessionFilter(filter);
    await this.reload();
  }

  async clearSessionFilter(): Promise<void> {
    await this.setSessionFilter(null);
  }

  /**
   * Restrict the session to `id` and every photo after it in the current order.
   * A snapshot writes the remaining ids as a precise allow-list. A windowed session
   * keeps its criteria and adds a start-position anchor, so photos not loaded yet
   * stay in the session. Returns false when the photo is not part of the session.
   */
  async startFromItem(id: string): Promise<boolean> {
    const session = this.session;
    if (!session || this.removals.has(id)) return false;

    if (session instanceof SnapshotSession) {
      const i = session.ids.indexOf(id);
      if (i < 0) return false;
      const ids = session.ids.slice(i).filter((x) => !this.removals.has(x));
      await this.setSessionFilter({ photoIds: ids, preciseMode: true });
      return true;
    }

    const record = this.loadedById.get(id);
    if (!record) return false;
    this.startAt = { id, takenAt: record.takenAt, sort: session.sort };
    await this.reload();
    return true;
  }

  // ── Daily task ────────────────────────────────────────────────────

  /** Cap the visible list so the session ends after `target` classifications. */
  setDailyTarget(target: number | null): void {
    this.dailyTarget = target === null || !Number.isFinite(target) ? null : Math.max(0, Math.floor(target));
    this.publish();
  }

  // ── Teardown ──────────────────────────────────────────────────────

  /**
   * Stop timers and fetches, let queued writes land, and drop a precise session
   * filter or start anchor so it does not outlive this session.
   */
  async dispose(): Promise<void> {
    this.generation++;
    this.startAt = null;
    this.abort?.abort();
    this.abort = null;
    this.cancelLoadMore();
    this.streak.dispose();
    await this.queue.idle();

    if (this.settings.sessionFilter?.preciseMode) {
      await this.settings.clearSessionFilter();
    }
  }

  // ── Internals ─────────────────────────────────────────────────────

  private resetSessionState(): void {
    this.session = null;
    this.loaded = [];
    this.loadedById.clear();
    this.page = 0;
    this.hasMore = false;
    this.loadingMore = false;
    this.pageFailures = 0;
    this.rawCount = 0;
    this.removals.clear();
    this.tally.reset();
    this.streak.reset();
    this.undoStack.clear();
    this.stabilizer.reset();
  }

  /** Append records not already loaded; returns how many were added. */
  private append(records: readonly PhotoRecord[]): number {
    let added = 0;
    for (const r of records) {
      if (this.loadedById.has(r.id)) continue;
      this.loadedById.set(r.id, r);
      this.loaded.push(r);
      added++;
    }
    return added;
  }

  private cancelLoadMore(): void {
    if (this.loadMoreTimer !== null) {
      clearTimeout(this.loadMoreTimer);
      this.loadMoreTimer = null;
    }
  }

  private publish(patch: Partial<TriageState> = {}): void {
    const visible = this.removals.project(this.loaded);
    const sortedCount = this.tally.sorted;
    const totalCount = this.stabilizer.observe(this.rawCount, sortedCount);
    const target = this.dailyTarget;
    const combo = this.streak.snapshot;

    this.state.setState({
      photos: target === null ? visible : visible.slice(0, Math.max(0, target - sortedCount)),
      totalCount,
      sortedCount,
      counters: this.tally.counters,
      sortedCountImmediate: this.tally.immediate,
      combo,
      comboLevel: comboLevel(combo.count),
      canUndo: this.undoStack.canUndo,
      lastUndo: this.undoStack.peek(),
      hasMore: this.hasMore,
      isLoadingMore: this.loadingMore,
      strategy: this.session?.kind ?? null,
      sortOrder: this.sort,
      progress: totalCount > 0 ? sortedCount / totalCount : 0,
      dailyTaskTarget: target,
      isDailyTaskComplete: target !== null && sortedCount >= target,
      ...patch,
    });
  }
}
