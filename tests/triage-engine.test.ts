// tests/triage-engine.test.ts
// ---------------------------------------------------------------------------
// Tests for src/engine/triage-engine.ts - session lifecycle, paging under
// classification, rebuild cancellation, debounced load-more, and the
// sort / filter / daily-task controls.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, afterEach } from "vitest";
import { EMPTY_CRITERIA } from "../src/criteria/criteria-resolver";
import { TriageEngine } from "../src/engine/triage-engine";
import { orderIds } from "../src/session/snapshot-session";
import { MemorySettingsAdapter, TriageSettingsStore } from "../src/settings/settings-store";
import type { PhotoRecord } from "../src/types/photo";
import { MemoryRecordStore, makePhotos } from "./helpers/memory-record-store";

// ── Helpers ─────────────────────────────────────────────────────────────────

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

const engines: TriageEngine[] = [];

afterEach(async () => {
  for (const e of engines.splice(0)) await e.dispose();
});

type SetupOptions = {
  records?: PhotoRecord[];
  session?: Record<string, number>;
  filter?: Record<string, unknown>;
};

async function setup(opts: SetupOptions = {}) {
  const store = new MemoryRecordStore(opts.records ?? makePhotos(30));
  const adapter = new MemorySettingsAdapter({
    settings: {
      filter: opts.filter ?? {},
      session: {
        pageSize: 10,
        preloadThreshold: 2,
        windowedThreshold: 100,
        loadMoreDebounceMs: 50,
        maxPageRetries: 3,
        ...opts.session,
      },
    },
  });
  const settings = new TriageSettingsStore(adapter);
  await settings.load();

  let clock = 50_000;
  const engine = new TriageEngine({ store, settings, now: () => clock });
  engines.push(engine);

  return {
    store,
    adapter,
    settings,
    engine,
    tick: (ms: number) => {
      clock += ms;
    },
    ids: () => engine.snapshot.photos.map((p) => p.id),
  };
}

function range(from: number, to: number): string[] {
  const out: string[] = [];
  const step = from <= to ? 1 : -1;
  for (let i = from; step > 0 ? i <= to : i >= to; i += step) out.push(`p${String(i).padStart(2, "0")}`);
  return out;
}

// ── Session lifecycle ───────────────────────────────────────────────────────

describe("TriageEngine - reload", () => {
  it("builds a snapshot session and publishes the first page", async () => {
    const t = await setup();
    await t.engine.reload();
    const s = t.engine.snapshot;
    expect(s.strategy).toBe("snapshot");
    expect(t.ids()).toEqual(range(30, 21));
    expect(s.totalCount).toBe(30);
    expect(s.hasMore).toBe(true);
    expect(s.isLoading).toBe(false);
    expect(s.progress).toBe(0);
  });

  it("flags a rebuild of an existing session as reloading", async () => {
    const t = await setup();
    await t.engine.reload();
    const seen: boolean[] = [];
    t.engine.subscribe((s) => seen.push(s.isReloading));
    await t.engine.reload();
    expect(seen).toContain(true);
    expect(t.engine.snapshot.isReloading).toBe(false);
  });

  it("surfaces a count failure as a reload error", async () => {
    const t = await setup();
    t.store.failCount = true;
    await t.engine.reload();
    expect(t.engine.snapshot.error).toBe("Could not load photos");
    expect(t.engine.snapshot.isLoading).toBe(false);
    expect(t.engine.snapshot.strategy).toBeNull();
  });

  it("discards a rebuild superseded while it was counting", async () => {
    const records: PhotoRecord[] = [
      ...["c1", "c2", "c3", "c4", "c5", "c6"].map((id, i) => ({ id, bucketId: "cam", takenAt: i, status: "unsorted" as const })),
      ...["o1", "o2", "o3", "o4"].map((id, i) => ({ id, bucketId: "other", takenAt: 100 + i, status: "unsorted" as const })),
    ];
    const t = await setup({ records });
    const release = t.store.holdCounts();

    const first = t.engine.reload();
    await vi.waitFor(() => expect(t.store.countCalls).toBe(1));
    const second = t.engine.setInPageFilter({ albumIds: ["other"] });
    release();
    await Promise.all([first, second]);

    expect(t.ids()).toEqual(["o4", "o3", "o2", "o1"]);
    expect(t.store.countCalls).toBe(2);
    expect(t.store.allIdsCalls).toBe(1);
    expect(t.engine.snapshot.error).toBeNull();
  });

  it("cancels a page fetch in flight and never appends its records", async () => {
    const t = await setup();
    await t.engine.reload();
    const release = t.store.holdReads();

    const more = t.engine.loadMore();
    expect(t.engine.snapshot.isLoadingMore).toBe(true);
    const again = t.engine.reload();
    expect(t.engine.snapshot.isLoadingMore).toBe(false);
    release();
    await Promise.all([more, again]);

    expect(t.store.byIdsCalls).toBe(3);
    expect(t.ids()).toEqual(range(30, 21));
    expect(t.engine.snapshot.isLoadingMore).toBe(false);
    expect(t.engine.snapshot.hasMore).toBe(true);

    // The next fetch is page 1 of the new session.
    await t.engine.loadMore();
    expect(t.ids()).toEqual(range(30, 11));
  });
});

// ── Paging ──────────────────────────────────────────────────────────────────

describe("TriageEngine - paging", () => {
  it("windowed: the page after 5 classifications is fetched at offset 15", async () => {
    const t = await setup({ session: { pageSize: 20, windowedThreshold: 20 } });
    await t.engine.reload();
    expect(t.engine.snapshot.strategy).toBe("windowed");

    for (const id of range(30, 26)) t.engine.classify(id, "trash");
    await t.engine.loadMore();

    expect(t.store.pageCalls).toEqual([
      { limit: 20, offset: 0 },
      { limit: 20, offset: 15 },
    ]);
    expect(t.ids()).toEqual(range(25, 1));
    expect(t.engine.snapshot.hasMore).toBe(false);
  });

  it("windowed: removals outside the loaded window do not shift the offset", async () => {
    const t = await setup({ session: { pageSize: 5, windowedThreshold: 5 } });
    await t.engine.reload();

    t.engine.classify("p10", "trash");
    t.engine.classify("p29", "trash");
    await t.engine.loadMore();

    expect(t.store.pageCalls).toEqual([
      { limit: 5, offset: 0 },
      { limit: 5, offset: 4 },
    ]);
    expect(t.ids()).toEqual(["p30", ...range(28, 21)]);
  });

  it("never loads an id twice across classify, undo and load-more", async () => {
    const t = await setup({ records: makePhotos(23), session: { pageSize: 5, windowedThreshold: 1, preloadThreshold: 1 } });
    await t.engine.reload();

    t.engine.classify("p23", "trash");
    t.tick(10);
    t.engine.classify("p22", "trash");
    await t.engine.undo();
    t.tick(10);
    t.engine.classify("p21", "keep");
    while (t.engine.snapshot.hasMore) await t.engine.loadMore();

    expect(t.store.pageCalls.map((c) => c.offset)).toEqual([0, 3, 8, 13, 18]);
    expect(new Set(t.ids()).size).toBe(t.ids().length);
    expect(t.ids()).toEqual(await t.store.allIds(EMPTY_CRITERIA));
  });

  it("debounces load-more triggers into a single fetch", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    try {
      const t = await setup({ records: makePhotos(12), session: { pageSize: 5, preloadThreshold: 2 } });
      await t.engine.reload();
      expect(t.store.byIdsCalls).toBe(1);

      for (const id of range(12, 9)) t.engine.classify(id, "keep");
      await vi.advanceTimersByTimeAsync(49);
      expect(t.store.byIdsCalls).toBe(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(t.store.byIdsCalls).toBe(2);

      await flush();
      expect(t.ids()).toEqual(range(8, 3));
      await t.engine.dispose();
    } finally {
      vi.useRealTimers();
    }
  });

  it("retries failed pages silently and surfaces the failure after the retry limit", async () => {
    const t = await setup({ records: makePhotos(12), session: { pageSize: 5, preloadThreshold: 0 } });
    await t.engine.reload();

    t.store.failReads = 1;
    await t.engine.loadMore();
    expect(t.engine.snapshot.error).toBeNull();
    expect(t.ids()).toEqual(range(12, 8));

    await t.engine.loadMore();
    expect(t.ids()).toEqual(range(12, 3));

    t.store.failReads = 3;
    await t.engine.loadMore();
    await t.engine.loadMore();
    expect(t.engine.snapshot.error).toBeNull();
    await t.engine.loadMore();
    expect(t.engine.snapshot.error).toBe("Could not load more photos");

    t.engine.clearError();
    await t.engine.loadMore();
    expect(t.ids()).toEqual(range(12, 1));
    expect(t.engine.snapshot.hasMore).toBe(false);
  });
});

// ── Actions ─────────────────────────────────────────────────────────────────

describe("TriageEngine - actions", () => {
  it("keeps the total stable over 50 rapid actions while the combo reaches 50", async () => {
    const t = await setup({ records: makePhotos(80), session: { pageSize: 100 } });
    await t.engine.reload();
    const totals = new Set<number>();
    t.engine.subscribe((s) => totals.add(s.totalCount));

    let combo = 0;
    for (let i = 0; i < 50; i++) {
      combo = t.engine.classify(t.engine.snapshot.photos[0].id, "trash");
      t.tick(10);
    }

    const s = t.engine.snapshot;
    expect(Array.from(totals)).toEqual([80]);
    expect(combo).toBe(50);
    expect(s.combo.count).toBe(50);
    expect(s.comboLevel).toBe("fire");
    expect(s.sortedCount).toBe(50);
    expect(s.sortedCountImmediate).toBe(50);
    expect(s.photos).toHaveLength(30);
    expect(s.progress).toBe(0.625);

    await t.engine.whenIdle();
    expect(await t.store.count(EMPTY_CRITERIA)).toBe(30);
  });

  it("brings a photo back when its write fails", async () => {
    const t = await setup({ records: makePhotos(5) });
    await t.engine.reload();
    t.store.failWrite = (id) => id === "p04";

    t.engine.classify("p04", "keep");
    expect(t.ids()).toEqual(["p05", "p03", "p02", "p01"]);
    await t.engine.whenIdle();
    await flush();

    expect(t.ids()).toEqual(range(5, 1));
    expect(t.engine.snapshot.error).toBe("Could not save classification");
    expect(t.engine.snapshot.counters).toEqual({ keep: 0, trash: 0, maybe: 0 });
    expect(t.engine.snapshot.canUndo).toBe(false);

    t.engine.clearError();
    expect(t.engine.snapshot.error).toBeNull();
  });

  it("reports a write that fails after a reload started", async () => {
    const t = await setup({ records: makePhotos(10) });
    await t.engine.reload();
    t.store.failWrite = (id) => id === "p10";
    const release = t.store.holdWrites();

    t.engine.classify("p10", "keep");
    const reloading = t.engine.reload();
    release();
    await reloading;
    await flush();

    expect(t.engine.snapshot.error).toBe("Could not save classification");
    expect(t.store.status("p10")).toBe("unsorted");
    expect(t.ids()).toEqual(range(10, 1));
    expect(t.engine.snapshot.counters).toEqual({ keep: 0, trash: 0, maybe: 0 });
  });

  it("undo puts the photo back at its original position", async () => {
    const t = await setup({ records: makePhotos(5) });
    await t.engine.reload();

    t.engine.classify("p04", "keep");
    expect(t.engine.snapshot.canUndo).toBe(true);
    expect(t.engine.snapshot.lastUndo?.ids).toEqual(["p04"]);

    const undone = await t.engine.undo();
    expect(undone?.ids).toEqual(["p04"]);
    expect(t.ids()).toEqual(range(5, 1));
    expect(t.engine.snapshot.counters.keep).toBe(0);
    expect(t.engine.snapshot.canUndo).toBe(false);
    expect(t.store.status("p04")).toBe("unsorted");
  });

  it("classifies a batch as one action", async () => {
    const t = await setup({ records: makePhotos(5) });
    await t.engine.reload();
    expect(t.engine.classifyBatch(["p05", "p03"], "maybe")).toBe(1);
    expect(t.ids()).toEqual(["p04", "p02", "p01"]);
    expect(t.engine.snapshot.counters.maybe).toBe(2);
    expect(t.engine.snapshot.combo.count).toBe(1);
  });
});

// ── Controls ────────────────────────────────────────────────────────────────

describe("TriageEngine - controls", () => {
  it("caps the visible list at the daily target", async () => {
    const t = await setup({ records: makePhotos(10) });
    await t.engine.reload();

    t.engine.setDailyTarget(3);
    expect(t.ids()).toEqual(["p10", "p09", "p08"]);
    t.engine.classify("p10", "keep");
    expect(t.ids()).toEqual(["p09", "p08"]);
    t.engine.classify("p09", "keep");
    t.engine.classify("p08", "keep");
    expect(t.ids()).toEqual([]);
    expect(t.engine.snapshot.isDailyTaskComplete).toBe(true);
    expect(t.engine.snapshot.dailyTaskTarget).toBe(3);

    t.engine.setDailyTarget(null);
    expect(t.ids()).toHaveLength(7);
    expect(t.engine.snapshot.isDailyTaskComplete).toBe(false);
  });

  it("starts from an item and clears the precise filter on dispose", async () => {
    const t = await setup({ records: makePhotos(10), session: { pageSize: 4 } });
    await t.engine.reload();
    t.engine.classify("p10", "trash");

    expect(await t.engine.startFromItem("p99")).toBe(false);
    expect(await t.engine.startFromItem("p08")).toBe(true);

    expect(t.settings.sessionFilter?.photoIds).toEqual(range(8, 1));
    expect(t.settings.sessionFilter?.preciseMode).toBe(true);
    expect(t.engine.snapshot.totalCount).toBe(8);
    expect(t.ids()).toEqual(range(8, 5));
    expect(t.engine.criteria?.precise).toBe(true);

    await t.engine.dispose();
    expect(t.settings.sessionFilter).toBeNull();
  });

  it("starts from an item in random order, keeping the order shown", async () => {
    const t = await setup({ records: makePhotos(10) });
    await t.engine.reload();
    await t.engine.reshuffle(1234);
    const shown = t.ids();
    t.engine.classify(shown[5], "keep");

    expect(await t.engine.startFromItem(shown[3])).toBe(true);
    expect(t.engine.snapshot.strategy).toBe("snapshot");
    expect(t.ids()).toEqual([shown[3], shown[4], ...shown.slice(6)]);
  });

  it("windowed: starts from an item without dropping photos not loaded yet", async () => {
    const t = await setup({ session: { pageSize: 5, windowedThreshold: 5 } });
    await t.engine.reload();
    expect(t.ids()).toEqual(range(30, 26));

    expect(await t.engine.startFromItem("p28")).toBe(true);
    const s = t.engine.snapshot;
    expect(s.strategy).toBe("windowed");
    expect(s.totalCount).toBe(28);
    expect(t.ids()).toEqual(range(28, 24));
    expect(t.engine.criteria?.startAt).toEqual({ id: "p28", takenAt: 1_028_000, sort: { kind: "date-desc" } });
    expect(t.settings.sessionFilter).toBeNull();

    while (t.engine.snapshot.hasMore) await t.engine.loadMore();
    expect(t.ids()).toEqual(range(28, 1));

    await t.engine.setFilterMode("all");
    expect(t.engine.criteria?.startAt).toBeNull();
    expect(t.ids()).toEqual(range(30, 26));
  });

  it("windowed: starts from an item in random order", async () => {
    const t = await setup({ session: { pageSize: 5, windowedThreshold: 5 } });
    await t.engine.reshuffle(1234);
    const full = orderIds(range(30, 1), { kind: "random", seed: 1234 });
    expect(t.ids()).toEqual(full.slice(0, 5));

    expect(await t.engine.startFromItem(full[2])).toBe(true);
    expect(t.engine.snapshot.totalCount).toBe(28);
    while (t.engine.snapshot.hasMore) await t.engine.loadMore();
    expect(t.ids()).toEqual(full.slice(2));
  });

  it("cycles sort order and persists it", async () => {
    const t = await setup({ records: makePhotos(6) });
    await t.engine.reload();

    await t.engine.cycleSortOrder();
    expect(t.engine.snapshot.sortOrder).toEqual({ kind: "date-asc" });
    expect(t.ids()).toEqual(range(1, 6));
    expect(t.settings.settings.sorting.order).toBe("date-asc");

    await t.engine.cycleSortOrder();
    expect(t.engine.snapshot.sortOrder.kind).toBe("random");

    await t.engine.cycleSortOrder();
    expect(t.engine.snapshot.sortOrder).toEqual({ kind: "date-desc" });
    expect(t.ids()).toEqual(range(6, 1));
  });

  it("reshuffles with a seed and reproduces the order", async () => {
    const t = await setup({ records: makePhotos(6) });
    await t.engine.reload();

    await t.engine.reshuffle(1234);
    const expected = orderIds(range(6, 1), { kind: "random", seed: 1234 });
    expect(t.ids()).toEqual(expected);
    expect(t.settings.settings.sorting).toEqual({ order: "random", randomSeed: 1234 });

    await t.engine.reload();
    expect(t.ids()).toEqual(expected);
  });

  it("applies the global filter mode", async () => {
    const records: PhotoRecord[] = [
      { id: "a", bucketId: "cam", takenAt: 1, status: "unsorted" },
      { id: "b", bucketId: "shots", takenAt: 2, status: "unsorted" },
    ];
    const t = await setup({ records, filter: { cameraBucketIds: ["cam"] } });
    await t.engine.reload();
    expect(t.ids()).toEqual(["b", "a"]);

    await t.engine.setFilterMode("exclude-camera");
    expect(t.ids()).toEqual(["b"]);
    await t.engine.setFilterMode("camera-only");
    expect(t.ids()).toEqual(["a"]);
    expect(t.settings.filterMode).toBe("camera-only");
  });

  it("uses a custom session filter and clears it", async () => {
    const t = await setup({ records: makePhotos(10) });
    await t.engine.setFilterMode("custom");
    await t.engine.setSessionFilter({ startDate: 1_000_000 + 3000, endDate: 1_000_000 + 5000 });
    // Non-precise end dates are widened to the end of that day.
    expect(t.ids()).toEqual(range(10, 3));

    await t.engine.clearSessionFilter();
    expect(t.ids()).toEqual(range(10, 1));
  });
});
