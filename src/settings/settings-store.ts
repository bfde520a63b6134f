/**
 * @file src/settings/settings-store.ts
 * @summary Persistence for settings and lifetime statistics. Both live in one JSON
 * document (`{ settings, stats }`) read and written through a SettingsAdapter. Saves
 * are queued through a mutex so concurrent callers never interleave their
 * read-modify-write cycles, and keys this module does not own are preserved.
 *
 * @exports
 *   - SettingsAdapter - loadData / saveData pair
 *   - FileSettingsAdapter - JSON file on disk (node:fs/promises)
 *   - MemorySettingsAdapter - in-memory document, for tests and embedding
 *   - TriageSettingsStore - loaded settings + stats with serialised saves
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { DEFAULT_SETTINGS } from "../core/default-settings";
import { log } from "../core/logger";
import { clonePlain, isPlainObject } from "../core/utils";
import type { FilterMode, SessionFilter } from "../types/criteria";
import type { LifetimeStatsData, TriageSettings } from "../types/settings";
import type { SortOrder } from "../types/sort";
import { normaliseSessionFilter, normaliseSettings, normaliseStats } from "./settings-normalisation";

export type SettingsAdapter = {
  loadData(): Promise<unknown>;
  saveData(data: Record<string, unknown>): Promise<void>;
};

export class FileSettingsAdapter implements SettingsAdapter {
  constructor(readonly path: string) {}

  async loadData(): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (e) {
      if (isPlainObject(e) && e.code === "ENOENT") return null;
      throw e;
    }
    try {
      return JSON.parse(text);
    } catch (e) {
      log.warn(`settings file is not valid JSON, using defaults: ${this.path}`, e);
      return null;
    }
  }

  async saveData(data: Record<string, unknown>): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    // Write-then-rename so a crash mid-write never leaves a truncated file.
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(data, null, 2), "utf8");
    await rename(tmp, this.path);
  }
}

export class MemorySettingsAdapter implements SettingsAdapter {
  saves = 0;

  constructor(public data: unknown = null) {}

  async loadData(): Promise<unknown> {
    return this.data === null ? null : clonePlain(this.data);
  }

  async saveData(data: Record<string, unknown>): Promise<void> {
    this.saves++;
    this.data = clonePlain(data);
  }
}

export class TriageSettingsStore {
  settings: TriageSettings = clonePlain(DEFAULT_SETTINGS);
  stats: LifetimeStatsData = normaliseStats(null);

  private _saving: Promise<void> | null = null;

  constructor(private adapter: SettingsAdapter) {}

  async load(): Promise<void> {
    const root = await this.adapter.loadData();
    const rootObj = isPlainObject(root) ? root : {};
    this.settings = normaliseSettings(rootObj.settings);
    this.stats = normaliseStats(rootObj.stats);
  }

  async save(): Promise<void> {
    // Queue through mutex to prevent concurrent read-modify-write races
    while (this._saving) await this._saving;
    this._saving = this._doSave();
    try {
      await this._saving;
    } finally {
      this._saving = null;
    }
  }

  private async _doSave(): Promise<void> {
    const root = await this.adapter.loadData();
    const out: Record<string, unknown> = isPlainObject(root) ? { ...root } : {};
    out.settings = clonePlain(this.settings);
    out.stats = clonePlain(this.stats);
    await this.adapter.saveData(out);
  }

  // ── Accessors used by the engine ──────────────────────────────────

  get filterMode(): FilterMode {
    return this.settings.filter.mode;
  }

  get cameraBucketIds(): readonly string[] {
    return this.settings.filter.cameraBucketIds;
  }

  get sessionFilter(): SessionFilter | null {
    return this.settings.filter.sessionFilter;
  }

  /** Sort order from the persisted preference; random order carries the stored seed. */
  get sortOrder(): SortOrder {
    const { order, randomSeed } = this.settings.sorting;
    return order === "random" ? { kind: "random", seed: randomSeed } : { kind: order };
  }

  async setFilterMode(mode: FilterMode): Promise<void> {
    this.settings.filter.mode = mode;
    await this.save();
  }

  async setCameraBucketIds(ids: readonly string[]): Promise<void> {
    this.settings.filter.cameraBucketIds = ids.slice();
    await this.save();
  }

  async setSessionFilter(filter: SessionFilter | null): Promise<void> {
    this.settings.filter.sessionFilter = normaliseSessionFilter(filter);
    await this.save();
  }

  async clearSessionFilter(): Promise<void> {
    await this.setSessionFilter(null);
  }

  async setSortOrder(sort: SortOrder): Promise<void> {
    this.settings.sorting.order = sort.kind;
    if (sort.kind === "random") this.settings.sorting.randomSeed = sort.seed;
    await this.save();
  }
}
