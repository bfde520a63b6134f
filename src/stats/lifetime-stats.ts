/**
 * @file src/stats/lifetime-stats.ts
 * @summary Cumulative classification counters that survive across sessions (total,
 * per-status, best combo). Persisted alongside settings. Only confirmed writes reach
 * these counters, and undo never decrements them.
 *
 * @exports
 *   - LifetimeStats - counters plus a TriageEffects adapter
 */

import type { TriageEffects } from "../types/engine";
import type { ClassifiedStatus } from "../types/photo";
import type { LifetimeStatsData } from "../types/settings";
import type { TriageSettingsStore } from "../settings/settings-store";

export class LifetimeStats {
  constructor(private settings: TriageSettingsStore) {}

  get data(): LifetimeStatsData {
    return { ...this.settings.stats };
  }

  async increment(status: ClassifiedStatus, count = 1): Promise<void> {
    if (count <= 0) return;
    const s = this.settings.stats;
    this.settings.stats = {
      ...s,
      totalSorted: s.totalSorted + count,
      [status]: s[status] + count,
    };
    await this.settings.save();
  }

  /** Raise the best combo; a lower value is ignored without saving. */
  async updateMaxCombo(combo: number): Promise<void> {
    if (combo <= this.settings.stats.maxCombo) return;
    this.settings.stats = { ...this.settings.stats, maxCombo: combo };
    await this.settings.save();
  }

  /** Side-effect hooks for the engine. */
  effects(): Pick<TriageEffects, "onClassified" | "onMaxCombo"> {
    return {
      onClassified: (status, count) => this.increment(status, count),
      onMaxCombo: (maxCombo) => this.updateMaxCombo(maxCombo),
    };
  }
}
