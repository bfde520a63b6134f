/**
 * @file src/engine/streak-tracker.ts
 * @summary Rapid-action combo counter. Actions within the combo window of the previous
 * one extend the streak; otherwise it restarts at 1. After a quiet window the combo
 * goes inactive, and after a further delay its count drops to 0 (the session maximum
 * is kept).
 *
 * @exports
 *   - comboLevel - visual intensity bucket for a count
 *   - StreakTrackerOptions - timing options
 *   - StreakTracker - the tracker
 */

import { COMBO_LEVEL_THRESHOLDS, COMBO_RESET_DELAY_MS, COMBO_WINDOW_MS } from "../core/constants";
import type { ComboLevel, ComboState } from "../types/engine";

export function comboLevel(count: number): ComboLevel {
  if (count >= COMBO_LEVEL_THRESHOLDS.fire) return "fire";
  if (count >= COMBO_LEVEL_THRESHOLDS.hot) return "hot";
  if (count >= COMBO_LEVEL_THRESHOLDS.warm) return "warm";
  if (count >= COMBO_LEVEL_THRESHOLDS.normal) return "normal";
  return "none";
}

export type StreakTrackerOptions = {
  windowMs?: number;
  resetDelayMs?: number;
  now?: () => number;
  /** Called whenever the state changes, including from decay timers. */
  onChange?: (state: ComboState) => void;
};

const EMPTY: ComboState = { count: 0, maxCount: 0, lastActionAt: 0, active: false };

export class StreakTracker {
  private state: ComboState = { ...EMPTY };
  private decayTimer: ReturnType<typeof setTimeout> | null = null;
  private resetTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly windowMs: number;
  private readonly resetDelayMs: number;
  private readonly now: () => number;
  private readonly onChange?: (state: ComboState) => void;

  constructor(opts: StreakTrackerOptions = {}) {
    this.windowMs = opts.windowMs ?? COMBO_WINDOW_MS;
    this.resetDelayMs = opts.resetDelayMs ?? COMBO_RESET_DELAY_MS;
    this.now = opts.now ?? Date.now;
    this.onChange = opts.onChange;
  }

  get snapshot(): ComboState {
    return { ...this.state };
  }

  get count(): number {
    return this.state.count;
  }

  get maxCount(): number {
    return this.state.maxCount;
  }

  /** Register one action and return the resulting combo count. */
  registerAction(now: number = this.now()): number {
    const prev = this.state;
    const continues = prev.count > 0 && prev.lastActionAt > 0 && now - prev.lastActionAt <= this.windowMs;
    const count = continues ? prev.count + 1 : 1;

    this.state = {
      count,
      maxCount: Math.max(prev.maxCount, count),
      lastActionAt: now,
      active: true,
    };
    this.scheduleDecay();
    this.emit();
    return count;
  }

  reset(): void {
    this.clearTimers();
    this.state = { ...EMPTY };
    this.emit();
  }

  dispose(): void {
    this.clearTimers();
  }

  private scheduleDecay(): void {
    this.clearTimers();
    this.decayTimer = setTimeout(() => {
      this.decayTimer = null;
      this.state = { ...this.state, active: false };
      this.emit();

      this.resetTimer = setTimeout(() => {
        this.resetTimer = null;
        this.state = { ...this.state, count: 0 };
        this.emit();
      }, this.resetDelayMs);
    }, this.windowMs);
  }

  private clearTimers(): void {
    if (this.decayTimer !== null) {
      clearTimeout(this.decayTimer);
      this.decayTimer = null;
    }
    if (this.resetTimer !== null) {
      clearTimeout(this.resetTimer);
      this.resetTimer = null;
    }
  }

  private emit(): void {
    this.onChange?.(this.snapshot);
  }
}
