/**
 * @file src/engine/undo-stack.ts
 * @summary Bounded LIFO of reversible classifications. Pushing beyond the depth drops
 * the oldest entry. Entries remember their push order, so a popped entry can be put
 * back beneath anything pushed after it.
 *
 * @exports
 *   - UndoStack - the stack
 *   - describeUndo - short label for an entry ("Kept 3 photos")
 */

import type { UndoEntry } from "../types/engine";
import type { ClassifiedStatus } from "../types/photo";

const VERBS: Record<ClassifiedStatus, string> = {
  keep: "Kept",
  trash: "Trashed",
  maybe: "Marked as maybe",
};

export function describeUndo(entry: UndoEntry): string {
  const n = entry.ids.length;
  return `${VERBS[entry.newStatus]} ${n} ${n === 1 ? "photo" : "photos"}`;
}

export class UndoStack {
  private entries: UndoEntry[] = [];
  private depth: number;
  private order = new WeakMap<UndoEntry, number>();
  private pushed = 0;

  constructor(depth = 1) {
    this.depth = Math.max(1, Math.floor(depth));
  }

  setDepth(depth: number): void {
    this.depth = Math.max(1, Math.floor(depth));
    this.trim();
  }

  push(entry: UndoEntry): void {
    this.order.set(entry, this.pushed++);
    this.entries.push(entry);
    this.trim();
  }

  /**
   * Return a popped entry to its original place. When newer entries fill the depth,
   * the restored entry is the one dropped.
   */
  restore(entry: UndoEntry): void {
    const seq = this.order.get(entry) ?? this.pushed;
    let i = this.entries.length;
    while (i > 0 && (this.order.get(this.entries[i - 1]) ?? 0) > seq) i--;
    this.entries.splice(i, 0, entry);
    this.trim();
  }

  pop(): UndoEntry | null {
    return this.entries.pop() ?? null;
  }

  peek(): UndoEntry | null {
    return this.entries[this.entries.length - 1] ?? null;
  }

  /** Drop a specific entry (a rolled-back write). Returns false if it was not held. */
  remove(entry: UndoEntry): boolean {
    const i = this.entries.lastIndexOf(entry);
    if (i < 0) return false;
    this.entries.splice(i, 1);
    return true;
  }

  get size(): number {
    return this.entries.length;
  }

  get canUndo(): boolean {
    return this.entries.length > 0;
  }

  clear(): void {
    this.entries = [];
  }

  private trim(): void {
    if (this.entries.length > this.depth) {
      this.entries.splice(0, this.entries.length - this.depth);
    }
  }
}
