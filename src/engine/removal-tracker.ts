/**
 * @file src/engine/removal-tracker.ts
 * @summary Ids classified locally in the current session. Anything in here is hidden
 * from the visible projection until it is undone or its write is rolled back. The number
 * of removed ids among the loaded records is the offset compensation for windowed paging.
 *
 * @exports
 *   - RemovalTracker - insertion-ordered id set
 */

export class RemovalTracker {
  private ids = new Set<string>();

  has(id: string): boolean {
    return this.ids.has(id);
  }

  add(id: string): void {
    this.ids.add(id);
  }

  addAll(ids: readonly string[]): void {
    for (const id of ids) this.ids.add(id);
  }

  delete(id: string): boolean {
    return this.ids.delete(id);
  }

  deleteAll(ids: readonly string[]): void {
    for (const id of ids) this.ids.delete(id);
  }

  get size(): number {
    return this.ids.size;
  }

  /** How many removed ids `scope` holds. */
  countIn(scope: { has(id: string): boolean }): number {
    let n = 0;
    for (const id of this.ids) if (scope.has(id)) n++;
    return n;
  }

  clear(): void {
    this.ids.clear();
  }

  /** Records not yet removed, in their original order. */
  project<T extends { id: string }>(records: readonly T[]): T[] {
    if (!this.ids.size) return records.slice();
    return records.filter((r) => !this.ids.has(r.id));
  }

  toArray(): string[] {
    return Array.from(this.ids);
  }
}
