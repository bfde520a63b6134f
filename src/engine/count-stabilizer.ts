/**
 * @file src/engine/count-stabilizer.ts
 * @summary Freezes the displayed total. The first non-zero
 * `unclassified + sessionClassified` sum is latched and returned for every later
 * observation until the session is rebuilt.
 *
 * @exports
 *   - CountStabilizer
 */

export class CountStabilizer {
  private latched: number | null = null;

  observe(rawUnclassified: number, sessionClassified: number): number {
    if (this.latched !== null) return this.latched;
    const sum = Math.max(0, rawUnclassified) + Math.max(0, sessionClassified);
    if (sum > 0) this.latched = sum;
    return sum;
  }

  get value(): number | null {
    return this.latched;
  }

  reset(): void {
    this.latched = null;
  }
}
