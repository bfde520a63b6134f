/**
 * @file src/core/utils.ts
 * @summary Generic utility functions shared across the engine. Provides numeric
 * clamping, integer coercion with a fallback, deep-clone, plain-object type guard, and
 * string-list sanitisation.
 *
 * @exports
 *   - clamp              - clamp a number between lo and hi
 *   - clampInt           - coerce to an integer and clamp, with a fallback for non-numbers
 *   - clonePlain         - deep-clone a plain value
 *   - isPlainObject      - type guard for Record<string, unknown>
 *   - cleanStringArray   - sanitise an unknown value into a de-duplicated string array
 */

/** Clamp `n` between `lo` and `hi` (inclusive). */
export function clamp(n: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, n));
}

/**
 * Coerce an unknown value to an integer in [lo, hi].
 * Returns `fallback` when the value is not a finite number.
 */
export function clampInt(v: unknown, lo: number, hi: number, fallback: number): number {
  const n = Number(v);
  if (v === null || v === undefined || !Number.isFinite(n)) return fallback;
  return clamp(Math.floor(n), lo, hi);
}

/** Deep-clone a plain JSON-safe value. */
export function clonePlain<T>(x: T): T {
  return structuredClone(x);
}

/** Type guard: returns true if `v` is a non-null, non-array object. */
export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

/** Coerce an unknown value into non-empty, trimmed, unique strings (first occurrence wins). */
export function cleanStringArray(v: unknown): string[] {
  const arr = Array.isArray(v) ? v : [];
  const seen = new Set<string>();
  const out: string[] = [];
  for (const x of arr) {
    if (typeof x !== "string" && typeof x !== "number") continue;
    const s = String(x).trim();
    if (!s || seen.has(s)) continue;
    seen.add(s);
    out.push(s);
  }
  return out;
}
