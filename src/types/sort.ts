/**
 * @file src/types/sort.ts
 * @summary Sort orders supported by the record store and the sessions built on it.
 * Random order carries its seed so the same seed always reproduces the same order.
 *
 * @exports
 *   - SortOrder - discriminated union of date-desc / date-asc / random(seed)
 *   - SortOrderKind - the `kind` tag alone, as persisted in settings
 */

export type SortOrder =
  | { kind: "date-desc" }
  | { kind: "date-asc" }
  | { kind: "random"; seed: number };

export type SortOrderKind = SortOrder["kind"];
