/**
 * @file src/store/criteria-sql.ts
 * @summary Renders a Criteria and a SortOrder to parameterised SQLite clauses for the
 * `photos` table. List constraints are bound as a single JSON parameter and expanded
 * with `json_each`, so allow-lists of any length stay within SQLite's variable limit.
 *
 * @exports
 *   - SqlFragment - rendered SQL with its positional parameters
 *   - renderWhere - WHERE clause (always restricted to unsorted photos)
 *   - renderAnchor - bound keeping the anchor row and every row after it in its sort
 *   - renderOrderBy - ORDER BY clause for a sort order
 *   - normaliseSeed - fold any finite seed into the 31-bit range used by the hash order
 */

import type { SqlValue } from "sql.js";
import type { Criteria, SortAnchor } from "../types/criteria";
import type { SortOrder } from "../types/sort";

export type SqlFragment = {
  sql: string;
  params: SqlValue[];
};

const SEED_MODULUS = 2147483648;
const HASH_MULTIPLIER = 1103515245;

export function normaliseSeed(seed: number): number {
  const s = Number.isFinite(seed) ? Math.floor(seed) : 0;
  return ((s % SEED_MODULUS) + SEED_MODULUS) % SEED_MODULUS;
}

export function renderWhere(c: Criteria): SqlFragment {
  const parts: string[] = ["status = 'unsorted'"];
  const params: SqlValue[] = [];

  if (c.matchNone) {
    parts.push("0");
    return { sql: parts.join(" AND "), params };
  }

  if (c.ids) {
    parts.push("id IN (SELECT value FROM json_each(?))");
    params.push(JSON.stringify(c.ids));
  }
  if (c.includeBuckets) {
    parts.push("bucket_id IN (SELECT value FROM json_each(?))");
    params.push(JSON.stringify(c.includeBuckets));
  }
  if (c.excludeBuckets) {
    parts.push("bucket_id NOT IN (SELECT value FROM json_each(?))");
    params.push(JSON.stringify(c.excludeBuckets));
  }
  if (c.startDate !== null) {
    parts.push("taken_at >= ?");
    params.push(c.startDate);
  }
  if (c.endDate !== null) {
    parts.push("taken_at <= ?");
    params.push(c.endDate);
  }
  if (c.startAt) {
    const anchor = renderAnchor(c.startAt);
    parts.push(anchor.sql);
    params.push(...anchor.params);
  }

  return { sql: parts.join(" AND "), params };
}

function hashKey(table = ""): string {
  return `((${table}rowid * ${HASH_MULTIPLIER} + ?) % ${SEED_MODULUS})`;
}

/** Mirrors `renderOrderBy` for the anchor's sort, tie-breaks included. */
export function renderAnchor(a: SortAnchor): SqlFragment {
  switch (a.sort.kind) {
    case "date-asc":
      return { sql: "(taken_at > ? OR (taken_at = ? AND id >= ?))", params: [a.takenAt, a.takenAt, a.id] };
    case "random": {
      // A missing anchor row folds to -1, which keeps every row.
      const seed = normaliseSeed(a.sort.seed);
      const anchorKey = `COALESCE((SELECT ${hashKey("a.")} FROM photos a WHERE a.id = ?), -1)`;
      return {
        sql: `(${hashKey()} > ${anchorKey} OR (${hashKey()} = ${anchorKey} AND id >= ?))`,
        params: [seed, seed, a.id, seed, seed, a.id, a.id],
      };
    }
    case "date-desc":
    default:
      return { sql: "(taken_at < ? OR (taken_at = ? AND id <= ?))", params: [a.takenAt, a.takenAt, a.id] };
  }
}

export function renderOrderBy(sort: SortOrder): SqlFragment {
  switch (sort.kind) {
    case "date-asc":
      return { sql: "taken_at ASC, id ASC", params: [] };
    case "random":
      // Integer hash of the rowid keyed by the seed: stable for a given seed.
      return {
        sql: `${hashKey()} ASC, id ASC`,
        params: [normaliseSeed(sort.seed)],
      };
    case "date-desc":
    default:
      return { sql: "taken_at DESC, id DESC", params: [] };
  }
}
