/**
 * @file src/store/sql-record-store.ts
 * @summary RecordStore implementation on sql.js (SQLite compiled to WASM, running in
 * process). Holds a single `photos` table; every query the engine issues is limited to
 * unsorted photos. Batch status writes run in one transaction so they either land
 * completely or not at all.
 *
 * @exports
 *  - getSqlJs        - lazy-load sql.js, cached for reuse
 *  - SqlRecordStore  - the store; create with `SqlRecordStore.open()`
 */

import initSqlJs from "sql.js";
import type { Database, SqlJsStatic, SqlValue } from "sql.js";
import { log } from "../core/logger";
import type { Criteria } from "../types/criteria";
import type { PhotoRecord, PhotoStatus } from "../types/photo";
import type { RecordStore } from "../types/store";
import type { SortOrder } from "../types/sort";
import { renderOrderBy, renderWhere } from "./criteria-sql";

// ── Lazy sql.js loader ────────────────────────────────────────────────────────

let _sqlJs: SqlJsStatic | null = null;
let _sqlJsPromise: Promise<SqlJsStatic> | null = null;

/**
 * Lazily initialise sql.js. The WASM binary is resolved from the installed package.
 * Subsequent calls return the cached instance immediately.
 */
export async function getSqlJs(): Promise<SqlJsStatic> {
  if (_sqlJs) return _sqlJs;
  if (_sqlJsPromise) return _sqlJsPromise;

  _sqlJsPromise = initSqlJs()
    .then((SQL) => {
      _sqlJs = SQL;
      return SQL;
    })
    .catch((err: unknown) => {
      // Reset so the next call retries instead of returning a stale rejected promise
      _sqlJsPromise = null;
      throw err;
    });

  return _sqlJsPromise;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS photos (
    id text primary key,
    bucket_id text not null,
    taken_at integer not null,
    status text not null default 'unsorted',
    display_name text
  );
  CREATE INDEX IF NOT EXISTS idx_photos_status_taken ON photos (status, taken_at);
  CREATE INDEX IF NOT EXISTS idx_photos_bucket ON photos (bucket_id);
`;

const COLUMNS = "id, bucket_id, taken_at, status, display_name";

function toStatus(v: SqlValue): PhotoStatus {
  const s = String(v);
  if (s === "keep" || s === "trash" || s === "maybe") return s;
  return "unsorted";
}

function rowToRecord(row: SqlValue[]): PhotoRecord {
  return {
    id: String(row[0]),
    bucketId: String(row[1]),
    takenAt: Number(row[2]),
    status: toStatus(row[3]),
    displayName: row[4] === null ? null : String(row[4]),
  };
}

// --------------------
// SqlRecordStore
// --------------------

export class SqlRecordStore implements RecordStore {
  private constructor(private db: Database) {}

  /** Open an empty store, or one restored from bytes produced by `export()`. */
  static async open(data?: Uint8Array): Promise<SqlRecordStore> {
    const SQL = await getSqlJs();
    const db = data ? new SQL.Database(data) : new SQL.Database();
    db.run(SCHEMA);
    return new SqlRecordStore(db);
  }

  insertMany(records: readonly PhotoRecord[]): void {
    this.inTransaction(() => {
      for (const r of records) {
        this.db.run(`INSERT OR REPLACE INTO photos (${COLUMNS}) VALUES (?, ?, ?, ?, ?)`, [
          r.id,
          r.bucketId,
          Math.floor(r.takenAt),
          r.status,
          r.displayName ?? null,
        ]);
      }
    });
  }

  async count(criteria: Criteria): Promise<number> {
    const where = renderWhere(criteria);
    const results = this.db.exec(`SELECT COUNT(*) FROM photos WHERE ${where.sql}`, where.params);
    if (!results.length) return 0;
    return Number(results[0].values[0]?.[0] ?? 0);
  }

  async page(criteria: Criteria, sort: SortOrder, limit: number, offset: number): Promise<PhotoRecord[]> {
    const where = renderWhere(criteria);
    const order = renderOrderBy(sort);
    const results = this.db.exec(
      `SELECT ${COLUMNS} FROM photos WHERE ${where.sql} ORDER BY ${order.sql} LIMIT ? OFFSET ?`,
      [...where.params, ...order.params, Math.max(0, Math.floor(limit)), Math.max(0, Math.floor(offset))],
    );
    if (!results.length) return [];
    return results[0].values.map(rowToRecord);
  }

  async allIds(criteria: Criteria): Promise<string[]> {
    const where = renderWhere(criteria);
    const order = renderOrderBy({ kind: "date-desc" });
    const results = this.db.exec(`SELECT id FROM photos WHERE ${where.sql} ORDER BY ${order.sql}`, where.params);
    if (!results.length) return [];
    return results[0].values.map((row) => String(row[0]));
  }

  async byIds(ids: readonly string[]): Promise<PhotoRecord[]> {
    if (!ids.length) return [];
    const results = this.db.exec(
      `SELECT ${COLUMNS} FROM photos WHERE id IN (SELECT value FROM json_each(?))`,
      [JSON.stringify(ids)],
    );
    if (!results.length) return [];
    return results[0].values.map(rowToRecord);
  }

  async getStatus(id: string): Promise<PhotoStatus | null> {
    const results = this.db.exec("SELECT status FROM photos WHERE id = ?", [id]);
    const v = results[0]?.values[0]?.[0];
    return v === undefined ? null : toStatus(v);
  }

  async setStatus(id: string, status: PhotoStatus): Promise<void> {
    this.db.run("UPDATE photos SET status = ? WHERE id = ?", [status, id]);
  }

  async setStatusBatch(ids: readonly string[], status: PhotoStatus): Promise<void> {
    if (!ids.length) return;
    this.inTransaction(() => {
      this.db.run("UPDATE photos SET status = ? WHERE id IN (SELECT value FROM json_each(?))", [
        status,
        JSON.stringify(ids),
      ]);
    });
  }

  /** Serialise the whole database; pass the bytes to `open()` to restore. */
  export(): Uint8Array {
    return this.db.export();
  }

  close(): void {
    this.db.close();
  }

  private inTransaction(fn: () => void): void {
    this.db.run("BEGIN");
    try {
      fn();
      this.db.run("COMMIT");
    } catch (err) {
      try {
        this.db.run("ROLLBACK");
      } catch (e) {
        log.swallow("rollback photos transaction", e);
      }
      throw err;
    }
  }
}
