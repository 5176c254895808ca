import Database from "better-sqlite3";
import type { SqlClientLike } from "../src";

export const NOW = Date.UTC(2026, 0, 1) / 1000;

export type SessionRow = { key: string; data: unknown; expiration: number };

export function createSessionsDatabase(options?: { unique?: boolean; dataType?: "TEXT" | "BLOB" }): Database.Database {
  const db = new Database(":memory:");
  const keyType = (options?.unique ?? true) ? "TEXT PRIMARY KEY" : "TEXT NOT NULL";
  const dataType = options?.dataType ?? "TEXT";
  db.exec(`CREATE TABLE sessions ("key" ${keyType}, "data" ${dataType} NOT NULL, "expiration" INTEGER NOT NULL)`);
  return db;
}

export function readRows(db: Database.Database): SessionRow[] {
  return db.prepare<[], SessionRow>('SELECT "key", "data", "expiration" FROM sessions ORDER BY rowid').all();
}

export type RecordedCall = { sql: string; method: "get" | "run"; params: unknown[] };

/**
 * Fake client recording every prepare and statement call. `get` answers with
 * `getResult` for every statement.
 */
export function createRecordingClient(getResult?: unknown) {
  const prepared: string[] = [];
  const calls: RecordedCall[] = [];
  let closed = 0;

  const client: SqlClientLike = {
    prepare(sql) {
      prepared.push(sql);
      return {
        get(...params) {
          calls.push({ sql, method: "get", params });
          return getResult;
        },
        run(...params) {
          calls.push({ sql, method: "run", params });
          return { changes: 1 };
        },
      };
    },
    close() {
      closed += 1;
    },
  };

  return {
    client,
    prepared,
    calls,
    closeCount: () => closed,
  };
}
