/**
 * SQLite-backed KvStore
 *
 * One `kv` table of BLOB keys to BLOB values. `update` runs inside an
 * immediate write transaction (SQLite admits one writer at a time), `view`
 * inside a deferred read transaction.
 */

import type { KvReadTx, KvStore, KvWriteTx } from "@blobvault/key-index";
import Database from "better-sqlite3";

export type SqliteKvConfig = {
  /** Database file; created when missing */
  path: string;
  /** Milliseconds to wait for a lock held by another connection (default: 1000) */
  busyTimeoutMs?: number;
};

const SCHEMA = `
CREATE TABLE IF NOT EXISTS kv (
  key BLOB PRIMARY KEY NOT NULL,
  value BLOB NOT NULL
) WITHOUT ROWID;
`;

const toBuffer = (bytes: Uint8Array): Buffer =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

export function createSqliteKvStore(config: SqliteKvConfig): KvStore {
  const db = new Database(config.path, { timeout: config.busyTimeoutMs ?? 1000 });
  try {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = FULL");
    db.exec(SCHEMA);
  } catch (error: unknown) {
    db.close();
    throw error;
  }

  const selectValue = db.prepare("SELECT value FROM kv WHERE key = ?").pluck();
  const upsert = db.prepare(
    "INSERT INTO kv (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
  );
  const remove = db.prepare("DELETE FROM kv WHERE key = ?");

  const readTx: KvReadTx = {
    get: (key) => {
      const value: unknown = selectValue.get(toBuffer(key));
      return value instanceof Uint8Array ? new Uint8Array(value) : null;
    },
  };

  const writeTx: KvWriteTx = {
    ...readTx,
    put: (key, value) => {
      upsert.run(toBuffer(key), toBuffer(value));
    },
    delete: (key) => remove.run(toBuffer(key)).changes > 0,
  };

  return {
    async view(fn) {
      return db.transaction(() => fn(readTx)).deferred();
    },
    async update(fn) {
      return db.transaction(() => fn(writeTx)).immediate();
    },
    async close() {
      if (db.open) db.close();
    },
  };
}
