/**
 * In-memory KvStore for tests and local use.
 *
 * Writes inside `update` go to an overlay that is merged only when the
 * callback returns, so a throwing callback leaves the store untouched.
 */
import { bytesToHex } from "@blobvault/storage-core";
import type { KvReadTx, KvStore, KvWriteTx } from "./types.ts";

export function createMemoryKvStore() {
  const records = new Map<string, Uint8Array>();
  let closed = false;

  const assertOpen = (): void => {
    if (closed) throw new Error("KV store is closed");
  };

  const readTx: KvReadTx = {
    get: (key) => records.get(bytesToHex(key))?.slice() ?? null,
  };

  const store: KvStore = {
    async view(fn) {
      assertOpen();
      return fn(readTx);
    },

    async update(fn) {
      assertOpen();
      // null marks a deletion
      const overlay = new Map<string, Uint8Array | null>();
      const get = (id: string): Uint8Array | null => {
        const pending = overlay.get(id);
        if (pending !== undefined) return pending;
        return records.get(id) ?? null;
      };
      const tx: KvWriteTx = {
        get: (key) => get(bytesToHex(key))?.slice() ?? null,
        put: (key, value) => {
          overlay.set(bytesToHex(key), value.slice());
        },
        delete: (key) => {
          const id = bytesToHex(key);
          const existed = get(id) !== null;
          overlay.set(id, null);
          return existed;
        },
      };
      const result = fn(tx);
      for (const [id, value] of overlay) {
        if (value === null) records.delete(id);
        else records.set(id, value);
      }
      return result;
    },

    async close() {
      closed = true;
    },
  };

  return {
    ...store,
    /** Number of stored records */
    size: () => records.size,
  };
}

export type MemoryKvStore = ReturnType<typeof createMemoryKvStore>;
