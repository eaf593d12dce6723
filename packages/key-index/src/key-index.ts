/**
 * Key index: maps `bucket/key` to the digest and attributes of a blob.
 *
 * Each operation is one KV transaction. Records are JSON under the UTF-8
 * bytes of the formatted path.
 */

import { createStoreError, toStoreError } from "@blobvault/storage-core";
import { decodeIndexEntry, encodeIndexEntry } from "./entry.ts";
import { formatObjectPath } from "./path.ts";
import type { IndexEntry, KvStore, ObjectPath } from "./types.ts";

const encoder = new TextEncoder();

const toKey = (path: ObjectPath): Uint8Array => encoder.encode(formatObjectPath(path));

const decodeOrFail = (path: ObjectPath, bytes: Uint8Array | null): IndexEntry | null => {
  if (bytes === null) return null;
  const entry = decodeIndexEntry(bytes);
  if (entry === null) {
    throw createStoreError(
      "IntegrityFailure",
      `Corrupt index record for ${formatObjectPath(path)}`
    );
  }
  return entry;
};

/** Run a KV operation, reporting store errors as IndexFailure */
const guard = async <T>(op: () => Promise<T>): Promise<T> => {
  try {
    return await op();
  } catch (error: unknown) {
    throw toStoreError("IndexFailure", error);
  }
};

export function createKeyIndex(kv: KvStore) {
  return {
    /** Write an entry; returns the entry it replaced, if any */
    put: (path: ObjectPath, entry: IndexEntry): Promise<{ previous: IndexEntry | null }> =>
      guard(() =>
        kv.update((tx) => {
          const key = toKey(path);
          const before = tx.get(key);
          tx.put(key, encodeIndexEntry(entry));
          // A corrupt previous record is overwritten, not reported
          return { previous: before === null ? null : decodeIndexEntry(before) };
        })
      ),

    get: (path: ObjectPath): Promise<IndexEntry | null> =>
      guard(() => kv.view((tx) => decodeOrFail(path, tx.get(toKey(path))))),

    delete: (path: ObjectPath): Promise<boolean> =>
      guard(() => kv.update((tx) => tx.delete(toKey(path)))),
  };
}

export type KeyIndex = ReturnType<typeof createKeyIndex>;
