/**
 * blobvault key index
 *
 * `bucket/key` naming over an abstract transactional KV store.
 */

export { decodeIndexEntry, encodeIndexEntry, IndexEntrySchema } from "./entry.ts";
export { createKeyIndex, type KeyIndex } from "./key-index.ts";
export { createMemoryKvStore, type MemoryKvStore } from "./memory-kv.ts";
export { formatObjectPath, parseObjectPath, validateObjectPath } from "./path.ts";
export type { IndexEntry, KvReadTx, KvStore, KvWriteTx, ObjectPath } from "./types.ts";
