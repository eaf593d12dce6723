/**
 * blobvault in-memory storage
 */

export {
  createMemoryBlobStorage,
  createMemoryMetaStore,
  type MemoryBlobStorage,
  type MemoryMetaStore,
  type MemoryStorageConfig,
} from "./memory-storage.ts";
