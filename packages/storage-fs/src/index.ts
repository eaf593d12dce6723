/**
 * blobvault file system storage
 *
 * Blob backend publishing staged writes by atomic rename, plus the sidecar
 * metadata store sharing its directory.
 */

export { openFileStream } from "./file-stream.ts";
export { createFsBlobStorage, type FsBlobStorage, type FsStorageConfig } from "./fs-storage.ts";
export { createStoreLayout, ensureStoreLayout, type StoreLayout } from "./layout.ts";
export { createFsMetaStore } from "./meta-store.ts";
export type { FsBlobStaging } from "./staging.ts";
