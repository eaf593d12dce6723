/**
 * Wire a complete store over one directory: blobs, sidecars, the SQLite
 * key index and the named-object façade.
 */
import { join } from "node:path";
import { createContentStore } from "@blobvault/cas";
import { createKeyIndex } from "@blobvault/key-index";
import { createSqliteKvStore } from "@blobvault/kv-sqlite";
import { toStoreError } from "@blobvault/storage-core";
import {
  createFsBlobStorage,
  createFsMetaStore,
  createStoreLayout,
  ensureStoreLayout,
} from "@blobvault/storage-fs";
import { createNamedObjectFacade } from "./named-object-facade.ts";

export const INDEX_FILE_NAME = "index.db";

export type LocalObjectStoreConfig = {
  rootDir: string;
  /** Bytes used for media-type classification (default: 512) */
  sniffLength?: number;
  /** Size of the blob existence cache */
  cacheSize?: number;
};

export async function openLocalObjectStore(config: LocalObjectStoreConfig) {
  const layout = createStoreLayout(config.rootDir);
  try {
    await ensureStoreLayout(layout);
  } catch (error: unknown) {
    throw toStoreError("StorageFailure", error);
  }

  const storage = createFsBlobStorage({ rootDir: layout.rootDir, cacheSize: config.cacheSize });
  const meta = createFsMetaStore(layout);
  const content = createContentStore({ storage, meta, sniffLength: config.sniffLength });

  let kv: ReturnType<typeof createSqliteKvStore>;
  try {
    kv = createSqliteKvStore({ path: join(layout.rootDir, INDEX_FILE_NAME) });
  } catch (error: unknown) {
    throw toStoreError("IndexFailure", error);
  }
  const index = createKeyIndex(kv);
  const objects = createNamedObjectFacade({ content, index });

  return {
    layout,
    storage,
    content,
    index,
    objects,
    close: () => kv.close(),
  };
}

export type LocalObjectStore = Awaited<ReturnType<typeof openLocalObjectStore>>;
