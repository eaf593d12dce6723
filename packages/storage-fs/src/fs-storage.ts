/**
 * File System Blob Storage
 *
 * Implements BlobStorage with:
 * - Staged writes published by atomic rename (see staging.ts)
 * - LRU cache of digests known to exist
 * - Sweeping of staging files left behind by crashed processes
 */

import { readdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import type { BlobStat, BlobStorage, ByteRange, BytesStream } from "@blobvault/storage-core";
import { createStoreError, isValidDigest, toStoreError } from "@blobvault/storage-core";
import QuickLRU from "quick-lru";
import { openFileStream } from "./file-stream.ts";
import { createStoreLayout, isErrnoCode, pathExists, type StoreLayout } from "./layout.ts";
import { createStaging, type FsBlobStaging, STAGING_PREFIX, STAGING_SUFFIX } from "./staging.ts";

const DEFAULT_CACHE_SIZE = 10000;

/**
 * File System Storage configuration
 */
export type FsStorageConfig = {
  /** Root directory of the store (must exist, see ensureStoreLayout) */
  rootDir: string;
  /** LRU cache size for digest existence (default: 10000) */
  cacheSize?: number;
};

export type FsBlobStorage = Omit<BlobStorage, "stage"> & {
  readonly layout: StoreLayout;
  stage: () => Promise<FsBlobStaging>;
  /** Delete staging files last modified more than `olderThanMs` ago; returns the count */
  sweepStaging: (olderThanMs: number) => Promise<number>;
};

/**
 * Create a file system-backed blob storage
 */
export const createFsBlobStorage = (config: FsStorageConfig): FsBlobStorage => {
  const layout = createStoreLayout(config.rootDir);
  const existsCache = new QuickLRU<string, true>({
    maxSize: config.cacheSize ?? DEFAULT_CACHE_SIZE,
  });

  const assertDigest = (digest: string): void => {
    if (!isValidDigest(digest)) {
      throw createStoreError("InvalidDigest", `Invalid digest: ${digest}`);
    }
  };

  const has = async (digest: string): Promise<boolean> => {
    assertDigest(digest);
    if (existsCache.has(digest)) return true;
    const exists = await pathExists(layout.blobPath(digest));
    // Blobs are never deleted, so only existence is cached
    if (exists) existsCache.set(digest, true);
    return exists;
  };

  const stage = async (): Promise<FsBlobStaging> => {
    try {
      return await createStaging({
        layout,
        exists: has,
        onPublished: (digest) => existsCache.set(digest, true),
      });
    } catch (error: unknown) {
      throw toStoreError("StorageFailure", error);
    }
  };

  const statBlob = async (digest: string): Promise<BlobStat | null> => {
    assertDigest(digest);
    try {
      const info = await stat(layout.blobPath(digest));
      existsCache.set(digest, true);
      return { size: info.size, lastModified: info.mtime };
    } catch (error: unknown) {
      if (isErrnoCode(error, "ENOENT")) return null;
      throw toStoreError("StorageFailure", error);
    }
  };

  const read = async (digest: string, range?: ByteRange): Promise<BytesStream | null> => {
    assertDigest(digest);
    try {
      return await openFileStream(layout.blobPath(digest), range);
    } catch (error: unknown) {
      throw toStoreError("StorageFailure", error);
    }
  };

  const sweepStaging = async (olderThanMs: number): Promise<number> => {
    let names: string[];
    try {
      names = await readdir(layout.stagingDir);
    } catch (error: unknown) {
      if (isErrnoCode(error, "ENOENT")) return 0;
      throw toStoreError("StorageFailure", error);
    }
    const cutoff = Date.now() - olderThanMs;
    let removed = 0;
    for (const name of names) {
      if (!name.endsWith(STAGING_SUFFIX)) continue;
      if (!name.startsWith(STAGING_PREFIX) && !name.startsWith("meta-")) continue;
      const path = join(layout.stagingDir, name);
      try {
        const info = await stat(path);
        if (info.mtimeMs > cutoff) continue;
        await rm(path, { force: true });
        removed++;
      } catch (error: unknown) {
        // Finished by its owner between readdir and stat
        if (isErrnoCode(error, "ENOENT")) continue;
        throw toStoreError("StorageFailure", error);
      }
    }
    return removed;
  };

  return { layout, stage, has, stat: statBlob, read, sweepStaging };
};
