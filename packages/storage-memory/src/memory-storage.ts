/**
 * In-Memory blob storage and sidecar store
 *
 * Useful for testing and local development. Publication follows the same
 * rules as the file system backend: first publisher of a digest wins,
 * later ones are no-ops.
 */

import type {
  BlobMeta,
  BlobStaging,
  BlobStat,
  BlobStorage,
  ByteRange,
  BytesStream,
  MetaStore,
  PublishOutcome,
} from "@blobvault/storage-core";
import {
  concatBytes,
  createStoreError,
  isValidDigest,
  streamFromBytes,
} from "@blobvault/storage-core";

type StoredBlob = {
  bytes: Uint8Array;
  lastModified: Date;
};

/**
 * Memory Storage configuration
 */
export type MemoryStorageConfig = {
  /** Optional initial data */
  initialData?: Map<string, Uint8Array>;
  /** Clock used for lastModified (default: current time) */
  now?: () => Date;
};

const assertDigest = (digest: string): void => {
  if (!isValidDigest(digest)) {
    throw createStoreError("InvalidDigest", `Invalid digest: ${digest}`);
  }
};

/**
 * Create memory blob storage with inspection methods (for testing)
 */
export const createMemoryBlobStorage = (config: MemoryStorageConfig = {}) => {
  const now = config.now ?? (() => new Date());
  const blobs = new Map<string, StoredBlob>();
  for (const [digest, bytes] of config.initialData ?? []) {
    blobs.set(digest, { bytes, lastModified: now() });
  }
  let openStagings = 0;

  const stage = async (): Promise<BlobStaging> => {
    const chunks: Uint8Array[] = [];
    let finished = false;
    openStagings++;

    const finish = (): void => {
      if (finished) return;
      finished = true;
      openStagings--;
    };

    const assertOpen = (): void => {
      if (finished) {
        throw createStoreError("StorageFailure", "Staging already published or aborted");
      }
    };

    return {
      write: async (chunk) => {
        assertOpen();
        chunks.push(chunk.slice());
      },
      publish: async (digest): Promise<PublishOutcome> => {
        assertOpen();
        finish();
        assertDigest(digest);
        if (blobs.has(digest)) return "existing";
        blobs.set(digest, { bytes: concatBytes(chunks), lastModified: now() });
        return "created";
      },
      abort: async () => {
        finish();
      },
    };
  };

  const storage: BlobStorage = {
    stage,
    has: async (digest) => {
      assertDigest(digest);
      return blobs.has(digest);
    },
    stat: async (digest): Promise<BlobStat | null> => {
      assertDigest(digest);
      const blob = blobs.get(digest);
      if (!blob) return null;
      return { size: blob.bytes.length, lastModified: blob.lastModified };
    },
    read: async (digest, range?: ByteRange): Promise<BytesStream | null> => {
      assertDigest(digest);
      const blob = blobs.get(digest);
      if (!blob) return null;
      const bytes = range ? blob.bytes.subarray(range.start, range.end + 1) : blob.bytes;
      return streamFromBytes(bytes);
    },
  };

  return {
    ...storage,
    /** Number of stagings neither published nor aborted */
    openStagings: () => openStagings,
    /** Get all stored digests */
    digests: () => Array.from(blobs.keys()),
    /** Remove a blob (simulates corruption; the store itself never deletes) */
    delete: (digest: string) => blobs.delete(digest),
  };
};

/**
 * Create an in-memory sidecar store with inspection methods (for testing)
 */
export const createMemoryMetaStore = () => {
  const records = new Map<string, BlobMeta>();

  const store: MetaStore = {
    get: async (digest) => {
      assertDigest(digest);
      return records.get(digest) ?? null;
    },
    put: async (digest, meta) => {
      assertDigest(digest);
      records.set(digest, { ...meta });
    },
  };

  return {
    ...store,
    /** Get all digests with a record */
    digests: () => Array.from(records.keys()),
    /** Delete a record (simulates a crash between publish and sidecar write) */
    delete: (digest: string) => records.delete(digest),
  };
};

export type MemoryBlobStorage = ReturnType<typeof createMemoryBlobStorage>;
export type MemoryMetaStore = ReturnType<typeof createMemoryMetaStore>;
