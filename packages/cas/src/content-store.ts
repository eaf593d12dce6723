import type { BlobMeta, ByteRange, BytesStream } from "@blobvault/storage-core";
import {
  createStoreError,
  DEFAULT_CONTENT_TYPE,
  isValidDigest,
  toStoreError,
} from "@blobvault/storage-core";
import { type ProcessResult, processStream } from "./digest-stream.ts";
import type { BlobHandle, BlobInfo, ContentStoreContext, PutResult } from "./types.ts";

const assertDigest = (digest: string): void => {
  if (!isValidDigest(digest)) {
    throw createStoreError("InvalidDigest", `Invalid digest: ${digest}`);
  }
};

/**
 * Creates the content store: put(stream) -> digest, get(digest) -> blob.
 */
export function createContentStore(ctx: ContentStoreContext) {
  const { storage, meta } = ctx;

  const stat = async (digest: string): Promise<BlobInfo | null> => {
    assertDigest(digest);
    const found = await storage.stat(digest);
    if (found === null) return null;
    const record = await meta.get(digest);
    return {
      digest,
      contentType: record?.contentType ?? DEFAULT_CONTENT_TYPE,
      size: found.size,
      lastModified: found.lastModified,
    };
  };

  const read = async (digest: string, range?: ByteRange): Promise<BytesStream | null> => {
    assertDigest(digest);
    return storage.read(digest, range);
  };

  return {
    async put(body: BytesStream): Promise<PutResult> {
      const staging = await storage.stage();
      let result: ProcessResult;
      try {
        result = await processStream(body, staging, { sniffLength: ctx.sniffLength });
      } catch (error: unknown) {
        await staging.abort();
        throw toStoreError("StorageFailure", error);
      }

      const outcome = await staging.publish(result.digest);
      const record: BlobMeta = { contentType: result.contentType, size: result.size };
      if (outcome === "created") {
        await meta.put(result.digest, record);
      } else if ((await meta.get(result.digest)) === null) {
        // Blob published by an earlier put that failed before its sidecar landed
        await meta.put(result.digest, record);
      }

      return { ...result, created: outcome === "created" };
    },

    has: async (digest: string): Promise<boolean> => {
      assertDigest(digest);
      return storage.has(digest);
    },

    stat,

    read,

    async get(digest: string): Promise<BlobHandle | null> {
      const info = await stat(digest);
      if (info === null) return null;
      return {
        ...info,
        open: async (range?: ByteRange) => {
          const stream = await read(digest, range);
          if (stream === null) {
            throw createStoreError("NotFound", `Blob ${digest} disappeared while reading`);
          }
          return stream;
        },
      };
    },
  };
}

export type ContentStore = ReturnType<typeof createContentStore>;
