/**
 * Atomic blob writer.
 *
 * Bytes go to a uniquely named file in the staging directory. Publishing
 * fsyncs and closes it, then renames it onto `<digest>.blob`; the rename is
 * the only point where a blob becomes visible. Every other exit path closes
 * and deletes the staging file.
 */

import { randomUUID } from "node:crypto";
import { open, rename, rm } from "node:fs/promises";
import { join } from "node:path";
import type { BlobStaging, PublishOutcome } from "@blobvault/storage-core";
import { createStoreError, isValidDigest, toStoreError } from "@blobvault/storage-core";
import { isErrnoCode, pathExists, type StoreLayout, syncDirectory } from "./layout.ts";

export const STAGING_PREFIX = "put-";
export const STAGING_SUFFIX = ".tmp";

export type StagingOptions = {
  layout: StoreLayout;
  /** Existence check for the final blob, may be cached */
  exists: (digest: string) => Promise<boolean>;
  /** Called once the blob is known to exist under its digest */
  onPublished?: (digest: string) => void;
};

export type FsBlobStaging = BlobStaging & {
  /** Absolute path of the staging file */
  readonly path: string;
};

export const createStaging = async (options: StagingOptions): Promise<FsBlobStaging> => {
  const { layout, exists, onPublished } = options;
  const tmpPath = join(layout.stagingDir, `${STAGING_PREFIX}${randomUUID()}${STAGING_SUFFIX}`);
  const handle = await open(tmpPath, "wx", 0o644);
  let closed = false;
  let finished = false;

  const closeHandle = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    await handle.close();
  };

  const release = async (): Promise<void> => {
    if (finished) return;
    finished = true;
    try {
      await closeHandle();
    } finally {
      await rm(tmpPath, { force: true });
    }
  };

  const assertOpen = (): void => {
    if (finished) {
      throw createStoreError("StorageFailure", "Staging file already published or aborted");
    }
  };

  const write = async (chunk: Uint8Array): Promise<void> => {
    assertOpen();
    try {
      let offset = 0;
      while (offset < chunk.length) {
        const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
        offset += bytesWritten;
      }
    } catch (error: unknown) {
      await release();
      throw toStoreError("StorageFailure", error);
    }
  };

  const publish = async (digest: string): Promise<PublishOutcome> => {
    assertOpen();
    if (!isValidDigest(digest)) {
      await release();
      throw createStoreError("InvalidDigest", `Invalid digest: ${digest}`);
    }
    const finalPath = layout.blobPath(digest);
    try {
      // Content addressing: an existing blob under this digest holds the same
      // bytes, so re-publication is skipped and the staged copy discarded.
      if (await exists(digest)) {
        await release();
        return "existing";
      }

      await handle.sync();
      await closeHandle();

      try {
        await rename(tmpPath, finalPath);
      } catch (error: unknown) {
        // A concurrent publisher of the same digest won the rename
        if (
          (isErrnoCode(error, "EEXIST") || isErrnoCode(error, "EPERM")) &&
          (await pathExists(finalPath))
        ) {
          await release();
          onPublished?.(digest);
          return "existing";
        }
        throw error;
      }
      // The rename consumed the staging file
      finished = true;
      onPublished?.(digest);

      await syncDirectory(layout.rootDir);
      return "created";
    } catch (error: unknown) {
      await release();
      throw toStoreError("StorageFailure", error);
    }
  };

  return { path: tmpPath, write, publish, abort: release };
};
