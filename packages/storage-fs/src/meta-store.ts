/**
 * Sidecar metadata store: one JSON record per digest, written whole.
 *
 * On disk the record is `{ "content_type": string, "size": number }`, the
 * layout existing store directories already use.
 */

import { readFile } from "node:fs/promises";
import type { BlobMeta, MetaStore } from "@blobvault/storage-core";
import { createStoreError, isValidDigest, toStoreError } from "@blobvault/storage-core";
import { z } from "zod";
import { writeFileAtomic } from "./atomic-file.ts";
import { isErrnoCode, type StoreLayout } from "./layout.ts";

export const SidecarRecordSchema = z.object({
  content_type: z.string().min(1),
  size: z.number().int().nonnegative(),
});

export type SidecarRecord = z.infer<typeof SidecarRecordSchema>;

const toRecord = (meta: BlobMeta): SidecarRecord => ({
  content_type: meta.contentType,
  size: meta.size,
});

const encoder = new TextEncoder();

const parseMeta = (text: string): BlobMeta | null => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    // Unparseable sidecars read as missing; the next put of the blob rewrites them
    return null;
  }
  const parsed = SidecarRecordSchema.safeParse(raw);
  if (!parsed.success) return null;
  return { contentType: parsed.data.content_type, size: parsed.data.size };
};

export const createFsMetaStore = (layout: StoreLayout): MetaStore => {
  const assertDigest = (digest: string): void => {
    if (!isValidDigest(digest)) {
      throw createStoreError("InvalidDigest", `Invalid digest: ${digest}`);
    }
  };

  const get = async (digest: string): Promise<BlobMeta | null> => {
    assertDigest(digest);
    try {
      const text = await readFile(layout.metaPath(digest), "utf8");
      return parseMeta(text);
    } catch (error: unknown) {
      if (isErrnoCode(error, "ENOENT")) return null;
      throw toStoreError("StorageFailure", error);
    }
  };

  const put = async (digest: string, meta: BlobMeta): Promise<void> => {
    assertDigest(digest);
    const record = SidecarRecordSchema.parse(toRecord(meta));
    try {
      await writeFileAtomic(
        layout.metaPath(digest),
        encoder.encode(JSON.stringify(record)),
        layout.stagingDir
      );
    } catch (error: unknown) {
      throw toStoreError("StorageFailure", error);
    }
  };

  return { get, put };
};
