/**
 * On-disk layout of a store directory:
 *
 * ```
 * <rootDir>/
 *   <digest>.blob        one file per blob
 *   <digest>.meta.json   sidecar metadata
 *   index.db             bucket/key index (see @blobvault/objects)
 *   tmp/                 staging files of in-flight writes
 * ```
 *
 * The staging directory lives under the root so renames never cross volumes.
 */

import { mkdir, open, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { toBlobFileName, toMetaFileName } from "@blobvault/storage-core";

const STAGING_DIR_NAME = "tmp";

export type StoreLayout = {
  rootDir: string;
  stagingDir: string;
  blobPath: (digest: string) => string;
  metaPath: (digest: string) => string;
};

export const createStoreLayout = (rootDir: string): StoreLayout => {
  const root = resolve(rootDir);
  return {
    rootDir: root,
    stagingDir: join(root, STAGING_DIR_NAME),
    blobPath: (digest) => join(root, toBlobFileName(digest)),
    metaPath: (digest) => join(root, toMetaFileName(digest)),
  };
};

/**
 * Create the root and staging directories if they are missing.
 */
export const ensureStoreLayout = async (layout: StoreLayout): Promise<void> => {
  await mkdir(layout.rootDir, { recursive: true });
  await mkdir(layout.stagingDir, { recursive: true });
};

export const isErrnoCode = (error: unknown, code: string): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === code;

export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await stat(path);
    return true;
  } catch (error: unknown) {
    if (isErrnoCode(error, "ENOENT")) return false;
    throw error;
  }
};

/**
 * fsync a directory so a rename inside it survives a crash. No-op on Windows,
 * which cannot open directories for syncing.
 */
export const syncDirectory = async (dir: string): Promise<void> => {
  if (process.platform === "win32") return;
  const handle = await open(dir, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
};
