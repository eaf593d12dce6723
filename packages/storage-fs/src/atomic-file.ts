import { randomUUID } from "node:crypto";
import { open, rename, rm } from "node:fs/promises";
import { join } from "node:path";

/**
 * Write a small file whole: temp file in `stagingDir`, fsync, rename onto `path`.
 * Readers see either the previous file or the complete new one.
 */
export const writeFileAtomic = async (
  path: string,
  data: Uint8Array,
  stagingDir: string
): Promise<void> => {
  const tmpPath = join(stagingDir, `meta-${randomUUID()}.tmp`);
  let renamed = false;
  try {
    const handle = await open(tmpPath, "wx", 0o644);
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmpPath, path);
    renamed = true;
  } finally {
    if (!renamed) await rm(tmpPath, { force: true });
  }
};
