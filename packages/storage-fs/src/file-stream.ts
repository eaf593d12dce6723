/**
 * Read a file (or an inclusive byte range of it) as a ReadableStream.
 *
 * The file is opened before the stream is returned, so a missing file is
 * reported to the caller instead of surfacing as a stream error mid-response.
 */

import { type FileHandle, open } from "node:fs/promises";
import type { ByteRange, BytesStream } from "@blobvault/storage-core";
import { isErrnoCode } from "./layout.ts";

const CHUNK_SIZE = 64 * 1024;

export const openFileStream = async (
  path: string,
  range?: ByteRange
): Promise<BytesStream | null> => {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (error: unknown) {
    if (isErrnoCode(error, "ENOENT")) return null;
    throw error;
  }

  let position = range?.start ?? 0;
  // Exclusive end
  const end = range ? range.end + 1 : Number.POSITIVE_INFINITY;
  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    await handle.close();
  };

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const length = Math.min(CHUNK_SIZE, end - position);
      if (length <= 0) {
        await close();
        controller.close();
        return;
      }
      try {
        const buffer = new Uint8Array(length);
        const { bytesRead } = await handle.read(buffer, 0, length, position);
        if (bytesRead === 0) {
          await close();
          controller.close();
          return;
        }
        position += bytesRead;
        controller.enqueue(buffer.subarray(0, bytesRead));
      } catch (error: unknown) {
        await close();
        controller.error(error);
      }
    },
    async cancel() {
      await close();
    },
  });
};
