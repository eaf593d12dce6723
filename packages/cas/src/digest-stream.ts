/**
 * Single-pass stream processing: hash every byte, classify the media type
 * from a bounded prefix, and forward all bytes to a sink unmodified.
 *
 * The prefix (up to `sniffLength` bytes) is held back until it is complete or
 * the stream ends, so classification runs once and nothing is read twice.
 */

import { createHash } from "node:crypto";
import type { BytesStream } from "@blobvault/storage-core";
import { concatBytes, DIGEST_ALGORITHM } from "@blobvault/storage-core";
import { sniffContentType } from "./sniff.ts";

export const DEFAULT_SNIFF_LENGTH = 512;

export type ChunkSink = {
  write: (chunk: Uint8Array) => Promise<void>;
};

export type ProcessOptions = {
  /** Number of leading bytes used for classification (default: 512) */
  sniffLength?: number;
};

export type ProcessResult = {
  digest: string;
  size: number;
  contentType: string;
};

export async function processStream(
  input: BytesStream,
  sink: ChunkSink,
  options: ProcessOptions = {}
): Promise<ProcessResult> {
  const sniffLength = options.sniffLength ?? DEFAULT_SNIFF_LENGTH;
  const hash = createHash(DIGEST_ALGORITHM);
  const reader = input.getReader();
  let size = 0;
  let prefix: Uint8Array[] = [];
  let prefixLength = 0;
  let contentType: string | null = null;

  const forward = async (chunk: Uint8Array): Promise<void> => {
    hash.update(chunk);
    size += chunk.length;
    await sink.write(chunk);
  };

  const flushPrefix = async (): Promise<string> => {
    const head = concatBytes(prefix, prefixLength);
    prefix = [];
    const sniffed = sniffContentType(head.subarray(0, sniffLength));
    if (head.length > 0) await forward(head);
    return sniffed;
  };

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!value || value.length === 0) continue;
      if (contentType === null) {
        prefix.push(value);
        prefixLength += value.length;
        if (prefixLength >= sniffLength) contentType = await flushPrefix();
        continue;
      }
      await forward(value);
    }
    if (contentType === null) contentType = await flushPrefix();
  } catch (error: unknown) {
    // Stop the producer. cancel() on a stream that already errored rejects
    // with that same error, which is rethrown below.
    await reader.cancel(error).then(
      () => undefined,
      () => undefined
    );
    throw error;
  } finally {
    reader.releaseLock();
  }

  return { digest: hash.digest("hex"), size, contentType };
}
