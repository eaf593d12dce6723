import { type FileHandle, open } from "node:fs/promises";
import { openFileStream } from "@blobvault/storage-fs";
import type { BytesStream } from "@blobvault/storage-core";

const toBytes = (chunk: unknown): Uint8Array =>
  chunk instanceof Uint8Array ? chunk : new TextEncoder().encode(String(chunk));

/** Read `file` (or stdin for `-`) as a byte stream */
export async function openInput(file: string): Promise<BytesStream> {
  if (file === "-") {
    const iterator = process.stdin[Symbol.asyncIterator]();
    return new ReadableStream<Uint8Array>({
      async pull(controller) {
        const { done, value } = await iterator.next();
        if (done) {
          controller.close();
          return;
        }
        controller.enqueue(toBytes(value));
      },
      async cancel() {
        await iterator.return?.();
      },
    });
  }
  const stream = await openFileStream(file);
  if (stream === null) throw new Error(`File not found: ${file}`);
  return stream;
}

const writeToFile = async (handle: FileHandle, chunk: Uint8Array): Promise<void> => {
  let offset = 0;
  while (offset < chunk.length) {
    const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
    offset += bytesWritten;
  }
};

const writeToStdout = (chunk: Uint8Array): Promise<void> =>
  new Promise((resolve, reject) => {
    process.stdout.write(chunk, (err) => (err ? reject(err) : resolve()));
  });

/** Copy a stream to `output`, or to stdout when no path is given; returns the byte count */
export async function writeOutput(stream: BytesStream, output?: string): Promise<number> {
  const handle = output === undefined ? null : await open(output, "w");
  const reader = stream.getReader();
  let written = 0;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (handle) await writeToFile(handle, value);
      else await writeToStdout(value);
      written += value.length;
    }
  } finally {
    reader.releaseLock();
    await handle?.close();
  }
  return written;
}
