/**
 * Upload bodies.
 *
 * @hono/node-server gives every POST and PUT a body stream, even when the
 * client sent nothing, so an upload counts as present only once a first
 * byte has arrived.
 */
import { toStoreError } from "@blobvault/storage-core";

/**
 * Returns the request body with its first chunk already read, or null when
 * the request carries no bytes.
 */
export async function takeUploadBody(req: Request): Promise<ReadableStream<Uint8Array> | null> {
  if (req.body === null || req.headers.get("content-length") === "0") return null;

  const reader = req.body.getReader();
  let head: Uint8Array | null = null;
  try {
    while (head === null) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value.byteLength > 0) head = value;
    }
  } catch (err) {
    throw toStoreError("StorageFailure", err);
  }
  if (head === null) {
    reader.releaseLock();
    return null;
  }

  const first = head;
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(first);
    },
    async pull(controller) {
      const { done, value } = await reader.read();
      if (done) controller.close();
      else controller.enqueue(value);
    },
    cancel(reason) {
      return reader.cancel(reason);
    },
  });
}
