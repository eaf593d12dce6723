import { createStoreError } from "@blobvault/storage-core";
import type { ObjectPath } from "./types.ts";

/**
 * Split `bucket/key` (one optional leading slash) on its first `/`.
 * The key keeps any further slashes. Throws InvalidPath when either part is empty.
 */
export function parseObjectPath(path: string): ObjectPath {
  const trimmed = path.startsWith("/") ? path.slice(1) : path;
  const slash = trimmed.indexOf("/");
  if (slash <= 0 || slash === trimmed.length - 1) {
    throw createStoreError("InvalidPath", `Invalid object path: ${path}`);
  }
  return { bucket: trimmed.slice(0, slash), key: trimmed.slice(slash + 1) };
}

export function formatObjectPath({ bucket, key }: ObjectPath): string {
  return `${bucket}/${key}`;
}

/**
 * Check a bucket/key pair given separately. The bucket may not contain `/`.
 */
export function validateObjectPath(path: ObjectPath): ObjectPath {
  if (path.bucket.length === 0 || path.key.length === 0 || path.bucket.includes("/")) {
    throw createStoreError(
      "InvalidPath",
      `Invalid object path: ${path.bucket}/${path.key}`
    );
  }
  return path;
}
