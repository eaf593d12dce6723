/**
 * Storage port types shared by the blob backends and the content store.
 *
 * Blobs are addressed by their lowercase hex SHA-256 digest. A backend stages
 * incoming bytes, then publishes them under the digest once it is known.
 */

/**
 * Byte stream type used for blob bodies.
 */
export type BytesStream = ReadableStream<Uint8Array>;

/**
 * Inclusive byte range within a blob.
 */
export type ByteRange = {
  start: number;
  end: number;
};

/**
 * Sidecar record stored next to every blob.
 */
export type BlobMeta = {
  contentType: string;
  size: number;
};

/**
 * What the backend itself knows about a published blob.
 */
export type BlobStat = {
  size: number;
  lastModified: Date;
};

/**
 * Outcome of a publish: a fresh write, or a no-op because the blob was already there.
 */
export type PublishOutcome = "created" | "existing";

/**
 * An in-flight write. Exactly one of `publish` or `abort` finishes it;
 * both release the staging resources on every path.
 */
export type BlobStaging = {
  write: (chunk: Uint8Array) => Promise<void>;
  publish: (digest: string) => Promise<PublishOutcome>;
  abort: () => Promise<void>;
};

/**
 * Blob backend: staging, publication and reads by digest.
 */
export type BlobStorage = {
  stage: () => Promise<BlobStaging>;
  has: (digest: string) => Promise<boolean>;
  /** Returns null if the blob does not exist */
  stat: (digest: string) => Promise<BlobStat | null>;
  /** Opens the blob eagerly; null if it does not exist */
  read: (digest: string, range?: ByteRange) => Promise<BytesStream | null>;
};

/**
 * Sidecar metadata backend, addressed by the same digest as the blob.
 */
export type MetaStore = {
  get: (digest: string) => Promise<BlobMeta | null>;
  put: (digest: string, meta: BlobMeta) => Promise<void>;
};
