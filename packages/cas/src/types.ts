import type { BlobStorage, ByteRange, BytesStream, MetaStore } from "@blobvault/storage-core";

/**
 * Dependencies of the content store: a blob backend and its sidecar store.
 */
export type ContentStoreContext = {
  storage: BlobStorage;
  meta: MetaStore;
  /** Leading bytes used for media-type classification (default: 512) */
  sniffLength?: number;
};

/**
 * Result of ingesting a stream. `created` is false when the bytes were
 * already stored; HTTP responses do not expose the difference.
 */
export type PutResult = {
  digest: string;
  size: number;
  contentType: string;
  created: boolean;
};

export type BlobInfo = {
  digest: string;
  contentType: string;
  size: number;
  lastModified: Date;
};

/**
 * A blob found by digest; the body is opened on demand so HEAD and
 * not-modified responses never touch the file.
 */
export type BlobHandle = BlobInfo & {
  open: (range?: ByteRange) => Promise<BytesStream>;
};
