/**
 * blobvault storage core
 *
 * Shared types, digest syntax and the error taxonomy used by every storage layer.
 */

// Digest utilities
export {
  bytesToHex,
  DEFAULT_CONTENT_TYPE,
  DIGEST_ALGORITHM,
  DIGEST_PATTERN,
  isValidDigest,
  toBlobFileName,
  toMetaFileName,
} from "./digest.ts";
// Errors
export {
  createStoreError,
  isStoreError,
  type StoreError,
  type StoreErrorCode,
  toStoreError,
} from "./errors.ts";
// Streams
export {
  bytesFromStream,
  concatBytes,
  streamFromBytes,
  streamFromChunks,
} from "./stream-util.ts";
// Types
export type {
  BlobMeta,
  BlobStaging,
  BlobStat,
  BlobStorage,
  ByteRange,
  BytesStream,
  MetaStore,
  PublishOutcome,
} from "./types.ts";
