export { type ContentStore, createContentStore } from "./content-store.ts";
export {
  type ChunkSink,
  DEFAULT_SNIFF_LENGTH,
  type ProcessOptions,
  type ProcessResult,
  processStream,
} from "./digest-stream.ts";
export { sniffContentType, TEXT_CONTENT_TYPE } from "./sniff.ts";
export type { BlobHandle, BlobInfo, ContentStoreContext, PutResult } from "./types.ts";
