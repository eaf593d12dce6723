import type { ContentStore } from "@blobvault/cas";
import type { KeyIndex } from "@blobvault/key-index";
import type { ByteRange, BytesStream } from "@blobvault/storage-core";

export type NamedObjectContext = {
  content: ContentStore;
  index: KeyIndex;
  /** Clock for modifiedAt (default: current time) */
  now?: () => Date;
};

export type NamedObject = {
  bucket: string;
  key: string;
  digest: string;
  size: number;
  contentType: string;
  modifiedAt: Date;
};

export type NamedObjectHandle = {
  object: NamedObject;
  /** Open the blob, or an inclusive range of it */
  open: (range?: ByteRange) => Promise<BytesStream>;
};
