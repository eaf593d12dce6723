/**
 * Ordered byte-keyed store with read and write transactions.
 *
 * Transaction callbacks are synchronous; `update` commits every write made
 * inside the callback or, when the callback throws, none of them.
 */

export type KvReadTx = {
  get: (key: Uint8Array) => Uint8Array | null;
};

export type KvWriteTx = KvReadTx & {
  put: (key: Uint8Array, value: Uint8Array) => void;
  /** Returns whether the key existed */
  delete: (key: Uint8Array) => boolean;
};

export type KvStore = {
  view: <T>(fn: (tx: KvReadTx) => T) => Promise<T>;
  update: <T>(fn: (tx: KvWriteTx) => T) => Promise<T>;
  close: () => Promise<void>;
};

export type ObjectPath = {
  bucket: string;
  key: string;
};

export type IndexEntry = {
  digest: string;
  size: number;
  contentType: string;
  /** ISO-8601 UTC timestamp */
  modifiedAt: string;
};
