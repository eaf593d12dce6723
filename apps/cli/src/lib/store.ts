import { type LocalObjectStore, openLocalObjectStore } from "@blobvault/objects";
import type { OutputFormatter } from "./output.ts";

export const DEFAULT_STORE_DIR = "./store";

export type StoreOptions = {
  store?: string;
};

export const resolveStoreDir = (opts: StoreOptions): string =>
  opts.store ?? process.env.STORE_DIR ?? DEFAULT_STORE_DIR;

/**
 * Open the local store for the duration of `fn`.
 */
export async function withStore<T>(
  opts: StoreOptions,
  formatter: OutputFormatter,
  fn: (store: LocalObjectStore) => Promise<T>
): Promise<T> {
  const store = await openLocalObjectStore({ rootDir: resolveStoreDir(opts) });
  formatter.debug(`Opened store at ${store.layout.rootDir}`);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
