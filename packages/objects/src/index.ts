/**
 * blobvault objects
 *
 * Named-object façade over the content store and key index, plus the wiring
 * of a local store directory.
 */

export {
  INDEX_FILE_NAME,
  type LocalObjectStore,
  type LocalObjectStoreConfig,
  openLocalObjectStore,
} from "./local-store.ts";
export { createNamedObjectFacade, type NamedObjectFacade } from "./named-object-facade.ts";
export type { NamedObject, NamedObjectContext, NamedObjectHandle } from "./types.ts";
