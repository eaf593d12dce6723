/**
 * Named objects: `bucket/key` entries pointing at content-addressed blobs.
 *
 * A put publishes the blob first and writes the index entry after it, so an
 * entry never points at a blob that was not yet stored. Deleting a name leaves
 * the blob in place; other names or ids may still reference it.
 */
import type { IndexEntry, ObjectPath } from "@blobvault/key-index";
import { formatObjectPath, validateObjectPath } from "@blobvault/key-index";
import type { ByteRange, BytesStream } from "@blobvault/storage-core";
import { createStoreError } from "@blobvault/storage-core";
import type { NamedObject, NamedObjectContext, NamedObjectHandle } from "./types.ts";

const toNamedObject = ({ bucket, key }: ObjectPath, entry: IndexEntry): NamedObject => ({
  bucket,
  key,
  digest: entry.digest,
  size: entry.size,
  contentType: entry.contentType,
  modifiedAt: new Date(entry.modifiedAt),
});

const missingBlob = (path: ObjectPath, digest: string) =>
  createStoreError(
    "IntegrityFailure",
    `Index entry ${formatObjectPath(path)} refers to missing blob ${digest}`
  );

export function createNamedObjectFacade(ctx: NamedObjectContext) {
  const { content, index } = ctx;
  const now = ctx.now ?? (() => new Date());

  return {
    async putNamed(bucket: string, key: string, body: BytesStream): Promise<NamedObject> {
      const path = validateObjectPath({ bucket, key });
      const stored = await content.put(body);
      const entry: IndexEntry = {
        digest: stored.digest,
        size: stored.size,
        contentType: stored.contentType,
        modifiedAt: now().toISOString(),
      };
      await index.put(path, entry);
      return toNamedObject(path, entry);
    },

    /**
     * Resolve a name. Returns null when the name is unbound; throws
     * IntegrityFailure when it is bound to a blob that is gone.
     */
    async getNamed(bucket: string, key: string): Promise<NamedObjectHandle | null> {
      const path = validateObjectPath({ bucket, key });
      const entry = await index.get(path);
      if (entry === null) return null;

      const info = await content.stat(entry.digest);
      if (info === null) throw missingBlob(path, entry.digest);

      return {
        object: { ...toNamedObject(path, entry), size: info.size },
        open: async (range?: ByteRange) => {
          const stream = await content.read(entry.digest, range);
          if (stream === null) throw missingBlob(path, entry.digest);
          return stream;
        },
      };
    },

    /** Remove the name only; returns whether it was bound */
    async deleteNamed(bucket: string, key: string): Promise<boolean> {
      return index.delete(validateObjectPath({ bucket, key }));
    },
  };
}

export type NamedObjectFacade = ReturnType<typeof createNamedObjectFacade>;
