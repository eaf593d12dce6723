/**
 * Named objects: PUT|GET|HEAD|DELETE /:bucket/:key
 */
import type { NamedObject, NamedObjectFacade } from "@blobvault/objects";
import { EMPTY_BODY, type NamedObjectResponse, NOT_FOUND } from "@blobvault/protocol";
import { createStoreError } from "@blobvault/storage-core";
import type { Context } from "hono";
import type { Env } from "../types.ts";
import { takeUploadBody } from "../util/body.ts";
import { errorJson, handleStoreError } from "../util/errors.ts";
import { serveBlob, toEtag } from "../util/serve-blob.ts";

/** Bucket names taken by the service's own routes */
export const RESERVED_BUCKETS: ReadonlySet<string> = new Set(["objects", "healthz"]);

export type NamedControllerDeps = {
  objects: NamedObjectFacade;
};

const toResponse = (object: NamedObject): NamedObjectResponse => ({
  bucket: object.bucket,
  key: object.key,
  id: object.digest,
  size: object.size,
  content_type: object.contentType,
  modified_at: object.modifiedAt.toISOString(),
});

const getPath = (c: Context<Env>) => {
  const bucket = c.req.param("bucket") ?? "";
  const key = c.req.param("key") ?? "";
  if (RESERVED_BUCKETS.has(bucket)) {
    throw createStoreError("InvalidPath", `Bucket name is reserved: ${bucket}`);
  }
  return { bucket, key };
};

export function createNamedController(deps: NamedControllerDeps) {
  return {
    async put(c: Context<Env>) {
      try {
        const { bucket, key } = getPath(c);
        const body = await takeUploadBody(c.req.raw);
        if (body === null) {
          return errorJson(c, 400, EMPTY_BODY, "Request body is required");
        }
        const stored = await deps.objects.putNamed(bucket, key, body);
        return c.json(toResponse(stored), 201, { ETag: toEtag(stored.digest) });
      } catch (err) {
        return handleStoreError(c, err);
      }
    },

    async get(c: Context<Env>) {
      try {
        const { bucket, key } = getPath(c);
        const found = await deps.objects.getNamed(bucket, key);
        if (found === null) {
          return errorJson(c, 404, NOT_FOUND, `No object at ${bucket}/${key}`);
        }
        return await serveBlob(c, {
          digest: found.object.digest,
          size: found.object.size,
          contentType: found.object.contentType,
          lastModified: found.object.modifiedAt,
          open: found.open,
        });
      } catch (err) {
        return handleStoreError(c, err);
      }
    },

    async delete(c: Context<Env>) {
      try {
        const { bucket, key } = getPath(c);
        await deps.objects.deleteNamed(bucket, key);
        return c.body(null, 204);
      } catch (err) {
        return handleStoreError(c, err);
      }
    },
  };
}
