/**
 * Anonymous objects: POST /objects stores a body, GET|HEAD /objects/:id
 * serves it by digest.
 */
import type { ContentStore } from "@blobvault/cas";
import { EMPTY_BODY, NOT_FOUND, type PutObjectResponse } from "@blobvault/protocol";
import type { Context } from "hono";
import type { Env } from "../types.ts";
import { takeUploadBody } from "../util/body.ts";
import { errorJson, handleStoreError } from "../util/errors.ts";
import { serveBlob } from "../util/serve-blob.ts";

export type ObjectsControllerDeps = {
  content: ContentStore;
};

const OBJECTS_PREFIX = "/objects/";

export function createObjectsController(deps: ObjectsControllerDeps) {
  return {
    async put(c: Context<Env>) {
      try {
        const body = await takeUploadBody(c.req.raw);
        if (body === null) {
          return errorJson(c, 400, EMPTY_BODY, "Request body is required");
        }
        const stored = await deps.content.put(body);
        const response: PutObjectResponse = {
          id: stored.digest,
          size: stored.size,
          content_type: stored.contentType,
        };
        return c.json(response, 200);
      } catch (err) {
        return handleStoreError(c, err);
      }
    },

    async get(c: Context<Env>) {
      const id = c.req.path.slice(OBJECTS_PREFIX.length);
      try {
        // Rejects malformed ids before any storage access
        const blob = await deps.content.get(id);
        if (blob === null) {
          return errorJson(c, 404, NOT_FOUND, `Object not found: ${id}`);
        }
        return await serveBlob(c, blob);
      } catch (err) {
        return handleStoreError(c, err);
      }
    },
  };
}
