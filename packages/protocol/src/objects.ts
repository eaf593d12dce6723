/**
 * Response bodies of the object and named-object routes.
 */

import { DIGEST_PATTERN } from "@blobvault/storage-core";
import { z } from "zod";

const ObjectIdSchema = z.string().regex(DIGEST_PATTERN, "Invalid object id");

/** POST /objects */
export const PutObjectResponseSchema = z.object({
  id: ObjectIdSchema,
  size: z.number().int().nonnegative(),
  content_type: z.string(),
});
export type PutObjectResponse = z.infer<typeof PutObjectResponseSchema>;

/** PUT /{bucket}/{key} */
export const NamedObjectResponseSchema = z.object({
  bucket: z.string().min(1),
  key: z.string().min(1),
  id: ObjectIdSchema,
  size: z.number().int().nonnegative(),
  content_type: z.string(),
  modified_at: z.string().datetime(),
});
export type NamedObjectResponse = z.infer<typeof NamedObjectResponseSchema>;

/** GET /healthz body */
export const HEALTH_OK_BODY = "ok\n";
