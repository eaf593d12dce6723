/**
 * StoreError → HTTP mapping.
 *
 * StoreErrors are plain objects, which Hono's onError never sees, so
 * controllers route them through `handleStoreError`.
 */
import {
  type ErrorCode,
  INDEX_ERROR,
  INTEGRITY_ERROR,
  INVALID_ID,
  INVALID_PATH,
  NOT_FOUND,
  STORAGE_ERROR,
} from "@blobvault/protocol";
import { isStoreError, type StoreError, type StoreErrorCode } from "@blobvault/storage-core";
import type { Context } from "hono";
import type { Env, ErrorBody } from "../types.ts";

export type ErrorStatus = 400 | 404 | 405 | 412 | 500;

const STORE_ERROR_MAP: Record<StoreErrorCode, { status: ErrorStatus; error: ErrorCode }> = {
  InvalidDigest: { status: 400, error: INVALID_ID },
  InvalidPath: { status: 400, error: INVALID_PATH },
  NotFound: { status: 404, error: NOT_FOUND },
  StorageFailure: { status: 500, error: STORAGE_ERROR },
  IntegrityFailure: { status: 500, error: INTEGRITY_ERROR },
  IndexFailure: { status: 500, error: INDEX_ERROR },
};

export const errorJson = (
  c: Context<Env>,
  status: ErrorStatus,
  error: ErrorCode,
  message: string,
  headers?: Record<string, string>
) => {
  const body: ErrorBody = { error, message };
  return c.json(body, status, headers);
};

export const storeErrorResponse = (c: Context<Env>, err: StoreError) => {
  const { status, error } = STORE_ERROR_MAP[err.code];
  if (status === 500) {
    console.error(`[blobvault] ${c.req.method} ${c.req.path}: ${err.code}: ${err.message}`);
  }
  return errorJson(c, status, error, err.message);
};

/**
 * Map a StoreError to its response; anything else is rethrown to onError.
 */
export const handleStoreError = (c: Context<Env>, err: unknown): Response => {
  if (isStoreError(err)) return storeErrorResponse(c, err);
  throw err;
};
