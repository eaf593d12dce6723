/**
 * blobvault protocol - wire schemas and error codes shared by server and clients
 *
 * @packageDocumentation
 */

// ============================================================================
// Error codes
// ============================================================================

export type { ErrorCode, ErrorResponse } from "./errors.ts";
export {
  EMPTY_BODY,
  ErrorCodeSchema,
  ErrorResponseSchema,
  INDEX_ERROR,
  INTEGRITY_ERROR,
  INTERNAL_ERROR,
  INVALID_ID,
  INVALID_PATH,
  METHOD_NOT_ALLOWED,
  NOT_FOUND,
  STORAGE_ERROR,
} from "./errors.ts";

// ============================================================================
// Object schemas
// ============================================================================

export type { NamedObjectResponse, PutObjectResponse } from "./objects.ts";
export {
  HEALTH_OK_BODY,
  NamedObjectResponseSchema,
  PutObjectResponseSchema,
} from "./objects.ts";
