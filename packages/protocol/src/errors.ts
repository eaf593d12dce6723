/**
 * Error codes for the blobvault HTTP API
 *
 * These error codes are used in API responses to provide
 * machine-readable error information.
 */

import { z } from "zod";

// ============================================================================
// Request Error Codes
// ============================================================================

/** Object id is not a lowercase hex SHA-256 digest */
export const INVALID_ID = "INVALID_ID";

/** Path is not of the form bucket/key */
export const INVALID_PATH = "INVALID_PATH";

/** Upload carried no body */
export const EMPTY_BODY = "EMPTY_BODY";

/** Method not supported on this route */
export const METHOD_NOT_ALLOWED = "METHOD_NOT_ALLOWED";

// ============================================================================
// Resource Error Codes
// ============================================================================

/** No blob with this id, or no entry under this name */
export const NOT_FOUND = "NOT_FOUND";

// ============================================================================
// Server Error Codes
// ============================================================================

/** Blob or sidecar I/O failed */
export const STORAGE_ERROR = "STORAGE_ERROR";

/** Index entry refers to a blob that does not exist, or is unreadable */
export const INTEGRITY_ERROR = "INTEGRITY_ERROR";

/** Index store failed */
export const INDEX_ERROR = "INDEX_ERROR";

/** Internal server error */
export const INTERNAL_ERROR = "INTERNAL_ERROR";

// ============================================================================
// Error Response Schema
// ============================================================================

/**
 * All error codes as a union type
 */
export const ErrorCodeSchema = z.enum([
  INVALID_ID,
  INVALID_PATH,
  EMPTY_BODY,
  METHOD_NOT_ALLOWED,
  NOT_FOUND,
  STORAGE_ERROR,
  INTEGRITY_ERROR,
  INDEX_ERROR,
  INTERNAL_ERROR,
]);

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

/**
 * Standard error response schema
 */
export const ErrorResponseSchema = z.object({
  /** Machine-readable error code */
  error: ErrorCodeSchema,
  /** Human-readable error message */
  message: z.string(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
