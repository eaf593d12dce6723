import type { ErrorResponse } from "@blobvault/protocol";

/** Hono bindings */
export type Env = {
  Variables: Record<string, never>;
};

/** Unified error response body */
export type ErrorBody = ErrorResponse;
