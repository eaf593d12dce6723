export type StoreErrorCode =
  | "InvalidDigest"
  | "InvalidPath"
  | "NotFound"
  | "StorageFailure"
  | "IntegrityFailure"
  | "IndexFailure";

export type StoreError = {
  readonly name: "StoreError";
  readonly code: StoreErrorCode;
  message: string;
  cause?: unknown;
};

export function createStoreError(
  code: StoreErrorCode,
  message?: string,
  cause?: unknown
): StoreError {
  const error: StoreError = { name: "StoreError", code, message: message ?? code };
  if (cause !== undefined) error.cause = cause;
  return error;
}

export function isStoreError(x: unknown): x is StoreError {
  return (
    typeof x === "object" &&
    x !== null &&
    "name" in x &&
    x.name === "StoreError" &&
    "code" in x
  );
}

/**
 * Pass StoreErrors through, wrap anything else under the given code.
 */
export function toStoreError(code: StoreErrorCode, error: unknown): StoreError {
  if (isStoreError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return createStoreError(code, message, error);
}
