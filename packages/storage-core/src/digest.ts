/**
 * Digest utilities
 *
 * Digests are 64-character lowercase hex SHA-256 strings. They are used
 * directly to build file names, so the syntax check guards every path.
 */

export const DIGEST_ALGORITHM = "sha256";

export const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Media type used when nothing better is known
 */
export const DEFAULT_CONTENT_TYPE = "application/octet-stream";

/**
 * Validate digest format
 */
export const isValidDigest = (digest: string): boolean => DIGEST_PATTERN.test(digest);

/**
 * File name of a published blob
 *
 * Example: 2cf24dba... -> 2cf24dba....blob
 */
export const toBlobFileName = (digest: string): string => `${digest}.blob`;

/**
 * File name of a blob's sidecar metadata record
 */
export const toMetaFileName = (digest: string): string => `${digest}.meta.json`;

/**
 * Convert Uint8Array to hex string
 */
export const bytesToHex = (bytes: Uint8Array): string => {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
};
