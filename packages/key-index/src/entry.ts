import { DIGEST_PATTERN } from "@blobvault/storage-core";
import { z } from "zod";
import type { IndexEntry } from "./types.ts";

export const IndexEntrySchema = z.object({
  digest: z.string().regex(DIGEST_PATTERN),
  size: z.number().int().nonnegative(),
  contentType: z.string().min(1),
  modifiedAt: z.string().datetime(),
});

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const encodeIndexEntry = (entry: IndexEntry): Uint8Array =>
  encoder.encode(JSON.stringify(entry));

/**
 * Decode a stored record; returns null when it is not a valid entry.
 */
export const decodeIndexEntry = (bytes: Uint8Array): IndexEntry | null => {
  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(bytes));
  } catch {
    return null;
  }
  const parsed = IndexEntrySchema.safeParse(json);
  return parsed.success ? parsed.data : null;
};
