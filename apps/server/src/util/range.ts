/**
 * Single `Range: bytes=...` header evaluation against a representation of
 * `size` bytes.
 *
 * Multi-range and malformed headers (`bytes=5-1`, other units, several
 * ranges) are ignored and the full representation is served with 200, as
 * RFC 9110 section 14.2 permits. No 416 is sent for bad syntax and no
 * multipart/byteranges body is produced. Only a well-formed range that does
 * not overlap the representation is unsatisfiable.
 */
import type { ByteRange } from "@blobvault/storage-core";

export type RangeResult =
  | { kind: "full" }
  | { kind: "partial"; range: ByteRange }
  | { kind: "unsatisfiable" };

const FULL: RangeResult = { kind: "full" };
const UNSATISFIABLE: RangeResult = { kind: "unsatisfiable" };

const DIGITS = /^\d+$/;

export function parseRangeHeader(header: string | undefined, size: number): RangeResult {
  if (header === undefined) return FULL;
  const value = header.trim();
  if (!value.startsWith("bytes=")) return FULL;
  const rangeSet = value.slice("bytes=".length).trim();
  if (rangeSet.includes(",")) return FULL;

  const dash = rangeSet.indexOf("-");
  if (dash < 0) return FULL;
  const first = rangeSet.slice(0, dash).trim();
  const last = rangeSet.slice(dash + 1).trim();

  if (first === "") {
    // Suffix: the last N bytes
    if (!DIGITS.test(last)) return FULL;
    const length = Number(last);
    if (length === 0 || size === 0) return UNSATISFIABLE;
    return { kind: "partial", range: { start: Math.max(0, size - length), end: size - 1 } };
  }

  if (!DIGITS.test(first) || (last !== "" && !DIGITS.test(last))) return FULL;
  const start = Number(first);
  if (last !== "" && Number(last) < start) return FULL;
  if (start >= size) return UNSATISFIABLE;
  const end = last === "" ? size - 1 : Math.min(Number(last), size - 1);
  return { kind: "partial", range: { start, end } };
}

export const formatContentRange = ({ start, end }: ByteRange, size: number): string =>
  `bytes ${start}-${end}/${size}`;

export const formatUnsatisfiedRange = (size: number): string => `bytes */${size}`;
