/**
 * Media type classification from a bounded prefix of the content, following
 * the WHATWG MIME Sniffing rules for unlabelled resources. The signature
 * table is data (sniff-signatures.json); the order of entries is the order
 * of precedence.
 */

import { DEFAULT_CONTENT_TYPE } from "@blobvault/storage-core";
import { z } from "zod";
import table from "./sniff-signatures.json";

export const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";

const hexString = z.string().regex(/^(?:[0-9a-f]{2})+$/);

const SignatureSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("html"), contentType: z.string(), tags: z.array(z.string()) }),
  z.object({
    kind: z.literal("masked"),
    contentType: z.string(),
    pattern: hexString,
    mask: hexString.optional(),
    skipWhitespace: z.boolean().optional(),
  }),
  z.object({ kind: z.literal("mp4"), contentType: z.string() }),
]);

const SignatureTableSchema = z.object({ signatures: z.array(SignatureSchema) });

type Matcher = (data: Uint8Array, firstNonWs: number) => string | null;

const hexToBytes = (hex: string): Uint8Array => {
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = Number.parseInt(hex.slice(i, i + 2), 16);
  }
  return bytes;
};

const isWhitespace = (b: number): boolean =>
  b === 0x09 || b === 0x0a || b === 0x0c || b === 0x0d || b === 0x20;

// Tag-terminating byte: space or '>'
const isTagTerminator = (b: number): boolean => b === 0x20 || b === 0x3e;

const isBinaryByte = (b: number): boolean =>
  b <= 0x08 || b === 0x0b || (b >= 0x0e && b <= 0x1a) || (b >= 0x1c && b <= 0x1f);

const htmlMatcher = (tag: string, contentType: string): Matcher => {
  const pattern = new TextEncoder().encode(tag);
  return (data, firstNonWs) => {
    const rest = data.subarray(firstNonWs);
    if (rest.length < pattern.length + 1) return null;
    for (let i = 0; i < pattern.length; i++) {
      const expected = pattern[i] ?? 0;
      let actual = rest[i] ?? 0;
      // Letters in the tag match either case
      if (expected >= 0x41 && expected <= 0x5a) actual &= 0xdf;
      if (actual !== expected) return null;
    }
    return isTagTerminator(rest[pattern.length] ?? 0) ? contentType : null;
  };
};

const maskedMatcher = (
  patternHex: string,
  maskHex: string | undefined,
  skipWhitespace: boolean,
  contentType: string
): Matcher => {
  const pattern = hexToBytes(patternHex);
  const mask = maskHex ? hexToBytes(maskHex) : new Uint8Array(pattern.length).fill(0xff);
  if (mask.length !== pattern.length) {
    throw new Error(`Sniff signature for ${contentType} has mismatched mask length`);
  }
  return (data, firstNonWs) => {
    const subject = skipWhitespace ? data.subarray(firstNonWs) : data;
    if (subject.length < pattern.length) return null;
    for (let i = 0; i < pattern.length; i++) {
      if (((subject[i] ?? 0) & (mask[i] ?? 0)) !== pattern[i]) return null;
    }
    return contentType;
  };
};

const FTYP = [0x66, 0x74, 0x79, 0x70];
const MP4 = [0x6d, 0x70, 0x34];

const mp4Matcher = (contentType: string): Matcher => {
  const equalsAt = (data: Uint8Array, offset: number, expected: number[]): boolean =>
    expected.every((b, i) => data[offset + i] === b);

  return (data) => {
    if (data.length < 12) return null;
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const boxSize = view.getUint32(0);
    if (data.length < boxSize || boxSize % 4 !== 0) return null;
    if (!equalsAt(data, 4, FTYP)) return null;
    for (let offset = 8; offset < boxSize; offset += 4) {
      // Bytes 12-15 hold the minor version, not a brand
      if (offset === 12) continue;
      if (equalsAt(data, offset, MP4)) return contentType;
    }
    return null;
  };
};

const buildMatchers = (): Matcher[] => {
  const { signatures } = SignatureTableSchema.parse(table);
  return signatures.flatMap((sig): Matcher[] => {
    switch (sig.kind) {
      case "html":
        return sig.tags.map((tag) => htmlMatcher(tag, sig.contentType));
      case "masked":
        return [
          maskedMatcher(sig.pattern, sig.mask, sig.skipWhitespace ?? false, sig.contentType),
        ];
      case "mp4":
        return [mp4Matcher(sig.contentType)];
    }
  });
};

const matchers = buildMatchers();

/**
 * Classify content from its leading bytes. Empty input is
 * application/octet-stream; unmatched input without binary control bytes
 * is UTF-8 text.
 */
export const sniffContentType = (prefix: Uint8Array): string => {
  if (prefix.length === 0) return DEFAULT_CONTENT_TYPE;

  let firstNonWs = 0;
  while (firstNonWs < prefix.length && isWhitespace(prefix[firstNonWs] ?? 0)) firstNonWs++;

  for (const match of matchers) {
    const contentType = match(prefix, firstNonWs);
    if (contentType !== null) return contentType;
  }

  for (let i = firstNonWs; i < prefix.length; i++) {
    if (isBinaryByte(prefix[i] ?? 0)) return DEFAULT_CONTENT_TYPE;
  }
  return TEXT_CONTENT_TYPE;
};
