/**
 * Serve a stored blob with validators, conditional requests and single byte
 * ranges. HEAD gets the same headers without opening the blob.
 */
import type { ByteRange, BytesStream } from "@blobvault/storage-core";
import type { Context } from "hono";
import type { Env } from "../types.ts";
import { evaluatePreconditions, isRangeApplicable, type RequestConditions } from "./conditional.ts";
import { formatContentRange, formatUnsatisfiedRange, parseRangeHeader } from "./range.ts";

export type ServableBlob = {
  digest: string;
  size: number;
  contentType: string;
  lastModified: Date;
  open: (range?: ByteRange) => Promise<BytesStream>;
};

export const toEtag = (digest: string): string => `"${digest}"`;

export async function serveBlob(c: Context<Env>, blob: ServableBlob): Promise<Response> {
  const etag = toEtag(blob.digest);
  const validators = { etag, lastModified: blob.lastModified };
  const req: RequestConditions = {
    method: c.req.method,
    header: (name) => c.req.header(name),
  };
  const headers: Record<string, string> = {
    ETag: etag,
    "Last-Modified": blob.lastModified.toUTCString(),
    "Accept-Ranges": "bytes",
  };

  const precondition = evaluatePreconditions(req, validators);
  if (precondition === "not-modified") {
    return new Response(null, { status: 304, headers });
  }
  if (precondition === "failed") {
    return new Response(null, { status: 412, headers });
  }

  const rangeHeader = isRangeApplicable(req, validators) ? c.req.header("Range") : undefined;
  const range = parseRangeHeader(rangeHeader, blob.size);
  if (range.kind === "unsatisfiable") {
    return new Response(null, {
      status: 416,
      headers: { ...headers, "Content-Range": formatUnsatisfiedRange(blob.size) },
    });
  }

  headers["Content-Type"] = blob.contentType;
  const isHead = c.req.method === "HEAD";

  if (range.kind === "partial") {
    headers["Content-Range"] = formatContentRange(range.range, blob.size);
    headers["Content-Length"] = String(range.range.end - range.range.start + 1);
    const body = isHead ? null : await blob.open(range.range);
    return new Response(body, { status: 206, headers });
  }

  headers["Content-Length"] = String(blob.size);
  const body = isHead ? null : await blob.open();
  return new Response(body, { status: 200, headers });
}
