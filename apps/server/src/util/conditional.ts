/**
 * Conditional request evaluation (If-Match, If-Unmodified-Since,
 * If-None-Match, If-Modified-Since, If-Range). HTTP dates carry whole
 * seconds, so modification times are compared truncated to seconds.
 */

export type Validators = {
  /** Quoted entity tag, e.g. `"abc"` */
  etag: string;
  lastModified: Date;
};

export type RequestConditions = {
  method: string;
  header: (name: string) => string | undefined;
};

export type PreconditionResult = "proceed" | "not-modified" | "failed";

const toSeconds = (ms: number): number => Math.floor(ms / 1000);

const parseHttpDate = (value: string | undefined): number | null => {
  if (value === undefined) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
};

const isWeak = (tag: string): boolean => tag.startsWith("W/");
const opaque = (tag: string): string => (isWeak(tag) ? tag.slice(2) : tag);

const splitTags = (value: string): string[] =>
  value
    .split(",")
    .map((t) => t.trim())
    .filter((t) => t.length > 0);

/** Strong comparison: both tags strong and identical */
const matchesStrong = (value: string, etag: string): boolean => {
  if (value.trim() === "*") return true;
  return splitTags(value).some((t) => !isWeak(t) && !isWeak(etag) && t === etag);
};

/** Weak comparison: opaque tags identical */
const matchesWeak = (value: string, etag: string): boolean => {
  if (value.trim() === "*") return true;
  return splitTags(value).some((t) => opaque(t) === opaque(etag));
};

const isModifiedAfter = (lastModified: Date, dateMs: number): boolean =>
  toSeconds(lastModified.getTime()) > toSeconds(dateMs);

export function evaluatePreconditions(
  req: RequestConditions,
  validators: Validators
): PreconditionResult {
  const isRead = req.method === "GET" || req.method === "HEAD";

  const ifMatch = req.header("If-Match");
  if (ifMatch !== undefined) {
    if (!matchesStrong(ifMatch, validators.etag)) return "failed";
  } else {
    const since = parseHttpDate(req.header("If-Unmodified-Since"));
    if (since !== null && isModifiedAfter(validators.lastModified, since)) return "failed";
  }

  const ifNoneMatch = req.header("If-None-Match");
  if (ifNoneMatch !== undefined) {
    if (matchesWeak(ifNoneMatch, validators.etag)) return isRead ? "not-modified" : "failed";
  } else if (isRead) {
    const since = parseHttpDate(req.header("If-Modified-Since"));
    if (since !== null && !isModifiedAfter(validators.lastModified, since)) return "not-modified";
  }

  return "proceed";
}

/**
 * Whether a Range header may be honoured: true without If-Range, otherwise
 * only when If-Range names the current entity tag (strongly) or exact date.
 */
export function isRangeApplicable(req: RequestConditions, validators: Validators): boolean {
  const ifRange = req.header("If-Range")?.trim();
  if (ifRange === undefined || ifRange === "") return true;
  if (ifRange.startsWith('"') || ifRange.startsWith("W/")) {
    return !isWeak(ifRange) && !isWeak(validators.etag) && ifRange === validators.etag;
  }
  const date = parseHttpDate(ifRange);
  return date !== null && toSeconds(date) === toSeconds(validators.lastModified.getTime());
}
