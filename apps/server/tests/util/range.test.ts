import { describe, expect, it } from "vitest";
import { formatContentRange, formatUnsatisfiedRange, parseRangeHeader } from "../../src/util/range.ts";

describe("parseRangeHeader", () => {
  it("serves the full body without a header", () => {
    expect(parseRangeHeader(undefined, 10)).toEqual({ kind: "full" });
  });

  it("parses closed, open and suffix ranges", () => {
    expect(parseRangeHeader("bytes=2-5", 10)).toEqual({ kind: "partial", range: { start: 2, end: 5 } });
    expect(parseRangeHeader("bytes=7-", 10)).toEqual({ kind: "partial", range: { start: 7, end: 9 } });
    expect(parseRangeHeader("bytes=-3", 10)).toEqual({ kind: "partial", range: { start: 7, end: 9 } });
  });

  it("clamps the end to the last byte", () => {
    expect(parseRangeHeader("bytes=4-100", 10)).toEqual({ kind: "partial", range: { start: 4, end: 9 } });
  });

  it("treats an oversized suffix as the whole blob", () => {
    expect(parseRangeHeader("bytes=-50", 10)).toEqual({ kind: "partial", range: { start: 0, end: 9 } });
  });

  it("reports ranges past the end as unsatisfiable", () => {
    expect(parseRangeHeader("bytes=10-", 10)).toEqual({ kind: "unsatisfiable" });
    expect(parseRangeHeader("bytes=10-20", 10)).toEqual({ kind: "unsatisfiable" });
    expect(parseRangeHeader("bytes=-0", 10)).toEqual({ kind: "unsatisfiable" });
    expect(parseRangeHeader("bytes=0-", 0)).toEqual({ kind: "unsatisfiable" });
  });

  it("ignores malformed and multi-range headers", () => {
    for (const header of ["items=0-1", "bytes=a-b", "bytes=5-2", "bytes=0-1,4-5", "bytes=", "bytes=--1"]) {
      expect(parseRangeHeader(header, 10)).toEqual({ kind: "full" });
    }
  });
});

describe("content range formatting", () => {
  it("formats satisfied and unsatisfied ranges", () => {
    expect(formatContentRange({ start: 0, end: 4 }, 10)).toBe("bytes 0-4/10");
    expect(formatUnsatisfiedRange(10)).toBe("bytes */10");
  });
});
