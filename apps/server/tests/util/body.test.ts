import { bytesFromStream, streamFromChunks } from "@blobvault/storage-core";
import { describe, expect, it } from "vitest";
import { takeUploadBody } from "../../src/util/body.ts";

const encoder = new TextEncoder();

const streamRequest = (body: ReadableStream<Uint8Array>, headers?: Record<string, string>) => {
  const init: RequestInit & { duplex: "half" } = { method: "POST", body, headers, duplex: "half" };
  return new Request("http://localhost/objects", init);
};

describe("takeUploadBody", () => {
  it("returns null without a body", async () => {
    expect(await takeUploadBody(new Request("http://localhost/objects", { method: "POST" }))).toBeNull();
  });

  it("returns null for a stream that ends without bytes", async () => {
    const body = streamFromChunks([new Uint8Array(0), new Uint8Array(0)]);
    expect(await takeUploadBody(streamRequest(body))).toBeNull();
  });

  it("returns null for Content-Length: 0", async () => {
    const body = streamFromChunks([encoder.encode("ignored")]);
    expect(await takeUploadBody(streamRequest(body, { "content-length": "0" }))).toBeNull();
  });

  it("keeps every byte of a present body", async () => {
    const body = streamFromChunks([new Uint8Array(0), encoder.encode("hel"), encoder.encode("lo")]);
    const taken = await takeUploadBody(streamRequest(body));
    expect(taken).not.toBeNull();
    if (taken === null) return;
    expect(new TextDecoder().decode(await bytesFromStream(taken))).toBe("hello");
  });

  it("reports a stream that fails before its first byte as a storage failure", async () => {
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error("connection reset"));
      },
    });
    await expect(takeUploadBody(streamRequest(body))).rejects.toMatchObject({
      code: "StorageFailure",
      message: "connection reset",
    });
  });
});
