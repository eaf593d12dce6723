/**
 * HTTP surface tests against in-memory stores via app.request().
 */
import { createHash } from "node:crypto";
import { createContentStore } from "@blobvault/cas";
import { createKeyIndex, createMemoryKvStore, type MemoryKvStore } from "@blobvault/key-index";
import { createNamedObjectFacade } from "@blobvault/objects";
import {
  createMemoryBlobStorage,
  createMemoryMetaStore,
  type MemoryBlobStorage,
} from "@blobvault/storage-memory";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type App, createApp } from "../src/app.ts";

const BLOB_TIME = new Date("2024-02-03T04:05:06.000Z");
const NAMED_TIME = new Date("2024-07-08T09:10:11.000Z");
const HELLO = "hello world";
const HELLO_ID = createHash("sha256").update(HELLO).digest("hex");

describe("createApp", () => {
  let app: App;
  let storage: MemoryBlobStorage;
  let kv: MemoryKvStore;

  beforeEach(() => {
    storage = createMemoryBlobStorage({ now: () => BLOB_TIME });
    kv = createMemoryKvStore();
    const content = createContentStore({ storage, meta: createMemoryMetaStore() });
    const objects = createNamedObjectFacade({
      content,
      index: createKeyIndex(kv),
      now: () => NAMED_TIME,
    });
    app = createApp({ content, objects, requestLog: false });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // A POST or PUT as @hono/node-server hands it over: always a stream, here one with no bytes
  const noBytesRequest = (path: string, method: string) => {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.close();
      },
    });
    const init: RequestInit & { duplex: "half" } = { method, body, duplex: "half" };
    return new Request(`http://localhost${path}`, init);
  };

  const post = (body: string) => app.request("/objects", { method: "POST", body });
  const put = (path: string, body: string) => app.request(path, { method: "PUT", body });

  describe("GET /healthz", () => {
    it("answers ok", async () => {
      const res = await app.request("/healthz");
      expect(res.status).toBe(200);
      expect(await res.text()).toBe("ok\n");
    });

    it("rejects other methods", async () => {
      const res = await app.request("/healthz", { method: "POST" });
      expect(res.status).toBe(405);
      expect(res.headers.get("Allow")).toBe("GET, HEAD");
    });
  });

  describe("POST /objects", () => {
    it("stores the body and returns its id", async () => {
      const res = await post(HELLO);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        id: HELLO_ID,
        size: 11,
        content_type: "text/plain; charset=utf-8",
      });
    });

    it("returns the same id for the same bytes", async () => {
      await post(HELLO);
      const res = await post(HELLO);
      expect(await res.json()).toMatchObject({ id: HELLO_ID });
      expect(storage.digests()).toEqual([HELLO_ID]);
    });

    it("requires a body", async () => {
      const res = await app.request("/objects", { method: "POST" });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "EMPTY_BODY", message: "Request body is required" });
    });

    it("rejects a body stream that ends without data", async () => {
      const res = await app.request(noBytesRequest("/objects", "POST"));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "EMPTY_BODY", message: "Request body is required" });
      expect(storage.digests()).toEqual([]);
    });

    it("rejects a zero-length body", async () => {
      const res = await post("");
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "EMPTY_BODY" });
      expect(storage.digests()).toEqual([]);
    });

    it("stores nothing when the upload breaks off", async () => {
      let sent = false;
      const body = new ReadableStream<Uint8Array>({
        pull(controller) {
          if (sent) {
            controller.error(new Error("connection reset"));
            return;
          }
          sent = true;
          controller.enqueue(new TextEncoder().encode("partial"));
        },
      });
      const init: RequestInit & { duplex: "half" } = { method: "POST", body, duplex: "half" };
      vi.spyOn(console, "error").mockImplementation(() => undefined);

      const res = await app.request("/objects", init);
      expect(res.status).toBe(500);
      expect(await res.json()).toMatchObject({ error: "STORAGE_ERROR" });
      expect(storage.digests()).toEqual([]);
      expect(storage.openStagings()).toBe(0);
    });

    it("rejects other methods", async () => {
      const res = await app.request("/objects");
      expect(res.status).toBe(405);
      expect(res.headers.get("Allow")).toBe("POST");
    });
  });

  describe("GET /objects/:id", () => {
    it("serves the blob with validators", async () => {
      await post(HELLO);
      const res = await app.request(`/objects/${HELLO_ID}`);
      expect(res.status).toBe(200);
      expect(await res.text()).toBe(HELLO);
      expect(res.headers.get("ETag")).toBe(`"${HELLO_ID}"`);
      expect(res.headers.get("Content-Type")).toBe("text/plain; charset=utf-8");
      expect(res.headers.get("Content-Length")).toBe("11");
      expect(res.headers.get("Accept-Ranges")).toBe("bytes");
      expect(res.headers.get("Last-Modified")).toBe("Sat, 03 Feb 2024 04:05:06 GMT");
    });

    it("answers HEAD with headers only", async () => {
      await post(HELLO);
      const res = await app.request(`/objects/${HELLO_ID}`, { method: "HEAD" });
      expect(res.status).toBe(200);
      expect(res.headers.get("Content-Length")).toBe("11");
      expect(await res.text()).toBe("");
    });

    it("serves a byte range", async () => {
      await post(HELLO);
      const res = await app.request(`/objects/${HELLO_ID}`, { headers: { Range: "bytes=0-4" } });
      expect(res.status).toBe(206);
      expect(await res.text()).toBe("hello");
      expect(res.headers.get("Content-Range")).toBe("bytes 0-4/11");
      expect(res.headers.get("Content-Length")).toBe("5");
    });

    it("answers 416 for a range past the end", async () => {
      await post(HELLO);
      const res = await app.request(`/objects/${HELLO_ID}`, { headers: { Range: "bytes=11-" } });
      expect(res.status).toBe(416);
      expect(res.headers.get("Content-Range")).toBe("bytes */11");
    });

    it("serves the whole body for inverted or multiple ranges", async () => {
      await post(HELLO);
      for (const range of ["bytes=5-1", "bytes=0-1,4-5"]) {
        const res = await app.request(`/objects/${HELLO_ID}`, { headers: { Range: range } });
        expect(res.status).toBe(200);
        expect(res.headers.get("Content-Range")).toBeNull();
        expect(await res.text()).toBe(HELLO);
      }
    });

    it("answers 304 for a matching If-None-Match", async () => {
      await post(HELLO);
      const res = await app.request(`/objects/${HELLO_ID}`, {
        headers: { "If-None-Match": `"${HELLO_ID}"` },
      });
      expect(res.status).toBe(304);
      expect(res.headers.get("ETag")).toBe(`"${HELLO_ID}"`);
    });

    it("answers 304 when not modified since", async () => {
      await post(HELLO);
      const res = await app.request(`/objects/${HELLO_ID}`, {
        headers: { "If-Modified-Since": "Sat, 03 Feb 2024 04:05:06 GMT" },
      });
      expect(res.status).toBe(304);
    });

    it("returns 404 for an absent id", async () => {
      const res = await app.request(`/objects/${"0".repeat(64)}`);
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: "NOT_FOUND" });
    });

    it("rejects malformed ids before touching storage", async () => {
      const stat = vi.spyOn(storage, "stat");
      const read = vi.spyOn(storage, "read");
      for (const id of ["ABC", HELLO_ID.toUpperCase(), `${HELLO_ID}0`, "..%2F..%2Fetc%2Fpasswd"]) {
        const res = await app.request(`/objects/${id}`);
        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ error: "INVALID_ID" });
      }
      expect(stat).not.toHaveBeenCalled();
      expect(read).not.toHaveBeenCalled();
    });

    it("rejects writes", async () => {
      const res = await put(`/objects/${HELLO_ID}`, HELLO);
      expect(res.status).toBe(405);
      expect(res.headers.get("Allow")).toBe("GET, HEAD");
    });
  });

  describe("named objects", () => {
    it("stores under bucket/key and returns the entry", async () => {
      const res = await put("/docs/a/b.txt", HELLO);
      expect(res.status).toBe(201);
      expect(res.headers.get("ETag")).toBe(`"${HELLO_ID}"`);
      expect(await res.json()).toEqual({
        bucket: "docs",
        key: "a/b.txt",
        id: HELLO_ID,
        size: 11,
        content_type: "text/plain; charset=utf-8",
        modified_at: "2024-07-08T09:10:11.000Z",
      });
    });

    it("rejects an upload without bytes and binds nothing", async () => {
      const res = await app.request(noBytesRequest("/docs/empty.txt", "PUT"));
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "EMPTY_BODY" });
      expect(kv.size()).toBe(0);
      expect((await app.request("/docs/empty.txt")).status).toBe(404);
    });

    it("serves the stored bytes with the entry's validators", async () => {
      await put("/docs/a/b.txt", HELLO);
      const res = await app.request("/docs/a/b.txt");
      expect(res.status).toBe(200);
      expect(await res.text()).toBe(HELLO);
      expect(res.headers.get("ETag")).toBe(`"${HELLO_ID}"`);
      expect(res.headers.get("Last-Modified")).toBe("Mon, 08 Jul 2024 09:10:11 GMT");
      expect(res.headers.get("Content-Type")).toBe("text/plain; charset=utf-8");
    });

    it("serves a suffix range", async () => {
      await put("/docs/hello", HELLO);
      const res = await app.request("/docs/hello", { headers: { Range: "bytes=-3" } });
      expect(res.status).toBe(206);
      expect(await res.text()).toBe("rld");
      expect(res.headers.get("Content-Range")).toBe("bytes 8-10/11");
    });

    it("returns 404 for an unbound name", async () => {
      const res = await app.request("/docs/missing");
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: "NOT_FOUND" });
    });

    it("reports an entry whose blob is gone as an integrity error", async () => {
      await put("/docs/gone", HELLO);
      storage.delete(HELLO_ID);
      const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);

      const res = await app.request("/docs/gone");
      expect(res.status).toBe(500);
      expect(await res.json()).toMatchObject({ error: "INTEGRITY_ERROR" });
      expect(logged).toHaveBeenCalledTimes(1);
    });

    it("deletes the name but keeps the blob", async () => {
      await put("/docs/tmp", HELLO);
      expect((await app.request("/docs/tmp", { method: "DELETE" })).status).toBe(204);
      expect((await app.request("/docs/tmp", { method: "DELETE" })).status).toBe(204);
      expect((await app.request("/docs/tmp")).status).toBe(404);
      expect((await app.request(`/objects/${HELLO_ID}`)).status).toBe(200);
      expect(kv.size()).toBe(0);
    });

    it("keeps names in different buckets apart", async () => {
      await put("/one/key", "first");
      await put("/two/key", "second");
      expect(await (await app.request("/one/key")).text()).toBe("first");
      expect(await (await app.request("/two/key")).text()).toBe("second");
    });

    it("rejects unsupported methods", async () => {
      const res = await app.request("/docs/x", { method: "PATCH", body: "x" });
      expect(res.status).toBe(405);
      expect(res.headers.get("Allow")).toBe("PUT, GET, HEAD, DELETE");
    });

    it("rejects reserved bucket names", async () => {
      const res = await put("/healthz/x", HELLO);
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "INVALID_PATH" });
    });

    it("rejects paths without a key", async () => {
      for (const path of ["/docs", "/docs/", "/"]) {
        const res = await app.request(path);
        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ error: "INVALID_PATH" });
      }
    });
  });
});
