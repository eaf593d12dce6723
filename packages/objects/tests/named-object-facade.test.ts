import { createContentStore } from "@blobvault/cas";
import { createKeyIndex, createMemoryKvStore, type MemoryKvStore } from "@blobvault/key-index";
import { bytesFromStream, streamFromBytes } from "@blobvault/storage-core";
import {
  createMemoryBlobStorage,
  createMemoryMetaStore,
  type MemoryBlobStorage,
} from "@blobvault/storage-memory";
import { beforeEach, describe, expect, it } from "vitest";
import { createNamedObjectFacade, type NamedObjectFacade } from "../src/index.ts";

const encoder = new TextEncoder();
const body = (s: string) => streamFromBytes(encoder.encode(s));
const text = async (stream: ReadableStream<Uint8Array>) =>
  new TextDecoder().decode(await bytesFromStream(stream));

describe("createNamedObjectFacade", () => {
  const fixedNow = new Date("2024-06-01T10:00:00.000Z");
  let storage: MemoryBlobStorage;
  let kv: MemoryKvStore;
  let objects: NamedObjectFacade;

  beforeEach(() => {
    storage = createMemoryBlobStorage();
    kv = createMemoryKvStore();
    objects = createNamedObjectFacade({
      content: createContentStore({ storage, meta: createMemoryMetaStore() }),
      index: createKeyIndex(kv),
      now: () => fixedNow,
    });
  });

  it("stores and resolves a named object", async () => {
    const stored = await objects.putNamed("docs", "a/readme.txt", body("hello"));
    expect(stored).toMatchObject({
      bucket: "docs",
      key: "a/readme.txt",
      size: 5,
      contentType: "text/plain; charset=utf-8",
      modifiedAt: fixedNow,
    });

    const found = await objects.getNamed("docs", "a/readme.txt");
    if (!found) throw new Error("expected an object");
    expect(found.object).toEqual(stored);
    expect(await text(await found.open())).toBe("hello");
    expect(await text(await found.open({ start: 1, end: 3 }))).toBe("ell");
  });

  it("shares one blob between names with the same bytes", async () => {
    const a = await objects.putNamed("b1", "k", body("same"));
    const b = await objects.putNamed("b2", "other", body("same"));
    expect(a.digest).toBe(b.digest);
    expect(storage.digests()).toEqual([a.digest]);
    expect(kv.size()).toBe(2);
  });

  it("returns null for an unbound name", async () => {
    await objects.putNamed("docs", "x", body("x"));
    expect(await objects.getNamed("docs", "y")).toBeNull();
    expect(await objects.getNamed("other", "x")).toBeNull();
  });

  it("distinguishes a missing blob from a missing name", async () => {
    const stored = await objects.putNamed("docs", "gone", body("vanishing"));
    storage.delete(stored.digest);

    await expect(objects.getNamed("docs", "gone")).rejects.toMatchObject({
      name: "StoreError",
      code: "IntegrityFailure",
    });
  });

  it("removes only the name on delete", async () => {
    const stored = await objects.putNamed("docs", "temp", body("keep the blob"));
    expect(await objects.deleteNamed("docs", "temp")).toBe(true);
    expect(await objects.deleteNamed("docs", "temp")).toBe(false);
    expect(await objects.getNamed("docs", "temp")).toBeNull();
    expect(await storage.has(stored.digest)).toBe(true);
  });

  it("rebinds a name to new content", async () => {
    await objects.putNamed("docs", "v", body("first"));
    const second = await objects.putNamed("docs", "v", body("second"));
    const found = await objects.getNamed("docs", "v");
    expect(found?.object.digest).toBe(second.digest);
  });

  it("writes no entry when the upload fails", async () => {
    const failing = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error("reset by peer"));
      },
    });
    await expect(objects.putNamed("docs", "broken", failing)).rejects.toMatchObject({
      code: "StorageFailure",
    });
    expect(kv.size()).toBe(0);
    expect(storage.digests()).toEqual([]);
  });

  it("rejects invalid paths", async () => {
    await expect(objects.putNamed("", "k", body("x"))).rejects.toMatchObject({ code: "InvalidPath" });
    await expect(objects.getNamed("a/b", "k")).rejects.toMatchObject({ code: "InvalidPath" });
    await expect(objects.deleteNamed("b", "")).rejects.toMatchObject({ code: "InvalidPath" });
  });
});
