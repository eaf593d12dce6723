import { describe, expect, it } from "vitest";
import { createKeyIndex } from "../src/key-index.ts";
import { createMemoryKvStore } from "../src/memory-kv.ts";
import type { IndexEntry, KvStore } from "../src/types.ts";

const entry = (overrides: Partial<IndexEntry> = {}): IndexEntry => ({
  digest: "a".repeat(64),
  size: 5,
  contentType: "text/plain; charset=utf-8",
  modifiedAt: "2024-05-01T12:00:00.000Z",
  ...overrides,
});

const path = { bucket: "docs", key: "notes/today.txt" };

describe("createKeyIndex", () => {
  it("stores and returns an entry", async () => {
    const index = createKeyIndex(createMemoryKvStore());
    expect(await index.put(path, entry())).toEqual({ previous: null });
    expect(await index.get(path)).toEqual(entry());
  });

  it("returns the replaced entry on overwrite", async () => {
    const index = createKeyIndex(createMemoryKvStore());
    await index.put(path, entry());
    const replaced = await index.put(path, entry({ digest: "b".repeat(64), size: 9 }));
    expect(replaced.previous).toEqual(entry());
    expect(await index.get(path)).toMatchObject({ digest: "b".repeat(64), size: 9 });
  });

  it("treats bucket and key as separate namespaces", async () => {
    const index = createKeyIndex(createMemoryKvStore());
    await index.put({ bucket: "a", key: "x" }, entry());
    expect(await index.get({ bucket: "b", key: "x" })).toBeNull();
    expect(await index.get({ bucket: "a", key: "y" })).toBeNull();
  });

  it("reports whether delete removed anything", async () => {
    const index = createKeyIndex(createMemoryKvStore());
    await index.put(path, entry());
    expect(await index.delete(path)).toBe(true);
    expect(await index.delete(path)).toBe(false);
    expect(await index.get(path)).toBeNull();
  });

  it("reports a corrupt record as an integrity failure", async () => {
    const kv = createMemoryKvStore();
    await kv.update((tx) =>
      tx.put(new TextEncoder().encode("docs/notes/today.txt"), new TextEncoder().encode("{oops"))
    );
    await expect(createKeyIndex(kv).get(path)).rejects.toMatchObject({
      name: "StoreError",
      code: "IntegrityFailure",
    });
  });

  it("reports store errors as index failures", async () => {
    const broken: KvStore = {
      view: async () => {
        throw new Error("disk gone");
      },
      update: async () => {
        throw new Error("disk gone");
      },
      close: async () => {},
    };
    const index = createKeyIndex(broken);
    await expect(index.get(path)).rejects.toMatchObject({ code: "IndexFailure", message: "disk gone" });
    await expect(index.put(path, entry())).rejects.toMatchObject({ code: "IndexFailure" });
    await expect(index.delete(path)).rejects.toMatchObject({ code: "IndexFailure" });
  });
});
