import { describe, it, expect, afterEach, jest } from "@jest/globals";
import { InMemoryDocumentStore, InMemoryVectorIndex } from "@/lib/memory-store";
import { NotFoundError, ValidationError } from "@/lib/errors";
import type { VectorRecord } from "@/lib/vector-index";

function record(documentId: string, sequenceIndex: number, embedding: number[]): VectorRecord {
  return {
    chunkId: `${documentId}#${sequenceIndex}`,
    documentId,
    sequenceIndex,
    text: `chunk ${sequenceIndex} of ${documentId}`,
    charStart: sequenceIndex * 10,
    charEnd: sequenceIndex * 10 + 10,
    embedding,
  };
}

describe("InMemoryVectorIndex", () => {
  it("keeps documents in separate partitions", async () => {
    const index = new InMemoryVectorIndex(2);
    await index.insert([record("a", 0, [1, 0]), record("a", 1, [0, 1])]);
    await index.insert([record("b", 0, [1, 0])]);

    const hits = await index.search([1, 0], 10, { documentId: "a" });
    expect(hits.map((h) => h.chunkId)).toEqual(["a#0", "a#1"]);
    expect(hits.map((h) => h.distance)).toEqual([0, 2]);
    expect(await index.count("a")).toBe(2);
    expect(await index.count()).toBe(3);
  });

  it("returns stored vectors only when asked", async () => {
    const index = new InMemoryVectorIndex(2);
    await index.insert([record("a", 0, [3, 4])]);

    const [plain] = await index.search([0, 0], 1, { documentId: "a" });
    expect(plain.embedding).toBeUndefined();
    const [full] = await index.search([0, 0], 1, { documentId: "a", includeVectors: true });
    expect(full.embedding).toEqual([3, 4]);
    expect(full.distance).toBe(25);
  });

  it("validates batches before touching the partition", async () => {
    const index = new InMemoryVectorIndex(2);
    await expect(index.insert([])).rejects.toThrow(ValidationError);
    await expect(
      index.insert([record("a", 0, [1, 0]), record("a", 1, [1, 0, 0])])
    ).rejects.toThrow("Embedding 1 has wrong dimension: 3 != 2");
    await expect(index.insert([record("a", 0, [Number.NaN, 0])])).rejects.toThrow(ValidationError);
    expect(await index.count("a")).toBe(0);
  });

  it("rejects bad queries", async () => {
    const index = new InMemoryVectorIndex(2);
    await expect(index.search([1], 1, { documentId: "a" })).rejects.toThrow(ValidationError);
    await expect(index.search([1, 0], 0, { documentId: "a" })).rejects.toThrow(ValidationError);
  });

  it("deletes a whole document and lists what remains", async () => {
    const index = new InMemoryVectorIndex(2);
    await index.insert([record("a", 0, [1, 0]), record("a", 1, [0, 1])]);
    await index.insert([record("b", 0, [1, 1])]);

    expect(await index.deleteByDocument("a")).toBe(2);
    expect(await index.deleteByDocument("a")).toBe(0);

    const rows = await index.list({ limit: 10, includeVectors: true });
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ chunkId: "b#0", embedding: [1, 1] });
  });
});

describe("InMemoryDocumentStore", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  const doc = (documentId: string, fileSize = 100) => ({
    documentId,
    filename: `${documentId}.txt`,
    fileType: "Text",
    fileSize,
    charLength: 50,
  });

  it("starts documents as processing and moves them once", async () => {
    const store = new InMemoryDocumentStore();
    const created = await store.create(doc("d1"));
    expect(created.status).toBe("processing");

    const ready = await store.markReady("d1", { chunksCount: 3, vectorsCount: 3 });
    expect(ready).toMatchObject({ status: "ready", chunksCount: 3, vectorsCount: 3 });

    await expect(store.markFailed("d1", "late")).rejects.toThrow(ValidationError);
    expect((await store.get("d1"))?.status).toBe("ready");
  });

  it("zeroes counts on failure and keeps the message", async () => {
    const store = new InMemoryDocumentStore();
    await store.create(doc("d1"));
    const failed = await store.markFailed("d1", "provider down");
    expect(failed).toMatchObject({
      status: "failed",
      error: "provider down",
      chunksCount: 0,
      vectorsCount: 0,
    });
  });

  it("rejects duplicates and unknown ids", async () => {
    const store = new InMemoryDocumentStore();
    await store.create(doc("d1"));
    await expect(store.create(doc("d1"))).rejects.toThrow(ValidationError);
    await expect(store.markReady("nope", { chunksCount: 1, vectorsCount: 1 })).rejects.toThrow(
      NotFoundError
    );
    expect(await store.get("nope")).toBeNull();
  });

  it("lists newest first and sums statistics", async () => {
    jest.useFakeTimers({ now: new Date("2024-05-01T10:00:00Z") });
    const store = new InMemoryDocumentStore();
    await store.create(doc("old", 1024 * 1024));
    jest.setSystemTime(new Date("2024-05-02T10:00:00Z"));
    await store.create(doc("new", 512 * 1024));
    await store.markReady("old", { chunksCount: 4, vectorsCount: 4 });

    expect((await store.list(10)).map((d) => d.documentId)).toEqual(["new", "old"]);
    expect((await store.list(1)).map((d) => d.documentId)).toEqual(["new"]);
    expect(await store.statistics()).toEqual({
      totalFiles: 2,
      totalChunks: 4,
      totalVectors: 4,
      totalSizeBytes: 1536 * 1024,
      totalSizeMb: 1.5,
    });

    expect(await store.delete("old")).toBe(true);
    expect(await store.delete("old")).toBe(false);
  });
});
