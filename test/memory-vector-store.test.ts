import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { cosineSimilarity, MemoryVectorStore } from "../src/services/vector-store/memory-vector-store.js";
import type { ContentType, VectorRecord } from "../src/services/vector-store/types.js";
import { makeTempDir, removeDir } from "./helpers.js";

const record = (id: string, vector: number[], source: string, contentType: ContentType = "text_file"): VectorRecord => ({
  id,
  content: `content of ${id}`,
  vector,
  metadata: {
    source,
    filename: source,
    chunkIndex: 0,
    contentType,
    indexedAt: "2026-01-01T00:00:00.000Z",
    lastUpdated: "2026-01-02T00:00:00.000Z",
  },
});

describe("cosineSimilarity", () => {
  it("scores parallel vectors 1 and orthogonal vectors 0", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
  });

  it("scores a zero vector 0", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe("MemoryVectorStore", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("returns the closest records first, limited to topK", async () => {
    const store = new MemoryVectorStore();
    await store.upsert([record("far", [0, 1], "a.md"), record("near", [1, 0], "a.md"), record("mid", [1, 1], "b.md")]);

    const matches = await store.query({ vector: [1, 0], topK: 2 });

    expect(matches.map((match) => match.id)).toEqual(["near", "mid"]);
    expect(matches[1]?.score).toBeCloseTo(Math.SQRT1_2);
  });

  it("applies scalar and list filters", async () => {
    const store = new MemoryVectorStore();
    await store.upsert([
      record("a", [1, 0], "a.md"),
      record("b", [1, 0], "b.json", "structured_data"),
      record("c", [1, 0], "c.md"),
    ]);

    const bySource = await store.query({ vector: [1, 0], topK: 10, filter: { source: "b.json" } });
    expect(bySource.map((match) => match.id)).toEqual(["b"]);

    const bySources = await store.query({ vector: [1, 0], topK: 10, filter: { source: ["a.md", "c.md"] } });
    expect(bySources.map((match) => match.id)).toEqual(["a", "c"]);

    const byType = await store.query({ vector: [1, 0], topK: 10, filter: { contentType: "text_file", source: "c.md" } });
    expect(byType.map((match) => match.id)).toEqual(["c"]);
  });

  it("deletes records by id", async () => {
    const store = new MemoryVectorStore();
    await store.upsert([record("a", [1, 0], "a.md"), record("b", [0, 1], "b.md")]);

    await store.delete(["a", "unknown"]);

    expect((await store.list()).map((chunk) => chunk.id)).toEqual(["b"]);
  });

  it("keeps its previous records when an upsert cannot be written", async () => {
    const persistPath = path.join(root, "index", "collection.json");
    const store = new MemoryVectorStore(persistPath);
    await store.upsert([record("a", [1, 0], "a.md")]);
    await fs.mkdir(`${persistPath}.tmp`, { recursive: true });

    await expect(store.upsert([record("b", [0, 1], "b.md")])).rejects.toThrow();

    expect((await store.list()).map((chunk) => chunk.id)).toEqual(["a"]);
    expect((await store.query({ vector: [0, 1], topK: 5 })).map((match) => match.id)).toEqual(["a"]);
  });

  it("keeps its records when a delete cannot be written", async () => {
    const persistPath = path.join(root, "index", "collection.json");
    const store = new MemoryVectorStore(persistPath);
    await store.upsert([record("a", [1, 0], "a.md")]);
    await fs.mkdir(`${persistPath}.tmp`, { recursive: true });

    await expect(store.delete(["a"])).rejects.toThrow();

    expect((await store.list()).map((chunk) => chunk.id)).toEqual(["a"]);
  });

  it("persists records and reads them back", async () => {
    const persistPath = path.join(root, "index", "collection.json");
    const first = new MemoryVectorStore(persistPath);
    await first.upsert([record("a", [1, 0], "a.md"), record("b", [0, 1], "b.md")]);
    await first.delete(["b"]);

    const second = new MemoryVectorStore(persistPath);
    const listed = await second.list();

    expect(listed).toEqual([{ id: "a", content: "content of a", metadata: record("a", [1, 0], "a.md").metadata }]);
    const matches = await second.query({ vector: [1, 0], topK: 1 });
    expect(matches[0]?.score).toBeCloseTo(1);
  });
});
