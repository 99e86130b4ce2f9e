import type { Express } from "express";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createKnowledgeBase, type KnowledgeBase } from "../src/lib/container.js";
import { buildServer } from "../src/server.js";
import { MemoryVectorStore } from "../src/services/vector-store/memory-vector-store.js";
import { FakeGenerator, KeywordEmbedder, makeTempDir, removeDir, testConfig } from "./helpers.js";

const AUTH = "Bearer test-secret";

describe("HTTP API", () => {
  let root: string;
  let kb: KnowledgeBase;
  let app: Express;

  beforeEach(async () => {
    root = await makeTempDir();
    kb = createKnowledgeBase(testConfig(root), {
      embedder: new KeywordEmbedder(),
      generator: new FakeGenerator(),
      vectorStore: new MemoryVectorStore(),
    });
    app = buildServer(kb, { apiKey: "test-secret", accessLog: false });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  const addGuide = () =>
    request(app)
      .post("/api/knowledge/documents")
      .set("Authorization", AUTH)
      .send({ filename: "guide.md", content: "Our pricing starts at 19 USD per month." });

  it("serves the health check without a key", async () => {
    const response = await request(app).get("/healthz");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
  });

  it("requires the API key", async () => {
    const missing = await request(app).get("/api/status");
    const wrong = await request(app).get("/api/status").set("Authorization", "Bearer other-secret");

    expect(missing.status).toBe(401);
    expect(missing.body).toEqual({ error: "Missing or invalid API key" });
    expect(wrong.status).toBe(401);
  });

  it("reports status", async () => {
    const response = await request(app).get("/api/status").set("Authorization", AUTH);

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: "operational",
      knowledge_base: { source_documents: 0, indexed_chunks: 0, backup_count: 0 },
      outputs: { count: 0, recent: [] },
    });
  });

  it("adds, lists, searches and removes documents", async () => {
    const added = await addGuide();
    expect(added.status).toBe(201);
    expect(added.body).toMatchObject({ status: "success", rebuild: { chunkCount: 1 } });

    const listed = await request(app).get("/api/knowledge/documents").set("Authorization", AUTH);
    expect(listed.body).toEqual({ status: "success", documents: ["guide.md"] });

    const found = await request(app)
      .post("/api/knowledge/search")
      .set("Authorization", AUTH)
      .send({ query: "pricing", filters: { source: "guide.md" }, limit: 5 });
    expect(found.status).toBe(200);
    expect(found.body).toMatchObject({ resultsCount: 1, filters: { source: "guide.md" } });
    expect(found.body.results[0].id).toBe("guide.md_0");

    const removed = await request(app).delete("/api/knowledge/documents/guide.md").set("Authorization", AUTH);
    expect(removed.status).toBe(200);
    expect(removed.body).toMatchObject({ status: "success", chunkCount: 1 });
  });

  it("updates a document", async () => {
    await addGuide();

    const response = await request(app)
      .put("/api/knowledge/documents/guide.md")
      .set("Authorization", AUTH)
      .send({ content: "Pricing now starts at 25 USD." });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "success", message: "Updated document guide.md with 1 chunks", chunkCount: 1 });
  });

  it("answers questions", async () => {
    await addGuide();

    const response = await request(app)
      .post("/api/assistant/ask")
      .set("Authorization", AUTH)
      .send({ question: "What does it cost?", filters: { contentType: "text_file" } });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: "success",
      answer: "generated answer",
      contextUsed: 1,
      sources: ["guide.md"],
      filtersApplied: { contentType: "text_file" },
    });
  });

  it("generates content", async () => {
    const response = await request(app)
      .post("/api/assistant/content")
      .set("Authorization", AUTH)
      .send({ contentType: "email", topic: "spring launch", audience: "customers", params: { tone: "warm" } });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: "success", content: "generated answer", targetAudience: "customers" });
  });

  it("rejects invalid payloads", async () => {
    const emptyQuestion = await request(app).post("/api/assistant/ask").set("Authorization", AUTH).send({ question: "" });
    const unknownFilter = await request(app)
      .post("/api/knowledge/search")
      .set("Authorization", AUTH)
      .send({ query: "pricing", filters: { author: "someone" } });
    const badLimit = await request(app)
      .post("/api/knowledge/search")
      .set("Authorization", AUTH)
      .send({ query: "pricing", limit: 500 });

    for (const response of [emptyQuestion, unknownFilter, badLimit]) {
      expect(response.status).toBe(400);
      expect(response.body.error).toBe("Invalid request");
    }
  });

  it("refuses unsafe document names", async () => {
    const response = await request(app)
      .post("/api/knowledge/documents")
      .set("Authorization", AUTH)
      .send({ filename: "../escape.md", content: "x" });

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ status: "error", message: "Failed to add document ../escape.md" });
  });

  it("creates and imports backups by file name only", async () => {
    await addGuide();

    const created = await request(app).post("/api/knowledge/backups").set("Authorization", AUTH);
    expect(created.status).toBe(201);
    const backupName = String(created.body.backupPath).split(/[\\/]/).pop();

    const imported = await request(app)
      .post("/api/knowledge/backups/import")
      .set("Authorization", AUTH)
      .send({ backup: backupName });
    expect(imported.status).toBe(200);
    expect(imported.body).toMatchObject({ status: "success", added: 0, skipped: 1 });

    const traversal = await request(app)
      .post("/api/knowledge/backups/import")
      .set("Authorization", AUTH)
      .send({ backup: "../secrets.json" });
    expect(traversal.status).toBe(400);
  });
});
