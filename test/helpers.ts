import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { AppConfig } from "../src/config/app-config.js";
import type { GenerationClient } from "../src/services/llm.service.js";
import type { ChunkMetadataInput, ContentType, Embedder } from "../src/services/vector-store/types.js";

export const makeTempDir = (prefix = "kb-test-") => fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (dir: string) => fs.rm(dir, { recursive: true, force: true });

export const VOCABULARY = ["pricing", "brand", "social", "email", "launch", "audience", "newsletter", "product"];

/** One axis per vocabulary word, valued by occurrence count. */
export const embedKeywords = (text: string) => {
  const tokens = text.toLowerCase().match(/[a-z]+/g) ?? [];
  return VOCABULARY.map((word) => tokens.filter((token) => token === word).length);
};

export class KeywordEmbedder implements Embedder {
  readonly embedded: string[] = [];

  constructor(private readonly failOn?: RegExp) {}

  async embedDocuments(texts: string[]) {
    const failing = this.failOn;
    if (failing && texts.some((text) => failing.test(text))) {
      throw new Error("embedding backend unavailable");
    }
    this.embedded.push(...texts);
    return texts.map(embedKeywords);
  }

  async embedQuery(text: string) {
    return embedKeywords(text);
  }
}

export class FakeGenerator implements GenerationClient {
  readonly calls: Array<{ prompt: string; context: string[] }> = [];

  constructor(private readonly reply: string | Error = "generated answer") {}

  async generate(prompt: string, context: string[] = []) {
    this.calls.push({ prompt, context });
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export const testConfig = (root: string, overrides: Partial<AppConfig> = {}): AppConfig => ({
  knowledgeDir: path.join(root, "knowledge"),
  dataDir: path.join(root, "data"),
  backupDir: path.join(root, "data", "backups"),
  outputDir: path.join(root, "outputs"),
  collectionName: "test_collection",
  chunking: { chunkSize: 50, overlap: 10 },
  vectorStore: { provider: "memory", persistPath: path.join(root, "data", "index.json") },
  openai: { completionsModel: "test-model", embeddingsModel: "test-embeddings", embeddingDimensions: 8 },
  retrieval: { answerResults: 5, contentResults: 3, searchResults: 10 },
  saveOutputs: false,
  ...overrides,
});

export const metadataFor = (source: string, chunkIndex: number, contentType: ContentType = "text_file"): ChunkMetadataInput => ({
  source,
  filename: source,
  chunkIndex,
  contentType,
  indexedAt: "2026-01-01T00:00:00.000Z",
});

export const numberedWords = (count: number, prefix = "w") => Array.from({ length: count }, (_, i) => `${prefix}${i}`);
