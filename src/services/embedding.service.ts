import crypto from "node:crypto";
import { OpenAIEmbeddings } from "@langchain/openai";
import { logger } from "../lib/logger.js";
import type { Embedder } from "./vector-store/types.js";

export interface EmbeddingServiceOptions {
  apiKey?: string | undefined;
  model: string;
  dimensions: number;
}

export class EmbeddingService implements Embedder {
  private readonly embeddings?: OpenAIEmbeddings;
  private readonly dimensions: number;

  constructor({ apiKey, model, dimensions }: EmbeddingServiceOptions) {
    this.dimensions = dimensions;
    if (apiKey) {
      this.embeddings = new OpenAIEmbeddings({ apiKey, model, dimensions });
    } else {
      logger.warn("OPENAI_API_KEY not set - using offline hashed embeddings");
    }
  }

  get offline() {
    return !this.embeddings;
  }

  async embedDocuments(texts: string[]) {
    if (!texts.length) return [];
    if (!this.embeddings) {
      return texts.map((text) => this.mockEmbedding(text));
    }
    const vectors = await this.embeddings.embedDocuments(texts);
    return vectors.map((vector) => this.normalizeVector(vector));
  }

  async embedQuery(text: string) {
    if (!text.trim()) {
      throw new Error("Text must not be empty");
    }
    if (!this.embeddings) {
      return this.mockEmbedding(text);
    }
    return this.normalizeVector(await this.embeddings.embedQuery(text));
  }

  /** Hashed bag of words: each lower-cased token adds 1 to a sha256-chosen slot. */
  private mockEmbedding(text: string) {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
      const slot = crypto.createHash("sha256").update(token).digest().readUInt32BE(0) % this.dimensions;
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
    return vector;
  }

  private normalizeVector(vector: number[]) {
    if (vector.length < this.dimensions) {
      return [...vector, ...new Array<number>(this.dimensions - vector.length).fill(0)];
    }
    if (vector.length > this.dimensions) {
      return vector.slice(0, this.dimensions);
    }
    return vector;
  }
}
