import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { logger } from "../../lib/logger.js";
import { errorCode } from "../../utils/errors.js";
import {
  chunkMetadataSchema,
  matchesFilter,
  type MetadataFilter,
  type StoredChunk,
  type VectorMatch,
  type VectorRecord,
  type VectorStore,
} from "./types.js";

const persistedSchema = z.object({
  records: z.array(
    z.object({
      id: z.string(),
      content: z.string(),
      vector: z.array(z.number()),
      metadata: chunkMetadataSchema,
    }),
  ),
});

const log = logger.child({ component: "memory-vector-store" });

export const cosineSimilarity = (a: number[], b: number[]) => {
  const minLength = Math.min(a.length, b.length);
  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < minLength; i += 1) {
    const valA = a[i] ?? 0;
    const valB = b[i] ?? 0;
    dot += valA * valB;
    magA += valA * valA;
    magB += valB * valB;
  }
  return dot / (Math.sqrt(magA) * Math.sqrt(magB) || 1);
};

/**
 * Brute-force cosine engine. With a `persistPath` every mutation is written
 * to a JSON file and the file is read back on first access.
 */
export class MemoryVectorStore implements VectorStore {
  private store = new Map<string, VectorRecord>();
  private loading?: Promise<void>;

  constructor(private readonly persistPath?: string) {}

  async upsert(records: VectorRecord[]) {
    await this.load();
    const next = new Map(this.store);
    for (const record of records) {
      next.set(record.id, { ...record, metadata: { ...record.metadata } });
    }
    await this.commit(next);
  }

  async query({ vector, topK, filter }: { vector: number[]; topK: number; filter?: MetadataFilter | undefined }) {
    await this.load();
    const matches: VectorMatch[] = [];

    for (const item of this.store.values()) {
      if (!matchesFilter(item.metadata, filter)) continue;
      matches.push({
        id: item.id,
        score: cosineSimilarity(vector, item.vector),
        metadata: { ...item.metadata },
        content: item.content,
      });
    }

    return matches.sort((a, b) => b.score - a.score).slice(0, Math.max(0, topK));
  }

  async delete(ids: string[]) {
    await this.load();
    const next = new Map(this.store);
    let removed = 0;
    for (const id of ids) {
      if (next.delete(id)) removed += 1;
    }
    if (removed) await this.commit(next);
  }

  async list(): Promise<StoredChunk[]> {
    await this.load();
    return Array.from(this.store.values(), ({ id, content, metadata }) => ({ id, content, metadata: { ...metadata } }));
  }

  private load() {
    this.loading ??= this.readPersisted().catch((error: unknown) => {
      this.loading = undefined;
      throw error;
    });
    return this.loading;
  }

  private async readPersisted() {
    if (!this.persistPath) return;
    let raw: string;
    try {
      raw = await fs.readFile(this.persistPath, "utf-8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") return;
      throw error;
    }
    const { records } = persistedSchema.parse(JSON.parse(raw));
    for (const record of records) {
      this.store.set(record.id, record);
    }
    log.debug({ count: records.length, path: this.persistPath }, "Vector records loaded");
  }

  /** The new state becomes visible only once it is on disk. */
  private async commit(next: Map<string, VectorRecord>) {
    await this.persist(next);
    this.store = next;
  }

  private async persist(records: Map<string, VectorRecord>) {
    if (!this.persistPath) return;
    await fs.mkdir(path.dirname(this.persistPath), { recursive: true });
    const tmpPath = `${this.persistPath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify({ records: Array.from(records.values()) }), "utf-8");
    await fs.rename(tmpPath, this.persistPath);
  }
}
