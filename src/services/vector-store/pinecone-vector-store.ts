import { Pinecone, type Index } from "@pinecone-database/pinecone";
import { z } from "zod";
import { logger } from "../../lib/logger.js";
import { chunkMetadataSchema, type MetadataFilter, type StoredChunk, type VectorRecord, type VectorStore } from "./types.js";

const storedMetadataSchema = chunkMetadataSchema.extend({ content: z.string() });

// Pinecone limits: 100 records per upsert/fetch, 1000 ids per delete
const UPSERT_BATCH = 100;
const FETCH_BATCH = 100;
const DELETE_BATCH = 1000;

const log = logger.child({ component: "pinecone-vector-store" });

const batches = <T>(items: T[], size: number) => {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
};

const toPineconeFilter = (filter?: MetadataFilter) => {
  if (!filter) return undefined;
  const clauses = Object.entries(filter)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => [key, Array.isArray(value) ? { $in: value } : { $eq: value }] as const);
  return clauses.length ? Object.fromEntries(clauses) : undefined;
};

export interface PineconeVectorStoreOptions {
  apiKey: string;
  index: string;
  namespace: string;
}

export class PineconeVectorStore implements VectorStore {
  private readonly index: Index;

  constructor({ apiKey, index, namespace }: PineconeVectorStoreOptions) {
    const client = new Pinecone({ apiKey });
    this.index = client.index(index).namespace(namespace);
  }

  async upsert(records: VectorRecord[]) {
    for (const batch of batches(records, UPSERT_BATCH)) {
      await this.index.upsert(
        batch.map(({ id, vector, metadata, content }) => ({
          id,
          values: vector,
          metadata: { ...metadata, content },
        })),
      );
    }
  }

  async query({ vector, topK, filter }: { vector: number[]; topK: number; filter?: MetadataFilter | undefined }) {
    const pineconeFilter = toPineconeFilter(filter);
    const response = await this.index.query({
      vector,
      topK,
      includeMetadata: true,
      ...(pineconeFilter ? { filter: pineconeFilter } : {}),
    });

    return response.matches.flatMap((match) => {
      const chunk = this.toStoredChunk(match.id, match.metadata);
      return chunk ? [{ ...chunk, score: match.score ?? 0 }] : [];
    });
  }

  async delete(ids: string[]) {
    for (const batch of batches(ids, DELETE_BATCH)) {
      await this.index.deleteMany(batch);
    }
    if (ids.length) log.info({ count: ids.length }, "Pinecone vectors deleted by ID");
  }

  async list() {
    const ids: string[] = [];
    let paginationToken: string | undefined;
    do {
      const page = await this.index.listPaginated(paginationToken ? { paginationToken } : {});
      for (const vector of page.vectors ?? []) {
        if (vector.id) ids.push(vector.id);
      }
      paginationToken = page.pagination?.next;
    } while (paginationToken);

    const chunks: StoredChunk[] = [];
    for (const batch of batches(ids, FETCH_BATCH)) {
      const response = await this.index.fetch(batch);
      for (const record of Object.values(response.records)) {
        const chunk = this.toStoredChunk(record.id, record.metadata);
        if (chunk) chunks.push(chunk);
      }
    }
    return chunks;
  }

  private toStoredChunk(id: string, metadata: unknown): StoredChunk | null {
    const parsed = storedMetadataSchema.safeParse(metadata);
    if (!parsed.success) {
      log.warn({ id, issues: parsed.error.issues }, "Skipping Pinecone record with unexpected metadata");
      return null;
    }
    const { content, ...chunkMetadata } = parsed.data;
    return { id, content, metadata: chunkMetadata };
  }
}
