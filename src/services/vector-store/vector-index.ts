import fs from "node:fs/promises";
import path from "node:path";
import { Mutex } from "async-mutex";
import { logger } from "../../lib/logger.js";
import { err, ok, type Result } from "../../lib/result.js";
import {
  EntryNotFoundError,
  errorCode,
  errorMessage,
  IngestionError,
  RetrievalError,
  StorageError,
} from "../../utils/errors.js";
import { timestampSlug } from "../../utils/time.js";
import {
  backupSnapshotSchema,
  chunkMetadataInputSchema,
  type AddSummary,
  type BackupSnapshot,
  type ChunkBatch,
  type ChunkMetadata,
  type ChunkMetadataInput,
  type CollectionInfo,
  type ContentType,
  type Embedder,
  type SearchOptions,
  type SearchResult,
  type StoredChunk,
  type VectorRecord,
  type VectorStore,
} from "./types.js";

export interface VectorIndexOptions {
  store: VectorStore;
  embedder: Embedder;
  collectionName: string;
  backupDir: string;
}

interface InsertOptions {
  /** keep `lastUpdated` from the input instead of stamping a fresh one */
  preserveTimestamps: boolean;
}

const DEFAULT_RESULTS = 5;

const log = logger.child({ component: "vector-index" });

const increment = <K>(counts: Map<K, number>, key: K, delta: number) => {
  const next = (counts.get(key) ?? 0) + delta;
  if (next > 0) counts.set(key, next);
  else counts.delete(key);
};

/**
 * Embedding-backed chunk collection. The engine holds vectors; the index keeps
 * a catalog of ids, texts and metadata for dedup, per-source lookups and
 * statistics. Writers are serialized, and the catalog only changes after the
 * engine call has succeeded.
 */
export class VectorIndex {
  private readonly store: VectorStore;
  private readonly embedder: Embedder;
  private readonly writeLock = new Mutex();
  private readonly catalog = new Map<string, StoredChunk>();
  private readonly sourceCounts = new Map<string, number>();
  private readonly typeCounts = new Map<ContentType, number>();
  private hydration?: Promise<void>;

  readonly collectionName: string;
  readonly backupDir: string;

  constructor({ store, embedder, collectionName, backupDir }: VectorIndexOptions) {
    this.store = store;
    this.embedder = embedder;
    this.collectionName = collectionName;
    this.backupDir = backupDir;
  }

  async add(batch: ChunkBatch): Promise<Result<AddSummary, IngestionError>> {
    return this.writeLock.runExclusive(() => this.insert(batch, { preserveTimestamps: false }));
  }

  async search(query: string, { nResults = DEFAULT_RESULTS, filters }: SearchOptions = {}): Promise<SearchResult[]> {
    if (!query.trim() || nResults <= 0) return [];

    try {
      const vector = await this.embedder.embedQuery(query);
      const matches = await this.store.query({ vector, topK: nResults, filter: filters });
      return matches
        .map(({ id, content, metadata, score }) => {
          const distance = Math.max(0, 1 - score);
          return { id, content, metadata, distance, relevanceScore: 1 - distance };
        })
        .sort((a, b) => b.relevanceScore - a.relevanceScore)
        .slice(0, nResults);
    } catch (error) {
      const failure = new RetrievalError(`Search failed: ${errorMessage(error)}`, { cause: error });
      log.error({ err: failure, query, filters }, "Search degraded to an empty result");
      return [];
    }
  }

  async update(id: string, text: string, metadata: ChunkMetadataInput): Promise<Result<void>> {
    return this.writeLock.runExclusive(async () => {
      try {
        await this.ready();
        if (!this.catalog.has(id)) {
          return err(new EntryNotFoundError(`No chunk with id "${id}"`));
        }
        const parsed = chunkMetadataInputSchema.safeParse(metadata);
        if (!parsed.success) {
          return err(new IngestionError(`Invalid metadata for "${id}": ${parsed.error.message}`));
        }

        const [vector] = await this.embedder.embedDocuments([text]);
        if (!vector) {
          return err(new IngestionError(`Embedder returned no vector for "${id}"`));
        }
        const record: VectorRecord = {
          id,
          content: text,
          vector,
          metadata: { ...parsed.data, lastUpdated: new Date().toISOString() },
        };
        await this.store.upsert([record]);
        this.remember(record);
        log.info({ id }, "Chunk updated");
        return ok(undefined);
      } catch (error) {
        log.error({ err: error, id }, "Chunk update failed");
        return err(new IngestionError(`Updating "${id}" failed: ${errorMessage(error)}`, { cause: error }));
      }
    });
  }

  async delete(ids: string[]): Promise<Result<number, StorageError>> {
    return this.writeLock.runExclusive(async () => {
      try {
        await this.ready();
        const known = Array.from(new Set(ids)).filter((id) => this.catalog.has(id));
        return ok(await this.removeAll(known));
      } catch (error) {
        log.error({ err: error }, "Chunk delete failed");
        return err(new StorageError(`Deleting chunks failed: ${errorMessage(error)}`, { cause: error }));
      }
    });
  }

  async deleteBySource(source: string): Promise<Result<number, StorageError>> {
    return this.writeLock.runExclusive(async () => {
      try {
        await this.ready();
        const ids = this.idsForSource(source);
        const removed = await this.removeAll(ids);
        log.info({ source, removed }, "Chunks deleted by source");
        return ok(removed);
      } catch (error) {
        log.error({ err: error, source }, "Delete by source failed");
        return err(new StorageError(`Deleting chunks of "${source}" failed: ${errorMessage(error)}`, { cause: error }));
      }
    });
  }

  /** Sources that currently have at least one chunk. */
  async sources(): Promise<string[]> {
    await this.ready();
    return Array.from(this.sourceCounts.keys());
  }

  async chunksForSource(source: string): Promise<StoredChunk[]> {
    await this.ready();
    return this.idsForSource(source).flatMap((id) => {
      const chunk = this.catalog.get(id);
      return chunk ? [chunk] : [];
    });
  }

  async exportTo(filePath: string): Promise<Result<string, StorageError>> {
    try {
      await this.ready();
      await this.writeSnapshot(filePath, this.snapshot(), false);
      log.info({ path: filePath, count: this.catalog.size }, "Collection exported");
      return ok(filePath);
    } catch (error) {
      log.error({ err: error, path: filePath }, "Export failed");
      return err(new StorageError(`Export to ${filePath} failed: ${errorMessage(error)}`, { cause: error }));
    }
  }

  /** Imports run through the same dedup path as `add`. */
  async importFrom(filePath: string): Promise<Result<AddSummary>> {
    let snapshot: BackupSnapshot;
    try {
      const raw = await fs.readFile(filePath, "utf-8");
      snapshot = backupSnapshotSchema.parse(JSON.parse(raw));
    } catch (error) {
      log.error({ err: error, path: filePath }, "Backup file unreadable");
      return err(new StorageError(`Cannot read backup ${filePath}: ${errorMessage(error)}`, { cause: error }));
    }

    const result = await this.writeLock.runExclusive(() =>
      this.insert(
        { documents: snapshot.documents, metadatas: snapshot.metadatas, ids: snapshot.ids },
        { preserveTimestamps: true },
      ),
    );
    if (result.ok) {
      log.info({ path: filePath, ...result.value }, "Backup imported");
    }
    return result;
  }

  async createBackup(): Promise<Result<string, StorageError>> {
    try {
      await this.ready();
      const snapshot = this.snapshot();
      const base = path.join(this.backupDir, `${this.collectionName}_backup_${timestampSlug()}`);
      for (let attempt = 0; ; attempt += 1) {
        const filePath = attempt ? `${base}_${attempt}.json` : `${base}.json`;
        try {
          await this.writeSnapshot(filePath, snapshot, true);
          log.info({ path: filePath, count: snapshot.ids.length }, "Backup created");
          return ok(filePath);
        } catch (error) {
          if (errorCode(error) !== "EEXIST") throw error;
        }
      }
    } catch (error) {
      log.error({ err: error }, "Backup failed");
      return err(new StorageError(`Backup failed: ${errorMessage(error)}`, { cause: error }));
    }
  }

  async collectionInfo(): Promise<CollectionInfo> {
    await this.ready();
    return {
      collectionName: this.collectionName,
      documentCount: this.catalog.size,
      uniqueSources: this.sourceCounts.size,
      contentTypes: Array.from(this.typeCounts.keys()),
      backupCount: await this.countBackups(),
    };
  }

  private async insert(batch: ChunkBatch, { preserveTimestamps }: InsertOptions): Promise<Result<AddSummary, IngestionError>> {
    const { documents, metadatas, ids } = batch;
    if (documents.length !== ids.length || metadatas.length !== ids.length) {
      return err(
        new IngestionError(
          `Batch length mismatch: ${documents.length} documents, ${metadatas.length} metadatas, ${ids.length} ids`,
        ),
      );
    }

    try {
      await this.ready();

      const seen = new Set<string>();
      const pending: Array<{ id: string; content: string; metadata: ChunkMetadataInput }> = [];
      for (const [i, id] of ids.entries()) {
        if (this.catalog.has(id) || seen.has(id)) continue;
        seen.add(id);
        const parsed = chunkMetadataInputSchema.safeParse(metadatas[i]);
        if (!parsed.success) {
          return err(new IngestionError(`Invalid metadata for "${id}": ${parsed.error.message}`));
        }
        pending.push({ id, content: documents[i] ?? "", metadata: parsed.data });
      }

      const skipped = ids.length - pending.length;
      if (!pending.length) {
        log.info({ skipped }, "All chunks already indexed");
        return ok({ added: 0, skipped });
      }

      const vectors = await this.embedder.embedDocuments(pending.map((chunk) => chunk.content));
      if (vectors.length !== pending.length) {
        return err(new IngestionError(`Embedder returned ${vectors.length} vectors for ${pending.length} chunks`));
      }

      const now = new Date().toISOString();
      const records = pending.map<VectorRecord>((chunk, i) => ({
        id: chunk.id,
        content: chunk.content,
        vector: vectors[i] ?? [],
        metadata: {
          ...chunk.metadata,
          lastUpdated: preserveTimestamps && chunk.metadata.lastUpdated ? chunk.metadata.lastUpdated : now,
        },
      }));

      await this.store.upsert(records);
      for (const record of records) {
        this.remember(record);
      }
      if (skipped) log.info({ skipped }, "Skipped chunks with known ids");
      log.info({ added: records.length }, "Chunks added to vector index");
      return ok({ added: records.length, skipped });
    } catch (error) {
      log.error({ err: error }, "Adding chunks failed");
      return err(new IngestionError(`Adding chunks failed: ${errorMessage(error)}`, { cause: error }));
    }
  }

  private async removeAll(ids: string[]) {
    if (!ids.length) return 0;
    await this.store.delete(ids);
    for (const id of ids) {
      this.forget(id);
    }
    return ids.length;
  }

  private idsForSource(source: string) {
    const ids: string[] = [];
    for (const chunk of this.catalog.values()) {
      if (chunk.metadata.source === source) ids.push(chunk.id);
    }
    return ids;
  }

  private remember({ id, content, metadata }: StoredChunk) {
    this.forget(id);
    this.catalog.set(id, { id, content, metadata });
    increment(this.sourceCounts, metadata.source, 1);
    increment(this.typeCounts, metadata.contentType, 1);
  }

  private forget(id: string) {
    const existing = this.catalog.get(id);
    if (!existing) return;
    this.catalog.delete(id);
    increment(this.sourceCounts, existing.metadata.source, -1);
    increment(this.typeCounts, existing.metadata.contentType, -1);
  }

  private ready() {
    this.hydration ??= this.hydrate().catch((error: unknown) => {
      this.hydration = undefined;
      throw error;
    });
    return this.hydration;
  }

  private async hydrate() {
    const chunks = await this.store.list();
    for (const chunk of chunks) {
      this.remember(chunk);
    }
    log.debug({ count: chunks.length, collection: this.collectionName }, "Vector index catalog loaded");
  }

  private snapshot(): BackupSnapshot {
    const chunks = Array.from(this.catalog.values());
    return {
      documents: chunks.map((chunk) => chunk.content),
      metadatas: chunks.map((chunk): ChunkMetadata => ({ ...chunk.metadata })),
      ids: chunks.map((chunk) => chunk.id),
      exported_at: new Date().toISOString(),
      collection_name: this.collectionName,
    };
  }

  private async writeSnapshot(filePath: string, snapshot: BackupSnapshot, exclusive: boolean) {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(snapshot, null, 2), { encoding: "utf-8", flag: exclusive ? "wx" : "w" });
  }

  private async countBackups() {
    try {
      const entries = await fs.readdir(this.backupDir);
      return entries.filter((entry) => entry.endsWith(".json")).length;
    } catch (error) {
      if (errorCode(error) === "ENOENT") return 0;
      throw error;
    }
  }
}
