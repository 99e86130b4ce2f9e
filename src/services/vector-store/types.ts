import { z } from "zod";

export const contentTypes = ["text_file", "structured_data", "company_info"] as const;
export type ContentType = (typeof contentTypes)[number];

export const chunkMetadataSchema = z.object({
  source: z.string().min(1),
  filename: z.string().min(1),
  chunkIndex: z.number().int().nonnegative(),
  contentType: z.enum(contentTypes),
  indexedAt: z.string().datetime(),
  lastUpdated: z.string().datetime(),
});

export type ChunkMetadata = z.infer<typeof chunkMetadataSchema>;

/** Metadata as callers hand it in; `lastUpdated` is stamped by the index. */
export const chunkMetadataInputSchema = chunkMetadataSchema.extend({
  lastUpdated: z.string().datetime().optional(),
});

export type ChunkMetadataInput = z.infer<typeof chunkMetadataInputSchema>;

/** Scalar = equality, array = membership. */
export type MetadataFilter = {
  [K in keyof ChunkMetadata]?: ChunkMetadata[K] | ChunkMetadata[K][];
};

export interface StoredChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
}

export interface VectorRecord extends StoredChunk {
  vector: number[];
}

export interface VectorMatch extends StoredChunk {
  /** cosine similarity */
  score: number;
}

export interface VectorStore {
  upsert(records: VectorRecord[]): Promise<void>;

  query(args: { vector: number[]; topK: number; filter?: MetadataFilter | undefined }): Promise<VectorMatch[]>;

  delete(ids: string[]): Promise<void>;

  /** Every stored chunk without its vector. */
  list(): Promise<StoredChunk[]>;
}

export interface Embedder {
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export interface SearchResult extends StoredChunk {
  distance: number;
  relevanceScore: number;
}

export interface SearchOptions {
  nResults?: number;
  filters?: MetadataFilter | undefined;
}

export interface ChunkBatch {
  documents: string[];
  metadatas: ChunkMetadataInput[];
  ids: string[];
}

export interface AddSummary {
  added: number;
  skipped: number;
}

export interface CollectionInfo {
  collectionName: string;
  documentCount: number;
  uniqueSources: number;
  contentTypes: ContentType[];
  backupCount: number;
}

export const backupSnapshotSchema = z
  .object({
    documents: z.array(z.string()),
    metadatas: z.array(chunkMetadataInputSchema),
    ids: z.array(z.string().min(1)),
    exported_at: z.string().datetime(),
    collection_name: z.string(),
  })
  .refine((snapshot) => snapshot.documents.length === snapshot.ids.length && snapshot.metadatas.length === snapshot.ids.length, {
    message: "documents, metadatas and ids must have the same length",
  });

export type BackupSnapshot = z.infer<typeof backupSnapshotSchema>;

const isMetadataKey = (key: string): key is keyof ChunkMetadata => key in chunkMetadataSchema.shape;

export const matchesFilter = (metadata: ChunkMetadata, filter?: MetadataFilter) => {
  if (!filter) return true;
  return Object.entries(filter).every(([key, expected]) => {
    if (expected === undefined) return true;
    if (!isMetadataKey(key)) return false;
    const actual = metadata[key];
    if (Array.isArray(expected)) {
      const candidates: readonly unknown[] = expected;
      return candidates.includes(actual);
    }
    return expected === actual;
  });
};

const oneOrMany = <T extends z.ZodTypeAny>(schema: T) => z.union([schema, z.array(schema).min(1)]).optional();

export const metadataFilterSchema = z
  .object({
    source: oneOrMany(z.string()),
    filename: oneOrMany(z.string()),
    chunkIndex: oneOrMany(z.number().int()),
    contentType: oneOrMany(z.enum(contentTypes)),
    indexedAt: oneOrMany(z.string()),
    lastUpdated: oneOrMany(z.string()),
  })
  .strict();
