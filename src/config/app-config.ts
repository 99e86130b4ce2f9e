import path from "node:path";
import type { Env } from "./env.js";
import { ConfigurationError } from "../utils/errors.js";

export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
}

export type VectorProviderConfig =
  | { provider: "memory"; persistPath: string }
  | { provider: "pinecone"; apiKey: string; index: string; namespace: string };

export interface AppConfig {
  knowledgeDir: string;
  dataDir: string;
  backupDir: string;
  outputDir: string;
  collectionName: string;
  chunking: ChunkingConfig;
  vectorStore: VectorProviderConfig;
  openai: {
    apiKey?: string | undefined;
    completionsModel: string;
    embeddingsModel: string;
    embeddingDimensions: number;
  };
  retrieval: {
    answerResults: number;
    contentResults: number;
    searchResults: number;
  };
  saveOutputs: boolean;
}

export const assertChunking = ({ chunkSize, overlap }: ChunkingConfig) => {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`Chunk overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(`Chunk overlap (${overlap}) must be smaller than chunk size (${chunkSize})`);
  }
};

const resolveVectorStore = (env: Env, dataDir: string): VectorProviderConfig => {
  if (env.VECTOR_DB_PROVIDER === "memory") {
    return { provider: "memory", persistPath: path.join(dataDir, "index", `${env.COLLECTION_NAME}.json`) };
  }
  if (!env.PINECONE_API_KEY || !env.PINECONE_INDEX) {
    throw new ConfigurationError("Pinecone provider requires PINECONE_API_KEY and PINECONE_INDEX");
  }
  return {
    provider: "pinecone",
    apiKey: env.PINECONE_API_KEY,
    index: env.PINECONE_INDEX,
    namespace: env.COLLECTION_NAME,
  };
};

export const buildAppConfig = (env: Env, cwd = process.cwd()): AppConfig => {
  const chunking = { chunkSize: env.CHUNK_SIZE, overlap: env.CHUNK_OVERLAP };
  assertChunking(chunking);

  const dataDir = path.resolve(cwd, env.DATA_DIR);
  return {
    knowledgeDir: path.resolve(cwd, env.KNOWLEDGE_DIR),
    dataDir,
    backupDir: path.join(dataDir, "backups"),
    outputDir: path.resolve(cwd, env.OUTPUT_DIR),
    collectionName: env.COLLECTION_NAME,
    chunking,
    vectorStore: resolveVectorStore(env, dataDir),
    openai: {
      apiKey: env.OPENAI_API_KEY,
      completionsModel: env.OPENAI_COMPLETIONS_MODEL,
      embeddingsModel: env.OPENAI_EMBEDDINGS_MODEL,
      embeddingDimensions: env.EMBEDDING_DIMENSIONS,
    },
    retrieval: { answerResults: 5, contentResults: 3, searchResults: 10 },
    saveOutputs: env.SAVE_OUTPUTS,
  };
};
