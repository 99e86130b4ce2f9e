import type { VectorProviderConfig } from "../../config/app-config.js";
import { logger } from "../../lib/logger.js";
import { MemoryVectorStore } from "./memory-vector-store.js";
import { PineconeVectorStore } from "./pinecone-vector-store.js";
import type { VectorStore } from "./types.js";

export const createVectorStore = (config: VectorProviderConfig): VectorStore => {
  if (config.provider === "pinecone") {
    logger.info({ index: config.index, namespace: config.namespace }, "Using Pinecone vector store");
    return new PineconeVectorStore(config);
  }
  logger.info({ path: config.persistPath }, "Using memory vector store");
  return new MemoryVectorStore(config.persistPath);
};
