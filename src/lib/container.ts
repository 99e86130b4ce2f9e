import type { AppConfig } from "../config/app-config.js";
import { DocumentStore } from "../services/document-store.service.js";
import { EmbeddingService } from "../services/embedding.service.js";
import { KnowledgeService } from "../services/knowledge.service.js";
import { LlmService, type GenerationClient } from "../services/llm.service.js";
import { OutputService } from "../services/output.service.js";
import { createVectorStore } from "../services/vector-store/index.js";
import type { Embedder, VectorStore } from "../services/vector-store/types.js";
import { VectorIndex } from "../services/vector-store/vector-index.js";

export interface KnowledgeBaseOverrides {
  embedder?: Embedder;
  generator?: GenerationClient;
  vectorStore?: VectorStore;
}

export interface KnowledgeBase {
  config: AppConfig;
  documents: DocumentStore;
  index: VectorIndex;
  outputs: OutputService;
  generator: GenerationClient;
  knowledge: KnowledgeService;
}

/** Builds every component once; callers pass the references around. */
export const createKnowledgeBase = (config: AppConfig, overrides: KnowledgeBaseOverrides = {}): KnowledgeBase => {
  const documents = new DocumentStore(config.knowledgeDir);
  const outputs = new OutputService(config.outputDir);
  const embedder =
    overrides.embedder ??
    new EmbeddingService({
      apiKey: config.openai.apiKey,
      model: config.openai.embeddingsModel,
      dimensions: config.openai.embeddingDimensions,
    });
  const generator =
    overrides.generator ?? new LlmService({ apiKey: config.openai.apiKey, model: config.openai.completionsModel });

  const index = new VectorIndex({
    store: overrides.vectorStore ?? createVectorStore(config.vectorStore),
    embedder,
    collectionName: config.collectionName,
    backupDir: config.backupDir,
  });

  const knowledge = new KnowledgeService({
    documents,
    index,
    generator,
    outputs,
    chunking: config.chunking,
    retrieval: config.retrieval,
    saveOutputs: config.saveOutputs,
  });

  return { config, documents, index, outputs, generator, knowledge };
};
