import type { AppConfig, ChunkingConfig } from "../config/app-config.js";
import { logger } from "../lib/logger.js";
import { err, ok, type Result } from "../lib/result.js";
import { chunkText } from "../utils/chunk-text.js";
import { errorMessage } from "../utils/errors.js";
import { timestampSlug } from "../utils/time.js";
import { contentTypeFor, type DocumentStore } from "./document-store.service.js";
import type { GenerationClient } from "./llm.service.js";
import type { OutputService } from "./output.service.js";
import { buildAnswerPrompt, buildContentPrompt } from "./prompts.js";
import type { ChunkBatch, ContentType, MetadataFilter, SearchResult } from "./vector-store/types.js";
import type { VectorIndex } from "./vector-store/vector-index.js";

export type OperationStatus = "success" | "warning" | "error";
export type KnowledgeBaseState = "empty" | "indexed";

export interface RebuildSummary {
  status: OperationStatus;
  state: KnowledgeBaseState;
  documentCount: number;
  chunkCount: number;
  addedChunks: number;
  failedDocuments: string[];
  /** indexed sources whose file is gone; their chunks were deleted */
  removedDocuments: string[];
  message: string;
}

export interface AnswerResponse {
  status: "success" | "error";
  question: string;
  answer: string;
  contextUsed: number;
  sources: string[];
  relevanceScores: number[];
  avgRelevance: number;
  filtersApplied: MetadataFilter;
  timestamp: string;
  message?: string;
}

export interface ContentResponse {
  status: "success" | "error";
  contentType: string;
  topic: string;
  targetAudience: string;
  content: string;
  contextUsed: number;
  sources: string[];
  timestamp: string;
  message?: string;
}

export interface DocumentResponse {
  status: "success" | "partial" | "error";
  message: string;
  chunkCount?: number;
  rebuild?: RebuildSummary;
}

export interface SearchResponse {
  status: "success" | "error";
  query: string;
  filters: MetadataFilter;
  resultsCount: number;
  results: SearchResult[];
  timestamp: string;
  message?: string;
}

export interface BackupResponse {
  status: "success" | "error";
  message: string;
  backupPath?: string;
}

export interface ImportResponse {
  status: "success" | "error";
  message: string;
  added: number;
  skipped: number;
}

export type StatusReport =
  | {
      knowledge_base: {
        source_documents: number;
        indexed_chunks: number;
        unique_sources: number;
        content_types: ContentType[];
        backup_count: number;
      };
      outputs: { count: number; recent: string[] };
      status: "operational";
      timestamp: string;
    }
  | { status: "error"; message: string; timestamp: string };

export interface OutputOptions {
  saveOutput?: boolean;
}

export interface KnowledgeServiceDeps {
  documents: DocumentStore;
  index: VectorIndex;
  generator: GenerationClient;
  outputs: OutputService;
  chunking: ChunkingConfig;
  retrieval: AppConfig["retrieval"];
  saveOutputs: boolean;
}

const RECENT_OUTPUTS = 5;

const log = logger.child({ component: "knowledge-service" });

export const chunkId = (source: string, chunkIndex: number) => `${source}_${chunkIndex}`;

/** JSON documents are indexed as `key: value` paragraphs. Anything unparsable is indexed as-is. */
export const flattenStructured = (content: string) => {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return content;
  }
  if (data === null || typeof data !== "object") return String(data);

  const entries: Array<[string, unknown]> = Array.isArray(data)
    ? data.map((value, i): [string, unknown] => [String(i), value])
    : Object.entries(data);
  return entries
    .map(([key, value]) => `${key}: ${typeof value === "object" && value !== null ? JSON.stringify(value) : String(value)}`)
    .join("\n\n");
};

const average = (values: number[]) => (values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : 0);

const apology = (what: string) => `I apologize, but I couldn't ${what} right now. Please try again later.`;

/**
 * Keeps the document store and the vector index consistent and combines
 * retrieval with generation. Every public method resolves to a response with a
 * `status`; nothing throws past this class.
 */
export class KnowledgeService {
  private readonly documents: DocumentStore;
  private readonly index: VectorIndex;
  private readonly generator: GenerationClient;
  private readonly outputs: OutputService;
  private readonly chunking: ChunkingConfig;
  private readonly retrieval: AppConfig["retrieval"];
  private readonly saveOutputs: boolean;
  private currentState: KnowledgeBaseState = "empty";

  constructor(deps: KnowledgeServiceDeps) {
    this.documents = deps.documents;
    this.index = deps.index;
    this.generator = deps.generator;
    this.outputs = deps.outputs;
    this.chunking = deps.chunking;
    this.retrieval = deps.retrieval;
    this.saveOutputs = deps.saveOutputs;
  }

  get state() {
    return this.currentState;
  }

  async rebuild(): Promise<RebuildSummary> {
    const empty = { documentCount: 0, chunkCount: 0, addedChunks: 0, failedDocuments: [], removedDocuments: [] };
    try {
      const documents = await this.documents.loadAll();
      const removedDocuments = await this.purgeMissingSources(new Set(documents.map((document) => document.filename)));
      if (!documents.length) {
        this.currentState = await this.indexState();
        log.warn("No documents found in knowledge base");
        return { ...empty, removedDocuments, status: "warning", state: this.currentState, message: "No documents found" };
      }

      let indexed = 0;
      let chunkCount = 0;
      let addedChunks = 0;
      const failedDocuments: string[] = [];

      for (const document of documents) {
        const batch = this.prepareChunks(document.filename, document.content, document.type);
        const synced = await this.syncSource(document.filename, batch);
        if (!synced.ok) {
          log.error({ filename: document.filename, err: synced.error }, "Indexing document failed");
          failedDocuments.push(document.filename);
          continue;
        }
        if (batch.ids.length) indexed += 1;
        chunkCount += batch.ids.length;
        addedChunks += synced.value;
      }

      this.currentState = await this.indexState();

      const succeeded = documents.length - failedDocuments.length;
      const summary: RebuildSummary = {
        status: failedDocuments.length === 0 ? "success" : succeeded > 0 ? "warning" : "error",
        state: this.currentState,
        documentCount: indexed,
        chunkCount,
        addedChunks,
        failedDocuments,
        removedDocuments,
        message: `Indexed ${indexed} documents into ${chunkCount} chunks (${addedChunks} new)${
          failedDocuments.length ? `; failed: ${failedDocuments.join(", ")}` : ""
        }${removedDocuments.length ? `; removed: ${removedDocuments.join(", ")}` : ""}`,
      };
      log.info({ ...summary }, "Knowledge base rebuilt");
      return summary;
    } catch (error) {
      log.error({ err: error }, "Knowledge base rebuild failed");
      return {
        ...empty,
        status: "error",
        state: this.currentState,
        message: `Error setting up knowledge base: ${errorMessage(error)}`,
      };
    }
  }

  async answer(question: string, filters?: MetadataFilter, { saveOutput = this.saveOutputs }: OutputOptions = {}): Promise<AnswerResponse> {
    const timestamp = new Date().toISOString();
    const filtersApplied = filters ?? {};

    const results = await this.index.search(question, { nResults: this.retrieval.answerResults, filters });
    const context = results.map((result) => result.content);
    const sources = results.map((result) => result.metadata.filename);
    const relevanceScores = results.map((result) => result.relevanceScore);
    const base = {
      question,
      contextUsed: context.length,
      sources,
      relevanceScores,
      avgRelevance: average(relevanceScores),
      filtersApplied,
      timestamp,
    };

    try {
      const answer = await this.generator.generate(buildAnswerPrompt(question), context);
      const response: AnswerResponse = { ...base, status: "success", answer };
      if (saveOutput) {
        await this.saveOutput(
          `qa_response_${timestampSlug()}.txt`,
          [
            `Question: ${question}`,
            `Answer: ${answer}`,
            `Sources: ${sources.join(", ")}\nAverage Relevance: ${response.avgRelevance.toFixed(3)}`,
          ].join("\n\n"),
        );
      }
      log.info({ contextUsed: context.length, avgRelevance: response.avgRelevance }, "Question answered");
      return response;
    } catch (error) {
      log.error({ err: error, question }, "Answer generation failed");
      return { ...base, status: "error", answer: apology("answer your question"), message: errorMessage(error) };
    }
  }

  async generateContent(
    contentType: string,
    topic: string,
    audience: string,
    params?: Record<string, unknown>,
    { saveOutput = this.saveOutputs }: OutputOptions = {},
  ): Promise<ContentResponse> {
    const timestamp = new Date().toISOString();
    const results = await this.index.search(`${topic} ${audience} ${contentType}`, {
      nResults: this.retrieval.contentResults,
    });
    const context = results.map((result) => result.content);
    const base = {
      contentType,
      topic,
      targetAudience: audience,
      contextUsed: context.length,
      sources: results.map((result) => result.metadata.filename),
      timestamp,
    };

    try {
      const content = await this.generator.generate(buildContentPrompt({ contentType, topic, audience, params }), context);
      const response: ContentResponse = { ...base, status: "success", content };
      if (saveOutput) {
        const filename = `${contentType.toLowerCase().replace(/\s+/g, "_")}_${timestampSlug()}.txt`;
        await this.saveOutput(filename, content);
        const saved = await this.outputs.saveJson(response, `metadata_${filename}`);
        if (!saved.ok) log.warn({ err: saved.error }, "Content metadata not saved");
      }
      log.info({ contentType, topic }, "Content generated");
      return response;
    } catch (error) {
      log.error({ err: error, contentType, topic }, "Content generation failed");
      return { ...base, status: "error", content: apology(`generate the ${contentType}`), message: errorMessage(error) };
    }
  }

  /** Stores the document, then reindexes the whole knowledge base. */
  async addDocument(filename: string, content: string): Promise<DocumentResponse> {
    try {
      if (!(await this.documents.add(filename, content))) {
        return { status: "error", message: `Failed to add document ${filename}` };
      }
      const rebuild = await this.rebuild();
      return {
        status: rebuild.status === "error" ? "error" : "success",
        message: `Added document ${filename} and re-indexed knowledge base`,
        rebuild,
      };
    } catch (error) {
      log.error({ err: error, filename }, "Adding document failed");
      return { status: "error", message: `Error adding document: ${errorMessage(error)}` };
    }
  }

  /** Targeted reindex of one source. */
  async updateDocument(filename: string, content: string): Promise<DocumentResponse> {
    try {
      const document = { filename, content, type: contentTypeFor(filename) };
      if (!(await this.documents.add(filename, content))) {
        return { status: "error", message: `Failed to update document ${filename}` };
      }
      const removed = await this.index.deleteBySource(filename);
      if (!removed.ok) {
        return { status: "error", message: removed.error.message };
      }
      const batch = this.prepareChunks(document.filename, document.content, document.type);
      if (batch.ids.length) {
        const added = await this.index.add(batch);
        if (!added.ok) {
          return { status: "error", message: added.error.message };
        }
      }
      return {
        status: "success",
        message: `Updated document ${filename} with ${batch.ids.length} chunks`,
        chunkCount: batch.ids.length,
      };
    } catch (error) {
      log.error({ err: error, filename }, "Updating document failed");
      return { status: "error", message: `Error updating document: ${errorMessage(error)}` };
    }
  }

  async removeDocument(filename: string): Promise<DocumentResponse> {
    try {
      const removed = await this.index.deleteBySource(filename);
      if (!removed.ok) {
        return { status: "error", message: removed.error.message };
      }
      const deleted = await this.documents.remove(filename);
      return {
        status: deleted ? "success" : "partial",
        message: `Removed document ${filename} from knowledge base`,
        chunkCount: removed.value,
      };
    } catch (error) {
      log.error({ err: error, filename }, "Removing document failed");
      return { status: "error", message: `Error removing document: ${errorMessage(error)}` };
    }
  }

  async listDocuments(): Promise<{ status: "success" | "error"; documents: string[]; message?: string }> {
    try {
      return { status: "success", documents: await this.documents.list() };
    } catch (error) {
      log.error({ err: error }, "Listing documents failed");
      return { status: "error", documents: [], message: errorMessage(error) };
    }
  }

  async searchDocuments(query: string, filters?: MetadataFilter, limit = this.retrieval.searchResults): Promise<SearchResponse> {
    const results = await this.index.search(query, { nResults: limit, filters });
    return {
      status: "success",
      query,
      filters: filters ?? {},
      resultsCount: results.length,
      results,
      timestamp: new Date().toISOString(),
    };
  }

  async createBackup(): Promise<BackupResponse> {
    const backup = await this.index.createBackup();
    if (!backup.ok) {
      return { status: "error", message: backup.error.message };
    }
    return { status: "success", message: "Backup created successfully", backupPath: backup.value };
  }

  async importBackup(filePath: string): Promise<ImportResponse> {
    const imported = await this.index.importFrom(filePath);
    if (!imported.ok) {
      return { status: "error", message: imported.error.message, added: 0, skipped: 0 };
    }
    return {
      status: "success",
      message: `Imported ${imported.value.added} chunks (${imported.value.skipped} already present)`,
      ...imported.value,
    };
  }

  async statusReport(): Promise<StatusReport> {
    const timestamp = new Date().toISOString();
    try {
      const [info, sourceDocuments, outputs] = await Promise.all([
        this.index.collectionInfo(),
        this.documents.count(),
        this.outputs.list(),
      ]);
      return {
        knowledge_base: {
          source_documents: sourceDocuments,
          indexed_chunks: info.documentCount,
          unique_sources: info.uniqueSources,
          content_types: info.contentTypes,
          backup_count: info.backupCount,
        },
        outputs: { count: outputs.length, recent: outputs.slice(-RECENT_OUTPUTS) },
        status: "operational",
        timestamp,
      };
    } catch (error) {
      log.error({ err: error }, "Status report failed");
      return { status: "error", message: errorMessage(error), timestamp };
    }
  }

  private prepareChunks(filename: string, content: string, type: ContentType): ChunkBatch {
    const text = filename.toLowerCase().endsWith(".json") ? flattenStructured(content) : content;
    const chunks = chunkText(text, this.chunking.chunkSize, this.chunking.overlap);
    const indexedAt = new Date().toISOString();
    return {
      documents: chunks,
      ids: chunks.map((_, i) => chunkId(filename, i)),
      metadatas: chunks.map((_, i) => ({
        source: filename,
        filename,
        chunkIndex: i,
        contentType: type,
        indexedAt,
      })),
    };
  }

  /**
   * Unchanged sources are left to the index's dedup. A source whose chunks
   * differ from what is indexed is deleted first, then re-added.
   */
  private async syncSource(source: string, batch: ChunkBatch): Promise<Result<number>> {
    const indexed = await this.index.chunksForSource(source);
    const fresh = new Map(batch.ids.map((id, i) => [id, batch.documents[i]]));
    const changed = indexed.length > 0 && (indexed.length !== fresh.size || indexed.some((chunk) => fresh.get(chunk.id) !== chunk.content));

    if (changed) {
      const removed = await this.index.deleteBySource(source);
      if (!removed.ok) return removed;
      log.info({ source, removed: removed.value }, "Source changed, replacing its chunks");
    }
    if (!batch.ids.length) return ok(0);

    const added = await this.index.add(batch);
    return added.ok ? ok(added.value.added) : err(added.error);
  }

  /** Deletes the chunks of every indexed source that is no longer on disk. */
  private async purgeMissingSources(present: Set<string>) {
    const removed: string[] = [];
    for (const source of await this.index.sources()) {
      if (present.has(source)) continue;
      const deleted = await this.index.deleteBySource(source);
      if (!deleted.ok) {
        log.error({ source, err: deleted.error }, "Removing chunks of a deleted document failed");
        continue;
      }
      log.info({ source, removed: deleted.value }, "Document no longer on disk, chunks removed");
      removed.push(source);
    }
    return removed;
  }

  private async indexState(): Promise<KnowledgeBaseState> {
    const info = await this.index.collectionInfo();
    return info.documentCount > 0 ? "indexed" : "empty";
  }

  private async saveOutput(filename: string, content: string) {
    const saved = await this.outputs.saveText(content, filename);
    if (!saved.ok) log.warn({ err: saved.error, filename }, "Output not saved");
  }
}
