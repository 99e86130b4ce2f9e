import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../lib/logger.js";
import { errorCode } from "../utils/errors.js";
import type { ContentType } from "./vector-store/types.js";

export interface SourceDocument {
  filename: string;
  content: string;
  type: ContentType;
}

export const RECOGNIZED_EXTENSIONS = [".txt", ".md", ".markdown", ".json"] as const;

const log = logger.child({ component: "document-store" });

export const isRecognizedFilename = (filename: string) =>
  RECOGNIZED_EXTENSIONS.some((extension) => filename.toLowerCase().endsWith(extension));

export const contentTypeFor = (filename: string): ContentType => {
  const extension = path.extname(filename);
  if (path.basename(filename, extension).toLowerCase() === "company_profile") return "company_info";
  if (extension.toLowerCase() === ".json") return "structured_data";
  return "text_file";
};

const isSafeFilename = (filename: string) =>
  filename.length > 0 &&
  filename === path.basename(filename) &&
  !filename.includes("\\") &&
  !filename.startsWith(".") &&
  isRecognizedFilename(filename);

/**
 * Canonical source documents, one file per document in a flat knowledge
 * directory. The filename is the document key.
 */
export class DocumentStore {
  constructor(private readonly root: string) {}

  get directory() {
    return this.root;
  }

  async list() {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.root, { withFileTypes: true });
    } catch (error) {
      if (errorCode(error) !== "ENOENT") throw error;
      await fs.mkdir(this.root, { recursive: true });
      log.info({ dir: this.root }, "Created knowledge directory");
      return [];
    }
    return entries
      .filter((entry) => (entry.isFile() || entry.isSymbolicLink()) && isRecognizedFilename(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  async loadAll(): Promise<SourceDocument[]> {
    const documents: SourceDocument[] = [];
    for (const filename of await this.list()) {
      try {
        const content = await fs.readFile(path.join(this.root, filename), "utf-8");
        documents.push({ filename, content, type: contentTypeFor(filename) });
      } catch (error) {
        log.error({ err: error, filename }, "Skipping unreadable document");
      }
    }
    log.info({ count: documents.length }, "Loaded source documents");
    return documents;
  }

  async add(filename: string, content: string) {
    if (!isSafeFilename(filename)) {
      log.warn({ filename }, "Rejected document filename");
      return false;
    }
    try {
      await fs.mkdir(this.root, { recursive: true });
      await fs.writeFile(path.join(this.root, filename), content, "utf-8");
      log.info({ filename }, "Document saved");
      return true;
    } catch (error) {
      log.error({ err: error, filename }, "Saving document failed");
      return false;
    }
  }

  async remove(filename: string) {
    if (!isSafeFilename(filename)) {
      log.warn({ filename }, "Rejected document filename");
      return false;
    }
    try {
      await fs.unlink(path.join(this.root, filename));
      log.info({ filename }, "Document removed");
      return true;
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        log.error({ err: error, filename }, "Removing document failed");
      }
      return false;
    }
  }

  async count() {
    return (await this.list()).length;
  }
}
