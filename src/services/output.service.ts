import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../lib/logger.js";
import { err, ok, type Result } from "../lib/result.js";
import { errorCode, errorMessage, StorageError } from "../utils/errors.js";

const log = logger.child({ component: "output-service" });

export const sanitizeFilename = (filename: string) =>
  path
    .basename(filename)
    .replace(/[^\w.-]+/g, "_")
    .replace(/^\.+/, "") || "output";

/** Generated artifacts and reports, written under the output directory. */
export class OutputService {
  constructor(private readonly root: string) {}

  async saveText(content: string, filename: string): Promise<Result<string, StorageError>> {
    return this.write(sanitizeFilename(filename), content);
  }

  async saveJson(data: unknown, filename: string): Promise<Result<string, StorageError>> {
    const name = sanitizeFilename(filename);
    return this.write(name.endsWith(".json") ? name : `${name}.json`, JSON.stringify(data, null, 2));
  }

  /** Output filenames, oldest first. */
  async list() {
    try {
      const entries = await fs.readdir(this.root, { withFileTypes: true });
      const files = await Promise.all(
        entries
          .filter((entry) => entry.isFile())
          .map(async (entry) => ({
            name: entry.name,
            mtimeMs: (await fs.stat(path.join(this.root, entry.name))).mtimeMs,
          })),
      );
      return files.sort((a, b) => a.mtimeMs - b.mtimeMs || a.name.localeCompare(b.name)).map((file) => file.name);
    } catch (error) {
      if (errorCode(error) === "ENOENT") return [];
      throw error;
    }
  }

  private async write(filename: string, content: string): Promise<Result<string, StorageError>> {
    const target = path.join(this.root, filename);
    try {
      await fs.mkdir(this.root, { recursive: true });
      await fs.writeFile(target, content, "utf-8");
      log.info({ path: target }, "Output saved");
      return ok(target);
    } catch (error) {
      log.error({ err: error, path: target }, "Saving output failed");
      return err(new StorageError(`Saving ${filename} failed: ${errorMessage(error)}`, { cause: error }));
    }
  }
}
