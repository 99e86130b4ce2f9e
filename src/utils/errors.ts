export class HttpError extends Error {
  public statusCode: number;
  public details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = "Unauthorized") {
    super(401, message);
  }
}

export type KnowledgeErrorKind =
  | "configuration"
  | "ingestion"
  | "retrieval"
  | "generation"
  | "storage"
  | "not_found";

export class KnowledgeBaseError extends Error {
  public readonly kind: KnowledgeErrorKind;

  constructor(kind: KnowledgeErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Invalid settings or missing credentials. Fatal at startup. */
export class ConfigurationError extends KnowledgeBaseError {
  constructor(message: string, options?: ErrorOptions) {
    super("configuration", message, options);
  }
}

export class IngestionError extends KnowledgeBaseError {
  constructor(message: string, options?: ErrorOptions) {
    super("ingestion", message, options);
  }
}

export class RetrievalError extends KnowledgeBaseError {
  constructor(message: string, options?: ErrorOptions) {
    super("retrieval", message, options);
  }
}

export class GenerationError extends KnowledgeBaseError {
  constructor(message: string, options?: ErrorOptions) {
    super("generation", message, options);
  }
}

export class StorageError extends KnowledgeBaseError {
  constructor(message: string, options?: ErrorOptions) {
    super("storage", message, options);
  }
}

export class EntryNotFoundError extends KnowledgeBaseError {
  constructor(message: string, options?: ErrorOptions) {
    super("not_found", message, options);
  }
}

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/** `code` of a Node system error such as ENOENT, if any. */
export const errorCode = (error: unknown) =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;
