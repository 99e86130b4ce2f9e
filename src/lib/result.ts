import type { KnowledgeBaseError } from "../utils/errors.js";

export type Result<T, E extends KnowledgeBaseError = KnowledgeBaseError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E extends KnowledgeBaseError>(error: E): Result<never, E> => ({ ok: false, error });
