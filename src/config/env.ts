import "dotenv/config";
import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
    CORS_ALLOWED_ORIGINS: z.string().default(""),
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120),
    API_KEY: optionalSecret,
    OPENAI_API_KEY: optionalSecret,
    OPENAI_COMPLETIONS_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OPENAI_EMBEDDINGS_MODEL: z.string().min(1).default("text-embedding-3-small"),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1024),
    VECTOR_DB_PROVIDER: z.enum(["memory", "pinecone"]).default("memory"),
    PINECONE_API_KEY: optionalSecret,
    PINECONE_INDEX: optionalSecret,
    KNOWLEDGE_DIR: z.string().min(1).default("knowledge_base"),
    DATA_DIR: z.string().min(1).default("data"),
    OUTPUT_DIR: z.string().min(1).default("outputs"),
    COLLECTION_NAME: z.string().regex(/^[\w-]+$/).default("marketing_knowledge"),
    CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(100),
    SAVE_OUTPUTS: flag.default("true"),
  })
  .transform((values) => ({
    ...values,
    CORS_ALLOWED_ORIGINS_LIST: values.CORS_ALLOWED_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
  }));

export type Env = z.infer<typeof envSchema>;

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid environment: ${issues}`, { cause: parsed.error });
  }
  return parsed.data;
};

export const env = loadEnv();
export const isProduction = env.NODE_ENV === "production";
