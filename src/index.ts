import { buildServer } from "./server.js";
import { buildAppConfig } from "./config/app-config.js";
import { env, isProduction } from "./config/env.js";
import { createKnowledgeBase } from "./lib/container.js";
import { logger } from "./lib/logger.js";

process.on("uncaughtException", (error) => {
  logger.fatal({ err: error }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ err: reason }, "Unhandled rejection");
  process.exit(1);
});

const start = async () => {
  const config = buildAppConfig(env);
  const kb = createKnowledgeBase(config);

  logger.info({ knowledgeDir: config.knowledgeDir }, "Indexing knowledge base...");
  const summary = await kb.knowledge.rebuild();
  logger.info({ status: summary.status, chunks: summary.chunkCount }, summary.message);

  const app = buildServer(kb, {
    apiKey: env.API_KEY,
    corsAllowedOrigins: env.CORS_ALLOWED_ORIGINS_LIST,
    rateLimitPerMinute: env.RATE_LIMIT_PER_MINUTE,
    accessLog: isProduction ? "combined" : "dev",
  });

  app.listen(env.PORT, () => {
    logger.info(`🚀 Marketing knowledge backend listening on port ${env.PORT}`);
  });
};

start().catch((error: unknown) => {
  logger.fatal({ err: error }, "Failed to start server");
  process.exit(1);
});
