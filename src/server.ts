import express from "express";
import helmet from "helmet";
import cors from "cors";
import morgan from "morgan";
import type { Express } from "express";
import type { KnowledgeBase } from "./lib/container.js";
import { createApiRateLimiter } from "./middleware/rate-limit.js";
import { registerRoutes } from "./routes/index.js";
import { errorHandler } from "./middleware/error-handler.js";

export interface ServerOptions {
  apiKey?: string | undefined;
  corsAllowedOrigins?: string[];
  rateLimitPerMinute?: number;
  accessLog?: "combined" | "dev" | false;
}

export const buildServer = (
  kb: KnowledgeBase,
  { apiKey, corsAllowedOrigins = [], rateLimitPerMinute = 120, accessLog = "dev" }: ServerOptions = {},
): Express => {
  const app = express();

  app.set("trust proxy", 1);
  app.use(helmet());
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || !corsAllowedOrigins.length) {
          return callback(null, true);
        }

        if (corsAllowedOrigins.includes(origin)) {
          return callback(null, true);
        }

        return callback(new Error("Origin not allowed by CORS"));
      },
      credentials: true,
    }),
  );
  app.use(express.json({ limit: "2mb" }));
  if (accessLog) {
    app.use(morgan(accessLog));
  }

  app.get("/healthz", (_req, res) =>
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    }),
  );

  app.use("/api", createApiRateLimiter(rateLimitPerMinute));
  registerRoutes(app, kb, apiKey);

  app.use(errorHandler);
  return app;
};
