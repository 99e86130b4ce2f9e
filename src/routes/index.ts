import type { Express } from "express";
import { Router } from "express";
import type { KnowledgeBase } from "../lib/container.js";
import { requireApiKey } from "../middleware/require-auth.js";
import { createAssistantRouter } from "./assistant.routes.js";
import { httpStatus } from "./http-status.js";
import { createKnowledgeRouter } from "./knowledge.routes.js";

export const registerRoutes = (app: Express, kb: KnowledgeBase, apiKey?: string) => {
  const api = Router();

  api.use(requireApiKey(apiKey));
  api.get("/status", async (_req, res, next) => {
    try {
      const report = await kb.knowledge.statusReport();
      res.status(httpStatus(report.status)).json(report);
    } catch (error) {
      next(error);
    }
  });
  api.use("/knowledge", createKnowledgeRouter(kb.knowledge, kb.config.backupDir));
  api.use("/assistant", createAssistantRouter(kb.knowledge));

  app.use("/api", api);
};
