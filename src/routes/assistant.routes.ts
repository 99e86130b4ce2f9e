import { Router } from "express";
import { z } from "zod";
import type { KnowledgeService } from "../services/knowledge.service.js";
import { metadataFilterSchema } from "../services/vector-store/types.js";
import { httpStatus } from "./http-status.js";

const askSchema = z.object({
  question: z.string().min(1).max(4000),
  filters: metadataFilterSchema.optional(),
});

const contentSchema = z.object({
  contentType: z.string().min(1).max(100),
  topic: z.string().min(1).max(500),
  audience: z.string().min(1).max(500),
  params: z.record(z.unknown()).optional(),
});

export const createAssistantRouter = (knowledge: KnowledgeService) => {
  const router = Router();

  router.post("/ask", async (req, res, next) => {
    try {
      const payload = askSchema.parse(req.body);
      const result = await knowledge.answer(payload.question, payload.filters);
      res.status(httpStatus(result.status)).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post("/content", async (req, res, next) => {
    try {
      const payload = contentSchema.parse(req.body);
      const result = await knowledge.generateContent(payload.contentType, payload.topic, payload.audience, payload.params);
      res.status(httpStatus(result.status)).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
