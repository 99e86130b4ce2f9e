import path from "node:path";
import { Router } from "express";
import { z } from "zod";
import type { KnowledgeService } from "../services/knowledge.service.js";
import { metadataFilterSchema } from "../services/vector-store/types.js";
import { httpStatus } from "./http-status.js";

const addDocumentSchema = z.object({
  filename: z.string().min(1).max(200),
  content: z.string(),
});

const updateDocumentSchema = z.object({
  content: z.string(),
});

const searchSchema = z.object({
  query: z.string().min(1),
  filters: metadataFilterSchema.optional(),
  limit: z.number().int().min(1).max(50).optional(),
});

const importSchema = z.object({
  backup: z.string().regex(/^[\w.-]+\.json$/, "Expected a backup file name"),
});

export const createKnowledgeRouter = (knowledge: KnowledgeService, backupDir: string) => {
  const router = Router();

  router.post("/rebuild", async (_req, res, next) => {
    try {
      const summary = await knowledge.rebuild();
      res.status(httpStatus(summary.status)).json(summary);
    } catch (error) {
      next(error);
    }
  });

  router.get("/documents", async (_req, res, next) => {
    try {
      const result = await knowledge.listDocuments();
      res.status(httpStatus(result.status)).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post("/documents", async (req, res, next) => {
    try {
      const payload = addDocumentSchema.parse(req.body);
      const result = await knowledge.addDocument(payload.filename, payload.content);
      res.status(httpStatus(result.status, 201)).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.put("/documents/:filename", async (req, res, next) => {
    try {
      const payload = updateDocumentSchema.parse(req.body);
      const result = await knowledge.updateDocument(req.params.filename, payload.content);
      res.status(httpStatus(result.status)).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.delete("/documents/:filename", async (req, res, next) => {
    try {
      const result = await knowledge.removeDocument(req.params.filename);
      res.status(httpStatus(result.status)).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post("/search", async (req, res, next) => {
    try {
      const payload = searchSchema.parse(req.body);
      const result = await knowledge.searchDocuments(payload.query, payload.filters, payload.limit);
      res.status(httpStatus(result.status)).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post("/backups", async (_req, res, next) => {
    try {
      const result = await knowledge.createBackup();
      res.status(httpStatus(result.status, 201)).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post("/backups/import", async (req, res, next) => {
    try {
      const payload = importSchema.parse(req.body);
      const result = await knowledge.importBackup(path.join(backupDir, payload.backup));
      res.status(httpStatus(result.status)).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
