import express, { type NextFunction, type Request, type Response } from "express";
import { z } from "zod";

import type { ModerationService } from "../core/service";
import { errorMessage, ModerationError, PoolExhaustedError } from "../util/errors";

// ---- Schemas ----
const ModerateBodySchema = z.object({
  groupId: z.string().min(1),
  userId: z.string().min(1),
  userName: z.string().default(""),
  text: z.string().min(1, "text is required"),
});

const KeywordBodySchema = z.object({
  word: z.string().trim().min(1, "word is required"),
});

export function createApp(service: ModerationService) {
  const { orchestrator, ledger, client, logger } = service;
  const app = express();
  app.use(express.json({ limit: "512kb" }));

  // ---- Routes ----
  app.get("/live", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.post("/moderate", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = ModerateBodySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });
        return;
      }
      res.json(await orchestrator.moderate(parsed.data));
    } catch (err) {
      next(err);
    }
  });

  app.get("/violations/:groupId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await ledger.listGroupRecords(req.params.groupId));
    } catch (err) {
      next(err);
    }
  });

  app.get("/violations/:groupId/:userId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { groupId, userId } = req.params;
      const [records, reading] = await Promise.all([
        ledger.listRecords(groupId, userId),
        ledger.getCurrentTier(groupId, userId),
      ]);
      res.json({ records, nextTier: reading.tier, asOfDate: reading.asOfDate });
    } catch (err) {
      next(err);
    }
  });

  app.delete("/violations/:groupId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ removed: await ledger.resetRecords(req.params.groupId) });
    } catch (err) {
      next(err);
    }
  });

  app.delete("/violations/:groupId/:userId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ removed: await ledger.resetRecords(req.params.groupId, req.params.userId) });
    } catch (err) {
      next(err);
    }
  });

  app.get("/stats", (_req: Request, res: Response) => {
    res.json({
      moderation: orchestrator.getMetrics().snapshot(),
      classification: client.stats(),
      pool: service.pool.stats(),
    });
  });

  app.get("/keywords", (_req: Request, res: Response) => {
    res.json({ words: orchestrator.getKeywords().list() });
  });

  app.post("/keywords", (req: Request, res: Response) => {
    const parsed = KeywordBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });
      return;
    }
    const current = orchestrator.getKeywords();
    if (current.has(parsed.data.word)) {
      res.status(409).json({ error: "already_exists" });
      return;
    }
    orchestrator.setKeywords(current.withWord(parsed.data.word));
    res.status(201).json({ words: orchestrator.getKeywords().list() });
  });

  app.delete("/keywords/:word", (req: Request, res: Response) => {
    const current = orchestrator.getKeywords();
    if (!current.has(req.params.word)) {
      res.status(404).json({ error: "not_found" });
      return;
    }
    orchestrator.setKeywords(current.withoutWord(req.params.word));
    res.json({ words: orchestrator.getKeywords().list() });
  });

  // ---- Error handler (no raw text logging) ----
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof PoolExhaustedError ? 503 : 500;
    const code = err instanceof ModerationError ? err.code : "internal_error";
    logger.error("request_failed", { code, error: errorMessage(err) });
    res.status(status).json({ error: code, message: errorMessage(err) });
  });

  return app;
}
