import type { Express, NextFunction, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import {
  resolveNameQuerySchema,
  selectComponentRequestSchema,
  startSessionRequestSchema,
  stepQuerySchema,
} from "@shared/schema";
import { EngineError } from "../platform/errors";
import type { EngineContext } from "./engineContext";
import * as sessionService from "./services/selectionSessionService";

const stepParamSchema = z.coerce.number().int();

const STATUS_BY_CODE: Readonly<Record<string, number>> = {
  INVALID_BUDGET: 400,
  INVALID_STEP: 400,
  UNKNOWN_SESSION: 404,
  SEQUENCE_VIOLATION: 409,
  CATEGORY_MISMATCH: 409,
  SESSION_CONFLICT: 409,
};

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

function sendError(res: Response, next: NextFunction, err: unknown): void {
  if (err instanceof EngineError) {
    const status = STATUS_BY_CODE[err.code] ?? 500;
    res.status(status).json({ message: err.message, code: err.code });
    return;
  }
  next(err);
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  ctx: EngineContext,
): Promise<Server> {

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", nodes: ctx.graph.nodeCount });
  });

  // Sessions
  app.post("/api/sessions", async (req, res, next) => {
    const parsed = startSessionRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ message: formatIssues(parsed.error) });

    try {
      const session = await sessionService.startSession(ctx, parsed.data.budget, parsed.data.purpose);
      res.status(201).json(session);
    } catch (err) {
      sendError(res, next, err);
    }
  });

  app.get("/api/sessions/:id", async (req, res, next) => {
    try {
      res.json(await sessionService.getSession(ctx, req.params.id));
    } catch (err) {
      sendError(res, next, err);
    }
  });

  app.get("/api/sessions/:id/steps/:step", async (req, res, next) => {
    const step = stepParamSchema.safeParse(req.params.step);
    if (!step.success) return res.status(400).json({ message: `step: ${formatIssues(step.error)}` });
    const query = stepQuerySchema.safeParse(req.query);
    if (!query.success) return res.status(400).json({ message: formatIssues(query.error) });

    try {
      const topK = query.data.topK ?? ctx.config.defaultTopK;
      const result = await sessionService.getStepCandidates(ctx, req.params.id, {
        step: step.data,
        topK,
        relax: query.data.relax,
      });

      let documents: Awaited<ReturnType<typeof sessionService.fetchStepDocuments>> = [];
      if (ctx.retriever) {
        try {
          documents = await sessionService.fetchStepDocuments(
            ctx,
            req.params.id,
            step.data,
            topK,
            AbortSignal.timeout(ctx.config.retrievalTimeoutMs),
          );
        } catch (err) {
          // Retrieval is advisory; the ranked candidates still go out.
          console.warn(`[routes] retrieval failed for ${req.params.id} step ${step.data}:`, err);
        }
      }

      res.json({ ...result, documents });
    } catch (err) {
      sendError(res, next, err);
    }
  });

  app.post("/api/sessions/:id/selections", async (req, res, next) => {
    const parsed = selectComponentRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ message: formatIssues(parsed.error) });

    try {
      const session = await sessionService.selectComponent(ctx, req.params.id, parsed.data);
      res.json(session);
    } catch (err) {
      sendError(res, next, err);
    }
  });

  app.get("/api/sessions/:id/summary", async (req, res, next) => {
    try {
      res.json(await sessionService.getSummary(ctx, req.params.id));
    } catch (err) {
      sendError(res, next, err);
    }
  });

  // Graph
  app.get("/api/graph/stats", (_req, res) => {
    res.json(ctx.graph.stats());
  });

  app.get("/api/components/resolve", (req, res) => {
    const parsed = resolveNameQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ message: formatIssues(parsed.error) });

    const id = ctx.graph.resolveName(parsed.data.name, { category: parsed.data.category });
    if (!id) return res.status(404).json({ message: `No component matches "${parsed.data.name}"` });
    res.json({ query: parsed.data.name, component: ctx.graph.getComponent(id) });
  });

  return httpServer;
}
