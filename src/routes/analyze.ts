import { Router } from "express";
import { z } from "zod";
import { analysisOptionsSchema } from "../config/engine";
import { ConfigError, HttpError } from "../engine/errors";
import type { AnalysisOrchestrator } from "../engine/orchestrator";
import { Validated, validate } from "../middleware/validate";
import { runAnalysis, toDiagnostics } from "../services/analysisService";
import { PipelineEvent, getEventsSince, subscribe } from "../services/events";

const analyzeSchema = z.object({
  url: z.string().trim().min(3).max(2048),
  options: analysisOptionsSchema.optional(),
  diagnostics: z.boolean().default(false)
});

type AnalyzeBody = Validated<typeof analyzeSchema>;

export function analyzeRoutes(orchestrator: AnalysisOrchestrator) {
  const router = Router();

  router.post("/", validate(analyzeSchema), async (req, res, next) => {
    const body: AnalyzeBody = req.body;
    try {
      const run = await runAnalysis(orchestrator, body.url, body.options ?? {}, req.requestId);
      res.setHeader("X-Pipeline-State", run.state);
      if (body.diagnostics) return res.json({ report: run.report, diagnostics: toDiagnostics(run) });
      return res.json(run.report);
    } catch (err) {
      if (err instanceof ConfigError) return next(new HttpError(400, err.message));
      return next(err);
    }
  });

  router.get("/events", (req, res) => {
    const since = typeof req.query.since === "string" ? req.query.since : undefined;
    res.json({ events: getEventsSince(since) });
  });

  router.get("/stream", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache, no-transform");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    const writeEvent = (event: PipelineEvent) => {
      res.write(`event: ${event.type}\n`);
      res.write(`id: ${event.id}\n`);
      res.write(`data: ${JSON.stringify({ type: event.type, createdAt: event.createdAt, payload: event.payload, correlationId: event.correlationId })}\n\n`);
    };

    const lastEventIdQuery = typeof req.query.since === "string" ? req.query.since : undefined;
    for (const event of getEventsSince(req.get("last-event-id") || lastEventIdQuery)) writeEvent(event);

    const keepAlive = setInterval(() => {
      res.write(`: ping ${Date.now()}\n\n`);
    }, 15_000);
    const unsubscribe = subscribe(writeEvent);

    res.on("close", () => {
      clearInterval(keepAlive);
      unsubscribe();
    });
  });

  return router;
}
