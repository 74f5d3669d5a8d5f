import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import compression from "compression";
import type { Env } from "./config/env";
import type { AnalysisOrchestrator } from "./engine/orchestrator";
import { attachRequestContext } from "./middleware/requestContext";
import { analyzeRoutes } from "./routes/analyze";

export type AppDeps = {
  orchestrator: AnalysisOrchestrator;
  env: Pick<Env, "nodeEnv" | "corsOrigin">;
};

function statusCodeOf(err: Error) {
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  if ("status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function createApp({ orchestrator, env }: AppDeps) {
  const app = express();

  const globalLimiter = rateLimit({ windowMs: 15 * 60 * 1000, max: 600, standardHeaders: true, legacyHeaders: false });
  const analyzeLimiter = rateLimit({ windowMs: 1 * 60 * 1000, max: 30, standardHeaders: true, legacyHeaders: false });

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'"],
          imgSrc: ["'self'", "data:"],
          connectSrc: ["'self'", env.corsOrigin],
          objectSrc: ["'none'"],
          baseUri: ["'self'"],
          frameAncestors: ["'none'"]
        }
      }
    })
  );
  app.use(cors({ origin: env.corsOrigin }));
  app.use(compression());
  app.use(express.json({ limit: "256kb" }));
  app.use(attachRequestContext);
  if (env.nodeEnv !== "test") app.use(morgan(env.nodeEnv === "production" ? "combined" : "dev"));
  app.use(globalLimiter);

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "site-risk-engine", timestamp: new Date().toISOString() });
  });

  app.use("/api/analyze", analyzeLimiter, analyzeRoutes(orchestrator));

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found", requestId: res.locals.requestId });
  });

  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const requestId = req.requestId || `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
    const statusCode = statusCodeOf(err);
    console.error(
      JSON.stringify({
        level: "error",
        requestId,
        statusCode,
        message: err.message,
        stack: env.nodeEnv === "production" ? undefined : err.stack,
        path: req.path,
        method: req.method,
        at: new Date().toISOString()
      })
    );

    const safeMessage = statusCode >= 500 && env.nodeEnv === "production" ? "Internal server error" : err.message || "Unexpected error";
    res.status(statusCode).json({ error: safeMessage, requestId });
  });

  return app;
}
