import { z } from "zod";
import { ConfigError } from "../engine/errors";
import { AnalysisOptions, AnalyzerSource, AnalyzerWeights, EngineConfig, analyzerSources } from "../engine/types";
import type { Env } from "./env";

export const defaultWeights: AnalyzerWeights = Object.freeze({
  content: 0.4,
  visual: 0.3,
  reputation: 0.3
});

const WEIGHT_SUM_TOLERANCE = 1e-6;

const weightsSchema = z
  .object({
    content: z.number().finite().min(0),
    visual: z.number().finite().min(0),
    reputation: z.number().finite().min(0)
  })
  .strict()
  .refine((w) => Math.abs(w.content + w.visual + w.reputation - 1) <= WEIGHT_SUM_TOLERANCE, {
    message: "analyzer weights must sum to 1"
  });

const engineConfigSchema = z.object({
  weights: weightsSchema,
  analyzerTimeoutMs: z.number().int().positive(),
  pipelineDeadlineMs: z.number().int().positive(),
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).max(10),
      baseDelayMs: z.number().int().min(0),
      maxDelayMs: z.number().int().min(0)
    })
    .refine((r) => r.maxDelayMs >= r.baseDelayMs, { message: "retry.maxDelayMs must be >= retry.baseDelayMs" })
});

export const analysisOptionsSchema = z
  .object({
    weights: z
      .object({
        content: z.number().finite().min(0).optional(),
        visual: z.number().finite().min(0).optional(),
        reputation: z.number().finite().min(0).optional()
      })
      .strict()
      .optional(),
    analyzerTimeoutMs: z.number().int().positive().max(300_000).optional(),
    pipelineDeadlineMs: z.number().int().positive().max(600_000).optional(),
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).max(10).optional(),
        baseDelayMs: z.number().int().min(0).optional(),
        maxDelayMs: z.number().int().min(0).optional()
      })
      .strict()
      .optional(),
    skip: z.array(z.enum(analyzerSources)).max(3).optional()
  })
  .strict();

function freezeConfig(input: z.infer<typeof engineConfigSchema>): EngineConfig {
  return Object.freeze({
    weights: Object.freeze({ ...input.weights }),
    analyzerTimeoutMs: input.analyzerTimeoutMs,
    pipelineDeadlineMs: input.pipelineDeadlineMs,
    retry: Object.freeze({ ...input.retry })
  });
}

function parseConfig(input: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; "));
  }
  return freezeConfig(parsed.data);
}

export function createEngineConfig(input: {
  weights?: AnalyzerWeights;
  analyzerTimeoutMs?: number;
  pipelineDeadlineMs?: number;
  retry?: Partial<EngineConfig["retry"]>;
} = {}): EngineConfig {
  return parseConfig({
    weights: input.weights ?? defaultWeights,
    analyzerTimeoutMs: input.analyzerTimeoutMs ?? 20_000,
    pipelineDeadlineMs: input.pipelineDeadlineMs ?? 45_000,
    retry: {
      maxAttempts: input.retry?.maxAttempts ?? 3,
      baseDelayMs: input.retry?.baseDelayMs ?? 500,
      maxDelayMs: input.retry?.maxDelayMs ?? 4_000
    }
  });
}

export function engineConfigFromEnv(e: Env): EngineConfig {
  return createEngineConfig({
    weights: e.weights,
    analyzerTimeoutMs: e.analyzerTimeoutMs,
    pipelineDeadlineMs: e.pipelineDeadlineMs,
    retry: { maxAttempts: e.retryMaxAttempts, baseDelayMs: e.retryBaseDelayMs, maxDelayMs: e.retryMaxDelayMs }
  });
}

/**
 * Applies per-run overrides on top of the base configuration. Partial weight overrides are
 * merged over the base table and the result must still sum to 1.
 */
export function resolveRunConfig(base: EngineConfig, options: AnalysisOptions): EngineConfig {
  if (!options.weights && !options.retry && options.analyzerTimeoutMs === undefined && options.pipelineDeadlineMs === undefined) {
    return base;
  }
  return parseConfig({
    weights: { ...base.weights, ...options.weights },
    analyzerTimeoutMs: options.analyzerTimeoutMs ?? base.analyzerTimeoutMs,
    pipelineDeadlineMs: options.pipelineDeadlineMs ?? base.pipelineDeadlineMs,
    retry: { ...base.retry, ...options.retry }
  });
}

export function skippedSources(options: AnalysisOptions): Set<AnalyzerSource> {
  return new Set(options.skip ?? []);
}
