import { engineConfigFromEnv } from "../config/engine";
import type { Env } from "../config/env";
import { ContentAnalyzer } from "../analyzers/content";
import { ReputationAnalyzer } from "../analyzers/reputation";
import { VisualAnalyzer } from "../analyzers/visual";
import { AnalysisOrchestrator, OrchestratorDeps, PipelineRun, PipelineTransition } from "../engine/orchestrator";
import type { AnalysisOptions, AnalyzerAdapter } from "../engine/types";
import { LlmClient } from "../lib/llm";
import { WebSearchClient } from "../lib/webSearch";
import { publish } from "./events";
import { SiteFetcher, normalizeTargetUrl } from "./siteFetcher";

export function createAdapters(e: Env, fetchImpl?: typeof fetch): AnalyzerAdapter[] {
  const llm = e.llmBaseUrl && e.llmApiKey ? new LlmClient({ baseUrl: e.llmBaseUrl, apiKey: e.llmApiKey, fetchImpl }) : undefined;
  const search =
    e.searchApiUrl && e.searchApiKey ? new WebSearchClient({ endpoint: e.searchApiUrl, apiKey: e.searchApiKey, fetchImpl }) : undefined;

  return [
    new ContentAnalyzer({ llm, model: e.llmModel }),
    new VisualAnalyzer({ llm, model: e.llmVisionModel }),
    new ReputationAnalyzer({ search })
  ];
}

function logTransition(transition: PipelineTransition) {
  const record = {
    level: transition.to === "FAILED" ? "warn" : "info",
    msg: "pipeline transition",
    runId: transition.runId,
    url: transition.url,
    from: transition.from,
    to: transition.to,
    detail: transition.detail,
    at: transition.at.toISOString()
  };
  console.log(JSON.stringify(record));
  publish({ type: "PIPELINE_TRANSITION", correlationId: transition.runId, payload: { ...record } });
}

export function createOrchestrator(e: Env, overrides: Partial<OrchestratorDeps> = {}): AnalysisOrchestrator {
  return new AnalysisOrchestrator({
    fetcher:
      overrides.fetcher ??
      new SiteFetcher({
        timeoutMs: e.fetchTimeoutMs,
        screenshotServiceUrl: e.screenshotServiceUrl || undefined,
        rdapBaseUrl: e.rdapBaseUrl || undefined
      }),
    adapters: overrides.adapters ?? createAdapters(e),
    config: overrides.config ?? engineConfigFromEnv(e),
    clock: overrides.clock,
    onTransition: overrides.onTransition ?? logTransition
  });
}

export type RunDiagnostics = {
  runId: string;
  state: PipelineRun["state"];
  failure: PipelineRun["failure"];
  processingTimeMs: number;
  weights: PipelineRun["weights"];
  contributingWeights: Record<string, number> | null;
  analyzers: Array<{ source: string; status: string; attempts: number; durationMs: number; errorDetail: string | null }>;
};

export function toDiagnostics(run: PipelineRun): RunDiagnostics {
  return {
    runId: run.runId,
    state: run.state,
    failure: run.failure,
    processingTimeMs: run.processingTimeMs,
    weights: run.weights,
    contributingWeights: run.fused ? { ...run.fused.contributingWeights } : null,
    analyzers: run.outcomes.map((o) => ({
      source: o.source,
      status: o.status,
      attempts: o.attempts,
      durationMs: o.durationMs,
      errorDetail: o.status === "ok" ? null : o.errorDetail
    }))
  };
}

/** Runs one analysis end to end and reports its outcome on the log and the event feed. */
export async function runAnalysis(
  orchestrator: AnalysisOrchestrator,
  rawUrl: string,
  options: AnalysisOptions = {},
  correlationId?: string
): Promise<PipelineRun> {
  const url = (() => {
    try {
      return normalizeTargetUrl(rawUrl);
    } catch {
      // the orchestrator turns the bad URL into a FetchError report
      return rawUrl;
    }
  })();

  const run = await orchestrator.analyze(orchestrator.createRequest(url, options));

  for (const outcome of run.outcomes) {
    if (outcome.status === "ok" || outcome.status === "skipped") continue;
    console.warn(
      JSON.stringify({ level: "warn", msg: "analyzer degraded", runId: run.runId, correlationId, source: outcome.source, status: outcome.status, errorDetail: outcome.errorDetail })
    );
    publish({
      type: "ANALYZER_DEGRADED",
      correlationId,
      payload: { runId: run.runId, source: outcome.source, status: outcome.status, errorDetail: outcome.errorDetail }
    });
  }

  publish({
    type: run.state === "DONE" ? "ANALYSIS_COMPLETED" : "ANALYSIS_FAILED",
    correlationId,
    payload: {
      runId: run.runId,
      url: run.report.url,
      riskScore: run.report.risk_score,
      recommendation: run.report.recommendation,
      confidence: run.report.confidence,
      failure: run.failure?.kind ?? null,
      processingTimeMs: run.processingTimeMs
    }
  });
  return run;
}
