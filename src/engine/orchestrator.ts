import crypto from "node:crypto";
import { resolveRunConfig, skippedSources } from "../config/engine";
import { fuseOutcomes } from "./aggregator";
import { FetchError, describeError } from "./errors";
import { RiskReport, buildRiskReport, buildUnknownReport } from "./report";
import { superviseAnalyzer } from "./supervisor";
import {
  AnalysisOptions,
  AnalysisRequest,
  AnalyzerAdapter,
  AnalyzerOutcome,
  AnalyzerSource,
  ContentFetcher,
  EngineConfig,
  FetchedContent,
  FusedResult,
  analyzerSources
} from "./types";

export type PipelineState = "PENDING" | "FETCHING" | "ANALYZING" | "AGGREGATING" | "DONE" | "FAILED";

export type PipelineTransition = {
  runId: string;
  url: string;
  from: PipelineState;
  to: PipelineState;
  at: Date;
  detail?: string;
};

export type PipelineFailure =
  | { kind: "FetchError"; code: FetchError["code"]; message: string }
  | { kind: "AggregationFatal"; message: string };

export type PipelineRun = Readonly<{
  runId: string;
  state: "DONE" | "FAILED";
  report: RiskReport;
  fused: FusedResult | null;
  outcomes: readonly AnalyzerOutcome[];
  weights: EngineConfig["weights"];
  failure: PipelineFailure | null;
  transitions: readonly PipelineTransition[];
  processingTimeMs: number;
}>;

export type OrchestratorDeps = {
  fetcher: ContentFetcher;
  adapters: readonly AnalyzerAdapter[];
  config: EngineConfig;
  clock?: () => Date;
  onTransition?: (transition: PipelineTransition) => void;
};

/**
 * Builds an immutable request. Per-run overrides are merged into `base` here, so invalid
 * options throw `ConfigError` and never reach a running pipeline.
 */
export function createAnalysisRequest(
  url: string,
  base: EngineConfig,
  options: AnalysisOptions = {},
  requestedAt = new Date()
): AnalysisRequest {
  return Object.freeze({
    url,
    requestedAt,
    options: Object.freeze({ ...options, skip: options.skip ? [...options.skip] : undefined }),
    config: resolveRunConfig(base, options)
  });
}

function toFetchError(err: unknown): FetchError {
  if (err instanceof FetchError) return err;
  return new FetchError(`content acquisition failed: ${describeError(err)}`, "CONNECTION", { cause: err });
}

export class AnalysisOrchestrator {
  private readonly adapters: ReadonlyMap<AnalyzerSource, AnalyzerAdapter>;
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    const bySource = new Map<AnalyzerSource, AnalyzerAdapter>();
    for (const adapter of deps.adapters) {
      if (bySource.has(adapter.source)) throw new Error(`more than one adapter registered for "${adapter.source}"`);
      bySource.set(adapter.source, adapter);
    }
    this.adapters = bySource;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Request against this orchestrator's base configuration; throws `ConfigError` on invalid options. */
  createRequest(url: string, options: AnalysisOptions = {}): AnalysisRequest {
    return createAnalysisRequest(url, this.deps.config, options, this.clock());
  }

  async analyze(request: AnalysisRequest): Promise<PipelineRun> {
    const { config } = request;
    const skipped = skippedSources(request.options);
    const runId = crypto.randomUUID();
    const startedAt = Date.now();
    const transitions: PipelineTransition[] = [];
    let state: PipelineState = "PENDING";

    const moveTo = (to: PipelineState, detail?: string) => {
      const transition: PipelineTransition = { runId, url: request.url, from: state, to, at: this.clock(), detail };
      transitions.push(transition);
      state = to;
      this.deps.onTransition?.(transition);
      return transition;
    };

    const analysisTimestamp = moveTo("FETCHING").at;

    let content: FetchedContent;
    try {
      content = Object.freeze(await this.deps.fetcher.fetch(request.url));
    } catch (err) {
      const fetchError = toFetchError(err);
      moveTo("FAILED", `${fetchError.code}: ${fetchError.message}`);
      return Object.freeze<PipelineRun>({
        runId,
        state: "FAILED",
        report: buildUnknownReport(request.url, analysisTimestamp),
        fused: null,
        outcomes: [],
        weights: config.weights,
        failure: { kind: "FetchError", code: fetchError.code, message: fetchError.message },
        transitions,
        processingTimeMs: Date.now() - startedAt
      });
    }

    moveTo("ANALYZING");
    const outcomes = await this.dispatch(content, config, skipped);

    moveTo("AGGREGATING");
    const fused = fuseOutcomes(outcomes, config.weights);
    const report = buildRiskReport({ url: request.url, analysisTimestamp, fused, outcomes });

    if (fused.recommendation === "UNKNOWN") {
      const message = "no analyzer produced a usable result";
      moveTo("FAILED", message);
      return Object.freeze<PipelineRun>({
        runId,
        state: "FAILED",
        report,
        fused,
        outcomes,
        weights: config.weights,
        failure: { kind: "AggregationFatal", message },
        transitions,
        processingTimeMs: Date.now() - startedAt
      });
    }

    moveTo("DONE");
    return Object.freeze({
      runId,
      state: "DONE",
      report,
      fused,
      outcomes,
      weights: config.weights,
      failure: null,
      transitions,
      processingTimeMs: Date.now() - startedAt
    });
  }

  /** One task per analyzer, joined at a single barrier bounded by the pipeline deadline. */
  private async dispatch(content: FetchedContent, config: EngineConfig, skipped: Set<AnalyzerSource>): Promise<AnalyzerOutcome[]> {
    const pipeline = new AbortController();
    const deadline = setTimeout(() => pipeline.abort(), config.pipelineDeadlineMs);

    try {
      const tasks = analyzerSources.map((source): Promise<AnalyzerOutcome> => {
        const adapter = this.adapters.get(source);
        if (!adapter || skipped.has(source)) {
          const errorDetail = adapter ? "skipped by request options" : "no analyzer configured";
          const outcome: AnalyzerOutcome = { source, status: "skipped", errorDetail, attempts: 0, durationMs: 0 };
          return Promise.resolve(outcome);
        }
        return superviseAnalyzer(adapter, content, {
          deadlineMs: config.analyzerTimeoutMs,
          retry: config.retry,
          signal: pipeline.signal
        });
      });
      return await Promise.all(tasks);
    } finally {
      clearTimeout(deadline);
    }
  }
}
