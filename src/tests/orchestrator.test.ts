import test from "node:test";
import assert from "node:assert/strict";
import { createEngineConfig } from "../config/engine";
import { ConfigError, FetchError, permanentFailure } from "../engine/errors";
import { AnalysisOrchestrator, PipelineTransition, createAnalysisRequest } from "../engine/orchestrator";
import type { AnalyzerAdapter, AnalyzerSource, AnalyzerVerdict, ContentFetcher } from "../engine/types";
import { fakeContent } from "./fixtures";

const fixedClock = () => new Date("2026-03-01T10:00:00.000Z");

const okFetcher: ContentFetcher = { fetch: async () => fakeContent() };

function staticAdapter(source: AnalyzerSource, subScore: number, confidence: number): AnalyzerAdapter {
  return { source, evaluate: async () => ({ subScore, confidence, findings: { source } }) };
}

function failingAdapter(source: AnalyzerSource): AnalyzerAdapter {
  return {
    source,
    evaluate: async () => {
      throw permanentFailure(`${source} unavailable`);
    }
  };
}

function hangingAdapter(source: AnalyzerSource): AnalyzerAdapter {
  return { source, evaluate: () => new Promise<AnalyzerVerdict>(() => {}) };
}

const config = createEngineConfig({ analyzerTimeoutMs: 1_000, pipelineDeadlineMs: 2_000, retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 } });

test("three healthy analyzers produce a DONE run with every finding", async () => {
  const transitions: PipelineTransition[] = [];
  const orchestrator = new AnalysisOrchestrator({
    fetcher: okFetcher,
    adapters: [staticAdapter("content", 8, 0.9), staticAdapter("visual", 7, 0.8), staticAdapter("reputation", 9, 0.95)],
    config,
    clock: fixedClock,
    onTransition: (t) => transitions.push(t)
  });

  const run = await orchestrator.analyze(orchestrator.createRequest("https://shop.example.com/"));
  assert.equal(run.state, "DONE");
  assert.equal(run.failure, null);
  assert.equal(run.report.risk_score, 8);
  assert.equal(run.report.recommendation, "HIGH RISK");
  assert.equal(run.report.analysis_timestamp, "2026-03-01T10:00:00.000Z");
  assert.deepEqual(run.report.findings.visual_analysis, { source: "visual" });
  assert.deepEqual(
    transitions.map((t) => `${t.from}->${t.to}`),
    ["PENDING->FETCHING", "FETCHING->ANALYZING", "ANALYZING->AGGREGATING", "AGGREGATING->DONE"]
  );
  assert.deepEqual(run.transitions, transitions);
});

test("a fetch failure ends the run with an UNKNOWN report", async () => {
  const called: AnalyzerSource[] = [];
  const spy = (source: AnalyzerSource): AnalyzerAdapter => ({
    source,
    evaluate: async () => {
      called.push(source);
      return { subScore: 1, confidence: 1, findings: {} };
    }
  });
  const orchestrator = new AnalysisOrchestrator({
    fetcher: {
      fetch: async () => {
        throw new FetchError("getaddrinfo ENOTFOUND nowhere.invalid", "DNS");
      }
    },
    adapters: [spy("content"), spy("visual"), spy("reputation")],
    config,
    clock: fixedClock
  });

  const run = await orchestrator.analyze(orchestrator.createRequest("https://nowhere.invalid/"));
  assert.equal(run.state, "FAILED");
  assert.deepEqual(run.failure, { kind: "FetchError", code: "DNS", message: "getaddrinfo ENOTFOUND nowhere.invalid" });
  assert.deepEqual(run.report, {
    url: "https://nowhere.invalid/",
    risk_score: 0,
    analysis_timestamp: "2026-03-01T10:00:00.000Z",
    findings: { content_analysis: null, visual_analysis: null, reputation_check: null },
    recommendation: "UNKNOWN",
    confidence: 0
  });
  assert.deepEqual(called, []);
  assert.deepEqual(
    run.transitions.map((t) => t.to),
    ["FETCHING", "FAILED"]
  );
});

test("unexpected fetcher errors are reported as connection failures", async () => {
  const orchestrator = new AnalysisOrchestrator({
    fetcher: {
      fetch: async () => {
        throw new Error("socket hang up");
      }
    },
    adapters: [],
    config,
    clock: fixedClock
  });
  const run = await orchestrator.analyze(orchestrator.createRequest("https://shop.example.com/"));
  assert.deepEqual(run.failure, { kind: "FetchError", code: "CONNECTION", message: "content acquisition failed: socket hang up" });
});

test("one degraded analyzer still yields a report from the others", async () => {
  const orchestrator = new AnalysisOrchestrator({
    fetcher: okFetcher,
    adapters: [staticAdapter("content", 2, 0.7), failingAdapter("visual"), staticAdapter("reputation", 1, 0.6)],
    config,
    clock: fixedClock
  });
  const run = await orchestrator.analyze(orchestrator.createRequest("https://shop.example.com/"));
  assert.equal(run.state, "DONE");
  assert.equal(run.report.risk_score, 1.6);
  assert.equal(run.report.confidence, 0.46);
  assert.equal(run.report.recommendation, "LOW RISK");
  assert.equal(run.report.findings.visual_analysis, null);
  const visual = run.outcomes.find((o) => o.source === "visual");
  assert.equal(visual?.status, "error");
});

test("no usable analyzer ends in AggregationFatal", async () => {
  const orchestrator = new AnalysisOrchestrator({
    fetcher: okFetcher,
    adapters: [failingAdapter("content"), failingAdapter("visual"), failingAdapter("reputation")],
    config,
    clock: fixedClock
  });
  const run = await orchestrator.analyze(orchestrator.createRequest("https://shop.example.com/"));
  assert.equal(run.state, "FAILED");
  assert.deepEqual(run.failure, { kind: "AggregationFatal", message: "no analyzer produced a usable result" });
  assert.equal(run.report.recommendation, "UNKNOWN");
  assert.equal(run.report.confidence, 0);
  assert.deepEqual(
    run.transitions.map((t) => t.to),
    ["FETCHING", "ANALYZING", "AGGREGATING", "FAILED"]
  );
});

test("the pipeline deadline cuts off analyzers that outlive it", async () => {
  const orchestrator = new AnalysisOrchestrator({
    fetcher: okFetcher,
    adapters: [staticAdapter("content", 6, 0.8), hangingAdapter("visual"), staticAdapter("reputation", 6, 0.8)],
    config: createEngineConfig({ analyzerTimeoutMs: 5_000, pipelineDeadlineMs: 40, retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 } }),
    clock: fixedClock
  });
  const run = await orchestrator.analyze(orchestrator.createRequest("https://shop.example.com/"));
  const visual = run.outcomes.find((o) => o.source === "visual");
  assert.equal(visual?.status, "timeout");
  if (visual && visual.status !== "ok") assert.equal(visual.errorDetail, "pipeline deadline exceeded");
  assert.equal(run.state, "DONE");
  assert.equal(run.report.risk_score, 6);
});

test("skipped and unwired analyzers are recorded as skipped outcomes", async () => {
  const orchestrator = new AnalysisOrchestrator({
    fetcher: okFetcher,
    adapters: [staticAdapter("content", 5, 1), staticAdapter("reputation", 5, 1)],
    config,
    clock: fixedClock
  });
  const run = await orchestrator.analyze(orchestrator.createRequest("https://shop.example.com/", { skip: ["reputation"] }));
  assert.deepEqual(
    run.outcomes.map((o) => (o.status === "ok" ? `${o.source}:ok` : `${o.source}:${o.status}:${o.errorDetail}`)),
    ["content:ok", "visual:skipped:no analyzer configured", "reputation:skipped:skipped by request options"]
  );
  assert.equal(run.report.confidence, 0.4);
});

test("per-run weight overrides are merged and validated", async () => {
  const orchestrator = new AnalysisOrchestrator({
    fetcher: okFetcher,
    adapters: [staticAdapter("content", 10, 1), staticAdapter("visual", 0, 1), staticAdapter("reputation", 0, 1)],
    config,
    clock: fixedClock
  });
  const run = await orchestrator.analyze(
    orchestrator.createRequest("https://shop.example.com/", { weights: { content: 0.6, visual: 0.2, reputation: 0.2 } })
  );
  assert.equal(run.report.risk_score, 6);
  assert.deepEqual(run.weights, { content: 0.6, visual: 0.2, reputation: 0.2 });
});

test("invalid overrides are rejected when the request is built, before any run starts", () => {
  const transitions: PipelineTransition[] = [];
  const orchestrator = new AnalysisOrchestrator({
    fetcher: okFetcher,
    adapters: [staticAdapter("content", 1, 1)],
    config,
    clock: fixedClock,
    onTransition: (t) => transitions.push(t)
  });
  assert.throws(() => orchestrator.createRequest("https://shop.example.com/", { weights: { content: 0.9 } }), ConfigError);
  assert.throws(() => createAnalysisRequest("https://shop.example.com/", config, { pipelineDeadlineMs: -1 }), ConfigError);
  assert.deepEqual(transitions, []);
});

test("a built request carries its resolved configuration and the orchestrator clock", () => {
  const orchestrator = new AnalysisOrchestrator({ fetcher: okFetcher, adapters: [], config, clock: fixedClock });
  const plain = orchestrator.createRequest("https://shop.example.com/");
  assert.equal(plain.config, config);
  assert.equal(plain.requestedAt.toISOString(), "2026-03-01T10:00:00.000Z");

  const tuned = createAnalysisRequest("https://shop.example.com/", config, { analyzerTimeoutMs: 300 });
  assert.equal(tuned.config.analyzerTimeoutMs, 300);
  assert.deepEqual(tuned.config.weights, config.weights);
  assert.ok(Object.isFrozen(tuned));
});

test("registering two adapters for one source is rejected", () => {
  assert.throws(
    () => new AnalysisOrchestrator({ fetcher: okFetcher, adapters: [staticAdapter("content", 1, 1), staticAdapter("content", 2, 1)], config }),
    /more than one adapter registered for "content"/
  );
});
