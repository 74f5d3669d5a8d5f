import test from "node:test";
import assert from "node:assert/strict";
import { fuseOutcomes } from "../engine/aggregator";
import { buildRiskReport, buildUnknownReport } from "../engine/report";
import type { AnalyzerOutcome } from "../engine/types";

const analysisTimestamp = new Date("2026-03-01T10:00:00.000Z");

test("report carries findings of usable analyzers under their published keys", () => {
  const outcomes: AnalyzerOutcome[] = [
    { source: "content", status: "ok", subScore: 6, confidence: 0.8, findings: { method: "rules" }, attempts: 1, durationMs: 3 },
    { source: "visual", status: "error", errorDetail: "permanent: no screenshot available", attempts: 1, durationMs: 1 },
    { source: "reputation", status: "ok", subScore: 4, confidence: 0.5, findings: { domain: "example.com" }, attempts: 2, durationMs: 9 }
  ];
  const fused = fuseOutcomes(outcomes, { content: 0.4, visual: 0.3, reputation: 0.3 });
  const report = buildRiskReport({ url: "https://example.com/", analysisTimestamp, fused, outcomes });

  assert.deepEqual(Object.keys(report), ["url", "risk_score", "analysis_timestamp", "findings", "recommendation", "confidence"]);
  assert.equal(report.analysis_timestamp, "2026-03-01T10:00:00.000Z");
  assert.deepEqual(report.findings, {
    content_analysis: { method: "rules" },
    visual_analysis: null,
    reputation_check: { domain: "example.com" }
  });
  assert.equal(report.risk_score, fused.riskScore);
  assert.equal(report.recommendation, "MEDIUM RISK");
  assert.ok(Object.isFrozen(report));
});

test("unknown report has zero score, zero confidence and no findings", () => {
  const report = buildUnknownReport("https://example.com/", analysisTimestamp);
  assert.deepEqual(JSON.parse(JSON.stringify(report)), {
    url: "https://example.com/",
    risk_score: 0,
    analysis_timestamp: "2026-03-01T10:00:00.000Z",
    findings: { content_analysis: null, visual_analysis: null, reputation_check: null },
    recommendation: "UNKNOWN",
    confidence: 0
  });
});
