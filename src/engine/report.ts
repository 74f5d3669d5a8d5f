import type { AnalyzerOutcome, AnalyzerSource, Findings, FusedResult, Recommendation } from "./types";

export type ReportRecommendation = "LOW RISK" | "MEDIUM RISK" | "HIGH RISK" | "UNKNOWN";

export type RiskReport = Readonly<{
  url: string;
  risk_score: number;
  analysis_timestamp: string;
  findings: Readonly<{
    content_analysis: Findings | null;
    visual_analysis: Findings | null;
    reputation_check: Findings | null;
  }>;
  recommendation: ReportRecommendation;
  confidence: number;
}>;

const findingsKeys = {
  content: "content_analysis",
  visual: "visual_analysis",
  reputation: "reputation_check"
} as const satisfies Record<AnalyzerSource, keyof RiskReport["findings"]>;

const recommendationLabels: Record<Recommendation, ReportRecommendation> = {
  LOW: "LOW RISK",
  MEDIUM: "MEDIUM RISK",
  HIGH: "HIGH RISK",
  UNKNOWN: "UNKNOWN"
};

export function buildRiskReport(input: {
  url: string;
  analysisTimestamp: Date;
  fused: FusedResult;
  outcomes: readonly AnalyzerOutcome[];
}): RiskReport {
  const findings: { -readonly [K in keyof RiskReport["findings"]]: Findings | null } = {
    content_analysis: null,
    visual_analysis: null,
    reputation_check: null
  };
  for (const outcome of input.outcomes) {
    if (outcome.status === "ok") findings[findingsKeys[outcome.source]] = outcome.findings;
  }

  return Object.freeze({
    url: input.url,
    risk_score: input.fused.riskScore,
    analysis_timestamp: input.analysisTimestamp.toISOString(),
    findings: Object.freeze(findings),
    recommendation: recommendationLabels[input.fused.recommendation],
    confidence: input.fused.confidence
  });
}

/** Report for a run that has no usable signal: fetch failure or empty quorum. */
export function buildUnknownReport(url: string, analysisTimestamp: Date): RiskReport {
  return Object.freeze({
    url,
    risk_score: 0,
    analysis_timestamp: analysisTimestamp.toISOString(),
    findings: Object.freeze({ content_analysis: null, visual_analysis: null, reputation_check: null }),
    recommendation: "UNKNOWN",
    confidence: 0
  });
}
