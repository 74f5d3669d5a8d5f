import type { AnalyzerOutcome, AnalyzerSource, AnalyzerWeights, FusedResult, Recommendation } from "./types";
import { analyzerSources, isUsable } from "./types";

/** Round half away from zero to one decimal place. */
export function round1(value: number): number {
  const scaled = Math.round(Math.abs(value) * 10 + 1e-9) / 10;
  return value < 0 ? -scaled : scaled;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function getRecommendation(riskScore: number): Exclude<Recommendation, "UNKNOWN"> {
  if (riskScore >= 6) return "HIGH";
  if (riskScore >= 3) return "MEDIUM";
  return "LOW";
}

function zeroWeights(): Record<AnalyzerSource, number> {
  return { content: 0, visual: 0, reputation: 0 };
}

export const unknownResult: FusedResult = Object.freeze<FusedResult>({
  riskScore: 0,
  confidence: 0,
  recommendation: "UNKNOWN",
  contributingWeights: Object.freeze(zeroWeights())
});

/**
 * Weighted fusion over the analyzers that produced a usable outcome. Weights are
 * renormalized over the quorum; the confidence penalty uses the original weights of the
 * analyzers that are missing. An empty quorum (or one whose weights are all zero) yields
 * the UNKNOWN result.
 */
export function fuseOutcomes(outcomes: readonly AnalyzerOutcome[], weights: AnalyzerWeights): FusedResult {
  const seen = new Set<AnalyzerSource>();
  for (const outcome of outcomes) {
    if (seen.has(outcome.source)) throw new Error(`duplicate outcome for analyzer "${outcome.source}"`);
    seen.add(outcome.source);
  }

  const usable = outcomes.filter(isUsable);
  const usableWeight = usable.reduce((acc, o) => acc + weights[o.source], 0);
  if (usable.length === 0 || usableWeight <= 0) return unknownResult;

  // an analyzer with no outcome at all counts as missing
  const usableSources = new Set(usable.map((o) => o.source));
  const missingFraction = analyzerSources.filter((s) => !usableSources.has(s)).reduce((acc, s) => acc + weights[s], 0);

  const contributingWeights = zeroWeights();
  let score = 0;
  let baseConfidence = 0;
  for (const outcome of usable) {
    const effective = weights[outcome.source] / usableWeight;
    contributingWeights[outcome.source] = effective;
    score += effective * outcome.subScore;
    baseConfidence += effective * outcome.confidence;
  }

  const riskScore = clamp(round1(score), 0, 10);
  const confidence = clamp(Number((baseConfidence * (1 - missingFraction)).toFixed(2)), 0, 1);

  return Object.freeze({
    riskScore,
    confidence,
    recommendation: getRecommendation(riskScore),
    contributingWeights: Object.freeze(contributingWeights)
  });
}
