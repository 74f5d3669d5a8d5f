import { ModuleResult, RiskContext, emptyResult } from "./core";

export function domainAgeModule(ctx: RiskContext): ModuleResult {
  const ageDays = ctx.ageDays;
  if (ageDays === undefined) return emptyResult();

  if (ageDays < 7) {
    return { scoreDelta: 25, confidenceDelta: 0.22, riskFactors: ["Recently registered domain (<7 days)"], abuseSignals: [] };
  }
  if (ageDays < 30) {
    return { scoreDelta: 15, confidenceDelta: 0.16, riskFactors: ["Recently registered domain (<30 days)"], abuseSignals: [] };
  }
  if (ageDays < 90) {
    return { scoreDelta: 8, confidenceDelta: 0.1, riskFactors: ["New domain (<90 days)"], abuseSignals: [] };
  }
  if (ageDays > 365 * 3) {
    return { scoreDelta: -5, confidenceDelta: 0.06, riskFactors: [], abuseSignals: ["Long-established domain age reduces risk"] };
  }
  return { scoreDelta: 0, confidenceDelta: 0.03, riskFactors: [], abuseSignals: [] };
}
