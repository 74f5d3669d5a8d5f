import type { DomainMetadata } from "../engine/types";
import { abuseHeuristicsModule } from "./abuseHeuristics";
import { DomainRiskResult, ModuleExecution, ModuleResult, RiskContext, clampScore, parseRiskContext } from "./core";
import { domainAgeModule } from "./domainAge";
import { impersonationModule } from "./impersonation";
import { infrastructureModule } from "./infrastructure";
import { lexicalSignalsModule } from "./lexicalSignals";
import { RiskModuleName, riskWeights } from "./weights";

type ModuleFn = (ctx: RiskContext) => ModuleResult;

const moduleDefs: Array<{ name: RiskModuleName; fn: ModuleFn }> = [
  { name: "impersonation", fn: impersonationModule },
  { name: "domainAge", fn: domainAgeModule },
  { name: "lexicalSignals", fn: lexicalSignalsModule },
  { name: "infrastructure", fn: infrastructureModule },
  { name: "abuseHeuristics", fn: abuseHeuristicsModule }
];

function scoreOf(runs: ModuleExecution[], name: RiskModuleName) {
  return runs.find((r) => r.module === name)?.result.scoreDelta ?? 0;
}

/** Heuristic 0–100 domain risk from the host name and the metadata gathered at fetch time. */
export function evaluateDomainRisk(meta: DomainMetadata): DomainRiskResult {
  const ctx = parseRiskContext(meta);
  const runs: ModuleExecution[] = moduleDefs.map(({ name, fn }) => {
    const result = fn(ctx);
    const weight = riskWeights[name];
    return { module: name, weight, weightedScoreDelta: result.scoreDelta * weight, result };
  });

  let score = clampScore(runs.reduce((acc, run) => acc + run.weightedScoreDelta, 0));
  const triggered = runs.filter((r) => r.result.scoreDelta > 0);
  const impersonationRaw = scoreOf(runs, "impersonation");
  const ageRaw = scoreOf(runs, "domainAge");

  let confidence = 0.2 + runs.reduce((acc, run) => acc + run.result.confidenceDelta * run.weight, 0);
  if (triggered.length >= 3) confidence += 0.1;
  if (impersonationRaw >= 45 && ageRaw >= 15) confidence += 0.15;
  if (impersonationRaw >= 45 && scoreOf(runs, "infrastructure") > 0) confidence += 0.08;

  // discount for old domains that trip nothing
  if (triggered.length === 0 && ageRaw < 0 && impersonationRaw === 0) {
    score = clampScore(score - 8);
    confidence += 0.08;
  }

  return {
    domain: ctx.asciiDomain,
    score,
    confidence: Math.max(0, Math.min(1, Number(confidence.toFixed(3)))),
    riskFactors: Array.from(new Set(runs.flatMap((r) => r.result.riskFactors))),
    abuseSignals: Array.from(new Set(runs.flatMap((r) => r.result.abuseSignals))),
    modulesTriggered: triggered.map((r) => r.module),
    moduleBreakdown: runs.map((run) => ({
      module: run.module,
      scoreDelta: run.result.scoreDelta,
      weightedScoreDelta: Number(run.weightedScoreDelta.toFixed(2)),
      confidenceDelta: Number(run.result.confidenceDelta.toFixed(3))
    }))
  };
}
