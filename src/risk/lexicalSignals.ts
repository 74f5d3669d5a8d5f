import protectedBrands from "../data/protectedBrands.json";
import { ModuleResult, RiskContext, emptyResult } from "./core";
import { phishingSuffixes } from "./weights";

export function shannonEntropy(input: string) {
  if (!input.length) return 0;
  const freq = new Map<string, number>();
  for (const ch of input) freq.set(ch, (freq.get(ch) || 0) + 1);
  let entropy = 0;
  freq.forEach((count) => {
    const p = count / input.length;
    entropy -= p * Math.log2(p);
  });
  return entropy;
}

/** Shape of the host name itself: hyphens, digit runs, TLD, brand+lure combos and randomness. */
export function lexicalSignalsModule(ctx: RiskContext): ModuleResult {
  if (ctx.isIpLiteral) return emptyResult();

  const riskFactors: string[] = [];
  const abuseSignals: string[] = [];
  let scoreDelta = 0;
  let confidenceDelta = 0;

  const hyphenCount = (ctx.sld.match(/-/g) || []).length;
  if (hyphenCount >= 2) {
    scoreDelta += 8;
    confidenceDelta += 0.08;
    riskFactors.push("Excessive hyphen usage in second-level domain");
  }

  if (/\d{3,}/.test(ctx.sld)) {
    scoreDelta += 8;
    confidenceDelta += 0.07;
    abuseSignals.push("Long numeric segments in domain label");
  }

  if (ctx.hasSuspiciousTld) {
    scoreDelta += 8;
    confidenceDelta += 0.08;
    abuseSignals.push(`Suspicious TLD .${ctx.tld}`);
  }

  if (ctx.labels.length > 4) {
    scoreDelta += 6;
    confidenceDelta += 0.05;
    abuseSignals.push(`Deep subdomain chain (${ctx.labels.length} labels)`);
  }

  const sldClean = ctx.skeleton.replace(/-/g, "");
  const hasBrand = protectedBrands.some((brand) => brand.tokens.some((token) => sldClean.includes(token.replace(/\s+/g, "").toLowerCase())));
  const hasPhishingTerm = phishingSuffixes.some((suffix) => sldClean.includes(suffix));
  if (hasBrand && hasPhishingTerm) {
    scoreDelta += 14;
    confidenceDelta += 0.14;
    riskFactors.push("Brand token combined with authentication/lure keyword");
  }

  const compact = ctx.sld.replace(/-/g, "");
  const entropy = shannonEntropy(compact);
  if (entropy >= 3.6 && compact.length >= 10) {
    scoreDelta += 15;
    confidenceDelta += 0.15;
    riskFactors.push(`High lexical entropy detected (${entropy.toFixed(2)})`);
  }
  if (/^[a-z0-9]{12,}$/.test(compact) && /\d/.test(compact) && /[a-z]/.test(compact)) {
    scoreDelta += 10;
    confidenceDelta += 0.08;
    abuseSignals.push("Random-like long alphanumeric SLD");
  }
  if (/[bcdfghjklmnpqrstvwxyz]{5,}/.test(compact) && compact.length >= 9) {
    scoreDelta += 6;
    confidenceDelta += 0.05;
    abuseSignals.push("Consonant-cluster randomness in SLD");
  }

  return { scoreDelta, riskFactors, abuseSignals, confidenceDelta };
}
