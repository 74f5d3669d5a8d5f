import { domainToUnicode } from "node:url";
import type { DomainMetadata } from "../engine/types";
import { phishingSuffixes, suspiciousTlds } from "./weights";

export type ModuleResult = {
  scoreDelta: number;
  riskFactors: string[];
  abuseSignals: string[];
  confidenceDelta: number;
};

export type RiskContext = {
  fqdn: string;
  asciiDomain: string;
  sld: string;
  tld: string;
  skeleton: string;
  confusableVariants: string[];
  labels: string[];
  hasSuspiciousTld: boolean;
  isLikelyLoginTheme: boolean;
  isIpLiteral: boolean;
  usesHttps: boolean;
  ipAddresses: string[];
  ageDays?: number;
};

export type ModuleExecution = {
  module: string;
  weight: number;
  weightedScoreDelta: number;
  result: ModuleResult;
};

export type DomainRiskResult = {
  domain: string;
  score: number;
  confidence: number;
  riskFactors: string[];
  abuseSignals: string[];
  modulesTriggered: string[];
  moduleBreakdown: Array<{ module: string; scoreDelta: number; weightedScoreDelta: number; confidenceDelta: number }>;
};

export function emptyResult(): ModuleResult {
  return { scoreDelta: 0, riskFactors: [], abuseSignals: [], confidenceDelta: 0 };
}

function skeletonize(value: string) {
  return value
    .toLowerCase()
    .replace(/[_\s]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/[01]/g, (m) => (m === "0" ? "o" : "l"));
}

const confusableTransforms = [
  (v: string) => v.replace(/rn/g, "m"),
  (v: string) => v.replace(/vv/g, "w"),
  (v: string) => v.replace(/0/g, "o"),
  (v: string) => v.replace(/1/g, "l"),
  (v: string) => v.replace(/i/g, "l"),
  (v: string) => v.replace(/[-_.]+/g, "")
];

function generateConfusableVariants(input: string, limit = 24): string[] {
  const seen = new Set<string>();
  const queue: string[] = [skeletonize(input)];
  for (let cur = queue.shift(); cur !== undefined && seen.size < limit; cur = queue.shift()) {
    if (seen.has(cur)) continue;
    seen.add(cur);
    for (const transform of confusableTransforms) {
      const next = skeletonize(transform(cur));
      if (!seen.has(next) && seen.size + queue.length < limit) queue.push(next);
    }
  }
  return Array.from(seen);
}

export function parseRiskContext(meta: DomainMetadata): RiskContext {
  const fqdn = meta.hostname.toLowerCase().trim().replace(/\.+$/g, "");
  const asciiDomain = (meta.isIpLiteral ? fqdn : domainToUnicode(fqdn))
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[\u2010-\u2015]/g, "-")
    .replace(/[^a-z0-9.:-]/g, "")
    .replace(/\.+/g, ".");
  const labels = meta.isIpLiteral ? [] : asciiDomain.split(".").filter(Boolean);
  const tld = labels.length > 1 ? labels[labels.length - 1] : "";
  const sld = labels.length > 1 ? labels[labels.length - 2] : labels[0] || "";
  const joined = `${labels.slice(0, -1).join("-")}-${tld}`;

  return {
    fqdn,
    asciiDomain,
    sld,
    tld,
    skeleton: skeletonize(sld),
    confusableVariants: sld ? generateConfusableVariants(sld) : [],
    labels,
    hasSuspiciousTld: suspiciousTlds.includes(tld),
    isLikelyLoginTheme: phishingSuffixes.some((suffix) => joined.includes(suffix)) || /(signin|password|account|mail)/.test(joined),
    isIpLiteral: meta.isIpLiteral,
    usesHttps: meta.usesHttps,
    ipAddresses: meta.ipAddresses,
    ageDays: meta.ageDays
  };
}

export function clampScore(score: number) {
  return Math.max(0, Math.min(100, Math.round(score)));
}
