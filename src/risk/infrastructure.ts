import { ModuleResult, RiskContext } from "./core";
import { disposableHostingHints, dynamicDnsTokens } from "./weights";

export function infrastructureModule(ctx: RiskContext): ModuleResult {
  const riskFactors: string[] = [];
  const abuseSignals: string[] = [];
  let scoreDelta = 0;
  let confidenceDelta = 0;

  if (ctx.isIpLiteral) {
    scoreDelta += 25;
    confidenceDelta += 0.2;
    riskFactors.push("Site is addressed by a raw IP address instead of a domain name");
  }

  if (!ctx.usesHttps) {
    scoreDelta += 10;
    confidenceDelta += 0.06;
    riskFactors.push("Page is served without HTTPS");
  }

  if (!ctx.isIpLiteral && ctx.ipAddresses.length === 0) {
    scoreDelta += 4;
    confidenceDelta += 0.02;
    abuseSignals.push("Host name has no resolvable IPv4 address");
  }

  if (dynamicDnsTokens.some((token) => ctx.fqdn.includes(token))) {
    scoreDelta += 12;
    confidenceDelta += 0.12;
    abuseSignals.push("Dynamic DNS / low-trust nameserver pattern detected");
  }

  if (disposableHostingHints.some((hint) => ctx.fqdn.includes(hint))) {
    scoreDelta += 10;
    confidenceDelta += 0.09;
    riskFactors.push("Infrastructure naming suggests disposable hosting");
  }

  if (ctx.isLikelyLoginTheme && ctx.hasSuspiciousTld) {
    scoreDelta += 10;
    confidenceDelta += 0.08;
    riskFactors.push("Login-themed domain on suspicious TLD suggests weak/abusive DNS posture");
  }

  if (/mail|smtp|support/.test(ctx.sld) && ctx.hasSuspiciousTld) {
    scoreDelta += 6;
    confidenceDelta += 0.06;
    abuseSignals.push("Email-themed naming on high-abuse TLD");
  }

  return { scoreDelta, riskFactors, abuseSignals, confidenceDelta };
}
