import type { FetchedContent } from "../engine/types";

export type SecurityFlags = {
  has_https: boolean;
  has_suspicious_keywords: boolean;
  has_login_forms: boolean;
  has_payment_forms: boolean;
  domain_age_days: number | null;
};

export type HeuristicVerdict = {
  riskScore: number;
  confidence: number;
  suspiciousElements: string[];
  legitimateIndicators: string[];
  explanation: string;
};

export const suspiciousKeywords = [
  "urgent",
  "verify",
  "suspended",
  "limited time",
  "act now",
  "confirm",
  "update",
  "security alert",
  "locked",
  "expires"
];

// the rule-based pass only scores the strongest lures
const scoredKeywords = ["urgent", "verify", "suspended", "expires"];
const paymentFieldTypes = ["email", "text", "password", "tel"];

const highRiskWords = ["high risk", "phishing", "suspicious", "fake", "scam"];
const lowRiskWords = ["legitimate", "safe", "low risk", "trusted"];

function hasPasswordField(content: FetchedContent) {
  return content.forms.some((form) => form.fields.some((field) => field.type === "password"));
}

export function computeSecurityFlags(content: FetchedContent): SecurityFlags {
  const text = content.textContent.toLowerCase();
  return {
    has_https: content.domainMetadata.usesHttps,
    has_suspicious_keywords: suspiciousKeywords.some((keyword) => text.includes(keyword)),
    has_login_forms: hasPasswordField(content),
    has_payment_forms: content.forms.some(
      (form) => form.fields.filter((field) => paymentFieldTypes.includes(field.type)).length > 2
    ),
    domain_age_days: content.domainMetadata.ageDays ?? null
  };
}

export function ruleBasedVerdict(content: FetchedContent): HeuristicVerdict {
  let factors = 0;
  const suspiciousElements: string[] = [];
  const legitimateIndicators: string[] = [];

  if (!content.domainMetadata.usesHttps) {
    factors += 2;
    suspiciousElements.push("No HTTPS encryption");
  } else {
    legitimateIndicators.push("HTTPS encryption present");
  }

  const text = content.textContent.toLowerCase();
  const found = scoredKeywords.filter((word) => text.includes(word));
  factors += found.length;
  suspiciousElements.push(...found.map((word) => `Suspicious keyword: ${word}`));

  if (hasPasswordField(content)) {
    factors += 1;
    suspiciousElements.push("Password input forms detected");
  }

  return {
    riskScore: Math.min(factors * 1.5, 10),
    confidence: 0.7,
    suspiciousElements,
    legitimateIndicators,
    explanation: `Rule-based analysis found ${factors} risk factors`
  };
}

/** Reads a verdict out of a free-text model reply that carried no JSON. */
export function verdictFromText(reply: string): HeuristicVerdict {
  const lower = reply.toLowerCase();
  let riskScore = 5;
  if (highRiskWords.some((word) => lower.includes(word))) riskScore = 8;
  else if (lowRiskWords.some((word) => lower.includes(word))) riskScore = 2;
  return {
    riskScore,
    confidence: 0.6,
    suspiciousElements: ["AI analysis inconclusive"],
    legitimateIndicators: [],
    explanation: "AI response could not be parsed properly"
  };
}

export function buildContentSummary(content: FetchedContent): string {
  const parts = [`URL: ${content.url}`];
  if (content.finalUrl !== content.url) parts.push(`Final URL after redirects: ${content.finalUrl}`);
  if (content.title) parts.push(`Title: ${content.title}`);
  if (content.metaDescription) parts.push(`Meta Description: ${content.metaDescription}`);
  if (content.textContent) parts.push(`Text Content Preview: ${content.textContent.slice(0, 1000)}`);
  if (content.forms.length) {
    const forms = content.forms
      .slice(0, 3)
      .map((form) => `Form with fields: ${form.fields.map((field) => field.type || "unknown").join(", ")}`);
    parts.push(`Forms: ${forms.join("; ")}`);
  }
  if (content.links.length) parts.push(`Links count: ${content.links.length}`);
  return parts.join("\n");
}
