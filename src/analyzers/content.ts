import { clamp01, clamp10, extractFirstJsonObject, optionalString, stringArray } from "../lib/json";
import type { LlmClient } from "../lib/llm";
import { AnalyzerFailure } from "../engine/errors";
import type { AnalyzerAdapter, AnalyzerVerdict, FetchedContent } from "../engine/types";
import { HeuristicVerdict, buildContentSummary, computeSecurityFlags, ruleBasedVerdict, verdictFromText } from "./contentHeuristics";

const systemPrompt = `You are a cybersecurity analyst who identifies phishing websites.
Analyze the website content you are given and determine:
1. Suspicious elements that indicate phishing
2. Legitimate indicators
3. A risk score from 0 to 10 (10 = certainly phishing)
4. Your confidence from 0 to 1

Pay attention to urgency and account-threat wording (urgent, limited time, verify account, suspended),
forms that collect credentials or card numbers, design quality and spelling mistakes, suspicious URLs
and domains, imitation of well-known brands, and transport security.

Answer with a single JSON object with the fields:
risk_score (number 0-10), confidence (number 0-1), suspicious_elements (string[]),
legitimate_indicators (string[]), explanation (string), brand_impersonation (string or null).`;

export type ContentAnalyzerOptions = {
  llm?: LlmClient;
  model: string;
};

type ContentVerdict = HeuristicVerdict & {
  brandImpersonation: string | null;
  method: "llm" | "llm-text" | "rules" | "rules-fallback";
  llmError?: string;
};

/**
 * Page-content analyzer. Asks the language model for a verdict when one is configured and
 * falls back to keyword and form rules otherwise. A permanent model failure also falls back to
 * the rules; transient ones are rethrown for the supervisor to retry.
 */
export class ContentAnalyzer implements AnalyzerAdapter {
  readonly source = "content" as const;

  constructor(private readonly options: ContentAnalyzerOptions) {}

  async evaluate(content: FetchedContent, signal: AbortSignal): Promise<AnalyzerVerdict> {
    const verdict = this.options.llm ? await this.askModelOrRules(this.options.llm, content, signal) : this.applyRules(content);
    return {
      subScore: verdict.riskScore,
      confidence: verdict.confidence,
      findings: {
        method: verdict.method,
        security_flags: computeSecurityFlags(content),
        suspicious_elements: verdict.suspiciousElements,
        legitimate_indicators: verdict.legitimateIndicators,
        explanation: verdict.explanation,
        brand_impersonation: verdict.brandImpersonation,
        ...(verdict.llmError ? { llm_error: verdict.llmError } : {})
      }
    };
  }

  private applyRules(content: FetchedContent): ContentVerdict {
    return { ...ruleBasedVerdict(content), brandImpersonation: null, method: "rules" };
  }

  private async askModelOrRules(llm: LlmClient, content: FetchedContent, signal: AbortSignal): Promise<ContentVerdict> {
    try {
      return await this.askModel(llm, content, signal);
    } catch (err) {
      if (!(err instanceof AnalyzerFailure) || err.kind !== "permanent") throw err;
      return { ...this.applyRules(content), method: "rules-fallback", llmError: err.message };
    }
  }

  private async askModel(llm: LlmClient, content: FetchedContent, signal: AbortSignal): Promise<ContentVerdict> {
    const reply = await llm.complete({
      model: this.options.model,
      temperature: 0,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: `Analyze this website for phishing:\n\n${buildContentSummary(content)}` }
      ],
      signal
    });

    const json = extractFirstJsonObject(reply.text);
    if (!json) return { ...verdictFromText(reply.text), brandImpersonation: null, method: "llm-text" };

    return {
      riskScore: clamp10(json.risk_score) ?? 5,
      confidence: clamp01(json.confidence) ?? 0.5,
      suspiciousElements: stringArray(json.suspicious_elements),
      legitimateIndicators: stringArray(json.legitimate_indicators),
      explanation: optionalString(json.explanation) ?? "Automated analysis completed",
      brandImpersonation: optionalString(json.brand_impersonation),
      method: "llm"
    };
  }
}
