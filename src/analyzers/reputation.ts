import type { AnalyzerAdapter, AnalyzerVerdict, FetchedContent } from "../engine/types";
import type { SearchHit, WebSearchClient } from "../lib/webSearch";
import { evaluateDomainRisk } from "../risk";
import { clampScore } from "../risk/core";

const fraudTerms = ["phishing", "scam", "fraud", "fake", "malware", "spoof", "impersonat"];

export type ReputationAnalyzerOptions = {
  search?: WebSearchClient;
};

type SearchSummary = {
  query: string;
  results: number;
  fraud_mentions: number;
  examples: Array<{ title: string; url: string }>;
};

export function summarizeSearch(domain: string, query: string, hits: SearchHit[]): SearchSummary {
  const flagged = hits.filter((hit) => {
    const text = `${hit.title} ${hit.snippet}`.toLowerCase();
    return text.includes(domain) && fraudTerms.some((term) => text.includes(term));
  });
  return {
    query,
    results: hits.length,
    fraud_mentions: flagged.length,
    examples: flagged.slice(0, 3).map((hit) => ({ title: hit.title, url: hit.url }))
  };
}

/**
 * Domain reputation: lexical, impersonation and infrastructure heuristics over the host,
 * optionally backed by a web search for fraud reports about it.
 */
export class ReputationAnalyzer implements AnalyzerAdapter {
  readonly source = "reputation" as const;

  constructor(private readonly options: ReputationAnalyzerOptions = {}) {}

  async evaluate(content: FetchedContent, signal: AbortSignal): Promise<AnalyzerVerdict> {
    const risk = evaluateDomainRisk(content.domainMetadata);
    let score = risk.score;
    let confidence = risk.confidence;
    let search: SearchSummary | null = null;

    if (this.options.search && !content.domainMetadata.isIpLiteral) {
      const domain = content.domainMetadata.registrableDomain;
      const query = `"${domain}" phishing OR scam OR fraud`;
      search = summarizeSearch(domain, query, await this.options.search.search(query, signal));
      score = clampScore(score + Math.min(30, search.fraud_mentions * 10));
      confidence = Math.min(1, confidence + 0.1 + Math.min(0.15, search.fraud_mentions * 0.05));
    }

    return {
      subScore: score / 10,
      confidence: Number(confidence.toFixed(3)),
      findings: {
        domain: risk.domain,
        domain_score: risk.score,
        risk_factors: risk.riskFactors,
        abuse_signals: risk.abuseSignals,
        modules_triggered: risk.modulesTriggered,
        module_breakdown: risk.moduleBreakdown,
        domain_age_days: content.domainMetadata.ageDays ?? null,
        search
      }
    };
  }
}
