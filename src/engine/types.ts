export const analyzerSources = ["content", "visual", "reputation"] as const;

export type AnalyzerSource = (typeof analyzerSources)[number];

export type AnalyzerWeights = Readonly<Record<AnalyzerSource, number>>;

export type Findings = Record<string, unknown>;

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type EngineConfig = Readonly<{
  weights: AnalyzerWeights;
  analyzerTimeoutMs: number;
  pipelineDeadlineMs: number;
  retry: Readonly<RetryPolicy>;
}>;

export type AnalysisOptions = {
  weights?: Partial<Record<AnalyzerSource, number>>;
  analyzerTimeoutMs?: number;
  pipelineDeadlineMs?: number;
  retry?: Partial<RetryPolicy>;
  skip?: AnalyzerSource[];
};

/** `config` is the base configuration with the request's overrides already applied and validated. */
export type AnalysisRequest = Readonly<{
  url: string;
  requestedAt: Date;
  options: Readonly<AnalysisOptions>;
  config: EngineConfig;
}>;

export type FormField = {
  type: string;
  name: string;
  placeholder: string;
};

export type PageForm = {
  action: string;
  method: string;
  fields: FormField[];
};

export type DomainMetadata = {
  hostname: string;
  registrableDomain: string;
  tld: string;
  usesHttps: boolean;
  isIpLiteral: boolean;
  ipAddresses: string[];
  ageDays?: number;
};

export type FetchedContent = Readonly<{
  url: string;
  finalUrl: string;
  statusCode: number;
  responseTimeMs: number;
  html: string;
  title: string | null;
  metaDescription: string | null;
  metaKeywords: string[];
  textContent: string;
  links: string[];
  forms: PageForm[];
  screenshotRef: string | null;
  domainMetadata: DomainMetadata;
  fetchedAt: Date;
}>;

/** What an adapter hands back on success. */
export type AnalyzerVerdict = {
  subScore: number;
  confidence: number;
  findings: Findings;
};

export interface AnalyzerAdapter {
  readonly source: AnalyzerSource;
  evaluate(content: FetchedContent, signal: AbortSignal): Promise<AnalyzerVerdict>;
}

export type OutcomeStatus = "ok" | "timeout" | "error" | "skipped";

type OutcomeBase = {
  source: AnalyzerSource;
  attempts: number;
  durationMs: number;
};

export type UsableOutcome = Readonly<
  OutcomeBase & {
    status: "ok";
    subScore: number;
    confidence: number;
    findings: Findings;
  }
>;

export type MissingOutcome = Readonly<
  OutcomeBase & {
    status: "timeout" | "error" | "skipped";
    errorDetail: string;
  }
>;

export type AnalyzerOutcome = UsableOutcome | MissingOutcome;

export type Recommendation = "LOW" | "MEDIUM" | "HIGH" | "UNKNOWN";

export type FusedResult = Readonly<{
  riskScore: number;
  confidence: number;
  recommendation: Recommendation;
  contributingWeights: AnalyzerWeights;
}>;

export type ContentFetcher = {
  fetch(url: string, signal?: AbortSignal): Promise<FetchedContent>;
};

export function isUsable(outcome: AnalyzerOutcome): outcome is UsableOutcome {
  return outcome.status === "ok";
}
