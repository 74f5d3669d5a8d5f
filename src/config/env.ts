import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalUrl = z
  .string()
  .trim()
  .transform((value) => value.replace(/\/+$/g, ""))
  .pipe(z.union([z.literal(""), z.string().url()]))
  .default("");

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),
  LLM_BASE_URL: optionalUrl,
  LLM_API_KEY: z.string().default(""),
  LLM_MODEL: z.string().default("gpt-4o-mini"),
  LLM_VISION_MODEL: z.string().default("gpt-4o-mini"),
  SEARCH_API_URL: optionalUrl,
  SEARCH_API_KEY: z.string().default(""),
  SCREENSHOT_SERVICE_URL: optionalUrl,
  RDAP_BASE_URL: optionalUrl,
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  ANALYZER_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  PIPELINE_DEADLINE_MS: z.coerce.number().int().positive().default(45_000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(4_000),
  WEIGHT_CONTENT: z.coerce.number().min(0).max(1).default(0.4),
  WEIGHT_VISUAL: z.coerce.number().min(0).max(1).default(0.3),
  WEIGHT_REPUTATION: z.coerce.number().min(0).max(1).default(0.3)
});

export type Env = {
  nodeEnv: string;
  port: number;
  corsOrigin: string;
  llmBaseUrl: string;
  llmApiKey: string;
  llmModel: string;
  llmVisionModel: string;
  searchApiUrl: string;
  searchApiKey: string;
  screenshotServiceUrl: string;
  rdapBaseUrl: string;
  fetchTimeoutMs: number;
  analyzerTimeoutMs: number;
  pipelineDeadlineMs: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  weights: { content: number; visual: number; reputation: number };
};

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // empty strings in .env mean "unset"
  const cleaned = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    llmBaseUrl: e.LLM_BASE_URL,
    llmApiKey: e.LLM_API_KEY,
    llmModel: e.LLM_MODEL,
    llmVisionModel: e.LLM_VISION_MODEL,
    searchApiUrl: e.SEARCH_API_URL,
    searchApiKey: e.SEARCH_API_KEY,
    screenshotServiceUrl: e.SCREENSHOT_SERVICE_URL,
    rdapBaseUrl: e.RDAP_BASE_URL,
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    analyzerTimeoutMs: e.ANALYZER_TIMEOUT_MS,
    pipelineDeadlineMs: e.PIPELINE_DEADLINE_MS,
    retryMaxAttempts: e.RETRY_MAX_ATTEMPTS,
    retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: e.RETRY_MAX_DELAY_MS,
    weights: { content: e.WEIGHT_CONTENT, visual: e.WEIGHT_VISUAL, reputation: e.WEIGHT_REPUTATION }
  };
}

export const env = loadEnv();
