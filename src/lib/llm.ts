import { z } from "zod";
import { permanentFailure, transientFailure } from "../engine/errors";

export type ChatContentPart = { type: "text"; text: string } | { type: "image_url"; image_url: { url: string } };

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string | ChatContentPart[];
};

export type ChatRequest = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

export type ChatUsage = {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
};

export type ChatResult = {
  text: string;
  usage?: ChatUsage;
};

export type LlmClientOptions = {
  baseUrl: string;
  apiKey: string;
  fetchImpl?: typeof fetch;
};

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() })
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional()
    })
    .optional()
});

export function parseRetryAfterMs(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds > 0) return Math.round(seconds * 1000);
  const at = Date.parse(header);
  if (Number.isFinite(at)) return Math.max(0, at - Date.now());
  return undefined;
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status <= 599);
}

/**
 * Thin client for an OpenAI-compatible `/chat/completions` endpoint. One HTTP attempt per
 * call; non-2xx answers are thrown as analyzer failures so the supervisor decides on retries.
 */
export class LlmClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: LlmClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(req: ChatRequest): Promise<ChatResult> {
    const resp = await this.fetchImpl(`${this.options.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.options.apiKey}`
      },
      body: JSON.stringify({
        model: req.model,
        messages: req.messages,
        ...(typeof req.temperature === "number" ? { temperature: req.temperature } : {}),
        ...(typeof req.maxTokens === "number" ? { max_tokens: req.maxTokens } : {})
      }),
      signal: req.signal
    });

    if (!resp.ok) {
      const body = await resp.text().catch(() => "");
      const message = `LLM API error: ${resp.status} ${resp.statusText}${body ? ` ${body.slice(0, 300)}` : ""}`;
      if (isRetryableStatus(resp.status)) {
        throw transientFailure(message, { retryAfterMs: parseRetryAfterMs(resp.headers.get("retry-after")) });
      }
      throw permanentFailure(message);
    }

    const parsed = completionSchema.safeParse(await resp.json().catch(() => null));
    if (!parsed.success) throw permanentFailure("LLM API returned an unexpected response shape");

    const usage = parsed.data.usage;
    return {
      text: parsed.data.choices[0].message.content ?? "",
      usage: usage
        ? { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens, totalTokens: usage.total_tokens }
        : undefined
    };
  }
}
