import { z } from "zod";
import { permanentFailure, transientFailure } from "../engine/errors";
import { isRetryableStatus, parseRetryAfterMs } from "./llm";

export type SearchHit = {
  title: string;
  url: string;
  snippet: string;
};

export type WebSearchOptions = {
  endpoint: string;
  apiKey: string;
  fetchImpl?: typeof fetch;
  maxResults?: number;
};

const hitSchema = z.object({
  title: z.string().default(""),
  url: z.string().default(""),
  snippet: z.string().optional(),
  description: z.string().optional()
});

// generic `{ results }` and Brave-style `{ web: { results } }` payloads
const searchResponseSchema = z.union([
  z.object({ results: z.array(hitSchema) }),
  z.object({ web: z.object({ results: z.array(hitSchema) }) })
]);

export class WebSearchClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: WebSearchOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string, signal?: AbortSignal): Promise<SearchHit[]> {
    const url = new URL(this.options.endpoint);
    url.searchParams.set("q", query);
    url.searchParams.set("count", String(this.options.maxResults ?? 10));

    const resp = await this.fetchImpl(url, {
      headers: {
        Accept: "application/json",
        "X-Subscription-Token": this.options.apiKey,
        Authorization: `Bearer ${this.options.apiKey}`
      },
      signal
    });

    if (!resp.ok) {
      const message = `search API error: ${resp.status} ${resp.statusText}`;
      if (isRetryableStatus(resp.status)) {
        throw transientFailure(message, { retryAfterMs: parseRetryAfterMs(resp.headers.get("retry-after")) });
      }
      throw permanentFailure(message);
    }

    const parsed = searchResponseSchema.safeParse(await resp.json().catch(() => null));
    if (!parsed.success) throw permanentFailure("search API returned an unexpected response shape");

    const rows = "results" in parsed.data ? parsed.data.results : parsed.data.web.results;
    return rows.slice(0, this.options.maxResults ?? 10).map((row) => ({
      title: row.title,
      url: row.url,
      snippet: row.snippet ?? row.description ?? ""
    }));
  }
}
