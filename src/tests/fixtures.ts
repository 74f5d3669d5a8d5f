import type { DomainMetadata, FetchedContent } from "../engine/types";

export function fakeDomain(overrides: Partial<DomainMetadata> = {}): DomainMetadata {
  return {
    hostname: "shop.example.com",
    registrableDomain: "example.com",
    tld: "com",
    usesHttps: true,
    isIpLiteral: false,
    ipAddresses: ["192.0.2.10"],
    ...overrides
  };
}

export function fakeContent(overrides: Partial<FetchedContent> = {}): FetchedContent {
  return {
    url: "https://shop.example.com/",
    finalUrl: "https://shop.example.com/",
    statusCode: 200,
    responseTimeMs: 12,
    html: "<html><head><title>Example Shop</title></head><body><p>Welcome to the shop</p></body></html>",
    title: "Example Shop",
    metaDescription: null,
    metaKeywords: [],
    textContent: "Welcome to the shop",
    links: [],
    forms: [],
    screenshotRef: null,
    domainMetadata: fakeDomain(),
    fetchedAt: new Date("2026-03-01T10:00:00.000Z"),
    ...overrides
  };
}

export type RecordedRequest = { url: string; method: string; headers: Headers; body: unknown };

/** fetch stand-in that records each request and answers with the next queued response. */
export function queuedFetch(responses: Array<() => Response>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    requests.push({
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : null
    });
    const next = responses.shift();
    if (!next) throw new Error(`unexpected request to ${url}`);
    return next();
  };
  return { fetchImpl, requests };
}

export function chatReply(text: string): () => Response {
  return () => Response.json({ choices: [{ message: { content: text } }], usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 } });
}
