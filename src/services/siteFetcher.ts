import { resolve4 } from "node:dns/promises";
import { isIP } from "node:net";
import * as cheerio from "cheerio";
import { z } from "zod";
import { FetchError, describeError, isAbortError } from "../engine/errors";
import type { ContentFetcher, DomainMetadata, FetchedContent, PageForm } from "../engine/types";

const MAX_LINKS = 50;
const USER_AGENT = "Mozilla/5.0 (compatible; SiteRiskEngine/0.1; +https://localhost/site-risk)";

const dnsErrorCodes = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_NONAME", "ENODATA"]);
const tlsErrorCodes = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "ERR_TLS_CERT_ALTNAME_INVALID",
  "ERR_SSL_WRONG_VERSION_NUMBER"
]);

export type SiteFetcherOptions = {
  timeoutMs: number;
  screenshotServiceUrl?: string;
  rdapBaseUrl?: string;
  fetchImpl?: typeof fetch;
  resolveIpv4?: (hostname: string) => Promise<string[]>;
  clock?: () => Date;
};

const rdapSchema = z.object({
  events: z.array(z.object({ eventAction: z.string(), eventDate: z.string() })).default([])
});

/** Adds `https://` when the scheme is missing and rejects anything that is not http(s). */
export function normalizeTargetUrl(input: string): string {
  const trimmed = input.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch (err) {
    throw new FetchError(`invalid URL: ${input}`, "INVALID_URL", { cause: err });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new FetchError(`unsupported URL scheme: ${parsed.protocol}`, "INVALID_URL");
  }
  if (!parsed.hostname) throw new FetchError(`invalid URL: ${input}`, "INVALID_URL");
  return parsed.toString();
}

function causeCode(err: unknown): string | undefined {
  const cause = err instanceof Error ? err.cause : undefined;
  for (const candidate of [cause, err]) {
    if (typeof candidate === "object" && candidate !== null && "code" in candidate && typeof candidate.code === "string") {
      return candidate.code;
    }
  }
  return undefined;
}

export function classifyFetchFailure(err: unknown, url: string): FetchError {
  if (err instanceof FetchError) return err;
  if (isAbortError(err)) return new FetchError(`timed out fetching ${url}`, "TIMEOUT", { cause: err });
  const code = causeCode(err);
  if (code && dnsErrorCodes.has(code)) return new FetchError(`DNS lookup failed for ${url} (${code})`, "DNS", { cause: err });
  if (code && (tlsErrorCodes.has(code) || code.startsWith("ERR_TLS") || code.startsWith("ERR_SSL"))) {
    return new FetchError(`TLS handshake failed for ${url} (${code})`, "TLS", { cause: err });
  }
  return new FetchError(`connection failed for ${url}: ${code ?? describeError(err)}`, "CONNECTION", { cause: err });
}

export function splitHostname(hostname: string): Pick<DomainMetadata, "registrableDomain" | "tld" | "isIpLiteral"> {
  const bare = hostname.replace(/^\[|\]$/g, "").toLowerCase().replace(/\.+$/g, "");
  if (isIP(bare)) return { registrableDomain: bare, tld: "", isIpLiteral: true };
  const labels = bare.split(".").filter(Boolean);
  const tld = labels.length > 1 ? labels[labels.length - 1] : "";
  const registrableDomain = labels.slice(-2).join(".");
  return { registrableDomain, tld, isIpLiteral: false };
}

export function extractPage(html: string, baseUrl: string) {
  const $ = cheerio.load(html);
  $("script, style, noscript").remove();

  const title = $("title").first().text().trim() || null;
  const metaDescription =
    $('meta[name="description"]').attr("content")?.trim() || $('meta[property="og:description"]').attr("content")?.trim() || null;
  const metaKeywords = ($('meta[name="keywords"]').attr("content") ?? "")
    .split(",")
    .map((kw) => kw.trim())
    .filter(Boolean);
  const textContent = $("body").text().replace(/\s+/g, " ").trim();

  const links: string[] = [];
  $("a[href]").each((_, el) => {
    if (links.length >= MAX_LINKS) return false;
    const href = $(el).attr("href");
    if (!href) return;
    try {
      const absolute = new URL(href, baseUrl);
      if (absolute.protocol === "http:" || absolute.protocol === "https:") links.push(absolute.toString());
    } catch {
      // unparseable href
      return;
    }
  });

  const forms: PageForm[] = [];
  $("form").each((_, form) => {
    const fields = $(form)
      .find("input")
      .toArray()
      .map((input) => ({
        type: ($(input).attr("type") || "text").toLowerCase(),
        name: $(input).attr("name") || "",
        placeholder: $(input).attr("placeholder") || ""
      }));
    forms.push({
      action: $(form).attr("action") || "",
      method: ($(form).attr("method") || "get").toLowerCase(),
      fields
    });
  });

  return { title, metaDescription, metaKeywords, textContent, links, forms };
}

function freezeDeep(content: FetchedContent): FetchedContent {
  for (const form of content.forms) {
    form.fields.forEach((field) => Object.freeze(field));
    Object.freeze(form.fields);
    Object.freeze(form);
  }
  Object.freeze(content.forms);
  Object.freeze(content.links);
  Object.freeze(content.metaKeywords);
  Object.freeze(content.domainMetadata.ipAddresses);
  Object.freeze(content.domainMetadata);
  return Object.freeze(content);
}

/**
 * Downloads a page and everything the analyzers read from it. Any failure of the page
 * download itself is a `FetchError`; the side lookups (DNS, RDAP, screenshot) are best effort.
 */
export class SiteFetcher implements ContentFetcher {
  private readonly fetchImpl: typeof fetch;
  private readonly resolveIpv4: (hostname: string) => Promise<string[]>;
  private readonly clock: () => Date;

  constructor(private readonly options: SiteFetcherOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.resolveIpv4 = options.resolveIpv4 ?? ((hostname) => resolve4(hostname));
    this.clock = options.clock ?? (() => new Date());
  }

  async fetch(rawUrl: string, signal?: AbortSignal): Promise<FetchedContent> {
    const url = normalizeTargetUrl(rawUrl);
    const startedAt = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let resp: Response;
    let html: string;
    try {
      resp = await this.fetchImpl(url, {
        redirect: "follow",
        headers: { "User-Agent": USER_AGENT, Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.5" },
        signal: controller.signal
      });
      if (resp.status >= 400) {
        await resp.body?.cancel();
        throw new FetchError(`${url} answered HTTP ${resp.status}`, "HTTP_STATUS", { statusCode: resp.status });
      }
      const contentType = resp.headers.get("content-type") ?? "";
      if (contentType && !/text\/|html|xml/i.test(contentType)) {
        await resp.body?.cancel();
        throw new FetchError(`${url} is not an HTML document (${contentType})`, "NOT_HTML", { statusCode: resp.status });
      }
      html = await resp.text();
    } catch (err) {
      throw classifyFetchFailure(err, url);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    const responseTimeMs = Date.now() - startedAt;
    const finalUrl = resp.url || url;
    const page = extractPage(html, finalUrl);
    const hostname = new URL(url).hostname;
    const hostParts = splitHostname(hostname);

    const [ipAddresses, ageDays, screenshotRef] = await Promise.all([
      this.lookupAddresses(hostname, hostParts.isIpLiteral),
      this.lookupDomainAgeDays(hostParts),
      this.captureScreenshot(finalUrl)
    ]);

    return freezeDeep({
      url,
      finalUrl,
      statusCode: resp.status,
      responseTimeMs,
      html,
      ...page,
      screenshotRef,
      domainMetadata: {
        hostname: hostname.toLowerCase(),
        ...hostParts,
        usesHttps: new URL(finalUrl).protocol === "https:",
        ipAddresses,
        ageDays
      },
      fetchedAt: this.clock()
    });
  }

  private async lookupAddresses(hostname: string, isIpLiteral: boolean): Promise<string[]> {
    if (isIpLiteral) return [hostname.replace(/^\[|\]$/g, "")];
    try {
      return await this.resolveIpv4(hostname);
    } catch (err) {
      console.warn("dns lookup failed", { hostname, message: describeError(err) });
      return [];
    }
  }

  private async lookupDomainAgeDays(host: Pick<DomainMetadata, "registrableDomain" | "isIpLiteral">): Promise<number | undefined> {
    if (!this.options.rdapBaseUrl || host.isIpLiteral) return undefined;
    try {
      const resp = await this.fetchImpl(`${this.options.rdapBaseUrl}/domain/${encodeURIComponent(host.registrableDomain)}`, {
        headers: { Accept: "application/rdap+json, application/json" },
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
      if (!resp.ok) throw new Error(`RDAP answered HTTP ${resp.status}`);
      const parsed = rdapSchema.parse(await resp.json());
      const registration = parsed.events.find((event) => event.eventAction === "registration");
      const registeredAt = registration ? Date.parse(registration.eventDate) : NaN;
      if (!Number.isFinite(registeredAt)) return undefined;
      return Math.max(0, Math.floor((this.clock().getTime() - registeredAt) / 86_400_000));
    } catch (err) {
      console.warn("rdap lookup failed", { domain: host.registrableDomain, message: describeError(err) });
      return undefined;
    }
  }

  private async captureScreenshot(pageUrl: string): Promise<string | null> {
    if (!this.options.screenshotServiceUrl) return null;
    try {
      const target = new URL(this.options.screenshotServiceUrl);
      target.searchParams.set("url", pageUrl);
      const resp = await this.fetchImpl(target, { signal: AbortSignal.timeout(this.options.timeoutMs) });
      if (!resp.ok) throw new Error(`screenshot service answered HTTP ${resp.status}`);
      const mime = (resp.headers.get("content-type") ?? "image/png").split(";")[0].trim();
      if (!mime.startsWith("image/")) throw new Error(`screenshot service returned ${mime}`);
      const bytes = Buffer.from(await resp.arrayBuffer());
      return `data:${mime};base64,${bytes.toString("base64")}`;
    } catch (err) {
      console.warn("screenshot capture failed", { url: pageUrl, message: describeError(err) });
      return null;
    }
  }
}
