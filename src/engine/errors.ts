export type FailureKind = "transient" | "permanent";

export class AnalyzerFailure extends Error {
  readonly kind: FailureKind;
  readonly retryAfterMs?: number;

  constructor(message: string, kind: FailureKind, options?: { cause?: unknown; retryAfterMs?: number }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AnalyzerFailure";
    this.kind = kind;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export function transientFailure(message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
  return new AnalyzerFailure(message, "transient", options);
}

export function permanentFailure(message: string, options?: { cause?: unknown }) {
  return new AnalyzerFailure(message, "permanent", options);
}

export type FetchErrorCode = "INVALID_URL" | "DNS" | "TLS" | "CONNECTION" | "TIMEOUT" | "HTTP_STATUS" | "NOT_HTML";

export class FetchError extends Error {
  readonly code: FetchErrorCode;
  readonly statusCode?: number;

  constructor(message: string, code: FetchErrorCode, options?: { cause?: unknown; statusCode?: number }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "FetchError";
    this.code = code;
    this.statusCode = options?.statusCode;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Error that reaches the Express error handler with an HTTP status attached. */
export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
  }
}

const transientNetworkCodes = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET"
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

export function classifyFailure(err: unknown): FailureKind {
  if (err instanceof AnalyzerFailure) return err.kind;
  if (isAbortError(err)) return "transient";
  const code = errorCode(err) ?? (err instanceof Error ? errorCode(err.cause) : undefined);
  if (code && transientNetworkCodes.has(code)) return "transient";
  if (err instanceof TypeError && err.message === "fetch failed") return "transient";
  return "permanent";
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
