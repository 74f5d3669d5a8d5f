import { AnalyzerFailure, classifyFailure, describeError, permanentFailure } from "./errors";
import type { AnalyzerAdapter, AnalyzerOutcome, AnalyzerVerdict, FetchedContent, RetryPolicy } from "./types";

export type SuperviseOptions = {
  deadlineMs: number;
  retry: RetryPolicy;
  /** Parent signal, aborted when the whole pipeline gives up. */
  signal?: AbortSignal;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  random?: () => number;
};

class DeadlineReached extends Error {
  constructor(readonly reason: string) {
    super(reason);
    this.name = "DeadlineReached";
  }
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) return reject(signal.reason);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

// The adapter may ignore the signal, so the race is what stops the waiting.
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

export function backoffDelayMs(attempt: number, retry: RetryPolicy, random: () => number = Math.random, retryAfterMs?: number) {
  if (retryAfterMs !== undefined && retryAfterMs >= 0) return Math.min(retryAfterMs, retry.maxDelayMs);
  const exponential = retry.baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(retry.maxDelayMs, Math.round(exponential * (0.9 + random() * 0.2)));
}

function checkVerdict(verdict: AnalyzerVerdict): AnalyzerVerdict {
  const { subScore, confidence, findings } = verdict;
  if (typeof subScore !== "number" || !Number.isFinite(subScore) || subScore < 0 || subScore > 10) {
    throw permanentFailure(`malformed analyzer response: subScore ${String(subScore)} outside [0,10]`);
  }
  if (typeof confidence !== "number" || !Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw permanentFailure(`malformed analyzer response: confidence ${String(confidence)} outside [0,1]`);
  }
  if (typeof findings !== "object" || findings === null || Array.isArray(findings)) {
    throw permanentFailure("malformed analyzer response: findings is not an object");
  }
  return verdict;
}

/**
 * Runs one adapter under a deadline and a bounded retry budget. Never rejects: every failure
 * mode comes back as a `timeout` or `error` outcome carrying `errorDetail`.
 */
export async function superviseAnalyzer(
  adapter: AnalyzerAdapter,
  content: FetchedContent,
  options: SuperviseOptions
): Promise<AnalyzerOutcome> {
  const startedAt = Date.now();
  const sleep = options.sleep ?? abortableSleep;
  const random = options.random ?? Math.random;
  const controller = new AbortController();

  const deadlineTimer = setTimeout(() => {
    controller.abort(new DeadlineReached(`analyzer deadline of ${options.deadlineMs}ms exceeded`));
  }, options.deadlineMs);
  const onParentAbort = () => controller.abort(new DeadlineReached("pipeline deadline exceeded"));
  if (options.signal?.aborted) onParentAbort();
  else options.signal?.addEventListener("abort", onParentAbort, { once: true });

  let attempts = 0;
  const elapsed = () => Date.now() - startedAt;

  try {
    while (true) {
      attempts += 1;
      try {
        const verdict = checkVerdict(await raceAbort(adapter.evaluate(content, controller.signal), controller.signal));
        return {
          source: adapter.source,
          status: "ok",
          subScore: verdict.subScore,
          confidence: verdict.confidence,
          findings: verdict.findings,
          attempts,
          durationMs: elapsed()
        };
      } catch (err) {
        if (err instanceof DeadlineReached) throw err;
        if (controller.signal.aborted && controller.signal.reason instanceof DeadlineReached) throw controller.signal.reason;
        const kind = classifyFailure(err);
        if (kind === "permanent" || attempts >= options.retry.maxAttempts) {
          const detail = `${kind === "permanent" ? "permanent" : "transient, retries exhausted"}: ${describeError(err)}`;
          return { source: adapter.source, status: "error", errorDetail: detail, attempts, durationMs: elapsed() };
        }
        const retryAfterMs = err instanceof AnalyzerFailure ? err.retryAfterMs : undefined;
        await sleep(backoffDelayMs(attempts, options.retry, random, retryAfterMs), controller.signal);
      }
    }
  } catch (err) {
    if (err instanceof DeadlineReached) {
      return { source: adapter.source, status: "timeout", errorDetail: err.reason, attempts, durationMs: elapsed() };
    }
    return { source: adapter.source, status: "error", errorDetail: describeError(err), attempts, durationMs: elapsed() };
  } finally {
    clearTimeout(deadlineTimer);
    options.signal?.removeEventListener("abort", onParentAbort);
    if (!controller.signal.aborted) controller.abort(new DeadlineReached("supervision finished"));
  }
}
