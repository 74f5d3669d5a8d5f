import test from "node:test";
import assert from "node:assert/strict";
import { permanentFailure, transientFailure } from "../engine/errors";
import { backoffDelayMs, superviseAnalyzer } from "../engine/supervisor";
import type { AnalyzerAdapter, AnalyzerVerdict, FetchedContent, RetryPolicy } from "../engine/types";
import { fakeContent } from "./fixtures";

const retry: RetryPolicy = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1_000 };

function adapterFrom(evaluate: (content: FetchedContent, signal: AbortSignal) => Promise<AnalyzerVerdict>): AnalyzerAdapter {
  return { source: "content", evaluate };
}

const instantSleep = async () => {};

test("successful first attempt returns an ok outcome", async () => {
  const outcome = await superviseAnalyzer(
    adapterFrom(async () => ({ subScore: 7.5, confidence: 0.8, findings: { note: "x" } })),
    fakeContent(),
    { deadlineMs: 1_000, retry, sleep: instantSleep }
  );
  assert.equal(outcome.status, "ok");
  assert.equal(outcome.attempts, 1);
  if (outcome.status === "ok") {
    assert.equal(outcome.subScore, 7.5);
    assert.equal(outcome.confidence, 0.8);
    assert.deepEqual(outcome.findings, { note: "x" });
  }
});

test("transient failures are retried until one succeeds", async () => {
  let calls = 0;
  const delays: number[] = [];
  const outcome = await superviseAnalyzer(
    adapterFrom(async () => {
      calls += 1;
      if (calls < 3) throw transientFailure("rate limited");
      return { subScore: 4, confidence: 0.5, findings: {} };
    }),
    fakeContent(),
    {
      deadlineMs: 1_000,
      retry,
      random: () => 0.5,
      sleep: async (ms) => {
        delays.push(ms);
      }
    }
  );
  assert.equal(outcome.status, "ok");
  assert.equal(outcome.attempts, 3);
  assert.deepEqual(delays, [100, 200]);
});

test("transient failures stop at the retry budget", async () => {
  let calls = 0;
  const outcome = await superviseAnalyzer(
    adapterFrom(async () => {
      calls += 1;
      throw transientFailure("upstream 503");
    }),
    fakeContent(),
    { deadlineMs: 1_000, retry, sleep: instantSleep }
  );
  assert.equal(calls, 3);
  assert.equal(outcome.status, "error");
  assert.equal(outcome.attempts, 3);
  if (outcome.status !== "ok") assert.equal(outcome.errorDetail, "transient, retries exhausted: upstream 503");
});

test("permanent failures are not retried", async () => {
  let calls = 0;
  const outcome = await superviseAnalyzer(
    adapterFrom(async () => {
      calls += 1;
      throw permanentFailure("invalid API key");
    }),
    fakeContent(),
    { deadlineMs: 1_000, retry, sleep: instantSleep }
  );
  assert.equal(calls, 1);
  assert.equal(outcome.status, "error");
  if (outcome.status !== "ok") assert.equal(outcome.errorDetail, "permanent: invalid API key");
});

test("unclassified errors count as permanent", async () => {
  const outcome = await superviseAnalyzer(
    adapterFrom(async () => {
      throw new Error("unexpected shape");
    }),
    fakeContent(),
    { deadlineMs: 1_000, retry, sleep: instantSleep }
  );
  assert.equal(outcome.attempts, 1);
  if (outcome.status !== "ok") assert.equal(outcome.errorDetail, "permanent: unexpected shape");
});

test("an analyzer that never answers times out at its deadline", async () => {
  let sawAbort = false;
  const outcome = await superviseAnalyzer(
    adapterFrom(
      (_content, signal) =>
        new Promise<AnalyzerVerdict>(() => {
          signal.addEventListener("abort", () => {
            sawAbort = true;
          });
        })
    ),
    fakeContent(),
    { deadlineMs: 30, retry, sleep: instantSleep }
  );
  assert.equal(outcome.status, "timeout");
  assert.equal(outcome.attempts, 1);
  assert.equal(sawAbort, true);
  if (outcome.status !== "ok") assert.equal(outcome.errorDetail, "analyzer deadline of 30ms exceeded");
});

test("aborting the parent signal ends supervision as a timeout", async () => {
  const parent = new AbortController();
  const pending = superviseAnalyzer(
    adapterFrom(() => new Promise<AnalyzerVerdict>(() => {})),
    fakeContent(),
    { deadlineMs: 5_000, retry, signal: parent.signal, sleep: instantSleep }
  );
  parent.abort();
  const outcome = await pending;
  assert.equal(outcome.status, "timeout");
  if (outcome.status !== "ok") assert.equal(outcome.errorDetail, "pipeline deadline exceeded");
});

test("out-of-range verdicts are rejected as malformed", async () => {
  let calls = 0;
  const outcome = await superviseAnalyzer(
    adapterFrom(async () => {
      calls += 1;
      return { subScore: 11, confidence: 0.5, findings: {} };
    }),
    fakeContent(),
    { deadlineMs: 1_000, retry, sleep: instantSleep }
  );
  assert.equal(calls, 1);
  assert.equal(outcome.status, "error");
  if (outcome.status !== "ok") assert.equal(outcome.errorDetail, "permanent: malformed analyzer response: subScore 11 outside [0,10]");
});

test("backoff doubles per attempt with jitter and respects the cap", () => {
  assert.equal(backoffDelayMs(1, retry, () => 0.5), 100);
  assert.equal(backoffDelayMs(2, retry, () => 0.5), 200);
  assert.equal(backoffDelayMs(3, retry, () => 0), 360);
  assert.equal(backoffDelayMs(3, retry, () => 1), 440);
  assert.equal(backoffDelayMs(6, retry, () => 0.5), 1_000);
});

test("retry-after from the collaborator overrides the computed backoff", () => {
  assert.equal(backoffDelayMs(1, retry, () => 0.5, 750), 750);
  assert.equal(backoffDelayMs(1, retry, () => 0.5, 60_000), 1_000);
});
