import test from "node:test";
import assert from "node:assert/strict";
import { VisualAnalyzer } from "../analyzers/visual";
import { AnalyzerFailure } from "../engine/errors";
import { LlmClient } from "../lib/llm";
import { z } from "zod";
import { chatReply, fakeContent, queuedFetch } from "./fixtures";

const chatBodySchema = z.object({
  model: z.string(),
  temperature: z.number(),
  max_tokens: z.number(),
  messages: z.array(z.object({ role: z.string(), content: z.unknown() }))
});

const screenshot = "data:image/png;base64,iVBORw0KGgo=";

test("visual analyzer without a model is a permanent failure", async () => {
  await assert.rejects(
    new VisualAnalyzer({ model: "test-vision" }).evaluate(fakeContent({ screenshotRef: screenshot }), new AbortController().signal),
    (err: unknown) => err instanceof AnalyzerFailure && err.kind === "permanent" && err.message === "vision model not configured"
  );
});

test("visual analyzer without a screenshot is a permanent failure", async () => {
  const { fetchImpl, requests } = queuedFetch([]);
  const llm = new LlmClient({ baseUrl: "https://llm.test/v1", apiKey: "test-secret", fetchImpl });
  await assert.rejects(
    new VisualAnalyzer({ llm, model: "test-vision" }).evaluate(fakeContent(), new AbortController().signal),
    (err: unknown) => err instanceof AnalyzerFailure && err.message === "no screenshot available"
  );
  assert.equal(requests.length, 0);
});

test("screenshot is sent as an image part and the verdict is parsed", async () => {
  const reply = JSON.stringify({
    risk_score: 7,
    confidence: 0.75,
    impersonated_brand: "Example Pay",
    visual_indicators: ["Logo copied from a payment brand"],
    explanation: "Branded login on an unrelated host"
  });
  const { fetchImpl, requests } = queuedFetch([chatReply(reply)]);
  const llm = new LlmClient({ baseUrl: "https://llm.test/v1", apiKey: "test-secret", fetchImpl });

  const verdict = await new VisualAnalyzer({ llm, model: "test-vision" }).evaluate(
    fakeContent({ screenshotRef: screenshot }),
    new AbortController().signal
  );
  assert.equal(verdict.subScore, 7);
  assert.equal(verdict.confidence, 0.75);
  assert.deepEqual(verdict.findings, {
    impersonated_brand: "Example Pay",
    visual_indicators: ["Logo copied from a payment brand"],
    explanation: "Branded login on an unrelated host",
    screenshot_analyzed: true
  });

  const body = chatBodySchema.parse(requests[0].body);
  assert.equal(body.model, "test-vision");
  assert.equal(body.temperature, 0);
  assert.equal(body.max_tokens, 600);
  assert.equal(body.messages[0].role, "system");
  assert.match(String(body.messages[0].content), /screenshots of web pages for phishing/);
  assert.deepEqual(body.messages[1], {
    role: "user",
    content: [
      { type: "text", text: "Domain: shop.example.com\nPage title: Example Shop" },
      { type: "image_url", image_url: { url: screenshot } }
    ]
  });
});

test("a reply without a score is rejected", async () => {
  const { fetchImpl } = queuedFetch([chatReply("I cannot tell from this image.")]);
  const llm = new LlmClient({ baseUrl: "https://llm.test/v1", apiKey: "test-secret", fetchImpl });
  await assert.rejects(
    new VisualAnalyzer({ llm, model: "test-vision" }).evaluate(fakeContent({ screenshotRef: screenshot }), new AbortController().signal),
    (err: unknown) => err instanceof AnalyzerFailure && err.message === "vision model reply did not contain a usable verdict"
  );
});
