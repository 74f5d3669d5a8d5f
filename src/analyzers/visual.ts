import { permanentFailure } from "../engine/errors";
import { clamp01, clamp10, extractFirstJsonObject, optionalString, stringArray } from "../lib/json";
import type { LlmClient } from "../lib/llm";
import type { AnalyzerAdapter, AnalyzerVerdict, FetchedContent } from "../engine/types";

const visualPrompt = `You review screenshots of web pages for phishing.
Look for: imitation of a well-known brand's logo, colours or layout on a domain that does not belong
to that brand; login or payment forms styled after a known service; low-quality or mismatched design;
fake security badges, countdown timers or alarming banners.

The page was served from the domain shown below. Answer with one JSON object:
risk_score (number 0-10), confidence (number 0-1), impersonated_brand (string or null),
visual_indicators (string[]), explanation (string).`;

export type VisualAnalyzerOptions = {
  llm?: LlmClient;
  model: string;
};

/** Screenshot analyzer backed by a vision-capable chat model. */
export class VisualAnalyzer implements AnalyzerAdapter {
  readonly source = "visual" as const;

  constructor(private readonly options: VisualAnalyzerOptions) {}

  async evaluate(content: FetchedContent, signal: AbortSignal): Promise<AnalyzerVerdict> {
    if (!this.options.llm) throw permanentFailure("vision model not configured");
    if (!content.screenshotRef) throw permanentFailure("no screenshot available");

    const reply = await this.options.llm.complete({
      model: this.options.model,
      temperature: 0,
      maxTokens: 600,
      messages: [
        { role: "system", content: visualPrompt },
        {
          role: "user",
          content: [
            { type: "text", text: `Domain: ${content.domainMetadata.hostname}\nPage title: ${content.title ?? "(none)"}` },
            { type: "image_url", image_url: { url: content.screenshotRef } }
          ]
        }
      ],
      signal
    });

    const json = extractFirstJsonObject(reply.text);
    const riskScore = clamp10(json?.risk_score);
    const confidence = clamp01(json?.confidence);
    if (!json || riskScore === undefined || confidence === undefined) {
      throw permanentFailure("vision model reply did not contain a usable verdict");
    }

    return {
      subScore: riskScore,
      confidence,
      findings: {
        impersonated_brand: optionalString(json.impersonated_brand),
        visual_indicators: stringArray(json.visual_indicators),
        explanation: optionalString(json.explanation) ?? "",
        screenshot_analyzed: true
      }
    };
  }
}
