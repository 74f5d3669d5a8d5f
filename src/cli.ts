#!/usr/bin/env node
import { env } from "./config/env";
import { createOrchestrator, runAnalysis } from "./services/analysisService";
import type { PipelineRun } from "./engine/orchestrator";

function getArg(name: string): string | undefined {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function hasFlag(name: string) {
  return process.argv.includes(`--${name}`);
}

function positionalUrl(): string | undefined {
  const args = process.argv.slice(2);
  for (let i = 0; i < args.length; i += 1) {
    if (args[i] === "--url") {
      i += 1;
      continue;
    }
    if (!args[i].startsWith("--")) return args[i];
  }
  return undefined;
}

function printList(heading: string, items: unknown) {
  if (!Array.isArray(items) || items.length === 0) return;
  console.log(heading);
  for (const item of items) console.log(`  - ${String(item)}`);
}

function printSummary(run: PipelineRun, verbose: boolean) {
  const { report } = run;
  console.log(`URL:            ${report.url}`);
  console.log(`Risk score:     ${report.risk_score}/10`);
  console.log(`Confidence:     ${Math.round(report.confidence * 100)}%`);
  console.log(`Recommendation: ${report.recommendation}`);

  const content = report.findings.content_analysis;
  printList("Suspicious elements:", content?.suspicious_elements);
  printList("Legitimate indicators:", content?.legitimate_indicators);

  if (run.failure) console.log(`Failure:        ${run.failure.kind}: ${run.failure.message}`);

  if (verbose) {
    console.log("Analyzers:");
    for (const outcome of run.outcomes) {
      const detail = outcome.status === "ok" ? `score ${outcome.subScore.toFixed(1)}, confidence ${outcome.confidence.toFixed(2)}` : outcome.errorDetail;
      console.log(`  ${outcome.source.padEnd(11)} ${outcome.status.padEnd(8)} ${detail} (${outcome.attempts} attempts, ${outcome.durationMs}ms)`);
    }
    console.log(`Processing time: ${run.processingTimeMs}ms`);
  }
}

async function main() {
  const url = getArg("url") || positionalUrl();
  if (!url) throw new Error("Usage: site-risk <url> [--json] [--no-verbose]");

  const json = hasFlag("json");
  const verbose = !hasFlag("no-verbose");
  const orchestrator = createOrchestrator(env, {
    onTransition: (t) => {
      if (verbose && !json) console.error(`[${t.at.toISOString()}] ${t.from} -> ${t.to}${t.detail ? ` (${t.detail})` : ""}`);
    }
  });

  const run = await runAnalysis(orchestrator, url);
  if (json) console.log(JSON.stringify(run.report, null, 2));
  else printSummary(run, verbose);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
