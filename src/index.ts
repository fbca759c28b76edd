#!/usr/bin/env node
import * as fs from "fs/promises";
import * as path from "path";
import { config, detectCapabilities, validateConfig } from "./config/index.js";
import { ingestPaper } from "./ingestion/ingest.js";
import { LocalPdfLoader } from "./ingestion/loader.js";
import { createAnalysisOrchestrator } from "./pipeline/analyze/index.js";
import { NlpProcessor, loadLinguisticBackend } from "./pipeline/nlp/index.js";
import { PaperStructurer } from "./pipeline/structure/index.js";
import { runAnalysisWorkflow } from "./pipeline/workflow/analysisWorkflow.js";
import { renderReport } from "./report/render.js";
import { createCompletionClient } from "./utils/llm.js";
import { type CliOptions, USAGE, parseArgs } from "./cli/args.js";

async function ingest(options: CliOptions) {
  const paper = await ingestPaper(path.resolve(options.paperPath), {
    loader: new LocalPdfLoader(),
    structurer: new PaperStructurer(),
  });
  const json = JSON.stringify(paper, null, 2);

  if (options.jsonOut) {
    await fs.writeFile(options.jsonOut, json);
    console.log(`[Main] Wrote ${path.resolve(options.jsonOut)}`);
  } else {
    console.log(json);
  }
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  if (!options) {
    console.error(USAGE);
    process.exit(1);
  }

  if (options.command === "ingest") {
    await ingest(options);
    return;
  }

  validateConfig();

  const backend = await loadLinguisticBackend();
  const completionClient = options.localOnly ? null : createCompletionClient();
  const capabilities = detectCapabilities(backend !== null);
  console.log(
    `[Main] Remote model: ${capabilities.remoteModel && completionClient ? "on" : "off"}, NLP: ${capabilities.nlp ? "on" : "off"}`,
  );

  const orchestrator = createAnalysisOrchestrator({
    completionClient,
    nlp: backend ? new NlpProcessor(backend) : null,
  });

  const result = await runAnalysisWorkflow(
    {
      loader: new LocalPdfLoader(),
      structurer: new PaperStructurer(),
      orchestrator,
      ...(options.debug ? { debugDir: config.paths.debugDir } : {}),
    },
    path.resolve(options.paperPath),
  );

  if (!result.success || !result.analysis || !result.paper) {
    console.log("=== Analysis Failed ===");
    process.exit(1);
  }

  console.log("=== Analysis Complete ===");
  console.log(renderReport(result.analysis, result.tier));

  if (options.jsonOut) {
    const payload = { paper: result.paper, analysis: result.analysis, tier: result.tier };
    await fs.writeFile(options.jsonOut, JSON.stringify(payload, null, 2));
    console.log(`[Main] Wrote ${path.resolve(options.jsonOut)}`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
