import { createWorkflow } from "@llamaindex/workflow-core";
import * as fs from "fs/promises";
import * as path from "path";
import type { IPaperLoader, IPaperStructurer } from "../../types/interfaces/pipeline.js";
import type { AnalysisOrchestrator } from "../analyze/orchestrator.js";
import {
  analyzeEvent,
  completeEvent,
  errorEvent,
  loadEvent,
  structureEvent,
} from "./events.js";

export interface AnalysisWorkflowDependencies {
  loader: IPaperLoader;
  structurer: IPaperStructurer;
  orchestrator: AnalysisOrchestrator;
  /** When set, each stage's output is dumped here as JSON. */
  debugDir?: string;
  signal?: AbortSignal;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createAnalysisWorkflow(deps: AnalysisWorkflowDependencies) {
  const workflow = createWorkflow();

  async function dump(fileName: string, data: unknown) {
    if (!deps.debugDir) return;
    const debugDir = path.resolve(deps.debugDir);
    try {
      await fs.mkdir(debugDir, { recursive: true });
      await fs.writeFile(path.join(debugDir, fileName), JSON.stringify(data, null, 2));
    } catch (error) {
      console.warn(`[Workflow] Could not write debug output ${fileName}: ${messageOf(error)}`);
    }
  }

  workflow.handle([loadEvent], async (context, event) => {
    const { sendEvent } = context;
    const { paperPath } = event.data;

    console.log("=== Starting Paper Analysis ===");
    console.log(`[Load Handler] Loading paper: ${paperPath}`);

    try {
      const document = await deps.loader.load(paperPath);
      console.log(`[Load Handler] Loaded ${document.text.length} characters`);
      sendEvent(structureEvent.with({ document, paperPath }));
    } catch (error) {
      console.error(`[Load Handler] Error:`, error);
      sendEvent(errorEvent.with({ stage: "load", error: messageOf(error), paperPath }));
    }
  });

  workflow.handle([structureEvent], async (context, event) => {
    const { sendEvent } = context;
    const { document, paperPath } = event.data;

    try {
      const paper = deps.structurer.process(document);
      await dump("01_structure.json", paper);
      console.log(`[Structure Handler] ${paper.sections.length} sections`);
      sendEvent(analyzeEvent.with({ paper, paperPath }));
    } catch (error) {
      console.error(`[Structure Handler] Error:`, error);
      sendEvent(errorEvent.with({ stage: "structure", error: messageOf(error), paperPath }));
    }
  });

  workflow.handle([analyzeEvent], async (context, event) => {
    const { sendEvent } = context;
    const { paper, paperPath } = event.data;

    console.log(`[Analyze Handler] Tiers: ${deps.orchestrator.tierNames.join(" -> ")}`);

    try {
      const outcome = await deps.orchestrator.analyze(paper, { signal: deps.signal });
      await dump("02_analysis.json", outcome);
      sendEvent(
        completeEvent.with({
          success: true,
          paperPath,
          paper,
          analysis: outcome.analysis,
          tier: outcome.tier,
          failures: outcome.failures,
        }),
      );
    } catch (error) {
      console.error(`[Analyze Handler] Error:`, error);
      sendEvent(errorEvent.with({ stage: "analyze", error: messageOf(error), paperPath }));
    }
  });

  workflow.handle([errorEvent], async (context, event) => {
    const { stage, error, paperPath } = event.data;
    console.error(`[Error Handler] Pipeline failed at ${stage} stage for ${paperPath}`);
    console.error(`[Error Handler] Error: ${error}`);

    context.sendEvent(completeEvent.with({ success: false, paperPath, error }));
  });

  return workflow;
}

/**
 * Runs the workflow for one paper and resolves with its completion event data.
 */
export async function runAnalysisWorkflow(deps: AnalysisWorkflowDependencies, paperPath: string) {
  const workflow = createAnalysisWorkflow(deps);
  const { stream, sendEvent } = workflow.createContext();

  sendEvent(loadEvent.with({ paperPath }));

  for await (const event of stream) {
    if (completeEvent.include(event)) {
      return event.data;
    }
  }
  throw new Error("Workflow stream ended without a completion event");
}
