import { workflowEvent } from "@llamaindex/workflow-core";
import type { Paper } from "../../types/domain.js";
import type { ExtractedDocument } from "../../types/extractedDocument.js";
import type { TierFailure } from "../analyze/orchestrator.js";
import type { TierName } from "../../types/interfaces/pipeline.js";
import type { AcademicAnalysis } from "../../types/zodSchemas.js";

/** Event fired to start the pipeline with a paper path */
export const loadEvent = workflowEvent<{ paperPath: string }>();

/** Event fired when the PDF text is extracted, ready for structuring */
export const structureEvent = workflowEvent<{
  document: ExtractedDocument;
  paperPath: string;
}>();

/** Event fired when the paper is structured, ready for analysis */
export const analyzeEvent = workflowEvent<{
  paper: Paper;
  paperPath: string;
}>();

/** Event fired when the pipeline finishes, successfully or not */
export const completeEvent = workflowEvent<{
  success: boolean;
  paperPath: string;
  paper?: Paper;
  analysis?: AcademicAnalysis;
  tier?: TierName;
  failures?: TierFailure[];
  error?: string;
}>();

/** Event fired on any error in the pipeline */
export const errorEvent = workflowEvent<{
  stage: string;
  error: string;
  paperPath: string;
}>();
