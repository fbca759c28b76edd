import { z } from "zod";

export const ANALYSIS_CONFIDENCE = ["low", "medium", "high"] as const;

export const ResearchProblemSchema = z.object({
  problem_statement: z.string().describe("What problem is being solved"),
  domain_relevance: z.string().describe("Why it is relevant in its domain"),
  constraints: z
    .array(z.string())
    .describe("Constraints or assumptions"),
});

export const MethodologySchema = z.object({
  input_data: z.string().describe("Input data or signals"),
  techniques: z
    .array(z.string())
    .describe("Algorithms, models, or techniques"),
  pipeline: z.string().describe("Processing pipeline description"),
  evaluation: z.string().describe("Evaluation or validation method"),
});

export const AnalysisConfidenceSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(ANALYSIS_CONFIDENCE));

/**
 * Field contract shared with the remote model.
 * paper_title / paper_doi are filled in locally, so the model is not asked for them.
 */
export const AnalysisBodySchema = z.object({
  technical_summary: z.string(),
  research_problem: ResearchProblemSchema,
  methodology: MethodologySchema,
  main_contributions: z.array(z.string()),
  limitations: z.array(z.string()),
  key_concepts: z.record(z.string(), z.string()),
  thematic_tags: z.array(z.string()),
  sota_positioning: z.string(),
  citation_summary: z.string(),
  analysis_confidence: AnalysisConfidenceSchema,
  missing_information: z.array(z.string()),
});

export const AcademicAnalysisSchema = AnalysisBodySchema.extend({
  paper_title: z.string(),
  paper_doi: z.string().optional(),
  main_contributions: z.array(z.string()).min(2).max(5),
});

export type ResearchProblem = z.infer<typeof ResearchProblemSchema>;
export type Methodology = z.infer<typeof MethodologySchema>;
export type AnalysisConfidence = (typeof ANALYSIS_CONFIDENCE)[number];
export type AnalysisBody = z.infer<typeof AnalysisBodySchema>;
export type AcademicAnalysis = z.infer<typeof AcademicAnalysisSchema>;
