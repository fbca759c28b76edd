export { AnalysisOrchestrator, createAnalysisOrchestrator } from "./orchestrator.js";
export type { AnalysisOutcome, OrchestratorDependencies, TierFailure } from "./orchestrator.js";
export { NlpTier } from "./nlpTier.js";
export { RemoteTier, parseRemoteResponse, serializePaper } from "./remoteTier.js";
export { TemplateTier, buildTemplateAnalysis } from "./templateTier.js";
export { TierFailureError, finalizeAnalysis } from "./shared.js";
