import type { ZodError } from "zod";
import { config } from "../../config/index.js";
import { ANALYSIS_SYSTEM_PROMPT, analysisPrompt } from "../../prompts/analysis.js";
import type { Paper } from "../../types/domain.js";
import type { IAnalysisTier, ICompletionClient, TierContext } from "../../types/interfaces/pipeline.js";
import { AnalysisBodySchema, type AcademicAnalysis, type AnalysisBody } from "../../types/zodSchemas.js";
import { withTimeout } from "../../utils/resilience.js";
import { TierFailureError, finalizeAnalysis } from "./shared.js";

const JSON_FENCE = /^```(?:json)?\s*\n?([\s\S]*?)\n?\s*```$/i;

function truncate(text: string, budget: number): string {
    return text.length > budget ? `${text.slice(0, budget)}...` : text;
}

/**
 * Title, abstract and every non-reference section, each bounded by the character budget.
 */
export function serializePaper(paper: Paper, sectionCharBudget: number): string {
    const parts = [`TITLE: ${paper.title}`];
    if (paper.abstract) {
        parts.push(`ABSTRACT:\n${truncate(paper.abstract, sectionCharBudget)}`);
    }
    for (const section of paper.sections) {
        if (section.sectionType === "references" || section.sectionType === "abstract") continue;
        if (!section.content) continue;
        const heading = (section.title ?? section.sectionType).toUpperCase();
        parts.push(`${heading}:\n${truncate(section.content, sectionCharBudget)}`);
    }
    return parts.join("\n\n");
}

function describeZodError(error: ZodError): string {
    return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * The reply must be one JSON object, optionally inside a ```json fence.
 * Prose around it, invalid JSON or a missing field all reject.
 */
export function parseRemoteResponse(raw: string): AnalysisBody {
    const trimmed = raw.trim();
    const body = JSON_FENCE.exec(trimmed)?.[1] ?? trimmed;

    let data: unknown;
    try {
        data = JSON.parse(body);
    } catch (error) {
        throw new TierFailureError("remote-model", "Response is not valid JSON", { cause: error });
    }

    const result = AnalysisBodySchema.safeParse(data);
    if (!result.success) {
        throw new TierFailureError("remote-model", `Response does not match the analysis contract: ${describeZodError(result.error)}`, {
            cause: result.error,
        });
    }
    return result.data;
}

export interface RemoteTierOptions {
    timeoutMs?: number;
    sectionCharBudget?: number;
}

/**
 * Remote-model tier. One attempt per paper: no retry, any failure falls through.
 */
export class RemoteTier implements IAnalysisTier {
    name = "remote-model" as const;
    private timeoutMs: number;
    private sectionCharBudget: number;

    constructor(
        private client: ICompletionClient,
        options: RemoteTierOptions = {},
    ) {
        this.timeoutMs = options.timeoutMs ?? config.analysis.remoteTimeoutMs;
        this.sectionCharBudget = options.sectionCharBudget ?? config.analysis.sectionCharBudget;
    }

    async analyze(paper: Paper, context: TierContext = {}): Promise<AcademicAnalysis> {
        const prompt = analysisPrompt(serializePaper(paper, this.sectionCharBudget));
        console.log(`[RemoteTier] Requesting analysis from ${this.client.model} (${prompt.length} chars)`);

        let raw: string;
        try {
            raw = await withTimeout(
                (signal) => this.client.complete({ system: ANALYSIS_SYSTEM_PROMPT, prompt, signal }),
                { timeoutMs: this.timeoutMs, name: "Remote analysis", signal: context.signal },
            );
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new TierFailureError(this.name, `Completion request failed: ${reason}`, { cause: error });
        }

        return finalizeAnalysis(paper, parseRemoteResponse(raw));
    }
}
