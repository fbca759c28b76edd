import { config } from "../../config/index.js";
import type { Paper } from "../../types/domain.js";
import type { IAnalysisTier, ICompletionClient, TierContext, TierName } from "../../types/interfaces/pipeline.js";
import type { AcademicAnalysis } from "../../types/zodSchemas.js";
import type { NlpProcessor } from "../nlp/index.js";
import { NlpTier } from "./nlpTier.js";
import { RemoteTier } from "./remoteTier.js";
import { TemplateTier } from "./templateTier.js";

export interface TierFailure {
    tier: TierName;
    reason: string;
}

export interface AnalysisOutcome {
    analysis: AcademicAnalysis;
    tier: TierName;
    failures: TierFailure[];
}

/**
 * Runs tiers in order and returns the first result.
 * The template tier is always appended last, so analyze() resolves for any paper.
 * An abort signal in the context cancels only the remote call; local tiers still run.
 */
export class AnalysisOrchestrator {
    name = "[AnalysisOrchestrator]";
    readonly tiers: IAnalysisTier[];
    private fallback = new TemplateTier();

    constructor(tiers: IAnalysisTier[] = []) {
        this.tiers = tiers.filter((tier) => tier.name !== "template");
    }

    get tierNames(): TierName[] {
        return [...this.tiers.map((tier) => tier.name), this.fallback.name];
    }

    async analyze(paper: Paper, context: TierContext = {}): Promise<AnalysisOutcome> {
        const failures: TierFailure[] = [];

        for (const tier of this.tiers) {
            try {
                const analysis = await tier.analyze(paper, context);
                console.log(`${this.name} "${paper.title}" analysed by ${tier.name}`);
                return { analysis, tier: tier.name, failures };
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                console.warn(`${this.name} Tier ${tier.name} failed, falling through: ${reason}`);
                failures.push({ tier: tier.name, reason });
            }
        }

        const analysis = await this.fallback.analyze(paper);
        console.log(`${this.name} "${paper.title}" analysed by ${this.fallback.name}`);
        return { analysis, tier: this.fallback.name, failures };
    }
}

export interface OrchestratorDependencies {
    completionClient: ICompletionClient | null;
    nlp: NlpProcessor | null;
    timeoutMs?: number;
    sectionCharBudget?: number;
}

/**
 * Assembles the tier chain from what is available at startup.
 * Unavailable tiers are left out here rather than attempted per paper.
 */
export function createAnalysisOrchestrator(deps: OrchestratorDependencies): AnalysisOrchestrator {
    const tiers: IAnalysisTier[] = [];

    if (deps.completionClient) {
        tiers.push(
            new RemoteTier(deps.completionClient, {
                timeoutMs: deps.timeoutMs ?? config.analysis.remoteTimeoutMs,
                sectionCharBudget: deps.sectionCharBudget ?? config.analysis.sectionCharBudget,
            }),
        );
    } else {
        console.warn("[AnalysisOrchestrator] Remote model unavailable, starting at the local tiers");
    }

    if (deps.nlp) {
        tiers.push(new NlpTier(deps.nlp));
    } else {
        console.warn("[AnalysisOrchestrator] NLP backend unavailable, using templates only");
    }

    return new AnalysisOrchestrator(tiers);
}
