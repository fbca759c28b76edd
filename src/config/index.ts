import "dotenv/config";

function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Centralized configuration module
 * Single source of truth for all environment variables and app configuration
 */
export const config = {
    gemini: {
        apiKey: process.env.GOOGLE_API_KEY,
        model: process.env.GEMINI_MODEL,
    },
    analysis: {
        remoteTimeoutMs: intFromEnv("REMOTE_TIMEOUT_MS", 60_000),
        sectionCharBudget: intFromEnv("SECTION_CHAR_BUDGET", 2_000),
    },
    parser: {
        version: "simple-0.3.0",
    },
    paths: {
        debugDir: "debug",
    },
} as const;

export interface Capabilities {
    remoteModel: boolean;
    nlp: boolean;
}

/**
 * Computes capability flags once at startup.
 * The NLP flag comes from the caller because only it knows whether the backend loaded.
 */
export function detectCapabilities(nlpLoaded: boolean): Capabilities {
    return {
        remoteModel: Boolean(config.gemini.apiKey),
        nlp: nlpLoaded,
    };
}

/**
 * Reports missing optional environment variables.
 * Nothing here is fatal: a missing credential demotes the analysis to the local tiers.
 */
export function validateConfig(): string[] {
    const optional = ["GOOGLE_API_KEY"];
    const missing = optional.filter((key) => !process.env[key]);

    if (missing.length > 0) {
        console.warn(`[Config] Missing environment variables: ${missing.join(", ")}. Remote-model analysis disabled.`);
    }
    return missing;
}
