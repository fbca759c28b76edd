import type { Paper } from "../types/domain.js";
import type { IPaperLoader, IPaperStructurer } from "../types/interfaces/pipeline.js";

export interface IngestDependencies {
    loader: IPaperLoader;
    structurer: IPaperStructurer;
}

/** Load and structure a paper without analysing it. */
export async function ingestPaper(paperPath: string, deps: IngestDependencies): Promise<Paper> {
    console.log(`[Ingest] Loading paper: ${paperPath}`);
    const document = await deps.loader.load(paperPath);
    return deps.structurer.process(document);
}
