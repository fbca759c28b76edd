import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it } from "vitest";
import type { ExtractedDocument } from "../../types/extractedDocument.js";
import type { IPaperLoader } from "../../types/interfaces/pipeline.js";
import { AnalysisOrchestrator } from "../analyze/orchestrator.js";
import { PaperStructurer } from "../structure/paperStructurer.js";
import { runAnalysisWorkflow } from "./analysisWorkflow.js";

class StaticLoader implements IPaperLoader {
    loaded: string[] = [];

    constructor(private document: ExtractedDocument) {}

    async load(filePath: string): Promise<ExtractedDocument> {
        this.loaded.push(filePath);
        return this.document;
    }
}

class FailingLoader implements IPaperLoader {
    async load(filePath: string): Promise<ExtractedDocument> {
        throw new Error(`Paper not found: ${filePath}`);
    }
}

describe("analysis workflow", () => {
    const tempDirs: string[] = [];

    afterEach(async () => {
        await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
    });

    it("loads, structures and analyses a paper", async () => {
        const loader = new StaticLoader({ text: "Sensor Fusion\nAbstract\nWe fuse sensors.\nMethods\nWe use filters." });

        const result = await runAnalysisWorkflow(
            { loader, structurer: new PaperStructurer(), orchestrator: new AnalysisOrchestrator() },
            "/papers/fusion.pdf",
        );

        expect(loader.loaded).toEqual(["/papers/fusion.pdf"]);
        expect(result.success).toBe(true);
        expect(result.tier).toBe("template");
        expect(result.paper?.abstract).toBe("We fuse sensors.");
        expect(result.analysis?.paper_title).toBe("Sensor Fusion");
        expect(result.failures).toEqual([]);
    });

    it("completes unsuccessfully when loading fails", async () => {
        const result = await runAnalysisWorkflow(
            { loader: new FailingLoader(), structurer: new PaperStructurer(), orchestrator: new AnalysisOrchestrator() },
            "/papers/missing.pdf",
        );

        expect(result).toEqual({
            success: false,
            paperPath: "/papers/missing.pdf",
            error: "Paper not found: /papers/missing.pdf",
        });
    });

    it("writes stage output to the debug directory", async () => {
        const debugDir = await fs.mkdtemp(path.join(os.tmpdir(), "paper-analyzer-"));
        tempDirs.push(debugDir);

        await runAnalysisWorkflow(
            {
                loader: new StaticLoader({ text: "Title\nAbstract\nText." }),
                structurer: new PaperStructurer(),
                orchestrator: new AnalysisOrchestrator(),
                debugDir,
            },
            "/papers/debug.pdf",
        );

        const files = (await fs.readdir(debugDir)).sort();
        expect(files).toEqual(["01_structure.json", "02_analysis.json"]);

        const dumped = await fs.readFile(path.join(debugDir, "02_analysis.json"), "utf-8");
        expect(JSON.parse(dumped)).toMatchObject({ tier: "template", failures: [] });
    });
});
