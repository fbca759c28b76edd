import type { MessageContent } from "llamaindex";
import { describe, expect, it } from "vitest";
import { type ChatModel, LlamaIndexCompletionClient } from "./llm.js";

class RecordingChatModel implements ChatModel {
    calls: Parameters<ChatModel["chat"]>[0][] = [];

    constructor(private content: MessageContent) {}

    async chat(params: Parameters<ChatModel["chat"]>[0]) {
        this.calls.push(params);
        return { message: { content: this.content } };
    }
}

describe("LlamaIndexCompletionClient", () => {
    it("asks for JSON and passes the caller's signal in the provider config", async () => {
        const llm = new RecordingChatModel('{"ok":true}');
        const client = new LlamaIndexCompletionClient(llm, "test-model");
        const controller = new AbortController();

        const reply = await client.complete({ system: "sys", prompt: "paper", signal: controller.signal });

        expect(reply).toBe('{"ok":true}');
        expect(llm.calls).toEqual([
            {
                messages: [
                    { role: "system", content: "sys" },
                    { role: "user", content: "paper" },
                ],
                additionalChatOptions: {
                    config: { responseMimeType: "application/json", abortSignal: controller.signal },
                },
            },
        ]);
    });

    it("leaves the signal out when the caller has none", async () => {
        const llm = new RecordingChatModel("{}");
        await new LlamaIndexCompletionClient(llm, "test-model").complete({ system: "s", prompt: "p" });

        expect(llm.calls[0]?.additionalChatOptions).toEqual({ config: { responseMimeType: "application/json" } });
    });

    it("joins the text parts of a multi-part reply", async () => {
        const llm = new RecordingChatModel([
            { type: "text", text: '{"a":' },
            { type: "text", text: "1}" },
        ]);

        await expect(new LlamaIndexCompletionClient(llm, "test-model").complete({ system: "s", prompt: "p" })).resolves.toBe('{"a":1}');
    });

    it("does not call the model once the signal is aborted", async () => {
        const llm = new RecordingChatModel("{}");
        const controller = new AbortController();
        controller.abort();

        await expect(
            new LlamaIndexCompletionClient(llm, "test-model").complete({ system: "s", prompt: "p", signal: controller.signal }),
        ).rejects.toThrow();
        expect(llm.calls).toEqual([]);
    });
});
