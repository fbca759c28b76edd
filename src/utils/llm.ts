import { Gemini, GEMINI_MODEL } from "@llamaindex/google";
import type { ChatMessage, MessageContent } from "llamaindex";
import { config } from "../config/index.js";
import type { CompletionRequest, ICompletionClient } from "../types/interfaces/pipeline.js";

function isGeminiModel(value: string | undefined): value is GEMINI_MODEL {
  return Object.values<string>(GEMINI_MODEL).includes(value ?? "");
}

function contentToText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => (part.type === "text" ? part.text : ""))
    .join("");
}

/** Per-request generation config, read by the Gemini provider from `additionalChatOptions.config`. */
export interface GenerationOptions {
  config: {
    responseMimeType: string;
    abortSignal?: AbortSignal;
  };
}

/** The non-streaming slice of a llamaindex chat model this client needs. */
export interface ChatModel {
  chat(params: {
    messages: ChatMessage[];
    additionalChatOptions?: GenerationOptions;
  }): Promise<{ message: { content: MessageContent } }>;
}

/**
 * Adapts a llamaindex chat model to the completion-client contract.
 * Asks for a JSON response and hands the caller's signal to the provider.
 */
export class LlamaIndexCompletionClient implements ICompletionClient {
  constructor(
    private llm: ChatModel,
    public model: string,
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    request.signal?.throwIfAborted();
    const generation: GenerationOptions["config"] = { responseMimeType: "application/json" };
    if (request.signal) generation.abortSignal = request.signal;

    const response = await this.llm.chat({
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.prompt },
      ],
      additionalChatOptions: { config: generation },
    });
    return contentToText(response.message.content);
  }
}

/**
 * Builds the Gemini-backed client, or null when no credentials are configured.
 * Missing credentials are a configuration error detected here, before any call is attempted.
 */
export const createCompletionClient = (): ICompletionClient | null => {
  if (!config.gemini.apiKey) {
    return null;
  }

  const model = isGeminiModel(config.gemini.model)
    ? config.gemini.model
    : GEMINI_MODEL.GEMINI_2_0_FLASH;

  const llm = new Gemini({ model, temperature: 0.3 });
  return new LlamaIndexCompletionClient(llm, model);
};
