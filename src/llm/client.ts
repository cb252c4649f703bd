import OpenAI from "openai";
import { GenerationServiceError } from "../errors.js";
import { log } from "../utils/logger.js";

const llmLog = log.withScope("llm");

export type GenerateResult = { text: string | null };

/** One stateless request to the text-generation service. */
export type GenerateFn = (parts: string[]) => Promise<GenerateResult>;

type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

type ChatRequest = {
  model: string;
  temperature: number;
  max_tokens: number;
  messages: ChatMessage[];
};

type ChatResponse = {
  choices: Array<{ message: { content: string | null } }>;
};

/** The slice of the OpenAI client this module calls. */
export interface ChatCompletionsApi {
  create(request: ChatRequest): Promise<ChatResponse>;
}

export type GenerateOptions = {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  completions?: ChatCompletionsApi;
};

function openAiCompletions(apiKey: string): ChatCompletionsApi {
  const client = new OpenAI({ apiKey });
  return {
    create: (request) => client.chat.completions.create(request),
  };
}

/** With more than one part the first is the fixed directive and goes out as the system message. */
export function toChatMessages(parts: string[]): ChatMessage[] {
  if (parts.length < 2) {
    return parts.map((content): ChatMessage => ({ role: "user", content }));
  }
  const [directive = "", ...rest] = parts;
  return [{ role: "system", content: directive }, ...rest.map((content): ChatMessage => ({ role: "user", content }))];
}

/** Builds a GenerateFn over the chat-completions API. */
export function createOpenAiGenerate(opts: GenerateOptions): GenerateFn {
  const completions = opts.completions ?? openAiCompletions(opts.apiKey);

  return async (parts) => {
    const start = Date.now();
    let response: ChatResponse;

    try {
      response = await completions.create({
        model: opts.model,
        temperature: opts.temperature,
        max_tokens: opts.maxTokens,
        messages: toChatMessages(parts),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      llmLog.error(`OpenAI API error: ${message}`);
      throw new GenerationServiceError(`LLM request failed: ${message}`, { cause: err });
    }

    if (!Array.isArray(response.choices)) {
      throw new GenerationServiceError("Malformed response from OpenAI: missing choices");
    }

    const text = response.choices[0]?.message?.content ?? null;
    llmLog.debug(`model=${opts.model} ms=${Date.now() - start} respChars=${text?.length ?? 0}`);
    return { text };
  };
}
