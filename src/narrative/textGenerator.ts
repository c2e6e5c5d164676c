import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import { AiProviderConfig } from "../utils/config";
import { SYSTEM_PROMPT } from "./prompts";

/**
 * Optional text-generation capability used to phrase computed results.
 */
export interface TextGenerator {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

/**
 * The part of the OpenAI client the generator calls.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

/**
 * Text generator backed by an OpenAI-compatible chat completions API
 * (OpenAI, OpenRouter, or a gateway exposing the same surface).
 */
export class OpenAITextGenerator implements TextGenerator {
  readonly name: string;
  private client: ChatCompletionClient;
  private model: string;
  private maxTokens: number;

  constructor(config: AiProviderConfig & { apiKey: string }, client?: ChatCompletionClient) {
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.apiBase,
        timeout: config.timeoutSeconds * 1000,
        maxRetries: 1,
      });
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.name = `openai:${config.model}`;
  }

  async generate(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      max_tokens: this.maxTokens,
      temperature: 0.3,
    });
    return completion.choices[0]?.message?.content?.trim() ?? "";
  }
}

/**
 * Returns a generator when the provider is enabled and has an API key, otherwise null.
 */
export function createTextGenerator(config: AiProviderConfig): TextGenerator | null {
  if (config.provider !== "openai" || !config.apiKey) {
    return null;
  }
  return new OpenAITextGenerator({ ...config, apiKey: config.apiKey });
}
