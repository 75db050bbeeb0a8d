import OpenAI from "openai";
import { ProviderError, errorMessage } from "../errors";
import type { LlmGeneration, LlmProvider, ResponseFormat } from "../types";

export const CEREBRAS_BASE_URL = "https://api.cerebras.ai/v1";

export interface ChatProviderOptions {
  name: string;
  model: string;
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
  client?: OpenAI;
}

/**
 * Chat completion over any OpenAI-compatible endpoint: Cerebras, Ollama's
 * `/v1` surface and self-hosted gateways all speak the same protocol.
 */
export class ChatCompletionProvider implements LlmProvider {
  readonly name: string;
  readonly model: string;
  readonly baseUrl: string;
  #client: OpenAI;
  #temperature: number;
  #maxTokens?: number;

  constructor(options: ChatProviderOptions) {
    this.name = options.name;
    this.model = options.model;
    this.baseUrl = options.baseUrl;
    this.#temperature = options.temperature ?? 0.3;
    this.#maxTokens = options.maxTokens;
    this.#client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
  }

  async generate(
    system: string,
    user: string,
    responseFormat: ResponseFormat = "text",
  ): Promise<LlmGeneration> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.#client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
        temperature: this.#temperature,
        max_tokens: this.#maxTokens,
        response_format:
          responseFormat === "json_object" ? { type: "json_object" } : undefined,
      });
    } catch (error) {
      throw new ProviderError(this.name, "request", errorMessage(error), { cause: error });
    }

    const text = completion.choices[0]?.message?.content;
    if (typeof text !== "string") {
      throw new ProviderError(this.name, "response", "completion carried no message content");
    }

    return {
      text,
      metadata: {
        provider: this.name,
        model: completion.model || this.model,
        baseUrl: this.baseUrl,
        promptTokens: completion.usage?.prompt_tokens,
        completionTokens: completion.usage?.completion_tokens,
        totalTokens: completion.usage?.total_tokens,
        fallbackUsed: false,
      },
    };
  }
}

/**
 * Ollama exposes its OpenAI-compatible API under `/v1`; the key is ignored but required by the SDK.
 */
export function ollamaBaseUrl(url: string): string {
  const trimmed = url.replace(/\/+$/, "");
  return trimmed.endsWith("/v1") ? trimmed : `${trimmed}/v1`;
}

export const OLLAMA_API_KEY = "ollama";
