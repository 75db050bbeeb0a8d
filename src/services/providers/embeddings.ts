import OpenAI from "openai";
import { ProviderError, errorMessage } from "../errors";
import type { EmbeddingProvider } from "../types";

export interface OpenAiEmbeddingOptions {
  name: string;
  model: string;
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  client?: OpenAI;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly baseUrl: string;
  #client: OpenAI;

  constructor(options: OpenAiEmbeddingOptions) {
    this.name = options.name;
    this.model = options.model;
    this.baseUrl = options.baseUrl;
    this.#client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
  }

  async embed(text: string): Promise<number[]> {
    if (!text.trim()) {
      throw new ProviderError(this.name, "empty_input", "cannot embed empty text");
    }

    let vector: number[] | undefined;
    try {
      const response = await this.#client.embeddings.create({
        model: this.model,
        input: text,
      });
      vector = response.data[0]?.embedding;
    } catch (error) {
      throw new ProviderError(this.name, "request", errorMessage(error), { cause: error });
    }

    if (!vector || vector.length === 0) {
      throw new ProviderError(this.name, "response", "response carried no embedding");
    }
    return vector;
  }
}
