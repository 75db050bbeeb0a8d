import type { Config } from "../../config";
import type { AppLogger } from "../../logging";
import { ConfigurationError } from "../errors";
import {
  CEREBRAS_BASE_URL,
  ChatCompletionProvider,
  OLLAMA_API_KEY,
  ollamaBaseUrl,
} from "./chat";
import { OpenAiEmbeddingProvider } from "./embeddings";
import { FallbackEmbeddingProvider, FallbackLlmProvider } from "./fallback";

const OPENAI_BASE_URL = "https://api.openai.com/v1";

export function createLlmProvider(
  config: Pick<Config, "llm">,
  logger?: AppLogger,
): FallbackLlmProvider {
  const { llm } = config;
  const primary = buildPrimaryLlm(llm);

  const fallbackFactory =
    llm.fallback.enabled && llm.provider !== "ollama"
      ? () =>
          new ChatCompletionProvider({
            name: "ollama",
            model: llm.fallback.model,
            baseUrl: ollamaBaseUrl(llm.fallback.url),
            apiKey: OLLAMA_API_KEY,
            timeoutMs: llm.timeoutMs,
            temperature: llm.temperature,
          })
      : undefined;

  return new FallbackLlmProvider(primary, fallbackFactory, logger);
}

function buildPrimaryLlm(llm: Config["llm"]): ChatCompletionProvider {
  switch (llm.provider) {
    case "cerebras":
      return new ChatCompletionProvider({
        name: "cerebras",
        model: llm.model,
        baseUrl: llm.baseUrl ?? CEREBRAS_BASE_URL,
        apiKey: requireKey(llm.apiKey, "HELIX_LLM_API_KEY", "cerebras"),
        timeoutMs: llm.timeoutMs,
        temperature: llm.temperature,
      });
    case "openai-compatible":
      if (!llm.baseUrl) {
        throw new ConfigurationError(
          "HELIX_LLM_BASE_URL is required for the openai-compatible provider",
        );
      }
      return new ChatCompletionProvider({
        name: "openai-compatible",
        model: llm.model,
        baseUrl: llm.baseUrl,
        apiKey: requireKey(llm.apiKey, "HELIX_LLM_API_KEY", "openai-compatible"),
        timeoutMs: llm.timeoutMs,
        temperature: llm.temperature,
      });
    case "ollama":
      return new ChatCompletionProvider({
        name: "ollama",
        model: llm.model,
        baseUrl: ollamaBaseUrl(llm.baseUrl ?? llm.fallback.url),
        apiKey: OLLAMA_API_KEY,
        timeoutMs: llm.timeoutMs,
        temperature: llm.temperature,
      });
  }
}

export function createEmbeddingProvider(
  config: Pick<Config, "embedding">,
  logger?: AppLogger,
): FallbackEmbeddingProvider {
  const { embedding } = config;

  const primary =
    embedding.provider === "openai"
      ? new OpenAiEmbeddingProvider({
          name: "openai",
          model: embedding.model,
          baseUrl:
            embedding.url === "http://localhost:11434" ? OPENAI_BASE_URL : embedding.url,
          apiKey: requireKey(embedding.apiKey, "HELIX_EMBEDDING_API_KEY", "openai"),
          timeoutMs: embedding.timeoutMs,
        })
      : new OpenAiEmbeddingProvider({
          name: "ollama",
          model: embedding.model,
          baseUrl: ollamaBaseUrl(embedding.url),
          apiKey: OLLAMA_API_KEY,
          timeoutMs: embedding.timeoutMs,
        });

  const fallbackFactory =
    embedding.fallback.enabled && embedding.provider !== "ollama"
      ? () =>
          new OpenAiEmbeddingProvider({
            name: "ollama",
            model: embedding.fallback.model,
            baseUrl: ollamaBaseUrl(embedding.fallback.url),
            apiKey: OLLAMA_API_KEY,
            timeoutMs: embedding.timeoutMs,
          })
      : undefined;

  return new FallbackEmbeddingProvider(primary, fallbackFactory, logger);
}

function requireKey(value: string | undefined, variable: string, provider: string): string {
  if (!value) {
    throw new ConfigurationError(`${variable} is required for the ${provider} provider`);
  }
  return value;
}
