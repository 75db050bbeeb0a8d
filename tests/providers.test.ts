import { describe, expect, it } from "vitest";
import { ollamaBaseUrl } from "../src/services/providers/chat";
import { createEmbeddingProvider, createLlmProvider } from "../src/services/providers/factory";
import { FallbackEmbeddingProvider, FallbackLlmProvider } from "../src/services/providers/fallback";
import { ConfigurationError, ProviderError } from "../src/services/errors";
import type { EmbeddingProvider, LlmGeneration, LlmProvider } from "../src/services/types";
import { testConfig } from "./helpers/container";

class StubLlm implements LlmProvider {
  readonly model: string;
  calls = 0;

  constructor(
    readonly name: string,
    private readonly reply: string | Error,
  ) {
    this.model = `${name}-model`;
  }

  async generate(): Promise<LlmGeneration> {
    this.calls += 1;
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return { text: this.reply, metadata: { provider: this.name, model: this.model, fallbackUsed: false } };
  }
}

class StubEmbedder implements EmbeddingProvider {
  readonly model: string;

  constructor(
    readonly name: string,
    private readonly result: number[] | Error,
  ) {
    this.model = `${name}-embed`;
  }

  async embed(): Promise<number[]> {
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

describe("FallbackLlmProvider", () => {
  it("uses the primary while it answers", async () => {
    let built = 0;
    const provider = new FallbackLlmProvider(new StubLlm("cerebras", "hello"), () => {
      built += 1;
      return new StubLlm("ollama", "local");
    });

    const result = await provider.generate("system", "user");

    expect(result.text).toBe("hello");
    expect(provider.name).toBe("cerebras");
    expect(built).toBe(0);
  });

  it("switches to the fallback and reports it", async () => {
    const primary = new StubLlm("cerebras", new Error("rate limited"));
    const provider = new FallbackLlmProvider(primary, () => new StubLlm("ollama", "local"));

    const result = await provider.generate("system", "user");

    expect(result.text).toBe("local");
    expect(result.metadata).toMatchObject({
      provider: "ollama",
      fallbackUsed: true,
      originalProvider: "cerebras",
      originalError: "rate limited",
    });
    expect(provider.name).toBe("ollama (fallback)");
    expect(provider.model).toBe("ollama-model");
    expect(provider.stats()).toEqual({
      provider: "cerebras",
      usingFallback: true,
      primaryFailures: 1,
      fallbackInvocations: 1,
    });

    provider.resetFallbackState();
    expect(provider.name).toBe("cerebras");
  });

  it("rethrows the primary error without a fallback", async () => {
    const failure = new Error("offline");
    const provider = new FallbackLlmProvider(new StubLlm("ollama", failure));

    await expect(provider.generate("system", "user")).rejects.toBe(failure);
  });

  it("reports both failures together", async () => {
    const provider = new FallbackLlmProvider(
      new StubLlm("cerebras", new Error("timeout")),
      () => new StubLlm("ollama", new Error("refused")),
    );

    const error = await provider.generate("system", "user").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      reason: "both_failed",
      message: "cerebras: primary failed (timeout); fallback ollama failed (refused)",
    });
  });
});

describe("FallbackEmbeddingProvider", () => {
  it("rejects empty text before calling any provider", async () => {
    const provider = new FallbackEmbeddingProvider(new StubEmbedder("ollama", [1, 0]));

    await expect(provider.embed("  ")).rejects.toMatchObject({ reason: "empty_input" });
  });

  it("falls back to the secondary embedder", async () => {
    const provider = new FallbackEmbeddingProvider(
      new StubEmbedder("openai", new Error("quota")),
      () => new StubEmbedder("ollama", [0, 1]),
    );

    await expect(provider.embed("text")).resolves.toEqual([0, 1]);
    expect(provider.model).toBe("ollama-embed");
    expect(provider.stats()).toMatchObject({ usingFallback: true, primaryFailures: 1 });
  });
});

describe("provider factory", () => {
  it("requires an API key for hosted chat providers", () => {
    const config = testConfig({ llm: { provider: "cerebras", apiKey: "" } });

    expect(() => createLlmProvider(config)).toThrow(ConfigurationError);
    expect(() => createLlmProvider(config)).toThrow(
      "HELIX_LLM_API_KEY is required for the cerebras provider",
    );
  });

  it("requires a base URL for openai-compatible gateways", () => {
    const config = testConfig({ llm: { provider: "openai-compatible", apiKey: "test-key" } });

    expect(() => createLlmProvider(config)).toThrow(
      "HELIX_LLM_BASE_URL is required for the openai-compatible provider",
    );
  });

  it("builds providers from configuration", () => {
    const llm = createLlmProvider(
      testConfig({ llm: { provider: "cerebras", apiKey: "test-key", model: "llama-3.3-70b" } }),
    );
    const embeddings = createEmbeddingProvider(
      testConfig({ embedding: { provider: "ollama", model: "nomic-embed-text" } }),
    );

    expect([llm.name, llm.model]).toEqual(["cerebras", "llama-3.3-70b"]);
    expect([embeddings.name, embeddings.model]).toEqual(["ollama", "nomic-embed-text"]);
    expect(() =>
      createEmbeddingProvider(testConfig({ embedding: { provider: "openai", apiKey: "" } })),
    ).toThrow("HELIX_EMBEDDING_API_KEY is required for the openai provider");
  });

  it("points Ollama at its OpenAI-compatible path", () => {
    expect(ollamaBaseUrl("http://localhost:11434/")).toBe("http://localhost:11434/v1");
    expect(ollamaBaseUrl("http://localhost:11434/v1")).toBe("http://localhost:11434/v1");
  });
});
