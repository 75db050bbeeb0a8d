import type { AppLogger } from "../../logging";
import { ProviderError, errorMessage } from "../errors";
import type {
  EmbeddingProvider,
  FallbackStats,
  LlmGeneration,
  LlmProvider,
  ResponseFormat,
} from "../types";

interface FallbackState {
  usingFallback: boolean;
  primaryFailures: number;
  fallbackInvocations: number;
}

function initialState(): FallbackState {
  return { usingFallback: false, primaryFailures: 0, fallbackInvocations: 0 };
}

/**
 * Lazily builds the fallback on first need and memoizes it. A factory that
 * returns `undefined` means no fallback is available.
 */
class LazyFallback<T> {
  #factory?: () => T | undefined;
  #instance?: T;
  #resolved = false;

  constructor(factory?: () => T | undefined) {
    this.#factory = factory;
  }

  get(): T | undefined {
    if (!this.#resolved) {
      this.#instance = this.#factory?.();
      this.#resolved = true;
    }
    return this.#instance;
  }
}

/**
 * Every call tries the primary first; the fallback state only describes the
 * most recent call.
 */
export class FallbackLlmProvider implements LlmProvider {
  #primary: LlmProvider;
  #fallback: LazyFallback<LlmProvider>;
  #state = initialState();
  #logger?: AppLogger;

  constructor(
    primary: LlmProvider,
    fallbackFactory?: () => LlmProvider | undefined,
    logger?: AppLogger,
  ) {
    this.#primary = primary;
    this.#fallback = new LazyFallback(fallbackFactory);
    this.#logger = logger?.child({ component: "llm-fallback" });
  }

  get name(): string {
    if (this.#state.usingFallback) {
      return `${this.#fallback.get()?.name ?? "fallback"} (fallback)`;
    }
    return this.#primary.name;
  }

  get model(): string {
    return this.#state.usingFallback
      ? this.#fallback.get()?.model ?? this.#primary.model
      : this.#primary.model;
  }

  async generate(
    system: string,
    user: string,
    responseFormat?: ResponseFormat,
  ): Promise<LlmGeneration> {
    let primaryError: unknown;
    try {
      const result = await this.#primary.generate(system, user, responseFormat);
      this.#state.usingFallback = false;
      this.#state.primaryFailures = 0;
      return result;
    } catch (error) {
      primaryError = error;
      this.#state.primaryFailures += 1;
    }

    const fallback = this.#fallback.get();
    if (!fallback) {
      throw primaryError;
    }

    this.#logger?.warn(
      { provider: this.#primary.name, err: errorMessage(primaryError) },
      "Primary LLM failed; using fallback",
    );
    this.#state.fallbackInvocations += 1;

    try {
      const result = await fallback.generate(system, user, responseFormat);
      this.#state.usingFallback = true;
      return {
        text: result.text,
        metadata: {
          ...result.metadata,
          fallbackUsed: true,
          originalProvider: this.#primary.name,
          originalError: errorMessage(primaryError),
        },
      };
    } catch (fallbackError) {
      throw new ProviderError(
        this.#primary.name,
        "both_failed",
        `primary failed (${errorMessage(primaryError)}); fallback ${fallback.name} failed (${errorMessage(fallbackError)})`,
        { cause: fallbackError },
      );
    }
  }

  stats(): FallbackStats {
    return { provider: this.#primary.name, ...this.#state };
  }

  resetFallbackState(): void {
    this.#state = initialState();
  }
}

export class FallbackEmbeddingProvider implements EmbeddingProvider {
  #primary: EmbeddingProvider;
  #fallback: LazyFallback<EmbeddingProvider>;
  #state = initialState();
  #logger?: AppLogger;

  constructor(
    primary: EmbeddingProvider,
    fallbackFactory?: () => EmbeddingProvider | undefined,
    logger?: AppLogger,
  ) {
    this.#primary = primary;
    this.#fallback = new LazyFallback(fallbackFactory);
    this.#logger = logger?.child({ component: "embedding-fallback" });
  }

  get name(): string {
    if (this.#state.usingFallback) {
      return `${this.#fallback.get()?.name ?? "fallback"} (fallback)`;
    }
    return this.#primary.name;
  }

  get model(): string {
    return this.#state.usingFallback
      ? this.#fallback.get()?.model ?? this.#primary.model
      : this.#primary.model;
  }

  async embed(text: string): Promise<number[]> {
    if (!text.trim()) {
      throw new ProviderError(this.#primary.name, "empty_input", "cannot embed empty text");
    }

    let primaryError: unknown;
    try {
      const vector = await this.#primary.embed(text);
      this.#state.usingFallback = false;
      this.#state.primaryFailures = 0;
      return vector;
    } catch (error) {
      primaryError = error;
      this.#state.primaryFailures += 1;
    }

    const fallback = this.#fallback.get();
    if (!fallback) {
      throw primaryError;
    }

    this.#logger?.warn(
      { provider: this.#primary.name, err: errorMessage(primaryError) },
      "Primary embedding provider failed; using fallback",
    );
    this.#state.fallbackInvocations += 1;

    try {
      const vector = await fallback.embed(text);
      this.#state.usingFallback = true;
      return vector;
    } catch (fallbackError) {
      throw new ProviderError(
        this.#primary.name,
        "both_failed",
        `primary failed (${errorMessage(primaryError)}); fallback ${fallback.name} failed (${errorMessage(fallbackError)})`,
        { cause: fallbackError },
      );
    }
  }

  stats(): FallbackStats {
    return { provider: this.#primary.name, ...this.#state };
  }

  resetFallbackState(): void {
    this.#state = initialState();
  }
}
