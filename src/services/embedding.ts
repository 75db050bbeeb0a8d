import { createHash } from "node:crypto";
import { TtlCache, type CacheStats } from "../cache/ttl-cache";
import { ProviderError } from "./errors";
import type { EmbeddingProvider } from "./types";

export interface EmbeddingCacheOptions {
  maxSize: number;
  ttlMs: number;
  now?: () => number;
}

function hashText(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}

/**
 * Deduplicates embedding calls on exact text. Eviction is by insertion age, not
 * by recency of use.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  #provider: EmbeddingProvider;
  #cache: TtlCache<string, number[]>;

  constructor(provider: EmbeddingProvider, options: EmbeddingCacheOptions) {
    this.#provider = provider;
    this.#cache = new TtlCache({
      maxSize: options.maxSize,
      ttlMs: options.ttlMs,
      touchOnGet: false,
      now: options.now,
    });
  }

  get name(): string {
    return this.#provider.name;
  }

  get model(): string {
    return this.#provider.model;
  }

  async embed(text: string): Promise<number[]> {
    if (!text.trim()) {
      throw new ProviderError(this.#provider.name, "empty_input", "cannot embed empty text");
    }

    const key = hashText(text);
    const cached = this.#cache.get(key);
    if (cached) {
      return cached;
    }

    const vector = await this.#provider.embed(text);
    this.#cache.set(key, vector);
    return vector;
  }

  prune(): number {
    return this.#cache.prune();
  }

  clear(): void {
    this.#cache.clear();
  }

  stats(): CacheStats {
    return this.#cache.stats();
  }
}
