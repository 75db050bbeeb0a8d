import { TtlCache } from "../../cache/ttl-cache";
import type { AppLogger } from "../../logging";
import type { MemoryRepository } from "../../repositories/memory-repository";
import { ResolutionError, errorMessage } from "../errors";
import { Semaphore } from "./semaphore";

export interface IdResolverOptions {
  maxSize: number;
  ttlMs: number;
  maxParallel: number;
  retryAttempts: number;
  retryDelayMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: AppLogger;
}

export interface ResolutionStats {
  hits: number;
  misses: number;
  invalidations: number;
  evictions: number;
  expirations: number;
  size: number;
  maxSize: number;
  hitRate: number;
}

export interface BatchFailure {
  memoryId: string;
  error: string;
}

export interface BatchResult {
  resolved: Map<string, string>;
  failed: BatchFailure[];
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Maps external `memory_id` values to the store's internal node ids behind a
 * bounded LRU with TTL. Mutators call {@link invalidate}.
 */
export class IdResolver {
  #repository: MemoryRepository;
  #cache: TtlCache<string, string>;
  #semaphore: Semaphore;
  #retryAttempts: number;
  #retryDelayMs: number;
  #sleep: (ms: number) => Promise<void>;
  #logger?: AppLogger;
  #invalidations = 0;

  constructor(repository: MemoryRepository, options: IdResolverOptions) {
    this.#repository = repository;
    this.#cache = new TtlCache({
      maxSize: options.maxSize,
      ttlMs: options.ttlMs,
      touchOnGet: true,
      now: options.now,
    });
    this.#semaphore = new Semaphore(options.maxParallel);
    this.#retryAttempts = Math.max(1, options.retryAttempts);
    this.#retryDelayMs = options.retryDelayMs;
    this.#sleep = options.sleep ?? defaultSleep;
    this.#logger = options.logger?.child({ component: "id-resolver" });
  }

  async resolve(memoryId: string): Promise<string> {
    const cached = this.#cache.get(memoryId);
    if (cached) {
      return cached;
    }

    let internalId: string | undefined;
    try {
      const node = await this.#repository.getMemoryNode(memoryId, { noRetry: true });
      internalId = node?.id;
    } catch (error) {
      throw new ResolutionError(
        memoryId,
        "database",
        `Failed to resolve ${memoryId}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (!internalId) {
      throw new ResolutionError(memoryId, "not_found", `Memory not found: ${memoryId}`);
    }

    this.#cache.set(memoryId, internalId);
    return internalId;
  }

  /**
   * Primes the cache with an id the store just issued.
   */
  remember(memoryId: string, internalId: string): void {
    this.#cache.set(memoryId, internalId);
  }

  async resolveMany(
    memoryIds: string[],
    options: { failFast?: boolean } = {},
  ): Promise<BatchResult> {
    const unique = Array.from(new Set(memoryIds));
    if (unique.length < memoryIds.length) {
      this.#logger?.debug(
        { requested: memoryIds.length, unique: unique.length },
        "Deduplicated batch resolution",
      );
    }

    const outcomes = await Promise.all(
      unique.map((memoryId) =>
        this.#semaphore.run<{ memoryId: string; internalId: string } | BatchFailure>(async () => {
          try {
            return { memoryId, internalId: await this.#resolveWithRetry(memoryId) };
          } catch (error) {
            return { memoryId, error: errorMessage(error) };
          }
        }),
      ),
    );

    const resolved = new Map<string, string>();
    const failed: BatchFailure[] = [];
    for (const outcome of outcomes) {
      if ("internalId" in outcome) {
        resolved.set(outcome.memoryId, outcome.internalId);
        continue;
      }
      if (options.failFast) {
        throw new ResolutionError(
          outcome.memoryId,
          "batch_failed",
          `Batch resolution failed for ${outcome.memoryId}: ${outcome.error}`,
        );
      }
      failed.push({ memoryId: outcome.memoryId, error: outcome.error });
    }

    this.#logger?.info(
      { resolved: resolved.size, total: unique.length, failed: failed.length },
      "Batch resolution complete",
    );
    return { resolved, failed };
  }

  invalidate(memoryId: string): void {
    if (this.#cache.delete(memoryId)) {
      this.#invalidations += 1;
    }
  }

  clear(): void {
    this.#cache.clear();
  }

  prune(): number {
    return this.#cache.prune();
  }

  stats(): ResolutionStats {
    const stats = this.#cache.stats();
    return {
      hits: stats.hits,
      misses: stats.misses,
      invalidations: this.#invalidations,
      evictions: stats.evictions,
      expirations: stats.expirations,
      size: stats.size,
      maxSize: stats.maxSize,
      hitRate: stats.hitRate,
    };
  }

  /**
   * A logical miss is final; other failures are retried with a doubling delay.
   */
  async #resolveWithRetry(memoryId: string): Promise<string> {
    let lastError: unknown;
    for (let attempt = 0; attempt < this.#retryAttempts; attempt += 1) {
      try {
        return await this.resolve(memoryId);
      } catch (error) {
        lastError = error;
        if (error instanceof ResolutionError && error.reason === "not_found") {
          throw error;
        }
        if (attempt < this.#retryAttempts - 1) {
          await this.#sleep(this.#retryDelayMs * 2 ** attempt);
        }
      }
    }
    this.#logger?.warn({ memoryId, attempts: this.#retryAttempts }, "Resolution retries exhausted");
    throw lastError;
  }
}
