import type { AppLogger } from "../../logging";
import type { MemoryRepository } from "../../repositories/memory-repository";
import type { SimilarMemory } from "../../schemas/llm";
import { isExpired } from "../../schemas/memory";
import type { MemoryHit } from "../../schemas/store";
import { hitSimilarity } from "../search/scoring";
import { type Clock, systemClock } from "../types";

export interface SimilarFinderOptions {
  similarityThreshold: number;
  maxSimilar: number;
  logger?: AppLogger;
  now?: Clock;
}

export interface FindSimilarOptions {
  /** External id of the memory being integrated, excluded from the results. */
  excludeMemoryId?: string;
}

/**
 * Near-neighbour lookup for the integration pipeline. Candidates are scoped to
 * one user; deleted and expired memories never qualify.
 */
export class SimilarFinder {
  #repository: MemoryRepository;
  #threshold: number;
  #maxSimilar: number;
  #logger?: AppLogger;
  #now: Clock;

  constructor(repository: MemoryRepository, options: SimilarFinderOptions) {
    this.#repository = repository;
    this.#threshold = options.similarityThreshold;
    this.#maxSimilar = options.maxSimilar;
    this.#logger = options.logger?.child({ component: "similar-finder" });
    this.#now = options.now ?? systemClock;
  }

  async findSimilar(
    vector: number[],
    userId: string,
    options: FindSimilarOptions = {},
  ): Promise<SimilarMemory[]> {
    const hits = await this.#repository.vectorSearch(vector, this.#maxSimilar * 2);
    const now = this.#now();
    const seen = new Set<string>();
    const candidates: SimilarMemory[] = [];

    for (const hit of [...hits.memories, ...hits.parentMemories]) {
      if (seen.has(hit.memory_id) || !this.#eligible(hit, userId, options, now)) {
        continue;
      }
      seen.add(hit.memory_id);

      const score = hitSimilarity(vector, hit);
      if (score < this.#threshold) {
        continue;
      }
      candidates.push({
        memoryId: hit.memory_id,
        internalId: hit.id,
        content: hit.content,
        score,
        createdAt: hit.created_at || undefined,
      });
    }

    candidates.sort((left, right) => right.score - left.score);
    const similar = candidates.slice(0, this.#maxSimilar);
    this.#logger?.debug(
      { userId, hits: hits.memories.length + hits.parentMemories.length, similar: similar.length },
      "Similar memories found",
    );
    return similar;
  }

  #eligible(hit: MemoryHit, userId: string, options: FindSimilarOptions, now: Date): boolean {
    if (hit.memory_id === options.excludeMemoryId) {
      return false;
    }
    if (hit.user_id !== userId) {
      return false;
    }
    return !hit.is_deleted && !isExpired(hit.valid_until, now);
  }
}
