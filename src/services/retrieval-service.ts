import type { AppLogger } from "../logging";
import type { MemoryRepository } from "../repositories/memory-repository";
import type { ReasoningRepository } from "../repositories/reasoning-repository";
import type { MemoryRecord } from "../schemas/memory";
import type { SearchMode, SearchResult } from "../schemas/search";
import { stripOverlap } from "../utils/text";
import { errorMessage } from "./errors";
import type { DefaultSearchService } from "./search-service";
import type { EntityService } from "./types";

export type RetrievalDepth = "shallow" | "medium" | "deep";

const DEPTH_MODES: Record<RetrievalDepth, SearchMode> = {
  shallow: "recent",
  medium: "contextual",
  deep: "deep",
};

const REASONING_DEPTH: Record<RetrievalDepth, number> = {
  shallow: 1,
  medium: 1,
  deep: 2,
};

export function parseRetrievalDepth(value: string | undefined): RetrievalDepth {
  const normalized = value?.trim().toLowerCase();
  return normalized === "shallow" || normalized === "deep" ? normalized : "medium";
}

export interface RetrievalRequest {
  query: string;
  vector: number[];
  userId?: string;
  depth: RetrievalDepth;
  limit: number;
  includeReasoning: boolean;
  includeEntities: boolean;
}

export interface RetrievedMemory extends SearchResult {
  chunkCount: number;
}

export interface ReasoningLink {
  fromMemoryId: string;
  toMemoryId: string;
  relationType: string;
  strength: number;
}

export interface EntityRef {
  entityId: string;
  name: string;
  entityType: string;
}

export interface RetrievalResult {
  memories: RetrievedMemory[];
  chunksReconstructed: number;
  contextMemories: MemoryRecord[];
  reasoningChains: ReasoningLink[];
  entities: EntityRef[];
  metadata: {
    query: string;
    depth: RetrievalDepth;
    mode: SearchMode;
    totalResults: number;
    durationMs: number;
  };
}

export interface RetrievalServiceDependencies {
  search: DefaultSearchService;
  memoryRepository: MemoryRepository;
  reasoningRepository: ReasoningRepository;
  entities: EntityService;
  /** Characters each chunk repeats from its predecessor. */
  chunkOverlap?: number;
  logger?: AppLogger;
}

/**
 * Search → chunk reconstruction → context gathering.
 */
export class RetrievalService {
  #search: DefaultSearchService;
  #memories: MemoryRepository;
  #reasoning: ReasoningRepository;
  #entities: EntityService;
  #chunkOverlap: number;
  #logger?: AppLogger;

  constructor(deps: RetrievalServiceDependencies) {
    this.#search = deps.search;
    this.#memories = deps.memoryRepository;
    this.#reasoning = deps.reasoningRepository;
    this.#entities = deps.entities;
    this.#chunkOverlap = deps.chunkOverlap ?? 0;
    this.#logger = deps.logger?.child({ component: "retrieval" });
  }

  async retrieve(request: RetrievalRequest): Promise<RetrievalResult> {
    const started = performance.now();
    const mode = DEPTH_MODES[request.depth];
    const results = await this.#search.search({
      vector: request.vector,
      userId: request.userId,
      mode,
      limit: request.limit,
    });

    const memories: RetrievedMemory[] = [];
    let chunksReconstructed = 0;
    for (const result of results) {
      const { content, chunkCount } = await this.reconstruct(result.memoryId, result.content);
      chunksReconstructed += chunkCount;
      memories.push({ ...result, content, chunkCount });
    }

    const reasoningChains: ReasoningLink[] = [];
    const entities = new Map<string, EntityRef>();
    for (const memory of memories) {
      if (request.includeReasoning) {
        reasoningChains.push(
          ...(await this.#relations(memory.memoryId, REASONING_DEPTH[request.depth])),
        );
      }
      if (request.includeEntities) {
        for (const entity of await this.#entitiesOf(memory.memoryId)) {
          entities.set(entity.entityId, entity);
        }
      }
    }

    const contextMemories = await this.#contextMemories(memories, reasoningChains);

    this.#logger?.info(
      {
        depth: request.depth,
        results: memories.length,
        chunksReconstructed,
        relations: reasoningChains.length,
      },
      "Retrieval completed",
    );

    return {
      memories,
      chunksReconstructed,
      contextMemories,
      reasoningChains,
      entities: Array.from(entities.values()),
      metadata: {
        query: request.query,
        depth: request.depth,
        mode,
        totalResults: memories.length,
        durationMs: performance.now() - started,
      },
    };
  }

  /**
   * Joins chunk texts in position order with a single space, dropping the
   * overlap each chunk carries from the one before it. Falls back to the
   * stored content when the memory has no chunks or the lookup fails.
   */
  async reconstruct(
    memoryId: string,
    fallback: string,
  ): Promise<{ content: string; chunkCount: number }> {
    try {
      const view = await this.#memories.getMemoryWithChunks(memoryId);
      if (!view.hasChunks || view.chunks.length === 0) {
        return { content: view.content ?? fallback, chunkCount: 0 };
      }
      const chunks = [...view.chunks].sort((left, right) => left.position - right.position);
      const texts = chunks.map((chunk, index) => {
        const previous = chunks[index - 1];
        return previous ? stripOverlap(previous.text, chunk.text, this.#chunkOverlap) : chunk.text;
      });
      return { content: texts.join(" "), chunkCount: chunks.length };
    } catch (error) {
      this.#logger?.warn({ memoryId, err: errorMessage(error) }, "Chunk reconstruction failed");
      return { content: fallback, chunkCount: 0 };
    }
  }

  async #relations(memoryId: string, maxDepth: number): Promise<ReasoningLink[]> {
    try {
      const relations = await this.#reasoning.getReasoningRelations(memoryId, maxDepth);
      return relations.map((relation) => ({
        fromMemoryId: relation.fromId,
        toMemoryId: relation.toId,
        relationType: relation.relationType,
        strength: relation.strength,
      }));
    } catch (error) {
      this.#logger?.debug({ memoryId, err: errorMessage(error) }, "No reasoning relations");
      return [];
    }
  }

  async #entitiesOf(memoryId: string): Promise<EntityRef[]> {
    try {
      const entities = await this.#entities.getEntitiesForMemory(memoryId);
      return entities.map((entity) => ({
        entityId: entity.entityId,
        name: entity.name,
        entityType: entity.entityType,
      }));
    } catch (error) {
      this.#logger?.debug({ memoryId, err: errorMessage(error) }, "No entities for memory");
      return [];
    }
  }

  /**
   * Memories reached through reasoning relations that the search itself did
   * not return; deleted ones are skipped.
   */
  async #contextMemories(
    memories: RetrievedMemory[],
    relations: ReasoningLink[],
  ): Promise<MemoryRecord[]> {
    const known = new Set(memories.map((memory) => memory.memoryId));
    const wanted = new Set<string>();
    for (const relation of relations) {
      for (const memoryId of [relation.fromMemoryId, relation.toMemoryId]) {
        if (!known.has(memoryId)) {
          wanted.add(memoryId);
        }
      }
    }

    const context: MemoryRecord[] = [];
    for (const memoryId of wanted) {
      const memory = await this.#memories.getMemory(memoryId).catch((error: unknown) => {
        this.#logger?.debug({ memoryId, err: errorMessage(error) }, "Context memory lookup failed");
        return undefined;
      });
      if (memory && !memory.isDeleted) {
        context.push(memory);
      }
    }
    return context;
  }
}
