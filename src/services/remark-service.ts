import type { AppLogger } from "../logging";
import type { MemoryRepository } from "../repositories/memory-repository";
import type { OntologyRepository } from "../repositories/ontology-repository";
import type { ExtractedEntity } from "../schemas/knowledge";
import type { MemoryRecord } from "../schemas/memory";
import { errorMessage } from "./errors";
import type { LlmExtractor } from "./llm/extractor";
import { type Clock, type EntityExtractor, type EntityService, type OntologyService, systemClock } from "./types";

export interface RemarkResult {
  memoryId: string;
  entitiesAdded: number;
  conceptsAdded: number;
  success: boolean;
  error?: string;
  durationMs: number;
}

export interface RemarkStats {
  totalProcessed: number;
  totalEntities: number;
  totalConcepts: number;
  failures: number;
  startedAt: string;
  completedAt: string;
  /** Percentage of processed memories that were re-marked without error. */
  successRate: number;
}

export interface RemarkOptions {
  batchSize?: number;
  /** Memories listed per user before the unmarked ones are picked out. */
  limit?: number;
}

export interface RemarkServiceDependencies {
  memoryRepository: MemoryRepository;
  ontologyRepository: OntologyRepository;
  entities: EntityService;
  ontology: OntologyService;
  extractor?: LlmExtractor;
  entityExtractor?: EntityExtractor;
  /** Wait between batches; keeps a long run from saturating the LLM. */
  batchPauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: AppLogger;
  now?: Clock;
}

export const REMARK_ENTITY_CONFIDENCE = 90;
const DEFAULT_BATCH_SIZE = 10;
const DEFAULT_LIMIT = 1000;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Re-runs entity extraction and concept classification over memories that
 * carry neither, typically ones stored while the LLM or ontology was down.
 */
export class RemarkService {
  #deps: RemarkServiceDependencies;
  #sleep: (ms: number) => Promise<void>;
  #logger?: AppLogger;
  #now: Clock;

  constructor(deps: RemarkServiceDependencies) {
    this.#deps = deps;
    this.#sleep = deps.sleep ?? defaultSleep;
    this.#logger = deps.logger?.child({ component: "remark" });
    this.#now = deps.now ?? systemClock;
  }

  async findUnmarked(userId: string, limit = DEFAULT_LIMIT): Promise<MemoryRecord[]> {
    const memories = await this.#deps.memoryRepository.listMemories(userId, limit);
    const unmarked: MemoryRecord[] = [];
    for (const memory of memories) {
      if (memory.isDeleted) {
        continue;
      }
      const concepts = await this.#deps.ontologyRepository.getMemoryConcepts(memory.memoryId);
      if (concepts.instance_of.length > 0 || concepts.belongs_to.length > 0) {
        continue;
      }
      const entities = await this.#deps.entities.getEntitiesForMemory(memory.memoryId);
      if (entities.length === 0) {
        unmarked.push(memory);
      }
    }
    this.#logger?.info(
      { userId, checked: memories.length, unmarked: unmarked.length },
      "Found memories without markup",
    );
    return unmarked;
  }

  async remarkMemory(memory: MemoryRecord): Promise<RemarkResult> {
    const started = this.#now().getTime();
    const result: RemarkResult = {
      memoryId: memory.memoryId,
      entitiesAdded: 0,
      conceptsAdded: 0,
      success: false,
      durationMs: 0,
    };
    const finish = (error?: string): RemarkResult => {
      result.success = error === undefined;
      result.error = error;
      result.durationMs = this.#now().getTime() - started;
      return result;
    };

    const internalId = memory.internalId;
    if (!internalId || !memory.memoryId || !memory.content.trim()) {
      return finish("Memory has no id or content");
    }

    try {
      for (const entity of await this.#extractEntities(memory)) {
        try {
          const record = await this.#deps.entities.getOrCreateEntity(entity.name, entity.type);
          await this.#deps.entities.linkToMemory(record.entityId, internalId, {
            kind: "extracted",
            confidence: REMARK_ENTITY_CONFIDENCE,
            method: "remark",
          });
          result.entitiesAdded += 1;
        } catch (error) {
          this.#logger?.warn(
            { memoryId: memory.memoryId, entity: entity.name, err: errorMessage(error) },
            "Failed to link entity",
          );
        }
      }

      const concepts = await this.#deps.ontology.linkMemoryToConcepts(
        internalId,
        memory.content,
        memory.memoryType,
      );
      result.conceptsAdded = concepts.instanceOf.length + concepts.categories.length;
    } catch (error) {
      return finish(errorMessage(error));
    }
    return finish();
  }

  async remarkBatch(memories: MemoryRecord[], batchSize = DEFAULT_BATCH_SIZE): Promise<RemarkStats> {
    const size = Math.max(1, batchSize);
    const startedAt = this.#now().toISOString();
    const totals = { totalProcessed: 0, totalEntities: 0, totalConcepts: 0, failures: 0 };
    const totalBatches = Math.ceil(memories.length / size);

    for (let batch = 0; batch < totalBatches; batch += 1) {
      const slice = memories.slice(batch * size, (batch + 1) * size);
      this.#logger?.debug(
        { batch: batch + 1, totalBatches, memories: slice.length },
        "Re-marking batch",
      );
      for (const memory of slice) {
        const result = await this.remarkMemory(memory);
        totals.totalProcessed += 1;
        if (result.success) {
          totals.totalEntities += result.entitiesAdded;
          totals.totalConcepts += result.conceptsAdded;
        } else {
          totals.failures += 1;
          this.#logger?.warn({ memoryId: result.memoryId, err: result.error }, "Re-mark failed");
        }
      }
      if (batch + 1 < totalBatches && this.#deps.batchPauseMs) {
        await this.#sleep(this.#deps.batchPauseMs);
      }
    }

    const succeeded = totals.totalProcessed - totals.failures;
    return {
      ...totals,
      startedAt,
      completedAt: this.#now().toISOString(),
      successRate: totals.totalProcessed === 0 ? 0 : (succeeded / totals.totalProcessed) * 100,
    };
  }

  async remarkAll(userId: string, options: RemarkOptions = {}): Promise<RemarkStats> {
    const unmarked = await this.findUnmarked(userId, options.limit ?? DEFAULT_LIMIT);
    const stats = await this.remarkBatch(unmarked, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.#logger?.info({ userId, ...stats }, "Re-mark completed");
    return stats;
  }

  async #extractEntities(memory: MemoryRecord): Promise<ExtractedEntity[]> {
    if (this.#deps.extractor) {
      const extraction = await this.#deps.extractor.extract(memory.content, memory.userId, {
        extractEntities: true,
        extractRelations: false,
      });
      return extraction.entities.map((entity) => ({ name: entity.name, type: entity.type }));
    }
    return this.#deps.entityExtractor ? this.#deps.entityExtractor.extract(memory.content) : [];
  }
}
