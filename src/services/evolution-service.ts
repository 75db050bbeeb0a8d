import type { AppLogger } from "../logging";
import type { MemoryRepository } from "../repositories/memory-repository";
import type { ReasoningRepository } from "../repositories/reasoning-repository";
import type { MemoryRecord, StoredMemory } from "../schemas/memory";
import type { DeletionResult, DeletionService, DeletionStrategy } from "./deletion-service";
import { EvolutionError, OmcError, ValidationError, errorMessage } from "./errors";
import { ContradictionDetector } from "./evolution/contradiction-detector";
import { RelationCopier } from "./evolution/relation-copier";
import type { IdResolver } from "./resolution/id-resolver";
import { type Clock, systemClock } from "./types";

export type EvolutionOperation =
  | "supersede"
  | "contradict"
  | "enhance"
  | "update_metadata"
  | "delete";

export interface EvolutionResult {
  success: boolean;
  oldMemoryId: string;
  newMemoryId?: string;
  operation: EvolutionOperation;
  edgeCreated: boolean;
  timestamp: string;
}

export interface SupersedeOptions {
  reason?: string;
  copyRelations?: boolean;
}

export interface EvolutionServiceDependencies {
  memoryRepository: MemoryRepository;
  reasoningRepository: ReasoningRepository;
  resolver: IdResolver;
  deletion: DeletionService;
  detector?: ContradictionDetector;
  copier?: RelationCopier;
  logger?: AppLogger;
  now?: Clock;
}

/**
 * Temporal evolution of memories: supersession, contradiction, in-place
 * enhancement and deletion.
 */
export class EvolutionService {
  #memories: MemoryRepository;
  #reasoning: ReasoningRepository;
  #resolver: IdResolver;
  #deletion: DeletionService;
  #detector: ContradictionDetector;
  #copier: RelationCopier;
  #logger?: AppLogger;
  #now: Clock;

  constructor(deps: EvolutionServiceDependencies) {
    this.#memories = deps.memoryRepository;
    this.#reasoning = deps.reasoningRepository;
    this.#resolver = deps.resolver;
    this.#deletion = deps.deletion;
    this.#logger = deps.logger?.child({ component: "evolution" });
    this.#detector = deps.detector ?? new ContradictionDetector();
    this.#copier = deps.copier ?? new RelationCopier(deps.reasoningRepository, deps.logger, deps.now);
    this.#now = deps.now ?? systemClock;
  }

  /**
   * Closes the old memory's validity at the successor's creation time and
   * writes SUPERSEDES(new → old). When the texts read as a reversal a resolved
   * CONTRADICTS(new → old) is added as well.
   */
  async supersede(
    oldMemoryId: string,
    successor: StoredMemory & { content: string },
    options: SupersedeOptions = {},
  ): Promise<EvolutionResult> {
    if (oldMemoryId === successor.memoryId) {
      throw new ValidationError("A memory cannot supersede itself", "supersedes_memory_id");
    }

    const old = await this.#requireMemory("supersede", oldMemoryId);
    const oldInternalId = await this.#internalId(old);
    const assessment = this.#detector.assess(old.content, successor.content);

    await this.#run("supersede", async () => {
      await this.#memories.updateValidUntil(oldMemoryId, successor.createdAt);
      await this.#reasoning.addSupersession(
        successor.internalId,
        oldInternalId,
        options.reason ?? "content_update",
        successor.createdAt,
        assessment.contradicts,
      );
    });

    if (assessment.contradicts) {
      try {
        await this.#reasoning.addContradiction(successor.internalId, oldInternalId, {
          resolution: "superseded",
          resolved: true,
          strategy: "newer_wins",
          confidence: assessment.confidence,
        });
      } catch (error) {
        this.#logger?.warn(
          { oldMemoryId, newMemoryId: successor.memoryId, err: errorMessage(error) },
          "Failed to record contradiction alongside supersession",
        );
      }
    }

    if (options.copyRelations ?? true) {
      await this.#copier.copyOutgoing(oldMemoryId, successor.internalId).catch((error: unknown) => {
        this.#logger?.warn(
          { oldMemoryId, err: errorMessage(error) },
          "Failed to read relations to copy",
        );
      });
    }

    this.#logger?.info(
      {
        oldMemoryId,
        newMemoryId: successor.memoryId,
        signals: assessment.signals,
      },
      "Memory superseded",
    );
    return this.#result("supersede", oldMemoryId, true, successor.memoryId);
  }

  /**
   * Writes CONTRADICTS in both directions at the same confidence; both memories
   * stay active. A failed direction is logged.
   */
  async contradict(
    first: { memoryId: string; internalId: string },
    second: { memoryId: string; internalId: string },
    confidence: number,
    reasoning = "conflicting_information",
  ): Promise<EvolutionResult> {
    const options = { resolution: "", resolved: false, strategy: reasoning, confidence };
    const outcomes = await Promise.allSettled([
      this.#reasoning.addContradiction(first.internalId, second.internalId, options),
      this.#reasoning.addContradiction(second.internalId, first.internalId, options),
    ]);

    outcomes.forEach((outcome) => {
      if (outcome.status === "rejected") {
        this.#logger?.warn(
          { first: first.memoryId, second: second.memoryId, err: errorMessage(outcome.reason) },
          "Failed to write contradiction edge",
        );
      }
    });

    const edgeCreated = outcomes.every((outcome) => outcome.status === "fulfilled");
    return this.#result("contradict", first.memoryId, edgeCreated, second.memoryId);
  }

  async enhance(memoryId: string, newContent: string): Promise<EvolutionResult> {
    if (!newContent.trim()) {
      throw new ValidationError("Content cannot be empty", "new_content");
    }
    await this.#requireMemory("enhance", memoryId);
    await this.#run("enhance", () =>
      this.#memories.updateContent(memoryId, newContent, this.#now().toISOString()),
    );
    this.#resolver.invalidate(memoryId);
    this.#logger?.debug({ memoryId }, "Memory enhanced");
    return this.#result("enhance", memoryId, false);
  }

  async updateMetadataOnly(
    memoryId: string,
    fields: { certainty?: number; importance?: number },
  ): Promise<EvolutionResult> {
    const memory = await this.#requireMemory("update_metadata", memoryId);
    const internalId = await this.#internalId(memory);
    await this.#run("update_metadata", () =>
      this.#memories.updateById(internalId, {
        content: memory.content,
        certainty: fields.certainty ?? memory.certainty,
        importance: fields.importance ?? memory.importance,
        updatedAt: this.#now().toISOString(),
      }),
    );
    return this.#result("update_metadata", memoryId, false);
  }

  async delete(
    memoryId: string,
    deletedBy: string,
    strategy: DeletionStrategy = "soft",
    reason?: string,
  ): Promise<DeletionResult> {
    return this.#deletion.delete(memoryId, deletedBy, strategy, reason);
  }

  async #requireMemory(operation: EvolutionOperation, memoryId: string): Promise<MemoryRecord> {
    const memory = await this.#run(operation, () => this.#memories.getMemory(memoryId));
    if (!memory) {
      throw new EvolutionError(operation, `Memory not found: ${memoryId}`);
    }
    return memory;
  }

  async #internalId(memory: MemoryRecord): Promise<string> {
    if (memory.internalId) {
      this.#resolver.remember(memory.memoryId, memory.internalId);
      return memory.internalId;
    }
    return this.#resolver.resolve(memory.memoryId);
  }

  async #run<T>(operation: EvolutionOperation, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof OmcError) {
        throw error;
      }
      throw new EvolutionError(operation, `${operation} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  #result(
    operation: EvolutionOperation,
    oldMemoryId: string,
    edgeCreated: boolean,
    newMemoryId?: string,
  ): EvolutionResult {
    return {
      success: true,
      oldMemoryId,
      newMemoryId,
      operation,
      edgeCreated,
      timestamp: this.#now().toISOString(),
    };
  }
}
