import type { AppLogger } from "../../logging";
import type { MemoryDecision, MemoryOperation, SimilarMemory } from "../../schemas/llm";
import type { NewMemoryInput, StoredMemory } from "../../schemas/memory";
import type { DeletionResult } from "../deletion-service";
import { errorMessage } from "../errors";
import type { EvolutionResult, EvolutionService } from "../evolution-service";
import type { DecisionEngine } from "../llm/decision-engine";
import type { MemoryCrud } from "../memory-crud";
import type { IdResolver } from "../resolution/id-resolver";
import {
  type RelationSpec,
  type RelationWriteSummary,
  type RelationWriter,
  toRelationType,
} from "./relation-writer";
import type { SimilarFinder } from "./similar-finder";

export interface IntegratorDependencies {
  finder: SimilarFinder;
  engine: DecisionEngine;
  crud: MemoryCrud;
  evolution: EvolutionService;
  relations: RelationWriter;
  resolver: IdResolver;
  relatesToThreshold: number;
  logger?: AppLogger;
}

export interface IntegrationRequest {
  memory: NewMemoryInput;
  vector: number[];
  embeddingModel?: string;
}

export interface IntegrationOutcome {
  decision: MemoryDecision;
  /** What was applied; differs from the decision when a missing target forced an ADD. */
  operation: MemoryOperation;
  similar: SimilarMemory[];
  /** Set when a new memory node was written. */
  stored?: StoredMemory;
  /** The existing memory the operation acted on, if any. */
  targetMemoryId?: string;
  evolution?: EvolutionResult;
  deletion?: DeletionResult;
  relations: RelationWriteSummary;
}

/**
 * Find similar → decide → apply, for one memory.
 */
export class MemoryIntegrator {
  #deps: IntegratorDependencies;
  #logger?: AppLogger;

  constructor(deps: IntegratorDependencies) {
    this.#deps = deps;
    this.#logger = deps.logger?.child({ component: "integrator" });
  }

  async integrate(request: IntegrationRequest): Promise<IntegrationOutcome> {
    const { memory } = request;
    const similar = await this.#deps.finder.findSimilar(request.vector, memory.userId, {
      excludeMemoryId: memory.memoryId,
    });
    const decision = await this.#deps.engine.decide(memory.content, similar, memory.userId);
    const outcome: IntegrationOutcome = {
      decision,
      operation: decision.operation,
      similar,
      relations: { created: 0, failed: 0 },
    };

    switch (decision.operation) {
      case "NOOP":
        outcome.targetMemoryId = decision.targetMemoryId ?? similar[0]?.memoryId;
        this.#logger?.info(
          { userId: memory.userId, duplicateOf: outcome.targetMemoryId },
          "Skipped redundant memory",
        );
        return outcome;

      case "UPDATE": {
        const target = this.#target(similar, decision.targetMemoryId);
        if (!target) {
          return this.#add(request, outcome, "UPDATE target not among similar memories");
        }
        outcome.targetMemoryId = target.memoryId;
        outcome.evolution = await this.#deps.evolution.enhance(
          target.memoryId,
          decision.mergedContent ?? memory.content,
        );
        return outcome;
      }

      case "DELETE": {
        const target = this.#target(similar, decision.targetMemoryId);
        if (!target) {
          return this.#add(request, outcome, "DELETE target not among similar memories");
        }
        outcome.targetMemoryId = target.memoryId;
        outcome.deletion = await this.#deps.evolution.delete(
          target.memoryId,
          memory.userId,
          "soft",
          decision.reasoning,
        );
        return outcome;
      }

      case "SUPERSEDE": {
        const target = this.#target(
          similar,
          decision.supersedesMemoryId ?? decision.targetMemoryId,
        );
        if (!target) {
          return this.#add(request, outcome, "SUPERSEDE target not among similar memories");
        }
        const stored = await this.#create(request, outcome);
        outcome.targetMemoryId = target.memoryId;
        outcome.evolution = await this.#deps.evolution.supersede(
          target.memoryId,
          { ...stored, content: memory.content },
          { reason: decision.reasoning || "content_update" },
        );
        outcome.relations = await this.#writeRelations(stored, decision, similar, target.memoryId);
        return outcome;
      }

      case "CONTRADICT": {
        const target = this.#target(
          similar,
          decision.contradictsMemoryId ?? decision.targetMemoryId,
        );
        if (!target) {
          return this.#add(request, outcome, "CONTRADICT target not among similar memories");
        }
        const stored = await this.#create(request, outcome);
        outcome.targetMemoryId = target.memoryId;
        outcome.evolution = await this.#deps.evolution.contradict(
          stored,
          { memoryId: target.memoryId, internalId: await this.#internalIdOf(target) },
          decision.confidence,
          decision.reasoning || "conflicting_information",
        );
        outcome.relations = await this.#writeRelations(stored, decision, similar, target.memoryId);
        return outcome;
      }

      case "ADD":
        return this.#add(request, outcome);
    }
  }

  async #add(
    request: IntegrationRequest,
    outcome: IntegrationOutcome,
    downgradeReason?: string,
  ): Promise<IntegrationOutcome> {
    if (downgradeReason) {
      this.#logger?.warn(
        { operation: outcome.decision.operation, reason: downgradeReason },
        "Falling back to ADD",
      );
      outcome.operation = "ADD";
    }
    const stored = await this.#create(request, outcome);
    outcome.relations = await this.#writeRelations(stored, outcome.decision, outcome.similar);
    return outcome;
  }

  async #create(request: IntegrationRequest, outcome: IntegrationOutcome): Promise<StoredMemory> {
    const stored = await this.#deps.crud.createMemory(request.memory, {
      vector: request.vector,
      embeddingModel: request.embeddingModel,
    });
    outcome.stored = stored;
    return stored;
  }

  /**
   * Relations named by the decision win; without any, every neighbour at or
   * above the RELATES_TO threshold gets a RELATES_TO edge weighted by its
   * similarity.
   */
  async #writeRelations(
    stored: StoredMemory,
    decision: MemoryDecision,
    similar: SimilarMemory[],
    evolvedMemoryId?: string,
  ): Promise<RelationWriteSummary> {
    const specs: RelationSpec[] = [];

    if (decision.relatesTo.length > 0) {
      for (const [memoryId, relationType] of decision.relatesTo) {
        if (memoryId === stored.memoryId) {
          continue;
        }
        const targetId = await this.#resolveTarget(similar, memoryId);
        if (!targetId) {
          continue;
        }
        specs.push({
          targetId,
          relationType: toRelationType(relationType),
          confidence: decision.confidence,
          reasoning: decision.reasoning,
        });
      }
    } else {
      for (const candidate of similar) {
        if (
          candidate.memoryId === evolvedMemoryId ||
          candidate.score < this.#deps.relatesToThreshold
        ) {
          continue;
        }
        const targetId = await this.#resolveTarget(similar, candidate.memoryId);
        if (!targetId) {
          continue;
        }
        specs.push({
          targetId,
          relationType: "RELATES_TO",
          confidence: Math.round(candidate.score * 100),
          reasoning: "semantic_similarity",
          metadata: { similarity: candidate.score },
        });
      }
    }

    if (specs.length === 0) {
      return { created: 0, failed: 0 };
    }
    return this.#deps.relations.writeRelations(stored.internalId, specs);
  }

  #target(similar: SimilarMemory[], memoryId: string | undefined): SimilarMemory | undefined {
    if (memoryId === undefined) {
      return similar[0];
    }
    return similar.find((candidate) => candidate.memoryId === memoryId);
  }

  async #internalIdOf(memory: SimilarMemory): Promise<string> {
    return memory.internalId ?? this.#deps.resolver.resolve(memory.memoryId);
  }

  async #resolveTarget(similar: SimilarMemory[], memoryId: string): Promise<string | undefined> {
    const known = similar.find((candidate) => candidate.memoryId === memoryId);
    try {
      return known ? await this.#internalIdOf(known) : await this.#deps.resolver.resolve(memoryId);
    } catch (error) {
      this.#logger?.warn({ memoryId, err: errorMessage(error) }, "Skipping unresolvable relation target");
      return undefined;
    }
  }
}
