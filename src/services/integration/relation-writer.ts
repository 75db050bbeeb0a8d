import type { AppLogger } from "../../logging";
import type { ReasoningRepository } from "../../repositories/reasoning-repository";
import { truncate } from "../../utils/text";
import { errorMessage } from "../errors";
import { type Clock, systemClock } from "../types";

export const REASONING_RELATION_TYPES = [
  "IMPLIES",
  "BECAUSE",
  "CONTRADICTS",
  "SUPPORTS",
  "REFUTES",
  "RELATES_TO",
] as const;
export type ReasoningRelationType = (typeof REASONING_RELATION_TYPES)[number];

/**
 * Maps free-form relation labels (LLM output, stored edge labels) onto the
 * known types; anything unrecognised is a plain RELATES_TO.
 */
export function toRelationType(value: string): ReasoningRelationType {
  const normalized = value.trim().toUpperCase().replace(/[\s-]+/g, "_");
  switch (normalized) {
    case "IMPLIES":
    case "BECAUSE":
    case "CONTRADICTS":
    case "SUPPORTS":
    case "REFUTES":
      return normalized;
    default:
      return "RELATES_TO";
  }
}

export interface RelationSpec {
  /** Store-internal id of the target memory. */
  targetId: string;
  relationType: ReasoningRelationType;
  /** 0..100 */
  confidence: number;
  reasoning: string;
  metadata?: Record<string, unknown>;
}

export interface RelationWriteSummary {
  created: number;
  failed: number;
}

/**
 * Writes typed reasoning edges from one memory. A failed edge is logged and
 * counted; it never fails the batch.
 */
export class RelationWriter {
  #repository: ReasoningRepository;
  #logger?: AppLogger;
  #now: Clock;

  constructor(repository: ReasoningRepository, logger?: AppLogger, now: Clock = systemClock) {
    this.#repository = repository;
    this.#logger = logger?.child({ component: "relation-writer" });
    this.#now = now;
  }

  async writeRelations(sourceId: string, relations: RelationSpec[]): Promise<RelationWriteSummary> {
    const summary: RelationWriteSummary = { created: 0, failed: 0 };
    for (const relation of relations) {
      try {
        await this.writeRelation(sourceId, relation);
        summary.created += 1;
      } catch (error) {
        summary.failed += 1;
        this.#logger?.warn(
          {
            sourceId,
            targetId: relation.targetId,
            relationType: relation.relationType,
            err: errorMessage(error),
          },
          "Failed to create relation",
        );
      }
    }
    return summary;
  }

  async writeRelation(sourceId: string, relation: RelationSpec): Promise<void> {
    const confidence = Math.round(Math.min(100, Math.max(0, relation.confidence)));
    const reasoning = truncate(relation.reasoning, 255);

    switch (relation.relationType) {
      case "IMPLIES":
        await this.#repository.addImplication(sourceId, relation.targetId, confidence, reasoning);
        break;
      case "BECAUSE":
        await this.#repository.addCausation(sourceId, relation.targetId, confidence, reasoning);
        break;
      case "CONTRADICTS":
        await this.#repository.addContradiction(sourceId, relation.targetId, {
          resolution: "",
          resolved: false,
          strategy: reasoning,
          confidence,
        });
        break;
      default:
        await this.#repository.addRelation(
          sourceId,
          relation.targetId,
          relation.relationType,
          confidence,
          this.#now().toISOString(),
          relation.metadata ?? { reasoning },
        );
    }

    this.#logger?.debug(
      { sourceId, targetId: relation.targetId, relationType: relation.relationType },
      "Created relation",
    );
  }
}
