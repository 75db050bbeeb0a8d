import type { AppLogger } from "../../logging";
import type { ReasoningRepository } from "../../repositories/reasoning-repository";
import { errorMessage } from "../errors";
import { type Clock, systemClock } from "../types";

export interface CopySummary {
  copied: number;
  failed: number;
}

/**
 * Carries the outgoing IMPLIES, BECAUSE and RELATES_TO edges of a superseded
 * memory over to its successor.
 */
export class RelationCopier {
  #repository: ReasoningRepository;
  #logger?: AppLogger;
  #now: Clock;

  constructor(repository: ReasoningRepository, logger?: AppLogger, now: Clock = systemClock) {
    this.#repository = repository;
    this.#logger = logger?.child({ component: "relation-copier" });
    this.#now = now;
  }

  /**
   * @param oldMemoryId external id of the superseded memory
   * @param newInternalId store-internal id of its successor
   */
  async copyOutgoing(oldMemoryId: string, newInternalId: string): Promise<CopySummary> {
    const summary: CopySummary = { copied: 0, failed: 0 };
    const outgoing = await this.#repository.getOutgoingRelations(oldMemoryId);
    const reasoningId = `copied_from_${oldMemoryId}`;

    const attempt = async (write: () => Promise<void>, target: string) => {
      try {
        await write();
        summary.copied += 1;
      } catch (error) {
        summary.failed += 1;
        this.#logger?.warn(
          { oldMemoryId, target, err: errorMessage(error) },
          "Failed to copy relation",
        );
      }
    };

    for (const edge of outgoing.implies_out) {
      await attempt(
        () =>
          this.#repository.addImplication(newInternalId, edge.id, edge.probability ?? 80, reasoningId),
        edge.memory_id,
      );
    }
    for (const edge of outgoing.because_out) {
      await attempt(
        () => this.#repository.addCausation(newInternalId, edge.id, edge.strength ?? 80, reasoningId),
        edge.memory_id,
      );
    }
    for (const edge of outgoing.relations_out) {
      await attempt(
        () =>
          this.#repository.addRelation(
            newInternalId,
            edge.id,
            edge.relation_type ?? "related",
            edge.strength ?? 50,
            this.#now().toISOString(),
            { copied_from: oldMemoryId },
          ),
        edge.memory_id,
      );
    }

    if (summary.copied > 0 || summary.failed > 0) {
      this.#logger?.info({ oldMemoryId, ...summary }, "Copied relations to successor");
    }
    return summary;
  }
}
