import type { QueryExecutor } from "../database/client";
import {
  LogicalConnectionsSchema,
  OutgoingRelationsSchema,
  ReasoningRelationsResponseSchema,
  type LogicalConnections,
  type OutgoingRelations,
} from "../schemas/store";
import { BaseRepository } from "./base";

export interface ReasoningRelationRow {
  fromId: string;
  toId: string;
  relationType: string;
  strength: number;
}

/**
 * Memory-to-memory reasoning edges. Edge writers take store-internal ids;
 * traversal reads take external memory ids.
 */
export class ReasoningRepository extends BaseRepository {
  constructor(client: QueryExecutor) {
    super(client);
  }

  async getLogicalConnections(memoryId: string): Promise<LogicalConnections> {
    return this.query(
      "getMemoryLogicalConnections",
      { memory_id: memoryId },
      LogicalConnectionsSchema,
    );
  }

  async getOutgoingRelations(memoryId: string): Promise<OutgoingRelations> {
    return this.query(
      "getMemoryOutgoingRelations",
      { memory_id: memoryId },
      OutgoingRelationsSchema,
    );
  }

  async getReasoningRelations(
    memoryId: string,
    maxDepth: number,
  ): Promise<ReasoningRelationRow[]> {
    const response = await this.query(
      "getMemoryReasoningRelations",
      { memory_id: memoryId, max_depth: maxDepth },
      ReasoningRelationsResponseSchema,
    );
    return response.relations.map((relation) => ({
      fromId: relation.from_id,
      toId: relation.to_id,
      relationType: relation.relation_type,
      strength: relation.strength,
    }));
  }

  async addImplication(
    fromId: string,
    toId: string,
    probability: number,
    reasoningId: string,
  ): Promise<void> {
    await this.command("addMemoryImplication", {
      from_id: fromId,
      to_id: toId,
      probability,
      reasoning_id: reasoningId,
    });
  }

  async addCausation(
    fromId: string,
    toId: string,
    strength: number,
    reasoningId: string,
  ): Promise<void> {
    await this.command("addMemoryCausation", {
      from_id: fromId,
      to_id: toId,
      strength,
      reasoning_id: reasoningId,
    });
  }

  async addContradiction(
    fromId: string,
    toId: string,
    options: { resolution: string; resolved: boolean; strategy: string; confidence: number },
  ): Promise<void> {
    await this.command("addMemoryContradiction", {
      from_id: fromId,
      to_id: toId,
      resolution: options.resolution,
      resolved: options.resolved ? 1 : 0,
      resolution_strategy: options.strategy,
      confidence: options.confidence,
    });
  }

  async addRelation(
    sourceId: string,
    targetId: string,
    relationType: string,
    strength: number,
    createdAt: string,
    metadata: Record<string, unknown> = {},
  ): Promise<void> {
    await this.command("addMemoryRelation", {
      source_id: sourceId,
      target_id: targetId,
      relation_type: relationType,
      strength,
      created_at: createdAt,
      metadata: this.stringifyJson(metadata),
    });
  }

  async addSupersession(
    newId: string,
    oldId: string,
    reason: string,
    supersededAt: string,
    isContradiction: boolean,
  ): Promise<void> {
    await this.command("addMemorySupersession", {
      new_id: newId,
      old_id: oldId,
      reason,
      superseded_at: supersededAt,
      is_contradiction: isContradiction,
    });
  }
}
