import type { QueryExecutor } from "../database/client";
import {
  BooleanResultSchema,
  CountResponseSchema,
  DeletedCountSchema,
  OrphanedEdgesSchema,
  OrphanedEntitiesSchema,
} from "../schemas/store";
import { BaseRepository } from "./base";
import type { RestoreRow, SoftDeleteRow } from "./types";

export class DeletionRepository extends BaseRepository {
  constructor(client: QueryExecutor) {
    super(client);
  }

  async softDelete(row: SoftDeleteRow): Promise<void> {
    await this.command("softDeleteMemory", {
      memory_id: row.memoryId,
      deleted_by: row.deletedBy,
      deleted_at: row.deletedAt,
      reason: row.reason,
    });
  }

  async restore(row: RestoreRow): Promise<void> {
    await this.command("restoreMemory", {
      memory_id: row.memoryId,
      restored_by: row.restoredBy,
      restored_at: row.restoredAt,
    });
  }

  async hardDelete(memoryId: string): Promise<boolean> {
    return this.query("hardDeleteMemory", { memory_id: memoryId }, BooleanResultSchema);
  }

  async deleteEdges(memoryId: string): Promise<boolean> {
    return this.query("deleteMemoryEdges", { memory_id: memoryId }, BooleanResultSchema);
  }

  async countEdges(memoryId: string): Promise<number> {
    const response = await this.query(
      "getMemoryEdgeCount",
      { memory_id: memoryId },
      CountResponseSchema,
    );
    return response.count;
  }

  async findOrphanedEntities(): Promise<string[]> {
    const response = await this.query("findOrphanedEntities", {}, OrphanedEntitiesSchema);
    return response.entity_ids;
  }

  async findOrphanedEdges(): Promise<string[]> {
    const response = await this.query("findOrphanedEdges", {}, OrphanedEdgesSchema);
    return response.edge_ids;
  }

  async deleteEntities(entityIds: string[]): Promise<number> {
    const response = await this.query(
      "deleteEntitiesBatch",
      { entity_ids: entityIds },
      DeletedCountSchema,
    );
    return response.deleted_count;
  }

  async deleteEdgesBatch(edgeIds: string[]): Promise<number> {
    const response = await this.query(
      "deleteEdgesBatch",
      { edge_ids: edgeIds },
      DeletedCountSchema,
    );
    return response.deleted_count;
  }
}
