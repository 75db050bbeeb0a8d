import type { AppLogger } from "../logging";
import type { DeletionRepository } from "../repositories/deletion-repository";
import type { MemoryRepository } from "../repositories/memory-repository";
import type { MemoryRecord } from "../schemas/memory";
import { DeletionError, OmcError, errorMessage } from "./errors";
import type { IdResolver } from "./resolution/id-resolver";
import { type Clock, systemClock } from "./types";

export type DeletionStrategy = "soft" | "hard" | "cascade";

export interface DeletionResult {
  memoryId: string;
  strategy: DeletionStrategy;
  success: boolean;
  deletedBy: string;
  deletedAt: string;
  reason?: string;
  edgesAffected: number;
}

export interface RestoreResult {
  memoryId: string;
  success: boolean;
  restoredBy: string;
  restoredAt: string;
}

export interface CleanupStats {
  orphanedEntities: number;
  orphanedEdges: number;
  deletedEntities: number;
  deletedEdges: number;
  dryRun: boolean;
}

export interface DeletionServiceDependencies {
  deletionRepository: DeletionRepository;
  memoryRepository: MemoryRepository;
  resolver: IdResolver;
  logger?: AppLogger;
  now?: Clock;
}

/**
 * Soft delete, restore, irreversible hard delete and orphan cleanup. Hard
 * deletions are remembered for the life of the process so a later restore
 * reports `cannot_restore` rather than a plain miss.
 */
export class DeletionService {
  #deletions: DeletionRepository;
  #memories: MemoryRepository;
  #resolver: IdResolver;
  #logger?: AppLogger;
  #now: Clock;
  #hardDeleted = new Set<string>();

  constructor(deps: DeletionServiceDependencies) {
    this.#deletions = deps.deletionRepository;
    this.#memories = deps.memoryRepository;
    this.#resolver = deps.resolver;
    this.#logger = deps.logger?.child({ component: "deletion" });
    this.#now = deps.now ?? systemClock;
  }

  async delete(
    memoryId: string,
    deletedBy: string,
    strategy: DeletionStrategy,
    reason?: string,
  ): Promise<DeletionResult> {
    switch (strategy) {
      case "soft":
        return this.softDelete(memoryId, deletedBy, reason);
      case "hard":
        return this.hardDelete(memoryId, deletedBy, false);
      case "cascade":
        return this.hardDelete(memoryId, deletedBy, true);
    }
  }

  async softDelete(memoryId: string, deletedBy: string, reason?: string): Promise<DeletionResult> {
    const memory = await this.#load(memoryId);
    if (memory.isDeleted) {
      throw new DeletionError("already_deleted", `Memory already deleted: ${memoryId}`, {
        memoryId,
      });
    }

    const deletedAt = this.#now().toISOString();
    await this.#guard(memoryId, () =>
      this.#deletions.softDelete({
        memoryId,
        deletedBy,
        deletedAt,
        reason: reason ?? "",
      }),
    );
    this.#logger?.info({ memoryId, deletedBy }, "Memory soft-deleted");

    return {
      memoryId,
      strategy: "soft",
      success: true,
      deletedBy,
      deletedAt,
      reason,
      edgesAffected: 0,
    };
  }

  async undelete(memoryId: string, restoredBy: string): Promise<RestoreResult> {
    if (this.#hardDeleted.has(memoryId)) {
      throw new DeletionError(
        "cannot_restore",
        `Cannot restore hard-deleted memory: ${memoryId}`,
        { memoryId },
      );
    }

    const memory = await this.#load(memoryId);
    if (!memory.isDeleted) {
      throw new DeletionError("cannot_restore", `Memory is not deleted: ${memoryId}`, {
        memoryId,
      });
    }

    const restoredAt = this.#now().toISOString();
    await this.#guard(memoryId, () =>
      this.#deletions.restore({ memoryId, restoredBy, restoredAt }),
    );
    this.#logger?.info({ memoryId, restoredBy }, "Memory restored");

    return { memoryId, success: true, restoredBy, restoredAt };
  }

  /**
   * Irreversible. With `cascade`, every incident edge is removed before the node.
   */
  async hardDelete(memoryId: string, deletedBy: string, cascade: boolean): Promise<DeletionResult> {
    await this.#load(memoryId);
    this.#logger?.warn({ memoryId, deletedBy, cascade }, "Hard delete requested");

    const edgesAffected = cascade ? await this.#deleteEdges(memoryId) : 0;

    const removed = await this.#guard(memoryId, () => this.#deletions.hardDelete(memoryId));
    if (!removed) {
      throw new DeletionError("database", `Hard delete failed for memory ${memoryId}`, {
        memoryId,
      });
    }

    this.#hardDeleted.add(memoryId);
    this.#resolver.invalidate(memoryId);
    this.#logger?.info({ memoryId, edgesAffected }, "Memory hard-deleted");

    return {
      memoryId,
      strategy: cascade ? "cascade" : "hard",
      success: true,
      deletedBy,
      deletedAt: this.#now().toISOString(),
      reason: "Hard delete requested",
      edgesAffected,
    };
  }

  async cleanupOrphans(dryRun: boolean): Promise<CleanupStats> {
    this.#logger?.info({ dryRun }, "Starting orphan cleanup");
    const stats: CleanupStats = {
      orphanedEntities: 0,
      orphanedEdges: 0,
      deletedEntities: 0,
      deletedEdges: 0,
      dryRun,
    };

    const entities = await this.#guard(undefined, () => this.#deletions.findOrphanedEntities());
    stats.orphanedEntities = entities.length;
    if (entities.length > 0 && !dryRun) {
      stats.deletedEntities = await this.#guard(undefined, () =>
        this.#deletions.deleteEntities(entities),
      );
    }

    const edges = await this.#guard(undefined, () => this.#deletions.findOrphanedEdges());
    stats.orphanedEdges = edges.length;
    if (edges.length > 0 && !dryRun) {
      stats.deletedEdges = await this.#guard(undefined, () =>
        this.#deletions.deleteEdgesBatch(edges),
      );
    }

    this.#logger?.info(stats, "Orphan cleanup completed");
    return stats;
  }

  async #load(memoryId: string): Promise<MemoryRecord> {
    const memory = await this.#guard(memoryId, () => this.#memories.getMemory(memoryId));
    if (!memory) {
      throw new DeletionError("not_found", `Memory not found: ${memoryId}`, { memoryId });
    }
    return memory;
  }

  async #deleteEdges(memoryId: string): Promise<number> {
    const count = await this.#deletions.countEdges(memoryId).catch((error: unknown) => {
      this.#logger?.warn({ memoryId, err: errorMessage(error) }, "Could not count edges");
      return 0;
    });
    if (count === 0) {
      return 0;
    }

    const removed = await this.#guard(memoryId, () => this.#deletions.deleteEdges(memoryId));
    if (!removed) {
      throw new DeletionError("database", `Failed to delete edges for memory ${memoryId}`, {
        memoryId,
      });
    }
    return count;
  }

  async #guard<T>(memoryId: string | undefined, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof OmcError) {
        throw error;
      }
      this.#logger?.error({ memoryId, err: errorMessage(error) }, "Deletion store call failed");
      throw new DeletionError("database", errorMessage(error), { memoryId, cause: error });
    }
  }
}
