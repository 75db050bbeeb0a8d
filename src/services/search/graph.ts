import type { ReasoningRepository } from "../../repositories/reasoning-repository";
import { isExpired } from "../../schemas/memory";
import type { ConnectionField, LogicalConnections, MemoryHit } from "../../schemas/store";

/**
 * Traversal weight of each connection list, keyed by direction relative to
 * the node being expanded.
 */
export const EDGE_WEIGHTS: Record<ConnectionField, number> = {
  implies_out: 0.9,
  implies_in: 0.8,
  because_out: 0.95,
  because_in: 0.85,
  contradicts_out: 0.5,
  contradicts_in: 0.5,
  supports_out: 0.8,
  supports_in: 0.7,
  refutes_out: 0.5,
  refutes_in: 0.4,
  relation_out: 0.7,
  relation_in: 0.6,
};

export const CONNECTION_FIELDS = Object.keys(EDGE_WEIGHTS).filter(
  (field): field is ConnectionField => field in EDGE_WEIGHTS,
);

export interface Neighbor {
  hit: MemoryHit;
  field: ConnectionField;
  weight: number;
}

export interface HitFilter {
  userId?: string;
  now: Date;
  cutoff?: Date;
}

/**
 * Default-search visibility: owned by the user (when one is given), not
 * deleted, not expired and not older than the cutoff.
 */
export function isVisible(hit: MemoryHit, filter: HitFilter): boolean {
  if (filter.userId !== undefined && hit.user_id !== filter.userId) {
    return false;
  }
  if (hit.is_deleted || isExpired(hit.valid_until, filter.now)) {
    return false;
  }
  if (filter.cutoff) {
    const created = Date.parse(hit.created_at);
    if (Number.isFinite(created) && created < filter.cutoff.getTime()) {
      return false;
    }
  }
  return true;
}

/**
 * Re-applies the time-dependent part of {@link isVisible} to a ranked result,
 * for lists computed under an earlier clock.
 */
export function isStillVisible(
  result: { createdAt: string; validUntil?: string | null },
  now: Date,
  cutoff?: Date,
): boolean {
  if (isExpired(result.validUntil, now)) {
    return false;
  }
  if (cutoff) {
    const created = Date.parse(result.createdAt);
    if (Number.isFinite(created) && created < cutoff.getTime()) {
      return false;
    }
  }
  return true;
}

/**
 * Merges `memories` and `parent_memories` of a vector search, first hit wins.
 */
export function uniqueHits(...lists: MemoryHit[][]): MemoryHit[] {
  const seen = new Set<string>();
  const hits: MemoryHit[] = [];
  for (const hit of lists.flat()) {
    if (!seen.has(hit.memory_id)) {
      seen.add(hit.memory_id);
      hits.push(hit);
    }
  }
  return hits;
}

export function neighborsOf(
  connections: LogicalConnections,
  fields: readonly ConnectionField[] = CONNECTION_FIELDS,
): Neighbor[] {
  return fields.flatMap((field) =>
    connections[field].map((hit) => ({ hit, field, weight: EDGE_WEIGHTS[field] })),
  );
}

export async function loadNeighbors(
  repository: ReasoningRepository,
  memoryId: string,
  fields?: readonly ConnectionField[],
): Promise<Neighbor[]> {
  return neighborsOf(await repository.getLogicalConnections(memoryId), fields);
}
