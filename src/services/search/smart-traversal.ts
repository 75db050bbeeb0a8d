import { createHash } from "node:crypto";
import { TtlCache } from "../../cache/ttl-cache";
import type { AppLogger } from "../../logging";
import type { MemoryRepository } from "../../repositories/memory-repository";
import type { ReasoningRepository } from "../../repositories/reasoning-repository";
import { toMemoryType } from "../../schemas/memory";
import type { SearchResult } from "../../schemas/search";
import type { ConnectionField, MemoryHit } from "../../schemas/store";
import { errorMessage } from "../errors";
import { type Clock, systemClock } from "../types";
import {
  type HitFilter,
  type Neighbor,
  isStillVisible,
  isVisible,
  loadNeighbors,
  uniqueHits,
} from "./graph";
import { clamp01, hitSimilarity, rescaledCosine, temporalScore } from "./scoring";

export interface TraversalConfig {
  vectorTopK: number;
  graphDepth: number;
  minVectorScore: number;
  minCombinedScore: number;
  edgeTypes?: ConnectionField[];
  temporalDecayDays?: number;
}

export interface TraversalRequest {
  vector: number[];
  userId?: string;
  config: TraversalConfig;
  temporalCutoff?: Date;
  /** Skip the result cache for this call. */
  noCache?: boolean;
}

export interface TraversalStats {
  searches: number;
  cacheHits: number;
  cacheMisses: number;
  cacheHitRate: number;
  cacheSize: number;
  phase1DurationMs: number;
  phase2DurationMs: number;
  phase3DurationMs: number;
  totalDurationMs: number;
}

export interface SmartTraversalOptions {
  cacheSize: number;
  cacheTtlMs: number;
  logger?: AppLogger;
  now?: Clock;
}

const DEFAULT_DECAY_DAYS = 30;

interface CachedSearch {
  results: SearchResult[];
  /** Cutoff the list was computed under, in epoch ms. */
  cutoffMs?: number;
}

export function vectorCombinedScore(vectorScore: number, temporal: number): number {
  return clamp01(vectorScore * 0.7 + temporal * 0.3);
}

export function graphCombinedScore(semantic: number, graph: number, temporal: number): number {
  return clamp01(semantic * 0.3 + graph * 0.5 + temporal * 0.2);
}

/**
 * Keeps the best-scoring entry per memory, drops those under the floor and
 * sorts by combined score.
 */
export function rankAndFilter(results: SearchResult[], minCombinedScore: number): SearchResult[] {
  const best = new Map<string, SearchResult>();
  for (const result of results) {
    const existing = best.get(result.memoryId);
    if (!existing || result.combinedScore > existing.combinedScore) {
      best.set(result.memoryId, result);
    }
  }
  return Array.from(best.values())
    .filter((result) => result.combinedScore >= minCombinedScore)
    .sort((left, right) => right.combinedScore - left.combinedScore);
}

/**
 * Two-phase retrieval: vector hits first, then a breadth-first walk over the
 * reasoning graph from every hit. Final lists are cached per query vector,
 * user, config and cutoff minute; a cached list is filtered again against the
 * caller's clock and cutoff before it is returned.
 */
export class SmartTraversal {
  #memories: MemoryRepository;
  #reasoning: ReasoningRepository;
  #cache: TtlCache<string, CachedSearch>;
  #logger?: AppLogger;
  #now: Clock;
  #stats: TraversalStats = {
    searches: 0,
    cacheHits: 0,
    cacheMisses: 0,
    cacheHitRate: 0,
    cacheSize: 0,
    phase1DurationMs: 0,
    phase2DurationMs: 0,
    phase3DurationMs: 0,
    totalDurationMs: 0,
  };

  constructor(
    memories: MemoryRepository,
    reasoning: ReasoningRepository,
    options: SmartTraversalOptions,
  ) {
    this.#memories = memories;
    this.#reasoning = reasoning;
    this.#cache = new TtlCache({ maxSize: options.cacheSize, ttlMs: options.cacheTtlMs });
    this.#logger = options.logger?.child({ component: "smart-traversal" });
    this.#now = options.now ?? systemClock;
  }

  async search(request: TraversalRequest): Promise<SearchResult[]> {
    this.#stats.searches += 1;
    const key = request.noCache ? undefined : cacheKey(request);
    const now = this.#now();
    if (key) {
      const cached = this.#cache.get(key);
      if (cached && covers(cached, request.temporalCutoff)) {
        this.#stats.cacheHits += 1;
        this.#updateHitRate();
        return cached.results.filter((result) =>
          isStillVisible(result, now, request.temporalCutoff),
        );
      }
      this.#stats.cacheMisses += 1;
      this.#updateHitRate();
    }

    const started = performance.now();
    const filter: HitFilter = { userId: request.userId, now, cutoff: request.temporalCutoff };
    const decayDays = request.config.temporalDecayDays ?? DEFAULT_DECAY_DAYS;

    const seeds = await this.vectorPhase(request.vector, request.config, filter, decayDays);
    const phase1End = performance.now();

    const expanded =
      seeds.length > 0 && request.config.graphDepth > 0
        ? await this.graphPhase(seeds, request.vector, request.config, filter, decayDays)
        : [];
    const phase2End = performance.now();

    const results = rankAndFilter([...seeds, ...expanded], request.config.minCombinedScore);
    const finished = performance.now();

    Object.assign(this.#stats, {
      phase1DurationMs: phase1End - started,
      phase2DurationMs: phase2End - phase1End,
      phase3DurationMs: finished - phase2End,
      totalDurationMs: finished - started,
    });

    if (key) {
      this.#cache.set(key, { results, cutoffMs: request.temporalCutoff?.getTime() });
      this.#stats.cacheSize = this.#cache.size;
    }

    this.#logger?.debug(
      { seeds: seeds.length, expanded: expanded.length, results: results.length },
      "Smart traversal completed",
    );
    return results;
  }

  async vectorPhase(
    vector: number[],
    config: TraversalConfig,
    filter: HitFilter,
    decayDays = DEFAULT_DECAY_DAYS,
  ): Promise<SearchResult[]> {
    const hits = await this.#memories.vectorSearch(vector, config.vectorTopK);
    const results: SearchResult[] = [];

    for (const hit of uniqueHits(hits.memories, hits.parentMemories)) {
      if (!isVisible(hit, filter)) {
        continue;
      }
      const vectorScore = hitSimilarity(vector, hit);
      if (vectorScore < config.minVectorScore) {
        continue;
      }
      const temporal = temporalScore(hit.created_at, filter.now, decayDays);
      results.push(
        toSearchResult(hit, {
          vectorScore,
          graphScore: 0,
          temporalScore: temporal,
          combinedScore: vectorCombinedScore(vectorScore, temporal),
          depth: 0,
          source: "vector",
        }),
      );
    }

    return results;
  }

  async graphPhase(
    seeds: SearchResult[],
    vector: number[],
    config: TraversalConfig,
    filter: HitFilter,
    decayDays = DEFAULT_DECAY_DAYS,
  ): Promise<SearchResult[]> {
    const visited = new Set(seeds.map((seed) => seed.memoryId));
    const expanded: SearchResult[] = [];
    let frontier = seeds;

    for (let depth = 1; depth <= config.graphDepth && frontier.length > 0; depth += 1) {
      const levels = await Promise.all(
        frontier.map((parent) =>
          this.#expandNode(parent, depth, vector, config, filter, decayDays, visited),
        ),
      );
      frontier = levels.flat();
      expanded.push(...frontier);
    }

    return expanded;
  }

  stats(): TraversalStats {
    return { ...this.#stats, cacheSize: this.#cache.size };
  }

  clearCache(): void {
    this.#cache.clear();
    this.#stats.cacheSize = 0;
  }

  pruneCache(): number {
    return this.#cache.prune();
  }

  async #expandNode(
    parent: SearchResult,
    depth: number,
    vector: number[],
    config: TraversalConfig,
    filter: HitFilter,
    decayDays: number,
    visited: Set<string>,
  ): Promise<SearchResult[]> {
    let neighbors: Neighbor[];
    try {
      neighbors = await loadNeighbors(this.#reasoning, parent.memoryId, config.edgeTypes);
    } catch (error) {
      this.#logger?.warn(
        { memoryId: parent.memoryId, err: errorMessage(error) },
        "Graph expansion failed for node",
      );
      return [];
    }

    const results: SearchResult[] = [];
    for (const { hit, field, weight } of neighbors) {
      if (visited.has(hit.memory_id) || !isVisible(hit, filter)) {
        continue;
      }
      visited.add(hit.memory_id);

      const semantic = hit.vector?.length ? rescaledCosine(vector, hit.vector) : 0.5;
      const graphScore = clamp01(weight * parent.combinedScore);
      const temporal = temporalScore(hit.created_at, filter.now, decayDays);
      results.push(
        toSearchResult(hit, {
          vectorScore: semantic,
          graphScore,
          temporalScore: temporal,
          combinedScore: graphCombinedScore(semantic, graphScore, temporal),
          depth,
          source: "graph",
          edgeType: field,
          parentId: parent.memoryId,
        }),
      );
    }
    return results;
  }

  #updateHitRate(): void {
    const lookups = this.#stats.cacheHits + this.#stats.cacheMisses;
    this.#stats.cacheHitRate = lookups === 0 ? 0 : this.#stats.cacheHits / lookups;
  }
}

function toSearchResult(
  hit: MemoryHit,
  scores: Pick<
    SearchResult,
    | "vectorScore"
    | "graphScore"
    | "temporalScore"
    | "combinedScore"
    | "depth"
    | "source"
    | "edgeType"
    | "parentId"
  >,
): SearchResult {
  return {
    memoryId: hit.memory_id,
    content: hit.content,
    memoryType: toMemoryType(hit.memory_type),
    userId: hit.user_id ?? "",
    createdAt: hit.created_at,
    validUntil: hit.valid_until ?? null,
    ...scores,
  };
}

/**
 * A list computed under a later cutoff lacks the older memories an earlier
 * cutoff would admit.
 */
function covers(cached: CachedSearch, cutoff: Date | undefined): boolean {
  if (cached.cutoffMs === undefined) {
    return cutoff === undefined;
  }
  return cutoff !== undefined && cached.cutoffMs <= cutoff.getTime();
}

function cacheKey(request: TraversalRequest): string {
  const hash = createHash("sha256");
  hash.update(Float64Array.from(request.vector));
  hash.update(`|${request.userId ?? ""}`);
  hash.update(`|${JSON.stringify(request.config)}`);
  if (request.temporalCutoff) {
    hash.update(`|${Math.floor(request.temporalCutoff.getTime() / 60_000)}`);
  }
  return hash.digest("hex");
}
