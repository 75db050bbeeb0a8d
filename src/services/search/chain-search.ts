import type { AppLogger } from "../../logging";
import type { MemoryRepository } from "../../repositories/memory-repository";
import type { ReasoningRepository } from "../../repositories/reasoning-repository";
import type {
  ChainDirection,
  ChainNode,
  ChainRelationType,
  ChainSearchResult,
  MemoryChain,
} from "../../schemas/search";
import type { ConnectionField, LogicalConnections, MemoryHit } from "../../schemas/store";
import { errorMessage } from "../errors";
import { type Clock, systemClock } from "../types";
import { type HitFilter, isVisible, uniqueHits } from "./graph";

export interface MemoryChainConfig {
  maxDepth: number;
  direction: ChainDirection;
  relationTypes: ChainRelationType[];
  /** 0..1, compared against the certainty of each reached memory. */
  minConfidence: number;
  includeContradictions: boolean;
}

export const CHAIN_PRESETS = {
  both: {
    maxDepth: 5,
    direction: "both",
    relationTypes: ["IMPLIES", "BECAUSE"],
    minConfidence: 0.5,
    includeContradictions: false,
  },
  causal: {
    maxDepth: 5,
    direction: "backward",
    relationTypes: ["BECAUSE"],
    minConfidence: 0.5,
    includeContradictions: false,
  },
  forward: {
    maxDepth: 5,
    direction: "forward",
    relationTypes: ["IMPLIES"],
    minConfidence: 0.5,
    includeContradictions: false,
  },
  deep: {
    maxDepth: 7,
    direction: "both",
    relationTypes: ["IMPLIES", "BECAUSE", "CONTRADICTS", "SUPPORTS", "REFUTES"],
    minConfidence: 0.3,
    includeContradictions: true,
  },
} satisfies Record<string, MemoryChainConfig>;

export type ChainMode = keyof typeof CHAIN_PRESETS;

export const CHAIN_MODES = ["both", "causal", "forward", "deep"] as const satisfies readonly ChainMode[];

export function parseChainMode(value: string | undefined): ChainMode {
  const mode = value?.trim().toLowerCase();
  return CHAIN_MODES.find((candidate) => candidate === mode) ?? "both";
}

export function chainPreset(mode: ChainMode): MemoryChainConfig {
  const preset: MemoryChainConfig = CHAIN_PRESETS[mode];
  return { ...preset, relationTypes: [...preset.relationTypes] };
}

export interface ChainEdge {
  field: ConnectionField;
  relationType: ChainRelationType;
  edgeDirection: "out" | "in";
}

/*
 * Forward walks from premises toward consequences; backward walks toward
 * causes. "A BECAUSE B" is stored as A→B, so its outgoing side is backward.
 */
const FORWARD_EDGES: ChainEdge[] = [
  { field: "implies_out", relationType: "IMPLIES", edgeDirection: "out" },
  { field: "because_in", relationType: "BECAUSE", edgeDirection: "in" },
  { field: "contradicts_out", relationType: "CONTRADICTS", edgeDirection: "out" },
  { field: "supports_out", relationType: "SUPPORTS", edgeDirection: "out" },
  { field: "refutes_out", relationType: "REFUTES", edgeDirection: "out" },
];

const BACKWARD_EDGES: ChainEdge[] = [
  { field: "implies_in", relationType: "IMPLIES", edgeDirection: "in" },
  { field: "because_out", relationType: "BECAUSE", edgeDirection: "out" },
  { field: "contradicts_in", relationType: "CONTRADICTS", edgeDirection: "in" },
  { field: "supports_in", relationType: "SUPPORTS", edgeDirection: "in" },
  { field: "refutes_in", relationType: "REFUTES", edgeDirection: "in" },
];

export function edgesFor(config: MemoryChainConfig): ChainEdge[] {
  const candidates =
    config.direction === "forward"
      ? FORWARD_EDGES
      : config.direction === "backward"
        ? BACKWARD_EDGES
        : [...FORWARD_EDGES, ...BACKWARD_EDGES];

  return candidates.filter(
    (edge) =>
      config.relationTypes.includes(edge.relationType) &&
      (edge.relationType !== "CONTRADICTS" || config.includeContradictions),
  );
}

export interface ChainSearchRequest {
  query: string;
  vector: number[];
  userId?: string;
  limit: number;
  config: MemoryChainConfig;
}

/**
 * Seeds with a vector search, then follows typed reasoning edges depth-first
 * from each seed. Only seeds that reach at least one other memory form a chain.
 */
export class ChainSearch {
  #memories: MemoryRepository;
  #reasoning: ReasoningRepository;
  #logger?: AppLogger;
  #now: Clock;

  constructor(
    memories: MemoryRepository,
    reasoning: ReasoningRepository,
    logger?: AppLogger,
    now: Clock = systemClock,
  ) {
    this.#memories = memories;
    this.#reasoning = reasoning;
    this.#logger = logger?.child({ component: "chain-search" });
    this.#now = now;
  }

  async search(request: ChainSearchRequest): Promise<ChainSearchResult> {
    const filter: HitFilter = { userId: request.userId, now: this.#now() };

    let seeds: MemoryHit[];
    try {
      const hits = await this.#memories.vectorSearch(request.vector, request.limit);
      seeds = uniqueHits(hits.memories, hits.parentMemories)
        .filter((hit) => isVisible(hit, filter))
        .slice(0, request.limit);
    } catch (error) {
      this.#logger?.error({ err: errorMessage(error) }, "Chain seed search failed");
      return buildChainResult(request.query, []);
    }

    const edges = edgesFor(request.config);
    const chains: MemoryChain[] = [];
    for (const seed of seeds) {
      const chain = await this.buildChain(seed, edges, request.config, filter);
      if (chain.nodes.length > 1) {
        chains.push(chain);
      }
    }

    chains.sort(
      (left, right) =>
        right.nodes.length - left.nodes.length || right.totalDepth - left.totalDepth,
    );

    const result = buildChainResult(request.query, chains);
    this.#logger?.info(
      {
        chains: result.totalChains,
        memories: result.totalMemories,
        deepest: result.deepestChain,
      },
      "Chain search completed",
    );
    return result;
  }

  async buildChain(
    seed: MemoryHit,
    edges: ChainEdge[],
    config: MemoryChainConfig,
    filter: HitFilter,
  ): Promise<MemoryChain> {
    const chain: MemoryChain = {
      seedId: seed.memory_id,
      nodes: [
        {
          memoryId: seed.memory_id,
          content: seed.content,
          memoryType: seed.memory_type,
          depth: 0,
        },
      ],
      totalDepth: 0,
    };
    const visited = new Set([seed.memory_id]);
    await this.#expand(chain, seed.memory_id, 1, edges, config, filter, visited);
    return chain;
  }

  async #expand(
    chain: MemoryChain,
    memoryId: string,
    depth: number,
    edges: ChainEdge[],
    config: MemoryChainConfig,
    filter: HitFilter,
    visited: Set<string>,
  ): Promise<void> {
    if (depth > config.maxDepth || edges.length === 0) {
      return;
    }

    let connections: LogicalConnections;
    try {
      connections = await this.#reasoning.getLogicalConnections(memoryId);
    } catch (error) {
      this.#logger?.debug({ memoryId, err: errorMessage(error) }, "No connections for node");
      return;
    }

    for (const edge of edges) {
      for (const hit of connections[edge.field]) {
        if (visited.has(hit.memory_id) || !isVisible(hit, filter)) {
          continue;
        }
        if ((hit.certainty ?? 100) / 100 < config.minConfidence) {
          continue;
        }
        visited.add(hit.memory_id);

        const node: ChainNode = {
          memoryId: hit.memory_id,
          content: hit.content,
          memoryType: hit.memory_type,
          depth,
          relationType: edge.relationType,
          edgeDirection: edge.edgeDirection,
        };
        chain.nodes.push(node);
        chain.totalDepth = Math.max(chain.totalDepth, depth);

        await this.#expand(chain, hit.memory_id, depth + 1, edges, config, filter, visited);
      }
    }
  }
}

export function buildChainResult(query: string, chains: MemoryChain[]): ChainSearchResult {
  const memories = new Map<string, ChainNode>();
  for (const chain of chains) {
    for (const node of chain.nodes) {
      if (!memories.has(node.memoryId)) {
        memories.set(node.memoryId, node);
      }
    }
  }

  return {
    query,
    chains,
    totalChains: chains.length,
    totalMemories: memories.size,
    deepestChain: chains.reduce((max, chain) => Math.max(max, chain.totalDepth), 0),
    memories: Array.from(memories.values()),
  };
}
