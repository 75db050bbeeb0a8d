import type { AppLogger } from "../logging";
import type {
  ChainSearchResult,
  OntoSearchResult,
  SearchMode,
  SearchResult,
} from "../schemas/search";
import type { ChainSearch, ChainSearchRequest } from "./search/chain-search";
import { searchModeSettings, temporalCutoff, vectorTopKFor } from "./search/modes";
import type { OntoSearch, OntoSearchRequest } from "./search/onto-search";
import type { SmartTraversal, TraversalStats } from "./search/smart-traversal";
import { type Clock, type SearchService, systemClock } from "./types";

export interface SearchServiceDependencies {
  traversal: SmartTraversal;
  onto: OntoSearch;
  chains: ChainSearch;
  logger?: AppLogger;
  now?: Clock;
}

export interface VectorSearchRequest {
  vector: number[];
  userId?: string;
  mode: SearchMode;
  limit?: number;
  /** Overrides the mode's temporal window. */
  temporalDays?: number;
  graphDepth?: number;
}

export class DefaultSearchService implements SearchService {
  #traversal: SmartTraversal;
  #onto: OntoSearch;
  #chains: ChainSearch;
  #logger?: AppLogger;
  #now: Clock;

  constructor(deps: SearchServiceDependencies) {
    this.#traversal = deps.traversal;
    this.#onto = deps.onto;
    this.#chains = deps.chains;
    this.#logger = deps.logger?.child({ component: "search" });
    this.#now = deps.now ?? systemClock;
  }

  async search(request: VectorSearchRequest): Promise<SearchResult[]> {
    const settings = searchModeSettings(request.mode);
    const limit = request.limit ?? settings.defaultLimit;

    const results = await this.#traversal.search({
      vector: request.vector,
      userId: request.userId,
      config: {
        vectorTopK: vectorTopKFor(settings, limit),
        graphDepth: request.graphDepth ?? settings.graphDepth,
        minVectorScore: settings.minVectorScore,
        minCombinedScore: settings.minCombinedScore,
      },
      temporalCutoff: temporalCutoff(settings, this.#now(), request.temporalDays),
      noCache: !settings.useSmartTraversal,
    });

    this.#logger?.debug(
      { mode: request.mode, results: results.length, limit },
      "Search completed",
    );
    return results.slice(0, limit);
  }

  async searchByConcept(request: OntoSearchRequest): Promise<OntoSearchResult[]> {
    return this.#onto.search(request);
  }

  async searchChains(request: ChainSearchRequest): Promise<ChainSearchResult> {
    return this.#chains.search(request);
  }

  clearCache(): void {
    this.#traversal.clearCache();
  }

  pruneCache(): number {
    return this.#traversal.pruneCache();
  }

  stats(): TraversalStats {
    return this.#traversal.stats();
  }
}
