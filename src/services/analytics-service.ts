import type { AppLogger } from "../logging";
import type { EntityRepository } from "../repositories/entity-repository";
import type { MemoryRepository } from "../repositories/memory-repository";
import type { OntologyRepository } from "../repositories/ontology-repository";
import type { MemoryRecord } from "../schemas/memory";
import type { CachedEmbeddingProvider } from "./embedding";
import { errorMessage } from "./errors";
import type { IdResolver } from "./resolution/id-resolver";
import type { DefaultSearchService } from "./search-service";
import {
  type AnalyticsService,
  type AnalyticsStats,
  type ReportingProvider,
  type StoreStats,
  reportProvider,
} from "./types";

export interface AnalyticsServiceDependencies {
  memoryRepository: MemoryRepository;
  entityRepository: EntityRepository;
  ontologyRepository: OntologyRepository;
  resolver: IdResolver;
  embeddingCache: CachedEmbeddingProvider;
  search: DefaultSearchService;
  embeddingProvider: ReportingProvider;
  llm?: ReportingProvider;
  logger?: AppLogger;
}

const DEFAULT_LIST_LIMIT = 100;

export class DefaultAnalyticsService implements AnalyticsService {
  #deps: AnalyticsServiceDependencies;
  #logger?: AppLogger;

  constructor(deps: AnalyticsServiceDependencies) {
    this.#deps = deps;
    this.#logger = deps.logger?.child({ component: "analytics" });
  }

  async getStats(): Promise<AnalyticsStats> {
    const counts = await this.#counts();
    return {
      ...counts,
      cache: {
        idResolver: this.#deps.resolver.stats(),
        embedding: this.#deps.embeddingCache.stats(),
        search: this.#deps.search.stats(),
      },
      providers: {
        llm: this.#deps.llm ? reportProvider(this.#deps.llm) : null,
        embedding: reportProvider(this.#deps.embeddingProvider),
      },
    };
  }

  async getAllMemories(request: { userId: string; limit?: number }): Promise<MemoryRecord[]> {
    return this.#deps.memoryRepository.listMemories(
      request.userId,
      request.limit ?? DEFAULT_LIST_LIMIT,
    );
  }

  /**
   * A count the store fails to report is 0.
   */
  async #counts(): Promise<StoreStats> {
    const [memories, entities, concepts] = await Promise.allSettled([
      this.#deps.memoryRepository.countMemories(),
      this.#deps.entityRepository.countEntities(),
      this.#deps.ontologyRepository.countConcepts(),
    ]);
    const read = (name: string, result: PromiseSettledResult<number>): number => {
      if (result.status === "fulfilled") {
        return result.value;
      }
      this.#logger?.warn({ count: name, err: errorMessage(result.reason) }, "Count query failed");
      return 0;
    };
    return {
      memories: read("memories", memories),
      entities: read("entities", entities),
      concepts: read("concepts", concepts),
    };
  }
}
