import { loadConfig, type Config } from "./config";
import { HelixStoreClient, type QueryExecutor } from "./database/client";
import { JobStatusStore } from "./jobs/status-store";
import { createLogger, type AppLogger } from "./logging";
import { ContextRepository } from "./repositories/context-repository";
import { DeletionRepository } from "./repositories/deletion-repository";
import { EntityRepository } from "./repositories/entity-repository";
import { MemoryRepository } from "./repositories/memory-repository";
import { OntologyRepository } from "./repositories/ontology-repository";
import { ReasoningRepository } from "./repositories/reasoning-repository";
import { UserRepository } from "./repositories/user-repository";
import { DefaultAnalyticsService } from "./services/analytics-service";
import { ChunkingService } from "./services/chunking/chunking-service";
import { ChunkLinkBuilder } from "./services/chunking/link-builder";
import { createSplitter } from "./services/chunking/splitter";
import { DefaultContextService } from "./services/context-service";
import { DeletionService } from "./services/deletion-service";
import { CachedEmbeddingProvider } from "./services/embedding";
import { CompromiseEntityExtractor, DefaultEntityService } from "./services/entity-service";
import { ConfigurationError, errorMessage } from "./services/errors";
import { EventBus } from "./services/events";
import { EvolutionService } from "./services/evolution-service";
import { MemoryIntegrator } from "./services/integration/integrator";
import { RelationWriter } from "./services/integration/relation-writer";
import { SimilarFinder } from "./services/integration/similar-finder";
import { DecisionEngine } from "./services/llm/decision-engine";
import { LlmExtractor } from "./services/llm/extractor";
import { MemoryCrud } from "./services/memory-crud";
import { DefaultMemoryService } from "./services/memory-service";
import { DefaultOntologyService } from "./services/ontology-service";
import { RemarkService } from "./services/remark-service";
import { createEmbeddingProvider, createLlmProvider } from "./services/providers/factory";
import { IdResolver } from "./services/resolution/id-resolver";
import { RetrievalService } from "./services/retrieval-service";
import { DefaultSearchService } from "./services/search-service";
import { ChainSearch } from "./services/search/chain-search";
import { OntoSearch } from "./services/search/onto-search";
import { QueryProcessor } from "./services/search/query-processor";
import { SmartTraversal } from "./services/search/smart-traversal";
import { DefaultSystemService } from "./services/system-service";
import {
  type Clock,
  type EmbeddingProvider,
  type LlmProvider,
  type ReportingProvider,
  type ServiceRegistry,
  systemClock,
} from "./services/types";

export interface RepositoryRegistry {
  memory: MemoryRepository;
  users: UserRepository;
  reasoning: ReasoningRepository;
  entities: EntityRepository;
  ontology: OntologyRepository;
  contexts: ContextRepository;
  deletion: DeletionRepository;
}

export interface CacheRegistry {
  resolver: IdResolver;
  embeddings: CachedEmbeddingProvider;
  search: DefaultSearchService;
}

export interface AppContainer {
  config: Config;
  logger: AppLogger;
  client: QueryExecutor;
  repositories: RepositoryRegistry;
  services: ServiceRegistry;
  caches: CacheRegistry;
  deletion: DeletionService;
  remark: RemarkService;
  jobStatuses: JobStatusStore;
  shutdown: () => Promise<void>;
}

export interface CreateContainerOptions {
  config?: Config;
  logger?: AppLogger;
  /** Store client; defaults to an HTTP client for `config.store`. */
  client?: QueryExecutor;
  /** `null` runs without an LLM; `undefined` builds one from `config.llm`. */
  llm?: (LlmProvider & ReportingProvider) | null;
  embeddingProvider?: EmbeddingProvider & ReportingProvider;
  now?: Clock;
}

export async function createAppContainer(
  options: CreateContainerOptions = {},
): Promise<AppContainer> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config);
  const now = options.now ?? systemClock;
  const clock = () => now().getTime();

  const client =
    options.client ??
    new HelixStoreClient({
      host: config.store.host,
      port: config.store.port,
      timeoutMs: config.store.timeoutMs,
      maxRetries: config.store.maxRetries,
      logger,
    });

  const repositories: RepositoryRegistry = {
    memory: new MemoryRepository(client),
    users: new UserRepository(client),
    reasoning: new ReasoningRepository(client),
    entities: new EntityRepository(client),
    ontology: new OntologyRepository(client),
    contexts: new ContextRepository(client),
    deletion: new DeletionRepository(client),
  };

  const llm = options.llm === undefined ? buildLlm(config, logger) : options.llm ?? undefined;
  const embeddingProvider = options.embeddingProvider ?? createEmbeddingProvider(config, logger);
  const embeddings = new CachedEmbeddingProvider(embeddingProvider, {
    maxSize: config.cache.embedding.maxSize,
    ttlMs: config.cache.embedding.ttlMs,
    now: clock,
  });

  const resolver = new IdResolver(repositories.memory, {
    maxSize: config.cache.idResolver.maxSize,
    ttlMs: config.cache.idResolver.ttlMs,
    maxParallel: config.resolver.maxParallel,
    retryAttempts: config.resolver.retryAttempts,
    retryDelayMs: config.resolver.retryDelayMs,
    now: clock,
    logger,
  });

  const bus = new EventBus(logger);
  const linkBuilder = new ChunkLinkBuilder(repositories.memory, bus, logger);
  const detachLinkBuilder = linkBuilder.attach();
  const chunking = new ChunkingService({
    config: config.chunking,
    memoryRepository: repositories.memory,
    resolver,
    splitter: createSplitter(config.chunking.strategy, {
      chunkSize: config.chunking.chunkSize,
      overlap: config.chunking.chunkOverlap,
      minSentencesPerChunk: config.chunking.minSentencesPerChunk,
    }),
    bus,
    embeddings,
    logger,
    now,
  });

  const entities = new DefaultEntityService({
    repository: repositories.entities,
    cacheSize: config.cache.entityMaxSize,
    logger,
  });
  const ontology = new DefaultOntologyService({ repository: repositories.ontology, logger });
  const contexts = new DefaultContextService({ repository: repositories.contexts, logger, now });

  const deletion = new DeletionService({
    deletionRepository: repositories.deletion,
    memoryRepository: repositories.memory,
    resolver,
    logger,
    now,
  });
  const evolution = new EvolutionService({
    memoryRepository: repositories.memory,
    reasoningRepository: repositories.reasoning,
    resolver,
    deletion,
    logger,
    now,
  });

  const relations = new RelationWriter(repositories.reasoning, logger, now);
  const crud = new MemoryCrud({
    memoryRepository: repositories.memory,
    userRepository: repositories.users,
    resolver,
    defaults: {
      certainty: config.search.defaultCertainty,
      importance: config.search.defaultImportance,
    },
    logger,
    now,
  });
  const integrator = new MemoryIntegrator({
    finder: new SimilarFinder(repositories.memory, {
      similarityThreshold: config.integration.similarityThreshold,
      maxSimilar: config.integration.maxSimilar,
      logger,
      now,
    }),
    engine: new DecisionEngine(llm, {
      duplicateThreshold: config.integration.duplicateThreshold,
      logger,
    }),
    crud,
    evolution,
    relations,
    resolver,
    relatesToThreshold: config.integration.relatesToThreshold,
    logger,
  });

  const traversal = new SmartTraversal(repositories.memory, repositories.reasoning, {
    cacheSize: config.cache.search.maxSize,
    cacheTtlMs: config.cache.search.ttlMs,
    logger,
    now,
  });
  const search = new DefaultSearchService({
    traversal,
    onto: new OntoSearch(traversal, repositories.ontology, {
      queryProcessor: new QueryProcessor({
        enableExpansion: config.search.queryExpansion,
        maxExpansions: config.search.maxQueryExpansions,
      }),
      defaultMode: config.search.defaultMode,
      logger,
      now,
    }),
    chains: new ChainSearch(repositories.memory, repositories.reasoning, logger, now),
    logger,
    now,
  });
  const retrieval = new RetrievalService({
    search,
    memoryRepository: repositories.memory,
    reasoningRepository: repositories.reasoning,
    entities,
    chunkOverlap: config.chunking.chunkOverlap,
    logger,
  });

  const extractor = llm ? new LlmExtractor(llm, logger) : undefined;
  const entityExtractor = llm ? undefined : new CompromiseEntityExtractor();

  const memory = new DefaultMemoryService({
    memoryRepository: repositories.memory,
    reasoningRepository: repositories.reasoning,
    embeddings,
    integrator,
    relations,
    entities,
    ontology,
    chunking,
    search,
    retrieval,
    evolution,
    deletion,
    resolver,
    searchDefaults: { limit: config.search.defaultLimit, mode: config.search.defaultMode },
    extractor,
    entityExtractor,
    logger,
    now,
  });

  const remark = new RemarkService({
    memoryRepository: repositories.memory,
    ontologyRepository: repositories.ontology,
    entities,
    ontology,
    extractor,
    entityExtractor,
    batchPauseMs: config.jobs.remarkPauseMs,
    logger,
    now,
  });

  const jobStatuses = new JobStatusStore();

  const services: ServiceRegistry = {
    memory,
    search,
    entities,
    ontology,
    contexts,
    analytics: new DefaultAnalyticsService({
      memoryRepository: repositories.memory,
      entityRepository: repositories.entities,
      ontologyRepository: repositories.ontology,
      resolver,
      embeddingCache: embeddings,
      search,
      embeddingProvider,
      llm,
      logger,
    }),
    system: new DefaultSystemService({
      config,
      client,
      resolver,
      search,
      ontology,
      embeddingProvider,
      llm,
      jobs: jobStatuses,
    }),
  };

  return {
    config,
    logger,
    client,
    repositories,
    services,
    caches: { resolver, embeddings, search },
    deletion,
    remark,
    jobStatuses,
    shutdown: async () => {
      detachLinkBuilder();
      resolver.clear();
      embeddings.clear();
      search.clearCache();
      logger.info("Container shut down");
    },
  };
}

/**
 * A missing API key disables the LLM; extraction and near-duplicate review
 * then fall back to their defaults.
 */
function buildLlm(
  config: Config,
  logger: AppLogger,
): (LlmProvider & ReportingProvider) | undefined {
  try {
    return createLlmProvider(config, logger);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.warn({ err: errorMessage(error) }, "LLM disabled");
      return undefined;
    }
    throw error;
  }
}
