import type { CacheStats } from "../cache/ttl-cache";
import type { JobStatus } from "../jobs/status-store";
import type { MemoryOperation } from "../schemas/llm";
import type {
  Concept,
  ConceptMatch,
  ContextDef,
  EntityRecord,
  ExtractedEntity,
} from "../schemas/knowledge";
import type { MemoryRecord, MemoryType, TextChunk } from "../schemas/memory";
import type {
  ChainSearchResult,
  OntoSearchResult,
  SearchMode,
  SearchResult,
} from "../schemas/search";
import type { CleanupStats, DeletionResult, RestoreResult } from "./deletion-service";
import type { EvolutionResult } from "./evolution-service";
import type { ResolutionStats } from "./resolution/id-resolver";
import type { RetrievalResult } from "./retrieval-service";
import type { ChainMode } from "./search/chain-search";
import type { TraversalStats } from "./search/smart-traversal";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export type ResponseFormat = "text" | "json_object";

export interface LlmMetadata {
  provider: string;
  model: string;
  baseUrl?: string;
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
  fallbackUsed: boolean;
  originalProvider?: string;
  originalError?: string;
}

export interface LlmGeneration {
  text: string;
  metadata: LlmMetadata;
}

export interface LlmProvider {
  readonly name: string;
  readonly model: string;
  generate(
    system: string,
    user: string,
    responseFormat?: ResponseFormat,
  ): Promise<LlmGeneration>;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

export interface FallbackStats {
  provider: string;
  usingFallback: boolean;
  primaryFailures: number;
  fallbackInvocations: number;
}

export interface EntityExtractor {
  extract(text: string): Promise<ExtractedEntity[]>;
}

export interface TextSplitter {
  split(text: string): TextChunk[];
}

export type EntityLink =
  | { kind: "extracted"; confidence: number; method?: string }
  | { kind: "mentions"; salience: number; sentiment?: string };

export interface EntityService {
  createEntity(
    name: string,
    entityType: string,
    properties?: Record<string, unknown>,
  ): Promise<EntityRecord>;
  getEntity(entityId: string): Promise<EntityRecord | undefined>;
  getOrCreateEntity(
    name: string,
    entityType: string,
    properties?: Record<string, unknown>,
  ): Promise<EntityRecord>;
  linkToMemory(entityId: string, internalMemoryId: string, link: EntityLink): Promise<void>;
  getEntitiesForMemory(memoryId: string): Promise<EntityRecord[]>;
  searchEntities(query: string, limit?: number): Promise<EntityRecord[]>;
}

export interface OntologyService {
  readonly isLoaded: boolean;
  load(): Promise<void>;
  ensureLoaded(): Promise<boolean>;
  getConcept(conceptId: string): Concept | undefined;
  listConcepts(): Concept[];
  getSubtypes(conceptId: string): Concept[];
  getAncestors(conceptId: string): Concept[];
  classify(text: string, minConfidence?: number): ConceptMatch[];
  linkMemoryToConcepts(
    internalMemoryId: string,
    content: string,
    memoryType: MemoryType,
  ): Promise<{ instanceOf: string[]; categories: string[]; failed: number }>;
}

export interface ContextService {
  createContext(name: string, properties?: Record<string, unknown>): Promise<ContextDef>;
  getContext(contextId: string): Promise<ContextDef | undefined>;
  getContextByName(name: string): Promise<ContextDef | undefined>;
  linkMemoryToContext(
    internalMemoryId: string,
    contextId: string,
    priority: number,
  ): Promise<boolean>;
  activateContext(userId: string, contextId: string): void;
  deactivateContext(userId: string, contextId: string): boolean;
  getActiveContexts(userId: string): string[];
  filterByContext(memories: MemoryRecord[], userId: string): MemoryRecord[];
  calculateContextRelevance(memory: MemoryRecord, userId: string): number;
}

export interface SearchService {
  search(request: {
    vector: number[];
    userId?: string;
    mode: SearchMode;
    limit?: number;
    temporalDays?: number;
    graphDepth?: number;
  }): Promise<SearchResult[]>;
  clearCache(): void;
}

export interface AddMemoryRequest {
  message: string;
  userId: string;
  agentId?: string;
  contextTags?: string[];
  metadata?: Record<string, unknown>;
}

export interface MemoryOperationRecord {
  operation: MemoryOperation;
  content: string;
  memoryId?: string;
  targetMemoryId?: string;
  confidence: number;
  reasoning: string;
}

export interface AddMemoryResult {
  memoriesAdded: number;
  memoriesUpdated: number;
  memoriesDeleted: number;
  memoriesSuperseded: number;
  contradictions: number;
  skipped: number;
  entitiesExtracted: number;
  relationsCreated: number;
  chunksCreated: number;
  memoryIds: string[];
  operations: MemoryOperationRecord[];
}

export interface SearchMemoryRequest {
  query: string;
  userId: string;
  limit?: number;
  mode?: string;
  temporalDays?: number;
  graphDepth?: number;
}

export interface UpdateMemoryRequest {
  memoryId: string;
  newContent: string;
  userId: string;
}

export interface DeleteMemoryRequest {
  memoryId: string;
  userId: string;
  hard?: boolean;
  cascade?: boolean;
  reason?: string;
}

export interface ConceptSearchRequest {
  query: string;
  userId: string;
  conceptType?: string;
  tags?: string[];
  mode?: string;
  limit?: number;
}

export interface ReasoningChainRequest {
  query: string;
  userId: string;
  chainMode?: ChainMode;
  maxDepth?: number;
  limit?: number;
}

export interface MemoryGraphRequest {
  userId: string;
  memoryId?: string;
  depth?: number;
  limit?: number;
}

export interface MemoryGraphNode {
  memoryId: string;
  content: string;
  memoryType: string;
  createdAt: string;
}

export interface MemoryGraphEdge {
  from: string;
  to: string;
  relationType: string;
}

export interface MemoryGraph {
  nodes: MemoryGraphNode[];
  edges: MemoryGraphEdge[];
}

export interface RetrieveRequest {
  query: string;
  userId: string;
  depth?: string;
  limit?: number;
  includeReasoning?: boolean;
  includeEntities?: boolean;
}

export interface MemoryView extends MemoryRecord {
  chunkCount: number;
}

export interface MemoryService {
  addMemory(request: AddMemoryRequest): Promise<AddMemoryResult>;
  searchMemory(request: SearchMemoryRequest): Promise<SearchResult[]>;
  updateMemory(request: UpdateMemoryRequest): Promise<EvolutionResult>;
  getMemory(memoryId: string): Promise<MemoryView | undefined>;
  deleteMemory(request: DeleteMemoryRequest): Promise<DeletionResult>;
  undeleteMemory(memoryId: string, userId: string): Promise<RestoreResult>;
  searchByConcept(request: ConceptSearchRequest): Promise<OntoSearchResult[]>;
  searchReasoningChain(request: ReasoningChainRequest): Promise<ChainSearchResult>;
  getMemoryGraph(request: MemoryGraphRequest): Promise<MemoryGraph>;
  retrieve(request: RetrieveRequest): Promise<RetrievalResult>;
  cleanupOrphans(dryRun: boolean): Promise<CleanupStats>;
}

export interface StoreStats {
  memories: number;
  entities: number;
  concepts: number;
}

/**
 * A provider as seen by status reporting. Providers wrapped for fallback
 * expose their fallback state.
 */
export interface ReportingProvider {
  readonly name: string;
  readonly model: string;
  stats?(): FallbackStats;
}

export interface ProviderReport {
  name: string;
  model: string;
  fallback?: FallbackStats;
}

export interface AnalyticsStats extends StoreStats {
  cache: {
    idResolver: ResolutionStats;
    embedding: CacheStats;
    search: TraversalStats;
  };
  providers: {
    llm: ProviderReport | null;
    embedding: ProviderReport;
  };
}

export interface AnalyticsService {
  getStats(): Promise<AnalyticsStats>;
  getAllMemories(request: { userId: string; limit?: number }): Promise<MemoryRecord[]>;
}

export interface SystemServiceStatus {
  env: string;
  logLevel: string;
  store: {
    ok: boolean;
    baseUrl: string;
    instance: string;
  };
  providers: {
    llm: ProviderReport | null;
    embedding: ProviderReport;
  };
  resolver: ResolutionStats;
  traversal: TraversalStats;
  ontology: { loaded: boolean; concepts: number };
  jobs: JobStatus[];
}

export interface SystemService {
  status(): Promise<SystemServiceStatus>;
}

export interface ServiceRegistry {
  memory: MemoryService;
  search: SearchService;
  entities: EntityService;
  ontology: OntologyService;
  contexts: ContextService;
  analytics: AnalyticsService;
  system: SystemService;
}

export function reportProvider(provider: ReportingProvider): ProviderReport {
  return { name: provider.name, model: provider.model, fallback: provider.stats?.() };
}
