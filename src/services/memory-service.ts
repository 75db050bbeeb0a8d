import type { AppLogger } from "../logging";
import type { MemoryRepository } from "../repositories/memory-repository";
import type { ReasoningRepository } from "../repositories/reasoning-repository";
import type { ExtractedEntity } from "../schemas/knowledge";
import type { ExtractionResult, MemoryOperation } from "../schemas/llm";
import { type MemoryRecord, type MemoryType, toMemoryType } from "../schemas/memory";
import type { ChainSearchResult, OntoSearchResult, SearchMode, SearchResult } from "../schemas/search";
import type { ChunkingService } from "./chunking/chunking-service";
import type { CleanupStats, DeletionResult, DeletionService, RestoreResult } from "./deletion-service";
import { ValidationError, errorMessage } from "./errors";
import type { EvolutionResult, EvolutionService } from "./evolution-service";
import type { IntegrationOutcome, MemoryIntegrator } from "./integration/integrator";
import { type RelationWriter, toRelationType } from "./integration/relation-writer";
import type { LlmExtractor } from "./llm/extractor";
import type { IdResolver } from "./resolution/id-resolver";
import { type RetrievalResult, type RetrievalService, parseRetrievalDepth } from "./retrieval-service";
import type { DefaultSearchService } from "./search-service";
import { chainPreset, parseChainMode } from "./search/chain-search";
import { loadNeighbors } from "./search/graph";
import { parseSearchMode } from "./search/modes";
import {
  type AddMemoryRequest,
  type AddMemoryResult,
  type Clock,
  type ConceptSearchRequest,
  type DeleteMemoryRequest,
  type EmbeddingProvider,
  type EntityExtractor,
  type EntityService,
  type MemoryGraph,
  type MemoryGraphEdge,
  type MemoryGraphNode,
  type MemoryGraphRequest,
  type MemoryService,
  type MemoryView,
  type OntologyService,
  type ReasoningChainRequest,
  type RetrieveRequest,
  type SearchMemoryRequest,
  type UpdateMemoryRequest,
  systemClock,
} from "./types";

export interface MemoryServiceDependencies {
  memoryRepository: MemoryRepository;
  reasoningRepository: ReasoningRepository;
  embeddings: EmbeddingProvider;
  integrator: MemoryIntegrator;
  relations: RelationWriter;
  entities: EntityService;
  ontology: OntologyService;
  chunking: ChunkingService;
  search: DefaultSearchService;
  retrieval: RetrievalService;
  evolution: EvolutionService;
  deletion: DeletionService;
  resolver: IdResolver;
  /** Applied when a request names no limit or mode. */
  searchDefaults?: { limit: number; mode: SearchMode };
  /** Absent when no LLM is configured; the whole message is then stored as one fact. */
  extractor?: LlmExtractor;
  /** Entity extraction used when there is no LLM extractor. */
  entityExtractor?: EntityExtractor;
  logger?: AppLogger;
  now?: Clock;
}

interface PendingMemory {
  content: string;
  memoryType: MemoryType;
  certainty?: number;
  importance?: number;
  entityNames: string[];
}

const DEFAULT_SEARCH_DEFAULTS = { limit: 10, mode: "recent" } as const;
const DEFAULT_CHAIN_LIMIT = 5;
const DEFAULT_GRAPH_LIMIT = 50;
const NLP_ENTITY_CONFIDENCE = 0.6;

function normalizeContent(content: string): string {
  return content.trim().toLowerCase();
}

function emptyAddResult(): AddMemoryResult {
  return {
    memoriesAdded: 0,
    memoriesUpdated: 0,
    memoriesDeleted: 0,
    memoriesSuperseded: 0,
    contradictions: 0,
    skipped: 0,
    entitiesExtracted: 0,
    relationsCreated: 0,
    chunksCreated: 0,
    memoryIds: [],
    operations: [],
  };
}

function tally(result: AddMemoryResult, operation: MemoryOperation): void {
  switch (operation) {
    case "ADD":
      result.memoriesAdded += 1;
      break;
    case "UPDATE":
      result.memoriesUpdated += 1;
      break;
    case "DELETE":
      result.memoriesDeleted += 1;
      break;
    case "SUPERSEDE":
      result.memoriesSuperseded += 1;
      break;
    case "CONTRADICT":
      result.contradictions += 1;
      break;
    case "NOOP":
      result.skipped += 1;
      break;
  }
}

export class DefaultMemoryService implements MemoryService {
  #deps: MemoryServiceDependencies;
  #defaults: { limit: number; mode: SearchMode };
  #logger?: AppLogger;
  #now: Clock;

  constructor(deps: MemoryServiceDependencies) {
    this.#deps = deps;
    this.#defaults = deps.searchDefaults ?? DEFAULT_SEARCH_DEFAULTS;
    this.#logger = deps.logger?.child({ component: "memory" });
    this.#now = deps.now ?? systemClock;
  }

  /**
   * Extract → embed → integrate, one extracted memory at a time. New memory
   * nodes then get their entities, concepts and chunks.
   */
  async addMemory(request: AddMemoryRequest): Promise<AddMemoryResult> {
    const message = request.message.trim();
    if (!message) {
      throw new ValidationError("Message cannot be empty", "message");
    }

    const extraction = await this.#extract(message, request.userId);
    const pending = this.#pendingMemories(message, extraction);
    const result = emptyAddResult();
    const storedByContent = new Map<string, string>();

    for (const memory of pending) {
      const vector = await this.#deps.embeddings.embed(memory.content);
      const outcome = await this.#deps.integrator.integrate({
        memory: {
          userId: request.userId,
          content: memory.content,
          memoryType: memory.memoryType,
          certainty: memory.certainty,
          importance: memory.importance,
          contextTags: request.contextTags,
          source: request.agentId ?? "user",
          metadata: request.metadata,
        },
        vector,
        embeddingModel: this.#deps.embeddings.model,
      });

      tally(result, outcome.operation);
      result.relationsCreated += outcome.relations.created;
      result.operations.push({
        operation: outcome.operation,
        content: memory.content,
        memoryId: outcome.stored?.memoryId,
        targetMemoryId: outcome.targetMemoryId,
        confidence: outcome.decision.confidence,
        reasoning: outcome.decision.reasoning,
      });

      if (outcome.stored) {
        result.memoryIds.push(outcome.stored.memoryId);
        storedByContent.set(normalizeContent(memory.content), outcome.stored.internalId);
        await this.#enrich(outcome, memory, extraction, result);
      }
    }

    result.relationsCreated += await this.#writeExtractedRelations(extraction, storedByContent);

    if (result.skipped < pending.length) {
      this.#deps.search.clearCache();
    }

    this.#logger?.info(
      {
        userId: request.userId,
        added: result.memoriesAdded,
        updated: result.memoriesUpdated,
        deleted: result.memoriesDeleted,
        superseded: result.memoriesSuperseded,
        contradictions: result.contradictions,
        skipped: result.skipped,
      },
      "Memory integration complete",
    );
    return result;
  }

  async searchMemory(request: SearchMemoryRequest): Promise<SearchResult[]> {
    const vector = await this.#embedQuery(request.query);
    return this.#deps.search.search({
      vector,
      userId: request.userId,
      mode: this.#mode(request.mode),
      limit: request.limit ?? this.#defaults.limit,
      temporalDays: request.temporalDays,
      graphDepth: request.graphDepth,
    });
  }

  async updateMemory(request: UpdateMemoryRequest): Promise<EvolutionResult> {
    const content = request.newContent.trim();
    const memory = await this.#owned(request.memoryId, request.userId);

    const result = await this.#deps.evolution.enhance(memory.memoryId, content);

    try {
      const vector = await this.#deps.embeddings.embed(content);
      const internalId = await this.#deps.resolver.resolve(memory.memoryId);
      await this.#deps.memoryRepository.addMemoryEmbedding(
        internalId,
        vector,
        this.#deps.embeddings.model,
        this.#now().toISOString(),
      );
    } catch (error) {
      this.#logger?.warn(
        { memoryId: memory.memoryId, err: errorMessage(error) },
        "Failed to re-embed updated memory",
      );
    }

    this.#deps.search.clearCache();
    return result;
  }

  async getMemory(memoryId: string): Promise<MemoryView | undefined> {
    const memory = await this.#deps.memoryRepository.getMemory(memoryId);
    if (!memory) {
      return undefined;
    }
    const { content, chunkCount } = await this.#deps.retrieval.reconstruct(
      memoryId,
      memory.content,
    );
    return { ...memory, content, chunkCount };
  }

  async deleteMemory(request: DeleteMemoryRequest): Promise<DeletionResult> {
    const strategy = !request.hard ? "soft" : request.cascade ? "cascade" : "hard";
    const result = await this.#deps.deletion.delete(
      request.memoryId,
      request.userId,
      strategy,
      request.reason,
    );
    this.#deps.search.clearCache();
    return result;
  }

  async undeleteMemory(memoryId: string, userId: string): Promise<RestoreResult> {
    const result = await this.#deps.deletion.undelete(memoryId, userId);
    this.#deps.search.clearCache();
    return result;
  }

  async searchByConcept(request: ConceptSearchRequest): Promise<OntoSearchResult[]> {
    const vector = await this.#embedQuery(request.query);
    return this.#deps.search.searchByConcept({
      query: request.query,
      vector,
      userId: request.userId,
      mode: request.mode === undefined ? undefined : parseSearchMode(request.mode),
      limit: request.limit ?? this.#defaults.limit,
      conceptType: request.conceptType,
      tags: request.tags,
    });
  }

  async searchReasoningChain(request: ReasoningChainRequest): Promise<ChainSearchResult> {
    const config = chainPreset(parseChainMode(request.chainMode));
    if (request.maxDepth !== undefined) {
      config.maxDepth = request.maxDepth;
    }
    const vector = await this.#embedQuery(request.query);
    return this.#deps.search.searchChains({
      query: request.query,
      vector,
      userId: request.userId,
      limit: request.limit ?? DEFAULT_CHAIN_LIMIT,
      config,
    });
  }

  /**
   * Breadth-first over logical connections, from one memory or from the
   * user's memories. Deleted and foreign memories are left out.
   */
  async getMemoryGraph(request: MemoryGraphRequest): Promise<MemoryGraph> {
    const depth = request.depth ?? 1;
    const limit = request.limit ?? DEFAULT_GRAPH_LIMIT;
    const nodes = new Map<string, MemoryGraphNode>();
    const edges = new Map<string, MemoryGraphEdge>();

    const roots = request.memoryId
      ? [await this.#owned(request.memoryId, request.userId)]
      : await this.#deps.memoryRepository.listMemories(request.userId, limit);

    let frontier: string[] = [];
    for (const memory of roots.filter((root) => !root.isDeleted).slice(0, limit)) {
      nodes.set(memory.memoryId, {
        memoryId: memory.memoryId,
        content: memory.content,
        memoryType: memory.memoryType,
        createdAt: memory.createdAt,
      });
      frontier.push(memory.memoryId);
    }

    for (let level = 0; level < depth && frontier.length > 0; level += 1) {
      const next: string[] = [];
      for (const memoryId of frontier) {
        const neighbors = await loadNeighbors(this.#deps.reasoningRepository, memoryId).catch(
          (error: unknown) => {
            this.#logger?.warn({ memoryId, err: errorMessage(error) }, "Neighbour lookup failed");
            return [];
          },
        );
        for (const { hit, field } of neighbors) {
          if (hit.is_deleted || (hit.user_id !== undefined && hit.user_id !== request.userId)) {
            continue;
          }
          if (!nodes.has(hit.memory_id)) {
            if (nodes.size >= limit) {
              continue;
            }
            nodes.set(hit.memory_id, {
              memoryId: hit.memory_id,
              content: hit.content,
              memoryType: hit.memory_type,
              createdAt: hit.created_at,
            });
            next.push(hit.memory_id);
          }
          const relationType = field.slice(0, field.lastIndexOf("_")).toUpperCase();
          const edge: MemoryGraphEdge = field.endsWith("_out")
            ? { from: memoryId, to: hit.memory_id, relationType }
            : { from: hit.memory_id, to: memoryId, relationType };
          edges.set(`${edge.from}|${edge.relationType}|${edge.to}`, edge);
        }
      }
      frontier = next;
    }

    return { nodes: [...nodes.values()], edges: [...edges.values()] };
  }

  async retrieve(request: RetrieveRequest): Promise<RetrievalResult> {
    const vector = await this.#embedQuery(request.query);
    return this.#deps.retrieval.retrieve({
      query: request.query,
      vector,
      userId: request.userId,
      depth: parseRetrievalDepth(request.depth),
      limit: request.limit ?? this.#defaults.limit,
      includeReasoning: request.includeReasoning ?? true,
      includeEntities: request.includeEntities ?? true,
    });
  }

  async cleanupOrphans(dryRun: boolean): Promise<CleanupStats> {
    return this.#deps.deletion.cleanupOrphans(dryRun);
  }

  async #extract(message: string, userId: string): Promise<ExtractionResult | undefined> {
    if (!this.#deps.extractor) {
      return undefined;
    }
    return this.#deps.extractor.extract(message, userId);
  }

  #pendingMemories(message: string, extraction: ExtractionResult | undefined): PendingMemory[] {
    const extracted = (extraction?.memories ?? []).filter((memory) => memory.text.trim());
    if (extracted.length === 0) {
      return [{ content: message, memoryType: "fact", entityNames: [] }];
    }
    return extracted.map((memory) => ({
      content: memory.text.trim(),
      memoryType: toMemoryType(memory.memory_type),
      certainty: memory.certainty,
      importance: memory.importance,
      entityNames: memory.entities,
    }));
  }

  /**
   * Entities, concepts and chunks of a newly stored memory. Failures are logged
   * and leave the memory in place.
   */
  async #enrich(
    outcome: IntegrationOutcome,
    memory: PendingMemory,
    extraction: ExtractionResult | undefined,
    result: AddMemoryResult,
  ): Promise<void> {
    const stored = outcome.stored;
    if (!stored) {
      return;
    }

    const entities = await this.#entitiesFor(memory, extraction);
    for (const entity of entities) {
      try {
        const record = await this.#deps.entities.getOrCreateEntity(entity.name, entity.type);
        await this.#deps.entities.linkToMemory(record.entityId, stored.internalId, {
          kind: "extracted",
          confidence: Math.round((entity.confidence ?? 1) * 100),
          method: extraction ? "llm" : "nlp",
        });
        result.entitiesExtracted += 1;
      } catch (error) {
        this.#logger?.warn(
          { memoryId: stored.memoryId, entity: entity.name, err: errorMessage(error) },
          "Failed to link entity",
        );
      }
    }

    try {
      await this.#deps.ontology.linkMemoryToConcepts(
        stored.internalId,
        memory.content,
        memory.memoryType,
      );
    } catch (error) {
      this.#logger?.warn(
        { memoryId: stored.memoryId, err: errorMessage(error) },
        "Failed to link concepts",
      );
    }

    try {
      const chunking = await this.#deps.chunking.processMemory(stored.memoryId, memory.content);
      result.chunksCreated += chunking.chunksCreated;
    } catch (error) {
      this.#logger?.warn(
        { memoryId: stored.memoryId, err: errorMessage(error) },
        "Chunking failed, memory kept unchunked",
      );
    }
  }

  async #entitiesFor(
    memory: PendingMemory,
    extraction: ExtractionResult | undefined,
  ): Promise<ExtractedEntity[]> {
    if (extraction) {
      return memory.entityNames.map((reference) => {
        const wanted = reference.trim().toLowerCase();
        const known = extraction.entities.find(
          (entity) => entity.id === reference || entity.name.toLowerCase() === wanted,
        );
        return { name: known?.name ?? reference.trim(), type: known?.type ?? "concept" };
      });
    }
    if (!this.#deps.entityExtractor) {
      return [];
    }
    try {
      const entities = await this.#deps.entityExtractor.extract(memory.content);
      return entities.map((entity) => ({
        ...entity,
        confidence: entity.confidence ?? NLP_ENTITY_CONFIDENCE,
      }));
    } catch (error) {
      this.#logger?.warn({ err: errorMessage(error) }, "Entity extraction failed");
      return [];
    }
  }

  /**
   * Writes relations the extractor found between memories stored in this call.
   */
  async #writeExtractedRelations(
    extraction: ExtractionResult | undefined,
    storedByContent: Map<string, string>,
  ): Promise<number> {
    let created = 0;
    for (const relation of extraction?.relations ?? []) {
      const from = storedByContent.get(normalizeContent(relation.from_memory_content));
      const to = storedByContent.get(normalizeContent(relation.to_memory_content));
      if (!from || !to || from === to) {
        continue;
      }
      const summary = await this.#deps.relations.writeRelations(from, [
        {
          targetId: to,
          relationType: toRelationType(relation.relation_type),
          confidence: relation.confidence,
          reasoning: relation.explanation || "extracted",
        },
      ]);
      created += summary.created;
    }
    return created;
  }

  #mode(value: string | undefined): SearchMode {
    return value === undefined ? this.#defaults.mode : parseSearchMode(value);
  }

  async #embedQuery(query: string): Promise<number[]> {
    if (!query.trim()) {
      throw new ValidationError("Query cannot be empty", "query");
    }
    return this.#deps.embeddings.embed(query);
  }

  async #owned(memoryId: string, userId: string): Promise<MemoryRecord> {
    const memory = await this.#deps.memoryRepository.getMemory(memoryId);
    if (!memory) {
      throw new ValidationError(`Memory not found: ${memoryId}`, "memory_id");
    }
    if (memory.userId !== userId) {
      throw new ValidationError(`Memory ${memoryId} does not belong to ${userId}`, "user_id");
    }
    return memory;
  }
}
