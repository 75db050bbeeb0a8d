import { z } from "zod";
import { SEARCH_MODES } from "../config";
import { MEMORY_OPERATIONS } from "./llm";
import { MemoryRecordSchema } from "./memory";
import { ChainSearchResultSchema, OntoSearchResultSchema, SearchResultSchema } from "./search";

const UserId = z.string().min(1).describe("Owner of the memories.");
const MemoryId = z.string().min(1).describe("External memory id, e.g. mem_1a2b3c4d5e6f.");
const Query = z.string().min(1);
const Limit = z.number().int().min(1).max(100).optional();

export const AddMemoryInputSchema = z.object({
  message: z.string().min(1).describe("Free text; may hold several facts."),
  user_id: UserId,
  agent_id: z.string().optional().describe("Recorded as the source of the new memories."),
  context_tags: z.array(z.string()).optional(),
  metadata: z.record(z.unknown()).optional(),
});

export const SearchMemoryInputSchema = z.object({
  query: Query,
  user_id: UserId,
  limit: Limit,
  mode: z.enum(SEARCH_MODES).optional(),
  temporal_days: z.number().int().min(1).optional(),
  graph_depth: z.number().int().min(1).max(5).optional(),
});

export const UpdateMemoryInputSchema = z.object({
  memory_id: MemoryId,
  new_content: z.string().min(1),
  user_id: UserId,
});

export const GetMemoryInputSchema = z.object({
  memory_id: MemoryId,
});

export const DeleteMemoryInputSchema = z.object({
  memory_id: MemoryId,
  user_id: UserId,
  hard: z.boolean().optional().describe("Removes the node for good; it cannot be restored."),
  cascade: z.boolean().optional().describe("With hard, also deletes the memory's edges."),
  reason: z.string().optional(),
});

export const UndeleteMemoryInputSchema = z.object({
  memory_id: MemoryId,
  user_id: UserId,
});

export const MemoryGraphInputSchema = z.object({
  user_id: UserId,
  memory_id: MemoryId.optional(),
  depth: z.number().int().min(1).max(5).optional(),
  limit: Limit,
});

export const ConceptSearchInputSchema = z.object({
  query: Query,
  user_id: UserId,
  concept_type: z.string().optional().describe("Only memories linked to this concept, e.g. Preference."),
  tags: z.array(z.string()).optional(),
  mode: z.enum(SEARCH_MODES).optional(),
  limit: Limit,
});

export const ReasoningChainInputSchema = z.object({
  query: Query,
  user_id: UserId,
  chain_mode: z.enum(["both", "causal", "forward", "deep"]).optional(),
  max_depth: z.number().int().min(1).max(10).optional(),
  limit: Limit,
});

export const RetrieveContextInputSchema = z.object({
  query: Query,
  user_id: UserId,
  depth: z.enum(["shallow", "medium", "deep"]).optional(),
  limit: Limit,
  include_reasoning: z.boolean().optional(),
  include_entities: z.boolean().optional(),
});

export const CleanupOrphansInputSchema = z.object({
  dry_run: z.boolean().optional(),
});

export const MemoryOperationRecordSchema = z.object({
  operation: z.enum(MEMORY_OPERATIONS),
  content: z.string(),
  memoryId: z.string().optional(),
  targetMemoryId: z.string().optional(),
  confidence: z.number(),
  reasoning: z.string(),
});

export const AddMemoryResultSchema = z.object({
  memoriesAdded: z.number().int(),
  memoriesUpdated: z.number().int(),
  memoriesDeleted: z.number().int(),
  memoriesSuperseded: z.number().int(),
  contradictions: z.number().int(),
  skipped: z.number().int(),
  entitiesExtracted: z.number().int(),
  relationsCreated: z.number().int(),
  chunksCreated: z.number().int(),
  memoryIds: z.array(z.string()),
  operations: z.array(MemoryOperationRecordSchema),
});

export const EvolutionResultSchema = z.object({
  success: z.boolean(),
  oldMemoryId: z.string(),
  newMemoryId: z.string().optional(),
  operation: z.enum(["supersede", "contradict", "enhance", "update_metadata", "delete"]),
  edgeCreated: z.boolean(),
  timestamp: z.string(),
});

export const DeletionResultSchema = z.object({
  memoryId: z.string(),
  strategy: z.enum(["soft", "hard", "cascade"]),
  success: z.boolean(),
  deletedBy: z.string(),
  deletedAt: z.string(),
  reason: z.string().optional(),
  edgesAffected: z.number().int(),
});

export const RestoreResultSchema = z.object({
  memoryId: z.string(),
  success: z.boolean(),
  restoredBy: z.string(),
  restoredAt: z.string(),
});

export const CleanupStatsSchema = z.object({
  orphanedEntities: z.number().int(),
  orphanedEdges: z.number().int(),
  deletedEntities: z.number().int(),
  deletedEdges: z.number().int(),
  dryRun: z.boolean(),
});

export const MemoryViewSchema = MemoryRecordSchema.extend({
  chunkCount: z.number().int().min(0),
});

export const MemoryGraphSchema = z.object({
  nodes: z.array(
    z.object({
      memoryId: z.string(),
      content: z.string(),
      memoryType: z.string(),
      createdAt: z.string(),
    }),
  ),
  edges: z.array(
    z.object({
      from: z.string(),
      to: z.string(),
      relationType: z.string(),
    }),
  ),
});

export const RetrievalResultSchema = z.object({
  memories: z.array(SearchResultSchema.extend({ chunkCount: z.number().int().min(0) })),
  chunksReconstructed: z.number().int(),
  contextMemories: z.array(MemoryRecordSchema),
  reasoningChains: z.array(
    z.object({
      fromMemoryId: z.string(),
      toMemoryId: z.string(),
      relationType: z.string(),
      strength: z.number(),
    }),
  ),
  entities: z.array(
    z.object({
      entityId: z.string(),
      name: z.string(),
      entityType: z.string(),
    }),
  ),
  metadata: z.object({
    query: z.string(),
    depth: z.enum(["shallow", "medium", "deep"]),
    mode: z.enum(SEARCH_MODES),
    totalResults: z.number().int(),
    durationMs: z.number(),
  }),
});

export const SystemStatusSchema = z
  .object({
    env: z.string(),
    logLevel: z.string(),
    store: z.object({
      ok: z.boolean(),
      baseUrl: z.string(),
      instance: z.string(),
    }),
  })
  .passthrough();

export { ChainSearchResultSchema, OntoSearchResultSchema, SearchResultSchema };

/**
 * Input schema of every tool, by tool name.
 */
export const TOOL_INPUT_SCHEMAS = {
  add_memory: AddMemoryInputSchema,
  search_memory: SearchMemoryInputSchema,
  update_memory: UpdateMemoryInputSchema,
  get_memory: GetMemoryInputSchema,
  delete_memory: DeleteMemoryInputSchema,
  undelete_memory: UndeleteMemoryInputSchema,
  get_memory_graph: MemoryGraphInputSchema,
  search_by_concept: ConceptSearchInputSchema,
  search_reasoning_chain: ReasoningChainInputSchema,
  retrieve_context: RetrieveContextInputSchema,
  cleanup_orphans: CleanupOrphansInputSchema,
  system_status: z.object({}),
} as const;
