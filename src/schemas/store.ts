import { z } from "zod";

/*
 * Response contracts of the backing store's named queries. Every query result
 * is parsed through one of these before it reaches a repository caller.
 */

const FlagSchema = z
  .union([z.boolean(), z.number(), z.string()])
  .optional()
  .transform((value) => value === true || value === 1 || value === "1" || value === "true");

export const MemoryNodeSchema = z.object({
  id: z.string().optional(),
  memory_id: z.string(),
  user_id: z.string().optional(),
  content: z.string().default(""),
  memory_type: z.string().default("fact"),
  certainty: z.number().optional(),
  importance: z.number().optional(),
  created_at: z.string().default(""),
  updated_at: z.string().optional(),
  valid_from: z.string().optional(),
  valid_until: z.string().nullable().optional(),
  context_tags: z.union([z.string(), z.array(z.string())]).optional(),
  source: z.string().optional(),
  metadata: z.union([z.string(), z.record(z.unknown())]).optional(),
  immutable: FlagSchema,
  verified: FlagSchema,
  is_deleted: FlagSchema,
  deleted_at: z.string().nullable().optional(),
  deleted_by: z.string().nullable().optional(),
});
export type MemoryNode = z.infer<typeof MemoryNodeSchema>;

export const MemoryHitSchema = MemoryNodeSchema.extend({
  score: z.number().optional(),
  vector: z.array(z.number()).optional(),
});
export type MemoryHit = z.infer<typeof MemoryHitSchema>;

export const AddMemoryResponseSchema = z.object({
  memory: z.object({
    id: z.string().optional(),
    memory_id: z.string().optional(),
  }),
});

export const GetMemoryResponseSchema = z.object({
  memory: MemoryNodeSchema,
});

export const UserNodeSchema = z.object({
  user_id: z.string(),
  name: z.string().default(""),
});

export const GetUserResponseSchema = z.object({
  user: UserNodeSchema.nullable().optional(),
});

export const AddChunkResponseSchema = z.union([
  z.object({ chunk: z.object({ id: z.string() }) }),
  z.object({ id: z.string() }),
]);

export const MemoryWithChunksSchema = z.object({
  has_chunks: FlagSchema,
  content: z.string().optional(),
  chunks: z
    .array(z.object({ text: z.string(), position: z.number().int() }))
    .default([]),
});

export const VectorSearchResponseSchema = z.object({
  memories: z.array(MemoryHitSchema).default([]),
  parent_memories: z.array(MemoryHitSchema).default([]),
});

const HitListSchema = z.array(MemoryHitSchema).default([]);

export const LogicalConnectionsSchema = z.object({
  implies_out: HitListSchema,
  implies_in: HitListSchema,
  because_out: HitListSchema,
  because_in: HitListSchema,
  contradicts_out: HitListSchema,
  contradicts_in: HitListSchema,
  supports_out: HitListSchema,
  supports_in: HitListSchema,
  refutes_out: HitListSchema,
  refutes_in: HitListSchema,
  relation_out: HitListSchema,
  relation_in: HitListSchema,
});
export type LogicalConnections = z.infer<typeof LogicalConnectionsSchema>;
export type ConnectionField = keyof LogicalConnections;

const EdgeTargetSchema = z.object({
  id: z.string(),
  memory_id: z.string(),
  probability: z.number().optional(),
  strength: z.number().optional(),
  relation_type: z.string().optional(),
});
export type EdgeTarget = z.infer<typeof EdgeTargetSchema>;

export const OutgoingRelationsSchema = z.object({
  implies_out: z.array(EdgeTargetSchema).default([]),
  because_out: z.array(EdgeTargetSchema).default([]),
  relations_out: z.array(EdgeTargetSchema).default([]),
});
export type OutgoingRelations = z.infer<typeof OutgoingRelationsSchema>;

export const ReasoningRelationSchema = z.object({
  from_id: z.string(),
  to_id: z.string(),
  relation_type: z.string(),
  strength: z.number().default(50),
});
export const ReasoningRelationsResponseSchema = z.object({
  relations: z.array(ReasoningRelationSchema).default([]),
});

export const EntityNodeSchema = z.object({
  entity_id: z.string(),
  name: z.string(),
  entity_type: z.string().default("custom"),
  properties: z.union([z.string(), z.record(z.unknown())]).optional(),
  aliases: z.union([z.string(), z.array(z.string())]).optional(),
});
export type EntityNode = z.infer<typeof EntityNodeSchema>;

export const EntityResponseSchema = z.object({
  entity: EntityNodeSchema.nullable().optional(),
});

export const EntitiesResponseSchema = z.object({
  entities: z.array(EntityNodeSchema).default([]),
});

export const ConceptNodeSchema = z.object({
  concept_id: z.string(),
  name: z.string(),
  level: z.number().int(),
  description: z.string().nullable().optional(),
  parent_id: z.string().nullable().optional(),
});
export type ConceptNode = z.infer<typeof ConceptNodeSchema>;

export const ConceptsResponseSchema = z.object({
  concepts: z.array(ConceptNodeSchema).default([]),
});

export const OntologyCheckSchema = z
  .object({ thing: z.unknown().optional() })
  .nullable();

export const MemoryConceptsSchema = z.object({
  instance_of: z
    .array(z.object({ concept_id: z.string(), confidence: z.number().optional() }))
    .default([]),
  belongs_to: z
    .array(z.object({ concept_id: z.string(), relevance: z.number().optional() }))
    .default([]),
});
export type MemoryConcepts = z.infer<typeof MemoryConceptsSchema>;

export const ContextNodeSchema = z.object({
  context_id: z.string(),
  name: z.string(),
  properties: z.union([z.string(), z.record(z.unknown())]).optional(),
  created_at: z.string().optional(),
});
export type ContextNode = z.infer<typeof ContextNodeSchema>;

export const ContextResponseSchema = z.object({
  context: ContextNodeSchema.nullable().optional(),
});

export const ContextsResponseSchema = z.object({
  contexts: z.array(ContextNodeSchema).default([]),
});

export const MemoriesResponseSchema = z.object({
  memories: z.array(MemoryNodeSchema).default([]),
});

export const CountResponseSchema = z.object({
  count: z.number().int().min(0),
});

/**
 * Deletion queries answer with a bare boolean or a `{success}` / `{deleted}` wrapper.
 */
export const BooleanResultSchema = z
  .union([
    z.boolean(),
    z.object({ success: z.boolean() }),
    z.object({ deleted: z.boolean() }),
  ])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    return "success" in value ? value.success : value.deleted;
  });

export const OrphanedEntitiesSchema = z.object({
  entity_ids: z.array(z.string()).default([]),
});

export const OrphanedEdgesSchema = z.object({
  edge_ids: z.array(z.string()).default([]),
});

export const DeletedCountSchema = z.object({
  deleted_count: z.number().int().min(0),
});
