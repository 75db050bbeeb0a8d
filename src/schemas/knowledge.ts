import { z } from "zod";

export const ENTITY_TYPES = [
  "person",
  "organization",
  "location",
  "technology",
  "concept",
  "event",
  "product",
  "system",
  "component",
  "resource",
  "process",
  "custom",
] as const;

export const EntityTypeSchema = z.enum(ENTITY_TYPES);
export type EntityType = z.infer<typeof EntityTypeSchema>;

export function toEntityType(value: string | undefined): EntityType {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "place") {
    return "location";
  }
  const parsed = EntityTypeSchema.safeParse(normalized);
  return parsed.success ? parsed.data : "custom";
}

export const EntityRecordSchema = z.object({
  entityId: z.string(),
  name: z.string(),
  entityType: EntityTypeSchema,
  properties: z.record(z.unknown()),
  aliases: z.array(z.string()),
});
export type EntityRecord = z.infer<typeof EntityRecordSchema>;

export const ExtractedEntitySchema = z.object({
  name: z.string(),
  type: z.string(),
  confidence: z.number().min(0).max(1).optional(),
});
export type ExtractedEntity = z.infer<typeof ExtractedEntitySchema>;

export type ConceptKind = "abstract" | "concrete";

export const ConceptSchema = z.object({
  conceptId: z.string(),
  name: z.string(),
  conceptType: z.enum(["abstract", "concrete"]),
  description: z.string(),
  parentConcept: z.string().nullable(),
  level: z.number().int().min(0),
});
export type Concept = z.infer<typeof ConceptSchema>;

export const ConceptMatchSchema = z.object({
  conceptId: z.string(),
  confidence: z.number().min(0).max(1),
  matchType: z.string(),
});
export type ConceptMatch = z.infer<typeof ConceptMatchSchema>;

export const ContextDefSchema = z.object({
  contextId: z.string(),
  name: z.string(),
  properties: z.record(z.unknown()),
  createdAt: z.string(),
});
export type ContextDef = z.infer<typeof ContextDefSchema>;
