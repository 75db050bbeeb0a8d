import { z } from "zod";

const OptionalText = z
  .string()
  .nullable()
  .optional()
  .transform((value) => (value && value.trim() ? value : undefined));

const Score = z.coerce.number().transform((value) => Math.min(100, Math.max(0, Math.round(value))));

export const ExtractedMemorySchema = z.object({
  text: z.string().min(1),
  memory_type: z.string().default("fact"),
  certainty: Score.default(80),
  importance: Score.default(50),
  entities: z.array(z.string()).default([]),
});
export type ExtractedMemory = z.infer<typeof ExtractedMemorySchema>;

export const LlmEntitySchema = z.object({
  id: z.string().default(""),
  name: z.string().min(1),
  type: z.string().default("concept"),
});
export type LlmEntity = z.infer<typeof LlmEntitySchema>;

export const ExtractedRelationSchema = z.object({
  from_memory_content: z.string(),
  to_memory_content: z.string(),
  relation_type: z.string(),
  strength: Score.default(80),
  confidence: Score.default(80),
  explanation: z.string().default(""),
});
export type ExtractedRelation = z.infer<typeof ExtractedRelationSchema>;

export const ExtractionResultSchema = z.object({
  memories: z.array(ExtractedMemorySchema).default([]),
  entities: z.array(LlmEntitySchema).default([]),
  relations: z.array(ExtractedRelationSchema).default([]),
});
export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;

export const MEMORY_OPERATIONS = [
  "ADD",
  "UPDATE",
  "DELETE",
  "NOOP",
  "SUPERSEDE",
  "CONTRADICT",
] as const;

export const MemoryOperationSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toUpperCase() : value),
  z.enum(MEMORY_OPERATIONS),
);
export type MemoryOperation = (typeof MEMORY_OPERATIONS)[number];

export const MemoryDecisionSchema = z.object({
  operation: MemoryOperationSchema,
  target_memory_id: OptionalText,
  confidence: Score,
  reasoning: z.string().default(""),
  merged_content: OptionalText,
  supersedes_memory_id: OptionalText,
  contradicts_memory_id: OptionalText,
  relates_to: z
    .array(z.tuple([z.string(), z.string()]))
    .nullable()
    .optional()
    .transform((value) => value ?? []),
});

export interface MemoryDecision {
  operation: MemoryOperation;
  targetMemoryId?: string;
  confidence: number;
  reasoning: string;
  mergedContent?: string;
  supersedesMemoryId?: string;
  contradictsMemoryId?: string;
  relatesTo: Array<[string, string]>;
}

export interface SimilarMemory {
  memoryId: string;
  internalId?: string;
  content: string;
  score: number;
  createdAt?: string;
}
