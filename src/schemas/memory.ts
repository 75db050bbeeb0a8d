import { z } from "zod";

export const MEMORY_TYPES = [
  "fact",
  "preference",
  "goal",
  "opinion",
  "experience",
  "achievement",
] as const;

export const MemoryTypeSchema = z.enum(MEMORY_TYPES);
export type MemoryType = z.infer<typeof MemoryTypeSchema>;

export function toMemoryType(value: string | undefined): MemoryType {
  const parsed = MemoryTypeSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : "fact";
}

export const MemoryRecordSchema = z.object({
  memoryId: z.string(),
  internalId: z.string().optional(),
  userId: z.string(),
  content: z.string(),
  memoryType: MemoryTypeSchema,
  certainty: z.number().min(0).max(100),
  importance: z.number().min(0).max(100),
  createdAt: z.string(),
  updatedAt: z.string(),
  validFrom: z.string(),
  validUntil: z.string().nullable(),
  contextTags: z.array(z.string()),
  source: z.string(),
  metadata: z.record(z.unknown()),
  immutable: z.boolean(),
  verified: z.boolean(),
  isDeleted: z.boolean(),
  deletedAt: z.string().nullable(),
  deletedBy: z.string().nullable(),
});
export type MemoryRecord = z.infer<typeof MemoryRecordSchema>;

export interface NewMemoryInput {
  memoryId?: string;
  userId: string;
  content: string;
  memoryType?: MemoryType;
  certainty?: number;
  importance?: number;
  contextTags?: string[];
  source?: string;
  metadata?: Record<string, unknown>;
  createdAt?: string;
}

export interface StoredMemory {
  memoryId: string;
  internalId: string;
  createdAt: string;
}

export const TextChunkSchema = z.object({
  text: z.string(),
  tokenCount: z.number().int().min(0),
  startPos: z.number().int().min(0),
  endPos: z.number().int().min(0),
});
export type TextChunk = z.infer<typeof TextChunkSchema>;

/**
 * Expired when `validUntil` is at or before `now`; the validity interval is half-open.
 */
export function isExpired(validUntil: string | null | undefined, now: Date): boolean {
  if (!validUntil) {
    return false;
  }
  const until = Date.parse(validUntil);
  return Number.isFinite(until) && until <= now.getTime();
}
