import type { MemoryType } from "../schemas/memory";

export interface NewMemoryRow {
  memoryId: string;
  userId: string;
  content: string;
  memoryType: MemoryType;
  certainty: number;
  importance: number;
  createdAt: string;
  contextTags: string[];
  source: string;
  metadata: Record<string, unknown>;
}

export interface NewChunkRow {
  chunkId: string;
  parentInternalId: string;
  position: number;
  content: string;
  tokenCount: number;
  createdAt: string;
}

export interface NewEntityRow {
  entityId: string;
  name: string;
  entityType: string;
  properties: Record<string, unknown>;
  aliases: string[];
}

export interface NewContextRow {
  contextId: string;
  name: string;
  properties: Record<string, unknown>;
  createdAt: string;
}

export interface SoftDeleteRow {
  memoryId: string;
  deletedBy: string;
  deletedAt: string;
  reason: string;
}

export interface RestoreRow {
  memoryId: string;
  restoredBy: string;
  restoredAt: string;
}
