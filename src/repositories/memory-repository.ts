import { z } from "zod";
import type { QueryExecutor } from "../database/client";
import {
  AddChunkResponseSchema,
  AddMemoryResponseSchema,
  CountResponseSchema,
  GetMemoryResponseSchema,
  MemoriesResponseSchema,
  MemoryWithChunksSchema,
  VectorSearchResponseSchema,
  type MemoryHit,
  type MemoryNode,
} from "../schemas/store";
import { toMemoryType, type MemoryRecord } from "../schemas/memory";
import { BaseRepository, type QueryOptions } from "./base";
import type { NewMemoryRow, NewChunkRow } from "./types";

const TagListSchema = z.array(z.string());
const MetadataSchema = z.record(z.unknown());

export interface MemoryChunksView {
  hasChunks: boolean;
  content?: string;
  chunks: Array<{ text: string; position: number }>;
}

export interface VectorSearchHits {
  memories: MemoryHit[];
  parentMemories: MemoryHit[];
}

export class MemoryRepository extends BaseRepository {
  constructor(client: QueryExecutor) {
    super(client);
  }

  /**
   * Returns the store's internal id, or `undefined` when the store did not report one.
   */
  async addMemory(row: NewMemoryRow): Promise<string | undefined> {
    const response = await this.query(
      "addMemory",
      {
        memory_id: row.memoryId,
        user_id: row.userId,
        content: row.content,
        memory_type: row.memoryType,
        certainty: row.certainty,
        importance: row.importance,
        created_at: row.createdAt,
        updated_at: row.createdAt,
        valid_from: row.createdAt,
        context_tags: this.stringifyJson(row.contextTags),
        source: row.source,
        metadata: this.stringifyJson(row.metadata),
      },
      AddMemoryResponseSchema,
    );
    const internalId = response.memory.id?.trim();
    return internalId ? internalId : undefined;
  }

  async getMemoryNode(
    memoryId: string,
    options: QueryOptions = {},
  ): Promise<MemoryNode | undefined> {
    const response = await this.find(
      "getMemory",
      { memory_id: memoryId },
      GetMemoryResponseSchema,
      options,
    );
    return response?.memory;
  }

  async getMemory(memoryId: string): Promise<MemoryRecord | undefined> {
    const node = await this.getMemoryNode(memoryId);
    return node ? this.toRecord(node) : undefined;
  }

  async updateContent(memoryId: string, content: string, updatedAt: string): Promise<void> {
    await this.command("updateMemoryContent", {
      memory_id: memoryId,
      content,
      updated_at: updatedAt,
    });
  }

  async updateValidUntil(memoryId: string, validUntil: string): Promise<void> {
    await this.command("updateMemoryValidUntil", {
      memory_id: memoryId,
      valid_until: validUntil,
    });
  }

  async updateById(
    internalId: string,
    fields: { content: string; certainty: number; importance: number; updatedAt: string },
  ): Promise<void> {
    await this.command("updateMemoryById", {
      id: internalId,
      content: fields.content,
      certainty: fields.certainty,
      importance: fields.importance,
      updated_at: fields.updatedAt,
    });
  }

  async addMemoryEmbedding(
    internalId: string,
    vector: number[],
    model: string,
    createdAt: string,
  ): Promise<void> {
    await this.command("addMemoryEmbedding", {
      memory_id: internalId,
      vector_data: vector,
      embedding_model: model,
      created_at: createdAt,
    });
  }

  async addChunkEmbedding(
    chunkInternalId: string,
    vector: number[],
    model: string,
    createdAt: string,
  ): Promise<void> {
    await this.command("addChunkEmbedding", {
      chunk_id: chunkInternalId,
      vector_data: vector,
      embedding_model: model,
      created_at: createdAt,
    });
  }

  async addChunk(row: NewChunkRow): Promise<string> {
    const response = await this.query(
      "addMemoryChunk",
      {
        chunk_id: row.chunkId,
        parent_id: row.parentInternalId,
        position: row.position,
        content: row.content,
        token_count: row.tokenCount,
        created_at: row.createdAt,
      },
      AddChunkResponseSchema,
    );
    return "chunk" in response ? response.chunk.id : response.id;
  }

  async linkChunks(fromChunkId: string, toChunkId: string): Promise<void> {
    await this.command("linkChunks", {
      from_chunk_id: fromChunkId,
      to_chunk_id: toChunkId,
    });
  }

  async getMemoryWithChunks(memoryId: string): Promise<MemoryChunksView> {
    const response = await this.query(
      "getMemoryWithChunks",
      { memory_id: memoryId },
      MemoryWithChunksSchema,
    );
    return {
      hasChunks: response.has_chunks,
      content: response.content,
      chunks: response.chunks,
    };
  }

  async vectorSearch(vector: number[], limit: number): Promise<VectorSearchHits> {
    const response = await this.query(
      "smartVectorSearchWithChunks",
      { query_vector: vector, limit },
      VectorSearchResponseSchema,
    );
    return {
      memories: response.memories,
      parentMemories: response.parent_memories,
    };
  }

  async listMemories(userId: string, limit: number): Promise<MemoryRecord[]> {
    const response = await this.query(
      "getAllMemories",
      { user_id: userId, limit },
      MemoriesResponseSchema,
    );
    return response.memories.map((node) => this.toRecord(node));
  }

  async countMemories(): Promise<number> {
    const response = await this.query("countAllMemories", {}, CountResponseSchema);
    return response.count;
  }

  toRecord(node: MemoryNode): MemoryRecord {
    const createdAt = node.created_at;
    return {
      memoryId: node.memory_id,
      internalId: node.id,
      userId: node.user_id ?? "",
      content: node.content,
      memoryType: toMemoryType(node.memory_type),
      certainty: node.certainty ?? 80,
      importance: node.importance ?? 50,
      createdAt,
      updatedAt: node.updated_at ?? createdAt,
      validFrom: node.valid_from ?? createdAt,
      validUntil: node.valid_until ?? null,
      contextTags: this.parseJson(node.context_tags, TagListSchema, []),
      source: node.source ?? "user",
      metadata: this.parseJson(node.metadata, MetadataSchema, {}),
      immutable: node.immutable,
      verified: node.verified,
      isDeleted: node.is_deleted,
      deletedAt: node.deleted_at ?? null,
      deletedBy: node.deleted_by ?? null,
    };
  }
}
