import type { Config } from "../../config";
import type { AppLogger } from "../../logging";
import type { MemoryRepository } from "../../repositories/memory-repository";
import type { TextChunk } from "../../schemas/memory";
import { ChunkingError, OmcError, errorMessage } from "../errors";
import type { EventBus, LinkingCompleteEvent, PipelineEvent } from "../events";
import type { IdResolver } from "../resolution/id-resolver";
import { type Clock, type EmbeddingProvider, type TextSplitter, systemClock } from "../types";

export type ChunkingStage =
  | "resolving"
  | "splitting"
  | "creating"
  | "embedding"
  | "complete";

export interface ChunkingOutcome {
  memoryId: string;
  chunked: boolean;
  chunksCreated: number;
  failedChunks: number;
  linksCreated: number;
  durationMs: number;
}

interface CreatedChunk {
  chunkId: string;
  chunkInternalId: string;
  position: number;
  chunk: TextChunk;
}

export interface ChunkingServiceDeps {
  config: Config["chunking"];
  memoryRepository: MemoryRepository;
  resolver: IdResolver;
  splitter: TextSplitter;
  bus: EventBus;
  embeddings?: EmbeddingProvider;
  logger?: AppLogger;
  now?: Clock;
}

export function chunkIdFor(memoryId: string, position: number): string {
  return `${memoryId}_chunk_${position}`;
}

/**
 * Write pipeline for long memories:
 * resolving → splitting → creating (parallel) → embedding → complete.
 *
 * Each chunk reports `chunk.created` or `chunk.failed` as soon as its write
 * settles. The link builder writes the NEXT_CHUNK chain when the last position
 * reports, which happens before the creating stage ends.
 */
export class ChunkingService {
  #config: Config["chunking"];
  #memoryRepository: MemoryRepository;
  #resolver: IdResolver;
  #splitter: TextSplitter;
  #bus: EventBus;
  #embeddings?: EmbeddingProvider;
  #logger?: AppLogger;
  #now: Clock;

  constructor(deps: ChunkingServiceDeps) {
    this.#config = deps.config;
    this.#memoryRepository = deps.memoryRepository;
    this.#resolver = deps.resolver;
    this.#splitter = deps.splitter;
    this.#bus = deps.bus;
    this.#embeddings = deps.embeddings;
    this.#logger = deps.logger?.child({ component: "chunking" });
    this.#now = deps.now ?? systemClock;
  }

  needsChunking(content: string): boolean {
    return this.#config.enabled && content.length >= this.#config.minChunkLength;
  }

  async processMemory(
    memoryId: string,
    content: string,
    signal?: AbortSignal,
  ): Promise<ChunkingOutcome> {
    if (!this.needsChunking(content)) {
      return {
        memoryId,
        chunked: false,
        chunksCreated: 0,
        failedChunks: 0,
        linksCreated: 0,
        durationMs: 0,
      };
    }

    const started = Date.now();
    let stage: ChunkingStage = "resolving";

    try {
      signal?.throwIfAborted();
      const parentInternalId = await this.#resolver.resolve(memoryId);

      stage = "splitting";
      signal?.throwIfAborted();
      const chunks = this.#split(content);

      await this.#bus.emit({
        type: "chunking.started",
        memoryId,
        estimatedChunks: chunks.length,
        contentLength: content.length,
      });

      stage = "creating";
      signal?.throwIfAborted();
      const linking: { event?: LinkingCompleteEvent } = {};
      const unsubscribe = this.#bus.subscribe((event: PipelineEvent) => {
        if (event.type === "linking.complete" && event.memoryId === memoryId) {
          linking.event = event;
        }
      });
      const { created, failed } = await this.#createChunks(
        memoryId,
        parentInternalId,
        chunks,
      ).finally(unsubscribe);
      const linksCreated = linking.event?.edgesCreated ?? 0;

      if (this.#embeddings && created.length > 0) {
        stage = "embedding";
        signal?.throwIfAborted();
        await this.#embedChunks(this.#embeddings, created);
      }

      stage = "complete";
      const durationMs = Date.now() - started;
      await this.#bus.emit({
        type: "chunking.complete",
        memoryId,
        chunksCreated: created.length,
        failedChunks: failed,
        linksCreated,
        durationMs,
        success: failed === 0 && linking.event?.errors === 0,
      });

      this.#logger?.info(
        { memoryId, chunksCreated: created.length, failedChunks: failed, linksCreated, durationMs },
        "Chunking complete",
      );

      return {
        memoryId,
        chunked: true,
        chunksCreated: created.length,
        failedChunks: failed,
        linksCreated,
        durationMs,
      };
    } catch (error) {
      await this.#bus.emit({
        type: "chunking.failed",
        memoryId,
        stage,
        error: errorMessage(error),
      });
      this.#logger?.error({ memoryId, stage, err: errorMessage(error) }, "Chunking failed");
      if (error instanceof OmcError) {
        throw error;
      }
      throw new ChunkingError("database", `Chunking failed during ${stage}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  #split(content: string): TextChunk[] {
    try {
      return this.#splitter.split(content);
    } catch (error) {
      if (error instanceof ChunkingError) {
        throw error;
      }
      throw new ChunkingError("splitting", errorMessage(error), { cause: error });
    }
  }

  async #createChunks(
    memoryId: string,
    parentInternalId: string,
    chunks: TextChunk[],
  ): Promise<{ created: CreatedChunk[]; failed: number }> {
    const createdAt = this.#now().toISOString();
    const totalChunks = chunks.length;
    const settled = await Promise.allSettled(
      chunks.map(async (chunk, position) => {
        const chunkId = chunkIdFor(memoryId, position);
        let chunkInternalId: string;
        try {
          chunkInternalId = await this.#memoryRepository.addChunk({
            chunkId,
            parentInternalId,
            position,
            content: chunk.text,
            tokenCount: chunk.tokenCount,
            createdAt,
          });
        } catch (error) {
          await this.#bus.emit({
            type: "chunk.failed",
            memoryId,
            chunkId,
            position,
            totalChunks,
            error: errorMessage(error),
          });
          throw error;
        }
        await this.#bus.emit({
          type: "chunk.created",
          memoryId,
          chunkId,
          chunkInternalId,
          position,
          totalChunks,
        });
        return { chunkId, chunkInternalId, position, chunk };
      }),
    );

    const created: CreatedChunk[] = [];
    let failed = 0;
    for (const outcome of settled) {
      if (outcome.status === "fulfilled") {
        created.push(outcome.value);
      } else {
        failed += 1;
        this.#logger?.warn(
          { memoryId, err: errorMessage(outcome.reason) },
          "Failed to create chunk",
        );
      }
    }
    return { created, failed };
  }

  async #embedChunks(embeddings: EmbeddingProvider, created: CreatedChunk[]): Promise<void> {
    const createdAt = this.#now().toISOString();
    const settled = await Promise.allSettled(
      created.map(async ({ chunk, chunkInternalId }) => {
        const vector = await embeddings.embed(chunk.text);
        await this.#memoryRepository.addChunkEmbedding(
          chunkInternalId,
          vector,
          embeddings.model,
          createdAt,
        );
      }),
    );
    const failures = settled.filter((outcome) => outcome.status === "rejected").length;
    if (failures > 0) {
      this.#logger?.warn({ failures }, "Some chunk embeddings were not stored");
    }
  }
}
