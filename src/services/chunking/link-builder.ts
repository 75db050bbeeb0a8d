import type { AppLogger } from "../../logging";
import type { MemoryRepository } from "../../repositories/memory-repository";
import { errorMessage } from "../errors";
import type { ChunkCreatedEvent, ChunkFailedEvent, EventBus, PipelineEvent } from "../events";

interface TrackedChunk {
  chunkId: string;
  chunkInternalId: string;
  position: number;
}

interface PendingChain {
  totalChunks: number;
  chunks: TrackedChunk[];
  failedPositions: number[];
}

type ChunkOutcomeEvent = ChunkCreatedEvent | ChunkFailedEvent;

/**
 * Collects `chunk.created` and `chunk.failed` events per parent memory. Once
 * every position has reported, it writes the NEXT_CHUNK chain in position
 * order, or drops the entry without linking when a position is missing.
 */
export class ChunkLinkBuilder {
  #repository: MemoryRepository;
  #bus: EventBus;
  #logger?: AppLogger;
  #pending = new Map<string, PendingChain>();

  constructor(repository: MemoryRepository, bus: EventBus, logger?: AppLogger) {
    this.#repository = repository;
    this.#bus = bus;
    this.#logger = logger?.child({ component: "link-builder" });
  }

  attach(): () => void {
    return this.#bus.subscribe((event) => this.handle(event));
  }

  get pendingMemories(): number {
    return this.#pending.size;
  }

  async handle(event: PipelineEvent): Promise<void> {
    if (event.type !== "chunk.created" && event.type !== "chunk.failed") {
      return;
    }
    await this.#track(event);
  }

  async #track(event: ChunkOutcomeEvent): Promise<void> {
    const entry = this.#pending.get(event.memoryId) ?? {
      totalChunks: event.totalChunks,
      chunks: [],
      failedPositions: [],
    };
    if (event.type === "chunk.created") {
      entry.chunks.push({
        chunkId: event.chunkId,
        chunkInternalId: event.chunkInternalId,
        position: event.position,
      });
    } else {
      entry.failedPositions.push(event.position);
    }
    this.#pending.set(event.memoryId, entry);

    const reported = entry.chunks.length + entry.failedPositions.length;
    this.#logger?.debug(
      {
        memoryId: event.memoryId,
        position: event.position,
        collected: reported,
        expected: entry.totalChunks,
      },
      "Tracked chunk",
    );

    if (reported < entry.totalChunks) {
      return;
    }

    this.#pending.delete(event.memoryId);
    if (entry.failedPositions.length > 0) {
      await this.#abandon(event.memoryId, entry);
      return;
    }
    await this.#buildChain(event.memoryId, entry.chunks);
  }

  async #abandon(memoryId: string, entry: PendingChain): Promise<void> {
    const missingPositions = [...entry.failedPositions].sort((left, right) => left - right);
    this.#logger?.warn(
      { memoryId, missingPositions, totalChunks: entry.totalChunks },
      "Chunk chain incomplete, not linking",
    );
    await this.#bus.emit({
      type: "linking.complete",
      memoryId,
      edgesCreated: 0,
      errors: 0,
      missingPositions,
      durationMs: 0,
    });
  }

  async #buildChain(memoryId: string, chunks: TrackedChunk[]): Promise<void> {
    const started = Date.now();
    const ordered = [...chunks].sort((left, right) => left.position - right.position);

    let edgesCreated = 0;
    let errors = 0;

    for (let index = 1; index < ordered.length; index += 1) {
      const previous = ordered[index - 1];
      const next = ordered[index];
      if (!previous || !next) {
        continue;
      }
      try {
        await this.#repository.linkChunks(previous.chunkInternalId, next.chunkInternalId);
        edgesCreated += 1;
      } catch (error) {
        errors += 1;
        this.#logger?.warn(
          { memoryId, from: previous.chunkId, to: next.chunkId, err: errorMessage(error) },
          "Failed to link chunks",
        );
      }
    }

    const durationMs = Date.now() - started;
    this.#logger?.info({ memoryId, edgesCreated, errors, durationMs }, "Chunk chain linked");

    await this.#bus.emit({
      type: "linking.complete",
      memoryId,
      edgesCreated,
      errors,
      missingPositions: [],
      durationMs,
    });
  }
}
