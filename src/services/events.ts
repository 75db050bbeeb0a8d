import type { AppLogger } from "../logging";
import { errorMessage } from "./errors";

export interface ChunkingStartedEvent {
  type: "chunking.started";
  memoryId: string;
  estimatedChunks: number;
  contentLength: number;
}

export interface ChunkCreatedEvent {
  type: "chunk.created";
  memoryId: string;
  chunkId: string;
  chunkInternalId: string;
  position: number;
  totalChunks: number;
}

/** A chunk write that did not reach the store. */
export interface ChunkFailedEvent {
  type: "chunk.failed";
  memoryId: string;
  chunkId: string;
  position: number;
  totalChunks: number;
  error: string;
}

export interface ChunkingCompleteEvent {
  type: "chunking.complete";
  memoryId: string;
  chunksCreated: number;
  failedChunks: number;
  linksCreated: number;
  durationMs: number;
  success: boolean;
}

export interface ChunkingFailedEvent {
  type: "chunking.failed";
  memoryId: string;
  stage: string;
  error: string;
}

export interface LinkingCompleteEvent {
  type: "linking.complete";
  memoryId: string;
  edgesCreated: number;
  errors: number;
  /** Positions that never arrived; no chain is written when any are missing. */
  missingPositions: number[];
  durationMs: number;
}

export type PipelineEvent =
  | ChunkingStartedEvent
  | ChunkCreatedEvent
  | ChunkFailedEvent
  | ChunkingCompleteEvent
  | ChunkingFailedEvent
  | LinkingCompleteEvent;

export type PipelineEventHandler = (event: PipelineEvent) => Promise<void> | void;

/**
 * In-process event channel of the write pipeline. `emit` resolves after every
 * subscriber has handled the event, in subscription order; a failing
 * subscriber is logged and does not stop the others.
 */
export class EventBus {
  #handlers: PipelineEventHandler[] = [];
  #logger?: AppLogger;

  constructor(logger?: AppLogger) {
    this.#logger = logger?.child({ component: "event-bus" });
  }

  subscribe(handler: PipelineEventHandler): () => void {
    this.#handlers.push(handler);
    return () => {
      this.#handlers = this.#handlers.filter((candidate) => candidate !== handler);
    };
  }

  async emit(event: PipelineEvent): Promise<void> {
    for (const handler of [...this.#handlers]) {
      try {
        await handler(event);
      } catch (error) {
        this.#logger?.error(
          { event: event.type, memoryId: event.memoryId, err: errorMessage(error) },
          "Event handler failed",
        );
      }
    }
  }
}
