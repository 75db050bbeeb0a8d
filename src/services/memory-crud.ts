import { randomUUID } from "node:crypto";
import type { AppLogger } from "../logging";
import type { MemoryRepository } from "../repositories/memory-repository";
import type { UserRepository } from "../repositories/user-repository";
import type { MemoryRecord, NewMemoryInput, StoredMemory } from "../schemas/memory";
import { MissingInternalIdError, errorMessage } from "./errors";
import type { IdResolver } from "./resolution/id-resolver";
import { type Clock, systemClock } from "./types";

export interface MemoryCrudDependencies {
  memoryRepository: MemoryRepository;
  userRepository: UserRepository;
  resolver: IdResolver;
  defaults: { certainty: number; importance: number };
  logger?: AppLogger;
  now?: Clock;
}

export interface CreateMemoryOptions {
  /** Pre-computed embedding of the content; stored as the memory's vector. */
  vector?: number[];
  embeddingModel?: string;
}

export function newMemoryId(): string {
  return `mem_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

/**
 * Creates memory nodes, their embedding and their owner link.
 */
export class MemoryCrud {
  #memories: MemoryRepository;
  #users: UserRepository;
  #resolver: IdResolver;
  #defaults: { certainty: number; importance: number };
  #logger?: AppLogger;
  #now: Clock;

  constructor(deps: MemoryCrudDependencies) {
    this.#memories = deps.memoryRepository;
    this.#users = deps.userRepository;
    this.#resolver = deps.resolver;
    this.#defaults = deps.defaults;
    this.#logger = deps.logger?.child({ component: "memory-crud" });
    this.#now = deps.now ?? systemClock;
  }

  /**
   * Fails with {@link MissingInternalIdError} when the store does not report an
   * internal id; nothing else is written for the memory in that case.
   */
  async createMemory(
    input: NewMemoryInput,
    options: CreateMemoryOptions = {},
  ): Promise<StoredMemory> {
    const memoryId = input.memoryId ?? newMemoryId();
    const createdAt = input.createdAt ?? this.#now().toISOString();

    const internalId = await this.#memories.addMemory({
      memoryId,
      userId: input.userId,
      content: input.content,
      memoryType: input.memoryType ?? "fact",
      certainty: input.certainty ?? this.#defaults.certainty,
      importance: input.importance ?? this.#defaults.importance,
      createdAt,
      contextTags: input.contextTags ?? [],
      source: input.source ?? "user",
      metadata: input.metadata ?? {},
    });
    if (!internalId) {
      throw new MissingInternalIdError(memoryId);
    }

    this.#resolver.remember(memoryId, internalId);
    this.#logger?.debug({ memoryId, internalId }, "Memory created");

    if (options.vector) {
      try {
        await this.#memories.addMemoryEmbedding(
          internalId,
          options.vector,
          options.embeddingModel ?? "unknown",
          createdAt,
        );
      } catch (error) {
        this.#logger?.warn({ memoryId, err: errorMessage(error) }, "Failed to store embedding");
      }
    }

    await this.#linkOwner(input.userId, memoryId, internalId);

    return { memoryId, internalId, createdAt };
  }

  async getMemory(memoryId: string): Promise<MemoryRecord | undefined> {
    return this.#memories.getMemory(memoryId);
  }

  /**
   * Creates the user on first sight. Returns `true` when a user was created.
   */
  async ensureUser(userId: string): Promise<boolean> {
    const existing = await this.#users.getUser(userId).catch((error: unknown) => {
      this.#logger?.debug({ userId, err: errorMessage(error) }, "User lookup failed");
      return undefined;
    });
    if (existing) {
      return false;
    }
    await this.#users.addUser(userId, userId);
    this.#logger?.info({ userId }, "Created user");
    return true;
  }

  async #linkOwner(userId: string, memoryId: string, internalId: string): Promise<void> {
    try {
      await this.ensureUser(userId);
    } catch (error) {
      this.#logger?.warn({ userId, err: errorMessage(error) }, "Failed to create user");
    }
    try {
      await this.#users.linkUserToMemory(userId, internalId);
    } catch (error) {
      this.#logger?.warn(
        { userId, memoryId, err: errorMessage(error) },
        "Failed to link memory to user",
      );
    }
  }
}
