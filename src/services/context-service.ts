import { randomUUID } from "node:crypto";
import { TtlCache } from "../cache/ttl-cache";
import type { AppLogger } from "../logging";
import type { ContextRepository } from "../repositories/context-repository";
import type { ContextDef } from "../schemas/knowledge";
import type { MemoryRecord } from "../schemas/memory";
import { ValidationError, errorMessage } from "./errors";
import { type Clock, type ContextService, systemClock } from "./types";

export interface ContextServiceDependencies {
  repository: ContextRepository;
  cacheSize?: number;
  logger?: AppLogger;
  now?: Clock;
}

export function newContextId(): string {
  return `ctx_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

export class DefaultContextService implements ContextService {
  #repository: ContextRepository;
  #logger?: AppLogger;
  #now: Clock;
  #cache: TtlCache<string, ContextDef>;
  #active = new Map<string, string[]>();
  #warmedUp = false;

  constructor(deps: ContextServiceDependencies) {
    this.#repository = deps.repository;
    this.#logger = deps.logger?.child({ component: "contexts" });
    this.#now = deps.now ?? systemClock;
    this.#cache = new TtlCache({
      maxSize: deps.cacheSize ?? 1_000,
      ttlMs: Number.POSITIVE_INFINITY,
      touchOnGet: false,
    });
  }

  async warmUp(limit = 100): Promise<number> {
    if (this.#warmedUp) {
      return this.#cache.size;
    }
    try {
      const contexts = await this.#repository.getRecentContexts(limit);
      contexts.forEach((context) => this.#cache.set(context.contextId, context));
      this.#warmedUp = true;
      this.#logger?.info({ contexts: this.#cache.size }, "Context cache warmed up");
    } catch (error) {
      this.#logger?.warn({ err: errorMessage(error) }, "Context warm-up failed, continuing cold");
    }
    return this.#cache.size;
  }

  async createContext(name: string, properties: Record<string, unknown> = {}): Promise<ContextDef> {
    if (!name.trim()) {
      throw new ValidationError("Context name cannot be empty", "name");
    }

    const context: ContextDef = {
      contextId: newContextId(),
      name: name.trim(),
      properties,
      createdAt: this.#now().toISOString(),
    };

    try {
      await this.#repository.addContext(context);
      this.#logger?.info({ contextId: context.contextId, name: context.name }, "Created context");
    } catch (error) {
      this.#logger?.warn(
        { name: context.name, err: errorMessage(error) },
        "Failed to persist context, keeping it in cache only",
      );
    }

    this.#cache.set(context.contextId, context);
    return context;
  }

  async getContext(contextId: string): Promise<ContextDef | undefined> {
    const cached = this.#cache.get(contextId);
    if (cached) {
      return cached;
    }
    try {
      const context = await this.#repository.getContext(contextId);
      if (context) {
        this.#cache.set(context.contextId, context);
      }
      return context;
    } catch (error) {
      this.#logger?.warn({ contextId, err: errorMessage(error) }, "Context lookup failed");
      return undefined;
    }
  }

  async getContextByName(name: string): Promise<ContextDef | undefined> {
    const wanted = name.trim().toLowerCase();
    const cached = this.#cache.values().find((context) => context.name.toLowerCase() === wanted);
    if (cached) {
      return cached;
    }
    try {
      const context = await this.#repository.getContextByName(name);
      if (context) {
        this.#cache.set(context.contextId, context);
      }
      return context;
    } catch (error) {
      this.#logger?.debug({ name, err: errorMessage(error) }, "Context not found by name");
      return undefined;
    }
  }

  /**
   * Returns `false` when the store rejected the link.
   */
  async linkMemoryToContext(
    internalMemoryId: string,
    contextId: string,
    priority: number,
  ): Promise<boolean> {
    if (!Number.isInteger(priority) || priority < 0 || priority > 100) {
      throw new ValidationError(
        `Priority must be between 0 and 100, got ${priority}`,
        "priority",
      );
    }
    try {
      await this.#repository.linkMemory(internalMemoryId, contextId, priority);
      return true;
    } catch (error) {
      this.#logger?.warn(
        { internalMemoryId, contextId, err: errorMessage(error) },
        "Failed to link memory to context",
      );
      return false;
    }
  }

  activateContext(userId: string, contextId: string): void {
    const contexts = this.#active.get(userId) ?? [];
    if (!contexts.includes(contextId)) {
      contexts.push(contextId);
    }
    this.#active.set(userId, contexts);
  }

  deactivateContext(userId: string, contextId: string): boolean {
    const contexts = this.#active.get(userId);
    if (!contexts) {
      return false;
    }
    this.#active.set(
      userId,
      contexts.filter((candidate) => candidate !== contextId),
    );
    return true;
  }

  getActiveContexts(userId: string): string[] {
    return [...(this.#active.get(userId) ?? [])];
  }

  /**
   * Keeps memories tagged with any active context of the user, or all of them
   * when the user has none active.
   */
  filterByContext(memories: MemoryRecord[], userId: string): MemoryRecord[] {
    const active = this.#activeNames(userId);
    if (active.length === 0) {
      return memories;
    }
    return memories.filter((memory) => {
      const tags = memory.contextTags.map((tag) => tag.toLowerCase());
      return active.some((name) => tags.includes(name));
    });
  }

  calculateContextRelevance(memory: MemoryRecord, userId: string): number {
    const active = this.#activeNames(userId);
    if (active.length === 0) {
      return 1;
    }
    const tags = memory.contextTags.map((tag) => tag.toLowerCase());
    if (tags.length === 0) {
      return 0.5;
    }
    const matches = active.filter((name) => tags.includes(name)).length;
    return matches / active.length;
  }

  get cachedCount(): number {
    return this.#cache.size;
  }

  /**
   * Active entries are context ids; memories are tagged by name.
   */
  #activeNames(userId: string): string[] {
    return this.getActiveContexts(userId).map(
      (contextId) => (this.#cache.peek(contextId)?.name ?? contextId).toLowerCase(),
    );
  }
}
