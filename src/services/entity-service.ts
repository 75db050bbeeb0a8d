import { randomUUID } from "node:crypto";
import type nlp from "compromise";
import { TtlCache } from "../cache/ttl-cache";
import type { AppLogger } from "../logging";
import type { EntityRepository } from "../repositories/entity-repository";
import {
  toEntityType,
  type EntityRecord,
  type ExtractedEntity,
} from "../schemas/knowledge";
import { ValidationError, errorMessage } from "./errors";
import type { EntityExtractor, EntityLink, EntityService } from "./types";

export interface EntityServiceDependencies {
  repository: EntityRepository;
  cacheSize: number;
  logger?: AppLogger;
}

export function newEntityId(): string {
  return `ent_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Canonical entity nodes behind a bounded cache and a lowercase name index.
 * The cache is authoritative for in-process dedup: an entity the store failed
 * to persist is still returned by later lookups of the same name.
 */
export class DefaultEntityService implements EntityService {
  #repository: EntityRepository;
  #logger?: AppLogger;
  #cache: TtlCache<string, EntityRecord>;
  #nameIndex = new Map<string, string>();

  constructor(deps: EntityServiceDependencies) {
    this.#repository = deps.repository;
    this.#logger = deps.logger?.child({ component: "entities" });
    this.#cache = new TtlCache({
      maxSize: deps.cacheSize,
      ttlMs: Number.POSITIVE_INFINITY,
      touchOnGet: false,
      onEvict: (_entityId, entity) => {
        this.#nameIndex.delete(normalizeName(entity.name));
      },
    });
  }

  async createEntity(
    name: string,
    entityType: string,
    properties: Record<string, unknown> = {},
  ): Promise<EntityRecord> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError("Entity name cannot be empty", "name");
    }

    const entity: EntityRecord = {
      entityId: newEntityId(),
      name: trimmed,
      entityType: toEntityType(entityType),
      properties,
      aliases: [],
    };

    try {
      await this.#repository.createEntity({
        entityId: entity.entityId,
        name: entity.name,
        entityType: entity.entityType,
        properties: entity.properties,
        aliases: entity.aliases,
      });
      this.#logger?.info(
        { entityId: entity.entityId, name: entity.name, entityType: entity.entityType },
        "Created entity",
      );
    } catch (error) {
      this.#logger?.warn(
        { name: entity.name, err: errorMessage(error) },
        "Failed to persist entity, keeping it in cache only",
      );
    }

    this.#remember(entity);
    return entity;
  }

  async getEntity(entityId: string): Promise<EntityRecord | undefined> {
    const cached = this.#cache.get(entityId);
    if (cached) {
      return cached;
    }

    try {
      const entity = await this.#repository.getEntity(entityId);
      if (entity) {
        this.#remember(entity);
      }
      return entity;
    } catch (error) {
      this.#logger?.warn({ entityId, err: errorMessage(error) }, "Entity lookup failed");
      return undefined;
    }
  }

  async getOrCreateEntity(
    name: string,
    entityType: string,
    properties: Record<string, unknown> = {},
  ): Promise<EntityRecord> {
    const normalized = normalizeName(name);
    if (!normalized) {
      throw new ValidationError("Entity name cannot be empty", "name");
    }

    const knownId = this.#nameIndex.get(normalized);
    const known = knownId ? this.#cache.get(knownId) : undefined;
    if (known) {
      return known;
    }

    try {
      const stored = await this.#repository.getEntityByName(name.trim());
      if (stored) {
        this.#remember(stored);
        return stored;
      }
    } catch (error) {
      this.#logger?.debug({ name, err: errorMessage(error) }, "Entity not found by name");
    }

    return this.createEntity(name, entityType, properties);
  }

  async linkToMemory(
    entityId: string,
    internalMemoryId: string,
    link: EntityLink,
  ): Promise<void> {
    if (link.kind === "extracted") {
      await this.#repository.linkExtracted(
        internalMemoryId,
        entityId,
        link.confidence,
        link.method ?? "llm",
      );
    } else {
      await this.#repository.linkMentions(
        internalMemoryId,
        entityId,
        link.salience,
        link.sentiment ?? "neutral",
      );
    }
    this.#logger?.debug({ entityId, internalMemoryId, kind: link.kind }, "Linked entity");
  }

  async getEntitiesForMemory(memoryId: string): Promise<EntityRecord[]> {
    try {
      const entities = await this.#repository.getEntitiesForMemory(memoryId);
      entities.forEach((entity) => this.#remember(entity));
      return entities;
    } catch (error) {
      this.#logger?.warn({ memoryId, err: errorMessage(error) }, "Failed to load memory entities");
      return [];
    }
  }

  async searchEntities(query: string, limit = 10): Promise<EntityRecord[]> {
    try {
      const entities = await this.#repository.searchEntities(query, limit);
      entities.forEach((entity) => this.#remember(entity));
      return entities;
    } catch (error) {
      this.#logger?.warn({ query, err: errorMessage(error) }, "Entity search failed");
      return [];
    }
  }

  cacheStats(): { entities: number; names: number } {
    return { entities: this.#cache.size, names: this.#nameIndex.size };
  }

  #remember(entity: EntityRecord): void {
    this.#cache.set(entity.entityId, entity);
    this.#nameIndex.set(normalizeName(entity.name), entity.entityId);
  }
}

export interface CompromiseEntityExtractorOptions {
  /**
   * Custom compromise instance (for testability). Default uses dynamic import.
   */
  nlp?: typeof nlp;
}

function toStrings(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
}

/**
 * Rule-based extraction used when no LLM is configured.
 */
export class CompromiseEntityExtractor implements EntityExtractor {
  #nlp?: typeof nlp;

  constructor(private readonly options: CompromiseEntityExtractorOptions = {}) {}

  async extract(text: string): Promise<ExtractedEntity[]> {
    if (!text.trim()) {
      return [];
    }

    const engine = await this.#loadEngine();
    const doc = engine(text);
    const seen = new Map<string, ExtractedEntity>();

    for (const name of toStrings(doc.people().out("array"))) {
      this.#remember(seen, name, "person");
    }

    for (const name of toStrings(doc.places().out("array"))) {
      this.#remember(seen, name, "location");
    }

    for (const name of toStrings(doc.organizations().out("array"))) {
      this.#remember(seen, name, "organization");
    }

    // fallback: simple noun extraction for remaining tokens
    if (seen.size === 0) {
      const nouns = toStrings(doc.nouns().isSingular().out("array"));
      for (const noun of nouns.slice(0, 5)) {
        this.#remember(seen, noun, "concept");
      }
    }

    return Array.from(seen.values());
  }

  async #loadEngine(): Promise<typeof nlp> {
    if (this.options.nlp) {
      return this.options.nlp;
    }
    if (this.#nlp) {
      return this.#nlp;
    }
    const mod = await import("compromise");
    this.#nlp = mod.default;
    return mod.default;
  }

  #remember(cache: Map<string, ExtractedEntity>, name: string, type: string) {
    const normalized = name.trim().replace(/[.,;:!?]+$/, "");
    if (!normalized) {
      return;
    }
    const key = normalized.toLowerCase();
    if (!cache.has(key)) {
      cache.set(key, { name: normalized, type, confidence: 0.6 });
    }
  }
}
