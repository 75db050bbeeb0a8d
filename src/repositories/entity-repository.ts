import { z } from "zod";
import type { QueryExecutor } from "../database/client";
import {
  CountResponseSchema,
  EntitiesResponseSchema,
  EntityResponseSchema,
  type EntityNode,
} from "../schemas/store";
import type { EntityRecord } from "../schemas/knowledge";
import { toEntityType } from "../schemas/knowledge";
import { BaseRepository } from "./base";
import type { NewEntityRow } from "./types";

const PropertiesSchema = z.record(z.unknown());
const AliasesSchema = z.array(z.string());

export class EntityRepository extends BaseRepository {
  constructor(client: QueryExecutor) {
    super(client);
  }

  async createEntity(row: NewEntityRow): Promise<void> {
    await this.command("createEntity", {
      entity_id: row.entityId,
      name: row.name,
      entity_type: row.entityType,
      properties: this.stringifyJson(row.properties),
      aliases: JSON.stringify(row.aliases),
    });
  }

  async getEntity(entityId: string): Promise<EntityRecord | undefined> {
    const response = await this.find("getEntity", { entity_id: entityId }, EntityResponseSchema);
    return response?.entity ? this.toRecord(response.entity) : undefined;
  }

  async getEntityByName(name: string): Promise<EntityRecord | undefined> {
    const response = await this.find("getEntityByName", { name }, EntityResponseSchema);
    return response?.entity ? this.toRecord(response.entity) : undefined;
  }

  async getEntitiesForMemory(memoryId: string): Promise<EntityRecord[]> {
    const response = await this.find(
      "getEntitiesForMemory",
      { memory_id: memoryId },
      EntitiesResponseSchema,
    );
    return (response?.entities ?? []).map((entity) => this.toRecord(entity));
  }

  async searchEntities(query: string, limit: number): Promise<EntityRecord[]> {
    const response = await this.find(
      "searchEntities",
      { query, limit },
      EntitiesResponseSchema,
    );
    return (response?.entities ?? []).map((entity) => this.toRecord(entity));
  }

  async linkExtracted(
    internalMemoryId: string,
    entityId: string,
    confidence: number,
    method: string,
  ): Promise<void> {
    await this.command("linkExtractedEntity", {
      memory_id: internalMemoryId,
      entity_id: entityId,
      confidence,
      method,
    });
  }

  async linkMentions(
    internalMemoryId: string,
    entityId: string,
    salience: number,
    sentiment: string,
  ): Promise<void> {
    await this.command("linkMentionsEntity", {
      memory_id: internalMemoryId,
      entity_id: entityId,
      salience,
      sentiment,
    });
  }

  async countEntities(): Promise<number> {
    const response = await this.query("countAllEntities", {}, CountResponseSchema);
    return response.count;
  }

  toRecord(node: EntityNode): EntityRecord {
    return {
      entityId: node.entity_id,
      name: node.name,
      entityType: toEntityType(node.entity_type),
      properties: this.parseJson(node.properties, PropertiesSchema, {}),
      aliases: this.parseJson(node.aliases, AliasesSchema, []),
    };
  }
}
