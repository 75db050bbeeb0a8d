import { z } from "zod";
import type { QueryExecutor } from "../database/client";
import {
  ContextResponseSchema,
  ContextsResponseSchema,
  type ContextNode,
} from "../schemas/store";
import type { ContextDef } from "../schemas/knowledge";
import { BaseRepository } from "./base";
import type { NewContextRow } from "./types";

const PropertiesSchema = z.record(z.unknown());

export class ContextRepository extends BaseRepository {
  constructor(client: QueryExecutor) {
    super(client);
  }

  async addContext(row: NewContextRow): Promise<void> {
    await this.command("addContext", {
      context_id: row.contextId,
      name: row.name,
      properties: this.stringifyJson(row.properties),
      created_at: row.createdAt,
    });
  }

  async getContext(contextId: string): Promise<ContextDef | undefined> {
    const response = await this.find(
      "getContext",
      { context_id: contextId },
      ContextResponseSchema,
    );
    return response?.context ? this.toDef(response.context) : undefined;
  }

  async getContextByName(name: string): Promise<ContextDef | undefined> {
    const response = await this.find("getContextByName", { name }, ContextResponseSchema);
    return response?.context ? this.toDef(response.context) : undefined;
  }

  async linkMemory(internalMemoryId: string, contextId: string, priority: number): Promise<void> {
    await this.command("linkMemoryToContext", {
      memory_id: internalMemoryId,
      context_id: contextId,
      priority,
    });
  }

  async getRecentContexts(limit: number): Promise<ContextDef[]> {
    const response = await this.find("getRecentContexts", { limit }, ContextsResponseSchema);
    return (response?.contexts ?? []).map((context) => this.toDef(context));
  }

  toDef(node: ContextNode): ContextDef {
    return {
      contextId: node.context_id,
      name: node.name,
      properties: this.parseJson(node.properties, PropertiesSchema, {}),
      createdAt: node.created_at ?? "",
    };
  }
}
