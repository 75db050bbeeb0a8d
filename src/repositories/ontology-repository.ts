import type { QueryExecutor } from "../database/client";
import {
  ConceptsResponseSchema,
  CountResponseSchema,
  MemoryConceptsSchema,
  OntologyCheckSchema,
  type ConceptNode,
  type MemoryConcepts,
} from "../schemas/store";
import { BaseRepository } from "./base";

export class OntologyRepository extends BaseRepository {
  constructor(client: QueryExecutor) {
    super(client);
  }

  async isInitialized(): Promise<boolean> {
    const response = await this.find("checkOntologyInitialized", {}, OntologyCheckSchema);
    return response?.thing !== undefined && response.thing !== null;
  }

  async initializeBase(): Promise<void> {
    await this.command("initializeBaseOntology", {});
  }

  async getAllConcepts(): Promise<ConceptNode[]> {
    const response = await this.query("getAllConcepts", {}, ConceptsResponseSchema);
    return response.concepts;
  }

  async getMemoryConcepts(memoryId: string): Promise<MemoryConcepts> {
    const response = await this.find(
      "getMemoryConcepts",
      { memory_id: memoryId },
      MemoryConceptsSchema,
    );
    return response ?? { instance_of: [], belongs_to: [] };
  }

  async linkInstanceOf(
    internalMemoryId: string,
    conceptId: string,
    confidence: number,
  ): Promise<void> {
    await this.command("linkMemoryToInstanceOf", {
      memory_id: internalMemoryId,
      concept_id: conceptId,
      confidence,
    });
  }

  async linkCategory(
    internalMemoryId: string,
    conceptId: string,
    relevance: number,
  ): Promise<void> {
    await this.command("linkMemoryToCategory", {
      memory_id: internalMemoryId,
      concept_id: conceptId,
      relevance,
    });
  }

  async countConcepts(): Promise<number> {
    const response = await this.query("countAllConcepts", {}, CountResponseSchema);
    return response.count;
  }
}
