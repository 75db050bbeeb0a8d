import type { AppLogger } from "../logging";
import type { OntologyRepository } from "../repositories/ontology-repository";
import type { Concept, ConceptMatch } from "../schemas/knowledge";
import type { MemoryType } from "../schemas/memory";
import type { ConceptNode } from "../schemas/store";
import { errorMessage } from "./errors";
import { ConceptClassifier, type ClassifiedConcept } from "./ontology/classifier";
import type { OntologyService } from "./types";

export interface OntologyServiceDependencies {
  repository: OntologyRepository;
  classifier?: ConceptClassifier;
  logger?: AppLogger;
}

export interface ConceptLinkSummary {
  instanceOf: string[];
  categories: string[];
  failed: number;
}

export interface OntologyStats {
  loaded: boolean;
  totalConcepts: number;
  totalRelations: number;
  maxLevel: number;
}

const CATEGORY_MIN_CONFIDENCE = 0.1;
const MEMORY_TYPE_CONFIDENCE = 90;

export function toConcept(node: ConceptNode): Concept {
  return {
    conceptId: node.concept_id,
    name: node.name,
    conceptType: node.level <= 2 ? "abstract" : "concrete",
    description: node.description ?? "",
    parentConcept: node.parent_id ?? null,
    level: node.level,
  };
}

export function conceptIdForMemoryType(memoryType: MemoryType): string {
  return memoryType.charAt(0).toUpperCase() + memoryType.slice(1);
}

/**
 * In-process view of the concept tree. The tree is read from the store once and
 * is read-only afterwards.
 */
export class DefaultOntologyService implements OntologyService {
  #repository: OntologyRepository;
  #classifier: ConceptClassifier;
  #logger?: AppLogger;
  #concepts = new Map<string, Concept>();
  #loaded = false;
  #loading?: Promise<void>;

  constructor(deps: OntologyServiceDependencies) {
    this.#repository = deps.repository;
    this.#classifier = deps.classifier ?? new ConceptClassifier();
    this.#logger = deps.logger?.child({ component: "ontology" });
  }

  get isLoaded(): boolean {
    return this.#loaded;
  }

  async load(): Promise<void> {
    if (this.#loaded) {
      return;
    }
    this.#loading ??= this.#loadOnce().finally(() => {
      this.#loading = undefined;
    });
    await this.#loading;
  }

  /**
   * Loads the tree if needed; a failed load is logged and reported as `false`.
   */
  async ensureLoaded(): Promise<boolean> {
    try {
      await this.load();
      return true;
    } catch (error) {
      this.#logger?.warn({ err: errorMessage(error) }, "Ontology unavailable");
      return false;
    }
  }

  getConcept(conceptId: string): Concept | undefined {
    return this.#concepts.get(conceptId);
  }

  listConcepts(): Concept[] {
    return Array.from(this.#concepts.values());
  }

  getSubtypes(conceptId: string): Concept[] {
    return this.listConcepts().filter((concept) => concept.parentConcept === conceptId);
  }

  /**
   * Walks parent pointers toward the root. The walk stops at a missing parent,
   * a revisited node, or a parent whose level is not strictly lower.
   */
  getAncestors(conceptId: string): Concept[] {
    const ancestors: Concept[] = [];
    const visited = new Set<string>([conceptId]);
    let current = this.#concepts.get(conceptId);

    while (current?.parentConcept) {
      const parent = this.#concepts.get(current.parentConcept);
      if (!parent || visited.has(parent.conceptId) || parent.level >= current.level) {
        if (parent) {
          this.#logger?.warn(
            { conceptId: current.conceptId, parentId: parent.conceptId },
            "Ignoring parent pointer that does not ascend the hierarchy",
          );
        }
        break;
      }
      ancestors.push(parent);
      visited.add(parent.conceptId);
      current = parent;
    }

    return ancestors;
  }

  getDepth(conceptId: string): number {
    return this.getAncestors(conceptId).length;
  }

  classify(text: string, minConfidence = CATEGORY_MIN_CONFIDENCE): ConceptMatch[] {
    return this.#classify(text, minConfidence).map(({ conceptId, confidence, matchType }) => ({
      conceptId,
      confidence,
      matchType,
    }));
  }

  /**
   * Writes INSTANCE_OF for the memory's own type and BELONGS_TO_CATEGORY for
   * every other keyword match. Only concepts present in the loaded tree are linked.
   */
  async linkMemoryToConcepts(
    internalMemoryId: string,
    content: string,
    memoryType: MemoryType,
  ): Promise<ConceptLinkSummary> {
    const summary: ConceptLinkSummary = { instanceOf: [], categories: [], failed: 0 };
    if (!(await this.ensureLoaded())) {
      return summary;
    }

    const typeConcept = conceptIdForMemoryType(memoryType);
    if (this.#concepts.has(typeConcept)) {
      try {
        await this.#repository.linkInstanceOf(internalMemoryId, typeConcept, MEMORY_TYPE_CONFIDENCE);
        summary.instanceOf.push(typeConcept);
      } catch (error) {
        summary.failed += 1;
        this.#logger?.warn(
          { internalMemoryId, conceptId: typeConcept, err: errorMessage(error) },
          "Failed to link memory to concept",
        );
      }
    }

    for (const match of this.#classify(content, CATEGORY_MIN_CONFIDENCE)) {
      if (match.conceptId === typeConcept || !this.#concepts.has(match.conceptId)) {
        continue;
      }
      try {
        await this.#repository.linkCategory(
          internalMemoryId,
          match.conceptId,
          Math.round(match.confidence * 100),
        );
        summary.categories.push(match.conceptId);
      } catch (error) {
        summary.failed += 1;
        this.#logger?.warn(
          { internalMemoryId, conceptId: match.conceptId, err: errorMessage(error) },
          "Failed to link memory to category",
        );
      }
    }

    return summary;
  }

  stats(): OntologyStats {
    const concepts = this.listConcepts();
    return {
      loaded: this.#loaded,
      totalConcepts: concepts.length,
      totalRelations: concepts.filter((concept) => concept.parentConcept !== null).length,
      maxLevel: concepts.reduce((max, concept) => Math.max(max, concept.level), 0),
    };
  }

  #classify(text: string, minConfidence: number): ClassifiedConcept[] {
    return this.#classifier.classify(text, minConfidence);
  }

  async #loadOnce(): Promise<void> {
    if (!(await this.#repository.isInitialized())) {
      this.#logger?.info("Ontology not initialized, creating base ontology");
      await this.#repository.initializeBase();
    }

    const nodes = await this.#repository.getAllConcepts();
    this.#concepts = new Map(nodes.map((node) => [node.concept_id, toConcept(node)]));
    this.#loaded = true;
    this.#logger?.info({ concepts: this.#concepts.size }, "Ontology loaded");
  }
}
