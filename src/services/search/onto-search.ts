import { z } from "zod";
import type { AppLogger } from "../../logging";
import type { OntologyRepository } from "../../repositories/ontology-repository";
import type { ConceptMatch } from "../../schemas/knowledge";
import type { OntoSearchResult, SearchMode, SearchResult, TagMatch } from "../../schemas/search";
import { containsKeyword } from "../../utils/text";
import { errorMessage } from "../errors";
import { ConceptClassifier, type KeywordTable } from "../ontology/classifier";
import { type Clock, systemClock } from "../types";
import conceptKeywords from "./data/concept-keywords.json";
import knownTags from "./data/known-tags.json";
import { CONNECTION_FIELDS, type HitFilter } from "./graph";
import { ontoSearchSettings, type OntoSearchSettings } from "./modes";
import { QueryProcessor } from "./query-processor";
import { clamp01 } from "./scoring";
import type { SmartTraversal } from "./smart-traversal";

const INTENT_HINT_CONFIDENCE = 0.5;

let queryTable: KeywordTable | undefined;
let tagList: string[] | undefined;

function defaultQueryTable(): KeywordTable {
  queryTable ??= z.record(z.array(z.string().min(1)).min(1)).parse(conceptKeywords);
  return queryTable;
}

function defaultTags(): string[] {
  tagList ??= z.array(z.string().min(1)).parse(knownTags);
  return tagList;
}

export interface OntoSearchRequest {
  query: string;
  vector: number[];
  userId?: string;
  /** Falls back to the mode the query suggests, then to the default mode. */
  mode?: SearchMode;
  limit: number;
  /** Restricts results to memories linked to this concept. */
  conceptType?: string;
  tags?: string[];
}

export interface OntoSearchOptions {
  classifier?: ConceptClassifier;
  queryProcessor?: QueryProcessor;
  tags?: string[];
  defaultMode?: SearchMode;
  logger?: AppLogger;
  now?: Clock;
}

export function conceptOverlap(
  queryConcepts: ConceptMatch[],
  memoryConcepts: string[],
  boostExactConceptMatch: number,
): number {
  if (queryConcepts.length === 0 || memoryConcepts.length === 0) {
    return 0;
  }
  const maxScore = queryConcepts.reduce((sum, concept) => sum + concept.confidence, 0);
  if (maxScore <= 0) {
    return 0;
  }
  const total = queryConcepts
    .filter((concept) => memoryConcepts.includes(concept.conceptId))
    .reduce((sum, concept) => sum + concept.confidence + boostExactConceptMatch, 0);
  return Math.min(1, total / maxScore);
}

/**
 * Fraction of query tags present in the content, plus the tag boost when at
 * least one matched.
 */
export function tagOverlap(queryTags: string[], content: string, boostTagMatch: number): number {
  if (queryTags.length === 0) {
    return 0;
  }
  const matches = queryTags.filter((tag) => containsKeyword(content, tag)).length;
  if (matches === 0) {
    return 0;
  }
  return Math.min(1, matches / queryTags.length + boostTagMatch);
}

/**
 * Weighted multi-signal search: vector similarity, concept overlap, tag
 * overlap, graph proximity and recency, mixed per search mode.
 */
export class OntoSearch {
  #traversal: SmartTraversal;
  #ontology: OntologyRepository;
  #classifier: ConceptClassifier;
  #queryProcessor: QueryProcessor;
  #tags: string[];
  #defaultMode: SearchMode;
  #logger?: AppLogger;
  #now: Clock;

  constructor(
    traversal: SmartTraversal,
    ontology: OntologyRepository,
    options: OntoSearchOptions = {},
  ) {
    this.#traversal = traversal;
    this.#ontology = ontology;
    this.#classifier = options.classifier ?? new ConceptClassifier(defaultQueryTable());
    this.#queryProcessor = options.queryProcessor ?? new QueryProcessor();
    this.#tags = options.tags ?? defaultTags();
    this.#defaultMode = options.defaultMode ?? "recent";
    this.#logger = options.logger?.child({ component: "onto-search" });
    this.#now = options.now ?? systemClock;
  }

  classifyQuery(query: string, maxConcepts: number): ConceptMatch[] {
    return this.#classifier
      .classify(query, 0, maxConcepts)
      .map(({ conceptId, confidence, matchType }) => ({ conceptId, confidence, matchType }));
  }

  extractTags(query: string, maxTags: number): string[] {
    return this.#tags.filter((tag) => containsKeyword(query, tag)).slice(0, maxTags);
  }

  async search(request: OntoSearchRequest): Promise<OntoSearchResult[]> {
    const processed = this.#queryProcessor.process(request.query);
    const mode = request.mode ?? processed.suggestedMode ?? this.#defaultMode;
    const settings = ontoSearchSettings(mode);
    const now = this.#now();

    const queryConcepts = this.classifyQuery(
      processed.enhancedQuery,
      settings.maxConceptsPerQuery,
    );
    for (const hint of processed.conceptHints) {
      if (
        queryConcepts.length < settings.maxConceptsPerQuery &&
        !queryConcepts.some((concept) => concept.conceptId === hint)
      ) {
        queryConcepts.push({
          conceptId: hint,
          confidence: INTENT_HINT_CONFIDENCE,
          matchType: "intent",
        });
      }
    }
    if (
      request.conceptType &&
      !queryConcepts.some((concept) => concept.conceptId === request.conceptType)
    ) {
      queryConcepts.push({ conceptId: request.conceptType, confidence: 1, matchType: "explicit" });
    }
    const queryTags = [
      ...new Set([
        ...this.extractTags(processed.enhancedQuery, settings.maxTagsPerQuery),
        ...(request.tags ?? []).map((tag) => tag.trim().toLowerCase()).filter(Boolean),
      ]),
    ];

    const filter: HitFilter = {
      userId: request.userId,
      now,
      cutoff:
        settings.temporalWindowHours === null
          ? undefined
          : new Date(now.getTime() - settings.temporalWindowHours * 3_600_000),
    };
    const config = {
      vectorTopK: Math.max(settings.vectorTopK, request.limit),
      graphDepth: settings.graphDepth,
      minVectorScore: 0,
      minCombinedScore: 0,
      edgeTypes: CONNECTION_FIELDS,
      temporalDecayDays: settings.temporalDecayDays,
    };

    const seeds = await this.#traversal.vectorPhase(
      request.vector,
      config,
      filter,
      settings.temporalDecayDays,
    );
    const expanded =
      seeds.length > 0
        ? await this.#traversal.graphPhase(
            seeds,
            request.vector,
            config,
            filter,
            settings.temporalDecayDays,
          )
        : [];

    const scored = await Promise.all(
      [...seeds, ...expanded].map((result) =>
        this.#score(result, queryConcepts, queryTags, settings),
      ),
    );

    const best = new Map<string, OntoSearchResult>();
    for (const result of scored) {
      const conceptMatched = result.matchedConcepts.some(
        (concept) => concept.conceptId === request.conceptType,
      );
      if (request.conceptType && !conceptMatched) {
        continue;
      }
      const existing = best.get(result.memoryId);
      if (!existing || result.finalScore > existing.finalScore) {
        best.set(result.memoryId, result);
      }
    }

    const results = Array.from(best.values())
      .filter((result) => result.finalScore >= settings.minFinalScore)
      .sort((left, right) => right.finalScore - left.finalScore)
      .slice(0, request.limit);

    this.#logger?.debug(
      {
        mode,
        intents: processed.detectedIntents,
        expansions: processed.expandedTerms,
        concepts: queryConcepts.map((concept) => concept.conceptId),
        tags: queryTags,
        results: results.length,
      },
      "Onto-search completed",
    );
    return results;
  }

  async #score(
    result: SearchResult,
    queryConcepts: ConceptMatch[],
    queryTags: string[],
    settings: OntoSearchSettings,
  ): Promise<OntoSearchResult> {
    const memoryConcepts = await this.#memoryConcepts(result.memoryId);
    const conceptScore = conceptOverlap(
      queryConcepts,
      memoryConcepts,
      settings.boostExactConceptMatch,
    );
    const tagScore = tagOverlap(queryTags, result.content, settings.boostTagMatch);
    const matchedTags: TagMatch[] = queryTags
      .filter((tag) => containsKeyword(result.content, tag))
      .map((tag) => ({ tag, score: 1 }));

    const { weights } = settings;
    const finalScore = clamp01(
      result.vectorScore * weights.vector +
        conceptScore * weights.concept +
        tagScore * weights.tag +
        result.graphScore * weights.graph +
        result.temporalScore * weights.temporal,
    );

    return {
      memoryId: result.memoryId,
      content: result.content,
      memoryType: result.memoryType,
      userId: result.userId,
      createdAt: result.createdAt,
      vectorScore: result.vectorScore,
      conceptScore,
      tagScore,
      graphScore: result.graphScore,
      temporalScore: result.temporalScore,
      finalScore,
      matchedConcepts: queryConcepts.filter((concept) =>
        memoryConcepts.includes(concept.conceptId),
      ),
      matchedTags,
      depth: result.depth,
      source: result.source,
    };
  }

  async #memoryConcepts(memoryId: string): Promise<string[]> {
    try {
      const concepts = await this.#ontology.getMemoryConcepts(memoryId);
      return [
        ...concepts.instance_of.map((concept) => concept.concept_id),
        ...concepts.belongs_to.map((concept) => concept.concept_id),
      ];
    } catch (error) {
      this.#logger?.debug({ memoryId, err: errorMessage(error) }, "Concept lookup failed");
      return [];
    }
  }
}
