import { z } from "zod";
import type { SearchMode } from "../../schemas/search";
import { containsKeyword } from "../../utils/text";
import queryPatterns from "./data/query-patterns.json";

const PhraseList = z.array(z.string().min(1));

const QueryPatternsSchema = z.object({
  intents: z.record(PhraseList),
  intentConcepts: z.record(z.string().min(1)),
  expansions: z.record(PhraseList),
  breadthTerms: PhraseList,
});
export type QueryPatterns = z.infer<typeof QueryPatternsSchema>;

export interface ProcessedQuery {
  originalQuery: string;
  /** The query followed by its expansion terms. */
  enhancedQuery: string;
  detectedIntents: string[];
  conceptHints: string[];
  expandedTerms: string[];
  suggestedMode?: SearchMode;
  confidence: number;
}

export interface QueryProcessorOptions {
  patterns?: QueryPatterns;
  enableExpansion?: boolean;
  maxExpansions?: number;
}

const RECENT_INTENT = "recent";
const DEFAULT_MAX_EXPANSIONS = 5;

let defaultPatterns: QueryPatterns | undefined;

export function defaultQueryPatterns(): QueryPatterns {
  defaultPatterns ??= QueryPatternsSchema.parse(queryPatterns);
  return defaultPatterns;
}

export function emptyProcessedQuery(query: string): ProcessedQuery {
  return {
    originalQuery: query,
    enhancedQuery: query,
    detectedIntents: [],
    conceptHints: [],
    expandedTerms: [],
    confidence: 0,
  };
}

/**
 * Rule-based query understanding ahead of concept search: intents from
 * phrase lists, synonyms appended to the query, and a search mode hint.
 */
export class QueryProcessor {
  #patterns: QueryPatterns;
  #enableExpansion: boolean;
  #maxExpansions: number;

  constructor(options: QueryProcessorOptions = {}) {
    this.#patterns = options.patterns ?? defaultQueryPatterns();
    this.#enableExpansion = options.enableExpansion ?? true;
    this.#maxExpansions = Math.max(0, options.maxExpansions ?? DEFAULT_MAX_EXPANSIONS);
  }

  process(query: string): ProcessedQuery {
    if (!query.trim()) {
      return emptyProcessedQuery(query);
    }

    const detectedIntents = this.detectIntents(query);
    const conceptHints = [
      ...new Set(detectedIntents.flatMap((intent) => this.#patterns.intentConcepts[intent] ?? [])),
    ];
    const expandedTerms = this.#enableExpansion ? this.expand(query) : [];

    return {
      originalQuery: query,
      enhancedQuery: expandedTerms.length > 0 ? `${query} ${expandedTerms.join(" ")}` : query,
      detectedIntents,
      conceptHints,
      expandedTerms,
      suggestedMode: this.#suggestMode(query, detectedIntents),
      confidence: Math.min(
        1,
        0.3 + Math.min(0.3, detectedIntents.length * 0.15) + Math.min(0.2, expandedTerms.length * 0.05),
      ),
    };
  }

  detectIntents(query: string): string[] {
    return Object.entries(this.#patterns.intents)
      .filter(([, phrases]) => phrases.some((phrase) => containsKeyword(query, phrase)))
      .map(([intent]) => intent);
  }

  /**
   * Synonyms of every mapped word in the query, in table order, skipping
   * terms the query already has. At most `maxExpansions` are returned.
   */
  expand(query: string): string[] {
    const terms: string[] = [];
    for (const [word, synonyms] of Object.entries(this.#patterns.expansions)) {
      if (!containsKeyword(query, word)) {
        continue;
      }
      for (const synonym of synonyms) {
        if (terms.length >= this.#maxExpansions) {
          return terms;
        }
        if (!terms.includes(synonym) && !containsKeyword(query, synonym)) {
          terms.push(synonym);
        }
      }
    }
    return terms;
  }

  #suggestMode(query: string, intents: string[]): SearchMode | undefined {
    if (intents.includes(RECENT_INTENT)) {
      return "recent";
    }
    if (this.#patterns.breadthTerms.some((term) => containsKeyword(query, term))) {
      return "deep";
    }
    return intents.length > 0 ? "contextual" : undefined;
  }
}
