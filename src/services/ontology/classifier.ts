import { z } from "zod";
import type { ConceptMatch } from "../../schemas/knowledge";
import { containsKeyword } from "../../utils/text";
import keywordTable from "./classifier-keywords.json";

const KeywordTableSchema = z.record(z.array(z.string().min(1)).min(1));
export type KeywordTable = z.infer<typeof KeywordTableSchema>;

export interface ClassifiedConcept extends ConceptMatch {
  matchedKeywords: string[];
}

let defaultTable: KeywordTable | undefined;

export function defaultKeywordTable(): KeywordTable {
  defaultTable ??= KeywordTableSchema.parse(keywordTable);
  return defaultTable;
}

/**
 * Scores each concept by the fraction of its keywords present in the text as
 * whole words. Results are sorted by confidence, highest first.
 */
export class ConceptClassifier {
  #table: KeywordTable;

  constructor(table: KeywordTable = defaultKeywordTable()) {
    this.#table = table;
  }

  get conceptIds(): string[] {
    return Object.keys(this.#table);
  }

  classify(text: string, minConfidence = 0.1, topK?: number): ClassifiedConcept[] {
    const matches: ClassifiedConcept[] = [];

    for (const [conceptId, keywords] of Object.entries(this.#table)) {
      const matchedKeywords = keywords.filter((keyword) => containsKeyword(text, keyword));
      if (matchedKeywords.length === 0) {
        continue;
      }
      const confidence = matchedKeywords.length / keywords.length;
      if (confidence >= minConfidence) {
        matches.push({ conceptId, confidence, matchType: "keyword", matchedKeywords });
      }
    }

    matches.sort(
      (left, right) =>
        right.confidence - left.confidence || left.conceptId.localeCompare(right.conceptId),
    );
    return topK === undefined ? matches : matches.slice(0, topK);
  }
}
