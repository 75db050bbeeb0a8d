import { containsKeyword } from "../../utils/text";

const NEGATION_MARKERS = [
  "not",
  "never",
  "don't",
  "doesn't",
  "isn't",
  "aren't",
  "wasn't",
  "weren't",
  "no longer",
  "actually",
  "but",
  "however",
  "instead",
];

const OPPOSITE_PAIRS: Array<[string, string]> = [
  ["like", "hate"],
  ["love", "hate"],
  ["prefer", "avoid"],
  ["good", "bad"],
  ["always", "never"],
  ["yes", "no"],
  ["best", "worst"],
];

const CHANGE_MARKERS = [
  "switched",
  "changed",
  "no longer",
  "instead",
  "now use",
  "migrated",
  "replaced",
];

export type ContradictionSignal = "negation" | "opposite_sentiment" | "change_marker";

export interface ContradictionAssessment {
  contradicts: boolean;
  signals: ContradictionSignal[];
  /** 0..100 */
  confidence: number;
}

/**
 * Keyword heuristics for "the newer text reverses the older one".
 */
export class ContradictionDetector {
  assess(oldContent: string, newContent: string): ContradictionAssessment {
    const signals: ContradictionSignal[] = [];

    const negated = NEGATION_MARKERS.some(
      (marker) => containsKeyword(newContent, marker) && !containsKeyword(oldContent, marker),
    );
    if (negated) {
      signals.push("negation");
    }

    const opposite = OPPOSITE_PAIRS.some(
      ([left, right]) =>
        (containsKeyword(oldContent, left) && containsKeyword(newContent, right)) ||
        (containsKeyword(oldContent, right) && containsKeyword(newContent, left)),
    );
    if (opposite) {
      signals.push("opposite_sentiment");
    }

    if (CHANGE_MARKERS.some((marker) => containsKeyword(newContent, marker))) {
      signals.push("change_marker");
    }

    return {
      contradicts: signals.length > 0,
      signals,
      confidence: signals.length === 0 ? 0 : Math.min(95, 60 + signals.length * 15),
    };
  }

  detect(oldContent: string, newContent: string): boolean {
    return this.assess(oldContent, newContent).contradicts;
  }
}
