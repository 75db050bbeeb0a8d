import { SearchModeSchema, type SearchMode } from "../../schemas/search";

export interface SearchModeSettings {
  mode: SearchMode;
  defaultLimit: number;
  graphDepth: number;
  /** Oldest memory considered, in hours; `null` means no cutoff. */
  temporalWindowHours: number | null;
  vectorTopK: number;
  minVectorScore: number;
  minCombinedScore: number;
  useSmartTraversal: boolean;
}

const MODE_TABLE: Record<SearchMode, Omit<SearchModeSettings, "mode">> = {
  recent: {
    defaultLimit: 10,
    graphDepth: 1,
    temporalWindowHours: 4,
    vectorTopK: 5,
    minVectorScore: 0.6,
    minCombinedScore: 0.4,
    useSmartTraversal: true,
  },
  contextual: {
    defaultLimit: 20,
    graphDepth: 2,
    temporalWindowHours: 30 * 24,
    vectorTopK: 10,
    minVectorScore: 0.5,
    minCombinedScore: 0.3,
    useSmartTraversal: true,
  },
  deep: {
    defaultLimit: 50,
    graphDepth: 3,
    temporalWindowHours: 90 * 24,
    vectorTopK: 15,
    minVectorScore: 0.4,
    minCombinedScore: 0.25,
    useSmartTraversal: true,
  },
  full: {
    defaultLimit: 100,
    graphDepth: 4,
    temporalWindowHours: null,
    vectorTopK: 50,
    minVectorScore: 0,
    minCombinedScore: 0,
    useSmartTraversal: false,
  },
};

/**
 * Unknown or missing mode names fall back to `recent`.
 */
export function parseSearchMode(value: string | undefined): SearchMode {
  const parsed = SearchModeSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : "recent";
}

export function searchModeSettings(mode: SearchMode): SearchModeSettings {
  return { mode, ...MODE_TABLE[mode] };
}

/**
 * `full` widens its vector phase to at least the requested limit.
 */
export function vectorTopKFor(settings: SearchModeSettings, limit: number): number {
  return settings.mode === "full" ? Math.max(limit, settings.vectorTopK) : settings.vectorTopK;
}

export function temporalCutoff(
  settings: SearchModeSettings,
  now: Date,
  temporalDays?: number,
): Date | undefined {
  const hours = temporalDays !== undefined ? temporalDays * 24 : settings.temporalWindowHours;
  if (hours === null || hours <= 0) {
    return undefined;
  }
  return new Date(now.getTime() - hours * 3_600_000);
}

export interface OntoSearchSettings {
  weights: {
    vector: number;
    concept: number;
    tag: number;
    graph: number;
    temporal: number;
  };
  temporalWindowHours: number | null;
  temporalDecayDays: number;
  minFinalScore: number;
  boostExactConceptMatch: number;
  boostTagMatch: number;
  maxConceptsPerQuery: number;
  maxTagsPerQuery: number;
  vectorTopK: number;
  graphDepth: number;
}

const ONTO_DEFAULTS: Omit<OntoSearchSettings, "weights"> = {
  temporalWindowHours: null,
  temporalDecayDays: 30,
  minFinalScore: 0.2,
  boostExactConceptMatch: 0.2,
  boostTagMatch: 0.1,
  maxConceptsPerQuery: 5,
  maxTagsPerQuery: 10,
  vectorTopK: 20,
  graphDepth: 2,
};

export function ontoSearchSettings(mode: SearchMode): OntoSearchSettings {
  switch (mode) {
    case "recent":
      return {
        ...ONTO_DEFAULTS,
        weights: { vector: 0.3, concept: 0.2, tag: 0.05, graph: 0.05, temporal: 0.4 },
        temporalWindowHours: 24,
        temporalDecayDays: 7,
        minFinalScore: 0.15,
      };
    case "contextual":
      return {
        ...ONTO_DEFAULTS,
        weights: { vector: 0.3, concept: 0.4, tag: 0.15, graph: 0.05, temporal: 0.1 },
        boostExactConceptMatch: 0.3,
      };
    case "deep":
      return {
        ...ONTO_DEFAULTS,
        weights: { vector: 0.25, concept: 0.25, tag: 0.1, graph: 0.3, temporal: 0.1 },
        graphDepth: 3,
      };
    case "full":
      return {
        ...ONTO_DEFAULTS,
        weights: { vector: 0.25, concept: 0.25, tag: 0.15, graph: 0.2, temporal: 0.15 },
      };
  }
}
