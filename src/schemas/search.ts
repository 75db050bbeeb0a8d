import { z } from "zod";
import { SEARCH_MODES } from "../config";
import { ConceptMatchSchema } from "./knowledge";
import { MemoryTypeSchema } from "./memory";

export const SearchModeSchema = z.enum(SEARCH_MODES);
export type SearchMode = z.infer<typeof SearchModeSchema>;

export const SearchResultSchema = z.object({
  memoryId: z.string(),
  content: z.string(),
  memoryType: MemoryTypeSchema,
  userId: z.string(),
  createdAt: z.string(),
  validUntil: z.string().nullable().optional(),
  vectorScore: z.number().min(0).max(1),
  graphScore: z.number().min(0).max(1),
  temporalScore: z.number().min(0).max(1),
  combinedScore: z.number().min(0).max(1),
  depth: z.number().int().min(0),
  source: z.enum(["vector", "graph"]),
  edgeType: z.string().optional(),
  parentId: z.string().optional(),
});
export type SearchResult = z.infer<typeof SearchResultSchema>;

export const TagMatchSchema = z.object({
  tag: z.string(),
  score: z.number(),
});
export type TagMatch = z.infer<typeof TagMatchSchema>;

export const OntoSearchResultSchema = z.object({
  memoryId: z.string(),
  content: z.string(),
  memoryType: MemoryTypeSchema,
  userId: z.string(),
  createdAt: z.string(),
  vectorScore: z.number(),
  conceptScore: z.number(),
  tagScore: z.number(),
  graphScore: z.number(),
  temporalScore: z.number(),
  finalScore: z.number(),
  matchedConcepts: z.array(ConceptMatchSchema),
  matchedTags: z.array(TagMatchSchema),
  depth: z.number().int().min(0),
  source: z.enum(["vector", "graph"]),
});
export type OntoSearchResult = z.infer<typeof OntoSearchResultSchema>;

export const CHAIN_RELATION_TYPES = [
  "IMPLIES",
  "BECAUSE",
  "CONTRADICTS",
  "SUPPORTS",
  "REFUTES",
] as const;
export const ChainRelationTypeSchema = z.enum(CHAIN_RELATION_TYPES);
export type ChainRelationType = z.infer<typeof ChainRelationTypeSchema>;

export const ChainDirectionSchema = z.enum(["forward", "backward", "both"]);
export type ChainDirection = z.infer<typeof ChainDirectionSchema>;

export const ChainNodeSchema = z.object({
  memoryId: z.string(),
  content: z.string(),
  memoryType: z.string().optional(),
  depth: z.number().int().min(0),
  relationType: ChainRelationTypeSchema.optional(),
  /** Edge orientation relative to the node it was reached from. */
  edgeDirection: z.enum(["out", "in"]).optional(),
});
export type ChainNode = z.infer<typeof ChainNodeSchema>;

export const MemoryChainSchema = z.object({
  seedId: z.string(),
  nodes: z.array(ChainNodeSchema),
  totalDepth: z.number().int().min(0),
});
export type MemoryChain = z.infer<typeof MemoryChainSchema>;

export const ChainSearchResultSchema = z.object({
  query: z.string(),
  chains: z.array(MemoryChainSchema),
  totalChains: z.number().int().min(0),
  totalMemories: z.number().int().min(0),
  deepestChain: z.number().int().min(0),
  memories: z.array(ChainNodeSchema),
});
export type ChainSearchResult = z.infer<typeof ChainSearchResultSchema>;
