import { beforeEach, describe, expect, it } from "vitest";
import { MemoryRepository } from "../src/repositories/memory-repository";
import { OntologyRepository } from "../src/repositories/ontology-repository";
import { ReasoningRepository } from "../src/repositories/reasoning-repository";
import { DefaultSearchService } from "../src/services/search-service";
import {
  ChainSearch,
  chainPreset,
  edgesFor,
  parseChainMode,
} from "../src/services/search/chain-search";
import {
  parseSearchMode,
  searchModeSettings,
  temporalCutoff,
  vectorTopKFor,
} from "../src/services/search/modes";
import { OntoSearch, conceptOverlap, tagOverlap } from "../src/services/search/onto-search";
import { QueryProcessor, emptyProcessedQuery } from "../src/services/search/query-processor";
import {
  cosineSimilarity,
  rescaledCosine,
  temporalScore,
} from "../src/services/search/scoring";
import {
  SmartTraversal,
  graphCombinedScore,
  rankAndFilter,
  vectorCombinedScore,
} from "../src/services/search/smart-traversal";
import { FakeStore } from "./helpers/fake-store";
import { TestClock } from "./helpers/fakes";

const HOUR = 3_600_000;
const QUERY = [1, 0, 0, 0];
const ORTHOGONAL = [0, 1, 0, 0];

let store: FakeStore;
let clock: TestClock;

function hoursAgo(hours: number): string {
  return new Date(clock.now().getTime() - hours * HOUR).toISOString();
}

function createSearch() {
  const memories = new MemoryRepository(store);
  const reasoning = new ReasoningRepository(store);
  const traversal = new SmartTraversal(memories, reasoning, {
    cacheSize: 10,
    cacheTtlMs: 60_000,
    now: clock.now,
  });
  const onto = new OntoSearch(traversal, new OntologyRepository(store), { now: clock.now });
  const chains = new ChainSearch(memories, reasoning, undefined, clock.now);
  const service = new DefaultSearchService({ traversal, onto, chains, now: clock.now });
  return { traversal, onto, chains, service };
}

beforeEach(() => {
  store = new FakeStore();
  clock = new TestClock();
});

describe("scoring", () => {
  it("computes cosine similarity and its rescaled form", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([3, 4], [3, 4])).toBeCloseTo(1);
    expect(rescaledCosine([1, 0], [-1, 0])).toBe(0);
    expect(rescaledCosine([1, 0], [0, 1])).toBe(0.5);
  });

  it("decays with age", () => {
    const now = new Date("2026-03-31T00:00:00.000Z");

    expect(temporalScore("2026-03-01T00:00:00.000Z", now, 30)).toBeCloseTo(Math.exp(-1));
    expect(temporalScore("not a date", now, 30)).toBe(1);
    expect(temporalScore("2026-03-01T00:00:00.000Z", now, 0)).toBe(1);
  });

  it("mixes vector, graph and recency scores", () => {
    expect(vectorCombinedScore(0.8, 1)).toBeCloseTo(0.86);
    expect(graphCombinedScore(0.5, 0.5, 1)).toBeCloseTo(0.6);
  });

  it("keeps the best entry per memory above the floor", () => {
    const base = {
      content: "x",
      memoryType: "fact" as const,
      userId: "user-1",
      createdAt: "2026-03-01T00:00:00.000Z",
      vectorScore: 0,
      graphScore: 0,
      temporalScore: 0,
      depth: 0,
      source: "vector" as const,
    };

    const ranked = rankAndFilter(
      [
        { ...base, memoryId: "a", combinedScore: 0.3 },
        { ...base, memoryId: "b", combinedScore: 0.9 },
        { ...base, memoryId: "a", combinedScore: 0.7 },
        { ...base, memoryId: "c", combinedScore: 0.1 },
      ],
      0.2,
    );

    expect(ranked.map((result) => [result.memoryId, result.combinedScore])).toEqual([
      ["b", 0.9],
      ["a", 0.7],
    ]);
  });
});

describe("search modes", () => {
  it("parses names and falls back to recent", () => {
    expect(parseSearchMode(" DEEP ")).toBe("deep");
    expect(parseSearchMode("sideways")).toBe("recent");
    expect(parseSearchMode(undefined)).toBe("recent");
  });

  it("derives the vector budget and the cutoff", () => {
    const now = new Date("2026-03-01T12:00:00.000Z");
    const recent = searchModeSettings("recent");
    const full = searchModeSettings("full");

    expect(vectorTopKFor(recent, 80)).toBe(5);
    expect(vectorTopKFor(full, 80)).toBe(80);
    expect(vectorTopKFor(full, 10)).toBe(50);
    expect(temporalCutoff(recent, now)?.toISOString()).toBe("2026-03-01T08:00:00.000Z");
    expect(temporalCutoff(recent, now, 2)?.toISOString()).toBe("2026-02-27T12:00:00.000Z");
    expect(temporalCutoff(full, now)).toBeUndefined();
  });
});

describe("SmartTraversal", () => {
  const config = { vectorTopK: 5, graphDepth: 1, minVectorScore: 0.6, minCombinedScore: 0 };

  beforeEach(() => {
    store.seedMemory({ memoryId: "mem_a", content: "Seed", createdAt: clock.iso(), vector: QUERY });
    store.seedMemory({ memoryId: "mem_b", content: "Neighbour", createdAt: clock.iso(), vector: ORTHOGONAL });
    store.seedMemory({ memoryId: "mem_c", content: "Other user", createdAt: clock.iso(), vector: QUERY, userId: "user-2" });
    store.seedMemory({ memoryId: "mem_d", content: "Deleted", createdAt: clock.iso(), vector: QUERY, isDeleted: true });
    store.seedMemory({ memoryId: "mem_e", content: "Expired", createdAt: clock.iso(), vector: QUERY, validUntil: hoursAgo(1) });
    store.seedEdge("IMPLIES", "mem_a", "mem_b", { probability: 80 });
  });

  it("expands vector seeds over the graph", async () => {
    const { traversal } = createSearch();

    const results = await traversal.search({ vector: QUERY, userId: "user-1", config });

    expect(results.map((result) => result.memoryId)).toEqual(["mem_a", "mem_b"]);
    expect(results[0]).toMatchObject({
      vectorScore: 1,
      temporalScore: 1,
      combinedScore: 1,
      depth: 0,
      source: "vector",
    });
    expect(results[1]).toMatchObject({
      vectorScore: 0.5,
      depth: 1,
      source: "graph",
      edgeType: "implies_out",
      parentId: "mem_a",
    });
    expect(results[1]?.graphScore).toBeCloseTo(0.9);
    expect(results[1]?.combinedScore).toBeCloseTo(0.8);
  });

  it("caches result lists per request", async () => {
    const { traversal } = createSearch();
    const request = { vector: QUERY, userId: "user-1", config };

    await traversal.search(request);
    await traversal.search(request);
    await traversal.search({ ...request, noCache: true });

    expect(store.callsTo("smartVectorSearchWithChunks")).toHaveLength(2);
    expect(traversal.stats()).toMatchObject({
      searches: 3,
      cacheHits: 1,
      cacheMisses: 1,
      cacheHitRate: 0.5,
      cacheSize: 1,
    });

    traversal.clearCache();
    expect(traversal.stats().cacheSize).toBe(0);
  });
});

describe("DefaultSearchService", () => {
  beforeEach(() => {
    store.seedMemory({ memoryId: "mem_new", content: "New", createdAt: hoursAgo(1), vector: QUERY });
    store.seedMemory({ memoryId: "mem_old", content: "Old", createdAt: hoursAgo(5), vector: QUERY });
  });

  it("applies the mode's temporal window", async () => {
    const { service } = createSearch();

    const recent = await service.search({ vector: QUERY, userId: "user-1", mode: "recent" });
    const widened = await service.search({
      vector: QUERY,
      userId: "user-1",
      mode: "recent",
      temporalDays: 1,
    });

    expect(recent.map((result) => result.memoryId)).toEqual(["mem_new"]);
    expect(widened.map((result) => result.memoryId)).toEqual(["mem_new", "mem_old"]);
  });

  it("re-applies the moving cutoff to cached results", async () => {
    store.seedMemory({
      memoryId: "mem_edge",
      content: "Edge",
      createdAt: "2026-03-01T08:00:10.000Z",
      vector: QUERY,
    });
    const { service } = createSearch();
    const ids = async () =>
      (await service.search({ vector: QUERY, userId: "user-1", mode: "recent" }))
        .map((result) => result.memoryId)
        .sort();

    expect(await ids()).toEqual(["mem_edge", "mem_new"]);

    clock.advance(30_000);

    expect(await ids()).toEqual(["mem_new"]);
    expect(store.callsTo("smartVectorSearchWithChunks")).toHaveLength(1);
  });

  it("drops cached memories that expired since the list was stored", async () => {
    store.seedMemory({
      memoryId: "mem_fading",
      content: "Fading",
      createdAt: hoursAgo(2),
      validUntil: "2026-03-01T12:00:20.000Z",
      vector: QUERY,
    });
    const { service } = createSearch();
    const ids = async () =>
      (await service.search({ vector: QUERY, userId: "user-1", mode: "recent" }))
        .map((result) => result.memoryId)
        .sort();

    expect(await ids()).toEqual(["mem_fading", "mem_new"]);

    clock.advance(30_000);

    expect(await ids()).toEqual(["mem_new"]);
    expect(store.callsTo("smartVectorSearchWithChunks")).toHaveLength(1);
  });

  it("recomputes when a wider window follows a narrower one", async () => {
    const { traversal } = createSearch();
    const config = { vectorTopK: 5, graphDepth: 0, minVectorScore: 0, minCombinedScore: 0 };
    const narrow = new Date("2026-03-01T11:00:30.000Z");
    const wide = new Date("2026-03-01T11:00:00.000Z");

    await traversal.search({ vector: QUERY, userId: "user-1", config, temporalCutoff: narrow });
    const results = await traversal.search({ vector: QUERY, userId: "user-1", config, temporalCutoff: wide });

    expect(results.map((result) => result.memoryId)).toEqual(["mem_new"]);
    expect(store.callsTo("smartVectorSearchWithChunks")).toHaveLength(2);
  });

  it("bypasses the cache in full mode and honours the limit", async () => {
    const { service } = createSearch();

    await service.search({ vector: QUERY, mode: "full", limit: 1 });
    const results = await service.search({ vector: QUERY, mode: "full", limit: 1 });

    expect(results.map((result) => result.memoryId)).toEqual(["mem_new"]);
    expect(store.callsTo("smartVectorSearchWithChunks")).toHaveLength(2);
    expect(service.stats().cacheSize).toBe(0);
  });
});

describe("OntoSearch", () => {
  it("scores concept and tag overlap", () => {
    const concepts = [
      { conceptId: "Preference", confidence: 0.5, matchType: "keyword" },
      { conceptId: "Goal", confidence: 0.25, matchType: "keyword" },
    ];

    expect(conceptOverlap(concepts, ["Preference"], 0.2)).toBeCloseTo(0.7 / 0.75);
    expect(conceptOverlap(concepts, ["Preference", "Goal"], 0.2)).toBe(1);
    expect(conceptOverlap([], ["Preference"], 0.2)).toBe(0);
    expect(tagOverlap(["docker", "redis"], "I run Docker daily", 0.1)).toBeCloseTo(0.6);
    expect(tagOverlap(["docker"], "I run containers", 0.1)).toBe(0);
  });

  it("classifies queries and extracts known tags", () => {
    const { onto } = createSearch();

    expect(onto.classifyQuery("my favorite drinks", 5)).toEqual([
      { conceptId: "Preference", confidence: 1 / 8, matchType: "keyword" },
    ]);
    expect(onto.extractTags("I use Docker and Redis with Go", 10)).toEqual([
      "docker",
      "go",
      "redis",
    ]);
    expect(onto.extractTags("I use Docker and Redis with Go", 2)).toEqual(["docker", "go"]);
  });

  it("restricts results to the requested concept", async () => {
    const a = store.seedMemory({ memoryId: "mem_a", content: "Loves green tea", createdAt: clock.iso(), vector: QUERY });
    store.seedMemory({ memoryId: "mem_b", content: "Owns a bike", createdAt: clock.iso(), vector: QUERY });
    store.edges.push({ id: "c1", type: "INSTANCE_OF", from: a.id, to: "Preference", props: { confidence: 90 } });
    const { service } = createSearch();

    const results = await service.searchByConcept({
      query: "my favorite drinks",
      vector: QUERY,
      userId: "user-1",
      mode: "full",
      limit: 10,
      conceptType: "Preference",
    });

    expect(results.map((result) => result.memoryId)).toEqual(["mem_a"]);
    expect(results[0]).toMatchObject({
      conceptScore: 1,
      tagScore: 0,
      matchedConcepts: [{ conceptId: "Preference", confidence: 1 / 8, matchType: "keyword" }],
      matchedTags: [],
    });
    expect(results[0]?.finalScore).toBeCloseTo(0.65);
  });

  it("returns candidates in score order and drops those under the mode's floor", async () => {
    const a = store.seedMemory({ memoryId: "mem_a", content: "Loves green tea", createdAt: clock.iso(), vector: QUERY });
    store.seedMemory({ memoryId: "mem_b", content: "Drinks coffee", createdAt: clock.iso(), vector: QUERY });
    store.seedMemory({ memoryId: "mem_c", content: "Tried kombucha", createdAt: clock.iso(), vector: [0.6, 0.8, 0, 0] });
    store.seedMemory({ memoryId: "mem_d", content: "Owns a bike", createdAt: clock.iso(), vector: ORTHOGONAL });
    store.seedMemory({ memoryId: "mem_e", content: "Sold the car", createdAt: clock.iso(), vector: [-1, 0, 0, 0] });
    store.edges.push({ id: "c1", type: "INSTANCE_OF", from: a.id, to: "Preference", props: { confidence: 90 } });
    const { service } = createSearch();

    const results = await service.searchByConcept({
      query: "my favorite drinks",
      vector: QUERY,
      userId: "user-1",
      mode: "full",
      limit: 10,
    });

    const scores = results.map((result) => result.finalScore);
    expect(results.map((result) => result.memoryId)).toEqual(["mem_a", "mem_b", "mem_c"]);
    expect(scores).toEqual([...scores].sort((left, right) => right - left));
    expect(scores.every((score) => score >= 0.2)).toBe(true);
    expect(scores[0]).toBeCloseTo(0.65);
    expect(scores[1]).toBeCloseTo(0.4);
    expect(scores[2]).toBeCloseTo(0.3);
  });

  it("matches tags the query expansion adds", async () => {
    store.seedMemory({ memoryId: "mem_llm", content: "Fine-tuned an LLM for support tickets", createdAt: clock.iso(), vector: QUERY });
    const { service } = createSearch();

    const results = await service.searchByConcept({
      query: "what tools for ai",
      vector: QUERY,
      userId: "user-1",
      mode: "full",
      limit: 10,
    });

    expect(results).toHaveLength(1);
    expect(results[0]?.matchedTags).toEqual([{ tag: "llm", score: 1 }]);
    expect(results[0]?.tagScore).toBeCloseTo(0.35);
  });

  it("uses the mode the query suggests when none is given", async () => {
    store.seedMemory({ memoryId: "mem_old", content: "Painted the fence", createdAt: hoursAgo(48), vector: QUERY });
    store.seedMemory({ memoryId: "mem_new", content: "Fixed the gate", createdAt: hoursAgo(1), vector: QUERY });
    const { service } = createSearch();

    const recent = await service.searchByConcept({
      query: "what changed recently",
      vector: QUERY,
      userId: "user-1",
      limit: 10,
    });
    const everything = await service.searchByConcept({
      query: "everything about the house",
      vector: QUERY,
      userId: "user-1",
      limit: 10,
    });

    expect(recent.map((result) => result.memoryId)).toEqual(["mem_new"]);
    expect(everything.map((result) => result.memoryId)).toEqual(["mem_new", "mem_old"]);
  });
});

describe("QueryProcessor", () => {
  it("detects intents, expands known words and suggests a mode", () => {
    const processed = new QueryProcessor({ maxExpansions: 7 }).process(
      "What do I like about python?",
    );

    expect(processed).toMatchObject({
      originalQuery: "What do I like about python?",
      detectedIntents: ["preference"],
      conceptHints: ["Preference"],
      expandedTerms: ["love", "enjoy", "prefer", "fond of", "appreciate", "programming", "coding"],
      enhancedQuery:
        "What do I like about python? love enjoy prefer fond of appreciate programming coding",
      suggestedMode: "contextual",
    });
    expect(processed.confidence).toBeCloseTo(0.65);
  });

  it("skips synonyms the query already has and stops at the cap", () => {
    expect(new QueryProcessor().expand("I like and love jazz")).toEqual([
      "enjoy",
      "prefer",
      "fond of",
      "appreciate",
      "adore",
    ]);
    expect(new QueryProcessor({ enableExpansion: false }).process("I like tea")).toMatchObject({
      expandedTerms: [],
      enhancedQuery: "I like tea",
    });
  });

  it("prefers recent over deep and deep over contextual", () => {
    const processor = new QueryProcessor();

    const recent = processor.process("everything I did recently");
    expect(recent).toMatchObject({
      detectedIntents: ["experience", "recent"],
      conceptHints: ["Experience"],
      expandedTerms: ["lately", "just", "new", "fresh"],
      suggestedMode: "recent",
    });
    expect(recent.confidence).toBeCloseTo(0.8);

    const broad = processor.process("show me all of it");
    expect(broad).toMatchObject({ detectedIntents: [], suggestedMode: "deep" });
    expect(broad.confidence).toBeCloseTo(0.3);
    expect(processor.process("   ")).toEqual(emptyProcessedQuery("   "));
  });
});

describe("ChainSearch", () => {
  beforeEach(() => {
    store.seedMemory({ memoryId: "mem_a", content: "Switched teams", createdAt: clock.iso(), vector: QUERY });
    store.seedMemory({ memoryId: "mem_b", content: "Wanted more backend work", createdAt: clock.iso() });
    store.seedMemory({ memoryId: "mem_c", content: "Enjoys database design", createdAt: clock.iso() });
    store.seedMemory({ memoryId: "mem_d", content: "Joins the on-call rota", createdAt: clock.iso() });
    store.seedEdge("BECAUSE", "mem_a", "mem_b", { strength: 80 });
    store.seedEdge("BECAUSE", "mem_b", "mem_c", { strength: 70 });
    store.seedEdge("IMPLIES", "mem_a", "mem_d", { probability: 90 });
  });

  function run(mode: string) {
    const { service } = createSearch();
    return service.searchChains({
      query: "why did I switch teams",
      vector: QUERY,
      userId: "user-1",
      limit: 5,
      config: chainPreset(parseChainMode(mode)),
    });
  }

  it("follows causes backwards", async () => {
    const result = await run("causal");

    expect(result).toMatchObject({ totalChains: 1, totalMemories: 3, deepestChain: 2 });
    expect(result.chains[0]?.nodes).toEqual([
      { memoryId: "mem_a", content: "Switched teams", memoryType: "fact", depth: 0 },
      {
        memoryId: "mem_b",
        content: "Wanted more backend work",
        memoryType: "fact",
        depth: 1,
        relationType: "BECAUSE",
        edgeDirection: "out",
      },
      {
        memoryId: "mem_c",
        content: "Enjoys database design",
        memoryType: "fact",
        depth: 2,
        relationType: "BECAUSE",
        edgeDirection: "out",
      },
    ]);
  });

  it("follows implications forwards", async () => {
    const result = await run("forward");

    expect(result.chains[0]?.nodes.map((node) => [node.memoryId, node.relationType, node.depth])).toEqual([
      ["mem_a", undefined, 0],
      ["mem_d", "IMPLIES", 1],
    ]);
  });

  it("walks both directions in edge order", async () => {
    const result = await run("anything");

    expect(result.chains[0]?.nodes.map((node) => node.memoryId)).toEqual([
      "mem_a",
      "mem_d",
      "mem_b",
      "mem_c",
    ]);
    expect(result.deepestChain).toBe(2);
  });

  it("skips memories below the confidence floor", async () => {
    const low = store.memory("mem_c");
    if (low) {
      low.certainty = 40;
    }

    const result = await run("causal");
    expect(result.chains[0]?.nodes.map((node) => node.memoryId)).toEqual(["mem_a", "mem_b"]);
  });

  it("returns no chain for an isolated seed", async () => {
    store.edges.splice(0, store.edges.length);

    await expect(run("both")).resolves.toEqual({
      query: "why did I switch teams",
      chains: [],
      totalChains: 0,
      totalMemories: 0,
      deepestChain: 0,
      memories: [],
    });
  });

  it("includes contradictions only in deep mode", () => {
    expect(edgesFor(chainPreset("deep")).map((edge) => edge.field)).toContain("contradicts_out");
    expect(edgesFor(chainPreset("both")).map((edge) => edge.field)).toEqual([
      "implies_out",
      "because_in",
      "implies_in",
      "because_out",
    ]);
  });
});
