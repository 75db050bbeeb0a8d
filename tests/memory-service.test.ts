import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/services/errors";
import { createTestContainer } from "./helpers/container";
import { FakeEmbedder, FakeLlm, withSimilarity } from "./helpers/fakes";

const QUERY = [1, 0, 0, 0];
const PROMPT_PREFIX = "Extract information from this text:\n\n";

const LONG_TEXT = Array.from(
  { length: 30 },
  (_, index) => `Fact ${index} about the long running migration project is noted here.`,
).join(" ");

/** Echoes the whole message back as a single extracted fact. */
function echoExtraction(user: string): string {
  return JSON.stringify({
    memories: [{ text: user.slice(PROMPT_PREFIX.length), memory_type: "fact" }],
  });
}

function decisionJson(operation: string, confidence: number, reasoning: string): string {
  return JSON.stringify({ operation, confidence, reasoning });
}

describe("DefaultMemoryService.addMemory", () => {
  it("stores a short message as one node with its embedding and owner", async () => {
    const { container, store } = await createTestContainer();

    const result = await container.services.memory.addMemory({
      userId: "user-1",
      message: "I enjoy hiking in the mountains",
    });

    expect(result).toMatchObject({
      memoriesAdded: 1,
      skipped: 0,
      chunksCreated: 0,
      relationsCreated: 0,
    });
    expect(result.operations).toMatchObject([
      { operation: "ADD", content: "I enjoy hiking in the mountains", confidence: 100 },
    ]);
    const [memoryId = ""] = result.memoryIds;
    const row = store.memory(memoryId);
    expect(row).toMatchObject({ user_id: "user-1", memory_type: "fact", source: "user" });
    expect(store.memories.size).toBe(1);
    expect(store.embeddings).toContainEqual({ owner: row?.id, model: "fake-embed" });
    expect(store.edgesOfType("OWNS").map((edge) => [edge.from, edge.to])).toEqual([
      ["user-1", row?.id],
    ]);
    expect(store.edgesOfType("INSTANCE_OF")).toMatchObject([{ from: row?.id, to: "Fact" }]);
  });

  it("chunks long content and reconstructs it on read", async () => {
    const { container, store } = await createTestContainer({
      overrides: {
        chunking: {
          enabled: true,
          strategy: "sentence",
          chunkSize: 150,
          chunkOverlap: 0,
          minChunkLength: 1000,
          minSentencesPerChunk: 2,
        },
      },
    });

    const result = await container.services.memory.addMemory({
      userId: "user-1",
      message: LONG_TEXT,
    });

    const [memoryId = ""] = result.memoryIds;
    expect(result.chunksCreated).toBe(3);
    expect(store.chunksOf(memoryId)).toHaveLength(3);
    expect(store.edgesOfType("NEXT_CHUNK")).toHaveLength(2);

    const view = await container.services.memory.getMemory(memoryId);
    expect(view?.chunkCount).toBe(3);
    expect(view?.content).toBe(LONG_TEXT);
  });

  it("drops the text chunks repeat from their predecessor on read", async () => {
    const { container, store } = await createTestContainer({
      overrides: {
        chunking: {
          enabled: true,
          strategy: "sentence",
          chunkSize: 150,
          chunkOverlap: 128,
          minChunkLength: 1000,
          minSentencesPerChunk: 2,
        },
      },
    });

    const result = await container.services.memory.addMemory({
      userId: "user-1",
      message: LONG_TEXT,
    });

    const [memoryId = ""] = result.memoryIds;
    const stored = store.chunksOf(memoryId).map((chunk) => chunk.content);
    expect(stored).toHaveLength(4);
    expect(stored[1]?.startsWith("e. Fact 8 about")).toBe(true);

    const view = await container.services.memory.getMemory(memoryId);
    expect(view?.content).toBe(LONG_TEXT);
  });

  it("skips a duplicate the model marks as redundant", async () => {
    const llm = new FakeLlm({
      extraction: echoExtraction,
      decision: decisionJson("NOOP", 97, "Duplicate"),
    });
    const { container, store } = await createTestContainer({ llm });
    const memory = container.services.memory;

    const first = await memory.addMemory({ userId: "user-1", message: "Lives in Berlin" });
    const second = await memory.addMemory({ userId: "user-1", message: "Lives in Berlin" });

    expect(second).toMatchObject({ memoriesAdded: 0, skipped: 1, memoryIds: [] });
    expect(second.operations).toMatchObject([
      { operation: "NOOP", targetMemoryId: first.memoryIds[0], confidence: 97 },
    ]);
    expect(store.memories.size).toBe(1);
    expect(llm.callsFor("decision")).toHaveLength(1);
  });

  it("supersedes an evolved memory so searches only find the new one", async () => {
    const embedder = new FakeEmbedder()
      .set("I use Vim for editing", QUERY)
      .set("I switched to Emacs for editing", withSimilarity(0.95))
      .set("text editor", QUERY);
    const llm = new FakeLlm({
      extraction: echoExtraction,
      decision: decisionJson("SUPERSEDE", 90, "Changed editor"),
    });
    const { container, store, clock } = await createTestContainer({ llm, embedder });
    const memory = container.services.memory;

    const first = await memory.addMemory({ userId: "user-1", message: "I use Vim for editing" });
    clock.advance(60_000);
    const second = await memory.addMemory({
      userId: "user-1",
      message: "I switched to Emacs for editing",
    });

    const [oldId = ""] = first.memoryIds;
    const [newId = ""] = second.memoryIds;
    expect(second).toMatchObject({ memoriesSuperseded: 1, relationsCreated: 0 });
    expect(second.operations[0]?.targetMemoryId).toBe(oldId);
    expect(store.memory(oldId)?.valid_until).toBe("2026-03-01T12:01:00.000Z");
    expect(store.edgesOfType("SUPERSEDES")).toMatchObject([
      { from: store.memory(newId)?.id, to: store.memory(oldId)?.id, props: { reason: "Changed editor" } },
    ]);

    const results = await memory.searchMemory({ userId: "user-1", query: "text editor" });
    expect(results.map((result) => result.memoryId)).toEqual([newId]);
  });

  it("keeps both memories and links them when they contradict", async () => {
    const embedder = new FakeEmbedder()
      .set("I love spicy food", QUERY)
      .set("I hate spicy food", withSimilarity(0.93));
    const llm = new FakeLlm({
      extraction: echoExtraction,
      decision: decisionJson("CONTRADICT", 85, "Conflicting tastes"),
    });
    const { container, store } = await createTestContainer({ llm, embedder });
    const memory = container.services.memory;

    const first = await memory.addMemory({ userId: "user-1", message: "I love spicy food" });
    const second = await memory.addMemory({ userId: "user-1", message: "I hate spicy food" });

    const older = store.memory(first.memoryIds[0] ?? "");
    const newer = store.memory(second.memoryIds[0] ?? "");
    expect(second.contradictions).toBe(1);
    const pairs = store.edgesOfType("CONTRADICTS").map((edge) => [edge.from, edge.to]);
    expect(pairs).toHaveLength(2);
    expect(pairs).toContainEqual([newer?.id, older?.id]);
    expect(pairs).toContainEqual([older?.id, newer?.id]);
    expect(store.edgesOfType("CONTRADICTS")[0]?.props).toMatchObject({
      confidence: 85,
      resolution_strategy: "Conflicting tastes",
    });
    expect(older?.valid_until).toBeNull();
    expect(newer?.valid_until).toBeNull();
  });

  it("writes extracted relations between memories stored together", async () => {
    const llm = new FakeLlm({
      extraction: JSON.stringify({
        memories: [{ text: "Moved to Lisbon" }, { text: "Learning Portuguese" }],
        relations: [
          {
            from_memory_content: "moved to lisbon",
            to_memory_content: "Learning Portuguese",
            relation_type: "implies",
            confidence: 75,
          },
        ],
      }),
      decision: decisionJson("ADD", 90, "New"),
    });
    const embedder = new FakeEmbedder()
      .set("Moved to Lisbon", [1, 0, 0, 0])
      .set("Learning Portuguese", [0, 1, 0, 0]);
    const { container, store } = await createTestContainer({ llm, embedder });

    const result = await container.services.memory.addMemory({
      userId: "user-1",
      message: "I moved to Lisbon so I am learning Portuguese",
    });

    expect(result).toMatchObject({ memoriesAdded: 2, relationsCreated: 1 });
    const [from, to] = result.memoryIds.map((memoryId) => store.memory(memoryId)?.id);
    expect(store.edgesOfType("IMPLIES")).toMatchObject([
      { from, to, props: { probability: 75, reasoning_id: "extracted" } },
    ]);
  });

  it("rejects an empty message", async () => {
    const { container } = await createTestContainer();

    await expect(
      container.services.memory.addMemory({ userId: "user-1", message: "   " }),
    ).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("DefaultMemoryService reads and edits", () => {
  it("re-embeds updated content and guards ownership", async () => {
    const { container, store } = await createTestContainer();
    const memory = container.services.memory;
    const { memoryIds } = await memory.addMemory({ userId: "user-1", message: "Plays chess" });
    const [memoryId = ""] = memoryIds;

    await expect(
      memory.updateMemory({ memoryId, newContent: "Plays chess weekly", userId: "user-2" }),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      memory.updateMemory({ memoryId: "mem_unknown", newContent: "x", userId: "user-1" }),
    ).rejects.toMatchObject({ message: "Memory not found: mem_unknown" });

    await memory.updateMemory({ memoryId, newContent: "Plays chess weekly", userId: "user-1" });

    expect(store.memory(memoryId)?.content).toBe("Plays chess weekly");
    expect(store.callsTo("addMemoryEmbedding")).toHaveLength(2);
  });

  it("hides soft-deleted memories from search until restored", async () => {
    const embedder = new FakeEmbedder().set("Plays chess", QUERY).set("chess", QUERY);
    const { container } = await createTestContainer({ embedder });
    const memory = container.services.memory;
    const { memoryIds } = await memory.addMemory({ userId: "user-1", message: "Plays chess" });
    const [memoryId = ""] = memoryIds;

    const before = await memory.searchMemory({ userId: "user-1", query: "chess" });
    expect(before.map((result) => result.memoryId)).toEqual([memoryId]);

    await memory.deleteMemory({ memoryId, userId: "user-1" });
    await expect(memory.searchMemory({ userId: "user-1", query: "chess" })).resolves.toEqual([]);

    await memory.undeleteMemory(memoryId, "user-1");
    const after = await memory.searchMemory({ userId: "user-1", query: "chess" });
    expect(after.map((result) => result.memoryId)).toEqual([memoryId]);
  });

  it("follows reasoning chains from the best match", async () => {
    const embedder = new FakeEmbedder().set("why did I switch teams", QUERY);
    const { container, store, clock } = await createTestContainer({ embedder });
    store.seedMemory({ memoryId: "mem_a", content: "Switched teams", createdAt: clock.iso(), vector: QUERY });
    store.seedMemory({ memoryId: "mem_b", content: "Wanted backend work", createdAt: clock.iso() });
    store.seedMemory({ memoryId: "mem_c", content: "Enjoys databases", createdAt: clock.iso() });
    store.seedMemory({ memoryId: "mem_d", content: "Joins on-call", createdAt: clock.iso() });
    store.seedEdge("BECAUSE", "mem_a", "mem_b", { strength: 80 });
    store.seedEdge("BECAUSE", "mem_b", "mem_c", { strength: 80 });
    store.seedEdge("IMPLIES", "mem_a", "mem_d", { probability: 90 });
    const memory = container.services.memory;

    const causal = await memory.searchReasoningChain({
      userId: "user-1",
      query: "why did I switch teams",
      chainMode: "causal",
    });
    const forward = await memory.searchReasoningChain({
      userId: "user-1",
      query: "why did I switch teams",
      chainMode: "forward",
    });
    const shallow = await memory.searchReasoningChain({
      userId: "user-1",
      query: "why did I switch teams",
      chainMode: "causal",
      maxDepth: 1,
    });

    expect(causal.chains[0]?.nodes.map((node) => node.memoryId)).toEqual(["mem_a", "mem_b", "mem_c"]);
    expect(forward.chains[0]?.nodes.map((node) => node.memoryId)).toEqual(["mem_a", "mem_d"]);
    expect(shallow.deepestChain).toBe(1);
  });

  it("builds the graph around a memory for its owner", async () => {
    const { container, store, clock } = await createTestContainer();
    store.seedMemory({ memoryId: "mem_a", content: "A", createdAt: clock.iso() });
    store.seedMemory({ memoryId: "mem_b", content: "B", createdAt: clock.iso() });
    store.seedMemory({ memoryId: "mem_c", content: "C", createdAt: clock.iso() });
    store.seedMemory({ memoryId: "mem_x", content: "X", createdAt: clock.iso(), userId: "user-2" });
    store.seedEdge("IMPLIES", "mem_a", "mem_b");
    store.seedEdge("BECAUSE", "mem_b", "mem_c");
    store.seedEdge("IMPLIES", "mem_a", "mem_x");

    const graph = await container.services.memory.getMemoryGraph({
      userId: "user-1",
      memoryId: "mem_a",
      depth: 2,
    });

    expect(graph.nodes.map((node) => node.memoryId)).toEqual(["mem_a", "mem_b", "mem_c"]);
    expect(graph.nodes[1]).toEqual({
      memoryId: "mem_b",
      content: "B",
      memoryType: "fact",
      createdAt: clock.iso(),
    });
    expect(graph.edges).toEqual([
      { from: "mem_a", to: "mem_b", relationType: "IMPLIES" },
      { from: "mem_b", to: "mem_c", relationType: "BECAUSE" },
    ]);
  });

  it("retrieves matches with their reasoning context", async () => {
    const embedder = new FakeEmbedder().set("team change", QUERY);
    const { container, store, clock } = await createTestContainer({ embedder });
    store.seedMemory({ memoryId: "mem_a", content: "Switched teams", createdAt: clock.iso(), vector: QUERY });
    store.seedMemory({ memoryId: "mem_b", content: "Wanted backend work", createdAt: clock.iso() });
    store.seedEdge("BECAUSE", "mem_a", "mem_b", { strength: 80 });

    const result = await container.services.memory.retrieve({
      userId: "user-1",
      query: "team change",
      depth: "shallow",
      limit: 1,
    });

    expect(result.memories.map((memory) => [memory.memoryId, memory.chunkCount])).toEqual([
      ["mem_a", 0],
    ]);
    expect(result.reasoningChains).toEqual([
      { fromMemoryId: "mem_a", toMemoryId: "mem_b", relationType: "BECAUSE", strength: 80 },
    ]);
    expect(result.contextMemories.map((memory) => memory.memoryId)).toEqual(["mem_b"]);
    expect(result.entities).toEqual([]);
    expect(result.metadata).toMatchObject({
      query: "team change",
      depth: "shallow",
      mode: "recent",
      totalResults: 1,
    });
  });
});
