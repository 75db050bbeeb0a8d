import { describe, expect, it, vi } from "vitest";
import { LlmExtractor } from "../src/services/llm/extractor";
import { RemarkService } from "../src/services/remark-service";
import { createTestContainer } from "./helpers/container";
import type { FakeStore } from "./helpers/fake-store";
import { FakeLlm, memoryRecord } from "./helpers/fakes";

const REDIS_EXTRACTION = JSON.stringify({
  memories: [],
  entities: [{ id: "e1", name: "Redis", type: "technology" }],
  relations: [],
});

function seedMixedMarkup(store: FakeStore, now: string) {
  const bare = store.seedMemory({
    memoryId: "mem_bare",
    content: "I love Redis",
    memoryType: "preference",
    createdAt: now,
  });
  const typed = store.seedMemory({ memoryId: "mem_typed", content: "Uses Docker", createdAt: now });
  store.edges.push({ id: "c1", type: "INSTANCE_OF", from: typed.id, to: "Fact", props: {} });
  const named = store.seedMemory({ memoryId: "mem_named", content: "Knows Alice", createdAt: now });
  store.seedEntity("ent_alice", "Alice");
  store.edges.push({ id: "e1", type: "EXTRACTED_ENTITY", from: named.id, to: "ent_alice", props: {} });
  store.seedMemory({ memoryId: "mem_gone", content: "Old note", createdAt: now, isDeleted: true });
  store.seedMemory({ memoryId: "mem_theirs", userId: "user-2", content: "Likes tea", createdAt: now });
  return bare;
}

describe("RemarkService", () => {
  it("finds live memories with neither entities nor concepts", async () => {
    const { container, store, clock } = await createTestContainer();
    seedMixedMarkup(store, clock.iso());

    const unmarked = await container.remark.findUnmarked("user-1");

    expect(unmarked.map((memory) => memory.memoryId)).toEqual(["mem_bare"]);
  });

  it("links extracted entities and concepts, then reports the run", async () => {
    const llm = new FakeLlm({ extraction: REDIS_EXTRACTION });
    const { container, store, clock } = await createTestContainer({ llm });
    const bare = seedMixedMarkup(store, clock.iso());

    const stats = await container.remark.remarkAll("user-1", { batchSize: 5 });

    expect(stats).toEqual({
      totalProcessed: 1,
      totalEntities: 1,
      totalConcepts: 1,
      failures: 0,
      startedAt: "2026-03-01T12:00:00.000Z",
      completedAt: "2026-03-01T12:00:00.000Z",
      successRate: 100,
    });
    expect(llm.callsFor("extraction")).toHaveLength(1);
    expect(llm.callsFor("extraction")[0]?.user).toBe(
      "Extract information from this text:\n\nI love Redis",
    );

    const redis = [...store.entities.values()].find((entity) => entity.name === "Redis");
    expect(
      store.edgesOfType("EXTRACTED_ENTITY").filter((edge) => edge.from === bare.id),
    ).toMatchObject([{ to: redis?.entity_id, props: { confidence: 90, method: "remark" } }]);
    expect(
      store.edgesOfType("INSTANCE_OF").filter((edge) => edge.from === bare.id),
    ).toMatchObject([{ to: "Preference" }]);
    await expect(container.remark.findUnmarked("user-1")).resolves.toEqual([]);
  });

  it("counts memories without content as failures and pauses between batches", async () => {
    const llm = new FakeLlm({ extraction: REDIS_EXTRACTION });
    const { container, store, clock } = await createTestContainer({ llm });
    seedMixedMarkup(store, clock.iso());
    const unmarked = await container.remark.findUnmarked("user-1");
    const sleep = vi.fn().mockResolvedValue(undefined);
    const service = new RemarkService({
      memoryRepository: container.repositories.memory,
      ontologyRepository: container.repositories.ontology,
      entities: container.services.entities,
      ontology: container.services.ontology,
      extractor: new LlmExtractor(llm),
      batchPauseMs: 250,
      sleep,
      now: clock.now,
    });

    const blank = memoryRecord({ memoryId: "mem_blank", content: "   " });
    await expect(service.remarkMemory(blank)).resolves.toEqual({
      memoryId: "mem_blank",
      entitiesAdded: 0,
      conceptsAdded: 0,
      success: false,
      error: "Memory has no id or content",
      durationMs: 0,
    });

    const stats = await service.remarkBatch([...unmarked, blank], 1);

    expect(stats).toMatchObject({
      totalProcessed: 2,
      totalEntities: 1,
      totalConcepts: 1,
      failures: 1,
      successRate: 50,
    });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it("reports an empty run with a zero success rate", async () => {
    const { container } = await createTestContainer();

    await expect(container.remark.remarkBatch([])).resolves.toMatchObject({
      totalProcessed: 0,
      failures: 0,
      successRate: 0,
    });
  });
});
