import { describe, expect, it } from "vitest";
import { StoreError } from "../src/database/errors";
import { createTestContainer } from "./helpers/container";

const CREATED = "2026-03-01T10:00:00.000Z";

describe("DefaultAnalyticsService", () => {
  it("counts store contents and treats failed counts as zero", async () => {
    const { container, store } = await createTestContainer();
    store.seedMemory({ memoryId: "mem_a", content: "Likes sailing", createdAt: CREATED });
    store.seedMemory({ memoryId: "mem_b", content: "Owns a boat", createdAt: CREATED });
    store.failOn("countAllEntities", new StoreError("offline", "CONNECTION"));

    const stats = await container.services.analytics.getStats();

    expect(stats).toMatchObject({ memories: 2, entities: 0, concepts: 0 });
    expect(stats.providers).toEqual({
      llm: null,
      embedding: { name: "fake", model: "fake-embed", fallback: undefined },
    });
    expect(stats.cache.search).toMatchObject({ searches: 0, cacheSize: 0 });
  });

  it("lists one user's memories", async () => {
    const { container, store } = await createTestContainer();
    store.seedMemory({ memoryId: "mem_a", content: "Likes sailing", createdAt: CREATED });
    store.seedMemory({ memoryId: "mem_b", content: "Other", createdAt: CREATED, userId: "user-2" });

    const memories = await container.services.analytics.getAllMemories({ userId: "user-1" });

    expect(memories.map((memory) => memory.memoryId)).toEqual(["mem_a"]);
  });
});

describe("DefaultSystemService", () => {
  it("reports store health, providers and jobs", async () => {
    const { container, store } = await createTestContainer({
      overrides: { store: { host: "graph.internal", port: 6970, instance: "memories" } },
    });
    container.jobStatuses.register("cache.prune", "*/15 * * * *");
    store.healthy = false;

    const status = await container.services.system.status();

    expect(status).toMatchObject({
      env: "test",
      logLevel: "silent",
      store: { ok: false, baseUrl: "http://graph.internal:6970", instance: "memories" },
      providers: { llm: null, embedding: { name: "fake", model: "fake-embed" } },
      ontology: { loaded: false, concepts: 0 },
      jobs: [{ name: "cache.prune", schedule: "*/15 * * * *", status: "idle", lastRun: null }],
    });
  });
});
