import { beforeEach, describe, expect, it } from "vitest";
import { StoreError } from "../src/database/errors";
import { MemoryRepository } from "../src/repositories/memory-repository";
import { UserRepository } from "../src/repositories/user-repository";
import { MissingInternalIdError, ResolutionError } from "../src/services/errors";
import { MemoryCrud } from "../src/services/memory-crud";
import { IdResolver } from "../src/services/resolution/id-resolver";
import { FakeStore } from "./helpers/fake-store";
import { TestClock } from "./helpers/fakes";

let store: FakeStore;
let time: number;

function createResolver(overrides: { ttlMs?: number; retryAttempts?: number } = {}) {
  const sleeps: number[] = [];
  const resolver = new IdResolver(new MemoryRepository(store), {
    maxSize: 10,
    ttlMs: overrides.ttlMs ?? 60_000,
    maxParallel: 2,
    retryAttempts: overrides.retryAttempts ?? 3,
    retryDelayMs: 10,
    now: () => time,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { resolver, sleeps };
}

beforeEach(() => {
  store = new FakeStore();
  time = 0;
  store.seedMemory({ memoryId: "mem_a", content: "A", createdAt: "2026-03-01T00:00:00.000Z" });
  store.seedMemory({ memoryId: "mem_b", content: "B", createdAt: "2026-03-01T00:00:00.000Z" });
});

describe("IdResolver", () => {
  it("serves repeat lookups from the cache", async () => {
    const { resolver } = createResolver();

    await expect(resolver.resolve("mem_a")).resolves.toBe("n1");
    await expect(resolver.resolve("mem_a")).resolves.toBe("n1");

    expect(store.callsTo("getMemory")).toHaveLength(1);
    expect(resolver.stats()).toMatchObject({ hits: 1, misses: 1, size: 1, hitRate: 0.5 });
  });

  it("goes back to the store once an entry expires", async () => {
    const { resolver } = createResolver({ ttlMs: 1_000 });

    await resolver.resolve("mem_a");
    time = 1_000;
    await resolver.resolve("mem_a");

    expect(store.callsTo("getMemory")).toHaveLength(2);
    expect(resolver.stats().expirations).toBe(1);
  });

  it("distinguishes a missing memory from a store failure", async () => {
    const { resolver } = createResolver();

    await expect(resolver.resolve("mem_missing")).rejects.toMatchObject({
      name: "ResolutionError",
      reason: "not_found",
      memoryId: "mem_missing",
    });

    store.failOn("getMemory", new StoreError("socket hang up", "CONNECTION"));
    const error = await resolver.resolve("mem_b").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toMatchObject({ reason: "database", message: "Failed to resolve mem_b: socket hang up" });
  });

  it("forgets invalidated ids", async () => {
    const { resolver } = createResolver();
    await resolver.resolve("mem_a");

    resolver.invalidate("mem_a");
    resolver.invalidate("mem_never_cached");
    await resolver.resolve("mem_a");

    expect(store.callsTo("getMemory")).toHaveLength(2);
    expect(resolver.stats().invalidations).toBe(1);
  });

  it("uses ids primed by remember without a lookup", async () => {
    const { resolver } = createResolver();
    resolver.remember("mem_new", "n99");

    await expect(resolver.resolve("mem_new")).resolves.toBe("n99");
    expect(store.callsTo("getMemory")).toHaveLength(0);
  });

  it("resolves batches, deduplicating ids and collecting failures", async () => {
    const { resolver, sleeps } = createResolver();

    const result = await resolver.resolveMany(["mem_a", "mem_b", "mem_a", "mem_missing"]);

    expect([...result.resolved.entries()]).toEqual([
      ["mem_a", "n1"],
      ["mem_b", "n2"],
    ]);
    expect(result.failed).toEqual([
      { memoryId: "mem_missing", error: "Memory not found: mem_missing" },
    ]);
    expect(sleeps).toEqual([]);
  });

  it("retries store failures in a batch with a doubling delay", async () => {
    const { resolver, sleeps } = createResolver({ retryAttempts: 3 });
    store.failOn("getMemory", new StoreError("timeout", "CONNECTION"));

    const result = await resolver.resolveMany(["mem_a"]);

    expect(result.failed).toHaveLength(1);
    expect(sleeps).toEqual([10, 20]);
    expect(store.callsTo("getMemory")).toHaveLength(3);
  });

  it("fails the whole batch in fail-fast mode", async () => {
    const { resolver } = createResolver();

    await expect(
      resolver.resolveMany(["mem_a", "mem_missing"], { failFast: true }),
    ).rejects.toMatchObject({ reason: "batch_failed", memoryId: "mem_missing" });
  });
});

describe("MemoryCrud", () => {
  function createCrud() {
    const memories = new MemoryRepository(store);
    const { resolver } = createResolver();
    const clock = new TestClock("2026-03-02T08:00:00.000Z");
    const crud = new MemoryCrud({
      memoryRepository: memories,
      userRepository: new UserRepository(store),
      resolver,
      defaults: { certainty: 80, importance: 50 },
      now: clock.now,
    });
    return { crud, resolver };
  }

  it("writes the node, its embedding and the owner link", async () => {
    const { crud, resolver } = createCrud();

    const stored = await crud.createMemory(
      { userId: "user-9", content: "Runs every morning" },
      { vector: [1, 0, 0], embeddingModel: "fake-embed" },
    );

    expect(stored.memoryId).toMatch(/^mem_[0-9a-f]{12}$/);
    expect(stored.createdAt).toBe("2026-03-02T08:00:00.000Z");
    expect(store.callsTo("addMemory")[0]).toMatchObject({
      memory_type: "fact",
      certainty: 80,
      importance: 50,
      source: "user",
      context_tags: "[]",
    });
    expect(store.embeddings).toEqual([{ owner: stored.internalId, model: "fake-embed" }]);
    expect(store.users.get("user-9")).toBe("user-9");
    expect(store.edgesOfType("OWNS").map((edge) => [edge.from, edge.to])).toEqual([
      ["user-9", stored.internalId],
    ]);
    await expect(resolver.resolve(stored.memoryId)).resolves.toBe(stored.internalId);
    expect(store.callsTo("getMemory")).toHaveLength(0);
  });

  it("does not recreate a known user", async () => {
    const { crud } = createCrud();
    await crud.createMemory({ userId: "user-9", content: "one" });
    await crud.createMemory({ userId: "user-9", content: "two" });

    expect(store.callsTo("addUser")).toHaveLength(1);
    expect(store.edgesOfType("OWNS")).toHaveLength(2);
  });

  it("keeps the memory when the embedding write fails", async () => {
    const { crud } = createCrud();
    store.failOn("addMemoryEmbedding", new StoreError("vector index offline", "HTTP"));

    const stored = await crud.createMemory({ userId: "user-9", content: "Likes jazz" }, { vector: [1] });

    expect(store.memory(stored.memoryId)?.content).toBe("Likes jazz");
    expect(store.edgesOfType("OWNS")).toHaveLength(1);
  });

  it("fails without an internal id and writes nothing else", async () => {
    const { crud } = createCrud();
    store.omitInternalIds = true;

    await expect(
      crud.createMemory({ userId: "user-9", content: "Orphan" }, { vector: [1] }),
    ).rejects.toBeInstanceOf(MissingInternalIdError);
    expect(store.callsTo("addMemoryEmbedding")).toHaveLength(0);
    expect(store.callsTo("linkUserToMemory")).toHaveLength(0);
  });
});
