import { beforeEach, describe, expect, it } from "vitest";
import type { QueryExecutor } from "../src/database/client";
import { StoreError } from "../src/database/errors";
import { DeletionRepository } from "../src/repositories/deletion-repository";
import { EntityRepository } from "../src/repositories/entity-repository";
import { MemoryRepository } from "../src/repositories/memory-repository";
import { OntologyRepository } from "../src/repositories/ontology-repository";
import { UserRepository } from "../src/repositories/user-repository";
import { MemoryNodeSchema } from "../src/schemas/store";
import { FakeStore } from "./helpers/fake-store";

function cannedExecutor(response: unknown): QueryExecutor {
  return {
    execute: async () => response,
    executeNoRetry: async () => response,
    healthCheck: async () => true,
  };
}

let store: FakeStore;

beforeEach(() => {
  store = new FakeStore();
});

describe("MemoryRepository", () => {
  it("writes a memory and reads it back as a record", async () => {
    const repository = new MemoryRepository(store);

    const internalId = await repository.addMemory({
      memoryId: "mem_000000000001",
      userId: "user-1",
      content: "Prefers tea over coffee",
      memoryType: "preference",
      certainty: 90,
      importance: 60,
      createdAt: "2026-03-01T12:00:00.000Z",
      contextTags: ["drinks"],
      source: "agent-7",
      metadata: { channel: "chat" },
    });

    expect(internalId).toBe("n1");
    expect(store.callsTo("addMemory")[0]).toMatchObject({
      context_tags: '["drinks"]',
      metadata: '{"channel":"chat"}',
      valid_from: "2026-03-01T12:00:00.000Z",
    });

    const record = await repository.getMemory("mem_000000000001");
    expect(record).toEqual({
      memoryId: "mem_000000000001",
      internalId: "n1",
      userId: "user-1",
      content: "Prefers tea over coffee",
      memoryType: "preference",
      certainty: 90,
      importance: 60,
      createdAt: "2026-03-01T12:00:00.000Z",
      updatedAt: "2026-03-01T12:00:00.000Z",
      validFrom: "2026-03-01T12:00:00.000Z",
      validUntil: null,
      contextTags: ["drinks"],
      source: "agent-7",
      metadata: { channel: "chat" },
      immutable: false,
      verified: false,
      isDeleted: false,
      deletedAt: null,
      deletedBy: null,
    });
  });

  it("resolves a missing memory to undefined", async () => {
    const repository = new MemoryRepository(store);
    await expect(repository.getMemory("mem_missing00000")).resolves.toBeUndefined();
  });

  it("reports a missing internal id as undefined", async () => {
    const repository = new MemoryRepository(cannedExecutor({ memory: { id: "  " } }));

    await expect(
      repository.addMemory({
        memoryId: "mem_000000000002",
        userId: "user-1",
        content: "x",
        memoryType: "fact",
        certainty: 80,
        importance: 50,
        createdAt: "2026-03-01T12:00:00.000Z",
        contextTags: [],
        source: "user",
        metadata: {},
      }),
    ).resolves.toBeUndefined();
  });

  it("falls back on defaults for sparse nodes", () => {
    const repository = new MemoryRepository(store);
    const record = repository.toRecord(
      MemoryNodeSchema.parse({
        memory_id: "mem_000000000003",
        memory_type: "Nonsense",
        created_at: "2026-01-01T00:00:00.000Z",
        context_tags: "not json",
        metadata: { nested: true },
        immutable: "1",
        verified: 0,
        is_deleted: "true",
      }),
    );

    expect(record).toMatchObject({
      content: "",
      memoryType: "fact",
      certainty: 80,
      importance: 50,
      source: "user",
      contextTags: [],
      metadata: { nested: true },
      immutable: true,
      verified: false,
      isDeleted: true,
      updatedAt: "2026-01-01T00:00:00.000Z",
    });
  });

  it("rejects responses of the wrong shape", async () => {
    const repository = new MemoryRepository(cannedExecutor({ unexpected: true }));

    const error = await repository.countMemories().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ code: "SERIALIZATION", query: "countAllMemories" });
  });

  it("accepts both chunk response shapes", async () => {
    const wrapped = new MemoryRepository(cannedExecutor({ chunk: { id: "c1" } }));
    const bare = new MemoryRepository(cannedExecutor({ id: "c2" }));
    const row = {
      chunkId: "mem_000000000001_chunk_0",
      parentInternalId: "n1",
      position: 0,
      content: "text",
      tokenCount: 1,
      createdAt: "2026-03-01T12:00:00.000Z",
    };

    await expect(wrapped.addChunk(row)).resolves.toBe("c1");
    await expect(bare.addChunk(row)).resolves.toBe("c2");
  });
});

describe("UserRepository", () => {
  it("looks users up without retry and links them to memories", async () => {
    const repository = new UserRepository(store);
    const memory = store.seedMemory({
      memoryId: "mem_000000000001",
      content: "x",
      createdAt: "2026-03-01T12:00:00.000Z",
    });

    await expect(repository.getUser("user-1")).resolves.toBeUndefined();
    await repository.addUser("user-1", "user-1");
    await expect(repository.getUser("user-1")).resolves.toEqual({
      userId: "user-1",
      name: "user-1",
    });

    await repository.linkUserToMemory("user-1", memory.id);
    expect(store.edgesOfType("OWNS")).toEqual([
      { id: "n2", type: "OWNS", from: "user-1", to: memory.id, props: { context: "created" } },
    ]);
  });
});

describe("EntityRepository", () => {
  it("parses stored JSON properties and aliases", async () => {
    const repository = new EntityRepository(store);
    await repository.createEntity({
      entityId: "ent_1",
      name: "PostgreSQL",
      entityType: "technology",
      properties: { kind: "database" },
      aliases: ["postgres"],
    });

    await expect(repository.getEntityByName("PostgreSQL")).resolves.toEqual({
      entityId: "ent_1",
      name: "PostgreSQL",
      entityType: "technology",
      properties: { kind: "database" },
      aliases: ["postgres"],
    });
    await expect(repository.getEntity("ent_missing")).resolves.toBeUndefined();
  });
});

describe("OntologyRepository", () => {
  it("reports an uninitialized ontology as false", async () => {
    const repository = new OntologyRepository(store);

    await expect(repository.isInitialized()).resolves.toBe(false);
    await repository.initializeBase();
    await expect(repository.isInitialized()).resolves.toBe(true);
    await expect(repository.countConcepts()).resolves.toBe(8);
  });
});

describe("DeletionRepository", () => {
  it("unwraps boolean results in every accepted shape", async () => {
    await expect(new DeletionRepository(cannedExecutor(true)).hardDelete("m")).resolves.toBe(true);
    await expect(
      new DeletionRepository(cannedExecutor({ success: false })).hardDelete("m"),
    ).resolves.toBe(false);
    await expect(
      new DeletionRepository(cannedExecutor({ deleted: true })).deleteEdges("m"),
    ).resolves.toBe(true);
  });
});
