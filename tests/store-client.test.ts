import { describe, expect, it } from "vitest";
import { HelixStoreClient } from "../src/database/client";
import { NotFoundError, StoreError } from "../src/database/errors";

type Reply = { status: number; body: string } | Error;

function scriptedFetch(replies: Reply[]) {
  const requests: Array<{ url: string; body: string }> = [];
  const fetchStub: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), body: typeof init?.body === "string" ? init.body : "" });
    const reply = replies.shift();
    if (!reply) {
      throw new Error("unexpected request");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return new Response(reply.body, { status: reply.status });
  };
  return { fetchStub, requests };
}

function createClient(replies: Reply[], maxRetries = 3) {
  const { fetchStub, requests } = scriptedFetch(replies);
  const delays: number[] = [];
  const client = new HelixStoreClient({
    host: "localhost",
    port: 6969,
    maxRetries,
    fetch: fetchStub,
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
  return { client, requests, delays };
}

describe("HelixStoreClient", () => {
  it("posts params as JSON to the query endpoint", async () => {
    const { client, requests } = createClient([{ status: 200, body: '{"memory":{"id":"n1"}}' }]);

    const result = await client.execute("getMemory", { memory_id: "mem_000000000001" });

    expect(result).toEqual({ memory: { id: "n1" } });
    expect(requests).toEqual([
      { url: "http://localhost:6969/getMemory", body: '{"memory_id":"mem_000000000001"}' },
    ]);
    expect(client.connected).toBe(true);
  });

  it("returns null for an empty body", async () => {
    const { client } = createClient([{ status: 200, body: "  " }]);
    await expect(client.execute("linkChunks", {})).resolves.toBeNull();
  });

  it("maps logical misses to NotFoundError without retrying", async () => {
    const { client, requests } = createClient([{ status: 500, body: "No value found" }]);

    const error = await client.execute("getUser", { user_id: "u1" }).catch((caught) => caught);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(requests).toHaveLength(1);
  });

  it("retries transient failures with doubling delays", async () => {
    const { client, delays } = createClient([
      new Error("ECONNREFUSED"),
      { status: 503, body: "busy" },
      { status: 200, body: '{"count":3}' },
    ]);

    await expect(client.execute("countAllMemories")).resolves.toEqual({ count: 3 });
    expect(delays).toEqual([100, 200]);
  });

  it("reports exhaustion after the configured attempts", async () => {
    const { client, requests } = createClient(
      [
        { status: 500, body: "boom" },
        { status: 500, body: "boom" },
      ],
      2,
    );

    const error = await client.execute("addMemory").catch((caught) => caught);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({
      code: "RETRY_EXHAUSTED",
      message: "Retry exhausted after 2 attempts: boom",
    });
    expect(requests).toHaveLength(2);
  });

  it("rejects invalid JSON as a serialization error", async () => {
    const { client } = createClient([{ status: 200, body: "{not json" }]);

    const error = await client.executeNoRetry("getMemory").catch((caught) => caught);
    expect(error).toMatchObject({ code: "SERIALIZATION" });
  });

  it("treats a 404 health check as a live server", async () => {
    const { client } = createClient([{ status: 404, body: "" }]);
    await expect(client.healthCheck()).resolves.toBe(true);
  });

  it("reports an unreachable server as unhealthy", async () => {
    const { client } = createClient([new Error("ECONNREFUSED")]);
    await expect(client.healthCheck()).resolves.toBe(false);
    expect(client.connected).toBe(false);
  });
});
