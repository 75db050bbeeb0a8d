import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  coerceBoolean,
  coerceInteger,
  coerceList,
  loadConfig,
  resetConfigCache,
  type LoadConfigOptions,
} from "../src/config";

const DEFAULT_OPTIONS: LoadConfigOptions = {
  useDotenv: false,
  envVars: {},
  cwd: path.resolve(process.cwd()),
};

const CLEAN_ENV: Record<string, string | undefined> = {
  NODE_ENV: undefined,
  LOG_LEVEL: undefined,
  HELIX_HOST: undefined,
  HELIX_PORT: undefined,
  HELIX_LLM_PROVIDER: undefined,
  HELIX_LLM_MODEL: undefined,
  HELIX_LLM_API_KEY: undefined,
  HELIX_CHUNKING_ENABLED: undefined,
  HELIX_CHUNK_SIZE: undefined,
  HELIX_SEARCH_MODE: undefined,
  HELIX_REMARK_USERS: undefined,
};

afterEach(() => {
  resetConfigCache();
});

describe("loadConfig", () => {
  it("uses sensible defaults when no overrides are provided", () => {
    const config = loadConfig({}, { ...DEFAULT_OPTIONS, envVars: CLEAN_ENV });

    expect(config.env).toBe("development");
    expect(config.logLevel).toBe("info");
    expect(config.store).toMatchObject({ host: "localhost", port: 6969, maxRetries: 3 });
    expect(config.llm.provider).toBe("ollama");
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.chunking).toMatchObject({
      enabled: true,
      strategy: "semantic",
      chunkSize: 1024,
      chunkOverlap: 128,
      minChunkLength: 1000,
    });
    expect(config.integration).toEqual({
      similarityThreshold: 0.7,
      duplicateThreshold: 0.92,
      maxSimilar: 5,
      relatesToThreshold: 0.75,
    });
    expect(config.search.defaultMode).toBe("recent");
    expect(config.jobs.cleanupCron).toBe("30 2 * * 0");
    expect(config.jobs).toMatchObject({
      remarkCron: "0 4 * * *",
      remarkUserIds: [],
      remarkBatchSize: 10,
    });
    expect(config.search).toMatchObject({ queryExpansion: true, maxQueryExpansions: 5 });
  });

  it("applies environment variable overrides", () => {
    const config = loadConfig(
      {},
      {
        ...DEFAULT_OPTIONS,
        envVars: {
          ...CLEAN_ENV,
          NODE_ENV: "production",
          LOG_LEVEL: "debug",
          HELIX_HOST: "graph.internal",
          HELIX_PORT: "7000",
          HELIX_LLM_PROVIDER: "cerebras",
          HELIX_LLM_API_KEY: "  test-secret  ",
          HELIX_CHUNKING_ENABLED: "off",
          HELIX_CHUNK_SIZE: "512",
          HELIX_SEARCH_MODE: "deep",
          HELIX_REMARK_USERS: "user-1, user-2,",
        },
      },
    );

    expect(config.env).toBe("production");
    expect(config.logLevel).toBe("debug");
    expect(config.store.host).toBe("graph.internal");
    expect(config.store.port).toBe(7000);
    expect(config.llm.provider).toBe("cerebras");
    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.chunking.enabled).toBe(false);
    expect(config.chunking.chunkSize).toBe(512);
    expect(config.search.defaultMode).toBe("deep");
    expect(config.jobs.remarkUserIds).toEqual(["user-1", "user-2"]);
  });

  it("honors explicit override parameters over the environment", () => {
    const config = loadConfig(
      {
        env: "test",
        store: { port: 7100 },
        integration: { maxSimilar: 3 },
      },
      { ...DEFAULT_OPTIONS, envVars: { ...CLEAN_ENV, HELIX_PORT: "7000" } },
    );

    expect(config.env).toBe("test");
    expect(config.store.port).toBe(7100);
    expect(config.integration.maxSimilar).toBe(3);
  });

  it("throws when overrides violate schema constraints", () => {
    expect(() => loadConfig({ store: { port: 70_000 } }, DEFAULT_OPTIONS)).toThrow();
    expect(() =>
      loadConfig({}, { ...DEFAULT_OPTIONS, envVars: { HELIX_SEARCH_MODE: "everything" } }),
    ).toThrow();
  });
});

describe("coercion helpers", () => {
  it("reads common boolean spellings", () => {
    expect(coerceBoolean("YES")).toBe(true);
    expect(coerceBoolean(" 0 ")).toBe(false);
    expect(coerceBoolean("maybe")).toBeUndefined();
    expect(coerceBoolean("")).toBeUndefined();
    expect(coerceBoolean(false)).toBe(false);
  });

  it("parses integers and falls back", () => {
    expect(coerceInteger("42")).toBe(42);
    expect(coerceInteger("", 7)).toBe(7);
    expect(coerceInteger(undefined, 9)).toBe(9);
    expect(() => coerceInteger("abc")).toThrow("Unable to coerce integer value from input");
  });

  it("splits comma separated lists", () => {
    expect(coerceList(" a ,b,, c ")).toEqual(["a", "b", "c"]);
    expect(coerceList(undefined)).toEqual([]);
  });
});
