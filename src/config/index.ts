import { config as loadEnvFile } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
const ENVIRONMENTS = ["development", "test", "production"] as const;
export const LLM_PROVIDERS = ["cerebras", "ollama", "openai-compatible"] as const;
export const EMBEDDING_PROVIDERS = ["ollama", "openai"] as const;
export const CHUNKING_STRATEGIES = ["sentence", "semantic"] as const;
export const SEARCH_MODES = ["recent", "contextual", "deep", "full"] as const;

const CacheSchema = z.object({
  maxSize: z.number().int().min(1),
  ttlMs: z.number().int().min(1),
});

export const ConfigSchema = z.object({
  env: z.enum(ENVIRONMENTS),
  logLevel: z.enum(LOG_LEVELS),
  store: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65_535),
    instance: z.string(),
    timeoutMs: z.number().int().min(100),
    maxRetries: z.number().int().min(1).max(10),
  }),
  llm: z.object({
    provider: z.enum(LLM_PROVIDERS),
    model: z.string().min(1),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().min(1_000),
    temperature: z.number().min(0).max(2),
    fallback: z.object({
      enabled: z.boolean(),
      url: z.string().url(),
      model: z.string().min(1),
    }),
  }),
  embedding: z.object({
    provider: z.enum(EMBEDDING_PROVIDERS),
    model: z.string().min(1),
    url: z.string().url(),
    apiKey: z.string().optional(),
    timeoutMs: z.number().int().min(1_000),
    fallback: z.object({
      enabled: z.boolean(),
      url: z.string().url(),
      model: z.string().min(1),
    }),
  }),
  chunking: z.object({
    enabled: z.boolean(),
    strategy: z.enum(CHUNKING_STRATEGIES),
    chunkSize: z.number().int().min(16),
    chunkOverlap: z.number().int().min(0),
    minChunkLength: z.number().int().min(1),
    minSentencesPerChunk: z.number().int().min(1),
  }),
  cache: z.object({
    idResolver: CacheSchema,
    embedding: CacheSchema,
    search: CacheSchema,
    entityMaxSize: z.number().int().min(1),
  }),
  resolver: z.object({
    maxParallel: z.number().int().min(1),
    retryAttempts: z.number().int().min(1),
    retryDelayMs: z.number().int().min(0),
  }),
  integration: z.object({
    similarityThreshold: z.number().min(0).max(1),
    duplicateThreshold: z.number().min(0).max(1),
    maxSimilar: z.number().int().min(1),
    relatesToThreshold: z.number().min(0).max(1),
  }),
  search: z.object({
    defaultLimit: z.number().int().min(1),
    defaultMode: z.enum(SEARCH_MODES),
    defaultCertainty: z.number().int().min(0).max(100),
    defaultImportance: z.number().int().min(0).max(100),
    queryExpansion: z.boolean(),
    maxQueryExpansions: z.number().int().min(0),
  }),
  jobs: z.object({
    cleanupCron: z.string(),
    cachePruneCron: z.string(),
    remarkCron: z.string(),
    /** Users whose unmarked memories the nightly re-mark job revisits. */
    remarkUserIds: z.array(z.string().min(1)),
    remarkBatchSize: z.number().int().min(1),
    remarkPauseMs: z.number().int().min(0),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
type ConfigInput = z.input<typeof ConfigSchema>;

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type ConfigOverrides = DeepPartial<ConfigInput>;

export interface LoadConfigOptions {
  /**
   * Explicit .env file location. Pass `false` to skip dotenv entirely.
   */
  envFile?: string | false;
  /**
   * Additional environment variables to overlay (useful for tests).
   */
  envVars?: Record<string, string | undefined>;
  /**
   * Toggle dotenv loading. Defaults to `true`.
   */
  useDotenv?: boolean;
  /**
   * Base directory used when resolving the default .env path. Defaults to `process.cwd()`.
   */
  cwd?: string;
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function loadConfig(
  overrides: ConfigOverrides = {},
  options: LoadConfigOptions = {},
): Config {
  const {
    envFile,
    envVars = {},
    useDotenv = true,
    cwd: baseDir = process.cwd(),
  } = options;

  if (useDotenv) {
    const resolvedEnvPath =
      envFile === undefined
        ? path.resolve(baseDir, ".env")
        : envFile === false
          ? undefined
          : envFile;

    if (resolvedEnvPath && existsSync(resolvedEnvPath)) {
      loadEnvFile({ path: resolvedEnvPath });
    }
  }

  const env: Record<string, string | undefined> = {
    ...process.env,
    ...envVars,
  };

  const raw = {
    env: overrides.env ?? env.NODE_ENV ?? "development",
    logLevel: overrides.logLevel ?? env.LOG_LEVEL ?? "info",
    store: {
      host: overrides.store?.host ?? env.HELIX_HOST ?? "localhost",
      port: overrides.store?.port ?? coerceInteger(env.HELIX_PORT, 6969),
      instance: overrides.store?.instance ?? env.HELIX_INSTANCE ?? "default",
      timeoutMs:
        overrides.store?.timeoutMs ?? coerceInteger(env.HELIX_TIMEOUT_MS, 30_000),
      maxRetries:
        overrides.store?.maxRetries ?? coerceInteger(env.HELIX_MAX_RETRIES, 3),
    },
    llm: {
      provider: overrides.llm?.provider ?? env.HELIX_LLM_PROVIDER ?? "ollama",
      model: overrides.llm?.model ?? env.HELIX_LLM_MODEL ?? "llama3.2",
      apiKey: overrides.llm?.apiKey ?? emptyToUndefined(env.HELIX_LLM_API_KEY),
      baseUrl: overrides.llm?.baseUrl ?? emptyToUndefined(env.HELIX_LLM_BASE_URL),
      timeoutMs:
        overrides.llm?.timeoutMs ?? coerceInteger(env.HELIX_LLM_TIMEOUT_MS, 600_000),
      temperature: overrides.llm?.temperature ?? 0.3,
      fallback: {
        enabled:
          overrides.llm?.fallback?.enabled ??
          coerceBoolean(env.HELIX_LLM_FALLBACK_ENABLED) ??
          true,
        url:
          overrides.llm?.fallback?.url ??
          env.HELIX_LLM_FALLBACK_URL ??
          "http://localhost:11434",
        model:
          overrides.llm?.fallback?.model ??
          env.HELIX_LLM_FALLBACK_MODEL ??
          "llama3.2",
      },
    },
    embedding: {
      provider:
        overrides.embedding?.provider ?? env.HELIX_EMBEDDING_PROVIDER ?? "ollama",
      model:
        overrides.embedding?.model ?? env.HELIX_EMBEDDING_MODEL ?? "nomic-embed-text",
      url:
        overrides.embedding?.url ??
        env.HELIX_EMBEDDING_URL ??
        "http://localhost:11434",
      apiKey:
        overrides.embedding?.apiKey ?? emptyToUndefined(env.HELIX_EMBEDDING_API_KEY),
      timeoutMs:
        overrides.embedding?.timeoutMs ??
        coerceInteger(env.HELIX_EMBEDDING_TIMEOUT_MS, 30_000),
      fallback: {
        enabled:
          overrides.embedding?.fallback?.enabled ??
          coerceBoolean(env.HELIX_EMBEDDING_FALLBACK_ENABLED) ??
          true,
        url:
          overrides.embedding?.fallback?.url ??
          env.HELIX_EMBEDDING_FALLBACK_URL ??
          "http://localhost:11434",
        model:
          overrides.embedding?.fallback?.model ??
          env.HELIX_EMBEDDING_FALLBACK_MODEL ??
          "nomic-embed-text",
      },
    },
    chunking: {
      enabled:
        overrides.chunking?.enabled ??
        coerceBoolean(env.HELIX_CHUNKING_ENABLED) ??
        true,
      strategy:
        overrides.chunking?.strategy ?? env.HELIX_CHUNKING_STRATEGY ?? "semantic",
      chunkSize:
        overrides.chunking?.chunkSize ?? coerceInteger(env.HELIX_CHUNK_SIZE, 1024),
      chunkOverlap:
        overrides.chunking?.chunkOverlap ?? coerceInteger(env.HELIX_CHUNK_OVERLAP, 128),
      minChunkLength:
        overrides.chunking?.minChunkLength ??
        coerceInteger(env.HELIX_CHUNK_MIN_LENGTH, 1000),
      minSentencesPerChunk:
        overrides.chunking?.minSentencesPerChunk ??
        coerceInteger(env.HELIX_CHUNK_MIN_SENTENCES, 2),
    },
    cache: {
      idResolver: {
        maxSize:
          overrides.cache?.idResolver?.maxSize ??
          coerceInteger(env.HELIX_ID_CACHE_SIZE, 10_000),
        ttlMs:
          overrides.cache?.idResolver?.ttlMs ??
          coerceInteger(env.HELIX_ID_CACHE_TTL_MS, 3_600_000),
      },
      embedding: {
        maxSize:
          overrides.cache?.embedding?.maxSize ??
          coerceInteger(env.HELIX_EMBEDDING_CACHE_SIZE, 1_000),
        ttlMs:
          overrides.cache?.embedding?.ttlMs ??
          coerceInteger(env.HELIX_EMBEDDING_CACHE_TTL_MS, 3_600_000),
      },
      search: {
        maxSize:
          overrides.cache?.search?.maxSize ??
          coerceInteger(env.HELIX_SEARCH_CACHE_SIZE, 500),
        ttlMs:
          overrides.cache?.search?.ttlMs ??
          coerceInteger(env.HELIX_SEARCH_CACHE_TTL_MS, 300_000),
      },
      entityMaxSize: overrides.cache?.entityMaxSize ?? 5_000,
    },
    resolver: {
      maxParallel:
        overrides.resolver?.maxParallel ??
        coerceInteger(env.HELIX_RESOLVER_MAX_PARALLEL, 100),
      retryAttempts:
        overrides.resolver?.retryAttempts ??
        coerceInteger(env.HELIX_RESOLVER_RETRY_ATTEMPTS, 3),
      retryDelayMs: overrides.resolver?.retryDelayMs ?? 100,
    },
    integration: {
      similarityThreshold: overrides.integration?.similarityThreshold ?? 0.7,
      duplicateThreshold: overrides.integration?.duplicateThreshold ?? 0.92,
      maxSimilar: overrides.integration?.maxSimilar ?? 5,
      relatesToThreshold: overrides.integration?.relatesToThreshold ?? 0.75,
    },
    search: {
      defaultLimit:
        overrides.search?.defaultLimit ?? coerceInteger(env.HELIX_SEARCH_LIMIT, 10),
      defaultMode: overrides.search?.defaultMode ?? env.HELIX_SEARCH_MODE ?? "recent",
      defaultCertainty:
        overrides.search?.defaultCertainty ??
        coerceInteger(env.HELIX_DEFAULT_CERTAINTY, 80),
      defaultImportance:
        overrides.search?.defaultImportance ??
        coerceInteger(env.HELIX_DEFAULT_IMPORTANCE, 50),
      queryExpansion:
        overrides.search?.queryExpansion ??
        coerceBoolean(env.HELIX_QUERY_EXPANSION) ??
        true,
      maxQueryExpansions:
        overrides.search?.maxQueryExpansions ??
        coerceInteger(env.HELIX_QUERY_MAX_EXPANSIONS, 5),
    },
    jobs: {
      cleanupCron: overrides.jobs?.cleanupCron ?? env.CRON_CLEANUP ?? "30 2 * * 0",
      cachePruneCron:
        overrides.jobs?.cachePruneCron ?? env.CRON_CACHE_PRUNE ?? "*/15 * * * *",
      remarkCron: overrides.jobs?.remarkCron ?? env.CRON_REMARK ?? "0 4 * * *",
      remarkUserIds: overrides.jobs?.remarkUserIds ?? coerceList(env.HELIX_REMARK_USERS),
      remarkBatchSize:
        overrides.jobs?.remarkBatchSize ?? coerceInteger(env.HELIX_REMARK_BATCH_SIZE, 10),
      remarkPauseMs:
        overrides.jobs?.remarkPauseMs ?? coerceInteger(env.HELIX_REMARK_PAUSE_MS, 1_000),
    },
  };

  const parsed = ConfigSchema.parse(raw);
  cachedConfig = Object.freeze(parsed);
  return parsed;
}

export function coerceBoolean(value?: string | boolean | null): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  if (["1", "true", "yes", "y", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "n", "off"].includes(normalized)) {
    return false;
  }

  return undefined;
}

export function coerceInteger(
  value?: string | number | null,
  fallback?: number,
): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string" && value.trim().length) {
    const parsed = Number.parseInt(value, 10);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  if (typeof fallback === "number") {
    return fallback;
  }

  throw new Error("Unable to coerce integer value from input");
}

export function coerceList(value?: string): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function emptyToUndefined(value?: string): string | undefined {
  return value && value.trim().length ? value.trim() : undefined;
}
