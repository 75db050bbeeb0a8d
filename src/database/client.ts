import type { AppLogger } from "../logging";
import {
  NotFoundError,
  StoreError,
  isLogicalMissMessage,
  normalizeStoreError,
} from "./errors";

export type QueryParams = Record<string, unknown>;

/**
 * Executes named, parameterized queries against the backing store.
 */
export interface QueryExecutor {
  execute(query: string, params?: QueryParams): Promise<unknown>;
  executeNoRetry(query: string, params?: QueryParams): Promise<unknown>;
  healthCheck(): Promise<boolean>;
}

export interface HelixStoreClientOptions {
  host: string;
  port: number;
  timeoutMs?: number;
  maxRetries?: number;
  initialRetryDelayMs?: number;
  maxRetryDelayMs?: number;
  logger?: AppLogger;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 3;
const INITIAL_RETRY_DELAY_MS = 100;
const MAX_RETRY_DELAY_MS = 10_000;

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export class HelixStoreClient implements QueryExecutor {
  readonly baseUrl: string;
  #timeoutMs: number;
  #maxRetries: number;
  #initialDelayMs: number;
  #maxDelayMs: number;
  #logger?: AppLogger;
  #fetch: typeof fetch;
  #sleep: (ms: number) => Promise<void>;
  #connected = false;

  constructor(options: HelixStoreClientOptions) {
    this.baseUrl = `http://${options.host}:${options.port}`;
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.#maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.#initialDelayMs = options.initialRetryDelayMs ?? INITIAL_RETRY_DELAY_MS;
    this.#maxDelayMs = options.maxRetryDelayMs ?? MAX_RETRY_DELAY_MS;
    this.#logger = options.logger?.child({ component: "helix-client" });
    this.#fetch = options.fetch ?? fetch;
    this.#sleep = options.sleep ?? defaultSleep;
  }

  get connected(): boolean {
    return this.#connected;
  }

  async execute(query: string, params: QueryParams = {}): Promise<unknown> {
    let delay = this.#initialDelayMs;
    let lastError: StoreError | undefined;

    for (let attempt = 1; attempt <= this.#maxRetries; attempt += 1) {
      this.#logger?.debug({ query, attempt }, "Executing store query");
      try {
        const result = await this.#post(query, params);
        this.#connected = true;
        return result;
      } catch (error) {
        const storeError = normalizeStoreError(error, { query, params });
        if (storeError instanceof NotFoundError) {
          this.#logger?.debug({ query }, "Store query returned no value");
          throw storeError;
        }

        lastError = storeError;
        this.#logger?.debug(
          { query, attempt, err: storeError.message },
          attempt < this.#maxRetries ? "Store query failed, retrying" : "Store query failed",
        );

        if (attempt < this.#maxRetries) {
          await this.#sleep(delay);
          delay = Math.min(delay * 2, this.#maxDelayMs);
        }
      }
    }

    throw new StoreError(
      `Retry exhausted after ${this.#maxRetries} attempts: ${lastError?.message ?? "unknown error"}`,
      "RETRY_EXHAUSTED",
      { query, params, cause: lastError },
    );
  }

  async executeNoRetry(query: string, params: QueryParams = {}): Promise<unknown> {
    try {
      return await this.#post(query, params);
    } catch (error) {
      throw normalizeStoreError(error, { query, params });
    }
  }

  /**
   * A 404 from the health check means the server answered but has no `health` query deployed.
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.executeNoRetry("health", {});
      this.#connected = true;
      return true;
    } catch (error) {
      if (error instanceof NotFoundError || (error instanceof StoreError && error.status === 404)) {
        this.#logger?.info("Health check passed (server alive, no health query)");
        this.#connected = true;
        return true;
      }
      this.#logger?.warn({ err: error }, "Backing store health check failed");
      this.#connected = false;
      return false;
    }
  }

  async #post(query: string, params: QueryParams): Promise<unknown> {
    let response: Response;
    try {
      response = await this.#fetch(`${this.baseUrl}/${query}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(params),
        signal: AbortSignal.timeout(this.#timeoutMs),
      });
    } catch (error) {
      throw new StoreError(
        `Connection failed: ${error instanceof Error ? error.message : String(error)}`,
        "CONNECTION",
        { query, params, cause: error },
      );
    }

    const body = await response.text();

    if (!response.ok) {
      const message = body.trim() || `HTTP ${response.status}`;
      if (response.status === 404 || isLogicalMissMessage(message)) {
        throw new NotFoundError(message, { query, params, status: response.status });
      }
      throw new StoreError(message, "HTTP", { query, params, status: response.status });
    }

    if (!body.trim()) {
      return null;
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      throw new StoreError(`Invalid JSON from query ${query}`, "SERIALIZATION", {
        query,
        params,
        cause: error,
      });
    }
  }
}
