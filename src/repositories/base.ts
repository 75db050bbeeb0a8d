import type { z } from "zod";
import type { QueryExecutor, QueryParams } from "../database/client";
import { StoreError, isNotFoundError } from "../database/errors";

export interface QueryOptions {
  /**
   * Skip the client's retry loop; misses and failures propagate immediately.
   */
  noRetry?: boolean;
}

export abstract class BaseRepository {
  protected readonly client: QueryExecutor;

  protected constructor(client: QueryExecutor) {
    this.client = client;
  }

  protected async run(
    query: string,
    params: QueryParams = {},
    options: QueryOptions = {},
  ): Promise<unknown> {
    return options.noRetry
      ? this.client.executeNoRetry(query, params)
      : this.client.execute(query, params);
  }

  protected async query<S extends z.ZodTypeAny>(
    query: string,
    params: QueryParams,
    schema: S,
    options: QueryOptions = {},
  ): Promise<z.output<S>> {
    const raw = await this.run(query, params, options);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreError(
        `Unexpected response shape from ${query}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} ${issue.message}`)
          .join("; ")}`,
        "SERIALIZATION",
        { query, params, cause: parsed.error },
      );
    }
    return parsed.data;
  }

  /**
   * Like {@link query}, but a logical miss resolves to `undefined`.
   */
  protected async find<S extends z.ZodTypeAny>(
    query: string,
    params: QueryParams,
    schema: S,
    options: QueryOptions = {},
  ): Promise<z.output<S> | undefined> {
    try {
      return await this.query(query, params, schema, options);
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  protected async command(query: string, params: QueryParams): Promise<void> {
    await this.run(query, params);
  }

  protected parseJson<T>(
    value: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    fallback: T,
  ): T {
    if (typeof value !== "string") {
      const direct = schema.safeParse(value);
      return direct.success ? direct.data : fallback;
    }

    try {
      const parsed = schema.safeParse(JSON.parse(value));
      return parsed.success ? parsed.data : fallback;
    } catch {
      return fallback;
    }
  }

  protected stringifyJson(value: unknown): string {
    return JSON.stringify(value ?? {});
  }
}
