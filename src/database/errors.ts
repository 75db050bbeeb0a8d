export type StoreErrorCode =
  | "CONNECTION"
  | "QUERY"
  | "NOT_FOUND"
  | "HTTP"
  | "SERIALIZATION"
  | "RETRY_EXHAUSTED";

export interface StoreErrorOptions {
  query?: string;
  params?: Record<string, unknown>;
  status?: number;
  cause?: unknown;
}

export class StoreError extends Error {
  readonly code: StoreErrorCode;
  readonly query?: string;
  readonly params?: Record<string, unknown>;
  readonly status?: number;

  constructor(message: string, code: StoreErrorCode, options: StoreErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "StoreError";
    this.code = code;
    this.query = options.query;
    this.params = options.params;
    this.status = options.status;
  }
}

export class NotFoundError extends StoreError {
  constructor(message: string, options: StoreErrorOptions = {}) {
    super(message, "NOT_FOUND", options);
    this.name = "NotFoundError";
  }
}

const LOGICAL_MISS_MARKERS = ["not found", "no value", "couldn't find"];

/**
 * The store reports absent records as error bodies rather than a dedicated status.
 */
export function isLogicalMissMessage(message: string): boolean {
  const lowered = message.toLowerCase();
  return LOGICAL_MISS_MARKERS.some((marker) => lowered.includes(marker));
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function normalizeStoreError(
  error: unknown,
  context: { query?: string; params?: Record<string, unknown> } = {},
): StoreError {
  if (error instanceof StoreError) {
    return error;
  }

  if (error instanceof Error) {
    if (isLogicalMissMessage(error.message)) {
      return new NotFoundError(error.message, { ...context, cause: error });
    }
    return new StoreError(error.message, "CONNECTION", { ...context, cause: error });
  }

  return new StoreError("Unknown backing store error", "QUERY", {
    ...context,
    cause: error,
  });
}
