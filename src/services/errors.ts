export type OmcErrorKind =
  | "configuration"
  | "validation"
  | "provider"
  | "integrity"
  | "resolution"
  | "chunking"
  | "deletion"
  | "evolution";

export class OmcError extends Error {
  readonly kind: OmcErrorKind;

  constructor(kind: OmcErrorKind, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "OmcError";
    this.kind = kind;
  }
}

export class ConfigurationError extends OmcError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("configuration", message, options);
    this.name = "ConfigurationError";
  }
}

export class ValidationError extends OmcError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super("validation", message);
    this.name = "ValidationError";
    this.field = field;
  }
}

export type ProviderErrorReason = "request" | "response" | "empty_input" | "both_failed";

export class ProviderError extends OmcError {
  readonly provider: string;
  readonly reason: ProviderErrorReason;

  constructor(
    provider: string,
    reason: ProviderErrorReason,
    message: string,
    options: { cause?: unknown } = {},
  ) {
    super("provider", `${provider}: ${message}`, options);
    this.name = "ProviderError";
    this.provider = provider;
    this.reason = reason;
  }
}

export class MissingInternalIdError extends OmcError {
  readonly memoryId: string;

  constructor(memoryId: string) {
    super("integrity", `addMemory returned no internal id for ${memoryId}`);
    this.name = "MissingInternalIdError";
    this.memoryId = memoryId;
  }
}

export type ResolutionErrorReason = "not_found" | "database" | "timeout" | "batch_failed";

export class ResolutionError extends OmcError {
  readonly memoryId: string;
  readonly reason: ResolutionErrorReason;

  constructor(
    memoryId: string,
    reason: ResolutionErrorReason,
    message: string,
    options: { cause?: unknown } = {},
  ) {
    super("resolution", message, options);
    this.name = "ResolutionError";
    this.memoryId = memoryId;
    this.reason = reason;
  }
}

export type ChunkingErrorReason = "content_too_short" | "splitting" | "database";

export class ChunkingError extends OmcError {
  readonly reason: ChunkingErrorReason;

  constructor(reason: ChunkingErrorReason, message: string, options: { cause?: unknown } = {}) {
    super("chunking", message, options);
    this.name = "ChunkingError";
    this.reason = reason;
  }
}

export type DeletionErrorReason = "not_found" | "already_deleted" | "cannot_restore" | "database";

export class DeletionError extends OmcError {
  readonly memoryId?: string;
  readonly reason: DeletionErrorReason;

  constructor(
    reason: DeletionErrorReason,
    message: string,
    options: { memoryId?: string; cause?: unknown } = {},
  ) {
    super("deletion", message, { cause: options.cause });
    this.name = "DeletionError";
    this.reason = reason;
    this.memoryId = options.memoryId;
  }
}

export class EvolutionError extends OmcError {
  readonly operation: string;

  constructor(operation: string, message: string, options: { cause?: unknown } = {}) {
    super("evolution", message, options);
    this.name = "EvolutionError";
    this.operation = operation;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
