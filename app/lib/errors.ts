/**
 * errors.ts
 *
 * Error taxonomy shared by the catalog client, the discovery engine and the CLI.
 */

export type CatalogErrorKind = "rate_limited" | "transient" | "permanent";

/**
 * Normalized upstream failure. Catalog clients translate their transport
 * errors into this shape so RetryPolicy can decide what to do.
 */
export class CatalogError extends Error {
  readonly kind: CatalogErrorKind;
  readonly retryAfterSeconds: number | null;
  readonly status: number | null;

  constructor(
    kind: CatalogErrorKind,
    message: string,
    options: {
      retryAfterSeconds?: number | null;
      status?: number | null;
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "CatalogError";
    this.kind = kind;
    this.retryAfterSeconds = options.retryAfterSeconds ?? null;
    this.status = options.status ?? null;
  }
}

/**
 * Stored data did not have the expected shape. Callers treat it as a cache miss.
 */
export class CacheCorruptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CacheCorruptionError";
  }
}

export class DeadlineExceededError extends Error {
  constructor(message = "Run deadline exceeded") {
    super(message);
    this.name = "DeadlineExceededError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "ValidationError";
    this.field = field;
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
