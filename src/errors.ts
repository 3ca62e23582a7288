import { parseRetryAfterSeconds } from "./rate-limit-tracker";

export class SpotifyApiError extends Error {
  readonly status: number;
  readonly retryAfterSeconds: number | null;

  constructor(status: number, message: string, retryAfterSeconds: number | null = null) {
    super(message);
    this.name = "SpotifyApiError";
    this.status = status;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class RateLimitedError extends Error {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message: string) {
    super(message);
    this.name = "RateLimitedError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class AuthExpiredError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthExpiredError";
  }
}

export class AuthFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthFailedError";
  }
}

export class TransientFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientFetchError";
  }
}

export class CorruptLocalStateError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorruptLocalStateError";
    this.filePath = filePath;
  }
}

export class SyncCancelledError extends Error {
  constructor() {
    super("Sync was cancelled by the caller");
    this.name = "SyncCancelledError";
  }
}

export type CatalogError = RateLimitedError | AuthExpiredError | AuthFailedError | TransientFetchError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const RATE_LIMIT_PATTERN = /rate[\s-]?limit/i;

function mentionsRateLimit(message: string): boolean {
  return RATE_LIMIT_PATTERN.test(message);
}

/**
 * Maps whatever a catalog call threw onto the sync error taxonomy.
 * Anything unrecognised is a transient fetch error.
 */
export function classifyCatalogError(error: unknown, context: string): CatalogError {
  if (
    error instanceof RateLimitedError ||
    error instanceof AuthExpiredError ||
    error instanceof AuthFailedError ||
    error instanceof TransientFetchError
  ) {
    return error;
  }

  const message = errorMessage(error);

  if (error instanceof SpotifyApiError) {
    if (error.status === 429) {
      return new RateLimitedError(error.retryAfterSeconds ?? parseRetryAfterSeconds(message), message);
    }

    if (error.status === 401) {
      return new AuthExpiredError(message);
    }
  }

  if (mentionsRateLimit(message)) {
    return new RateLimitedError(parseRetryAfterSeconds(message), message);
  }

  if (message.toLowerCase().includes("expired")) {
    return new AuthExpiredError(message);
  }

  return new TransientFetchError(`Failed while ${context}: ${message}`, { cause: error });
}
