/**
 * Error taxonomy shared by the fetchers, the pipeline and the HTTP layer.
 */

export interface AppErrorOptions {
  statusCode?: number;
  isRetryable?: boolean;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isRetryable: boolean;

  constructor(message: string, code: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AppError";
    this.code = code;
    this.statusCode = options.statusCode ?? 500;
    this.isRetryable = options.isRetryable ?? false;
  }
}

/** Malformed input, rejected before any network call. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR", { statusCode: 400 });
    this.name = "ValidationError";
  }
}

/** Catalog, transcript or completion service failure. */
export class UpstreamError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, "UPSTREAM_ERROR", { statusCode: 502, ...options });
    this.name = "UpstreamError";
  }
}

export class RateLimitedError extends AppError {
  public readonly retryAfterMs?: number;

  constructor(message: string, options: { retryAfterMs?: number; cause?: unknown } = {}) {
    super(message, "RATE_LIMITED", { statusCode: 429, isRetryable: true, cause: options.cause });
    this.name = "RateLimitedError";
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** Expected absence, e.g. a video without captions. */
export class NotAvailableError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, "NOT_AVAILABLE", { statusCode: 404, cause: options.cause });
    this.name = "NotAvailableError";
  }
}

export interface VideoFailure {
  videoId: string;
  error: string;
}

/** Every video of a batch failed. */
export class BatchFailedError extends UpstreamError {
  public readonly failures: readonly VideoFailure[];

  constructor(failures: readonly VideoFailure[]) {
    super("Failed to process any transcripts", { statusCode: 502 });
    this.name = "BatchFailedError";
    this.failures = failures;
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof AppError && error.isRetryable;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
