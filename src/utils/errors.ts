/**
 * Typed errors raised across the scraping pipeline.
 */

export type FetchFailureReason = 'network' | 'timeout' | 'status' | 'too_large' | 'browser';

export class FetchError extends Error {
  readonly url: string;
  readonly reason: FetchFailureReason;
  readonly statusCode?: number;

  constructor(
    message: string,
    details: { url: string; reason: FetchFailureReason; statusCode?: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = 'FetchError';
    this.url = details.url;
    this.reason = details.reason;
    this.statusCode = details.statusCode;
  }

  /** Network failures, timeouts, 429 and 5xx are worth another attempt */
  get retryable(): boolean {
    if (this.reason === 'network' || this.reason === 'timeout') {
      return true;
    }
    if (this.reason === 'status' && this.statusCode !== undefined) {
      return this.statusCode === 429 || this.statusCode >= 500;
    }
    return false;
  }
}

export class PersistenceError extends Error {
  readonly operation: string;

  constructor(message: string, operation: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class UnknownSourceError extends Error {
  readonly sourceId: string;

  constructor(sourceId: string) {
    super(`Unknown source: ${sourceId}`);
    this.name = 'UnknownSourceError';
    this.sourceId = sourceId;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
