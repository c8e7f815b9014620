import type { FetchMode, Relation } from './types.js';

export type FeedbackErrorCode =
  | 'INVALID_REFERENCE'
  | 'AUTHENTICATION'
  | 'RATE_LIMITED'
  | 'TRANSIENT_NETWORK'
  | 'X_API_REQUEST'
  | 'PASS_FAILED';

export class FeedbackError extends Error {
  readonly code: FeedbackErrorCode;

  constructor(code: FeedbackErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidReferenceError extends FeedbackError {
  readonly input: string;

  constructor(input: string) {
    super('INVALID_REFERENCE', `Cannot extract tweet ID from: ${input}`);
    this.input = input;
  }
}

export class AuthenticationError extends FeedbackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTHENTICATION', message, options);
  }
}

export class RateLimitedError extends FeedbackError {
  /** How long the API asked us to wait, when it said. */
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, options?: { cause?: unknown }) {
    super('RATE_LIMITED', message, options);
    this.retryAfterMs = retryAfterMs;
  }
}

export class TransientNetworkError extends FeedbackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_NETWORK', message, options);
  }
}

export class XApiRequestError extends FeedbackError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('X_API_REQUEST', message, options);
    this.status = status;
  }
}

export class PassFailedError extends FeedbackError {
  readonly relation: Relation;
  readonly mode: FetchMode;
  readonly pagesFetched: number;
  readonly tweetsFetched: number;
  readonly tweetsInserted: number;

  constructor(params: {
    relation: Relation;
    mode: FetchMode;
    reason: string;
    pagesFetched: number;
    tweetsFetched: number;
    tweetsInserted: number;
    cause?: unknown;
  }) {
    super(
      'PASS_FAILED',
      `${params.relation} ${params.mode} pass failed after ${params.pagesFetched} page(s): ${params.reason}`,
      { cause: params.cause },
    );
    this.relation = params.relation;
    this.mode = params.mode;
    this.pagesFetched = params.pagesFetched;
    this.tweetsFetched = params.tweetsFetched;
    this.tweetsInserted = params.tweetsInserted;
  }
}

export function isRetryableError(err: unknown): err is RateLimitedError | TransientNetworkError {
  return err instanceof RateLimitedError || err instanceof TransientNetworkError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
