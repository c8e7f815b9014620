import { Client } from '@xdevplatform/xdk';
import { z } from 'zod';

import {
  AuthenticationError,
  FeedbackError,
  RateLimitedError,
  TransientNetworkError,
  XApiRequestError,
} from '../errors.js';
import { parseSearchPage } from '../parsers/tweet.js';
import type { PageRequest, Relation, TweetPage, TweetSource } from '../types.js';

const errorShapeSchema = z.object({
  status: z.number().optional(),
  statusText: z.string().optional(),
  message: z.string().optional(),
  code: z.string().optional(),
  headers: z.unknown().optional(),
  response: z
    .object({
      status: z.number().optional(),
      headers: z.unknown().optional(),
    })
    .optional(),
});

type ErrorShape = z.infer<typeof errorShapeSchema>;

function errorShape(err: unknown): ErrorShape {
  const parsed = errorShapeSchema.safeParse(err);
  return parsed.success ? parsed.data : {};
}

function getErrorStatus(err: unknown): number | undefined {
  const shape = errorShape(err);
  return shape.status ?? shape.response?.status;
}

const headerRecordSchema = z.record(z.unknown());

function readHeader(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) return headers.get(name) ?? undefined;

  const parsed = headerRecordSchema.safeParse(headers);
  if (!parsed.success) return undefined;
  const value = parsed.data[name] ?? parsed.data[name.toLowerCase()];
  return typeof value === 'string' ? value : undefined;
}

// The reset header is an epoch second; the extra 5s covers clock skew.
const RATE_LIMIT_RESET_SLACK_MS = 5_000;

/**
 * Milliseconds the API asked us to wait before retrying, if it said.
 */
export function rateLimitWaitMs(err: unknown, now = Date.now()): number | undefined {
  const shape = errorShape(err);
  const headers = shape.headers ?? shape.response?.headers;

  const reset = Number(readHeader(headers, 'x-rate-limit-reset'));
  if (Number.isFinite(reset) && reset > 0) {
    return Math.max(0, reset * 1000 - now) + RATE_LIMIT_RESET_SLACK_MS;
  }

  const retryAfter = Number(readHeader(headers, 'retry-after'));
  if (Number.isFinite(retryAfter) && retryAfter >= 0) {
    return retryAfter * 1000;
  }

  return undefined;
}

const NETWORK_ERROR_RE = /fetch failed|socket hang up|network|timed? ?out|ECONNRESET|ECONNREFUSED|ETIMEDOUT|ENOTFOUND|EAI_AGAIN/i;

export function normalizeXApiError(err: unknown, context: string): FeedbackError {
  if (err instanceof FeedbackError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const shape = errorShape(err);
  const status = getErrorStatus(err);

  // The SDK reports failed, aborted and timed-out fetches with status 0.
  if (status === 0 || shape.statusText === 'NETWORK_ERROR') {
    return new TransientNetworkError(`Network error during ${context}: ${message}`, { cause: err });
  }

  if (status === 429 || /too many requests|rate limit/i.test(message)) {
    return new RateLimitedError(`X API rate limited ${context}`, rateLimitWaitMs(err), { cause: err });
  }

  if (status === 402 || /payment required/i.test(message) || /\b402\b/.test(message)) {
    return new XApiRequestError(
      `X API request failed for ${context}: HTTP 402 Payment Required. ` +
        'Your X API app likely needs additional credits or a paid tier for the search endpoint. ' +
        'Top up credits in https://console.x.com and retry.',
      402,
      { cause: err },
    );
  }

  if (/available:\s*none/i.test(message)) {
    return new AuthenticationError(
      `X API authentication not configured for ${context}. Provide X_API_BEARER_TOKEN.`,
      { cause: err },
    );
  }

  if (status === 401 || status === 403 || /unauthorized|forbidden/i.test(message)) {
    return new AuthenticationError(
      `X API request unauthorized for ${context}. Check token validity and permissions in https://console.x.com.`,
      { cause: err },
    );
  }

  if (status !== undefined && status >= 500) {
    return new TransientNetworkError(`X API returned HTTP ${status} for ${context}`, { cause: err });
  }

  const code = shape.code ?? '';
  if (status === undefined && (NETWORK_ERROR_RE.test(message) || NETWORK_ERROR_RE.test(code))) {
    return new TransientNetworkError(`Network error during ${context}: ${message}`, { cause: err });
  }

  return new XApiRequestError(`X API request failed for ${context}: ${message}`, status, { cause: err });
}

// Only what the feedback rows need
const TWEET_FIELDS = ['created_at', 'public_metrics', 'author_id', 'conversation_id'];

const USER_FIELDS = ['username'];

const EXPANSIONS = ['author_id'];

/**
 * Recent-search query selecting the replies or the quotes of a post.
 * Search (unlike the quote_tweets endpoint) honours since_id/until_id for both.
 */
export function buildSearchQuery(parentTweetId: string, relation: Relation): string {
  return relation === 'reply'
    ? `conversation_id:${parentTweetId} is:reply`
    : `quotes_of_tweet_id:${parentTweetId}`;
}

export interface XClientOptions {
  /** Per-request limit; the SDK aborts the fetch when it passes. */
  requestTimeoutMs?: number;
}

export function createXClient(bearerToken: string | undefined, options: XClientOptions = {}): Client {
  const token = bearerToken?.trim();
  if (!token) {
    throw new AuthenticationError('X_API_BEARER_TOKEN is not configured. Add it to your environment or .env file.');
  }
  return new Client({
    bearerToken: token,
    ...(options.requestTimeoutMs !== undefined ? { timeout: options.requestTimeoutMs } : {}),
  });
}

export function createXApiTweetSource(client: Client): TweetSource {
  return {
    async fetchPage(request: PageRequest): Promise<TweetPage> {
      const context = `${request.relation === 'reply' ? 'replies' : 'quotes'}_of(${request.parent_tweet_id})`;
      try {
        const response: unknown = await client.posts.searchRecent(
          buildSearchQuery(request.parent_tweet_id, request.relation),
          {
            maxResults: Math.min(Math.max(request.max_results, 10), 100),
            tweetfields: TWEET_FIELDS,
            userfields: USER_FIELDS,
            expansions: EXPANSIONS,
            ...(request.bounds.since_id ? { sinceId: request.bounds.since_id } : {}),
            ...(request.bounds.until_id ? { untilId: request.bounds.until_id } : {}),
            ...(request.cursor ? { nextToken: request.cursor } : {}),
          },
        );
        return parseSearchPage(response, request.parent_tweet_id, request.relation);
      } catch (err) {
        throw normalizeXApiError(err, context);
      }
    },
  };
}
