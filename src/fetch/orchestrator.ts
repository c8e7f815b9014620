import { createXApiTweetSource, createXClient } from '../clients/x-api.js';
import type { Config } from '../config.js';
import { AuthenticationError, PassFailedError } from '../errors.js';
import { createLogger } from '../logger.js';
import { parsePostReference } from '../parsers/reference.js';
import type { FetchMode, FetchReport, PassFailure, PassResult, Relation } from '../types.js';
import { type PagerDeps, runPass } from './pager.js';
import { DEFAULT_RETRY_POLICY } from './retry.js';

const log = createLogger('fetch');

const PASS_ORDER: Relation[] = ['reply', 'quote'];

export type FetchDeps = PagerDeps;

/**
 * Wire the X API source, retry policy and paging limits from configuration.
 * The bearer token is read here once and handed to the client explicitly.
 */
export function createFetchDeps(config: Config): FetchDeps {
  const client = createXClient(config.X_API_BEARER_TOKEN, { requestTimeoutMs: config.FETCH_REQUEST_TIMEOUT_MS });
  return {
    source: createXApiTweetSource(client),
    retryPolicy: {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: config.FETCH_MAX_ATTEMPTS,
      maxRateLimitWaitMs: config.FETCH_RATE_LIMIT_MAX_WAIT_MS,
    },
    options: {
      pageSize: config.FETCH_PAGE_SIZE,
      maxPages: config.FETCH_MAX_PAGES,
      pageDelayMs: config.FETCH_PAGE_DELAY_MS,
    },
  };
}

function toFailure(err: PassFailedError): PassFailure {
  const cause = err.cause instanceof Error ? err.cause : undefined;
  return {
    relation: err.relation,
    code: cause && 'code' in cause && typeof cause.code === 'string' ? cause.code : err.code,
    message: err.message,
    pages_fetched: err.pagesFetched,
    tweets_fetched: err.tweetsFetched,
    tweets_inserted: err.tweetsInserted,
  };
}

/**
 * Fetch the replies and quotes of one post. The two passes use separate
 * watermarks, so one failing does not stop the other; only a rejected or
 * missing credential ends the run early.
 */
export async function runFetch(reference: string, mode: FetchMode, deps: FetchDeps): Promise<FetchReport> {
  const postId = parsePostReference(reference);
  const passes: PassResult[] = [];
  const errors: PassFailure[] = [];

  for (const relation of PASS_ORDER) {
    try {
      passes.push(await runPass({ parentTweetId: postId, relation, mode }, deps));
    } catch (err) {
      if (!(err instanceof PassFailedError)) throw err;
      if (err.cause instanceof AuthenticationError) throw err.cause;
      log.error(err.message);
      errors.push(toFailure(err));
    }
  }

  // Rows from a failed pass are kept, so they count too.
  const sum = (relation: Relation, key: 'tweets_fetched' | 'tweets_inserted') =>
    [...passes, ...errors].filter((p) => p.relation === relation).reduce((total, p) => total + p[key], 0);

  return {
    post_id: postId,
    mode,
    replies_fetched: sum('reply', 'tweets_fetched'),
    quotes_fetched: sum('quote', 'tweets_fetched'),
    replies_inserted: sum('reply', 'tweets_inserted'),
    quotes_inserted: sum('quote', 'tweets_inserted'),
    passes,
    errors,
    ok: errors.length === 0,
  };
}
