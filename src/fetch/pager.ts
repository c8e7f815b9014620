import {
  ensureWatermarks,
  getOldestStoredTweetId,
  getWatermark,
  setWatermark,
  upsertTweets,
} from '../db/index.js';
import { PassFailedError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { FetchMode, PassResult, Relation, TweetPage, TweetSource } from '../types.js';
import { type RetryPolicy, sleep as defaultSleep, withRetry } from './retry.js';
import {
  type IdRange,
  commitWatermark,
  directionFor,
  nextPageParams,
  observeIds,
  shouldContinue,
} from './watermarks.js';

const log = createLogger('pager');

export type PassState = 'start' | 'fetching' | 'page_received' | 'done' | 'error';

export interface PagerOptions {
  pageSize: number;
  /** A pass needing more pages than this fails rather than leave a gap. */
  maxPages: number;
  pageDelayMs: number;
}

export interface PagerDeps {
  source: TweetSource;
  retryPolicy: RetryPolicy;
  options: PagerOptions;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface PassTarget {
  parentTweetId: string;
  relation: Relation;
  mode: FetchMode;
}

/**
 * Page through every reply or quote of a post in one direction.
 *
 * Each page is written to the store as soon as it arrives. The watermark moves
 * once, after the last page, from the min/max id seen across the whole pass. A
 * pass that fails leaves its rows in place and the watermark where it was, so
 * the next run repeats it from the same bound.
 */
export async function runPass(target: PassTarget, deps: PagerDeps): Promise<PassResult> {
  const { parentTweetId, relation, mode } = target;
  const wait = deps.sleep ?? defaultSleep;
  let state: PassState = 'start';

  const transition = (next: PassState) => {
    log.debug(`${relation}/${mode} ${state} -> ${next}`);
    state = next;
  };

  ensureWatermarks(parentTweetId, relation);
  const watermarks = {
    newest: getWatermark(parentTweetId, relation, 'newest'),
    oldest: getWatermark(parentTweetId, relation, 'oldest'),
  };

  const decision = nextPageParams(
    mode,
    watermarks,
    mode === 'backfill' && !watermarks.oldest ? getOldestStoredTweetId(parentTweetId, relation) : null,
  );

  const direction = directionFor(mode);

  if (decision.kind === 'skip') {
    log.info(`No ${relation}s stored for ${parentTweetId} yet, nothing to backfill from`);
    transition('done');
    return {
      parent_tweet_id: parentTweetId,
      relation,
      mode,
      status: 'noop',
      skip_reason: decision.reason,
      pages_fetched: 0,
      tweets_fetched: 0,
      tweets_inserted: 0,
      watermark: { direction, previous: watermarks[direction], current: watermarks[direction] },
    };
  }

  log.info(
    `Fetching ${relation}s of ${parentTweetId} (${mode}${decision.boundary ? `, boundary ${decision.boundary}` : ', initial'})`,
  );

  let cursor: string | undefined;
  let observed: IdRange | null = null;
  let pages = 0;
  let fetched = 0;
  let inserted = 0;

  const fail = (reason: string, cause?: unknown): PassFailedError => {
    transition('error');
    return new PassFailedError({
      relation,
      mode,
      reason,
      pagesFetched: pages,
      tweetsFetched: fetched,
      tweetsInserted: inserted,
      cause,
    });
  };

  for (;;) {
    if (pages >= deps.options.maxPages) {
      throw fail(`more than ${deps.options.maxPages} pages available; raise FETCH_MAX_PAGES`);
    }

    transition('fetching');
    let page: TweetPage;
    try {
      page = await withRetry(
        deps.retryPolicy,
        () =>
          deps.source.fetchPage({
            parent_tweet_id: parentTweetId,
            relation,
            bounds: decision.bounds,
            cursor,
            max_results: deps.options.pageSize,
          }),
        {
          sleep: wait,
          random: deps.random,
          onRetry: ({ attempt, delayMs, error }) =>
            log.warn(`Page ${pages + 1} attempt ${attempt + 1} failed (${errorMessage(error)}), retrying in ${delayMs}ms`),
        },
      );
    } catch (err) {
      throw fail(errorMessage(err), err);
    }

    transition('page_received');
    pages++;

    if (page.data.length > 0) {
      const result = upsertTweets(page.data);
      observed = observeIds(observed, page.data);
      fetched += page.data.length;
      inserted += result.inserted;
      log.info(`Page ${pages}: ${page.data.length} ${relation}s saved (total: ${fetched}, new: ${inserted})`);
    }

    if (!shouldContinue(page)) break;

    cursor = page.cursor;
    if (deps.options.pageDelayMs > 0) await wait(deps.options.pageDelayMs);
  }

  const commit = commitWatermark(mode, watermarks, observed);
  if (commit.changed && commit.next) {
    setWatermark(parentTweetId, relation, commit.direction, commit.next);
    log.info(`Updated ${commit.direction} ${relation} watermark: ${commit.next}`);
  }
  transition('done');

  return {
    parent_tweet_id: parentTweetId,
    relation,
    mode,
    status: fetched > 0 ? 'completed' : 'noop',
    pages_fetched: pages,
    tweets_fetched: fetched,
    tweets_inserted: inserted,
    watermark: { direction: commit.direction, previous: commit.previous, current: commit.next },
  };
}
