import type { Direction, FeedbackTweet, FetchMode, PageBounds, TweetPage, WatermarkPair } from '../types.js';

/**
 * Order two decimal tweet ids without going through floats (ids exceed 2^53).
 */
export function compareTweetIds(a: string, b: string): number {
  const left = a.replace(/^0+(?=\d)/, '');
  const right = b.replace(/^0+(?=\d)/, '');
  if (left.length !== right.length) return left.length < right.length ? -1 : 1;
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export function directionFor(mode: FetchMode): Direction {
  return mode === 'forward' ? 'newest' : 'oldest';
}

export type PageParamsDecision =
  | { kind: 'fetch'; bounds: PageBounds; boundary: string | null }
  | { kind: 'skip'; reason: 'no_backfill_boundary' };

/**
 * Bounds for every page of a pass.
 *
 * Forward passes fetch strictly after `newest` (everything when unset). Backfill
 * passes fetch strictly before `oldest`; with no backfill marker yet they start
 * below the oldest tweet already stored, and with nothing stored there is
 * nothing to backfill from.
 */
export function nextPageParams(
  mode: FetchMode,
  watermarks: WatermarkPair,
  storedOldest: string | null = null,
): PageParamsDecision {
  if (mode === 'forward') {
    return watermarks.newest
      ? { kind: 'fetch', bounds: { since_id: watermarks.newest }, boundary: watermarks.newest }
      : { kind: 'fetch', bounds: {}, boundary: null };
  }

  const boundary = watermarks.oldest ?? storedOldest;
  if (!boundary) return { kind: 'skip', reason: 'no_backfill_boundary' };
  return { kind: 'fetch', bounds: { until_id: boundary }, boundary };
}

export function shouldContinue(page: TweetPage): boolean {
  return page.has_more && page.data.length > 0;
}

export interface IdRange {
  min: string;
  max: string;
}

/**
 * Fold a page's ids into the running min/max of the pass.
 */
export function observeIds(range: IdRange | null, tweets: FeedbackTweet[]): IdRange | null {
  let current = range;
  for (const { id } of tweets) {
    if (!current) {
      current = { min: id, max: id };
      continue;
    }
    if (compareTweetIds(id, current.min) < 0) current = { ...current, min: id };
    if (compareTweetIds(id, current.max) > 0) current = { ...current, max: id };
  }
  return current;
}

export interface WatermarkCommit {
  direction: Direction;
  previous: string | null;
  next: string | null;
  changed: boolean;
}

/**
 * Decide the marker value after a successful pass. `newest` only moves up on
 * forward passes, `oldest` only moves down on backfill passes; a pass that saw
 * nothing leaves the marker alone.
 */
export function commitWatermark(mode: FetchMode, current: WatermarkPair, observed: IdRange | null): WatermarkCommit {
  const direction = directionFor(mode);
  const previous = current[direction];

  if (!observed) return { direction, previous, next: previous, changed: false };

  if (direction === 'newest') {
    const advance = previous === null || compareTweetIds(observed.max, previous) > 0;
    return { direction, previous, next: advance ? observed.max : previous, changed: advance };
  }

  const regress = previous === null || compareTweetIds(observed.min, previous) < 0;
  return { direction, previous, next: regress ? observed.min : previous, changed: regress };
}
