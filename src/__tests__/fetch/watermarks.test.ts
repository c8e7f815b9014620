import { describe, it, expect } from 'vitest';
import {
  commitWatermark,
  compareTweetIds,
  directionFor,
  nextPageParams,
  observeIds,
  shouldContinue,
} from '../../fetch/watermarks.js';
import { makeTweet } from '../fixtures/tweets.js';

describe('compareTweetIds', () => {
  it('orders by numeric value, not text', () => {
    expect(compareTweetIds('9', '10')).toBe(-1);
    expect(compareTweetIds('10', '9')).toBe(1);
  });

  it('orders ids beyond float precision', () => {
    expect(compareTweetIds('1800000000000000001', '1800000000000000000')).toBe(1);
  });

  it('ignores leading zeros', () => {
    expect(compareTweetIds('007', '7')).toBe(0);
    expect(compareTweetIds('0', '0')).toBe(0);
  });
});

describe('directionFor', () => {
  it('maps forward to newest and backfill to oldest', () => {
    expect(directionFor('forward')).toBe('newest');
    expect(directionFor('backfill')).toBe('oldest');
  });
});

describe('nextPageParams', () => {
  it('fetches everything on the first forward pass', () => {
    expect(nextPageParams('forward', { newest: null, oldest: null })).toEqual({
      kind: 'fetch',
      bounds: {},
      boundary: null,
    });
  });

  it('fetches strictly after newest on later forward passes', () => {
    expect(nextPageParams('forward', { newest: '500', oldest: '100' })).toEqual({
      kind: 'fetch',
      bounds: { since_id: '500' },
      boundary: '500',
    });
  });

  it('fetches strictly before oldest when backfilling', () => {
    expect(nextPageParams('backfill', { newest: '500', oldest: '100' }, '50')).toEqual({
      kind: 'fetch',
      bounds: { until_id: '100' },
      boundary: '100',
    });
  });

  it('backfills from the oldest stored tweet when no marker exists', () => {
    expect(nextPageParams('backfill', { newest: '500', oldest: null }, '300')).toEqual({
      kind: 'fetch',
      bounds: { until_id: '300' },
      boundary: '300',
    });
  });

  it('skips a backfill with nothing to start from', () => {
    expect(nextPageParams('backfill', { newest: null, oldest: null }, null)).toEqual({
      kind: 'skip',
      reason: 'no_backfill_boundary',
    });
  });
});

describe('shouldContinue', () => {
  it('continues only while pages say there is more and are non-empty', () => {
    expect(shouldContinue({ data: [makeTweet()], cursor: 'c', has_more: true })).toBe(true);
    expect(shouldContinue({ data: [makeTweet()], has_more: false })).toBe(false);
    expect(shouldContinue({ data: [], cursor: 'c', has_more: true })).toBe(false);
  });
});

describe('observeIds', () => {
  it('tracks min and max across pages', () => {
    const first = observeIds(null, [makeTweet({ id: '50' }), makeTweet({ id: '30' })]);
    const second = observeIds(first, [makeTweet({ id: '90' }), makeTweet({ id: '10' })]);
    expect(first).toEqual({ min: '30', max: '50' });
    expect(second).toEqual({ min: '10', max: '90' });
  });

  it('leaves an empty range empty', () => {
    expect(observeIds(null, [])).toBeNull();
  });
});

describe('commitWatermark', () => {
  it('sets newest on the first forward pass', () => {
    expect(commitWatermark('forward', { newest: null, oldest: null }, { min: '10', max: '90' })).toEqual({
      direction: 'newest',
      previous: null,
      next: '90',
      changed: true,
    });
  });

  it('only moves newest up', () => {
    const pair = { newest: '100', oldest: null };
    expect(commitWatermark('forward', pair, { min: '101', max: '150' }).next).toBe('150');
    expect(commitWatermark('forward', pair, { min: '10', max: '90' })).toMatchObject({
      next: '100',
      changed: false,
    });
  });

  it('only moves oldest down', () => {
    const pair = { newest: '500', oldest: '100' };
    expect(commitWatermark('backfill', pair, { min: '20', max: '99' })).toEqual({
      direction: 'oldest',
      previous: '100',
      next: '20',
      changed: true,
    });
    expect(commitWatermark('backfill', pair, { min: '200', max: '300' }).changed).toBe(false);
  });

  it('keeps the marker when nothing was observed', () => {
    expect(commitWatermark('backfill', { newest: '500', oldest: '100' }, null)).toEqual({
      direction: 'oldest',
      previous: '100',
      next: '100',
      changed: false,
    });
  });
});
