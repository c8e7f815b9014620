import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  resetDb,
  upsertTweets,
  getTweetById,
  countTweets,
  getOldestStoredTweetId,
  iterateTweetsForAnalysis,
  getWatermark,
  setWatermark,
  ensureWatermarks,
  getFetchState,
  saveAnalysis,
  listAnalyzedTweets,
  getAnalysisSummary,
} from '../db/index.js';
import { PARENT_ID, makeTweet, useMemoryDb } from './fixtures/tweets.js';

describe('db', () => {
  beforeEach(() => {
    useMemoryDb();
  });

  afterEach(() => {
    resetDb();
  });

  // --- upsertTweets ---

  describe('upsertTweets', () => {
    it('stores and retrieves a tweet', () => {
      const tweet = makeTweet();
      expect(upsertTweets([tweet])).toEqual({ written: 1, inserted: 1 });

      const stored = getTweetById(tweet.id);
      expect(stored).not.toBeNull();
      expect(stored?.parent_tweet_id).toBe(PARENT_ID);
      expect(stored?.relation).toBe('reply');
      expect(stored?.author_username).toBe('testuser');
      expect(stored?.metrics).toEqual({ likes: 1, retweets: 0, replies: 0, quotes: 0 });
      expect(stored?.fetched_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    });

    it('returns null for an unknown id', () => {
      expect(getTweetById('1')).toBeNull();
    });

    it('is idempotent and counts only new ids as inserted', () => {
      const batch = [makeTweet({ id: '11' }), makeTweet({ id: '12' })];
      expect(upsertTweets(batch)).toEqual({ written: 2, inserted: 2 });
      expect(upsertTweets(batch)).toEqual({ written: 2, inserted: 0 });
      expect(upsertTweets([makeTweet({ id: '12' }), makeTweet({ id: '13' })])).toEqual({
        written: 2,
        inserted: 1,
      });
      expect(countTweets(PARENT_ID)).toBe(3);
    });

    it('counts a duplicated id inside one batch once', () => {
      expect(upsertTweets([makeTweet({ id: '11' }), makeTweet({ id: '11' })])).toEqual({
        written: 2,
        inserted: 1,
      });
      expect(countTweets(PARENT_ID)).toBe(1);
    });

    it('refreshes text and metrics on re-upsert', () => {
      upsertTweets([makeTweet({ id: '11', text: 'first' })]);
      upsertTweets([
        makeTweet({ id: '11', text: 'edited', metrics: { likes: 9, retweets: 2, replies: 1, quotes: 0 } }),
      ]);

      const stored = getTweetById('11');
      expect(stored?.text).toBe('edited');
      expect(stored?.metrics.likes).toBe(9);
    });

    it('keeps the first relation and a known created_at', () => {
      upsertTweets([makeTweet({ id: '11', relation: 'reply' })]);
      upsertTweets([makeTweet({ id: '11', relation: 'quote', created_at: null })]);

      const stored = getTweetById('11');
      expect(stored?.relation).toBe('reply');
      expect(stored?.created_at).toBe('2025-01-15T12:00:00.000Z');
    });

    it('writes nothing for an empty batch', () => {
      expect(upsertTweets([])).toEqual({ written: 0, inserted: 0 });
    });
  });

  // --- counting and ordering ---

  describe('countTweets + getOldestStoredTweetId', () => {
    beforeEach(() => {
      upsertTweets([
        makeTweet({ id: '9', relation: 'reply' }),
        makeTweet({ id: '10', relation: 'reply' }),
        makeTweet({ id: '8', relation: 'quote' }),
        makeTweet({ id: '7', parent_tweet_id: '555' }),
      ]);
    });

    it('counts per parent and per relation', () => {
      expect(countTweets(PARENT_ID)).toBe(3);
      expect(countTweets(PARENT_ID, 'reply')).toBe(2);
      expect(countTweets(PARENT_ID, 'quote')).toBe(1);
      expect(countTweets('555')).toBe(1);
    });

    it('orders ids numerically, not as text', () => {
      expect(getOldestStoredTweetId(PARENT_ID, 'reply')).toBe('9');
      expect(getOldestStoredTweetId(PARENT_ID, 'quote')).toBe('8');
    });

    it('returns null when nothing is stored for the relation', () => {
      expect(getOldestStoredTweetId('555', 'quote')).toBeNull();
    });
  });

  // --- iterateTweetsForAnalysis ---

  describe('iterateTweetsForAnalysis', () => {
    beforeEach(() => {
      upsertTweets([makeTweet({ id: '9' }), makeTweet({ id: '10' }), makeTweet({ id: '100', relation: 'quote' })]);
    });

    it('yields newest first, one row at a time', () => {
      const iterator = iterateTweetsForAnalysis(PARENT_ID);
      expect(iterator.next()).toMatchObject({ done: false, value: { id: '100' } });
      expect(iterator.next()).toMatchObject({ done: false, value: { id: '10' } });
      iterator.return(undefined);
    });

    it('starts over on every call', () => {
      const first = Array.from(iterateTweetsForAnalysis(PARENT_ID), (t) => t.id);
      const second = Array.from(iterateTweetsForAnalysis(PARENT_ID), (t) => t.id);
      expect(first).toEqual(['100', '10', '9']);
      expect(second).toEqual(first);
    });

    it('skips analyzed tweets when asked', () => {
      saveAnalysis([{ tweet_id: '10', category: 'praise', summary: 'Positive feedback', priority: 0 }]);
      const ids = Array.from(iterateTweetsForAnalysis(PARENT_ID, { unanalyzedOnly: true }), (t) => t.id);
      expect(ids).toEqual(['100', '9']);
    });
  });

  // --- watermarks ---

  describe('watermarks', () => {
    it('returns null before anything is recorded', () => {
      expect(getWatermark(PARENT_ID, 'reply', 'newest')).toBeNull();
    });

    it('creates empty markers once and keeps existing values', () => {
      ensureWatermarks(PARENT_ID, 'reply');
      setWatermark(PARENT_ID, 'reply', 'newest', '500');
      ensureWatermarks(PARENT_ID, 'reply');

      expect(getWatermark(PARENT_ID, 'reply', 'newest')).toBe('500');
      expect(getWatermark(PARENT_ID, 'reply', 'oldest')).toBeNull();
    });

    it('overwrites a marker and keeps relations and directions apart', () => {
      setWatermark(PARENT_ID, 'reply', 'newest', '500');
      setWatermark(PARENT_ID, 'reply', 'newest', '600');
      setWatermark(PARENT_ID, 'quote', 'oldest', '50');

      expect(getWatermark(PARENT_ID, 'reply', 'newest')).toBe('600');
      expect(getWatermark(PARENT_ID, 'reply', 'oldest')).toBeNull();
      expect(getWatermark(PARENT_ID, 'quote', 'newest')).toBeNull();
      expect(getWatermark(PARENT_ID, 'quote', 'oldest')).toBe('50');
    });

    it('reports fetch state per relation', () => {
      upsertTweets([makeTweet({ id: '501' }), makeTweet({ id: '502' })]);
      setWatermark(PARENT_ID, 'reply', 'newest', '502');

      const [reply, quote] = getFetchState(PARENT_ID);
      expect(reply).toMatchObject({ relation: 'reply', newest: '502', oldest: null, stored_tweets: 2 });
      expect(reply.updated_at).not.toBeNull();
      expect(quote).toEqual({ relation: 'quote', newest: null, oldest: null, stored_tweets: 0, updated_at: null });
    });
  });

  // --- analysis ---

  describe('analysis', () => {
    beforeEach(() => {
      upsertTweets([
        makeTweet({ id: '1', author_username: 'alice', text: 'love it' }),
        makeTweet({ id: '2', author_username: 'bob', text: 'it crashed' }),
        makeTweet({ id: '3', author_username: 'carol', text: 'how?' }),
        makeTweet({ id: '4', author_username: 'dave', text: 'please add export' }),
      ]);
      saveAnalysis([
        { tweet_id: '1', category: 'praise', summary: 'Positive feedback', priority: 0 },
        { tweet_id: '2', category: 'bug_report', summary: 'Potential issue report', priority: 2 },
        { tweet_id: '3', category: 'question', summary: 'User question', priority: 1 },
        { tweet_id: '4', category: 'feature_request', summary: 'Potential feature suggestion', priority: 2 },
      ]);
    });

    it('lists by priority, then category, then newest', () => {
      expect(listAnalyzedTweets(PARENT_ID).map((t) => t.id)).toEqual(['2', '4', '3', '1']);
    });

    it('summarizes counts and high-priority items', () => {
      const summary = getAnalysisSummary(PARENT_ID);
      expect(summary.total).toBe(4);
      expect(summary.counts).toEqual({ praise: 1, bug_report: 1, question: 1, feature_request: 1 });
      expect(summary.high_priority.map((t) => t.author_username)).toEqual(['bob', 'dave', 'carol']);
    });

    it('limits the high-priority list', () => {
      expect(getAnalysisSummary(PARENT_ID, 1).high_priority).toHaveLength(1);
    });

    it('replaces an earlier analysis of the same tweet', () => {
      saveAnalysis([{ tweet_id: '1', category: 'joke', summary: 'Casual/joke response', priority: 0 }]);
      expect(getAnalysisSummary(PARENT_ID).counts.joke).toBe(1);
      expect(getAnalysisSummary(PARENT_ID).counts.praise).toBeUndefined();
    });
  });
});
