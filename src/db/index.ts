import { mkdirSync } from 'fs';
import Database from 'better-sqlite3';
import { homedir } from 'os';
import { dirname, join } from 'path';

import { loadConfig } from '../config.js';
import type {
  AnalysisResult,
  AnalysisSummary,
  AnalyzedTweet,
  Category,
  Direction,
  FeedbackTweet,
  FetchStateEntry,
  Priority,
  Relation,
  StoredTweet,
  UpsertResult,
} from '../types.js';
import { CATEGORY_VALUES, RELATIONS } from '../types.js';
import { ensureSchema } from './schema.js';

let _db: Database.Database | null = null;

type TweetRow = {
  id: string;
  parent_tweet_id: string;
  relation: string;
  author_id: string | null;
  author_username: string;
  text: string;
  created_at: string | null;
  like_count: number;
  retweet_count: number;
  reply_count: number;
  quote_count: number;
  fetched_at: string;
};

type AnalyzedRow = {
  id: string;
  author_username: string;
  text: string;
  relation: string;
  category: string;
  summary: string;
  priority: number;
};

type WatermarkRow = {
  relation: string;
  direction: string;
  last_id: string | null;
  updated_at: string;
};

export function getDb(): Database.Database {
  if (_db) return _db;

  const config = loadConfig();
  const dbPath = config.TWEET_FEEDBACK_DB_PATH ?? join(homedir(), '.tweet-feedback', 'feedback.db');
  mkdirSync(dirname(dbPath), { recursive: true });

  _db = new Database(dbPath);
  _db.pragma('journal_mode = WAL');
  _db.pragma('foreign_keys = ON');
  _db.pragma('busy_timeout = 5000');
  ensureSchema(_db);

  return _db;
}

export function setDb(db: Database.Database): void {
  _db = db;
}

export function resetDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

function parseRelation(value: string): Relation {
  const relation = RELATIONS.find((r) => r === value);
  if (!relation) throw new Error(`Unknown relation in store: ${value}`);
  return relation;
}

function parseCategory(value: string): Category {
  return CATEGORY_VALUES.find((c) => c === value) ?? 'other';
}

function toPriority(value: number): Priority {
  if (value >= 2) return 2;
  if (value >= 1) return 1;
  return 0;
}

function rowToTweet(row: TweetRow): StoredTweet {
  return {
    id: row.id,
    parent_tweet_id: row.parent_tweet_id,
    relation: parseRelation(row.relation),
    author_id: row.author_id,
    author_username: row.author_username,
    text: row.text,
    created_at: row.created_at,
    metrics: {
      likes: row.like_count,
      retweets: row.retweet_count,
      replies: row.reply_count,
      quotes: row.quote_count,
    },
    fetched_at: row.fetched_at,
  };
}

function rowToAnalyzed(row: AnalyzedRow): AnalyzedTweet {
  return {
    id: row.id,
    author_username: row.author_username,
    text: row.text,
    relation: parseRelation(row.relation),
    category: parseCategory(row.category),
    summary: row.summary,
    priority: toPriority(row.priority),
  };
}

// --- Tweets ---

// Parent and relation keep their first recorded values; everything else is refreshed.
const UPSERT_TWEET_SQL = `
  INSERT INTO tweets (
    id, parent_tweet_id, relation, author_id, author_username, text, created_at,
    like_count, retweet_count, reply_count, quote_count, raw_json, fetched_at
  ) VALUES (
    @id, @parent_tweet_id, @relation, @author_id, @author_username, @text, @created_at,
    @like_count, @retweet_count, @reply_count, @quote_count, @raw_json, datetime('now')
  )
  ON CONFLICT (id) DO UPDATE SET
    author_id = excluded.author_id,
    author_username = excluded.author_username,
    text = excluded.text,
    created_at = COALESCE(excluded.created_at, tweets.created_at),
    like_count = excluded.like_count,
    retweet_count = excluded.retweet_count,
    reply_count = excluded.reply_count,
    quote_count = excluded.quote_count,
    raw_json = excluded.raw_json,
    fetched_at = datetime('now')
`;

/**
 * Insert-or-replace a batch keyed by tweet id, in one transaction.
 * `inserted` counts only ids the store had not seen before.
 */
export function upsertTweets(tweets: FeedbackTweet[]): UpsertResult {
  const db = getDb();
  const existsStmt = db.prepare<[string], { id: string }>('SELECT id FROM tweets WHERE id = ?');
  const upsertStmt = db.prepare(UPSERT_TWEET_SQL);

  const tx = db.transaction((batch: FeedbackTweet[]): UpsertResult => {
    const seen = new Set<string>();
    let inserted = 0;

    for (const tweet of batch) {
      if (!seen.has(tweet.id) && !existsStmt.get(tweet.id)) inserted++;
      seen.add(tweet.id);

      upsertStmt.run({
        id: tweet.id,
        parent_tweet_id: tweet.parent_tweet_id,
        relation: tweet.relation,
        author_id: tweet.author_id,
        author_username: tweet.author_username,
        text: tweet.text,
        created_at: tweet.created_at,
        like_count: tweet.metrics.likes,
        retweet_count: tweet.metrics.retweets,
        reply_count: tweet.metrics.replies,
        quote_count: tweet.metrics.quotes,
        raw_json: JSON.stringify(tweet),
      });
    }

    return { written: batch.length, inserted };
  });

  return tx(tweets);
}

export function getTweetById(id: string): StoredTweet | null {
  const db = getDb();
  const row = db.prepare<[string], TweetRow>('SELECT * FROM tweets WHERE id = ?').get(id);
  return row ? rowToTweet(row) : null;
}

export function countTweets(parentTweetId: string, relation?: Relation): number {
  const db = getDb();
  const row = relation
    ? db
        .prepare<[string, string], { c: number }>(
          'SELECT COUNT(*) as c FROM tweets WHERE parent_tweet_id = ? AND relation = ?',
        )
        .get(parentTweetId, relation)
    : db
        .prepare<[string], { c: number }>('SELECT COUNT(*) as c FROM tweets WHERE parent_tweet_id = ?')
        .get(parentTweetId);
  return row?.c ?? 0;
}

export function getOldestStoredTweetId(parentTweetId: string, relation: Relation): string | null {
  const db = getDb();
  const row = db
    .prepare<[string, string], { id: string }>(
      `SELECT id FROM tweets
       WHERE parent_tweet_id = ? AND relation = ?
       ORDER BY CAST(id AS INTEGER) ASC
       LIMIT 1`,
    )
    .get(parentTweetId, relation);
  return row?.id ?? null;
}

/**
 * Lazily walk a parent's tweets, newest first. Every call runs a fresh query.
 * The connection stays busy until the generator finishes, so collect before writing.
 */
export function* iterateTweetsForAnalysis(
  parentTweetId: string,
  options: { unanalyzedOnly?: boolean } = {},
): Generator<StoredTweet, void, undefined> {
  const db = getDb();
  const sql = options.unanalyzedOnly
    ? `SELECT t.* FROM tweets t
       LEFT JOIN analysis a ON a.tweet_id = t.id
       WHERE t.parent_tweet_id = ? AND a.tweet_id IS NULL
       ORDER BY CAST(t.id AS INTEGER) DESC`
    : `SELECT * FROM tweets
       WHERE parent_tweet_id = ?
       ORDER BY CAST(id AS INTEGER) DESC`;

  for (const row of db.prepare<[string], TweetRow>(sql).iterate(parentTweetId)) {
    yield rowToTweet(row);
  }
}

// --- Watermarks ---

export function getWatermark(parentTweetId: string, relation: Relation, direction: Direction): string | null {
  const db = getDb();
  const row = db
    .prepare<[string, string, string], { last_id: string | null }>(
      `SELECT last_id FROM ingestion_state
       WHERE parent_tweet_id = ? AND relation = ? AND direction = ?`,
    )
    .get(parentTweetId, relation, direction);
  return row?.last_id ?? null;
}

export function setWatermark(parentTweetId: string, relation: Relation, direction: Direction, lastId: string): void {
  const db = getDb();
  db.prepare(
    `
    INSERT INTO ingestion_state (parent_tweet_id, relation, direction, last_id, updated_at)
    VALUES (?, ?, ?, ?, datetime('now'))
    ON CONFLICT (parent_tweet_id, relation, direction) DO UPDATE SET
      last_id = excluded.last_id,
      updated_at = datetime('now')
  `,
  ).run(parentTweetId, relation, direction, lastId);
}

/**
 * Create the (still empty) newest and oldest markers the first time a relation is fetched.
 */
export function ensureWatermarks(parentTweetId: string, relation: Relation): void {
  const db = getDb();
  const stmt = db.prepare(
    `INSERT OR IGNORE INTO ingestion_state (parent_tweet_id, relation, direction, last_id)
     VALUES (?, ?, ?, NULL)`,
  );
  const tx = db.transaction(() => {
    stmt.run(parentTweetId, relation, 'newest');
    stmt.run(parentTweetId, relation, 'oldest');
  });
  tx();
}

export function getFetchState(parentTweetId: string): FetchStateEntry[] {
  const db = getDb();
  const rows = db
    .prepare<[string], WatermarkRow>(
      'SELECT relation, direction, last_id, updated_at FROM ingestion_state WHERE parent_tweet_id = ?',
    )
    .all(parentTweetId);

  return RELATIONS.map((relation) => {
    const forRelation = rows.filter((r) => r.relation === relation);
    const updated = forRelation.map((r) => r.updated_at).sort();
    return {
      relation,
      newest: forRelation.find((r) => r.direction === 'newest')?.last_id ?? null,
      oldest: forRelation.find((r) => r.direction === 'oldest')?.last_id ?? null,
      stored_tweets: countTweets(parentTweetId, relation),
      updated_at: updated.length > 0 ? updated[updated.length - 1] : null,
    };
  });
}

// --- Analysis ---

export function saveAnalysis(results: AnalysisResult[]): number {
  const db = getDb();
  const stmt = db.prepare(`
    INSERT INTO analysis (tweet_id, category, summary, priority, analyzed_at)
    VALUES (@tweet_id, @category, @summary, @priority, datetime('now'))
    ON CONFLICT (tweet_id) DO UPDATE SET
      category = excluded.category,
      summary = excluded.summary,
      priority = excluded.priority,
      analyzed_at = datetime('now')
  `);

  const tx = db.transaction((batch: AnalysisResult[]) => {
    for (const result of batch) {
      stmt.run({ ...result });
    }
    return batch.length;
  });

  return tx(results);
}

export function listAnalyzedTweets(parentTweetId: string): AnalyzedTweet[] {
  const db = getDb();
  return db
    .prepare<[string], AnalyzedRow>(
      `SELECT t.id, t.author_username, t.text, t.relation, a.category, a.summary, a.priority
       FROM tweets t
       JOIN analysis a ON a.tweet_id = t.id
       WHERE t.parent_tweet_id = ?
       ORDER BY a.priority DESC, a.category, CAST(t.id AS INTEGER) DESC`,
    )
    .all(parentTweetId)
    .map(rowToAnalyzed);
}

export function getAnalysisSummary(parentTweetId: string, highPriorityLimit = 20): AnalysisSummary {
  const analyzed = listAnalyzedTweets(parentTweetId);
  const counts: Partial<Record<Category, number>> = {};
  for (const item of analyzed) {
    counts[item.category] = (counts[item.category] ?? 0) + 1;
  }

  return {
    parent_tweet_id: parentTweetId,
    total: analyzed.length,
    counts,
    high_priority: analyzed.filter((item) => item.priority >= 1).slice(0, highPriorityLimit),
  };
}
