import type Database from 'better-sqlite3';

import { CATEGORY_VALUES, DIRECTIONS, RELATIONS } from '../types.js';

function sqlList(values: readonly string[]): string {
  return values.map((value) => `'${value}'`).join(', ');
}

/**
 * Create all tables and indexes if they don't exist.
 * Safe to call multiple times.
 */
export function ensureSchema(db: Database.Database): void {
  db.exec(`
    -- Replies and quotes of a parent post
    CREATE TABLE IF NOT EXISTS tweets (
      id TEXT PRIMARY KEY,
      parent_tweet_id TEXT NOT NULL,
      relation TEXT NOT NULL CHECK (relation IN (${sqlList(RELATIONS)})),
      author_id TEXT,
      author_username TEXT NOT NULL DEFAULT 'unknown',
      text TEXT NOT NULL DEFAULT '',
      created_at TEXT,
      like_count INTEGER NOT NULL DEFAULT 0,
      retweet_count INTEGER NOT NULL DEFAULT 0,
      reply_count INTEGER NOT NULL DEFAULT 0,
      quote_count INTEGER NOT NULL DEFAULT 0,
      raw_json TEXT NOT NULL,
      fetched_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    -- Categorization, at most one row per tweet
    CREATE TABLE IF NOT EXISTS analysis (
      tweet_id TEXT PRIMARY KEY REFERENCES tweets(id) ON DELETE CASCADE,
      category TEXT NOT NULL CHECK (category IN (${sqlList(CATEGORY_VALUES)})),
      summary TEXT NOT NULL DEFAULT '',
      priority INTEGER NOT NULL DEFAULT 0 CHECK (priority BETWEEN 0 AND 2),
      analyzed_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    -- Fetch watermarks: newest/oldest id per parent post and relation
    CREATE TABLE IF NOT EXISTS ingestion_state (
      parent_tweet_id TEXT NOT NULL,
      relation TEXT NOT NULL CHECK (relation IN (${sqlList(RELATIONS)})),
      direction TEXT NOT NULL CHECK (direction IN (${sqlList(DIRECTIONS)})),
      last_id TEXT,
      updated_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (parent_tweet_id, relation, direction)
    );

    CREATE INDEX IF NOT EXISTS idx_tweets_parent_relation ON tweets(parent_tweet_id, relation);
    CREATE INDEX IF NOT EXISTS idx_analysis_category ON analysis(category);
  `);
}
