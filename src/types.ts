export const RELATIONS = ['reply', 'quote'] as const;

export type Relation = (typeof RELATIONS)[number];

export const DIRECTIONS = ['newest', 'oldest'] as const;

export type Direction = (typeof DIRECTIONS)[number];

export type FetchMode = 'forward' | 'backfill';

export interface TweetMetrics {
  likes: number;
  retweets: number;
  replies: number;
  quotes: number;
}

export interface FeedbackTweet {
  id: string;
  parent_tweet_id: string;
  relation: Relation;
  author_id: string | null;
  author_username: string;
  text: string;
  created_at: string | null;
  metrics: TweetMetrics;
}

export interface StoredTweet extends FeedbackTweet {
  fetched_at: string;
}

export interface PaginatedResponse<T> {
  data: T[];
  cursor?: string;
  has_more: boolean;
}

export type TweetPage = PaginatedResponse<FeedbackTweet>;

/** Exclusive id bounds for one page request. */
export interface PageBounds {
  since_id?: string;
  until_id?: string;
}

export interface PageRequest {
  parent_tweet_id: string;
  relation: Relation;
  bounds: PageBounds;
  cursor?: string;
  max_results: number;
}

/**
 * Anything that can serve one page of replies or quotes. The X API client
 * implements it; tests substitute an in-memory source.
 */
export interface TweetSource {
  fetchPage(request: PageRequest): Promise<TweetPage>;
}

export interface WatermarkPair {
  newest: string | null;
  oldest: string | null;
}

export interface UpsertResult {
  written: number;
  inserted: number;
}

export interface PassResult {
  parent_tweet_id: string;
  relation: Relation;
  mode: FetchMode;
  status: 'completed' | 'noop';
  skip_reason?: 'no_backfill_boundary';
  pages_fetched: number;
  tweets_fetched: number;
  tweets_inserted: number;
  watermark: {
    direction: Direction;
    previous: string | null;
    current: string | null;
  };
}

export interface PassFailure {
  relation: Relation;
  code: string;
  message: string;
  pages_fetched: number;
  tweets_fetched: number;
  tweets_inserted: number;
}

export interface FetchReport {
  post_id: string;
  mode: FetchMode;
  replies_fetched: number;
  quotes_fetched: number;
  replies_inserted: number;
  quotes_inserted: number;
  passes: PassResult[];
  errors: PassFailure[];
  ok: boolean;
}

export interface FetchStateEntry {
  relation: Relation;
  newest: string | null;
  oldest: string | null;
  stored_tweets: number;
  updated_at: string | null;
}

export const CATEGORY_VALUES = [
  'feature_request',
  'question',
  'bug_report',
  'criticism',
  'praise',
  'joke',
  'spam',
  'other',
] as const;

export type Category = (typeof CATEGORY_VALUES)[number];

export type Priority = 0 | 1 | 2;

export interface AnalysisResult {
  tweet_id: string;
  category: Category;
  summary: string;
  priority: Priority;
}

export interface AnalyzedTweet {
  id: string;
  author_username: string;
  text: string;
  relation: Relation;
  category: Category;
  summary: string;
  priority: Priority;
}

export interface AnalysisSummary {
  parent_tweet_id: string;
  total: number;
  counts: Partial<Record<Category, number>>;
  high_priority: AnalyzedTweet[];
}
