import { z } from 'zod';

import { XApiRequestError } from '../errors.js';
import type { FeedbackTweet, Relation, TweetMetrics, TweetPage } from '../types.js';

// The SDK hands back camelCase keys, the raw v2 payload uses snake_case. Accept both.

const publicMetricsSchema = z.object({
  likeCount: z.number().optional(),
  like_count: z.number().optional(),
  retweetCount: z.number().optional(),
  retweet_count: z.number().optional(),
  replyCount: z.number().optional(),
  reply_count: z.number().optional(),
  quoteCount: z.number().optional(),
  quote_count: z.number().optional(),
});

const rawTweetSchema = z.object({
  id: z.string().regex(/^\d+$/, 'tweet id must be numeric'),
  text: z.string().optional(),
  authorId: z.string().optional(),
  author_id: z.string().optional(),
  createdAt: z.string().optional(),
  created_at: z.string().optional(),
  publicMetrics: publicMetricsSchema.optional(),
  public_metrics: publicMetricsSchema.optional(),
});

const rawUserSchema = z.object({
  id: z.string(),
  username: z.string(),
});

const searchResponseSchema = z.object({
  data: z.array(rawTweetSchema).optional(),
  includes: z
    .object({
      users: z.array(rawUserSchema).optional(),
    })
    .optional(),
  meta: z
    .object({
      nextToken: z.string().optional(),
      next_token: z.string().optional(),
      resultCount: z.number().optional(),
      result_count: z.number().optional(),
    })
    .optional(),
});

export type RawTweet = z.infer<typeof rawTweetSchema>;

function normalizeMetrics(pm: z.infer<typeof publicMetricsSchema> | undefined): TweetMetrics {
  return {
    likes: pm?.likeCount ?? pm?.like_count ?? 0,
    retweets: pm?.retweetCount ?? pm?.retweet_count ?? 0,
    replies: pm?.replyCount ?? pm?.reply_count ?? 0,
    quotes: pm?.quoteCount ?? pm?.quote_count ?? 0,
  };
}

/**
 * Normalize one v2 tweet into a stored feedback row for the given parent post.
 */
export function normalizeFeedbackTweet(
  tweet: RawTweet,
  usernames: Map<string, string>,
  parentTweetId: string,
  relation: Relation,
): FeedbackTweet {
  const authorId = tweet.authorId ?? tweet.author_id ?? null;
  return {
    id: tweet.id,
    parent_tweet_id: parentTweetId,
    relation,
    author_id: authorId,
    author_username: (authorId && usernames.get(authorId)) || 'unknown',
    text: tweet.text ?? '',
    created_at: tweet.createdAt ?? tweet.created_at ?? null,
    metrics: normalizeMetrics(tweet.publicMetrics ?? tweet.public_metrics),
  };
}

/**
 * Validate a recent-search payload and turn it into a typed page.
 * A page without `data` is an empty, final page.
 */
export function parseSearchPage(payload: unknown, parentTweetId: string, relation: Relation): TweetPage {
  const parsed = searchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new XApiRequestError(`Unexpected X API search response: ${issues}`);
  }

  const usernames = new Map<string, string>();
  for (const user of parsed.data.includes?.users ?? []) {
    usernames.set(user.id, user.username);
  }

  const data = (parsed.data.data ?? []).map(t => normalizeFeedbackTweet(t, usernames, parentTweetId, relation));
  const nextToken = parsed.data.meta?.nextToken ?? parsed.data.meta?.next_token;

  return {
    data,
    cursor: nextToken,
    has_more: !!nextToken,
  };
}
