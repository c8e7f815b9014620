import { z } from 'zod';

import { analyzeFeedback as categorizeStored } from '../analysis/analyze.js';
import { getAnalysisSummary, listAnalyzedTweets } from '../db/index.js';
import { parsePostReference } from '../parsers/reference.js';

export const analyzeFeedbackSchema = {
  post: z.string().min(1).describe('Post URL or bare numeric post ID whose stored replies/quotes to categorize.'),
  show_all: z.boolean().default(false).describe('Include every categorized tweet, not just the summary.'),
};

export async function analyzeFeedback(params: { post: string; show_all: boolean }) {
  const postId = parsePostReference(params.post);
  const newlyAnalyzed = categorizeStored(postId);
  const summary = getAnalysisSummary(postId);

  return {
    post_id: postId,
    newly_analyzed: newlyAnalyzed,
    ...summary,
    ...(params.show_all ? { tweets: listAnalyzedTweets(postId) } : {}),
  };
}
