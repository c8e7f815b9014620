import { getAnalysisSummary, iterateTweetsForAnalysis, listAnalyzedTweets, saveAnalysis } from '../db/index.js';
import { createLogger } from '../logger.js';
import { CATEGORY_VALUES } from '../types.js';
import type { AnalysisResult, AnalysisSummary, AnalyzedTweet } from '../types.js';
import { categorizeText } from './categorizer.js';

const log = createLogger('analyze');

/**
 * Categorize every stored reply and quote of a post that has no analysis yet.
 * Returns how many were analyzed.
 */
export function analyzeFeedback(parentTweetId: string): number {
  // Drain the lazy query before writing; the connection is busy while it runs.
  const pending = Array.from(iterateTweetsForAnalysis(parentTweetId, { unanalyzedOnly: true }));
  if (pending.length === 0) {
    log.info(`No new tweets to analyze for ${parentTweetId}`);
    return 0;
  }

  const results: AnalysisResult[] = pending.map((tweet) => ({
    tweet_id: tweet.id,
    ...categorizeText(tweet.text),
  }));

  const saved = saveAnalysis(results);
  log.info(`Analyzed ${saved} new tweets for ${parentTweetId}`);
  return saved;
}

function clip(text: string, max: number): string {
  const chars = Array.from(text.replace(/\n/g, ' '));
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : chars.join('');
}

const RULE = '='.repeat(60);
const THIN_RULE = '-'.repeat(60);

/**
 * Plain-text report: counts per category, the high-priority items, and
 * optionally up to ten items of every category.
 */
export function formatSummary(
  summary: AnalysisSummary,
  options: { showAll?: boolean; analyzed?: AnalyzedTweet[] } = {},
): string {
  if (summary.total === 0) return 'No analyzed tweets found.';

  const lines: string[] = ['', RULE, 'FEEDBACK ANALYSIS SUMMARY', RULE];
  for (const category of CATEGORY_VALUES) {
    const count = summary.counts[category];
    if (count) lines.push(`  ${category.padEnd(18)} ${String(count).padStart(4)} tweets`);
  }
  lines.push(RULE);

  if (summary.high_priority.length > 0) {
    lines.push('', 'HIGH PRIORITY ITEMS:', THIN_RULE);
    for (const item of summary.high_priority) {
      lines.push(`[@${item.author_username}] (${item.category})`, `  ${clip(item.text, 100)}`, '');
    }
  }

  if (options.showAll && options.analyzed) {
    lines.push('', 'ALL CATEGORIZED TWEETS:', THIN_RULE);
    for (const category of CATEGORY_VALUES) {
      const items = options.analyzed.filter((item) => item.category === category);
      if (items.length === 0) continue;
      lines.push('', `### ${category.toUpperCase()} (${items.length} tweets) ###`, '');
      for (const item of items.slice(0, 10)) {
        lines.push(`  @${item.author_username}: ${clip(item.text, 80)}`);
      }
    }
  }

  return lines.join('\n');
}

export function buildAnalysisReport(parentTweetId: string, showAll = false): { summary: AnalysisSummary; text: string } {
  const summary = getAnalysisSummary(parentTweetId);
  const analyzed = showAll ? listAnalyzedTweets(parentTweetId) : undefined;
  return { summary, text: formatSummary(summary, { showAll, analyzed }) };
}
