#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'util';

import { buildAnalysisReport, analyzeFeedback } from '../analysis/analyze.js';
import { errorMessage } from '../errors.js';
import { parsePostReference } from '../parsers/reference.js';
import { isEntrypoint } from './entry.js';

const USAGE = 'Usage: tweet-feedback-analyze <tweet_url_or_id> [--show-all]';

export function runAnalyzeCli(args: string[]): number {
  try {
    const { values, positionals } = parseArgs({
      args,
      options: { 'show-all': { type: 'boolean', default: false } },
      allowPositionals: true,
    });

    if (!positionals[0]) {
      process.stderr.write(`${USAGE}\n`);
      return 1;
    }

    const postId = parsePostReference(positionals[0]);
    const analyzed = analyzeFeedback(postId);
    const { text } = buildAnalysisReport(postId, values['show-all'] === true);

    process.stdout.write(`Analyzed ${analyzed} new tweets for ${postId}\n${text}\n`);
    return 0;
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    return 1;
  }
}

if (isEntrypoint(import.meta.url)) {
  process.exitCode = runAnalyzeCli(process.argv.slice(2));
}
