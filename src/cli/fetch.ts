#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'util';

import { loadConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { type FetchDeps, createFetchDeps, runFetch } from '../fetch/orchestrator.js';
import { parsePostReference } from '../parsers/reference.js';
import type { FetchReport, PassResult } from '../types.js';
import { isEntrypoint } from './entry.js';

const USAGE = 'Usage: tweet-feedback-fetch <tweet_url_or_id> [--backfill]';

function describePass(pass: PassResult): string {
  const label = pass.relation === 'reply' ? 'replies' : 'quotes';
  if (pass.skip_reason === 'no_backfill_boundary') {
    return `  ${label}: nothing stored yet, no backfill boundary (no-op)`;
  }
  const noop = pass.status === 'noop' ? ' (no-op)' : '';
  const watermark = pass.watermark.current ? `, ${pass.watermark.direction} watermark ${pass.watermark.current}` : '';
  return `  ${label}: ${pass.tweets_fetched} fetched, ${pass.tweets_inserted} new over ${pass.pages_fetched} page(s)${watermark}${noop}`;
}

export function formatFetchReport(report: FetchReport): string {
  const lines = [`Feedback for tweet ${report.post_id} (${report.mode})`];
  for (const pass of report.passes) lines.push(describePass(pass));
  for (const failure of report.errors) {
    lines.push(`  FAILED ${failure.relation} [${failure.code}]: ${failure.message}`);
  }
  lines.push(
    `Done! Saved ${report.replies_fetched} replies + ${report.quotes_fetched} quotes ` +
      `(${report.replies_inserted + report.quotes_inserted} new)`,
  );
  return lines.join('\n');
}

/**
 * Run the fetch command and return the process exit code.
 */
export async function runFetchCli(
  args: string[],
  makeDeps: () => FetchDeps = () => createFetchDeps(loadConfig()),
): Promise<number> {
  let reference: string | undefined;
  let backfill: boolean;
  try {
    const { values, positionals } = parseArgs({
      args,
      options: { backfill: { type: 'boolean', default: false } },
      allowPositionals: true,
    });
    reference = positionals[0];
    backfill = values.backfill === true;
  } catch (err) {
    process.stderr.write(`${errorMessage(err)}\n${USAGE}\n`);
    return 1;
  }

  if (!reference) {
    process.stderr.write(`${USAGE}\n`);
    return 1;
  }

  try {
    // Reject a bad reference before a missing token gets reported.
    parsePostReference(reference);
    const report = await runFetch(reference, backfill ? 'backfill' : 'forward', makeDeps());
    process.stdout.write(`${formatFetchReport(report)}\n`);
    return report.ok ? 0 : 1;
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    return 1;
  }
}

if (isEntrypoint(import.meta.url)) {
  runFetchCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      process.stderr.write(`fetch failed: ${errorMessage(err)}\n`);
      process.exit(1);
    });
}
