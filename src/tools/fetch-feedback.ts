import { z } from 'zod';

import { loadConfig } from '../config.js';
import { type FetchDeps, createFetchDeps, runFetch } from '../fetch/orchestrator.js';
import type { FetchReport } from '../types.js';

export const fetchFeedbackSchema = {
  post: z.string().min(1).describe('Post URL (https://x.com/<user>/status/<id>) or bare numeric post ID.'),
  backfill: z.boolean().default(false).describe(
    'Fetch replies/quotes older than the oldest already stored instead of newer than the newest.',
  ),
};

export async function fetchFeedback(
  params: { post: string; backfill: boolean },
  makeDeps: () => FetchDeps = () => createFetchDeps(loadConfig()),
): Promise<FetchReport> {
  return runFetch(params.post, params.backfill ? 'backfill' : 'forward', makeDeps());
}
