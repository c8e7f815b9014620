#!/usr/bin/env node
import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from './config.js';
import { getDb } from './db/index.js';
import { createLogger } from './logger.js';

import { fetchFeedbackSchema, fetchFeedback } from './tools/fetch-feedback.js';
import { analyzeFeedbackSchema, analyzeFeedback } from './tools/analyze-feedback.js';
import { getFetchStateSchema, getFetchState } from './tools/get-fetch-state.js';

const log = createLogger();

function toolResult(data: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(data, null, 2) }] };
}

function toolError(err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  return { isError: true, content: [{ type: 'text' as const, text: message }] };
}

async function main() {
  // Validate env vars and open the store early
  loadConfig();
  getDb();

  const server = new McpServer({
    name: 'tweet-feedback',
    version: '1.0.0',
  });

  server.tool(
    'fetch_feedback',
    'Fetch new replies and quotes of a post into the local store. Resumes from stored watermarks; set backfill to walk further into the past.',
    fetchFeedbackSchema,
    async (params) => {
      try {
        return toolResult(await fetchFeedback(params));
      } catch (err) {
        return toolError(err);
      }
    },
  );

  server.tool(
    'analyze_feedback',
    'Categorize stored replies and quotes of a post (feature requests, questions, bug reports, ...) and summarize them. Zero API cost.',
    analyzeFeedbackSchema,
    async (params) => {
      try {
        return toolResult(await analyzeFeedback(params));
      } catch (err) {
        return toolError(err);
      }
    },
  );

  server.tool(
    'get_fetch_state',
    'Show the stored newest/oldest watermarks and tweet counts for a post.',
    getFetchStateSchema,
    async (params) => {
      try {
        return toolResult(await getFetchState(params));
      } catch (err) {
        return toolError(err);
      }
    },
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('MCP server started');
}

main().catch((err) => {
  console.error('[tweet-feedback] Fatal error:', err);
  process.exit(1);
});
