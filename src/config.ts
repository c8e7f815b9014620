import { z } from 'zod';

// Blank lines in a copied .env.example count as unset.
const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional(),
);

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']).default('info');

const configSchema = z.object({
  X_API_BEARER_TOKEN: optionalString,
  TWEET_FEEDBACK_DB_PATH: optionalString,
  LOG_LEVEL: logLevelSchema,
  FETCH_PAGE_SIZE: z.coerce.number().int().min(10).max(100).default(100),
  FETCH_MAX_PAGES: z.coerce.number().int().min(1).default(50),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  FETCH_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  FETCH_PAGE_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  FETCH_RATE_LIMIT_MAX_WAIT_MS: z.coerce.number().int().min(0).default(120_000),
});

export type Config = z.infer<typeof configSchema>;

let _config: Config | null = null;

export function loadConfig(): Config {
  if (_config) return _config;

  const result = configSchema.safeParse(process.env);
  if (!result.success) {
    const missing = result.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Missing or invalid environment variables:\n${missing}`);
  }

  _config = result.data;
  return _config;
}
