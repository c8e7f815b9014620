import { z } from 'zod';

import { logLevelSchema } from './config.js';

type LogLevel = z.infer<typeof logLevelSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

// An unreadable LOG_LEVEL falls back to info; loadConfig() reports it separately.
function thresholdFromEnv(): LogLevel {
  const parsed = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}

/**
 * Logs to stderr so stdout stays reserved for the MCP transport and CLI reports.
 */
export function createLogger(scope?: string): Logger {
  const prefix = scope ? `[tweet-feedback:${scope}]` : '[tweet-feedback]';
  const threshold = LEVEL_ORDER[thresholdFromEnv()];

  const write = (level: LogLevel) => (message: string, ...details: unknown[]) => {
    if (LEVEL_ORDER[level] < threshold) return;
    console.error(`${prefix} ${message}`, ...details);
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}
