/**
 * threatreg — Configuration
 *
 * Reads THREATREG_* environment variables through a Zod schema.
 */

import { z } from 'zod';
import { ConfigError } from './types/errors.js';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';

export interface AppConfig {
  /** SQLite database file (":memory:" is accepted) */
  dbPath: string;
  logLevel: LogLevel;
}

const EnvSchema = z.object({
  THREATREG_DB_PATH: z.string().min(1).default('threatreg.db'),
  THREATREG_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/**
 * Build the application config from an environment map.
 *
 * @throws ConfigError naming the first offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse({
    THREATREG_DB_PATH: env['THREATREG_DB_PATH'],
    THREATREG_LOG_LEVEL: env['THREATREG_LOG_LEVEL'],
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue !== undefined ? String(issue.path[0]) : 'environment';
    throw new ConfigError(variable, issue?.message ?? result.error.message);
  }

  return {
    dbPath: result.data.THREATREG_DB_PATH,
    logLevel: result.data.THREATREG_LOG_LEVEL,
  };
}
