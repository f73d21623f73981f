/**
 * Environment configuration for the status monitor
 * Loads and validates environment variables, applying defaults
 */

import { z } from 'zod';

export interface EnvironmentConfig {
  feed: {
    url: string;
    timeoutMs: number;
    retries: number;
    userAgent: string;
  };
  monitor: {
    intervalSeconds: number;
    includeHistory: boolean;
  };
  incidentLog: {
    file: string;
  };
  webhook: {
    port: number;
    secret?: string;
  };
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
  };
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  STATUS_FEED_URL: z.string().url().default('https://status.openai.com/history.rss'),
  FEED_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  FEED_RETRIES: z.coerce.number().int().min(0).default(3),
  FEED_USER_AGENT: z.string().min(1).default('status-feed-monitor/1.0'),
  POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(30),
  INCLUDE_HISTORY: booleanFlag,
  INCIDENT_LOG_FILE: z.string().min(1).default('logs/openai_status_log.json'),
  WEBHOOK_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  WEBHOOK_SECRET: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

/**
 * Load and validate environment configuration
 * @throws Error if any variable is set to an invalid value
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  // Empty strings count as unset so that `FOO=` in a .env file falls back to the default
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join(', ')}`);
  }

  const vars = parsed.data;
  return {
    feed: {
      url: vars.STATUS_FEED_URL,
      timeoutMs: vars.FEED_TIMEOUT_MS,
      retries: vars.FEED_RETRIES,
      userAgent: vars.FEED_USER_AGENT
    },
    monitor: {
      intervalSeconds: vars.POLL_INTERVAL_SECONDS,
      includeHistory: vars.INCLUDE_HISTORY
    },
    incidentLog: {
      file: vars.INCIDENT_LOG_FILE
    },
    webhook: {
      port: vars.WEBHOOK_PORT,
      secret: vars.WEBHOOK_SECRET
    },
    logging: {
      level: vars.LOG_LEVEL
    }
  };
}
