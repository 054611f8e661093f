/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every process-level setting (port, environment, log level) is read here and
 * nowhere else. dotenv loads .env into process.env, then a Zod schema validates
 * and coerces the values at startup. An invalid environment stops the process
 * before the HTTP server binds.
 *
 * Note what is NOT in here: per-variant options such as a rideshare apiKey.
 * Those travel in the config bundle passed to TransportFactory.create(), so
 * every dependency a vehicle needs is visible at the call site.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  /** Defaults to "silent" under test and "info" everywhere else. */
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',

  log: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'silent' : 'info'),
  },
} as const;

export type AppConfig = typeof config;
