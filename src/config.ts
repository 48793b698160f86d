// =============================================================================
// Configuration
// Built once from the environment and passed explicitly to the app
// =============================================================================

import { z } from 'zod';
import { ConfigError } from './errors';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const integerString = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: integerString(5000),
  RANDOM_SEED: z.coerce.number().int().optional(),
  BOND_BATCH_SIZE: integerString(20),
  STREAM_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  MARKET_DATA_API_KEY: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  environment: 'development' | 'production' | 'test';
  host: string;
  port: number;
  randomSeed?: number;
  bondBatchSize: number;
  streamIntervalMs: number;
  marketDataApiKey?: string;
  logLevel: LogLevel;
}

/**
 * Parse configuration from an environment map.
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const parsed = result.data;

  if (parsed.NODE_ENV === 'production' && !parsed.MARKET_DATA_API_KEY) {
    throw new ConfigError('MARKET_DATA_API_KEY is required in production', [
      'MARKET_DATA_API_KEY: Required',
    ]);
  }

  return {
    environment: parsed.NODE_ENV,
    host: parsed.HOST,
    port: parsed.PORT,
    randomSeed: parsed.RANDOM_SEED,
    bondBatchSize: parsed.BOND_BATCH_SIZE,
    streamIntervalMs: parsed.STREAM_INTERVAL_MS,
    marketDataApiKey: parsed.MARKET_DATA_API_KEY,
    logLevel: parsed.LOG_LEVEL,
  };
}
