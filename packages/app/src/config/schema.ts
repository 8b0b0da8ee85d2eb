/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { Interval, Period } from '@marketlens/contracts';
import { YAHOO_BASE_URL, DEFAULT_TIMEOUT_MS } from '@marketlens/provider-yahoo';
import { DEFAULT_TTL_MS } from '@marketlens/series-cache';

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  provider: z
    .object({
      baseUrl: z.string().url().default(YAHOO_BASE_URL),
      timeout: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    })
    .default({}),

  cache: z
    .object({
      ttlMs: z.number().int().positive().default(DEFAULT_TTL_MS),
      maxEntries: z.number().int().positive().default(500),
    })
    .default({}),

  analysis: z
    .object({
      defaultSymbol: z.string().min(1).default('SPY'),
      defaultPeriod: z.nativeEnum(Period).default(Period.MO6),
      defaultInterval: z.nativeEnum(Interval).default(Interval.D1),
      screenConcurrency: z.number().int().positive().default(4),
      failureMode: z.enum(['degrade', 'throw']).default('degrade'),
      macdNormalizeStrength: z.boolean().default(true),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  YAHOO_BASE_URL: 'provider.baseUrl',
  PROVIDER_TIMEOUT_MS: 'provider.timeout',
  CACHE_TTL_MS: 'cache.ttlMs',
  CACHE_MAX_ENTRIES: 'cache.maxEntries',
  DEFAULT_SYMBOL: 'analysis.defaultSymbol',
  DEFAULT_PERIOD: 'analysis.defaultPeriod',
  DEFAULT_INTERVAL: 'analysis.defaultInterval',
  SCREEN_CONCURRENCY: 'analysis.screenConcurrency',
  INDICATOR_FAILURE_MODE: 'analysis.failureMode',
  MACD_NORMALIZE_STRENGTH: 'analysis.macdNormalizeStrength',
};
