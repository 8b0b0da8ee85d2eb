/**
 * Configuration loading and management
 */

import type { Logger } from '@marketlens/logger';
import { configSchema, envMapping } from './schema.js';
import type { Config } from './schema.js';

type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  /** @default process.env */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Load configuration from environment and defaults
 *
 * @throws {Error} listing every invalid path when validation fails
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { env = process.env, logger } = options;
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  logger?.debug('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
export function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
    provider: {
      baseUrl: config.provider.baseUrl,
      timeout: config.provider.timeout,
    },
    cache: {
      ttlMs: config.cache.ttlMs,
      maxEntries: config.cache.maxEntries,
    },
    analysis: {
      defaults: `${config.analysis.defaultSymbol} ${config.analysis.defaultPeriod}/${config.analysis.defaultInterval}`,
      screenConcurrency: config.analysis.screenConcurrency,
      failureMode: config.analysis.failureMode,
    },
  };
}

export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
