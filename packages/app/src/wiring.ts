/**
 * Builds the provider, strategies and analysis service from configuration.
 */

import type { MarketDataProvider } from '@marketlens/contracts';
import type { Logger } from '@marketlens/logger';
import { YahooProvider } from '@marketlens/provider-yahoo';
import { CachedSeriesProvider } from '@marketlens/series-cache';
import { createDefaultStrategies } from '@marketlens/strategy';
import type { Config } from './config/index.js';
import { AnalysisService } from './services/analysis-service.js';

export interface Services {
  provider: CachedSeriesProvider;
  analysis: AnalysisService;
}

export interface BuildServicesOverrides {
  /** Replaces the Yahoo provider behind the cache */
  upstream?: MarketDataProvider;
}

export function buildServices(
  config: Config,
  logger: Logger,
  overrides: BuildServicesOverrides = {}
): Services {
  const upstream =
    overrides.upstream ??
    new YahooProvider({
      baseUrl: config.provider.baseUrl,
      timeout: config.provider.timeout,
      logger,
    });

  const provider = new CachedSeriesProvider(upstream, {
    ttlMs: config.cache.ttlMs,
    maxEntries: config.cache.maxEntries,
    logger,
  });

  const strategies = createDefaultStrategies({
    macd: { normalizeStrength: config.analysis.macdNormalizeStrength },
  });

  const analysis = new AnalysisService({
    provider,
    strategies,
    logger,
    failureMode: config.analysis.failureMode,
    screenConcurrency: config.analysis.screenConcurrency,
  });

  logger.debug('Services wired', {
    provider: provider.id,
    strategies: strategies.map((s) => s.name),
  });

  return { provider, analysis };
}
