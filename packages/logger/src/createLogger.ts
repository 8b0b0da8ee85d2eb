/**
 * @fileoverview Logger factory for MarketLens.
 * Creates winston loggers with secret redaction, standard fields and either
 * JSON or pretty console output.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Analysis complete', { symbol: 'AAPL', duration_ms: 182 });
 * ```
 *
 * @example
 * ```typescript
 * // Component logger with file output
 * const logger = createLogger({ level: 'debug', filePath: './logs/marketlens.log' });
 * const providerLogger = logger.child({ component: 'provider', provider: 'yahoo' });
 * providerLogger.debug('Fetching series', { symbol: 'MSFT', period: '6mo', interval: '1d' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
    silent = false,
  } = config;

  // Order matters: redaction must see raw fields before anything renders them
  const logFormat = format.combine(redactSecrets(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        stderrLevels: stderr ? ['error', 'warn', 'info', 'debug'] : [],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // No ANSI colour codes in files
        format: format.uncolorize(),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    // Fatal errors are handled in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger that stamps `context` onto every entry.
 *
 * @example
 * ```typescript
 * const strategyLogger = createChildLogger(logger, { component: 'strategy', strategy: 'MACD' });
 * strategyLogger.warn('Indicator columns missing, returning neutral signal');
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * A logger that discards everything, for callers that were not handed one.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'error', console: false, silent: true });
}
