/**
 * @fileoverview Public API exports for @marketlens/logger
 * Structured logging and process error handling for MarketLens
 */

export { createLogger, createChildLogger, createSilentLogger } from './createLogger.js';

export { attachGlobalHandlers, gracefulExit } from './errorHandler.js';

export { getRequestContext, withRequestContext } from './request-context.js';

export { startTimer, measureSync, measureAsync } from './perf-timer.js';

export { REDACTED, isSecretFieldName, redactValue, renderLine } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
