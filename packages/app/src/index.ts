/**
 * Main exports for @marketlens/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, parseEnvValue, configSchema, envMapping } from './config/index.js';
export type { Config, LoadConfigOptions } from './config/index.js';

// Service exports
export { AnalysisService } from './services/analysis-service.js';
export type {
  AnalysisServiceOptions,
  AnalysisReport,
  AnalyzeOptions,
  ScreenOptions,
  ScreenResult,
} from './services/analysis-service.js';

export { buildServices } from './wiring.js';
export type { Services, BuildServicesOverrides } from './wiring.js';

// Formatter exports
export { ReportFormatter, formatReport, formatScreenResults } from './formatters/report-formatter.js';
export type { OutputFormat } from './formatters/report-formatter.js';

// CLI exports
export { createProgram, runCli, CLI_VERSION } from './program.js';
export type { CliContext, CliOutput } from './program.js';
