#!/usr/bin/env node

/**
 * `marketlens` command-line entry point
 */

import 'dotenv/config';

import { attachGlobalHandlers, createLogger, withRequestContext } from '@marketlens/logger';
import { loadConfig } from './config/index.js';
import { runCli } from './program.js';
import { buildServices } from './wiring.js';

async function main(): Promise<void> {
  const config = loadConfig();

  // stdout carries reports, so every log level goes to stderr
  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
    stderr: true,
  });

  attachGlobalHandlers(logger);

  const argv = process.argv.slice(2);
  const { analysis } = buildServices(config, logger);

  process.exitCode = await withRequestContext(() => runCli(argv, { config, analysis }), undefined, {
    command: argv[0],
  });
}

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
