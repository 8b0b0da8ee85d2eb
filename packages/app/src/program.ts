/**
 * Command definitions for the `marketlens` CLI.
 */

import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { isMarketLensError, parseInterval, parsePeriod } from '@marketlens/contracts';
import type { Config } from './config/index.js';
import { formatReport, formatScreenResults } from './formatters/report-formatter.js';
import type { AnalysisService } from './services/analysis-service.js';

export const CLI_VERSION = '0.1.0';

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

export interface CliContext {
  config: Config;
  analysis: AnalysisService;
  /** @default stdout and stderr */
  output?: CliOutput;
}

interface SeriesOptions {
  period: string;
  interval: string;
  json: boolean;
}

interface ScreenCommandOptions extends SeriesOptions {
  concurrency?: number;
}

const processOutput: CliOutput = {
  out: (text) => {
    process.stdout.write(`${text}\n`);
  },
  err: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function describeError(error: unknown): string {
  if (isMarketLensError(error)) return `[${error.code}] ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}

/**
 * Builds the command tree. `setExitCode` receives 1 when a command fails;
 * commands never call `process.exit` themselves.
 */
export function createProgram(context: CliContext, setExitCode: (code: number) => void): Command {
  const { config, analysis } = context;
  const output = context.output ?? processOutput;
  const defaults = config.analysis;

  const program = new Command();

  program
    .name('marketlens')
    .description('Technical indicators, strategy signals and consensus for stock price history')
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.out(text.trimEnd()),
      writeErr: (text) => output.err(text.trimEnd()),
    });

  program
    .command('analyze')
    .description('Analyze one symbol')
    .argument('[symbol]', 'Ticker symbol', defaults.defaultSymbol)
    .option('-p, --period <period>', 'History period (e.g. 1mo, 6mo, 1y)', defaults.defaultPeriod)
    .option('-i, --interval <interval>', 'Bar interval (e.g. 1h, 1d, 1wk)', defaults.defaultInterval)
    .option('--json', 'Print the report as JSON', false)
    .action(async (symbol: string, options: SeriesOptions) => {
      try {
        const report = await analysis.analyzeSymbol(symbol, {
          period: parsePeriod(options.period),
          interval: parseInterval(options.interval),
        });
        output.out(formatReport(report, options.json ? 'json' : 'text'));
      } catch (error) {
        output.err(chalk.red(`Error: ${describeError(error)}`));
        setExitCode(1);
      }
    });

  program
    .command('screen')
    .description('Analyze several symbols and list their consensus')
    .argument('<symbols...>', 'Ticker symbols')
    .option('-p, --period <period>', 'History period (e.g. 1mo, 6mo, 1y)', defaults.defaultPeriod)
    .option('-i, --interval <interval>', 'Bar interval (e.g. 1h, 1d, 1wk)', defaults.defaultInterval)
    .option('-c, --concurrency <n>', 'Symbols analyzed at once', parsePositiveInt)
    .option('--json', 'Print results as JSON', false)
    .action(async (symbols: string[], options: ScreenCommandOptions) => {
      try {
        const results = await analysis.screenSymbols(symbols, {
          period: parsePeriod(options.period),
          interval: parseInterval(options.interval),
          concurrency: options.concurrency,
        });
        output.out(formatScreenResults(results, options.json ? 'json' : 'text'));

        const failed = results.filter((r) => r.status === 'error').length;
        if (failed > 0) {
          output.err(chalk.yellow(`${failed} of ${results.length} symbols failed`));
          setExitCode(1);
        }
      } catch (error) {
        output.err(chalk.red(`Error: ${describeError(error)}`));
        setExitCode(1);
      }
    });

  return program;
}

/**
 * Parses `argv` (without the node and script entries) and runs the matching
 * command.
 *
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], context: CliContext): Promise<number> {
  let exitCode = 0;
  const program = createProgram(context, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  return exitCode;
}
