/**
 * Command Line Program
 *
 * Usage:
 *   feed-validator -i <path> [options]
 *
 * Options:
 *   -i, --input <path>         GTFS directory or .zip archive
 *   -m, --max-issues <n>       Issues kept per kind (default: 1000)
 *   -f, --format <format>      json | pretty-json | yaml (default: json)
 *   -c, --custom-rules <path>  YAML rules file
 *   -v, --verbose              Debug logging
 *   --log-json                 Log lines as JSON
 *
 * The report goes to stdout, logs to stderr.
 *
 * @module cli/program
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import type { RuleConfiguration } from '../config/rules.js';
import { validateInput, type Report } from '../core/engine.js';
import { RulesConfigError } from '../core/errors.js';
import { DEFAULT_MAX_ISSUES } from '../core/issue-collector.js';
import { VALIDATOR_VERSION } from '../core/metadata.js';
import { formatReport, isReportFormat, REPORT_FORMATS } from '../core/report-format.js';
import { loadRules, resolveRulesPath } from './lib/config.js';
import { createCLILogger } from './lib/logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Types
// ============================================================================

interface Writable {
  write(chunk: string): unknown;
}

export interface CliIO {
  readonly stdout: Writable;
  readonly stderr: Writable;
  readonly env: NodeJS.ProcessEnv;
}

interface ValidateOptions {
  readonly input: string;
  readonly maxIssues: number;
  readonly format: string;
  readonly customRules?: string;
  readonly verbose?: boolean;
  readonly logJson?: boolean;
}

const PROCESS_IO: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
};

function parseMaxIssues(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function totalIssues(report: Report): number {
  if (report.metadata === null) {
    return Object.values(report.validations).reduce((sum, issues) => sum + issues.length, 0);
  }
  return Object.values(report.metadata.issuesCount).reduce((sum, count) => sum + count, 0);
}

// ============================================================================
// Validate
// ============================================================================

async function executeValidate(options: ValidateOptions, io: CliIO): Promise<ExitCode> {
  const logger = createCLILogger({
    level: options.verbose === true ? 'debug' : 'info',
    json: options.logJson === true,
    color: io.stderr === process.stderr && options.logJson !== true && process.stderr.isTTY === true,
    output: io.stderr,
  });

  if (!isReportFormat(options.format)) {
    logger.error('Unknown report format', { format: options.format });
    return EXIT_CODES.CONFIG_ERROR;
  }
  const format = options.format;

  logger.commandStart('validate', { input: options.input, format, maxIssues: options.maxIssues });

  let rules: RuleConfiguration;
  try {
    rules = loadRules(resolveRulesPath(options.customRules, io.env));
  } catch (error) {
    if (error instanceof RulesConfigError) {
      logger.error(error.getSummary(), { path: error.path });
      logger.commandEnd(false);
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  try {
    const report = await validateInput(options.input, {
      maxIssues: options.maxIssues,
      rules,
      logger,
    });
    io.stdout.write(`${formatReport(report, format)}\n`);
    logger.commandEnd(true, { issues: totalIssues(report) });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.error('Validation failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    logger.commandEnd(false);
    return EXIT_CODES.ERRORS;
  }
}

// ============================================================================
// Program
// ============================================================================

/**
 * Run the command line with user arguments (no node/script prefix)
 */
export async function runCli(argv: readonly string[], io: CliIO = PROCESS_IO): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;

  const program = new Command()
    .name('feed-validator')
    .description('Check a GTFS feed and print a validation report')
    .version(VALIDATOR_VERSION)
    .requiredOption('-i, --input <path>', 'GTFS directory or .zip archive')
    .option('-m, --max-issues <n>', 'Issues kept per kind', parseMaxIssues, DEFAULT_MAX_ISSUES)
    .addOption(
      new Option('-f, --format <format>', 'Report format').choices(REPORT_FORMATS).default('json')
    )
    .option('-c, --custom-rules <path>', 'YAML rules file')
    .option('-v, --verbose', 'Debug logging')
    .option('--log-json', 'Log lines as JSON')
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout.write(text),
      writeErr: text => io.stderr.write(text),
    })
    .action(async (options: ValidateOptions) => {
      exitCode = await executeValidate(options, io);
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit with 0; usage errors are configuration errors
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }
  return exitCode;
}
