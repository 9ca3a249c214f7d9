/**
 * Format command - reorganize files in place (or report, or print)
 */

import { Command } from 'commander';
import { relative, resolve } from 'path';
import {
  ConfigError,
  FileFormatter,
  closeLogger,
  createLogger,
  discoverFiles,
  isLogLevel,
  loadConfig,
  LOG_LEVELS,
} from '@declsort/core';
import type { FileResult, LogLevel } from '@declsort/core';
import { exitWithError } from '../utils/errorFormatter.js';

export interface FormatCommandOptions {
  project?: string;
  check?: boolean;
  stdout?: boolean;
  /** false with --no-backup */
  backup?: boolean;
  config?: string;
  logLevel?: string;
  logFile?: string;
}

/**
 * Where command output goes. Results go to `out`; status lines go to `err`
 * in stdout mode so the formatted text stays clean.
 */
export interface CommandOutput {
  out(text: string): void;
  err(text: string): void;
}

export const consoleOutput: CommandOutput = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

export interface FormatSummary {
  formatted: number;
  unchanged: number;
  needsFormatting: number;
  failed: number;
}

function summarize(results: readonly FileResult[]): FormatSummary {
  const summary: FormatSummary = { formatted: 0, unchanged: 0, needsFormatting: 0, failed: 0 };
  for (const result of results) {
    switch (result.status) {
      case 'formatted':
        summary.formatted++;
        break;
      case 'unchanged':
        summary.unchanged++;
        break;
      case 'needs-formatting':
        summary.needsFormatting++;
        break;
      case 'failed':
        summary.failed++;
        break;
    }
  }
  return summary;
}

export function statusLine(result: FileResult, displayPath: string): string {
  switch (result.status) {
    case 'failed':
      return `✗ ${displayPath}: ${result.error?.message ?? 'unknown error'}`;
    case 'needs-formatting':
      return `✗ ${displayPath}: needs formatting`;
    default:
      return `✓ ${displayPath}`;
  }
}

export function summaryLine(summary: FormatSummary, check: boolean): string {
  const failed = summary.failed > 0 ? `, ${summary.failed} failed` : '';
  if (check) {
    return `${summary.needsFormatting} file(s) need formatting, ${summary.unchanged} already formatted${failed}`;
  }
  return `${summary.formatted} file(s) formatted, ${summary.unchanged} unchanged${failed}`;
}

function resolveLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined) return fallback;
  if (!isLogLevel(value)) {
    throw new ConfigError(
      `Invalid log level: ${value}`,
      'ERR_CONFIG_INVALID',
      {},
      `Use one of: ${LOG_LEVELS.join(', ')}`
    );
  }
  return value;
}

/**
 * @returns the process exit code
 * @throws ConfigError on invalid configuration or options
 */
export async function runFormat(
  paths: readonly string[],
  options: FormatCommandOptions,
  output: CommandOutput = consoleOutput
): Promise<number> {
  const projectPath = resolve(options.project ?? '.');
  const setupLogger = createLogger(resolveLogLevel(options.logLevel, 'warnings'));
  const config = loadConfig(projectPath, setupLogger, options.config);
  const logger = createLogger(resolveLogLevel(options.logLevel, config.logLevel), { logFile: options.logFile });

  try {
    const files = discoverFiles(paths, config, projectPath);
    if (files.length === 0) {
      logger.warn('No matching files found', { paths: [...paths] });
      return 0;
    }
    logger.debug('Files discovered', { count: files.length });

    const check = options.check === true;
    const formatter = new FileFormatter(config, logger);
    const results = formatter.formatFiles(files, {
      check,
      stdout: options.stdout,
      backup: options.backup,
    });

    const status = options.stdout ? output.err : output.out;
    for (const result of results) {
      const displayPath = relative(projectPath, result.path) || result.path;
      if (options.stdout && result.output !== undefined) {
        output.out(result.output);
      }
      if (result.status === 'failed') {
        logger.info('File failed', { path: displayPath, error: result.error?.message });
      }
      status(`${statusLine(result, displayPath)}\n`);
    }

    const summary = summarize(results);
    status(`\n${summaryLine(summary, check)}\n`);

    return summary.failed > 0 || (check && summary.needsFormatting > 0) ? 1 : 0;
  } finally {
    await closeLogger(logger);
  }
}

async function runAction(paths: string[], options: FormatCommandOptions): Promise<void> {
  try {
    process.exitCode = await runFormat(paths, options);
  } catch (err) {
    if (err instanceof ConfigError) {
      exitWithError(err.message, err.suggestion ? [err.suggestion] : undefined);
    }
    throw err;
  }
}

function withSharedOptions(command: Command): Command {
  return command
    .argument('[paths...]', 'Files, directories or glob patterns (default: project root)')
    .option('-p, --project <path>', 'Project path', '.')
    .option('-c, --config <path>', 'Config file (default: .declsort.yaml in the project)')
    .option('--log-level <level>', `Log level: ${LOG_LEVELS.join(', ')}`)
    .option('--log-file <path>', 'Also write logs to this file');
}

export const formatCommand = withSharedOptions(
  new Command('format').description('Reorganize declarations while keeping every comment with its code')
)
  .option('--check', 'Report files that would change, write nothing')
  .option('--stdout', 'Print formatted output instead of writing files')
  .option('--no-backup', 'Do not write .bak copies before overwriting')
  .addHelpText('after', `
Examples:
  declsort format                    Format every matching file in the project
  declsort format src/index.ts       Format one file
  declsort format "src/**/*.tsx"     Format files matching a glob
  declsort format --check            Exit 1 if anything would change
  declsort format a.ts --stdout      Print the result instead of writing
`)
  .action(runAction);

export const checkCommand = withSharedOptions(
  new Command('check').description('Exit 1 if any file would be reformatted (same as format --check)')
).action(async (paths: string[], options: FormatCommandOptions) => {
  await runAction(paths, { ...options, check: true });
});
