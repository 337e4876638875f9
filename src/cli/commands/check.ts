import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { ValidationEngine } from '../../core/validation/engine.js';
import type { BatchValidationResult } from '../../core/validation/types.js';
import { JsonFormatter, HumanFormatter, type IFormatter, type OutputFormat } from '../formatters/index.js';
import { findSourceFiles } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { ArgCheckError, ConfigError, ErrorCodes, ExitCodes } from '../../utils/errors.js';

export interface CheckOptions {
  format: string;
  config?: string;
  strict?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  /** False under --no-color */
  color: boolean;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate the argument schemas of command-line classes')
    .argument('[files...]', 'Files or glob patterns to validate')
    .option('--format <format>', 'Output format: human or json', 'human')
    .option('--config <path>', 'Path to config file')
    .option('--strict', 'Treat warnings as errors')
    .option('--quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show passing files and the groups of each class')
    .option('--no-color', 'Disable colored output')
    .action(async (filePatterns: string[], options: CheckOptions) => {
      const exitCode = await runCheck(filePatterns, options, process.cwd());
      process.exit(exitCode);
    });
}

/**
 * Run the check and print the report. Resolves to the process exit code.
 */
export async function runCheck(
  filePatterns: string[],
  options: CheckOptions,
  projectRoot: string
): Promise<number> {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('silent');
  }

  try {
    const format = parseFormat(options.format);
    const config = await loadConfig(projectRoot, options.config);
    logger.debug('Loaded configuration', { modules: config.modules, strict_groups: config.strict_groups });

    const patterns = filePatterns.length > 0 ? filePatterns : config.files.include;
    const files = await findSourceFiles(patterns, { cwd: projectRoot, exclude: config.files.exclude });

    if (files.length === 0) {
      logger.warn('No files found matching the given patterns.');
      return ExitCodes.SUCCESS;
    }

    if (format === 'human') {
      logger.info(`Validating ${files.length} file(s)...`);
    }

    const engine = new ValidationEngine(config);
    let batch: BatchValidationResult;
    try {
      batch = await engine.validateFiles(files);
    } finally {
      engine.dispose();
    }

    const formatter = createFormatter(format, options);
    console.log(formatter.formatBatch(relativize(batch, projectRoot)));

    return getExitCode(batch, options.strict ?? false);
  } catch (error) {
    if (error instanceof ArgCheckError) {
      logger.error(`${error.message} [${error.code}]`);
      return ExitCodes.FAILURE;
    }
    throw error;
  }
}

/**
 * Exit code for a finished check: findings fail on errors, or on warnings under --strict.
 */
export function getExitCode(batch: BatchValidationResult, strict: boolean): number {
  const { totalErrors, totalWarnings } = batch.summary;
  if (totalErrors > 0 || (strict && totalWarnings > 0)) {
    return ExitCodes.FINDINGS;
  }
  return ExitCodes.SUCCESS;
}

function parseFormat(format: string): OutputFormat {
  if (format === 'human' || format === 'json') {
    return format;
  }
  throw new ConfigError(ErrorCodes.CONFIG_INVALID, `Unknown output format: ${format}`, { format });
}

/** Create formatter based on output format. */
function createFormatter(format: OutputFormat, options: CheckOptions): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'human':
      return new HumanFormatter({
        colors: options.color && !options.quiet,
        verbose: options.verbose ?? false,
      });
  }
}

function relativize(batch: BatchValidationResult, projectRoot: string): BatchValidationResult {
  return {
    ...batch,
    results: batch.results.map(result => ({
      ...result,
      file: path.relative(projectRoot, result.file),
    })),
  };
}
