/**
 * @tabq/cli Program
 *
 * Command-line parsing and wiring. Kept apart from the bin entry point so
 * that tests can run the whole CLI in-process against captured streams.
 */

import { Command, CommanderError, Option } from 'commander';
import { createLogger, formatLogEntry, LOG_LEVELS, type Logger } from '@tabq/core';
import {
  configError,
  createConfig,
  getEnvOverrides,
  mergeConfigs,
  OUTPUT_FORMATS,
  validateConfig,
  type TabqConfig,
} from '@tabq/config';
import { queryCommand } from './commands/query.js';
import type { CliFlags, CliIO } from './types.js';

export const VERSION = '0.1.0';

const USAGE_EXAMPLES = `
Examples:
  tabq data.csv
  tabq data.csv --where 'price>500'
  tabq data.csv --where 'brand=apple'
  tabq data.csv --aggregate 'price=avg'
  tabq data.csv --aggregate 'price=max'
  tabq data.csv --order-by 'price=desc'
  tabq data.csv --order-by 'rating=desc' --format simple`;

/**
 * Build the commander program. `run` receives the file argument and the
 * parsed flags.
 */
export function createProgram(
  io: CliIO,
  run: (file: string, flags: CliFlags) => Promise<void>
): Command {
  return new Command()
    .name('tabq')
    .description('Filter, aggregate and sort CSV files')
    .version(VERSION)
    .argument('<file>', 'Path to the CSV file')
    .option('--where <condition>', 'Filter condition (e.g. "price>500")')
    .option('--aggregate <expression>', 'Aggregation (e.g. "price=avg")')
    .option('--order-by <expression>', 'Sort order (e.g. "price=desc")')
    .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS))
    .addOption(new Option('--log-level <level>', 'Minimum level for diagnostic logs').choices(LOG_LEVELS))
    .addHelpText('after', USAGE_EXAMPLES)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .action(async (file: string, flags: CliFlags) => {
      await run(file, flags);
    });
}

/**
 * Resolve configuration: defaults, then TABQ_* variables, then flags.
 *
 * @throws ValidationError (INVALID_CONFIG) for unusable environment values
 */
export function resolveConfig(flags: CliFlags, env?: Record<string, string | undefined>): TabqConfig {
  const { overrides, issues } = getEnvOverrides({ env });
  if (issues.length > 0) {
    throw configError(issues);
  }

  const config = createConfig(
    mergeConfigs(overrides, {
      output: { format: flags.format },
      observability: { logLevel: flags.logLevel },
    })
  );

  const validation = validateConfig(config);
  if (!validation.valid) {
    throw configError(validation.errors);
  }
  return config;
}

function createCliLogger(config: TabqConfig, io: CliIO): Logger {
  const { logLevel, logFormat } = config.observability;
  return createLogger({
    minLevel: logLevel,
    output: (entry) => io.stderr(`${formatLogEntry(entry, logFormat)}\n`),
  });
}

async function execute(file: string, flags: CliFlags, io: CliIO): Promise<number> {
  let config: TabqConfig;
  try {
    config = resolveConfig(flags, io.env);
  } catch (error) {
    io.stderr(`Validation error: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }

  const logger = createCliLogger(config, io);
  for (const warning of validateConfig(config).warnings) {
    logger.warn(warning.message, { path: warning.path });
  }

  const result = await queryCommand({
    file,
    where: flags.where,
    aggregate: flags.aggregate,
    orderBy: flags.orderBy,
    config,
    logger,
    signal: io.signal,
  });

  if (result.output !== undefined) {
    io.stdout(`${result.output}\n`);
  }
  if (result.error !== undefined) {
    io.stderr(`${result.error}\n`);
  }
  return result.exitCode;
}

/**
 * Run the CLI on user arguments (without the node and script entries) and
 * return the process exit code.
 *
 * @example
 * ```typescript
 * const code = await runCli(['phones.csv', '--aggregate', 'price=avg'], {
 *   stdout: (text) => process.stdout.write(text),
 *   stderr: (text) => process.stderr.write(text),
 * });
 * ```
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, async (file, flags) => {
    exitCode = await execute(file, flags, io);
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
