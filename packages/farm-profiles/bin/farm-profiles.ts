#!/usr/bin/env tsx
/**
 * Farm Profiles CLI Entry Point
 *
 * Builds environmental farm profiles from a geospatial query gateway,
 * one farm at a time or in bulk.
 *
 * Profiles are written to stdout (or --output). Logs below `warn` are
 * suppressed unless --verbose is given, so stdout stays machine-readable.
 *
 * @module farm-profiles-cli
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { writeFile } from 'node:fs/promises';
import { z } from 'zod';

import { buildCommand } from '../src/cli/commands/build.js';
import { bulkCreateCommand } from '../src/cli/commands/bulk-create.js';
import { bulkUpdateCommand } from '../src/cli/commands/bulk-update.js';
import { datasetsCommand } from '../src/cli/commands/datasets.js';
import { ConfigurationError, loadConfig } from '../src/cli/lib/config.js';
import { EXIT_CODES, type CommandResult, type ExitCode } from '../src/cli/lib/exit-codes.js';
import { InputFileError } from '../src/cli/lib/input.js';
import { LIST_FORMATS, PROFILE_FORMATS, printError, printOutput } from '../src/cli/lib/output.js';
import { createRuntime, type Runtime } from '../src/cli/lib/runtime.js';
import {
  DatasetConfigError,
  InvalidGeometryError,
  UnknownDatasetError,
  getErrorMessage,
} from '../src/core/errors.js';

const VERSION = '0.1.0';

// ============================================================================
// Option Parsing
// ============================================================================

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

const GlobalFlagsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  gatewayUrl: z.string().optional(),
  timeout: z.number().optional(),
  maxRetries: z.number().optional(),
  datasets: z.string().optional(),
});

const OutputFlagsSchema = z.object({
  output: z.string().optional(),
});

const ProfileFormatSchema = z.enum(['json', 'ndjson', 'csv']);

const BuildFlagsSchema = OutputFlagsSchema.extend({
  lat: z.number().optional(),
  lon: z.number().optional(),
  geometry: z.string().optional(),
  id: z.string().optional(),
  year: z.number().optional(),
  format: ProfileFormatSchema,
});

const BulkFlagsSchema = OutputFlagsSchema.extend({
  year: z.number().optional(),
  maxWorkers: z.number().optional(),
  itemTimeout: z.number().optional(),
  format: ProfileFormatSchema,
});

const BulkCreateFlagsSchema = BulkFlagsSchema.extend({
  geometryField: z.string(),
  idField: z.string(),
});

const BulkUpdateFlagsSchema = BulkFlagsSchema.extend({
  fields: z.string().optional(),
});

const DatasetsFlagsSchema = z.object({
  format: z.enum(['table', 'json']),
});

// ============================================================================
// Execution
// ============================================================================

function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError || error instanceof DatasetConfigError || error instanceof UnknownDatasetError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof InputFileError || error instanceof InvalidGeometryError || error instanceof z.ZodError) {
    return EXIT_CODES.INVALID_INPUT;
  }
  return EXIT_CODES.ERRORS;
}

async function withRuntime(
  program: Command,
  run: (runtime: Runtime) => Promise<CommandResult>,
  outputPath?: string
): Promise<void> {
  const flags = GlobalFlagsSchema.parse(program.opts());
  if (flags.verbose === true) {
    process.env.LOG_LEVEL = 'debug';
  } else if (process.env.LOG_LEVEL === undefined) {
    process.env.LOG_LEVEL = 'warn';
  }

  const config = await loadConfig({
    configPath: flags.config,
    overrides: {
      verbose: flags.verbose,
      baseUrl: flags.gatewayUrl,
      timeoutMs: flags.timeout,
      maxRetries: flags.maxRetries,
      datasetsPath: flags.datasets,
    },
  });

  const result = await run(await createRuntime(config));
  if (outputPath !== undefined) {
    await writeFile(outputPath, `${result.output}\n`, 'utf-8');
  } else {
    printOutput(result.output);
  }
  process.exitCode = result.exitCode;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('farm-profiles')
    .description('Environmental farm profiles from geospatial datasets')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--config <path>', 'Path to config file (default: .farm-profilesrc)')
    .option('--gateway-url <url>', 'Geospatial query gateway base URL')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parseInteger)
    .option('--max-retries <n>', 'Transport retries for transient failures', parseInteger)
    .option('--datasets <path>', 'Dataset configuration file');

  program
    .command('datasets')
    .description('List configured datasets')
    .addOption(new Option('--format <fmt>', 'Output format').choices(LIST_FORMATS).default('table'))
    .action(async (options: unknown) => {
      const flags = DatasetsFlagsSchema.parse(options);
      await withRuntime(program, async (runtime) => datasetsCommand(runtime.datasets, flags));
    });

  program
    .command('build')
    .description('Build one farm profile')
    .option('--lat <deg>', 'Latitude of a point farm', parseNumber)
    .option('--lon <deg>', 'Longitude of a point farm', parseNumber)
    .option('--geometry <json>', 'Geometry as JSON ([lat, lon] pairs)')
    .option('--id <id>', 'Farm identifier', 'farm')
    .option('--year <n>', 'Profile year', parseInteger)
    .addOption(new Option('--format <fmt>', 'Output format').choices(PROFILE_FORMATS).default('json'))
    .option('--output <file>', 'Write output to a file')
    .action(async (options: unknown) => {
      const flags = BuildFlagsSchema.parse(options);
      await withRuntime(program, (runtime) => buildCommand(runtime, flags), flags.output);
    });

  program
    .command('bulk-create <input>')
    .description('Build profiles for every farm in a JSON array')
    .option('--geometry-field <key>', 'Key holding each geometry', 'geometry')
    .option('--id-field <key>', 'Key holding each farm id', 'farm_id')
    .option('--year <n>', 'Profile year', parseInteger)
    .option('--max-workers <n>', 'Concurrent farms', parseInteger)
    .option('--item-timeout <ms>', 'Fail a farm that takes longer than this', parseInteger)
    .addOption(new Option('--format <fmt>', 'Output format').choices(PROFILE_FORMATS).default('json'))
    .option('--output <file>', 'Write output to a file')
    .action(async (input: string, options: unknown) => {
      const flags = BulkCreateFlagsSchema.parse(options);
      await withRuntime(program, (runtime) => bulkCreateCommand(runtime, input, flags), flags.output);
    });

  program
    .command('bulk-update <profiles> <geometries>')
    .description('Refresh existing profiles; geometries map farm ids to geometry')
    .option('--fields <list>', 'Comma-separated fields to refresh (default: all)')
    .option('--year <n>', 'New profile year', parseInteger)
    .option('--max-workers <n>', 'Concurrent farms', parseInteger)
    .option('--item-timeout <ms>', 'Fail a farm that takes longer than this', parseInteger)
    .addOption(new Option('--format <fmt>', 'Output format').choices(PROFILE_FORMATS).default('json'))
    .option('--output <file>', 'Write output to a file')
    .action(async (profiles: string, geometries: string, options: unknown) => {
      const flags = BulkUpdateFlagsSchema.parse(options);
      await withRuntime(
        program,
        (runtime) => bulkUpdateCommand(runtime, profiles, geometries, flags),
        flags.output
      );
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    printError(getErrorMessage(error));
    process.exitCode = exitCodeFor(error);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
