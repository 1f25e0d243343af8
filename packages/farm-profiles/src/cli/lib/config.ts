/**
 * Farm Profiles CLI Configuration Management
 *
 * Loads configuration from .farm-profilesrc (YAML) with environment variable
 * overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (FARM_PROFILES_*)
 * 3. Config file (.farm-profilesrc or --config path)
 * 4. Default values
 *
 * EXAMPLE (.farm-profilesrc):
 * ```yaml
 * version: 1
 * gateway:
 *   base_url: https://gateway.example.org/v1
 *   timeout_ms: 60000
 *   max_retries: 2
 * datasets_path: ./config/datasets.yaml
 * defaults:
 *   year: 2023
 *   max_workers: 8
 *   item_timeout_ms: 300000
 * ```
 *
 * @module cli/lib/config
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_MAX_WORKERS, DEFAULT_YEAR } from '../../core/constants.js';
import { DEFAULT_DATASETS_PATH } from '../../registry/dataset-registry.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface GatewayConfig {
  readonly baseUrl: string;
  /** Per-request timeout in milliseconds */
  readonly timeoutMs: number;
  /** Transport retries for transient failures */
  readonly maxRetries: number;
}

export interface DefaultsConfig {
  readonly year: number;
  readonly maxWorkers: number;
  /** Per-item time budget for bulk runs; null disables it */
  readonly itemTimeoutMs: number | null;
}

export interface CLIConfig {
  readonly version: number;
  readonly gateway: GatewayConfig;
  readonly datasetsPath: string;
  readonly defaults: DefaultsConfig;
  readonly verbose: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly configPath: string | null
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Schemas
// ============================================================================

const PositiveInt = z.number().int().positive();
const NonNegativeInt = z.number().int().nonnegative();

const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    gateway: z
      .object({
        base_url: z.string().url().optional(),
        timeout_ms: PositiveInt.optional(),
        max_retries: NonNegativeInt.optional(),
      })
      .strict()
      .optional(),
    datasets_path: z.string().min(1).optional(),
    defaults: z
      .object({
        year: PositiveInt.optional(),
        max_workers: PositiveInt.optional(),
        item_timeout_ms: PositiveInt.nullable().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

const ResolvedConfigSchema = z.object({
  gateway: z.object({
    baseUrl: z.string().url(),
    timeoutMs: PositiveInt,
    maxRetries: NonNegativeInt,
  }),
  datasetsPath: z.string().min(1),
  defaults: z.object({
    year: PositiveInt,
    maxWorkers: PositiveInt,
    itemTimeoutMs: PositiveInt.nullable(),
  }),
});

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'configPath'> = {
  version: 1,
  gateway: {
    baseUrl: 'http://localhost:8080',
    timeoutMs: 60000,
    maxRetries: 0,
  },
  datasetsPath: DEFAULT_DATASETS_PATH,
  defaults: {
    year: DEFAULT_YEAR,
    maxWorkers: DEFAULT_MAX_WORKERS,
    itemTimeoutMs: null,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = ['.farm-profilesrc', '.farm-profilesrc.yaml', '.farm-profilesrc.yml'];

const ENV_PREFIX = 'FARM_PROFILES_';

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

async function parseConfigFile(filePath: string): Promise<ConfigFile> {
  let raw: unknown;
  try {
    raw = parseYaml(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  // an empty file parses to null
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid config file: ${issues.join('; ')}`, filePath);
  }
  return parsed.data;
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value === undefined || value.trim().length === 0 ? undefined : value.trim();
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new ConfigurationError(`${ENV_PREFIX}${name} must be a number, got '${value}'`, null);
  }
  return num;
}

export interface ConfigOverrides {
  readonly verbose?: boolean;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  readonly datasetsPath?: string;
  readonly year?: number;
  readonly maxWorkers?: number;
  readonly itemTimeoutMs?: number;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: ConfigOverrides;
  readonly env?: NodeJS.ProcessEnv;
  /** Directory to start the config file search from (default: cwd) */
  readonly cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigurationError} If a source is unreadable or a merged value is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  const explicitPath = options.configPath ?? envString(env, 'CONFIG');
  if (explicitPath !== undefined) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, configPath);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  const file: ConfigFile = configPath === null ? {} : await parseConfigFile(configPath);
  // relative dataset paths in a config file are relative to that file
  const fileDatasetsPath =
    file.datasets_path !== undefined && configPath !== null
      ? resolve(dirname(configPath), file.datasets_path)
      : undefined;
  const overrideDatasetsPath =
    overrides.datasetsPath ?? envString(env, 'DATASETS');

  const merged = {
    gateway: {
      baseUrl:
        overrides.baseUrl ??
        envString(env, 'GATEWAY_URL') ??
        file.gateway?.base_url ??
        DEFAULT_CONFIG.gateway.baseUrl,
      timeoutMs:
        overrides.timeoutMs ??
        envNumber(env, 'TIMEOUT_MS') ??
        file.gateway?.timeout_ms ??
        DEFAULT_CONFIG.gateway.timeoutMs,
      maxRetries:
        overrides.maxRetries ??
        envNumber(env, 'MAX_RETRIES') ??
        file.gateway?.max_retries ??
        DEFAULT_CONFIG.gateway.maxRetries,
    },
    datasetsPath:
      overrideDatasetsPath !== undefined
        ? resolve(cwd, overrideDatasetsPath)
        : fileDatasetsPath ?? DEFAULT_CONFIG.datasetsPath,
    defaults: {
      year: overrides.year ?? envNumber(env, 'YEAR') ?? file.defaults?.year ?? DEFAULT_CONFIG.defaults.year,
      maxWorkers:
        overrides.maxWorkers ??
        envNumber(env, 'MAX_WORKERS') ??
        file.defaults?.max_workers ??
        DEFAULT_CONFIG.defaults.maxWorkers,
      itemTimeoutMs:
        overrides.itemTimeoutMs ??
        envNumber(env, 'ITEM_TIMEOUT_MS') ??
        (file.defaults?.item_timeout_ms !== undefined
          ? file.defaults.item_timeout_ms
          : DEFAULT_CONFIG.defaults.itemTimeoutMs),
    },
  };

  const resolved = ResolvedConfigSchema.safeParse(merged);
  if (!resolved.success) {
    const issues = resolved.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, configPath);
  }

  return {
    version: DEFAULT_CONFIG.version,
    ...resolved.data,
    verbose: overrides.verbose ?? false,
    configPath,
  };
}
