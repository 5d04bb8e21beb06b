/**
 * precip-reconcile CLI Configuration Management
 *
 * Loads configuration from .precip-reconcilerc (YAML) with environment
 * variable overrides and sensible defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (PRECIP_RECONCILE_*)
 * 3. Config file (.precip-reconcilerc or --config path)
 * 4. Default values
 *
 * Database credentials are separate: they come from DB_* variables, which
 * may be supplied through a .env file.
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Grib2SourceConfig, NetcdfSourceConfig } from '../../acquisition/sources.js';
import { parseSourceTimestamp } from '../../alignment/timestamp.js';
import { ConfigError } from '../../core/errors.js';
import {
  DEFAULT_INCIDENT_COLUMNS,
  type IncidentColumns,
} from '../../incidents/incident-source.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Local store of downloaded GRIB2 archives */
  readonly gribDir: string;
  /** Directory for the JSON output documents */
  readonly outputDir: string;
}

export interface FetchConfig {
  /** Shared concurrency limit across both sources */
  readonly concurrency: number;
  readonly maxRetries: number;
  readonly backoffSeconds: number;
  readonly requestTimeoutMs: number;
  readonly downloadTimeoutMs: number;
}

export interface SourcesConfig {
  readonly netcdf: NetcdfSourceConfig;
  readonly grib2: Grib2SourceConfig;
}

export interface IncidentsConfig {
  /** Schema-qualified table name */
  readonly table: string;
  readonly limit: number;
  readonly columns: IncidentColumns;
}

export interface GridConfig {
  /** Timestamp of the artifacts both grid geometries are read from */
  readonly sampleTimestamp: string;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly fetch: FetchConfig;
  readonly sources: SourcesConfig;
  readonly incidents: IncidentsConfig;
  readonly grid: GridConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

export interface DatabaseConfig {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: string;
}

/**
 * Config file structure (YAML or JSON)
 */
const configFileSchema = z.object({
  version: z.number().int().optional(),
  paths: z
    .object({ gribDir: z.string(), outputDir: z.string() })
    .partial()
    .optional(),
  fetch: z
    .object({
      concurrency: z.number(),
      maxRetries: z.number(),
      backoffSeconds: z.number(),
      requestTimeoutMs: z.number(),
      downloadTimeoutMs: z.number(),
    })
    .partial()
    .optional(),
  sources: z
    .object({
      netcdf: z.object({ baseUrl: z.string(), productCode: z.string() }).partial().optional(),
      grib2: z
        .object({
          bucketUrl: z.string(),
          prefix: z.string(),
          product: z.string(),
          parameter: z.object({
            discipline: z.number().int(),
            category: z.number().int(),
            number: z.number().int(),
          }),
        })
        .partial()
        .optional(),
    })
    .optional(),
  incidents: z
    .object({
      table: z.string(),
      limit: z.number(),
      columns: z
        .object({
          id: z.string(),
          lat: z.string(),
          lon: z.string(),
          timestamp: z.string(),
          value: z.string(),
        })
        .partial(),
    })
    .partial()
    .optional(),
  grid: z.object({ sampleTimestamp: z.string() }).partial().optional(),
});

type ConfigFileSchema = z.infer<typeof configFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  paths: {
    gribDir: './data/grib2',
    outputDir: './netcdf_vs_grib2',
  },

  fetch: {
    concurrency: 20,
    maxRetries: 5,
    backoffSeconds: 60,
    requestTimeoutMs: 60000,
    downloadTimeoutMs: 120000,
  },

  sources: {
    netcdf: {
      baseUrl: 'https://mesonet.agron.iastate.edu/cgi-bin/request/raster2netcdf.py',
      productCode: 'mrms_a2m',
    },
    grib2: {
      bucketUrl: 'https://noaa-mrms-pds.s3.amazonaws.com',
      prefix: 'CONUS/PrecipRate_00.00',
      product: 'MRMS_PrecipRate_00.00',
      parameter: { discipline: 209, category: 6, number: 1 },
    },
  },

  incidents: {
    table: 'public.mrms_data_for_cris_records_60min_statewide',
    limit: 400,
    columns: DEFAULT_INCIDENT_COLUMNS,
  },

  grid: {
    sampleTimestamp: '2024-06-01T12:00:00Z',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.precip-reconcilerc',
  '.precip-reconcilerc.yaml',
  '.precip-reconcilerc.yml',
  '.precip-reconcilerc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    if (dir === root) {
      return null;
    }
    dir = resolve(dir, '..');
  }
}

/**
 * Parse and validate config file content
 */
export function parseConfigFile(filePath: string): ConfigFileSchema {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`);
  }
  return parsed.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function envReader(env: Env) {
  const get = (name: string): string | undefined => {
    const value = env[`PRECIP_RECONCILE_${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  return {
    string: get,
    bool(name: string): boolean | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      return value.toLowerCase() === 'true' || value === '1';
    },
    number(name: string): number | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      const num = Number(value);
      if (!Number.isFinite(num)) {
        throw new ConfigError(`PRECIP_RECONCILE_${name} must be a number, got "${value}"`);
      }
      return num;
    },
  };
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    concurrency?: number;
  };
  /** Defaults to process.env */
  env?: Env;
  /** Directory the config file search starts from (defaults to cwd) */
  cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = envReader(options.env ?? process.env);
  let configPath: string | null = null;
  let fileConfig: ConfigFileSchema = {};

  const explicitPath = options.configPath ?? env.string('CONFIG');
  if (explicitPath) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const defaults = DEFAULT_CONFIG;
  const netcdfFile = fileConfig.sources?.netcdf;
  const grib2File = fileConfig.sources?.grib2;

  return {
    version: fileConfig.version ?? defaults.version,

    paths: {
      gribDir: env.string('GRIB_DIR') ?? fileConfig.paths?.gribDir ?? defaults.paths.gribDir,
      outputDir:
        env.string('OUTPUT_DIR') ?? fileConfig.paths?.outputDir ?? defaults.paths.outputDir,
    },

    fetch: {
      concurrency:
        options.overrides?.concurrency ??
        env.number('CONCURRENCY') ??
        fileConfig.fetch?.concurrency ??
        defaults.fetch.concurrency,
      maxRetries:
        env.number('MAX_RETRIES') ?? fileConfig.fetch?.maxRetries ?? defaults.fetch.maxRetries,
      backoffSeconds:
        env.number('BACKOFF_SECONDS') ??
        fileConfig.fetch?.backoffSeconds ??
        defaults.fetch.backoffSeconds,
      requestTimeoutMs:
        env.number('REQUEST_TIMEOUT_MS') ??
        fileConfig.fetch?.requestTimeoutMs ??
        defaults.fetch.requestTimeoutMs,
      downloadTimeoutMs:
        env.number('DOWNLOAD_TIMEOUT_MS') ??
        fileConfig.fetch?.downloadTimeoutMs ??
        defaults.fetch.downloadTimeoutMs,
    },

    sources: {
      netcdf: {
        baseUrl: netcdfFile?.baseUrl ?? defaults.sources.netcdf.baseUrl,
        productCode: netcdfFile?.productCode ?? defaults.sources.netcdf.productCode,
      },
      grib2: {
        bucketUrl: grib2File?.bucketUrl ?? defaults.sources.grib2.bucketUrl,
        prefix: grib2File?.prefix ?? defaults.sources.grib2.prefix,
        product: grib2File?.product ?? defaults.sources.grib2.product,
        parameter: grib2File?.parameter ?? defaults.sources.grib2.parameter,
      },
    },

    incidents: {
      table:
        env.string('INCIDENT_TABLE') ?? fileConfig.incidents?.table ?? defaults.incidents.table,
      limit:
        env.number('INCIDENT_LIMIT') ?? fileConfig.incidents?.limit ?? defaults.incidents.limit,
      columns: { ...defaults.incidents.columns, ...fileConfig.incidents?.columns },
    },

    grid: {
      sampleTimestamp:
        env.string('SAMPLE_TIMESTAMP') ??
        fileConfig.grid?.sampleTimestamp ??
        defaults.grid.sampleTimestamp,
    },

    verbose: options.overrides?.verbose ?? env.bool('VERBOSE') ?? false,
    json: options.overrides?.json ?? env.bool('JSON') ?? false,
    configPath,
  };
}

/**
 * Resolve a configured path relative to the config file (or cwd)
 */
export function resolvePath(config: CLIConfig, pathKey: keyof PathsConfig): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, config.paths[pathKey]);
}

/**
 * Validate configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigError(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  const { fetch } = config;
  if (!Number.isInteger(fetch.concurrency) || fetch.concurrency < 1 || fetch.concurrency > 100) {
    throw new ConfigError('Concurrency must be an integer between 1 and 100');
  }
  if (!Number.isInteger(fetch.maxRetries) || fetch.maxRetries < 0) {
    throw new ConfigError('maxRetries must be a non-negative integer');
  }
  if (fetch.backoffSeconds < 0) {
    throw new ConfigError('backoffSeconds must not be negative');
  }
  if (fetch.requestTimeoutMs <= 0 || fetch.downloadTimeoutMs <= 0) {
    throw new ConfigError('Timeouts must be positive numbers');
  }

  if (!Number.isInteger(config.incidents.limit) || config.incidents.limit <= 0) {
    throw new ConfigError('Incident limit must be a positive integer');
  }

  try {
    parseSourceTimestamp(config.grid.sampleTimestamp);
  } catch (error) {
    throw new ConfigError(
      `Invalid grid.sampleTimestamp: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

// ============================================================================
// Database
// ============================================================================

/**
 * Load variables from a .env file into process.env without overriding
 * variables that are already set
 */
export function loadEnvFile(path?: string): void {
  loadDotenv(path ? { path } : {});
}

const DB_VARIABLES = ['DB_NAME', 'DB_USER', 'DB_PASSWORD', 'DB_HOST', 'DB_PORT'] as const;

/**
 * Read connection parameters from DB_* variables
 *
 * @throws ConfigError listing every missing variable
 */
export function loadDatabaseConfig(env: Env = process.env): DatabaseConfig {
  const missing = DB_VARIABLES.filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing database settings: ${missing.join(', ')}`);
  }

  const port = Number(env.DB_PORT);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`DB_PORT must be a port number, got "${env.DB_PORT}"`);
  }

  return {
    host: env.DB_HOST ?? '',
    port,
    database: env.DB_NAME ?? '',
    user: env.DB_USER ?? '',
    password: env.DB_PASSWORD ?? '',
  };
}
