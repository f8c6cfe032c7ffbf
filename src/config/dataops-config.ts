/**
 * sf-dataops Configuration
 *
 * Loads sf-dataops.config.json (working directory by default), fills in
 * defaults and validates it. The result is deeply frozen and handed to
 * each component's constructor; nothing reads configuration from global
 * state after startup.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULTS } from './defaults.js';
import { DEFAULT_ENRICHMENT_FIELDS } from './enrichment-fields.js';
import { ConfigError } from '../core/errors.js';

export type CsvEncoding = 'utf-8' | 'utf8' | 'latin1' | 'ascii' | 'utf16le';

export interface DataOpsConfig {
  readonly api: {
    /** Salesforce REST API version, e.g. '60.0' */
    readonly version: string;
    /** Default records per call, capped at 200 */
    readonly batchSize: number;
    /** Per-call timeout in seconds */
    readonly timeout: number;
  };
  readonly csv: {
    readonly encoding: CsvEncoding;
    readonly delimiter: string;
    readonly errorDirectory: string;
    readonly resultsDirectory: string;
    /** Write a success_*.csv playback file per upload run */
    readonly writeSuccessFile: boolean;
  };
  readonly retry: {
    readonly attempts: number;
    readonly delayMs: number;
    readonly backoffMultiplier: number;
    readonly maxDelayMs: number;
  };
  readonly enrichment: {
    /** Allow-list of enrichable fields per object type */
    readonly fields: Readonly<Record<string, readonly string[]>>;
    /** Search page URL, `{query}` is replaced by the encoded search text */
    readonly searchUrl: string;
    readonly userAgent: string;
    readonly defaultCountry: string;
  };
  readonly logLevel: string;
}

const fieldName = z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'must be an API field name');

const configSchema = z.object({
  api: z
    .object({
      version: z.string().regex(/^\d+\.\d+$/, "must look like '60.0'").default(DEFAULTS.API_VERSION),
      batchSize: z.number().int().min(1).max(DEFAULTS.MAX_BATCH_SIZE).default(DEFAULTS.BATCH_SIZE),
      timeout: z.number().positive().default(DEFAULTS.API_TIMEOUT_SECONDS),
    })
    .default({}),
  csv: z
    .object({
      encoding: z.enum(['utf-8', 'utf8', 'latin1', 'ascii', 'utf16le']).default(DEFAULTS.CSV_ENCODING),
      delimiter: z.string().length(1).default(DEFAULTS.CSV_DELIMITER),
      errorDirectory: z.string().min(1).default(DEFAULTS.ERROR_DIRECTORY),
      resultsDirectory: z.string().min(1).default(DEFAULTS.RESULTS_DIRECTORY),
      writeSuccessFile: z.boolean().default(true),
    })
    .default({}),
  retry: z
    .object({
      attempts: z.number().int().min(1).default(DEFAULTS.RETRY_ATTEMPTS),
      delayMs: z.number().int().min(0).default(DEFAULTS.RETRY_DELAY_MS),
      backoffMultiplier: z.number().min(1).default(DEFAULTS.RETRY_BACKOFF_MULTIPLIER),
      maxDelayMs: z.number().int().min(0).default(DEFAULTS.RETRY_MAX_DELAY_MS),
    })
    .default({}),
  enrichment: z
    .object({
      fields: z.record(z.array(fieldName).min(1)).default({}),
      searchUrl: z.string().includes('{query}').default(DEFAULTS.SEARCH_URL),
      userAgent: z.string().min(1).default(DEFAULTS.USER_AGENT),
      defaultCountry: z.string().default(DEFAULTS.DEFAULT_COUNTRY),
    })
    .default({}),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
});

/**
 * Get the default config path (working directory)
 */
export function getDefaultConfigPath(): string {
  return path.resolve(process.cwd(), DEFAULTS.CONFIG_FILE);
}

/**
 * Validate a raw config object and fill in defaults.
 * Object types listed in the file replace the built-in allow-list for
 * that type; the others keep their defaults.
 */
export function parseConfig(raw: unknown): DataOpsConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;
  return deepFreeze({
    ...parsed,
    enrichment: {
      ...parsed.enrichment,
      fields: { ...DEFAULT_ENRICHMENT_FIELDS, ...parsed.enrichment.fields },
    },
  });
}

/**
 * Load the configuration from disk.
 * A missing file at the default location yields the defaults; a missing
 * file at an explicit path is an error.
 */
export function loadConfig(configPath?: string): DataOpsConfig {
  const resolved = configPath ? path.resolve(configPath) : getDefaultConfigPath();

  if (!fs.existsSync(resolved)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${resolved}`, 'config');
    }
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Could not parse config file ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
      'config',
      error instanceof Error ? error : undefined
    );
  }

  return parseConfig(raw);
}

/**
 * Allow-list for an object type, or undefined when none is configured
 */
export function getEnrichmentFields(
  config: DataOpsConfig,
  objectType: string
): readonly string[] | undefined {
  return config.enrichment.fields[objectType];
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
