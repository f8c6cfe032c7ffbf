/**
 * API Service - Core Business Logic Layer
 *
 * The single entry point the CLI commands (and library users) call.
 * Wires the configuration, the object store, the session and the
 * decision provider into the upload, query and enrichment flows.
 */

import * as path from 'node:path';
import type { Connection, Org } from '@salesforce/core';
import type {
  CompanyScraper,
  DecisionProvider,
  DispatchProgress,
  EnrichmentOutcome,
  ObjectStore,
  SessionProvider,
  SyncSummary,
} from './types.js';
import { isOperation } from './types.js';
import { ConfigError } from './errors.js';
import { createLogger, setLogLevel } from './logger.js';
import type { DataOpsConfig } from '../config/dataops-config.js';
import { BatchDispatcher, validateDispatchRequest, type Dispatcher } from '../services/batch-dispatcher.js';
import { readCsvFile, type CsvOptions } from '../services/csv.js';
import { FieldMapper, type FieldMapping } from '../services/field-mapper.js';
import { ErrorSink, SuccessLog, type RunLogOptions } from '../services/run-log.js';
import { QueryExporter } from '../services/query-exporter.js';
import { EnrichmentPipeline } from '../services/enrichment/enrichment-pipeline.js';
import { WebCompanyScraper, type FetchHtml } from '../services/enrichment/company-scraper.js';
import { SalesforceObjectStore } from '../services/salesforce.js';
import { OrgSessionProvider } from '../services/org-session.js';
import { DEFAULTS } from '../config/defaults.js';

const log = createLogger('api-service');

const API_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;

export interface SyncOptions {
  filePath: string;
  objectName: string;
  /** insert | update | upsert | delete */
  operation: string;
  /** Defaults to api.batchSize */
  batchSize?: number;
  externalIdField?: string;
  /** Skips the interactive mapping when given */
  mapping?: FieldMapping;
  signal?: AbortSignal;
  onProgress?: (progress: DispatchProgress) => void;
}

export interface DataOpsServiceDependencies {
  config: DataOpsConfig;
  store: ObjectStore;
  session: Pick<SessionProvider, 'reauthenticate'>;
  decisions: DecisionProvider;
  scraper: CompanyScraper;
  /** Replaces the batch dispatcher built from the config */
  dispatcher?: Dispatcher;
  /** Clock for run log file names and timestamps */
  now?: () => Date;
  /** Wait between retries */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Central API Service class
 *
 * CLI commands call methods on this class rather than reaching into the
 * services directly.
 */
export class DataOpsService {
  private readonly dispatcher: Dispatcher;
  private readonly enrichment: EnrichmentPipeline;
  private readonly csv: CsvOptions;

  constructor(private readonly deps: DataOpsServiceDependencies) {
    const { config } = deps;
    this.csv = { encoding: config.csv.encoding, delimiter: config.csv.delimiter };
    this.dispatcher =
      deps.dispatcher ??
      new BatchDispatcher(deps.store, deps.session, {
        retry: config.retry,
        timeoutMs: config.api.timeout * 1000,
        sleep: deps.sleep,
      });
    this.enrichment = new EnrichmentPipeline({
      store: deps.store,
      dispatcher: this.dispatcher,
      scraper: deps.scraper,
      decisions: deps.decisions,
      config,
    });
  }

  get config(): DataOpsConfig {
    return this.deps.config;
  }

  // === Upload ===

  /**
   * Upload a CSV file to an object.
   *
   * Inputs are validated before the org is contacted. Failed rows go to
   * a failed_*.csv file in csv.errorDirectory; with csv.writeSuccessFile,
   * succeeded rows go to a success_*.csv file in csv.resultsDirectory.
   */
  async sync(options: SyncOptions): Promise<SyncSummary> {
    const started = Date.now();
    const { filePath, objectName, signal, onProgress } = options;
    const { config } = this.deps;

    const operation = options.operation.trim().toLowerCase();
    if (!isOperation(operation)) {
      throw new ConfigError(
        `Unknown operation '${options.operation}', expected insert, update, upsert or delete`,
        'operation'
      );
    }
    if (!API_NAME.test(objectName)) {
      throw new ConfigError(`Invalid object name '${objectName}'`, 'objectName');
    }
    const batchSize = options.batchSize ?? config.api.batchSize;
    const externalIdField = validateDispatchRequest({
      operation,
      batchSize,
      externalIdField: options.externalIdField,
    });

    const table = await readCsvFile(filePath, this.csv);
    log.info({ filePath, rows: table.rows.length, columns: table.columns.length }, 'Read source file');

    const mapping =
      options.mapping ??
      (await new FieldMapper(this.deps.decisions).build(
        objectName,
        table.columns,
        await this.deps.store.describeFields(objectName)
      ));

    const logOptions: RunLogOptions = {
      directory: config.csv.errorDirectory,
      sourceName: path.basename(filePath),
      operation,
      columns: table.columns,
      encoding: config.csv.encoding,
      delimiter: config.csv.delimiter,
      now: this.deps.now,
    };
    const errorSink = new ErrorSink(logOptions);
    const successLog = config.csv.writeSuccessFile
      ? new SuccessLog({ ...logOptions, directory: config.csv.resultsDirectory })
      : undefined;

    const summary = await this.dispatcher.dispatch({
      objectName,
      operation,
      rows: table.rows,
      mapping,
      batchSize,
      externalIdField: externalIdField || undefined,
      errorSink,
      successSink: successLog,
      signal,
      onProgress,
    });

    return {
      ...summary,
      objectName,
      operation,
      errorFile: errorSink.filePath,
      successFile: successLog?.filePath ?? null,
      durationMs: Date.now() - started,
    };
  }

  // === Query ===

  /**
   * Export the results of a SOQL query to a CSV file.
   *
   * @returns Number of rows written
   */
  async queryExport(soql: string, outputPath: string): Promise<number> {
    if (!soql.trim()) {
      throw new ConfigError('Query is empty', 'soql');
    }
    return new QueryExporter(this.deps.store, this.csv).export(soql, outputPath);
  }

  // === Enrichment ===

  async enrich(recordId: string, objectType: string, fields?: readonly string[]): Promise<boolean> {
    return this.enrichment.enrich(recordId, objectType, fields);
  }

  async enrichRecord(
    recordId: string,
    objectType: string,
    fields?: readonly string[]
  ): Promise<EnrichmentOutcome> {
    return this.enrichment.run(recordId, objectType, fields);
  }

  async enrichMany(
    recordIds: readonly string[],
    objectType: string,
    fields?: readonly string[]
  ): Promise<EnrichmentOutcome[]> {
    return this.enrichment.enrichMany(recordIds, objectType, fields);
  }
}

export interface OrgServiceOptions {
  org: Org;
  config: DataOpsConfig;
  decisions: DecisionProvider;
  /** Page loader for the scraper, node-fetch when omitted */
  fetchHtml?: FetchHtml;
}

/**
 * Build a service for an authenticated org
 */
export function createDataOpsService(options: OrgServiceOptions): DataOpsService {
  const { org, config, decisions } = options;
  setLogLevel(config.logLevel);

  const session: SessionProvider<Connection> = new OrgSessionProvider(org, config.api.version);
  const store = new SalesforceObjectStore(session, config.api.version);
  const scraper = new WebCompanyScraper({
    searchUrl: config.enrichment.searchUrl,
    userAgent: config.enrichment.userAgent,
    defaultCountry: config.enrichment.defaultCountry,
    timeoutMs: DEFAULTS.SCRAPE_TIMEOUT_MS,
    retry: config.retry,
    fetchHtml: options.fetchHtml,
  });

  return new DataOpsService({ config, store, session, decisions, scraper });
}
