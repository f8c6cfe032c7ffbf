/**
 * sf-dataops library entry point
 *
 * @example
 * import { DataOpsService, loadConfig } from 'sf-dataops';
 */

export * from './core/index.js';
export {
  loadConfig,
  parseConfig,
  getEnrichmentFields,
  type CsvEncoding,
  type DataOpsConfig,
} from './config/dataops-config.js';
export { DEFAULTS } from './config/defaults.js';
export { readCsvFile, parseCsv, type CsvOptions, type CsvTable } from './services/csv.js';
export { FieldMapper, FieldMapping } from './services/field-mapper.js';
export {
  BatchDispatcher,
  classifyResult,
  type DispatchRequest,
  type Dispatcher,
  type DispatcherOptions,
} from './services/batch-dispatcher.js';
export { ErrorSink, SuccessLog, type FailureSink, type SuccessSink } from './services/run-log.js';
export { QueryExporter, exportColumns, flattenRecord } from './services/query-exporter.js';
export { SalesforceObjectStore } from './services/salesforce.js';
export { OrgSessionProvider } from './services/org-session.js';
export {
  PromptDecisionProvider,
  ScriptedDecisionProvider,
  type ScriptedDecisions,
} from './services/decisions.js';
export * from './services/enrichment/index.js';
