/**
 * Core module exports
 */

export * from './types.js';
export * from './errors.js';
export * from './concurrency.js';
export {
  DataOpsService,
  createDataOpsService,
  type DataOpsServiceDependencies,
  type OrgServiceOptions,
  type SyncOptions,
} from './api-service.js';
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
