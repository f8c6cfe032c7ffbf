/**
 * Centralized Logger Service
 *
 * Provides structured logging using pino. Uses pino-pretty for
 * interactive use and JSON output for production and tests.
 *
 * Usage:
 *   import { createLogger } from './logger.js';
 *   const log = createLogger('dispatch');
 *   log.info({ chunk: 2, size: 200 }, 'Submitting chunk');
 *   log.error({ err }, 'Chunk failed');
 */

import pino, { type Logger as PinoLogger } from 'pino';

const env = process.env.NODE_ENV;
const level = process.env.SF_DATAOPS_LOG_LEVEL || 'warn';
const isPretty = env !== 'production' && env !== 'test';

/**
 * Root logger instance
 */
export const logger = pino({
  name: 'sf-dataops',
  level,
  ...(isPretty && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// pino children copy the parent level when created
const children: PinoLogger[] = [];

/**
 * Create a child logger with a namespace
 *
 * @param namespace - The namespace for this logger (e.g., 'dispatch', 'salesforce', 'enrichment')
 *
 * @example
 * const log = createLogger('error-sink');
 * log.info({ filePath }, 'Created error file');
 */
export function createLogger(namespace: string) {
  const child = logger.child({ namespace });
  children.push(child);
  return child;
}

/**
 * Apply the configured level once the configuration has been loaded.
 * An explicit SF_DATAOPS_LOG_LEVEL always wins.
 */
export function setLogLevel(configured: string): void {
  if (!process.env.SF_DATAOPS_LOG_LEVEL) {
    logger.level = configured;
    for (const child of children) {
      child.level = configured;
    }
  }
}

/**
 * Re-export pino types for convenience
 */
export type { Logger } from 'pino';
