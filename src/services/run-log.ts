/**
 * Per-run CSV logs: the error sink (failed rows) and the success
 * playback file.
 *
 * A file is created lazily on the first record, with an exclusive open
 * so a previous run's file is never overwritten, and is only ever
 * appended to afterwards.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { format } from 'date-fns';
import { ErrorSinkError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { Operation, SourceRow } from '../core/types.js';
import type { CsvEncoding } from '../config/dataops-config.js';
import { formatCsvHeader, formatCsvRows } from './csv.js';

const log = createLogger('run-log');

export interface RunLogOptions {
  directory: string;
  /** Name of the source (file or object), used in the file name */
  sourceName: string;
  operation: Operation;
  /** Source columns, written in this order before the trailing columns */
  columns: readonly string[];
  encoding: CsvEncoding;
  delimiter: string;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Receives rows whose outcome reached terminal Failed
 */
export interface FailureSink {
  record(row: SourceRow, reason: string, operation: Operation): Promise<void>;
}

/**
 * Receives rows whose outcome reached Succeeded
 */
export interface SuccessSink {
  record(row: SourceRow, id: string | null): Promise<void>;
}

const MAX_NAME_ATTEMPTS = 1000;

class CsvRunLog {
  private filePathValue: string | null = null;
  private writes = 0;
  protected readonly now: () => Date;

  constructor(
    private readonly prefix: string,
    private readonly trailingColumns: readonly string[],
    protected readonly options: RunLogOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Path of the file, null until the first record is written
   */
  get filePath(): string | null {
    return this.filePathValue;
  }

  get count(): number {
    return this.writes;
  }

  protected async append(row: SourceRow, trailing: readonly string[]): Promise<void> {
    const filePath = this.filePathValue ?? (await this.create());
    const values: Record<string, string> = {};
    const columns = [...this.options.columns, ...this.trailingColumns];
    this.options.columns.forEach((column) => {
      values[column] = row[column] ?? '';
    });
    this.trailingColumns.forEach((column, index) => {
      values[column] = trailing[index] ?? '';
    });

    try {
      await fs.appendFile(filePath, formatCsvRows(columns, [values], this.options.delimiter), {
        encoding: this.options.encoding,
      });
      this.writes++;
    } catch (error) {
      throw new ErrorSinkError(
        `Cannot append to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        filePath,
        error instanceof Error ? error : undefined
      );
    }
  }

  private async create(): Promise<string> {
    const { directory, sourceName, operation, columns, delimiter, encoding } = this.options;
    const stamp = format(this.now(), 'yyyyMMdd_HHmmss');
    const base = `${this.prefix}_${sanitizeName(sourceName)}_${operation}_${stamp}`;
    const header = formatCsvHeader([...columns, ...this.trailingColumns], delimiter);

    try {
      await fs.mkdir(directory, { recursive: true });
    } catch (error) {
      throw new ErrorSinkError(
        `Cannot create directory ${directory}: ${error instanceof Error ? error.message : String(error)}`,
        directory,
        error instanceof Error ? error : undefined
      );
    }

    for (let n = 0; n < MAX_NAME_ATTEMPTS; n++) {
      const candidate = path.join(directory, n === 0 ? `${base}.csv` : `${base}_${n}.csv`);
      try {
        await fs.writeFile(candidate, header, { encoding, flag: 'wx' });
        this.filePathValue = candidate;
        log.info({ filePath: candidate }, 'Created run log file');
        return candidate;
      } catch (error) {
        if (isExistsError(error)) continue;
        throw new ErrorSinkError(
          `Cannot create ${candidate}: ${error instanceof Error ? error.message : String(error)}`,
          candidate,
          error instanceof Error ? error : undefined
        );
      }
    }

    throw new ErrorSinkError(`No free file name for ${base} in ${directory}`, directory);
  }
}

/**
 * Append-only failure file: source columns, then error_reason and
 * failed_at (ISO-8601).
 */
export class ErrorSink extends CsvRunLog implements FailureSink {
  constructor(options: RunLogOptions) {
    super('failed', ['error_reason', 'failed_at'], options);
  }

  async record(row: SourceRow, reason: string, operation: Operation): Promise<void> {
    if (operation !== this.options.operation) {
      log.warn({ operation, expected: this.options.operation }, 'Failure recorded for a different operation');
    }
    await this.append(row, [reason, this.now().toISOString()]);
  }
}

/**
 * Success playback file: source columns, then record_id and succeeded_at.
 */
export class SuccessLog extends CsvRunLog implements SuccessSink {
  constructor(options: RunLogOptions) {
    super('success', ['record_id', 'succeeded_at'], options);
  }

  async record(row: SourceRow, id: string | null): Promise<void> {
    await this.append(row, [id ?? '', this.now().toISOString()]);
  }
}

function sanitizeName(name: string): string {
  return path.parse(name).name.replace(/[^A-Za-z0-9._-]+/g, '_');
}

function isExistsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}
