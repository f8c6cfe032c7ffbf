/**
 * Query Exporter
 *
 * Runs a SOQL query and writes the results to CSV, following the
 * continuation token page by page. Columns are the union of every
 * record's fields in first-seen order. Each page is appended as soon as
 * it arrives, so a failure halfway leaves the rows already written in
 * place; a page that brings new columns rewrites the file with the wider
 * header.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { AuthError, QueryError, toError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { ObjectStore, QueryPage } from '../core/types.js';
import { formatCsvHeader, formatCsvRows, type CsvOptions } from './csv.js';

const log = createLogger('query-export');

/**
 * Flatten one query record into column → text.
 * The `attributes` metadata is dropped, parent relationship records
 * become dotted columns (Account.Name) and child subquery results are
 * kept as JSON.
 */
export function flattenRecord(record: Record<string, unknown>, prefix = ''): Record<string, string> {
  const flat: Record<string, string> = {};

  for (const [key, value] of Object.entries(record)) {
    if (key === 'attributes') continue;
    const column = prefix ? `${prefix}.${key}` : key;

    if (value === null || value === undefined) {
      flat[column] = '';
    } else if (isPlainObject(value)) {
      const children = value.records;
      if (Array.isArray(children)) {
        flat[column] = JSON.stringify(children.map((child: unknown) => stripAttributes(child)));
      } else {
        Object.assign(flat, flattenRecord(value, column));
      }
    } else if (typeof value === 'string') {
      flat[column] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      flat[column] = String(value);
    } else {
      flat[column] = JSON.stringify(value);
    }
  }

  return flat;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripAttributes(value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    if (key !== 'attributes') copy[key] = stripAttributes(nested);
  }
  return copy;
}

/**
 * Add the fields of `added` to `known`, in first-seen order. A bare
 * relationship column that is empty in every row of `rows` gives way to
 * its dotted columns (Account → Account.Name).
 */
export function exportColumns(
  known: readonly string[],
  added: ReadonlyArray<Record<string, string>>,
  rows: ReadonlyArray<Record<string, string>> = added
): string[] {
  const columns = [...known];
  const seen = new Set(known);
  for (const row of added) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  return columns.filter(
    (column) => !(columns.some((other) => other.startsWith(`${column}.`)) && rows.every((row) => !row[column]))
  );
}

function sameColumns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((column, index) => column === b[index]);
}

export class QueryExporter {
  constructor(
    private readonly store: Pick<ObjectStore, 'query' | 'queryMore'>,
    private readonly csv: CsvOptions
  ) {}

  /**
   * Export every row of `soql` to `outputPath`.
   *
   * @returns Number of rows written
   * @throws QueryError when the org rejects the query or a later page
   */
  async export(soql: string, outputPath: string): Promise<number> {
    let page = await this.fetch(soql, () => this.store.query(soql));

    await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });

    const { encoding, delimiter } = this.csv;
    const rows: Array<Record<string, string>> = [];
    let columns: string[] = [];
    let first = true;

    for (;;) {
      const pageRows = page.records.map((record) => flattenRecord(record));
      rows.push(...pageRows);
      const next = exportColumns(columns, pageRows, rows);

      if (first || !sameColumns(columns, next)) {
        if (!first) {
          log.info({ outputPath, added: next.filter((c) => !columns.includes(c)) }, 'New columns, rewriting file');
        }
        columns = next;
        const header = columns.length > 0 ? formatCsvHeader(columns, delimiter) : '';
        await fs.writeFile(outputPath, header + formatCsvRows(columns, rows, delimiter), { encoding });
      } else {
        await fs.appendFile(outputPath, formatCsvRows(columns, pageRows, delimiter), { encoding });
      }

      if (first) {
        log.info({ outputPath, rows: rows.length, totalSize: page.totalSize }, 'Wrote first page');
      } else {
        log.debug({ rows: rows.length }, 'Appended page');
      }
      first = false;

      const token = page.nextPageToken;
      if (!token) break;
      page = await this.fetch(soql, () => this.store.queryMore(token));
    }

    log.info({ outputPath, rows: rows.length }, 'Query export finished');
    return rows.length;
  }

  private async fetch(soql: string, call: () => Promise<QueryPage>): Promise<QueryPage> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof QueryError || error instanceof AuthError) throw error;
      const err = toError(error);
      log.error({ err, soql }, 'Query failed');
      throw new QueryError(err.message, soql, err);
    }
  }
}
