/**
 * CSV reading and writing on top of papaparse.
 */

import * as fs from 'node:fs/promises';
import Papa from 'papaparse';
import { CsvError } from '../core/errors.js';
import type { SourceRow } from '../core/types.js';
import type { CsvEncoding } from '../config/dataops-config.js';

export interface CsvOptions {
  encoding: CsvEncoding;
  delimiter: string;
}

export interface CsvTable {
  /** Header columns in file order */
  columns: string[];
  rows: SourceRow[];
}

/**
 * Read a CSV file with a header row. Blank lines are skipped; cells
 * missing from short rows read as ''.
 */
export async function readCsvFile(filePath: string, options: CsvOptions): Promise<CsvTable> {
  let text: string;
  try {
    text = await fs.readFile(filePath, { encoding: options.encoding });
  } catch (error) {
    throw new CsvError(
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  return parseCsv(text.replace(/^\uFEFF/, ''), options.delimiter, filePath);
}

/**
 * Parse CSV text with a header row. Blank lines are skipped; a quoted
 * empty line ("") is a row of empty cells. Repeated header names get a
 * _1, _2 ... suffix.
 */
export function parseCsv(text: string, delimiter: string, source = '<input>'): CsvTable {
  const parsed = Papa.parse<string[]>(text, { delimiter, skipEmptyLines: false });

  const fatal = parsed.errors.find((e) => e.type === 'Quotes' || e.type === 'Delimiter');
  if (fatal) {
    const where = fatal.row !== undefined ? ` (row ${fatal.row + 1})` : '';
    throw new CsvError(`Malformed CSV in ${source}${where}: ${fatal.message}`, source);
  }

  const blank = blankRecords(text, parsed.meta.linebreak || '\n', delimiter);
  const [header, ...body] = parsed.data.filter((_, index) => !blank.has(index));
  if (!header || header.every((cell) => cell.trim() === '')) {
    throw new CsvError(`No header row found in ${source}`, source);
  }

  const columns = uniqueColumns(header);
  const rows = body.map((values) => {
    const row: Record<string, string> = {};
    columns.forEach((column, index) => {
      row[column] = values[index] ?? '';
    });
    return row;
  });

  return { columns, rows };
}

/**
 * Indexes of the records that are blank lines. Quoted cells are skipped
 * the way papaparse reads them, so the indexes line up with its rows.
 */
function blankRecords(text: string, linebreak: string, delimiter: string): Set<number> {
  const blank = new Set<number>();
  let record = 0;
  let empty = true;
  let fieldStart = true;
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          i++;
        } else {
          quoted = false;
        }
      }
      continue;
    }

    if (text.startsWith(linebreak, i)) {
      if (empty) blank.add(record);
      record++;
      empty = true;
      fieldStart = true;
      i += linebreak.length - 1;
      continue;
    }

    if (ch === '"' && fieldStart) {
      quoted = true;
    }
    if (ch.trim() !== '') {
      empty = false;
    }
    fieldStart = ch === delimiter;
  }

  if (empty) blank.add(record);
  return blank;
}

function uniqueColumns(header: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((name) => {
    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);
    return count === 0 ? name : `${name}_${count}`;
  });
}

/**
 * Format rows as CSV lines (no header), each terminated by '\n'.
 * A row of empty cells is written quoted so it reads back as a row.
 */
export function formatCsvRows(
  columns: readonly string[],
  rows: ReadonlyArray<Record<string, string>>,
  delimiter: string
): string {
  return rows
    .map((row) => {
      const values = columns.map((column) => row[column] ?? '');
      const quotes = values.every((value) => value === '');
      return Papa.unparse([values], { delimiter, newline: '\n', quotes }) + '\n';
    })
    .join('');
}

/**
 * Format the header line, terminated by '\n'
 */
export function formatCsvHeader(columns: readonly string[], delimiter: string): string {
  return Papa.unparse([[...columns]], { delimiter, newline: '\n' }) + '\n';
}
