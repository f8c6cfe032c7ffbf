import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { QueryExporter, exportColumns, flattenRecord } from './query-exporter.js';
import { readCsvFile, type CsvOptions } from './csv.js';
import { QueryError } from '../core/errors.js';
import { InMemoryObjectStore } from '../../tests/support/in-memory-store.js';
import { makeTempDir, removeDir } from '../../tests/support/fixtures.js';

const csv: CsvOptions = { encoding: 'utf-8', delimiter: ',' };
const SOQL = 'SELECT Id, Name FROM Account';

function account(n: number): Record<string, unknown> {
  return {
    attributes: { type: 'Account', url: `/services/data/v62.0/sobjects/Account/001${n}` },
    Id: `001${String(n).padStart(15, '0')}`,
    Name: `Account ${n}`,
  };
}

describe('flattenRecord', () => {
  it('drops attributes and turns parent records into dotted columns', () => {
    const record = {
      attributes: { type: 'Contact' },
      Id: '003000000000001AAA',
      Account: { attributes: { type: 'Account' }, Name: 'Acme', Owner: { Alias: 'jdoe' } },
    };

    expect(flattenRecord(record)).toEqual({
      Id: '003000000000001AAA',
      'Account.Name': 'Acme',
      'Account.Owner.Alias': 'jdoe',
    });
  });

  it('renders null, numbers and booleans as text', () => {
    expect(flattenRecord({ Phone: null, NumberOfEmployees: 250, IsDeleted: false })).toEqual({
      Phone: '',
      NumberOfEmployees: '250',
      IsDeleted: 'false',
    });
  });

  it('keeps child subquery results as JSON without attributes', () => {
    const record = {
      Name: 'Acme',
      Contacts: {
        totalSize: 1,
        done: true,
        records: [{ attributes: { type: 'Contact' }, LastName: 'Doe' }],
      },
    };

    expect(flattenRecord(record)).toEqual({ Name: 'Acme', Contacts: '[{"LastName":"Doe"}]' });
  });
});

describe('exportColumns', () => {
  it('takes the union of fields in first-seen order', () => {
    expect(exportColumns([], [{ Id: '1' }, { Id: '2', Phone: '555' }, { Name: 'Acme', Id: '3' }])).toEqual([
      'Id',
      'Phone',
      'Name',
    ]);
  });

  it('replaces an empty parent column with its dotted columns', () => {
    const rows: Array<Record<string, string>> = [
      { Id: '003A', Account: '' },
      { Id: '003B', 'Account.Name': 'Acme' },
    ];

    expect(exportColumns([], rows)).toEqual(['Id', 'Account.Name']);
  });

  it('keeps a parent column that holds a value', () => {
    const rows: Array<Record<string, string>> = [{ Account: 'x' }, { 'Account.Name': 'Acme' }];

    expect(exportColumns([], rows)).toEqual(['Account', 'Account.Name']);
  });

  it('extends known columns without reordering them', () => {
    expect(exportColumns(['Name', 'Id'], [{ Id: '1', City: 'Springfield' }])).toEqual(['Name', 'Id', 'City']);
  });
});

describe('QueryExporter', () => {
  let dir: string;
  let store: InMemoryObjectStore;
  let exporter: QueryExporter;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new InMemoryObjectStore();
    exporter = new QueryExporter(store, csv);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('follows the continuation token and writes every page', async () => {
    store.pages.set(SOQL, { records: [account(1), account(2)], totalSize: 5, nextPageToken: 'page-2' });
    store.pages.set('page-2', { records: [account(3), account(4)], totalSize: 5, nextPageToken: 'page-3' });
    store.pages.set('page-3', { records: [account(5)], totalSize: 5 });
    const output = path.join(dir, 'out', 'accounts.csv');

    const count = await exporter.export(SOQL, output);

    expect(count).toBe(5);
    expect(store.queries).toEqual([SOQL, 'page-2', 'page-3']);
    const table = await readCsvFile(output, csv);
    expect(table.columns).toEqual(['Id', 'Name']);
    expect(table.rows.map((row) => row.Name)).toEqual([
      'Account 1',
      'Account 2',
      'Account 3',
      'Account 4',
      'Account 5',
    ]);
  });

  it('writes the exact file content', async () => {
    store.pages.set(SOQL, { records: [{ Id: '001A', Name: 'Acme, Inc.' }], totalSize: 1 });
    const output = path.join(dir, 'one.csv');

    await exporter.export(SOQL, output);

    expect(await fs.readFile(output, 'utf-8')).toBe('Id,Name\n001A,"Acme, Inc."\n');
  });

  it('writes an empty file for a query with no rows', async () => {
    store.pages.set(SOQL, { records: [], totalSize: 0 });
    const output = path.join(dir, 'empty.csv');

    expect(await exporter.export(SOQL, output)).toBe(0);
    expect(await fs.readFile(output, 'utf-8')).toBe('');
  });

  it('wraps a rejected query in QueryError', async () => {
    store.queryError = new Error("MALFORMED_QUERY: unexpected token: 'FORM'");

    const result = exporter.export('SELECT Id FORM Account', path.join(dir, 'bad.csv'));

    await expect(result).rejects.toBeInstanceOf(QueryError);
    await expect(result).rejects.toMatchObject({ query: 'SELECT Id FORM Account' });
  });

  it('keeps the rows already written when a later page fails', async () => {
    store.pages.set(SOQL, { records: [account(1), account(2)], totalSize: 4, nextPageToken: 'gone' });
    const output = path.join(dir, 'partial.csv');

    await expect(exporter.export(SOQL, output)).rejects.toBeInstanceOf(QueryError);

    const table = await readCsvFile(output, csv);
    expect(table.rows).toHaveLength(2);
  });

  it('exports parent fields when the first record has no parent', async () => {
    const contactSoql = 'SELECT Id, Account.Name FROM Contact';
    store.pages.set(contactSoql, {
      records: [
        { attributes: { type: 'Contact' }, Id: '003A', Account: null },
        { attributes: { type: 'Contact' }, Id: '003B', Account: { attributes: { type: 'Account' }, Name: 'Acme' } },
      ],
      totalSize: 2,
    });
    const output = path.join(dir, 'contacts.csv');

    await exporter.export(contactSoql, output);

    expect(await fs.readFile(output, 'utf-8')).toBe('Id,Account.Name\n003A,\n003B,Acme\n');
  });

  it('rewrites the file when a later page brings new columns', async () => {
    const contactSoql = 'SELECT Id, Account.Name FROM Contact';
    store.pages.set(contactSoql, {
      records: [{ Id: '003A', Account: null }],
      totalSize: 2,
      nextPageToken: 'page-2',
    });
    store.pages.set('page-2', { records: [{ Id: '003B', Account: { Name: 'Acme' } }], totalSize: 2 });
    const output = path.join(dir, 'contacts.csv');

    expect(await exporter.export(contactSoql, output)).toBe(2);
    expect(await fs.readFile(output, 'utf-8')).toBe('Id,Account.Name\n003A,\n003B,Acme\n');
  });

  it('keeps rows whose only value is null', async () => {
    const phoneSoql = 'SELECT Phone FROM Account';
    store.pages.set(phoneSoql, { records: [{ Phone: '1' }], totalSize: 3, nextPageToken: 'page-2' });
    store.pages.set('page-2', { records: [{ Phone: null }], totalSize: 3, nextPageToken: 'page-3' });
    store.pages.set('page-3', { records: [{ Phone: '3' }], totalSize: 3 });
    const output = path.join(dir, 'phones.csv');

    expect(await exporter.export(phoneSoql, output)).toBe(3);

    const table = await readCsvFile(output, csv);
    expect(table.rows).toEqual([{ Phone: '1' }, { Phone: '' }, { Phone: '3' }]);
  });
});
