import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getEnrichmentFields, loadConfig, parseConfig } from './dataops-config.js';
import { ConfigError } from '../core/errors.js';
import { makeTempDir, removeDir } from '../../tests/support/fixtures.js';

describe('parseConfig', () => {
  it('fills in every default', () => {
    const config = parseConfig({});

    expect(config.api).toEqual({ version: '60.0', batchSize: 200, timeout: 30 });
    expect(config.csv).toEqual({
      encoding: 'utf-8',
      delimiter: ',',
      errorDirectory: 'errors',
      resultsDirectory: 'results',
      writeSuccessFile: true,
    });
    expect(config.retry).toEqual({ attempts: 3, delayMs: 1000, backoffMultiplier: 2, maxDelayMs: 30000 });
    expect(config.enrichment.defaultCountry).toBe('United States');
    expect(config.logLevel).toBe('warn');
  });

  it('returns a deeply frozen value', () => {
    const config = parseConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.api)).toBe(true);
    expect(Object.isFrozen(config.enrichment.fields.Account)).toBe(true);
  });

  it('replaces the allow-list only for the object types it names', () => {
    const config = parseConfig({ enrichment: { fields: { Account: ['Phone'], Partner__c: ['Website'] } } });

    expect(getEnrichmentFields(config, 'Account')).toEqual(['Phone']);
    expect(getEnrichmentFields(config, 'Partner__c')).toEqual(['Website']);
    expect(getEnrichmentFields(config, 'Lead')).toEqual([
      'Phone',
      'Email',
      'Street',
      'City',
      'State',
      'PostalCode',
      'Country',
    ]);
    expect(getEnrichmentFields(config, 'Opportunity')).toBeUndefined();
  });

  it('rejects a batch size above the API limit', () => {
    expect(() => parseConfig({ api: { batchSize: 500 } })).toThrow(ConfigError);
    expect(() => parseConfig({ api: { batchSize: 500 } })).toThrow(/api\.batchSize/);
  });

  it('rejects a search URL without the query placeholder', () => {
    expect(() => parseConfig({ enrichment: { searchUrl: 'https://search.example.com/' } })).toThrow(
      /enrichment\.searchUrl/
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reads and validates a JSON file', async () => {
    const file = path.join(dir, 'config.json');
    await fs.writeFile(file, JSON.stringify({ api: { batchSize: 50 }, csv: { delimiter: ';' } }));

    const config = loadConfig(file);

    expect(config.api.batchSize).toBe(50);
    expect(config.csv.delimiter).toBe(';');
    expect(config.api.version).toBe('60.0');
  });

  it('fails when an explicit path does not exist', () => {
    expect(() => loadConfig(path.join(dir, 'missing.json'))).toThrow(ConfigError);
  });

  it('fails on malformed JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ "api": ');

    expect(() => loadConfig(file)).toThrow(/Could not parse config file/);
  });
});
