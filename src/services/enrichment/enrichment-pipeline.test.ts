import { describe, it, expect, beforeEach } from 'vitest';
import { EnrichmentPipeline, computeDiff } from './enrichment-pipeline.js';
import { BatchDispatcher } from '../batch-dispatcher.js';
import { ScriptedDecisionProvider } from '../decisions.js';
import { ConfigError, NotFoundError, ScrapeError } from '../../core/errors.js';
import type { CompanyScraper, ObjectStore, QueryPage, ScrapeQuery } from '../../core/types.js';
import { parseConfig } from '../../config/dataops-config.js';
import { InMemoryObjectStore, permanent } from '../../../tests/support/in-memory-store.js';
import { FakeSessionProvider } from '../../../tests/support/fake-session.js';
import { noDelay } from '../../../tests/support/fixtures.js';

const ACME_ID = '001000000000001AAA';

class RecordLookup implements Pick<ObjectStore, 'query'> {
  readonly queries: string[] = [];

  constructor(private readonly records: Record<string, Record<string, unknown>>) {}

  async query(soql: string): Promise<QueryPage> {
    this.queries.push(soql);
    const id = /WHERE Id = '([^']+)'/.exec(soql)?.[1] ?? '';
    const record = this.records[id];
    return { records: record ? [record] : [], totalSize: record ? 1 : 0 };
  }
}

class FakeScraper implements CompanyScraper {
  readonly queries: ScrapeQuery[] = [];

  constructor(private readonly result: Record<string, string> | ScrapeError) {}

  async scrape(query: ScrapeQuery): Promise<Record<string, string>> {
    this.queries.push(query);
    if (this.result instanceof ScrapeError) throw this.result;
    return this.result;
  }
}

describe('computeDiff', () => {
  it('lists allowed fields with a new non-empty value, in allow-list order', () => {
    const changes = computeDiff({
      recordId: ACME_ID,
      objectType: 'Account',
      currentValues: { Phone: '', Website: 'https://acme.com', BillingCity: 'Boston' },
      proposedValues: { BillingCity: 'Springfield', Website: 'https://acme.com', Phone: '555-0100', Fax: '' },
      allowedFields: new Set(['Phone', 'Website', 'BillingCity', 'Fax']),
    });

    expect(changes).toEqual([
      { field: 'Phone', current: '', proposed: '555-0100' },
      { field: 'BillingCity', current: 'Boston', proposed: 'Springfield' },
    ]);
  });
});

describe('EnrichmentPipeline', () => {
  const config = parseConfig({});
  let writes: InMemoryObjectStore;
  let lookup: RecordLookup;

  function pipeline(scraper: CompanyScraper, decisions: ScriptedDecisionProvider): EnrichmentPipeline {
    return new EnrichmentPipeline({
      store: lookup,
      dispatcher: new BatchDispatcher(writes, new FakeSessionProvider(), noDelay),
      scraper,
      decisions,
      config,
    });
  }

  beforeEach(() => {
    writes = new InMemoryObjectStore();
    lookup = new RecordLookup({
      [ACME_ID]: {
        attributes: { type: 'Account' },
        Id: ACME_ID,
        Name: 'Acme Widgets',
        Phone: null,
        Website: 'acmewidgets.com',
      },
    });
  });

  it('writes nothing when the diff is declined', async () => {
    const decisions = new ScriptedDecisionProvider({ confirm: false });

    const outcome = await pipeline(new FakeScraper({ Phone: '555-0100' }), decisions).run(ACME_ID, 'Account', [
      'Phone',
    ]);

    expect(outcome).toEqual({
      recordId: ACME_ID,
      objectType: 'Account',
      applied: false,
      status: 'declined',
      changes: [{ field: 'Phone', current: '', proposed: '555-0100' }],
    });
    expect(writes.calls).toHaveLength(0);
    expect(decisions.confirmations).toHaveLength(1);
  });

  it('sends one single-record update when confirmed', async () => {
    const decisions = new ScriptedDecisionProvider({ confirm: true });

    const applied = await pipeline(new FakeScraper({ Phone: '555-0100' }), decisions).enrich(ACME_ID, 'Account', [
      'Phone',
    ]);

    expect(applied).toBe(true);
    expect(writes.calls).toEqual([
      { method: 'update', objectName: 'Account', records: [{ Id: ACME_ID, Phone: '555-0100' }] },
    ]);
    expect(lookup.queries).toEqual([`SELECT Id, Name, Phone FROM Account WHERE Id = '${ACME_ID}' LIMIT 1`]);
    expect(decisions.confirmations[0].context).toEqual({
      recordId: ACME_ID,
      objectType: 'Account',
      recordName: 'Acme Widgets',
    });
  });

  it('passes the record name and website to the scraper', async () => {
    const scraper = new FakeScraper({ Phone: '555-0100' });

    await pipeline(scraper, new ScriptedDecisionProvider()).run(ACME_ID, 'Account', ['Phone', 'Website']);

    expect(scraper.queries).toEqual([
      { searchKey: 'Acme Widgets', objectType: 'Account', fields: ['Phone', 'Website'], website: 'acmewidgets.com' },
    ]);
  });

  it('never proposes fields outside the allow-list', async () => {
    const decisions = new ScriptedDecisionProvider({ confirm: true });
    const scraper = new FakeScraper({ Phone: '555-0100', Description: 'Makes widgets' });

    await pipeline(scraper, decisions).run(ACME_ID, 'Account', ['Phone']);

    expect(decisions.confirmations[0].changes.map((c) => c.field)).toEqual(['Phone']);
    expect(writes.calls[0].records).toEqual([{ Id: ACME_ID, Phone: '555-0100' }]);
  });

  it('uses the configured allow-list when no fields are given', async () => {
    const decisions = new ScriptedDecisionProvider({ confirm: false });

    await pipeline(new FakeScraper({ Phone: '555-0100' }), decisions).run(ACME_ID, 'Account');

    expect(lookup.queries[0]).toBe(
      'SELECT Id, Name, Phone, Website, BillingStreet, BillingCity, BillingState, BillingPostalCode, ' +
        `BillingCountry FROM Account WHERE Id = '${ACME_ID}' LIMIT 1`
    );
  });

  it('reports no changes without asking', async () => {
    const decisions = new ScriptedDecisionProvider({ confirm: true });

    const outcome = await pipeline(new FakeScraper({ Website: 'acmewidgets.com' }), decisions).run(
      ACME_ID,
      'Account',
      ['Website']
    );

    expect(outcome.status).toBe('no-changes');
    expect(decisions.confirmations).toHaveLength(0);
    expect(writes.calls).toHaveLength(0);
  });

  it('reports a failed scrape', async () => {
    const scraper = new FakeScraper(new ScrapeError("Could not find a website for 'Acme Widgets'", 'Acme Widgets'));

    const outcome = await pipeline(scraper, new ScriptedDecisionProvider()).run(ACME_ID, 'Account', ['Phone']);

    expect(outcome).toMatchObject({
      status: 'scrape-failed',
      applied: false,
      message: "Could not find a website for 'Acme Widgets'",
    });
  });

  it('reports the reason of a rejected update', async () => {
    writes.script = () => permanent('Phone format is invalid');
    const decisions = new ScriptedDecisionProvider({ confirm: true });

    const outcome = await pipeline(new FakeScraper({ Phone: '555-0100' }), decisions).run(ACME_ID, 'Account', [
      'Phone',
    ]);

    expect(outcome).toMatchObject({
      status: 'update-failed',
      applied: false,
      message: 'FIELD_CUSTOM_VALIDATION_EXCEPTION: Phone format is invalid',
    });
  });

  it('throws NotFoundError for a missing record', async () => {
    await expect(
      pipeline(new FakeScraper({}), new ScriptedDecisionProvider()).run('001000000000404AAA', 'Account', ['Phone'])
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('throws ConfigError for an object type without an allow-list', async () => {
    await expect(
      pipeline(new FakeScraper({}), new ScriptedDecisionProvider()).run(ACME_ID, 'Opportunity')
    ).rejects.toBeInstanceOf(ConfigError);
    expect(lookup.queries).toHaveLength(0);
  });

  it('throws ConfigError for an invalid record id', async () => {
    await expect(
      pipeline(new FakeScraper({}), new ScriptedDecisionProvider()).run("001' OR Id != '", 'Account', ['Phone'])
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('keeps going past a missing record in a batch', async () => {
    const decisions = new ScriptedDecisionProvider({ confirm: true });

    const outcomes = await pipeline(new FakeScraper({ Phone: '555-0100' }), decisions).enrichMany(
      ['001000000000404AAA', ACME_ID],
      'Account',
      ['Phone']
    );

    expect(outcomes.map((o) => o.status)).toEqual(['not-found', 'applied']);
    expect(writes.calls).toHaveLength(1);
  });

  it('rejects a batch with a malformed id before updating any record', async () => {
    const decisions = new ScriptedDecisionProvider({ confirm: true });

    const result = pipeline(new FakeScraper({ Phone: '555-0100' }), decisions).enrichMany(
      [ACME_ID, 'bad-id', '001000000000002AAA'],
      'Account',
      ['Phone']
    );

    await expect(result).rejects.toBeInstanceOf(ConfigError);
    await expect(result).rejects.toThrow('Invalid record id(s): bad-id');
    expect(writes.calls).toHaveLength(0);
  });
});
