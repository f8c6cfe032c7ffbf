/**
 * Enrichment Pipeline
 *
 * fetch record → scrape candidates → diff against the allow-list →
 * confirm once → single-record update. Nothing is written unless the
 * decision provider confirms the whole diff.
 */

import {
  ConfigError,
  NotFoundError,
  QueryError,
  ScrapeError,
  isDataOpsError,
  toError,
} from '../../core/errors.js';
import { createLogger } from '../../core/logger.js';
import type {
  CompanyScraper,
  DecisionProvider,
  EnrichmentCandidate,
  EnrichmentOutcome,
  EnrichmentStatus,
  FieldChange,
  ObjectStore,
  SourceRow,
} from '../../core/types.js';
import { getEnrichmentFields, type DataOpsConfig } from '../../config/dataops-config.js';
import type { Dispatcher } from '../batch-dispatcher.js';
import { FieldMapping } from '../field-mapper.js';
import { flattenRecord } from '../query-exporter.js';
import type { FailureSink } from '../run-log.js';

const log = createLogger('enrichment');

const RECORD_ID = /^[a-zA-Z0-9]{15}(?:[a-zA-Z0-9]{3})?$/;
const API_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;

export interface EnrichmentDependencies {
  store: Pick<ObjectStore, 'query'>;
  dispatcher: Dispatcher;
  scraper: CompanyScraper;
  decisions: DecisionProvider;
  config: DataOpsConfig;
}

/**
 * Allowed fields whose proposed value is non-empty and differs from the
 * current one, in allow-list order
 */
export function computeDiff(candidate: EnrichmentCandidate): FieldChange[] {
  const changes: FieldChange[] = [];
  for (const field of candidate.allowedFields) {
    const proposed = lookup(candidate.proposedValues, field);
    if (!proposed) continue;
    const current = lookup(candidate.currentValues, field);
    if (proposed !== current) {
      changes.push({ field, current, proposed });
    }
  }
  return changes;
}

/**
 * Field lookup ignoring case
 */
function lookup(values: Readonly<Record<string, string>>, field: string): string {
  const exact = values[field];
  if (exact !== undefined) return exact;
  const wanted = field.toLowerCase();
  for (const [key, value] of Object.entries(values)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return '';
}

function toOutcome(
  recordId: string,
  objectType: string,
  status: EnrichmentStatus,
  changes: FieldChange[],
  message?: string
): EnrichmentOutcome {
  return {
    recordId,
    objectType,
    applied: status === 'applied',
    status,
    changes,
    ...(message !== undefined ? { message } : {}),
  };
}

/**
 * Keeps the reason of the last failure reported by the dispatcher
 */
class LastFailure implements FailureSink {
  reason: string | null = null;

  async record(_row: SourceRow, reason: string): Promise<void> {
    this.reason = reason;
  }
}

export class EnrichmentPipeline {
  constructor(private readonly deps: EnrichmentDependencies) {}

  /**
   * Enrich one record.
   *
   * @returns true when the update was confirmed and succeeded
   * @throws ConfigError when no allow-list exists or an identifier is invalid
   * @throws NotFoundError when the record does not exist
   */
  async enrich(recordId: string, objectType: string, fields?: readonly string[]): Promise<boolean> {
    const outcome = await this.run(recordId, objectType, fields);
    return outcome.applied;
  }

  /**
   * Enrich one record and report what happened
   */
  async run(
    recordId: string,
    objectType: string,
    fields?: readonly string[]
  ): Promise<EnrichmentOutcome> {
    const allowed = this.resolveFields(recordId, objectType, fields);
    const record = await this.fetchRecord(recordId, objectType, allowed);
    const recordName = lookup(record, 'Name').trim();
    log.info({ recordId, objectType, recordName }, 'Found record');

    const outcome = (status: EnrichmentStatus, changes: FieldChange[] = [], message?: string) =>
      toOutcome(recordId, objectType, status, changes, message);

    let proposed: Record<string, string>;
    try {
      const website = lookup(record, 'Website');
      proposed = await this.deps.scraper.scrape({
        searchKey: recordName,
        objectType,
        fields: allowed,
        ...(website ? { website } : {}),
      });
    } catch (error) {
      if (error instanceof ScrapeError) {
        log.warn({ recordId, searchKey: error.searchKey, reason: error.message }, 'Scrape failed');
        return outcome('scrape-failed', [], error.message);
      }
      throw error;
    }

    const allowedKeys = new Set(allowed.map((field) => field.toLowerCase()));
    const candidate: EnrichmentCandidate = {
      recordId,
      objectType,
      currentValues: record,
      proposedValues: Object.fromEntries(
        Object.entries(proposed).filter(([field]) => allowedKeys.has(field.toLowerCase()))
      ),
      allowedFields: new Set(allowed),
    };

    const changes = computeDiff(candidate);
    if (changes.length === 0) {
      log.info({ recordId }, 'No changes to apply');
      return outcome('no-changes');
    }

    const confirmed = await this.deps.decisions.confirm(changes, {
      recordId,
      objectType,
      recordName,
    });
    if (!confirmed) {
      log.info({ recordId, changes: changes.length }, 'Changes declined');
      return outcome('declined', changes);
    }

    const row: Record<string, string> = { Id: recordId };
    for (const change of changes) {
      row[change.field] = change.proposed;
    }

    const failure = new LastFailure();
    const summary = await this.deps.dispatcher.dispatch({
      objectName: objectType,
      operation: 'update',
      rows: [row],
      mapping: FieldMapping.identity(Object.keys(row)),
      batchSize: 1,
      errorSink: failure,
    });

    if (summary.succeeded === 1) {
      log.info({ recordId, objectType, fields: changes.map((c) => c.field) }, 'Record enriched');
      return outcome('applied', changes);
    }

    log.error({ recordId, reason: failure.reason }, 'Update failed');
    return outcome('update-failed', changes, failure.reason ?? 'Update failed');
  }

  /**
   * Enrich several records one after another. A missing record or a
   * failed scrape only affects that record. Every id is checked before
   * the first record is touched.
   */
  async enrichMany(
    recordIds: readonly string[],
    objectType: string,
    fields?: readonly string[]
  ): Promise<EnrichmentOutcome[]> {
    const invalid = recordIds.filter((recordId) => !RECORD_ID.test(recordId));
    if (invalid.length > 0) {
      throw new ConfigError(`Invalid record id(s): ${invalid.join(', ')}`, 'recordId');
    }

    const outcomes: EnrichmentOutcome[] = [];
    for (const recordId of recordIds) {
      try {
        outcomes.push(await this.run(recordId, objectType, fields));
      } catch (error) {
        if (error instanceof NotFoundError) {
          log.warn({ recordId, objectType }, 'Record not found, skipping');
          outcomes.push(toOutcome(recordId, objectType, 'not-found', [], error.message));
        } else if (error instanceof ScrapeError) {
          outcomes.push(toOutcome(recordId, objectType, 'scrape-failed', [], error.message));
        } else {
          throw error;
        }
      }
    }
    return outcomes;
  }

  private resolveFields(recordId: string, objectType: string, fields?: readonly string[]): string[] {
    if (!API_NAME.test(objectType)) {
      throw new ConfigError(`Invalid object type '${objectType}'`, 'objectType');
    }
    if (!RECORD_ID.test(recordId)) {
      throw new ConfigError(`Invalid record id '${recordId}'`, 'recordId');
    }

    const allowed =
      fields && fields.length > 0 ? fields : getEnrichmentFields(this.deps.config, objectType);
    if (!allowed || allowed.length === 0) {
      throw new ConfigError(
        `No enrichable fields configured for ${objectType}`,
        `enrichment.fields.${objectType}`
      );
    }

    const invalid = allowed.filter((field) => !API_NAME.test(field));
    if (invalid.length > 0) {
      throw new ConfigError(`Invalid field name(s): ${invalid.join(', ')}`, 'fields');
    }
    return [...new Set(allowed)];
  }

  private async fetchRecord(
    recordId: string,
    objectType: string,
    fields: readonly string[]
  ): Promise<Record<string, string>> {
    const selected = ['Id', 'Name'];
    for (const field of fields) {
      if (!selected.some((s) => s.toLowerCase() === field.toLowerCase())) {
        selected.push(field);
      }
    }
    const soql = `SELECT ${selected.join(', ')} FROM ${objectType} WHERE Id = '${recordId}' LIMIT 1`;

    let records: Array<Record<string, unknown>>;
    try {
      records = (await this.deps.store.query(soql)).records;
    } catch (error) {
      if (isDataOpsError(error)) throw error;
      const err = toError(error);
      throw new QueryError(err.message, soql, err);
    }

    const [record] = records;
    if (!record) {
      throw new NotFoundError(objectType, recordId);
    }
    return flattenRecord(record);
  }
}
