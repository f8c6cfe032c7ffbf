/**
 * Batch Dispatcher
 *
 * Sends mapped rows to the org in bounded chunks, one chunk at a time.
 * Per-record outcomes are classified as succeeded, retrying (transient)
 * or failed (permanent or out of attempts). Transient records are
 * resubmitted as a smaller chunk with exponential backoff; every failed
 * record goes to the error sink. A failing record never stops the run.
 *
 * Record states: pending → in flight → succeeded | retrying → in flight | failed
 */

import {
  backoffDelay,
  chunk,
  isTransientStatusCode,
  sleep,
  withTimeout,
  type BackoffOptions,
} from '../core/concurrency.js';
import { ConfigError, toError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import {
  isOperation,
  type DispatchProgress,
  type DispatchSummary,
  type ObjectStore,
  type Operation,
  type RecordPayload,
  type SessionProvider,
  type SourceRow,
  type StoreRecordResult,
} from '../core/types.js';
import { DEFAULTS } from '../config/defaults.js';
import type { FieldMapping } from './field-mapper.js';
import type { FailureSink, SuccessSink } from './run-log.js';

const log = createLogger('dispatch');

export interface DispatchRequest {
  objectName: string;
  operation: Operation;
  rows: readonly SourceRow[];
  mapping: FieldMapping;
  batchSize: number;
  /** Required for upsert, ignored otherwise */
  externalIdField?: string;
  errorSink: FailureSink;
  successSink?: SuccessSink;
  /** Aborting stops the run at the next chunk boundary */
  signal?: AbortSignal;
  onProgress?: (progress: DispatchProgress) => void;
}

export interface DispatcherOptions {
  retry: BackoffOptions & { attempts: number };
  /** Timeout for one store call in milliseconds, 0 disables it */
  timeoutMs: number;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Something that can run a dispatch request; the enrichment pipeline
 * depends on this rather than on the class.
 */
export interface Dispatcher {
  dispatch(request: DispatchRequest): Promise<DispatchSummary>;
}

interface PendingRecord {
  /** Position in the source rows */
  index: number;
  row: SourceRow;
  payload: RecordPayload;
}

/**
 * A chunk ready for submission. The external id field exists exactly
 * when the operation is upsert.
 */
export type Batch =
  | { operation: Exclude<Operation, 'upsert'>; records: PendingRecord[]; maxSize: number }
  | { operation: 'upsert'; externalIdField: string; records: PendingRecord[]; maxSize: number };

export type RecordOutcome =
  | { kind: 'succeeded'; id: string | null }
  | { kind: 'retrying'; reason: string }
  | { kind: 'failed'; reason: string };

/**
 * Turn a store result into an outcome. Any transient status code among
 * the errors makes the record retryable.
 */
export function classifyResult(result: StoreRecordResult | undefined): RecordOutcome {
  if (!result) {
    return { kind: 'failed', reason: 'NO_RESULT: the org returned no result for this record' };
  }
  if (result.success) {
    return { kind: 'succeeded', id: result.id ?? null };
  }

  const reason = formatStoreErrors(result);
  const transient = result.errors.some((e) => isTransientStatusCode(e.statusCode));
  return transient ? { kind: 'retrying', reason } : { kind: 'failed', reason };
}

function formatStoreErrors(result: StoreRecordResult): string {
  if (result.errors.length === 0) {
    return 'UNKNOWN_ERROR: the org reported a failure without details';
  }
  return result.errors
    .map((e) => {
      const fields = e.fields && e.fields.length > 0 ? ` [${e.fields.join(', ')}]` : '';
      return `${e.statusCode}: ${e.message}${fields}`;
    })
    .join('; ');
}

/**
 * Payload lookup ignoring case, as Salesforce does for field names
 */
function payloadValue(payload: RecordPayload, field: string): string {
  const wanted = field.toLowerCase();
  for (const [key, value] of Object.entries(payload)) {
    if (key.toLowerCase() === wanted) {
      return value ?? '';
    }
  }
  return '';
}

export class BatchDispatcher implements Dispatcher {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly store: ObjectStore,
    private readonly session: Pick<SessionProvider, 'reauthenticate'>,
    private readonly options: DispatcherOptions
  ) {
    this.sleep = options.sleep ?? sleep;
  }

  async dispatch(request: DispatchRequest): Promise<DispatchSummary> {
    const externalIdField = validateDispatchRequest(request);
    const { objectName, operation, rows, mapping, batchSize, errorSink, successSink, signal } =
      request;

    const summary: DispatchSummary = {
      total: rows.length,
      succeeded: 0,
      failed: 0,
      notAttempted: 0,
      cancelled: false,
    };

    const fail = async (record: PendingRecord, reason: string): Promise<void> => {
      summary.failed++;
      log.debug({ index: record.index, reason }, 'Record failed');
      await errorSink.record(record.row, reason, operation);
    };
    const succeed = async (record: PendingRecord, id: string | null): Promise<void> => {
      summary.succeeded++;
      await successSink?.record(record.row, id);
    };

    // Rows that cannot form a valid request fail without being sent
    const ready: PendingRecord[] = [];
    for (const [index, row] of rows.entries()) {
      const record = { index, row, payload: this.buildPayload(operation, mapping.apply(row)) };
      const problem = checkPayload(operation, record.payload, externalIdField);
      if (problem) {
        await fail(record, problem);
      } else {
        ready.push(record);
      }
    }

    const chunks = chunk(ready, batchSize);
    let processed = rows.length - ready.length;

    for (const [chunkIndex, records] of chunks.entries()) {
      if (signal?.aborted) {
        summary.cancelled = true;
        summary.notAttempted = rows.length - processed;
        log.warn({ chunk: chunkIndex + 1, notAttempted: summary.notAttempted }, 'Run cancelled');
        break;
      }

      const batch: Batch =
        operation === 'upsert'
          ? { operation, externalIdField, records, maxSize: batchSize }
          : { operation, records, maxSize: batchSize };

      log.info(
        { objectName, operation, chunk: chunkIndex + 1, of: chunks.length, size: records.length },
        'Processing chunk'
      );
      await this.processChunk(objectName, batch, fail, succeed);

      processed += records.length;
      request.onProgress?.({
        chunk: chunkIndex + 1,
        totalChunks: chunks.length,
        processed,
        total: rows.length,
        succeeded: summary.succeeded,
        failed: summary.failed,
      });
    }

    log.info({ objectName, operation, ...summary }, 'Dispatch finished');
    return summary;
  }

  /**
   * Submit one chunk and keep resubmitting its transient failures until
   * they succeed, fail permanently or run out of attempts.
   */
  private async processChunk(
    objectName: string,
    batch: Batch,
    fail: (record: PendingRecord, reason: string) => Promise<void>,
    succeed: (record: PendingRecord, id: string | null) => Promise<void>
  ): Promise<void> {
    const { attempts } = this.options.retry;
    let current = batch;

    for (let attempt = 1; current.records.length > 0; attempt++) {
      const results = await this.submit(objectName, current);

      if ('transportError' in results) {
        for (const record of current.records) {
          await fail(record, results.transportError);
        }
        return;
      }

      const retry: PendingRecord[] = [];
      for (const [i, record] of current.records.entries()) {
        const outcome = classifyResult(results[i]);
        switch (outcome.kind) {
          case 'succeeded':
            await succeed(record, outcome.id ?? (payloadValue(record.payload, 'Id') || null));
            break;
          case 'retrying':
            if (attempt < attempts) {
              retry.push(record);
            } else {
              await fail(record, outcome.reason);
            }
            break;
          case 'failed':
            await fail(record, outcome.reason);
            break;
        }
      }

      if (retry.length === 0) {
        return;
      }

      const delay = backoffDelay(attempt, this.options.retry);
      log.warn(
        { objectName, operation: current.operation, attempt, retrying: retry.length, delayMs: delay },
        'Retrying transient failures'
      );
      await this.sleep(delay);
      current = { ...current, records: retry };
    }
  }

  /**
   * One store call. A thrown call gets one reauthentication and one
   * resubmission; if that throws too, the whole chunk fails with the
   * transport reason.
   */
  private async submit(
    objectName: string,
    batch: Batch
  ): Promise<StoreRecordResult[] | { transportError: string }> {
    try {
      return await this.callStore(objectName, batch);
    } catch (error) {
      log.warn(
        { err: error, objectName, operation: batch.operation, size: batch.records.length },
        'Chunk call failed, reauthenticating'
      );
    }

    await this.session.reauthenticate();

    try {
      return await this.callStore(objectName, batch);
    } catch (error) {
      const err = toError(error);
      log.error({ err, objectName, operation: batch.operation }, 'Chunk call failed after reauthentication');
      return { transportError: `TRANSPORT_ERROR: ${err.message}` };
    }
  }

  private callStore(objectName: string, batch: Batch): Promise<StoreRecordResult[]> {
    const payloads = batch.records.map((record) => record.payload);
    const label = `${batch.operation} ${objectName}`;

    switch (batch.operation) {
      case 'insert':
        return withTimeout(this.store.insert(objectName, payloads), this.options.timeoutMs, label);
      case 'update':
        return withTimeout(this.store.update(objectName, payloads), this.options.timeoutMs, label);
      case 'upsert':
        return withTimeout(
          this.store.upsert(objectName, batch.externalIdField, payloads),
          this.options.timeoutMs,
          label
        );
      case 'delete':
        return withTimeout(
          this.store.delete(
            objectName,
            payloads.map((p) => payloadValue(p, 'Id'))
          ),
          this.options.timeoutMs,
          label
        );
    }
  }

  private buildPayload(operation: Operation, mapped: RecordPayload): RecordPayload {
    if (operation === 'delete') {
      return { Id: payloadValue(mapped, 'Id') };
    }
    return mapped;
  }
}

/**
 * Reject invalid requests before anything is sent.
 * Returns the external id field for upserts, '' otherwise.
 *
 * @throws ConfigError
 */
export function validateDispatchRequest(
  request: Pick<DispatchRequest, 'operation' | 'batchSize' | 'externalIdField'>
): string {
  const { operation, batchSize, externalIdField } = request;

  if (!isOperation(operation)) {
    throw new ConfigError(`Unknown operation '${String(operation)}'`, 'operation');
  }
  if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > DEFAULTS.MAX_BATCH_SIZE) {
    throw new ConfigError(
      `Batch size must be an integer between 1 and ${DEFAULTS.MAX_BATCH_SIZE}, got ${batchSize}`,
      'batchSize'
    );
  }

  const field = externalIdField?.trim() ?? '';
  if (operation === 'upsert') {
    if (!field) {
      throw new ConfigError('Upsert requires an external id field', 'externalIdField');
    }
    return field;
  }

  if (field) {
    log.warn({ operation, externalIdField: field }, 'External id field is only used for upsert; ignoring');
  }
  return '';
}

function checkPayload(
  operation: Operation,
  payload: RecordPayload,
  externalIdField: string
): string | null {
  switch (operation) {
    case 'update':
    case 'delete':
      return payloadValue(payload, 'Id')
        ? null
        : `MISSING_ID: record has no Id value for ${operation}`;
    case 'upsert':
      return payloadValue(payload, externalIdField)
        ? null
        : `MISSING_EXTERNAL_ID: record has no ${externalIdField} value for upsert`;
    case 'insert':
      return null;
  }
}
