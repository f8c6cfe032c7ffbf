/**
 * Salesforce Object Store
 *
 * ObjectStore over a @salesforce/core Connection. Writes go through the
 * SObject Collections REST endpoints (up to 200 records per call, one
 * result per record, allOrNone=false); reads use SOQL query/queryMore.
 * The connection is taken from the session provider on every call, so a
 * refreshed session is picked up by the next request.
 */

import type { Connection } from '@salesforce/core';
import { z } from 'zod';
import { createLogger } from '../core/logger.js';
import type {
  ObjectStore,
  QueryPage,
  RecordPayload,
  SessionProvider,
  StoreRecordResult,
} from '../core/types.js';

const log = createLogger('salesforce');

// === Response schemas ===

const saveResultSchema = z.object({
  id: z.string().nullish(),
  success: z.boolean(),
  errors: z
    .array(
      z.object({
        statusCode: z.string(),
        message: z.string(),
        fields: z.array(z.string()).optional(),
      })
    )
    .default([]),
});

const saveResultsSchema = z.array(saveResultSchema);

// === Store ===

export class SalesforceObjectStore implements ObjectStore {
  constructor(
    private readonly session: SessionProvider<Connection>,
    private readonly apiVersion: string
  ) {}

  async insert(objectName: string, records: RecordPayload[]): Promise<StoreRecordResult[]> {
    const conn = await this.session.acquire();
    const response = await conn.requestPost(this.collectionsUrl(), {
      allOrNone: false,
      records: records.map((record) => withType(objectName, record)),
    });
    return parseSaveResults(response, 'insert', objectName);
  }

  async update(objectName: string, records: RecordPayload[]): Promise<StoreRecordResult[]> {
    const conn = await this.session.acquire();
    const response = await conn.requestPatch(this.collectionsUrl(), {
      allOrNone: false,
      records: records.map((record) => withType(objectName, record)),
    });
    return parseSaveResults(response, 'update', objectName);
  }

  async upsert(
    objectName: string,
    externalIdField: string,
    records: RecordPayload[]
  ): Promise<StoreRecordResult[]> {
    const conn = await this.session.acquire();
    const url = `${this.collectionsUrl()}/${encodeURIComponent(objectName)}/${encodeURIComponent(externalIdField)}`;
    const response = await conn.requestPatch(url, {
      allOrNone: false,
      records: records.map((record) => withType(objectName, record)),
    });
    return parseSaveResults(response, 'upsert', objectName);
  }

  async delete(objectName: string, ids: string[]): Promise<StoreRecordResult[]> {
    const conn = await this.session.acquire();
    const params = new URLSearchParams({ ids: ids.join(','), allOrNone: 'false' });
    const response = await conn.requestDelete(`${this.collectionsUrl()}?${params.toString()}`);
    return parseSaveResults(response, 'delete', objectName);
  }

  async query(soql: string): Promise<QueryPage> {
    const conn = await this.session.acquire();
    log.debug({ soql }, 'Running query');
    const result = await conn.query(soql);
    return {
      records: result.records.map((record) => ({ ...record })),
      totalSize: result.totalSize,
      nextPageToken: result.nextRecordsUrl,
    };
  }

  async queryMore(nextPageToken: string): Promise<QueryPage> {
    const conn = await this.session.acquire();
    const result = await conn.queryMore(nextPageToken);
    return {
      records: result.records.map((record) => ({ ...record })),
      totalSize: result.totalSize,
      nextPageToken: result.nextRecordsUrl,
    };
  }

  async describeFields(objectName: string): Promise<string[] | null> {
    try {
      const conn = await this.session.acquire();
      const describe = await conn.describe(objectName);
      return describe.fields.map((field) => field.name);
    } catch (err) {
      log.debug({ err, objectName }, 'Object describe failed, skipping field check');
      return null;
    }
  }

  private collectionsUrl(): string {
    return `/services/data/v${this.apiVersion}/composite/sobjects`;
  }
}

function withType(objectName: string, record: RecordPayload): Record<string, unknown> {
  return { attributes: { type: objectName }, ...record };
}

function parseSaveResults(response: unknown, operation: string, objectName: string): StoreRecordResult[] {
  const parsed = saveResultsSchema.safeParse(response);
  if (!parsed.success) {
    log.error({ operation, objectName, issues: parsed.error.issues }, 'Unexpected collections response');
    throw new Error(`Unexpected response from ${operation} on ${objectName}`);
  }
  return parsed.data.map((result) => ({
    success: result.success,
    id: result.id ?? null,
    errors: result.errors,
  }));
}
