/**
 * Core Type Definitions
 *
 * Shared types for the upload, query and enrichment flows. The object
 * store, session and decision interfaces are the seams every external
 * collaborator plugs into.
 */

// === Rows and payloads ===

/**
 * One source file row, keyed by column name in header order
 */
export type SourceRow = Readonly<Record<string, string>>;

/**
 * Field values sent to the org for one record
 */
export type RecordPayload = Record<string, string | null>;

export type Operation = 'insert' | 'update' | 'upsert' | 'delete';

export const OPERATIONS: readonly Operation[] = ['insert', 'update', 'upsert', 'delete'];

export function isOperation(value: string): value is Operation {
  return (OPERATIONS as readonly string[]).includes(value);
}

// === Object store ===

export interface StoreError {
  statusCode: string;
  message: string;
  fields?: string[];
}

/**
 * Per-record result of a bulk call, in submission order
 */
export interface StoreRecordResult {
  success: boolean;
  id?: string | null;
  errors: StoreError[];
}

/**
 * One page of query results
 */
export interface QueryPage {
  records: Array<Record<string, unknown>>;
  totalSize: number;
  /** Continuation token for the next page; absent on the last page */
  nextPageToken?: string;
}

/**
 * Capability boundary around the org: one method per bulk operation plus
 * query and describe. The Salesforce implementation lives in
 * services/salesforce.ts; tests use an in-memory fake.
 */
export interface ObjectStore {
  insert(objectName: string, records: RecordPayload[]): Promise<StoreRecordResult[]>;
  update(objectName: string, records: RecordPayload[]): Promise<StoreRecordResult[]>;
  upsert(
    objectName: string,
    externalIdField: string,
    records: RecordPayload[]
  ): Promise<StoreRecordResult[]>;
  delete(objectName: string, ids: string[]): Promise<StoreRecordResult[]>;
  query(soql: string): Promise<QueryPage>;
  queryMore(nextPageToken: string): Promise<QueryPage>;
  /**
   * Field names of an object, or null when the object cannot be described
   */
  describeFields(objectName: string): Promise<string[] | null>;
}

// === Session ===

/**
 * Owner of the authenticated handle. The core only observes validity and
 * asks for a refresh; it never touches the handle's internals.
 */
export interface SessionProvider<TSession = unknown> {
  acquire(): Promise<TSession>;
  isValid(): Promise<boolean>;
  /**
   * Refresh the session. Throws AuthError when that is impossible.
   */
  reauthenticate(): Promise<void>;
}

// === Field mapping ===

export interface FieldMappingEntry {
  readonly source: string;
  /** Target field, or null when the column is skipped */
  readonly target: string | null;
}

export type ColumnDecision = { kind: 'map'; target: string } | { kind: 'skip' };

export interface ColumnContext {
  /** Known fields of the target object, or null when unavailable */
  knownFields: ReadonlySet<string> | null;
  objectName: string;
}

// === Enrichment ===

export interface FieldChange {
  field: string;
  current: string;
  proposed: string;
}

export interface EnrichmentCandidate {
  recordId: string;
  objectType: string;
  currentValues: Readonly<Record<string, string>>;
  proposedValues: Readonly<Record<string, string>>;
  allowedFields: ReadonlySet<string>;
}

export interface DiffContext {
  recordId: string;
  objectType: string;
  recordName: string;
}

/**
 * Source of the answers that drive interactive steps: the terminal in
 * normal use, a script in tests and non-interactive runs.
 */
export interface DecisionProvider {
  mapColumn(column: string, context: ColumnContext): Promise<ColumnDecision>;
  /**
   * One yes/no answer for the whole diff
   */
  confirm(changes: readonly FieldChange[], context: DiffContext): Promise<boolean>;
}

export interface ScrapeQuery {
  searchKey: string;
  objectType: string;
  fields: readonly string[];
  /** Known company website, skips the search step when present */
  website?: string;
}

/**
 * External source of candidate field values for one record
 */
export interface CompanyScraper {
  /**
   * Candidate values keyed by object field. Throws ScrapeError when
   * nothing usable was found.
   */
  scrape(query: ScrapeQuery): Promise<Record<string, string>>;
}

// === Progress and results ===

export interface DispatchProgress {
  chunk: number;
  totalChunks: number;
  processed: number;
  total: number;
  succeeded: number;
  failed: number;
}

export interface DispatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** Records never submitted because the run was cancelled */
  notAttempted: number;
  cancelled: boolean;
}

export interface SyncSummary extends DispatchSummary {
  objectName: string;
  operation: Operation;
  /** Path of the failure file, null when nothing failed */
  errorFile: string | null;
  /** Path of the success playback file, null when not written */
  successFile: string | null;
  durationMs: number;
}

export type EnrichmentStatus =
  | 'applied'
  | 'declined'
  | 'no-changes'
  | 'scrape-failed'
  | 'update-failed'
  | 'not-found';

export interface EnrichmentOutcome {
  recordId: string;
  objectType: string;
  applied: boolean;
  status: EnrichmentStatus;
  changes: FieldChange[];
  message?: string;
}
