import { isDataOpsError } from '../../core/errors.js';
import type { EnrichmentOutcome, SyncSummary } from '../../core/types.js';

/**
 * Message shown for a failed command, with the error code and cause
 * for the project's own errors
 */
export function describeError(error: unknown): string {
  if (isDataOpsError(error)) {
    return error.getFullMessage();
  }
  return error instanceof Error ? error.message : String(error);
}

export function formatSyncSummary(summary: SyncSummary): string[] {
  const lines = [
    `${summary.operation} ${summary.objectName}: ${summary.succeeded} succeeded, ${summary.failed} failed of ${summary.total}`,
  ];
  if (summary.cancelled) {
    lines.push(`Cancelled: ${summary.notAttempted} record(s) not attempted`);
  }
  if (summary.errorFile) {
    lines.push(`Failed rows: ${summary.errorFile}`);
  }
  if (summary.successFile) {
    lines.push(`Succeeded rows: ${summary.successFile}`);
  }
  return lines;
}

const STATUS_LABELS: Record<EnrichmentOutcome['status'], string> = {
  applied: 'updated',
  declined: 'declined, nothing written',
  'no-changes': 'already up to date',
  'scrape-failed': 'no company data found',
  'update-failed': 'update failed',
  'not-found': 'record not found',
};

export function formatEnrichmentOutcome(outcome: EnrichmentOutcome): string {
  const detail = outcome.message && !outcome.applied ? ` (${outcome.message})` : '';
  return `${outcome.objectType} ${outcome.recordId}: ${STATUS_LABELS[outcome.status]}${detail}`;
}
