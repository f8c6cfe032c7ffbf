/**
 * Field Mapper
 *
 * Builds the column → field mapping for a run by asking a decision
 * provider about each source column in order. The mapping is frozen
 * before any record is dispatched.
 */

import { MappingError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type {
  DecisionProvider,
  FieldMappingEntry,
  RecordPayload,
  SourceRow,
} from '../core/types.js';

const log = createLogger('field-mapper');

export class FieldMapping {
  readonly entries: readonly FieldMappingEntry[];

  constructor(entries: readonly FieldMappingEntry[]) {
    assertUniqueTargets(entries);
    this.entries = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
    Object.freeze(this);
  }

  /**
   * Map every column onto a field of the same name
   */
  static identity(columns: readonly string[]): FieldMapping {
    return new FieldMapping(columns.map((source) => ({ source, target: source })));
  }

  /**
   * Columns that are sent, with their target fields
   */
  get mapped(): Array<{ source: string; target: string }> {
    const result: Array<{ source: string; target: string }> = [];
    for (const { source, target } of this.entries) {
      if (target !== null) {
        result.push({ source, target });
      }
    }
    return result;
  }

  get skipped(): string[] {
    return this.entries.filter((entry) => entry.target === null).map((entry) => entry.source);
  }

  /**
   * Build the payload for one row. Skipped columns and columns absent
   * from the row are left out.
   */
  apply(row: SourceRow): RecordPayload {
    const payload: RecordPayload = {};
    for (const { source, target } of this.mapped) {
      if (Object.prototype.hasOwnProperty.call(row, source)) {
        payload[target] = row[source];
      }
    }
    return payload;
  }
}

/**
 * Salesforce API names are case-insensitive
 */
function fieldKey(field: string): string {
  return field.toLowerCase();
}

function assertUniqueTargets(entries: readonly FieldMappingEntry[]): void {
  const claimedBy = new Map<string, string>();
  for (const { source, target } of entries) {
    if (target === null) continue;
    const previous = claimedBy.get(fieldKey(target));
    if (previous !== undefined) {
      throw new MappingError(
        `Column '${source}' cannot map to '${target}': already mapped from column '${previous}'`,
        source,
        target
      );
    }
    claimedBy.set(fieldKey(target), source);
  }
}

export class FieldMapper {
  constructor(private readonly decisions: DecisionProvider) {}

  /**
   * Ask about each column in order and build the mapping.
   *
   * @param knownFields - Field names of the target object, or null to skip that check
   * @throws MappingError when a target is claimed twice or is not a field of the object
   */
  async build(
    objectName: string,
    columns: readonly string[],
    knownFields: readonly string[] | null
  ): Promise<FieldMapping> {
    const known = knownFields ? new Map(knownFields.map((f) => [fieldKey(f), f])) : null;
    const context = {
      objectName,
      knownFields: knownFields ? new Set(knownFields) : null,
    };
    const claimedBy = new Map<string, string>();
    const entries: FieldMappingEntry[] = [];

    for (const column of columns) {
      const decision = await this.decisions.mapColumn(column, context);

      if (decision.kind === 'skip') {
        log.info({ column }, 'Skipping column');
        entries.push({ source: column, target: null });
        continue;
      }

      let target = decision.target.trim() || column;

      if (known) {
        const canonical = known.get(fieldKey(target));
        if (canonical === undefined) {
          throw new MappingError(
            `Column '${column}' maps to '${target}', which is not a field of ${objectName}`,
            column,
            target
          );
        }
        target = canonical;
      }

      const previous = claimedBy.get(fieldKey(target));
      if (previous !== undefined) {
        throw new MappingError(
          `Column '${column}' cannot map to '${target}': already mapped from column '${previous}'`,
          column,
          target
        );
      }

      claimedBy.set(fieldKey(target), column);
      entries.push({ source: column, target });
      log.info({ column, target }, 'Mapped column');
    }

    return new FieldMapping(entries);
  }
}
