/**
 * Decision providers
 *
 * PromptDecisionProvider asks on the terminal; ScriptedDecisionProvider
 * answers from a fixed mapping and a fixed confirmation, for --mapping /
 * --yes runs and for tests.
 */

import confirm from '@inquirer/confirm';
import input from '@inquirer/input';
import type {
  ColumnContext,
  ColumnDecision,
  DecisionProvider,
  DiffContext,
  FieldChange,
} from '../core/types.js';

/**
 * Render a diff as an aligned three-column table
 */
export function formatDiffTable(changes: readonly FieldChange[]): string[] {
  const header = { field: 'Field', current: 'Current', proposed: 'Proposed' };
  const rows = [
    header,
    ...changes.map((c) => ({ field: c.field, current: c.current || '(empty)', proposed: c.proposed })),
  ];
  const width = {
    field: Math.max(...rows.map((r) => r.field.length)),
    current: Math.max(...rows.map((r) => r.current.length)),
  };
  return rows.map((r) => `${r.field.padEnd(width.field)}  ${r.current.padEnd(width.current)}  ${r.proposed}`);
}

export class PromptDecisionProvider implements DecisionProvider {
  constructor(private readonly print: (line: string) => void) {}

  async mapColumn(column: string, context: ColumnContext): Promise<ColumnDecision> {
    this.print('');
    this.print(`Column detected: '${column}'`);

    const send = await confirm({ message: `Map '${column}' to a ${context.objectName} field?`, default: true });
    if (!send) {
      return { kind: 'skip' };
    }

    const target = await input({
      message: `${context.objectName} field for '${column}':`,
      default: column,
      validate: (value) => {
        const field = value.trim() || column;
        if (!context.knownFields) return true;
        const lower = field.toLowerCase();
        for (const known of context.knownFields) {
          if (known.toLowerCase() === lower) return true;
        }
        return `${field} is not a field of ${context.objectName}`;
      },
    });
    return { kind: 'map', target: target.trim() || column };
  }

  async confirm(changes: readonly FieldChange[], context: DiffContext): Promise<boolean> {
    this.print('');
    this.print(`${context.objectType} ${context.recordId} (${context.recordName || 'no name'})`);
    for (const line of formatDiffTable(changes)) {
      this.print(`  ${line}`);
    }
    return confirm({ message: 'Apply these changes?', default: false });
  }
}

export interface ScriptedDecisions {
  /**
   * Column → target field, null to skip. Columns not listed map to a
   * field of the same name.
   */
  mapping?: Readonly<Record<string, string | null>>;
  /** Answer to every confirmation, false when omitted */
  confirm?: boolean;
}

export class ScriptedDecisionProvider implements DecisionProvider {
  /** Diffs shown so far, in order */
  readonly confirmations: Array<{ changes: FieldChange[]; context: DiffContext }> = [];

  constructor(private readonly decisions: ScriptedDecisions = {}) {}

  async mapColumn(column: string): Promise<ColumnDecision> {
    const mapping = this.decisions.mapping ?? {};
    if (!Object.prototype.hasOwnProperty.call(mapping, column)) {
      return { kind: 'map', target: column };
    }
    const target = mapping[column];
    return target === null || target === undefined ? { kind: 'skip' } : { kind: 'map', target };
  }

  async confirm(changes: readonly FieldChange[], context: DiffContext): Promise<boolean> {
    this.confirmations.push({ changes: [...changes], context });
    return this.decisions.confirm ?? false;
  }
}
