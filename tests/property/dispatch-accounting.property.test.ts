import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { BatchDispatcher } from '../../src/services/batch-dispatcher.js';
import { FieldMapping } from '../../src/services/field-mapper.js';
import { InMemoryObjectStore, permanent, transient } from '../support/in-memory-store.js';
import { FakeSessionProvider } from '../support/fake-session.js';
import { MemoryFailureSink } from '../support/memory-sinks.js';
import { noDelay } from '../support/fixtures.js';

type Behaviour = 'ok' | 'permanent' | 'transient-once' | 'transient-always';

const BEHAVIOURS: Behaviour[] = ['ok', 'permanent', 'transient-once', 'transient-always'];

/**
 * succeeded + failed = total, and the error sink holds exactly the
 * rows that ended failed
 */
describe('Property: dispatch accounting', () => {
  it('accounts for every row once', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.constantFrom(...BEHAVIOURS), { maxLength: 30 }),
        fc.integer({ min: 1, max: 10 }),
        async (behaviours, batchSize) => {
          const store = new InMemoryObjectStore();
          const byName = new Map(behaviours.map((b, i) => [`Row ${i}`, b]));
          store.script = (record, attempt) => {
            switch (byName.get(record.Name ?? '')) {
              case 'permanent':
                return permanent('rejected');
              case 'transient-once':
                return attempt === 1 ? transient() : undefined;
              case 'transient-always':
                return transient();
              default:
                return undefined;
            }
          };
          const errorSink = new MemoryFailureSink();
          const dispatcher = new BatchDispatcher(store, new FakeSessionProvider(), noDelay);

          const summary = await dispatcher.dispatch({
            objectName: 'Account',
            operation: 'insert',
            rows: behaviours.map((_, i) => ({ Name: `Row ${i}` })),
            mapping: FieldMapping.identity(['Name']),
            batchSize,
            errorSink,
          });

          const expectedFailed = behaviours.flatMap((b, i) =>
            b === 'permanent' || b === 'transient-always' ? [`Row ${i}`] : []
          );
          expect(summary.succeeded + summary.failed).toBe(behaviours.length);
          expect(summary.failed).toBe(expectedFailed.length);
          expect(errorSink.records.map((r) => r.row.Name).sort()).toEqual([...expectedFailed].sort());
          for (const call of store.calls) {
            expect(call.records.length).toBeLessThanOrEqual(batchSize);
          }
        }
      ),
      { numRuns: 50 }
    );
  });
});
