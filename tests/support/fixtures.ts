import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { parseConfig, type DataOpsConfig } from '../../src/config/dataops-config.js';
import type { DispatcherOptions } from '../../src/services/batch-dispatcher.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'sf-dataops-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Config with no retry delay and output directories under `dir`
 */
export function testConfig(dir: string, overrides: Record<string, unknown> = {}): DataOpsConfig {
  return parseConfig({
    retry: { attempts: 3, delayMs: 0 },
    csv: {
      errorDirectory: path.join(dir, 'errors'),
      resultsDirectory: path.join(dir, 'results'),
    },
    ...overrides,
  });
}

export const noDelay: DispatcherOptions = {
  retry: { attempts: 3, delayMs: 0 },
  timeoutMs: 0,
  sleep: async () => {},
};

export const FIXED_NOW = new Date('2024-03-05T14:07:09.000Z');
