import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';

const mappingSchema = z.record(z.string().nullable());

/**
 * Parse the --mapping flag: a JSON object of column → field, null to skip
 *
 * @example
 * parseMappingFlag('{"Company":"Name","Notes":null}');
 */
export function parseMappingFlag(value: string): Record<string, string | null> {
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch (error) {
    throw new ConfigError(
      `--mapping is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'mapping'
    );
  }

  const parsed = mappingSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      '--mapping must be an object of column names to field names or null',
      'mapping'
    );
  }
  return parsed.data;
}
