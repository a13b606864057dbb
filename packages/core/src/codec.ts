import type { z } from 'zod';
import { RecordDecodeError } from './errors';

/**
 * Validate a record and serialize it for a `record_json` column.
 */
export function encodeRecord<S extends z.ZodTypeAny>(
  schema: S,
  value: z.input<S>
): string {
  return JSON.stringify(schema.parse(value));
}

/**
 * Parse a `record_json` column back into its record type.
 * Throws RecordDecodeError when the stored text is not valid JSON or no longer
 * matches the schema.
 */
export function decodeRecord<S extends z.ZodTypeAny>(
  schema: S,
  json: string,
  table: string
): z.output<S> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new RecordDecodeError(`Invalid JSON in ${table} row`, table, {
      cause: error,
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new RecordDecodeError(
      `Invalid ${table} row: ${result.error.message}`,
      table,
      { cause: result.error }
    );
  }
  return result.data;
}
