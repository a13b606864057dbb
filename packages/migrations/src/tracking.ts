/**
 * @studycache/migrations - Schema version tracking
 *
 * The version lives in SQLite's `user_version` header field, so it commits or
 * rolls back together with the schema changes of the same transaction.
 */

import { type Kysely, sql } from 'kysely';

/**
 * Read the stored schema version (0 for a new file).
 */
export async function getSchemaVersion<DB>(db: Kysely<DB>): Promise<number> {
  const result = await sql<{ user_version: number }>`
    pragma user_version
  `.execute(db);
  return Number(result.rows[0]?.user_version ?? 0);
}

/**
 * Write the stored schema version.
 */
export async function setSchemaVersion<DB>(
  db: Kysely<DB>,
  version: number
): Promise<void> {
  if (!Number.isInteger(version) || version < 0) {
    throw new Error(
      `Invalid schema version ${version}. Schema version must be an integer >= 0.`
    );
  }
  // PRAGMA does not take bound parameters; the value is validated above.
  await sql.raw(`pragma user_version = ${version}`).execute(db);
}
