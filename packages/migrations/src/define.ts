/**
 * @studycache/migrations - Migration definition
 */

import type {
  DefinedMigrations,
  MigrationDefinition,
  MigrationFn,
  MigrationRecord,
  MigrationStep,
  ParsedMigration,
} from './types';

/**
 * Parse a version key (e.g., 'v1', 'v2', '1', '2') into a version number.
 */
function parseVersionKey(key: string): number | null {
  const match = key.match(/^v?(\d+)$/i);
  if (!match?.[1]) return null;
  const version = Number.parseInt(match[1], 10);
  return Number.isNaN(version) ? null : version;
}

function isMigrationStep<DB>(
  value: MigrationDefinition<DB>
): value is MigrationStep<DB> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Define versioned migrations with automatic version parsing and sorting.
 *
 * Versions must run 1..N without gaps: the stored schema version is a plain
 * counter of applied steps.
 *
 * @example
 * ```typescript
 * export const migrations = defineMigrations<Db>({
 *   v1: async (db) => {
 *     await db.schema.createTable('notes')
 *       .addColumn('id', 'integer', (col) => col.primaryKey())
 *       .execute();
 *   },
 *   v2: {
 *     up: async (db) => { ... },
 *     backfill: async (db) => { ... },
 *   },
 * });
 * ```
 */
export function defineMigrations<
  DB = unknown,
  T extends MigrationRecord<DB> = MigrationRecord<DB>,
>(versionedMigrations: T): DefinedMigrations<DB> {
  const migrations: ParsedMigration<DB>[] = [];

  for (const [key, definition] of Object.entries(versionedMigrations)) {
    const version = parseVersionKey(key);
    if (version === null) {
      throw new Error(
        `Invalid migration key "${key}": must be a version number (e.g., 'v1', 'v2', '1', '2')`
      );
    }
    if (version < 1) {
      throw new Error(
        `Invalid migration version ${version}: versions must be >= 1`
      );
    }

    const up: MigrationFn<DB> = isMigrationStep(definition)
      ? definition.up
      : definition;
    const backfill = isMigrationStep(definition)
      ? definition.backfill
      : undefined;
    if (typeof up !== 'function') {
      throw new Error(
        `Invalid migration "${key}": expected an async function or { up, backfill? } object.`
      );
    }
    if (backfill !== undefined && typeof backfill !== 'function') {
      throw new Error(
        `Invalid migration "${key}": "backfill" must be a function when provided.`
      );
    }

    migrations.push({ version, name: key, up, backfill });
  }

  migrations.sort((a, b) => a.version - b.version);

  migrations.forEach((migration, index) => {
    const previous = migrations[index - 1];
    if (previous && previous.version === migration.version) {
      throw new Error(`Duplicate migration version ${migration.version}`);
    }
    if (migration.version !== index + 1) {
      throw new Error(
        `Missing migration version ${index + 1}: versions must be contiguous from 1`
      );
    }
  });

  return {
    migrations,
    currentVersion: migrations.length,
    getMigration(version: number) {
      return migrations.find((m) => m.version === version);
    },
  };
}
