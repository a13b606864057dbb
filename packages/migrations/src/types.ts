/**
 * @studycache/migrations - Type definitions
 */

import type { Kysely } from 'kysely';

/**
 * A single migration function that modifies the database schema or data.
 */
export type MigrationFn<DB = unknown> = (db: Kysely<DB>) => Promise<void>;

/**
 * A migration step with a one-time backfill.
 *
 * Backfills run after every pending `up` of the same run has been applied, so
 * they see the final schema, and before the version is recorded.
 */
export interface MigrationStep<DB = unknown> {
  up: MigrationFn<DB>;
  backfill?: MigrationFn<DB>;
}

/**
 * A migration definition can be a plain "up" function or a step with a
 * backfill.
 */
export type MigrationDefinition<DB = unknown> =
  | MigrationFn<DB>
  | MigrationStep<DB>;

/**
 * Record of versioned migrations keyed by version string (e.g., 'v1', 'v2').
 */
export type MigrationRecord<DB = unknown> = Record<
  string,
  MigrationDefinition<DB>
>;

export interface ParsedMigration<DB = unknown> {
  version: number;
  name: string;
  up: MigrationFn<DB>;
  backfill?: MigrationFn<DB>;
}

/**
 * Result of defineMigrations().
 */
export interface DefinedMigrations<DB = unknown> {
  /** Migrations sorted by version, contiguous from 1 */
  migrations: ParsedMigration<DB>[];
  /** Latest schema version (equals the number of steps) */
  currentVersion: number;
  getMigration(version: number): ParsedMigration<DB> | undefined;
}

export interface RunMigrationsOptions<DB = unknown> {
  /** Kysely database instance */
  db: Kysely<DB>;
  /** Defined migrations from defineMigrations() */
  migrations: DefinedMigrations<DB>;
}

export interface RunMigrationsResult {
  /** Schema version found before this run */
  previousVersion: number;
  /** Versions that were applied in this run */
  applied: number[];
  /** Versions whose backfill ran in this run */
  backfilled: number[];
  /** Schema version after this run */
  currentVersion: number;
}

export interface RunMigrationsToVersionOptions<DB = unknown>
  extends RunMigrationsOptions<DB> {
  /** Target schema version (0..migrations.currentVersion). */
  targetVersion: number;
}
