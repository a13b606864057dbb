/**
 * @studycache/migrations - Migration runner
 */

import { getSchemaVersion, setSchemaVersion } from './tracking';
import type {
  MigrationFn,
  RunMigrationsOptions,
  RunMigrationsResult,
  RunMigrationsToVersionOptions,
} from './types';

/**
 * Bring the store up to the latest defined version.
 *
 * @example
 * ```typescript
 * import { defineMigrations, runMigrations } from '@studycache/migrations';
 *
 * const migrations = defineMigrations({
 *   v1: async (db) => { ... },
 *   v2: async (db) => { ... },
 * });
 *
 * const result = await runMigrations({ db, migrations });
 * console.log(`Applied versions: ${result.applied.join(', ')}`);
 * ```
 */
export async function runMigrations<DB>(
  options: RunMigrationsOptions<DB>
): Promise<RunMigrationsResult> {
  return runMigrationsToVersion({
    ...options,
    targetVersion: options.migrations.currentVersion,
  });
}

/**
 * Migrate up to an explicit target version.
 *
 * Every pending step, then every backfill of those steps, then the version
 * bump all run inside one transaction: a failure anywhere rolls the whole run
 * back and is rethrown. A store already at or past the target is left as is.
 */
export async function runMigrationsToVersion<DB>(
  options: RunMigrationsToVersionOptions<DB>
): Promise<RunMigrationsResult> {
  const { db, migrations, targetVersion } = options;
  if (!Number.isInteger(targetVersion) || targetVersion < 0) {
    throw new Error(
      `Invalid target version ${targetVersion}. Target version must be an integer >= 0.`
    );
  }
  if (targetVersion > migrations.currentVersion) {
    throw new Error(
      `Invalid target version ${targetVersion}. Maximum defined version is ${migrations.currentVersion}.`
    );
  }

  return db.transaction().execute(async (trx) => {
    const previousVersion = await getSchemaVersion(trx);
    if (previousVersion >= targetVersion) {
      return {
        previousVersion,
        applied: [],
        backfilled: [],
        currentVersion: previousVersion,
      };
    }

    const applied: number[] = [];
    const backfills: Array<{ version: number; run: MigrationFn<DB> }> = [];
    for (const migration of migrations.migrations) {
      if (migration.version <= previousVersion) continue;
      if (migration.version > targetVersion) break;

      await migration.up(trx);
      applied.push(migration.version);
      if (migration.backfill) {
        backfills.push({ version: migration.version, run: migration.backfill });
      }
    }

    const backfilled: number[] = [];
    for (const backfill of backfills) {
      await backfill.run(trx);
      backfilled.push(backfill.version);
    }

    await setSchemaVersion(trx, targetVersion);

    return {
      previousVersion,
      applied,
      backfilled,
      currentVersion: targetVersion,
    };
  });
}
