/**
 * @studycache/client - Local cache migrations (SQLite)
 */

import { createCacheTimer, logCacheEvent } from '@studycache/core';
import {
  defineMigrations,
  type RunMigrationsResult,
  runMigrations,
} from '@studycache/migrations';
import { sql } from 'kysely';
import { getAllAssignments, getAllPendingProgress } from './queries';
import type { LocalCacheDb, LocalCacheExecutor } from './schema';

/** Stays under SQLite's historical 999 bound-parameter limit */
const DELETE_CHUNK_SIZE = 500;

/**
 * Rebuild subject_progress from every assignment and pending report.
 */
async function backfillSubjectProgress(db: LocalCacheExecutor): Promise<void> {
  const assignments = await getAllAssignments(db);
  const pending = (await getAllPendingProgress(db)).map((p) => p.assignment);

  for (const assignment of [...assignments, ...pending]) {
    await db
      .replaceInto('subject_progress')
      .values({
        id: assignment.subjectId,
        level: assignment.level,
        srs_stage: assignment.srsStage,
        subject_type: assignment.subjectType,
      })
      .execute();
  }
}

export const localCacheMigrations = defineMigrations<LocalCacheDb>({
  v1: async (db) => {
    await db.schema
      .createTable('sync')
      .addColumn('assignments_updated_after', 'text')
      .addColumn('study_materials_updated_after', 'text')
      .execute();
    await db
      .insertInto('sync')
      .values({
        assignments_updated_after: '',
        study_materials_updated_after: '',
      })
      .execute();

    for (const table of [
      'assignments',
      'pending_progress',
      'study_materials',
    ] as const) {
      await db.schema
        .createTable(table)
        .addColumn('id', 'integer', (col) => col.primaryKey())
        .addColumn('record_json', 'text', (col) => col.notNull())
        .execute();
    }

    await db.schema
      .createTable('user')
      .addColumn('id', 'integer', (col) =>
        col.primaryKey().check(sql`id = 0`)
      )
      .addColumn('record_json', 'text', (col) => col.notNull())
      .execute();
    await db.schema
      .createTable('pending_study_materials')
      .addColumn('id', 'integer', (col) => col.primaryKey())
      .execute();
  },

  // Assignments gain a subject_id column; they are re-downloaded to fill it.
  v2: async (db) => {
    await db.deleteFrom('assignments').execute();
    await db.updateTable('sync').set({ assignments_updated_after: '' }).execute();
    await db.schema
      .alterTable('assignments')
      .addColumn('subject_id', 'integer')
      .execute();
    await db.schema
      .createIndex('idx_subject_id')
      .on('assignments')
      .column('subject_id')
      .execute();
  },

  v3: {
    up: async (db) => {
      await db.schema
        .createTable('subject_progress')
        .addColumn('id', 'integer', (col) => col.primaryKey())
        .addColumn('level', 'integer', (col) => col.notNull())
        .addColumn('srs_stage', 'integer', (col) => col.notNull())
        .addColumn('subject_type', 'text', (col) => col.notNull())
        .execute();
    },
    backfill: backfillSubjectProgress,
  },

  v4: async (db) => {
    await db.schema
      .createTable('error_log')
      .addColumn('date', 'timestamp', (col) =>
        col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`)
      )
      .addColumn('stack', 'text')
      .addColumn('code', 'integer')
      .addColumn('description', 'text')
      .addColumn('request_url', 'text')
      .addColumn('response_url', 'text')
      .addColumn('request_data', 'text')
      .addColumn('request_headers', 'text')
      .addColumn('response_headers', 'text')
      .addColumn('response_data', 'text')
      .execute();
  },

  v5: async (db) => {
    await db.schema
      .createTable('level_progressions')
      .addColumn('id', 'integer', (col) => col.primaryKey())
      .addColumn('level', 'integer', (col) => col.notNull())
      .addColumn('record_json', 'text', (col) => col.notNull())
      .execute();
  },
});

/**
 * Delete assignment and subject_progress rows for subjects that no longer
 * exist in the catalogue. Returns the number of assignment rows removed.
 */
export async function purgeDeletedSubjects(
  db: LocalCacheExecutor,
  deletedSubjectIds: Iterable<number>
): Promise<number> {
  const ids = Array.from(new Set(deletedSubjectIds));
  if (ids.length === 0) return 0;

  return db.transaction().execute(async (trx) => {
    let removed = 0;
    for (let i = 0; i < ids.length; i += DELETE_CHUNK_SIZE) {
      const chunk = ids.slice(i, i + DELETE_CHUNK_SIZE);
      const res = await trx
        .deleteFrom('assignments')
        .where('subject_id', 'in', chunk)
        .executeTakeFirst();
      removed += Number(res.numDeletedRows);
      await trx.deleteFrom('subject_progress').where('id', 'in', chunk).execute();
    }
    return removed;
  });
}

export interface EnsureLocalCacheSchemaOptions {
  /** Subjects removed from the catalogue; their rows are purged after migrating */
  deletedSubjectIds?: Iterable<number>;
}

/**
 * Bring a store to the current schema and reconcile it with the catalogue.
 *
 * Migration failures are thrown: a store that cannot be migrated is a
 * programming error and startup must not continue.
 */
export async function ensureLocalCacheSchema(
  db: LocalCacheExecutor,
  options: EnsureLocalCacheSchemaOptions = {}
): Promise<RunMigrationsResult> {
  const elapsed = createCacheTimer();
  const result = await runMigrations({ db, migrations: localCacheMigrations });
  logCacheEvent({
    event: 'cache.migrate',
    previousVersion: result.previousVersion,
    currentVersion: result.currentVersion,
    applied: result.applied.join(','),
    durationMs: elapsed(),
  });

  const purged = await purgeDeletedSubjects(db, options.deletedSubjectIds ?? []);
  if (purged > 0) {
    logCacheEvent({ event: 'cache.purge_deleted_subjects', rowCount: purged });
  }
  return result;
}
