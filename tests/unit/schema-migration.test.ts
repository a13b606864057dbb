/**
 * Tests for the local cache schema
 *
 * Covers:
 * - a new store reaches the current version with every table
 * - v2 -> current backfills subject_progress from assignments and pending progress
 * - purging subjects removed from the catalogue
 */

import { beforeEach, describe, expect, it } from 'vitest';
import {
  AssignmentSchema,
  configureCacheTelemetry,
  createSilentCacheTelemetry,
  encodeRecord,
  ensureLocalCacheSchema,
  type LocalCacheExecutor,
  localCacheMigrations,
  ProgressSchema,
  purgeDeletedSubjects,
} from '@studycache/client';
import {
  getSchemaVersion,
  runMigrationsToVersion,
} from '@studycache/migrations';
import { createTestDb, makeAssignment } from './test-utils';

let db: LocalCacheExecutor;

beforeEach(() => {
  configureCacheTelemetry(createSilentCacheTelemetry());
  db = createTestDb();
});

async function subjectProgressRows() {
  return db
    .selectFrom('subject_progress')
    .selectAll()
    .orderBy('id')
    .execute();
}

describe('ensureLocalCacheSchema', () => {
  it('creates every table on a new store', async () => {
    const result = await ensureLocalCacheSchema(db);

    expect(result.previousVersion).toBe(0);
    expect(result.applied).toEqual([1, 2, 3, 4, 5]);
    expect(await getSchemaVersion(db)).toBe(localCacheMigrations.currentVersion);

    const tables = (await db.introspection.getTables()).map((t) => t.name);
    expect(tables.sort()).toEqual([
      'assignments',
      'error_log',
      'level_progressions',
      'pending_progress',
      'pending_study_materials',
      'study_materials',
      'subject_progress',
      'sync',
      'user',
    ]);

    const cursors = await db.selectFrom('sync').selectAll().execute();
    expect(cursors).toEqual([
      { assignments_updated_after: '', study_materials_updated_after: '' },
    ]);
  });

  it('is idempotent', async () => {
    await ensureLocalCacheSchema(db);
    const again = await ensureLocalCacheSchema(db);
    expect(again.applied).toEqual([]);
    expect(await db.selectFrom('sync').selectAll().execute()).toHaveLength(1);
  });

  it('backfills subject_progress when migrating from version 2', async () => {
    await runMigrationsToVersion({
      db,
      migrations: localCacheMigrations,
      targetVersion: 2,
    });

    const committed = [
      makeAssignment({ subjectId: 10, level: 1, srsStage: 3 }),
      makeAssignment({
        subjectId: 11,
        level: 2,
        srsStage: 6,
        subjectType: 'vocabulary',
      }),
    ];
    for (const assignment of committed) {
      await db
        .insertInto('assignments')
        .values({
          id: assignment.id,
          subject_id: assignment.subjectId,
          record_json: encodeRecord(AssignmentSchema, assignment),
        })
        .execute();
    }
    await db
      .insertInto('pending_progress')
      .values({
        id: 12,
        record_json: encodeRecord(ProgressSchema, {
          assignment: makeAssignment({
            subjectId: 12,
            level: 1,
            srsStage: 0,
            subjectType: 'radical',
          }),
          isLesson: true,
          createdAt: '2026-02-01T00:00:00.000Z',
        }),
      })
      .execute();

    const result = await ensureLocalCacheSchema(db);

    expect(result.previousVersion).toBe(2);
    expect(result.applied).toEqual([3, 4, 5]);
    expect(result.backfilled).toEqual([3]);
    expect(await subjectProgressRows()).toEqual([
      { id: 10, level: 1, srs_stage: 3, subject_type: 'kanji' },
      { id: 11, level: 2, srs_stage: 6, subject_type: 'vocabulary' },
      { id: 12, level: 1, srs_stage: 0, subject_type: 'radical' },
    ]);
  });

  it('purges subjects removed from the catalogue', async () => {
    await ensureLocalCacheSchema(db);
    for (const subjectId of [20, 21]) {
      const assignment = makeAssignment({ subjectId });
      await db
        .insertInto('assignments')
        .values({
          id: assignment.id,
          subject_id: subjectId,
          record_json: encodeRecord(AssignmentSchema, assignment),
        })
        .execute();
      await db
        .insertInto('subject_progress')
        .values({ id: subjectId, level: 1, srs_stage: 1, subject_type: 'kanji' })
        .execute();
    }

    await ensureLocalCacheSchema(db, { deletedSubjectIds: [21, 99] });

    const assignments = await db
      .selectFrom('assignments')
      .select('subject_id')
      .execute();
    expect(assignments).toEqual([{ subject_id: 20 }]);
    expect((await subjectProgressRows()).map((r) => r.id)).toEqual([20]);
  });
});

describe('purgeDeletedSubjects', () => {
  it('returns 0 without touching the store when nothing is deleted', async () => {
    await ensureLocalCacheSchema(db);
    expect(await purgeDeletedSubjects(db, [])).toBe(0);
  });

  it('handles more ids than fit in one statement', async () => {
    await ensureLocalCacheSchema(db);
    const ids = Array.from({ length: 1200 }, (_, i) => i + 1);
    for (const subjectId of [5, 700, 1150]) {
      const assignment = makeAssignment({ subjectId });
      await db
        .insertInto('assignments')
        .values({
          id: assignment.id,
          subject_id: subjectId,
          record_json: encodeRecord(AssignmentSchema, assignment),
        })
        .execute();
    }

    expect(await purgeDeletedSubjects(db, ids)).toBe(3);
    expect(await db.selectFrom('assignments').selectAll().execute()).toEqual([]);
  });
});
