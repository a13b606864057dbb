/**
 * @studycache/client - Fetch and merge
 *
 * Each fetch commits its rows and, where there is one, its cursor in a single
 * transaction: either everything from the response lands or nothing does.
 *
 * Subjects with a queued local change keep their local rows until that change
 * is acknowledged: fetched assignments and study materials for them are
 * skipped.
 */

import {
  AssignmentSchema,
  createCacheTimer,
  encodeRecord,
  LevelProgressionSchema,
  logCacheEvent,
  type RemoteGateway,
  StudyMaterialSchema,
  type SyncProgress,
  UserSchema,
} from '@studycache/core';
import { getSyncCursors } from './queries';
import type { LocalCacheExecutor } from './schema';

function idSet(rows: readonly { id: number }[]): Set<number> {
  return new Set(rows.map((row) => row.id));
}

export async function resetAssignmentsCursor(
  db: LocalCacheExecutor
): Promise<void> {
  await db.updateTable('sync').set({ assignments_updated_after: '' }).execute();
}

export async function fetchAssignments(
  db: LocalCacheExecutor,
  gateway: RemoteGateway,
  progress: SyncProgress
): Promise<number> {
  const elapsed = createCacheTimer();
  const { assignmentsUpdatedAfter } = await getSyncCursors(db);
  const result = await gateway.fetchAssignments(
    assignmentsUpdatedAfter,
    progress
  );

  let skipped = 0;
  await db.transaction().execute(async (trx) => {
    const pending = idSet(
      await trx.selectFrom('pending_progress').select('id').execute()
    );
    for (const assignment of result.items) {
      if (pending.has(assignment.subjectId)) {
        skipped += 1;
        continue;
      }
      await trx
        .replaceInto('assignments')
        .values({
          id: assignment.id,
          subject_id: assignment.subjectId,
          record_json: encodeRecord(AssignmentSchema, assignment),
        })
        .execute();
      await trx
        .replaceInto('subject_progress')
        .values({
          id: assignment.subjectId,
          level: assignment.level,
          srs_stage: assignment.srsStage,
          subject_type: assignment.subjectType,
        })
        .execute();
    }
    await trx
      .updateTable('sync')
      .set({ assignments_updated_after: result.updatedAt })
      .execute();
  });

  logCacheEvent({
    event: 'cache.fetch.assignments',
    rowCount: result.items.length - skipped,
    skipped,
    durationMs: elapsed(),
  });
  return result.items.length;
}

export async function fetchStudyMaterials(
  db: LocalCacheExecutor,
  gateway: RemoteGateway,
  progress: SyncProgress
): Promise<number> {
  const elapsed = createCacheTimer();
  const { studyMaterialsUpdatedAfter } = await getSyncCursors(db);
  const result = await gateway.fetchStudyMaterials(
    studyMaterialsUpdatedAfter,
    progress
  );

  let skipped = 0;
  await db.transaction().execute(async (trx) => {
    const pending = idSet(
      await trx.selectFrom('pending_study_materials').select('id').execute()
    );
    for (const material of result.items) {
      if (pending.has(material.subjectId)) {
        skipped += 1;
        continue;
      }
      await trx
        .replaceInto('study_materials')
        .values({
          id: material.subjectId,
          record_json: encodeRecord(StudyMaterialSchema, material),
        })
        .execute();
    }
    await trx
      .updateTable('sync')
      .set({ study_materials_updated_after: result.updatedAt })
      .execute();
  });

  logCacheEvent({
    event: 'cache.fetch.study_materials',
    rowCount: result.items.length - skipped,
    skipped,
    durationMs: elapsed(),
  });
  return result.items.length;
}

export async function fetchUser(
  db: LocalCacheExecutor,
  gateway: RemoteGateway,
  progress: SyncProgress
): Promise<void> {
  const elapsed = createCacheTimer();
  const user = await gateway.fetchUser(progress);
  await db
    .replaceInto('user')
    .values({ id: 0, record_json: encodeRecord(UserSchema, user) })
    .execute();
  logCacheEvent({ event: 'cache.fetch.user', durationMs: elapsed() });
}

export async function fetchLevelProgressions(
  db: LocalCacheExecutor,
  gateway: RemoteGateway,
  progress: SyncProgress
): Promise<number> {
  const elapsed = createCacheTimer();
  const items = await gateway.fetchLevelProgressions(progress);

  await db.transaction().execute(async (trx) => {
    for (const item of items) {
      await trx
        .replaceInto('level_progressions')
        .values({
          id: item.id,
          level: item.level,
          record_json: encodeRecord(LevelProgressionSchema, item),
        })
        .execute();
    }
  });

  logCacheEvent({
    event: 'cache.fetch.level_progressions',
    rowCount: items.length,
    durationMs: elapsed(),
  });
  return items.length;
}
