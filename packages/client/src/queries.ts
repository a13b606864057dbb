/**
 * @studycache/client - Read accessors
 *
 * Every function takes an executor so it can run on the root database or
 * inside a caller's transaction. Callers always receive decoded copies.
 */

import {
  type Assignment,
  AssignmentSchema,
  decodeRecord,
  type LevelProgression,
  LevelProgressionSchema,
  type Progress,
  ProgressSchema,
  type StudyMaterial,
  StudyMaterialSchema,
  type SubjectCatalogue,
  type SubjectType,
  type User,
  UserSchema,
} from '@studycache/core';
import { sql } from 'kysely';
import type { LocalCacheExecutor } from './schema';

export interface SyncCursors {
  assignmentsUpdatedAfter: string;
  studyMaterialsUpdatedAfter: string;
}

export async function getAllAssignments(
  db: LocalCacheExecutor
): Promise<Assignment[]> {
  const rows = await db
    .selectFrom('assignments')
    .select('record_json')
    .orderBy('id')
    .execute();
  return rows.map((row) =>
    decodeRecord(AssignmentSchema, row.record_json, 'assignments')
  );
}

export async function getAllPendingProgress(
  db: LocalCacheExecutor
): Promise<Progress[]> {
  const rows = await db
    .selectFrom('pending_progress')
    .select('record_json')
    .orderBy('id')
    .execute();
  return rows.map((row) =>
    decodeRecord(ProgressSchema, row.record_json, 'pending_progress')
  );
}

/**
 * The assignment for a subject. A pending progress report takes precedence
 * over the committed table until it is acknowledged.
 */
export async function getAssignment(
  db: LocalCacheExecutor,
  subjectId: number
): Promise<Assignment | null> {
  const pending = await db
    .selectFrom('pending_progress')
    .select('record_json')
    .where('id', '=', subjectId)
    .executeTakeFirst();
  if (pending) {
    return decodeRecord(ProgressSchema, pending.record_json, 'pending_progress')
      .assignment;
  }

  const row = await db
    .selectFrom('assignments')
    .select('record_json')
    .where('subject_id', '=', subjectId)
    .executeTakeFirst();
  return row
    ? decodeRecord(AssignmentSchema, row.record_json, 'assignments')
    : null;
}

function placeholderAssignment(
  subjectId: number,
  subjectType: SubjectType,
  level: number
): Assignment {
  return { id: 0, subjectId, subjectType, level, srsStage: 0 };
}

/**
 * One entry per curriculum subject at a level: the known assignment (with the
 * stage from subject_progress, which already reflects pending reports), or a
 * locked stage-0 placeholder for subjects the user has not unlocked yet.
 */
export async function getAssignmentsAtLevel(
  db: LocalCacheExecutor,
  catalogue: SubjectCatalogue,
  level: number
): Promise<Assignment[]> {
  const rows = await db
    .selectFrom('subject_progress as p')
    .leftJoin('assignments as a', 'a.subject_id', 'p.id')
    .select([
      'p.id',
      'p.level',
      'p.srs_stage',
      'p.subject_type',
      'a.record_json',
    ])
    .where('p.level', '=', level)
    .orderBy('p.id')
    .execute();

  const ret: Assignment[] = [];
  const seen = new Set<number>();
  for (const row of rows) {
    const assignment = row.record_json
      ? decodeRecord(AssignmentSchema, row.record_json, 'assignments')
      : placeholderAssignment(row.id, row.subject_type, row.level);
    ret.push({ ...assignment, srsStage: row.srs_stage });
    seen.add(row.id);
  }

  const subjects = catalogue.subjectsAtLevel(level);
  if (!subjects) return ret;

  const byType: Array<[SubjectType, readonly number[]]> = [
    ['radical', subjects.radicalIds],
    ['kanji', subjects.kanjiIds],
    ['vocabulary', subjects.vocabularyIds],
  ];
  for (const [subjectType, ids] of byType) {
    for (const id of ids) {
      if (seen.has(id)) continue;
      ret.push(placeholderAssignment(id, subjectType, level));
    }
  }
  return ret;
}

export async function getStudyMaterial(
  db: LocalCacheExecutor,
  subjectId: number
): Promise<StudyMaterial | null> {
  const row = await db
    .selectFrom('study_materials')
    .select('record_json')
    .where('id', '=', subjectId)
    .executeTakeFirst();
  return row
    ? decodeRecord(StudyMaterialSchema, row.record_json, 'study_materials')
    : null;
}

export async function getAllPendingStudyMaterials(
  db: LocalCacheExecutor
): Promise<StudyMaterial[]> {
  const rows = await db
    .selectFrom('study_materials as s')
    .innerJoin('pending_study_materials as p', 'p.id', 's.id')
    .select('s.record_json')
    .orderBy('s.id')
    .execute();
  return rows.map((row) =>
    decodeRecord(StudyMaterialSchema, row.record_json, 'study_materials')
  );
}

export async function getUserInfo(
  db: LocalCacheExecutor
): Promise<User | null> {
  const row = await db
    .selectFrom('user')
    .select('record_json')
    .executeTakeFirst();
  return row ? decodeRecord(UserSchema, row.record_json, 'user') : null;
}

export async function getAllLevelProgressions(
  db: LocalCacheExecutor
): Promise<LevelProgression[]> {
  const rows = await db
    .selectFrom('level_progressions')
    .select('record_json')
    .orderBy('level')
    .execute();
  return rows.map((row) =>
    decodeRecord(LevelProgressionSchema, row.record_json, 'level_progressions')
  );
}

export async function getSyncCursors(
  db: LocalCacheExecutor
): Promise<SyncCursors> {
  const row = await db
    .selectFrom('sync')
    .select(['assignments_updated_after', 'study_materials_updated_after'])
    .executeTakeFirst();
  return {
    assignmentsUpdatedAfter: row?.assignments_updated_after ?? '',
    studyMaterialsUpdatedAfter: row?.study_materials_updated_after ?? '',
  };
}

export async function countRows(
  db: LocalCacheExecutor,
  table: 'pending_progress' | 'pending_study_materials'
): Promise<number> {
  const result = await sql<{ count: number }>`
    select count(*) as count from ${sql.table(table)}
  `.execute(db);
  return Number(result.rows[0]?.count ?? 0);
}
