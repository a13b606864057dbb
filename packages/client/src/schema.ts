/**
 * @studycache/client - Local cache schema types (SQLite)
 *
 * Domain records live in `record_json` columns; the scalar columns beside
 * them exist only for WHERE / GROUP BY.
 */

import type { SubjectType } from '@studycache/core';
import type { Generated, Kysely } from 'kysely';

/**
 * Singleton row holding the incremental-fetch cursors.
 */
export interface SyncCursorsTable {
  /** "updated after" watermark for assignments ('' = fetch everything) */
  assignments_updated_after: string;
  /** "updated after" watermark for study materials */
  study_materials_updated_after: string;
}

export interface AssignmentsTable {
  /** Remote assignment id */
  id: number;
  subject_id: number | null;
  /** JSON string of Assignment */
  record_json: string;
}

export interface PendingProgressTable {
  /** Subject id */
  id: number;
  /** JSON string of Progress */
  record_json: string;
}

export interface StudyMaterialsTable {
  /** Subject id */
  id: number;
  /** JSON string of StudyMaterial */
  record_json: string;
}

export interface UserTable {
  /** Always 0 */
  id: number;
  /** JSON string of User */
  record_json: string;
}

export interface PendingStudyMaterialsTable {
  /** Subject id of a study_materials row awaiting push */
  id: number;
}

export interface SubjectProgressTable {
  /** Subject id */
  id: number;
  level: number;
  srs_stage: number;
  subject_type: SubjectType;
}

export interface ErrorLogTable {
  date: Generated<string>;
  stack: string | null;
  code: number | null;
  description: string | null;
  request_url: string | null;
  response_url: string | null;
  request_data: string | null;
  request_headers: string | null;
  response_headers: string | null;
  response_data: string | null;
}

export interface LevelProgressionsTable {
  /** Remote level progression id */
  id: number;
  level: number;
  /** JSON string of LevelProgression */
  record_json: string;
}

export interface LocalCacheDb {
  sync: SyncCursorsTable;
  assignments: AssignmentsTable;
  pending_progress: PendingProgressTable;
  study_materials: StudyMaterialsTable;
  user: UserTable;
  pending_study_materials: PendingStudyMaterialsTable;
  subject_progress: SubjectProgressTable;
  error_log: ErrorLogTable;
  level_progressions: LevelProgressionsTable;
}

/**
 * Either the root Kysely instance or a transaction.
 */
export type LocalCacheExecutor = Kysely<LocalCacheDb>;

export type LocalCacheTable = keyof LocalCacheDb & string;
