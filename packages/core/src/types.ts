/**
 * @studycache/core - Collaborator interfaces
 *
 * The cache never talks HTTP and never owns the curriculum. It consumes a
 * remote gateway and a subject catalogue through these interfaces.
 */

import type { SyncProgress } from './progress';
import type {
  Assignment,
  LevelProgression,
  Progress,
  StudyMaterial,
  User,
} from './schemas/records';

// ============================================================================
// Remote gateway
// ============================================================================

/**
 * One incremental page set: every record updated after the cursor, and the
 * cursor to use next time.
 */
export interface IncrementalFetchResult<T> {
  items: T[];
  updatedAt: string;
}

/**
 * Network access to the remote service.
 *
 * Failures are thrown: RemoteRequestError for status codes (401 means the
 * session expired, 422 on a push means the item can never be accepted),
 * RemoteDecodeError for malformed bodies, RemoteConnectionError when the
 * request never completed.
 */
export interface RemoteGateway {
  fetchAssignments(
    updatedAfter: string,
    progress: SyncProgress
  ): Promise<IncrementalFetchResult<Assignment>>;

  fetchStudyMaterials(
    updatedAfter: string,
    progress: SyncProgress
  ): Promise<IncrementalFetchResult<StudyMaterial>>;

  fetchUser(progress: SyncProgress): Promise<User>;

  fetchLevelProgressions(progress: SyncProgress): Promise<LevelProgression[]>;

  pushProgress(item: Progress, progress: SyncProgress): Promise<void>;

  pushStudyMaterial(
    material: StudyMaterial,
    progress: SyncProgress
  ): Promise<void>;
}

// ============================================================================
// Subject catalogue
// ============================================================================

export interface SubjectsByLevel {
  radicalIds: readonly number[];
  kanjiIds: readonly number[];
  vocabularyIds: readonly number[];
}

/**
 * Read-only view of the immutable curriculum shipped with the application.
 */
export interface SubjectCatalogue {
  /** Whether the subject exists and is within the user's reach */
  isValidSubject(subjectId: number): boolean;
  /** Subjects at a level, or undefined when the level does not exist */
  subjectsAtLevel(level: number): SubjectsByLevel | undefined;
  /** Subjects removed from the curriculum since earlier releases */
  readonly deletedSubjectIds: Iterable<number>;
}
