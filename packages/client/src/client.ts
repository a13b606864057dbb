/**
 * @studycache/client - LocalCachingClient
 *
 * Single entry point for the offline-first cache:
 * - Migrates the store on open
 * - Queues progress and study material edits, pushing them immediately
 * - Fetches and merges remote changes on sync
 * - Memoizes derived counts and emits change events
 */

import {
  type Assignment,
  captureCacheException,
  countCacheMetric,
  createCacheTimer,
  type LevelProgression,
  logCacheEvent,
  type Progress,
  type ProgressInput,
  type RemoteGateway,
  type StudyMaterial,
  type StudyMaterialInput,
  type SubjectCatalogue,
  SyncProgress,
  type User,
} from '@studycache/core';
import {
  type AvailableSubjects,
  createLocalCacheAggregates,
  type LocalCacheAggregates,
} from './aggregates';
import {
  type LocalCacheConfig,
  type LocalCacheConfigInput,
  resolveLocalCacheConfig,
} from './config';
import {
  type ErrorLogEntry,
  getErrorLogEntries,
  recordErrorLogEntry,
} from './error-log';
import { type CacheFailure, classifyCacheFailure } from './errors';
import {
  type LocalCacheEventListener,
  LocalCacheEvents,
  type LocalCacheEventType,
} from './events';
import {
  fetchAssignments,
  fetchLevelProgressions,
  fetchStudyMaterials,
  fetchUser,
  resetAssignmentsCursor,
} from './fetch';
import { ensureLocalCacheSchema } from './migrate';
import {
  enqueuePendingProgress,
  flushPendingProgress,
  pushPendingProgress,
} from './pending-progress';
import {
  enqueuePendingStudyMaterial,
  flushPendingStudyMaterials,
  pushPendingStudyMaterials,
} from './pending-study-materials';
import {
  getAllAssignments,
  getAllLevelProgressions,
  getAllPendingProgress,
  getAllPendingStudyMaterials,
  getAssignment,
  getAssignmentsAtLevel,
  getStudyMaterial,
  getSyncCursors,
  getUserInfo,
  type SyncCursors,
} from './queries';
import type { LocalCacheExecutor } from './schema';

/**
 * Progress units per sync: one per queue flush, then 8 for assignments and
 * one each for study materials, user and level progressions.
 */
export const SYNC_UNITS = {
  pendingProgress: 1,
  pendingStudyMaterials: 1,
  assignments: 8,
  studyMaterials: 1,
  user: 1,
  levelProgressions: 1,
} as const;

export const SYNC_TOTAL_UNITS = Object.values(SYNC_UNITS).reduce(
  (sum, units) => sum + units,
  0
);

export interface LocalCachingClientOptions {
  /** Kysely database instance (see createDatabase) */
  db: LocalCacheExecutor;
  /** Network access to the remote service */
  gateway: RemoteGateway;
  /** The curriculum shipped with the application */
  catalogue: SubjectCatalogue;
  /** Optional: tunables (see LocalCacheConfigSchema) */
  config?: LocalCacheConfigInput;
  /** Optional: clock used for due-review arithmetic (default: system time) */
  now?: () => Date;
}

export interface SyncOptions {
  /** Keep the assignments cursor instead of re-downloading everything */
  quick?: boolean;
  /** Receives SYNC_TOTAL_UNITS units of work */
  progress?: SyncProgress;
}

export interface SyncResult {
  /** 'skipped' when another sync was already running */
  status: 'completed' | 'failed' | 'skipped';
  /** Every failure seen, already classified and recorded */
  errors: unknown[];
}

export class LocalCachingClient {
  private readonly events = new LocalCacheEvents();
  private readonly aggregates: LocalCacheAggregates;
  private syncing = false;
  private closed = false;

  private constructor(
    private readonly db: LocalCacheExecutor,
    private readonly gateway: RemoteGateway,
    private readonly catalogue: SubjectCatalogue,
    readonly config: LocalCacheConfig,
    now: () => Date
  ) {
    this.aggregates = createLocalCacheAggregates({
      db,
      catalogue,
      events: this.events,
      config,
      now,
    });
  }

  /**
   * Migrate the store and purge subjects the catalogue no longer has.
   * Throws when the store cannot be migrated.
   */
  static async open(
    options: LocalCachingClientOptions
  ): Promise<LocalCachingClient> {
    const config = resolveLocalCacheConfig(options.config);
    await ensureLocalCacheSchema(options.db, {
      deletedSubjectIds: options.catalogue.deletedSubjectIds,
    });
    return new LocalCachingClient(
      options.db,
      options.gateway,
      options.catalogue,
      config,
      options.now ?? (() => new Date())
    );
  }

  get isSyncing(): boolean {
    return this.syncing;
  }

  on(type: LocalCacheEventType, listener: LocalCacheEventListener): () => void {
    return this.events.on(type, listener);
  }

  // ===========================================================================
  // Derived counts
  // ===========================================================================

  getPendingProgressCount(): Promise<number> {
    return this.aggregates.pendingProgressCount.get();
  }

  getPendingStudyMaterialsCount(): Promise<number> {
    return this.aggregates.pendingStudyMaterialsCount.get();
  }

  getAvailableSubjects(): Promise<AvailableSubjects> {
    return this.aggregates.availableSubjects.get();
  }

  async getAvailableLessonCount(): Promise<number> {
    return (await this.getAvailableSubjects()).lessonCount;
  }

  async getAvailableReviewCount(): Promise<number> {
    return (await this.getAvailableSubjects()).reviewCount;
  }

  async getUpcomingReviews(): Promise<number[]> {
    return [...(await this.getAvailableSubjects()).upcomingReviews];
  }

  getGuruKanjiCount(): Promise<number> {
    return this.aggregates.guruKanjiCount.get();
  }

  async getSrsCategoryCounts(): Promise<number[]> {
    return [...(await this.aggregates.srsCategoryCounts.get())];
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  getAllAssignments(): Promise<Assignment[]> {
    return getAllAssignments(this.db);
  }

  getAssignments(level: number): Promise<Assignment[]> {
    return getAssignmentsAtLevel(this.db, this.catalogue, level);
  }

  async getAssignmentsAtUsersCurrentLevel(): Promise<Assignment[]> {
    const user = await getUserInfo(this.db);
    if (!user) return [];
    return this.getAssignments(user.level);
  }

  getAssignment(subjectId: number): Promise<Assignment | null> {
    return getAssignment(this.db, subjectId);
  }

  getAllPendingProgress(): Promise<Progress[]> {
    return getAllPendingProgress(this.db);
  }

  getAllPendingStudyMaterials(): Promise<StudyMaterial[]> {
    return getAllPendingStudyMaterials(this.db);
  }

  getStudyMaterial(subjectId: number): Promise<StudyMaterial | null> {
    return getStudyMaterial(this.db, subjectId);
  }

  getAllLevelProgressions(): Promise<LevelProgression[]> {
    return getAllLevelProgressions(this.db);
  }

  getUserInfo(): Promise<User | null> {
    return getUserInfo(this.db);
  }

  getSyncCursors(): Promise<SyncCursors> {
    return getSyncCursors(this.db);
  }

  getErrorLogEntries(): Promise<ErrorLogEntry[]> {
    return getErrorLogEntries(this.db);
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * Record completed lessons or reviews and try to push them right away.
   * Resolves once the push attempt finished; push failures are recorded, not
   * thrown.
   */
  async recordProgress(items: readonly ProgressInput[]): Promise<void> {
    const recorded = await enqueuePendingProgress(this.db, items);
    if (recorded.length === 0) return;

    this.aggregates.pendingProgressCount.invalidate();
    this.aggregates.availableSubjects.invalidate();
    this.aggregates.srsCategoryCounts.invalidate();
    this.aggregates.guruKanjiCount.invalidate();

    try {
      await pushPendingProgress(
        this.db,
        this.gateway,
        recorded,
        new SyncProgress(),
        { onItemCleared: () => this.aggregates.pendingProgressCount.invalidate() }
      );
    } catch (err) {
      await this.handleError(err);
    }
  }

  /**
   * Save a study material locally and try to push it right away.
   */
  async updateStudyMaterial(input: StudyMaterialInput): Promise<void> {
    const material = await enqueuePendingStudyMaterial(this.db, input);
    this.aggregates.pendingStudyMaterialsCount.invalidate();

    try {
      await pushPendingStudyMaterials(
        this.db,
        this.gateway,
        [material],
        new SyncProgress(),
        {
          onItemCleared: () =>
            this.aggregates.pendingStudyMaterialsCount.invalidate(),
        }
      );
    } catch (err) {
      await this.handleError(err);
    }
  }

  // ===========================================================================
  // Sync
  // ===========================================================================

  /**
   * Push both queues, then fetch and merge remote changes.
   *
   * Only one sync runs at a time; a call made while one is running resolves
   * immediately with status 'skipped'. Never throws.
   */
  async sync(options: SyncOptions = {}): Promise<SyncResult> {
    if (this.syncing) {
      return { status: 'skipped', errors: [] };
    }
    this.syncing = true;

    const elapsed = createCacheTimer();
    const progress = options.progress ?? new SyncProgress();
    const errors: unknown[] = [];

    try {
      progress.totalUnitCount = SYNC_TOTAL_UNITS;
      if (!options.quick) {
        await this.settle(errors, [resetAssignmentsCursor(this.db)]);
      }

      await this.settle(errors, [
        flushPendingProgress(
          this.db,
          this.gateway,
          progress.createChild(SYNC_UNITS.pendingProgress),
          {
            onItemCleared: () =>
              this.aggregates.pendingProgressCount.invalidate(),
          }
        ),
        flushPendingStudyMaterials(
          this.db,
          this.gateway,
          progress.createChild(SYNC_UNITS.pendingStudyMaterials),
          {
            onItemCleared: () =>
              this.aggregates.pendingStudyMaterialsCount.invalidate(),
          }
        ),
      ]);

      const fetched = await this.settle(errors, [
        this.withChild(progress, SYNC_UNITS.assignments, (child) =>
          fetchAssignments(this.db, this.gateway, child)
        ),
        this.withChild(progress, SYNC_UNITS.studyMaterials, (child) =>
          fetchStudyMaterials(this.db, this.gateway, child)
        ),
        this.withChild(progress, SYNC_UNITS.user, (child) =>
          fetchUser(this.db, this.gateway, child)
        ),
        this.withChild(progress, SYNC_UNITS.levelProgressions, (child) =>
          fetchLevelProgressions(this.db, this.gateway, child)
        ),
      ]);

      if (fetched) {
        this.aggregates.availableSubjects.invalidate();
        this.aggregates.srsCategoryCounts.invalidate();
        this.aggregates.guruKanjiCount.invalidate();
        this.events.emit('userInfoChanged');
      }
    } catch (err) {
      // Raised by the caller's progress listeners
      errors.push(err);
      captureCacheException(err, { event: 'cache.sync.progress_failed' });
    } finally {
      this.syncing = false;
      try {
        progress.completedUnitCount = progress.totalUnitCount;
      } catch (err) {
        errors.push(err);
        captureCacheException(err, { event: 'cache.sync.progress_failed' });
      }
    }

    const status = errors.length === 0 ? 'completed' : 'failed';
    countCacheMetric('cache.sync.results', 1, { status });
    logCacheEvent({
      event: 'cache.sync',
      level: status === 'completed' ? 'info' : 'warn',
      quick: options.quick ?? false,
      status,
      errorCount: errors.length,
      durationMs: elapsed(),
    });
    return { status, errors };
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Delete every cached and queued row and reset both cursors, e.g. on
   * sign-out.
   */
  async clearAllData(): Promise<void> {
    await this.db.transaction().execute(async (trx) => {
      for (const table of [
        'assignments',
        'pending_progress',
        'study_materials',
        'user',
        'pending_study_materials',
        'subject_progress',
        'error_log',
        'level_progressions',
      ] as const) {
        await trx.deleteFrom(table).execute();
      }
      await trx
        .updateTable('sync')
        .set({
          assignments_updated_after: '',
          study_materials_updated_after: '',
        })
        .execute();
    });

    const {
      pendingProgressCount,
      pendingStudyMaterialsCount,
      availableSubjects,
      guruKanjiCount,
      srsCategoryCounts,
    } = this.aggregates;
    for (const aggregate of [
      pendingProgressCount,
      pendingStudyMaterialsCount,
      availableSubjects,
      guruKanjiCount,
      srsCategoryCounts,
    ]) {
      aggregate.invalidate();
    }
    this.events.emit('userInfoChanged');
    logCacheEvent({ event: 'cache.clear_all_data' });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.events.clear();
    await this.db.destroy();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async withChild<T>(
    progress: SyncProgress,
    pendingUnitCount: number,
    run: (child: SyncProgress) => Promise<T>
  ): Promise<T> {
    const child = progress.createChild(pendingUnitCount);
    const result = await run(child);
    child.complete();
    return result;
  }

  /**
   * Wait for every task. Each rejection is collected and handled; resolves
   * true when none failed.
   */
  private async settle(
    errors: unknown[],
    tasks: Promise<unknown>[]
  ): Promise<boolean> {
    const results = await Promise.allSettled(tasks);
    let ok = true;
    for (const result of results) {
      if (result.status === 'fulfilled') continue;
      ok = false;
      errors.push(result.reason);
      await this.handleError(result.reason);
    }
    return ok;
  }

  /**
   * Classify a failure and act on it. Never throws.
   */
  private async handleError(error: unknown): Promise<void> {
    const failure: CacheFailure = classifyCacheFailure(error);
    switch (failure.kind) {
      case 'unauthorized':
        this.events.emit('unauthorized');
        return;
      case 'unprocessable':
      case 'connectivity':
        logCacheEvent({
          event: 'cache.error_ignored',
          level: 'debug',
          kind: failure.kind,
        });
        return;
      default:
        try {
          await recordErrorLogEntry(this.db, failure.entry, {
            limit: this.config.errorLogLimit,
          });
        } catch (logError) {
          captureCacheException(logError, {
            event: 'cache.error_log.write_failed',
          });
        }
    }
  }
}
