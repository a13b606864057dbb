/**
 * @studycache/client - Pending progress queue
 *
 * Completed lessons and reviews are written here first and pushed one at a
 * time. The subject's committed assignment is dropped on enqueue; the next
 * assignments fetch brings back the server's view once the push landed.
 */

import {
  createCacheTimer,
  encodeRecord,
  logCacheEvent,
  nextSrsStage,
  type Progress,
  type ProgressInput,
  ProgressSchema,
  RemoteRequestError,
  type RemoteGateway,
  type SyncProgress,
} from '@studycache/core';
import { getAllPendingProgress } from './queries';
import type { LocalCacheExecutor } from './schema';

/** Status the remote service returns for a report it will never accept */
export const UNPROCESSABLE_STATUS = 422;

export function isUnprocessableError(error: unknown): boolean {
  return (
    error instanceof RemoteRequestError && error.status === UNPROCESSABLE_STATUS
  );
}

/**
 * Record progress items in one transaction. Returns the parsed items.
 */
export async function enqueuePendingProgress(
  db: LocalCacheExecutor,
  items: readonly ProgressInput[]
): Promise<Progress[]> {
  const parsed = items.map((item) => ProgressSchema.parse(item));
  if (parsed.length === 0) return parsed;

  await db.transaction().execute(async (trx) => {
    for (const item of parsed) {
      const { assignment } = item;

      await trx
        .deleteFrom('assignments')
        .where('subject_id', '=', assignment.subjectId)
        .execute();

      await trx
        .replaceInto('pending_progress')
        .values({
          id: assignment.subjectId,
          record_json: encodeRecord(ProgressSchema, item),
        })
        .execute();

      const existing = await trx
        .selectFrom('subject_progress')
        .select('srs_stage')
        .where('id', '=', assignment.subjectId)
        .executeTakeFirst();
      const baseStage = existing?.srs_stage ?? assignment.srsStage;

      await trx
        .replaceInto('subject_progress')
        .values({
          id: assignment.subjectId,
          level: assignment.level,
          srs_stage: nextSrsStage(baseStage, item),
          subject_type: assignment.subjectType,
        })
        .execute();
    }
  });

  logCacheEvent({ event: 'cache.enqueue.progress', rowCount: parsed.length });
  return parsed;
}

export async function clearPendingProgress(
  db: LocalCacheExecutor,
  subjectId: number
): Promise<void> {
  await db.deleteFrom('pending_progress').where('id', '=', subjectId).execute();
}

export interface FlushPendingOptions {
  /** Called after each row leaves the queue */
  onItemCleared?: () => void;
}

/**
 * Push progress reports one at a time, clearing each from the queue once the
 * server acknowledged it.
 *
 * A report the server rejects as unprocessable is dropped. Any other failure
 * stops the loop and is thrown; rows not yet acknowledged stay queued.
 */
export async function pushPendingProgress(
  db: LocalCacheExecutor,
  gateway: RemoteGateway,
  items: readonly Progress[],
  progress: SyncProgress,
  options: FlushPendingOptions = {}
): Promise<number> {
  if (items.length === 0) {
    progress.totalUnitCount = 1;
    progress.completedUnitCount = 1;
    return 0;
  }

  progress.totalUnitCount = items.length;
  let cleared = 0;
  for (const item of items) {
    const child = progress.createChild(1);
    try {
      await gateway.pushProgress(item, child);
    } catch (err) {
      if (!isUnprocessableError(err)) throw err;
      logCacheEvent({
        event: 'cache.flush.progress.rejected',
        level: 'warn',
        subjectId: item.assignment.subjectId,
      });
    } finally {
      child.complete();
    }

    await clearPendingProgress(db, item.assignment.subjectId);
    cleared += 1;
    options.onItemCleared?.();
  }
  return cleared;
}

/**
 * Push the whole queue, lowest subject id first.
 */
export async function flushPendingProgress(
  db: LocalCacheExecutor,
  gateway: RemoteGateway,
  progress: SyncProgress,
  options: FlushPendingOptions = {}
): Promise<number> {
  const elapsed = createCacheTimer();
  const queue = await getAllPendingProgress(db);
  const cleared = await pushPendingProgress(
    db,
    gateway,
    queue,
    progress,
    options
  );
  logCacheEvent({
    event: 'cache.flush.progress',
    rowCount: cleared,
    durationMs: elapsed(),
  });
  return cleared;
}
