/**
 * @studycache/client - Pending study material queue
 */

import {
  createCacheTimer,
  encodeRecord,
  logCacheEvent,
  type RemoteGateway,
  type StudyMaterial,
  type StudyMaterialInput,
  StudyMaterialSchema,
  type SyncProgress,
} from '@studycache/core';
import type { FlushPendingOptions } from './pending-progress';
import { getAllPendingStudyMaterials } from './queries';
import type { LocalCacheExecutor } from './schema';

/**
 * Store an edited study material and mark it for upload.
 */
export async function enqueuePendingStudyMaterial(
  db: LocalCacheExecutor,
  input: StudyMaterialInput
): Promise<StudyMaterial> {
  const material = StudyMaterialSchema.parse(input);

  await db.transaction().execute(async (trx) => {
    await trx
      .replaceInto('study_materials')
      .values({
        id: material.subjectId,
        record_json: encodeRecord(StudyMaterialSchema, material),
      })
      .execute();
    await trx
      .replaceInto('pending_study_materials')
      .values({ id: material.subjectId })
      .execute();
  });

  logCacheEvent({ event: 'cache.enqueue.study_material', rowCount: 1 });
  return material;
}

export async function clearPendingStudyMaterial(
  db: LocalCacheExecutor,
  subjectId: number
): Promise<void> {
  await db
    .deleteFrom('pending_study_materials')
    .where('id', '=', subjectId)
    .execute();
}

/**
 * Push study materials one at a time, unmarking each once acknowledged. The
 * first failure stops the loop and is thrown.
 */
export async function pushPendingStudyMaterials(
  db: LocalCacheExecutor,
  gateway: RemoteGateway,
  materials: readonly StudyMaterial[],
  progress: SyncProgress,
  options: FlushPendingOptions = {}
): Promise<number> {
  if (materials.length === 0) {
    progress.totalUnitCount = 1;
    progress.completedUnitCount = 1;
    return 0;
  }

  progress.totalUnitCount = materials.length;
  let cleared = 0;
  for (const material of materials) {
    const child = progress.createChild(1);
    try {
      await gateway.pushStudyMaterial(material, child);
    } finally {
      child.complete();
    }

    await clearPendingStudyMaterial(db, material.subjectId);
    cleared += 1;
    options.onItemCleared?.();
  }
  return cleared;
}

export async function flushPendingStudyMaterials(
  db: LocalCacheExecutor,
  gateway: RemoteGateway,
  progress: SyncProgress,
  options: FlushPendingOptions = {}
): Promise<number> {
  const elapsed = createCacheTimer();
  const queue = await getAllPendingStudyMaterials(db);
  const cleared = await pushPendingStudyMaterials(
    db,
    gateway,
    queue,
    progress,
    options
  );
  logCacheEvent({
    event: 'cache.flush.study_materials',
    rowCount: cleared,
    durationMs: elapsed(),
  });
  return cleared;
}
