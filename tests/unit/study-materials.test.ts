/**
 * Tests for the pending study material queue
 */

import { beforeEach, describe, expect, it } from 'vitest';
import {
  configureCacheTelemetry,
  createSilentCacheTelemetry,
  enqueuePendingStudyMaterial,
  ensureLocalCacheSchema,
  flushPendingStudyMaterials,
  getAllPendingStudyMaterials,
  getStudyMaterial,
  type LocalCacheExecutor,
  LocalCachingClient,
  RemoteRequestError,
  SyncProgress,
} from '@studycache/client';
import { createTestDb, MockGateway, NOW, TestCatalogue } from './test-utils';

let db: LocalCacheExecutor;
let gateway: MockGateway;

beforeEach(async () => {
  configureCacheTelemetry(createSilentCacheTelemetry());
  db = createTestDb();
  gateway = new MockGateway();
  await ensureLocalCacheSchema(db);
});

describe('enqueuePendingStudyMaterial', () => {
  it('stores the material by subject and marks it for upload', async () => {
    const material = await enqueuePendingStudyMaterial(db, {
      subjectId: 12,
      meaningNote: 'looks like a ladder',
      meaningSynonyms: ['steps'],
    });

    expect(material).toEqual({
      id: 0,
      subjectId: 12,
      meaningNote: 'looks like a ladder',
      meaningSynonyms: ['steps'],
    });
    expect(await getStudyMaterial(db, 12)).toEqual(material);
    expect(await getAllPendingStudyMaterials(db)).toEqual([material]);
  });

  it('replaces an earlier edit of the same subject', async () => {
    await enqueuePendingStudyMaterial(db, { subjectId: 12, meaningNote: 'one' });
    await enqueuePendingStudyMaterial(db, { subjectId: 12, meaningNote: 'two' });

    const pending = await getAllPendingStudyMaterials(db);
    expect(pending.map((m) => m.meaningNote)).toEqual(['two']);
  });
});

describe('flushPendingStudyMaterials', () => {
  it('unmarks pushed materials but keeps their content', async () => {
    await enqueuePendingStudyMaterial(db, { subjectId: 12, readingNote: 'じゅう' });
    const progress = new SyncProgress();

    expect(await flushPendingStudyMaterials(db, gateway, progress)).toBe(1);

    expect(await getAllPendingStudyMaterials(db)).toEqual([]);
    expect((await getStudyMaterial(db, 12))?.readingNote).toBe('じゅう');
    expect(progress.completedUnitCount).toBe(1);
  });

  it('keeps the marker when the push fails', async () => {
    await enqueuePendingStudyMaterial(db, { subjectId: 12 });
    const failure = new RemoteRequestError('Unprocessable Entity', 422);
    gateway.failures.pushStudyMaterial = failure;

    await expect(
      flushPendingStudyMaterials(db, gateway, new SyncProgress())
    ).rejects.toBe(failure);
    expect(await getAllPendingStudyMaterials(db)).toHaveLength(1);
  });
});

describe('LocalCachingClient.updateStudyMaterial', () => {
  it('pushes the edit right away', async () => {
    const client = await LocalCachingClient.open({
      db,
      gateway,
      catalogue: new TestCatalogue(),
      now: () => NOW,
    });

    await client.updateStudyMaterial({ subjectId: 30, meaningSynonyms: ['thirty'] });

    expect(gateway.calls).toEqual(['pushStudyMaterial:30']);
    expect(gateway.pushedStudyMaterials[0]?.meaningSynonyms).toEqual(['thirty']);
    expect(await client.getPendingStudyMaterialsCount()).toBe(0);
    expect(await client.getAllPendingStudyMaterials()).toEqual([]);
  });
});
