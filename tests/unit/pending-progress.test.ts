/**
 * Tests for the pending progress queue
 *
 * Covers:
 * - enqueue replaces the committed assignment with a pending report
 * - SRS stage transitions across a sequence of reports
 * - flush: acknowledged rows leave, unprocessable rows are dropped, other
 *   failures stop the flush
 * - recordProgress pushes immediately and never throws
 */

import { beforeEach, describe, expect, it } from 'vitest';
import {
  AssignmentSchema,
  configureCacheTelemetry,
  createSilentCacheTelemetry,
  encodeRecord,
  enqueuePendingProgress,
  ensureLocalCacheSchema,
  flushPendingProgress,
  getAllPendingProgress,
  getAssignment,
  type LocalCacheExecutor,
  LocalCachingClient,
  type ProgressInput,
  RemoteConnectionError,
  RemoteRequestError,
  SyncProgress,
} from '@studycache/client';
import {
  createTestDb,
  MockGateway,
  makeAssignment,
  NOW,
  nextTick,
  TestCatalogue,
} from './test-utils';

let db: LocalCacheExecutor;
let gateway: MockGateway;

beforeEach(async () => {
  configureCacheTelemetry(createSilentCacheTelemetry());
  db = createTestDb();
  gateway = new MockGateway();
  await ensureLocalCacheSchema(db);
});

function review(
  subjectId: number,
  srsStage: number,
  wrong: { meaning?: boolean; reading?: boolean } = {}
): ProgressInput {
  return {
    assignment: makeAssignment({ subjectId, srsStage }),
    isLesson: false,
    meaningWrong: wrong.meaning ?? false,
    readingWrong: wrong.reading ?? false,
    createdAt: NOW.toISOString(),
  };
}

function lesson(subjectId: number): ProgressInput {
  return {
    assignment: makeAssignment({ subjectId, srsStage: 0 }),
    isLesson: true,
    createdAt: NOW.toISOString(),
  };
}

async function stageOf(subjectId: number): Promise<number | undefined> {
  const row = await db
    .selectFrom('subject_progress')
    .select('srs_stage')
    .where('id', '=', subjectId)
    .executeTakeFirst();
  return row?.srs_stage;
}

async function pendingSubjectIds(): Promise<number[]> {
  return (await getAllPendingProgress(db)).map((p) => p.assignment.subjectId);
}

describe('enqueuePendingProgress', () => {
  it('moves a finished lesson from assignments into the queue', async () => {
    const assignment = makeAssignment({ subjectId: 42, srsStage: 0 });
    await db
      .insertInto('assignments')
      .values({
        id: assignment.id,
        subject_id: 42,
        record_json: encodeRecord(AssignmentSchema, assignment),
      })
      .execute();

    await enqueuePendingProgress(db, [lesson(42)]);

    const assignments = await db
      .selectFrom('assignments')
      .select('subject_id')
      .execute();
    expect(assignments).toEqual([]);
    expect(await pendingSubjectIds()).toEqual([42]);
    expect(await stageOf(42)).toBe(1);
  });

  it('keeps one queued report per subject', async () => {
    await enqueuePendingProgress(db, [review(7, 2)]);
    await enqueuePendingProgress(db, [review(7, 2, { meaning: true })]);

    const pending = await getAllPendingProgress(db);
    expect(pending).toHaveLength(1);
    expect(pending[0]?.meaningWrong).toBe(true);
  });

  it('serves the queued assignment before the committed one', async () => {
    await enqueuePendingProgress(db, [review(8, 4)]);
    const assignment = await getAssignment(db, 8);
    expect(assignment?.srsStage).toBe(4);
    expect(assignment?.subjectId).toBe(8);
  });

  it('moves the stage up on a clean answer and down on a wrong one', async () => {
    await enqueuePendingProgress(db, [review(5, 3)]);
    expect(await stageOf(5)).toBe(4);

    // The stored stage is the base from now on, whatever the payload says.
    await enqueuePendingProgress(db, [review(5, 3, { reading: true })]);
    expect(await stageOf(5)).toBe(3);

    await enqueuePendingProgress(db, [review(5, 3, { meaning: true })]);
    expect(await stageOf(5)).toBe(2);

    await enqueuePendingProgress(db, [review(5, 3)]);
    expect(await stageOf(5)).toBe(3);
  });

  it('never moves below stage 0', async () => {
    await enqueuePendingProgress(db, [
      review(6, 0, { meaning: true, reading: true }),
    ]);
    expect(await stageOf(6)).toBe(0);
  });

  it('rejects malformed reports without writing anything', async () => {
    const bad: ProgressInput = { ...review(9, 1), createdAt: 'yesterday' };
    await expect(enqueuePendingProgress(db, [review(10, 1), bad])).rejects.toThrow();
    expect(await pendingSubjectIds()).toEqual([]);
  });
});

describe('flushPendingProgress', () => {
  it('reports a finished unit for an empty queue', async () => {
    const progress = new SyncProgress();
    expect(await flushPendingProgress(db, gateway, progress)).toBe(0);
    expect(progress.totalUnitCount).toBe(1);
    expect(progress.completedUnitCount).toBe(1);
    expect(gateway.calls).toEqual([]);
  });

  it('pushes every report in subject order and clears the queue', async () => {
    await enqueuePendingProgress(db, [review(3, 1), review(1, 1), review(2, 1)]);
    const progress = new SyncProgress();
    let cleared = 0;

    const count = await flushPendingProgress(db, gateway, progress, {
      onItemCleared: () => {
        cleared += 1;
      },
    });

    expect(count).toBe(3);
    expect(cleared).toBe(3);
    expect(gateway.calls).toEqual([
      'pushProgress:1',
      'pushProgress:2',
      'pushProgress:3',
    ]);
    expect(await pendingSubjectIds()).toEqual([]);
    expect(progress.totalUnitCount).toBe(3);
    expect(progress.completedUnitCount).toBe(3);
  });

  it('drops a report the server cannot process', async () => {
    await enqueuePendingProgress(db, [review(1, 1), review(2, 1), review(3, 1)]);
    gateway.progressFailures.set(
      2,
      new RemoteRequestError('Unprocessable Entity', 422)
    );

    await flushPendingProgress(db, gateway, new SyncProgress());

    expect(gateway.pushedProgress.map((p) => p.assignment.subjectId)).toEqual([
      1, 3,
    ]);
    expect(await pendingSubjectIds()).toEqual([]);
  });

  it('stops at the first other failure and keeps the rest queued', async () => {
    await enqueuePendingProgress(db, [review(1, 1), review(2, 1), review(3, 1)]);
    const failure = new RemoteRequestError('Internal Server Error', 500);
    gateway.progressFailures.set(2, failure);
    const progress = new SyncProgress();

    await expect(flushPendingProgress(db, gateway, progress)).rejects.toBe(
      failure
    );

    expect(gateway.calls).toEqual(['pushProgress:1', 'pushProgress:2']);
    expect(await pendingSubjectIds()).toEqual([2, 3]);
    expect(progress.completedUnitCount).toBe(2);
    expect(progress.isFinished).toBe(false);
  });
});

describe('LocalCachingClient.recordProgress', () => {
  let client: LocalCachingClient;

  beforeEach(async () => {
    client = await LocalCachingClient.open({
      db,
      gateway,
      catalogue: new TestCatalogue(),
      now: () => NOW,
    });
  });

  it('keeps the report queued while offline', async () => {
    gateway.failures.pushProgress = new RemoteConnectionError(
      'The Internet connection appears to be offline.',
      'offline'
    );

    await client.recordProgress([lesson(42)]);

    expect(await client.getAssignment(42)).toMatchObject({
      subjectId: 42,
      srsStage: 0,
    });
    expect(await client.getPendingProgressCount()).toBe(1);
    expect(await stageOf(42)).toBe(1);
    expect(await client.getErrorLogEntries()).toEqual([]);
  });

  it('clears the report once pushed and announces both changes', async () => {
    let notifications = 0;
    client.on('pendingItemsChanged', () => {
      notifications += 1;
    });

    await client.recordProgress([review(4, 2)]);
    await nextTick();

    expect(gateway.calls).toEqual(['pushProgress:4']);
    expect(await client.getPendingProgressCount()).toBe(0);
    expect(notifications).toBe(2);
  });

  it('records a server failure in the error log instead of throwing', async () => {
    gateway.failures.pushProgress = new RemoteRequestError(
      'Service Unavailable',
      503,
      { url: 'https://api.example.test/v2/reviews', method: 'POST' }
    );

    await client.recordProgress([review(4, 2)]);

    const entries = await client.getErrorLogEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0]?.code).toBe(503);
    expect(entries[0]?.requestUrl).toBe('https://api.example.test/v2/reviews');
    expect(await client.getPendingProgressCount()).toBe(1);
  });
});
