/**
 * @studycache/client - Derived counts over the local cache
 */

import {
  isLessonStage,
  isReviewStage,
  SRS_CATEGORIES,
  type SubjectCatalogue,
  srsCategoryIndexForStage,
} from '@studycache/core';
import { CachedValue } from './cached';
import type { LocalCacheConfig } from './config';
import type { LocalCacheEvents } from './events';
import { countRows, getAllAssignments, getUserInfo } from './queries';
import type { LocalCacheExecutor } from './schema';

const HOUR_MS = 60 * 60 * 1000;

export interface AvailableSubjects {
  lessonCount: number;
  reviewCount: number;
  /** Reviews becoming due in each of the next hours; index 0 = within the hour */
  upcomingReviews: number[];
}

/**
 * Lessons and reviews available now, plus the upcoming-review histogram.
 */
export async function computeAvailableSubjects(
  db: LocalCacheExecutor,
  catalogue: SubjectCatalogue,
  options: { now: Date; upcomingReviewHours: number }
): Promise<AvailableSubjects> {
  const upcomingReviews = new Array<number>(options.upcomingReviewHours).fill(0);
  const user = await getUserInfo(db);
  if (!user) {
    return { lessonCount: 0, reviewCount: 0, upcomingReviews };
  }

  const now = options.now.getTime();
  let lessonCount = 0;
  let reviewCount = 0;

  for (const assignment of await getAllAssignments(db)) {
    if (!catalogue.isValidSubject(assignment.subjectId)) continue;
    if (assignment.level > user.level) continue;

    if (isLessonStage(assignment)) {
      lessonCount += 1;
      continue;
    }
    if (!isReviewStage(assignment) || !assignment.availableAt) continue;

    const dueAt = Date.parse(assignment.availableAt);
    if (dueAt <= now) {
      reviewCount += 1;
      continue;
    }
    const bucket = Math.floor((dueAt - now) / HOUR_MS);
    if (bucket < upcomingReviews.length) {
      upcomingReviews[bucket] = (upcomingReviews[bucket] ?? 0) + 1;
    }
  }

  return { lessonCount, reviewCount, upcomingReviews };
}

export async function computeGuruKanjiCount(
  db: LocalCacheExecutor,
  guruStage: number
): Promise<number> {
  const row = await db
    .selectFrom('subject_progress')
    .select((eb) => eb.fn.countAll<number>().as('count'))
    .where('subject_type', '=', 'kanji')
    .where('srs_stage', '>=', guruStage)
    .executeTakeFirst();
  return Number(row?.count ?? 0);
}

/**
 * Subject counts per SRS category, in SRS_CATEGORIES order. Locked and
 * unstarted subjects (stage 0) are not counted.
 */
export async function computeSrsCategoryCounts(
  db: LocalCacheExecutor
): Promise<number[]> {
  const rows = await db
    .selectFrom('subject_progress')
    .select('srs_stage')
    .select((eb) => eb.fn.countAll<number>().as('count'))
    .where('srs_stage', '>=', 1)
    .groupBy('srs_stage')
    .execute();

  const counts = SRS_CATEGORIES.map(() => 0);
  for (const row of rows) {
    const index = srsCategoryIndexForStage(row.srs_stage);
    counts[index] = (counts[index] ?? 0) + Number(row.count);
  }
  return counts;
}

export interface LocalCacheAggregates {
  pendingProgressCount: CachedValue<number>;
  pendingStudyMaterialsCount: CachedValue<number>;
  availableSubjects: CachedValue<AvailableSubjects>;
  guruKanjiCount: CachedValue<number>;
  srsCategoryCounts: CachedValue<number[]>;
}

export function createLocalCacheAggregates(args: {
  db: LocalCacheExecutor;
  catalogue: SubjectCatalogue;
  events: LocalCacheEvents;
  config: LocalCacheConfig;
  now: () => Date;
}): LocalCacheAggregates {
  const { db, catalogue, events, config, now } = args;
  return {
    pendingProgressCount: new CachedValue({
      compute: () => countRows(db, 'pending_progress'),
      event: 'pendingItemsChanged',
      events,
    }),
    pendingStudyMaterialsCount: new CachedValue({
      compute: () => countRows(db, 'pending_study_materials'),
      event: 'pendingItemsChanged',
      events,
    }),
    availableSubjects: new CachedValue({
      compute: () =>
        computeAvailableSubjects(db, catalogue, {
          now: now(),
          upcomingReviewHours: config.upcomingReviewHours,
        }),
      event: 'availableItemsChanged',
      events,
    }),
    guruKanjiCount: new CachedValue({
      compute: () => computeGuruKanjiCount(db, config.guruStage),
    }),
    srsCategoryCounts: new CachedValue({
      compute: () => computeSrsCategoryCounts(db),
      event: 'srsCategoryCountsChanged',
      events,
    }),
  };
}
