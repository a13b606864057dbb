import { describe, expect, it } from 'vitest';
import type { Assignment } from '../schemas/records';
import {
  isLessonStage,
  isReviewStage,
  nextSrsStage,
  SRS_CATEGORIES,
  srsCategoryForStage,
} from '../srs';

const base: Assignment = {
  id: 1,
  subjectId: 1,
  subjectType: 'kanji',
  level: 1,
  srsStage: 0,
};

describe('nextSrsStage', () => {
  it('moves up after a lesson or a clean review', () => {
    expect(
      nextSrsStage(0, { isLesson: true, meaningWrong: false, readingWrong: false })
    ).toBe(1);
    expect(
      nextSrsStage(4, { isLesson: false, meaningWrong: false, readingWrong: false })
    ).toBe(5);
  });

  it('moves down after any wrong answer, never below 0', () => {
    expect(
      nextSrsStage(4, { isLesson: false, meaningWrong: true, readingWrong: false })
    ).toBe(3);
    expect(
      nextSrsStage(4, { isLesson: false, meaningWrong: false, readingWrong: true })
    ).toBe(3);
    expect(
      nextSrsStage(0, { isLesson: false, meaningWrong: true, readingWrong: true })
    ).toBe(0);
  });

  it('ignores wrong answers on a lesson', () => {
    expect(
      nextSrsStage(0, { isLesson: true, meaningWrong: true, readingWrong: false })
    ).toBe(1);
  });
});

describe('categories', () => {
  it('maps each stage to its category', () => {
    expect(
      [0, 1, 2, 3, 4, 5, 6, 7, 8, 9].map((stage) => srsCategoryForStage(stage))
    ).toEqual([
      'lesson',
      'apprentice',
      'apprentice',
      'apprentice',
      'apprentice',
      'guru',
      'guru',
      'master',
      'enlightened',
      'burned',
    ]);
    expect(SRS_CATEGORIES).toHaveLength(6);
  });
});

describe('lesson and review stages', () => {
  it('treats an unstarted stage-0 assignment as a lesson', () => {
    expect(isLessonStage(base)).toBe(true);
    expect(isLessonStage({ ...base, startedAt: '2026-01-01T00:00:00Z' })).toBe(
      false
    );
  });

  it('needs a schedule and a stage between 1 and 8 for a review', () => {
    const scheduled = { ...base, availableAt: '2026-01-01T00:00:00Z' };
    expect(isReviewStage({ ...scheduled, srsStage: 1 })).toBe(true);
    expect(isReviewStage({ ...scheduled, srsStage: 8 })).toBe(true);
    expect(isReviewStage({ ...scheduled, srsStage: 9 })).toBe(false);
    expect(isReviewStage({ ...base, srsStage: 3 })).toBe(false);
  });
});
