/**
 * @studycache/core - SRS stage ladder
 *
 * Stage 0 is an unlocked lesson, 1-4 apprentice, 5-6 guru, 7 master,
 * 8 enlightened and 9 burned.
 */

import type { Assignment, Progress } from './schemas/records';

export const SRS_LESSON_STAGE = 0;
export const SRS_GURU_STAGE = 5;
export const SRS_BURNED_STAGE = 9;

export const SRS_CATEGORIES = [
  'lesson',
  'apprentice',
  'guru',
  'master',
  'enlightened',
  'burned',
] as const;

export type SrsCategory = (typeof SRS_CATEGORIES)[number];

/**
 * Index into SRS_CATEGORIES for a stage.
 */
export function srsCategoryIndexForStage(stage: number): number {
  if (stage <= SRS_LESSON_STAGE) return 0;
  if (stage <= 4) return 1;
  if (stage <= 6) return 2;
  if (stage === 7) return 3;
  if (stage === 8) return 4;
  return 5;
}

export function srsCategoryForStage(stage: number): SrsCategory {
  return SRS_CATEGORIES[srsCategoryIndexForStage(stage)] ?? 'burned';
}

/**
 * Unlocked but not yet started.
 */
export function isLessonStage(assignment: Assignment): boolean {
  return assignment.srsStage === SRS_LESSON_STAGE && !assignment.startedAt;
}

/**
 * Started and scheduled for a review (now or later).
 */
export function isReviewStage(assignment: Assignment): boolean {
  return (
    assignment.srsStage > SRS_LESSON_STAGE &&
    assignment.srsStage < SRS_BURNED_STAGE &&
    !!assignment.availableAt
  );
}

/**
 * Stage a subject moves to once this progress is recorded: one up for a lesson
 * or a clean review, one down (never below 0) when anything was answered
 * wrong.
 */
export function nextSrsStage(
  currentStage: number,
  progress: Pick<Progress, 'isLesson' | 'meaningWrong' | 'readingWrong'>
): number {
  if (progress.isLesson || (!progress.meaningWrong && !progress.readingWrong)) {
    return currentStage + 1;
  }
  return Math.max(0, currentStage - 1);
}
