/**
 * @studycache/core - Record Zod schemas
 *
 * Every record kept by the local cache is stored as JSON and parsed back
 * through one of these schemas, so a row always round-trips to the same value.
 */

import { z } from 'zod';

// ============================================================================
// Subjects
// ============================================================================

export const SubjectTypeSchema = z.enum(['radical', 'kanji', 'vocabulary']);
export type SubjectType = z.infer<typeof SubjectTypeSchema>;

/**
 * Timestamps travel as ISO-8601 strings, exactly as the remote service sends
 * them.
 */
const TimestampSchema = z.string().datetime({ offset: true });

// ============================================================================
// Assignment
// ============================================================================

export const AssignmentSchema = z.object({
  /** Remote assignment id (0 for placeholders that have no remote row yet) */
  id: z.number().int().nonnegative(),
  subjectId: z.number().int().positive(),
  subjectType: SubjectTypeSchema,
  level: z.number().int().nonnegative(),
  srsStage: z.number().int().min(0).max(9),
  availableAt: TimestampSchema.nullable().optional(),
  startedAt: TimestampSchema.nullable().optional(),
  passedAt: TimestampSchema.nullable().optional(),
  burnedAt: TimestampSchema.nullable().optional(),
});

export type Assignment = z.infer<typeof AssignmentSchema>;

// ============================================================================
// Progress (a completed lesson or review, not yet acknowledged)
// ============================================================================

export const ProgressSchema = z.object({
  assignment: AssignmentSchema,
  isLesson: z.boolean(),
  meaningWrong: z.boolean().default(false),
  readingWrong: z.boolean().default(false),
  meaningWrongCount: z.number().int().nonnegative().default(0),
  readingWrongCount: z.number().int().nonnegative().default(0),
  createdAt: TimestampSchema,
});

export type Progress = z.infer<typeof ProgressSchema>;
export type ProgressInput = z.input<typeof ProgressSchema>;

// ============================================================================
// Study materials
// ============================================================================

export const StudyMaterialSchema = z.object({
  /** Remote id when known, otherwise 0 */
  id: z.number().int().nonnegative().default(0),
  subjectId: z.number().int().positive(),
  meaningNote: z.string().nullable().optional(),
  readingNote: z.string().nullable().optional(),
  meaningSynonyms: z.array(z.string()).default([]),
});

export type StudyMaterial = z.infer<typeof StudyMaterialSchema>;
export type StudyMaterialInput = z.input<typeof StudyMaterialSchema>;

// ============================================================================
// User
// ============================================================================

export const UserSchema = z.object({
  username: z.string(),
  level: z.number().int().positive(),
  maxLevelGrantedBySubscription: z.number().int().nonnegative(),
  subscribed: z.boolean(),
  subscriptionEndsAt: TimestampSchema.nullable().optional(),
  startedAt: TimestampSchema.nullable().optional(),
});

export type User = z.infer<typeof UserSchema>;

// ============================================================================
// Level progression
// ============================================================================

export const LevelProgressionSchema = z.object({
  id: z.number().int().positive(),
  level: z.number().int().positive(),
  unlockedAt: TimestampSchema.nullable().optional(),
  startedAt: TimestampSchema.nullable().optional(),
  passedAt: TimestampSchema.nullable().optional(),
  completedAt: TimestampSchema.nullable().optional(),
  abandonedAt: TimestampSchema.nullable().optional(),
});

export type LevelProgression = z.infer<typeof LevelProgressionSchema>;
