/**
 * @studycache/client - Tunables
 */

import { z } from 'zod';

export const LocalCacheConfigSchema = z.object({
  /** Rows kept in error_log; older ones are pruned on insert */
  errorLogLimit: z.number().int().positive().default(100),
  /** Length of the upcoming-review histogram, in hours */
  upcomingReviewHours: z.number().int().positive().default(48),
  /** First stage counted as "guru" */
  guruStage: z.number().int().min(1).max(9).default(5),
});

export type LocalCacheConfig = z.infer<typeof LocalCacheConfigSchema>;
export type LocalCacheConfigInput = z.input<typeof LocalCacheConfigSchema>;

export function resolveLocalCacheConfig(
  input: LocalCacheConfigInput = {}
): LocalCacheConfig {
  return LocalCacheConfigSchema.parse(input);
}
