import { z } from "zod";

/** Tier counts and week alignment for one rotation run. */
export const retentionTierConfigSchema = z.object({
  /** Number of consecutive days to keep, ending today */
  dailyCount: z.number().int().min(0),
  /** Number of week-anchor days to keep */
  weeklyCount: z.number().int().min(0),
  /** Number of month-start anchors to keep (4-week strides) */
  monthlyCount: z.number().int().min(0),
  /** Weekday that starts a week, Monday = 0 … Sunday = 6 */
  weekAnchorWeekday: z.number().int().min(0).max(6),
});

export type RetentionTierConfig = z.infer<typeof retentionTierConfigSchema>;

export const DEFAULT_RETENTION: RetentionTierConfig = {
  dailyCount: 7,
  weeklyCount: 4,
  monthlyCount: 12,
  weekAnchorWeekday: 0,
};
