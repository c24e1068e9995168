import { addDays, addWeeks, type CalendarDate, dayOfMonth, daysSinceMin, weekdayOf } from "./calendar-date.js";
import type { RetentionTierConfig } from "./types.js";

/**
 * Retention tiers for rotating snapshots.
 *
 * Policy:
 * - daily: the `dailyCount` days ending today
 * - weekly: the `weeklyCount` most recent week-anchor days, starting from the
 *   last anchor on or before today
 * - monthly: `monthlyCount` anchors spaced 4 weeks apart, each moved back one
 *   week when it falls after the 7th of its calendar month
 *
 * A "month" here is a 4-week stride rather than a calendar month. When an
 * anchor falls after the 7th of its month it moves back a single week. That
 * keeps the anchors near the start of their months but does not pin them
 * there: a late-month anchor stays in the third or fourth week, and the dates
 * drift toward month-start over long horizons.
 *
 * Tiers stop early rather than step before MIN_CALENDAR_DATE.
 */

export interface RetentionTiers {
  daily: ReadonlySet<CalendarDate>;
  weekly: ReadonlySet<CalendarDate>;
  monthly: ReadonlySet<CalendarDate>;
}

/** The most recent date on or before `today` that falls on `weekAnchorWeekday`. */
export function lastAnchorWeek(today: CalendarDate, weekAnchorWeekday: number): CalendarDate {
  return addDays(today, -daysBackToAnchor(today, weekAnchorWeekday));
}

function daysBackToAnchor(today: CalendarDate, weekAnchorWeekday: number): number {
  return (weekdayOf(today) - weekAnchorWeekday + 7) % 7;
}

/** Step back one week when the anchor falls after the first week of its month. */
function correctToFirstWeek(anchor: CalendarDate): CalendarDate {
  return dayOfMonth(anchor) > 7 ? addWeeks(anchor, -1) : anchor;
}

export function dailyTier(today: CalendarDate, dailyCount: number): Set<CalendarDate> {
  const dates = new Set<CalendarDate>();
  const count = Math.min(dailyCount, daysSinceMin(today) + 1);
  for (let k = 0; k < count; k++) {
    dates.add(addDays(today, -k));
  }
  return dates;
}

export function weeklyTier(anchor: CalendarDate, weeklyCount: number): Set<CalendarDate> {
  const dates = new Set<CalendarDate>();
  const count = Math.min(weeklyCount, Math.floor(daysSinceMin(anchor) / 7) + 1);
  for (let k = 0; k < count; k++) {
    dates.add(addWeeks(anchor, -k));
  }
  return dates;
}

export function monthlyTier(anchor: CalendarDate, monthlyCount: number): Set<CalendarDate> {
  const dates = new Set<CalendarDate>();
  let month = correctToFirstWeek(anchor);
  for (let k = 0; k < monthlyCount; k++) {
    dates.add(month);
    // The correction only fires after the 7th, so it cannot cross MIN_CALENDAR_DATE itself.
    if (daysSinceMin(month) < 28) break;
    month = correctToFirstWeek(addWeeks(month, -4));
  }
  return dates;
}

/** Compute the three retention tiers for `today`. Pure; no I/O. */
export function computeRetention(today: CalendarDate, config: RetentionTierConfig): RetentionTiers {
  const daily = dailyTier(today, config.dailyCount);
  if (daysSinceMin(today) < daysBackToAnchor(today, config.weekAnchorWeekday)) {
    return { daily, weekly: new Set(), monthly: new Set() };
  }

  const anchor = lastAnchorWeek(today, config.weekAnchorWeekday);
  return {
    daily,
    weekly: weeklyTier(anchor, config.weeklyCount),
    monthly: monthlyTier(anchor, config.monthlyCount),
  };
}

/** Union of all tiers. Dates retained by more than one tier appear once. */
export function wantedDates(tiers: RetentionTiers): Set<CalendarDate> {
  return new Set([...tiers.daily, ...tiers.weekly, ...tiers.monthly]);
}
