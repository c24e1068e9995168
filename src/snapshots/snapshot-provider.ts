import { type CalendarDate, isCalendarDate } from "../retention/calendar-date.js";

/**
 * Backend that owns the snapshots themselves. The rotation engine only ever
 * talks to snapshots by date; naming and discovery belong to the provider.
 */
export interface SnapshotProvider {
  /**
   * Dates of all snapshots matching the configured name pattern.
   * Must reject with ProviderUnavailableError rather than return an empty set
   * when the volume cannot be read.
   */
  list(): Promise<Set<CalendarDate>>;
  /** Create the snapshot for `date`. Rejects with CreationFailedError if it already exists. */
  create(date: CalendarDate): Promise<void>;
  /** Delete the snapshot for `date`. Rejects with DeletionFailedError if it does not exist. */
  delete(date: CalendarDate): Promise<void>;
}

/** Snapshot name for a date: "{prefix}-{YYYY-MM-DD}". */
export function snapshotName(prefix: string, date: CalendarDate): string {
  return `${prefix}-${date}`;
}

/** Inverse of snapshotName(); null when the name belongs to something else. */
export function parseSnapshotName(prefix: string, name: string): CalendarDate | null {
  const head = `${prefix}-`;
  if (!name.startsWith(head)) return null;
  const rest = name.slice(head.length);
  return isCalendarDate(rest) ? rest : null;
}
