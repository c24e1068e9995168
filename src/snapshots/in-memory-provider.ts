import { type CalendarDate, sortCalendarDates } from "../retention/calendar-date.js";
import { CreationFailedError, DeletionFailedError } from "./errors.js";
import type { SnapshotProvider } from "./snapshot-provider.js";

/** Snapshot provider backed by a Set, with the same failure semantics as the btrfs adapter. */
export class InMemorySnapshotProvider implements SnapshotProvider {
  private readonly dates: Set<CalendarDate>;

  constructor(initial: Iterable<CalendarDate> = []) {
    this.dates = new Set(initial);
  }

  async list(): Promise<Set<CalendarDate>> {
    return new Set(this.dates);
  }

  async create(date: CalendarDate): Promise<void> {
    if (this.dates.has(date)) {
      throw new CreationFailedError(date, "snapshot already exists");
    }
    this.dates.add(date);
  }

  async delete(date: CalendarDate): Promise<void> {
    if (!this.dates.has(date)) {
      throw new DeletionFailedError(date, "snapshot does not exist");
    }
    this.dates.delete(date);
  }

  /** Current snapshot dates, oldest first. */
  current(): CalendarDate[] {
    return sortCalendarDates(this.dates);
  }
}
