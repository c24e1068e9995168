import type { CalendarDate } from "../retention/calendar-date.js";

/** Message text of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Invalid tier counts, mountpoint, subvolume or prefix. Raised before any provider call. */
export class ConfigurationError extends Error {
  readonly name = "ConfigurationError" as const;
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/** The snapshot listing could not be obtained. Fatal: nothing is created or deleted. */
export class ProviderUnavailableError extends Error {
  readonly name = "ProviderUnavailableError" as const;
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/** Today's snapshot could not be created. Fatal: the run stops before any deletion. */
export class CreationFailedError extends Error {
  readonly name = "CreationFailedError" as const;
  readonly date: CalendarDate;
  constructor(date: CalendarDate, reason: string, options?: ErrorOptions) {
    super(`Failed to create snapshot for ${date}: ${reason}`, options);
    this.date = date;
  }
}

/** One snapshot could not be removed. Collected per run; other deletions continue. */
export class DeletionFailedError extends Error {
  readonly name = "DeletionFailedError" as const;
  readonly date: CalendarDate;
  constructor(date: CalendarDate, reason: string, options?: ErrorOptions) {
    super(`Failed to delete snapshot for ${date}: ${reason}`, options);
    this.date = date;
  }
}

/** Thrown when the run state machine is driven along an edge not in its transition graph. */
export class InvalidTransitionError extends Error {
  readonly name = "InvalidTransitionError" as const;
  constructor(from: string, to: string) {
    super(`Invalid rotation state transition: ${from} → ${to}`);
  }
}
