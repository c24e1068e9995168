export type { Config, LogLevel, RotationConfig, RotationFlags } from "./config/index.js";
export { loadRotationConfig, rotationConfigSchema } from "./config/index.js";
export type { Logger } from "./config/logger.js";
export { createLogger } from "./config/logger.js";
export type { CalendarDate } from "./retention/calendar-date.js";
export {
  addDays,
  addWeeks,
  calendarDateFromLocal,
  dayOfMonth,
  daysSinceMin,
  isCalendarDate,
  MIN_CALENDAR_DATE,
  parseCalendarDate,
  parseWeekday,
  sortCalendarDates,
  weekdayOf,
} from "./retention/calendar-date.js";
export type { RetentionTiers } from "./retention/retention-calculator.js";
export { computeRetention, lastAnchorWeek, wantedDates } from "./retention/retention-calculator.js";
export type { RetentionTierConfig } from "./retention/types.js";
export { DEFAULT_RETENTION, retentionTierConfigSchema } from "./retention/types.js";
export type { BtrfsSnapshotProviderOptions, ExecFileFn } from "./snapshots/btrfs-provider.js";
export { BtrfsSnapshotProvider, parseSubvolumeList } from "./snapshots/btrfs-provider.js";
export {
  ConfigurationError,
  CreationFailedError,
  DeletionFailedError,
  InvalidTransitionError,
  ProviderUnavailableError,
} from "./snapshots/errors.js";
export { InMemorySnapshotProvider } from "./snapshots/in-memory-provider.js";
export type { SnapshotProvider } from "./snapshots/snapshot-provider.js";
export { parseSnapshotName, snapshotName } from "./snapshots/snapshot-provider.js";
export type {
  DeletionFailure,
  RotateSnapshotsOptions,
  RunResult,
  RunState,
  SnapshotStateMachineOptions,
} from "./snapshots/snapshot-state-machine.js";
export { rotateSnapshots, SnapshotStateMachine } from "./snapshots/snapshot-state-machine.js";
