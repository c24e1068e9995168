import { type Logger, logger as defaultLogger } from "../config/logger.js";
import {
  type CalendarDate,
  calendarDateFromLocal,
  isCalendarDate,
  sortCalendarDates,
} from "../retention/calendar-date.js";
import { computeRetention, wantedDates } from "../retention/retention-calculator.js";
import { type RetentionTierConfig, retentionTierConfigSchema } from "../retention/types.js";
import {
  ConfigurationError,
  CreationFailedError,
  DeletionFailedError,
  describeError,
  InvalidTransitionError,
  ProviderUnavailableError,
} from "./errors.js";
import type { SnapshotProvider } from "./snapshot-provider.js";

/**
 * Rotation run state machine.
 *
 * ```
 * idle        → listing
 * listing     → ensuring, failed
 * ensuring    → computing, failed
 * computing   → reconciling, failed
 * reconciling → done, failed
 * done        → listing
 * failed      → listing
 * ```
 *
 * Key invariant: nothing is deleted unless today's snapshot is known to exist
 * (listed or just created). Listing and creation failures end in `failed`;
 * individual deletion failures do not.
 */

export const RUN_STATES = ["idle", "listing", "ensuring", "computing", "reconciling", "done", "failed"] as const;

export type RunState = (typeof RUN_STATES)[number];

export const VALID_TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ["listing"],
  listing: ["ensuring", "failed"],
  ensuring: ["computing", "failed"],
  computing: ["reconciling", "failed"],
  reconciling: ["done", "failed"],
  done: ["listing"],
  failed: ["listing"],
};

export function isValidTransition(from: RunState, to: RunState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export interface DeletionFailure {
  date: CalendarDate;
  error: string;
}

export interface RunResult {
  today: CalendarDate;
  /** Date of the snapshot created by this run, or null if today already existed */
  created: CalendarDate | null;
  /** Snapshots present before the run, oldest first */
  existing: CalendarDate[];
  /**
   * Dates kept by reconciliation, oldest first. This is the tier union plus
   * today when `keptToday` is set, so it can hold one date more than the
   * tier counts add up to.
   */
  wanted: CalendarDate[];
  /** True when today is in `wanted` only through the keepToday exemption */
  keptToday: boolean;
  /** Raw tier output, oldest first */
  tiers: { daily: CalendarDate[]; weekly: CalendarDate[]; monthly: CalendarDate[] };
  /** Snapshots removed by this run, oldest first */
  deleted: CalendarDate[];
  failed: DeletionFailure[];
}

export interface SnapshotStateMachineOptions {
  provider: SnapshotProvider;
  logger?: Logger;
  /** Never delete today's snapshot, even if no tier retains it (default: true) */
  keepToday?: boolean;
}

export class SnapshotStateMachine {
  private readonly provider: SnapshotProvider;
  private readonly logger: Logger;
  private readonly keepToday: boolean;
  private current: RunState = "idle";

  constructor(opts: SnapshotStateMachineOptions) {
    this.provider = opts.provider;
    this.logger = opts.logger ?? defaultLogger;
    this.keepToday = opts.keepToday ?? true;
  }

  get state(): RunState {
    return this.current;
  }

  /**
   * Run one rotation: list, ensure today's snapshot, compute the wanted set,
   * delete everything else.
   *
   * Rejects with ConfigurationError before touching the provider, with
   * ProviderUnavailableError if listing fails and with CreationFailedError if
   * today's snapshot cannot be created. Deletion failures are reported in the
   * result instead.
   */
  async run(today: CalendarDate, config: RetentionTierConfig): Promise<RunResult> {
    const tierConfig = validateRun(today, config);

    this.transition("listing");
    try {
      const existing = await this.listExisting();

      this.transition("ensuring");
      const created = await this.ensureToday(today, existing);

      this.transition("computing");
      const tiers = computeRetention(today, tierConfig);
      const wanted = wantedDates(tiers);
      const keptToday = this.keepToday && !wanted.has(today);
      if (keptToday) wanted.add(today);

      this.transition("reconciling");
      const candidates = new Set(existing).add(today);
      const toDelete = sortCalendarDates([...candidates].filter((date) => !wanted.has(date)));
      const { deleted, failed } = await this.reconcile(toDelete);

      this.transition("done");
      return {
        today,
        created,
        existing: sortCalendarDates(existing),
        wanted: sortCalendarDates(wanted),
        keptToday,
        tiers: {
          daily: sortCalendarDates(tiers.daily),
          weekly: sortCalendarDates(tiers.weekly),
          monthly: sortCalendarDates(tiers.monthly),
        },
        deleted,
        failed,
      };
    } catch (err) {
      this.transition("failed");
      throw err;
    }
  }

  private transition(to: RunState): void {
    if (!isValidTransition(this.current, to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.logger.debug(`Rotation state: ${this.current} → ${to}`);
    this.current = to;
  }

  private async listExisting(): Promise<Set<CalendarDate>> {
    try {
      const existing = await this.provider.list();
      this.logger.info(`Found ${existing.size} existing snapshot(s)`);
      return existing;
    } catch (err) {
      this.logger.error("Listing snapshots failed", { err: describeError(err) });
      if (err instanceof ProviderUnavailableError) throw err;
      throw new ProviderUnavailableError(`Failed to list snapshots: ${describeError(err)}`, { cause: err });
    }
  }

  private async ensureToday(today: CalendarDate, existing: Set<CalendarDate>): Promise<CalendarDate | null> {
    if (existing.has(today)) {
      this.logger.info(`Snapshot for ${today} already exists`);
      return null;
    }

    try {
      await this.provider.create(today);
    } catch (err) {
      this.logger.error(`Creating snapshot for ${today} failed; skipping cleanup`, { err: describeError(err) });
      if (err instanceof CreationFailedError) throw err;
      throw new CreationFailedError(today, describeError(err), { cause: err });
    }
    this.logger.info(`Snapshot for ${today} created`);
    return today;
  }

  /** Delete each date independently; one failure never stops the rest. */
  private async reconcile(toDelete: CalendarDate[]): Promise<{ deleted: CalendarDate[]; failed: DeletionFailure[] }> {
    const deleted: CalendarDate[] = [];
    const failed: DeletionFailure[] = [];

    for (const date of toDelete) {
      try {
        await this.provider.delete(date);
        deleted.push(date);
      } catch (err) {
        const error =
          err instanceof DeletionFailedError ? err : new DeletionFailedError(date, describeError(err), { cause: err });
        this.logger.error(error.message);
        failed.push({ date, error: error.message });
      }
    }

    if (failed.length > 0) {
      this.logger.error(`${failed.length} of ${toDelete.length} deletions failed`, {
        failed: failed.map((f) => f.date),
      });
    } else {
      this.logger.info(`Deleted ${deleted.length} snapshot(s)`);
    }

    return { deleted, failed };
  }
}

function validateRun(today: CalendarDate, config: RetentionTierConfig): RetentionTierConfig {
  if (!isCalendarDate(today)) {
    throw new ConfigurationError(`Invalid run date: ${today}`);
  }
  const parsed = retentionTierConfigSchema.safeParse(config);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid retention config: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
}

export interface RotateSnapshotsOptions extends SnapshotStateMachineOptions {
  config: RetentionTierConfig;
  /** Run date; defaults to today on the local clock */
  today?: CalendarDate;
}

/** Build a state machine and run it once. */
export async function rotateSnapshots(opts: RotateSnapshotsOptions): Promise<RunResult> {
  const machine = new SnapshotStateMachine(opts);
  return machine.run(opts.today ?? calendarDateFromLocal(), opts.config);
}
