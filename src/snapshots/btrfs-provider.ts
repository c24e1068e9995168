import { execFile } from "node:child_process";
import { stat } from "node:fs/promises";
import { posix } from "node:path";
import { promisify } from "node:util";
import { type Logger, logger as defaultLogger } from "../config/logger.js";
import type { CalendarDate } from "../retention/calendar-date.js";
import {
  CreationFailedError,
  DeletionFailedError,
  describeError,
  ProviderUnavailableError,
} from "./errors.js";
import { parseSnapshotName, type SnapshotProvider, snapshotName } from "./snapshot-provider.js";

const execFileAsync = promisify(execFile);

export type ExecFileFn = (file: string, args: readonly string[]) => Promise<{ stdout: string; stderr: string }>;

const defaultExecFile: ExecFileFn = (file, args) => execFileAsync(file, args);

export interface BtrfsSnapshotProviderOptions {
  /** Mountpoint of the volume holding the live subvolume and its snapshots */
  mountpoint: string;
  /** Live subvolume, relative to the mountpoint */
  subvolume: string;
  /** Snapshot name prefix */
  prefix: string;
  /** Create read-only snapshots (default: true) */
  readOnly?: boolean;
  /** Run btrfs through `sudo -n` */
  sudo?: boolean;
  /** Log create/delete commands instead of running them. Listing still runs. */
  dryRun?: boolean;
  logger?: Logger;
  /** Injectable for tests */
  execFileFn?: ExecFileFn;
}

/**
 * Snapshot provider backed by the btrfs CLI.
 *
 * Every call goes through execFile with an explicit argument array; nothing
 * is ever interpolated into a shell command line. Snapshots live directly
 * under the mountpoint as `{mountpoint}/{prefix}-{YYYY-MM-DD}`.
 */
export class BtrfsSnapshotProvider implements SnapshotProvider {
  private readonly mountpoint: string;
  private readonly subvolume: string;
  private readonly prefix: string;
  private readonly readOnly: boolean;
  private readonly sudo: boolean;
  private readonly dryRun: boolean;
  private readonly logger: Logger;
  private readonly execFileFn: ExecFileFn;
  /** Dry-run creations, so a later dry-run delete of the same date is planned rather than refused */
  private readonly planned = new Set<CalendarDate>();

  constructor(opts: BtrfsSnapshotProviderOptions) {
    this.mountpoint = opts.mountpoint;
    this.subvolume = opts.subvolume;
    this.prefix = opts.prefix;
    this.readOnly = opts.readOnly ?? true;
    this.sudo = opts.sudo ?? false;
    this.dryRun = opts.dryRun ?? false;
    this.logger = opts.logger ?? defaultLogger;
    this.execFileFn = opts.execFileFn ?? defaultExecFile;
  }

  async list(): Promise<Set<CalendarDate>> {
    let mounted: boolean;
    try {
      mounted = await isDirectory(this.mountpoint);
    } catch (err) {
      throw new ProviderUnavailableError(`Cannot access mountpoint ${this.mountpoint}: ${describeError(err)}`, {
        cause: err,
      });
    }
    if (!mounted) {
      throw new ProviderUnavailableError(`Mountpoint ${this.mountpoint} does not exist or is not a directory`);
    }

    let stdout: string;
    try {
      ({ stdout } = await this.btrfs(["subvolume", "list", "-o", this.mountpoint], { mutating: false }));
    } catch (err) {
      throw new ProviderUnavailableError(`Failed to list subvolumes under ${this.mountpoint}: ${describeError(err)}`, {
        cause: err,
      });
    }

    const dates = parseSubvolumeList(stdout, this.prefix);
    this.logger.debug(`Found ${dates.size} snapshot(s) under ${this.mountpoint}`, { prefix: this.prefix });
    return dates;
  }

  async create(date: CalendarDate): Promise<void> {
    const source = posix.join(this.mountpoint, this.subvolume);
    const target = this.pathFor(date);

    if (await exists(target)) {
      throw new CreationFailedError(date, `${target} already exists`);
    }
    if (!(await isDirectory(source))) {
      throw new CreationFailedError(date, `source subvolume ${source} is missing`);
    }

    const args = ["subvolume", "snapshot", ...(this.readOnly ? ["-r"] : []), source, target];
    try {
      await this.btrfs(args, { mutating: true });
    } catch (err) {
      throw new CreationFailedError(date, describeError(err), { cause: err });
    }

    if (this.dryRun) {
      this.planned.add(date);
    } else {
      this.logger.info(`Created snapshot ${target}`, { readOnly: this.readOnly });
    }
  }

  async delete(date: CalendarDate): Promise<void> {
    const target = this.pathFor(date);

    if (!this.planned.has(date) && !(await exists(target))) {
      throw new DeletionFailedError(date, `${target} does not exist`);
    }

    try {
      await this.btrfs(["subvolume", "delete", target], { mutating: true });
    } catch (err) {
      throw new DeletionFailedError(date, describeError(err), { cause: err });
    }

    if (this.dryRun) {
      this.planned.delete(date);
    } else {
      this.logger.info(`Deleted snapshot ${target}`);
    }
  }

  private pathFor(date: CalendarDate): string {
    return posix.join(this.mountpoint, snapshotName(this.prefix, date));
  }

  /** Run a btrfs subcommand. Mutating commands are only logged in dry-run mode. */
  private async btrfs(args: string[], opts: { mutating: boolean }): Promise<{ stdout: string; stderr: string }> {
    const argv = this.sudo ? ["sudo", "-n", "btrfs", ...args] : ["btrfs", ...args];
    const commandLine = argv.join(" ");

    if (opts.mutating && this.dryRun) {
      this.logger.info(`Dry run: ${commandLine}`);
      return { stdout: "", stderr: "" };
    }

    this.logger.debug(`Running: ${commandLine}`);
    const [file, ...rest] = argv;
    return this.execFileFn(file, rest);
  }
}

/**
 * Parse `btrfs subvolume list` output and return the dates of the subvolumes
 * whose last path segment is a snapshot name for `prefix`.
 * Format: "ID 257 gen 12 top level 5 path @snapshot-2024-03-15"
 */
export function parseSubvolumeList(stdout: string, prefix: string): Set<CalendarDate> {
  const dates = new Set<CalendarDate>();
  for (const line of stdout.split("\n")) {
    const match = line.trim().match(/^ID \d+ .*\bpath (.+)$/);
    if (!match) continue;

    const date = parseSnapshotName(prefix, posix.basename(match[1]));
    if (date) dates.add(date);
  }
  return dates;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) return false;
    throw err;
  }
}
