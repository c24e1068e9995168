import { Command, CommanderError } from "commander";
import { loadRotationConfig, type RotationConfig } from "../config/index.js";
import { createLogger, type Logger, logger as defaultLogger } from "../config/logger.js";
import { calendarDateFromLocal } from "../retention/calendar-date.js";
import { BtrfsSnapshotProvider } from "../snapshots/btrfs-provider.js";
import { ConfigurationError, describeError } from "../snapshots/errors.js";
import type { SnapshotProvider } from "../snapshots/snapshot-provider.js";
import { type RunResult, rotateSnapshots } from "../snapshots/snapshot-state-machine.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Clock used when --today is not given */
  now?: () => Date;
  createLogger?: (config: RotationConfig) => Logger;
  createProvider?: (config: RotationConfig, logger: Logger) => SnapshotProvider;
  /** Where the one-line summary goes (default: stdout) */
  write?: (line: string) => void;
}

export function buildProgram(): Command {
  return new Command()
    .name("subvol-rotate")
    .description("Keep a rolling daily/weekly/monthly set of btrfs snapshots of one subvolume")
    .option("--mountpoint <path>", "mountpoint of the btrfs volume (env: SNAPSHOT_MOUNTPOINT)")
    .option("--subvolume <name>", 'live subvolume, relative to the mountpoint (default: "@")')
    .option("--prefix <prefix>", 'snapshot name prefix (default: "snapshot")')
    .option("--daily <n>", "daily snapshots to keep (default: 7)")
    .option("--weekly <n>", "weekly snapshots to keep (default: 4)")
    .option("--monthly <n>", "monthly snapshots to keep (default: 12)")
    .option("--week-anchor <weekday>", "first day of the week, 0-6 with Monday = 0 or a name (default: monday)")
    .option("--writable", "create writable snapshots instead of read-only ones")
    .option("--sudo", "run btrfs through sudo -n")
    .option("--dry-run", "list and plan, but do not create or delete anything")
    .option("--today <YYYY-MM-DD>", "run as if today were this date")
    .option("-v, --verbose", "log debug output")
    .option("-q, --quiet", "log errors only")
    .exitOverride();
}

function defaultProvider(config: RotationConfig, logger: Logger): SnapshotProvider {
  return new BtrfsSnapshotProvider({
    mountpoint: config.mountpoint,
    subvolume: config.subvolume,
    prefix: config.prefix,
    readOnly: config.readOnly,
    sudo: config.sudo,
    dryRun: config.dryRun,
    logger,
  });
}

/** One-line run summary, e.g. "create 2024-03-05; delete 2024-03-01; keeping 2 date(s)". */
export function formatSummary(result: RunResult, dryRun: boolean): string {
  const verb = dryRun ? "would " : "";
  const created = result.created ? `${verb}create ${result.created}` : `${result.today} already present`;
  const deleted = result.deleted.length > 0 ? result.deleted.join(", ") : "nothing";
  const attempted = result.deleted.length + result.failed.length;
  const failed = result.failed.length > 0 ? `; ${result.failed.length} of ${attempted} deletions failed` : "";
  return `${created}; ${verb}delete ${deleted}; keeping ${result.wanted.length} date(s)${failed}`;
}

/**
 * Parse argv, run one rotation and return the process exit code:
 * 0 on success (including reported deletion failures), 1 on a fatal provider
 * error, 2 on invalid configuration or usage.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_OK : EXIT_CONFIG_ERROR;
    }
    throw err;
  }

  let config: RotationConfig;
  try {
    config = loadRotationConfig(program.opts(), deps.env ?? process.env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      defaultLogger.error(err.message);
      return EXIT_CONFIG_ERROR;
    }
    throw err;
  }

  const logger = deps.createLogger ? deps.createLogger(config) : createLogger(config.logLevel);
  const provider = (deps.createProvider ?? defaultProvider)(config, logger);
  const today = config.today ?? calendarDateFromLocal(deps.now ? deps.now() : new Date());
  const write = deps.write ?? ((line: string) => process.stdout.write(`${line}\n`));

  if (config.dryRun) {
    logger.info("Dry run: no snapshots will be created or deleted");
  }

  try {
    const result = await rotateSnapshots({ provider, logger, today, config: config.retention });
    write(formatSummary(result, config.dryRun));
    return EXIT_OK;
  } catch (err) {
    logger.error(`Rotation failed: ${describeError(err)}`);
    return err instanceof ConfigurationError ? EXIT_CONFIG_ERROR : EXIT_FAILURE;
  }
}
