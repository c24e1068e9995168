import { isAbsolute } from "node:path";
import { z } from "zod";
import { isCalendarDate, parseWeekday } from "../retention/calendar-date.js";
import { DEFAULT_RETENTION } from "../retention/types.js";
import { ConfigurationError } from "../snapshots/errors.js";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const logLevelSchema = z.enum(LOG_LEVELS);

const configSchema = z.object({
  logLevel: logLevelSchema.catch("info"),
});

/** Process-wide settings read once from the environment. */
export const config = configSchema.parse({
  logLevel: process.env.LOG_LEVEL,
});

export type Config = z.infer<typeof configSchema>;

/** Snapshot names end up as directory names under the mountpoint. */
const SAFE_NAME_RE = /^[A-Za-z0-9@._-]+$/;

/** An exported-but-empty variable counts as unset; coercion would otherwise read it as 0. */
const blankAsUnset = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const countSchema = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(fallback));

const weekdaySchema = z
  .union([z.string(), z.number()])
  .default(DEFAULT_RETENTION.weekAnchorWeekday)
  .transform((value, ctx) => {
    const weekday = parseWeekday(String(value));
    if (weekday === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid weekday "${value}" (use 0-6 with Monday = 0, or a name such as "monday")`,
      });
      return z.NEVER;
    }
    return weekday;
  });

export const rotationConfigSchema = z.object({
  /** Mountpoint of the top-level btrfs volume that holds the live subvolume and its snapshots */
  mountpoint: z
    .string({ required_error: "mountpoint is required" })
    .min(1, "mountpoint is required")
    .refine((p) => isAbsolute(p), "mountpoint must be an absolute path"),
  /** Live subvolume, relative to the mountpoint */
  subvolume: z
    .string()
    .default("@")
    .refine((s) => s.length > 0 && !s.startsWith("/") && !s.split("/").includes(".."), {
      message: "subvolume must be a relative path inside the mountpoint",
    }),
  /** Snapshot name prefix; snapshots are named "{prefix}-{YYYY-MM-DD}" */
  prefix: z.string().default("snapshot").refine((p) => SAFE_NAME_RE.test(p), {
    message: "prefix may only contain letters, digits, '@', '.', '_' and '-'",
  }),
  retention: z.object({
    dailyCount: countSchema(DEFAULT_RETENTION.dailyCount),
    weeklyCount: countSchema(DEFAULT_RETENTION.weeklyCount),
    monthlyCount: countSchema(DEFAULT_RETENTION.monthlyCount),
    weekAnchorWeekday: weekdaySchema,
  }),
  /** Create read-only snapshots (btrfs subvolume snapshot -r) */
  readOnly: z.boolean().default(true),
  /** Prefix btrfs invocations with `sudo -n` */
  sudo: z.boolean().default(false),
  /** List and plan, but do not create or delete anything */
  dryRun: z.boolean().default(false),
  logLevel: logLevelSchema.default("info"),
  /** Override for the run date, YYYY-MM-DD */
  today: z
    .string()
    .optional()
    .refine((d) => d === undefined || isCalendarDate(d), { message: "today must be a valid YYYY-MM-DD date" }),
});

export type RotationConfig = z.infer<typeof rotationConfigSchema>;

/** Parsed CLI flags, as commander hands them over. */
export interface RotationFlags {
  mountpoint?: unknown;
  subvolume?: unknown;
  prefix?: unknown;
  daily?: unknown;
  weekly?: unknown;
  monthly?: unknown;
  weekAnchor?: unknown;
  writable?: unknown;
  sudo?: unknown;
  dryRun?: unknown;
  verbose?: unknown;
  quiet?: unknown;
  today?: unknown;
}

function pickLogLevel(flags: RotationFlags, env: NodeJS.ProcessEnv): unknown {
  if (flags.verbose === true) return "debug";
  if (flags.quiet === true) return "error";
  return env.LOG_LEVEL;
}

/**
 * Merge CLI flags over SNAPSHOT_* environment variables and validate the result.
 * Throws ConfigurationError listing every invalid field.
 */
export function loadRotationConfig(flags: RotationFlags, env: NodeJS.ProcessEnv = process.env): RotationConfig {
  const parsed = rotationConfigSchema.safeParse({
    mountpoint: flags.mountpoint ?? env.SNAPSHOT_MOUNTPOINT,
    subvolume: flags.subvolume ?? env.SNAPSHOT_SUBVOLUME,
    prefix: flags.prefix ?? env.SNAPSHOT_PREFIX,
    retention: {
      dailyCount: flags.daily ?? env.SNAPSHOT_DAILY,
      weeklyCount: flags.weekly ?? env.SNAPSHOT_WEEKLY,
      monthlyCount: flags.monthly ?? env.SNAPSHOT_MONTHLY,
      weekAnchorWeekday: flags.weekAnchor ?? env.SNAPSHOT_WEEK_ANCHOR,
    },
    readOnly: flags.writable !== true,
    sudo: flags.sudo === true,
    dryRun: flags.dryRun === true,
    logLevel: pickLogLevel(flags, env),
    today: flags.today,
  });

  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error), { cause: parsed.error });
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  const details = error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return `Invalid configuration: ${details.join("; ")}`;
}
