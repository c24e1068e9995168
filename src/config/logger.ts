import winston from "winston";
import { config, type LogLevel } from "./index.js";

const { combine, timestamp, printf } = winston.format;

/** The subset of the winston logger the rotation code calls. Fakes in tests satisfy it directly. */
export type Logger = Pick<winston.Logger, "error" | "warn" | "info" | "debug">;

const lineFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(ts)} ${level}: ${String(message)}${extra}`;
});

/**
 * Build a console logger at the given level. Everything goes to stderr so
 * that stdout stays free for the run summary.
 */
export function createLogger(level: LogLevel): winston.Logger {
  return winston.createLogger({
    level,
    format: combine(timestamp(), lineFormat),
    transports: [
      new winston.transports.Console({
        stderrLevels: ["error", "warn", "info", "debug"],
      }),
    ],
  });
}

export const logger: Logger = createLogger(config.logLevel);
