import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../snapshots/errors.js";
import { loadRotationConfig } from "./index.js";

describe("loadRotationConfig", () => {
  it("applies defaults for everything but the mountpoint", () => {
    const config = loadRotationConfig({ mountpoint: "/mnt/pool" }, {});

    expect(config).toEqual({
      mountpoint: "/mnt/pool",
      subvolume: "@",
      prefix: "snapshot",
      retention: { dailyCount: 7, weeklyCount: 4, monthlyCount: 12, weekAnchorWeekday: 0 },
      readOnly: true,
      sudo: false,
      dryRun: false,
      logLevel: "info",
    });
  });

  it("lets flags override environment variables", () => {
    const config = loadRotationConfig(
      { daily: "3", weekAnchor: "fri" },
      { SNAPSHOT_MOUNTPOINT: "/srv", SNAPSHOT_DAILY: "10", SNAPSHOT_WEEKLY: "2", SNAPSHOT_WEEK_ANCHOR: "0" },
    );

    expect(config.mountpoint).toBe("/srv");
    expect(config.retention).toEqual({ dailyCount: 3, weeklyCount: 2, monthlyCount: 12, weekAnchorWeekday: 4 });
  });

  it("maps -v and -q onto log levels, overriding LOG_LEVEL", () => {
    expect(loadRotationConfig({ mountpoint: "/m", verbose: true }, { LOG_LEVEL: "warn" }).logLevel).toBe("debug");
    expect(loadRotationConfig({ mountpoint: "/m", quiet: true }, {}).logLevel).toBe("error");
    expect(loadRotationConfig({ mountpoint: "/m" }, { LOG_LEVEL: "warn" }).logLevel).toBe("warn");
  });

  it("accepts a --today override", () => {
    expect(loadRotationConfig({ mountpoint: "/m", today: "2024-03-15" }, {}).today).toBe("2024-03-15");
  });

  it("requires an absolute mountpoint", () => {
    expect(() => loadRotationConfig({}, {})).toThrow("Invalid configuration: mountpoint: mountpoint is required");
    expect(() => loadRotationConfig({ mountpoint: "mnt/pool" }, {})).toThrow(
      "Invalid configuration: mountpoint: mountpoint must be an absolute path",
    );
  });

  it("rejects a subvolume that escapes the mountpoint", () => {
    expect(() => loadRotationConfig({ mountpoint: "/m", subvolume: "../etc" }, {})).toThrow(ConfigurationError);
    expect(() => loadRotationConfig({ mountpoint: "/m", subvolume: "/@" }, {})).toThrow(ConfigurationError);
  });

  it("rejects a prefix containing a path separator", () => {
    expect(() => loadRotationConfig({ mountpoint: "/m", prefix: "a/b" }, {})).toThrow(
      "Invalid configuration: prefix: prefix may only contain letters, digits, '@', '.', '_' and '-'",
    );
  });

  it("treats an empty count variable as unset instead of zero", () => {
    const config = loadRotationConfig({ mountpoint: "/m" }, { SNAPSHOT_DAILY: "", SNAPSHOT_MONTHLY: "  " });

    expect(config.retention.dailyCount).toBe(7);
    expect(config.retention.monthlyCount).toBe(12);
  });

  it("lets an empty count flag fall back to the environment default", () => {
    expect(loadRotationConfig({ mountpoint: "/m", weekly: "" }, {}).retention.weeklyCount).toBe(4);
  });

  it("rejects negative and fractional counts", () => {
    expect(() => loadRotationConfig({ mountpoint: "/m", weekly: "-1" }, {})).toThrow(ConfigurationError);
    expect(() => loadRotationConfig({ mountpoint: "/m", monthly: "1.5" }, {})).toThrow(ConfigurationError);
  });

  it("rejects an unknown weekday and an impossible date", () => {
    expect(() => loadRotationConfig({ mountpoint: "/m", weekAnchor: "funday" }, {})).toThrow(
      'retention.weekAnchorWeekday: Invalid weekday "funday"',
    );
    expect(() => loadRotationConfig({ mountpoint: "/m", today: "2024-02-30" }, {})).toThrow(
      "today: today must be a valid YYYY-MM-DD date",
    );
  });

  it("reports every invalid field at once", () => {
    expect(() => loadRotationConfig({ daily: "x" }, {})).toThrow(/mountpoint: .*; retention\.dailyCount: /);
  });
});
