import { describe, expect, it, vi } from "vitest";
import type { RetentionTierConfig } from "../retention/types.js";
import { ConfigurationError, CreationFailedError, ProviderUnavailableError } from "./errors.js";
import { InMemorySnapshotProvider } from "./in-memory-provider.js";
import { isValidTransition, rotateSnapshots, SnapshotStateMachine } from "./snapshot-state-machine.js";

function makeLogger() {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

function tiers(dailyCount: number, weeklyCount: number, monthlyCount: number): RetentionTierConfig {
  return { dailyCount, weeklyCount, monthlyCount, weekAnchorWeekday: 0 };
}

describe("isValidTransition", () => {
  it("allows the happy path", () => {
    expect(isValidTransition("idle", "listing")).toBe(true);
    expect(isValidTransition("listing", "ensuring")).toBe(true);
    expect(isValidTransition("ensuring", "computing")).toBe(true);
    expect(isValidTransition("computing", "reconciling")).toBe(true);
    expect(isValidTransition("reconciling", "done")).toBe(true);
  });

  it("rejects skipping the ensure step", () => {
    expect(isValidTransition("listing", "reconciling")).toBe(false);
    expect(isValidTransition("listing", "computing")).toBe(false);
  });
});

describe("SnapshotStateMachine", () => {
  it("creates today and prunes everything outside the tiers (7/4/12, Monday anchor)", async () => {
    const provider = new InMemorySnapshotProvider([
      "2024-03-14",
      "2024-03-08",
      "2024-03-04",
      "2024-02-20",
      "2024-02-05",
      "2023-03-06",
    ]);
    const machine = new SnapshotStateMachine({ provider, logger: makeLogger() });

    const result = await machine.run("2024-03-15", tiers(7, 4, 12));

    expect(result.created).toBe("2024-03-15");
    expect(result.deleted).toEqual(["2023-03-06", "2024-02-20", "2024-03-08"]);
    expect(result.failed).toEqual([]);
    expect(result.tiers.weekly).toEqual(["2024-02-19", "2024-02-26", "2024-03-04", "2024-03-11"]);
    expect(provider.current()).toEqual(["2024-02-05", "2024-03-04", "2024-03-14", "2024-03-15"]);
    expect(machine.state).toBe("done");
  });

  it("does nothing when today exists and every tier wants only today", async () => {
    const provider = new InMemorySnapshotProvider(["2024-01-01"]);
    const create = vi.spyOn(provider, "create");
    const del = vi.spyOn(provider, "delete");

    const result = await new SnapshotStateMachine({ provider, logger: makeLogger() }).run("2024-01-01", tiers(1, 1, 1));

    expect(result.created).toBeNull();
    expect(result.wanted).toEqual(["2024-01-01"]);
    expect(result.keptToday).toBe(false);
    expect(result.tiers).toEqual({ daily: ["2024-01-01"], weekly: ["2024-01-01"], monthly: ["2024-01-01"] });
    expect(result.deleted).toEqual([]);
    expect(create).not.toHaveBeenCalled();
    expect(del).not.toHaveBeenCalled();
  });

  describe("zero-count tiers", () => {
    it("keeps the snapshot created by the same run by default", async () => {
      const provider = new InMemorySnapshotProvider(["2024-01-01"]);

      const result = await new SnapshotStateMachine({ provider, logger: makeLogger() }).run(
        "2024-01-02",
        tiers(0, 0, 0),
      );

      expect(result.created).toBe("2024-01-02");
      expect(result.tiers).toEqual({ daily: [], weekly: [], monthly: [] });
      expect(result.wanted).toEqual(["2024-01-02"]);
      expect(result.keptToday).toBe(true);
      expect(result.deleted).toEqual(["2024-01-01"]);
      expect(provider.current()).toEqual(["2024-01-02"]);
    });

    it("deletes today as well when keepToday is off", async () => {
      const provider = new InMemorySnapshotProvider(["2024-01-01"]);

      const result = await new SnapshotStateMachine({ provider, logger: makeLogger(), keepToday: false }).run(
        "2024-01-02",
        tiers(0, 0, 0),
      );

      expect(result.created).toBe("2024-01-02");
      expect(result.wanted).toEqual([]);
      expect(result.keptToday).toBe(false);
      expect(result.deleted).toEqual(["2024-01-01", "2024-01-02"]);
      expect(provider.current()).toEqual([]);
    });
  });

  it("is idempotent when run twice on the same day", async () => {
    const provider = new InMemorySnapshotProvider(["2024-03-01", "2024-03-02", "2024-03-03"]);
    const machine = new SnapshotStateMachine({ provider, logger: makeLogger() });

    const first = await machine.run("2024-03-05", tiers(2, 0, 0));
    const second = await machine.run("2024-03-05", tiers(2, 0, 0));

    expect(first.created).toBe("2024-03-05");
    expect(first.deleted).toEqual(["2024-03-01", "2024-03-02", "2024-03-03"]);
    expect(second.created).toBeNull();
    expect(second.deleted).toEqual([]);
    expect(provider.current()).toEqual(["2024-03-05"]);
  });

  it("deletes snapshots dated after today", async () => {
    const provider = new InMemorySnapshotProvider(["2024-03-05", "2024-04-01"]);

    const result = await new SnapshotStateMachine({ provider, logger: makeLogger() }).run("2024-03-05", tiers(7, 0, 0));

    expect(result.deleted).toEqual(["2024-04-01"]);
  });

  describe("failures", () => {
    it("aborts with ProviderUnavailableError when listing fails", async () => {
      const provider = new InMemorySnapshotProvider(["2024-01-01"]);
      vi.spyOn(provider, "list").mockRejectedValue(new Error("volume offline"));
      const create = vi.spyOn(provider, "create");
      const machine = new SnapshotStateMachine({ provider, logger: makeLogger() });

      await expect(machine.run("2024-01-02", tiers(1, 0, 0))).rejects.toThrow(
        "Failed to list snapshots: volume offline",
      );
      await expect(machine.run("2024-01-02", tiers(1, 0, 0))).rejects.toBeInstanceOf(ProviderUnavailableError);
      expect(create).not.toHaveBeenCalled();
      expect(machine.state).toBe("failed");
    });

    it("never deletes when today's snapshot cannot be created", async () => {
      const provider = new InMemorySnapshotProvider(["2024-01-01"]);
      vi.spyOn(provider, "create").mockRejectedValue(new CreationFailedError("2024-01-02", "no space left"));
      const del = vi.spyOn(provider, "delete");
      const machine = new SnapshotStateMachine({ provider, logger: makeLogger() });

      await expect(machine.run("2024-01-02", tiers(1, 0, 0))).rejects.toThrow(
        "Failed to create snapshot for 2024-01-02: no space left",
      );
      expect(del).not.toHaveBeenCalled();
      expect(provider.current()).toEqual(["2024-01-01"]);
      expect(machine.state).toBe("failed");
    });

    it("keeps deleting after one deletion fails and reports the summary", async () => {
      const provider = new InMemorySnapshotProvider(["2024-03-01", "2024-03-02", "2024-03-05"]);
      const original = provider.delete.bind(provider);
      vi.spyOn(provider, "delete").mockImplementation(async (date) => {
        if (date === "2024-03-01") throw new Error("Device or resource busy");
        return original(date);
      });
      const logger = makeLogger();

      const result = await new SnapshotStateMachine({ provider, logger }).run("2024-03-05", tiers(1, 0, 0));

      expect(result.deleted).toEqual(["2024-03-02"]);
      expect(result.failed).toEqual([
        { date: "2024-03-01", error: "Failed to delete snapshot for 2024-03-01: Device or resource busy" },
      ]);
      expect(provider.current()).toEqual(["2024-03-01", "2024-03-05"]);
      expect(logger.error).toHaveBeenCalledWith("1 of 2 deletions failed", { failed: ["2024-03-01"] });
    });

    it("rejects negative tier counts before calling the provider", async () => {
      const provider = new InMemorySnapshotProvider();
      const list = vi.spyOn(provider, "list");
      const machine = new SnapshotStateMachine({ provider, logger: makeLogger() });

      await expect(machine.run("2024-01-01", tiers(-1, 0, 0))).rejects.toBeInstanceOf(ConfigurationError);
      expect(list).not.toHaveBeenCalled();
      expect(machine.state).toBe("idle");
    });

    it("rejects an out-of-range week anchor", async () => {
      const machine = new SnapshotStateMachine({ provider: new InMemorySnapshotProvider(), logger: makeLogger() });

      await expect(
        machine.run("2024-01-01", { dailyCount: 1, weeklyCount: 1, monthlyCount: 1, weekAnchorWeekday: 7 }),
      ).rejects.toThrow("Invalid retention config: weekAnchorWeekday:");
    });

    it("rejects an invalid run date", async () => {
      const machine = new SnapshotStateMachine({ provider: new InMemorySnapshotProvider(), logger: makeLogger() });

      await expect(machine.run("2024-02-30", tiers(1, 0, 0))).rejects.toThrow("Invalid run date: 2024-02-30");
    });
  });

  it("logs every state transition at debug", async () => {
    const logger = makeLogger();

    await new SnapshotStateMachine({ provider: new InMemorySnapshotProvider(), logger }).run(
      "2024-01-01",
      tiers(1, 0, 0),
    );

    expect(logger.debug.mock.calls.map((call) => call[0])).toEqual([
      "Rotation state: idle → listing",
      "Rotation state: listing → ensuring",
      "Rotation state: ensuring → computing",
      "Rotation state: computing → reconciling",
      "Rotation state: reconciling → done",
    ]);
  });
});

describe("rotateSnapshots", () => {
  it("runs a single rotation with the given date", async () => {
    const provider = new InMemorySnapshotProvider(["2024-05-01"]);

    const result = await rotateSnapshots({ provider, logger: makeLogger(), today: "2024-05-02", config: tiers(2, 0, 0) });

    expect(result.created).toBe("2024-05-02");
    expect(provider.current()).toEqual(["2024-05-01", "2024-05-02"]);
  });
});
