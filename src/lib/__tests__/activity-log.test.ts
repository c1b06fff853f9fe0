import { describe, it, expect, vi, afterEach } from "vitest";
import { ActivityLog } from "../activity-log.ts";

describe("ActivityLog", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("records entries with increasing ids", () => {
    const log = new ActivityLog({ mirrorToConsole: false });
    log.info("Poller", "first");
    log.error("Capture", "second");
    const entries = log.getAll();
    expect(entries.map((e) => [e.id, e.level, e.source, e.message])).toEqual([
      [1, "info", "Poller", "first"],
      [2, "error", "Capture", "second"],
    ]);
  });

  it("trims to maxEntries", () => {
    const log = new ActivityLog({ mirrorToConsole: false, maxEntries: 3 });
    for (let i = 1; i <= 5; i++) log.debug("T", `m${i}`);
    expect(log.getAll().map((e) => e.message)).toEqual(["m3", "m4", "m5"]);
    expect(log.getRecent(2).map((e) => e.message)).toEqual(["m4", "m5"]);
  });

  it("mirrors to the console with a source prefix", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = new ActivityLog();
    log.warn("WakeWordGate", "restart failed");
    expect(warn).toHaveBeenCalledWith("[WakeWordGate] restart failed");
  });

  it("keeps a stable snapshot between changes and notifies on clear", () => {
    const log = new ActivityLog({ mirrorToConsole: false });
    const listener = vi.fn();
    log.subscribe(listener);
    log.info("T", "x");
    const snap = log.getAll();
    expect(log.getAll()).toBe(snap);
    log.clear();
    expect(log.getAll()).toEqual([]);
    expect(listener).toHaveBeenCalledTimes(2);
  });
});
