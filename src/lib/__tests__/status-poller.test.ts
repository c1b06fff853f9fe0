import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { StatusPoller, isMicrophoneAvailable, type StatusSource } from "../status-poller.ts";
import { ActivityLog } from "../activity-log.ts";
import { NotificationCenter } from "../notification-center.ts";
import type { AssistantStatus, ToggleResponse } from "../assistant-types.ts";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function status(running: boolean, microphone = false): AssistantStatus {
  return { running, microphone_available: microphone, screenshots: [], clipboard_items: [] };
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let source: { getStatus: ReturnType<typeof vi.fn>; start: ReturnType<typeof vi.fn>; stop: ReturnType<typeof vi.fn> };
let notifications: NotificationCenter;
let log: ActivityLog;

function makePoller(): StatusPoller {
  const s: StatusSource = source;
  return new StatusPoller({ source: s, notifications, log, intervalMs: 10_000 });
}

beforeEach(() => {
  vi.useFakeTimers();
  source = {
    getStatus: vi.fn().mockResolvedValue(status(false)),
    start: vi.fn(),
    stop: vi.fn(),
  };
  notifications = new NotificationCenter();
  log = new ActivityLog({ mirrorToConsole: false });
});

afterEach(() => {
  vi.useRealTimers();
});

// ---------------------------------------------------------------------------
// Polling
// ---------------------------------------------------------------------------

describe("StatusPoller polling", () => {
  it("refreshes immediately and then on every interval", async () => {
    const poller = makePoller();
    poller.start();
    expect(source.getStatus).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(source.getStatus).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(source.getStatus).toHaveBeenCalledTimes(3);

    poller.stop();
    expect(poller.isPolling()).toBe(false);
    await vi.advanceTimersByTimeAsync(30_000);
    expect(source.getStatus).toHaveBeenCalledTimes(3);
  });

  it("start() twice does not create a second timer", async () => {
    const poller = makePoller();
    poller.start();
    poller.start();
    await vi.advanceTimersByTimeAsync(10_000);
    expect(source.getStatus).toHaveBeenCalledTimes(2);
    poller.stop();
  });

  it("applies a successful refresh", async () => {
    source.getStatus.mockResolvedValue(status(true, true));
    const poller = makePoller();
    await expect(poller.refresh()).resolves.toBe(true);
    const state = poller.getState();
    expect(state.loaded).toBe(true);
    expect(state.status.running).toBe(true);
    expect(state.lastUpdatedAt).not.toBeNull();
  });

  it("keeps the previous state when a refresh fails", async () => {
    source.getStatus.mockResolvedValueOnce(status(true));
    const poller = makePoller();
    await poller.refresh();

    source.getStatus.mockRejectedValueOnce(new TypeError("Failed to fetch"));
    await expect(poller.refresh()).resolves.toBe(false);
    expect(poller.getState().status.running).toBe(true);
    expect(log.getAll().at(-1)).toMatchObject({ level: "warn", message: "Status refresh #2 failed: Failed to fetch" });
    expect(notifications.getAll()).toHaveLength(0);
  });

  it("never lets an older response overwrite a newer one", async () => {
    const first = deferred<AssistantStatus>();
    const second = deferred<AssistantStatus>();
    source.getStatus.mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);
    const poller = makePoller();

    const r1 = poller.refresh();
    const r2 = poller.refresh();
    second.resolve(status(true));
    await expect(r2).resolves.toBe(true);
    first.resolve(status(false));
    await expect(r1).resolves.toBe(false);

    expect(poller.getState().status.running).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Start / stop
// ---------------------------------------------------------------------------

describe("StatusPoller toggleRunning", () => {
  it("marks toggling while the request is in flight", async () => {
    const pending = deferred<ToggleResponse>();
    source.start.mockReturnValue(pending.promise);
    const poller = makePoller();

    const done = poller.toggleRunning();
    expect(poller.getState().toggling).toBe(true);

    pending.resolve({ running: true, success: true, message: "Assistant started" });
    await done;
    expect(poller.getState().toggling).toBe(false);
    expect(poller.getState().status.running).toBe(true);
    expect(notifications.getAll()[0]).toMatchObject({ level: "success", message: "Assistant started" });
  });

  it("clears toggling after a rejected request", async () => {
    source.start.mockRejectedValue(new TypeError("Failed to fetch"));
    const poller = makePoller();
    await poller.toggleRunning();
    expect(poller.getState().toggling).toBe(false);
    expect(poller.getState().status.running).toBe(false);
    expect(notifications.getAll()[0]).toMatchObject({ level: "danger", message: "Failed to start the assistant" });
  });

  it("stops a running assistant", async () => {
    source.getStatus.mockResolvedValue(status(true));
    source.stop.mockResolvedValue({ running: false });
    const poller = makePoller();
    await poller.refresh();
    await poller.toggleRunning();
    expect(source.stop).toHaveBeenCalledTimes(1);
    expect(poller.getState().status.running).toBe(false);
    expect(notifications.getAll()[0]).toMatchObject({ level: "success", message: "Assistant stopped" });
  });

  it("reports a refusal from the service", async () => {
    source.start.mockResolvedValue({ running: false, success: false, message: "Microphone busy" });
    const poller = makePoller();
    await poller.toggleRunning();
    expect(notifications.getAll()[0]).toMatchObject({ level: "danger", message: "Microphone busy" });
  });

  it("ignores a second toggle while one is in flight", async () => {
    const pending = deferred<ToggleResponse>();
    source.start.mockReturnValue(pending.promise);
    const poller = makePoller();

    const first = poller.toggleRunning();
    await poller.toggleRunning();
    pending.resolve({ running: true });
    await first;
    expect(source.start).toHaveBeenCalledTimes(1);
  });

  it("discards a poll issued before the toggle", async () => {
    const poll = deferred<AssistantStatus>();
    source.getStatus.mockReturnValueOnce(poll.promise);
    source.start.mockResolvedValue({ running: true });
    const poller = makePoller();

    const refreshing = poller.refresh();
    await poller.toggleRunning();
    poll.resolve(status(false));
    await expect(refreshing).resolves.toBe(false);
    expect(poller.getState().status.running).toBe(true);
  });
});

describe("isMicrophoneAvailable", () => {
  it("prefers the browser probe over the service report", async () => {
    source.getStatus.mockResolvedValue(status(false, true));
    const poller = makePoller();
    await poller.refresh();
    expect(isMicrophoneAvailable(poller.getState())).toBe(true);

    poller.setBrowserMicrophone(false);
    expect(isMicrophoneAvailable(poller.getState())).toBe(false);
  });
});
