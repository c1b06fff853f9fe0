/**
 * status-poller.ts — Keeps the displayed run/microphone state in sync with
 * the Assistant Service.
 *
 * Ordering rules:
 *  - Every /status request gets a sequence number; a response is applied only
 *    if it is newer than the last applied one, so a slow early response can
 *    never overwrite a faster later one.
 *  - Start/stop bumps a generation counter when it begins and when it ends.
 *    Polls issued under an older generation are discarded: the toggle's own
 *    response is authoritative, and the next tick reconciles.
 *  - Poll failures keep the previous state and are only logged; the timer
 *    keeps running regardless.
 */

import type { AssistantStatus, ToggleResponse } from "./assistant-types.ts";
import { EMPTY_STATUS } from "./assistant-types.ts";
import type { ActivityLog } from "./activity-log.ts";
import type { NotificationCenter } from "./notification-center.ts";
import { errorMessage } from "./errors.ts";

export interface StatusSource {
  getStatus(): Promise<AssistantStatus>;
  start(): Promise<ToggleResponse>;
  stop(): Promise<ToggleResponse>;
}

export interface StatusPollerDeps {
  source: StatusSource;
  notifications: NotificationCenter;
  log: ActivityLog;
  intervalMs: number;
}

export interface StatusPollerState {
  status: AssistantStatus;
  /** True once any /status request has succeeded. */
  loaded: boolean;
  lastUpdatedAt: number | null;
  /** Start/stop request in flight; controls are disabled while set. */
  toggling: boolean;
  /** Result of the browser's own microphone probe, null until probed. */
  browserMicrophone: boolean | null;
}

const INITIAL_STATE: StatusPollerState = {
  status: EMPTY_STATUS,
  loaded: false,
  lastUpdatedAt: null,
  toggling: false,
  browserMicrophone: null,
};

const SOURCE = "StatusPoller";

export class StatusPoller {
  private state: StatusPollerState = INITIAL_STATE;
  private listeners: Set<() => void> = new Set();
  private timer: ReturnType<typeof setInterval> | null = null;
  private issuedSeq = 0;
  private appliedSeq = 0;
  private generation = 0;
  private readonly source: StatusSource;
  private readonly notifications: NotificationCenter;
  private readonly log: ActivityLog;
  private readonly intervalMs: number;

  constructor(deps: StatusPollerDeps) {
    this.source = deps.source;
    this.notifications = deps.notifications;
    this.log = deps.log;
    this.intervalMs = deps.intervalMs;
  }

  getState(): StatusPollerState {
    return this.state;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Refresh now, then every intervalMs until stop(). */
  start() {
    if (this.timer !== null) return;
    void this.refresh();
    this.timer = setInterval(() => {
      void this.refresh();
    }, this.intervalMs);
  }

  stop() {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isPolling(): boolean {
    return this.timer !== null;
  }

  /**
   * Fetch /status once. Resolves to true when the response was applied,
   * false when it failed or was superseded. Never rejects.
   */
  async refresh(): Promise<boolean> {
    const seq = ++this.issuedSeq;
    const generation = this.generation;

    let status: AssistantStatus;
    try {
      status = await this.source.getStatus();
    } catch (err) {
      this.log.warn(SOURCE, `Status refresh #${seq} failed: ${errorMessage(err)}`);
      return false;
    }

    if (generation !== this.generation) {
      this.log.debug(SOURCE, `Discarded status #${seq}: start/stop happened since it was issued`);
      return false;
    }
    if (seq <= this.appliedSeq) {
      this.log.debug(SOURCE, `Discarded stale status #${seq} (already showing #${this.appliedSeq})`);
      return false;
    }

    this.appliedSeq = seq;
    this.setState({ status, loaded: true, lastUpdatedAt: Date.now() });
    return true;
  }

  /** Start the assistant if stopped, stop it if running. Ignored while a toggle is in flight. */
  async toggleRunning(): Promise<void> {
    if (this.state.toggling) return;
    const target = !this.state.status.running;
    const verb = target ? "start" : "stop";

    this.generation++;
    this.setState({ toggling: true });
    try {
      const resp = target ? await this.source.start() : await this.source.stop();
      const ok = resp.success ?? resp.running === target;
      this.setState({ status: { ...this.state.status, running: resp.running } });

      if (ok) {
        this.log.info(SOURCE, `Assistant ${target ? "started" : "stopped"}`);
        this.notifications.success(resp.message || (target ? "Assistant started" : "Assistant stopped"));
      } else {
        this.log.warn(SOURCE, `Service refused to ${verb}: ${resp.message ?? "no message"}`);
        this.notifications.danger(resp.message || `Failed to ${verb} the assistant`);
      }
    } catch (err) {
      this.log.error(SOURCE, `Failed to ${verb} the assistant: ${errorMessage(err)}`);
      this.notifications.danger(`Failed to ${verb} the assistant`);
    } finally {
      this.generation++;
      this.setState({ toggling: false });
    }
  }

  setBrowserMicrophone(available: boolean) {
    if (this.state.browserMicrophone === available) return;
    this.setState({ browserMicrophone: available });
  }

  private setState(partial: Partial<StatusPollerState>) {
    this.state = { ...this.state, ...partial };
    for (const l of this.listeners) l();
  }
}

/** Microphone badge value: the browser's own probe wins over the service's report. */
export function isMicrophoneAvailable(state: StatusPollerState): boolean {
  return state.browserMicrophone ?? state.status.microphone_available;
}
