/**
 * activity-log.ts — Ring buffer of timestamped activity entries.
 *
 * Every module logs what it decided here (poll failures, discarded stale
 * responses, capture strategy, routed commands, wake detections). Entries are
 * mirrored to the console with a "[Source]" prefix.
 *
 * Same subscribe/snapshot pattern as the other stores, so the Activity panel
 * can read it through useSyncExternalStore.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ActivityEntry {
  id: number;
  level: LogLevel;
  source: string;
  message: string;
  timestampMs: number;
}

const MAX_ENTRIES = 200;

export interface ActivityLogOptions {
  mirrorToConsole?: boolean;
  maxEntries?: number;
}

export class ActivityLog {
  private entries: ActivityEntry[] = [];
  private snapshot: ActivityEntry[] = [];
  private nextId = 1;
  private listeners: Set<() => void> = new Set();
  private readonly mirrorToConsole: boolean;
  private readonly maxEntries: number;

  constructor(options: ActivityLogOptions = {}) {
    this.mirrorToConsole = options.mirrorToConsole ?? true;
    this.maxEntries = options.maxEntries ?? MAX_ENTRIES;
  }

  add(level: LogLevel, source: string, message: string, detail?: unknown): ActivityEntry {
    const entry: ActivityEntry = { id: this.nextId++, level, source, message, timestampMs: Date.now() };
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }
    this.snapshot = [...this.entries];

    if (this.mirrorToConsole) {
      const line = `[${source}] ${message}`;
      const sink = level === "debug" ? console.debug : level === "info" ? console.log : level === "warn" ? console.warn : console.error;
      if (detail === undefined) sink(line);
      else sink(line, detail);
    }

    this.notify();
    return entry;
  }

  debug(source: string, message: string, detail?: unknown) { return this.add("debug", source, message, detail); }
  info(source: string, message: string, detail?: unknown) { return this.add("info", source, message, detail); }
  warn(source: string, message: string, detail?: unknown) { return this.add("warn", source, message, detail); }
  error(source: string, message: string, detail?: unknown) { return this.add("error", source, message, detail); }

  /** Referentially stable until the next add/clear. */
  getAll(): ActivityEntry[] {
    return this.snapshot;
  }

  getRecent(n = 50): ActivityEntry[] {
    return this.entries.slice(-n);
  }

  clear() {
    this.entries = [];
    this.snapshot = [];
    this.notify();
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify() {
    for (const l of this.listeners) l();
  }
}
