/**
 * notification-center.ts — Transient, auto-dismissing user notifications.
 *
 * All user-visible outcomes (success, failure, permission problems, QR
 * codes for new captures) go through here. Nothing blocks interaction:
 * each notification removes itself after its duration, or earlier when the
 * user dismisses it.
 */

import type { AppNotification, NotificationAction, NotificationLevel } from "./assistant-types.ts";

const MAX_VISIBLE = 6;

export interface NotifyOptions {
  durationMs?: number;
  imageUrl?: string;
  actions?: NotificationAction[];
}

export class NotificationCenter {
  private items: AppNotification[] = [];
  private nextId = 1;
  private timers = new Map<number, ReturnType<typeof setTimeout>>();
  private listeners: Set<() => void> = new Set();
  private readonly defaultDurationMs: number;

  constructor(defaultDurationMs = 5000) {
    this.defaultDurationMs = defaultDurationMs;
  }

  notify(level: NotificationLevel, message: string, options: NotifyOptions = {}): AppNotification {
    const notification: AppNotification = {
      id: this.nextId++,
      level,
      message,
      imageUrl: options.imageUrl,
      actions: options.actions ?? [],
      createdAt: Date.now(),
      durationMs: options.durationMs ?? this.defaultDurationMs,
    };

    this.items = [...this.items, notification];
    // Oldest fall off first when the stack is full
    while (this.items.length > MAX_VISIBLE) {
      this.dismiss(this.items[0].id, false);
    }

    this.timers.set(
      notification.id,
      setTimeout(() => this.dismiss(notification.id), notification.durationMs),
    );
    this.notifyListeners();
    return notification;
  }

  info(message: string, options?: NotifyOptions) { return this.notify("info", message, options); }
  success(message: string, options?: NotifyOptions) { return this.notify("success", message, options); }
  warning(message: string, options?: NotifyOptions) { return this.notify("warning", message, options); }
  danger(message: string, options?: NotifyOptions) { return this.notify("danger", message, options); }

  dismiss(id: number, notify = true) {
    const timer = this.timers.get(id);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(id);
    }
    const next = this.items.filter((n) => n.id !== id);
    if (next.length === this.items.length) return;
    this.items = next;
    if (notify) this.notifyListeners();
  }

  clear() {
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    this.items = [];
    this.notifyListeners();
  }

  /** Current notifications (referentially stable between changes). */
  getAll(): AppNotification[] {
    return this.items;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notifyListeners() {
    for (const l of this.listeners) l();
  }
}
