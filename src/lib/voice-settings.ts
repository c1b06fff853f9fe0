/**
 * voice-settings.ts — Persisted voice preferences.
 *
 * Settings live in localStorage under "omifiVoiceSettings" as JSON and are
 * merged over DEFAULT_VOICE_SETTINGS on load, field by field, so an old or
 * hand-edited entry never produces a half-valid object. The "is voice
 * recognition on" flag is stored separately so a reload can resume listening.
 */

import type { VoiceSettings } from "./assistant-types.ts";
import { DEFAULT_VOICE_SETTINGS } from "./assistant-types.ts";

export const SETTINGS_KEY = "omifiVoiceSettings";
export const ACTIVE_KEY = "voiceRecognitionActive";

export type KeyValueStorage = Pick<Storage, "getItem" | "setItem">;

function clampSensitivity(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

function normalizeWakeWord(value: string): string {
  return value.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Merge a parsed JSON value over the defaults, keeping only well-typed fields. */
export function parseVoiceSettings(raw: string | null): VoiceSettings {
  if (!raw) return { ...DEFAULT_VOICE_SETTINGS };

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ...DEFAULT_VOICE_SETTINGS };
  }
  if (typeof data !== "object" || data === null) return { ...DEFAULT_VOICE_SETTINGS };

  const d: Record<string, unknown> = { ...data };
  const settings = { ...DEFAULT_VOICE_SETTINGS };
  if (typeof d.language === "string" && d.language) settings.language = d.language;
  if (typeof d.wakeWord === "string" && normalizeWakeWord(d.wakeWord)) {
    settings.wakeWord = normalizeWakeWord(d.wakeWord);
  }
  if (typeof d.sensitivity === "number" && Number.isFinite(d.sensitivity)) {
    settings.sensitivity = clampSensitivity(d.sensitivity);
  }
  if (typeof d.continualListening === "boolean") settings.continualListening = d.continualListening;
  if (typeof d.spokenFeedback === "boolean") settings.spokenFeedback = d.spokenFeedback;
  return settings;
}

export class VoiceSettingsStore {
  private settings: VoiceSettings;
  private listeners: Set<() => void> = new Set();
  private readonly storage: KeyValueStorage;

  constructor(storage: KeyValueStorage) {
    this.storage = storage;
    this.settings = parseVoiceSettings(storage.getItem(SETTINGS_KEY));
  }

  /** Current settings (referentially stable between saves). */
  get(): VoiceSettings {
    return this.settings;
  }

  /** Merge, normalise and persist. Returns the stored settings. */
  save(partial: Partial<VoiceSettings>): VoiceSettings {
    const next = { ...this.settings, ...partial };
    const wakeWord = normalizeWakeWord(next.wakeWord);
    next.wakeWord = wakeWord || this.settings.wakeWord;
    next.sensitivity = Number.isFinite(next.sensitivity)
      ? clampSensitivity(next.sensitivity)
      : this.settings.sensitivity;

    this.settings = next;
    this.storage.setItem(SETTINGS_KEY, JSON.stringify(next));
    this.notify();
    return next;
  }

  reset(): VoiceSettings {
    return this.save({ ...DEFAULT_VOICE_SETTINGS });
  }

  isRecognitionActive(): boolean {
    return this.storage.getItem(ACTIVE_KEY) === "true";
  }

  setRecognitionActive(active: boolean) {
    this.storage.setItem(ACTIVE_KEY, active ? "true" : "false");
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify() {
    for (const listener of this.listeners) listener();
  }
}
