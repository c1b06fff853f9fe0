/**
 * assistant-types.ts — Shared types for the companion client.
 *
 * Everything here is transient client-side state, rebuilt on page load from
 * the Assistant Service (status, captures) or from localStorage (settings).
 */

/** Kind of persisted capture; also selects the download and QR endpoints. */
export type ContentKind = "screenshot" | "clipboard";

/** A capture the Assistant Service persisted. Immutable once received. */
export interface ContentRef {
  /** Opaque server-assigned id (usually a path; only the last segment is used in URLs). */
  filepath: string;
  filename: string;
  timestamp: string;
  content_preview?: string;
}

export interface AssistantStatus {
  running: boolean;
  microphone_available: boolean;
  screenshots: ContentRef[];
  clipboard_items: ContentRef[];
}

export const EMPTY_STATUS: AssistantStatus = {
  running: false,
  microphone_available: false,
  screenshots: [],
  clipboard_items: [],
};

export interface VoiceSettings {
  language: string;
  wakeWord: string;
  /** 0–100 slider value. */
  sensitivity: number;
  /** Restart recognition when the engine ends its session. */
  continualListening: boolean;
  /** Speak help text and command replies aloud. */
  spokenFeedback: boolean;
}

export const DEFAULT_VOICE_SETTINGS: VoiceSettings = {
  language: "en-US",
  wakeWord: "hey omifi",
  sensitivity: 50,
  continualListening: true,
  spokenFeedback: false,
};

export const SUPPORTED_LANGUAGES = [
  { code: "en-US", label: "English (US)" },
  { code: "en-GB", label: "English (UK)" },
  { code: "en-AU", label: "English (Australia)" },
  { code: "es-ES", label: "Spanish" },
  { code: "fr-FR", label: "French" },
  { code: "de-DE", label: "German" },
] as const;

export interface TrainingSample {
  id: string;
  phrase: string;
  timestamp: number;
  /** Object URL of the recorded audio blob; valid for this page only. */
  audioRef: string;
}

export type NotificationLevel = "info" | "success" | "warning" | "danger";

export interface NotificationAction {
  label: string;
  href: string;
}

export interface AppNotification {
  id: number;
  level: NotificationLevel;
  message: string;
  /** Optional image shown above the message (QR codes). */
  imageUrl?: string;
  actions: NotificationAction[];
  createdAt: number;
  durationMs: number;
}

/** Response of POST /take-screenshot and POST /sense-clipboard. */
export interface CaptureResponse {
  success: boolean;
  message: string;
  filepath?: string;
  content_preview?: string;
  content_type?: string;
}

/** Response of POST /start and POST /stop. */
export interface ToggleResponse {
  running: boolean;
  /** Present when the service reports an explicit outcome. */
  success?: boolean;
  message?: string;
}

/** Response of POST /command. */
export interface CommandResponse {
  success: boolean;
  message: string;
}

/** Category reported to the service for clipboard payloads. */
export type ClipboardContentType = "text" | "image" | "audio" | "video" | "document" | "archive" | "file";

/** Multipart clipboard upload (tier 1 and tier 2 of the capture chain). */
export interface ClipboardUpload {
  content: Blob | string;
  type: ClipboardContentType;
  mimeType?: string;
  filename?: string;
}

/** Timing constants and service location; see assistant-config.ts. */
export interface AssistantConfig {
  serviceUrl: string;
  pollIntervalMs: number;
  wakeCooldownMs: number;
  restartDelayMs: number;
  networkRetryDelayMs: number;
  listRefreshDelayMs: number;
  recordingWindowMs: number;
  notificationDurationMs: number;
  qrNotificationDurationMs: number;
  autoStartDelayMs: number;
  maxReconnectAttempts: number;
  reconnectBackoffMs: number;
}
