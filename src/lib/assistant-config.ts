import type { AssistantConfig } from "./assistant-types.ts";

export const DEFAULT_CONFIG: AssistantConfig = {
  serviceUrl: "",
  pollIntervalMs: 10_000,
  wakeCooldownMs: 3_000,
  restartDelayMs: 1_000,
  networkRetryDelayMs: 2_000,
  listRefreshDelayMs: 1_500,
  recordingWindowMs: 3_000,
  notificationDurationMs: 5_000,
  qrNotificationDurationMs: 10_000,
  autoStartDelayMs: 1_000,
  maxReconnectAttempts: 3,
  reconnectBackoffMs: 5_000,
};

type EnvSource = Partial<Record<string, string | boolean | undefined>>;

function positiveInt(raw: string | boolean | undefined, fallback: number): number {
  if (typeof raw !== "string" || !/^\d+$/.test(raw.trim())) return fallback;
  const n = Number(raw.trim());
  return n > 0 ? n : fallback;
}

/** Build the runtime config from Vite env variables (VITE_*), with overrides on top. */
export function loadConfig(env: EnvSource = import.meta.env, overrides: Partial<AssistantConfig> = {}): AssistantConfig {
  const url = typeof env.VITE_ASSISTANT_URL === "string" ? env.VITE_ASSISTANT_URL.trim() : "";
  return {
    ...DEFAULT_CONFIG,
    serviceUrl: url.replace(/\/+$/, ""),
    pollIntervalMs: positiveInt(env.VITE_POLL_INTERVAL_MS, DEFAULT_CONFIG.pollIntervalMs),
    wakeCooldownMs: positiveInt(env.VITE_WAKE_COOLDOWN_MS, DEFAULT_CONFIG.wakeCooldownMs),
    ...overrides,
  };
}
