/**
 * format-time.ts — Timestamp formatting for the activity log and content lists.
 *
 * Uses the native Intl API. No external date library needed.
 */

export type TimezoneMode = "utc" | "local";

/** Format an epoch timestamp as HH:MM:SS.mmm (24-hour) in UTC or local time. */
export function formatTimestamp(epochMs: number, mode: TimezoneMode): string {
  return new Date(epochMs).toLocaleTimeString("en-GB", {
    timeZone: mode === "utc" ? "UTC" : undefined,
    hour12: false,
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    fractionalSecondDigits: 3,
  });
}

const pad = (n: number) => n.toString().padStart(2, "0");

/**
 * Service timestamps are ISO strings; show them as "YYYY-MM-DD HH:MM:SS"
 * in the given mode. Anything unparseable is shown as received.
 */
export function formatCaptureTime(raw: string, mode: TimezoneMode = "local"): string {
  if (!raw) return "";
  const ms = Date.parse(raw);
  if (Number.isNaN(ms)) return raw;
  const d = new Date(ms);
  if (mode === "utc") {
    return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
  }
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/** Human-readable label for a timezone mode. */
export function formatTimezoneLabel(mode: TimezoneMode): string {
  return mode === "utc" ? "UTC" : "Local";
}
