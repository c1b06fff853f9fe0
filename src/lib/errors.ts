/**
 * errors.ts — Error taxonomy shared by the capture, voice and service flows.
 *
 *  - permission   microphone/clipboard/screen denied; terminal for this attempt
 *  - unsupported  API absent in this browser; route to the fallback path
 *  - not-found    no device to capture from
 *  - transient    network or engine hiccup; retry or ignore
 *  - unknown      anything else
 */

export type ErrorKind = "permission" | "unsupported" | "not-found" | "transient" | "unknown";

/** Non-2xx response from the Assistant Service. */
export class ServiceError extends Error {
  readonly status: number;
  readonly path: string;

  constructor(path: string, status: number, statusText: string) {
    super(`Assistant service returned ${status} for ${path}: ${statusText}`);
    this.name = "ServiceError";
    this.status = status;
    this.path = path;
  }
}

const PERMISSION_NAMES = new Set(["NotAllowedError", "PermissionDeniedError", "SecurityError"]);
const NOT_FOUND_NAMES = new Set(["NotFoundError", "DevicesNotFoundError"]);

function errorName(err: unknown): string | null {
  if (err instanceof Error) return err.name;
  if (typeof err === "object" && err !== null && "name" in err && typeof err.name === "string") return err.name;
  return null;
}

export function classifyError(err: unknown): ErrorKind {
  if (err instanceof ServiceError) return err.status >= 500 ? "transient" : "unknown";

  const name = errorName(err);
  if (name && PERMISSION_NAMES.has(name)) return "permission";
  if (name && NOT_FOUND_NAMES.has(name)) return "not-found";
  if (name === "NotSupportedError") return "unsupported";
  if (name === "AbortError" || name === "NetworkError") return "transient";

  const message = errorMessage(err);
  if (/no audio input devices/i.test(message)) return "not-found";
  // fetch() rejects with a TypeError on network failure
  if (name === "TypeError" && /fetch|network/i.test(message)) return "transient";
  if (name === "TypeError" && /not a function|undefined/i.test(message)) return "unsupported";
  return "unknown";
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") return err.message;
  return String(err);
}
