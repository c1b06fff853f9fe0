/**
 * capabilities.ts — Detects which browser features the dashboard can use.
 *
 * None of these are hard requirements: every capture has a server-side
 * fallback and the command box works without speech. The report only tells
 * the user which paths will be taken.
 *
 *  - Microphone        (getUserMedia; wake word and training)
 *  - Screen capture    (getDisplayMedia; otherwise server screenshot)
 *  - Clipboard read    (rich read, then text read, otherwise server clipboard)
 *  - Speech recognition (wake word)
 *  - MediaRecorder     (voice training)
 *  - AudioContext      (activation tone)
 *  - Secure context    (required by the browser for all of the above)
 */

export type CapabilityStatus = "pass" | "warn" | "fail";

export interface CapabilityCheck {
  name: string;
  status: CapabilityStatus;
  detail: string;
}

export interface CapabilityReport {
  checks: CapabilityCheck[];
  /** "full" = everything available, "partial" = some fallbacks in use, "server-only" = no browser capture or voice */
  overall: "full" | "partial" | "server-only";
}

/** The slice of the browser environment the checks look at. */
export interface CapabilityEnvironment {
  isSecureContext: boolean;
  mediaDevices?: Partial<Pick<MediaDevices, "getUserMedia" | "getDisplayMedia">>;
  clipboard?: Partial<Pick<Clipboard, "read" | "readText">>;
  hasSpeechRecognition: boolean;
  hasMediaRecorder: boolean;
  hasAudioContext: boolean;
}

export function browserCapabilityEnvironment(): CapabilityEnvironment {
  return {
    isSecureContext: window.isSecureContext,
    mediaDevices: navigator.mediaDevices,
    clipboard: navigator.clipboard,
    hasSpeechRecognition: !!(window.SpeechRecognition || window.webkitSpeechRecognition),
    hasMediaRecorder: typeof MediaRecorder !== "undefined",
    hasAudioContext: !!(window.AudioContext || window.webkitAudioContext),
  };
}

function check(name: string, ok: boolean, passDetail: string, missingDetail: string, missing: CapabilityStatus = "warn"): CapabilityCheck {
  return ok ? { name, status: "pass", detail: passDetail } : { name, status: missing, detail: missingDetail };
}

export function detectCapabilities(env: CapabilityEnvironment): CapabilityReport {
  const md = env.mediaDevices;
  const cb = env.clipboard;
  const hasMic = typeof md?.getUserMedia === "function";
  const hasDisplay = typeof md?.getDisplayMedia === "function";
  const hasRichRead = typeof cb?.read === "function";
  const hasTextRead = typeof cb?.readText === "function";

  const checks: CapabilityCheck[] = [
    check(
      "Secure Context",
      env.isSecureContext,
      "Running over HTTPS or localhost",
      "Not a secure context. Microphone, screen and clipboard access need HTTPS or localhost.",
      "fail",
    ),
    check(
      "Microphone",
      hasMic,
      "getUserMedia available",
      "Not available. Voice commands and training are disabled.",
    ),
    check(
      "Screen Capture",
      hasDisplay,
      "getDisplayMedia available",
      "Not available. Screenshots are taken by the assistant service.",
    ),
    hasRichRead
      ? { name: "Clipboard", status: "pass", detail: "Rich clipboard read (images and files)" }
      : check(
          "Clipboard",
          hasTextRead,
          "Text-only clipboard read; images are read by the assistant service",
          "Not available. Clipboard is read by the assistant service.",
        ),
    check(
      "Speech Recognition",
      env.hasSpeechRecognition,
      "SpeechRecognition available",
      "Not available. Use the command box, or Chrome or Edge for voice.",
    ),
    check("MediaRecorder", env.hasMediaRecorder, "Available for voice training", "Not available. Voice training is disabled."),
    check("AudioContext", env.hasAudioContext, "Available for the activation tone", "Not available. No tone on wake word."),
  ];

  const browserPaths = env.isSecureContext && (hasDisplay || hasRichRead || hasTextRead || env.hasSpeechRecognition);
  const hasGap = checks.some((c) => c.status !== "pass");
  return {
    checks,
    overall: !browserPaths ? "server-only" : hasGap ? "partial" : "full",
  };
}
