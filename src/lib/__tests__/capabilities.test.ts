import { describe, it, expect, vi } from "vitest";
import { detectCapabilities, type CapabilityEnvironment } from "../capabilities.ts";

function fullEnv(): CapabilityEnvironment {
  return {
    isSecureContext: true,
    mediaDevices: { getUserMedia: vi.fn(), getDisplayMedia: vi.fn() },
    clipboard: { read: vi.fn(), readText: vi.fn() },
    hasSpeechRecognition: true,
    hasMediaRecorder: true,
    hasAudioContext: true,
  };
}

describe("detectCapabilities", () => {
  it("reports full support in the expected order", () => {
    const report = detectCapabilities(fullEnv());
    expect(report.overall).toBe("full");
    expect(report.checks.map((c) => c.name)).toEqual([
      "Secure Context",
      "Microphone",
      "Screen Capture",
      "Clipboard",
      "Speech Recognition",
      "MediaRecorder",
      "AudioContext",
    ]);
    expect(report.checks.every((c) => c.status === "pass")).toBe(true);
  });

  it("passes text-only clipboard with a note", () => {
    const report = detectCapabilities({ ...fullEnv(), clipboard: { readText: vi.fn() } });
    const clipboard = report.checks.find((c) => c.name === "Clipboard");
    expect(clipboard).toEqual({
      name: "Clipboard",
      status: "pass",
      detail: "Text-only clipboard read; images are read by the assistant service",
    });
    expect(report.overall).toBe("full");
  });

  it("is partial when a feature falls back", () => {
    const report = detectCapabilities({ ...fullEnv(), mediaDevices: { getUserMedia: vi.fn() }, hasAudioContext: false });
    expect(report.overall).toBe("partial");
    expect(report.checks.find((c) => c.name === "Screen Capture")?.status).toBe("warn");
  });

  it("is server-only outside a secure context", () => {
    const report = detectCapabilities({ ...fullEnv(), isSecureContext: false });
    expect(report.overall).toBe("server-only");
    expect(report.checks[0].status).toBe("fail");
  });

  it("is server-only with no browser capture or voice", () => {
    const report = detectCapabilities({
      isSecureContext: true,
      hasSpeechRecognition: false,
      hasMediaRecorder: false,
      hasAudioContext: false,
    });
    expect(report.overall).toBe("server-only");
  });
});
