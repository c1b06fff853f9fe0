/**
 * wake-word-gate.ts — Continuous speech recognition gated by a wake phrase.
 *
 *   idle ──start()──▶ listening ──wake phrase──▶ wake-detected ──cool-down──▶ listening
 *
 * Only final utterances are acted on:
 *  - wake phrase + trailing text  → route the trailing text now, start cool-down
 *  - wake phrase alone            → the next final utterance is the command
 *  - no wake phrase               → route only utterances naming a screenshot or the clipboard
 *
 * During cool-down further wake phrases are ignored; when it ends the status
 * text goes back to "Listening for ..." once.
 *
 * Each recognizer instance belongs to a session. Events from a session that
 * is no longer current (after stop(), a restart or a fatal error) are dropped,
 * so a late `onend` can never schedule a second restart.
 */

import type { AssistantConfig } from "./assistant-types.ts";
import type { ActivityLog } from "./activity-log.ts";
import type { NotificationCenter } from "./notification-center.ts";
import type { VoiceSettingsStore } from "./voice-settings.ts";
import { classifyError, errorMessage } from "./errors.ts";

export type WakeGateState = "idle" | "listening" | "wake-detected";

export interface WakeWordGateSnapshot {
  state: WakeGateState;
  statusText: string;
  /** Last final utterance heard. */
  lastTranscript: string;
  interimTranscript: string;
  /** Wake phrase heard without a command; the next final utterance is routed. */
  awaitingCommand: boolean;
  coolingDown: boolean;
  /** Show the "Reconnect microphone" control. */
  reconnectAvailable: boolean;
  reconnectAttempt: number;
}

export type GateTimings = Pick<
  AssistantConfig,
  | "wakeCooldownMs"
  | "restartDelayMs"
  | "networkRetryDelayMs"
  | "autoStartDelayMs"
  | "maxReconnectAttempts"
  | "reconnectBackoffMs"
>;

export interface WakeWordGateDeps {
  /** Null when the browser has no speech recognition. */
  createRecognizer: (() => SpeechRecognizer) | null;
  /** Open and immediately release the microphone; rejects when unavailable. */
  probeMicrophone: () => Promise<void>;
  /** True when at least one audio input device is enumerated. */
  hasAudioInput: () => Promise<boolean>;
  settings: VoiceSettingsStore;
  route: (command: string) => Promise<unknown>;
  notifications: NotificationCenter;
  log: ActivityLog;
  timings: GateTimings;
  playActivationTone?: () => void;
  onMicrophoneChange?: (available: boolean) => void;
}

interface Session {
  recognizer: SpeechRecognizer;
}

const SOURCE = "WakeWord";

/** Phrases that route an utterance even without the wake phrase. */
export const DIRECT_TRIGGERS = ["screenshot", "clipboard", "screen shot", "take picture", "copy text"] as const;
const IDLE_TEXT = "Voice recognition is off";
const AWAITING_TEXT = "Wake word detected! Listening for command...";

const INITIAL_SNAPSHOT: WakeWordGateSnapshot = {
  state: "idle",
  statusText: IDLE_TEXT,
  lastTranscript: "",
  interimTranscript: "",
  awaitingCommand: false,
  coolingDown: false,
  reconnectAvailable: false,
  reconnectAttempt: 0,
};

/** Browser microphone probe: open a fresh stream and release every track. */
export async function probeUserMicrophone(mediaDevices: Pick<MediaDevices, "getUserMedia">): Promise<void> {
  const stream = await mediaDevices.getUserMedia({ audio: true });
  for (const track of stream.getTracks()) track.stop();
}

export async function hasAudioInputDevice(mediaDevices: Pick<MediaDevices, "enumerateDevices">): Promise<boolean> {
  const devices = await mediaDevices.enumerateDevices();
  return devices.some((d) => d.kind === "audioinput");
}

/** Recognizer factory for this browser, or null when unsupported. */
export function speechRecognizerFactory(
  win: Pick<Window, "SpeechRecognition" | "webkitSpeechRecognition">,
): (() => SpeechRecognizer) | null {
  const Ctor = win.SpeechRecognition ?? win.webkitSpeechRecognition;
  return Ctor ? () => new Ctor() : null;
}

export class WakeWordGate {
  private snapshot: WakeWordGateSnapshot = INITIAL_SNAPSHOT;
  private listeners: Set<() => void> = new Set();
  private session: Session | null = null;
  /** User intent: keep a recognizer running. Survives restarts and reconnects. */
  private wantListening = false;
  private starting = false;
  private restartTimer: ReturnType<typeof setTimeout> | null = null;
  private cooldownTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private autoStartTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly deps: WakeWordGateDeps;

  constructor(deps: WakeWordGateDeps) {
    this.deps = deps;
  }

  getSnapshot(): WakeWordGateSnapshot {
    return this.snapshot;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  isSupported(): boolean {
    return this.deps.createRecognizer !== null;
  }

  /** Probe the microphone, then start a recognizer. Resolves true when listening. */
  async start(): Promise<boolean> {
    if (this.session || this.starting) return this.session !== null;
    if (!this.deps.createRecognizer) {
      this.deps.notifications.warning("Speech recognition is not supported in this browser. Try Chrome or Edge.");
      return false;
    }

    this.starting = true;
    this.clearTimer("autoStartTimer");
    try {
      try {
        await this.deps.probeMicrophone();
      } catch (err) {
        this.deps.onMicrophoneChange?.(false);
        this.deps.log.error(SOURCE, `Microphone probe failed: ${errorMessage(err)}`);
        this.deps.notifications.danger(microphoneErrorMessage(err));
        this.update({ ...INITIAL_SNAPSHOT, reconnectAvailable: true });
        return false;
      }
      this.deps.onMicrophoneChange?.(true);
      this.wantListening = true;
      this.deps.settings.setRecognitionActive(true);

      if (this.launch()) return true;
      this.wantListening = false;
      this.deps.settings.setRecognitionActive(false);
      return false;
    } finally {
      this.starting = false;
    }
  }

  stop() {
    this.wantListening = false;
    this.deps.settings.setRecognitionActive(false);
    this.halt();
    this.update({ ...INITIAL_SNAPSHOT, reconnectAvailable: this.snapshot.reconnectAvailable });
    this.deps.log.info(SOURCE, "Voice recognition stopped");
  }

  async toggle(): Promise<boolean> {
    if (this.snapshot.state === "idle") return this.start();
    this.stop();
    return false;
  }

  /** Restart an active session so a new language or wake phrase takes effect. */
  applySettings() {
    if (!this.session) return;
    this.detachSession();
    if (this.launch()) {
      this.deps.log.info(SOURCE, "Recognizer restarted with new settings");
    } else {
      this.wantListening = false;
      this.deps.settings.setRecognitionActive(false);
    }
  }

  /** Resume listening after a reload if it was on before. Returns true when scheduled. */
  resumeIfPreviouslyActive(): boolean {
    if (!this.deps.settings.isRecognitionActive() || !this.isSupported()) return false;
    this.clearTimer("autoStartTimer");
    this.autoStartTimer = setTimeout(() => {
      this.autoStartTimer = null;
      void this.start();
    }, this.deps.timings.autoStartDelayMs);
    return true;
  }

  /**
   * Re-acquire the microphone after a failure. Retries itself with backoff
   * (attempt × reconnectBackoffMs) up to maxReconnectAttempts.
   */
  async reconnect(): Promise<boolean> {
    this.clearTimer("reconnectTimer");
    const attempt = this.snapshot.reconnectAttempt + 1;
    this.update({ reconnectAttempt: attempt, statusText: `Reconnecting microphone (attempt ${attempt})...` });

    try {
      if (!(await this.deps.hasAudioInput())) throw new Error("No audio input devices found");
      await this.deps.probeMicrophone();
    } catch (err) {
      this.deps.onMicrophoneChange?.(false);
      this.deps.log.warn(SOURCE, `Reconnect attempt ${attempt} failed: ${errorMessage(err)}`);

      if (attempt < this.deps.timings.maxReconnectAttempts) {
        const delay = attempt * this.deps.timings.reconnectBackoffMs;
        this.deps.notifications.warning(`Microphone reconnect failed, retrying in ${Math.round(delay / 1000)}s`);
        this.reconnectTimer = setTimeout(() => {
          this.reconnectTimer = null;
          void this.reconnect();
        }, delay);
        return false;
      }

      this.deps.notifications.danger(microphoneErrorMessage(err));
      this.update({ state: "idle", statusText: IDLE_TEXT, reconnectAttempt: 0, reconnectAvailable: true });
      return false;
    }

    this.deps.onMicrophoneChange?.(true);
    this.deps.notifications.success("Microphone reconnected");
    this.update({ reconnectAttempt: 0, reconnectAvailable: false });

    if (!this.wantListening && !this.deps.settings.isRecognitionActive()) {
      this.update({ statusText: IDLE_TEXT });
      return true;
    }
    this.wantListening = true;
    this.detachSession();
    return this.launch();
  }

  /** Stop timers and the recognizer without touching the persisted active flag. */
  dispose() {
    this.wantListening = false;
    this.halt();
    this.clearTimer("autoStartTimer");
    this.update(INITIAL_SNAPSHOT);
  }

  // --- Recognizer session ---

  private launch(): boolean {
    const factory = this.deps.createRecognizer;
    if (!factory) return false;
    const settings = this.deps.settings.get();

    try {
      const recognizer = factory();
      recognizer.continuous = true;
      recognizer.interimResults = true;
      recognizer.lang = settings.language;
      const session: Session = { recognizer };
      recognizer.onresult = (event) => this.handleResult(session, event);
      recognizer.onerror = (event) => this.handleError(session, event);
      recognizer.onend = () => this.handleEnd(session);
      this.session = session;
      recognizer.start();
    } catch (err) {
      this.session = null;
      this.deps.log.error(SOURCE, `Recognizer failed to start: ${errorMessage(err)}`);
      this.deps.notifications.warning("Could not start voice recognition");
      this.update({ state: "idle", statusText: IDLE_TEXT, awaitingCommand: false, interimTranscript: "" });
      return false;
    }

    this.deps.log.info(SOURCE, `Listening for "${settings.wakeWord}" (${settings.language})`);
    this.update({
      state: this.snapshot.coolingDown ? "wake-detected" : "listening",
      statusText: this.listeningText(),
      awaitingCommand: false,
      interimTranscript: "",
    });
    return true;
  }

  private handleResult(session: Session, event: SpeechRecognizerResultEvent) {
    if (session !== this.session) return;

    let interim = "";
    const finals: string[] = [];
    for (let i = event.resultIndex; i < event.results.length; i++) {
      const result = event.results[i];
      if (result.length === 0) continue;
      if (result.isFinal) finals.push(result[0].transcript);
      else interim += result[0].transcript;
    }

    if (interim !== this.snapshot.interimTranscript) this.update({ interimTranscript: interim });
    for (const text of finals) this.handleFinal(text);
  }

  private handleFinal(raw: string) {
    const transcript = raw.trim().replace(/\s+/g, " ");
    if (!transcript) return;
    this.update({ lastTranscript: transcript, interimTranscript: "" });

    if (this.snapshot.awaitingCommand) {
      this.update({ awaitingCommand: false, statusText: `Processing: "${transcript}"` });
      this.dispatch(transcript);
      this.beginCooldown();
      return;
    }

    const wakeWord = this.deps.settings.get().wakeWord;
    const lower = transcript.toLowerCase();
    const at = lower.indexOf(wakeWord);

    if (at >= 0) {
      if (this.snapshot.coolingDown) {
        this.deps.log.debug(SOURCE, "Wake phrase ignored during cool-down");
        return;
      }
      this.deps.log.info(SOURCE, `Wake phrase detected in "${transcript}"`);
      this.deps.playActivationTone?.();

      const trailing = lower.slice(at + wakeWord.length).replace(/^[\s,.!?;:]+/, "").trim();
      if (trailing.length > 1) {
        this.update({ state: "wake-detected", statusText: `Processing: "${trailing}"` });
        this.dispatch(trailing);
        this.beginCooldown();
      } else {
        this.update({ state: "wake-detected", statusText: AWAITING_TEXT, awaitingCommand: true });
      }
      return;
    }

    if (DIRECT_TRIGGERS.some((t) => lower.includes(t))) {
      this.deps.log.info(SOURCE, `Direct command without wake phrase: "${transcript}"`);
      this.dispatch(transcript);
    }
  }

  private dispatch(command: string) {
    this.deps.route(command).catch((err: unknown) => {
      this.deps.log.error(SOURCE, `Routing "${command}" failed: ${errorMessage(err)}`);
    });
  }

  private beginCooldown() {
    this.clearTimer("cooldownTimer");
    this.update({ coolingDown: true });
    this.cooldownTimer = setTimeout(() => {
      this.cooldownTimer = null;
      const partial: Partial<WakeWordGateSnapshot> = { coolingDown: false };
      if (this.session) {
        partial.state = "listening";
        partial.statusText = this.listeningText();
      }
      this.update(partial);
    }, this.deps.timings.wakeCooldownMs);
  }

  private handleError(session: Session, event: SpeechRecognizerErrorEvent) {
    if (session !== this.session) return;

    switch (event.error) {
      case "no-speech":
      case "aborted":
        this.deps.log.debug(SOURCE, `Recognizer: ${event.error}`);
        return;
      case "network":
        this.deps.log.warn(SOURCE, "Recognizer network error, retrying");
        this.deps.notifications.warning("Speech recognition network error, retrying...");
        this.detachSession();
        this.scheduleRestart(this.deps.timings.networkRetryDelayMs);
        return;
      case "not-allowed":
      case "service-not-allowed":
        this.deps.log.error(SOURCE, `Recognizer permission error: ${event.error}`);
        this.deps.notifications.danger("Microphone access was denied. Allow it in the browser settings and reconnect.");
        this.deps.onMicrophoneChange?.(false);
        this.wantListening = false;
        this.deps.settings.setRecognitionActive(false);
        this.halt();
        this.update({ ...INITIAL_SNAPSHOT, lastTranscript: this.snapshot.lastTranscript, reconnectAvailable: true });
        return;
      default:
        this.deps.log.warn(SOURCE, `Recognizer error: ${event.error}${event.message ? ` (${event.message})` : ""}`);
    }
  }

  private handleEnd(session: Session) {
    if (session !== this.session) return;
    this.session = null;

    if (this.wantListening && this.deps.settings.get().continualListening) {
      this.update({ statusText: "Restarting voice recognition..." });
      this.scheduleRestart(this.deps.timings.restartDelayMs);
      return;
    }

    this.deps.log.info(SOURCE, "Recognizer session ended");
    this.wantListening = false;
    this.deps.settings.setRecognitionActive(false);
    this.clearTimer("cooldownTimer");
    this.update({ ...INITIAL_SNAPSHOT, lastTranscript: this.snapshot.lastTranscript });
  }

  private scheduleRestart(delayMs: number) {
    if (this.restartTimer !== null) return;
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      this.restart();
    }, delayMs);
  }

  private restart() {
    if (!this.wantListening || this.session) return;
    if (this.launch()) {
      this.deps.log.debug(SOURCE, "Recognizer restarted");
      return;
    }
    // Keep wantListening so a successful reconnect resumes listening.
    this.deps.onMicrophoneChange?.(false);
    this.update({ reconnectAvailable: true });
  }

  /** Drop the current session and all pending timers except auto-start. */
  private halt() {
    this.clearTimer("restartTimer");
    this.clearTimer("cooldownTimer");
    this.clearTimer("reconnectTimer");
    this.detachSession();
  }

  private detachSession() {
    const session = this.session;
    this.session = null;
    if (!session) return;
    try {
      session.recognizer.stop();
    } catch (err) {
      this.deps.log.debug(SOURCE, `Recognizer stop failed: ${errorMessage(err)}`);
    }
  }

  private clearTimer(name: "restartTimer" | "cooldownTimer" | "reconnectTimer" | "autoStartTimer") {
    const timer = this[name];
    if (timer !== null) {
      clearTimeout(timer);
      this[name] = null;
    }
  }

  private listeningText(): string {
    return `Listening for "${this.deps.settings.get().wakeWord}"...`;
  }

  private update(partial: Partial<WakeWordGateSnapshot>) {
    this.snapshot = { ...this.snapshot, ...partial };
    for (const l of this.listeners) l();
  }
}

function microphoneErrorMessage(err: unknown): string {
  switch (classifyError(err)) {
    case "permission":
      return "Microphone access was denied. Allow it in the browser settings and reconnect.";
    case "not-found":
      return "No microphone found. Connect one and reconnect.";
    case "unsupported":
      return "This browser cannot access the microphone.";
    default:
      return `Microphone unavailable: ${errorMessage(err)}`;
  }
}
