/**
 * assistant-controller.ts — Composes the dashboard's modules.
 *
 * Owns one instance of each store and wires their callbacks together:
 *  - captures publish optimistic refs here and ask the poller to refresh
 *  - the router's screenshot/clipboard handlers are the capture dispatcher
 *  - the wake-word gate routes through the same router as the command box
 *  - microphone probes update the poller's microphone badge
 *
 * Plain TypeScript, no React. useAssistant() subscribes via getState()/subscribe().
 */

import type { AssistantConfig, AssistantStatus, ContentKind, ContentRef, VoiceSettings } from "./assistant-types.ts";
import { ActivityLog } from "./activity-log.ts";
import { AssistantClient } from "./assistant-client.ts";
import { CaptureDispatcher, grabVideoFrame, type CaptureEnvironment, type CaptureResult } from "./capture-dispatcher.ts";
import { CommandRouter, type CommandAction } from "./command-router.ts";
import { errorMessage } from "./errors.ts";
import { NotificationCenter } from "./notification-center.ts";
import { StatusPoller } from "./status-poller.ts";
import { VoiceSettingsStore, type KeyValueStorage } from "./voice-settings.ts";
import { VoiceTrainer, openMediaRecorder, type RecordingHandle } from "./voice-training.ts";
import {
  WakeWordGate,
  hasAudioInputDevice,
  probeUserMicrophone,
  speechRecognizerFactory,
} from "./wake-word-gate.ts";

export interface Speaker {
  speak(text: string, lang: string): Promise<void>;
  setMuted(muted: boolean): void;
  stop(): void;
}

export interface Tone {
  play(): void;
}

export interface AssistantControllerDeps {
  config: AssistantConfig;
  client: AssistantClient;
  storage: KeyValueStorage;
  captureEnv: CaptureEnvironment;
  createRecognizer: (() => SpeechRecognizer) | null;
  probeMicrophone: () => Promise<void>;
  hasAudioInput: () => Promise<boolean>;
  openRecorder: () => Promise<RecordingHandle>;
  createObjectUrl: (blob: Blob) => string;
  revokeObjectUrl?: (url: string) => void;
  speaker?: Speaker;
  tone?: Tone;
  log?: ActivityLog;
  notifications?: NotificationCenter;
}

export type RecentCaptures = Record<ContentKind, ContentRef[]>;

export interface AssistantControllerState {
  /** Capture in flight, if any. */
  capturing: ContentKind | null;
  /** Captures the service acknowledged but /status has not listed yet. */
  recentCaptures: RecentCaptures;
}

const SOURCE = "Controller";

const STATUS_LIST: Record<ContentKind, "screenshots" | "clipboard_items"> = {
  screenshot: "screenshots",
  clipboard: "clipboard_items",
};

/** Optimistic captures first, then the service's list newest first, without duplicates. */
export function mergeContent(status: AssistantStatus, recent: RecentCaptures, kind: ContentKind): ContentRef[] {
  const listed = [...status[STATUS_LIST[kind]]].sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  const known = new Set(listed.map((r) => r.filepath));
  return [...recent[kind].filter((r) => !known.has(r.filepath)), ...listed];
}

/** Wire the controller to the real browser. */
export function browserControllerDeps(
  config: AssistantConfig,
  extras: Pick<AssistantControllerDeps, "speaker" | "tone"> = {},
): AssistantControllerDeps {
  const media = navigator.mediaDevices;
  return {
    config,
    client: new AssistantClient(config.serviceUrl),
    storage: window.localStorage,
    captureEnv: {
      mediaDevices: media,
      clipboard: navigator.clipboard,
      grabFrame: grabVideoFrame,
    },
    createRecognizer: speechRecognizerFactory(window),
    probeMicrophone: () => probeUserMicrophone(media),
    hasAudioInput: () => hasAudioInputDevice(media),
    openRecorder: () => openMediaRecorder(media),
    createObjectUrl: (blob) => URL.createObjectURL(blob),
    revokeObjectUrl: (url) => URL.revokeObjectURL(url),
    ...extras,
  };
}

export class AssistantController {
  readonly log: ActivityLog;
  readonly notifications: NotificationCenter;
  readonly client: AssistantClient;
  readonly settings: VoiceSettingsStore;
  readonly poller: StatusPoller;
  readonly capture: CaptureDispatcher;
  readonly router: CommandRouter;
  readonly gate: WakeWordGate;
  readonly trainer: VoiceTrainer;

  private state: AssistantControllerState = {
    capturing: null,
    recentCaptures: { screenshot: [], clipboard: [] },
  };
  private listeners: Set<() => void> = new Set();
  private unsubscribers: Array<() => void> = [];
  private readonly speaker: Speaker | undefined;
  private readonly config: AssistantConfig;

  constructor(deps: AssistantControllerDeps) {
    this.config = deps.config;
    this.speaker = deps.speaker;
    this.log = deps.log ?? new ActivityLog();
    this.notifications = deps.notifications ?? new NotificationCenter(deps.config.notificationDurationMs);
    this.client = deps.client;
    this.settings = new VoiceSettingsStore(deps.storage);

    this.poller = new StatusPoller({
      source: this.client,
      notifications: this.notifications,
      log: this.log,
      intervalMs: deps.config.pollIntervalMs,
    });

    this.capture = new CaptureDispatcher({
      service: this.client,
      env: deps.captureEnv,
      notifications: this.notifications,
      log: this.log,
      listRefreshDelayMs: deps.config.listRefreshDelayMs,
      qrNotificationDurationMs: deps.config.qrNotificationDurationMs,
      onCaptured: (kind, ref) => this.addRecentCapture(kind, ref),
      refreshStatus: () => {
        void this.poller.refresh();
      },
    });

    this.router = new CommandRouter({
      sendCommand: (command) => this.client.sendCommand(command),
      handlers: {
        takeScreenshot: async () => {
          await this.takeScreenshot();
        },
        senseClipboard: async () => {
          await this.captureClipboard();
        },
      },
      notifications: this.notifications,
      log: this.log,
      speak: (text) => this.speak(text),
    });

    const tone = deps.tone;
    this.gate = new WakeWordGate({
      createRecognizer: deps.createRecognizer,
      probeMicrophone: deps.probeMicrophone,
      hasAudioInput: deps.hasAudioInput,
      settings: this.settings,
      route: (command) => this.router.route(command),
      notifications: this.notifications,
      log: this.log,
      timings: deps.config,
      playActivationTone: tone ? () => tone.play() : undefined,
      onMicrophoneChange: (available) => this.poller.setBrowserMicrophone(available),
    });

    this.trainer = new VoiceTrainer({
      openRecorder: deps.openRecorder,
      createObjectUrl: deps.createObjectUrl,
      revokeObjectUrl: deps.revokeObjectUrl,
      notifications: this.notifications,
      log: this.log,
      recordingWindowMs: deps.config.recordingWindowMs,
    });

    this.speaker?.setMuted(!this.settings.get().spokenFeedback);
  }

  getState(): AssistantControllerState {
    return this.state;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Begin polling and resume voice recognition if it was on before the reload. */
  start() {
    this.log.info(SOURCE, `Dashboard started (build ${__BUILD_NUMBER__}, service ${this.config.serviceUrl || "same origin"})`);
    if (this.unsubscribers.length === 0) {
      this.unsubscribers.push(this.poller.subscribe(() => this.pruneRecentCaptures()));
    }
    this.poller.start();
    this.gate.resumeIfPreviouslyActive();
  }

  dispose() {
    this.poller.stop();
    this.gate.dispose();
    this.speaker?.stop();
    this.notifications.clear();
    for (const unsub of this.unsubscribers) unsub();
    this.unsubscribers = [];
  }

  toggleAssistant(): Promise<void> {
    return this.poller.toggleRunning();
  }

  takeScreenshot(): Promise<CaptureResult> {
    return this.runCapture("screenshot", () => this.capture.captureScreenshot());
  }

  captureClipboard(): Promise<CaptureResult> {
    return this.runCapture("clipboard", () => this.capture.captureClipboard());
  }

  /** Command box submit; same path as a spoken command. */
  submitCommand(text: string): Promise<CommandAction | null> {
    return this.router.route(text);
  }

  toggleVoice(): Promise<boolean> {
    return this.gate.toggle();
  }

  reconnectMicrophone(): Promise<boolean> {
    return this.gate.reconnect();
  }

  saveSettings(partial: Partial<VoiceSettings>): VoiceSettings {
    const saved = this.settings.save(partial);
    this.speaker?.setMuted(!saved.spokenFeedback);
    this.gate.applySettings();
    this.log.info(SOURCE, `Voice settings saved (wake word "${saved.wakeWord}", ${saved.language})`);
    this.notifications.success("Voice settings saved");
    return saved;
  }

  /** Speak a reply when spoken feedback is on. */
  speak(text: string) {
    const settings = this.settings.get();
    if (!this.speaker || !settings.spokenFeedback) return;
    this.speaker.speak(text, settings.language).catch((err: unknown) => {
      this.log.warn(SOURCE, `Spoken feedback failed: ${errorMessage(err)}`);
    });
  }

  private async runCapture(kind: ContentKind, run: () => Promise<CaptureResult>): Promise<CaptureResult> {
    const ownsFlag = this.state.capturing === null;
    if (ownsFlag) this.setState({ capturing: kind });
    try {
      return await run();
    } finally {
      if (ownsFlag) this.setState({ capturing: null });
    }
  }

  private addRecentCapture(kind: ContentKind, ref: ContentRef) {
    const recent = this.state.recentCaptures;
    this.setState({
      recentCaptures: { ...recent, [kind]: [ref, ...recent[kind].filter((r) => r.filepath !== ref.filepath)] },
    });
  }

  /** Drop optimistic refs once /status lists them. */
  private pruneRecentCaptures() {
    const status = this.poller.getState().status;
    const recent = this.state.recentCaptures;
    if (recent.screenshot.length === 0 && recent.clipboard.length === 0) return;

    const next: RecentCaptures = { screenshot: [], clipboard: [] };
    let changed = false;
    for (const kind of ["screenshot", "clipboard"] as const) {
      const listed = new Set(status[STATUS_LIST[kind]].map((r) => r.filepath));
      next[kind] = recent[kind].filter((r) => !listed.has(r.filepath));
      if (next[kind].length !== recent[kind].length) changed = true;
    }
    if (changed) this.setState({ recentCaptures: next });
  }

  private setState(partial: Partial<AssistantControllerState>) {
    this.state = { ...this.state, ...partial };
    for (const l of this.listeners) l();
  }
}
