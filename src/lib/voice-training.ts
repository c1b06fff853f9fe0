/**
 * voice-training.ts — Guided recording of wake-phrase and command samples.
 *
 * Steps: wake-word (3 samples of the wake phrase) → commands (one sample per
 * training command, in order) → summary. Each recording runs for
 * recordingWindowMs and is stored when the recorder reports it has stopped,
 * so the last chunk is never lost.
 *
 * Samples live in page memory as object URLs. They are not uploaded and do
 * not tune recognition; finish() says so instead of claiming to save them.
 */

import type { TrainingSample } from "./assistant-types.ts";
import type { ActivityLog } from "./activity-log.ts";
import type { NotificationCenter } from "./notification-center.ts";
import { classifyError, errorMessage } from "./errors.ts";

export const WAKE_SAMPLE_COUNT = 3;

export const TRAINING_COMMANDS = [
  "Take a screenshot",
  "Sense clipboard",
  "Show last screenshot",
  "Read clipboard",
  "Help me with commands",
] as const;

export type TrainingStep = "wake-word" | "commands" | "summary";
export type TrainingConfidence = "High" | "Medium" | "Low";

export interface TrainingSnapshot {
  step: TrainingStep;
  recording: boolean;
  wakeSamples: TrainingSample[];
  commandSamples: TrainingSample[];
  /** Index into TRAINING_COMMANDS of the next command to record. */
  commandIndex: number;
  finished: boolean;
}

/** A started-on-demand audio recorder; events may fire after stop() returns. */
export interface AudioRecorder {
  start(): void;
  stop(): void;
  onData(listener: (chunk: Blob) => void): void;
  onStop(listener: () => void): void;
}

export interface RecordingHandle {
  recorder: AudioRecorder;
  mimeType: string;
  /** Stop every microphone track. */
  release(): void;
}

export interface VoiceTrainerDeps {
  openRecorder: () => Promise<RecordingHandle>;
  createObjectUrl: (blob: Blob) => string;
  revokeObjectUrl?: (url: string) => void;
  notifications: NotificationCenter;
  log: ActivityLog;
  recordingWindowMs: number;
  now?: () => number;
}

/** Confidence label from sample counts (High ≥3/≥4, Medium ≥2/≥3). */
export function trainingConfidence(wakeCount: number, commandCount: number): TrainingConfidence {
  if (wakeCount >= 3 && commandCount >= 4) return "High";
  if (wakeCount >= 2 && commandCount >= 3) return "Medium";
  return "Low";
}

/** Open the default microphone and wrap it in a MediaRecorder. */
export async function openMediaRecorder(mediaDevices: Pick<MediaDevices, "getUserMedia">): Promise<RecordingHandle> {
  const stream = await mediaDevices.getUserMedia({ audio: true });
  const release = () => {
    for (const track of stream.getTracks()) track.stop();
  };
  let rec: MediaRecorder;
  try {
    rec = new MediaRecorder(stream);
  } catch (err) {
    release();
    throw err;
  }
  return {
    mimeType: rec.mimeType || "audio/webm",
    recorder: {
      start: () => rec.start(),
      stop: () => {
        if (rec.state !== "inactive") rec.stop();
      },
      onData: (listener) => rec.addEventListener("dataavailable", (e) => listener(e.data)),
      onStop: (listener) => rec.addEventListener("stop", () => listener()),
    },
    release,
  };
}

const SOURCE = "Training";

const INITIAL_SNAPSHOT: TrainingSnapshot = {
  step: "wake-word",
  recording: false,
  wakeSamples: [],
  commandSamples: [],
  commandIndex: 0,
  finished: false,
};

export class VoiceTrainer {
  private snapshot: TrainingSnapshot = INITIAL_SNAPSHOT;
  private listeners: Set<() => void> = new Set();
  private nextSampleId = 1;
  private readonly deps: VoiceTrainerDeps;
  private readonly now: () => number;

  constructor(deps: VoiceTrainerDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  getSnapshot(): TrainingSnapshot {
    return this.snapshot;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Phrase the user should say next, or null on the summary step. */
  currentPhrase(wakeWord: string): string | null {
    if (this.snapshot.step === "wake-word") return wakeWord.toLowerCase();
    if (this.snapshot.step === "commands") {
      const command = TRAINING_COMMANDS[this.snapshot.commandIndex];
      return command ? command.toLowerCase() : null;
    }
    return null;
  }

  async recordWakeSample(wakeWord: string): Promise<TrainingSample | null> {
    if (this.snapshot.step !== "wake-word") return null;
    const sample = await this.record("wake", wakeWord.toLowerCase());
    if (!sample) return null;

    const wakeSamples = [...this.snapshot.wakeSamples, sample];
    this.update({ wakeSamples });
    const remaining = WAKE_SAMPLE_COUNT - wakeSamples.length;
    if (remaining > 0) {
      this.deps.notifications.info(`Please record ${remaining} more sample(s)`);
    } else if (remaining === 0) {
      this.deps.notifications.success("Wake word training complete!");
    }
    return sample;
  }

  async recordCommandSample(): Promise<TrainingSample | null> {
    if (this.snapshot.step !== "commands") return null;
    const command = TRAINING_COMMANDS[this.snapshot.commandIndex];
    if (!command) return null;

    const sample = await this.record("cmd", command.toLowerCase());
    if (!sample) return null;

    this.update({ commandSamples: [...this.snapshot.commandSamples, sample] });
    this.advanceCommand();
    return sample;
  }

  /** Move on without recording the current command. */
  skipCommand() {
    if (this.snapshot.step !== "commands" || this.snapshot.recording) return;
    this.advanceCommand();
  }

  /** Wake-word → commands once enough wake samples exist. */
  next(): boolean {
    if (this.snapshot.step !== "wake-word" || this.snapshot.recording) return false;
    if (this.snapshot.wakeSamples.length < WAKE_SAMPLE_COUNT) return false;
    this.update({ step: "commands", commandIndex: 0 });
    return true;
  }

  back(): boolean {
    if (this.snapshot.step !== "commands" || this.snapshot.recording) return false;
    this.update({ step: "wake-word" });
    return true;
  }

  summary() {
    const wake = this.snapshot.wakeSamples.length;
    const commands = this.snapshot.commandSamples.length;
    return { wakeSamples: wake, commandSamples: commands, confidence: trainingConfidence(wake, commands) };
  }

  /** End the session. Samples are reported as kept locally, not applied. */
  finish() {
    const result = this.summary();
    this.update({ step: "summary", finished: true });
    this.deps.log.info(SOURCE, `Training finished: ${result.wakeSamples} wake, ${result.commandSamples} command samples`);
    this.deps.notifications.info(
      `Recorded ${result.wakeSamples} wake word and ${result.commandSamples} command samples (confidence: ${result.confidence}). ` +
        "Samples stay in this page only; they are not uploaded and do not change recognition.",
      { durationMs: 10_000 },
    );
    return result;
  }

  reset() {
    if (this.deps.revokeObjectUrl) {
      for (const s of [...this.snapshot.wakeSamples, ...this.snapshot.commandSamples]) {
        this.deps.revokeObjectUrl(s.audioRef);
      }
    }
    this.update(INITIAL_SNAPSHOT);
  }

  private advanceCommand() {
    const commandIndex = this.snapshot.commandIndex + 1;
    if (commandIndex >= TRAINING_COMMANDS.length) {
      this.update({ commandIndex, step: "summary" });
      this.deps.notifications.success("Command training complete!");
    } else {
      this.update({ commandIndex });
    }
  }

  private async record(prefix: "wake" | "cmd", phrase: string): Promise<TrainingSample | null> {
    if (this.snapshot.recording) return null;
    this.update({ recording: true });

    let handle: RecordingHandle;
    try {
      handle = await this.deps.openRecorder();
    } catch (err) {
      this.deps.log.error(SOURCE, `Could not open microphone: ${errorMessage(err)}`);
      this.deps.notifications.danger(
        classifyError(err) === "permission"
          ? "Microphone access denied. Please allow microphone access in your browser settings to use voice training."
          : "Voice training requires a microphone.",
      );
      this.update({ recording: false });
      return null;
    }

    const audio = await this.capture(handle);
    this.update({ recording: false });
    if (!audio) return null;

    const sample: TrainingSample = {
      id: `${prefix}_${this.now()}_${this.nextSampleId++}`,
      phrase,
      timestamp: this.now(),
      audioRef: this.deps.createObjectUrl(audio),
    };
    this.deps.log.info(SOURCE, `Saved ${prefix} sample "${phrase}" (${audio.size} bytes)`);
    return sample;
  }

  /** Record for recordingWindowMs; resolves with the audio after the recorder's stop event. */
  private capture(handle: RecordingHandle): Promise<Blob | null> {
    return new Promise((resolve) => {
      const chunks: Blob[] = [];
      handle.recorder.onData((chunk) => {
        if (chunk.size > 0) chunks.push(chunk);
      });
      handle.recorder.onStop(() => {
        handle.release();
        resolve(new Blob(chunks, { type: handle.mimeType }));
      });

      try {
        handle.recorder.start();
      } catch (err) {
        handle.release();
        this.deps.log.error(SOURCE, `Recorder failed to start: ${errorMessage(err)}`);
        this.deps.notifications.danger("Could not start recording");
        resolve(null);
        return;
      }
      setTimeout(() => handle.recorder.stop(), this.deps.recordingWindowMs);
    });
  }

  private update(partial: Partial<TrainingSnapshot>) {
    this.snapshot = { ...this.snapshot, ...partial };
    for (const l of this.listeners) l();
  }
}
