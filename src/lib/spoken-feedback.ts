/**
 * spoken-feedback.ts — Speaks short assistant replies (help text, command
 * results) when spoken feedback is enabled in the voice settings.
 *
 *  - English text is synthesized in-browser with vits-web and played as a blob
 *  - Other languages, or any VITS failure, use native SpeechSynthesis; after
 *    the first VITS failure every later reply goes native too (iOS never
 *    runs the ONNX runtime)
 *  - A new reply cuts off the one playing
 */

import * as tts from "@diffusionstudio/vits-web";

type VoiceId = Parameters<typeof tts.predict>[0]["voiceId"];

export const FEEDBACK_VOICE: VoiceId = "en_GB-cori-high";

const GENERATION_TIMEOUT_MS = 10_000;
const PLAYBACK_TIMEOUT_MS = 30_000;

export interface SpokenFeedbackCallbacks {
  onSpeakStart?: () => void;
  onSpeakEnd?: () => void;
  onFallback?: (reason: string) => void;
}

export class SpokenFeedback {
  private currentAudio: HTMLAudioElement | null = null;
  private speaking = false;
  private muted = false;
  private volume = 0.8;
  private useNative: boolean;
  /** Incremented by stop(); a reply whose token is stale must not play. */
  private token = 0;
  private callbacks: SpokenFeedbackCallbacks;

  constructor(callbacks: SpokenFeedbackCallbacks = {}) {
    this.callbacks = callbacks;
    this.useNative = typeof navigator !== "undefined" && /iPhone|iPad|iPod/i.test(navigator.userAgent);
  }

  setMuted(muted: boolean) {
    this.muted = muted;
    if (this.currentAudio) this.currentAudio.volume = muted ? 0 : this.volume;
  }

  isMuted(): boolean {
    return this.muted;
  }

  isSpeaking(): boolean {
    return this.speaking;
  }

  isUsingNativeVoice(): boolean {
    return this.useNative;
  }

  async speak(text: string, lang = "en-US"): Promise<void> {
    this.stop();
    const clean = text.trim();
    if (!clean || this.muted) return;

    const token = this.token;
    this.speaking = true;
    this.callbacks.onSpeakStart?.();
    try {
      if (this.useNative || !lang.toLowerCase().startsWith("en")) {
        await this.speakNative(clean, lang);
        return;
      }

      let blob: Blob;
      try {
        blob = await Promise.race([
          tts.predict({ text: clean, voiceId: FEEDBACK_VOICE }),
          new Promise<never>((_, reject) =>
            setTimeout(() => reject(new Error("TTS generation timed out")), GENERATION_TIMEOUT_MS),
          ),
        ]);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn("[SpokenFeedback] VITS failed, switching to SpeechSynthesis:", reason);
        this.useNative = true;
        this.callbacks.onFallback?.(reason);
        if (token === this.token) await this.speakNative(clean, lang);
        return;
      }
      if (token === this.token) await this.playBlob(blob);
    } finally {
      if (token === this.token) {
        this.speaking = false;
        this.callbacks.onSpeakEnd?.();
      }
    }
  }

  stop() {
    this.token++;
    if (this.currentAudio) {
      this.currentAudio.pause();
      this.currentAudio = null;
    }
    if (typeof speechSynthesis !== "undefined") speechSynthesis.cancel();
    this.speaking = false;
  }

  private playBlob(blob: Blob): Promise<void> {
    return new Promise((resolve) => {
      const url = URL.createObjectURL(blob);
      const audio = new Audio(url);
      audio.volume = this.muted ? 0 : this.volume;
      this.currentAudio = audio;

      let done = false;
      const cleanup = () => {
        if (done) return;
        done = true;
        clearTimeout(timeout);
        URL.revokeObjectURL(url);
        audio.onended = null;
        audio.onerror = null;
        if (this.currentAudio === audio) this.currentAudio = null;
        resolve();
      };

      // play() can stay pending forever on iOS
      const timeout = setTimeout(() => {
        audio.pause();
        cleanup();
      }, PLAYBACK_TIMEOUT_MS);

      audio.onended = cleanup;
      audio.onerror = cleanup;
      audio.play().catch(cleanup);
    });
  }

  private speakNative(text: string, lang: string): Promise<void> {
    return new Promise((resolve) => {
      if (typeof speechSynthesis === "undefined") {
        resolve();
        return;
      }
      const utterance = new SpeechSynthesisUtterance(text);
      utterance.volume = this.muted ? 0 : this.volume;
      utterance.lang = lang;
      utterance.onend = () => resolve();
      utterance.onerror = () => resolve();
      speechSynthesis.speak(utterance);
    });
  }
}
