/**
 * activation-tone.ts — Short "ding" played when the wake phrase is heard.
 *
 * The tone is rendered once with OfflineAudioContext (no user gesture
 * needed) into a 16-bit PCM WAV blob and reused for every activation.
 * A failed render or blocked playback drops the cached blob, so the next
 * wake phrase renders it again.
 */

export interface ToneOptions {
  frequency: number;
  durationMs: number;
  /** Peak gain, 0..1. */
  volume: number;
  sampleRate: number;
}

export const WAKE_TONE: ToneOptions = { frequency: 880, durationMs: 250, volume: 0.5, sampleRate: 22050 };

/** Seconds spent ramping up from silence; avoids a click at the start. */
const ATTACK_S = 0.01;

/** Render a sine tone with a short attack and exponential decay as a WAV Blob. */
export async function generateActivationTone(options: ToneOptions = WAKE_TONE): Promise<Blob> {
  const { frequency, volume, sampleRate } = options;
  const duration = options.durationMs / 1000;
  const ctx = new OfflineAudioContext(1, Math.ceil(sampleRate * duration), sampleRate);

  const osc = ctx.createOscillator();
  osc.type = "sine";
  osc.frequency.value = frequency;

  const gain = ctx.createGain();
  gain.gain.setValueAtTime(0, 0);
  gain.gain.linearRampToValueAtTime(volume, ATTACK_S);
  gain.gain.exponentialRampToValueAtTime(0.001, duration);

  osc.connect(gain);
  gain.connect(ctx.destination);
  osc.start(0);
  osc.stop(duration);

  const buffer = await ctx.startRendering();
  return encodeWav(buffer.getChannelData(0), buffer.sampleRate);
}

/** Encode mono float samples (-1..1) as a 16-bit PCM WAV Blob. */
export function encodeWav(samples: Float32Array, sampleRate: number): Blob {
  const bytesPerSample = 2;
  const dataLength = samples.length * bytesPerSample;
  const view = new DataView(new ArrayBuffer(44 + dataLength));

  writeAscii(view, 0, "RIFF");
  view.setUint32(4, 36 + dataLength, true);
  writeAscii(view, 8, "WAVE");

  writeAscii(view, 12, "fmt ");
  view.setUint32(16, 16, true);
  view.setUint16(20, 1, true); // PCM
  view.setUint16(22, 1, true); // mono
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * bytesPerSample, true);
  view.setUint16(32, bytesPerSample, true);
  view.setUint16(34, 16, true);

  writeAscii(view, 36, "data");
  view.setUint32(40, dataLength, true);

  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i]));
    view.setInt16(44 + i * bytesPerSample, s < 0 ? s * 0x8000 : s * 0x7fff, true);
  }
  return new Blob([view.buffer], { type: "audio/wav" });
}

function writeAscii(view: DataView, offset: number, text: string) {
  for (let i = 0; i < text.length; i++) view.setUint8(offset + i, text.charCodeAt(i));
}

/**
 * Lazily renders the tone on first use and plays it through an <audio>
 * element. Failures (no Web Audio, autoplay blocked) are reported, never thrown.
 */
export class ActivationTone {
  private url: Promise<string> | null = null;
  private readonly onError: (message: string) => void;
  private readonly options: ToneOptions;

  constructor(onError: (message: string) => void = () => {}, options: ToneOptions = WAKE_TONE) {
    this.onError = onError;
    this.options = options;
  }

  play() {
    if (typeof OfflineAudioContext === "undefined" || typeof Audio === "undefined") return;
    if (!this.url) this.url = generateActivationTone(this.options).then((blob) => URL.createObjectURL(blob));
    this.url
      .then((url) => new Audio(url).play())
      .catch((err: unknown) => {
        this.url = null;
        this.onError(err instanceof Error ? err.message : String(err));
      });
  }
}
