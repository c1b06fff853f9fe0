import { describe, it, expect, vi, afterEach } from "vitest";
import { ActivationTone, WAKE_TONE, encodeWav } from "../activation-tone.ts";

function ascii(view: DataView, offset: number, length: number): string {
  let s = "";
  for (let i = 0; i < length; i++) s += String.fromCharCode(view.getUint8(offset + i));
  return s;
}

describe("encodeWav", () => {
  it("writes a mono 16-bit PCM header and clamps samples", async () => {
    const blob = encodeWav(new Float32Array([0, 1, -1, 0.5, 2]), 8000);
    expect(blob.type).toBe("audio/wav");
    expect(blob.size).toBe(54);

    const view = new DataView(await blob.arrayBuffer());
    expect(ascii(view, 0, 4)).toBe("RIFF");
    expect(view.getUint32(4, true)).toBe(46);
    expect(ascii(view, 8, 4)).toBe("WAVE");
    expect(ascii(view, 12, 4)).toBe("fmt ");
    expect(view.getUint16(20, true)).toBe(1);
    expect(view.getUint16(22, true)).toBe(1);
    expect(view.getUint32(24, true)).toBe(8000);
    expect(view.getUint32(28, true)).toBe(16000);
    expect(view.getUint16(34, true)).toBe(16);
    expect(ascii(view, 36, 4)).toBe("data");
    expect(view.getUint32(40, true)).toBe(10);

    expect([0, 1, 2, 3, 4].map((i) => view.getInt16(44 + i * 2, true))).toEqual([0, 32767, -32768, 16383, 32767]);
  });
});

// ---------------------------------------------------------------------------
// Minimal OfflineAudioContext: records gain automation, renders silence
// ---------------------------------------------------------------------------

const contexts: FakeOfflineContext[] = [];

class FakeOfflineContext {
  destination = {};
  gainCalls: Array<[string, number, number]> = [];

  constructor(
    readonly channels: number,
    readonly length: number,
    readonly sampleRate: number,
  ) {
    contexts.push(this);
  }

  createOscillator() {
    return { type: "", frequency: { value: 0 }, connect: vi.fn(), start: vi.fn(), stop: vi.fn() };
  }

  createGain() {
    const record = (name: string) => (value: number, time: number) => {
      this.gainCalls.push([name, value, time]);
    };
    return {
      gain: {
        setValueAtTime: record("set"),
        linearRampToValueAtTime: record("linear"),
        exponentialRampToValueAtTime: record("exponential"),
      },
      connect: vi.fn(),
    };
  }

  startRendering() {
    return Promise.resolve({ sampleRate: this.sampleRate, getChannelData: () => new Float32Array(4) });
  }
}

describe("ActivationTone", () => {
  afterEach(() => {
    contexts.length = 0;
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("does nothing without Web Audio", () => {
    const onError = vi.fn();
    new ActivationTone(onError).play();
    expect(onError).not.toHaveBeenCalled();
  });

  it("renders the wake tone once and reuses it", async () => {
    const audioPlay = vi.fn().mockResolvedValue(undefined);
    vi.stubGlobal("OfflineAudioContext", FakeOfflineContext);
    vi.stubGlobal(
      "Audio",
      class {
        constructor(readonly src: string) {}
        play = audioPlay;
      },
    );
    const createObjectURL = vi.spyOn(URL, "createObjectURL").mockReturnValue("blob:tone");

    const tone = new ActivationTone();
    tone.play();
    await vi.waitFor(() => expect(audioPlay).toHaveBeenCalledTimes(1));
    tone.play();
    await vi.waitFor(() => expect(audioPlay).toHaveBeenCalledTimes(2));

    expect(createObjectURL).toHaveBeenCalledTimes(1);
    expect(contexts).toHaveLength(1);
    // 250 ms at 22 050 Hz
    expect(contexts[0].length).toBe(5513);
    expect(contexts[0].gainCalls).toEqual([
      ["set", 0, 0],
      ["linear", WAKE_TONE.volume, 0.01],
      ["exponential", 0.001, 0.25],
    ]);
  });

  it("reports blocked playback and renders again next time", async () => {
    const audioPlay = vi.fn().mockRejectedValueOnce(new Error("autoplay blocked")).mockResolvedValue(undefined);
    vi.stubGlobal("OfflineAudioContext", FakeOfflineContext);
    vi.stubGlobal(
      "Audio",
      class {
        constructor(readonly src: string) {}
        play = audioPlay;
      },
    );
    const createObjectURL = vi.spyOn(URL, "createObjectURL").mockReturnValue("blob:tone");
    const onError = vi.fn();

    const tone = new ActivationTone(onError);
    tone.play();
    await vi.waitFor(() => expect(onError).toHaveBeenCalledWith("autoplay blocked"));

    tone.play();
    await vi.waitFor(() => expect(audioPlay).toHaveBeenCalledTimes(2));
    expect(createObjectURL).toHaveBeenCalledTimes(2);
    expect(onError).toHaveBeenCalledTimes(1);
  });
});
