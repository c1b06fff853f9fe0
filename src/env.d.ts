/// <reference types="vite/client" />

declare const __BUILD_NUMBER__: string;

interface ImportMetaEnv {
  readonly VITE_ASSISTANT_URL?: string;
  readonly VITE_POLL_INTERVAL_MS?: string;
  readonly VITE_WAKE_COOLDOWN_MS?: string;
}

// Web Speech API types (Chrome/Edge vendor-prefixed, not in the default DOM lib)
interface SpeechRecognizer {
  continuous: boolean;
  interimResults: boolean;
  lang: string;
  onstart: (() => void) | null;
  onresult: ((event: SpeechRecognizerResultEvent) => void) | null;
  onerror: ((event: SpeechRecognizerErrorEvent) => void) | null;
  onend: (() => void) | null;
  start(): void;
  stop(): void;
  abort(): void;
}

type SpeechRecognizerConstructor = new () => SpeechRecognizer;

interface SpeechRecognizerAlternative {
  transcript: string;
  confidence: number;
}

interface SpeechRecognizerResult {
  readonly isFinal: boolean;
  readonly length: number;
  readonly [index: number]: SpeechRecognizerAlternative;
}

interface SpeechRecognizerResultEvent {
  resultIndex: number;
  results: ArrayLike<SpeechRecognizerResult>;
}

interface SpeechRecognizerErrorEvent {
  error: string;
  message?: string;
}

interface Window {
  SpeechRecognition?: SpeechRecognizerConstructor;
  webkitSpeechRecognition?: SpeechRecognizerConstructor;
  webkitAudioContext?: typeof AudioContext;
}
