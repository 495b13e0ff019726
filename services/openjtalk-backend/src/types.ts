import type { SpeakError } from "./errors";

export const VOICE_TYPES = [
  "MALE1",
  "MALE2",
  "MALE3",
  "FEMALE1",
  "FEMALE2",
  "FEMALE3",
  "CHILD_MALE",
  "CHILD_FEMALE",
] as const;

export type VoiceType = (typeof VOICE_TYPES)[number];

export const DEFAULT_VOICE_TYPE: VoiceType = "MALE1";

export const isVoiceType = (value: unknown): value is VoiceType =>
  typeof value === "string" && VOICE_TYPES.some((t) => t === value);

export type VoiceEntry = {
  language: string;
  voiceType: VoiceType;
  /** Engine voice identifier; substituted for `$VOICE` in search paths. */
  name: string;
};

/** Per-message voice parameters, as sent by the host with every request. */
export type MessageSettings = {
  language?: string;
  voiceType?: VoiceType;
  voiceName?: string;
};

export type BackendConfig = {
  port: number;
  binPath: string;
  dictionaryDir: string;
  /** Templates containing `$VOICE`, in priority order. */
  voiceSearchPaths: string[];
  voices: VoiceEntry[];
  tmpDir: string;
  timeoutMs: number;
};

/** "le" = little-endian PCM. */
export type AudioFormat = "le" | "be";

export interface AudioTrack {
  bits: number;
  numChannels: number;
  sampleRate: number;
  /** Frame count: one sample per channel. */
  numSamples: number;
  samples: Buffer;
}

export interface ModuleReporter {
  speakOk(): void;
  speakError(error: SpeakError): void;
  eventBegin(): void;
  eventEnd(): void;
}

export interface AudioSink {
  play(track: AudioTrack, format: AudioFormat): Promise<void>;
}

export type SpeechOutput = ModuleReporter & AudioSink;

export type SpeakRequest = {
  text: string;
  settings: MessageSettings;
  traceId?: string;
};

export type SpeakResult = { ok: true; traceId: string } | { ok: false; traceId: string; error: SpeakError };
