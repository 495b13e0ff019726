export interface SynthesizedWav {
  /** WAV file written by the engine. Exists until dispose() resolves. */
  path: string;
  dispose(): Promise<void>;
}

export interface TtsEngine {
  ready(): Promise<{ ok: boolean; details?: Record<string, unknown> }>;
  synthesize(voicePath: string, text: string): Promise<SynthesizedWav>;
}
