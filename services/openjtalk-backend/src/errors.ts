export type SpeakErrorKind =
  | "NoVoiceResolved"
  | "TempFileError"
  | "LaunchError"
  | "SynthesisFailed"
  | "MalformedHeader";

/** A failure of a single speak request. Never fatal to the module. */
export class SpeakError extends Error {
  constructor(
    readonly kind: SpeakErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SpeakError";
  }
}

export class ModuleInitError extends Error {
  readonly kind = "NoVoiceConfigured";

  constructor(message: string) {
    super(message);
    this.name = "ModuleInitError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly line?: number,
  ) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = "ConfigError";
  }
}

export const isSpeakError = (e: unknown): e is SpeakError => e instanceof SpeakError;
