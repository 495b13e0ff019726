export { createBackendServer, statusForKind } from "./app";
export type { BackendServer } from "./app";
export { loadConfig, parseModuleConfig, parseVoiceList } from "./config";
export { SpeechModule, MODULE_NAME, MODULE_VERSION } from "./core/speechModule";
export type { SpeechModuleDeps } from "./core/speechModule";
export { VoiceRegistry } from "./core/voiceRegistry";
export { VoiceSelection, resolveVoicePath, VOICE_PLACEHOLDER } from "./core/voiceSelection";
export { OpenJTalkEngine } from "./modules/tts/openJtalk";
export type { SynthesizedWav, TtsEngine } from "./modules/tts/types";
export { createCaptureOutput } from "./output/captureOutput";
export { createSocketOutput } from "./output/socketOutput";
export { decodeWavFile, encodeWav } from "./util/wav";
export { stripSsml } from "./util/ssml";
export { SpeakError, ModuleInitError, ConfigError } from "./errors";
export type { SpeakErrorKind } from "./errors";
export * from "./types";
