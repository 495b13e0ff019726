import { isVoiceType } from "../types";
import type { MessageSettings, VoiceEntry } from "../types";

export type ClientMessage =
  | ({ type: "set" } & MessageSettings)
  | ({ type: "speak"; text: string; traceId?: string } & MessageSettings)
  | { type: "pause" }
  | { type: "stop" }
  | { type: "list_voices" }
  | { type: "end" };

export type RelayEvent =
  | { type: "ready"; module: string; version: string }
  | { type: "error"; error: string }
  | { type: "voices"; voices: VoiceEntry[] }
  | { type: "pause_result"; ok: boolean }
  | { type: "speak_ok"; traceId: string }
  | { type: "speak_error"; traceId: string; kind: string; error: string }
  | { type: "speak_failed"; traceId: string; kind: string; error: string }
  | { type: "event_begin"; traceId: string }
  | { type: "event_end"; traceId: string }
  | {
      type: "audio_start";
      traceId: string;
      format: string;
      bits: number;
      numChannels: number;
      sampleRate: number;
      numSamples: number;
    }
  | { type: "audio_delta"; traceId: string; audio: string }
  | { type: "audio_end"; traceId: string };

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === "object" && v !== null && !Array.isArray(v);

const optionalString = (body: Record<string, unknown>, key: string): string | undefined => {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string" || !v.trim()) throw new Error(`${key} must be a non-empty string`);
  return v.trim();
};

/** Voice fields of a request body; absent fields are left undefined. */
export const parseSettings = (body: unknown): MessageSettings => {
  if (!isRecord(body)) throw new Error("payload must be a JSON object");
  const settings: MessageSettings = {};

  const language = optionalString(body, "language");
  if (language) settings.language = language;

  const rawType = optionalString(body, "voiceType")?.toUpperCase();
  if (rawType !== undefined) {
    if (!isVoiceType(rawType)) throw new Error(`unknown voiceType "${rawType}"`);
    settings.voiceType = rawType;
  }

  const voiceName = optionalString(body, "voiceName");
  if (voiceName) settings.voiceName = voiceName;

  return settings;
};

export const parseSpeakBody = (body: unknown): { text: string; traceId?: string; settings: MessageSettings } => {
  const settings = parseSettings(body);
  const text = isRecord(body) ? body.text : undefined;
  if (typeof text !== "string" || !text.trim()) {
    throw new Error("speak payload must include non-empty text field");
  }
  const traceId = isRecord(body) ? optionalString(body, "traceId") : undefined;
  return { text, traceId, settings };
};

export const parseClientMessage = (raw: string): ClientMessage => {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new Error("message is not valid JSON");
  }
  const type = isRecord(payload) ? payload.type : undefined;
  if (typeof type !== "string") {
    throw new Error("message must be an object with a type field");
  }

  switch (type) {
    case "set":
      return { type: "set", ...parseSettings(payload) };
    case "speak": {
      const { text, traceId, settings } = parseSpeakBody(payload);
      return { type: "speak", text, traceId, ...settings };
    }
    case "pause":
    case "stop":
    case "list_voices":
    case "end":
      return { type };
    default:
      throw new Error(`Unsupported payload type "${type}"`);
  }
};
