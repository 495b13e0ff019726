import type { SpeakError } from "../errors";
import type { AudioFormat, AudioTrack, SpeechOutput } from "../types";

export type CapturedSpeech = {
  accepted: boolean;
  rejected?: SpeakError;
  events: Array<"begin" | "end">;
  track?: AudioTrack;
  format?: AudioFormat;
};

/** Keeps the played track in memory, for request/response callers. */
export const createCaptureOutput = (): SpeechOutput & { captured: CapturedSpeech } => {
  const captured: CapturedSpeech = { accepted: false, events: [] };
  return {
    captured,
    speakOk: () => {
      captured.accepted = true;
    },
    speakError: (error) => {
      captured.rejected = error;
    },
    eventBegin: () => {
      captured.events.push("begin");
    },
    eventEnd: () => {
      captured.events.push("end");
    },
    play: async (track, format) => {
      captured.track = track;
      captured.format = format;
    },
  };
};
