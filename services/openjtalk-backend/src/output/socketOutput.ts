import { WebSocket } from "ws";
import type { SpeakError } from "../errors";
import type { AudioFormat, AudioTrack, SpeechOutput } from "../types";
import { chunkTrack } from "../util/audio";
import type { RelayEvent } from "../core/messages";

export type SendEvent = (event: RelayEvent) => void;

export const socketSender =
  (socket: WebSocket): SendEvent =>
  (event) => {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(event));
    }
  };

/**
 * Reports speak progress to a relay client and streams the decoded track to
 * it as 20 ms base64 frames between `audio_start` and `audio_end`.
 */
export const createSocketOutput = (send: SendEvent, traceId: string): SpeechOutput => ({
  speakOk: () => send({ type: "speak_ok", traceId }),
  speakError: (error: SpeakError) => send({ type: "speak_error", traceId, kind: error.kind, error: error.message }),
  eventBegin: () => send({ type: "event_begin", traceId }),
  eventEnd: () => send({ type: "event_end", traceId }),
  play: async (track: AudioTrack, format: AudioFormat) => {
    send({
      type: "audio_start",
      traceId,
      format,
      bits: track.bits,
      numChannels: track.numChannels,
      sampleRate: track.sampleRate,
      numSamples: track.numSamples,
    });
    for (const chunk of chunkTrack(track)) {
      send({ type: "audio_delta", traceId, audio: chunk.toString("base64") });
    }
    send({ type: "audio_end", traceId });
  },
});
