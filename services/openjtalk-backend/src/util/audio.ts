import type { AudioTrack } from "../types";

export const bytesPerFrame = (track: Pick<AudioTrack, "numChannels" | "bits">): number =>
  track.numChannels * Math.floor(track.bits / 8);

export const durationMs = (track: Pick<AudioTrack, "numSamples" | "sampleRate">): number =>
  track.sampleRate > 0 ? Math.round((track.numSamples * 1000) / track.sampleRate) : 0;

/** Splits a track's payload into chunks of `frameMs` worth of whole frames. */
export const chunkTrack = (track: AudioTrack, frameMs = 20): Buffer[] => {
  const framesPerChunk = Math.max(1, Math.round(track.sampleRate * (frameMs / 1000)));
  const chunkBytes = framesPerChunk * bytesPerFrame(track);
  const chunks: Buffer[] = [];
  if (chunkBytes === 0) return chunks;
  for (let i = 0; i < track.samples.length; i += chunkBytes) {
    chunks.push(track.samples.subarray(i, Math.min(i + chunkBytes, track.samples.length)));
  }
  return chunks;
};
