import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { SpeakError } from "../errors";
import type { AudioTrack } from "../types";

// open_jtalk always writes the canonical 44-byte RIFF/WAVE header (fmt chunk
// of 16 bytes followed directly by the data chunk), so fields are read at
// fixed offsets rather than by walking chunks.
export const WAV_FIELDS = {
  numChannels: { offset: 22, size: 2 },
  sampleRate: { offset: 24, size: 4 },
  bitsPerSample: { offset: 34, size: 2 },
  dataSize: { offset: 40, size: 4 },
} as const;

export const WAV_SAMPLES_OFFSET = 44;

type WavField = keyof typeof WAV_FIELDS;

const malformed = (msg: string, cause?: unknown) => new SpeakError("MalformedHeader", msg, { cause });

const readExact = async (fh: FileHandle, position: number, length: number, what: string): Promise<Buffer> => {
  const buf = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await fh.read(buf, filled, length - filled, position + filled);
    if (bytesRead === 0) {
      throw malformed(`short read on ${what}: got ${filled} of ${length} bytes at offset ${position}`);
    }
    filled += bytesRead;
  }
  return buf;
};

const readField = async (fh: FileHandle, field: WavField): Promise<number> => {
  const { offset, size } = WAV_FIELDS[field];
  const buf = await readExact(fh, offset, size, field);
  return size === 2 ? buf.readUInt16LE(0) : buf.readUInt32LE(0);
};

/**
 * Decodes the WAV file written by the engine into an {@link AudioTrack}.
 * Throws a `MalformedHeader` {@link SpeakError} on any short read or on a
 * header that would make the frame count undefined.
 */
export const decodeWavFile = async (path: string): Promise<AudioTrack> => {
  let fh: FileHandle;
  try {
    fh = await fs.open(path, "r");
  } catch (e) {
    throw malformed(`cannot open wav output ${path}`, e);
  }

  try {
    const bits = await readField(fh, "bitsPerSample");
    const numChannels = await readField(fh, "numChannels");
    const sampleRate = await readField(fh, "sampleRate");
    const dataSize = await readField(fh, "dataSize");

    const bytesPerSample = Math.floor(bits / 8);
    if (numChannels === 0) throw malformed("header declares 0 channels");
    if (bytesPerSample === 0) throw malformed(`unsupported bits per sample: ${bits}`);

    const numSamples = Math.floor(Math.floor(dataSize / numChannels) / bytesPerSample);
    const payloadBytes = numSamples * numChannels * bytesPerSample;

    const { size: fileSize } = await fh.stat();
    if (fileSize < WAV_SAMPLES_OFFSET + payloadBytes) {
      throw malformed(
        `short read on samples: header declares ${payloadBytes} bytes, file has ${Math.max(0, fileSize - WAV_SAMPLES_OFFSET)}`,
      );
    }

    const samples = await readExact(fh, WAV_SAMPLES_OFFSET, payloadBytes, "samples");
    return { bits, numChannels, sampleRate, numSamples, samples };
  } finally {
    await fh.close();
  }
};

/** Canonical 44-byte PCM header followed by the track's samples. */
export const encodeWav = (track: AudioTrack): Buffer => {
  const { numChannels, sampleRate, bits } = track;
  const blockAlign = (numChannels * bits) / 8;
  const byteRate = sampleRate * blockAlign;
  const dataSize = track.samples.length;

  const header = Buffer.alloc(WAV_SAMPLES_OFFSET);
  header.write("RIFF", 0);
  header.writeUInt32LE(36 + dataSize, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(numChannels, WAV_FIELDS.numChannels.offset);
  header.writeUInt32LE(sampleRate, WAV_FIELDS.sampleRate.offset);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bits, WAV_FIELDS.bitsPerSample.offset);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, WAV_FIELDS.dataSize.offset);

  return Buffer.concat([header, track.samples]);
};
