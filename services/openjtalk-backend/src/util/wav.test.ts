import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { decodeWavFile, encodeWav, WAV_FIELDS } from "./wav";
import type { AudioTrack } from "../types";

const pattern = (length: number) => {
  const buf = Buffer.alloc(length);
  for (let i = 0; i < length; i += 1) buf[i] = i % 251;
  return buf;
};

const stereo16: AudioTrack = {
  bits: 16,
  numChannels: 2,
  sampleRate: 22050,
  numSamples: 1000,
  samples: pattern(4000),
};

describe("decodeWavFile", () => {
  let dir: string;

  const writeWav = async (bytes: Buffer) => {
    const file = path.join(dir, "out.wav");
    await fs.writeFile(file, bytes);
    return file;
  };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "wav-test-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads header fields and the exact payload", async () => {
    const track = await decodeWavFile(await writeWav(encodeWav(stereo16)));

    expect(track.bits).toBe(16);
    expect(track.numChannels).toBe(2);
    expect(track.sampleRate).toBe(22050);
    expect(track.numSamples).toBe(1000);
    expect(track.samples.length).toBe(4000);
    expect(track.samples.equals(stereo16.samples)).toBe(true);
  });

  it("drops a trailing partial frame using integer division", async () => {
    const wav = encodeWav({ ...stereo16, samples: pattern(4003) });
    const track = await decodeWavFile(await writeWav(wav));

    expect(track.numSamples).toBe(1000);
    expect(track.samples.length).toBe(4000);
    expect(track.samples.equals(pattern(4000))).toBe(true);
  });

  it("ignores bytes past the declared payload", async () => {
    const wav = Buffer.concat([encodeWav(stereo16), Buffer.from([1, 2, 3, 4])]);
    const track = await decodeWavFile(await writeWav(wav));

    expect(track.samples.length).toBe(4000);
  });

  it("decodes 8-bit mono", async () => {
    const wav = encodeWav({ bits: 8, numChannels: 1, sampleRate: 8000, numSamples: 10, samples: pattern(10) });
    const track = await decodeWavFile(await writeWav(wav));

    expect(track).toMatchObject({ bits: 8, numChannels: 1, sampleRate: 8000, numSamples: 10 });
  });

  it("fails on a payload shorter than declared", async () => {
    const wav = encodeWav(stereo16).subarray(0, 44 + 3999);

    await expect(decodeWavFile(await writeWav(wav))).rejects.toMatchObject({ kind: "MalformedHeader" });
  });

  it("fails when the header itself is truncated", async () => {
    const wav = encodeWav(stereo16).subarray(0, 30);

    await expect(decodeWavFile(await writeWav(wav))).rejects.toMatchObject({
      kind: "MalformedHeader",
      message: "short read on bitsPerSample: got 0 of 2 bytes at offset 34",
    });
  });

  it("fails when the data size field is cut off", async () => {
    const wav = encodeWav(stereo16).subarray(0, 42);

    await expect(decodeWavFile(await writeWav(wav))).rejects.toMatchObject({
      kind: "MalformedHeader",
      message: "short read on dataSize: got 2 of 4 bytes at offset 40",
    });
  });

  it("rejects a zero channel count", async () => {
    const wav = encodeWav(stereo16);
    wav.writeUInt16LE(0, WAV_FIELDS.numChannels.offset);

    await expect(decodeWavFile(await writeWav(wav))).rejects.toMatchObject({
      kind: "MalformedHeader",
      message: "header declares 0 channels",
    });
  });

  it("rejects a zero bit depth", async () => {
    const wav = encodeWav(stereo16);
    wav.writeUInt16LE(0, WAV_FIELDS.bitsPerSample.offset);

    await expect(decodeWavFile(await writeWav(wav))).rejects.toMatchObject({
      kind: "MalformedHeader",
      message: "unsupported bits per sample: 0",
    });
  });

  it("rejects sub-byte bit depths", async () => {
    const wav = encodeWav(stereo16);
    wav.writeUInt16LE(4, WAV_FIELDS.bitsPerSample.offset);

    await expect(decodeWavFile(await writeWav(wav))).rejects.toMatchObject({ kind: "MalformedHeader" });
  });

  it("rejects a declared size larger than the file without allocating it", async () => {
    const wav = encodeWav(stereo16);
    wav.writeUInt32LE(0xffffffff, WAV_FIELDS.dataSize.offset);

    await expect(decodeWavFile(await writeWav(wav))).rejects.toMatchObject({ kind: "MalformedHeader" });
  });

  it("reports a missing output file as malformed", async () => {
    await expect(decodeWavFile(path.join(dir, "missing.wav"))).rejects.toMatchObject({ kind: "MalformedHeader" });
  });
});

describe("encodeWav", () => {
  it("writes the canonical PCM header", () => {
    const wav = encodeWav(stereo16);

    expect(wav.length).toBe(4044);
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.readUInt32LE(4)).toBe(4036);
    expect(wav.toString("ascii", 8, 16)).toBe("WAVEfmt ");
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(2);
    expect(wav.readUInt32LE(24)).toBe(22050);
    expect(wav.readUInt32LE(28)).toBe(88200);
    expect(wav.readUInt16LE(32)).toBe(4);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString("ascii", 36, 40)).toBe("data");
    expect(wav.readUInt32LE(40)).toBe(4000);
  });
});
