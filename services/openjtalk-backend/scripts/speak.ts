/*
  Sends one speak request to a running backend and saves the audio.

  Examples:
    npm run speak -- --text "こんにちは" --lang ja --type FEMALE1
    npm run speak -- --relay ws://localhost:5070/relay --text "<speak>テスト</speak>" --out /tmp/test.wav
*/

import WebSocket from "ws";
import fs from "node:fs/promises";
import type { RelayEvent } from "../src/core/messages";
import { encodeWav } from "../src/util/wav";

const arg = (name: string): string | undefined => {
  const idx = process.argv.indexOf(name);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
};

const relay = arg("--relay") ?? "ws://localhost:5070/relay";
const text = arg("--text");
const out = arg("--out") ?? "speak.wav";

const main = async () => {
  if (!text) {
    throw new Error("Provide --text");
  }

  const ws = new WebSocket(relay);
  await new Promise<void>((resolve, reject) => {
    ws.on("open", () => resolve());
    ws.on("error", (e) => reject(e));
  });

  const chunks: Buffer[] = [];
  let header: Extract<RelayEvent, { type: "audio_start" }> | undefined;

  const done = new Promise<void>((resolve, reject) => {
    ws.on("message", (data) => {
      const evt = JSON.parse(data.toString()) as RelayEvent;
      process.stdout.write(`< ${evt.type}\n`);
      switch (evt.type) {
        case "audio_start":
          header = evt;
          break;
        case "audio_delta":
          chunks.push(Buffer.from(evt.audio, "base64"));
          break;
        case "speak_error":
        case "speak_failed":
          reject(new Error(`${evt.kind}: ${evt.error}`));
          break;
        case "error":
          reject(new Error(evt.error));
          break;
        case "audio_end":
          resolve();
          break;
        default:
          break;
      }
    });
  });

  ws.send(
    JSON.stringify({
      type: "speak",
      text,
      language: arg("--lang") ?? "ja",
      voiceType: arg("--type"),
      voiceName: arg("--voice"),
    }),
  );

  try {
    await done;
  } finally {
    ws.close();
  }

  if (!header) throw new Error("no audio received");
  const wav = encodeWav({ ...header, samples: Buffer.concat(chunks) });
  await fs.writeFile(out, wav);
  process.stdout.write(`wrote ${out} (${header.numSamples} frames @ ${header.sampleRate} Hz)\n`);
};

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
