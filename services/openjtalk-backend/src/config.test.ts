import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { DEFAULT_DICTIONARY_DIR, loadConfig, parseModuleConfig, parseVoiceList } from "./config";
import { ConfigError } from "./errors";

const SAMPLE = `
# Open JTalk
OpenjtalkDictionaryDirectory "/opt/dic"

VoiceFileSearchPath "/usr/share/hts-voice/$VOICE.htsvoice"
VoiceFileSearchPath "/home/me/voices/$VOICE/$VOICE.htsvoice"

AddVoice "ja" "MALE1" "nitech_jp_atr503_m001"
AddVoice "ja" "female1" "mei_normal"
DefaultVoice "mei_normal"
`;

describe("parseModuleConfig", () => {
  it("reads directives in order", () => {
    expect(parseModuleConfig(SAMPLE)).toEqual({
      dictionaryDir: "/opt/dic",
      voiceSearchPaths: ["/usr/share/hts-voice/$VOICE.htsvoice", "/home/me/voices/$VOICE/$VOICE.htsvoice"],
      voices: [
        { language: "ja", voiceType: "MALE1", name: "nitech_jp_atr503_m001" },
        { language: "ja", voiceType: "FEMALE1", name: "mei_normal" },
      ],
    });
  });

  it("accepts unquoted and escaped arguments", () => {
    const parsed = parseModuleConfig('VoiceFileSearchPath /v/$VOICE.htsvoice\nVoiceFileSearchPath "/my \\"voices\\"/$VOICE"');

    expect(parsed.voiceSearchPaths).toEqual(["/v/$VOICE.htsvoice", '/my "voices"/$VOICE']);
  });

  it("reports the line of a bad voice type", () => {
    expect(() => parseModuleConfig('# header\nAddVoice "ja" "ROBOT" "x"')).toThrow(
      new ConfigError('unknown voice type "ROBOT"', 2),
    );
  });

  it("rejects the wrong number of arguments", () => {
    expect(() => parseModuleConfig('AddVoice "ja" "MALE1"')).toThrow("line 1: AddVoice takes 3 argument(s), got 2");
  });

  it("rejects unbalanced quotes", () => {
    expect(() => parseModuleConfig('VoiceFileSearchPath "/v/$VOICE')).toThrow(ConfigError);
  });
});

describe("parseVoiceList", () => {
  it("parses language:TYPE:name entries", () => {
    expect(parseVoiceList("ja:MALE1:m001, ja:female2:mei_happy,")).toEqual([
      { language: "ja", voiceType: "MALE1", name: "m001" },
      { language: "ja", voiceType: "FEMALE2", name: "mei_happy" },
    ]);
  });

  it("rejects malformed entries", () => {
    expect(() => parseVoiceList("ja:MALE1")).toThrow('voice entry "ja:MALE1" must be language:TYPE:name');
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ojt-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("uses defaults with an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 5070,
      binPath: "open_jtalk",
      dictionaryDir: DEFAULT_DICTIONARY_DIR,
      voiceSearchPaths: [],
      voices: [],
      tmpDir: os.tmpdir(),
      timeoutMs: 0,
    });
  });

  it("merges the config file with environment overrides", async () => {
    const file = path.join(dir, "openjtalk.conf");
    await fs.writeFile(file, SAMPLE);

    const config = loadConfig({
      OPENJTALK_CONFIG: file,
      OPENJTALK_DICTIONARY_DIR: "/env/dic",
      OPENJTALK_VOICE_SEARCH_PATHS: ["/a/$VOICE", "/b/$VOICE"].join(path.delimiter),
      OPENJTALK_VOICES: "ja:CHILD_MALE:kid",
      OPENJTALK_BIN: "/opt/bin/open_jtalk",
      OPENJTALK_TMP_DIR: dir,
      OPENJTALK_TIMEOUT_MS: "30000",
      PORT: "6000",
    });

    expect(config.port).toBe(6000);
    expect(config.binPath).toBe("/opt/bin/open_jtalk");
    expect(config.dictionaryDir).toBe("/env/dic");
    expect(config.voiceSearchPaths).toEqual([
      "/usr/share/hts-voice/$VOICE.htsvoice",
      "/home/me/voices/$VOICE/$VOICE.htsvoice",
      "/a/$VOICE",
      "/b/$VOICE",
    ]);
    expect(config.voices.map((v) => v.name)).toEqual(["nitech_jp_atr503_m001", "mei_normal", "kid"]);
    expect(config.tmpDir).toBe(dir);
    expect(config.timeoutMs).toBe(30000);
  });

  it("takes the dictionary from the file when the env is silent", async () => {
    const file = path.join(dir, "openjtalk.conf");
    await fs.writeFile(file, SAMPLE);

    expect(loadConfig({ OPENJTALK_CONFIG: file }).dictionaryDir).toBe("/opt/dic");
  });

  it("rejects a bad timeout", () => {
    expect(() => loadConfig({ OPENJTALK_TIMEOUT_MS: "soon" })).toThrow(
      'OPENJTALK_TIMEOUT_MS must be a non-negative integer, got "soon"',
    );
  });
});
