import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "./errors";
import { log } from "./util/log";
import { isVoiceType } from "./types";
import type { BackendConfig, VoiceEntry } from "./types";

export const DEFAULT_DICTIONARY_DIR = "/var/lib/mecab/dic/open-jtalk";
export const DEFAULT_PORT = 5070;

export type ModuleConfigFile = {
  dictionaryDir?: string;
  voiceSearchPaths: string[];
  voices: VoiceEntry[];
};

const toVoice = (language: string, type: string, name: string, line?: number): VoiceEntry => {
  const voiceType = type.toUpperCase();
  if (!isVoiceType(voiceType)) {
    throw new ConfigError(`unknown voice type "${type}"`, line);
  }
  if (!language || !name) {
    throw new ConfigError("voice needs a language and a name", line);
  }
  return { language, voiceType, name };
};

// `Directive "arg one" "arg two"`; bare words are accepted as arguments too
const tokenize = (line: string, lineNo: number): string[] => {
  const tokens: string[] = [];
  const re = /"((?:[^"\\]|\\.)*)"|(\S+)/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(line)) !== null) {
    if (m[1] !== undefined) {
      tokens.push(m[1].replace(/\\(.)/g, "$1"));
    } else if (m[2].includes('"')) {
      throw new ConfigError(`unbalanced quote in "${line.trim()}"`, lineNo);
    } else {
      tokens.push(m[2]);
    }
  }
  return tokens;
};

const expectArgs = (directive: string, args: string[], count: number, lineNo: number) => {
  if (args.length !== count) {
    throw new ConfigError(`${directive} takes ${count} argument(s), got ${args.length}`, lineNo);
  }
};

/** Parses the module's dotconf-style configuration file. */
export const parseModuleConfig = (text: string): ModuleConfigFile => {
  const out: ModuleConfigFile = { voiceSearchPaths: [], voices: [] };

  text.split(/\r?\n/).forEach((raw, idx) => {
    const lineNo = idx + 1;
    const line = raw.trim();
    if (!line || line.startsWith("#")) return;

    const [directive, ...args] = tokenize(line, lineNo);
    switch (directive) {
      case "OpenjtalkDictionaryDirectory":
        expectArgs(directive, args, 1, lineNo);
        out.dictionaryDir = args[0];
        break;
      case "VoiceFileSearchPath":
        expectArgs(directive, args, 1, lineNo);
        out.voiceSearchPaths.push(args[0]);
        break;
      case "AddVoice":
        expectArgs(directive, args, 3, lineNo);
        out.voices.push(toVoice(args[0], args[1], args[2], lineNo));
        break;
      default:
        log.warn("ignoring unknown config directive", { directive, line: lineNo });
    }
  });

  return out;
};

/** `ja:MALE1:mei_normal,ja:FEMALE1:mei_happy` */
export const parseVoiceList = (raw: string): VoiceEntry[] =>
  raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((entry) => {
      const parts = entry.split(":");
      if (parts.length !== 3) {
        throw new ConfigError(`voice entry "${entry}" must be language:TYPE:name`);
      }
      return toVoice(parts[0].trim(), parts[1].trim(), parts[2].trim());
    });

const intFromEnv = (name: string, raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return n;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): BackendConfig => {
  const file: ModuleConfigFile = env.OPENJTALK_CONFIG
    ? parseModuleConfig(fs.readFileSync(env.OPENJTALK_CONFIG, "utf8"))
    : { voiceSearchPaths: [], voices: [] };

  const extraPaths = (env.OPENJTALK_VOICE_SEARCH_PATHS ?? "").split(path.delimiter).filter(Boolean);
  const extraVoices = env.OPENJTALK_VOICES ? parseVoiceList(env.OPENJTALK_VOICES) : [];

  return {
    port: intFromEnv("PORT", env.PORT, DEFAULT_PORT),
    binPath: env.OPENJTALK_BIN || "open_jtalk",
    dictionaryDir: env.OPENJTALK_DICTIONARY_DIR || file.dictionaryDir || DEFAULT_DICTIONARY_DIR,
    voiceSearchPaths: [...file.voiceSearchPaths, ...extraPaths],
    voices: [...file.voices, ...extraVoices],
    tmpDir: env.OPENJTALK_TMP_DIR || os.tmpdir(),
    timeoutMs: intFromEnv("OPENJTALK_TIMEOUT_MS", env.OPENJTALK_TIMEOUT_MS, 0),
  };
};
