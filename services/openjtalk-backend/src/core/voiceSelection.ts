import fs from "node:fs/promises";
import { log } from "../util/log";
import { DEFAULT_VOICE_TYPE } from "../types";
import type { MessageSettings, VoiceType } from "../types";
import type { VoiceRegistry } from "./voiceRegistry";

export const VOICE_PLACEHOLDER = "$VOICE";

export type PathExists = (path: string) => Promise<boolean>;

export const pathExists: PathExists = async (path) => {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
};

/**
 * First search-path template that, with every `$VOICE` replaced by `voiceId`,
 * names an existing file.
 */
export const resolveVoicePath = async (
  templates: readonly string[],
  voiceId: string | undefined,
  exists: PathExists = pathExists,
): Promise<string | undefined> => {
  if (!voiceId) return undefined;
  for (const template of templates) {
    const candidate = template.split(VOICE_PLACEHOLDER).join(voiceId);
    if (await exists(candidate)) return candidate;
  }
  return undefined;
};

export type ResolvedVoice = {
  language?: string;
  voiceType: VoiceType;
  voiceId?: string;
  voicePath?: string;
};

/**
 * Resolved-voice state of one client. Settings are applied lazily: only
 * fields that differ from the previously applied message trigger a
 * re-resolve, so a selection must not be shared between clients.
 */
export class VoiceSelection {
  private language?: string;
  private voiceType: VoiceType = DEFAULT_VOICE_TYPE;
  private voiceId?: string;
  private voicePath?: string;
  private applied: MessageSettings = {};

  constructor(
    private readonly registry: VoiceRegistry,
    private readonly searchPaths: readonly string[],
    private readonly exists: PathExists = pathExists,
  ) {}

  get current(): ResolvedVoice {
    return {
      language: this.language,
      voiceType: this.voiceType,
      voiceId: this.voiceId,
      voicePath: this.voicePath,
    };
  }

  async apply(settings: MessageSettings): Promise<void> {
    if (settings.language !== undefined && settings.language !== this.applied.language) {
      this.applied.language = settings.language;
      await this.setLanguage(settings.language, settings.voiceType ?? this.voiceType);
    }
    if (settings.voiceType !== undefined && settings.voiceType !== this.applied.voiceType) {
      this.applied.voiceType = settings.voiceType;
      await this.setVoiceType(settings.voiceType);
    }
    if (settings.voiceName !== undefined && settings.voiceName !== this.applied.voiceName) {
      this.applied.voiceName = settings.voiceName;
      await this.setVoiceName(settings.voiceName);
    }
  }

  private async setLanguage(language: string, voiceType: VoiceType) {
    log.debug("setting language", { language });
    this.language = language;
    await this.setVoiceType(voiceType);
  }

  private async setVoiceType(voiceType: VoiceType) {
    log.debug("setting voice type", { voiceType, language: this.language });
    this.voiceType = voiceType;
    this.voiceId = this.language ? this.registry.getVoice(this.language, voiceType) : undefined;
    if (!this.voiceId) {
      log.debug("no voice available for type", { voiceType, language: this.language });
    }
    await this.refreshPath();
  }

  private async setVoiceName(name: string) {
    if (!this.registry.exists(name)) {
      log.debug("ignoring unknown voice name", { voiceName: name });
      return;
    }
    log.debug("setting voice name", { voiceName: name });
    this.voiceId = name;
    await this.refreshPath();
  }

  private async refreshPath() {
    this.voicePath = await resolveVoicePath(this.searchPaths, this.voiceId, this.exists);
    log.debug("voice path resolved", { voiceId: this.voiceId, voicePath: this.voicePath ?? null });
  }
}
