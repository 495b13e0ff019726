import type { VoiceEntry, VoiceType } from "../types";

const primarySubtag = (language: string) => language.split(/[-_]/)[0].toLowerCase();

/** The voices this backend was configured with (`AddVoice` entries). */
export class VoiceRegistry {
  private readonly voices: VoiceEntry[] = [];

  register(entry: VoiceEntry) {
    const dup = this.voices.some(
      (v) => v.language === entry.language && v.voiceType === entry.voiceType && v.name === entry.name,
    );
    if (!dup) this.voices.push({ ...entry });
  }

  get size(): number {
    return this.voices.length;
  }

  list(): VoiceEntry[] {
    return this.voices.map((v) => ({ ...v }));
  }

  exists(name: string): boolean {
    return this.voices.some((v) => v.name === name);
  }

  /**
   * Voice identifier for a language and coarse type. Falls back to the same
   * type under the primary language subtag, then to the language's first
   * voice of any type.
   */
  getVoice(language: string, voiceType: VoiceType): string | undefined {
    const exact = this.voices.find((v) => v.language === language && v.voiceType === voiceType);
    if (exact) return exact.name;

    const primary = primarySubtag(language);
    const sameLanguage = this.voices.filter((v) => primarySubtag(v.language) === primary);
    return (sameLanguage.find((v) => v.voiceType === voiceType) ?? sameLanguage[0])?.name;
  }
}
