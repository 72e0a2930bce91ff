import languageTable from "../../data/languages.json";

/**
 * One row of the fixed language code table. The internal code space is
 * NLLB's (`rus_Cyrl`); Argos uses ISO 639-1 and franc ISO 639-3.
 */
export interface LanguageInfo {
  nllb: string;
  name: string;
  iso1: string;
  iso3: string;
  family: string;
  argos: boolean;
}

/**
 * Bidirectional lookups over the language table
 */
export class LanguageMapper {
  private byNllb = new Map<string, LanguageInfo>();
  private byIso1 = new Map<string, LanguageInfo>();
  private byIso3 = new Map<string, LanguageInfo>();

  constructor(languages: LanguageInfo[] = languageTable) {
    for (const language of languages) {
      this.byNllb.set(language.nllb, language);
      this.byIso1.set(language.iso1, language);
      this.byIso3.set(language.iso3, language);
    }
  }

  get(code: string): LanguageInfo | undefined {
    return this.byNllb.get(code);
  }

  /**
   * Normalize an NLLB, ISO 639-1 or ISO 639-3 code to the NLLB code
   */
  toNllb(code: string): string | undefined {
    return (
      this.byNllb.get(code)?.nllb ??
      this.byIso1.get(code.toLowerCase())?.nllb ??
      this.byIso3.get(code.toLowerCase())?.nllb
    );
  }

  toArgos(code: string): string | undefined {
    const language = this.byNllb.get(code);
    return language?.argos ? language.iso1 : undefined;
  }

  fromIso3(code: string): string | undefined {
    return this.byIso3.get(code)?.nllb;
  }

  getName(code: string): string {
    return this.byNllb.get(code)?.name ?? code;
  }

  /**
   * Suffix for derived column names: `eng_Latn` -> `en`
   */
  columnSuffix(code: string): string {
    return (
      this.byNllb.get(code)?.iso1 ?? code.split("_")[0].slice(0, 2).toLowerCase()
    );
  }

  iso3Codes(): string[] {
    return [...this.byIso3.keys()];
  }

  getAllLanguages(): LanguageInfo[] {
    return [...this.byNllb.values()];
  }
}
