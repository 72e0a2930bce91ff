import { z } from "zod";
import type { EngineCapability } from "../../types";
import type { TranslationBackend } from "./interfaces";
import { BaseEngine } from "./base";
import { postJson, probe } from "./http";
import { LanguageMapper } from "../../config/languages";
import { BackendInferenceError } from "../../utils/errors";
import { DEFAULT_ENDPOINTS, DEFAULT_TIMEOUT_MS } from "../../utils/constants";
import { Logger } from "../../utils/logger";

// LibreTranslate echoes the shape of `q`: a list in, a list out
const libreReplySchema = z.object({
  translatedText: z.union([z.string(), z.array(z.string())]),
});

export interface LibreTranslateOptions {
  url?: string;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * Client for a local LibreTranslate process, which serves Argos Translate
 * language packs
 */
export class LibreTranslateBackend implements TranslationBackend {
  private url: string;
  private apiKey?: string;
  private timeoutMs: number;

  constructor(options: LibreTranslateOptions = {}) {
    this.url = (options.url ?? DEFAULT_ENDPOINTS.argos).replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  getBackendName(): string {
    return `LibreTranslate (${this.url})`;
  }

  async isAvailable(): Promise<boolean> {
    return probe(`${this.url}/languages`, 5000);
  }

  async translate(text: string, sourceCode: string, targetCode: string): Promise<string> {
    const [translation] = await this.translateBatch([text], sourceCode, targetCode);
    return translation;
  }

  async translateBatch(
    texts: string[],
    sourceCode: string,
    targetCode: string
  ): Promise<string[]> {
    const reply = await postJson(
      `${this.url}/translate`,
      {
        q: texts,
        source: sourceCode,
        target: targetCode,
        format: "text",
        ...(this.apiKey ? { api_key: this.apiKey } : {}),
      },
      this.timeoutMs
    );

    const parsed = libreReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new BackendInferenceError("LibreTranslate reply has no translatedText");
    }
    const { translatedText } = parsed.data;
    return typeof translatedText === "string" ? [translatedText] : translatedText;
  }
}

/**
 * Engine B: lightweight and fast, fewer languages. Speaks ISO 639-1, so
 * every internal code goes through the language table first.
 */
export class ArgosEngine extends BaseEngine {
  readonly id = "argos" as const;

  constructor(
    backend: TranslationBackend,
    capability: EngineCapability,
    private mapper: LanguageMapper = new LanguageMapper(),
    logger?: Logger
  ) {
    super(backend, capability, logger);
  }

  protected toEngineCode(languageCode: string): string | undefined {
    return this.mapper.toArgos(languageCode);
  }
}
