import { z } from "zod";
import type { TranslationBackend } from "./interfaces";
import { BaseEngine } from "./base";
import { postJson, probe } from "./http";
import { BackendInferenceError } from "../../utils/errors";
import { DEFAULT_ENDPOINTS, DEFAULT_TIMEOUT_MS } from "../../utils/constants";

const nllbReplySchema = z.object({
  translation: z.array(z.string()),
});

export interface NllbServerOptions {
  url?: string;
  timeoutMs?: number;
}

/**
 * Client for a local nllb-serve process hosting NLLB-200
 */
export class NllbServerBackend implements TranslationBackend {
  private url: string;
  private timeoutMs: number;

  constructor(options: NllbServerOptions = {}) {
    this.url = (options.url ?? DEFAULT_ENDPOINTS.nllb).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  getBackendName(): string {
    return `nllb-serve (${this.url})`;
  }

  async isAvailable(): Promise<boolean> {
    return probe(this.url, 5000);
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
      { source: texts, src_lang: sourceCode, tgt_lang: targetCode },
      this.timeoutMs
    );

    const parsed = nllbReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new BackendInferenceError("nllb-serve reply has no translation list");
    }
    return parsed.data.translation;
  }
}

/**
 * Engine A: broad coverage, the default. NLLB codes are the internal
 * code space, so no mapping is needed.
 */
export class NllbEngine extends BaseEngine {
  readonly id = "nllb" as const;

  protected toEngineCode(languageCode: string): string | undefined {
    return languageCode;
  }
}
