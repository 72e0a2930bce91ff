import { francAll } from "franc-min";
import type { LanguageDetection, LanguageIdentifier } from "./interfaces";
import { LanguageMapper } from "../../config/languages";
import { UNKNOWN_LANGUAGE } from "../../utils/constants";

export interface FrancOptions {
  /**
   * Shortest text franc will try to identify
   */
  minLength?: number;
  /**
   * Multiplier turning the score margin over the runner-up into a confidence
   */
  marginScale?: number;
}

/**
 * Confidence from franc's normalized scores. The best candidate always
 * scores 1, so the distance to the runner-up is what carries certainty.
 */
export function marginConfidence(
  scores: Array<[string, number]>,
  marginScale: number
): number {
  if (scores.length === 0) return 0;
  if (scores.length === 1) return 1;
  const margin = scores[0][1] - scores[1][1];
  return Math.max(0, Math.min(1, margin * marginScale));
}

/**
 * Trigram language identification with franc, restricted to the languages
 * of the code table. Runs in-process; there is no model to download.
 */
export class FrancLanguageIdentifier implements LanguageIdentifier {
  private mapper: LanguageMapper;
  private only: string[];
  private minLength: number;
  private marginScale: number;

  constructor(mapper: LanguageMapper = new LanguageMapper(), options: FrancOptions = {}) {
    this.mapper = mapper;
    this.only = mapper.iso3Codes();
    this.minLength = options.minLength ?? 3;
    this.marginScale = options.marginScale ?? 4;
  }

  getModelName(): string {
    return "franc-min";
  }

  detect(text: string): LanguageDetection {
    const scores = francAll(text, { only: this.only, minLength: this.minLength });
    const [best] = scores;

    if (!best || best[0] === "und") {
      return { code: UNKNOWN_LANGUAGE, confidence: 0 };
    }

    return {
      code: this.mapper.fromIso3(best[0]) ?? best[0],
      confidence: marginConfidence(scores, this.marginScale),
    };
  }
}
