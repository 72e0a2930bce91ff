import type { Cell, ClassificationResult, Decision } from "../types";
import type { LanguageIdentifier } from "../services/detection/interfaces";
import { SkipRuleEvaluator, type SkipRuleSettings } from "./SkipRuleEvaluator";
import { DEFAULT_TARGET_LANGUAGE, UNKNOWN_LANGUAGE } from "../utils/constants";

export interface ClassifierOptions extends SkipRuleSettings {
  confidenceThreshold: number;
  fallbackLanguage: string;
  targetLanguage: string;
  forceSourceLanguage: string | null;
}

// U+FFFD or an unpaired UTF-16 surrogate
const MALFORMED_TEXT =
  /\uFFFD|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?:^|[^\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function isMalformed(text: string): boolean {
  return MALFORMED_TEXT.test(text);
}

/**
 * Decides, for one cell at a time, whether it needs translation and from
 * which language. Skip rules run before the model; force-language mode
 * bypasses the model entirely.
 */
export class LanguageClassifier {
  private skipRules: SkipRuleEvaluator;
  private options: ClassifierOptions;
  private modelCalls = 0;

  constructor(
    private identifier: LanguageIdentifier,
    options: ClassifierOptions,
    skipRules: SkipRuleEvaluator = new SkipRuleEvaluator()
  ) {
    this.skipRules = skipRules;
    this.options = {
      ...options,
      // Already-English text only counts as done when English is the target
      skipEnglish:
        options.skipEnglish && options.targetLanguage === DEFAULT_TARGET_LANGUAGE,
    };
  }

  /**
   * Number of identification model invocations so far
   */
  get detectionCount(): number {
    return this.modelCalls;
  }

  classify(cell: Cell, forcedLanguage?: string): ClassificationResult {
    if (isMalformed(cell.text)) {
      return this.result(cell, UNKNOWN_LANGUAGE, 0, "malformed-cell-error");
    }

    const skip = this.skipRules.evaluate(cell.text, this.options);
    if (skip) {
      return this.result(cell, UNKNOWN_LANGUAGE, 1, skip);
    }

    const forced = forcedLanguage ?? this.options.forceSourceLanguage;
    if (forced) {
      return this.result(cell, forced, 1, this.translateOrSkip(forced));
    }

    this.modelCalls++;
    const detection = this.identifier.detect(cell.text);

    if (
      detection.code === UNKNOWN_LANGUAGE ||
      detection.confidence < this.options.confidenceThreshold
    ) {
      return this.result(
        cell,
        this.options.fallbackLanguage,
        detection.confidence,
        "low-confidence-fallback"
      );
    }

    return this.result(
      cell,
      detection.code,
      detection.confidence,
      this.translateOrSkip(detection.code)
    );
  }

  private translateOrSkip(language: string): Decision {
    return language === this.options.targetLanguage
      ? "skip-same-language"
      : "translate";
  }

  private result(
    cell: Cell,
    language: string,
    confidence: number,
    decision: Decision
  ): ClassificationResult {
    return Object.freeze({ cell, language, confidence, decision });
  }
}
