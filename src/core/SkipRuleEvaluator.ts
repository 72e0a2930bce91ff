import englishWords from "../../data/english-words.json";
import type { SkipDecision } from "../types";

/**
 * Per-run switches for the skip rules
 */
export interface SkipRuleSettings {
  skipEmpty: boolean;
  skipNumeric: boolean;
  skipDates: boolean;
  skipEnglish: boolean;
}

const CURRENCY = "$€£¥₽₹₩₺¢";

// Sign, optional grouping (, . space ' ’ nbsp), decimal part, exponent, percent
const NUMBER_PATTERN = new RegExp(
  `^[${CURRENCY}]?\\s?[+-]?[${CURRENCY}]?\\s?` +
    "(?:(?:\\d{1,3}(?:[,. '’\\u00A0]\\d{3})+|\\d+)(?:[.,]\\d+)?|[.,]\\d+)" +
    "(?:[eE][+-]?\\d+)?" +
    `\\s?%?\\s?[${CURRENCY}]?$`
);

const TIME_SUFFIX = "(?:[ T]\\d{1,2}:\\d{2}(?::\\d{2}(?:\\.\\d+)?)?(?:Z|[+-]\\d{2}:?\\d{2})?)?";

interface DateGrammar {
  pattern: RegExp;
  order: "ymd" | "dmy" | "mdy";
}

const DATE_GRAMMARS: DateGrammar[] = [
  { pattern: new RegExp(`^(\\d{4})-(\\d{1,2})-(\\d{1,2})${TIME_SUFFIX}$`), order: "ymd" },
  { pattern: new RegExp(`^(\\d{4})/(\\d{1,2})/(\\d{1,2})${TIME_SUFFIX}$`), order: "ymd" },
  { pattern: new RegExp(`^(\\d{1,2})\\.(\\d{1,2})\\.(\\d{2}|\\d{4})${TIME_SUFFIX}$`), order: "dmy" },
  { pattern: new RegExp(`^(\\d{1,2})-(\\d{1,2})-(\\d{4})${TIME_SUFFIX}$`), order: "dmy" },
  { pattern: new RegExp(`^(\\d{1,2})/(\\d{1,2})/(\\d{2}|\\d{4})${TIME_SUFFIX}$`), order: "dmy" },
  { pattern: new RegExp(`^(\\d{1,2})/(\\d{1,2})/(\\d{2}|\\d{4})${TIME_SUFFIX}$`), order: "mdy" },
];

const BASIC_LATIN = /^[\x20-\x7E\t\r\n]+$/;

const ENGLISH_LEXICON: ReadonlySet<string> = new Set(englishWords);

export function isNumeric(text: string): boolean {
  const trimmed = text.trim();
  return /\d/.test(trimmed) && NUMBER_PATTERN.test(trimmed);
}

export function isDate(text: string): boolean {
  const trimmed = text.trim();

  return DATE_GRAMMARS.some(({ pattern, order }) => {
    const match = pattern.exec(trimmed);
    if (!match) return false;

    const [a, b, c] = [match[1], match[2], match[3]].map(Number);
    const [month, day] =
      order === "ymd" ? [b, c] : order === "dmy" ? [b, a] : [a, b];

    return month >= 1 && month <= 12 && day >= 1 && day <= 31;
  });
}

/**
 * Basic Latin text whose words are mostly common English words
 */
export function looksEnglish(text: string): boolean {
  if (!BASIC_LATIN.test(text)) return false;

  const words = text.toLowerCase().match(/[a-z]+/g);
  if (!words) return false;

  const hits = words.filter((word) => ENGLISH_LEXICON.has(word)).length;
  return hits * 2 > words.length;
}

/**
 * Cheap predicates consulted before the language model, so numbers, dates
 * and blanks never reach it. Rules run in a fixed order; first match wins.
 */
export class SkipRuleEvaluator {
  evaluate(text: string, settings: SkipRuleSettings): SkipDecision | null {
    if (text.trim().length === 0) {
      return settings.skipEmpty ? "skip-empty" : null;
    }
    if (settings.skipNumeric && isNumeric(text)) {
      return "skip-numeric";
    }
    if (settings.skipDates && isDate(text)) {
      return "skip-date";
    }
    if (settings.skipEnglish && looksEnglish(text)) {
      return "skip-english";
    }
    return null;
  }
}
