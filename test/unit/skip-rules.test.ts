import { describe, test, expect } from "vitest";
import {
  SkipRuleEvaluator,
  isDate,
  isNumeric,
  looksEnglish,
  type SkipRuleSettings,
} from "../../src/core/SkipRuleEvaluator";

const allRules: SkipRuleSettings = {
  skipEmpty: true,
  skipNumeric: true,
  skipDates: true,
  skipEnglish: true,
};

describe("Skip rules", () => {
  describe("isNumeric", () => {
    test("should accept plain, signed and grouped numbers", () => {
      expect(isNumeric("123")).toBe(true);
      expect(isNumeric("-1,234.56")).toBe(true);
      expect(isNumeric("1 000 000")).toBe(true);
      expect(isNumeric("3.2e5")).toBe(true);
    });

    test("should accept currency and percentages", () => {
      expect(isNumeric("$99.99")).toBe(true);
      expect(isNumeric("12%")).toBe(true);
      expect(isNumeric("100 €")).toBe(true);
    });

    test("should reject text and bare exponents", () => {
      expect(isNumeric("abc")).toBe(false);
      expect(isNumeric("12 apples")).toBe(false);
      expect(isNumeric("e5")).toBe(false);
      expect(isNumeric("$")).toBe(false);
    });
  });

  describe("isDate", () => {
    test("should accept ISO dates with an optional time", () => {
      expect(isDate("2024-01-01")).toBe(true);
      expect(isDate("2024/3/7")).toBe(true);
      expect(isDate("2024-01-01T10:30:00Z")).toBe(true);
    });

    test("should accept day-first and month-first dates", () => {
      expect(isDate("31.12.2023")).toBe(true);
      expect(isDate("31/12/2023")).toBe(true);
      expect(isDate("12/31/2024")).toBe(true);
    });

    test("should reject impossible months and partial dates", () => {
      expect(isDate("2024-13-01")).toBe(false);
      expect(isDate("2024-01-32")).toBe(false);
      expect(isDate("01/02")).toBe(false);
      expect(isDate("yesterday")).toBe(false);
    });
  });

  describe("looksEnglish", () => {
    test("should accept common English phrases", () => {
      expect(looksEnglish("Hello world")).toBe(true);
      expect(looksEnglish("Good product, fast delivery")).toBe(true);
    });

    test("should reject other languages and non-Latin scripts", () => {
      expect(looksEnglish("Guten Tag")).toBe(false);
      expect(looksEnglish("Labas rytas")).toBe(false);
      expect(looksEnglish("Отличный продукт!")).toBe(false);
      expect(looksEnglish("123")).toBe(false);
    });
  });

  describe("SkipRuleEvaluator", () => {
    const evaluator = new SkipRuleEvaluator();

    test("should skip empty and whitespace-only cells", () => {
      expect(evaluator.evaluate("", allRules)).toBe("skip-empty");
      expect(evaluator.evaluate("   ", allRules)).toBe("skip-empty");
      expect(evaluator.evaluate("", { ...allRules, skipEmpty: false })).toBeNull();
    });

    test("should apply rules in order", () => {
      expect(evaluator.evaluate("2024", allRules)).toBe("skip-numeric");
      expect(evaluator.evaluate("2024-01-01", allRules)).toBe("skip-date");
      expect(evaluator.evaluate("Hello", allRules)).toBe("skip-english");
    });

    test("should let disabled rules through", () => {
      expect(evaluator.evaluate("123", { ...allRules, skipNumeric: false })).toBeNull();
      expect(evaluator.evaluate("2024-01-01", { ...allRules, skipDates: false })).toBeNull();
      expect(evaluator.evaluate("Hello", { ...allRules, skipEnglish: false })).toBeNull();
    });

    test("should not skip foreign text", () => {
      expect(evaluator.evaluate("Отличный продукт!", allRules)).toBeNull();
    });
  });
});
