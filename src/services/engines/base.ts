import type {
  EngineCapability,
  EngineId,
  TranslationResult,
  TranslationUnit,
} from "../../types";
import type { TranslationBackend, TranslationEngine } from "./interfaces";
import { BackendInferenceError, UnsupportedLanguageError, errorMessage } from "../../utils/errors";
import { Logger } from "../../utils/logger";

/**
 * Shared batch handling for both engine variants. Subclasses only supply
 * the mapping from internal (NLLB) codes to their backend's vocabulary.
 */
export abstract class BaseEngine implements TranslationEngine {
  abstract readonly id: EngineId;

  protected logger: Logger;

  constructor(
    protected backend: TranslationBackend,
    protected capability: EngineCapability,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger("quiet");
  }

  /**
   * Map an internal language code to the backend's code, if it has one
   */
  protected abstract toEngineCode(languageCode: string): string | undefined;

  supports(languageCode: string): boolean {
    return (
      this.capability.languages.has(languageCode) &&
      this.toEngineCode(languageCode) !== undefined
    );
  }

  maxBatchSize(): number {
    return this.capability.maxBatchSize;
  }

  /**
   * Translate units of any mix of language pairs. Units are grouped by pair
   * internally; results come back in input order, one per unit.
   */
  async translateBatch(units: TranslationUnit[]): Promise<TranslationResult[]> {
    const results = new Map<TranslationUnit, TranslationResult>();
    const groups = new Map<string, TranslationUnit[]>();

    for (const unit of units) {
      const source = this.toEngineCode(unit.sourceLanguage);
      const target = this.toEngineCode(unit.targetLanguage);

      if (!source || !target || !this.supports(unit.sourceLanguage)) {
        results.set(unit, {
          cell: unit.cell,
          ok: false,
          error: "unsupported-language",
          message: new UnsupportedLanguageError(
            unit.sourceLanguage,
            unit.targetLanguage,
            this.id
          ).message,
          engine: this.id,
        });
        continue;
      }

      const key = `${source}\u0000${target}`;
      const group = groups.get(key) ?? [];
      group.push(unit);
      groups.set(key, group);
    }

    for (const [key, group] of groups) {
      const [source, target] = key.split("\u0000");
      const groupResults = await this.translateGroup(group, source, target, true);
      group.forEach((unit, i) => results.set(unit, groupResults[i]));
    }

    return units.map((unit) => {
      const result = results.get(unit);
      if (!result) {
        throw new Error(`Missing result for cell ${unit.cell.row}:${unit.cell.column}`);
      }
      return result;
    });
  }

  private async translateGroup(
    units: TranslationUnit[],
    source: string,
    target: string,
    mayHalve: boolean
  ): Promise<TranslationResult[]> {
    if (!this.backend.translateBatch) {
      return this.translateEach(units, source, target);
    }

    try {
      const texts = await this.backend.translateBatch(
        units.map((u) => u.text),
        source,
        target
      );
      if (texts.length !== units.length) {
        throw new BackendInferenceError(
          `Expected ${units.length} translations, got ${texts.length}`
        );
      }
      return units.map((unit, i) => this.success(unit, texts[i]));
    } catch (error) {
      const resource = error instanceof BackendInferenceError && error.resource;

      if (resource && mayHalve && units.length > 1) {
        const half = Math.ceil(units.length / 2);
        this.logger.warn(
          `⚠️ ${this.id}: resource error on a batch of ${units.length}, retrying at ${half}`
        );
        const first = await this.translateGroup(units.slice(0, half), source, target, false);
        const second = await this.translateGroup(units.slice(half), source, target, false);
        return [...first, ...second];
      }

      if (resource || units.length === 1) {
        return units.map((unit) => this.failure(unit, error));
      }

      this.logger.debug(
        `${this.id}: batch failed (${errorMessage(error)}), translating units one by one`
      );
      return this.translateEach(units, source, target);
    }
  }

  private async translateEach(
    units: TranslationUnit[],
    source: string,
    target: string
  ): Promise<TranslationResult[]> {
    const results: TranslationResult[] = [];
    for (const unit of units) {
      try {
        const text = await this.backend.translate(unit.text, source, target);
        results.push(this.success(unit, text));
      } catch (error) {
        results.push(this.failure(unit, error));
      }
    }
    return results;
  }

  private success(unit: TranslationUnit, text: string): TranslationResult {
    if (text.trim().length === 0) {
      return this.failure(unit, new BackendInferenceError("Empty translation"));
    }
    return { cell: unit.cell, ok: true, text, engine: this.id };
  }

  private failure(unit: TranslationUnit, error: unknown): TranslationResult {
    return {
      cell: unit.cell,
      ok: false,
      error: "backend-failure",
      message: errorMessage(error),
      engine: this.id,
    };
  }
}
