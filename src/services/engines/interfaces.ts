import type { EngineId, TranslationResult, TranslationUnit } from "../../types";

/**
 * A loaded translation model. Codes passed in are already in the backend's
 * own vocabulary. Failures are thrown as BackendInferenceError.
 */
export interface TranslationBackend {
  /**
   * Translate a single text
   */
  translate(text: string, sourceCode: string, targetCode: string): Promise<string>;

  /**
   * Translate several texts of one language pair in a single model call
   */
  translateBatch?(
    texts: string[],
    sourceCode: string,
    targetCode: string
  ): Promise<string[]>;

  /**
   * Check whether the model is reachable and loaded
   */
  isAvailable(): Promise<boolean>;

  /**
   * Get the backend name
   */
  getBackendName(): string;
}

/**
 * Uniform, capability-checked contract shared by both engine variants
 */
export interface TranslationEngine {
  readonly id: EngineId;
  supports(languageCode: string): boolean;
  maxBatchSize(): number;
  translateBatch(units: TranslationUnit[]): Promise<TranslationResult[]>;
}
