/**
 * Result of a language identification call
 */
export interface LanguageDetection {
  code: string; // NLLB code when known, "unknown" when undetermined
  confidence: number; // in [0, 1]
}

/**
 * Interface for language identification models
 */
export interface LanguageIdentifier {
  /**
   * Identify the language of a single cell's text
   */
  detect(text: string): LanguageDetection;

  /**
   * Get the model name
   */
  getModelName(): string;
}
