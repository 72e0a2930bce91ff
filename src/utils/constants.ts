/**
 * Constants used throughout the application
 */

export const DEFAULT_TARGET_LANGUAGE = "eng_Latn";

export const UNKNOWN_LANGUAGE = "unknown";

/**
 * Markers written into derived columns for cells that could not be
 * translated. They never collide with an empty string, so downstream
 * consumers can tell "nothing to translate" from "translation failed".
 */
export const ERROR_MARKERS = {
  translationFailed: "[ERROR: translation failed]",
  unsupportedLanguage: (language: string) =>
    `[ERROR: unsupported language ${language}]`,
  malformedCell: "[ERROR: malformed cell]",
  cancelled: "[ERROR: cancelled]",
} as const;

export const DEFAULT_ENDPOINTS = {
  nllb: "http://127.0.0.1:6060",
  argos: "http://127.0.0.1:5000",
} as const;

export const DEFAULT_TIMEOUT_MS = 120_000;

// Warnings kept on a run report
export const MAX_REPORTED_WARNINGS = 50;

export const CONFIG_FILENAME = "cellwise.config.json";
