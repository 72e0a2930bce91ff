/**
 * cellwise - translate foreign-language cells in tabular files with local
 * machine translation models
 *
 * This module exports the public API for use as a library.
 */

import type { RunConfig } from "./types";
import { TranslationJob, type JobResult } from "./core/TranslationJob";
import { loadSettings } from "./config/settings";
import { Logger } from "./utils/logger";

// Re-export types
export type * from "./types";
export type { ColumnAnalysis, ColumnType } from "./core/ColumnAnalyzer";
export type { PipelineDependencies, PipelineResult, RunOptions } from "./core/TranslationPipeline";
export type { JobDependencies, JobOptions, JobResult } from "./core/TranslationJob";
export type { LanguageDetection, LanguageIdentifier } from "./services/detection/interfaces";
export type { TranslationBackend, TranslationEngine } from "./services/engines/interfaces";
export type { EngineEndpoint, Settings } from "./config/settings";
export type { LanguageInfo } from "./config/languages";

// Re-export main functionality
export { TranslationPipeline } from "./core/TranslationPipeline";
export { TranslationJob } from "./core/TranslationJob";
export { ColumnAnalyzer } from "./core/ColumnAnalyzer";
export { ColumnProjector } from "./core/ColumnProjector";
export { BatchScheduler } from "./core/BatchScheduler";
export { LanguageClassifier } from "./core/LanguageClassifier";
export { SkipRuleEvaluator, isDate, isNumeric, looksEnglish } from "./core/SkipRuleEvaluator";
export { EngineRegistry } from "./services/engines";
export { NllbEngine, NllbServerBackend } from "./services/engines/nllb";
export { ArgosEngine, LibreTranslateBackend } from "./services/engines/argos";
export { BaseEngine } from "./services/engines/base";
export { FrancLanguageIdentifier } from "./services/detection/franc";
export { TabularFileService } from "./services/tabular";
export { LanguageMapper } from "./config/languages";
export { buildCapabilities, ENGINE_FALLBACKS } from "./config/capabilities";
export { DEFAULT_RUN_CONFIG, loadSettings, resolveRunConfig } from "./config/settings";
export { Logger } from "./utils/logger";
export {
  BackendInferenceError,
  CellwiseError,
  ColumnNotFoundError,
  ConfigError,
  MalformedCellError,
  TableIOError,
  UnsupportedLanguageError,
} from "./utils/errors";
export { ERROR_MARKERS } from "./utils/constants";

/**
 * Simple standalone function to translate a file
 */
export async function translateFile(
  inputPath: string,
  options?: {
    output?: string;
    columns?: string[];
    config?: Partial<RunConfig>;
    configPath?: string;
    signal?: AbortSignal;
    verbose?: boolean;
  }
): Promise<JobResult> {
  const settings = loadSettings(options?.configPath, options?.config ?? {});
  const logger = new Logger(options?.verbose ? "normal" : "quiet");

  return new TranslationJob(settings, logger).execute(inputPath, {
    output: options?.output,
    columns: options?.columns,
    signal: options?.signal,
  });
}
