/**
 * Core type definitions for the cellwise translation pipeline
 */

/**
 * Identifier of a translation engine
 */
export type EngineId = "nllb" | "argos";

/**
 * An ordered table of text cells with stable column identity
 */
export interface Table {
  columns: string[];
  rows: string[][];
}

/**
 * Position of a cell in the source table
 */
export interface CellRef {
  row: number;
  column: string;
}

/**
 * One row/column intersection of the source table
 */
export interface Cell extends CellRef {
  text: string;
}

export type SkipDecision =
  | "skip-empty"
  | "skip-numeric"
  | "skip-date"
  | "skip-english";

export type Decision =
  | "translate"
  | SkipDecision
  | "skip-same-language"
  | "low-confidence-fallback"
  | "malformed-cell-error";

/**
 * Per-cell classification, produced once and never mutated
 */
export interface ClassificationResult {
  readonly cell: Cell;
  readonly language: string; // NLLB code, raw detector code, or "unknown"
  readonly confidence: number;
  readonly decision: Decision;
}

/**
 * A cell that needs translation
 */
export interface TranslationUnit {
  cell: Cell;
  text: string;
  sourceLanguage: string;
  targetLanguage: string;
}

/**
 * A translation unit bound to the engine that will translate it
 */
export interface RoutedUnit extends TranslationUnit {
  engine: EngineId;
  rerouted: boolean;
}

export type TranslationFailure =
  | "unsupported-language"
  | "backend-failure"
  | "cancelled";

export type TranslationResult =
  | { cell: CellRef; ok: true; text: string; engine: EngineId }
  | {
      cell: CellRef;
      ok: false;
      error: TranslationFailure;
      message: string;
      engine?: EngineId;
    };

/**
 * Static per-engine capability: supported source languages and batch cap
 */
export interface EngineCapability {
  engine: EngineId;
  languages: ReadonlySet<string>;
  maxBatchSize: number;
}

/**
 * A group of units sharing an engine and a language pair
 */
export interface Batch {
  engine: EngineId;
  sourceLanguage: string;
  targetLanguage: string;
  units: RoutedUnit[];
}

export interface ColumnPlanEntry {
  source: string;
  sourceIndex: number;
  output: string;
  position: number; // insertion index relative to the original columns
}

export interface ColumnPlan {
  entries: ColumnPlanEntry[];
  columns: string[]; // full output column order
}

export type OutputTable = Table;

/**
 * Options recognized for a single pipeline run
 */
export interface RunConfig {
  engine: EngineId;
  targetLanguage: string;
  confidenceThreshold: number;
  fallbackLanguage: string;
  skipNumeric: boolean;
  skipDates: boolean;
  skipEnglish: boolean;
  skipEmpty: boolean;
  batchSize: number;
  forceSourceLanguage: string | null;
  engineFallback: boolean;
}

/**
 * Counters and warnings for a finished (or cancelled) run
 */
export interface RunReport {
  rowsProcessed: number;
  columnsTranslated: number;
  cellsClassified: number;
  cellsTranslated: number;
  cellsFailed: number;
  cellsRerouted: number;
  decisions: Record<Decision, number>;
  cancelled: boolean;
  duration: number; // in seconds
  warnings: string[];
}

export interface PipelineProgress {
  phase: "classify" | "translate";
  completed: number;
  total: number;
  message: string;
}
