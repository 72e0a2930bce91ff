import type {
  Batch,
  ClassificationResult,
  ColumnPlan,
  Decision,
  EngineCapability,
  EngineId,
  OutputTable,
  PipelineProgress,
  RoutedUnit,
  RunConfig,
  RunReport,
  Table,
  TranslationResult,
} from "../types";
import type { TranslationEngine } from "../services/engines/interfaces";
import type { LanguageIdentifier } from "../services/detection/interfaces";
import { LanguageClassifier } from "./LanguageClassifier";
import { BatchScheduler } from "./BatchScheduler";
import { ColumnProjector, cellKey, type CellOutcome } from "./ColumnProjector";
import { ENGINE_FALLBACKS } from "../config/capabilities";
import { LanguageMapper } from "../config/languages";
import { Logger } from "../utils/logger";
import { formatDuration } from "../utils/formatters";
import { MAX_REPORTED_WARNINGS } from "../utils/constants";
import { ConfigError, MalformedCellError, UnsupportedLanguageError } from "../utils/errors";

/**
 * Long-lived handles a pipeline is built from. Engines and the language
 * identifier are loaded once per process and shared across runs.
 */
export interface PipelineDependencies {
  identifier: LanguageIdentifier;
  engines: ReadonlyMap<EngineId, TranslationEngine>;
  capabilities: ReadonlyMap<EngineId, EngineCapability>;
  logger?: Logger;
  mapper?: LanguageMapper;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: (progress: PipelineProgress) => void;
  /**
   * Source language per column, bypassing detection for that column
   */
  columnOverrides?: Record<string, string>;
}

export interface PipelineResult {
  table: OutputTable;
  plan: ColumnPlan;
  report: RunReport;
  classifications: ClassificationResult[];
  results: TranslationResult[];
}

function emptyDecisionCounts(): Record<Decision, number> {
  return {
    translate: 0,
    "skip-empty": 0,
    "skip-numeric": 0,
    "skip-date": 0,
    "skip-english": 0,
    "skip-same-language": 0,
    "low-confidence-fallback": 0,
    "malformed-cell-error": 0,
  };
}

/**
 * One pass over a table: for every selected column and every cell,
 * classify, then skip or batch, translate, and assemble.
 */
export class TranslationPipeline {
  private config: RunConfig;
  private identifier: LanguageIdentifier;
  private engines: ReadonlyMap<EngineId, TranslationEngine>;
  private capabilities: ReadonlyMap<EngineId, EngineCapability>;
  private scheduler: BatchScheduler;
  private projector = new ColumnProjector();
  private mapper: LanguageMapper;
  private logger: Logger;

  constructor(config: RunConfig, deps: PipelineDependencies) {
    this.config = config;
    this.identifier = deps.identifier;
    this.engines = deps.engines;
    this.capabilities = deps.capabilities;
    this.scheduler = new BatchScheduler(config.batchSize);
    this.mapper = deps.mapper ?? new LanguageMapper();
    this.logger = deps.logger ?? new Logger("quiet");

    if (!this.engines.has(config.engine)) {
      throw new ConfigError(`Selected engine ${config.engine} is not loaded`);
    }
  }

  async run(
    table: Table,
    selectedColumns: string[],
    options: RunOptions = {}
  ): Promise<PipelineResult> {
    const startTime = performance.now();
    const warnings: string[] = [];
    const warn = (message: string) => {
      if (warnings.length < MAX_REPORTED_WARNINGS) warnings.push(message);
    };

    // The plan is fixed before any cell is looked at
    const plan = this.projector.plan(
      table.columns,
      selectedColumns,
      this.mapper.columnSuffix(this.config.targetLanguage)
    );

    const classifier = new LanguageClassifier(this.identifier, this.config);
    const classifications = this.classifyAll(table, plan, classifier, options);

    const { routed, unsupported } = this.route(classifications);
    for (const result of unsupported) {
      if (!result.ok) {
        warn(`Row ${result.cell.row + 1}, column '${result.cell.column}': ${result.message}`);
      }
    }

    const batches = this.scheduler.schedule(routed, this.capabilities);
    this.logger.debug(
      `Scheduled ${routed.length} unit(s) into ${batches.length} batch(es)`
    );

    const translated = await this.dispatch(batches, routed.length, options);
    const results = [...unsupported, ...translated];

    const outcomes = new Map<string, CellOutcome>();
    for (const classification of classifications) {
      const { cell } = classification;
      outcomes.set(cellKey(cell.row, cell.column), { classification });
      if (classification.decision === "malformed-cell-error") {
        warn(`Row ${cell.row + 1}, column '${cell.column}': ${new MalformedCellError().message}`);
      }
    }
    for (const result of results) {
      const outcome = outcomes.get(cellKey(result.cell.row, result.cell.column));
      if (outcome) outcome.result = result;
      if (!result.ok && result.error === "backend-failure") {
        warn(`Row ${result.cell.row + 1}, column '${result.cell.column}': ${result.message}`);
      }
    }

    const output = this.projector.assemble(table, plan, outcomes);
    const report = this.buildReport(table, plan, classifications, results, routed);
    report.duration = (performance.now() - startTime) / 1000;
    report.warnings = warnings;

    this.logger.debug(
      `Run finished in ${formatDuration(report.duration)}: ${report.cellsTranslated} translated, ${report.cellsFailed} failed`
    );

    return { table: output, plan, report, classifications, results };
  }

  private classifyAll(
    table: Table,
    plan: ColumnPlan,
    classifier: LanguageClassifier,
    options: RunOptions
  ): ClassificationResult[] {
    const classifications: ClassificationResult[] = [];
    const total = table.rows.length * plan.entries.length;

    for (const entry of plan.entries) {
      const forced = options.columnOverrides?.[entry.source];

      table.rows.forEach((row, rowIndex) => {
        classifications.push(
          classifier.classify(
            { row: rowIndex, column: entry.source, text: row[entry.sourceIndex] ?? "" },
            forced
          )
        );
      });

      options.onProgress?.({
        phase: "classify",
        completed: classifications.length,
        total,
        message: `Classified column ${entry.source}`,
      });
    }

    this.logger.debug(
      `Classified ${classifications.length} cell(s) with ${classifier.detectionCount} detector call(s)`
    );
    return classifications;
  }

  /**
   * Bind each translate cell to an engine: the selected one when it
   * supports the source language, otherwise its fallback, otherwise none
   */
  private route(classifications: ClassificationResult[]): {
    routed: RoutedUnit[];
    unsupported: TranslationResult[];
  } {
    const selected = this.config.engine;
    const fallbackId = ENGINE_FALLBACKS[selected];
    const fallback = this.config.engineFallback ? this.engines.get(fallbackId) : undefined;
    const primary = this.engines.get(selected);

    const routed: RoutedUnit[] = [];
    const unsupported: TranslationResult[] = [];

    for (const { cell, language, decision } of classifications) {
      if (decision !== "translate") continue;

      const unit = {
        cell,
        text: cell.text,
        sourceLanguage: language,
        targetLanguage: this.config.targetLanguage,
      };

      if (primary && this.canTranslate(primary, language)) {
        routed.push({ ...unit, engine: selected, rerouted: false });
      } else if (fallback && this.canTranslate(fallback, language)) {
        routed.push({ ...unit, engine: fallbackId, rerouted: true });
      } else {
        unsupported.push({
          cell: { row: cell.row, column: cell.column },
          ok: false,
          error: "unsupported-language",
          message: new UnsupportedLanguageError(language, this.config.targetLanguage).message,
        });
      }
    }

    return { routed, unsupported };
  }

  private canTranslate(engine: TranslationEngine, language: string): boolean {
    return engine.supports(language) && engine.supports(this.config.targetLanguage);
  }

  /**
   * Engines run side by side; batches for one engine run in order. The
   * abort signal is checked between batches only.
   */
  private async dispatch(
    batches: Batch[],
    totalUnits: number,
    options: RunOptions
  ): Promise<TranslationResult[]> {
    const byEngine = new Map<EngineId, Batch[]>();
    for (const batch of batches) {
      const list = byEngine.get(batch.engine) ?? [];
      list.push(batch);
      byEngine.set(batch.engine, list);
    }

    let completed = 0;
    const lanes = [...byEngine].map(async ([engineId, engineBatches]) => {
      const engine = this.engines.get(engineId);
      const results: TranslationResult[] = [];

      for (const batch of engineBatches) {
        if (!engine || options.signal?.aborted) {
          results.push(...batch.units.map((unit) => this.cancelled(unit)));
          continue;
        }

        this.logger.debug(
          `${engineId}: ${batch.units.length} unit(s) ${batch.sourceLanguage} -> ${batch.targetLanguage}`
        );
        results.push(...(await engine.translateBatch(batch.units)));

        completed += batch.units.length;
        options.onProgress?.({
          phase: "translate",
          completed,
          total: totalUnits,
          message: `Translated ${this.mapper.getName(batch.sourceLanguage)} batch on ${engineId}`,
        });
      }
      return results;
    });

    return (await Promise.all(lanes)).flat();
  }

  private cancelled(unit: RoutedUnit): TranslationResult {
    return {
      cell: unit.cell,
      ok: false,
      error: "cancelled",
      message: "Run cancelled before this batch was sent",
      engine: unit.engine,
    };
  }

  private buildReport(
    table: Table,
    plan: ColumnPlan,
    classifications: ClassificationResult[],
    results: TranslationResult[],
    routed: RoutedUnit[]
  ): RunReport {
    const decisions = emptyDecisionCounts();
    for (const { decision } of classifications) {
      decisions[decision]++;
    }

    const failures = results.filter((r) => !r.ok).length;

    return {
      rowsProcessed: table.rows.length,
      columnsTranslated: plan.entries.length,
      cellsClassified: classifications.length,
      cellsTranslated: results.length - failures,
      cellsFailed: failures + decisions["malformed-cell-error"],
      cellsRerouted: routed.filter((u) => u.rerouted).length,
      decisions,
      // An abort after the last batch leaves nothing cancelled
      cancelled: results.some((r) => !r.ok && r.error === "cancelled"),
      duration: 0,
      warnings: [],
    };
  }
}
