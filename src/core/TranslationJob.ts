import * as path from "path";
import chalk from "chalk";
import type {
  ColumnPlan,
  EngineCapability,
  EngineId,
  PipelineProgress,
  RunReport,
  Table,
} from "../types";
import type { Settings } from "../config/settings";
import type { LanguageIdentifier } from "../services/detection/interfaces";
import type { TranslationEngine } from "../services/engines/interfaces";
import { TranslationPipeline, type PipelineResult } from "./TranslationPipeline";
import { ColumnAnalyzer, type ColumnAnalysis } from "./ColumnAnalyzer";
import { EngineRegistry } from "../services/engines";
import { FrancLanguageIdentifier } from "../services/detection/franc";
import { TabularFileService } from "../services/tabular";
import { LanguageMapper } from "../config/languages";
import { Logger } from "../utils/logger";
import { defaultOutputPath } from "../utils/filesystem";
import { createProgressBar, formatDuration, formatPercent } from "../utils/formatters";

export interface JobDependencies {
  identifier?: LanguageIdentifier;
  engines?: ReadonlyMap<EngineId, TranslationEngine>;
  capabilities?: ReadonlyMap<EngineId, EngineCapability>;
  io?: TabularFileService;
  mapper?: LanguageMapper;
}

export interface JobOptions {
  output?: string;
  /**
   * Columns to translate; analyzed and picked automatically when omitted
   */
  columns?: string[];
  signal?: AbortSignal;
}

export interface JobResult {
  outputPath: string;
  columns: string[];
  plan: ColumnPlan;
  report: RunReport;
}

// Warnings printed after a run; the rest stay on the report
const PRINTED_WARNINGS = 10;

/**
 * Translate one file end to end: read, pick columns, run the pipeline,
 * write the result next to the input
 */
export class TranslationJob {
  private settings: Settings;
  private logger: Logger;
  private mapper: LanguageMapper;
  private io: TabularFileService;
  private identifier: LanguageIdentifier;
  private engines: ReadonlyMap<EngineId, TranslationEngine>;
  private capabilities: ReadonlyMap<EngineId, EngineCapability>;

  constructor(settings: Settings, logger: Logger = new Logger(), deps: JobDependencies = {}) {
    this.settings = settings;
    this.logger = logger;
    this.mapper = deps.mapper ?? new LanguageMapper();
    this.io = deps.io ?? new TabularFileService();
    this.identifier = deps.identifier ?? new FrancLanguageIdentifier(this.mapper);

    if (deps.engines && deps.capabilities) {
      this.engines = deps.engines;
      this.capabilities = deps.capabilities;
    } else {
      const registry = new EngineRegistry(settings.engines, logger, this.mapper);
      this.engines = registry.getEngines();
      this.capabilities = registry.capabilities;
    }
  }

  async readTable(inputPath: string): Promise<Table> {
    this.logger.startSpinner(`Reading ${path.basename(inputPath)}`);
    try {
      const table = await this.io.readTable(inputPath);
      this.logger.succeedSpinner(
        `📂 Loaded ${table.rows.length} row(s) and ${table.columns.length} column(s)`
      );
      return table;
    } catch (error) {
      this.logger.failSpinner(`Could not load ${path.basename(inputPath)}`);
      throw error;
    }
  }

  analyze(table: Table): ColumnAnalysis[] {
    return new ColumnAnalyzer(this.identifier, this.settings.run, this.mapper).analyze(table);
  }

  async execute(inputPath: string, options: JobOptions = {}): Promise<JobResult> {
    this.logger.logHeader(`Translating ${path.basename(inputPath)}`);

    const table = await this.readTable(inputPath);
    const columns = options.columns ?? this.pickColumns(table);

    if (columns.length === 0) {
      this.logger.warn("⚠️ No columns selected for translation; the file is copied as is");
    } else {
      this.logger.info(`🔍 Columns: ${columns.join(", ")}`);
    }

    const pipeline = new TranslationPipeline(this.settings.run, {
      identifier: this.identifier,
      engines: this.engines,
      capabilities: this.capabilities,
      logger: this.logger,
      mapper: this.mapper,
    });

    this.logger.startSpinner("Classifying cells");
    let result: PipelineResult;
    try {
      result = await pipeline.run(table, columns, {
        signal: options.signal,
        columnOverrides: this.settings.columnOverrides,
        onProgress: (progress) => this.logger.updateSpinner(this.describe(progress)),
      });
    } catch (error) {
      this.logger.failSpinner("Translation failed");
      throw error;
    }

    const { report } = result;
    if (report.cancelled) {
      this.logger.warnSpinner("⚠️ Run cancelled; unsent cells are marked");
    } else {
      this.logger.succeedSpinner(`✅ Translated ${report.cellsTranslated} cell(s)`);
    }

    const outputPath = await this.io.writeTable(
      result.table,
      options.output ?? defaultOutputPath(inputPath)
    );
    this.logger.success(`💾 Saved ${outputPath}`);
    this.logReport(report);

    return { outputPath, columns, plan: result.plan, report };
  }

  private pickColumns(table: Table): string[] {
    const analysis = this.analyze(table);
    for (const column of analysis) {
      this.logger.debug(
        `${column.name}: ${column.columnType}, ${column.languageName}${column.selected ? " (selected)" : ""}`
      );
    }
    return analysis.filter((column) => column.selected).map((column) => column.name);
  }

  private describe(progress: PipelineProgress): string {
    const label = progress.phase === "classify" ? "Classifying" : "Translating";
    return `${label} ${createProgressBar(progress.completed, progress.total)} ${formatPercent(
      progress.completed,
      progress.total
    )} ${chalk.dim(progress.message)}`;
  }

  private logReport(report: RunReport): void {
    this.logger.logMetrics("Run summary", {
      Rows: report.rowsProcessed,
      Columns: report.columnsTranslated,
      "Cells classified": report.cellsClassified,
      Translated: report.cellsTranslated,
      Rerouted: report.cellsRerouted,
      Failed: report.cellsFailed,
      Duration: formatDuration(report.duration),
    });

    const skipped = Object.entries(report.decisions)
      .filter(([decision, count]) => decision !== "translate" && count > 0)
      .map(([decision, count]) => `${decision}: ${count}`);
    if (skipped.length > 0) {
      this.logger.log(chalk.dim(`   ${skipped.join(", ")}`));
    }

    for (const warning of report.warnings.slice(0, PRINTED_WARNINGS)) {
      this.logger.warn(`⚠️ ${warning}`);
    }
    if (report.warnings.length > PRINTED_WARNINGS) {
      this.logger.warn(`⚠️ ...and ${report.warnings.length - PRINTED_WARNINGS} more`);
    }
  }
}
