import * as fs from "fs";
import { Command, Option } from "commander";
import chalk from "chalk";
import { z } from "zod";
import type { RunConfig } from "./types";
import { TranslationJob } from "./core/TranslationJob";
import { EngineRegistry } from "./services/engines";
import { FrancLanguageIdentifier } from "./services/detection/franc";
import { LanguageMapper } from "./config/languages";
import { loadSettings } from "./config/settings";
import { Logger, type LogLevel } from "./utils/logger";
import { errorMessage } from "./utils/errors";
import { formatRow } from "./utils/formatters";
import type { ColumnAnalysis } from "./core/ColumnAnalyzer";

// Conventional exit status for a run stopped by SIGINT
const EXIT_CANCELLED = 130;

const translateOptionsSchema = z.object({
  output: z.string().optional(),
  columns: z.string().optional(),
  forceLang: z.string().optional(),
  targetLang: z.string().optional(),
  engine: z.enum(["nllb", "argos"]).optional(),
  threshold: z.coerce.number().optional(),
  fallbackLang: z.string().optional(),
  batchSize: z.coerce.number().optional(),
  skipNumeric: z.boolean(),
  skipDates: z.boolean(),
  skipEnglish: z.boolean(),
  skipEmpty: z.boolean(),
  engineFallback: z.boolean(),
  config: z.string().optional(),
  analyze: z.boolean().optional(),
  quiet: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type TranslateOptions = z.infer<typeof translateOptionsSchema>;

function logLevel(options: { quiet?: boolean; verbose?: boolean }): LogLevel {
  if (options.quiet) return "quiet";
  return options.verbose ? "debug" : "normal";
}

/**
 * Only flags the user actually passed override the settings file. The
 * `--no-*` switches default to true, so only `false` counts as set.
 */
function buildOverrides(options: TranslateOptions): Partial<RunConfig> {
  const overrides: Partial<RunConfig> = {};

  if (options.engine) overrides.engine = options.engine;
  if (options.targetLang) overrides.targetLanguage = options.targetLang;
  if (options.fallbackLang) overrides.fallbackLanguage = options.fallbackLang;
  if (options.forceLang) overrides.forceSourceLanguage = options.forceLang;
  if (options.threshold !== undefined) overrides.confidenceThreshold = options.threshold;
  if (options.batchSize !== undefined) overrides.batchSize = options.batchSize;
  if (!options.skipNumeric) overrides.skipNumeric = false;
  if (!options.skipDates) overrides.skipDates = false;
  if (!options.skipEnglish) overrides.skipEnglish = false;
  if (!options.skipEmpty) overrides.skipEmpty = false;
  if (!options.engineFallback) overrides.engineFallback = false;

  return overrides;
}

function parseColumns(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(",")
    .map((column) => column.trim())
    .filter((column) => column.length > 0);
}

function printAnalysis(logger: Logger, analysis: ColumnAnalysis[]): void {
  const widths = [24, 14, 24, 8, 10];
  logger.logHeader("Column Analysis");
  logger.log(chalk.bold(formatRow(["Column", "Type", "Language", "Conf.", "Selected"], widths)));

  for (const column of analysis) {
    logger.log(
      formatRow(
        [
          column.name,
          column.columnType,
          column.languageName,
          column.averageConfidence > 0 ? column.averageConfidence.toFixed(2) : "-",
          column.selected ? chalk.green("yes") : chalk.dim("no"),
        ],
        widths
      )
    );
    if (column.samples.length > 0) {
      logger.log(chalk.dim(`   e.g. ${column.samples.slice(0, 3).join(" | ")}`));
    }
  }
}

async function runTranslate(input: string, rawOptions: unknown): Promise<void> {
  const parsed = translateOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    throw new Error(
      `Invalid options: ${parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`
    );
  }
  const options = parsed.data;
  const logger = new Logger(logLevel(options));

  if (!fs.existsSync(input)) {
    logger.error(`❌ Input file not found: ${input}`);
    process.exit(1);
  }

  const settings = loadSettings(options.config, buildOverrides(options));
  logger.debug(`Run configuration: ${JSON.stringify(settings.run)}`);

  const job = new TranslationJob(settings, logger);

  if (options.analyze) {
    const table = await job.readTable(input);
    printAnalysis(logger, job.analyze(table));
    return;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn("\n⚠️ Cancelling after the current batch...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const result = await job.execute(input, {
      output: options.output,
      columns: parseColumns(options.columns),
      signal: controller.signal,
    });
    if (result.report.cancelled) {
      process.exitCode = EXIT_CANCELLED;
    }
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

function runLanguages(): void {
  const logger = new Logger();
  const mapper = new LanguageMapper();
  const widths = [12, 6, 22, 16, 6];

  logger.logHeader("Supported Languages");
  logger.log(chalk.bold(formatRow(["Code", "ISO", "Name", "Family", "Argos"], widths)));
  for (const language of mapper.getAllLanguages()) {
    logger.log(
      formatRow(
        [
          language.nllb,
          language.iso1,
          language.name,
          language.family,
          language.argos ? chalk.green("yes") : chalk.dim("no"),
        ],
        widths
      )
    );
  }
}

async function runDoctor(options: { config?: string }): Promise<void> {
  const logger = new Logger();
  const settings = loadSettings(options.config);
  const registry = new EngineRegistry(settings.engines, logger);

  logger.logHeader("Environment Check");
  logger.success(`✅ Language identification: ${new FrancLanguageIdentifier().getModelName()}`);

  const statuses = await registry.getStatus();
  for (const status of statuses) {
    const line = `${status.engine}: ${status.backend}, ${status.languages} language(s)`;
    if (status.available) {
      logger.success(`✅ ${line}`);
    } else {
      logger.warn(`❌ ${line} is not reachable`);
    }
  }

  if (!statuses.some((status) => status.available)) {
    logger.error("❌ No translation engine is reachable. Start nllb-serve or LibreTranslate.");
    process.exitCode = 1;
  }
}

// Create command line interface
const program = new Command();

program
  .name("cellwise")
  .description("Translate foreign-language cells in CSV and Excel files with local models")
  .version("0.1.0");

program
  .command("translate", { isDefault: true })
  .description("Translate the selected columns of a table")
  .argument("<input>", "CSV, XLSX or XLS file")
  .option("-o, --output <path>", "Output file (default: <name>_translated<ext>)")
  .option("-c, --columns <names>", "Comma-separated columns to translate (default: auto)")
  .option("-l, --force-lang <code>", "Treat every cell as this source language")
  .option("-t, --target-lang <code>", "Target language (default: eng_Latn)")
  .addOption(new Option("-e, --engine <engine>", "Translation engine").choices(["nllb", "argos"]))
  .option("--threshold <number>", "Minimum detection confidence (0-1)")
  .option("--fallback-lang <code>", "Language assumed below the threshold")
  .option("--batch-size <number>", "Cells per model call")
  .option("--no-skip-numeric", "Translate numeric cells")
  .option("--no-skip-dates", "Translate date cells")
  .option("--no-skip-english", "Translate cells that already read as English")
  .option("--no-skip-empty", "Run empty cells through the classifier")
  .option("--no-engine-fallback", "Do not reroute unsupported languages to the other engine")
  .option("--config <path>", "Settings file (default: ./cellwise.config.json)")
  .option("--analyze", "Only analyze columns and print the result")
  .option("-q, --quiet", "Only print errors")
  .option("-v, --verbose", "Print debug output")
  .action(async (input: string, options: unknown) => {
    await runTranslate(input, options);
  });

program
  .command("languages")
  .description("List supported languages and Argos availability")
  .action(() => runLanguages());

program
  .command("doctor")
  .description("Check that the local model servers are reachable")
  .option("--config <path>", "Settings file")
  .action(async (options: { config?: string }) => {
    await runDoctor(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`\n❌ ${errorMessage(error)}`));
  process.exit(1);
});
