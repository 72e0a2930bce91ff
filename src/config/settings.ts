import * as fs from "fs";
import * as path from "path";
import * as dotenv from "dotenv";
import { z } from "zod";
import type { RunConfig } from "../types";
import { LanguageMapper } from "./languages";
import { ConfigError } from "../utils/errors";
import {
  CONFIG_FILENAME,
  DEFAULT_ENDPOINTS,
  DEFAULT_TARGET_LANGUAGE,
  DEFAULT_TIMEOUT_MS,
} from "../utils/constants";

dotenv.config();

const languageCode = z.string().regex(/^[a-z]{2,3}(_[A-Z][a-z]{3})?$/, {
  message: "expected a code like rus_Cyrl or ru",
});

export const runConfigSchema = z.object({
  engine: z.enum(["nllb", "argos"]).default("nllb"),
  targetLanguage: languageCode.default(DEFAULT_TARGET_LANGUAGE),
  confidenceThreshold: z.number().min(0).max(1).default(0.7),
  fallbackLanguage: languageCode.default(DEFAULT_TARGET_LANGUAGE),
  skipNumeric: z.boolean().default(true),
  skipDates: z.boolean().default(true),
  skipEnglish: z.boolean().default(true),
  skipEmpty: z.boolean().default(true),
  batchSize: z.number().int().positive().default(16),
  forceSourceLanguage: languageCode.nullable().default(null),
  engineFallback: z.boolean().default(true),
});

const endpointSchema = z.object({
  url: z.string().url(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export const settingsFileSchema = z.object({
  run: runConfigSchema.partial().default({}),
  engines: z
    .object({
      nllb: endpointSchema.partial().default({}),
      argos: endpointSchema.extend({ apiKey: z.string().optional() }).partial().default({}),
    })
    .default({}),
  columnOverrides: z.record(languageCode).default({}),
});

export interface EngineEndpoint {
  url: string;
  timeoutMs: number;
  apiKey?: string;
}

/**
 * Fully resolved settings: run options, model server endpoints and
 * per-column source language overrides
 */
export interface Settings {
  run: RunConfig;
  engines: { nllb: EngineEndpoint; argos: EngineEndpoint };
  columnOverrides: Record<string, string>;
}

export const DEFAULT_RUN_CONFIG: RunConfig = runConfigSchema.parse({});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function toInternalCode(mapper: LanguageMapper, code: string, field: string): string {
  const nllb = mapper.toNllb(code);
  if (!nllb) {
    throw new ConfigError(`Unknown language code for ${field}: ${code}`);
  }
  return nllb;
}

/**
 * Validate a partial run configuration, fill in defaults and normalize
 * ISO codes (`ru`, `rus`) to table codes (`rus_Cyrl`)
 */
export function resolveRunConfig(
  input: Partial<RunConfig> = {},
  mapper: LanguageMapper = new LanguageMapper()
): RunConfig {
  const parsed = runConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid run configuration: ${formatIssues(parsed.error)}`);
  }
  const config = parsed.data;

  return {
    ...config,
    targetLanguage: toInternalCode(mapper, config.targetLanguage, "targetLanguage"),
    fallbackLanguage: toInternalCode(mapper, config.fallbackLanguage, "fallbackLanguage"),
    forceSourceLanguage:
      config.forceSourceLanguage === null
        ? null
        : toInternalCode(mapper, config.forceSourceLanguage, "forceSourceLanguage"),
  };
}

/**
 * Load settings from a JSON file (or cellwise.config.json in the working
 * directory when present), then apply overrides. Endpoints default to the
 * CELLWISE_NLLB_URL and CELLWISE_ARGOS_URL environment variables.
 */
export function loadSettings(
  configPath?: string,
  overrides: Partial<RunConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const filePath = configPath ?? path.join(process.cwd(), CONFIG_FILENAME);
  let raw: unknown = {};

  if (fs.existsSync(filePath)) {
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      throw new ConfigError(`Could not read settings file ${filePath}`, { cause: error });
    }
  } else if (configPath) {
    throw new ConfigError(`Settings file not found: ${configPath}`);
  }

  const parsed = settingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings in ${filePath}: ${formatIssues(parsed.error)}`);
  }
  const file = parsed.data;
  const mapper = new LanguageMapper();

  const columnOverrides: Record<string, string> = {};
  for (const [column, code] of Object.entries(file.columnOverrides)) {
    columnOverrides[column] = toInternalCode(mapper, code, `columnOverrides.${column}`);
  }

  return {
    run: resolveRunConfig({ ...file.run, ...overrides }, mapper),
    engines: {
      nllb: {
        url: file.engines.nllb.url ?? env.CELLWISE_NLLB_URL ?? DEFAULT_ENDPOINTS.nllb,
        timeoutMs: file.engines.nllb.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      },
      argos: {
        url: file.engines.argos.url ?? env.CELLWISE_ARGOS_URL ?? DEFAULT_ENDPOINTS.argos,
        timeoutMs: file.engines.argos.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        apiKey: file.engines.argos.apiKey ?? env.LIBRETRANSLATE_API_KEY,
      },
    },
    columnOverrides,
  };
}
