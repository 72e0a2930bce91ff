import type { EngineCapability, EngineId } from "../types";
import { LanguageMapper } from "./languages";

/**
 * Largest batch each engine's model server accepts in one forward pass
 */
export const ENGINE_MAX_BATCH: Record<EngineId, number> = {
  nllb: 16,
  argos: 32,
};

/**
 * Engine tried when the selected one lacks a unit's source language
 */
export const ENGINE_FALLBACKS: Record<EngineId, EngineId> = {
  nllb: "argos",
  argos: "nllb",
};

export const ENGINE_IDS: readonly EngineId[] = ["nllb", "argos"];

/**
 * Build the capability table once at startup from the language table.
 * NLLB covers every entry; Argos only the languages with an installed pack.
 */
export function buildCapabilities(
  mapper: LanguageMapper = new LanguageMapper()
): Map<EngineId, EngineCapability> {
  const languages = mapper.getAllLanguages();

  return new Map<EngineId, EngineCapability>([
    [
      "nllb",
      {
        engine: "nllb",
        languages: new Set(languages.map((l) => l.nllb)),
        maxBatchSize: ENGINE_MAX_BATCH.nllb,
      },
    ],
    [
      "argos",
      {
        engine: "argos",
        languages: new Set(languages.filter((l) => l.argos).map((l) => l.nllb)),
        maxBatchSize: ENGINE_MAX_BATCH.argos,
      },
    ],
  ]);
}
