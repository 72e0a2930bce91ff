import type { EngineCapability, EngineId } from "../../types";
import type { TranslationBackend, TranslationEngine } from "./interfaces";
import type { EngineEndpoint } from "../../config/settings";
import { NllbEngine, NllbServerBackend } from "./nllb";
import { ArgosEngine, LibreTranslateBackend } from "./argos";
import { buildCapabilities, ENGINE_IDS } from "../../config/capabilities";
import { LanguageMapper } from "../../config/languages";
import { Logger } from "../../utils/logger";

export interface EngineStatus {
  engine: EngineId;
  backend: string;
  available: boolean;
  languages: number;
}

/**
 * Owns both engines and their model server clients for the life of the
 * process. Capabilities are computed once here and handed to the pipeline.
 */
export class EngineRegistry {
  readonly capabilities: ReadonlyMap<EngineId, EngineCapability>;
  private backends: Map<EngineId, TranslationBackend>;
  private engines: Map<EngineId, TranslationEngine>;

  constructor(
    endpoints: { nllb: EngineEndpoint; argos: EngineEndpoint },
    logger: Logger = new Logger("quiet"),
    mapper: LanguageMapper = new LanguageMapper()
  ) {
    const capabilities = buildCapabilities(mapper);
    this.capabilities = capabilities;

    const nllbBackend = new NllbServerBackend(endpoints.nllb);
    const argosBackend = new LibreTranslateBackend(endpoints.argos);
    this.backends = new Map<EngineId, TranslationBackend>([
      ["nllb", nllbBackend],
      ["argos", argosBackend],
    ]);

    this.engines = new Map<EngineId, TranslationEngine>();
    for (const id of ENGINE_IDS) {
      const capability = capabilities.get(id);
      if (!capability) continue;
      if (id === "nllb") {
        this.engines.set(id, new NllbEngine(nllbBackend, capability, logger));
      } else {
        this.engines.set(id, new ArgosEngine(argosBackend, capability, mapper, logger));
      }
    }
  }

  getEngines(): ReadonlyMap<EngineId, TranslationEngine> {
    return this.engines;
  }

  /**
   * Probe every model server
   */
  async getStatus(): Promise<EngineStatus[]> {
    return Promise.all(
      ENGINE_IDS.map(async (id) => {
        const backend = this.backends.get(id);
        return {
          engine: id,
          backend: backend?.getBackendName() ?? "(none)",
          available: backend ? await backend.isAvailable() : false,
          languages: this.capabilities.get(id)?.languages.size ?? 0,
        };
      })
    );
  }
}
