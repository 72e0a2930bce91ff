import type { Batch, EngineCapability, EngineId, RoutedUnit } from "../types";

export const DEFAULT_BATCH_SIZE = 16;

/**
 * Groups routed units into engine-efficient batches. Batching only
 * amortizes model overhead; results never depend on it.
 */
export class BatchScheduler {
  constructor(private batchSizeOverride: number = DEFAULT_BATCH_SIZE) {}

  /**
   * Effective batch size for an engine: the smaller of its cap and the
   * run's configured size
   */
  batchSizeFor(capability: EngineCapability): number {
    return Math.max(1, Math.min(capability.maxBatchSize, this.batchSizeOverride));
  }

  /**
   * Group by engine and language pair (groups ordered by first appearance,
   * units in read order), then cut each group at the batch size
   */
  schedule(
    units: RoutedUnit[],
    capabilities: ReadonlyMap<EngineId, EngineCapability>
  ): Batch[] {
    const groups = new Map<string, RoutedUnit[]>();

    for (const unit of units) {
      const key = `${unit.engine}|${unit.sourceLanguage}|${unit.targetLanguage}`;
      const group = groups.get(key);
      if (group) {
        group.push(unit);
      } else {
        groups.set(key, [unit]);
      }
    }

    const batches: Batch[] = [];
    for (const group of groups.values()) {
      const { engine, sourceLanguage, targetLanguage } = group[0];
      const capability = capabilities.get(engine);
      if (!capability) {
        throw new Error(`No capability registered for engine ${engine}`);
      }

      const size = this.batchSizeFor(capability);
      for (let start = 0; start < group.length; start += size) {
        batches.push({
          engine,
          sourceLanguage,
          targetLanguage,
          units: group.slice(start, start + size),
        });
      }
    }

    return batches;
  }
}
