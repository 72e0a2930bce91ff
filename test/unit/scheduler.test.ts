import { describe, test, expect } from "vitest";
import { BatchScheduler } from "../../src/core/BatchScheduler";
import { buildCapabilities } from "../../src/config/capabilities";
import type { EngineCapability, EngineId, RoutedUnit } from "../../src/types";

function unit(row: number, sourceLanguage: string, engine: EngineId = "nllb"): RoutedUnit {
  const cell = { row, column: "comment", text: `text ${row}` };
  return {
    cell,
    text: cell.text,
    sourceLanguage,
    targetLanguage: "eng_Latn",
    engine,
    rerouted: false,
  };
}

describe("BatchScheduler", () => {
  const capabilities = buildCapabilities();

  test("should cap the batch size at the engine limit", () => {
    const nllb = capabilities.get("nllb");
    expect(nllb).toBeDefined();
    if (!nllb) return;

    expect(new BatchScheduler(64).batchSizeFor(nllb)).toBe(16);
    expect(new BatchScheduler(4).batchSizeFor(nllb)).toBe(4);
    expect(new BatchScheduler(0).batchSizeFor(nllb)).toBe(1);
  });

  test("should group by language pair in order of first appearance", () => {
    const units = [
      unit(0, "rus_Cyrl"),
      unit(1, "deu_Latn"),
      unit(2, "rus_Cyrl"),
      unit(3, "rus_Cyrl"),
      unit(4, "deu_Latn"),
      unit(5, "rus_Cyrl"),
      unit(6, "rus_Cyrl"),
    ];

    const batches = new BatchScheduler(2).schedule(units, capabilities);

    expect(batches.map((b) => [b.sourceLanguage, b.units.map((u) => u.cell.row)])).toEqual([
      ["rus_Cyrl", [0, 2]],
      ["rus_Cyrl", [3, 5]],
      ["rus_Cyrl", [6]],
      ["deu_Latn", [1, 4]],
    ]);
  });

  test("should keep engines in separate batches", () => {
    const batches = new BatchScheduler().schedule(
      [unit(0, "rus_Cyrl", "nllb"), unit(1, "rus_Cyrl", "argos")],
      capabilities
    );

    expect(batches.map((b) => b.engine)).toEqual(["nllb", "argos"]);
  });

  test("should return no batches for no units", () => {
    expect(new BatchScheduler().schedule([], capabilities)).toEqual([]);
  });

  test("should throw for an engine without a capability", () => {
    const onlyNllb = new Map<EngineId, EngineCapability>();
    const nllb = capabilities.get("nllb");
    if (nllb) onlyNllb.set("nllb", nllb);

    expect(() =>
      new BatchScheduler().schedule([unit(0, "rus_Cyrl", "argos")], onlyNllb)
    ).toThrow("No capability registered for engine argos");
  });
});
