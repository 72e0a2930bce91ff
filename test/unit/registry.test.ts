import { describe, test, expect, vi, afterEach } from "vitest";
import { EngineRegistry } from "../../src/services/engines";

describe("EngineRegistry", () => {
  const registry = new EngineRegistry({
    nllb: { url: "http://nllb.test", timeoutMs: 1000 },
    argos: { url: "http://libre.test", timeoutMs: 1000 },
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test("should load both engines", () => {
    const engines = registry.getEngines();
    expect([...engines.keys()]).toEqual(["nllb", "argos"]);
    expect(engines.get("argos")?.id).toBe("argos");
  });

  test("should probe every model server", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (input: string | URL | Request) => {
        if (String(input).startsWith("http://nllb.test")) return new Response("ok");
        throw new TypeError("fetch failed");
      })
    );

    await expect(registry.getStatus()).resolves.toEqual([
      {
        engine: "nllb",
        backend: "nllb-serve (http://nllb.test)",
        available: true,
        languages: 48,
      },
      {
        engine: "argos",
        backend: "LibreTranslate (http://libre.test)",
        available: false,
        languages: 24,
      },
    ]);
  });
});
