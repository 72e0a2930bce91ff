import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { TranslationJob } from "../../src/core/TranslationJob";
import { TabularFileService } from "../../src/services/tabular";
import { Logger } from "../../src/utils/logger";
import type { Settings } from "../../src/config/settings";
import { MockIdentifier, createMockEngines, runConfig } from "../mocks/engines.mock";

describe("TranslationJob", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cellwise-job-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function createJob() {
    const settings: Settings = {
      run: runConfig(),
      engines: {
        nllb: { url: "http://127.0.0.1:6060", timeoutMs: 1000 },
        argos: { url: "http://127.0.0.1:5000", timeoutMs: 1000 },
      },
      columnOverrides: {},
    };
    const { engines, capabilities, nllbBackend } = createMockEngines();
    const identifier = new MockIdentifier({
      "Отличный продукт!": { code: "rus_Cyrl", confidence: 0.95 },
    });
    const job = new TranslationJob(settings, new Logger("quiet"), {
      identifier,
      engines,
      capabilities,
    });
    return { job, nllbBackend };
  }

  test("should pick foreign columns and write next to the input", async () => {
    const input = path.join(dir, "reviews.csv");
    fs.writeFileSync(input, "id,comment\n1,Отличный продукт!\n2,Hello\n");
    const { job } = createJob();

    const result = await job.execute(input);

    expect(result.columns).toEqual(["comment"]);
    expect(result.outputPath).toBe(path.join(dir, "reviews_translated.csv"));
    await expect(new TabularFileService().readTable(result.outputPath)).resolves.toEqual({
      columns: ["id", "comment", "comment_en"],
      rows: [
        ["1", "Отличный продукт!", "eng_Latn:Отличный продукт!"],
        ["2", "Hello", "Hello"],
      ],
    });
    expect(result.report.cellsTranslated).toBe(1);
  });

  test("should honour explicit columns and output path", async () => {
    const input = path.join(dir, "reviews.csv");
    fs.writeFileSync(input, "id,comment\n1,Отличный продукт!\n");
    const { job, nllbBackend } = createJob();

    const result = await job.execute(input, {
      columns: ["id"],
      output: path.join(dir, "result.txt"),
    });

    expect(result.outputPath).toBe(path.join(dir, "result.csv"));
    expect(result.plan.columns).toEqual(["id", "id_en", "comment"]);
    expect(nllbBackend.batchCalls).toEqual([]);
  });
});
