import { describe, test, expect } from "vitest";
import { ColumnProjector, cellKey, type CellOutcome } from "../../src/core/ColumnProjector";
import { ColumnNotFoundError } from "../../src/utils/errors";
import type { ClassificationResult, Decision, TranslationResult } from "../../src/types";

function outcome(
  row: number,
  text: string,
  decision: Decision,
  result?: TranslationResult,
  language = "rus_Cyrl"
): [string, CellOutcome] {
  const classification: ClassificationResult = {
    cell: { row, column: "comment", text },
    language,
    confidence: 0.9,
    decision,
  };
  return [cellKey(row, "comment"), { classification, result }];
}

describe("ColumnProjector", () => {
  const projector = new ColumnProjector();

  describe("plan", () => {
    test("should insert each derived column right after its source", () => {
      const plan = projector.plan(
        ["id", "description", "notes", "country"],
        ["description", "notes"],
        "en"
      );

      expect(plan.columns).toEqual([
        "id",
        "description",
        "description_en",
        "notes",
        "notes_en",
        "country",
      ]);
      expect(plan.entries.map((e) => [e.source, e.sourceIndex, e.position])).toEqual([
        ["description", 1, 2],
        ["notes", 2, 3],
      ]);
    });

    test("should reject columns that are not in the table", () => {
      expect(() => projector.plan(["id"], ["comment", "notes"], "en")).toThrow(
        ColumnNotFoundError
      );
      expect(() => projector.plan(["id"], ["comment"], "en")).toThrow(
        "Column(s) not found in table: comment"
      );
    });

    test("should not collide with existing column names", () => {
      const plan = projector.plan(["name", "name_en"], ["name"], "en");
      expect(plan.columns).toEqual(["name", "name_en_2", "name_en"]);
    });

    test("should plan nothing when no columns are selected", () => {
      const plan = projector.plan(["id", "comment"], [], "en");
      expect(plan.entries).toEqual([]);
      expect(plan.columns).toEqual(["id", "comment"]);
    });
  });

  describe("assemble", () => {
    const table = {
      columns: ["id", "comment"],
      rows: [
        ["1", "Привет"],
        ["2", "123"],
        ["3", "Labas"],
        ["4", "Пока"],
        ["5", "Сломано"],
        ["6", "bad"],
        ["7", "Ещё"],
      ],
    };
    const plan = new ColumnProjector().plan(table.columns, ["comment"], "en");

    test("should write text, originals and markers per cell", () => {
      const outcomes = new Map<string, CellOutcome>([
        outcome(0, "Привет", "translate", {
          cell: { row: 0, column: "comment" },
          ok: true,
          text: "Hi",
          engine: "nllb",
        }),
        outcome(1, "123", "skip-numeric"),
        outcome(
          2,
          "Labas",
          "translate",
          {
            cell: { row: 2, column: "comment" },
            ok: false,
            error: "unsupported-language",
            message: "unsupported",
          },
          "lit_Latn"
        ),
        outcome(3, "Пока", "translate", {
          cell: { row: 3, column: "comment" },
          ok: false,
          error: "cancelled",
          message: "cancelled",
        }),
        outcome(4, "Сломано", "translate", {
          cell: { row: 4, column: "comment" },
          ok: false,
          error: "backend-failure",
          message: "boom",
        }),
        outcome(5, "bad", "malformed-cell-error"),
      ]);

      const output = projector.assemble(table, plan, outcomes);

      expect(output.columns).toEqual(["id", "comment", "comment_en"]);
      expect(output.rows.map((row) => row[2])).toEqual([
        "Hi",
        "123",
        "[ERROR: unsupported language lit_Latn]",
        "[ERROR: cancelled]",
        "[ERROR: translation failed]",
        "[ERROR: malformed cell]",
        "[ERROR: translation failed]",
      ]);
      expect(output.rows.map((row) => row.slice(0, 2))).toEqual(table.rows);
    });

    test("should keep the original text for low-confidence cells", () => {
      const outcomes = new Map<string, CellOutcome>([
        outcome(0, "Привет", "low-confidence-fallback"),
      ]);
      const output = projector.assemble(
        { columns: ["id", "comment"], rows: [["1", "Привет"]] },
        plan,
        outcomes
      );
      expect(output.rows).toEqual([["1", "Привет", "Привет"]]);
    });

    test("should pad short rows before inserting", () => {
      const short = { columns: ["id", "comment", "country"], rows: [["1"]] };
      const wide = projector.plan(short.columns, ["comment"], "en");
      const outcomes = new Map<string, CellOutcome>([outcome(0, "", "skip-empty")]);

      const output = projector.assemble(short, wide, outcomes);

      expect(output.rows).toEqual([["1", "", "", ""]]);
    });
  });
});
