import type {
  ClassificationResult,
  ColumnPlan,
  ColumnPlanEntry,
  OutputTable,
  Table,
  TranslationResult,
} from "../types";
import { ColumnNotFoundError } from "../utils/errors";
import { ERROR_MARKERS } from "../utils/constants";

/**
 * What is known about one cell of a selected column once the run is over
 */
export interface CellOutcome {
  classification: ClassificationResult;
  result?: TranslationResult;
}

export function cellKey(row: number, column: string): string {
  return `${row}:${column}`;
}

/**
 * Computes where derived columns go and writes the final table
 */
export class ColumnProjector {
  /**
   * Insert one derived column immediately right of each selected column.
   * Unselected columns keep their relative order.
   */
  plan(columns: string[], selected: string[], suffix: string): ColumnPlan {
    const missing = selected.filter((name) => !columns.includes(name));
    if (missing.length > 0) {
      throw new ColumnNotFoundError(missing);
    }

    const chosen = new Set(selected);
    const taken = new Set(columns);
    const entries: ColumnPlanEntry[] = [];
    const output: string[] = [];

    columns.forEach((column, sourceIndex) => {
      output.push(column);
      if (!chosen.has(column)) return;

      const name = this.derivedName(column, suffix, taken);
      taken.add(name);
      entries.push({ source: column, sourceIndex, output: name, position: sourceIndex + 1 });
      output.push(name);
    });

    return { entries, columns: output };
  }

  /**
   * Build the output table. Every planned cell gets translated text, the
   * original text, or an explicit error marker; no cell is dropped.
   */
  assemble(
    table: Table,
    plan: ColumnPlan,
    outcomes: ReadonlyMap<string, CellOutcome>
  ): OutputTable {
    const rows = table.rows.map((row, rowIndex) => {
      const out = table.columns.map((_, i) => row[i] ?? "");
      // Walk right to left so earlier insertions do not shift later ones
      for (let i = plan.entries.length - 1; i >= 0; i--) {
        const entry = plan.entries[i];
        const outcome = outcomes.get(cellKey(rowIndex, entry.source));
        const original = row[entry.sourceIndex] ?? "";
        out.splice(entry.position, 0, this.render(original, outcome));
      }
      return out;
    });

    return { columns: [...plan.columns], rows };
  }

  private render(original: string, outcome: CellOutcome | undefined): string {
    if (!outcome) return ERROR_MARKERS.translationFailed;

    const { classification, result } = outcome;
    switch (classification.decision) {
      case "malformed-cell-error":
        return ERROR_MARKERS.malformedCell;
      case "translate":
        if (!result) return ERROR_MARKERS.translationFailed;
        if (result.ok) return result.text;
        if (result.error === "unsupported-language") {
          return ERROR_MARKERS.unsupportedLanguage(classification.language);
        }
        if (result.error === "cancelled") return ERROR_MARKERS.cancelled;
        return ERROR_MARKERS.translationFailed;
      default:
        return original;
    }
  }

  private derivedName(column: string, suffix: string, taken: Set<string>): string {
    const base = `${column}_${suffix}`;
    if (!taken.has(base)) return base;
    let n = 2;
    while (taken.has(`${base}_${n}`)) n++;
    return `${base}_${n}`;
  }
}
