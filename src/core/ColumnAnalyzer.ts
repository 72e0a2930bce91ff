import type { Decision, RunConfig, Table } from "../types";
import type { LanguageIdentifier } from "../services/detection/interfaces";
import { LanguageClassifier } from "./LanguageClassifier";
import { LanguageMapper } from "../config/languages";
import { UNKNOWN_LANGUAGE } from "../utils/constants";

export type ColumnType =
  | "empty"
  | "numeric"
  | "date"
  | "english"
  | "foreign_text"
  | "mixed";

export interface ColumnAnalysis {
  name: string;
  index: number;
  columnType: ColumnType;
  dominantLanguage: string;
  languageName: string;
  averageConfidence: number;
  samples: string[];
  selected: boolean;
}

// Share of samples one kind needs to name the column
const DOMINANT_SHARE = 0.8;

const KIND_BY_DECISION: Partial<Record<Decision, ColumnType>> = {
  "skip-numeric": "numeric",
  "skip-date": "date",
  "skip-english": "english",
  "skip-same-language": "english",
  "low-confidence-fallback": "english",
  translate: "foreign_text",
};

/**
 * Samples each column to suggest which ones hold foreign text. Language is
 * still decided per cell at translation time; this is only a preview.
 */
export class ColumnAnalyzer {
  private classifier: LanguageClassifier;

  constructor(
    identifier: LanguageIdentifier,
    private config: RunConfig,
    private mapper: LanguageMapper = new LanguageMapper()
  ) {
    // Classify with every rule on so the column type reflects the data
    this.classifier = new LanguageClassifier(identifier, {
      ...config,
      skipEmpty: true,
      skipNumeric: true,
      skipDates: true,
      skipEnglish: true,
      forceSourceLanguage: null,
    });
  }

  analyze(table: Table, sampleSize = 50): ColumnAnalysis[] {
    return table.columns.map((name, index) =>
      this.analyzeColumn(table, name, index, sampleSize)
    );
  }

  private analyzeColumn(
    table: Table,
    name: string,
    index: number,
    sampleSize: number
  ): ColumnAnalysis {
    const values = table.rows
      .map((row) => row[index] ?? "")
      .filter((value) => value.trim().length > 0)
      .slice(0, sampleSize);

    if (values.length === 0) {
      return this.describe(name, index, "empty", UNKNOWN_LANGUAGE, 0, []);
    }

    const kinds = new Map<ColumnType, number>();
    const languages = new Map<string, number>();
    let confidenceSum = 0;
    let foreign = 0;

    values.forEach((text, row) => {
      const result = this.classifier.classify({ row, column: name, text });
      const kind = KIND_BY_DECISION[result.decision];
      if (kind) kinds.set(kind, (kinds.get(kind) ?? 0) + 1);

      if (result.decision === "translate") {
        foreign++;
        confidenceSum += result.confidence;
        languages.set(result.language, (languages.get(result.language) ?? 0) + 1);
      }
    });

    const top = [...kinds].sort((a, b) => b[1] - a[1])[0];
    const topKind: ColumnType = top ? top[0] : "mixed";
    const topCount = top ? top[1] : 0;

    let columnType: ColumnType;
    if (topCount / values.length >= DOMINANT_SHARE) {
      columnType = topKind;
    } else if (foreign > 0) {
      columnType = "mixed";
    } else {
      columnType = topKind;
    }

    const dominant =
      [...languages].sort((a, b) => b[1] - a[1])[0]?.[0] ?? UNKNOWN_LANGUAGE;

    return this.describe(
      name,
      index,
      columnType,
      dominant,
      foreign > 0 ? confidenceSum / foreign : 0,
      values.slice(0, 5)
    );
  }

  private describe(
    name: string,
    index: number,
    columnType: ColumnType,
    dominantLanguage: string,
    averageConfidence: number,
    samples: string[]
  ): ColumnAnalysis {
    return {
      name,
      index,
      columnType,
      dominantLanguage,
      languageName:
        dominantLanguage === UNKNOWN_LANGUAGE ? "-" : this.mapper.getName(dominantLanguage),
      averageConfidence,
      samples,
      selected: this.isSelected(columnType),
    };
  }

  private isSelected(columnType: ColumnType): boolean {
    switch (columnType) {
      case "foreign_text":
      case "mixed":
        return true;
      case "numeric":
        return !this.config.skipNumeric;
      case "date":
        return !this.config.skipDates;
      case "english":
        return !this.config.skipEnglish;
      case "empty":
        return !this.config.skipEmpty;
    }
  }
}
