import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import type { Table } from "../types";
import { TableIOError, errorMessage } from "../utils/errors";
import { ensureDirectoryExists, normalizeOutputPath } from "../utils/filesystem";

const UTF8_BOM = "\uFEFF";

/**
 * Decode CSV bytes: UTF-8 (with or without BOM) first, Windows-1252 when
 * the bytes are not valid UTF-8
 */
export function decodeText(buffer: Buffer): string {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    text = new TextDecoder("windows-1252").decode(buffer);
  }
  return text.startsWith(UTF8_BOM) ? text.slice(1) : text;
}

/**
 * Unique, non-empty column ids from a header row. Repeats get the first
 * free `_1`, `_2`, ... suffix that no other header already uses.
 */
export function buildColumnIds(header: string[]): string[] {
  const reserved = new Set(header.map((raw) => raw.trim()).filter((name) => name.length > 0));
  const assigned = new Set<string>();

  return header.map((raw, index) => {
    const own = raw.trim();
    const base = own || `column_${index + 1}`;
    const free = (id: string) => !assigned.has(id) && (id === own || !reserved.has(id));

    let id = base;
    for (let n = 1; !free(id); n++) {
      id = `${base}_${n}`;
    }
    assigned.add(id);
    return id;
  });
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/**
 * Reads and writes CSV and Excel tables. Every cell comes back as the text
 * the file shows; numbers and dates are never reinterpreted.
 */
export class TabularFileService {
  async readTable(filePath: string): Promise<Table> {
    const ext = path.extname(filePath).toLowerCase();
    let buffer: Buffer;

    try {
      buffer = await fs.promises.readFile(filePath);
    } catch (error) {
      throw new TableIOError(`Could not read ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let workbook: XLSX.WorkBook;
    try {
      if (ext === ".csv") {
        workbook = XLSX.read(decodeText(buffer), { type: "string", raw: true });
      } else if (ext === ".xlsx" || ext === ".xls") {
        workbook = XLSX.read(buffer, { type: "buffer" });
      } else {
        throw new TableIOError(
          `Unsupported file format: ${ext || "(none)"}. Supported formats: .csv, .xlsx, .xls`
        );
      }
    } catch (error) {
      if (error instanceof TableIOError) throw error;
      throw new TableIOError(`Could not parse ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return this.sheetToTable(workbook);
  }

  async writeTable(table: Table, filePath: string): Promise<string> {
    const target = normalizeOutputPath(filePath);
    const ext = path.extname(target).toLowerCase();
    const worksheet = XLSX.utils.aoa_to_sheet([table.columns, ...table.rows]);

    try {
      ensureDirectoryExists(path.dirname(path.resolve(target)));

      if (ext === ".csv") {
        const csv = XLSX.utils.sheet_to_csv(worksheet, { blankrows: true });
        await fs.promises.writeFile(target, UTF8_BOM + csv, "utf-8");
      } else {
        const workbook = XLSX.utils.book_new();
        XLSX.utils.book_append_sheet(workbook, worksheet, "Translated");
        const data: Buffer = XLSX.write(workbook, {
          type: "buffer",
          bookType: ext === ".xls" ? "biff8" : "xlsx",
        });
        await fs.promises.writeFile(target, data);
      }
    } catch (error) {
      throw new TableIOError(`Could not write ${target}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return target;
  }

  private sheetToTable(workbook: XLSX.WorkBook): Table {
    const sheetName = workbook.SheetNames[0];
    const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!worksheet) {
      throw new TableIOError("File contains no sheets");
    }

    const grid = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
      header: 1,
      raw: false,
      defval: "",
      // Empty rows stay so the output keeps one row per input row
      blankrows: true,
    });

    const [header = [], ...body] = grid;
    const columns = buildColumnIds(header.map(cellText));
    const rows = body.map((row) => columns.map((_, i) => cellText(row[i])));

    return { columns, rows };
  }
}
