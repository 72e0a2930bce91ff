import * as fs from "fs";
import * as path from "path";

/**
 * Utilities for file system operations
 */

export const SUPPORTED_EXTENSIONS: readonly string[] = [".csv", ".xlsx", ".xls"];

/**
 * Ensure a directory exists, create it if it doesn't
 */
export function ensureDirectoryExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Default output path: `<stem>_translated<ext>` next to the input
 */
export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}_translated${parsed.ext}`);
}

/**
 * Anything that is not a spreadsheet extension is written as CSV
 */
export function normalizeOutputPath(outputPath: string): string {
  const ext = path.extname(outputPath).toLowerCase();
  if (SUPPORTED_EXTENSIONS.includes(ext)) {
    return outputPath;
  }
  return outputPath.slice(0, outputPath.length - ext.length) + ".csv";
}
