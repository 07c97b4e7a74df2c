import * as fs from "fs";
import * as path from "path";
import { ContactRecord, CrawlSummary, FIELD_NAMES } from "./types";

/** UTF-8 BOM for Excel compatibility */
const BOM = "\uFEFF";

/** Fixed column order of every records CSV */
export const RECORD_COLUMNS = [
  "source",
  "category",
  "region",
  ...FIELD_NAMES,
  "listing_url",
  "detail_url",
] as const satisfies readonly (keyof ContactRecord)[];

/** File name of a run's records CSV, e.g. providers_20260224_143022.csv */
export const RUN_FILE_RE = /^providers_\d{8}_\d{6}\.csv$/;

export const GOLDEN_FILE = "providers_golden.csv";

/** Generate a filename with a timestamp suffix to avoid overwriting old runs. */
function timestampedPath(outputDir: string, base: string, ext: string): string {
  const ts = new Date()
    .toISOString()
    .replace(/[-:]/g, "")
    .replace("T", "_")
    .slice(0, 15); // "20260224_143022"
  return path.join(outputDir, `${base}_${ts}${ext}`);
}

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 */
export function escapeCsv(value: string | number | null | undefined): string {
  const str = value == null ? "" : String(value);
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Convert rows to a CSV string with a header row, BOM first.
 * @param columns - Ordered keys; each becomes one column
 */
export function toCsv<T>(rows: readonly T[], columns: readonly (keyof T & string)[]): string {
  const header = columns.map((c) => escapeCsv(c)).join(",");
  const lines = rows.map((row) =>
    columns.map((col) => escapeCsv(String(row[col] ?? ""))).join(",")
  );
  return BOM + [header, ...lines].join("\n") + "\n";
}

/**
 * Write rows to an explicit path, creating the directory if needed.
 */
export function writeCsv<T>(
  filePath: string,
  rows: readonly T[],
  columns: readonly (keyof T & string)[]
): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, toCsv(rows, columns), "utf-8");
  return filePath;
}

/**
 * Export records to providers_<timestamp>.csv inside the output directory.
 * @returns Path to the written file
 */
export function exportRecords(records: readonly ContactRecord[], outputDir: string): string {
  return writeCsv(timestampedPath(outputDir, "providers", ".csv"), records, RECORD_COLUMNS);
}

/**
 * Write crawl summary statistics to summary_<timestamp>.json.
 * @returns Path to the written file
 */
export function exportSummary(summary: CrawlSummary, outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "summary", ".json");
  fs.writeFileSync(filePath, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  return filePath;
}
