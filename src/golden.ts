import * as fs from "fs";
import * as path from "path";
import { CsvRow, readCsvRows } from "./core/file-reader";
import { GOLDEN_FILE, RECORD_COLUMNS, RUN_FILE_RE, writeCsv } from "./exporter";

export interface GoldenUpdate {
  goldenPath: string;
  before: number;
  after: number;
  /** Golden rows appended to run files that lacked their phone number */
  appended: number;
}

/** Phone key for deduplication: `tel:` prefix, whitespace, dashes and dots removed */
export function normalizeGoldenPhone(phone: string | undefined): string {
  if (!phone) return "";
  let p = phone.trim();
  if (p.toLowerCase().startsWith("tel:")) p = p.slice(4);
  return p.replace(/[\s\-.]/g, "");
}

/** Order-insensitive identity of a row across all of its columns */
export function canonicalRowKey(row: CsvRow): string {
  return Object.keys(row)
    .sort()
    .map((key) => `${key}\u241E${row[key] ?? ""}`)
    .join("\u241F");
}

/**
 * Merge existing golden rows with run rows (newest run first).
 * Rows without a phone are dropped, phones are normalized, exact duplicates
 * are kept once in first-seen order.
 */
export function buildGoldenRows(existing: CsvRow[], runsNewestFirst: CsvRow[][]): CsvRow[] {
  const rows: CsvRow[] = [];
  const seen = new Set<string>();

  for (const row of [existing, ...runsNewestFirst].flat()) {
    const phone = normalizeGoldenPhone(row.phone);
    if (!phone) continue;
    const normalized = { ...row, phone };
    const key = canonicalRowKey(normalized);
    if (seen.has(key)) continue;
    seen.add(key);
    rows.push(normalized);
  }
  return rows;
}

/** Golden rows whose phone number is not yet present in `current` */
export function rowsToAppend(current: CsvRow[], golden: CsvRow[]): CsvRow[] {
  const phones = new Set(
    current.map((row) => normalizeGoldenPhone(row.phone)).filter(Boolean)
  );
  return golden
    .filter((row) => {
      const phone = normalizeGoldenPhone(row.phone);
      return phone !== "" && !phones.has(phone);
    })
    .map((row) => ({ ...row, phone: normalizeGoldenPhone(row.phone) }));
}

/** Known record columns first, then any extra columns alphabetically */
export function goldenColumns(rows: CsvRow[]): string[] {
  const keys = new Set(rows.flatMap((row) => Object.keys(row)));
  const known: string[] = RECORD_COLUMNS.filter((c) => keys.has(c));
  const extras = [...keys].filter((k) => !known.includes(k)).sort();
  return [...known, ...extras];
}

/** Run CSVs in the output directory, newest first */
export function listRunFiles(outputDir: string): string[] {
  if (!fs.existsSync(outputDir)) return [];
  return fs
    .readdirSync(outputDir)
    .filter((name) => RUN_FILE_RE.test(name))
    .map((name) => path.join(outputDir, name))
    .sort((a, b) => fs.statSync(b).mtimeMs - fs.statSync(a).mtimeMs);
}

/**
 * Rebuild providers_golden.csv from every run CSV in the output directory,
 * then append golden rows to each run file that is missing their phone.
 */
export function updateGolden(outputDir: string): GoldenUpdate {
  const goldenPath = path.join(outputDir, GOLDEN_FILE);
  const existing = readCsvRows(goldenPath);
  const runFiles = listRunFiles(outputDir);

  const golden = buildGoldenRows(existing, runFiles.map(readCsvRows));
  writeCsv(goldenPath, golden, goldenColumns(golden));

  let appended = 0;
  for (const file of runFiles) {
    const current = readCsvRows(file);
    const extra = rowsToAppend(current, golden);
    if (extra.length === 0) continue;
    const rows = [...current, ...extra];
    writeCsv(file, rows, goldenColumns(rows));
    appended += extra.length;
  }

  return {
    goldenPath,
    before: existing.length,
    after: golden.length,
    appended,
  };
}
