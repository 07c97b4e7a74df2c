import * as fs from "fs";

/** One CSV data row keyed by header name */
export type CsvRow = Record<string, string>;

/**
 * Read a CSV file with a header row into keyed rows.
 * A missing file reads as no rows; cells beyond the header are dropped.
 * @param filePath  Absolute or relative path to the file.
 */
export function readCsvRows(filePath: string): CsvRow[] {
  if (!fs.existsSync(filePath)) return [];
  return parseCsv(fs.readFileSync(filePath, "utf-8"));
}

/** Parse CSV text (optionally BOM-prefixed) with a header row. */
export function parseCsv(raw: string): CsvRow[] {
  // Strip BOM if present
  const content = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;

  const lines = splitCsvRecords(content).filter((l) => l.trim() !== "");
  if (lines.length === 0) return [];

  const headers = parseCsvRow(lines[0]).map((h) => h.trim());
  const rows: CsvRow[] = [];
  for (let i = 1; i < lines.length; i++) {
    const fields = parseCsvRow(lines[i]);
    const row: CsvRow = {};
    headers.forEach((header, idx) => {
      row[header] = fields[idx] ?? "";
    });
    rows.push(row);
  }
  return rows;
}

// ── Internals ────────────────────────────────────────────────────────────────

/** Split CSV text into records on line breaks outside quoted fields. */
function splitCsvRecords(content: string): string[] {
  const records: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if (ch === "\n" && !inQuotes) {
      records.push(current.endsWith("\r") ? current.slice(0, -1) : current);
      current = "";
    } else {
      current += ch;
    }
  }
  if (current !== "") records.push(current);
  return records;
}

/** Minimal CSV row parser: handles quoted fields and "" escaped quotes. */
function parseCsvRow(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ",") {
        fields.push(current);
        current = "";
      } else {
        current += ch;
      }
    }
  }
  fields.push(current);
  return fields;
}
