/**
 * Minimal CSV reader for cleaned result exports.
 * Handles quoted fields and doubled quotes; reports bad rows instead of throwing.
 */

export interface CsvRow {
  /** 1-based line number in the source (header is line 1) */
  line: number;
  /** Lower-cased header name → trimmed field value */
  fields: Record<string, string>;
}

export type CsvErrorReason = "empty_file" | "malformed_row" | "missing_header";

export interface CsvError {
  line: number;
  reason: CsvErrorReason;
  rawValue: string;
}

export interface CsvParseResult {
  columns: string[];
  rows: CsvRow[];
  errors: CsvError[];
}

/**
 * Splits one line into fields. Returns null on an unclosed quote.
 */
export function splitCsvLine(line: string, delimiter = ","): string[] | null {
  const fields: string[] = [];
  let pos = 0;
  while (pos <= line.length) {
    if (line[pos] === '"') {
      let i = pos + 1;
      let value = "";
      let closed = false;
      while (i < line.length) {
        if (line[i] === '"') {
          if (line[i + 1] === '"') {
            value += '"';
            i += 2;
            continue;
          }
          closed = true;
          i++;
          break;
        }
        value += line[i];
        i++;
      }
      if (!closed) return null;
      fields.push(value.trim());
      const next = line.indexOf(delimiter, i);
      if (next === -1) break;
      pos = next + 1;
      continue;
    }
    const idx = line.indexOf(delimiter, pos);
    const end = idx === -1 ? line.length : idx;
    fields.push(line.slice(pos, end).trim());
    if (idx === -1) break;
    pos = idx + 1;
  }
  return fields;
}

export function parseCsv(content: string, delimiter = ","): CsvParseResult {
  const errors: CsvError[] = [];
  const trimmed = content.replace(/^\uFEFF/, "").trim();
  if (trimmed.length === 0) {
    return { columns: [], rows: [], errors: [{ line: 0, reason: "empty_file", rawValue: "" }] };
  }

  const lines = trimmed.split(/\r?\n/);
  const header = splitCsvLine(lines[0], delimiter);
  if (header === null || header.every((c) => c === "")) {
    return {
      columns: [],
      rows: [],
      errors: [{ line: 1, reason: "missing_header", rawValue: lines[0].slice(0, 80) }],
    };
  }
  const columns = header.map((c) => c.toLowerCase());

  const rows: CsvRow[] = [];
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === "") continue;
    const values = splitCsvLine(line, delimiter);
    if (values === null) {
      errors.push({ line: i + 1, reason: "malformed_row", rawValue: line.slice(0, 80) });
      continue;
    }
    const fields: Record<string, string> = {};
    columns.forEach((col, c) => {
      fields[col] = values[c] ?? "";
    });
    rows.push({ line: i + 1, fields });
  }
  return { columns, rows, errors };
}

function quoteField(value: string, delimiter: string): string {
  if (value.includes(delimiter) || value.includes('"') || /[\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(columns: readonly string[], rows: ReadonlyArray<readonly string[]>, delimiter = ","): string {
  const out = [columns.map((c) => quoteField(c, delimiter)).join(delimiter)];
  for (const row of rows) {
    out.push(row.map((v) => quoteField(v, delimiter)).join(delimiter));
  }
  return out.join("\n") + "\n";
}
