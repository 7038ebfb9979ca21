// src/csv.ts
import type { Cell, Row, Table } from "./table.js";

export class CsvParseError extends Error {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`line ${line}: ${message}`);
    this.name = "CsvParseError";
  }
}

type RawRecord = { fields: string[]; line: number };

// Splits text into records. Quoted fields may span lines and use "" for a
// literal quote. Records made of a single empty field (blank lines) are
// dropped.
function* records(text: string, delimiter: string): Generator<RawRecord> {
  let fields: string[] = [];
  let field = "";
  let quoted = false;
  let fieldWasQuoted = false;
  let line = 1;
  let recordLine = 1;
  let i = 0;

  const endRecord = (): RawRecord | null => {
    fields.push(field);
    const rec = { fields, line: recordLine };
    fields = [];
    field = "";
    fieldWasQuoted = false;
    if (rec.fields.length === 1 && rec.fields[0] === "") return null;
    return rec;
  };

  while (i < text.length) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
        i++;
        continue;
      }
      if (ch === "\n") line++;
      field += ch;
      i++;
      continue;
    }
    if (ch === '"') {
      if (field !== "" || fieldWasQuoted) {
        throw new CsvParseError("unexpected quote inside unquoted field", line);
      }
      quoted = true;
      fieldWasQuoted = true;
      i++;
      continue;
    }
    if (ch === delimiter) {
      fields.push(field);
      field = "";
      fieldWasQuoted = false;
      i++;
      continue;
    }
    if (ch === "\r" || ch === "\n") {
      const rec = endRecord();
      if (rec) yield rec;
      i += ch === "\r" && text[i + 1] === "\n" ? 2 : 1;
      line++;
      recordLine = line;
      continue;
    }
    if (fieldWasQuoted) {
      throw new CsvParseError("text after closing quote", line);
    }
    field += ch;
    i++;
  }
  if (quoted) {
    throw new CsvParseError("unterminated quoted field", recordLine);
  }
  if (field !== "" || fieldWasQuoted || fields.length > 0) {
    const rec = endRecord();
    if (rec) yield rec;
  }
}

/**
 * Parse CSV text into a table. The first record is the header; empty fields
 * become null and every other field stays a string.
 */
export function parseCsv(text: string, delimiter = ","): Table {
  const it = records(text, delimiter);
  const first = it.next();
  if (first.done) {
    return { columns: [], rows: [] };
  }
  const columns = first.value.fields.map((c) => c.trim());
  const seen = new Set<string>();
  for (const col of columns) {
    if (!col) {
      throw new CsvParseError("empty column name in header", first.value.line);
    }
    if (seen.has(col)) {
      throw new CsvParseError(`duplicate column "${col}"`, first.value.line);
    }
    seen.add(col);
  }

  const rows: Row[] = [];
  for (const { fields, line } of it) {
    if (fields.length > columns.length) {
      throw new CsvParseError(
        `expected ${columns.length} fields, saw ${fields.length}`,
        line,
      );
    }
    const row: Row = {};
    columns.forEach((col, idx) => {
      const raw = fields[idx];
      row[col] = raw === undefined || raw === "" ? null : raw;
    });
    rows.push(row);
  }
  return { columns, rows };
}

function formatField(cell: Cell | undefined, delimiter: string): string {
  if (cell == null) return "";
  const s = String(cell);
  if (
    s.includes(delimiter) ||
    s.includes('"') ||
    s.includes("\n") ||
    s.includes("\r")
  ) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
}

export function serializeCsv(table: Table, delimiter = ","): string {
  const lines = [table.columns.map((c) => formatField(c, delimiter)).join(delimiter)];
  for (const row of table.rows) {
    lines.push(
      table.columns.map((c) => formatField(row[c], delimiter)).join(delimiter),
    );
  }
  return lines.join("\n") + "\n";
}
