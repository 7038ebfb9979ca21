// src/table.ts

export type Cell = string | number | null;
export type Row = Record<string, Cell>;

export interface Table {
  columns: string[];
  rows: Row[];
}

export function emptyTable(columns: readonly string[] = []): Table {
  return { columns: [...columns], rows: [] };
}

export function isNullCell(cell: Cell | undefined): boolean {
  return cell == null || cell === "";
}

/** Keys compare by their string form, so `7` and `"7"` are one key. */
export function keyString(cell: Cell | undefined): string | null {
  if (isNullCell(cell)) return null;
  return String(cell);
}

/** Project `row` onto `columns`, filling absent cells with null. */
export function projectRow(row: Row, columns: readonly string[]): Row {
  const out: Row = {};
  for (const col of columns) {
    const v = row[col];
    out[col] = v === undefined || v === "" ? null : v;
  }
  return out;
}

export function distinctKeys(table: Table, keyColumn: string): Set<string> {
  const keys = new Set<string>();
  for (const row of table.rows) {
    const k = keyString(row[keyColumn]);
    if (k != null) keys.add(k);
  }
  return keys;
}

// ---------- text encodings ----------

export const SUPPORTED_ENCODINGS = [
  "utf-8",
  "utf-16le",
  "latin1",
  "ascii",
] as const;

export type TextEncodingName = (typeof SUPPORTED_ENCODINGS)[number];

const ENCODING_ALIASES: Record<string, TextEncodingName> = {
  "utf-8": "utf-8",
  utf8: "utf-8",
  "utf-16le": "utf-16le",
  utf16le: "utf-16le",
  latin1: "latin1",
  "latin-1": "latin1",
  "iso-8859-1": "latin1",
  ascii: "ascii",
  "us-ascii": "ascii",
};

export function normalizeEncoding(raw: string): TextEncodingName | null {
  return ENCODING_ALIASES[raw.trim().toLowerCase()] ?? null;
}

/**
 * Strict decode: any byte sequence that is not valid in `encoding` throws.
 * A leading BOM is dropped.
 */
export function decodeText(bytes: Uint8Array, encoding: TextEncodingName): string {
  switch (encoding) {
    case "utf-8":
    case "utf-16le":
      return new TextDecoder(encoding, { fatal: true }).decode(bytes);
    case "latin1":
      return Buffer.from(bytes).toString("latin1");
    case "ascii": {
      const bad = bytes.findIndex((b) => b > 0x7f);
      if (bad >= 0) {
        throw new RangeError(`byte 0x${bytes[bad].toString(16)} at offset ${bad} is not ascii`);
      }
      return Buffer.from(bytes).toString("latin1");
    }
  }
}

export function encodeText(text: string, encoding: TextEncodingName): Buffer {
  switch (encoding) {
    case "utf-8":
      return Buffer.from(text, "utf8");
    case "utf-16le":
      return Buffer.from(text, "utf16le");
    case "latin1":
    case "ascii":
      return Buffer.from(text, "latin1");
  }
}
