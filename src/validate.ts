// src/validate.ts
import fs from "node:fs/promises";
import { CsvParseError, parseCsv } from "./csv.js";
import {
  DataValidationError,
  errorMessage,
  fail,
  FileProcessingError,
  ok,
  type Result,
} from "./errors.js";
import {
  decodeText,
  keyString,
  type Table,
  type TextEncodingName,
} from "./table.js";

export interface ValidationRules {
  keyColumn: string;
  requiredColumns: readonly string[];
}

export interface DecodeOptions {
  encoding: TextEncodingName;
  delimiter: string;
}

export type ValidationError = FileProcessingError | DataValidationError;

/**
 * Structural checks on a loaded table, in order: non-empty, key column
 * present, required columns present, no null key. Stops at the first
 * failure.
 */
export function validateTable(
  table: Table,
  { keyColumn, requiredColumns }: ValidationRules,
  file?: string,
): Result<Table, DataValidationError> {
  const label = file ?? "table";
  if (table.columns.length === 0 || table.rows.length === 0) {
    return fail(new DataValidationError("empty", `empty: ${label}`, file));
  }
  const present = new Set(table.columns);
  if (!present.has(keyColumn)) {
    return fail(
      new DataValidationError(
        "missing-key-column",
        `missing key column "${keyColumn}" in ${label}`,
        file,
      ),
    );
  }
  const missing = requiredColumns.filter((c) => !present.has(c));
  if (missing.length) {
    return fail(
      new DataValidationError(
        "missing-required-columns",
        `missing required columns in ${label}: ${missing.join(", ")}`,
        file,
      ),
    );
  }
  let firstNull = -1;
  let nullCount = 0;
  table.rows.forEach((row, idx) => {
    if (keyString(row[keyColumn]) == null) {
      if (firstNull < 0) firstNull = idx;
      nullCount++;
    }
  });
  if (nullCount > 0) {
    return fail(
      new DataValidationError(
        "null-key-values",
        `null key values in ${label}: ${nullCount} row(s), first at data row ${firstNull + 1}`,
        file,
      ),
    );
  }
  return ok(table);
}

/**
 * Decode raw bytes and parse them as CSV. Encoding errors are reported before
 * anything structural, since a mis-decoded file produces nonsense columns.
 */
export function decodeTable(
  bytes: Uint8Array,
  { encoding, delimiter }: DecodeOptions,
  file?: string,
): Result<Table, FileProcessingError> {
  const label = file ?? "input";
  let text: string;
  try {
    text = decodeText(bytes, encoding);
  } catch (err) {
    return fail(
      new FileProcessingError(
        "encoding-invalid",
        `file is not valid ${encoding}: ${label}`,
        file,
        { cause: err },
      ),
    );
  }
  try {
    return ok(parseCsv(text, delimiter));
  } catch (err) {
    if (err instanceof CsvParseError) {
      return fail(
        new FileProcessingError(
          "load-failed",
          `CSV load failed for ${label}: ${err.message}`,
          file,
          { cause: err },
        ),
      );
    }
    throw err;
  }
}

export async function validateFile(
  file: string,
  opts: DecodeOptions & ValidationRules,
): Promise<Result<Table, ValidationError>> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(file);
  } catch (err) {
    return fail(
      new FileProcessingError(
        "io-failed",
        `cannot read ${file}: ${errorMessage(err)}`,
        file,
        { cause: err },
      ),
    );
  }
  const decoded = decodeTable(bytes, opts, file);
  if (!decoded.ok) return decoded;
  return validateTable(decoded.value, opts, file);
}
