// src/merge.ts
import {
  distinctKeys,
  isNullCell,
  keyString,
  projectRow,
  type Row,
  type Table,
} from "./table.js";

export interface MergeOptions {
  keyColumn: string;
  sortByKey?: boolean;
}

export interface MergeStats {
  baseRows: number;
  incomingRows: number;
  replacedRows: number;
  insertedRows: number;
  // rows hidden by a later row with the same key
  collapsedDuplicates: number;
  resultRows: number;
}

export interface MergePlan {
  keyColumn: string;
  columns: string[];
  rows: Row[];
  newKeys: string[];
  replacedKeys: string[];
  addedColumns: string[];
  droppedColumns: string[];
  stats: MergeStats;
}

// Code-unit order; localeCompare would make the output depend on the host.
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function numericKey(key: string): number | null {
  if (!NUMERIC.test(key)) return null;
  const n = Number(key);
  return Number.isFinite(n) ? n : null;
}

/**
 * Total order on keys: finite numbers first (by value, then by text), then
 * everything else by code units, then null.
 */
export function compareKeys(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a == null) return 1;
  if (b == null) return -1;
  const na = numericKey(a);
  const nb = numericKey(b);
  if (na != null && nb != null) {
    if (na !== nb) return na < nb ? -1 : 1;
  } else if (na != null) {
    return -1;
  } else if (nb != null) {
    return 1;
  }
  return compareStrings(a, b);
}

function dedupeKeepLast(rows: Row[], keyColumn: string): Row[] {
  const lastIndex = new Map<string, number>();
  rows.forEach((row, idx) => {
    const k = keyString(row[keyColumn]);
    if (k != null) lastIndex.set(k, idx);
  });
  return rows.filter((row, idx) => {
    const k = keyString(row[keyColumn]);
    return k == null || lastIndex.get(k) === idx;
  });
}

/**
 * Fold `incoming` into `base` keyed on `keyColumn`.
 *
 * Every base row whose key appears in `incoming` is replaced wholesale by the
 * incoming row; other base rows are kept as they are. The schema is the
 * sorted union of both inputs, minus base-only columns that end up holding no
 * value at all. Within `incoming` the last row for a key wins.
 */
export function mergeTables(
  base: Table,
  incoming: Table,
  { keyColumn, sortByKey = false }: MergeOptions,
): MergePlan {
  const newKeys = distinctKeys(incoming, keyColumn);
  const baseColumns = new Set(base.columns);
  const incomingColumns = new Set(incoming.columns);

  const allColumns = [...new Set([...base.columns, ...incoming.columns])].sort(
    compareStrings,
  );

  const replacedKeys = new Set<string>();
  let replacedRows = 0;
  const kept: Row[] = [];
  for (const row of base.rows) {
    const k = keyString(row[keyColumn]);
    if (k != null && newKeys.has(k)) {
      replacedKeys.add(k);
      replacedRows++;
      continue;
    }
    kept.push(projectRow(row, allColumns));
  }
  const updated = incoming.rows.map((row) => projectRow(row, allColumns));

  let merged = dedupeKeepLast([...kept, ...updated], keyColumn);
  const collapsedDuplicates = kept.length + updated.length - merged.length;

  if (sortByKey) {
    // Array.prototype.sort is stable, so equal keys keep their order
    merged = merged.sort((a, b) =>
      compareKeys(keyString(a[keyColumn]), keyString(b[keyColumn])),
    );
  }

  // A base-only column is obsolete once the updated rows hold no value for
  // it. Updated rows never do (their source file lacks the column), so the
  // column also has to be empty on every untouched row before it goes.
  const updatedRows: Row[] = [];
  const untouchedRows: Row[] = [];
  for (const row of merged) {
    const k = keyString(row[keyColumn]);
    (k != null && newKeys.has(k) ? updatedRows : untouchedRows).push(row);
  }
  const droppedColumns = base.columns
    .filter((col) => col !== keyColumn && !incomingColumns.has(col))
    .filter(
      (col) =>
        updatedRows.every((row) => isNullCell(row[col])) &&
        untouchedRows.every((row) => isNullCell(row[col])),
    )
    .sort(compareStrings);

  const dropped = new Set(droppedColumns);
  const columns = allColumns.filter((c) => !dropped.has(c));
  const rows = dropped.size
    ? merged.map((row) => projectRow(row, columns))
    : merged;

  return {
    keyColumn,
    columns,
    rows,
    newKeys: [...newKeys],
    replacedKeys: [...replacedKeys],
    addedColumns: incoming.columns
      .filter((c) => !baseColumns.has(c))
      .sort(compareStrings),
    droppedColumns,
    stats: {
      baseRows: base.rows.length,
      incomingRows: incoming.rows.length,
      replacedRows,
      insertedRows: newKeys.size - replacedKeys.size,
      collapsedDuplicates,
      resultRows: rows.length,
    },
  };
}

export function planToTable(plan: MergePlan): Table {
  return { columns: plan.columns, rows: plan.rows };
}
