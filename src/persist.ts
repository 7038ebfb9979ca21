// src/persist.ts
import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { CsvParseError, parseCsv, serializeCsv } from "./csv.js";
import {
  errorCode,
  errorMessage,
  FileProcessingError,
} from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { planToTable, type MergePlan } from "./merge.js";
import {
  decodeText,
  emptyTable,
  encodeText,
  type Table,
  type TextEncodingName,
} from "./table.js";
import { backupStamp, firstFreePath } from "./util.js";

export interface MasterFileOptions {
  mergedFile: string;
  keyColumn: string;
  csvDelimiter: string;
  csvEncoding: TextEncodingName;
  logger?: Logger;
}

export interface CommitOptions extends MasterFileOptions {
  backupDir: string | null;
  backupCount: number;
  dryRun: boolean;
  // swap point for tests that need the final rename to fail
  rename?: (from: string, to: string) => Promise<void>;
}

export interface CommitResult {
  written: boolean;
  bytes: number;
  backup: string | null;
  prunedBackups: string[];
}

/**
 * Read the current master. A missing master is an empty table. One that
 * cannot be decoded or parsed is logged and treated as empty with
 * `fallbackColumns`; the backup taken before the next write keeps its bytes.
 */
export async function readMaster(
  { mergedFile, keyColumn, csvDelimiter, csvEncoding, logger = new NullLogger() }: MasterFileOptions,
  fallbackColumns: readonly string[] = [],
): Promise<Table> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(mergedFile);
  } catch (err) {
    if (errorCode(err) === "ENOENT") return emptyTable();
    throw new FileProcessingError(
      "io-failed",
      `cannot read master ${mergedFile}: ${errorMessage(err)}`,
      mergedFile,
      { cause: err },
    );
  }
  let table: Table;
  try {
    table = parseCsv(decodeText(bytes, csvEncoding), csvDelimiter);
  } catch (err) {
    if (!(err instanceof CsvParseError || err instanceof TypeError || err instanceof RangeError)) {
      throw err;
    }
    logger.warn("master file unreadable; starting from an empty table", {
      file: mergedFile,
      error: errorMessage(err),
    });
    return emptyTable(fallbackColumns);
  }
  if (table.rows.length > 0 && !table.columns.includes(keyColumn)) {
    throw new FileProcessingError(
      "load-failed",
      `master ${mergedFile} has no "${keyColumn}" column`,
      mergedFile,
    );
  }
  return table;
}

const BACKUP_NAME = /^(.*)_(\d{8})_(\d{6})(?:-(\d+))?\.csv$/;

type BackupEntry = { name: string; stamp: string; seq: number };

export async function listBackups(
  backupDir: string,
  mergedFile: string,
): Promise<BackupEntry[]> {
  const stem = path.parse(mergedFile).name;
  let names: string[];
  try {
    names = await fs.readdir(backupDir);
  } catch (err) {
    if (errorCode(err) === "ENOENT") return [];
    throw err;
  }
  const out: BackupEntry[] = [];
  for (const name of names) {
    const m = BACKUP_NAME.exec(name);
    if (!m || m[1] !== stem) continue;
    out.push({ name, stamp: `${m[2]}_${m[3]}`, seq: m[4] ? Number(m[4]) : 0 });
  }
  // oldest first
  return out.sort((a, b) =>
    a.stamp === b.stamp ? a.seq - b.seq : a.stamp < b.stamp ? -1 : 1,
  );
}

export async function backupMaster(
  mergedFile: string,
  backupDir: string,
  now: Date = new Date(),
): Promise<string> {
  await fs.mkdir(backupDir, { recursive: true });
  const stem = path.parse(mergedFile).name;
  const dest = await firstFreePath(
    path.join(backupDir, `${stem}_${backupStamp(now)}`),
    ".csv",
  );
  await fs.copyFile(mergedFile, dest);
  return dest;
}

/** Delete the oldest backups so at most `keep` remain; 0 keeps everything. */
export async function pruneBackups(
  backupDir: string,
  mergedFile: string,
  keep: number,
): Promise<string[]> {
  if (keep <= 0) return [];
  const backups = await listBackups(backupDir, mergedFile);
  const excess = backups.slice(0, Math.max(0, backups.length - keep));
  const removed: string[] = [];
  for (const b of excess) {
    const full = path.join(backupDir, b.name);
    await fs.rm(full, { force: true });
    removed.push(full);
  }
  return removed;
}

/**
 * Write `bytes` to `target` so readers see either the old file or the new
 * one: the data goes to a fresh temp file in the same directory, which is
 * then renamed over `target`.
 */
export async function writeFileAtomic(
  target: string,
  bytes: Uint8Array,
  rename: (from: string, to: string) => Promise<void> = fs.rename,
): Promise<void> {
  const dir = path.dirname(target);
  const tmp = path.join(
    dir,
    `.${path.basename(target)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`,
  );
  try {
    await fs.writeFile(tmp, bytes, { flag: "wx" });
    await rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/**
 * Persist a merge plan as the new master. The caller must hold the master's
 * lock.
 */
export async function commitPlan(
  plan: MergePlan,
  {
    mergedFile,
    csvDelimiter,
    csvEncoding,
    backupDir,
    backupCount,
    dryRun,
    rename,
    logger = new NullLogger(),
  }: CommitOptions,
): Promise<CommitResult> {
  const bytes = encodeText(serializeCsv(planToTable(plan), csvDelimiter), csvEncoding);
  if (dryRun) {
    logger.info("dry run: master not written", {
      file: mergedFile,
      rows: plan.rows.length,
      columns: plan.columns.length,
      bytes: bytes.length,
    });
    return { written: false, bytes: bytes.length, backup: null, prunedBackups: [] };
  }

  let backup: string | null = null;
  let prunedBackups: string[] = [];
  try {
    await fs.mkdir(path.dirname(mergedFile), { recursive: true });
    if (backupDir) {
      try {
        backup = await backupMaster(mergedFile, backupDir);
        logger.info("backup written", { backup });
      } catch (err) {
        if (errorCode(err) !== "ENOENT") throw err;
      }
    }
    await writeFileAtomic(mergedFile, bytes, rename);
  } catch (err) {
    throw new FileProcessingError(
      "write-failed",
      `writing master ${mergedFile} failed: ${errorMessage(err)}`,
      mergedFile,
      { cause: err },
    );
  }
  logger.info("master written", {
    file: mergedFile,
    rows: plan.rows.length,
    columns: plan.columns.length,
  });

  if (backupDir) {
    try {
      prunedBackups = await pruneBackups(backupDir, mergedFile, backupCount);
      if (prunedBackups.length) {
        logger.info("old backups pruned", { removed: prunedBackups.length });
      }
    } catch (err) {
      // the master is already committed at this point
      logger.warn("backup pruning failed", { error: errorMessage(err) });
    }
  }
  return { written: true, bytes: bytes.length, backup, prunedBackups };
}
