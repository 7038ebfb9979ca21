// src/monitor.ts
import fs from "node:fs/promises";
import path from "node:path";
import { archiveFile, summarizeKeys } from "./archive.js";
import { mib, type Config } from "./config.js";
import { asCsvFoldError, type ErrorKind } from "./errors.js";
import { lockPathFor, withLock } from "./lock.js";
import { NullLogger, type Logger } from "./logger.js";
import { mergeTables, type MergeStats } from "./merge.js";
import { buildMetadata, writeMetadata } from "./metadata.js";
import { commitPlan, readMaster } from "./persist.js";
import { scanStableFiles } from "./stability.js";
import { validateFile } from "./validate.js";

export type FileStatus = "merged" | "dry-run" | "failed";

export interface FileOutcome {
  file: string;
  status: FileStatus;
  stats?: MergeStats;
  addedColumns?: string[];
  droppedColumns?: string[];
  archivedTo?: string | null;
  error?: { kind: ErrorKind; reason: string; message: string };
}

export interface PassReport {
  dryRun: boolean;
  stable: string[];
  unstable: string[];
  processed: FileOutcome[];
  failed: FileOutcome[];
}

export interface ProgressEvent {
  index: number;
  total: number;
  file: string;
  status: FileStatus;
}

export interface PassOptions {
  config: Config;
  logger?: Logger;
  onProgress?: (event: ProgressEvent) => void;
  sleep?: (ms: number) => Promise<void>;
  // forwarded to the master write; tests use it to interrupt the rename
  rename?: (from: string, to: string) => Promise<void>;
}

async function ensureDirectories(config: Config): Promise<void> {
  const dirs = new Set([
    config.watchDir,
    config.archiveDir,
    path.dirname(config.mergedFile),
    path.dirname(config.metadataFile),
  ]);
  if (config.backupDir) dirs.add(config.backupDir);
  for (const dir of dirs) {
    await fs.mkdir(dir, { recursive: true });
  }
}

/**
 * Validate `file`, then under the master's lock read the master, merge,
 * write it, refresh metadata and archive the source. Throws on any failure;
 * the file then stays where it is.
 */
export async function processFile(
  file: string,
  { config, logger = new NullLogger(), rename }: PassOptions,
): Promise<FileOutcome> {
  const log = logger.child("file");
  const { dryRun } = config;
  log.info("processing", { file, dryRun });

  const validated = await validateFile(file, {
    encoding: config.csvEncoding,
    delimiter: config.csvDelimiter,
    keyColumn: config.keyColumn,
    requiredColumns: config.requiredColumns,
  });
  if (!validated.ok) throw validated.error;
  const incoming = validated.value;

  const masterOpts = {
    mergedFile: config.mergedFile,
    keyColumn: config.keyColumn,
    csvDelimiter: config.csvDelimiter,
    csvEncoding: config.csvEncoding,
    logger: log,
  };

  const mergeUnderLock = async (): Promise<FileOutcome> => {
    const base = await readMaster(masterOpts, incoming.columns);
    const plan = mergeTables(base, incoming, {
      keyColumn: config.keyColumn,
      sortByKey: config.sortOutput,
    });
    if (base.columns.length > 0 && plan.addedColumns.length) {
      log.info("new columns", { file, columns: plan.addedColumns });
    }
    for (const col of plan.droppedColumns) {
      log.info("dropped obsolete column", { file, column: col });
    }
    if (plan.stats.collapsedDuplicates > 0) {
      log.warn("duplicate keys collapsed, last row kept", {
        file,
        rows: plan.stats.collapsedDuplicates,
      });
    }

    await commitPlan(plan, {
      ...masterOpts,
      backupDir: config.backupDir,
      backupCount: config.backupCount,
      dryRun,
      rename,
    });

    const outcome: FileOutcome = {
      file,
      status: dryRun ? "dry-run" : "merged",
      stats: plan.stats,
      addedColumns: plan.addedColumns,
      droppedColumns: plan.droppedColumns,
      archivedTo: null,
    };
    if (dryRun) {
      log.info("dry run: skipping metadata and archive", { file });
      return outcome;
    }

    await writeMetadata(
      config.metadataFile,
      buildMetadata({ columns: plan.columns, rows: plan.rows }),
    );
    outcome.archivedTo = await archiveFile(file, config.archiveDir);
    log.info("archived", {
      file,
      to: outcome.archivedTo,
      keys: summarizeKeys(plan.newKeys, config.maxKeysInLog),
    });
    return outcome;
  };

  // a dry run leaves the filesystem alone, lock file included
  if (dryRun) return mergeUnderLock();
  return withLock(
    lockPathFor(config.mergedFile),
    { timeoutMs: config.lockTimeoutSeconds * 1000, logger: log },
    mergeUnderLock,
  );
}

/**
 * One full pass over the watch directory. Files are handled one at a time in
 * name order; a failure is logged and recorded and the pass moves on.
 */
export async function runPass({
  config,
  logger = new NullLogger(),
  onProgress,
  sleep,
  rename,
}: PassOptions): Promise<PassReport> {
  const log = logger.child("monitor");
  log.info("pass start", { watchDir: config.watchDir, dryRun: config.dryRun });
  if (!config.dryRun) {
    await ensureDirectories(config);
  }

  const scan = await scanStableFiles(config.watchDir, {
    extensions: config.supportedExtensions,
    waitMs: config.checksumWaitSeconds * 1000,
    algorithm: config.hashAlgorithm,
    chunkSize: config.chunkSize,
    maxBytes: mib(config.maxFileSizeMb),
    logger: logger.child("stability"),
    sleep,
  });

  const report: PassReport = {
    dryRun: config.dryRun,
    stable: scan.stable,
    unstable: scan.records.filter((r) => !r.stable).map((r) => r.path),
    processed: [],
    failed: [],
  };

  const total = scan.stable.length;
  for (const [idx, file] of scan.stable.entries()) {
    let outcome: FileOutcome;
    try {
      outcome = await processFile(file, { config, logger, rename });
      report.processed.push(outcome);
    } catch (err) {
      const e = asCsvFoldError(err, file);
      log.error(`failed to process ${path.basename(file)}: ${e.message}`, {
        ...e.toLogMeta(),
        file,
      });
      outcome = {
        file,
        status: "failed",
        error: { kind: e.kind, reason: e.reason, message: e.message },
      };
      report.failed.push(outcome);
    }
    onProgress?.({ index: idx + 1, total, file, status: outcome.status });
  }

  log.info("pass complete", {
    stable: report.stable.length,
    unstable: report.unstable.length,
    processed: report.processed.length,
    failed: report.failed.length,
  });
  return report;
}
