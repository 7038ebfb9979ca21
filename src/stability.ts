// src/stability.ts
import fs from "node:fs/promises";
import path from "node:path";
import { errorCode, type FileProcessingError, type Result } from "./errors.js";
import { fileDigest, type DigestOptions } from "./hash.js";
import { NullLogger, type Logger } from "./logger.js";
import { compareStrings } from "./merge.js";
import { wait } from "./util.js";

export type StabilityOptions = DigestOptions & {
  extensions: readonly string[];
  waitMs: number;
  logger?: Logger;
  // replaced in tests to act while the scan is waiting
  sleep?: (ms: number) => Promise<void>;
};

export type StabilityRecord = {
  path: string;
  first: Result<string, FileProcessingError>;
  second: Result<string, FileProcessingError> | null;
  waitedMs: number;
  stable: boolean;
  reason?: "changed" | "first-digest-failed" | "second-digest-failed";
};

export type StabilityScan = {
  stable: string[];
  records: StabilityRecord[];
};

export function hasSupportedExtension(
  name: string,
  extensions: readonly string[],
): boolean {
  const lower = name.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext.toLowerCase()));
}

export async function listCandidates(
  dir: string,
  extensions: readonly string[],
): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && hasSupportedExtension(e.name, extensions))
    .map((e) => e.name)
    .sort(compareStrings)
    .map((name) => path.join(dir, name));
}

/**
 * Two-pass stability check: digest every candidate, wait `waitMs`, digest
 * again. A file is stable only if both digests succeeded and agree. Unstable
 * files are skipped for this pass; the next invocation looks at them again.
 * Stable paths come back sorted by name.
 */
export async function scanStableFiles(
  dir: string,
  opts: StabilityOptions,
): Promise<StabilityScan> {
  const logger = opts.logger ?? new NullLogger();
  const sleep = opts.sleep ?? wait;

  let candidates: string[];
  try {
    candidates = await listCandidates(dir, opts.extensions);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      logger.warn("watch directory does not exist", { dir });
      return { stable: [], records: [] };
    }
    throw err;
  }
  logger.info("scanning for stable files", {
    dir,
    candidates: candidates.length,
  });
  if (candidates.length === 0) {
    return { stable: [], records: [] };
  }

  const first = new Map<string, Result<string, FileProcessingError>>();
  for (const file of candidates) {
    first.set(file, await fileDigest(file, opts));
  }

  const started = Date.now();
  await sleep(opts.waitMs);
  const waitedMs = Date.now() - started;

  const records: StabilityRecord[] = [];
  for (const file of candidates) {
    const a = first.get(file);
    if (!a) continue;
    if (!a.ok) {
      logger.warn("unstable or unreadable", {
        file,
        error: a.error.message,
        reason: a.error.reason,
      });
      records.push({
        path: file,
        first: a,
        second: null,
        waitedMs,
        stable: false,
        reason: "first-digest-failed",
      });
      continue;
    }
    const b = await fileDigest(file, opts);
    const stable = b.ok && b.value === a.value;
    const reason = stable ? undefined : b.ok ? "changed" : "second-digest-failed";
    if (!stable) {
      logger.warn("unstable or unreadable", { file, reason });
    }
    records.push({ path: file, first: a, second: b, waitedMs, stable, reason });
  }

  return {
    stable: records.filter((r) => r.stable).map((r) => r.path),
    records,
  };
}
