// src/status.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { Config } from "./config.js";
import { lockPathFor, pidAlive, readLockHolder, type LockHolder } from "./lock.js";
import { readMetadata, type Metadata } from "./metadata.js";
import { fileExists } from "./util.js";

export interface StatusReport {
  mergedFile: string;
  masterExists: boolean;
  metadataFile: string;
  metadata: Metadata | null;
  lock: (LockHolder & { alive: boolean }) | null;
}

export async function collectStatus(config: Config): Promise<StatusReport> {
  const holder = await readLockHolder(lockPathFor(config.mergedFile));
  return {
    mergedFile: config.mergedFile,
    masterExists: await fileExists(config.mergedFile),
    metadataFile: config.metadataFile,
    metadata: await readMetadata(config.metadataFile),
    lock: holder ? { ...holder, alive: pidAlive(holder.pid) } : null,
  };
}

export function describeLock(lock: StatusReport["lock"]): string {
  if (!lock) return "unlocked";
  const state = lock.alive ? "" : ", stale";
  return `held by pid ${lock.pid} on ${lock.hostname}${state}`;
}

export function renderStatus(status: StatusReport): string {
  const table = new AsciiTable3("csv-fold status")
    .setHeading("Field", "Value")
    .setStyle("unicode-round");
  [1, 2].forEach((idx) => table.setAlign(idx, AlignmentEnum.LEFT));
  const m = status.metadata;
  table.addRowMatrix([
    ["master", status.mergedFile],
    ["master exists", status.masterExists ? "yes" : "no"],
    ["last updated", m?.last_updated ?? "-"],
    ["rows", m ? String(m.row_count) : "-"],
    ["columns", m ? String(m.column_count) : "-"],
    ["column names", m ? m.columns.join(", ") : "-"],
    ["lock", describeLock(status.lock)],
  ]);
  return table.toString();
}
