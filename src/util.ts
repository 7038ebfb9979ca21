import fs from "node:fs/promises";
import { errorCode } from "./errors.js";

export function wait(ms: number) {
  return ms > 0
    ? new Promise<void>((resolve) => setTimeout(resolve, ms))
    : Promise.resolve();
}

export async function fileExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/** Local time as `YYYYMMDDTHHMMSS.mmm` (archive suffix). */
export function archiveStamp(d: Date = new Date()): string {
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}` +
    `T${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}` +
    `.${pad(d.getMilliseconds(), 3)}`
  );
}

/** Local time as `YYYYMMDD_HHMMSS` (backup names). */
export function backupStamp(d: Date = new Date()): string {
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}` +
    `_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  );
}

/**
 * First of `candidate`, `candidate-1`, `candidate-2`, ... (the counter goes
 * before `ext`) that does not exist yet.
 */
export async function firstFreePath(
  stem: string,
  ext = "",
): Promise<string> {
  let candidate = stem + ext;
  for (let n = 1; await fileExists(candidate); n++) {
    candidate = `${stem}-${n}${ext}`;
  }
  return candidate;
}
