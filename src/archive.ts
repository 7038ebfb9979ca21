// src/archive.ts
import fs from "node:fs/promises";
import path from "node:path";
import { errorCode, errorMessage, FileProcessingError } from "./errors.js";
import { compareKeys } from "./merge.js";
import { archiveStamp, firstFreePath } from "./util.js";

/**
 * Move `src` into `archiveDir` as `<name>.<YYYYMMDDTHHMMSS.mmm>`. Two files
 * archived within the same millisecond get a `-<n>` counter.
 */
export async function archiveFile(
  src: string,
  archiveDir: string,
  now: Date = new Date(),
): Promise<string> {
  try {
    await fs.mkdir(archiveDir, { recursive: true });
    const dest = await firstFreePath(
      path.join(archiveDir, `${path.basename(src)}.${archiveStamp(now)}`),
    );
    try {
      await fs.rename(src, dest);
    } catch (err) {
      if (errorCode(err) !== "EXDEV") throw err;
      await fs.copyFile(src, dest);
      await fs.unlink(src);
    }
    return dest;
  } catch (err) {
    throw new FileProcessingError(
      "archive-failed",
      `archiving ${src} failed: ${errorMessage(err)}`,
      src,
      { cause: err },
    );
  }
}

/** Sorted key list for log lines, cut at `limit` with a total. */
export function summarizeKeys(keys: readonly string[], limit: number): string {
  const shown = [...keys].sort(compareKeys).slice(0, limit);
  let text = shown.join(", ");
  if (keys.length > limit) {
    text += `... (${keys.length} total)`;
  }
  return text;
}
