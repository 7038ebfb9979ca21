// src/log-file.ts
import fs from "node:fs";
import path from "node:path";
import { formatLogLine, type LogEntry, type Sink } from "./logger.js";

export interface RotatingFileSinkOptions {
  maxBytes: number;
  backupCount: number;
}

export interface RotatingFileSink {
  sink: Sink;
  close(): void;
}

/**
 * Appends formatted log lines to `file`. When the next line would push the
 * file past `maxBytes` it is shifted to `file.1` (and `.1` to `.2`, ...),
 * keeping at most `backupCount` rotated files. With `backupCount` 0 the file
 * is truncated instead.
 */
export function createRotatingFileSink(
  file: string,
  { maxBytes, backupCount }: RotatingFileSinkOptions,
): RotatingFileSink {
  fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  let fd = fs.openSync(file, "a");
  let size = fs.fstatSync(fd).size;

  const rotate = () => {
    fs.closeSync(fd);
    if (backupCount > 0) {
      const oldest = `${file}.${backupCount}`;
      fs.rmSync(oldest, { force: true });
      for (let i = backupCount - 1; i >= 1; i--) {
        const from = `${file}.${i}`;
        if (fs.existsSync(from)) {
          fs.renameSync(from, `${file}.${i + 1}`);
        }
      }
      fs.renameSync(file, `${file}.1`);
      fd = fs.openSync(file, "a");
    } else {
      fd = fs.openSync(file, "w");
    }
    size = 0;
  };

  const sink = (entry: LogEntry) => {
    const line = Buffer.from(formatLogLine(entry) + "\n", "utf8");
    if (size > 0 && size + line.length > maxBytes) {
      rotate();
    }
    fs.writeSync(fd, line);
    size += line.length;
  };

  let closed = false;
  return {
    sink: (entry) => {
      if (!closed) sink(entry);
    },
    close: () => {
      if (closed) return;
      closed = true;
      fs.closeSync(fd);
    },
  };
}
