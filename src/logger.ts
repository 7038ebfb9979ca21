import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown> | null;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type Sink = (entry: LogEntry) => void;
type EchoWriter = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  minLevel?: LogLevel;
  sink?: Sink;
  echo?: {
    minLevel?: LogLevel;
    writer?: EchoWriter;
  };
  clock?: () => number;
}

const defaultClock = () => Date.now();

function isEchoSuppressed(): boolean {
  const raw = process.env.CSV_FOLD_DISABLE_LOG_ECHO;
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return false;
  return normalized !== "0" && normalized !== "false";
}

export function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

/** `2026-01-02T03:04:05.000Z - INFO - [monitor] message {"k":1}` */
export function formatLogLine(entry: LogEntry): string {
  const scope = entry.scope ? `[${entry.scope}] ` : "";
  const meta =
    entry.meta && Object.keys(entry.meta).length
      ? ` ${serializeMeta(entry.meta)}`
      : "";
  return `${new Date(entry.ts).toISOString()} - ${entry.level.toUpperCase()} - ${scope}${entry.message}${meta}`;
}

const defaultEchoWriter: EchoWriter = (entry) => {
  if (isEchoSuppressed()) return;
  console.error(formatLogLine(entry));
};

export class StructuredLogger implements Logger {
  private readonly sink: Sink;
  private readonly minLevel: LogLevel;
  private readonly echoMinLevel?: LogLevel;
  private readonly echoWriter: EchoWriter;
  private readonly clock: () => number;
  private readonly scope?: string;

  constructor({ scope, minLevel, sink, echo, clock }: LoggerOptions = {}) {
    this.scope = scope;
    this.minLevel = minLevel ?? "debug";
    this.sink = sink ?? (() => {});
    this.echoMinLevel = echo?.minLevel;
    this.echoWriter = echo?.writer ?? defaultEchoWriter;
    this.clock = clock ?? defaultClock;
  }

  child(scope: string): Logger {
    const childScope = this.scope ? `${this.scope}.${scope}` : scope;
    return new StructuredLogger({
      scope: childScope,
      minLevel: this.minLevel,
      sink: this.sink,
      echo: this.echoMinLevel
        ? { minLevel: this.echoMinLevel, writer: this.echoWriter }
        : undefined,
      clock: this.clock,
    });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    const entry: LogEntry = {
      ts: this.clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.sink(entry);
    if (this.echoMinLevel && levelAtOrAbove(this.echoMinLevel, level)) {
      this.echoWriter(entry);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return levelAtOrAbove(this.minLevel, level);
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

/** Collects entries in memory; handy in tests and for dry-run reports. */
export class MemoryLogger extends StructuredLogger {
  readonly entries: LogEntry[];

  constructor(minLevel: LogLevel = "debug") {
    const entries: LogEntry[] = [];
    super({ minLevel, sink: (entry) => entries.push(entry) });
    this.entries = entries;
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((e) => level == null || e.level === level)
      .map((e) => e.message);
  }
}

export function isLogLevel(raw: string): raw is LogLevel {
  return LOG_LEVELS.some((lvl) => lvl === raw);
}

export function normalizeLogLevel(raw: string): LogLevel | null {
  const normalized = raw.trim().toLowerCase();
  // older config files spell these WARNING / CRITICAL
  if (normalized === "warning") return "warn";
  if (normalized === "critical") return "error";
  return isLogLevel(normalized) ? normalized : null;
}

export function levelAtOrAbove(
  desired: LogLevel,
  candidate: LogLevel,
): boolean {
  return LEVEL_ORDER[candidate] >= LEVEL_ORDER[desired];
}
