// src/errors.ts

export type ErrorKind =
  | "configuration"
  | "file-processing"
  | "data-validation"
  | "lock-timeout";

export type FileProcessingReason =
  | "file-too-large"
  | "checksum-failed"
  | "encoding-invalid"
  | "load-failed"
  | "write-failed"
  | "archive-failed"
  | "io-failed";

export type DataValidationReason =
  | "empty"
  | "missing-key-column"
  | "missing-required-columns"
  | "null-key-values";

export abstract class CsvFoldError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly reason: string;
  override readonly cause?: unknown;

  constructor(
    message: string,
    public readonly file?: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.cause = options?.cause;
  }

  toLogMeta(): Record<string, unknown> {
    const meta: Record<string, unknown> = {
      kind: this.kind,
      reason: this.reason,
    };
    if (this.file) meta.file = this.file;
    if (this.cause instanceof Error) meta.cause = this.cause.message;
    return meta;
  }
}

export class ConfigurationError extends CsvFoldError {
  readonly kind = "configuration" as const;
  readonly reason = "invalid-config";

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, undefined, options);
    this.name = "ConfigurationError";
  }
}

export class FileProcessingError extends CsvFoldError {
  readonly kind = "file-processing" as const;

  constructor(
    public readonly reason: FileProcessingReason,
    message: string,
    file?: string,
    options?: { cause?: unknown },
  ) {
    super(message, file, options);
    this.name = "FileProcessingError";
  }
}

export class DataValidationError extends CsvFoldError {
  readonly kind = "data-validation" as const;

  constructor(
    public readonly reason: DataValidationReason,
    message: string,
    file?: string,
  ) {
    super(message, file);
    this.name = "DataValidationError";
  }
}

export class LockTimeoutError extends CsvFoldError {
  readonly kind = "lock-timeout" as const;
  readonly reason = "lock-timeout";

  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number,
    public readonly holder?: { pid: number; hostname: string } | null,
  ) {
    super(
      `timed out after ${timeoutMs}ms waiting for lock ${lockPath}` +
        (holder ? ` (held by pid ${holder.pid} on ${holder.hostname})` : ""),
    );
    this.name = "LockTimeoutError";
  }
}

export type Result<T, E = CsvFoldError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({
  ok: true,
  value,
});

export const fail = <E>(error: E): { ok: false; error: E } => ({
  ok: false,
  error,
});

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

// Anything that escapes a per-file step without a type of ours is an I/O
// problem as far as the pass is concerned.
export function asCsvFoldError(err: unknown, file?: string): CsvFoldError {
  if (err instanceof CsvFoldError) return err;
  return new FileProcessingError("io-failed", errorMessage(err), file, {
    cause: err,
  });
}
