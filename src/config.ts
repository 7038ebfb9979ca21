// src/config.ts
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CONFIG_ENV, DEFAULT_CONFIG_PATH } from "./constants.js";
import { ConfigurationError, errorCode, errorMessage } from "./errors.js";
import { normalizeHashAlg, type HashAlg } from "./hash.js";
import { LOG_LEVELS, normalizeLogLevel, type LogLevel } from "./logger.js";
import { normalizeEncoding, type TextEncodingName } from "./table.js";

const nonEmpty = z.string().trim().min(1);

const fileSchema = z
  .object({
    watch_dir: nonEmpty.default("csv_inbox"),
    archive_dir: nonEmpty.default("csv_archive"),
    backup_dir: nonEmpty.nullable().default("csv_backups"),
    merged_file: nonEmpty.default("final_clusters_data.csv"),
    metadata_file: nonEmpty.default("merged_metadata.json"),
    key_column: z
      .string()
      .trim()
      .min(1, "key_column must be a non-empty column name")
      .default("cluster_name"),
    required_columns: z.array(nonEmpty).default([]),
    supported_extensions: z
      .array(
        z.string().regex(/^\.[^./\\]+$/, "extensions must start with '.'"),
      )
      .min(1)
      .default([".csv"]),
    checksum_wait_seconds: z.number().nonnegative().default(5),
    chunk_size: z.number().int().positive().default(4096),
    max_file_size_mb: z.number().positive().default(500),
    lock_timeout_seconds: z.number().nonnegative().default(30),
    backup_count: z.number().int().nonnegative().default(5),
    sort_output: z.boolean().default(false),
    dry_run: z.boolean().default(false),
    csv_delimiter: z
      .string()
      .length(1, "csv_delimiter must be a single character")
      .refine((d) => d !== '"' && d !== "\r" && d !== "\n", {
        message: "csv_delimiter cannot be a quote or line break",
      })
      .default(","),
    csv_encoding: z
      .string()
      .transform((raw, ctx) => {
        const enc = normalizeEncoding(raw);
        if (!enc) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unsupported encoding "${raw}"`,
          });
          return z.NEVER;
        }
        return enc;
      })
      .default("utf-8"),
    hash_algorithm: z
      .string()
      .transform((raw, ctx) => {
        const alg = normalizeHashAlg(raw);
        if (!alg) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unsupported hash algorithm "${raw}"`,
          });
          return z.NEVER;
        }
        return alg;
      })
      .default("md5"),
    max_keys_in_log: z.number().int().nonnegative().default(20),
    log_file: nonEmpty.nullable().default("csv_watchdog.log"),
    log_level: z
      .string()
      .transform((raw, ctx) => {
        const lvl = normalizeLogLevel(raw);
        if (!lvl) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `log_level must be one of ${LOG_LEVELS.join(", ")}`,
          });
          return z.NEVER;
        }
        return lvl;
      })
      .default("info"),
    log_to_console: z.boolean().default(false),
    log_max_bytes: z.number().int().positive().default(1_048_576),
    log_backup_count: z.number().int().nonnegative().default(5),
  })
  .strict();

export type ConfigFile = z.input<typeof fileSchema>;

export interface Config {
  readonly watchDir: string;
  readonly archiveDir: string;
  readonly backupDir: string | null;
  readonly mergedFile: string;
  readonly metadataFile: string;
  readonly keyColumn: string;
  readonly requiredColumns: readonly string[];
  readonly supportedExtensions: readonly string[];
  readonly checksumWaitSeconds: number;
  readonly chunkSize: number;
  readonly maxFileSizeMb: number;
  readonly lockTimeoutSeconds: number;
  readonly backupCount: number;
  readonly sortOutput: boolean;
  readonly dryRun: boolean;
  readonly csvDelimiter: string;
  readonly csvEncoding: TextEncodingName;
  readonly hashAlgorithm: HashAlg;
  readonly maxKeysInLog: number;
  readonly logFile: string | null;
  readonly logLevel: LogLevel;
  readonly logToConsole: boolean;
  readonly logMaxBytes: number;
  readonly logBackupCount: number;
}

export interface ConfigOverrides {
  dryRun?: boolean;
  sortOutput?: boolean;
  backupCount?: number;
  logLevel?: string;
}

function formatIssues(err: z.ZodError): string[] {
  return err.issues.map((issue) => {
    const where = issue.path.length ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate a raw config object (snake_case, as stored on disk) and return the
 * frozen runtime config. Relative paths resolve against `baseDir`.
 */
export function parseConfig(
  raw: unknown,
  { baseDir = process.cwd(), overrides = {} }: { baseDir?: string; overrides?: ConfigOverrides } = {},
): Config {
  const parsed = fileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(
      `invalid configuration:\n  ${issues.join("\n  ")}`,
      issues,
    );
  }
  const c = parsed.data;
  const abs = (p: string) => path.resolve(baseDir, p);

  if (overrides.backupCount != null) {
    if (!Number.isInteger(overrides.backupCount) || overrides.backupCount < 0) {
      throw new ConfigurationError(
        `--backup-count must be a non-negative integer, got ${overrides.backupCount}`,
      );
    }
  }
  let logLevel = c.log_level;
  if (overrides.logLevel != null) {
    const lvl = normalizeLogLevel(overrides.logLevel);
    if (!lvl) {
      throw new ConfigurationError(`unknown log level "${overrides.logLevel}"`);
    }
    logLevel = lvl;
  }

  const config: Config = {
    watchDir: abs(c.watch_dir),
    archiveDir: abs(c.archive_dir),
    backupDir: c.backup_dir == null ? null : abs(c.backup_dir),
    mergedFile: abs(c.merged_file),
    metadataFile: abs(c.metadata_file),
    keyColumn: c.key_column,
    requiredColumns: Object.freeze([...new Set(c.required_columns)]),
    supportedExtensions: Object.freeze(
      c.supported_extensions.map((e) => e.toLowerCase()),
    ),
    checksumWaitSeconds: c.checksum_wait_seconds,
    chunkSize: c.chunk_size,
    maxFileSizeMb: c.max_file_size_mb,
    lockTimeoutSeconds: c.lock_timeout_seconds,
    backupCount: overrides.backupCount ?? c.backup_count,
    sortOutput: overrides.sortOutput || c.sort_output,
    dryRun: overrides.dryRun || c.dry_run,
    csvDelimiter: c.csv_delimiter,
    csvEncoding: c.csv_encoding,
    hashAlgorithm: c.hash_algorithm,
    maxKeysInLog: c.max_keys_in_log,
    logFile: c.log_file == null ? null : abs(c.log_file),
    logLevel,
    logToConsole: c.log_to_console,
    logMaxBytes: c.log_max_bytes,
    logBackupCount: c.log_backup_count,
  };
  return Object.freeze(config);
}

export function resolveConfigPath(explicit?: string): string {
  return path.resolve(explicit ?? process.env[CONFIG_ENV] ?? DEFAULT_CONFIG_PATH);
}

/**
 * Load the JSON config at `configPath`. A missing file means "all defaults"
 * unless the path was asked for explicitly.
 */
export async function loadConfig({
  configPath,
  overrides,
}: { configPath?: string; overrides?: ConfigOverrides } = {}): Promise<Config> {
  const file = resolveConfigPath(configPath);
  let raw: unknown = {};
  try {
    raw = JSON.parse(await fs.readFile(file, "utf8"));
  } catch (err) {
    if (errorCode(err) === "ENOENT" && configPath == null) {
      raw = {};
    } else if (err instanceof SyntaxError) {
      throw new ConfigurationError(`config ${file} is not valid JSON: ${err.message}`, [], { cause: err });
    } else {
      throw new ConfigurationError(`cannot read config ${file}: ${errorMessage(err)}`, [], { cause: err });
    }
  }
  return parseConfig(raw, { baseDir: process.cwd(), overrides });
}

export function mib(n: number): number {
  return Math.floor(n * 1024 * 1024);
}
