import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfig, parseConfig } from "../config.js";
import { CONFIG_ENV } from "../constants.js";
import { ConfigurationError } from "../errors.js";

const issuesOf = (raw: unknown): string[] => {
  try {
    parseConfig(raw, { baseDir: "/srv" });
  } catch (err) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  return [];
};

describe("parseConfig", () => {
  test("fills in defaults and resolves paths", () => {
    const config = parseConfig({}, { baseDir: "/srv" });
    expect(config).toMatchObject({
      watchDir: "/srv/csv_inbox",
      archiveDir: "/srv/csv_archive",
      backupDir: "/srv/csv_backups",
      mergedFile: "/srv/final_clusters_data.csv",
      metadataFile: "/srv/merged_metadata.json",
      keyColumn: "cluster_name",
      requiredColumns: [],
      supportedExtensions: [".csv"],
      checksumWaitSeconds: 5,
      chunkSize: 4096,
      maxFileSizeMb: 500,
      lockTimeoutSeconds: 30,
      backupCount: 5,
      sortOutput: false,
      dryRun: false,
      csvDelimiter: ",",
      csvEncoding: "utf-8",
      hashAlgorithm: "md5",
      maxKeysInLog: 20,
      logFile: "/srv/csv_watchdog.log",
      logLevel: "info",
      logToConsole: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  test("normalizes extensions, encodings and levels", () => {
    const config = parseConfig(
      {
        supported_extensions: [".CSV", ".Txt"],
        csv_encoding: "ISO-8859-1",
        hash_algorithm: "SHA256",
        log_level: "WARNING",
        required_columns: ["region", "region", "owner"],
        backup_dir: null,
        log_file: null,
      },
      { baseDir: "/srv" },
    );
    expect(config.supportedExtensions).toEqual([".csv", ".txt"]);
    expect(config.csvEncoding).toBe("latin1");
    expect(config.hashAlgorithm).toBe("sha256");
    expect(config.logLevel).toBe("warn");
    expect(config.requiredColumns).toEqual(["region", "owner"]);
    expect(config.backupDir).toBeNull();
    expect(config.logFile).toBeNull();
  });

  test("command line overrides win", () => {
    const config = parseConfig(
      { backup_count: 3, log_level: "info" },
      { baseDir: "/srv", overrides: { dryRun: true, sortOutput: true, backupCount: 0, logLevel: "debug" } },
    );
    expect(config.dryRun).toBe(true);
    expect(config.sortOutput).toBe(true);
    expect(config.backupCount).toBe(0);
    expect(config.logLevel).toBe("debug");
  });

  test("bad overrides are configuration errors", () => {
    expect(() => parseConfig({}, { overrides: { backupCount: -1 } })).toThrow(
      ConfigurationError,
    );
    expect(() => parseConfig({}, { overrides: { logLevel: "loud" } })).toThrow(
      'unknown log level "loud"',
    );
  });

  test("reports each invalid field", () => {
    expect(issuesOf({ key_column: "  " })).toEqual([
      "key_column: key_column must be a non-empty column name",
    ]);
    expect(issuesOf({ supported_extensions: ["csv"] })).toEqual([
      "supported_extensions.0: extensions must start with '.'",
    ]);
    expect(issuesOf({ csv_encoding: "ebcdic" })).toEqual([
      'csv_encoding: unsupported encoding "ebcdic"',
    ]);
    expect(issuesOf({ hash_algorithm: "crc32" })).toEqual([
      'hash_algorithm: unsupported hash algorithm "crc32"',
    ]);
    expect(issuesOf({ csv_delimiter: '"' })).toEqual([
      "csv_delimiter: csv_delimiter cannot be a quote or line break",
    ]);
    expect(issuesOf({ chunk_size: 0, backup_count: 1.5 })).toHaveLength(2);
  });

  test("unknown keys are rejected", () => {
    expect(issuesOf({ bogus: 1 })).toEqual([
      "(root): Unrecognized key(s) in object: 'bogus'",
    ]);
  });

  test("the error message lists the issues", () => {
    expect(() => parseConfig({ log_level: "loud" })).toThrow(
      "invalid configuration:\n  log_level: log_level must be one of debug, info, warn, error",
    );
  });
});

describe("loadConfig", () => {
  let dir: string;
  const saved = process.env[CONFIG_ENV];
  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "csv-fold-config-"));
  });
  afterEach(async () => {
    if (saved === undefined) delete process.env[CONFIG_ENV];
    else process.env[CONFIG_ENV] = saved;
    await fsp.rm(dir, { recursive: true, force: true });
  });

  test("reads the file named explicitly", async () => {
    const file = path.join(dir, "c.json");
    await fsp.writeFile(
      file,
      JSON.stringify({ watch_dir: path.join(dir, "in"), key_column: "id" }),
    );
    const config = await loadConfig({ configPath: file });
    expect(config.watchDir).toBe(path.join(dir, "in"));
    expect(config.keyColumn).toBe("id");
  });

  test("falls back to the environment variable", async () => {
    const file = path.join(dir, "env.json");
    await fsp.writeFile(file, JSON.stringify({ key_column: "host" }));
    process.env[CONFIG_ENV] = file;
    expect((await loadConfig()).keyColumn).toBe("host");
  });

  test("a missing default file means defaults", async () => {
    process.env[CONFIG_ENV] = path.join(dir, "absent.json");
    expect((await loadConfig()).keyColumn).toBe("cluster_name");
  });

  test("a missing explicit file is an error", async () => {
    const file = path.join(dir, "absent.json");
    await expect(loadConfig({ configPath: file })).rejects.toThrow(
      `cannot read config ${file}`,
    );
  });

  test("invalid JSON is an error", async () => {
    const file = path.join(dir, "bad.json");
    await fsp.writeFile(file, "{ nope");
    const err = await loadConfig({ configPath: file }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err instanceof Error && err.message.startsWith(`config ${file} is not valid JSON`)).toBe(true);
  });
});
