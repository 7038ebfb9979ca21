#!/usr/bin/env node
// src/cli.ts
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { cliEntrypoint } from "./cli-util.js";
import { loadConfig, type Config, type ConfigOverrides } from "./config.js";
import { CLI_NAME, CONFIG_ENV } from "./constants.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { createRotatingFileSink } from "./log-file.js";
import {
  LOG_LEVELS,
  StructuredLogger,
  type Logger,
} from "./logger.js";
import { runPass, type ProgressEvent } from "./monitor.js";
import { collectStatus, renderStatus } from "./status.js";
import { startWatch, type WatchHandle } from "./watch.js";

type GlobalOpts = {
  configPath?: string;
  dryRun?: boolean;
  sortOutput?: boolean;
  backupCount?: number;
  progress?: boolean;
  logLevel?: string;
};

function parseCount(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return n;
}

function overridesFrom(opts: GlobalOpts): ConfigOverrides {
  return {
    dryRun: opts.dryRun,
    sortOutput: opts.sortOutput,
    backupCount: opts.backupCount,
    logLevel: opts.logLevel,
  };
}

export interface AppLogger {
  logger: Logger;
  close(): void;
}

/**
 * File sink per config, plus stderr echo when asked for (or when there is no
 * log file, so nothing is silently discarded).
 */
export function createAppLogger(
  config: Config,
  { console: forceConsole = false }: { console?: boolean } = {},
): AppLogger {
  const file = config.logFile
    ? createRotatingFileSink(config.logFile, {
        maxBytes: config.logMaxBytes,
        backupCount: config.logBackupCount,
      })
    : null;
  const echo = forceConsole || config.logToConsole || !file;
  const logger = new StructuredLogger({
    minLevel: config.logLevel,
    sink: file?.sink,
    echo: echo ? { minLevel: config.logLevel } : undefined,
  });
  return { logger, close: () => file?.close() };
}

function progressPrinter(event: ProgressEvent): void {
  process.stderr.write(
    `[${event.index}/${event.total}] ${path.basename(event.file)} ${event.status}\n`,
  );
}

async function loadOrReport(opts: GlobalOpts): Promise<Config | null> {
  try {
    return await loadConfig({
      configPath: opts.configPath,
      overrides: overridesFrom(opts),
    });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`${CLI_NAME}: ${err.message}`);
      return null;
    }
    throw err;
  }
}

export async function runOnce(opts: GlobalOpts): Promise<number> {
  const config = await loadOrReport(opts);
  if (!config) return 1;
  const { logger, close } = createAppLogger(config);
  try {
    logger.info("=== monitor start ===", { dryRun: config.dryRun });
    const report = await runPass({
      config,
      logger,
      onProgress: opts.progress ? progressPrinter : undefined,
    });
    logger.info("=== monitor complete ===", {
      processed: report.processed.length,
      failed: report.failed.length,
    });
    return 0;
  } catch (err) {
    logger.error("fatal error", {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    return 1;
  } finally {
    close();
  }
}

async function watchForever(opts: GlobalOpts): Promise<number> {
  const config = await loadOrReport(opts);
  if (!config) return 1;
  const { logger, close } = createAppLogger(config, { console: true });
  let watching: WatchHandle;
  try {
    watching = await startWatch({
      config,
      logger,
      onProgress: opts.progress ? progressPrinter : undefined,
    });
  } catch (err) {
    logger.error("fatal error", { error: errorMessage(err) });
    close();
    return 1;
  }
  await new Promise<void>((resolve) => {
    const stop = () => {
      logger.info("stopping");
      watching.close().then(resolve, (err: unknown) => {
        logger.error("shutdown failed", { error: errorMessage(err) });
        resolve();
      });
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
  });
  close();
  return 0;
}

async function showStatus(opts: GlobalOpts & { json?: boolean }): Promise<number> {
  const config = await loadOrReport(opts);
  if (!config) return 1;
  const status = await collectStatus(config);
  if (opts.json) {
    console.log(JSON.stringify(status, null, 2));
  } else {
    console.log(renderStatus(status));
  }
  return 0;
}

export function buildProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Fold CSV files dropped into a watch directory into one keyed master CSV",
    )
    .option(
      "--config-path <file>",
      `JSON config file (default: $${CONFIG_ENV} or ./config.json)`,
    )
    .option("--dry-run", "simulate only: no writing or archiving", false)
    .option("--sort-output", "sort the master by the key column", false)
    .option(
      "--backup-count <n>",
      "master backups to keep (0 keeps all)",
      parseCount,
    )
    .option("--progress", "print one line per processed file", false)
    .option("--log-level <level>", `log verbosity (${LOG_LEVELS.join(", ")})`);

  program
    .command("run", { isDefault: true })
    .description("scan the watch directory once and merge every stable file")
    .action(async (_opts: unknown, command: Command) => {
      process.exitCode = await runOnce(command.optsWithGlobals<GlobalOpts>());
    });

  program
    .command("watch")
    .description("run a pass now and again whenever the watch directory changes")
    .action(async (_opts: unknown, command: Command) => {
      process.exitCode = await watchForever(command.optsWithGlobals<GlobalOpts>());
    });

  program
    .command("status")
    .description("show master metadata and lock state")
    .option("--json", "print JSON instead of a table", false)
    .action(async (_opts: unknown, command: Command) => {
      process.exitCode = await showStatus(
        command.optsWithGlobals<GlobalOpts & { json?: boolean }>(),
      );
    });

  return program;
}

cliEntrypoint(module, buildProgram, { label: CLI_NAME });
