// src/watch.ts
import chokidar, { type FSWatcher } from "chokidar";
import path from "node:path";
import { errorMessage } from "./errors.js";
import { NullLogger } from "./logger.js";
import { runPass, type PassOptions, type PassReport } from "./monitor.js";
import { hasSupportedExtension } from "./stability.js";

const MIN_DEBOUNCE_MS = 250;

/**
 * Runs `pass` after `debounceMs` of quiet following a trigger. Passes never
 * overlap: triggers that arrive while one is running collapse into a single
 * follow-up pass.
 */
export class PassScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private pending = false;
  private closed = false;

  constructor(
    private readonly pass: () => Promise<void>,
    private readonly debounceMs: number,
    private readonly onError: (err: unknown) => void = () => {},
  ) {}

  get busy(): boolean {
    return this.running != null;
  }

  trigger(): void {
    if (this.closed) return;
    if (this.running) {
      this.pending = true;
      return;
    }
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.start();
    }, this.debounceMs);
  }

  /** Start a pass now (or right after the current one). */
  runNow(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      this.pending = true;
      return this.running;
    }
    return this.start();
  }

  private start(): Promise<void> {
    const current = (async () => {
      try {
        await this.pass();
      } catch (err) {
        this.onError(err);
      } finally {
        this.running = null;
      }
      if (this.pending && !this.closed) {
        this.pending = false;
        this.trigger();
      }
    })();
    this.running = current;
    return current;
  }

  /** Stop scheduling; resolves once an in-flight pass has finished. */
  async close(): Promise<void> {
    this.closed = true;
    this.pending = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.running;
  }
}

export interface WatchHandle {
  close(): Promise<void>;
  scheduler: PassScheduler;
}

export interface WatchOptions extends PassOptions {
  onReport?: (report: PassReport) => void;
}

/**
 * Run one pass now, then another whenever a supported file shows up or
 * changes in the watch directory.
 */
export async function startWatch({
  config,
  logger = new NullLogger(),
  onReport,
  ...passOpts
}: WatchOptions): Promise<WatchHandle> {
  const log = logger.child("watch");
  const scheduler = new PassScheduler(
    async () => {
      const report = await runPass({ config, logger, ...passOpts });
      onReport?.(report);
    },
    Math.max(MIN_DEBOUNCE_MS, config.checksumWaitSeconds * 1000),
    (err) => log.error("pass failed", { error: errorMessage(err) }),
  );

  await scheduler.runNow();

  const watcher: FSWatcher = chokidar.watch(config.watchDir, {
    persistent: true,
    ignoreInitial: true,
    depth: 0,
    followSymlinks: false,
  });
  const onEvent = (evt: string, abs: string) => {
    if (path.dirname(abs) !== config.watchDir) return;
    if (!hasSupportedExtension(path.basename(abs), config.supportedExtensions)) {
      return;
    }
    log.debug("file event", { evt, file: abs });
    scheduler.trigger();
  };
  watcher.on("add", (p) => onEvent("add", p));
  watcher.on("change", (p) => onEvent("change", p));
  watcher.on("error", (err) => {
    log.error("watch error", { error: errorMessage(err) });
  });
  watcher.once("ready", () => {
    log.info("watching", { dir: config.watchDir });
  });

  return {
    scheduler,
    close: async () => {
      await watcher.close();
      await scheduler.close();
    },
  };
}
