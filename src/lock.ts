// src/lock.ts
import { randomBytes } from "node:crypto";
import fs, { type FileHandle } from "node:fs/promises";
import os from "node:os";
import { LOCK_POLL_MS, LOCK_SUFFIX } from "./constants.js";
import { errorCode, LockTimeoutError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { wait } from "./util.js";

export interface LockHolder {
  pid: number;
  hostname: string;
  acquiredAt: string;
}

export interface FileLockOptions {
  timeoutMs: number;
  pollMs?: number;
  logger?: Logger;
}

export function lockPathFor(target: string): string {
  return target + LOCK_SUFFIX;
}

function parseHolder(text: string): LockHolder | null {
  try {
    const data: unknown = JSON.parse(text);
    if (
      data &&
      typeof data === "object" &&
      "pid" in data &&
      typeof data.pid === "number" &&
      "hostname" in data &&
      typeof data.hostname === "string"
    ) {
      const acquiredAt =
        "acquiredAt" in data && typeof data.acquiredAt === "string"
          ? data.acquiredAt
          : "";
      return { pid: data.pid, hostname: data.hostname, acquiredAt };
    }
  } catch {
    // a half-written or foreign lock file; treated as held
  }
  return null;
}

export async function readLockHolder(lockPath: string): Promise<LockHolder | null> {
  try {
    return parseHolder(await fs.readFile(lockPath, "utf8"));
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    throw err;
  }
}

function sameHolder(a: LockHolder | null, b: LockHolder): boolean {
  return (
    a != null &&
    a.pid === b.pid &&
    a.hostname === b.hostname &&
    a.acquiredAt === b.acquiredAt
  );
}

export function pidAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists but belongs to someone else
    return errorCode(err) === "EPERM";
  }
}

/**
 * Advisory cross-process lock: a file created with O_EXCL next to the
 * resource, holding the owner's pid and hostname. A lock left behind by a
 * dead process on this host is taken over.
 */
export class FileLock {
  private held = false;
  private readonly timeoutMs: number;
  private readonly pollMs: number;
  private readonly logger: Logger;
  private readonly token: LockHolder;

  constructor(
    readonly lockPath: string,
    { timeoutMs, pollMs = LOCK_POLL_MS, logger }: FileLockOptions,
  ) {
    this.timeoutMs = timeoutMs;
    this.pollMs = pollMs;
    this.logger = logger ?? new NullLogger();
    this.token = {
      pid: process.pid,
      hostname: os.hostname(),
      acquiredAt: "",
    };
  }

  get isHeld(): boolean {
    return this.held;
  }

  private async tryCreate(): Promise<boolean> {
    const holder = { ...this.token, acquiredAt: new Date().toISOString() };
    let handle: FileHandle;
    try {
      handle = await fs.open(this.lockPath, "wx");
    } catch (err) {
      if (errorCode(err) === "EEXIST") return false;
      throw err;
    }
    try {
      await handle.writeFile(JSON.stringify(holder));
    } finally {
      await handle.close();
    }
    return true;
  }

  /**
   * Take a dead holder's lock out of the way. The file is renamed aside
   * first, so of several contenders only one moves it; whoever moved it
   * checks it is still the dead holder's and puts it back otherwise.
   * Returns true when the caller should retry creating the lock.
   */
  private async clearIfStale(): Promise<boolean> {
    const holder = await readLockHolder(this.lockPath);
    if (!holder) return false;
    if (holder.hostname !== this.token.hostname) return false;
    if (holder.pid === process.pid || pidAlive(holder.pid)) return false;

    const aside = `${this.lockPath}.${process.pid}.${randomBytes(4).toString("hex")}.stale`;
    try {
      await fs.rename(this.lockPath, aside);
    } catch (err) {
      // someone else moved it first
      if (errorCode(err) === "ENOENT") return true;
      throw err;
    }

    const moved = await readLockHolder(aside);
    if (!sameHolder(moved, holder)) {
      // a fresh lock was created between our read and the rename
      try {
        await fs.link(aside, this.lockPath);
      } catch (err) {
        if (errorCode(err) !== "EEXIST") throw err;
        this.logger.warn("could not restore a lock moved during takeover", {
          lock: this.lockPath,
          pid: moved?.pid,
        });
      }
      await fs.rm(aside, { force: true });
      return false;
    }

    this.logger.warn("removing stale lock", {
      lock: this.lockPath,
      pid: holder.pid,
      acquiredAt: holder.acquiredAt,
    });
    await fs.rm(aside, { force: true });
    return true;
  }

  async acquire(): Promise<void> {
    if (this.held) {
      throw new Error(`lock ${this.lockPath} is already held by this handle`);
    }
    const deadline = Date.now() + this.timeoutMs;
    let announced = false;
    for (;;) {
      if (await this.tryCreate()) {
        this.held = true;
        this.logger.debug("lock acquired", { lock: this.lockPath });
        return;
      }
      if (await this.clearIfStale()) continue;
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new LockTimeoutError(
          this.lockPath,
          this.timeoutMs,
          await readLockHolder(this.lockPath),
        );
      }
      if (!announced) {
        announced = true;
        this.logger.info("waiting for lock", {
          lock: this.lockPath,
          timeoutMs: this.timeoutMs,
        });
      }
      await wait(Math.min(this.pollMs, remaining));
    }
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    const holder = await readLockHolder(this.lockPath);
    if (
      holder &&
      (holder.pid !== this.token.pid || holder.hostname !== this.token.hostname)
    ) {
      this.logger.warn("lock was taken over by another process; leaving it", {
        lock: this.lockPath,
        pid: holder.pid,
      });
      return;
    }
    try {
      await fs.unlink(this.lockPath);
    } catch (err) {
      if (errorCode(err) !== "ENOENT") throw err;
    }
    this.logger.debug("lock released", { lock: this.lockPath });
  }
}

export async function withLock<T>(
  lockPath: string,
  opts: FileLockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const lock = new FileLock(lockPath, opts);
  await lock.acquire();
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
