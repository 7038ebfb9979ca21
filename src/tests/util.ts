import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parseConfig, type Config, type ConfigFile } from "../config.js";

export function wait(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export const noSleep = async (_ms: number) => {};

export type Workspace = {
  root: string;
  inbox: string;
  archive: string;
  backups: string;
  master: string;
  metadata: string;
  config(extra?: ConfigFile): Config;
};

export async function mkWorkspace(prefix: string): Promise<Workspace> {
  const root = await fsp.mkdtemp(path.join(os.tmpdir(), prefix));
  const ws = {
    root,
    inbox: path.join(root, "inbox"),
    archive: path.join(root, "archive"),
    backups: path.join(root, "backups"),
    master: path.join(root, "master.csv"),
    metadata: path.join(root, "meta.json"),
    config(extra: ConfigFile = {}): Config {
      return parseConfig(
        {
          watch_dir: "inbox",
          archive_dir: "archive",
          backup_dir: "backups",
          merged_file: "master.csv",
          metadata_file: "meta.json",
          key_column: "cluster_name",
          checksum_wait_seconds: 0,
          lock_timeout_seconds: 1,
          log_file: null,
          ...extra,
        },
        { baseDir: root },
      );
    },
  };
  await fsp.mkdir(ws.inbox, { recursive: true });
  return ws;
}

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}
