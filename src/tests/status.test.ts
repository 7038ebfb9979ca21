import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { lockPathFor } from "../lock.js";
import { runPass } from "../monitor.js";
import { collectStatus, describeLock, renderStatus } from "../status.js";
import { mkWorkspace, noSleep, type Workspace } from "./util.js";

describe("describeLock", () => {
  test("unlocked, held and stale", () => {
    expect(describeLock(null)).toBe("unlocked");
    const holder = { pid: 42, hostname: "build-1", acquiredAt: "" };
    expect(describeLock({ ...holder, alive: true })).toBe("held by pid 42 on build-1");
    expect(describeLock({ ...holder, alive: false })).toBe(
      "held by pid 42 on build-1, stale",
    );
  });
});

describe("collectStatus", () => {
  let ws: Workspace;
  beforeEach(async () => {
    ws = await mkWorkspace("csv-fold-status-");
  });
  afterEach(async () => {
    await fsp.rm(ws.root, { recursive: true, force: true });
  });

  test("before anything was merged", async () => {
    expect(await collectStatus(ws.config())).toEqual({
      mergedFile: ws.master,
      masterExists: false,
      metadataFile: ws.metadata,
      metadata: null,
      lock: null,
    });
  });

  test("after a pass, with a lock held", async () => {
    const config = ws.config();
    await fsp.writeFile(path.join(ws.inbox, "u.csv"), "cluster_name,v\nA,1\nB,2\n");
    await runPass({ config, sleep: noSleep });
    await fsp.writeFile(
      lockPathFor(ws.master),
      JSON.stringify({ pid: process.pid, hostname: os.hostname(), acquiredAt: "t" }),
    );

    const status = await collectStatus(config);
    expect(status.masterExists).toBe(true);
    expect(status.metadata).toMatchObject({ row_count: 2, column_count: 2 });
    expect(status.lock).toEqual({
      pid: process.pid,
      hostname: os.hostname(),
      acquiredAt: "t",
      alive: true,
    });

    const text = renderStatus(status);
    expect(text).toContain("csv-fold status");
    expect(text).toContain("cluster_name, v");
    expect(text).toContain(`held by pid ${process.pid} on ${os.hostname()}`);
  });
});
