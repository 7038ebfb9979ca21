import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { archiveFile, summarizeKeys } from "../archive.js";
import { FileProcessingError } from "../errors.js";
import { archiveStamp, backupStamp } from "../util.js";
import { fileExists } from "./util.js";

const when = new Date(2026, 0, 2, 3, 4, 5, 6);

describe("timestamps", () => {
  test("archive and backup stamps use local time", () => {
    expect(archiveStamp(when)).toBe("20260102T030405.006");
    expect(backupStamp(when)).toBe("20260102_030405");
  });
});

describe("archiveFile", () => {
  let dir: string;
  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "csv-fold-archive-"));
  });
  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  test("moves the file under a timestamped name", async () => {
    const src = path.join(dir, "in.csv");
    await fsp.writeFile(src, "id\n1\n");
    const dest = await archiveFile(src, path.join(dir, "archive"), when);
    expect(dest).toBe(path.join(dir, "archive", "in.csv.20260102T030405.006"));
    expect(await fileExists(src)).toBe(false);
    expect(await fsp.readFile(dest, "utf8")).toBe("id\n1\n");
  });

  test("adds a counter when the name is taken", async () => {
    const archive = path.join(dir, "archive");
    const src = path.join(dir, "in.csv");
    await fsp.writeFile(src, "one");
    await archiveFile(src, archive, when);
    await fsp.writeFile(src, "two");
    const dest = await archiveFile(src, archive, when);
    expect(dest).toBe(path.join(archive, "in.csv.20260102T030405.006-1"));
    expect(await fsp.readFile(dest, "utf8")).toBe("two");
  });

  test("failures are archive errors", async () => {
    const err = await archiveFile(path.join(dir, "missing.csv"), dir, when).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(FileProcessingError);
    expect(err instanceof FileProcessingError && err.reason).toBe("archive-failed");
  });
});

describe("summarizeKeys", () => {
  test("sorts and truncates with a total", () => {
    expect(summarizeKeys(["c", "a", "b"], 2)).toBe("a, b... (3 total)");
  });

  test("numeric keys sort numerically", () => {
    expect(summarizeKeys(["10", "9"], 5)).toBe("9, 10");
  });
});
