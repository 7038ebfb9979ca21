import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { decodeTable, validateFile, validateTable } from "../validate.js";
import type { Table } from "../table.js";

const rules = { keyColumn: "cluster_name", requiredColumns: [] };
const utf8 = { encoding: "utf-8", delimiter: "," } as const;

describe("validateTable", () => {
  test("rejects a table without columns or rows", () => {
    const noRows = validateTable({ columns: ["cluster_name"], rows: [] }, rules, "t.csv");
    expect(noRows.ok).toBe(false);
    if (noRows.ok) return;
    expect(noRows.error.reason).toBe("empty");
    expect(noRows.error.message).toBe("empty: t.csv");
  });

  test("key column is checked before required columns", () => {
    const res = validateTable(
      { columns: ["id"], rows: [{ id: "1" }] },
      { keyColumn: "cluster_name", requiredColumns: ["region"] },
    );
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.reason).toBe("missing-key-column");
    expect(res.error.message).toBe('missing key column "cluster_name" in table');
  });

  test("lists every missing required column", () => {
    const res = validateTable(
      { columns: ["cluster_name", "region"], rows: [{ cluster_name: "A", region: "x" }] },
      { keyColumn: "cluster_name", requiredColumns: ["region", "owner", "tier"] },
    );
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.reason).toBe("missing-required-columns");
    expect(res.error.message).toBe("missing required columns in table: owner, tier");
  });

  test("rejects null keys and points at the first one", () => {
    const table: Table = {
      columns: ["cluster_name", "v"],
      rows: [
        { cluster_name: "A", v: "1" },
        { cluster_name: null, v: "2" },
        { cluster_name: "", v: "3" },
      ],
    };
    const res = validateTable(table, rules);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe("data-validation");
    expect(res.error.reason).toBe("null-key-values");
    expect(res.error.message).toBe(
      "null key values in table: 2 row(s), first at data row 2",
    );
  });

  test("passes a well-formed table through", () => {
    const table: Table = { columns: ["cluster_name"], rows: [{ cluster_name: "A" }] };
    expect(validateTable(table, rules)).toEqual({ ok: true, value: table });
  });
});

describe("decodeTable", () => {
  test("invalid utf-8 is an encoding failure", () => {
    const res = decodeTable(Buffer.from([0x69, 0x64, 0x0a, 0xff, 0x0a]), utf8);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.reason).toBe("encoding-invalid");
    expect(res.error.message).toBe("file is not valid utf-8: input");
  });

  test("drops a utf-8 byte order mark", () => {
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("id\n1\n")]);
    const res = decodeTable(bytes, utf8);
    expect(res).toEqual({ ok: true, value: { columns: ["id"], rows: [{ id: "1" }] } });
  });

  test("latin1 decodes high bytes, ascii refuses them", () => {
    const bytes = Buffer.from("id,name\n1,café\n", "latin1");
    const latin = decodeTable(bytes, { encoding: "latin1", delimiter: "," });
    expect(latin.ok && latin.value.rows[0].name).toBe("café");
    const ascii = decodeTable(bytes, { encoding: "ascii", delimiter: "," }, "x.csv");
    expect(ascii.ok).toBe(false);
    if (ascii.ok) return;
    expect(ascii.error.message).toBe("file is not valid ascii: x.csv");
  });

  test("malformed CSV is a load failure", () => {
    const res = decodeTable(Buffer.from("a,b\n1,2,3\n"), utf8);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.reason).toBe("load-failed");
    expect(res.error.message).toBe(
      "CSV load failed for input: line 2: expected 2 fields, saw 3",
    );
  });
});

describe("validateFile", () => {
  let dir: string;
  beforeAll(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "csv-fold-validate-"));
  });
  afterAll(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  test("reads, decodes and validates", async () => {
    const file = path.join(dir, "ok.csv");
    await fsp.writeFile(file, "cluster_name,v\nA,1\n");
    const res = await validateFile(file, { ...utf8, ...rules });
    expect(res).toEqual({
      ok: true,
      value: { columns: ["cluster_name", "v"], rows: [{ cluster_name: "A", v: "1" }] },
    });
  });

  test("an unreadable file is an io failure", async () => {
    const res = await validateFile(path.join(dir, "missing.csv"), { ...utf8, ...rules });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe("file-processing");
    expect(res.error.reason).toBe("io-failed");
  });

  test("a header-only file is empty", async () => {
    const file = path.join(dir, "header.csv");
    await fsp.writeFile(file, "cluster_name,v\n");
    const res = await validateFile(file, { ...utf8, ...rules });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.message).toBe(`empty: ${file}`);
  });
});
