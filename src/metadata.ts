// src/metadata.ts
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorCode } from "./errors.js";
import { writeFileAtomic } from "./persist.js";
import type { Table } from "./table.js";

export const metadataSchema = z.object({
  last_updated: z.string(),
  row_count: z.number().int().nonnegative(),
  column_count: z.number().int().nonnegative(),
  columns: z.array(z.string()),
});

export type Metadata = z.infer<typeof metadataSchema>;

export function buildMetadata(table: Table, now: Date = new Date()): Metadata {
  return {
    last_updated: now.toISOString(),
    row_count: table.rows.length,
    column_count: table.columns.length,
    columns: [...table.columns],
  };
}

/** Replaces the whole file; earlier summaries are not kept. */
export async function writeMetadata(file: string, meta: Metadata): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await writeFileAtomic(file, Buffer.from(JSON.stringify(meta, null, 2) + "\n", "utf8"));
}

export async function readMetadata(file: string): Promise<Metadata | null> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    throw err;
  }
  return metadataSchema.parse(JSON.parse(text));
}
