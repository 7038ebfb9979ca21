// src/hash.ts
import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import { createHash, getHashes } from "node:crypto";
import { errorMessage, fail, FileProcessingError, ok, type Result } from "./errors.js";

// Curated set we're willing to expose. md5 is only a change detector here.
export const CURATED_HASH_ALGOS = [
  "md5",
  "sha1",
  "sha256",
  "sha512",
  "blake2b512",
  "blake2s256",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

export function defaultHashAlg(): HashAlg {
  return "md5";
}

let supportedHashes: HashAlg[] | null = null;
export function listSupportedHashes(): HashAlg[] {
  if (supportedHashes == null) {
    const avail = new Set(getHashes().map((s) => s.toLowerCase()));
    supportedHashes = CURATED_HASH_ALGOS.filter((a) => avail.has(a));
  }
  return supportedHashes;
}

/**
 * Normalize/validate requested algorithm against runtime support.
 * Accepts the shorthands "blake2b" -> blake2b512, "blake2s" -> blake2s256.
 * Returns null when the runtime does not offer it.
 */
export function normalizeHashAlg(requested?: string): HashAlg | null {
  if (!requested) return defaultHashAlg();
  const low = requested.trim().toLowerCase();
  const wanted =
    low === "blake2b" ? "blake2b512" : low === "blake2s" ? "blake2s256" : low;
  return listSupportedHashes().find((h) => h === wanted) ?? null;
}

export interface DigestOptions {
  algorithm: HashAlg;
  chunkSize: number;
  maxBytes: number;
}

/**
 * Streams `path` through the hash `chunkSize` bytes at a time. Files larger
 * than `maxBytes` are rejected before any byte is read.
 */
export async function fileDigest(
  path: string,
  { algorithm, chunkSize, maxBytes }: DigestOptions,
): Promise<Result<string, FileProcessingError>> {
  let size: number;
  try {
    size = (await fs.stat(path)).size;
  } catch (err) {
    return fail(
      new FileProcessingError(
        "checksum-failed",
        `cannot stat ${path}: ${errorMessage(err)}`,
        path,
        { cause: err },
      ),
    );
  }
  if (size > maxBytes) {
    return fail(
      new FileProcessingError(
        "file-too-large",
        `file too large: ${path} is ${size} bytes, limit ${maxBytes}`,
        path,
      ),
    );
  }

  const h = createHash(algorithm);
  try {
    const rs = createReadStream(path, { highWaterMark: chunkSize });
    for await (const chunk of rs) {
      h.update(chunk);
    }
  } catch (err) {
    return fail(
      new FileProcessingError(
        "checksum-failed",
        `checksum error on ${path}: ${errorMessage(err)}`,
        path,
        { cause: err },
      ),
    );
  }
  return ok(h.digest("hex"));
}
