/**
 * Filesystem utility functions
 */

import { randomBytes } from "node:crypto";
import { constants } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Convert a string to a safe filename by replacing invalid characters
 */
export function safeFilename(s: string): string {
  return s
    .replace(/[^a-zA-Z0-9._-]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * One-to-one character replacement for a single path segment.
 * Unlike safeFilename it keeps length and position, and never emits "~".
 */
export function safeSegment(s: string): string {
  const cleaned = s.replace(/[^a-zA-Z0-9._-]/g, "_");
  return cleaned === "." || cleaned === ".." ? cleaned.replace(/\./g, "_") : cleaned;
}

/**
 * Write through a sibling temp file and rename, so readers never see a
 * partially written file.
 */
export async function writeFileAtomic(file: string, data: Buffer | string): Promise<void> {
  await ensureDir(path.dirname(file));
  const tmp = `${file}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
  try {
    await fs.writeFile(tmp, data);
    await fs.rename(tmp, file);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/**
 * Create the directory if needed and confirm we can write into it
 */
export async function assertWritableDir(dir: string): Promise<void> {
  await ensureDir(dir);
  await fs.access(dir, constants.W_OK);
}
