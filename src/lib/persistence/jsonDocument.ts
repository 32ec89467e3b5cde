/**
 * Whole-file JSON documents. Loading never throws: a missing or unparseable
 * file yields the default arm of LoadResult.
 */

import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname } from "path";
import type { z } from "zod";

export type LoadResult<T> =
  | { source: "stored"; value: T }
  | { source: "default"; value: T; reason: "missing" | "corrupt" };

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Reads and parses path. parse returns null for a document of the wrong shape,
 * which is treated the same as invalid JSON.
 */
export async function loadJsonDocument<T>(
  path: string,
  parse: (raw: unknown) => T | null,
  fallback: () => T
): Promise<LoadResult<T>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFileError(err)) return { source: "default", value: fallback(), reason: "missing" };
    console.warn(`[fileStore] Failed to read ${path}:`, err instanceof Error ? err.message : err);
    return { source: "default", value: fallback(), reason: "corrupt" };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    console.warn(`[fileStore] ${path} is not valid JSON, using defaults`);
    return { source: "default", value: fallback(), reason: "corrupt" };
  }
  const value = parse(parsed);
  if (value === null) {
    console.warn(`[fileStore] ${path} has an unexpected shape, using defaults`);
    return { source: "default", value: fallback(), reason: "corrupt" };
  }
  return { source: "stored", value };
}

let tmpCounter = 0;

/** Writes to a sibling temp file, then renames over path. A failed write removes the temp file. */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${process.pid}.${++tmpCounter}.tmp`;
  try {
    await writeFile(tmpPath, JSON.stringify(data, null, 2), "utf-8");
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

/**
 * Validates each array element; invalid elements are skipped with a warning.
 * A non-array yields [].
 */
export function parseItems<S extends z.ZodTypeAny>(raw: unknown, schema: S, label: string): z.output<S>[] {
  if (!Array.isArray(raw)) return [];
  const valid: z.output<S>[] = [];
  raw.forEach((item, index) => {
    const result = schema.safeParse(item);
    if (result.success) {
      valid.push(result.data);
    } else {
      console.warn(`[fileStore] Skipping invalid ${label} at index ${index}: ${result.error.issues[0]?.message ?? result.error.message}`);
    }
  });
  return valid;
}
