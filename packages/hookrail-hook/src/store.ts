import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { StateCorruptionError, isNotFound } from "./errors.js";

export function nowIso(): string {
  return new Date().toISOString();
}

export function newId(prefix: string): string {
  return `${prefix}_${crypto.randomBytes(6).toString("hex")}`;
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads a JSON record. A missing file is `null`; a file that exists but does not parse
 * is a StateCorruptionError so the caller decides how loudly to recover.
 */
export async function readJsonRecord(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw new StateCorruptionError(`Cannot read ${filePath}`, filePath, { cause: err });
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new StateCorruptionError(`Invalid JSON in ${filePath}`, filePath, { cause: err });
  }
}

/** Write-temp-then-rename, so concurrent readers never see a partial record. */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeTextAtomic(filePath, JSON.stringify(value, null, 2) + "\n");
}

export async function writeTextAtomic(filePath: string, text: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(filePath)}.tmp-${crypto.randomBytes(6).toString("hex")}`);
  try {
    await fs.writeFile(tmp, text, "utf8");
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/** One `appendFile` call per record: O_APPEND keeps concurrent lines whole. */
export async function appendJsonLine(filePath: string, record: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, JSON.stringify(record) + "\n", "utf8");
}

/**
 * Parses a JSON-lines log. Blank lines and lines that fail to parse (a torn tail from a
 * concurrent writer, or hand edits) are skipped.
 */
export async function readJsonLines(filePath: string): Promise<{ records: unknown[]; skipped: number }> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNotFound(err)) return { records: [], skipped: 0 };
    throw err;
  }
  const records: unknown[] = [];
  let skipped = 0;
  for (const line of raw.split("\n")) {
    if (line.trim().length === 0) continue;
    try {
      records.push(JSON.parse(line));
    } catch {
      skipped += 1;
    }
  }
  return { records, skipped };
}
