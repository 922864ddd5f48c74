import fs from "node:fs/promises";
import dotenv from "dotenv";
import { errorMessage, isNotFound } from "./errors.js";
import type { Logger } from "./logger.js";

/** Set by the host: a file of `export` lines it sources into the session's shell. */
export const SESSION_ENV_FILE_VAR = "CLAUDE_ENV_FILE";

const SHELL_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Later files win on duplicate keys. A missing file contributes nothing. */
export async function readEnvFiles(files: readonly string[], logger: Logger): Promise<Record<string, string>> {
  const merged: Record<string, string> = {};
  for (const file of files) {
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (err) {
      if (!isNotFound(err)) logger.warn({ file, err: errorMessage(err) }, "cannot read env file");
      continue;
    }
    for (const [key, value] of Object.entries(dotenv.parse(text))) {
      if (SHELL_NAME.test(key)) merged[key] = value;
      else logger.warn({ file, key }, "skipping env key that is not a shell name");
    }
  }
  return merged;
}

export function exportLine(key: string, value: string): string {
  return `export ${key}='${value.replaceAll("'", `'"'"'`)}'`;
}

/** One append for the whole batch. Returns the number of variables written. */
export async function appendSessionEnv(target: string, vars: Record<string, string>): Promise<number> {
  const lines = Object.entries(vars).map(([key, value]) => exportLine(key, value));
  if (lines.length === 0) return 0;
  await fs.appendFile(target, lines.join("\n") + "\n", "utf8");
  return lines.length;
}
