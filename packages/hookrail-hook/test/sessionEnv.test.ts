import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { silentLogger } from "../src/logger.js";
import { appendSessionEnv, exportLine, readEnvFiles } from "../src/sessionEnv.js";

const logger = silentLogger();

async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "hookrail-env-"));
}

describe("readEnvFiles", () => {
  it("parses export prefixes, quotes and inline comments", async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, "vars.env");
    await fs.writeFile(
      file,
      [
        "# project settings",
        "export API_URL=http://localhost:8080",
        'GREETING="hello world"',
        "SINGLE='it is'",
        "PLAIN=value # trailing comment",
        "bad-key=1",
      ].join("\n"),
      "utf8",
    );
    expect(await readEnvFiles([file], logger)).toEqual({
      API_URL: "http://localhost:8080",
      GREETING: "hello world",
      SINGLE: "it is",
      PLAIN: "value",
    });
  });

  it("merges files with the later one winning and skips missing files", async () => {
    const dir = await makeTempDir();
    const base = path.join(dir, "base.env");
    const local = path.join(dir, "local.env");
    await fs.writeFile(base, "MODE=base\nKEEP=1\n", "utf8");
    await fs.writeFile(local, "MODE=local\n", "utf8");
    expect(await readEnvFiles([base, path.join(dir, "missing.env"), local], logger)).toEqual({ MODE: "local", KEEP: "1" });
  });
});

describe("appendSessionEnv", () => {
  it("quotes values for the shell", () => {
    expect(exportLine("NAME", "it's")).toBe(`export NAME='it'"'"'s'`);
  });

  it("appends after existing lines and writes nothing for an empty set", async () => {
    const target = path.join(await makeTempDir(), "session.env");
    await fs.writeFile(target, "export EXISTING='1'\n", "utf8");
    expect(await appendSessionEnv(target, { A: "x", B: "y z" })).toBe(2);
    expect(await appendSessionEnv(target, {})).toBe(0);
    expect(await fs.readFile(target, "utf8")).toBe("export EXISTING='1'\nexport A='x'\nexport B='y z'\n");
  });
});
