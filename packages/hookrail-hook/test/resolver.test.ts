import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { getPaths, initProject, resolveProjectRoot, resolveRoot } from "../src/resolver.js";

async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "hookrail-root-"));
}

describe("resolveProjectRoot", () => {
  it("finds the marker from any depth", async () => {
    const root = await makeTempDir();
    await initProject(root);
    for (const rel of [".", "a", "a/b", "a/b/c/d"]) {
      const start = path.join(root, rel);
      await fs.mkdir(start, { recursive: true });
      expect(await resolveProjectRoot(start)).toEqual({ root, source: "marker" });
    }
  });

  it("prefers the nearest marker", async () => {
    const outer = await makeTempDir();
    const inner = path.join(outer, "packages", "inner");
    await fs.mkdir(inner, { recursive: true });
    await initProject(outer);
    await initProject(inner);
    expect((await resolveProjectRoot(path.join(inner, "src"))).root).toBe(inner);
  });

  it("falls back to the version-control root", async () => {
    const root = await makeTempDir();
    await fs.mkdir(path.join(root, ".git"));
    const nested = path.join(root, "src", "lib");
    await fs.mkdir(nested, { recursive: true });
    expect(await resolveProjectRoot(nested)).toEqual({ root, source: "vcs" });
  });

  it("accepts a .git file (worktrees)", async () => {
    const root = await makeTempDir();
    await fs.writeFile(path.join(root, ".git"), "gitdir: /elsewhere\n");
    expect((await resolveProjectRoot(root)).source).toBe("vcs");
  });

  it("falls back to the starting directory", async () => {
    const dir = await makeTempDir();
    expect(await resolveProjectRoot(dir)).toEqual({ root: dir, source: "cwd" });
  });

  it("honours HOOKRAIL_ROOT", async () => {
    const dir = await makeTempDir();
    expect(await resolveRoot("/somewhere/else", { HOOKRAIL_ROOT: dir })).toEqual({ root: dir, source: "env" });
  });
});

describe("initProject", () => {
  it("is idempotent", async () => {
    const dir = await makeTempDir();
    expect(await initProject(dir)).toEqual({ root: dir, created: true });
    const first = await fs.readFile(getPaths(dir).marker, "utf8");
    expect(JSON.parse(first).version).toBe(1);
    expect(await initProject(dir)).toEqual({ root: dir, created: false });
    expect(await fs.readFile(getPaths(dir).marker, "utf8")).toBe(first);
  });
});
