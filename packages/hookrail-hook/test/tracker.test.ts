import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { defaultRuleSet } from "../src/config.js";
import { UsageError } from "../src/errors.js";
import type { PostToolUseEvent } from "../src/events.js";
import { silentLogger } from "../src/logger.js";
import { getPaths, type ProjectPaths } from "../src/resolver.js";
import {
  collapseRecords,
  confirmFile,
  observeToolUse,
  readRelevantFiles,
  relativeToRoot,
  type RelevantFileRecord,
} from "../src/tracker.js";

const logger = silentLogger();

async function makePaths(): Promise<ProjectPaths> {
  return getPaths(await fs.mkdtemp(path.join(os.tmpdir(), "hookrail-tracker-")));
}

function toolEvent(paths: ProjectPaths, toolName: string, toolInput: Record<string, unknown>): PostToolUseEvent {
  return {
    hook_event_name: "PostToolUse",
    session_id: "s1",
    transcript_path: "",
    cwd: paths.root,
    tool_name: toolName,
    tool_input: toolInput,
    tool_response: {},
  };
}

function record(p: string, provenance: "tool" | "user", confidence: number, packetId?: string): RelevantFileRecord {
  const r: RelevantFileRecord = { ts: "2026-01-01T00:00:00.000Z", path: p, provenance, confidence };
  if (packetId) r.packetId = packetId;
  return r;
}

describe("relevant-file tracker", () => {
  it("keeps every concurrent append", async () => {
    const paths = await makePaths();
    const tracker = defaultRuleSet(paths.root).tracker;
    const writes = Array.from({ length: 40 }, (_, i) =>
      observeToolUse(paths, tracker, toolEvent(paths, "Edit", { file_path: `src/file-${i % 7}.ts` }), null),
    );
    await Promise.all(writes);
    expect(await readRelevantFiles(paths, logger)).toHaveLength(40);
  });

  it("records root-relative paths with the tool's confidence", async () => {
    const paths = await makePaths();
    const tracker = defaultRuleSet(paths.root).tracker;
    const rec = await observeToolUse(paths, tracker, toolEvent(paths, "Read", { file_path: path.join(paths.root, "src", "a.ts") }), "pkt_1");
    expect(rec).toMatchObject({ path: "src/a.ts", provenance: "tool", confidence: 0.5, packetId: "pkt_1", tool: "Read" });
  });

  it("skips untracked tools, ignored paths and paths outside the root", async () => {
    const paths = await makePaths();
    const tracker = defaultRuleSet(paths.root).tracker;
    expect(await observeToolUse(paths, tracker, toolEvent(paths, "Bash", { command: "ls" }), null)).toBeNull();
    expect(await observeToolUse(paths, tracker, toolEvent(paths, "Edit", { file_path: ".git/config" }), null)).toBeNull();
    expect(await observeToolUse(paths, tracker, toolEvent(paths, "Edit", { file_path: "/etc/hosts" }), null)).toBeNull();
    expect(await observeToolUse(paths, tracker, toolEvent(paths, "toString", { file_path: "a.ts" }), null)).toBeNull();
    expect(await observeToolUse(paths, { ...tracker, enabled: false }, toolEvent(paths, "Edit", { file_path: "a.ts" }), null)).toBeNull();
    expect(await readRelevantFiles(paths, logger)).toEqual([]);
  });

  it("skips torn lines when reading", async () => {
    const paths = await makePaths();
    await confirmFile(paths, "README.md", null);
    await fs.appendFile(paths.relevantFiles, '{"ts":"2026', "utf8");
    expect(await readRelevantFiles(paths, logger)).toHaveLength(1);
  });

  it("refuses to confirm files outside the root", async () => {
    const paths = await makePaths();
    await expect(confirmFile(paths, "../elsewhere.txt", null)).rejects.toThrow(UsageError);
  });

  it("normalises paths", () => {
    expect(relativeToRoot("/work", "/work/src", "../lib/x.ts")).toBe("lib/x.ts");
    expect(relativeToRoot("/work", "/work", "/work")).toBeNull();
    expect(relativeToRoot("/work", "/work", "/other/x.ts")).toBeNull();
    expect(relativeToRoot("/work", "/work", "..notes.md")).toBe("..notes.md");
    expect(relativeToRoot("/work", "/work/src", "../..")).toBeNull();
  });
});

describe("collapseRecords", () => {
  it("dedupes by path, keeps the latest entry and orders suggestions", () => {
    const log = [
      record("a.ts", "tool", 0.5),
      record("b.ts", "tool", 0.9),
      record("a.ts", "tool", 0.9),
      record("c.ts", "user", 1),
      record("d.ts", "tool", 0.9, "pkt_other"),
      record("e.ts", "tool", 0.5, "pkt_1"),
    ];
    expect(collapseRecords(log, "pkt_1")).toEqual({ confirmed: ["c.ts"], suggested: ["a.ts", "b.ts", "e.ts"] });
    expect(collapseRecords(log, "pkt_other")).toEqual({ confirmed: ["c.ts"], suggested: ["d.ts", "a.ts", "b.ts"] });
  });

  it("moves a confirmed file out of the suggested set even when a tool touched it later", () => {
    const log = [record("a.ts", "user", 1), record("a.ts", "tool", 0.9)];
    expect(collapseRecords(log, null)).toEqual({ confirmed: ["a.ts"], suggested: [] });
  });
});
