import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { silentLogger } from "../src/logger.js";
import { loadLoop, readPointer, startLoop } from "../src/loops.js";
import { createPacket, loadPacket } from "../src/packets.js";
import { getPaths, initProject } from "../src/resolver.js";
import { runHook } from "../src/runner.js";
import { readJsonLines } from "../src/store.js";

const logger = silentLogger();

async function makeTempWorkspace(rules?: unknown): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "hookrail-run-"));
  await initProject(dir);
  if (rules !== undefined) await fs.writeFile(getPaths(dir).rules, JSON.stringify(rules), "utf8");
  return dir;
}

function run(root: string, payload: Record<string, unknown>, env: Record<string, string> = {}) {
  return runHook(JSON.stringify({ session_id: "s1", cwd: root, ...payload }), { env, logger });
}

describe("runHook", () => {
  it("denies rm -rf / and exits 2", async () => {
    const root = await makeTempWorkspace();
    const res = await run(root, { hook_event_name: "PreToolUse", tool_name: "Bash", tool_input: { command: "rm -rf /" } });
    expect(res.exitCode).toBe(2);
    expect(res.stderr).toBe("Destructive filesystem command blocked: rm -rf /");
    expect(JSON.parse(res.stdout)).toEqual({
      hookSpecificOutput: {
        hookEventName: "PreToolUse",
        permissionDecision: "deny",
        permissionDecisionReason: "Destructive filesystem command blocked: rm -rf /",
      },
    });
    const audit = await readJsonLines(getPaths(root).audit);
    expect(audit.records).toHaveLength(1);
    expect(audit.records[0]).toMatchObject({ event: "PreToolUse", tool_name: "Bash", decision: "deny", rule: "root-delete" });
  });

  it("resolves the project from a nested cwd", async () => {
    const root = await makeTempWorkspace({ policy: { default: "deny" } });
    const nested = path.join(root, "src", "deep");
    await fs.mkdir(nested, { recursive: true });
    const res = await runHook(
      JSON.stringify({ hook_event_name: "PreToolUse", session_id: "s1", cwd: nested, tool_name: "Foo", tool_input: {} }),
      { env: {}, logger },
    );
    expect(res.exitCode).toBe(2);
    expect(res.stderr).toBe("No hookrail policy rule allows Foo.");
  });

  it("continues a loop on Stop and re-delivers the directive", async () => {
    const root = await makeTempWorkspace();
    const loop = await startLoop(
      getPaths(root),
      { directive: "Make the test suite pass.", completionPromise: "ALL GREEN", maxIterations: 3 },
      { maxIterations: 0, promiseMatch: "strict" },
      logger,
    );
    const res = await run(root, { hook_event_name: "Stop", last_assistant_message: "not yet" });
    expect(res.exitCode).toBe(2);
    expect(JSON.parse(res.stdout)).toEqual({
      decision: "block",
      reason: "Make the test suite pass.",
      systemMessage: `hookrail loop ${loop.id}: iteration 1/3`,
    });

    const done = await run(root, { hook_event_name: "Stop", last_assistant_message: "<promise>ALL GREEN</promise>" });
    expect(done.exitCode).toBe(0);
    expect(JSON.parse(done.stdout)).toEqual({ systemMessage: `hookrail loop ${loop.id}: promise fulfilled` });

    const audit = await readJsonLines(getPaths(root).audit);
    expect(audit.records).toHaveLength(3);
    expect(audit.records[1]).toMatchObject({ event: "Stop", loop: loop.id, from: "active", to: "active", iteration: 1, verdict: "continue" });
    expect(audit.records[2]).toMatchObject({ event: "Stop", loop: loop.id, from: "active", to: "done", iteration: 1, verdict: "completed" });
  });

  it("answers with the safe default at the deadline and leaves the loop untouched", async () => {
    const root = await makeTempWorkspace();
    const paths = getPaths(root);
    const loop = await startLoop(
      paths,
      { directive: "Keep going.", completionPromise: "DONE", maxIterations: 3 },
      { maxIterations: 0, promiseMatch: "strict" },
      logger,
    );
    const transcript = path.join(root, "long.jsonl");
    const line = JSON.stringify({ type: "assistant", message: { role: "assistant", content: [{ type: "text", text: "still working on it" }] } });
    await fs.writeFile(transcript, Array.from({ length: 60000 }, () => line).join("\n"), "utf8");

    const res = await run(root, { hook_event_name: "Stop", transcript_path: transcript }, { HOOKRAIL_TIMEOUT_MS: "1" });
    expect(res).toEqual({
      stdout: JSON.stringify({ systemMessage: "hookrail: timed out after 1ms" }),
      stderr: "hookrail: timed out after 1ms",
      exitCode: 1,
    });

    // let the abandoned handler run to completion
    await new Promise((resolve) => setTimeout(resolve, 1500));
    expect((await loadLoop(paths, loop.id, logger))?.iteration).toBe(0);
    expect(await readPointer(paths, logger)).toBe(loop.id);
    expect((await readJsonLines(paths.audit)).records).toHaveLength(1);
  });

  it("reads the last turn from the transcript when the event does not carry it", async () => {
    const root = await makeTempWorkspace();
    await startLoop(
      getPaths(root),
      { directive: "Keep going.", completionPromise: "DONE" },
      { maxIterations: 0, promiseMatch: "strict" },
      logger,
    );
    const transcript = path.join(root, "transcript.jsonl");
    await fs.writeFile(
      transcript,
      JSON.stringify({ type: "assistant", message: { role: "assistant", content: [{ type: "text", text: "<promise>DONE</promise>" }] } }) + "\n",
      "utf8",
    );
    const res = await run(root, { hook_event_name: "Stop", transcript_path: transcript });
    expect(res.exitCode).toBe(0);
  });

  it("allows termination when no loop is running", async () => {
    const root = await makeTempWorkspace();
    expect(await run(root, { hook_event_name: "Stop" })).toEqual({ stdout: "", stderr: "", exitCode: 0 });
  });

  it("injects instructions on SessionStart", async () => {
    const root = await makeTempWorkspace({
      instructions: { rules: [{ on: ["SessionStart"], when: ["startup"], text: ["Project root: ${project_root}"] }] },
    });
    const res = await run(root, { hook_event_name: "SessionStart", source: "startup" });
    expect(JSON.parse(res.stdout)).toEqual({
      hookSpecificOutput: { hookEventName: "SessionStart", additionalContext: `Project root: ${root}` },
    });
  });

  it("appends configured env files to the session env file on startup only", async () => {
    const root = await makeTempWorkspace({ sessionStart: { envFiles: ["vars.env"] } });
    await fs.writeFile(path.join(root, "vars.env"), 'export TOKEN=test-secret\nMODE="dev mode"\n', "utf8");
    const sessionEnv = path.join(root, "session.env");

    const resumed = await run(root, { hook_event_name: "SessionStart", source: "resume" }, { CLAUDE_ENV_FILE: sessionEnv });
    expect(resumed).toEqual({ stdout: "", stderr: "", exitCode: 0 });
    await expect(fs.access(sessionEnv)).rejects.toThrow();

    const started = await run(root, { hook_event_name: "SessionStart", source: "startup" }, { CLAUDE_ENV_FILE: sessionEnv });
    expect(started).toEqual({ stdout: "", stderr: "", exitCode: 0 });
    expect(await fs.readFile(sessionEnv, "utf8")).toBe("export TOKEN='test-secret'\nexport MODE='dev mode'\n");
  });

  it("tracks files on PostToolUse against the active packet", async () => {
    const root = await makeTempWorkspace();
    const paths = getPaths(root);
    const packet = await createPacket(paths, { purpose: "Tracking" });
    const res = await run(root, {
      hook_event_name: "PostToolUse",
      tool_name: "Edit",
      tool_input: { file_path: path.join(root, "src", "index.ts") },
      tool_response: { success: true },
    });
    expect(res).toEqual({ stdout: "", stderr: "", exitCode: 0 });
    const log = await readJsonLines(paths.relevantFiles);
    expect(log.records).toHaveLength(1);
    expect(log.records[0]).toMatchObject({ path: "src/index.ts", provenance: "tool", confidence: 0.9, packetId: packet.id });

    await run(root, { hook_event_name: "SessionEnd", reason: "logout" });
    expect((await loadPacket(paths, packet.id, logger))?.suggestedFiles).toEqual(["src/index.ts"]);
  });

  it("halts automatic compaction when configured", async () => {
    const root = await makeTempWorkspace({ preCompact: { blockAuto: true } });
    const auto = await run(root, { hook_event_name: "PreCompact", trigger: "auto" });
    expect(JSON.parse(auto.stdout)).toEqual({
      continue: false,
      stopReason: "Automatic compaction is disabled for this project; compact manually when ready.",
    });
    expect((await run(root, { hook_event_name: "PreCompact", trigger: "manual" })).stdout).toBe("");
  });

  it("blocks oversized prompts when the guard is enabled", async () => {
    const root = await makeTempWorkspace({ promptGuard: { enabled: true, tokenThreshold: 5, cacheDir: "prompt-cache", tokenizer: "chars" } });
    const res = await run(root, { hook_event_name: "UserPromptSubmit", prompt: "x".repeat(100) });
    expect(res.exitCode).toBe(2);
    expect(JSON.parse(res.stdout).decision).toBe("block");
    expect(await fs.readFile(path.join(root, "prompt-cache", "latest.md"), "utf8")).toBe("x".repeat(100));
  });

  it("writes the session tail on SessionEnd when configured", async () => {
    const root = await makeTempWorkspace({ sessionEnd: { tailCount: 1 } });
    const transcript = path.join(root, "t.jsonl");
    await fs.writeFile(
      transcript,
      [
        JSON.stringify({ type: "user", message: { role: "user", content: "hello" } }),
        JSON.stringify({ type: "assistant", message: { role: "assistant", content: [{ type: "text", text: "hi" }] } }),
      ].join("\n"),
      "utf8",
    );
    await run(root, { hook_event_name: "SessionEnd", reason: "other", transcript_path: transcript });
    expect(await fs.readFile(path.join(getPaths(root).sessionsDir, "s1_tail.md"), "utf8")).toBe(
      "# Session s1 tail\n\n## User\n\nhello\n\n## Assistant\n\nhi\n",
    );
  });

  it("reports invalid input with exit 1", async () => {
    const res = await runHook("{ nope", { env: {}, logger });
    expect(res.exitCode).toBe(1);
    expect(JSON.parse(res.stdout).systemMessage).toMatch(/^hookrail: Invalid JSON/);
  });

  it("falls back to ask when a PreToolUse event is malformed", async () => {
    const root = await makeTempWorkspace();
    const res = await run(root, { hook_event_name: "PreToolUse" });
    expect(res.exitCode).toBe(0);
    expect(JSON.parse(res.stdout).hookSpecificOutput.permissionDecision).toBe("ask");
  });

  it("surfaces a broken rule set instead of applying an empty policy", async () => {
    const root = await makeTempWorkspace();
    await fs.writeFile(getPaths(root).rules, "{ broken", "utf8");
    const pre = await run(root, { hook_event_name: "PreToolUse", tool_name: "Read", tool_input: { file_path: "a.ts" } });
    expect(pre.exitCode).toBe(0);
    const body = JSON.parse(pre.stdout);
    expect(body.hookSpecificOutput.permissionDecision).toBe("ask");
    expect(body.systemMessage).toContain("is not valid JSON");

    const start = await run(root, { hook_event_name: "SessionStart", source: "startup" });
    expect(start.exitCode).toBe(1);
  });

  it("does nothing when disabled", async () => {
    const root = await makeTempWorkspace();
    const res = await run(
      root,
      { hook_event_name: "PreToolUse", tool_name: "Bash", tool_input: { command: "rm -rf /" } },
      { HOOKRAIL_DISABLE: "1" },
    );
    expect(res).toEqual({ stdout: "", stderr: "", exitCode: 0 });
  });
});
