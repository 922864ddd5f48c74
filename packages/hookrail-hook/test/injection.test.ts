import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { buildRuleSet } from "../src/config.js";
import type { PostToolUseEvent, SessionStartEvent, UserPromptSubmitEvent } from "../src/events.js";
import { resolveInjection, type InjectionEvent } from "../src/injection.js";
import { silentLogger } from "../src/logger.js";
import { buildScope } from "../src/scope.js";

async function makePromptsDir(files: Record<string, string> = {}): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "hookrail-prompts-"));
  for (const [name, content] of Object.entries(files)) await fs.writeFile(path.join(dir, name), content, "utf8");
  return dir;
}

function rules(data: unknown[]) {
  return buildRuleSet("/work", { instructions: { rules: data } }).instructions.rules;
}

function sessionStart(source: SessionStartEvent["source"]): SessionStartEvent {
  return { hook_event_name: "SessionStart", session_id: "s1", transcript_path: "", cwd: "/work", source };
}

function postToolUse(toolName: string, toolInput: Record<string, unknown>, toolResponse: unknown): PostToolUseEvent {
  return {
    hook_event_name: "PostToolUse",
    session_id: "s1",
    transcript_path: "",
    cwd: "/work",
    tool_name: toolName,
    tool_input: toolInput,
    tool_response: toolResponse,
  };
}

function prompt(text: string): UserPromptSubmitEvent {
  return { hook_event_name: "UserPromptSubmit", session_id: "s1", transcript_path: "", cwd: "/work", prompt: text };
}

async function run(ruleData: unknown[], event: InjectionEvent, promptsDir: string, unresolved: "keep" | "empty" = "keep") {
  return resolveInjection(rules(ruleData), event, buildScope(event), { promptsDir, unresolved, logger: silentLogger() });
}

const startupRules = [
  { name: "boot", on: ["SessionStart"], when: ["startup", "clear"], text: ["Session ${session_id} started from ${source}"] },
  { name: "after-compact", on: ["SessionStart"], when: ["compact"], text: ["Resumed after compaction"] },
];

describe("resolveInjection", () => {
  it("selects rules by SessionStart source", async () => {
    const dir = await makePromptsDir();
    const startup = await run(startupRules, sessionStart("startup"), dir);
    expect(startup.content).toBe("Session s1 started from startup");
    expect(startup.fired).toEqual(["boot"]);

    const compact = await run(startupRules, sessionStart("compact"), dir);
    expect(compact.content).toBe("Resumed after compaction");
    expect(compact.fired).toEqual(["after-compact"]);

    expect((await run(startupRules, sessionStart("resume"), dir)).content).toBeNull();
  });

  it("accumulates every matching rule in order and strips frontmatter", async () => {
    const dir = await makePromptsDir({
      "edit.md": "---\ntitle: Edit notes\n---\nEdited ${file_path} with ${tool_name}\n",
    });
    const res = await run(
      [
        { name: "notes", on: ["PostToolUse"], when: ["Edit", "Write"], include: ["edit.md"] },
        { name: "again", on: ["PostToolUse"], include: ["edit.md"], text: ["Run the linter."] },
      ],
      postToolUse("Edit", { file_path: "src/a.ts" }, { ok: true }),
      dir,
    );
    expect(res.content).toBe("Edited src/a.ts with Edit\n\nRun the linter.");
    expect(res.fired).toEqual(["notes", "again"]);
  });

  it("skips only the rule whose file is missing", async () => {
    const dir = await makePromptsDir();
    const res = await run(
      [
        { name: "broken", on: ["SessionStart"], include: ["missing.md"], text: ["never shown"] },
        { name: "fine", on: ["SessionStart"], text: ["still here"] },
      ],
      sessionStart("startup"),
      dir,
    );
    expect(res.content).toBe("still here");
    expect(res.skipped).toEqual([{ rule: "broken", file: "missing.md" }]);
  });

  it("matches tool input and output", async () => {
    const dir = await makePromptsDir();
    const ruleData = [
      {
        name: "failing-tests",
        on: ["PostToolUse"],
        tool: "Bash",
        input: { command: "re:^npm test" },
        output: "FAIL",
        text: ["Tests failed: fix them before moving on."],
      },
    ];
    const failing = postToolUse("Bash", { command: "npm test" }, JSON.stringify({ stdout: "FAIL src/a.test.ts" }));
    expect((await run(ruleData, failing, dir)).content).toBe("Tests failed: fix them before moving on.");
    const passing = postToolUse("Bash", { command: "npm test" }, { stdout: "PASS src/a.test.ts" });
    expect((await run(ruleData, passing, dir)).content).toBeNull();
    const other = postToolUse("Bash", { command: "ls" }, { stdout: "FAIL" });
    expect((await run(ruleData, other, dir)).content).toBeNull();
  });

  it("filters PostToolUse subtypes by tool name", async () => {
    const dir = await makePromptsDir();
    const ruleData = [{ on: ["PostToolUse"], when: ["Edit"], text: ["edited"] }];
    expect((await run(ruleData, postToolUse("Write", { file_path: "a" }, {}), dir)).content).toBeNull();
    expect((await run(ruleData, postToolUse("Edit", { file_path: "a" }, {}), dir)).fired).toEqual(["#1"]);
  });

  it("matches prompts by text", async () => {
    const dir = await makePromptsDir();
    const ruleData = [{ name: "deploy", on: ["UserPromptSubmit"], input: "deploy", text: ["Check the release checklist."] }];
    expect((await run(ruleData, prompt("please deploy to staging"), dir)).content).toBe("Check the release checklist.");
    expect((await run(ruleData, prompt("fix the bug"), dir)).content).toBeNull();
  });

  it("keeps or empties unresolved placeholders and reports them", async () => {
    const dir = await makePromptsDir();
    const ruleData = [{ on: ["SessionStart"], text: ["Hi ${nobody}"] }];
    const kept = await run(ruleData, sessionStart("startup"), dir);
    expect(kept.content).toBe("Hi ${nobody}");
    expect(kept.missing).toEqual(["nobody"]);
    expect((await run(ruleData, sessionStart("startup"), dir, "empty")).content).toBe("Hi ");
  });
});
