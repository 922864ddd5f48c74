import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import type { RuleSet } from "../src/config.js";
import { cacheFileName, countTokens, estimateTokens, guardPrompt } from "../src/promptGuard.js";

async function makeGuard(overrides: Partial<RuleSet["promptGuard"]> = {}): Promise<RuleSet["promptGuard"]> {
  const cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), "hookrail-guard-"));
  return { enabled: true, tokenThreshold: 2, cacheDir, skipPrefix: "", tokenizer: "chars", ...overrides };
}

describe("prompt guard", () => {
  it("estimates four characters per token", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });

  it("counts o200k_base tokens by default", async () => {
    expect(await countTokens("")).toBe(0);
    expect(await countTokens("hello world")).toBe(2);
    expect(await countTokens("hello world", "chars")).toBe(3);
  });

  it("passes prompts at or under the threshold", async () => {
    const guard = await makeGuard();
    expect(await guardPrompt(guard, "s1", "12345678")).toEqual({ kind: "pass", tokens: 2 });
  });

  it("parks oversized prompts on disk", async () => {
    const guard = await makeGuard();
    const verdict = await guardPrompt(guard, "session-1234", "123456789");
    if (verdict.kind !== "blocked") throw new Error("expected a block");
    expect(verdict.tokens).toBe(3);
    expect(path.dirname(verdict.savedTo)).toBe(guard.cacheDir);
    expect(path.basename(verdict.savedTo)).toMatch(/^\d{4}-\d{2}-\d{2}T[\d-]+Z-session--[0-9a-f]{10}\.md$/);
    expect(await fs.readFile(verdict.savedTo, "utf8")).toBe("123456789");
    expect(await fs.readFile(path.join(guard.cacheDir, "latest.md"), "utf8")).toBe("123456789");
    expect(verdict.reason).toContain(verdict.savedTo);
  });

  it("lets a skip prefix or a disabled guard through", async () => {
    expect((await guardPrompt(await makeGuard({ skipPrefix: "!!" }), "s1", "!! a very long prompt")).kind).toBe("pass");
    expect((await guardPrompt(await makeGuard({ enabled: false }), "s1", "a very long prompt")).kind).toBe("pass");
  });

  it("names cache files after time, session and content", () => {
    const at = new Date("2026-03-04T05:06:07.089Z");
    expect(cacheFileName("abc/def-123456", "hello", at)).toBe(
      "2026-03-04T05-06-07-089Z-abcdef-1-2cf24dba5f.md",
    );
  });
});
