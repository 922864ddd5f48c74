import path from "node:path";
import crypto from "node:crypto";
import type { RuleSet } from "./config.js";
import { writeTextAtomic } from "./store.js";

export type PromptGuardVerdict =
  | { kind: "pass"; tokens: number }
  | { kind: "blocked"; tokens: number; savedTo: string; reason: string };

export type Tokenizer = "o200k_base" | "chars";

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

type Encoder = (text: string) => number;

let o200k: Promise<Encoder | null> | null = null;

/** Loaded on first use: the rank tables are large and most invocations never count tokens. */
function loadO200k(): Promise<Encoder | null> {
  o200k ??= import("js-tiktoken")
    .then(({ getEncoding }): Encoder => {
      const encoding = getEncoding("o200k_base");
      return (text) => encoding.encode(text).length;
    })
    // no tokenizer available: counting falls back to the character estimate
    .catch(() => null);
  return o200k;
}

export async function countTokens(text: string, tokenizer: Tokenizer = "o200k_base"): Promise<number> {
  if (tokenizer === "chars" || text.length === 0) return estimateTokens(text);
  const encode = await loadO200k();
  return encode ? encode(text) : estimateTokens(text);
}

export function cacheFileName(sessionId: string, prompt: string, at: Date = new Date()): string {
  const ts = at.toISOString().replace(/[:.]/g, "-");
  const session = (sessionId || "nosession").replace(/[^A-Za-z0-9_-]/g, "").slice(0, 8) || "nosession";
  const digest = crypto.createHash("sha256").update(prompt).digest("hex").slice(0, 10);
  return `${ts}-${session}-${digest}.md`;
}

/**
 * Oversized prompts are parked on disk instead of reaching the model. The saved copy is also
 * written to `latest.md` so it is easy to find again.
 */
export async function guardPrompt(
  guard: RuleSet["promptGuard"],
  sessionId: string,
  prompt: string,
): Promise<PromptGuardVerdict> {
  const tokens = await countTokens(prompt, guard.tokenizer);
  if (!guard.enabled) return { kind: "pass", tokens };
  if (guard.skipPrefix && prompt.trimStart().startsWith(guard.skipPrefix)) return { kind: "pass", tokens };
  if (tokens <= guard.tokenThreshold) return { kind: "pass", tokens };

  const savedTo = path.join(guard.cacheDir, cacheFileName(sessionId, prompt));
  await writeTextAtomic(savedTo, prompt);
  await writeTextAtomic(path.join(guard.cacheDir, "latest.md"), prompt);

  const bypass = guard.skipPrefix ? ` Start the prompt with "${guard.skipPrefix}" to send it anyway.` : "";
  return {
    kind: "blocked",
    tokens,
    savedTo,
    reason:
      `Prompt is about ${tokens} tokens, above the limit of ${guard.tokenThreshold}. ` +
      `It was saved to ${savedTo}; trim it or reference the file instead.${bypass}`,
  };
}
