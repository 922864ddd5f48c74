import path from "node:path";
import fs from "node:fs/promises";
import matter from "gray-matter";
import type { InjectionEventName, InstructionRule } from "./config.js";
import { ResourceMissingError, errorMessage } from "./errors.js";
import type { HookEvent } from "./events.js";
import { interpolate, type UnresolvedMode } from "./interpolate.js";
import type { Logger } from "./logger.js";
import { matchSubset, matchText, matchToolName, evaluate, type Scope } from "./matcher.js";

export type InjectionEvent = Extract<HookEvent, { hook_event_name: InjectionEventName }>;

export type InjectionOptions = {
  promptsDir: string;
  unresolved: UnresolvedMode;
  logger: Logger;
};

export type Injection = {
  content: string | null;
  fired: string[];
  skipped: { rule: string; file: string }[];
  missing: string[];
  ambiguous: string[];
};

/** SessionStart: source, PreCompact: trigger, PostToolUse: tool name, UserPromptSubmit: "prompt". */
export function subtypeOf(event: InjectionEvent): string {
  switch (event.hook_event_name) {
    case "SessionStart":
      return event.source;
    case "PreCompact":
      return event.trigger;
    case "PostToolUse":
      return event.tool_name;
    case "UserPromptSubmit":
      return "prompt";
  }
}

function inputSubject(event: InjectionEvent): { present: boolean; value: unknown } {
  switch (event.hook_event_name) {
    case "PostToolUse":
      return { present: true, value: event.tool_input };
    case "UserPromptSubmit":
      return { present: true, value: event.prompt };
    case "PreCompact":
      return { present: true, value: event.custom_instructions };
    case "SessionStart":
      return { present: false, value: undefined };
  }
}

function matchLoose(matcher: string | Record<string, unknown>, value: unknown): boolean {
  return typeof matcher === "string" ? matchText(matcher, value) : matchSubset(matcher, value);
}

export function matchWhen(when: readonly string[] | undefined, event: InjectionEvent): boolean {
  if (!when || when.length === 0 || when.includes("*")) return true;
  const subtype = subtypeOf(event);
  if (event.hook_event_name === "PostToolUse") return when.some((p) => matchToolName(subtype, p));
  return when.includes(subtype);
}

export function ruleApplies(rule: InstructionRule, event: InjectionEvent, scope: Scope): boolean {
  if (!rule.on.includes(event.hook_event_name)) return false;
  if (!matchWhen(rule.when, event)) return false;
  if (rule.tool) {
    if (event.hook_event_name !== "PostToolUse") return false;
    if (!matchToolName(event.tool_name, rule.tool)) return false;
  }
  if (rule.input !== undefined) {
    const subject = inputSubject(event);
    if (!subject.present || !matchLoose(rule.input, subject.value)) return false;
  }
  if (rule.output !== undefined) {
    if (event.hook_event_name !== "PostToolUse") return false;
    if (!matchLoose(rule.output, scope.tool_response)) return false;
  }
  if (rule.match && !evaluate(rule.match, scope)) return false;
  return true;
}

export async function readContentFile(filePath: string): Promise<string> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new ResourceMissingError(filePath, { cause: err });
  }
  try {
    return matter(raw).content.trim();
  } catch {
    // unparseable frontmatter: treat the whole file as content
    return raw.trim();
  }
}

/**
 * Every applicable rule contributes, in declaration order. A rule whose referenced file is
 * missing contributes nothing; the others are unaffected. Never throws for content problems.
 */
export async function resolveInjection(
  rules: readonly InstructionRule[],
  event: InjectionEvent,
  scope: Scope,
  options: InjectionOptions,
): Promise<Injection> {
  const blocks: string[] = [];
  const fired: string[] = [];
  const skipped: { rule: string; file: string }[] = [];
  const missing = new Set<string>();
  const ambiguous = new Set<string>();
  const seenFiles = new Set<string>();

  for (const [index, rule] of rules.entries()) {
    if (!ruleApplies(rule, event, scope)) continue;
    const label = rule.name ?? `#${index + 1}`;

    const ruleBlocks: string[] = [];
    const ruleFiles: string[] = [];
    let failed = false;
    for (const file of rule.include) {
      const filePath = path.resolve(options.promptsDir, file);
      if (seenFiles.has(filePath) || ruleFiles.includes(filePath)) continue;
      try {
        const text = await readContentFile(filePath);
        ruleFiles.push(filePath);
        if (text) ruleBlocks.push(text);
      } catch (err) {
        options.logger.warn({ rule: label, file: filePath, err: errorMessage(err) }, "instruction file missing; rule skipped");
        skipped.push({ rule: label, file });
        failed = true;
        break;
      }
    }
    if (failed) continue;
    ruleBlocks.push(...rule.text);

    for (const block of ruleBlocks) {
      const rendered = interpolate(block, scope, options.unresolved);
      rendered.missing.forEach((k) => missing.add(k));
      rendered.ambiguous.forEach((k) => ambiguous.add(k));
      if (rendered.text.trim()) blocks.push(rendered.text);
    }
    ruleFiles.forEach((f) => seenFiles.add(f));
    fired.push(label);
  }

  if (missing.size > 0 || ambiguous.size > 0) {
    options.logger.warn(
      { event: event.hook_event_name, missing: [...missing].sort(), ambiguous: [...ambiguous].sort() },
      "unresolved placeholders in instructions",
    );
  }

  return {
    content: blocks.length > 0 ? blocks.join("\n\n") : null,
    fired,
    skipped,
    missing: [...missing].sort(),
    ambiguous: [...ambiguous].sort(),
  };
}
