import type { PolicyDefault, PolicyRule } from "./config.js";
import { interpolate } from "./interpolate.js";
import { evaluate, matchToolName, type Scope } from "./matcher.js";
import type { Decision } from "./output.js";

const SHELL_TOOLS = "re:^(Bash|Execute)$";
const FILE_TOOLS = "re:^(Read|Edit|MultiEdit|Write|Create|NotebookEdit)$";

function shell(pattern: string) {
  return { kind: "regex", field: "tool_input.command", pattern } as const;
}

export function defaultPolicyRules(): PolicyRule[] {
  return [
    // deny: destructive or remote-exec command patterns
    {
      name: "root-delete",
      tool: SHELL_TOOLS,
      match: shell("\\brm\\s+-(rf|fr)\\s+/(\\*|\\s|$)"),
      action: "deny",
      reason: "Destructive filesystem command blocked: ${command}",
    },
    {
      name: "fork-bomb",
      tool: SHELL_TOOLS,
      match: shell(":\\(\\)\\s*\\{\\s*:\\s*\\|\\s*:\\s*&\\s*\\}\\s*;\\s*:"),
      action: "deny",
      reason: "Fork bomb pattern blocked.",
    },
    {
      name: "disk-write",
      tool: SHELL_TOOLS,
      match: { kind: "any", of: [shell("\\bmkfs(\\.|\\s)"), shell("\\bdd\\s+.*\\bof=/dev/"), shell(">\\s*/dev/sd")] },
      action: "deny",
      reason: "Direct disk write blocked: ${command}",
    },
    {
      name: "pipe-to-shell",
      tool: SHELL_TOOLS,
      match: shell("\\b(curl|wget)\\b[^|]*\\|\\s*(sudo\\s+)?(ba|z)?sh\\b"),
      action: "deny",
      reason: "Remote code execution pattern blocked: ${command}",
    },
    {
      name: "secret-files",
      tool: FILE_TOOLS,
      match: { kind: "regex", field: "tool_input.file_path", pattern: "(^|/)(\\.env(\\.[^/]*)?|[^/]+\\.(pem|key))$" },
      action: "deny",
      reason: "Access to secret material is blocked: ${file_path}",
    },

    // ask: history rewrites and publishing
    {
      name: "force-push",
      tool: SHELL_TOOLS,
      match: shell("\\bgit\\s+push\\b.*\\s(--force(-with-lease)?|-f)\\b"),
      action: "ask",
      reason: "Force push can overwrite remote history: ${command}",
    },
    {
      name: "hard-reset",
      tool: SHELL_TOOLS,
      match: shell("\\bgit\\s+(reset\\s+--hard|clean\\s+-[a-z]*f)"),
      action: "ask",
      reason: "Destructive git operation: ${command}",
    },
    {
      name: "publish",
      tool: SHELL_TOOLS,
      match: shell("\\b(npm|yarn|pnpm)\\s+publish\\b"),
      action: "ask",
      reason: "Publishing to a package registry: ${command}",
    },

    // allow: read-only tools and commands
    { name: "read-only-tools", tool: "re:^(Read|Grep|Glob|LS|TodoWrite)$", action: "allow" },
    { name: "hookrail-control", tool: "hookrail:*", action: "allow" },
    {
      name: "read-only-shell",
      tool: SHELL_TOOLS,
      match: shell("^(?![^\\n]*[;&|`<>]|[^\\n]*\\$\\()\\s*(git\\s+(status|diff|log|show|branch|rev-parse)\\b|ls\\b|pwd\\s*$|cat\\s|head\\s|tail\\s|which\\s)"),
      action: "allow",
    },
  ];
}

export type PolicyOutcome = {
  decision: Decision;
  rule: PolicyRule | null;
  ruleIndex: number;
};

function ruleLabel(rule: PolicyRule, index: number): string {
  return rule.name ?? `#${index + 1}`;
}

export function ruleMatches(rule: PolicyRule, toolName: string, scope: Scope): boolean {
  if (rule.tool && !matchToolName(toolName, rule.tool)) return false;
  if (rule.match && !evaluate(rule.match, scope)) return false;
  return true;
}

function fallbackReason(action: Decision["kind"], label: string): string {
  if (action === "deny") return `Blocked by hookrail policy rule ${label}.`;
  if (action === "ask") return `hookrail policy rule ${label} requires confirmation.`;
  return "";
}

/**
 * First matching rule decides. With no match the configured default applies; the engine
 * never invents an `allow` on its own. Pure: only the tool's declared name and input are read.
 */
export function evaluatePolicy(
  rules: readonly PolicyRule[],
  defaultKind: PolicyDefault,
  toolName: string,
  toolInput: Record<string, unknown>,
  scope: Scope,
): PolicyOutcome {
  for (const [index, rule] of rules.entries()) {
    if (!ruleMatches(rule, toolName, scope)) continue;

    const label = ruleLabel(rule, index);
    const rendered = rule.reason ? interpolate(rule.reason, { ...scope, rule: label }).text : "";
    const reason = rendered.trim() || fallbackReason(rule.action, label);
    const decision: Decision = { kind: rule.action };
    if (reason) decision.reason = reason;
    if (rule.updatedInput) decision.modifiedInput = { ...toolInput, ...rule.updatedInput };
    return { decision, rule, ruleIndex: index };
  }

  const decision: Decision = { kind: defaultKind };
  if (defaultKind === "ask") decision.reason = `No hookrail policy rule matched ${toolName}; confirm manually.`;
  if (defaultKind === "deny") decision.reason = `No hookrail policy rule allows ${toolName}.`;
  return { decision, rule: null, ruleIndex: -1 };
}
