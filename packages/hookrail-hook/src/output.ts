import type { HookEventName } from "./events.js";

export type DecisionKind = "allow" | "ask" | "deny" | "block" | "none";

export type Decision = {
  kind: DecisionKind;
  reason?: string;
  modifiedInput?: Record<string, unknown>;
};

/**
 * What a handler produced for one event. `systemMessage` is operator-visible; `decision.reason`
 * is agent-visible. `failed` marks an operator-facing error (exit 1) whose decision is already
 * the safe default for the event kind.
 */
export type HookResult = {
  event: HookEventName | null;
  decision: Decision;
  additionalContext?: string;
  systemMessage?: string;
  halt?: { stopReason: string };
  failed?: boolean;
};

export type RenderedResponse = {
  stdout: string;
  stderr: string;
  exitCode: 0 | 1 | 2;
};

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_BLOCK = 2;

export function noneResult(event: HookEventName | null): HookResult {
  return { event, decision: { kind: "none" } };
}

export function contextResult(event: HookEventName, additionalContext: string | null): HookResult {
  if (!additionalContext) return noneResult(event);
  return { event, decision: { kind: "none" }, additionalContext };
}

/** The fallback a timed-out or failed invocation must amount to. */
export function safeDefault(event: HookEventName | null): Decision {
  if (event === "PreToolUse") return { kind: "ask", reason: "hookrail could not evaluate this call; confirm manually." };
  return { kind: "none" };
}

function isPermission(kind: DecisionKind): kind is "allow" | "ask" | "deny" {
  return kind === "allow" || kind === "ask" || kind === "deny";
}

export function renderResult(result: HookResult): RenderedResponse {
  const out: Record<string, unknown> = {};
  const stderr: string[] = [];
  const { decision } = result;

  if (result.event === "PreToolUse" && isPermission(decision.kind)) {
    const specific: Record<string, unknown> = {
      hookEventName: "PreToolUse",
      permissionDecision: decision.kind,
    };
    if (decision.reason) specific.permissionDecisionReason = decision.reason;
    if (decision.modifiedInput && decision.kind !== "deny") specific.updatedInput = decision.modifiedInput;
    out.hookSpecificOutput = specific;
  } else if (decision.kind === "block") {
    out.decision = "block";
    out.reason = decision.reason ?? "";
  } else if (result.additionalContext && result.event) {
    out.hookSpecificOutput = { hookEventName: result.event, additionalContext: result.additionalContext };
  }

  if (result.halt) {
    out.continue = false;
    out.stopReason = result.halt.stopReason;
  }
  if (result.systemMessage) out.systemMessage = result.systemMessage;

  // A failed invocation that still carries a permission decision exits 0 so the host applies it.
  let exitCode: RenderedResponse["exitCode"] = EXIT_OK;
  if (decision.kind === "deny" || decision.kind === "block") {
    exitCode = EXIT_BLOCK;
    if (decision.reason) stderr.push(decision.reason);
  } else if (result.failed && decision.kind === "none") {
    exitCode = EXIT_ERROR;
  }
  if (result.failed && result.systemMessage) stderr.push(result.systemMessage);

  return {
    stdout: Object.keys(out).length > 0 ? JSON.stringify(out) : "",
    stderr: stderr.join("\n"),
    exitCode,
  };
}
