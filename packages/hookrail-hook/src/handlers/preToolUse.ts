import { appendAudit } from "../audit.js";
import type { PreToolUseEvent } from "../events.js";
import type { HookResult } from "../output.js";
import { evaluatePolicy } from "../policy.js";
import { buildScope } from "../scope.js";
import type { HookContext } from "./context.js";

export async function handlePreToolUse(event: PreToolUseEvent, ctx: HookContext): Promise<HookResult> {
  const { policy } = ctx.ruleSet;
  const outcome = evaluatePolicy(policy.rules, policy.default, event.tool_name, event.tool_input, buildScope(event));

  if (outcome.decision.kind !== "allow" && outcome.decision.kind !== "none") {
    await appendAudit(
      ctx.paths,
      {
        event: "PreToolUse",
        session_id: event.session_id,
        tool_name: event.tool_name,
        decision: outcome.decision.kind,
        rule: outcome.rule?.name ?? (outcome.ruleIndex >= 0 ? `#${outcome.ruleIndex + 1}` : null),
      },
      ctx.logger,
    );
  }
  ctx.logger.debug({ tool: event.tool_name, decision: outcome.decision.kind, rule: outcome.ruleIndex }, "policy evaluated");
  return { event: "PreToolUse", decision: outcome.decision };
}
