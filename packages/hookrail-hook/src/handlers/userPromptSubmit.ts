import { appendAudit } from "../audit.js";
import type { UserPromptSubmitEvent } from "../events.js";
import { contextResult, type HookResult } from "../output.js";
import { guardPrompt } from "../promptGuard.js";
import type { HookContext } from "./context.js";
import { injectionFor } from "./inject.js";

export async function handleUserPromptSubmit(event: UserPromptSubmitEvent, ctx: HookContext): Promise<HookResult> {
  const verdict = await guardPrompt(ctx.ruleSet.promptGuard, event.session_id, event.prompt);
  if (verdict.kind === "blocked") {
    await appendAudit(
      ctx.paths,
      { event: "UserPromptSubmit", session_id: event.session_id, decision: "block", tokens: verdict.tokens, savedTo: verdict.savedTo },
      ctx.logger,
    );
    return { event: "UserPromptSubmit", decision: { kind: "block", reason: verdict.reason } };
  }
  return contextResult("UserPromptSubmit", await injectionFor(event, ctx, { prompt_tokens: verdict.tokens }));
}
