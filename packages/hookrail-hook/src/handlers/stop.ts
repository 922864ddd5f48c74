import type { StopEvent } from "../events.js";
import { evaluateStop } from "../loops.js";
import { noneResult, type HookResult } from "../output.js";
import { lastAssistantText } from "../transcript.js";
import type { HookContext } from "./context.js";

/** Subagent stops never drive the foreground loop. */
export async function handleStop(event: StopEvent, ctx: HookContext): Promise<HookResult> {
  if (event.hook_event_name === "SubagentStop") return noneResult("SubagentStop");

  const verdict = await evaluateStop(
    ctx.paths,
    event.session_id,
    async () => event.last_assistant_message ?? (await lastAssistantText(event.transcript_path)),
    ctx.logger,
    ctx.signal,
  );

  switch (verdict.kind) {
    case "idle":
      return noneResult("Stop");
    case "completed":
      return { event: "Stop", decision: { kind: "none" }, systemMessage: `hookrail loop ${verdict.loop.id}: promise fulfilled` };
    case "exhausted":
      return {
        event: "Stop",
        decision: { kind: "none" },
        systemMessage: `hookrail loop ${verdict.loop.id}: stopped after ${verdict.loop.iteration}/${verdict.loop.maxIterations} iterations`,
      };
    case "continue": {
      const { loop } = verdict;
      const max = loop.maxIterations > 0 ? String(loop.maxIterations) : "∞";
      return {
        event: "Stop",
        decision: { kind: "block", reason: loop.directive },
        systemMessage: `hookrail loop ${loop.id}: iteration ${loop.iteration}/${max}`,
      };
    }
  }
}
