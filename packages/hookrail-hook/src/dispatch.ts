import type { HookEvent } from "./events.js";
import { noneResult, type HookResult } from "./output.js";
import type { HookContext } from "./handlers/context.js";
import { handlePostToolUse } from "./handlers/postToolUse.js";
import { handlePreCompact } from "./handlers/preCompact.js";
import { handlePreToolUse } from "./handlers/preToolUse.js";
import { handleSessionEnd } from "./handlers/sessionEnd.js";
import { handleSessionStart } from "./handlers/sessionStart.js";
import { handleStop } from "./handlers/stop.js";
import { handleUserPromptSubmit } from "./handlers/userPromptSubmit.js";

function assertNever(value: never): never {
  throw new Error(`Unhandled hook event: ${JSON.stringify(value)}`);
}

export async function dispatch(event: HookEvent, ctx: HookContext): Promise<HookResult> {
  switch (event.hook_event_name) {
    case "PreToolUse":
      return handlePreToolUse(event, ctx);
    case "PostToolUse":
      return handlePostToolUse(event, ctx);
    case "UserPromptSubmit":
      return handleUserPromptSubmit(event, ctx);
    case "Stop":
    case "SubagentStop":
      return handleStop(event, ctx);
    case "PreCompact":
      return handlePreCompact(event, ctx);
    case "SessionStart":
      return handleSessionStart(event, ctx);
    case "SessionEnd":
      return handleSessionEnd(event, ctx);
    case "Notification":
      return noneResult("Notification");
    default:
      return assertNever(event);
  }
}
