import type { PreCompactEvent } from "../events.js";
import { contextResult, type HookResult } from "../output.js";
import type { HookContext } from "./context.js";
import { injectionFor } from "./inject.js";

export async function handlePreCompact(event: PreCompactEvent, ctx: HookContext): Promise<HookResult> {
  if (event.trigger === "auto" && ctx.ruleSet.preCompact.blockAuto) {
    return {
      event: "PreCompact",
      decision: { kind: "none" },
      halt: { stopReason: "Automatic compaction is disabled for this project; compact manually when ready." },
    };
  }
  return contextResult("PreCompact", await injectionFor(event, ctx));
}
