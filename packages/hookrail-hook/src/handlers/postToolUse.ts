import { errorMessage } from "../errors.js";
import type { PostToolUseEvent } from "../events.js";
import { contextResult, type HookResult } from "../output.js";
import { findActivePacket } from "../packets.js";
import { observeToolUse, trackedConfidence } from "../tracker.js";
import type { HookContext } from "./context.js";
import { injectionFor } from "./inject.js";

async function track(event: PostToolUseEvent, ctx: HookContext): Promise<void> {
  const { tracker } = ctx.ruleSet;
  if (!tracker.enabled || trackedConfidence(tracker, event.tool_name) === null) return;
  try {
    const packet = await findActivePacket(ctx.paths, ctx.logger);
    ctx.signal.throwIfAborted();
    const record = await observeToolUse(ctx.paths, tracker, event, packet?.id ?? null);
    if (record) ctx.logger.debug({ path: record.path, packet: record.packetId }, "relevant file observed");
  } catch (err) {
    ctx.logger.warn({ tool: event.tool_name, err: errorMessage(err) }, "relevant-file tracking failed");
  }
}

export async function handlePostToolUse(event: PostToolUseEvent, ctx: HookContext): Promise<HookResult> {
  await track(event, ctx);
  return contextResult("PostToolUse", await injectionFor(event, ctx));
}
