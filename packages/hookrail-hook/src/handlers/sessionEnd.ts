import path from "node:path";
import { errorMessage } from "../errors.js";
import type { SessionEndEvent } from "../events.js";
import { noneResult, type HookResult } from "../output.js";
import { findActivePacket, snapshotPacket } from "../packets.js";
import { writeTextAtomic } from "../store.js";
import { readTranscript, renderTail, tailTurns } from "../transcript.js";
import type { HookContext } from "./context.js";

async function snapshotActive(ctx: HookContext): Promise<void> {
  const packet = await findActivePacket(ctx.paths, ctx.logger);
  if (!packet) return;
  const next = await snapshotPacket(ctx.paths, packet.id, ctx.logger, ctx.signal);
  ctx.logger.info({ packet: next.id, suggested: next.suggestedFiles.length }, "packet snapshot written");
}

async function writeTail(event: SessionEndEvent, ctx: HookContext): Promise<void> {
  const turns = tailTurns(await readTranscript(event.transcript_path), ctx.ruleSet.sessionEnd.tailCount);
  if (turns.length === 0) return;
  ctx.signal.throwIfAborted();
  const safeSession = event.session_id.replace(/[^A-Za-z0-9_-]/g, "_") || "session";
  await writeTextAtomic(path.join(ctx.paths.sessionsDir, `${safeSession}_tail.md`), renderTail(event.session_id, turns));
}

/** Handoff point: both steps are best effort and never block the session from ending. */
export async function handleSessionEnd(event: SessionEndEvent, ctx: HookContext): Promise<HookResult> {
  const { sessionEnd } = ctx.ruleSet;
  if (sessionEnd.snapshotPacket) {
    try {
      await snapshotActive(ctx);
    } catch (err) {
      ctx.logger.warn({ err: errorMessage(err) }, "packet snapshot failed");
    }
  }
  if (sessionEnd.tailCount > 0 && sessionEnd.tailWhen.includes(event.reason)) {
    try {
      await writeTail(event, ctx);
    } catch (err) {
      ctx.logger.warn({ err: errorMessage(err) }, "session tail failed");
    }
  }
  return noneResult("SessionEnd");
}
