import { envStr } from "../env.js";
import { errorMessage } from "../errors.js";
import type { SessionStartEvent } from "../events.js";
import { contextResult, type HookResult } from "../output.js";
import { SESSION_ENV_FILE_VAR, appendSessionEnv, readEnvFiles } from "../sessionEnv.js";
import type { HookContext } from "./context.js";
import { injectionFor } from "./inject.js";

async function loadSessionEnv(event: SessionStartEvent, ctx: HookContext): Promise<void> {
  const { envFiles, envWhen } = ctx.ruleSet.sessionStart;
  if (envFiles.length === 0 || !envWhen.includes(event.source)) return;
  const target = envStr(ctx.env, SESSION_ENV_FILE_VAR);
  if (!target) {
    ctx.logger.debug({ files: envFiles }, `${SESSION_ENV_FILE_VAR} is not set; env files not loaded`);
    return;
  }
  try {
    const vars = await readEnvFiles(envFiles, ctx.logger);
    ctx.signal.throwIfAborted();
    const count = await appendSessionEnv(target, vars);
    ctx.logger.info({ count, target }, "session environment loaded");
  } catch (err) {
    ctx.logger.warn({ target, err: errorMessage(err) }, "session environment not loaded");
  }
}

export async function handleSessionStart(event: SessionStartEvent, ctx: HookContext): Promise<HookResult> {
  await loadSessionEnv(event, ctx);
  return contextResult("SessionStart", await injectionFor(event, ctx));
}
