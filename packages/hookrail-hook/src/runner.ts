import { loadRuleSet } from "./config.js";
import { dispatch } from "./dispatch.js";
import { envBool, envInt, type Env } from "./env.js";
import { ConfigError, InputError, errorMessage } from "./errors.js";
import { isHookEventName, parseEvent, type HookEvent, type HookEventName } from "./events.js";
import type { HookContext } from "./handlers/context.js";
import { createLogger, type Logger } from "./logger.js";
import { noneResult, renderResult, safeDefault, type HookResult, type RenderedResponse } from "./output.js";
import { getPaths, resolveRoot } from "./resolver.js";

export const DEFAULT_TIMEOUT_MS = 8000;

export type RunOptions = {
  env?: Env;
  logger?: Logger;
  /** `--config` flag; wins over HOOKRAIL_CONFIG_PATH. */
  configPath?: string | null;
};

function failure(event: HookEventName | null, message: string): HookResult {
  return { event, decision: safeDefault(event), systemMessage: `hookrail: ${message}`, failed: true };
}

type Invocation = {
  env: Env;
  logger: Logger;
  configPath: string | null;
  signal: AbortSignal;
};

async function buildContext(event: HookEvent, inv: Invocation): Promise<HookContext> {
  const project = await resolveRoot(event.cwd, inv.env);
  const { ruleSet, source } = await loadRuleSet(project.root, inv.env, inv.configPath);
  return {
    project,
    paths: getPaths(project.root),
    ruleSet,
    configSource: source,
    env: inv.env,
    logger: inv.logger,
    signal: inv.signal,
  };
}

async function handleEvent(event: HookEvent, inv: Invocation): Promise<HookResult> {
  const { logger } = inv;
  try {
    const ctx = await buildContext(event, inv);
    logger.debug({ event: event.hook_event_name, root: ctx.project.root, config: ctx.configSource }, "hook context loaded");
    return await dispatch(event, ctx);
  } catch (err) {
    if (inv.signal.aborted) {
      logger.debug({ event: event.hook_event_name }, "handler abandoned after the deadline");
      return failure(event.hook_event_name, "deadline reached");
    }
    if (err instanceof ConfigError) {
      logger.error({ file: err.filePath, err: err.message }, "rule set rejected");
      return failure(event.hook_event_name, err.message);
    }
    logger.error({ event: event.hook_event_name, err: errorMessage(err) }, "hook failed");
    return failure(event.hook_event_name, `internal error: ${errorMessage(err)}`);
  }
}

/**
 * Resolves with the safe default once `ms` elapses and aborts the handler's signal, so the
 * abandoned handler commits nothing afterwards. The timer never keeps the process alive.
 */
async function withDeadline(
  work: (signal: AbortSignal) => Promise<HookResult>,
  event: HookEventName,
  ms: number,
  logger: Logger,
): Promise<HookResult> {
  const controller = new AbortController();
  if (ms <= 0) return work(controller.signal);
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<HookResult>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      logger.warn({ event, timeoutMs: ms }, "hook deadline reached; falling back to the safe default");
      resolve(failure(event, `timed out after ${ms}ms`));
    }, ms);
    timer.unref();
  });
  try {
    return await Promise.race([work(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/** One event in, one rendered response out. Never throws. */
export async function runHook(raw: string, options: RunOptions = {}): Promise<RenderedResponse> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger(env);

  if (envBool(env, "HOOKRAIL_DISABLE")) return renderResult(noneResult(null));

  let event: HookEvent;
  try {
    event = await parseEvent(raw);
  } catch (err) {
    if (!(err instanceof InputError)) throw err;
    logger.error({ event: err.eventName, err: err.message }, "invalid hook input");
    return renderResult(failure(isHookEventName(err.eventName) ? err.eventName : null, err.message));
  }

  const timeoutMs = envInt(env, "HOOKRAIL_TIMEOUT_MS", DEFAULT_TIMEOUT_MS);
  const configPath = options.configPath ?? null;
  const result = await withDeadline(
    (signal) => handleEvent(event, { env, logger, configPath, signal }),
    event.hook_event_name,
    timeoutMs,
    logger,
  );
  return renderResult(result);
}
