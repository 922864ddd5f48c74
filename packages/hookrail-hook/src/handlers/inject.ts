import { resolveInjection, type InjectionEvent } from "../injection.js";
import type { Scope } from "../matcher.js";
import { buildScope } from "../scope.js";
import type { HookContext } from "./context.js";

/** Extra names every instruction template can reference. */
export function templateExtras(ctx: HookContext): Scope {
  return {
    project_root: ctx.paths.root,
    project_name: ctx.paths.root.split(/[\\/]/).filter(Boolean).pop() ?? "",
    prompts_dir: ctx.ruleSet.promptsDir,
  };
}

export async function injectionFor(event: InjectionEvent, ctx: HookContext, extras: Scope = {}): Promise<string | null> {
  const { instructions, promptsDir } = ctx.ruleSet;
  const scope = buildScope(event, { ...templateExtras(ctx), ...extras });
  const injection = await resolveInjection(instructions.rules, event, scope, {
    promptsDir,
    unresolved: instructions.unresolved,
    logger: ctx.logger,
  });
  if (injection.fired.length > 0) {
    ctx.logger.debug({ event: event.hook_event_name, rules: injection.fired }, "instructions injected");
  }
  return injection.content;
}
