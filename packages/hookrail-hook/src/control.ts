import { loadRuleSet } from "./config.js";
import type { Env } from "./env.js";
import type { Logger } from "./logger.js";
import type { LoopDefaults } from "./loops.js";
import { getPaths, resolveRoot, type ProjectPaths, type ProjectRoot } from "./resolver.js";

/** What out-of-band callers (the control server, scripts) need to act on a project's state. */
export type ControlContext = {
  project: ProjectRoot;
  paths: ProjectPaths;
  loopDefaults: LoopDefaults;
  logger: Logger;
};

export async function openControl(start: string, env: Env, logger: Logger): Promise<ControlContext> {
  const project = await resolveRoot(start, env);
  const { ruleSet } = await loadRuleSet(project.root, env);
  return {
    project,
    paths: getPaths(project.root),
    loopDefaults: {
      maxIterations: ruleSet.loops.defaultMaxIterations,
      promiseMatch: ruleSet.loops.promiseMatch,
    },
    logger,
  };
}
