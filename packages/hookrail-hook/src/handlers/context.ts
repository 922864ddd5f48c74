import type { RuleSet } from "../config.js";
import type { Env } from "../env.js";
import type { Logger } from "../logger.js";
import type { ProjectPaths, ProjectRoot } from "../resolver.js";

/**
 * Everything a handler may read for one invocation. Loaded once, never mutated.
 * `signal` aborts at the invocation deadline; handlers check it before committing state.
 */
export type HookContext = {
  project: ProjectRoot;
  paths: ProjectPaths;
  ruleSet: RuleSet;
  configSource: string | null;
  env: Env;
  logger: Logger;
  signal: AbortSignal;
};
