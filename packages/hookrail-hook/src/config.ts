import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { fallback } from "fallback-chain-js";
import { z } from "zod";
import { ConfigError, isNotFound } from "./errors.js";
import { envChoice, envStr, type Env } from "./env.js";
import { patternRegexErrors, regexErrors, type Predicate } from "./matcher.js";
import { defaultPolicyRules } from "./policy.js";
import { getPaths, type ProjectPaths } from "./resolver.js";

export const predicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal("glob"), pattern: z.string().min(1), field: z.string().min(1).optional() }).strict(),
    z
      .object({
        kind: z.literal("regex"),
        pattern: z.string().min(1),
        flags: z.string().optional(),
        field: z.string().min(1).optional(),
      })
      .strict(),
    z.object({ kind: z.literal("subset"), value: z.record(z.unknown()), field: z.string().min(1).optional() }).strict(),
    z.object({ kind: z.literal("all"), of: z.array(predicateSchema) }).strict(),
    z.object({ kind: z.literal("any"), of: z.array(predicateSchema) }).strict(),
    z.object({ kind: z.literal("not"), predicate: predicateSchema }).strict(),
  ]),
);

const policyRuleSchema = z
  .object({
    name: z.string().min(1).optional(),
    tool: z.string().min(1).optional(),
    match: predicateSchema.optional(),
    action: z.enum(["allow", "ask", "deny"]),
    reason: z.string().optional(),
    updatedInput: z.record(z.unknown()).optional(),
  })
  .strict()
  .refine((r) => !(r.updatedInput && r.action === "deny"), {
    message: "updatedInput cannot be combined with action 'deny'",
  });

export const INJECTION_EVENTS = ["SessionStart", "PostToolUse", "PreCompact", "UserPromptSubmit"] as const;
export type InjectionEventName = (typeof INJECTION_EVENTS)[number];

const textMatcher = z.union([z.string().min(1), z.record(z.unknown())]);

const instructionRuleSchema = z
  .object({
    name: z.string().min(1).optional(),
    on: z.array(z.enum(INJECTION_EVENTS)).min(1),
    when: z.array(z.string().min(1)).optional(),
    tool: z.string().min(1).optional(),
    input: textMatcher.optional(),
    output: textMatcher.optional(),
    match: predicateSchema.optional(),
    include: z.array(z.string().min(1)).default([]),
    text: z.array(z.string()).default([]),
  })
  .strict()
  .refine((r) => r.include.length > 0 || r.text.length > 0, {
    message: "an instruction rule needs at least one 'include' file or 'text' block",
  });

const policySection = z
  .object({
    default: z.enum(["allow", "ask", "deny", "none"]).default("ask"),
    rules: z.array(policyRuleSchema).default([]),
  })
  .strict();

const instructionsSection = z
  .object({
    unresolved: z.enum(["keep", "empty"]).default("keep"),
    rules: z.array(instructionRuleSchema).default([]),
  })
  .strict();

const loopsSection = z
  .object({
    promiseMatch: z.enum(["strict", "fuzzy"]).default("strict"),
    defaultMaxIterations: z.number().int().min(0).default(0),
  })
  .strict();

const trackerSection = z
  .object({
    enabled: z.boolean().default(true),
    tools: z.record(z.number().min(0).max(1)).default({
      Read: 0.5,
      Edit: 0.9,
      MultiEdit: 0.9,
      Write: 0.9,
      Create: 0.9,
      NotebookEdit: 0.9,
    }),
    ignore: z.array(z.string().min(1)).default([".git/**", ".hookrail/**", "node_modules/**"]),
  })
  .strict();

const promptGuardSection = z
  .object({
    enabled: z.boolean().default(false),
    tokenThreshold: z.number().int().positive().default(1800),
    cacheDir: z.string().min(1).default(path.join(os.tmpdir(), "hookrail-prompts")),
    skipPrefix: z.string().default(""),
    tokenizer: z.enum(["o200k_base", "chars"]).default("o200k_base"),
  })
  .strict();

const sessionStartSection = z
  .object({
    envFiles: z.array(z.string().min(1)).default([]),
    envWhen: z.array(z.enum(["startup", "resume", "clear", "compact"])).default(["startup"]),
  })
  .strict();

const preCompactSection = z.object({ blockAuto: z.boolean().default(false) }).strict();

const sessionEndSection = z
  .object({
    snapshotPacket: z.boolean().default(true),
    tailCount: z.number().int().min(0).default(0),
    tailWhen: z.array(z.string().min(1)).default(["prompt_input_exit", "other"]),
  })
  .strict();

export const ruleSetFileSchema = z
  .object({
    $schema: z.string().optional(),
    version: z.literal(1).optional(),
    promptsDir: z.string().min(1).optional(),
    policy: policySection.optional(),
    instructions: instructionsSection.optional(),
    loops: loopsSection.optional(),
    tracker: trackerSection.optional(),
    promptGuard: promptGuardSection.optional(),
    sessionStart: sessionStartSection.optional(),
    preCompact: preCompactSection.optional(),
    sessionEnd: sessionEndSection.optional(),
  })
  .strict();

export type PolicyRule = z.infer<typeof policyRuleSchema>;
export type InstructionRule = z.infer<typeof instructionRuleSchema>;
export type PolicyDefault = z.infer<typeof policySection>["default"];

export type RuleSet = {
  promptsDir: string;
  policy: z.infer<typeof policySection>;
  instructions: z.infer<typeof instructionsSection>;
  loops: z.infer<typeof loopsSection>;
  tracker: z.infer<typeof trackerSection>;
  promptGuard: z.infer<typeof promptGuardSection>;
  sessionStart: z.infer<typeof sessionStartSection>;
  preCompact: z.infer<typeof preCompactSection>;
  sessionEnd: z.infer<typeof sessionEndSection>;
};

export type LoadedRuleSet = {
  ruleSet: RuleSet;
  source: string | null;
};

export function defaultRuleSet(root: string): RuleSet {
  return {
    promptsDir: getPaths(root).prompts,
    policy: { default: "ask", rules: defaultPolicyRules() },
    instructions: instructionsSection.parse({}),
    loops: loopsSection.parse({}),
    tracker: trackerSection.parse({}),
    promptGuard: promptGuardSection.parse({}),
    sessionStart: sessionStartSection.parse({}),
    preCompact: preCompactSection.parse({}),
    sessionEnd: sessionEndSection.parse({}),
  };
}

function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

function resolveFrom(root: string, p: string): string {
  const expanded = expandHome(p);
  return path.isAbsolute(expanded) ? expanded : path.resolve(root, expanded);
}

function collectRegexErrors(file: z.infer<typeof ruleSetFileSchema>): string[] {
  const errors: string[] = [];
  (file.policy?.rules ?? []).forEach((rule, i) => {
    const where = `policy.rules[${i}]${rule.name ? ` (${rule.name})` : ""}`;
    const found = [...(rule.tool ? patternRegexErrors(rule.tool) : []), ...(rule.match ? regexErrors(rule.match) : [])];
    errors.push(...found.map((e) => `${where}: ${e}`));
  });
  (file.instructions?.rules ?? []).forEach((rule, i) => {
    const where = `instructions.rules[${i}]${rule.name ? ` (${rule.name})` : ""}`;
    const found = [
      ...(rule.tool ? patternRegexErrors(rule.tool) : []),
      ...(typeof rule.input === "string" ? patternRegexErrors(rule.input) : []),
      ...(typeof rule.output === "string" ? patternRegexErrors(rule.output) : []),
      ...(rule.match ? regexErrors(rule.match) : []),
    ];
    errors.push(...found.map((e) => `${where}: ${e}`));
  });
  return errors;
}

/** Validates a parsed rule-set document and layers it over the defaults, one section at a time. */
export function buildRuleSet(root: string, data: unknown, source: string | null = null): RuleSet {
  const parsed = ruleSetFileSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid rule set${source ? ` in ${source}` : ""}: ${detail}`, source);
  }
  const file = parsed.data;
  const regexProblems = collectRegexErrors(file);
  if (regexProblems.length > 0) {
    throw new ConfigError(`Invalid rule set${source ? ` in ${source}` : ""}: ${regexProblems.join("; ")}`, source);
  }

  const base = defaultRuleSet(root);
  return {
    promptsDir: file.promptsDir ? resolveFrom(root, file.promptsDir) : base.promptsDir,
    policy: file.policy ?? base.policy,
    instructions: file.instructions ?? base.instructions,
    loops: file.loops ?? base.loops,
    tracker: file.tracker ?? base.tracker,
    promptGuard: file.promptGuard
      ? { ...file.promptGuard, cacheDir: resolveFrom(root, file.promptGuard.cacheDir) }
      : base.promptGuard,
    sessionStart: file.sessionStart
      ? { ...file.sessionStart, envFiles: file.sessionStart.envFiles.map((p) => resolveFrom(root, p)) }
      : base.sessionStart,
    preCompact: file.preCompact ?? base.preCompact,
    sessionEnd: file.sessionEnd ?? base.sessionEnd,
  };
}

function applyEnvOverrides(root: string, ruleSet: RuleSet, env: Env): RuleSet {
  const defaultDecision = envChoice(env, "HOOKRAIL_DEFAULT_DECISION", ["allow", "ask", "deny", "none"] as const);
  const promiseMatch = envChoice(env, "HOOKRAIL_PROMISE_MATCH", ["strict", "fuzzy"] as const);
  const promptsDir = envStr(env, "HOOKRAIL_PROMPTS_DIR");
  return {
    ...ruleSet,
    promptsDir: promptsDir ? resolveFrom(root, promptsDir) : ruleSet.promptsDir,
    policy: defaultDecision ? { ...ruleSet.policy, default: defaultDecision } : ruleSet.policy,
    loops: promiseMatch ? { ...ruleSet.loops, promiseMatch } : ruleSet.loops,
  };
}

/**
 * First existing candidate wins: explicit path (flag, then HOOKRAIL_CONFIG_PATH),
 * `.hookrail/rules.json`, `hookrail.rules.json`. An explicit path that does not exist is
 * a ConfigError rather than a silent fallback to the defaults.
 */
type Located = { candidate: string; raw: string } | { candidate: string; error: unknown } | null;

/** Only a missing file moves on to the next candidate; any other read failure is reported. */
async function readCandidate(candidate: string): Promise<Located> {
  try {
    return { candidate, raw: await fs.readFile(candidate, "utf8") };
  } catch (err) {
    if (isNotFound(err)) throw err;
    return { candidate, error: err };
  }
}

async function locateRuleSet(p: ProjectPaths, explicit: string | null): Promise<Located> {
  if (explicit) {
    try {
      return { candidate: explicit, raw: await fs.readFile(explicit, "utf8") };
    } catch (err) {
      return { candidate: explicit, error: err };
    }
  }
  return fallback([
    () => readCandidate(p.rules),
    () => readCandidate(p.rootRules),
    async (): Promise<Located> => null,
  ]);
}

export async function loadRuleSet(root: string, env: Env = process.env, explicitPath?: string | null): Promise<LoadedRuleSet> {
  const explicit = explicitPath ?? envStr(env, "HOOKRAIL_CONFIG_PATH");
  const located = await locateRuleSet(getPaths(root), explicit ? resolveFrom(root, explicit) : null);
  if (!located) return { ruleSet: applyEnvOverrides(root, defaultRuleSet(root), env), source: null };

  const { candidate } = located;
  if ("error" in located) {
    throw new ConfigError(`Cannot read rule set ${candidate}`, candidate, { cause: located.error });
  }
  let data: unknown;
  try {
    data = JSON.parse(located.raw);
  } catch (err) {
    throw new ConfigError(`Rule set ${candidate} is not valid JSON`, candidate, { cause: err });
  }
  return { ruleSet: applyEnvOverrides(root, buildRuleSet(root, data, candidate), env), source: candidate };
}
