const TRUE_VALUES = new Set(["1", "true", "yes", "on", "y"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off", "n", ""]);

export type Env = Record<string, string | undefined>;

export function envStr(env: Env, key: string): string | null {
  const v = env[key];
  if (v === undefined || v.trim().length === 0) return null;
  return v;
}

export function envBool(env: Env, key: string, defaultValue = false): boolean {
  const v = env[key];
  if (v === undefined) return defaultValue;
  const lower = v.trim().toLowerCase();
  if (TRUE_VALUES.has(lower)) return true;
  if (FALSE_VALUES.has(lower)) return false;
  return defaultValue;
}

export function envInt(env: Env, key: string, defaultValue: number): number {
  const v = env[key];
  if (v === undefined) return defaultValue;
  const n = Number.parseInt(v.trim(), 10);
  return Number.isFinite(n) ? n : defaultValue;
}

export function envChoice<T extends string>(env: Env, key: string, choices: readonly T[]): T | null {
  const v = env[key]?.trim();
  if (!v) return null;
  return choices.find((c) => c === v) ?? null;
}
