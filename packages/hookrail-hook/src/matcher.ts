import { minimatch } from "minimatch";

/**
 * Predicates are plain data so rule sets stay declarative: leaves test one field of
 * the event scope, composites combine them.
 */
export type Predicate =
  | { kind: "glob"; pattern: string; field?: string }
  | { kind: "regex"; pattern: string; flags?: string; field?: string }
  | { kind: "subset"; value: Record<string, unknown>; field?: string }
  | { kind: "all"; of: Predicate[] }
  | { kind: "any"; of: Predicate[] }
  | { kind: "not"; predicate: Predicate };

export type Scope = Record<string, unknown>;

const REGEX_PREFIX = "re:";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => stableStringify(v)).join(",")}]`;
  }
  if (isRecord(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${stableStringify(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function toText(value: unknown): string {
  return typeof value === "string" ? value : stableStringify(value);
}

export function parseMaybeJson(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

export function getPath(scope: unknown, dotted: string): { found: boolean; value: unknown } {
  const parts = dotted.split(".").filter(Boolean);
  if (parts.length === 0) return { found: false, value: undefined };
  let current: unknown = scope;
  for (const part of parts) {
    if (!isRecord(current) || !Object.hasOwn(current, part)) return { found: false, value: undefined };
    current = current[part];
  }
  return { found: true, value: current };
}

function regexTest(pattern: string, text: string, flags?: string): boolean {
  try {
    return new RegExp(pattern, flags).test(text);
  } catch {
    return false;
  }
}

export function matchGlob(value: string, pattern: string): boolean {
  return minimatch(value, pattern, { dot: true, nocomment: true, nonegate: true });
}

function splitNamespaced(name: string): [string, string] | null {
  const trimmed = name.trim();
  if (trimmed.includes(":")) {
    const idx = trimmed.indexOf(":");
    return [trimmed.slice(0, idx), trimmed.slice(idx + 1)];
  }
  // MCP-style: mcp__server__tool (the leading `mcp` is optional)
  let parts = trimmed.split(/_{2,}/);
  if (parts[0] === "mcp") parts = parts.slice(1);
  if (parts.length < 2 || parts.some((p) => p.length === 0)) return null;
  const server = parts[0];
  const tool = parts[parts.length - 1];
  if (server === undefined || tool === undefined) return null;
  return [server, tool];
}

/**
 * Tool-name pattern: `*`, a glob, `re:<regex>`, or a namespaced `group:item` form where
 * either side may be empty (= any) and the group side also matches by substring.
 */
export function matchToolName(toolName: string, pattern: string): boolean {
  const p = pattern.trim();
  if (!p || p === "*") return true;
  if (p.startsWith(REGEX_PREFIX)) return regexTest(p.slice(REGEX_PREFIX.length), toolName);
  if (!p.includes(":")) return matchGlob(toolName, p);

  const idx = p.indexOf(":");
  const groupPattern = p.slice(0, idx) || "*";
  const itemPattern = p.slice(idx + 1) || "*";
  const parts = splitNamespaced(toolName);
  if (!parts) return false;
  const [group, item] = parts;
  if (groupPattern !== "*" && !(matchGlob(group, groupPattern) || group.includes(groupPattern))) return false;
  return matchGlob(item, itemPattern);
}

function matchScalar(expected: unknown, actual: unknown): boolean {
  if (typeof expected === "string" && expected.startsWith(REGEX_PREFIX)) {
    if (actual === undefined) return false;
    return regexTest(expected.slice(REGEX_PREFIX.length), toText(actual));
  }
  return expected === actual;
}

/**
 * Every key of `pattern` must be present in `candidate` with a matching value; extra
 * candidate keys are ignored. Objects recurse, pattern arrays need each element to match
 * some candidate element, scalars compare by equality or `re:` regex.
 */
export function matchSubset(pattern: unknown, candidate: unknown): boolean {
  const value = isRecord(pattern) || Array.isArray(pattern) ? parseMaybeJson(candidate) : candidate;

  if (isRecord(pattern)) {
    if (!isRecord(value)) return false;
    for (const [key, expected] of Object.entries(pattern)) {
      if (!Object.hasOwn(value, key)) return false;
      if (!matchSubset(expected, value[key])) return false;
    }
    return true;
  }

  if (Array.isArray(pattern)) {
    if (!Array.isArray(value)) return false;
    return pattern.every((expected) => value.some((actual) => matchSubset(expected, actual)));
  }

  return matchScalar(pattern, value);
}

/** Loose text test: substring, or `re:<regex>`. Non-string values use their stable JSON text. */
export function matchText(pattern: string, value: unknown): boolean {
  const text = toText(value);
  if (pattern.startsWith(REGEX_PREFIX)) return regexTest(pattern.slice(REGEX_PREFIX.length), text);
  return text.includes(pattern);
}

export function evaluate(predicate: Predicate, scope: Scope): boolean {
  switch (predicate.kind) {
    case "glob": {
      const field = predicate.field ?? "tool_name";
      const { found, value } = getPath(scope, field);
      if (!found) return false;
      const text = toText(value);
      return field === "tool_name" ? matchToolName(text, predicate.pattern) : matchGlob(text, predicate.pattern);
    }
    case "regex": {
      const { found, value } = getPath(scope, predicate.field ?? "tool_input");
      if (!found) return false;
      return regexTest(predicate.pattern, toText(value), predicate.flags);
    }
    case "subset": {
      const { found, value } = getPath(scope, predicate.field ?? "tool_input");
      if (!found) return false;
      return matchSubset(predicate.value, value);
    }
    case "all":
      return predicate.of.every((p) => evaluate(p, scope));
    case "any":
      return predicate.of.some((p) => evaluate(p, scope));
    case "not":
      return !evaluate(predicate.predicate, scope);
  }
}

/** Collects regex compile errors so a bad rule set fails at load time, not per event. */
export function regexErrors(predicate: Predicate): string[] {
  switch (predicate.kind) {
    case "regex":
      try {
        new RegExp(predicate.pattern, predicate.flags);
        return [];
      } catch (err) {
        return [`invalid regex /${predicate.pattern}/: ${err instanceof Error ? err.message : String(err)}`];
      }
    case "glob":
      return patternRegexErrors(predicate.pattern);
    case "subset":
      return valueRegexErrors(predicate.value);
    case "all":
    case "any":
      return predicate.of.flatMap(regexErrors);
    case "not":
      return regexErrors(predicate.predicate);
  }
}

export function patternRegexErrors(pattern: string): string[] {
  if (!pattern.startsWith(REGEX_PREFIX)) return [];
  const source = pattern.slice(REGEX_PREFIX.length);
  try {
    new RegExp(source);
    return [];
  } catch (err) {
    return [`invalid regex /${source}/: ${err instanceof Error ? err.message : String(err)}`];
  }
}

function valueRegexErrors(value: unknown): string[] {
  if (typeof value === "string") return patternRegexErrors(value);
  if (Array.isArray(value)) return value.flatMap(valueRegexErrors);
  if (isRecord(value)) return Object.values(value).flatMap(valueRegexErrors);
  return [];
}
