import { getPath, toText, type Scope } from "./matcher.js";

const PLACEHOLDER_RE = /\$\{([^}]+)\}/g;

export type UnresolvedMode = "keep" | "empty";

export type Rendered = {
  text: string;
  missing: string[];
  ambiguous: string[];
};

/** Bare names fall through the root scope to the tool response, then the tool input. */
const NESTED_SOURCES = ["tool_response", "tool_input"] as const;

function resolvePlaceholder(key: string, scope: Scope): { found: boolean; value: string; ambiguous: boolean } {
  if (key.includes(".")) {
    const { found, value } = getPath(scope, key);
    return { found, value: found ? toText(value) : "", ambiguous: false };
  }

  const hits: unknown[] = [];
  if (Object.hasOwn(scope, key)) hits.push(scope[key]);
  for (const source of NESTED_SOURCES) {
    const { found, value } = getPath(scope, `${source}.${key}`);
    if (found) hits.push(value);
  }
  if (hits.length === 0) return { found: false, value: "", ambiguous: false };
  const [first] = hits;
  return { found: true, value: first === undefined || first === null ? "" : toText(first), ambiguous: hits.length > 1 };
}

export function interpolate(template: string, scope: Scope, mode: UnresolvedMode = "keep"): Rendered {
  const missing = new Set<string>();
  const ambiguous = new Set<string>();

  const text = template.replace(PLACEHOLDER_RE, (whole: string, rawKey: string) => {
    const key = rawKey.trim();
    const res = resolvePlaceholder(key, scope);
    if (!res.found) {
      missing.add(key);
      return mode === "keep" ? whole : "";
    }
    if (res.ambiguous) ambiguous.add(key);
    return res.value;
  });

  return { text, missing: [...missing].sort(), ambiguous: [...ambiguous].sort() };
}
