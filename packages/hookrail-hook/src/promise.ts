export type PromiseMatch = "strict" | "fuzzy";

const PROMISE_TAG = /<promise>([\s\S]*?)<\/promise>/gi;

export function collapseWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

/**
 * Strict: some `<promise>…</promise>` marker whose collapsed inner text equals the promise.
 * Fuzzy: the collapsed promise appears anywhere, case-insensitively.
 */
export function promiseFulfilled(output: string, promise: string, mode: PromiseMatch = "strict"): boolean {
  const expected = collapseWhitespace(promise);
  if (!expected) return false;
  if (mode === "fuzzy") {
    return collapseWhitespace(output).toLowerCase().includes(expected.toLowerCase());
  }
  for (const match of output.matchAll(PROMISE_TAG)) {
    if (collapseWhitespace(match[1] ?? "") === expected) return true;
  }
  return false;
}
