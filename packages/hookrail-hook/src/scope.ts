import type { HookEvent } from "./events.js";
import { parseMaybeJson, type Scope } from "./matcher.js";

/**
 * Variable scope for matching and interpolation: the event's own fields, the tool response
 * decoded when it arrives as a JSON string (`tool_response_raw` keeps the original), and
 * whatever the caller adds (project root, foreground loop, active packet).
 */
export function buildScope(event: HookEvent, extras: Scope = {}): Scope {
  const scope: Scope = { ...event, ...extras };
  if (event.hook_event_name === "PostToolUse") {
    const parsed = parseMaybeJson(event.tool_response);
    scope.tool_response = parsed;
    if (parsed !== event.tool_response) scope.tool_response_raw = event.tool_response;
  }
  return scope;
}
