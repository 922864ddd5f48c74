import { fallback } from "fallback-chain-js";
import { z } from "zod";
import { InputError } from "./errors.js";

export const HOOK_EVENT_NAMES = [
  "PreToolUse",
  "PostToolUse",
  "UserPromptSubmit",
  "Stop",
  "SubagentStop",
  "PreCompact",
  "SessionStart",
  "SessionEnd",
  "Notification",
] as const;

export type HookEventName = (typeof HOOK_EVENT_NAMES)[number];

const base = {
  session_id: z.string(),
  transcript_path: z.string().nullish().transform((v) => v ?? ""),
  cwd: z.string().min(1),
  permission_mode: z.string().optional(),
};

const toolInput = z.record(z.unknown()).default({});

const preToolUse = z.object({
  ...base,
  hook_event_name: z.literal("PreToolUse"),
  tool_name: z.string().min(1),
  tool_input: toolInput,
});

const postToolUse = z.object({
  ...base,
  hook_event_name: z.literal("PostToolUse"),
  tool_name: z.string().min(1),
  tool_input: toolInput,
  tool_response: z.unknown(),
});

const userPromptSubmit = z.object({
  ...base,
  hook_event_name: z.literal("UserPromptSubmit"),
  prompt: z.string(),
});

const stopFields = {
  stop_hook_active: z.boolean().default(false),
  last_assistant_message: z.string().optional(),
};

const stop = z.object({ ...base, ...stopFields, hook_event_name: z.literal("Stop") });
const subagentStop = z.object({ ...base, ...stopFields, hook_event_name: z.literal("SubagentStop") });

const preCompact = z.object({
  ...base,
  hook_event_name: z.literal("PreCompact"),
  trigger: z.enum(["manual", "auto"]),
  custom_instructions: z.string().nullish().transform((v) => v ?? ""),
});

const sessionStart = z.object({
  ...base,
  hook_event_name: z.literal("SessionStart"),
  source: z.enum(["startup", "resume", "clear", "compact"]),
});

const sessionEnd = z.object({
  ...base,
  hook_event_name: z.literal("SessionEnd"),
  reason: z.string().default("other"),
});

const notification = z.object({
  ...base,
  hook_event_name: z.literal("Notification"),
  message: z.string().default(""),
});

export const hookEventSchema = z.discriminatedUnion("hook_event_name", [
  preToolUse,
  postToolUse,
  userPromptSubmit,
  stop,
  subagentStop,
  preCompact,
  sessionStart,
  sessionEnd,
  notification,
]);

export type HookEvent = z.infer<typeof hookEventSchema>;
export type PreToolUseEvent = z.infer<typeof preToolUse>;
export type PostToolUseEvent = z.infer<typeof postToolUse>;
export type UserPromptSubmitEvent = z.infer<typeof userPromptSubmit>;
export type StopEvent = z.infer<typeof stop> | z.infer<typeof subagentStop>;
export type PreCompactEvent = z.infer<typeof preCompact>;
export type SessionStartEvent = z.infer<typeof sessionStart>;
export type SessionEndEvent = z.infer<typeof sessionEnd>;

export function isHookEventName(value: unknown): value is HookEventName {
  return typeof value === "string" && HOOK_EVENT_NAMES.some((n) => n === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const EVENT_NAME_KEYS = ["hook_event_name", "hookEventName"];

/** Discriminator first, so an error on a known kind can still fall back to that kind's safe default. */
export async function resolveEventName(payload: unknown): Promise<HookEventName | null> {
  if (!isRecord(payload)) return null;
  const fields = payload;
  try {
    return await fallback(
      EVENT_NAME_KEYS.map((key) => async (): Promise<HookEventName> => {
        const v = fields[key];
        if (!isHookEventName(v)) throw new Error(`no event name under ${key}`);
        return v;
      }),
    );
  } catch {
    return null;
  }
}

export async function parseEvent(raw: string): Promise<HookEvent> {
  const trimmed = raw.trim();
  if (trimmed.length === 0) throw new InputError("No input received on stdin");

  let payload: unknown;
  try {
    payload = JSON.parse(trimmed);
  } catch (err) {
    throw new InputError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(payload)) throw new InputError("Hook input must be a JSON object");

  const declared = payload.hook_event_name ?? payload.hookEventName;
  if (declared === undefined || declared === null || declared === "") {
    throw new InputError("Missing 'hook_event_name' field");
  }
  const eventName = await resolveEventName(payload);
  if (!eventName) throw new InputError(`Unknown hook event: ${String(declared)}`);

  const parsed = hookEventSchema.safeParse({ ...payload, hook_event_name: eventName });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new InputError(`Invalid ${eventName} event: ${detail}`, eventName);
  }
  return parsed.data;
}
