import path from "node:path";
import { minimatch } from "minimatch";
import { z } from "zod";
import type { RuleSet } from "./config.js";
import { UsageError } from "./errors.js";
import type { PostToolUseEvent } from "./events.js";
import type { Logger } from "./logger.js";
import type { ProjectPaths } from "./resolver.js";
import { appendJsonLine, nowIso, readJsonLines } from "./store.js";

export const relevantFileRecordSchema = z.object({
  ts: z.string(),
  path: z.string().min(1),
  provenance: z.enum(["tool", "user"]),
  packetId: z.string().min(1).optional(),
  confidence: z.number().min(0).max(1),
  tool: z.string().optional(),
  sessionId: z.string().optional(),
});

export type RelevantFileRecord = z.infer<typeof relevantFileRecordSchema>;

const PATH_KEYS = ["file_path", "path", "notebook_path"] as const;

function toPosixRel(p: string): string {
  return p.split(path.sep).join("/");
}

/** Root-relative posix path, or null when the path leaves the root. */
export function relativeToRoot(root: string, cwd: string, filePath: string): string | null {
  const rel = path.relative(root, path.resolve(cwd, filePath));
  if (!rel || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return null;
  return toPosixRel(rel);
}

export function observedPath(toolInput: Record<string, unknown>): string | null {
  for (const key of PATH_KEYS) {
    const value = toolInput[key];
    if (typeof value === "string" && value.trim()) return value;
  }
  return null;
}

function isIgnored(rel: string, ignore: readonly string[]): boolean {
  return ignore.some((pat) => minimatch(rel, pat, { dot: true }));
}

/** Configured confidence for a tool, or null when the tool is not tracked. */
export function trackedConfidence(tracker: RuleSet["tracker"], toolName: string): number | null {
  return Object.hasOwn(tracker.tools, toolName) ? tracker.tools[toolName] : null;
}

/** Appends a `tool` record for a file-touching tool call; returns null when nothing is recorded. */
export async function observeToolUse(
  paths: ProjectPaths,
  tracker: RuleSet["tracker"],
  event: PostToolUseEvent,
  packetId: string | null,
): Promise<RelevantFileRecord | null> {
  if (!tracker.enabled) return null;
  const confidence = trackedConfidence(tracker, event.tool_name);
  if (confidence === null) return null;
  const raw = observedPath(event.tool_input);
  if (!raw) return null;
  const rel = relativeToRoot(paths.root, event.cwd, raw);
  if (!rel || isIgnored(rel, tracker.ignore)) return null;

  const record: RelevantFileRecord = {
    ts: nowIso(),
    path: rel,
    provenance: "tool",
    confidence,
    tool: event.tool_name,
    sessionId: event.session_id,
  };
  if (packetId) record.packetId = packetId;
  await appendJsonLine(paths.relevantFiles, record);
  return record;
}

export async function confirmFile(
  paths: ProjectPaths,
  filePath: string,
  packetId: string | null,
  cwd: string = paths.root,
): Promise<RelevantFileRecord> {
  const rel = relativeToRoot(paths.root, cwd, filePath);
  if (!rel) throw new UsageError(`File is outside the project root: ${filePath}`);
  const record: RelevantFileRecord = { ts: nowIso(), path: rel, provenance: "user", confidence: 1 };
  if (packetId) record.packetId = packetId;
  await appendJsonLine(paths.relevantFiles, record);
  return record;
}

export async function readRelevantFiles(paths: ProjectPaths, logger: Logger): Promise<RelevantFileRecord[]> {
  const { records, skipped } = await readJsonLines(paths.relevantFiles);
  const valid: RelevantFileRecord[] = [];
  let invalid = skipped;
  for (const record of records) {
    const parsed = relevantFileRecordSchema.safeParse(record);
    if (parsed.success) valid.push(parsed.data);
    else invalid += 1;
  }
  if (invalid > 0) logger.warn({ file: paths.relevantFiles, skipped: invalid }, "skipped unreadable relevant-file records");
  return valid;
}

export type FileSets = {
  confirmed: string[];
  suggested: string[];
};

/**
 * Collapses the log for one packet. Records of other packets are ignored; unscoped records
 * count for every packet. Suggested paths are ordered by confidence, then recency.
 */
export function collapseRecords(records: readonly RelevantFileRecord[], packetId: string | null): FileSets {
  const latest = new Map<string, { record: RelevantFileRecord; order: number }>();
  const confirmed: string[] = [];
  records.forEach((record, order) => {
    if (record.packetId && record.packetId !== packetId) return;
    latest.delete(record.path);
    latest.set(record.path, { record, order });
    if (record.provenance === "user" && !confirmed.includes(record.path)) confirmed.push(record.path);
  });

  const suggested = [...latest.values()]
    .filter(({ record }) => !confirmed.includes(record.path))
    .sort((a, b) => b.record.confidence - a.record.confidence || b.order - a.order)
    .map(({ record }) => record.path);
  return { confirmed, suggested };
}
