import path from "node:path";
import fs from "node:fs/promises";
import { z } from "zod";
import { appendAudit } from "./audit.js";
import { StateCorruptionError, UsageError, errorMessage, isNotFound } from "./errors.js";
import type { Logger } from "./logger.js";
import { promiseFulfilled, type PromiseMatch } from "./promise.js";
import type { ProjectPaths } from "./resolver.js";
import { newId, nowIso, readJsonRecord, writeJsonAtomic } from "./store.js";

const LOOP_ID = /^[A-Za-z0-9_-]+$/;

export const LOOP_STATUSES = ["active", "paused", "done", "cancelled"] as const;
export type LoopStatus = (typeof LOOP_STATUSES)[number];

export const loopStateSchema = z.object({
  id: z.string().regex(LOOP_ID),
  status: z.enum(LOOP_STATUSES),
  iteration: z.number().int().min(0),
  maxIterations: z.number().int().min(0),
  completionPromise: z.string().min(1),
  directive: z.string().min(1),
  sourcePacketId: z.string().min(1).optional(),
  sessionId: z.string().min(1).optional(),
  promiseMatch: z.enum(["strict", "fuzzy"]).default("strict"),
  outcome: z.enum(["completed", "exhausted", "cancelled"]).optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  endedAt: z.string().optional(),
});

export type LoopState = z.infer<typeof loopStateSchema>;

const pointerSchema = z.object({
  activeLoopId: z.string().regex(LOOP_ID).nullable(),
  updatedAt: z.string(),
});

export type ActivePointer = z.infer<typeof pointerSchema>;

export type StartLoopInput = {
  directive: string;
  completionPromise: string;
  maxIterations?: number;
  sourcePacketId?: string;
  sessionId?: string;
  promiseMatch?: PromiseMatch;
};

export type LoopDefaults = {
  maxIterations: number;
  promiseMatch: PromiseMatch;
};

export function isTerminal(status: LoopStatus): boolean {
  return status === "done" || status === "cancelled";
}

function loopFile(paths: ProjectPaths, id: string): string {
  if (!LOOP_ID.test(id)) throw new UsageError(`Invalid loop id: ${id}`);
  return path.join(paths.loopsDir, `${id}.json`);
}

async function readValidated<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, logger: Logger): Promise<T | null> {
  try {
    const raw = await readJsonRecord(filePath);
    if (raw === null) return null;
    const parsed = schema.safeParse(raw);
    if (!parsed.success) throw new StateCorruptionError(`Malformed record in ${filePath}`, filePath);
    return parsed.data;
  } catch (err) {
    if (!(err instanceof StateCorruptionError)) throw err;
    logger.warn({ file: filePath, err: errorMessage(err) }, "ignoring unreadable state record");
    return null;
  }
}

export async function loadLoop(paths: ProjectPaths, id: string, logger: Logger): Promise<LoopState | null> {
  return readValidated(loopFile(paths, id), loopStateSchema, logger);
}

export async function saveLoop(paths: ProjectPaths, loop: LoopState): Promise<void> {
  await writeJsonAtomic(loopFile(paths, loop.id), loop);
}

export async function readPointer(paths: ProjectPaths, logger: Logger): Promise<string | null> {
  const pointer = await readValidated(paths.activeLoop, pointerSchema, logger);
  return pointer?.activeLoopId ?? null;
}

export async function writePointer(paths: ProjectPaths, activeLoopId: string | null): Promise<void> {
  const pointer: ActivePointer = { activeLoopId, updatedAt: nowIso() };
  await writeJsonAtomic(paths.activeLoop, pointer);
}

export async function listLoops(paths: ProjectPaths, logger: Logger): Promise<LoopState[]> {
  let names: string[];
  try {
    names = await fs.readdir(paths.loopsDir);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
  const loops: LoopState[] = [];
  for (const name of names.filter((n) => n.endsWith(".json")).sort()) {
    const loop = await readValidated(path.join(paths.loopsDir, name), loopStateSchema, logger);
    if (loop) loops.push(loop);
  }
  return loops.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

/** One audit line per status or iteration change. */
async function auditTransition(
  paths: ProjectPaths,
  event: string,
  from: LoopState,
  to: LoopState,
  logger: Logger,
  extra: Record<string, unknown> = {},
): Promise<void> {
  await appendAudit(
    paths,
    { event, loop: to.id, from: from.status, to: to.status, iteration: to.iteration, ...extra },
    logger,
  );
}

async function requireLoop(paths: ProjectPaths, id: string | undefined, logger: Logger): Promise<LoopState> {
  const target = id ?? (await readPointer(paths, logger));
  if (!target) throw new UsageError("No loop id given and no foreground loop is set");
  const loop = await loadLoop(paths, target, logger);
  if (!loop) throw new UsageError(`Unknown loop: ${target}`);
  return loop;
}

/** Pauses whatever active loop currently holds the foreground, unless it is `keepId`. */
async function yieldForeground(paths: ProjectPaths, keepId: string, logger: Logger): Promise<void> {
  const current = await readPointer(paths, logger);
  if (!current || current === keepId) return;
  const loop = await loadLoop(paths, current, logger);
  if (loop && loop.status === "active") {
    const paused: LoopState = { ...loop, status: "paused", updatedAt: nowIso() };
    await saveLoop(paths, paused);
    await auditTransition(paths, "loop_pause", loop, paused, logger, { reason: `foreground taken by ${keepId}` });
  }
}

export async function startLoop(
  paths: ProjectPaths,
  input: StartLoopInput,
  defaults: LoopDefaults,
  logger: Logger,
): Promise<LoopState> {
  const ts = nowIso();
  const parsed = loopStateSchema.safeParse({
    id: newId("loop"),
    status: "active",
    iteration: 0,
    maxIterations: input.maxIterations ?? defaults.maxIterations,
    completionPromise: input.completionPromise,
    directive: input.directive,
    sourcePacketId: input.sourcePacketId,
    sessionId: input.sessionId,
    promiseMatch: input.promiseMatch ?? defaults.promiseMatch,
    createdAt: ts,
    updatedAt: ts,
  });
  if (!parsed.success) {
    throw new UsageError(`Invalid loop: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  const loop = parsed.data;
  await yieldForeground(paths, loop.id, logger);
  await saveLoop(paths, loop);
  await writePointer(paths, loop.id);
  await appendAudit(
    paths,
    { event: "loop_start", loop: loop.id, from: null, to: loop.status, iteration: loop.iteration, maxIterations: loop.maxIterations },
    logger,
  );
  logger.info({ loop: loop.id, maxIterations: loop.maxIterations }, "loop started");
  return loop;
}

export async function pauseLoop(paths: ProjectPaths, id: string | undefined, logger: Logger): Promise<LoopState> {
  const loop = await requireLoop(paths, id, logger);
  if (isTerminal(loop.status)) throw new UsageError(`Loop ${loop.id} is ${loop.status} and cannot be paused`);
  if (loop.status === "paused") return loop;
  const next: LoopState = { ...loop, status: "paused", updatedAt: nowIso() };
  await saveLoop(paths, next);
  await auditTransition(paths, "loop_pause", loop, next, logger);
  return next;
}

export async function resumeLoop(paths: ProjectPaths, id: string | undefined, logger: Logger): Promise<LoopState> {
  const loop = await requireLoop(paths, id, logger);
  if (isTerminal(loop.status)) throw new UsageError(`Loop ${loop.id} is ${loop.status} and cannot be resumed`);
  await yieldForeground(paths, loop.id, logger);
  const next: LoopState = { ...loop, status: "active", updatedAt: nowIso() };
  await saveLoop(paths, next);
  await writePointer(paths, next.id);
  await auditTransition(paths, "loop_resume", loop, next, logger);
  return next;
}

export async function cancelLoop(paths: ProjectPaths, id: string | undefined, logger: Logger): Promise<LoopState> {
  const loop = await requireLoop(paths, id, logger);
  if (isTerminal(loop.status)) throw new UsageError(`Loop ${loop.id} is already ${loop.status}`);
  const ts = nowIso();
  const next: LoopState = { ...loop, status: "cancelled", outcome: "cancelled", updatedAt: ts, endedAt: ts };
  await saveLoop(paths, next);
  if ((await readPointer(paths, logger)) === next.id) await writePointer(paths, null);
  await auditTransition(paths, "loop_cancel", loop, next, logger);
  return next;
}

/** The only way back to iteration 0. Works from any state, terminal ones included. */
export async function restartLoop(paths: ProjectPaths, id: string | undefined, logger: Logger): Promise<LoopState> {
  const loop = await requireLoop(paths, id, logger);
  await yieldForeground(paths, loop.id, logger);
  const { outcome: _outcome, endedAt: _endedAt, ...rest } = loop;
  const next: LoopState = { ...rest, status: "active", iteration: 0, updatedAt: nowIso() };
  await saveLoop(paths, next);
  await writePointer(paths, next.id);
  await auditTransition(paths, "loop_restart", loop, next, logger);
  return next;
}

export type LoopStatusReport = {
  activeLoopId: string | null;
  loop: LoopState | null;
  loops: LoopState[];
};

export async function loopStatus(paths: ProjectPaths, id: string | undefined, logger: Logger): Promise<LoopStatusReport> {
  const activeLoopId = await readPointer(paths, logger);
  const target = id ?? activeLoopId;
  const loop = target ? await loadLoop(paths, target, logger) : null;
  if (id && !loop) throw new UsageError(`Unknown loop: ${id}`);
  return { activeLoopId, loop, loops: await listLoops(paths, logger) };
}

export type StopVerdict =
  | { kind: "idle" }
  | { kind: "completed"; loop: LoopState }
  | { kind: "exhausted"; loop: LoopState }
  | { kind: "continue"; loop: LoopState };

/**
 * One Stop event against the foreground loop. Pure: the caller persists `loop` for every
 * verdict but `idle`.
 */
export function transitionOnStop(loop: LoopState, output: string, ts: string = nowIso()): StopVerdict {
  if (loop.status !== "active") return { kind: "idle" };

  if (promiseFulfilled(output, loop.completionPromise, loop.promiseMatch)) {
    return { kind: "completed", loop: { ...loop, status: "done", outcome: "completed", updatedAt: ts, endedAt: ts } };
  }

  const iteration = loop.iteration + 1;
  if (loop.maxIterations > 0 && iteration >= loop.maxIterations) {
    return {
      kind: "exhausted",
      loop: { ...loop, iteration, status: "done", outcome: "exhausted", updatedAt: ts, endedAt: ts },
    };
  }
  return { kind: "continue", loop: { ...loop, iteration, updatedAt: ts } };
}

/**
 * Stop handling end to end: pointer lookup, session binding, transition, persistence.
 * Without a foreground active loop this reads state and writes nothing. Once `signal` is
 * aborted nothing is committed: the caller has already answered with the safe default.
 */
export async function evaluateStop(
  paths: ProjectPaths,
  sessionId: string,
  readOutput: () => Promise<string>,
  logger: Logger,
  signal?: AbortSignal,
): Promise<StopVerdict> {
  const activeLoopId = await readPointer(paths, logger);
  if (!activeLoopId) return { kind: "idle" };
  const loop = await loadLoop(paths, activeLoopId, logger);
  if (!loop || loop.status !== "active") return { kind: "idle" };
  if (loop.sessionId && loop.sessionId !== sessionId) return { kind: "idle" };

  const verdict = transitionOnStop(loop, await readOutput());
  if (verdict.kind === "idle") return verdict;

  signal?.throwIfAborted();
  await saveLoop(paths, verdict.loop);
  if (verdict.kind !== "continue") await writePointer(paths, null);
  await auditTransition(paths, "Stop", loop, verdict.loop, logger, { verdict: verdict.kind, session_id: sessionId });
  logger.info({ loop: loop.id, verdict: verdict.kind, iteration: verdict.loop.iteration }, "loop evaluated on stop");
  return verdict;
}
