import path from "node:path";
import fs from "node:fs/promises";
import { fallback } from "fallback-chain-js";
import { exists, nowIso, writeJsonAtomic } from "./store.js";
import { envStr, type Env } from "./env.js";

export const MARKER_DIR = ".hookrail";
export const MARKER_FILE = "project.json";

export type RootSource = "env" | "marker" | "vcs" | "cwd";

export type ProjectRoot = {
  root: string;
  source: RootSource;
};

export type ProjectMarker = {
  version: 1;
  createdAt: string;
};

/**
 * Layout under the project root:
 *  - .hookrail/project.json              root marker
 *  - .hookrail/rules.json                rule set (optional)
 *  - .hookrail/prompts/                  instruction content
 *  - .hookrail/loops/<id>.json           one record per loop
 *  - .hookrail/packets/<id>.md           handoff packets
 *  - .hookrail/state/active-loop.json    foreground loop pointer
 *  - .hookrail/state/relevant-files.jsonl
 *  - .hookrail/state/audit.jsonl
 *  - .hookrail/sessions/                 session tails
 */
export function getPaths(root: string) {
  const dir = path.join(root, MARKER_DIR);
  const stateDir = path.join(dir, "state");
  return {
    root,
    dir,
    marker: path.join(dir, MARKER_FILE),
    rules: path.join(dir, "rules.json"),
    rootRules: path.join(root, "hookrail.rules.json"),
    prompts: path.join(dir, "prompts"),
    loopsDir: path.join(dir, "loops"),
    packetsDir: path.join(dir, "packets"),
    sessionsDir: path.join(dir, "sessions"),
    stateDir,
    activeLoop: path.join(stateDir, "active-loop.json"),
    relevantFiles: path.join(stateDir, "relevant-files.jsonl"),
    audit: path.join(stateDir, "audit.jsonl"),
  };
}

export type ProjectPaths = ReturnType<typeof getPaths>;

async function findAncestor(start: string, probe: (dir: string) => Promise<boolean>): Promise<string | null> {
  let dir = path.resolve(start);
  for (;;) {
    if (await probe(dir)) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export async function findMarkerRoot(start: string): Promise<string | null> {
  return findAncestor(start, (dir) => exists(path.join(dir, MARKER_DIR, MARKER_FILE)));
}

/** `.git` may be a directory or, in worktrees and submodules, a file. */
export async function findVcsRoot(start: string): Promise<string | null> {
  return findAncestor(start, (dir) => exists(path.join(dir, ".git")));
}

function found(root: string | null, source: RootSource): ProjectRoot {
  if (!root) throw new Error(`no ${source} root`);
  return { root, source };
}

function discoverySteps(start: string): Array<() => Promise<ProjectRoot>> {
  return [
    async () => found(await findMarkerRoot(start), "marker"),
    async () => found(await findVcsRoot(start), "vcs"),
    async () => ({ root: path.resolve(start), source: "cwd" }),
  ];
}

/**
 * Marker ancestor, else version-control root, else the starting directory.
 * Reads the filesystem only.
 */
export async function resolveProjectRoot(start: string): Promise<ProjectRoot> {
  return fallback(discoverySteps(start));
}

/** Creates the marker in `dir`. Idempotent: an existing marker is kept. */
export async function initProject(dir: string): Promise<{ root: string; created: boolean }> {
  const root = path.resolve(dir);
  const p = getPaths(root);
  if (await exists(p.marker)) return { root, created: false };
  await fs.mkdir(p.dir, { recursive: true });
  const marker: ProjectMarker = { version: 1, createdAt: nowIso() };
  await writeJsonAtomic(p.marker, marker);
  return { root, created: true };
}

/** `HOOKRAIL_ROOT` skips discovery entirely. */
export async function resolveRoot(start: string, env: Env = process.env): Promise<ProjectRoot> {
  return fallback([
    async (): Promise<ProjectRoot> => {
      const fromEnv = envStr(env, "HOOKRAIL_ROOT");
      return found(fromEnv ? path.resolve(fromEnv) : null, "env");
    },
    ...discoverySteps(start),
  ]);
}
