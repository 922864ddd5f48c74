import path from "node:path";
import fs from "node:fs/promises";
import matter from "gray-matter";
import { z } from "zod";
import { StateCorruptionError, UsageError, errorMessage, isNotFound } from "./errors.js";
import type { Logger } from "./logger.js";
import type { ProjectPaths } from "./resolver.js";
import { newId, nowIso, writeTextAtomic } from "./store.js";
import { collapseRecords, readRelevantFiles } from "./tracker.js";

export const PACKET_STATUSES = ["draft", "active", "done", "blocked"] as const;
export type PacketStatus = (typeof PACKET_STATUSES)[number];

export const CANONICAL_SECTIONS = ["Intent", "Decisions", "Progress", "Open Questions", "Next Steps"] as const;

// YAML turns unquoted timestamps into Dates
const timestamp = z.union([z.string(), z.date()]).transform((v) => (typeof v === "string" ? v : v.toISOString()));

const headerSchema = z.object({
  id: z.string().min(1),
  status: z.enum(PACKET_STATUSES),
  createdAt: timestamp,
  updatedAt: timestamp,
  purpose: z.string().default(""),
  confirmedFiles: z.array(z.string()).default([]),
  suggestedFiles: z.array(z.string()).default([]),
});

export type PacketHeader = z.infer<typeof headerSchema>;

export type PacketSection = {
  title: string;
  body: string;
};

export type Packet = PacketHeader & {
  sections: PacketSection[];
};

export type CreatePacketInput = {
  purpose: string;
  status?: PacketStatus;
  sections?: Record<string, string>;
};

export type UpdatePacketInput = {
  status?: PacketStatus;
  purpose?: string;
  /** Replaces the named sections' bodies. */
  sections?: Record<string, string>;
  /** Appends to the named sections' bodies. */
  append?: Record<string, string>;
};

function packetFile(paths: ProjectPaths, id: string): string {
  if (!/^[A-Za-z0-9_-]+$/.test(id)) throw new UsageError(`Invalid packet id: ${id}`);
  return path.join(paths.packetsDir, `${id}.md`);
}

export function parseSections(body: string): PacketSection[] {
  const sections: PacketSection[] = [];
  let current: { title: string; lines: string[] } | null = null;
  const flush = () => {
    if (current) sections.push({ title: current.title, body: current.lines.join("\n").trim() });
  };
  for (const line of body.split("\n")) {
    const heading = /^##\s+(.+?)\s*$/.exec(line);
    if (heading?.[1]) {
      flush();
      current = { title: heading[1], lines: [] };
    } else if (current) {
      current.lines.push(line);
    }
  }
  flush();
  return sections;
}

/** Canonical sections first, always present and in fixed order; any others follow as found. */
export function orderSections(sections: readonly PacketSection[]): PacketSection[] {
  const byTitle = new Map(sections.map((s) => [s.title, s.body]));
  const canonical: readonly string[] = CANONICAL_SECTIONS;
  return [
    ...CANONICAL_SECTIONS.map((title) => ({ title, body: byTitle.get(title) ?? "" })),
    ...sections.filter((s) => !canonical.includes(s.title)),
  ];
}

export function renderPacket(packet: Packet): string {
  const { sections, ...header } = packet;
  const body = orderSections(sections)
    .map((s) => (s.body ? `## ${s.title}\n\n${s.body}\n` : `## ${s.title}\n`))
    .join("\n");
  return matter.stringify(`\n${body}`, header);
}

export function parsePacket(raw: string, filePath: string): Packet {
  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(raw);
  } catch (err) {
    throw new StateCorruptionError(`Invalid packet header in ${filePath}`, filePath, { cause: err });
  }
  const header = headerSchema.safeParse(parsed.data);
  if (!header.success) throw new StateCorruptionError(`Malformed packet header in ${filePath}`, filePath);
  return { ...header.data, sections: orderSections(parseSections(parsed.content)) };
}

export async function savePacket(paths: ProjectPaths, packet: Packet): Promise<void> {
  await writeTextAtomic(packetFile(paths, packet.id), renderPacket(packet));
}

export async function loadPacket(paths: ProjectPaths, id: string, logger: Logger): Promise<Packet | null> {
  const filePath = packetFile(paths, id);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
  try {
    return parsePacket(raw, filePath);
  } catch (err) {
    if (!(err instanceof StateCorruptionError)) throw err;
    logger.warn({ file: filePath, err: errorMessage(err) }, "ignoring unreadable packet");
    return null;
  }
}

export async function listPackets(paths: ProjectPaths, logger: Logger): Promise<Packet[]> {
  let names: string[];
  try {
    names = await fs.readdir(paths.packetsDir);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
  const packets: Packet[] = [];
  for (const name of names.filter((n) => n.endsWith(".md")).sort()) {
    const packet = await loadPacket(paths, name.slice(0, -3), logger);
    if (packet) packets.push(packet);
  }
  return packets;
}

/** Most recently updated packet with status `active`. */
export async function findActivePacket(paths: ProjectPaths, logger: Logger): Promise<Packet | null> {
  const active = (await listPackets(paths, logger)).filter((p) => p.status === "active");
  active.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  return active[0] ?? null;
}

export async function createPacket(paths: ProjectPaths, input: CreatePacketInput): Promise<Packet> {
  const ts = nowIso();
  const packet: Packet = {
    id: newId("pkt"),
    status: input.status ?? "active",
    createdAt: ts,
    updatedAt: ts,
    purpose: input.purpose,
    confirmedFiles: [],
    suggestedFiles: [],
    sections: orderSections(Object.entries(input.sections ?? {}).map(([title, body]) => ({ title, body: body.trim() }))),
  };
  await savePacket(paths, packet);
  return packet;
}

async function requirePacket(paths: ProjectPaths, id: string, logger: Logger): Promise<Packet> {
  const packet = await loadPacket(paths, id, logger);
  if (!packet) throw new UsageError(`Unknown packet: ${id}`);
  return packet;
}

export async function updatePacket(
  paths: ProjectPaths,
  id: string,
  input: UpdatePacketInput,
  logger: Logger,
): Promise<Packet> {
  const packet = await requirePacket(paths, id, logger);
  const bodies = new Map(packet.sections.map((s) => [s.title, s.body]));
  for (const [title, body] of Object.entries(input.sections ?? {})) bodies.set(title, body.trim());
  for (const [title, body] of Object.entries(input.append ?? {})) {
    const existing = bodies.get(title) ?? "";
    bodies.set(title, existing ? `${existing}\n${body.trim()}` : body.trim());
  }
  const next: Packet = {
    ...packet,
    status: input.status ?? packet.status,
    purpose: input.purpose ?? packet.purpose,
    updatedAt: nowIso(),
    sections: orderSections([...bodies].map(([title, body]) => ({ title, body }))),
  };
  await savePacket(paths, next);
  return next;
}

/**
 * Materializes the relevant-file log into the packet's file lists. Confirmed files only grow;
 * the suggested list is replaced. The log itself is only read.
 */
export async function snapshotPacket(paths: ProjectPaths, id: string, logger: Logger, signal?: AbortSignal): Promise<Packet> {
  const packet = await requirePacket(paths, id, logger);
  const sets = collapseRecords(await readRelevantFiles(paths, logger), packet.id);
  const confirmedFiles = [...packet.confirmedFiles];
  for (const file of sets.confirmed) if (!confirmedFiles.includes(file)) confirmedFiles.push(file);
  const next: Packet = {
    ...packet,
    confirmedFiles,
    suggestedFiles: sets.suggested.filter((file) => !confirmedFiles.includes(file)),
    updatedAt: nowIso(),
  };
  signal?.throwIfAborted();
  await savePacket(paths, next);
  return next;
}
