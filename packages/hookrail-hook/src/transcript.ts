import fs from "node:fs/promises";

export type TranscriptRole = "user" | "assistant";

export type TranscriptTurn = {
  role: TranscriptRole;
  text: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function contentText(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  const parts: string[] = [];
  for (const part of content) {
    if (typeof part === "string") parts.push(part);
    else if (isRecord(part) && part.type === "text" && typeof part.text === "string") parts.push(part.text);
  }
  return parts.join("\n");
}

function toTurn(entry: unknown): TranscriptTurn | null {
  if (!isRecord(entry)) return null;
  const message = isRecord(entry.message) ? entry.message : entry;
  const role = message.role ?? entry.type;
  if (role !== "user" && role !== "assistant") return null;
  const text = contentText(message.content);
  if (!text.trim()) return null;
  return { role, text };
}

/**
 * Text turns of a JSON-lines transcript, oldest first. Tool-only entries and lines that do not
 * parse are skipped; an unreadable transcript yields no turns.
 */
export async function readTranscript(transcriptPath: string): Promise<TranscriptTurn[]> {
  if (!transcriptPath) return [];
  let raw: string;
  try {
    raw = await fs.readFile(transcriptPath, "utf8");
  } catch {
    return [];
  }
  const turns: TranscriptTurn[] = [];
  for (const line of raw.split("\n")) {
    if (!line.trim()) continue;
    let entry: unknown;
    try {
      entry = JSON.parse(line);
    } catch {
      continue;
    }
    const turn = toTurn(entry);
    if (turn) turns.push(turn);
  }
  return turns;
}

export async function lastAssistantText(transcriptPath: string): Promise<string> {
  const turns = await readTranscript(transcriptPath);
  for (let i = turns.length - 1; i >= 0; i -= 1) {
    const turn = turns[i];
    if (turn && turn.role === "assistant") return turn.text;
  }
  return "";
}

/** The last `count` user turns and everything after them. */
export function tailTurns(turns: readonly TranscriptTurn[], count: number): TranscriptTurn[] {
  if (count <= 0) return [];
  let seen = 0;
  for (let i = turns.length - 1; i >= 0; i -= 1) {
    if (turns[i]?.role !== "user") continue;
    seen += 1;
    if (seen === count) return turns.slice(i);
  }
  return [...turns];
}

export function renderTail(sessionId: string, turns: readonly TranscriptTurn[]): string {
  const lines = [`# Session ${sessionId} tail`, ""];
  for (const turn of turns) {
    lines.push(`## ${turn.role === "user" ? "User" : "Assistant"}`, "", turn.text.trim(), "");
  }
  return lines.join("\n");
}
