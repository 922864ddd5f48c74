import pino, { type Logger, type LevelWithSilent } from "pino";
import { envChoice, type Env } from "./env.js";

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * stdout belongs to the host protocol, so every log line goes to stderr.
 * The destination is synchronous: hook processes exit right after responding.
 */
export function createLogger(env: Env = process.env): Logger {
  const level = envChoice(env, "HOOKRAIL_LOG_LEVEL", LEVELS) ?? "warn";
  return pino({ name: "hookrail", level }, pino.destination({ fd: 2, sync: true }));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
