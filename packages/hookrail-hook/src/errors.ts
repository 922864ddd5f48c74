export type ErrorKind = "input" | "config" | "state" | "resource" | "usage";

export class HookrailError extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
    super(message, options);
    this.name = "HookrailError";
    this.kind = kind;
  }
}

/** Malformed event on stdin. */
export class InputError extends HookrailError {
  readonly eventName: string | null;

  constructor(message: string, eventName: string | null = null, options?: ErrorOptions) {
    super(message, "input", options);
    this.name = "InputError";
    this.eventName = eventName;
  }
}

/** Malformed rule set. Fatal to the current invocation only. */
export class ConfigError extends HookrailError {
  readonly filePath: string | null;

  constructor(message: string, filePath: string | null = null, options?: ErrorOptions) {
    super(message, "config", options);
    this.name = "ConfigError";
    this.filePath = filePath;
  }
}

/** Unreadable persisted record. Callers recover by treating the record as absent. */
export class StateCorruptionError extends HookrailError {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: ErrorOptions) {
    super(message, "state", options);
    this.name = "StateCorruptionError";
    this.filePath = filePath;
  }
}

export class ResourceMissingError extends HookrailError {
  readonly filePath: string;

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Referenced content file not found: ${filePath}`, "resource", options);
    this.name = "ResourceMissingError";
    this.filePath = filePath;
  }
}

/** An explicit control action that names an unknown record or an invalid transition. */
export class UsageError extends HookrailError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "usage", options);
    this.name = "UsageError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
