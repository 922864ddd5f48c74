export * from "./errors.js";
export * from "./env.js";
export * from "./logger.js";
export * from "./store.js";
export * from "./resolver.js";
export * from "./matcher.js";
export * from "./interpolate.js";
export * from "./events.js";
export * from "./output.js";
export * from "./config.js";
export * from "./policy.js";
export * from "./scope.js";
export * from "./injection.js";
export * from "./promise.js";
export * from "./transcript.js";
export * from "./loops.js";
export * from "./tracker.js";
export * from "./packets.js";
export * from "./promptGuard.js";
export * from "./sessionEnv.js";
export * from "./audit.js";
export * from "./control.js";
export * from "./runner.js";
export type { HookContext } from "./handlers/context.js";
