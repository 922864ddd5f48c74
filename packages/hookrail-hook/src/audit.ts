import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { ProjectPaths } from "./resolver.js";
import { appendJsonLine, nowIso } from "./store.js";

/** Best effort: an audit write that fails is logged and never changes the hook's outcome. */
export async function appendAudit(paths: ProjectPaths, record: Record<string, unknown>, logger: Logger): Promise<void> {
  try {
    await appendJsonLine(paths.audit, { ts: nowIso(), ...record });
  } catch (err) {
    logger.warn({ file: paths.audit, err: errorMessage(err) }, "audit append failed");
  }
}
