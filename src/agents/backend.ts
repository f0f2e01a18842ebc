import { createLogger } from "../utils/logger.js";
import type { AgentAdapter } from "./adapter.js";

const log = createLogger("backend");

/**
 * Pick the execution backend once, up front: the enhanced one when its
 * health check passes, otherwise the local one. The scheduler never sees
 * which was chosen.
 */
export async function selectBackend(enhanced: AgentAdapter | undefined, local: AgentAdapter): Promise<AgentAdapter> {
  if (!enhanced) return local;
  if (!enhanced.healthCheck) {
    log.info(`Using enhanced backend "${enhanced.name}"`);
    return enhanced;
  }
  try {
    if (await enhanced.healthCheck()) {
      log.info(`Using enhanced backend "${enhanced.name}"`);
      return enhanced;
    }
    log.warn(`Enhanced backend "${enhanced.name}" unavailable, falling back to "${local.name}"`);
  } catch (err) {
    log.warn(`Enhanced backend "${enhanced.name}" failed its health check, falling back to "${local.name}"`, {
      error: String(err),
    });
  }
  return local;
}
