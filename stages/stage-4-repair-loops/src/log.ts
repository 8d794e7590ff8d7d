import type { AttemptStatus, Logger } from "../../stage-0-engine/src/index.js";
import type { LoopName } from "./types.js";

export function logAttempt(
  logger: Logger,
  loop: LoopName,
  attempt: number,
  status: AttemptStatus,
  detail?: string
): void {
  logger.logAttempt({
    timestamp: new Date().toISOString(),
    loop,
    attempt,
    status,
    detail,
  });
}
