import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

/** `level` comes from the parsed configuration (`LOG_LEVEL`). */
export function createLogger(level: string): Logger {
  return pino({
    level,
    // JSON to stdout only; the Actions runner captures it as the job log
  });
}

export function createRunLogger(
  logger: Logger,
  context: { runId: string; owner?: string; repo?: string; issueNumber?: number; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
