import type { Logger } from "pino";

export interface Measurement {
  /** Stop the clock (idempotent) and return the elapsed milliseconds. */
  stop(): number;
}

/**
 * Start a wall-clock measurement. On the first stop() the duration is
 * logged under `field` (default `startupDurationMs`).
 */
export function startMeasurement(
  logger: Logger,
  field = "startupDurationMs",
  now: () => number = Date.now,
): Measurement {
  const startedAt = now();
  let elapsed: number | undefined;

  return {
    stop(): number {
      if (elapsed === undefined) {
        elapsed = now() - startedAt;
        logger.info({ [field]: elapsed }, "Measurement recorded");
      }
      return elapsed;
    },
  };
}
