/**
 * Shared error primitives.
 *
 * Expected remote failures are modelled as result values by each component;
 * the classes here cover the two cases that are allowed to propagate:
 * caller cancellation and programmer errors.
 */

import { redactGitHubTokens } from "./sanitizer.ts";

/** Process exit codes for the action. */
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  cancelled: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Raised when the run's AbortSignal fires (operator cancellation, shutdown). */
export class OperationCancelledError extends Error {
  constructor(reason?: unknown) {
    super(
      reason instanceof Error && reason.message
        ? `Operation cancelled: ${reason.message}`
        : "Operation cancelled",
    );
    this.name = "OperationCancelledError";
  }
}

/** Raised before any remote call when the workflow token is missing. */
export class MissingTokenError extends Error {
  constructor() {
    super("Workflow must provide github-token input (uses: github.token).");
    this.name = "MissingTokenError";
  }
}

/**
 * Extract a loggable message from an unknown thrown value.
 * GitHub tokens are redacted so the message is safe to log or embed in a result.
 */
export function errorMessage(error: unknown): string {
  const message =
    error instanceof Error ? error.message : String(error);
  return redactGitHubTokens(message.trim() || "No additional details.");
}

/** Reject blank strings for required arguments (programmer errors). */
export function requireNonBlank(value: string | null | undefined, name: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new TypeError(`${name} must be provided.`);
  }
  return value.trim();
}
