import { throwIfCancelled } from "../lib/abort.ts";
import { MissingTokenError } from "../lib/errors.ts";

/**
 * Fail before any remote call when the workflow did not pass a token.
 * Returns the trimmed token.
 */
export function ensureGitHubToken(token: string | null | undefined, signal?: AbortSignal): string {
  throwIfCancelled(signal);

  const trimmed = token?.trim();
  if (!trimmed) {
    throw new MissingTokenError();
  }
  return trimmed;
}
