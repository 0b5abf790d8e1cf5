/**
 * Text scrubbing for content that leaves the process: conversation text sent
 * to the AI backend and error detail that ends up in logs or results.
 *
 * Order matters in sanitizeContent: HTML comments go first so hidden
 * instructions (and the agent's own signature marker) never reach the model.
 */

/** Strip `<!-- ... -->` blocks. */
export const stripHtmlComments = (content: string): string =>
  content.replace(/<!--[\s\S]*?-->/g, "");

/**
 * Strip characters that are invisible to a human reader of the issue but
 * still read by a model: zero-width characters and BOM, C0/C1 controls other
 * than tab/newline/CR, soft hyphens, bidi overrides and isolates.
 */
export function stripInvisibleCharacters(content: string): string {
  content = content.replace(/[\u200B\u200C\u200D\uFEFF]/g, "");
  content = content.replace(
    /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g,
    "",
  );
  content = content.replace(/\u00AD/g, "");
  content = content.replace(/[\u202A-\u202E\u2066-\u2069]/g, "");
  return content;
}

/**
 * Redact GitHub tokens: classic PATs, OAuth, installation and refresh
 * tokens (`ghp_`, `gho_`, `ghs_`, `ghr_`) and fine-grained PATs.
 */
export function redactGitHubTokens(content: string): string {
  content = content.replace(
    /\bgh[posr]_[A-Za-z0-9]{36}\b/g,
    "[REDACTED_GITHUB_TOKEN]",
  );
  content = content.replace(
    /\bgithub_pat_[A-Za-z0-9_]{11,221}\b/g,
    "[REDACTED_GITHUB_TOKEN]",
  );
  return content;
}

/** Replace every occurrence of the given literal secrets. Blank entries are ignored. */
export function redactSecrets(
  content: string,
  secrets: ReadonlyArray<string | undefined>,
): string {
  let result = content;
  for (const secret of secrets) {
    if (!secret || secret.trim().length === 0) continue;
    result = result.split(secret).join("[REDACTED]");
  }
  return result;
}

/** Sanitize user-authored text before it is placed into a model prompt. */
export function sanitizeContent(content: string): string {
  content = stripHtmlComments(content);
  content = stripInvisibleCharacters(content);
  content = redactGitHubTokens(content);
  return content;
}
