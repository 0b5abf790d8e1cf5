/**
 * Constructors for the immutable snapshot and result values.
 *
 * Each constructor validates its inputs and applies the truncation rules;
 * invalid inputs are programmer errors and throw.
 */

import { requireNonBlank } from "../lib/errors.ts";
import type {
  CommentSnapshot,
  IssueContextResult,
  IssueEventType,
  IssueSnapshot,
} from "./types.ts";

export const MAX_COMMENT_EXCERPT_LENGTH = 280;
export const MAX_TITLE_LENGTH = 256;
export const MAX_LATEST_COMMENTS = 5;

/** Allowed clock skew between GitHub and the runner. */
const FUTURE_TOLERANCE_MS = 1_000;

export const PERMISSION_REMEDIATION =
  "Grant the workflow token the minimum required scope: `issues: read` to retrieve context and `issues: write` to post replies.";

function ensurePastTimestamp(value: Date, name: string, now: Date): Date {
  if (Number.isNaN(value.getTime())) {
    throw new TypeError(`${name} must be a valid timestamp.`);
  }
  if (value.getTime() > now.getTime() + FUTURE_TOLERANCE_MS) {
    throw new RangeError(`${name} cannot be in the future.`);
  }
  return new Date(value.getTime());
}

export function createCommentSnapshot(
  input: { id: string; authorLogin: string; body: string | null | undefined; createdAt: Date },
  now: Date = new Date(),
): CommentSnapshot {
  const excerpt = (input.body ?? "").trim();

  return {
    id: requireNonBlank(input.id, "Comment id"),
    authorLogin: requireNonBlank(input.authorLogin, "Comment author login"),
    bodyExcerpt: excerpt.slice(0, MAX_COMMENT_EXCERPT_LENGTH),
    createdAt: ensurePastTimestamp(input.createdAt, "Comment timestamp", now),
  };
}

export function createIssueSnapshot(
  input: {
    id: string;
    number: number;
    title: string;
    body: string | null | undefined;
    authorLogin: string;
    createdAt: Date;
    comments?: readonly CommentSnapshot[];
  },
  now: Date = new Date(),
): IssueSnapshot {
  if (!Number.isInteger(input.number) || input.number <= 0) {
    throw new RangeError(`Issue number must be positive. Received: ${input.number}`);
  }

  const title = requireNonBlank(input.title, "Issue title");
  const comments = input.comments ?? [];

  return {
    id: requireNonBlank(input.id, "Issue id"),
    number: input.number,
    title: title.slice(0, MAX_TITLE_LENGTH),
    body: (input.body ?? "").trim(),
    authorLogin: requireNonBlank(input.authorLogin, "Issue author login"),
    createdAt: ensurePastTimestamp(input.createdAt, "Issue timestamp", now),
    // Newest comments win; relative order is preserved.
    latestComments: comments.slice(-MAX_LATEST_COMMENTS),
  };
}

function formatMessage(prefix: string, detail: string): string {
  const text = detail.trim() || "No additional details.";
  return `${prefix}: ${text}`;
}

export function successResult(
  runId: string,
  eventType: IssueEventType,
  issue: IssueSnapshot,
  retrievedAt: Date = new Date(),
): IssueContextResult {
  return {
    runId: requireNonBlank(runId, "runId"),
    eventType,
    issue,
    retrievedAt,
    status: "success",
    message: `Success: Issue #${issue.number} retrieved.`,
  };
}

export function graphqlFailureResult(
  runId: string,
  eventType: IssueEventType,
  detail: string,
): IssueContextResult {
  return {
    runId: requireNonBlank(runId, "runId"),
    eventType,
    issue: null,
    retrievedAt: new Date(),
    status: "graphql_failure",
    message: formatMessage("GraphQL failure", detail),
  };
}

export function permissionDeniedResult(
  runId: string,
  eventType: IssueEventType,
  detail: string,
): IssueContextResult {
  return {
    runId: requireNonBlank(runId, "runId"),
    eventType,
    issue: null,
    retrievedAt: new Date(),
    status: "permission_denied",
    message: `${formatMessage("Permission denied", detail)} ${PERMISSION_REMEDIATION}`,
  };
}

export function unexpectedErrorResult(
  runId: string,
  eventType: IssueEventType,
  detail: string,
): IssueContextResult {
  return {
    runId: requireNonBlank(runId, "runId"),
    eventType,
    issue: null,
    retrievedAt: new Date(),
    status: "unexpected_error",
    message: formatMessage("Unexpected error", detail),
  };
}

export function skippedResult(
  runId: string,
  eventType: IssueEventType,
  reason: string,
): IssueContextResult {
  return {
    runId: requireNonBlank(runId, "runId"),
    eventType,
    issue: null,
    retrievedAt: new Date(),
    status: "skipped",
    message: formatMessage("Skipped", reason),
  };
}
