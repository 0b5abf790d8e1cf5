/**
 * Event boundary: turns the workflow event name and payload into an
 * IssueContextRequest, or a skip for events the agent deliberately ignores.
 */

import { z } from "zod";
import { clampCommentsPageSize } from "../context/issue-context-service.ts";
import type { IssueContextRequest, IssueEventType } from "../context/types.ts";

/** Unsupported event or malformed payload; a configuration error for the workflow. */
export class EventPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EventPayloadError";
  }
}

const repositorySchema = z.object({
  name: z.string().min(1),
  owner: z.object({ login: z.string().min(1) }),
});

const eventPayloadSchema = z.object({
  action: z.string(),
  issue: z.object({
    number: z.number().int().positive(),
    // Present (possibly null) when the "issue" is a pull request.
    pull_request: z.unknown().optional(),
  }),
  repository: repositorySchema.nullish(),
});

const SUPPORTED_ACTIONS: Record<string, Record<string, IssueEventType>> = {
  issues: { opened: "issue_opened", reopened: "issue_reopened" },
  issue_comment: { created: "issue_comment_created" },
};

export interface EventBase {
  /** From GITHUB_REPOSITORY; the payload's repository is used when absent. */
  repository?: { owner: string; name: string };
  runId: string;
  commentsPageSize: number;
}

export type ParsedIssueEvent =
  | { kind: "request"; request: IssueContextRequest }
  | { kind: "skip"; eventType: IssueEventType; issueNumber: number; reason: string };

export function parseIssueEvent(
  eventName: string,
  payload: unknown,
  base: EventBase,
): ParsedIssueEvent {
  const actions = SUPPORTED_ACTIONS[eventName];
  if (!actions) {
    throw new EventPayloadError(
      `Unsupported event '${eventName}'. Trigger the workflow on 'issues' or 'issue_comment'.`,
    );
  }

  const parsed = eventPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new EventPayloadError(
      `Event payload is malformed (${issue?.path.join(".") || "root"}: ${issue?.message ?? "invalid"}).`,
    );
  }

  const { action, issue, repository } = parsed.data;
  const eventType = actions[action];
  if (!eventType) {
    throw new EventPayloadError(
      `Unsupported action '${action}' for event '${eventName}'. Supported: ${Object.keys(actions).join(", ")}.`,
    );
  }

  if (eventName === "issue_comment" && issue.pull_request != null) {
    return {
      kind: "skip",
      eventType,
      issueNumber: issue.number,
      reason: `Comment on pull request #${issue.number} is not an issue conversation.`,
    };
  }

  const target =
    base.repository ??
    (repository ? { owner: repository.owner.login, name: repository.name } : undefined);
  if (!target) {
    throw new EventPayloadError(
      "Repository is unknown. Set GITHUB_REPOSITORY or include repository in the event payload.",
    );
  }

  return {
    kind: "request",
    request: {
      owner: target.owner,
      name: target.name,
      issueNumber: issue.number,
      commentsPageSize: clampCommentsPageSize(base.commentsPageSize),
      runId: base.runId,
      eventType,
    },
  };
}
