/**
 * Issue context retrieval.
 *
 * Runs the single "issue + latest comments" query and maps every outcome into
 * the closed IssueContextStatus set. Expected remote failures come back as
 * result values; the only things that throw are a missing request and
 * caller cancellation.
 */

import type { Logger } from "pino";
import type { GraphQLClient } from "../github/graphql-client.ts";
import {
  ISSUE_CONTEXT_QUERY,
  errorCode,
  issueContextEnvelopeSchema,
  type CommentNode,
  type GraphQLErrorEntry,
  type IssueNode,
} from "../github/issue-context-query.ts";
import { rethrowIfCancelled, throwIfCancelled } from "../lib/abort.ts";
import { errorMessage } from "../lib/errors.ts";
import {
  createCommentSnapshot,
  createIssueSnapshot,
  graphqlFailureResult,
  permissionDeniedResult,
  successResult,
  unexpectedErrorResult,
} from "./snapshots.ts";
import type {
  CommentSnapshot,
  IssueContextRequest,
  IssueContextResult,
  IssueSnapshot,
} from "./types.ts";

export const MIN_COMMENTS_PAGE_SIZE = 1;
export const MAX_COMMENTS_PAGE_SIZE = 20;

const INSUFFICIENT_SCOPES = "INSUFFICIENT_SCOPES";

export interface IssueContextService {
  fetchIssueContext(
    request: IssueContextRequest,
    signal?: AbortSignal,
  ): Promise<IssueContextResult>;
}

export function clampCommentsPageSize(value: number): number {
  if (!Number.isFinite(value)) return MIN_COMMENTS_PAGE_SIZE;
  return Math.min(MAX_COMMENTS_PAGE_SIZE, Math.max(MIN_COMMENTS_PAGE_SIZE, Math.trunc(value)));
}

function isInsufficientScopes(error: GraphQLErrorEntry): boolean {
  return errorCode(error)?.toUpperCase() === INSUFFICIENT_SCOPES;
}

function toCommentSnapshots(
  nodes: readonly CommentNode[] | null | undefined,
  now: Date,
): CommentSnapshot[] {
  const snapshots: CommentSnapshot[] = [];
  for (const node of nodes ?? []) {
    const login = node?.author?.login;
    if (!node?.id?.trim() || !login?.trim() || !node.createdAt) {
      continue;
    }

    snapshots.push(
      createCommentSnapshot(
        {
          id: node.id,
          authorLogin: login,
          body: node.body ?? node.bodyText,
          createdAt: new Date(node.createdAt),
        },
        now,
      ),
    );
  }
  return snapshots;
}

function toIssueSnapshot(issue: IssueNode, now: Date): IssueSnapshot | string {
  if (!issue.id?.trim() || !issue.title?.trim()) {
    return "Issue payload missing required fields.";
  }

  const authorLogin = issue.author?.login;
  if (!authorLogin?.trim()) {
    return "Issue author login missing from GraphQL response.";
  }

  return createIssueSnapshot(
    {
      id: issue.id,
      number: issue.number,
      title: issue.title,
      body: issue.body,
      authorLogin,
      createdAt: issue.createdAt ? new Date(issue.createdAt) : now,
      comments: toCommentSnapshots(issue.comments?.nodes, now),
    },
    now,
  );
}

export function createIssueContextService(deps: {
  graphqlClient: GraphQLClient;
  logger: Logger;
  now?: () => Date;
}): IssueContextService {
  const { graphqlClient, logger } = deps;
  const now = deps.now ?? (() => new Date());

  return {
    async fetchIssueContext(request, signal): Promise<IssueContextResult> {
      if (!request) {
        throw new TypeError("request must be provided.");
      }

      const { runId, eventType } = request;
      const queryLogger = logger.child({
        component: "issue-context",
        owner: request.owner,
        repo: request.name,
        issueNumber: request.issueNumber,
      });

      try {
        throwIfCancelled(signal);

        const raw = await graphqlClient.query(
          ISSUE_CONTEXT_QUERY,
          {
            owner: request.owner,
            name: request.name,
            number: request.issueNumber,
            commentsPageSize: clampCommentsPageSize(request.commentsPageSize),
          },
          signal,
        );

        if (raw === null || raw === undefined) {
          return unexpectedErrorResult(runId, eventType, "GraphQL returned an empty response.");
        }

        const parsed = issueContextEnvelopeSchema.safeParse(raw);
        if (!parsed.success) {
          const firstIssue = parsed.error.issues[0];
          return unexpectedErrorResult(
            runId,
            eventType,
            `GraphQL response did not match the expected shape (${firstIssue?.path.join(".") || "root"}: ${firstIssue?.message ?? "invalid"}).`,
          );
        }

        const { data, errors } = parsed.data;

        if (errors && errors.length > 0) {
          if (errors.some(isInsufficientScopes)) {
            const detail =
              errors.find((e) => e.message?.trim())?.message ??
              "GitHub returned insufficient scopes.";
            queryLogger.warn({ errorCount: errors.length }, "GraphQL query rejected for insufficient scopes");
            return permissionDeniedResult(runId, eventType, detail);
          }

          const detail = errors
            .map((e) => e.message?.trim())
            .filter((m): m is string => !!m)
            .join("; ");
          queryLogger.warn({ errorCount: errors.length }, "GraphQL query returned errors");
          return graphqlFailureResult(
            runId,
            eventType,
            detail || "GraphQL query failed without details.",
          );
        }

        const issue = data?.repository?.issue;
        if (!issue) {
          return graphqlFailureResult(runId, eventType, `Issue #${request.issueNumber} not found.`);
        }

        const snapshot = toIssueSnapshot(issue, now());
        if (typeof snapshot === "string") {
          return graphqlFailureResult(runId, eventType, snapshot);
        }

        queryLogger.info(
          {
            commentCount: snapshot.latestComments.length,
            totalComments: issue.comments?.totalCount ?? 0,
          },
          "Issue context retrieved",
        );

        return successResult(runId, eventType, snapshot, now());
      } catch (err) {
        rethrowIfCancelled(err, signal);
        queryLogger.error({ err }, "Issue context retrieval failed");
        return unexpectedErrorResult(runId, eventType, errorMessage(err));
      }
    },
  };
}
