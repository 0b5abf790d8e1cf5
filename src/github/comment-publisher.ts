import type { Octokit } from "@octokit/rest";
import type { Logger } from "pino";
import { formatAgentComment } from "../conversation/signature.ts";
import { rethrowIfCancelled, throwIfCancelled } from "../lib/abort.ts";
import { errorMessage } from "../lib/errors.ts";

export interface PublishCommentResult {
  success: boolean;
  commentId: number | null;
  commentUrl: string | null;
  errorMessage: string | null;
}

export interface PublishCommentInput {
  owner: string;
  repo: string;
  issueNumber: number;
  reply: string;
}

export interface CommentPublisher {
  publish(input: PublishCommentInput, signal?: AbortSignal): Promise<PublishCommentResult>;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/**
 * Posts agent replies as issue comments. The body always starts with the
 * signature marker and banner so later runs recognise the agent's turns.
 */
export function createCommentPublisher(deps: {
  octokit: Octokit;
  logger: Logger;
}): CommentPublisher {
  const { octokit } = deps;
  const logger = deps.logger.child({ component: "comment-publisher" });

  return {
    async publish(input, signal): Promise<PublishCommentResult> {
      if (!input.reply.trim()) {
        throw new TypeError("reply must be provided.");
      }

      try {
        throwIfCancelled(signal);

        const response = await octokit.rest.issues.createComment({
          owner: input.owner,
          repo: input.repo,
          issue_number: input.issueNumber,
          body: formatAgentComment(input.reply),
          request: { signal },
        });

        logger.info(
          { issueNumber: input.issueNumber, commentId: response.data.id },
          "Agent reply published",
        );

        return {
          success: true,
          commentId: response.data.id,
          commentUrl: response.data.html_url,
          errorMessage: null,
        };
      } catch (err) {
        rethrowIfCancelled(err, signal);

        const status = statusOf(err);
        const detail = errorMessage(err);
        logger.error({ issueNumber: input.issueNumber, status, error: detail }, "Failed to publish agent reply");

        return {
          success: false,
          commentId: null,
          commentUrl: null,
          errorMessage:
            status === 403
              ? `GitHub denied the comment (HTTP 403). Grant the workflow token \`issues: write\`. ${detail}`
              : detail,
        };
      }
    },
  };
}
