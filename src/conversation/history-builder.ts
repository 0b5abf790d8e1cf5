import type { CommentSnapshot, IssueSnapshot } from "../context/types.ts";
import { requireNonBlank } from "../lib/errors.ts";
import {
  AGENT_NAME,
  createConversationMessage,
  hasAgentSignature,
} from "./signature.ts";
import type { ConversationMessage } from "./types.ts";

export interface ConversationHistoryBuilder {
  buildHistory(issue: IssueSnapshot): ConversationMessage[];
}

/** Lowercase and drop the `[bot]` suffix REST logins carry and GraphQL logins do not. */
export function normalizeLogin(login: string): string {
  return login.trim().toLowerCase().replace(/\[bot\]$/, "");
}

/**
 * @param botLogin - Login of the workflow identity that posts the agent's replies
 * @param agentName - Display name used for assistant turns
 */
export function createConversationHistoryBuilder(opts: {
  botLogin: string;
  agentName?: string;
}): ConversationHistoryBuilder {
  const botLogin = normalizeLogin(requireNonBlank(opts.botLogin, "Bot login"));
  const agentName = opts.agentName ?? AGENT_NAME;

  function isAgentComment(comment: CommentSnapshot): boolean {
    return (
      normalizeLogin(comment.authorLogin) === botLogin ||
      hasAgentSignature(comment.bodyExcerpt)
    );
  }

  return {
    buildHistory(issue): ConversationMessage[] {
      if (!issue) {
        throw new TypeError("issue must be provided.");
      }

      const messages: ConversationMessage[] = [
        createConversationMessage({
          messageId: issue.id,
          role: "user",
          authorName: issue.authorLogin,
          text: `${issue.title}\n\n${issue.body}`,
          createdAt: issue.createdAt,
        }),
      ];

      for (const comment of issue.latestComments) {
        const fromAgent = isAgentComment(comment);
        messages.push(
          createConversationMessage({
            messageId: comment.id,
            role: fromAgent ? "assistant" : "user",
            authorName: fromAgent ? agentName : comment.authorLogin,
            text: comment.bodyExcerpt,
            createdAt: comment.createdAt,
          }),
        );
      }

      return messages;
    },
  };
}
