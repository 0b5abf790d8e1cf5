import { requireNonBlank } from "../lib/errors.ts";
import type { ConversationMessage, MessageRole } from "./types.ts";

export const AGENT_NAME = "issueagent";

/** Hidden marker placed at the top of every comment the agent publishes. */
export const AGENT_SIGNATURE_MARKER = "<!-- issueagent-signature -->";

export const AGENT_BANNER = `🤖 **${AGENT_NAME}**`;

/**
 * Wrap reply text for publication. The marker leads the body so it survives
 * the comment excerpt cap when the thread is read back.
 */
export function formatAgentComment(reply: string): string {
  return `${AGENT_SIGNATURE_MARKER}\n${AGENT_BANNER}\n\n${reply.trim()}`;
}

export function hasAgentSignature(body: string): boolean {
  return body.includes(AGENT_SIGNATURE_MARKER);
}

export function createConversationMessage(
  input: {
    messageId: string;
    role: MessageRole;
    authorName: string;
    text: string | null | undefined;
    createdAt: Date;
  },
  now: Date = new Date(),
): ConversationMessage {
  if (input.createdAt.getTime() > now.getTime() + 1_000) {
    throw new RangeError("Message timestamps cannot be in the future.");
  }

  return {
    messageId: requireNonBlank(input.messageId, "Message id"),
    role: input.role,
    authorName: requireNonBlank(input.authorName, "Author name"),
    text: (input.text ?? "").trim(),
    createdAt: new Date(input.createdAt.getTime()),
  };
}
