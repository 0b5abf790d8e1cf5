export type MessageRole = "user" | "assistant";

/**
 * One role-tagged turn of the issue thread. The issue body and comments are
 * both represented this way so downstream logic treats them uniformly.
 */
export interface ConversationMessage {
  readonly messageId: string;
  readonly role: MessageRole;
  readonly authorName: string;
  readonly text: string;
  readonly createdAt: Date;
}

export type ResponseDecision = "must_respond" | "should_respond" | "skip";

export interface ResponseDecisionResult {
  readonly decision: ResponseDecision;
  /** Human-readable explanation, logged for observability. */
  readonly reason: string;
}
