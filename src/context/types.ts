/** The GitHub events the agent is wired to. */
export type IssueEventType =
  | "issue_opened"
  | "issue_reopened"
  | "issue_comment_created";

/** Immutable description of one invocation, built from the triggering event. */
export interface IssueContextRequest {
  readonly owner: string;
  readonly name: string;
  readonly issueNumber: number;
  /** Number of most recent comments to request (1-20). */
  readonly commentsPageSize: number;
  readonly runId: string;
  readonly eventType: IssueEventType;
}

export interface CommentSnapshot {
  readonly id: string;
  readonly authorLogin: string;
  /** Trimmed body, at most MAX_COMMENT_EXCERPT_LENGTH characters. */
  readonly bodyExcerpt: string;
  readonly createdAt: Date;
}

export interface IssueSnapshot {
  readonly id: string;
  readonly number: number;
  /** Trimmed title, at most MAX_TITLE_LENGTH characters. */
  readonly title: string;
  readonly body: string;
  readonly authorLogin: string;
  readonly createdAt: Date;
  /** Oldest first; at most MAX_LATEST_COMMENTS entries. */
  readonly latestComments: readonly CommentSnapshot[];
}

export type IssueContextStatus =
  | "success"
  | "graphql_failure"
  | "permission_denied"
  | "unexpected_error"
  | "skipped";

interface IssueContextResultBase {
  readonly runId: string;
  readonly eventType: IssueEventType;
  readonly retrievedAt: Date;
  readonly message: string;
}

/** Outcome of context retrieval. `issue` is set exactly when status is "success". */
export type IssueContextResult =
  | (IssueContextResultBase & {
      readonly status: "success";
      readonly issue: IssueSnapshot;
    })
  | (IssueContextResultBase & {
      readonly status: Exclude<IssueContextStatus, "success">;
      readonly issue: null;
    });
