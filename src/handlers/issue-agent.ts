/**
 * One agent run for one issue event.
 *
 * token guard -> backend bootstrap (when configured) -> context retrieval ->
 * history -> decision -> reply generation -> publication. Stages run strictly
 * in order; the only exception that escapes is caller cancellation (and the
 * token guard, which fails before anything remote happens).
 */

import type { Logger } from "pino";
import type { BackendClient, ConnectionResult } from "../backend/types.ts";
import type { IssueContextService } from "../context/issue-context-service.ts";
import { unexpectedErrorResult } from "../context/snapshots.ts";
import type { IssueContextRequest, IssueContextResult } from "../context/types.ts";
import type { ResponseDecisionEngine } from "../conversation/decision-engine.ts";
import type { ConversationHistoryBuilder } from "../conversation/history-builder.ts";
import {
  createResponseGenerator,
  type GeneratedReply,
  type ResponseGenerator,
} from "../conversation/response-generator.ts";
import type { ResponseDecisionResult } from "../conversation/types.ts";
import type { CommentPublisher, PublishCommentResult } from "../github/comment-publisher.ts";
import { ensureGitHubToken } from "../github/token-guard.ts";
import { rethrowIfCancelled, throwIfCancelled } from "../lib/abort.ts";
import { EXIT_CODES, errorMessage, type ExitCode } from "../lib/errors.ts";
import { createRunLogger } from "../lib/logger.ts";
import { startMeasurement } from "../lib/timing.ts";

export type FailedConnection = Extract<ConnectionResult, { success: false }>;

export type AgentOutcome =
  | { status: "backend_failed"; connection: FailedConnection }
  | { status: "context_failed"; context: IssueContextResult }
  | { status: "skipped"; context: IssueContextResult; decision: ResponseDecisionResult }
  | {
      status: "replied";
      context: IssueContextResult;
      decision: ResponseDecisionResult;
      reply: GeneratedReply;
      publication: PublishCommentResult;
    };

export interface IssueAgent {
  run(request: IssueContextRequest, token: string | undefined, signal?: AbortSignal): Promise<AgentOutcome>;
}

export interface IssueAgentDeps {
  contextService: IssueContextService;
  historyBuilder: ConversationHistoryBuilder;
  decisionEngine: ResponseDecisionEngine;
  publisher: CommentPublisher;
  logger: Logger;
  /** Undefined when no AI backend is configured; replies then use fallback text. */
  connectBackend?: (signal?: AbortSignal) => Promise<ConnectionResult>;
  createGenerator?: (client: BackendClient | undefined, logger: Logger) => ResponseGenerator;
}

/** 0 for success and skips, 1 for any failure. Cancellation (130) is decided by the entry point. */
export function exitCodeFor(outcome: AgentOutcome): ExitCode {
  switch (outcome.status) {
    case "backend_failed":
      return EXIT_CODES.failure;
    case "context_failed":
      return outcome.context.status === "skipped" ? EXIT_CODES.success : EXIT_CODES.failure;
    case "skipped":
      return EXIT_CODES.success;
    case "replied":
      return outcome.publication.success ? EXIT_CODES.success : EXIT_CODES.failure;
  }
}

export function createIssueAgent(deps: IssueAgentDeps): IssueAgent {
  const { contextService, historyBuilder, decisionEngine, publisher } = deps;
  const createGenerator =
    deps.createGenerator ?? ((client, logger) => createResponseGenerator({ client, logger }));

  return {
    async run(request, token, signal): Promise<AgentOutcome> {
      if (!request) {
        throw new TypeError("request must be provided.");
      }

      // 1. Token guard: nothing remote happens without a token
      ensureGitHubToken(token, signal);

      const logger = createRunLogger(deps.logger, {
        runId: request.runId,
        owner: request.owner,
        repo: request.name,
        issueNumber: request.issueNumber,
        eventType: request.eventType,
      });
      const measurement = startMeasurement(logger);

      try {
        // 2. Backend bootstrap, fail-fast
        let client: BackendClient | undefined;
        if (deps.connectBackend) {
          const connection = await deps.connectBackend(signal);
          if (!connection.success) {
            logger.error(
              {
                errorCategory: connection.errorCategory,
                stage: connection.stage,
                endpoint: connection.attemptedEndpoint,
              },
              `AI backend unavailable: ${connection.errorMessage}`,
            );
            return { status: "backend_failed", connection };
          }
          client = connection.client;
        }

        // 3. Context retrieval
        const context = await contextService.fetchIssueContext(request, signal);
        if (context.status !== "success") {
          logger.warn({ status: context.status }, context.message);
          return { status: "context_failed", context };
        }

        try {
          // 4. History and decision
          const history = historyBuilder.buildHistory(context.issue);
          logger.info({ messageCount: history.length }, "Conversation history built");

          const decision = decisionEngine.shouldRespond(history);
          logger.info({ decision: decision.decision, reason: decision.reason }, "Response decision made");

          if (decision.decision === "skip") {
            return { status: "skipped", context, decision };
          }

          // 5. Generate and publish
          throwIfCancelled(signal);
          const reply = await createGenerator(client, logger).generate(history, decision, signal);

          const publication = await publisher.publish(
            {
              owner: request.owner,
              repo: request.name,
              issueNumber: request.issueNumber,
              reply: reply.text,
            },
            signal,
          );

          if (publication.success) {
            logger.info({ commentUrl: publication.commentUrl, replySource: reply.source }, "Reply posted");
          } else {
            logger.error({ error: publication.errorMessage }, "Reply could not be posted");
          }

          return { status: "replied", context, decision, reply, publication };
        } catch (err) {
          rethrowIfCancelled(err, signal);
          logger.error({ err }, "Agent run failed after context retrieval");
          return {
            status: "context_failed",
            context: unexpectedErrorResult(request.runId, request.eventType, errorMessage(err)),
          };
        }
      } finally {
        measurement.stop();
      }
    },
  };
}
