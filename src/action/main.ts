/**
 * Action entry logic: configuration, event boundary and wiring. Returns the
 * process exit code instead of exiting so the whole run is testable.
 */

import { readFile } from "node:fs/promises";
import { Octokit } from "@octokit/rest";
import type { AuthenticationRegistry } from "../backend/auth/types.ts";
import { initializeBackend } from "../backend/bootstrap.ts";
import { ConfigError, loadConfig, type AppConfig } from "../config.ts";
import { createIssueContextService } from "../context/issue-context-service.ts";
import { skippedResult } from "../context/snapshots.ts";
import { createResponseDecisionEngine } from "../conversation/decision-engine.ts";
import { createConversationHistoryBuilder } from "../conversation/history-builder.ts";
import { createCommentPublisher } from "../github/comment-publisher.ts";
import { createOctokitGraphQLClient } from "../github/graphql-client.ts";
import { createIssueAgent, exitCodeFor } from "../handlers/issue-agent.ts";
import type { Env } from "../lib/action-input.ts";
import {
  EXIT_CODES,
  MissingTokenError,
  OperationCancelledError,
  errorMessage,
  type ExitCode,
} from "../lib/errors.ts";
import { createLogger, type Logger } from "../lib/logger.ts";
import { redactPayload } from "../lib/redaction.ts";
import { EventPayloadError, parseIssueEvent, type ParsedIssueEvent } from "./event.ts";

export interface RunActionOptions {
  env: Env;
  signal?: AbortSignal;
  logger?: Logger;
  readEventPayload?: (path: string) => Promise<unknown>;
  createOctokit?: (token: string | undefined) => Octokit;
  registry?: AuthenticationRegistry;
  /** Sink for FATAL lines; defaults to console.error. */
  reportFatal?: (line: string) => void;
}

async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readFile(path, "utf8");
  return JSON.parse(raw);
}

function runtimeMetadata(config: AppConfig): Record<string, unknown> {
  return {
    eventName: config.eventName,
    repository: config.repository ? `${config.repository.owner}/${config.repository.name}` : undefined,
    runId: config.runId,
    commentsPageSize: config.commentsPageSize,
    botLogin: config.botLogin,
    agentHandle: config.agentHandle,
    semanticWindowHours: config.semanticWindowHours,
    github_token: config.githubToken,
    azure_foundry_api_key: config.backend?.config.apiKey,
    backendConfigured: config.backend !== undefined,
    backendSources: config.backend?.sources,
  };
}

export async function runAction(opts: RunActionOptions): Promise<ExitCode> {
  const reportFatal = opts.reportFatal ?? ((line: string) => console.error(line));

  // Fail fast on missing or invalid config
  let config: AppConfig;
  try {
    config = loadConfig(opts.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      reportFatal("FATAL: Invalid configuration:");
      for (const issue of err.issues) {
        reportFatal(`  ${issue}`);
      }
      return EXIT_CODES.failure;
    }
    throw err;
  }

  const logger = opts.logger ?? createLogger(config.logLevel);
  logger.info(redactPayload(runtimeMetadata(config)), "Issue agent starting");

  let parsed: ParsedIssueEvent;
  try {
    const payload = await (opts.readEventPayload ?? readJsonFile)(config.eventPath);
    parsed = parseIssueEvent(config.eventName, payload, {
      repository: config.repository,
      runId: config.runId,
      commentsPageSize: config.commentsPageSize,
    });
  } catch (err) {
    reportFatal(
      err instanceof EventPayloadError
        ? `FATAL: ${err.message}`
        : `FATAL: Could not read event payload from ${config.eventPath}: ${errorMessage(err)}`,
    );
    return EXIT_CODES.failure;
  }

  if (parsed.kind === "skip") {
    const result = skippedResult(config.runId, parsed.eventType, parsed.reason);
    logger.info({ issueNumber: parsed.issueNumber, status: result.status }, result.message);
    return EXIT_CODES.success;
  }

  const octokit =
    opts.createOctokit?.(config.githubToken) ??
    new Octokit({ auth: config.githubToken, userAgent: "issue-agent" });

  const backend = config.backend;
  const agent = createIssueAgent({
    logger,
    contextService: createIssueContextService({
      graphqlClient: createOctokitGraphQLClient(octokit, logger),
      logger,
    }),
    historyBuilder: createConversationHistoryBuilder({ botLogin: config.botLogin }),
    decisionEngine: createResponseDecisionEngine({
      mentionHandles: [config.agentHandle],
      semanticWindowMs: config.semanticWindowHours * 60 * 60 * 1000,
    }),
    publisher: createCommentPublisher({ octokit, logger }),
    connectBackend: backend
      ? (signal) => {
          logger.debug({ sources: backend.sources }, "AI backend settings loaded");
          return initializeBackend(backend.config, { logger, signal, registry: opts.registry });
        }
      : undefined,
  });

  try {
    const outcome = await agent.run(parsed.request, config.githubToken, opts.signal);
    const exitCode = exitCodeFor(outcome);
    logger.info({ status: outcome.status, exitCode }, "Issue agent finished");
    return exitCode;
  } catch (err) {
    if (err instanceof OperationCancelledError) {
      logger.warn({ reason: err.message }, "Issue agent cancelled");
      return EXIT_CODES.cancelled;
    }
    if (err instanceof MissingTokenError) {
      logger.error(err.message);
      return EXIT_CODES.failure;
    }
    logger.fatal({ err }, "Issue agent crashed");
    return EXIT_CODES.failure;
  }
}
