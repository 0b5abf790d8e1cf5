/**
 * Reply generation.
 *
 * Sends the sanitized conversation to the AI backend when one is connected and
 * falls back to fixed guidance text when it is not, when the call fails, or
 * when the model returns nothing.
 */

import type { Logger } from "pino";
import type { BackendClient } from "../backend/types.ts";
import { rethrowIfCancelled } from "../lib/abort.ts";
import { errorMessage } from "../lib/errors.ts";
import { sanitizeContent } from "../lib/sanitizer.ts";
import { AGENT_NAME } from "./signature.ts";
import { AGENT_SYSTEM_PROMPT } from "./system-prompt.ts";
import type { ConversationMessage, ResponseDecisionResult } from "./types.ts";

export const FIRST_INTERACTION_REPLY = [
  "Thanks for the mention! I can help shape this issue into a clear, testable user story.",
  "",
  "To start, it would help to know:",
  "- What goal or user story are you after?",
  "- Which users or systems are involved?",
  "- How will we know it is done (measurable acceptance criteria)?",
  "- Are there constraints or dependencies to keep in mind?",
].join("\n");

export const SUBSEQUENT_INTERACTION_REPLY = [
  "I'm looking at your latest message. To move this forward:",
  "",
  "- Add any missing context or clarifications",
  "- Make each acceptance criterion specific and measurable",
  "- List the assumptions and constraints you are working with",
  "",
  "Tell me which part you would like to refine next.",
].join("\n");

export const FOLLOW_UP_ACKNOWLEDGMENT_REPLY =
  "Thanks for the update! Let me know if you want help refining the requirements or acceptance criteria.";

export type ReplySource = "backend" | "fallback";

export interface GeneratedReply {
  text: string;
  source: ReplySource;
}

export interface ResponseGenerator {
  generate(
    history: readonly ConversationMessage[],
    decision: ResponseDecisionResult,
    signal?: AbortSignal,
  ): Promise<GeneratedReply>;
}

export function buildConversationPrompt(
  history: readonly ConversationMessage[],
  agentName: string = AGENT_NAME,
): string {
  const lines: string[] = ["## Previous conversation:", ""];

  for (const message of history) {
    const label =
      message.role === "assistant"
        ? `Assistant (${agentName})`
        : `User (${message.authorName})`;
    lines.push(`**${label}:**`, sanitizeContent(message.text), "");
  }

  lines.push(
    "## Your task:",
    "Using the conversation above, write a helpful reply that follows the policy in your instructions.",
  );
  return lines.join("\n");
}

export function fallbackReply(
  history: readonly ConversationMessage[],
  decision: ResponseDecisionResult,
): string {
  if (decision.decision === "should_respond") {
    return FOLLOW_UP_ACKNOWLEDGMENT_REPLY;
  }

  const agentTurns = history.filter((m) => m.role === "assistant").length;
  return agentTurns === 0 ? FIRST_INTERACTION_REPLY : SUBSEQUENT_INTERACTION_REPLY;
}

export function createResponseGenerator(deps: {
  client?: BackendClient;
  logger: Logger;
}): ResponseGenerator {
  const { client } = deps;
  const logger = deps.logger.child({ component: "response-generator" });

  return {
    async generate(history, decision, signal): Promise<GeneratedReply> {
      if (history.length === 0) {
        throw new TypeError("history must contain at least one message.");
      }
      if (decision.decision === "skip") {
        throw new TypeError("Cannot generate a reply for a skip decision.");
      }

      const fallback = (): GeneratedReply => ({
        text: fallbackReply(history, decision),
        source: "fallback",
      });

      if (!client) {
        logger.warn("AI backend not configured, using fallback reply");
        return fallback();
      }

      try {
        const result = await client.complete({
          system: AGENT_SYSTEM_PROMPT,
          prompt: buildConversationPrompt(history),
          signal,
        });

        if (!result.text.trim()) {
          logger.warn({ deployment: client.deployment }, "AI backend returned an empty reply, using fallback");
          return fallback();
        }

        logger.info(
          {
            deployment: client.deployment,
            messageCount: history.length,
            inputTokens: result.usage.inputTokens,
            outputTokens: result.usage.outputTokens,
            durationMs: result.durationMs,
          },
          "AI reply generated",
        );
        return { text: result.text.trim(), source: "backend" };
      } catch (err) {
        rethrowIfCancelled(err, signal);
        logger.error(
          { deployment: client.deployment, error: errorMessage(err) },
          "AI reply generation failed, using fallback",
        );
        return fallback();
      }
    },
  };
}
