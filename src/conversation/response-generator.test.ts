import { describe, test, expect } from "vitest";
import pino from "pino";
import type { BackendClient, CompletionRequest, CompletionResult } from "../backend/types.ts";
import { OperationCancelledError } from "../lib/errors.ts";
import {
  FIRST_INTERACTION_REPLY,
  FOLLOW_UP_ACKNOWLEDGMENT_REPLY,
  SUBSEQUENT_INTERACTION_REPLY,
  buildConversationPrompt,
  createResponseGenerator,
} from "./response-generator.ts";
import { AGENT_SYSTEM_PROMPT } from "./system-prompt.ts";
import type { ConversationMessage, ResponseDecisionResult } from "./types.ts";

// -- Test helpers -------------------------------------------------------------

const logger = pino({ level: "silent" });
const MUST: ResponseDecisionResult = { decision: "must_respond", reason: "@mention of issueagent detected" };
const SHOULD: ResponseDecisionResult = { decision: "should_respond", reason: "follow-up" };

function message(role: "user" | "assistant", text: string, authorName = "alice"): ConversationMessage {
  return {
    messageId: `${role}-${text.length}`,
    role,
    authorName: role === "assistant" ? "issueagent" : authorName,
    text,
    createdAt: new Date("2025-05-01T10:00:00Z"),
  };
}

function createFakeClient(
  complete: (request: CompletionRequest) => Promise<CompletionResult>,
): BackendClient & { requests: CompletionRequest[] } {
  const requests: CompletionRequest[] = [];
  return {
    requests,
    authMethod: "api_key",
    deployment: "gpt-5-mini",
    async probe() {},
    async complete(request) {
      requests.push(request);
      return complete(request);
    },
  };
}

const firstTurn = [message("user", "Export to CSV\n\nPlease help @issueagent")];

// -- Tests --------------------------------------------------------------------

describe("buildConversationPrompt", () => {
  test("labels turns and strips hidden content", () => {
    const prompt = buildConversationPrompt([
      message("user", "Export please", "alice"),
      message("assistant", "<!-- issueagent-signature -->\nWhich columns?"),
    ]);

    expect(prompt).toBe(
      [
        "## Previous conversation:",
        "",
        "**User (alice):**",
        "Export please",
        "",
        "**Assistant (issueagent):**",
        "\nWhich columns?",
        "",
        "## Your task:",
        "Using the conversation above, write a helpful reply that follows the policy in your instructions.",
      ].join("\n"),
    );
  });
});

describe("createResponseGenerator", () => {
  test("uses the first-interaction fallback when no backend is configured", async () => {
    const generator = createResponseGenerator({ logger });

    await expect(generator.generate(firstTurn, MUST)).resolves.toEqual({
      text: FIRST_INTERACTION_REPLY,
      source: "fallback",
    });
  });

  test("uses the subsequent-interaction fallback once the agent has spoken", async () => {
    const generator = createResponseGenerator({ logger });
    const history = [...firstTurn, message("assistant", "What format?"), message("user", "@issueagent CSV")];

    const reply = await generator.generate(history, MUST);

    expect(reply.text).toBe(SUBSEQUENT_INTERACTION_REPLY);
  });

  test("uses the acknowledgment fallback for follow-ups", async () => {
    const generator = createResponseGenerator({ logger });

    expect((await generator.generate(firstTurn, SHOULD)).text).toBe(FOLLOW_UP_ACKNOWLEDGMENT_REPLY);
  });

  test("sends the system prompt and conversation to the backend", async () => {
    const client = createFakeClient(async () => ({
      text: "  Here is a refined story.  ",
      usage: { inputTokens: 120, outputTokens: 40 },
      durationMs: 15,
    }));
    const generator = createResponseGenerator({ client, logger });

    const reply = await generator.generate(firstTurn, MUST);

    expect(reply).toEqual({ text: "Here is a refined story.", source: "backend" });
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]?.system).toBe(AGENT_SYSTEM_PROMPT);
    expect(client.requests[0]?.prompt).toBe(buildConversationPrompt(firstTurn));
  });

  test("falls back when the backend fails", async () => {
    const client = createFakeClient(async () => {
      throw new Error("HTTP 500");
    });
    const generator = createResponseGenerator({ client, logger });

    expect(await generator.generate(firstTurn, MUST)).toEqual({
      text: FIRST_INTERACTION_REPLY,
      source: "fallback",
    });
  });

  test("falls back when the backend returns blank text", async () => {
    const client = createFakeClient(async () => ({
      text: "   ",
      usage: { inputTokens: 1, outputTokens: 0 },
      durationMs: 1,
    }));
    const generator = createResponseGenerator({ client, logger });

    expect((await generator.generate(firstTurn, MUST)).source).toBe("fallback");
  });

  test("rethrows cancellation", async () => {
    const controller = new AbortController();
    const client = createFakeClient(async () => {
      controller.abort();
      throw new Error("aborted");
    });
    const generator = createResponseGenerator({ client, logger });

    await expect(generator.generate(firstTurn, MUST, controller.signal)).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
  });

  test("refuses skip decisions and empty history", async () => {
    const generator = createResponseGenerator({ logger });

    await expect(generator.generate(firstTurn, { decision: "skip", reason: "x" })).rejects.toThrow(
      "Cannot generate a reply for a skip decision.",
    );
    await expect(generator.generate([], MUST)).rejects.toThrow("history must contain at least one message.");
  });
});
