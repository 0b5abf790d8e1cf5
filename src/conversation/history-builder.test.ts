import { describe, test, expect } from "vitest";
import { createCommentSnapshot, createIssueSnapshot } from "../context/snapshots.ts";
import type { IssueSnapshot } from "../context/types.ts";
import { createConversationHistoryBuilder, normalizeLogin } from "./history-builder.ts";
import {
  AGENT_SIGNATURE_MARKER,
  createConversationMessage,
  formatAgentComment,
  hasAgentSignature,
} from "./signature.ts";

const NOW = new Date("2025-06-01T12:00:00Z");

function makeIssue(comments: Array<{ id: string; author: string; body: string; at: string }>): IssueSnapshot {
  return createIssueSnapshot(
    {
      id: "I_1",
      number: 1,
      title: "Export to CSV",
      body: "We need CSV export.",
      authorLogin: "alice",
      createdAt: new Date("2025-05-30T09:00:00Z"),
      comments: comments.map((c) =>
        createCommentSnapshot({ id: c.id, authorLogin: c.author, body: c.body, createdAt: new Date(c.at) }, NOW),
      ),
    },
    NOW,
  );
}

// --- signature ---

describe("formatAgentComment", () => {
  test("prefixes the marker and banner", () => {
    expect(formatAgentComment("  Hello there  ")).toBe(
      "<!-- issueagent-signature -->\n🤖 **issueagent**\n\nHello there",
    );
  });

  test("marker survives the comment excerpt cap", () => {
    const body = formatAgentComment("x".repeat(1_000));
    const snapshot = createCommentSnapshot({ id: "c", authorLogin: "someone", body, createdAt: NOW }, NOW);

    expect(hasAgentSignature(snapshot.bodyExcerpt)).toBe(true);
  });
});

describe("createConversationMessage", () => {
  test("rejects future timestamps", () => {
    expect(() =>
      createConversationMessage(
        { messageId: "m", role: "user", authorName: "a", text: "t", createdAt: new Date(NOW.getTime() + 5_000) },
        NOW,
      ),
    ).toThrow(new RangeError("Message timestamps cannot be in the future."));
  });

  test("rejects a blank author", () => {
    expect(() =>
      createConversationMessage({ messageId: "m", role: "user", authorName: " ", text: "t", createdAt: NOW }, NOW),
    ).toThrow("Author name must be provided.");
  });
});

// --- history builder ---

describe("normalizeLogin", () => {
  test("lowercases and drops the [bot] suffix", () => {
    expect(normalizeLogin("GitHub-Actions[bot]")).toBe("github-actions");
    expect(normalizeLogin("github-actions")).toBe("github-actions");
  });
});

describe("buildHistory", () => {
  const builder = createConversationHistoryBuilder({ botLogin: "github-actions[bot]" });

  test("starts with the issue as a user message", () => {
    const history = builder.buildHistory(makeIssue([]));

    expect(history).toEqual([
      {
        messageId: "I_1",
        role: "user",
        authorName: "alice",
        text: "Export to CSV\n\nWe need CSV export.",
        createdAt: new Date("2025-05-30T09:00:00Z"),
      },
    ]);
  });

  test("tags the bot's comments and signed comments as assistant turns", () => {
    const history = builder.buildHistory(
      makeIssue([
        { id: "C_1", author: "github-actions", body: "What format?", at: "2025-05-30T10:00:00Z" },
        { id: "C_2", author: "bob", body: "CSV with headers", at: "2025-05-30T11:00:00Z" },
        {
          id: "C_3",
          author: "deploy-bot",
          body: `${AGENT_SIGNATURE_MARKER}\nNoted.`,
          at: "2025-05-30T12:00:00Z",
        },
      ]),
    );

    expect(history.map((m) => [m.messageId, m.role, m.authorName])).toEqual([
      ["I_1", "user", "alice"],
      ["C_1", "assistant", "issueagent"],
      ["C_2", "user", "bob"],
      ["C_3", "assistant", "issueagent"],
    ]);
  });

  test("uses a custom agent name for assistant turns", () => {
    const custom = createConversationHistoryBuilder({ botLogin: "helper-bot", agentName: "helper" });
    const history = custom.buildHistory(
      makeIssue([{ id: "C_1", author: "Helper-Bot", body: "Hi", at: "2025-05-30T10:00:00Z" }]),
    );

    expect(history[1]?.authorName).toBe("helper");
  });

  test("requires a bot login", () => {
    expect(() => createConversationHistoryBuilder({ botLogin: " " })).toThrow("Bot login must be provided.");
  });
});
