/**
 * Response decision engine.
 *
 * Pure policy over the ordered conversation: decides whether the agent must
 * reply (explicit @mention), should reply (an answer to the question the agent
 * last asked, inside the follow-up window) or stay silent. The input array is
 * never modified.
 */

import { AGENT_NAME } from "./signature.ts";
import type { ConversationMessage, ResponseDecisionResult } from "./types.ts";

export const DEFAULT_SEMANTIC_WINDOW_MS = 48 * 60 * 60 * 1000;

/** Phrases that mark an agent turn as a request for information. */
export const QUESTION_CUES: readonly string[] = [
  "please provide",
  "please share",
  "please add",
  "could you add",
  "could you share",
  "could you provide",
  "can you provide",
  "can you share",
  "acceptance criteria",
  "constraints",
  "steps",
  "repro",
  "link",
  "screenshot",
  "logs",
];

/** Whole-message acknowledgments. */
export const ACKNOWLEDGMENTS: readonly string[] = [
  "thanks",
  "thank you",
  "thanks a lot",
  "thank you so much",
  "thx",
  "ty",
  "ok",
  "okay",
  "k",
  "lgtm",
  "looks good",
  "looks good to me",
  "sounds good",
  "got it",
  "great",
  "cool",
  "nice",
  "+1",
  ":+1:",
  "👍",
];

/** Tokens a short message may consist of and still be a bare acknowledgment. */
const ACKNOWLEDGMENT_TOKENS = new Set([
  "thanks",
  "thank",
  "you",
  "so",
  "much",
  "thx",
  "ty",
  "ok",
  "okay",
  "k",
  "lgtm",
  "great",
  "cool",
  "nice",
  "got",
  "it",
  "+1",
  ":+1:",
  "👍",
]);

const SHORT_ACKNOWLEDGMENT_LENGTH = 20;

const CONFIRMATION_WORD = /\b(?:yes|no|done|updated|pushed|added|completed)\b/i;
const LINK = /https?:\/\/\S+/i;
const FENCED_CODE = /```/;
const LIST_ITEM = /^\s*(?:[-*+]\s+\[[ xX]\]|\d+[.)])\s+\S/;
const FOLLOW_THROUGH = /\bper your request\b|\bas you suggested\b|\bAC:/i;
const SKIN_TONE_MODIFIERS = /[\u{1F3FB}-\u{1F3FF}]/gu;

export interface ResponseDecisionEngineOptions {
  /** Handles that count as a mention (without the leading @). */
  mentionHandles?: string[];
  /** Maximum time between the agent's question and a follow-up answer. */
  semanticWindowMs?: number;
}

export interface ResponseDecisionEngine {
  shouldRespond(history: readonly ConversationMessage[]): ResponseDecisionResult;
}

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function buildMentionRegex(handles: readonly string[]): RegExp {
  const cleaned = handles
    .map((h) => (h.startsWith("@") ? h.slice(1) : h))
    .map((h) => h.trim())
    .filter((h) => h.length > 0)
    .map(escapeRegExp);

  if (cleaned.length === 0) {
    // Never matches.
    return /$^/g;
  }

  return new RegExp(`(?<!\\w)@(?:${cleaned.join("|")})\\b`, "gi");
}

/**
 * True when at least one mention sits outside inline code and fenced blocks.
 * A match preceded by an odd number of backticks is inside an open span.
 */
export function containsUnquotedMention(text: string, mentionRegex: RegExp): boolean {
  for (const match of text.matchAll(mentionRegex)) {
    const index = match.index ?? 0;
    const backticks = text.slice(0, index).split("`").length - 1;
    if (backticks % 2 === 0) {
      return true;
    }
  }
  return false;
}

export function askedQuestion(text: string): boolean {
  if (text.includes("?")) return true;
  const lower = text.toLowerCase();
  return QUESTION_CUES.some((cue) => lower.includes(cue));
}

export function isBareAcknowledgment(text: string): boolean {
  const normalized = text
    .toLowerCase()
    .replace(SKIN_TONE_MODIFIERS, "")
    .trim()
    .replace(/[!.,]+$/, "")
    .trim();

  if (normalized.length === 0) return true;
  if (ACKNOWLEDGMENTS.includes(normalized)) return true;
  if (normalized.length >= SHORT_ACKNOWLEDGMENT_LENGTH) return false;

  const tokens = normalized.split(/[\s,.!]+/).filter((t) => t.length > 0);
  return tokens.length > 0 && tokens.every((t) => ACKNOWLEDGMENT_TOKENS.has(t));
}

function listItemCount(text: string): number {
  return text.split(/\r?\n/).filter((line) => LIST_ITEM.test(line)).length;
}

export function isAnswerLike(text: string): boolean {
  const items = listItemCount(text);
  const substantive = LINK.test(text) || FENCED_CODE.test(text) || items > 0;

  if (CONFIRMATION_WORD.test(text) && substantive) return true;
  if (FOLLOW_THROUGH.test(text)) return true;
  return items >= 2;
}

function findLastAgentMessage(
  history: readonly ConversationMessage[],
  before: number,
): ConversationMessage | undefined {
  for (let i = before - 1; i >= 0; i--) {
    if (history[i].role === "assistant") {
      return history[i];
    }
  }
  return undefined;
}

function skip(reason: string): ResponseDecisionResult {
  return { decision: "skip", reason };
}

export function createResponseDecisionEngine(
  options: ResponseDecisionEngineOptions = {},
): ResponseDecisionEngine {
  const handles = options.mentionHandles ?? [AGENT_NAME];
  const primaryHandle = handles[0] ?? AGENT_NAME;
  const windowMs = options.semanticWindowMs ?? DEFAULT_SEMANTIC_WINDOW_MS;

  return {
    shouldRespond(history): ResponseDecisionResult {
      if (!history || history.length === 0) {
        return skip("No conversation history");
      }

      const latestIndex = history.length - 1;
      const latest = history[latestIndex];

      if (latest.role === "assistant") {
        return skip("Latest message is from the agent");
      }

      // A fresh regex per call: global regexes carry lastIndex state.
      if (containsUnquotedMention(latest.text, buildMentionRegex(handles))) {
        return {
          decision: "must_respond",
          reason: `@mention of ${primaryHandle} detected`,
        };
      }

      const agentMessage = findLastAgentMessage(history, latestIndex);
      if (!agentMessage) {
        return skip("No mention detected");
      }

      if (!askedQuestion(agentMessage.text)) {
        return skip("No mention detected and the agent's last message asked nothing");
      }

      const elapsedMs = latest.createdAt.getTime() - agentMessage.createdAt.getTime();
      if (elapsedMs <= 0) {
        return skip("Latest message does not follow the agent's last message");
      }

      if (elapsedMs > windowMs) {
        return skip("Follow-up window elapsed");
      }

      if (isBareAcknowledgment(latest.text)) {
        return skip("Latest message is an acknowledgment");
      }

      if (isAnswerLike(latest.text)) {
        return {
          decision: "should_respond",
          reason: "Semantic follow-up to the agent's question",
        };
      }

      return skip("No mention or follow-up detected");
    },
  };
}
