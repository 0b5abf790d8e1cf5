import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  loadBackendConfiguration,
  type LoadedBackendConfiguration,
} from "./backend/configuration.ts";
import { clampCommentsPageSize } from "./context/issue-context-service.ts";
import { readActionInput, type Env } from "./lib/action-input.ts";

const DEFAULT_COMMENTS_PAGE_SIZE = 5;

const configSchema = z.object({
  // Optional here: the token guard reports a missing token with its own message.
  githubToken: z.string().optional(),
  repository: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, "GITHUB_REPOSITORY must look like <owner>/<repo>")
    .transform((s) => {
      const [owner = "", name = ""] = s.split("/");
      return { owner, name };
    })
    .optional(),
  eventName: z.string({ required_error: "GITHUB_EVENT_NAME is required" }).min(1, "GITHUB_EVENT_NAME is required"),
  eventPath: z.string({ required_error: "GITHUB_EVENT_PATH is required" }).min(1, "GITHUB_EVENT_PATH is required"),
  runId: z.string().min(1).default(() => randomUUID()),
  // Unparseable values fall back to the default rather than failing the run.
  commentsPageSize: z
    .string()
    .optional()
    .transform((raw) =>
      clampCommentsPageSize(raw && /^[+-]?\d+$/.test(raw) ? Number(raw) : DEFAULT_COMMENTS_PAGE_SIZE),
    ),
  botLogin: z.string().min(1).default("github-actions[bot]"),
  agentHandle: z
    .string()
    .min(1)
    .default("issueagent")
    .transform((s) => s.replace(/^@/, "")),
  semanticWindowHours: z.coerce
    .number()
    .positive("semantic-window-hours must be greater than 0")
    .default(48),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type AppConfig = z.infer<typeof configSchema> & {
  /** Undefined when no AI backend endpoint is configured. */
  backend: LoadedBackendConfiguration | undefined;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Parse the process environment once. Action inputs (`INPUT_*`) win over
 * plain environment variables.
 *
 * @throws ConfigError listing every invalid setting
 */
export function loadConfig(env: Env): AppConfig {
  const input = (name: string, envName?: string) => readActionInput(env, name, envName)?.value;

  const result = configSchema.safeParse({
    githubToken: input("github-token", "GITHUB_TOKEN"),
    repository: env.GITHUB_REPOSITORY?.trim() || undefined,
    eventName: env.GITHUB_EVENT_NAME?.trim() || undefined,
    eventPath: env.GITHUB_EVENT_PATH?.trim() || undefined,
    runId: env.GITHUB_RUN_ID?.trim() || undefined,
    commentsPageSize: input("comments-page-size"),
    botLogin: input("bot-login"),
    agentHandle: input("agent-handle"),
    semanticWindowHours: input("semantic-window-hours"),
    logLevel: env.LOG_LEVEL?.trim() || undefined,
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  return { ...result.data, backend: loadBackendConfiguration(env) };
}
