/**
 * HTTP handle to an Azure AI Foundry project.
 *
 * Authentication is applied by a RequestAuthorizer on every outgoing request,
 * both for our own readiness probe and for the chat calls the AI SDK makes,
 * so the two strategies share one client.
 */

import { createAzure } from "@ai-sdk/azure";
import { generateText } from "ai";
import { BackendHttpError } from "./errors.ts";
import type {
  AuthMethod,
  BackendClient,
  CompletionResult,
  ValidatedBackendConfiguration,
} from "./types.ts";

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface RequestAuthorizer {
  readonly method: AuthMethod;
  /** Headers that authorize one request. */
  headers(signal?: AbortSignal): Promise<Record<string, string>>;
}

// The Azure provider insists on an API key; in bearer mode this value is
// stripped again by authorizedFetch before anything leaves the process.
const BEARER_MODE_API_KEY = "federated-identity";

export function createBackendClient(opts: {
  config: ValidatedBackendConfiguration;
  authorizer: RequestAuthorizer;
  fetchImpl?: FetchLike;
  now?: () => number;
}): BackendClient {
  const { config, authorizer } = opts;
  const fetchImpl = opts.fetchImpl ?? fetch;
  const now = opts.now ?? Date.now;

  const authorizedFetch: FetchLike = async (input, init) => {
    const headers = new Headers(init?.headers);
    headers.delete("api-key");
    headers.delete("authorization");
    const authHeaders = await authorizer.headers(init?.signal ?? undefined);
    for (const [name, value] of Object.entries(authHeaders)) {
      headers.set(name, value);
    }
    return fetchImpl(input, { ...init, headers });
  };

  const readOnlyGet = async (url: string, signal?: AbortSignal): Promise<void> => {
    const response = await authorizedFetch(url, {
      method: "GET",
      headers: { accept: "application/json" },
      signal,
    });

    const body = await response.text();
    if (!response.ok) {
      throw new BackendHttpError(response.status, body);
    }
  };

  const azure = createAzure({
    baseURL: `${new URL(config.endpoint).origin}/openai`,
    apiKey: config.credential.kind === "api_key" ? config.credential.apiKey : BEARER_MODE_API_KEY,
    apiVersion: config.apiVersion,
    useDeploymentBasedUrls: true,
    fetch: authorizedFetch,
  });

  return {
    authMethod: authorizer.method,
    deployment: config.modelDeploymentName,

    async probe(signal): Promise<void> {
      const apiVersion = encodeURIComponent(config.apiVersion);

      // 1. Project reachable and credential accepted
      await readOnlyGet(`${config.endpoint}/assistants?api-version=${apiVersion}&limit=1`, signal);

      // 2. The configured deployment exists in the project
      const deployment = encodeURIComponent(config.modelDeploymentName);
      await readOnlyGet(`${config.endpoint}/deployments/${deployment}?api-version=${apiVersion}`, signal);
    },

    async complete({ system, prompt, signal }): Promise<CompletionResult> {
      const startedAt = now();
      const response = await generateText({
        model: azure.chat(config.modelDeploymentName),
        system,
        prompt,
        abortSignal: signal,
        maxRetries: 0,
      });

      return {
        text: response.text,
        usage: {
          inputTokens: response.usage?.inputTokens ?? 0,
          outputTokens: response.usage?.outputTokens ?? 0,
        },
        durationMs: now() - startedAt,
      };
    },
  };
}
