import { describe, test, expect } from "vitest";
import pino from "pino";
import type { AccessToken, TokenCredential } from "@azure/identity";
import { OperationCancelledError } from "../lib/errors.ts";
import { createDefaultRegistry } from "./auth/registry.ts";
import type { CredentialFactory } from "./auth/federated-identity.ts";
import { initializeBackend } from "./bootstrap.ts";
import type { FetchLike } from "./client.ts";
import type { BackendConfiguration } from "./types.ts";

// -- Test helpers -------------------------------------------------------------

const logger = pino({ level: "silent" });
const ENDPOINT = "https://contoso.services.ai.azure.com/api/projects/demo";
const API_KEY = "test-secret-0123456789abcdefghijk";

interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
}

function createFakeFetch(
  respond: (request: RecordedRequest, signal: AbortSignal | undefined) => Promise<Response>,
): FetchLike & { calls: RecordedRequest[] } {
  const calls: RecordedRequest[] = [];
  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const request = {
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
    };
    calls.push(request);
    return respond(request, init?.signal ?? undefined);
  };
  return Object.assign(fetchImpl, { calls });
}

function hangUntilAborted(signal: AbortSignal | undefined): Promise<Response> {
  return new Promise((_resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

function fakeCredentialFactory(getToken: TokenCredential["getToken"]): CredentialFactory & {
  identities: Array<{ tenantId: string; clientId: string }>;
} {
  const identities: Array<{ tenantId: string; clientId: string }> = [];
  const factory: CredentialFactory = (identity) => {
    identities.push(identity);
    return { getToken };
  };
  return Object.assign(factory, { identities });
}

const okToken = async (): Promise<AccessToken> => ({
  token: "test-token",
  expiresOnTimestamp: Date.now() + 60 * 60 * 1000,
});

const apiKeyConfig: BackendConfiguration = { endpoint: ENDPOINT, apiKey: API_KEY };

// -- Tests --------------------------------------------------------------------

describe("initializeBackend", () => {
  test("fails validation before any network call", async () => {
    const fetchImpl = createFakeFetch(async () => new Response("{}"));

    const result = await initializeBackend(
      { endpoint: ENDPOINT, apiKey: "abcde" },
      { logger, registry: createDefaultRegistry({ fetchImpl }), now: () => 1_000 },
    );

    expect(result.success).toBe(false);
    if (result.success) throw new Error("expected failure");
    expect(result.errorCategory).toBe("invalid_configuration");
    expect(result.stage).toBe("validating");
    expect(result.durationMs).toBe(0);
    expect(result.attemptedEndpoint).toBe("...om/api/projects/demo");
    expect(result.attemptedAt).toEqual(new Date(1_000));
    expect(fetchImpl.calls).toHaveLength(0);
  });

  test("connects with an API key and checks the project and the deployment", async () => {
    const fetchImpl = createFakeFetch(async () => new Response('{"data":[]}', { status: 200 }));

    const result = await initializeBackend(apiKeyConfig, {
      logger,
      registry: createDefaultRegistry({ fetchImpl }),
    });

    if (!result.success) throw new Error(`expected success: ${result.errorMessage}`);
    expect(result.client.authMethod).toBe("api_key");
    expect(result.client.deployment).toBe("gpt-5-mini");
    expect(fetchImpl.calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `GET ${ENDPOINT}/assistants?api-version=2025-04-01-preview&limit=1`,
      `GET ${ENDPOINT}/deployments/gpt-5-mini?api-version=2025-04-01-preview`,
    ]);
    expect(fetchImpl.calls[0]?.headers.get("api-key")).toBe(API_KEY);
    expect(fetchImpl.calls[1]?.headers.get("api-key")).toBe(API_KEY);
  });

  test("fails with model_not_found when the deployment does not exist", async () => {
    const fetchImpl = createFakeFetch(async (request) =>
      request.url.includes("nonexistent-model")
        ? new Response('{"error":{"code":"DeploymentNotFound"}}', { status: 404 })
        : new Response('{"data":[]}', { status: 200 }),
    );

    const result = await initializeBackend(
      { ...apiKeyConfig, modelDeploymentName: "nonexistent-model" },
      { logger, registry: createDefaultRegistry({ fetchImpl }) },
    );

    if (result.success) throw new Error("expected failure");
    expect(result.errorCategory).toBe("model_not_found");
    expect(result.stage).toBe("readiness_check");
    expect(result.errorMessage).toBe(
      "Model deployment 'nonexistent-model' was not found in the Azure AI Foundry project (HTTP 404). Verify 'azure_foundry_model_deployment' (AZURE_AI_FOUNDRY_MODEL_DEPLOYMENT) and the project name in the endpoint.",
    );
    expect(fetchImpl.calls.map((c) => c.url)).toEqual([
      `${ENDPOINT}/assistants?api-version=2025-04-01-preview&limit=1`,
      `${ENDPOINT}/deployments/nonexistent-model?api-version=2025-04-01-preview`,
    ]);
  });

  test("classifies a rejected key as an authentication failure", async () => {
    const fetchImpl = createFakeFetch(async () => new Response("unauthorized", { status: 401 }));

    const result = await initializeBackend(apiKeyConfig, {
      logger,
      registry: createDefaultRegistry({ fetchImpl }),
    });

    if (result.success) throw new Error("expected failure");
    expect(result.errorCategory).toBe("authentication_failure");
    expect(result.stage).toBe("readiness_check");
    expect(result.errorMessage).not.toContain(API_KEY);
  });

  test("classifies socket failures as network errors", async () => {
    const fetchImpl = createFakeFetch(async () => {
      throw new TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } });
    });

    const result = await initializeBackend(apiKeyConfig, {
      logger,
      registry: createDefaultRegistry({ fetchImpl }),
    });

    if (result.success) throw new Error("expected failure");
    expect(result.errorCategory).toBe("network_error");
  });

  test("connects with federated identity using a bearer token", async () => {
    const fetchImpl = createFakeFetch(async () => new Response("{}", { status: 200 }));
    const credentialFactory = fakeCredentialFactory(okToken);

    const result = await initializeBackend(
      { endpoint: ENDPOINT, clientId: "client-1", tenantId: "tenant-1" },
      { logger, registry: createDefaultRegistry({ fetchImpl, credentialFactory }) },
    );

    if (!result.success) throw new Error(`expected success: ${result.errorMessage}`);
    expect(result.client.authMethod).toBe("federated_identity");
    expect(credentialFactory.identities).toEqual([{ tenantId: "tenant-1", clientId: "client-1" }]);
    expect(fetchImpl.calls[0]?.headers.get("authorization")).toBe("Bearer test-token");
    expect(fetchImpl.calls[0]?.headers.get("api-key")).toBeNull();
  });

  test("reports identity failures during authentication", async () => {
    const fetchImpl = createFakeFetch(async () => new Response("{}"));
    const credentialFactory = fakeCredentialFactory(async () => {
      const err = new Error("no federated token available");
      err.name = "CredentialUnavailableError";
      throw err;
    });

    const result = await initializeBackend(
      { endpoint: ENDPOINT, clientId: "client-1", tenantId: "tenant-1" },
      { logger, registry: createDefaultRegistry({ fetchImpl, credentialFactory }) },
    );

    if (result.success) throw new Error("expected failure");
    expect(result.errorCategory).toBe("authentication_failure");
    expect(result.stage).toBe("authenticating");
    expect(fetchImpl.calls).toHaveLength(0);
  });

  test("reports its own timeout as a network timeout", async () => {
    const fetchImpl = createFakeFetch(async (_request, signal) => hangUntilAborted(signal));

    const result = await initializeBackend(
      { ...apiKeyConfig, connectionTimeoutMs: 20 },
      { logger, registry: createDefaultRegistry({ fetchImpl }) },
    );

    if (result.success) throw new Error("expected failure");
    expect(result.errorCategory).toBe("network_timeout");
    expect(result.stage).toBe("readiness_check");
  });

  test("throws when the caller cancels mid-probe", async () => {
    const controller = new AbortController();
    const fetchImpl = createFakeFetch(async (_request, signal) => {
      controller.abort(new Error("Received SIGTERM"));
      return hangUntilAborted(signal);
    });

    await expect(
      initializeBackend(apiKeyConfig, {
        logger,
        signal: controller.signal,
        registry: createDefaultRegistry({ fetchImpl }),
      }),
    ).rejects.toThrow(new OperationCancelledError(new Error("Received SIGTERM")));
  });

  test("throws immediately for an already cancelled caller", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(initializeBackend(apiKeyConfig, { logger, signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
  });
});
