/**
 * AI backend configuration: validation, defaults and the boundary loader.
 */

import { readActionInput, type Env, type ValueSource } from "../lib/action-input.ts";
import { BackendConfigurationError } from "./errors.ts";
import type {
  BackendConfiguration,
  BackendCredential,
  ValidatedBackendConfiguration,
} from "./types.ts";

export const DEFAULT_MODEL_DEPLOYMENT = "gpt-5-mini";
export const DEFAULT_API_VERSION = "2025-04-01-preview";
export const DEFAULT_CONNECTION_TIMEOUT_MS = 30_000;
export const MAX_CONNECTION_TIMEOUT_MS = 5 * 60 * 1000;
export const MIN_API_KEY_LENGTH = 32;

const ENDPOINT_PATTERN = /^https:\/\/[^/\s]+\/api\/projects\/[^/\s]+$/i;
const DEPLOYMENT_PATTERN = /^[A-Za-z0-9-]{1,64}$/;
const API_VERSION_PATTERN = /^(\d{4}-\d{2}-\d{2})(-preview)?$/;

/** Action input and environment variable behind each setting. */
export const BACKEND_SETTINGS = {
  endpoint: { input: "azure_foundry_endpoint", env: "AZURE_AI_FOUNDRY_ENDPOINT" },
  apiKey: { input: "azure_foundry_api_key", env: "AZURE_AI_FOUNDRY_API_KEY" },
  clientId: { input: "azure_foundry_client_id", env: "AZURE_AI_FOUNDRY_CLIENT_ID" },
  tenantId: { input: "azure_foundry_tenant_id", env: "AZURE_AI_FOUNDRY_TENANT_ID" },
  modelDeploymentName: {
    input: "azure_foundry_model_deployment",
    env: "AZURE_AI_FOUNDRY_MODEL_DEPLOYMENT",
  },
  apiVersion: { input: "azure_foundry_api_version", env: "AZURE_AI_FOUNDRY_API_VERSION" },
  connectionTimeoutMs: {
    input: "azure_foundry_connection_timeout_seconds",
    env: "AZURE_AI_FOUNDRY_CONNECTION_TIMEOUT_SECONDS",
  },
} as const satisfies Record<keyof BackendConfiguration, { input: string; env: string }>;

type Setting = keyof typeof BACKEND_SETTINGS;

function where(setting: Setting): string {
  const { input, env } = BACKEND_SETTINGS[setting];
  return `'${input}' input or the ${env} environment variable`;
}

/** `...` plus the last 20 characters, so logs identify the project without echoing the URL. */
export function maskEndpoint(endpoint: string | undefined): string {
  const trimmed = endpoint?.trim() ?? "";
  if (!trimmed) return "<empty>";
  return trimmed.length > 20 ? `...${trimmed.slice(-20)}` : trimmed;
}

function missing(message: string): BackendConfigurationError {
  return new BackendConfigurationError("missing_configuration", message);
}

function invalid(message: string): BackendConfigurationError {
  return new BackendConfigurationError("invalid_configuration", message);
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function toRaw(config: BackendConfiguration | ValidatedBackendConfiguration): BackendConfiguration {
  if (!("credential" in config)) {
    return config;
  }

  const { credential, ...rest } = config;
  return credential.kind === "api_key"
    ? { ...rest, apiKey: credential.apiKey }
    : { ...rest, clientId: credential.clientId, tenantId: credential.tenantId };
}

function validateCredential(raw: BackendConfiguration): BackendCredential {
  const apiKey = blankToUndefined(raw.apiKey);
  const clientId = blankToUndefined(raw.clientId);
  const tenantId = blankToUndefined(raw.tenantId);

  if (apiKey) {
    if (apiKey.length < MIN_API_KEY_LENGTH) {
      throw invalid(
        `Azure AI Foundry API key must be at least ${MIN_API_KEY_LENGTH} characters. Copy the key from the project's 'Keys and Endpoint' page into the ${where("apiKey")}.`,
      );
    }
    return { kind: "api_key", apiKey };
  }

  if (clientId && tenantId) {
    return { kind: "federated_identity", clientId, tenantId };
  }

  if (clientId) {
    throw missing(`Azure AI Foundry tenant id is required with a client id. Provide the ${where("tenantId")}.`);
  }
  if (tenantId) {
    throw missing(`Azure AI Foundry client id is required with a tenant id. Provide the ${where("clientId")}.`);
  }

  throw missing(
    `Azure AI Foundry credentials are required. Provide the ${where("apiKey")}, or both the ${where("clientId")} and the ${where("tenantId")}.`,
  );
}

function validateApiVersion(value: string | undefined, now: Date): string {
  const apiVersion = blankToUndefined(value);
  if (!apiVersion) return DEFAULT_API_VERSION;

  const match = API_VERSION_PATTERN.exec(apiVersion);
  const datePart = match?.[1];
  if (!datePart) {
    throw invalid(
      `Azure AI Foundry API version must look like YYYY-MM-DD or YYYY-MM-DD-preview (for example ${DEFAULT_API_VERSION}). Received: ${apiVersion}`,
    );
  }

  const parsed = new Date(`${datePart}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== datePart) {
    throw invalid(`Azure AI Foundry API version is not a valid date. Received: ${apiVersion}`);
  }

  if (datePart > now.toISOString().slice(0, 10)) {
    throw invalid(`Azure AI Foundry API version date cannot be in the future. Received: ${apiVersion}`);
  }

  return apiVersion;
}

function validateTimeout(value: number | undefined): number {
  if (value === undefined) return DEFAULT_CONNECTION_TIMEOUT_MS;

  if (!Number.isFinite(value) || value <= 0) {
    throw invalid(
      `Connection timeout must be greater than 0 seconds. Set the ${where("connectionTimeoutMs")}.`,
    );
  }
  if (value > MAX_CONNECTION_TIMEOUT_MS) {
    throw invalid(
      `Connection timeout must not exceed 5 minutes. Received: ${value / 1000} seconds`,
    );
  }
  return value;
}

/**
 * Validate raw settings and apply defaults. Accepts an already validated
 * configuration too, in which case the result is equal to the input.
 *
 * @throws BackendConfigurationError carrying `missing_configuration` or `invalid_configuration`
 */
export function validateBackendConfiguration(
  config: BackendConfiguration | ValidatedBackendConfiguration,
  now: Date = new Date(),
): ValidatedBackendConfiguration {
  const raw = toRaw(config);

  const endpoint = blankToUndefined(raw.endpoint);
  if (!endpoint) {
    throw missing(`Azure AI Foundry endpoint is required. Provide the ${where("endpoint")}.`);
  }
  if (!ENDPOINT_PATTERN.test(endpoint)) {
    throw invalid(
      `Azure AI Foundry endpoint must be an HTTPS URL of the form https://<host>/api/projects/<project>. Received: ${maskEndpoint(endpoint)}`,
    );
  }

  const credential = validateCredential(raw);

  const modelDeploymentName = blankToUndefined(raw.modelDeploymentName) ?? DEFAULT_MODEL_DEPLOYMENT;
  if (!DEPLOYMENT_PATTERN.test(modelDeploymentName)) {
    throw invalid(
      `Model deployment name must be 1 to 64 letters, digits or hyphens. Received: ${modelDeploymentName.slice(0, 80)}`,
    );
  }

  return {
    endpoint,
    credential,
    modelDeploymentName,
    apiVersion: validateApiVersion(raw.apiVersion, now),
    connectionTimeoutMs: validateTimeout(raw.connectionTimeoutMs),
  };
}

export interface LoadedBackendConfiguration {
  config: BackendConfiguration;
  sources: Partial<Record<Setting, ValueSource>>;
}

/**
 * Read backend settings from action inputs and environment. Returns undefined
 * when no endpoint is supplied: the backend is then not configured at all.
 */
export function loadBackendConfiguration(env: Env): LoadedBackendConfiguration | undefined {
  const sources: Partial<Record<Setting, ValueSource>> = {};

  const read = (setting: Setting): string | undefined => {
    const { input, env: envName } = BACKEND_SETTINGS[setting];
    const found = readActionInput(env, input, envName);
    if (found) {
      sources[setting] = found.source;
    }
    return found?.value;
  };

  const endpoint = read("endpoint");
  if (!endpoint) {
    return undefined;
  }

  const modelDeploymentName = read("modelDeploymentName");
  const apiVersion = read("apiVersion");
  const timeoutSeconds = read("connectionTimeoutMs");

  sources.modelDeploymentName ??= "default";
  sources.apiVersion ??= "default";
  sources.connectionTimeoutMs ??= "default";

  return {
    config: {
      endpoint,
      apiKey: read("apiKey"),
      clientId: read("clientId"),
      tenantId: read("tenantId"),
      modelDeploymentName,
      apiVersion,
      connectionTimeoutMs: timeoutSeconds === undefined ? undefined : Number(timeoutSeconds) * 1000,
    },
    sources,
  };
}
