/**
 * Backend error types and classification.
 *
 * Everything that can go wrong while connecting is reduced to a
 * ConnectionErrorCategory plus a message that tells the operator what to
 * change. Messages are built from templates; raw service text only appears in
 * the unknown case, and always after secret redaction.
 */

import { errorMessage } from "../lib/errors.ts";
import { redactSecrets } from "../lib/sanitizer.ts";
import type { ConnectionErrorCategory } from "./types.ts";

const MAX_ERROR_BODY_LENGTH = 500;

/** Configuration rejected before any network call. */
export class BackendConfigurationError extends Error {
  readonly category: "missing_configuration" | "invalid_configuration";

  constructor(category: "missing_configuration" | "invalid_configuration", message: string) {
    super(message);
    this.name = "BackendConfigurationError";
    this.category = category;
  }
}

/** Non-2xx response from the AI backend. */
export class BackendHttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Azure AI Foundry responded with HTTP ${status}`);
    this.name = "BackendHttpError";
    this.status = status;
    this.body = body.slice(0, MAX_ERROR_BODY_LENGTH);
  }
}

const IDENTITY_ERROR_NAMES = new Set([
  "AuthenticationError",
  "AggregateAuthenticationError",
  "AuthenticationRequiredError",
  "CredentialUnavailableError",
]);

const NETWORK_ERROR_CODES = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
  "CERT_HAS_EXPIRED",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
]);

const NETWORK_TIMEOUT_CODES = new Set(["ETIMEDOUT", "UND_ERR_CONNECT_TIMEOUT"]);

export interface ClassificationContext {
  /** The bootstrap's own timeout fired (as opposed to the caller cancelling). */
  timedOut: boolean;
  timeoutMs: number;
  apiVersion: string;
  modelDeploymentName: string;
  /** Values that must never appear in a message. */
  secrets: readonly string[];
}

export interface ClassifiedError {
  category: ConnectionErrorCategory;
  message: string;
}

/** First string `code` found on the error or along its `cause` chain. */
export function networkErrorCode(err: unknown, depth = 0): string | undefined {
  if (typeof err !== "object" || err === null || depth > 5) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err) return networkErrorCode(err.cause, depth + 1);
  return undefined;
}

function timeoutMessage(timeoutMs: number): string {
  return `Connection to Azure AI Foundry timed out after ${timeoutMs / 1000} seconds. Increase 'azure_foundry_connection_timeout_seconds' (AZURE_AI_FOUNDRY_CONNECTION_TIMEOUT_SECONDS) or check the runner's network access.`;
}

function classifyHttpError(err: BackendHttpError, ctx: ClassificationContext): ClassifiedError {
  switch (err.status) {
    case 401:
    case 403:
      return {
        category: "authentication_failure",
        message: `Azure AI Foundry rejected the credentials (HTTP ${err.status}). Verify the API key, or the federated identity's role assignment on the project.`,
      };
    case 404:
      return {
        category: "model_not_found",
        message: `Model deployment '${ctx.modelDeploymentName}' was not found in the Azure AI Foundry project (HTTP 404). Verify 'azure_foundry_model_deployment' (AZURE_AI_FOUNDRY_MODEL_DEPLOYMENT) and the project name in the endpoint.`,
      };
    case 429:
      return {
        category: "quota_exceeded",
        message:
          "Azure AI Foundry rate limit or quota exceeded (HTTP 429). Rerun the workflow later or raise the deployment quota.",
      };
    case 400:
      if (/api[-_ ]?version/i.test(err.body)) {
        return {
          category: "api_version_unsupported",
          message: `Azure AI Foundry does not support API version ${ctx.apiVersion}. Set 'azure_foundry_api_version' (AZURE_AI_FOUNDRY_API_VERSION) to a supported version.`,
        };
      }
      break;
  }

  return {
    category: "unknown_error",
    message: redactSecrets(
      `Unexpected response from Azure AI Foundry (HTTP ${err.status}): ${err.body.trim() || "no body"}`,
      ctx.secrets,
    ),
  };
}

export function classifyBackendError(err: unknown, ctx: ClassificationContext): ClassifiedError {
  if (ctx.timedOut) {
    return { category: "network_timeout", message: timeoutMessage(ctx.timeoutMs) };
  }

  if (err instanceof BackendConfigurationError) {
    return { category: err.category, message: redactSecrets(err.message, ctx.secrets) };
  }

  if (err instanceof BackendHttpError) {
    return classifyHttpError(err, ctx);
  }

  if (err instanceof Error && IDENTITY_ERROR_NAMES.has(err.name)) {
    return {
      category: "authentication_failure",
      message: redactSecrets(
        `Azure identity authentication failed: ${errorMessage(err)} Verify the client id, the tenant id and the federated credential of the app registration.`,
        ctx.secrets,
      ),
    };
  }

  const code = networkErrorCode(err);
  if (code && NETWORK_TIMEOUT_CODES.has(code)) {
    return { category: "network_timeout", message: timeoutMessage(ctx.timeoutMs) };
  }
  if ((code && NETWORK_ERROR_CODES.has(code)) || (err instanceof TypeError && err.message === "fetch failed")) {
    return {
      category: "network_error",
      message: `Could not reach Azure AI Foundry${code ? ` (${code})` : ""}. Check the endpoint host name and the runner's network access.`,
    };
  }

  return {
    category: "unknown_error",
    message: redactSecrets(
      `Unexpected error while connecting to Azure AI Foundry: ${errorMessage(err)}`,
      ctx.secrets,
    ),
  };
}
