/**
 * Federated identity authentication (OIDC from the workflow into Entra ID).
 *
 * The credential is restricted to the configured tenant and client id. A token
 * is requested while the client is created so a broken federation shows up as
 * an authentication failure at bootstrap.
 */

import {
  CredentialUnavailableError,
  DefaultAzureCredential,
  type AccessToken,
  type TokenCredential,
} from "@azure/identity";
import { throwIfCancelled } from "../../lib/abort.ts";
import { createBackendClient, type FetchLike } from "../client.ts";
import { BackendConfigurationError } from "../errors.ts";
import type { AuthenticationStrategy } from "./types.ts";

export const AI_FOUNDRY_SCOPE = "https://ai.azure.com/.default";

/** Refresh this long before the token's stated expiry. */
const TOKEN_REFRESH_MARGIN_MS = 5 * 60 * 1000;

export type CredentialFactory = (identity: { tenantId: string; clientId: string }) => TokenCredential;

export const defaultCredentialFactory: CredentialFactory = ({ tenantId, clientId }) =>
  new DefaultAzureCredential({
    tenantId,
    managedIdentityClientId: clientId,
    workloadIdentityClientId: clientId,
  });

export function createFederatedIdentityStrategy(
  deps: {
    credentialFactory?: CredentialFactory;
    fetchImpl?: FetchLike;
    now?: () => number;
  } = {},
): AuthenticationStrategy {
  const credentialFactory = deps.credentialFactory ?? defaultCredentialFactory;
  const now = deps.now ?? Date.now;

  return {
    name: "federated_identity",

    async createClient(config, signal) {
      throwIfCancelled(signal);

      const { credential } = config;
      if (credential.kind !== "federated_identity") {
        throw new BackendConfigurationError(
          "invalid_configuration",
          "Federated identity authentication needs a client id and a tenant id.",
        );
      }

      const tokenCredential = credentialFactory({
        tenantId: credential.tenantId,
        clientId: credential.clientId,
      });

      let cached: AccessToken | undefined;

      const acquire = async (abortSignal?: AbortSignal): Promise<AccessToken> => {
        if (cached && cached.expiresOnTimestamp - TOKEN_REFRESH_MARGIN_MS > now()) {
          return cached;
        }
        const token = await tokenCredential.getToken(AI_FOUNDRY_SCOPE, {
          abortSignal,
          tenantId: credential.tenantId,
        });
        if (!token) {
          throw new CredentialUnavailableError(
            `No access token was issued for ${AI_FOUNDRY_SCOPE}.`,
          );
        }
        cached = token;
        return token;
      };

      await acquire(signal);

      return createBackendClient({
        config,
        fetchImpl: deps.fetchImpl,
        now,
        authorizer: {
          method: "federated_identity",
          headers: async (requestSignal) => {
            const token = await acquire(requestSignal);
            return { authorization: `Bearer ${token.token}` };
          },
        },
      });
    },
  };
}
