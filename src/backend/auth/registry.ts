import type { FetchLike } from "../client.ts";
import type { ValidatedBackendConfiguration } from "../types.ts";
import { createApiKeyStrategy } from "./api-key.ts";
import { createFederatedIdentityStrategy, type CredentialFactory } from "./federated-identity.ts";
import type { AuthenticationRegistry, AuthenticationStrategy } from "./types.ts";

export function createDefaultRegistry(
  deps: { fetchImpl?: FetchLike; credentialFactory?: CredentialFactory } = {},
): AuthenticationRegistry {
  return {
    api_key: createApiKeyStrategy({ fetchImpl: deps.fetchImpl }),
    federated_identity: createFederatedIdentityStrategy({
      fetchImpl: deps.fetchImpl,
      credentialFactory: deps.credentialFactory,
    }),
  };
}

/** The one place a credential kind is mapped to a strategy. */
export function selectAuthenticationStrategy(
  config: ValidatedBackendConfiguration,
  registry: AuthenticationRegistry,
): AuthenticationStrategy {
  return registry[config.credential.kind];
}
