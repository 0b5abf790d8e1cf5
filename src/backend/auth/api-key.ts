import { throwIfCancelled } from "../../lib/abort.ts";
import { createBackendClient, type FetchLike } from "../client.ts";
import { BackendConfigurationError } from "../errors.ts";
import type { AuthenticationStrategy } from "./types.ts";

/** Sends the project key in the `api-key` header. */
export function createApiKeyStrategy(deps: { fetchImpl?: FetchLike } = {}): AuthenticationStrategy {
  return {
    name: "api_key",

    async createClient(config, signal) {
      throwIfCancelled(signal);

      const { credential } = config;
      if (credential.kind !== "api_key") {
        throw new BackendConfigurationError(
          "invalid_configuration",
          "API key authentication needs an API key credential.",
        );
      }

      return createBackendClient({
        config,
        fetchImpl: deps.fetchImpl,
        authorizer: {
          method: "api_key",
          headers: async () => ({ "api-key": credential.apiKey }),
        },
      });
    },
  };
}
