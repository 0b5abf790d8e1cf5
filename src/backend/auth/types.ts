import type {
  AuthMethod,
  BackendClient,
  BackendCredential,
  ValidatedBackendConfiguration,
} from "../types.ts";

export interface AuthenticationStrategy {
  readonly name: AuthMethod;
  /**
   * Build a client for the project. Credential problems must surface here,
   * during bootstrap, rather than on the first completion call.
   */
  createClient(config: ValidatedBackendConfiguration, signal: AbortSignal): Promise<BackendClient>;
}

export type AuthenticationRegistry = Readonly<
  Record<BackendCredential["kind"], AuthenticationStrategy>
>;
