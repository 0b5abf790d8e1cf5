/** How the action authenticates against the AI backend. */
export type AuthMethod = "api_key" | "federated_identity";

export type ConnectionErrorCategory =
  | "missing_configuration"
  | "invalid_configuration"
  | "authentication_failure"
  | "network_timeout"
  | "network_error"
  | "model_not_found"
  | "quota_exceeded"
  | "api_version_unsupported"
  | "unknown_error";

/** Bootstrap stages, in the order they run. */
export type ConnectionStage = "validating" | "authenticating" | "readiness_check";

/** Raw, unvalidated backend settings as read from inputs and environment. */
export interface BackendConfiguration {
  endpoint?: string;
  apiKey?: string;
  clientId?: string;
  tenantId?: string;
  modelDeploymentName?: string;
  apiVersion?: string;
  connectionTimeoutMs?: number;
}

export type BackendCredential =
  | { readonly kind: "api_key"; readonly apiKey: string }
  | { readonly kind: "federated_identity"; readonly clientId: string; readonly tenantId: string };

export interface ValidatedBackendConfiguration {
  readonly endpoint: string;
  readonly credential: BackendCredential;
  readonly modelDeploymentName: string;
  readonly apiVersion: string;
  readonly connectionTimeoutMs: number;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface CompletionResult {
  text: string;
  usage: { inputTokens: number; outputTokens: number };
  durationMs: number;
}

/** Opaque handle to a connected AI project. */
export interface BackendClient {
  readonly authMethod: AuthMethod;
  readonly deployment: string;
  /** Read-only readiness call; creates nothing on the service. */
  probe(signal?: AbortSignal): Promise<void>;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

interface ConnectionAttempt {
  /** Truncated endpoint: `...` plus the last 20 characters, or `<empty>`. */
  attemptedEndpoint: string;
  attemptedAt: Date;
  durationMs: number;
}

export type ConnectionResult =
  | (ConnectionAttempt & { success: true; client: BackendClient })
  | (ConnectionAttempt & {
      success: false;
      errorMessage: string;
      errorCategory: ConnectionErrorCategory;
      stage: ConnectionStage;
    });
