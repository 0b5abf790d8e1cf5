/**
 * AI backend connection bootstrap.
 *
 * validating -> authenticating -> readiness_check, bounded by the configured
 * connection timeout and never retried. Every outcome other than caller
 * cancellation comes back as a ConnectionResult.
 */

import type { Logger } from "pino";
import { raceAbort, throwIfCancelled } from "../lib/abort.ts";
import { OperationCancelledError } from "../lib/errors.ts";
import { createDefaultRegistry, selectAuthenticationStrategy } from "./auth/registry.ts";
import type { AuthenticationRegistry } from "./auth/types.ts";
import { maskEndpoint, validateBackendConfiguration } from "./configuration.ts";
import {
  BackendConfigurationError,
  classifyBackendError,
  type ClassifiedError,
} from "./errors.ts";
import type {
  BackendConfiguration,
  ConnectionResult,
  ConnectionStage,
  ValidatedBackendConfiguration,
} from "./types.ts";

export interface BootstrapOptions {
  logger: Logger;
  /** Caller cancellation; aborting it throws OperationCancelledError. */
  signal?: AbortSignal;
  registry?: AuthenticationRegistry;
  now?: () => number;
}

export async function initializeBackend(
  config: BackendConfiguration | ValidatedBackendConfiguration,
  opts: BootstrapOptions,
): Promise<ConnectionResult> {
  const now = opts.now ?? Date.now;
  const logger = opts.logger.child({ component: "backend-bootstrap" });
  const startedAt = now();
  const attempt = {
    attemptedEndpoint: maskEndpoint(config.endpoint),
    attemptedAt: new Date(startedAt),
  };

  throwIfCancelled(opts.signal);

  const fail = (classified: ClassifiedError, stage: ConnectionStage): ConnectionResult => {
    const durationMs = now() - startedAt;
    logger.warn(
      {
        stage,
        errorCategory: classified.category,
        endpoint: attempt.attemptedEndpoint,
        durationMs,
      },
      "AI backend connection failed",
    );
    return {
      ...attempt,
      success: false,
      errorMessage: classified.message,
      errorCategory: classified.category,
      stage,
      durationMs,
    };
  };

  let validated: ValidatedBackendConfiguration;
  try {
    validated = validateBackendConfiguration(config, new Date(startedAt));
  } catch (err) {
    if (err instanceof BackendConfigurationError) {
      return fail({ category: err.category, message: err.message }, "validating");
    }
    throw err;
  }

  const registry = opts.registry ?? createDefaultRegistry();
  const secrets = validated.credential.kind === "api_key" ? [validated.credential.apiKey] : [];

  logger.info(
    {
      endpoint: attempt.attemptedEndpoint,
      authMethod: validated.credential.kind,
      deployment: validated.modelDeploymentName,
      apiVersion: validated.apiVersion,
      timeoutMs: validated.connectionTimeoutMs,
    },
    "Connecting to AI backend",
  );

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`Connection timed out after ${validated.connectionTimeoutMs}ms`));
  }, validated.connectionTimeoutMs);
  const onCallerAbort = () => controller.abort(opts.signal?.reason);
  opts.signal?.addEventListener("abort", onCallerAbort, { once: true });

  let stage: ConnectionStage = "authenticating";
  try {
    const strategy = selectAuthenticationStrategy(validated, registry);
    const client = await raceAbort(
      strategy.createClient(validated, controller.signal),
      controller.signal,
    );

    stage = "readiness_check";
    await raceAbort(client.probe(controller.signal), controller.signal);

    const durationMs = now() - startedAt;
    logger.info(
      { authMethod: client.authMethod, deployment: client.deployment, durationMs },
      "AI backend connected",
    );
    return { ...attempt, success: true, client, durationMs };
  } catch (err) {
    if (opts.signal?.aborted) {
      throw new OperationCancelledError(opts.signal.reason);
    }
    return fail(
      classifyBackendError(err, {
        timedOut,
        timeoutMs: validated.connectionTimeoutMs,
        apiVersion: validated.apiVersion,
        modelDeploymentName: validated.modelDeploymentName,
        secrets,
      }),
      stage,
    );
  } finally {
    clearTimeout(timeoutId);
    opts.signal?.removeEventListener("abort", onCallerAbort);
  }
}
