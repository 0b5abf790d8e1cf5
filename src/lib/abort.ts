import { OperationCancelledError } from "./errors.ts";

/** Throw OperationCancelledError when the caller's signal has fired. */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(signal.reason);
  }
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as the
 * signal aborts. Used where a collaborator may ignore the signal it was given.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Rethrow as OperationCancelledError when `err` came from caller
 * cancellation; otherwise return so the caller can handle `err` as a failure.
 */
export function rethrowIfCancelled(err: unknown, signal: AbortSignal | undefined): void {
  if (err instanceof OperationCancelledError) {
    throw err;
  }
  if (signal?.aborted) {
    throw new OperationCancelledError(signal.reason);
  }
}
