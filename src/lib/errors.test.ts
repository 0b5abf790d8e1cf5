import { describe, test, expect } from "vitest";
import {
  EXIT_CODES,
  MissingTokenError,
  OperationCancelledError,
  errorMessage,
  requireNonBlank,
} from "./errors.ts";
import { raceAbort, rethrowIfCancelled, throwIfCancelled } from "./abort.ts";

// --- errorMessage ---

describe("errorMessage", () => {
  test("uses the message of an Error", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  test("stringifies non-Error values", () => {
    expect(errorMessage(42)).toBe("42");
  });

  test("falls back when the message is blank", () => {
    expect(errorMessage(new Error("   "))).toBe("No additional details.");
  });

  test("redacts GitHub tokens", () => {
    expect(errorMessage(new Error(`bad credentials ghp_${"z".repeat(36)}`))).toBe(
      "bad credentials [REDACTED_GITHUB_TOKEN]",
    );
  });
});

// --- requireNonBlank ---

describe("requireNonBlank", () => {
  test("returns the trimmed value", () => {
    expect(requireNonBlank("  run-1 ", "runId")).toBe("run-1");
  });

  test("throws TypeError naming the argument", () => {
    expect(() => requireNonBlank(" ", "runId")).toThrow(new TypeError("runId must be provided."));
    expect(() => requireNonBlank(undefined, "Issue id")).toThrow("Issue id must be provided.");
  });
});

// --- error classes ---

describe("error classes", () => {
  test("MissingTokenError carries operator guidance", () => {
    expect(new MissingTokenError().message).toBe(
      "Workflow must provide github-token input (uses: github.token).",
    );
  });

  test("OperationCancelledError includes the abort reason", () => {
    expect(new OperationCancelledError().message).toBe("Operation cancelled");
    expect(new OperationCancelledError(new Error("Received SIGINT")).message).toBe(
      "Operation cancelled: Received SIGINT",
    );
  });

  test("exit codes", () => {
    expect(EXIT_CODES).toEqual({ success: 0, failure: 1, cancelled: 130 });
  });
});

// --- abort helpers ---

describe("abort helpers", () => {
  test("throwIfCancelled throws only once the signal fired", () => {
    const controller = new AbortController();
    expect(() => throwIfCancelled(controller.signal)).not.toThrow();
    expect(() => throwIfCancelled(undefined)).not.toThrow();

    controller.abort();
    expect(() => throwIfCancelled(controller.signal)).toThrow(OperationCancelledError);
  });

  test("raceAbort rejects with the signal reason when aborted first", async () => {
    const controller = new AbortController();
    const pending = new Promise<string>(() => {});
    const raced = raceAbort(pending, controller.signal);

    const reason = new Error("stop");
    controller.abort(reason);

    await expect(raced).rejects.toBe(reason);
  });

  test("raceAbort settles with the promise when it wins", async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve("done"), controller.signal)).resolves.toBe("done");
  });

  test("rethrowIfCancelled converts errors raised after the caller aborted", () => {
    const controller = new AbortController();
    controller.abort(new Error("Received SIGTERM"));

    expect(() => rethrowIfCancelled(new Error("socket closed"), controller.signal)).toThrow(
      new OperationCancelledError(new Error("Received SIGTERM")),
    );
  });

  test("rethrowIfCancelled passes cancellation errors through unchanged", () => {
    const cancelled = new OperationCancelledError();

    expect(() => rethrowIfCancelled(cancelled, undefined)).toThrow(cancelled);
  });

  test("rethrowIfCancelled returns for ordinary failures", () => {
    const controller = new AbortController();

    expect(rethrowIfCancelled(new Error("HTTP 500"), controller.signal)).toBeUndefined();
    expect(rethrowIfCancelled(new Error("HTTP 500"), undefined)).toBeUndefined();
  });
});
