import { describe, test, expect } from "vitest";
import { REDACTED_VALUE, createRedactor, redactPayload } from "./redaction.ts";

describe("redactPayload", () => {
  test("redacts sensitive keys regardless of case", () => {
    const result = redactPayload({
      Authorization: "Bearer test-secret",
      GITHUB_TOKEN: "test-token",
      Azure_Foundry_Api_Key: "test-api-key",
      repository: "octo/widgets",
    });

    expect(result).toEqual({
      Authorization: REDACTED_VALUE,
      GITHUB_TOKEN: REDACTED_VALUE,
      Azure_Foundry_Api_Key: REDACTED_VALUE,
      repository: "octo/widgets",
    });
  });

  test("leaves the input map untouched", () => {
    const input = { token: "test-token", runId: "42" };
    const result = redactPayload(input);

    expect(input).toEqual({ token: "test-token", runId: "42" });
    expect(result).not.toBe(input);
    expect(result.token).toBe("[REDACTED]");
  });

  test("accepts a custom key set", () => {
    const result = redactPayload({ password: "test-secret", token: "kept" }, ["PASSWORD"]);

    expect(result).toEqual({ password: REDACTED_VALUE, token: "kept" });
  });

  test("returns an empty map for an empty payload", () => {
    expect(redactPayload({})).toEqual({});
  });
});

describe("createRedactor", () => {
  test("is reusable across payloads", () => {
    const redact = createRedactor(["secret"]);

    expect(redact({ secret: "a" })).toEqual({ secret: REDACTED_VALUE });
    expect(redact({ Secret: "b", other: 1 })).toEqual({ Secret: REDACTED_VALUE, other: 1 });
  });
});
