import { afterEach, describe, test, expect, vi } from "vitest";
import { createLogger, createRunLogger } from "./logger.ts";

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test("uses the level it is given, not LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "debug");

    expect(createLogger("warn").level).toBe("warn");
  });

  test("run loggers carry the run context", () => {
    const logger = createRunLogger(createLogger("silent"), { runId: "run-1", issueNumber: 7 });

    expect(logger.bindings()).toMatchObject({ runId: "run-1", issueNumber: 7 });
  });
});
