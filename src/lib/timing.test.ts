import { describe, test, expect } from "vitest";
import pino from "pino";
import { startMeasurement } from "./timing.ts";

describe("startMeasurement", () => {
  test("returns the elapsed time and freezes it on the first stop", () => {
    const ticks = [1_000, 1_250, 9_999];
    const measurement = startMeasurement(pino({ level: "silent" }), "startupDurationMs", () => ticks.shift() ?? 0);

    expect(measurement.stop()).toBe(250);
    expect(measurement.stop()).toBe(250);
  });
});
