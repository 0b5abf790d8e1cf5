import { describe, test, expect } from "vitest";
import { readActionInput } from "./action-input.ts";

describe("readActionInput", () => {
  test("prefers the action input over the environment variable", () => {
    const env = { "INPUT_GITHUB-TOKEN": "input-token", GITHUB_TOKEN: "env-token" };

    expect(readActionInput(env, "github-token", "GITHUB_TOKEN")).toEqual({
      value: "input-token",
      source: "action_input",
    });
  });

  test("accepts the underscore spelling of a hyphenated input", () => {
    expect(readActionInput({ INPUT_GITHUB_TOKEN: "t" }, "github-token")).toEqual({
      value: "t",
      source: "action_input",
    });
  });

  test("accepts the hyphen spelling of an underscored input", () => {
    expect(
      readActionInput({ "INPUT_AZURE-FOUNDRY-ENDPOINT": "e" }, "azure_foundry_endpoint"),
    ).toEqual({ value: "e", source: "action_input" });
  });

  test("falls back to the environment variable", () => {
    expect(readActionInput({ GITHUB_TOKEN: " env-token " }, "github-token", "GITHUB_TOKEN")).toEqual({
      value: "env-token",
      source: "environment",
    });
  });

  test("treats blank values as absent", () => {
    expect(readActionInput({ "INPUT_GITHUB-TOKEN": "  ", GITHUB_TOKEN: "" }, "github-token", "GITHUB_TOKEN")).toBeUndefined();
  });
});
