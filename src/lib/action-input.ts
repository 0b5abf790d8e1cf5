/**
 * Action input lookup.
 *
 * The runner exposes `with:` inputs as `INPUT_<NAME>` variables, upper-cased
 * with the name otherwise unchanged, so `github-token` arrives as
 * `INPUT_GITHUB-TOKEN`. Both hyphen and underscore spellings are checked, and
 * an input always wins over the plain environment variable.
 */

export type ValueSource = "action_input" | "environment" | "default";

export type Env = Readonly<Record<string, string | undefined>>;

export interface SourcedValue {
  value: string;
  source: ValueSource;
}

function inputKeys(inputName: string): string[] {
  const upper = inputName.toUpperCase();
  const keys = [
    `INPUT_${upper}`,
    `INPUT_${upper.replace(/-/g, "_")}`,
    `INPUT_${upper.replace(/_/g, "-")}`,
  ];
  return [...new Set(keys)];
}

export function readActionInput(
  env: Env,
  inputName: string,
  envName?: string,
): SourcedValue | undefined {
  for (const key of inputKeys(inputName)) {
    const value = env[key]?.trim();
    if (value) {
      return { value, source: "action_input" };
    }
  }

  if (envName) {
    const value = env[envName]?.trim();
    if (value) {
      return { value, source: "environment" };
    }
  }

  return undefined;
}
