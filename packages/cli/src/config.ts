import { StaticTypeCompanion } from "@sift/core";
import { ErrInvalidSetting } from "./errors.js";

export type OutputFormat = "text" | "json";

export interface SiftConfig {
  /** Colour rendered errors and printer output */
  readonly color: boolean;
  /** Default format for `translate` and `tokens` */
  readonly output: OutputFormat;
  /** Include stack traces in rendered errors */
  readonly debug: boolean;
}

export type Env = Readonly<Record<string, string | undefined>>;

function envFlag(env: Env, name: string): boolean | undefined {
  const value = env[name];
  if (value === undefined) return undefined;
  switch (value.toLowerCase()) {
    case "1":
    case "true":
      return true;
    case "0":
    case "false":
    case "":
      return false;
    default:
      throw ErrInvalidSetting.create({ name, value, expected: "1, true, 0 or false" });
  }
}

function envOutput(env: Env): OutputFormat | undefined {
  const value = env.SIFT_OUTPUT;
  if (value === undefined) return undefined;
  if (value === "text" || value === "json") return value;
  throw ErrInvalidSetting.create({ name: "SIFT_OUTPUT", value, expected: "text or json" });
}

export const SiftConfig = StaticTypeCompanion({
  /**
   * Explicit overrides win, then the environment, then defaults.
   * Colour defaults to on for a terminal unless NO_COLOR is set.
   */
  build(overrides: Partial<SiftConfig> = {}, env: Env = process.env, isTTY: boolean = false): SiftConfig {
    const color = overrides.color
      ?? envFlag(env, "SIFT_COLOR")
      ?? (env.NO_COLOR === undefined && isTTY);

    const output = overrides.output ?? envOutput(env) ?? "text";

    const debug = overrides.debug ?? envFlag(env, "SIFT_DEBUG") ?? false;

    return { color, output, debug };
  },
});
