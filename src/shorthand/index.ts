import { ConfigError, describeValue } from "../errors.js";
import { expandToLonghands } from "./expand.js";
import { keepShorthands } from "./keep.js";
import { rejectShorthands } from "./reject.js";
import type { ShorthandOptions, ShorthandStrategy } from "./strategy.js";

export type { Expansion, ShorthandOptions, ShorthandStrategy } from "./strategy.js";
export { defineStrategy, expandConditionTree } from "./strategy.js";
export { expandToLonghands, keepShorthands, rejectShorthands };

export const BUILTIN_STRATEGIES = {
  "keep-shorthands": keepShorthands,
  "expand-to-longhands": expandToLonghands,
  "reject-shorthands": rejectShorthands,
} as const;

export type StrategyName = keyof typeof BUILTIN_STRATEGIES;

/** A strategy name, a strategy object, or either paired with options. */
export type ShorthandStrategySetting =
  | StrategyName
  | ShorthandStrategy
  | readonly [StrategyName | ShorthandStrategy, ShorthandOptions];

export interface ResolvedShorthandStrategy {
  strategy: ShorthandStrategy;
  options: ShorthandOptions;
}

function isStrategyName(value: unknown): value is StrategyName {
  return typeof value === "string" && Object.hasOwn(BUILTIN_STRATEGIES, value);
}

function isStrategy(value: unknown): value is ShorthandStrategy {
  return (
    typeof value === "object" &&
    value !== null &&
    "expand" in value &&
    typeof value.expand === "function" &&
    "expandConditions" in value &&
    typeof value.expandConditions === "function"
  );
}

function resolveOne(value: unknown): ShorthandStrategy {
  if (isStrategyName(value)) {
    return BUILTIN_STRATEGIES[value];
  }
  if (isStrategy(value)) {
    return value;
  }
  throw new ConfigError(
    [
      `Invalid shorthandStrategy: ${describeValue(value)}.`,
      `Expected one of ${Object.keys(BUILTIN_STRATEGIES).map((name) => `"${name}"`).join(", ")},`,
      "a strategy object with expand() and expandConditions(), or [strategy, options].",
    ].join("\n"),
  );
}

export function resolveShorthandStrategy(setting: unknown): ResolvedShorthandStrategy {
  if (Array.isArray(setting)) {
    const [strategy, options]: unknown[] = setting;
    if (setting.length !== 2 || typeof options !== "object" || options === null) {
      throw new ConfigError(
        `Invalid shorthandStrategy tuple: expected [strategy, options], received ${describeValue(setting)}`,
      );
    }
    return { strategy: resolveOne(strategy), options: readOptions(options) };
  }
  return { strategy: resolveOne(setting), options: {} };
}

function readOptions(options: object): ShorthandOptions {
  if (!("exclude" in options) || options.exclude === undefined) {
    return {};
  }
  const { exclude } = options;
  if (!Array.isArray(exclude) || exclude.some((item) => typeof item !== "string")) {
    throw new ConfigError("Invalid shorthandStrategy options: `exclude` must be a list of property names");
  }
  return { exclude: exclude.map(String) };
}
