import { ConfigError, describeValue } from "./errors.js";
import type { PropertyNoticeLevel, UnknownPropertyLevel } from "./property-validation.js";
import {
  resolveShorthandStrategy,
  type ShorthandOptions,
  type ShorthandStrategy,
  type ShorthandStrategySetting,
} from "./shorthand/index.js";

/**
 * Build configuration. Every compilation resolves one frozen config up front;
 * nothing reads settings from anywhere else afterwards.
 */

export interface AtomCssConfig {
  /** Prefix of every generated class and variable name. Default `"x"`. */
  classNamePrefix?: string;
  /** Shorthand handling. Default `"keep-shorthands"`. */
  shorthandStrategy?: ShorthandStrategySetting;
  /** Emit vendor-prefixed declarations from the fixed prefix table. */
  autoprefixer?: boolean;
  /** Group atomic rules into `@layer priorityN` blocks. */
  useCssLayers?: boolean;
  /** Readable class names (`color-x1abc`) for development builds. */
  debugClassNames?: boolean;
  /** Convert `font-size` pixel values to `rem`. */
  fontSizePxToRem?: boolean;
  fontSizeRootPx?: number;
  /** Check declared property names. Default `true`. */
  validateProperties?: boolean;
  /** Default `"warn"`. */
  unknownPropertyLevel?: UnknownPropertyLevel;
  /** Prefixed properties the prefix table covers, checked with `autoprefixer` on. Default `"warn"`. */
  vendorPrefixLevel?: PropertyNoticeLevel;
  deprecatedPropertyLevel?: PropertyNoticeLevel;
}

export interface ResolvedConfig {
  readonly classNamePrefix: string;
  readonly shorthandStrategy: ShorthandStrategy;
  readonly shorthandOptions: ShorthandOptions;
  readonly autoprefixer: boolean;
  readonly useCssLayers: boolean;
  readonly debugClassNames: boolean;
  readonly fontSizePxToRem: boolean;
  readonly fontSizeRootPx: number;
  readonly validateProperties: boolean;
  readonly unknownPropertyLevel: UnknownPropertyLevel;
  readonly vendorPrefixLevel: PropertyNoticeLevel;
  readonly deprecatedPropertyLevel: PropertyNoticeLevel;
}

const PREFIX_PATTERN = /^[a-z][a-z0-9-]*$/i;
const UNKNOWN_LEVELS = ["error", "warn", "ignore"] as const;
const NOTICE_LEVELS = ["warn", "ignore"] as const;

/** Identity helper for typed config files. */
export function defineConfig(config: AtomCssConfig): AtomCssConfig {
  return config;
}

function readBoolean(config: AtomCssConfig, key: keyof AtomCssConfig, fallback: boolean): boolean {
  const value: unknown = config[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid \`${key}\`: expected a boolean, received ${describeValue(value)}`);
  }
  return value;
}

function readLevel<L extends string>(
  config: AtomCssConfig,
  key: keyof AtomCssConfig,
  levels: readonly L[],
  fallback: L,
): L {
  const value: unknown = config[key];
  if (value === undefined) {
    return fallback;
  }
  const level = levels.find((candidate) => candidate === value);
  if (level === undefined) {
    throw new ConfigError(
      `Invalid \`${key}\`: expected one of ${levels.map((name) => `"${name}"`).join(", ")}, received ${describeValue(value)}`,
    );
  }
  return level;
}

export function resolveConfig(config: AtomCssConfig = {}): ResolvedConfig {
  const prefix: unknown = config.classNamePrefix ?? "x";
  if (typeof prefix !== "string" || !PREFIX_PATTERN.test(prefix)) {
    throw new ConfigError(
      [
        `Invalid \`classNamePrefix\`: ${describeValue(prefix)}.`,
        "The prefix must start with a letter and contain only letters, digits and hyphens.",
      ].join("\n"),
    );
  }

  const rootPx: unknown = config.fontSizeRootPx ?? 16;
  if (typeof rootPx !== "number" || !Number.isFinite(rootPx) || rootPx <= 0) {
    throw new ConfigError(
      `Invalid \`fontSizeRootPx\`: expected a positive number, received ${describeValue(rootPx)}`,
    );
  }

  const { strategy, options } = resolveShorthandStrategy(
    config.shorthandStrategy ?? "keep-shorthands",
  );

  return Object.freeze({
    classNamePrefix: prefix,
    shorthandStrategy: strategy,
    shorthandOptions: options,
    autoprefixer: readBoolean(config, "autoprefixer", false),
    useCssLayers: readBoolean(config, "useCssLayers", false),
    debugClassNames: readBoolean(config, "debugClassNames", false),
    fontSizePxToRem: readBoolean(config, "fontSizePxToRem", false),
    fontSizeRootPx: rootPx,
    validateProperties: readBoolean(config, "validateProperties", true),
    unknownPropertyLevel: readLevel(config, "unknownPropertyLevel", UNKNOWN_LEVELS, "warn"),
    vendorPrefixLevel: readLevel(config, "vendorPrefixLevel", NOTICE_LEVELS, "warn"),
    deprecatedPropertyLevel: readLevel(config, "deprecatedPropertyLevel", NOTICE_LEVELS, "warn"),
  });
}
