import { loadStringSet } from "../data.js";
import { CompileError, describeValue } from "../errors.js";

/**
 * Normalization of declared values into the minified text used both for
 * hashing and for the emitted CSS.
 */

export interface ValueOptions {
  fontSizePxToRem?: boolean;
  fontSizeRootPx?: number;
}

const UNITS_TABLE = "property-units.json";

let unitless: ReadonlySet<string> | null = null;
let timeProperties: ReadonlySet<string> | null = null;

export function isUnitless(property: string): boolean {
  if (property.startsWith("--")) {
    return true;
  }
  unitless ??= loadStringSet(UNITS_TABLE, "unitless");
  return unitless.has(property);
}

export function isTimeProperty(property: string): boolean {
  timeProperties ??= loadStringSet(UNITS_TABLE, "time");
  return timeProperties.has(property);
}

export function unitSuffix(property: string): string {
  if (isUnitless(property)) {
    return "";
  }
  return isTimeProperty(property) ? "ms" : "px";
}

// ────────────────────────────────────────────────────────────────────────────
// Strings
// ────────────────────────────────────────────────────────────────────────────

const LENGTH_UNITS =
  "px|em|rem|vh|vw|vmin|vmax|ch|ex|cm|mm|in|pt|pc|dvh|dvw|lvh|lvw|svh|svw";

const WHITESPACE_AROUND_COMMA = /\s*,\s*/g;
const MULTIPLE_SPACES = /\s{2,}/g;
const SPACE_BEFORE_IMPORTANT = /\s+!important/g;
const SPACE_AFTER_OPEN_PAREN = /\(\s+/g;
const SPACE_BEFORE_CLOSE_PAREN = /\s+\)/g;
const MS_TIMING = /(\d+(?:\.\d+)?)ms\b/g;
const LEADING_ZERO = /(?<![0-9])0\.(\d+)/g;
const ZERO_ANGLE = /\b0(deg|grad|turn|rad)\b/g;
const ZERO_TIME = /\b0(ms|s)\b/g;
const ZERO_LENGTH = new RegExp(`\\b0(${LENGTH_UNITS})\\b`, "g");
const ZERO_LENGTH_AT_BOUNDARY = new RegExp(`\\b0(${LENGTH_UNITS})(?=\\s*[;,})]|$)`, "g");

export function normalizeValue(value: string): string {
  let out = value
    .trim()
    .replace(WHITESPACE_AROUND_COMMA, ",")
    .replace(MULTIPLE_SPACES, " ")
    .replace(SPACE_AFTER_OPEN_PAREN, "(")
    .replace(SPACE_BEFORE_CLOSE_PAREN, ")")
    .replace(SPACE_BEFORE_IMPORTANT, "!important");

  out = out.replace(MS_TIMING, (whole, num: string) => {
    const ms = Number(num);
    return ms >= 10 ? `${formatNumber(ms / 1000)}s` : whole;
  });
  out = out.replace(LEADING_ZERO, ".$1");
  out = out.replace(ZERO_ANGLE, "0deg").replace(ZERO_TIME, "0s");
  // Inside functions only lengths followed by a separator are safe to strip.
  out = out.replace(out.includes("(") ? ZERO_LENGTH_AT_BOUNDARY : ZERO_LENGTH, "0");
  return out.replace(/''/g, '""');
}

// ────────────────────────────────────────────────────────────────────────────
// Numbers
// ────────────────────────────────────────────────────────────────────────────

/** Rounds to four decimals and drops trailing zeros. */
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 10_000) / 10_000;
  return String(Object.is(rounded, -0) ? 0 : rounded);
}

function numberToCss(value: number, property: string, options: ValueOptions): string {
  const suffix = unitSuffix(property);
  if (property === "font-size" && suffix === "px" && options.fontSizePxToRem) {
    const root = options.fontSizeRootPx ?? 16;
    return `${formatNumber(value / root)}rem`;
  }
  return normalizeValue(`${formatNumber(value)}${suffix}`);
}

// ────────────────────────────────────────────────────────────────────────────
// Quoting
// ────────────────────────────────────────────────────────────────────────────

const CONTENT_KEYWORDS = new Set([
  "normal",
  "none",
  "open-quote",
  "close-quote",
  "no-open-quote",
  "no-close-quote",
  "inherit",
  "initial",
  "revert",
  "revert-layer",
  "unset",
]);

const HYPHENATE_KEYWORDS = new Set(["auto", "inherit", "initial", "revert", "revert-layer", "unset"]);

const CONTENT_FUNCTIONS = [
  "attr(",
  "counter(",
  "counters(",
  "url(",
  "linear-gradient(",
  "image-set(",
  "var(--",
];

function hasMatchingQuotes(value: string): boolean {
  const count = (ch: string) => value.split(ch).length - 1;
  return count('"') >= 2 || count("'") >= 2;
}

function quoteContent(value: string): string {
  const trimmed = value.trim();
  const skip =
    CONTENT_FUNCTIONS.some((fn) => trimmed.includes(fn)) ||
    CONTENT_KEYWORDS.has(trimmed) ||
    hasMatchingQuotes(trimmed);
  return skip ? trimmed : `"${trimmed}"`;
}

function quoteHyphenateCharacter(value: string): string {
  const trimmed = value.trim();
  return HYPHENATE_KEYWORDS.has(trimmed) || hasMatchingQuotes(trimmed) ? trimmed : `"${trimmed}"`;
}

function snakeToDashList(value: string): string {
  return value
    .split(",")
    .map((part) => {
      const trimmed = part.trim();
      return trimmed.startsWith("--") ? trimmed : trimmed.replace(/_/g, "-");
    })
    .join(",");
}

/**
 * Converts one declared value into CSS text for `property`.
 *
 * @throws CompileError for values that have no CSS representation (booleans,
 * objects).
 */
export function toCssValue(value: unknown, property: string, options: ValueOptions = {}): string {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new CompileError(`Invalid property value: ${value} is not a valid CSS value for \`${property}\``, {
        property,
      });
    }
    return numberToCss(value, property, options);
  }
  if (typeof value === "string") {
    const normalized = normalizeValue(value);
    switch (property) {
      case "content":
        return quoteContent(normalized);
      case "hyphenate-character":
        return quoteHyphenateCharacter(normalized);
      case "transition-property":
      case "will-change":
        return snakeToDashList(normalized);
      default:
        return normalized;
    }
  }
  if (typeof value === "boolean") {
    throw new CompileError(
      `Invalid property value: boolean \`${value}\` is not a valid CSS value for \`${property}\``,
      { property },
    );
  }
  throw new CompileError(
    [
      `Invalid property value for \`${property}\`: ${describeValue(value)}.`,
      "Use a string or number, an array of fallbacks, or a condition map like",
      '  { default: "red", ":hover": "blue" }',
    ].join("\n"),
    { property },
  );
}
