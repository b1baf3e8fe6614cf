import type { ResolvedConfig } from "./config.js";
import { loadStringList, loadStringMap } from "./data.js";
import { CompileError } from "./errors.js";
import { Logger, type WarningType } from "./internal/logger.js";
import { vendorPrefixes } from "./prefixer.js";

/**
 * Compile-time checks on declared property names: unknown properties (with
 * suggestions), vendor prefixes the prefix table already covers, and
 * deprecated properties.
 */

export type UnknownPropertyLevel = "error" | "warn" | "ignore";
export type PropertyNoticeLevel = "warn" | "ignore";

const VENDOR_PREFIX_PATTERN = /^-(?:webkit|moz|ms|o)-/;
const MAX_SUGGESTIONS = 3;
const MIN_SIMILARITY = 0.8;

let knownProperties: readonly string[] | null = null;
let knownSet: ReadonlySet<string> | null = null;
let aliases: ReadonlyMap<string, string> | null = null;
let deprecated: ReadonlySet<string> | null = null;

function known(): readonly string[] {
  knownProperties ??= loadStringList("css-properties.json");
  return knownProperties;
}

export function isKnownProperty(property: string): boolean {
  if (property.startsWith("--")) {
    return true;
  }
  knownSet ??= new Set(known());
  aliases ??= loadStringMap("property-aliases.json");
  const standard = property.replace(VENDOR_PREFIX_PATTERN, "");
  return knownSet.has(standard) || aliases.has(standard);
}

export function isDeprecatedProperty(property: string): boolean {
  deprecated ??= new Set(loadStringList("deprecated-properties.json"));
  return deprecated.has(property);
}

/** Jaro similarity in [0, 1]. */
export function jaroSimilarity(a: string, b: string): number {
  if (a === b) {
    return 1;
  }
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  const window = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);
  const aMatched: boolean[] = new Array<boolean>(a.length).fill(false);
  const bMatched: boolean[] = new Array<boolean>(b.length).fill(false);
  let matches = 0;
  for (let i = 0; i < a.length; i++) {
    const end = Math.min(i + window + 1, b.length);
    for (let j = Math.max(0, i - window); j < end; j++) {
      if (!bMatched[j] && a[i] === b[j]) {
        aMatched[i] = true;
        bMatched[j] = true;
        matches++;
        break;
      }
    }
  }
  if (matches === 0) {
    return 0;
  }
  let halfTranspositions = 0;
  let k = 0;
  for (let i = 0; i < a.length; i++) {
    if (!aMatched[i]) {
      continue;
    }
    while (!bMatched[k]) {
      k++;
    }
    if (a[i] !== b[k]) {
      halfTranspositions++;
    }
    k++;
  }
  const transpositions = halfTranspositions / 2;
  return (matches / a.length + matches / b.length + (matches - transpositions) / matches) / 3;
}

/** Up to three known properties closest to `property`, best first. */
export function findSuggestions(property: string): string[] {
  const target = property.toLowerCase();
  return known()
    .map((candidate) => ({ candidate, score: jaroSimilarity(target, candidate) }))
    .filter(({ score }) => score > MIN_SIMILARITY)
    .sort((a, b) => b.score - a.score)
    .slice(0, MAX_SUGGESTIONS)
    .map(({ candidate }) => candidate);
}

export function unknownPropertyMessage(property: string, suggestions: readonly string[]): string {
  return suggestions.length === 0
    ? `Unknown CSS property '${property}'`
    : `Unknown CSS property '${property}'. Did you mean: ${suggestions.join(", ")}?`;
}

function warn(type: WarningType, property: string, context: Record<string, unknown>): void {
  Logger.logWarnings([{ severity: "warning", type, source: property, context }]);
}

function checkVendorPrefix(property: string, config: ResolvedConfig): void {
  if (!config.autoprefixer || config.vendorPrefixLevel === "ignore") {
    return;
  }
  const prefix = VENDOR_PREFIX_PATTERN.exec(property)?.[0];
  if (prefix === undefined) {
    return;
  }
  const standard = property.slice(prefix.length);
  if (vendorPrefixes(standard).length > 0) {
    warn("Unnecessary vendor prefix", property, {
      message: `Unnecessary vendor prefix '${property}'. Use '${standard}' instead; autoprefixer adds vendor prefixes.`,
    });
  }
}

/**
 * Checks one declared property name (kebab-case, before shorthand expansion).
 * Throws a `CompileError` for an unknown property when the level is `"error"`.
 */
export function validateProperty(property: string, config: ResolvedConfig): void {
  if (!config.validateProperties || property.startsWith("--")) {
    return;
  }
  checkVendorPrefix(property, config);

  if (config.deprecatedPropertyLevel === "warn" && isDeprecatedProperty(property)) {
    warn("Deprecated CSS property", property, {
      message: `CSS property '${property}' is deprecated. Consider using a modern alternative.`,
    });
  }

  if (config.unknownPropertyLevel === "ignore" || isKnownProperty(property)) {
    return;
  }
  const suggestions = findSuggestions(property);
  if (config.unknownPropertyLevel === "error") {
    throw new CompileError(unknownPropertyMessage(property, suggestions), { property });
  }
  warn("Unknown CSS property", property, { suggestions });
}
