import { loadStringList } from "./data.js";
import { CompileError, describeValue } from "./errors.js";
import { positionTryName, type NamingOptions } from "./hash.js";
import type { Declaration } from "./rtl.js";
import { isScalar, toCssProperty, type Scalar } from "./types.js";
import { compareStrings } from "./utils.js";
import { formatNumber, normalizeValue } from "./value/normalize.js";

/**
 * `@position-try` fallbacks for CSS anchor positioning.
 */

export type PositionTryDeclarations = { readonly [property: string]: Scalar };

export interface PositionTryEntry {
  readonly cssName: string;
  readonly ltr: string;
  readonly priority: 0;
  readonly declarations: readonly Declaration[];
}

let allowed: ReadonlySet<string> | null = null;

export function isPositionTryProperty(property: string): boolean {
  allowed ??= new Set(loadStringList("position-try-properties.json"));
  return allowed.has(property);
}

function positionTryValue(property: string, value: Scalar): string {
  if (typeof value === "number") {
    return `${formatNumber(value)}px`;
  }
  if (!isScalar(value)) {
    throw new CompileError(
      `\`${property}\` in @position-try must be a string or number, received ${describeValue(value)}`,
      { property },
    );
  }
  return normalizeValue(value);
}

export function compilePositionTry(
  declarations: PositionTryDeclarations,
  options: NamingOptions,
): PositionTryEntry {
  const compiled: Declaration[] = [];
  const rejected: string[] = [];
  for (const [declared, value] of Object.entries(declarations)) {
    const property = toCssProperty(declared);
    if (!isPositionTryProperty(property)) {
      rejected.push(property);
      continue;
    }
    compiled.push({ property, value: positionTryValue(property, value) });
  }
  if (rejected.length > 0) {
    throw new CompileError(
      [
        `Properties not allowed in @position-try: ${rejected.join(", ")}.`,
        "Only anchor, inset, margin, size and self-alignment properties can be used.",
      ].join("\n"),
      { property: rejected[0] },
    );
  }
  compiled.sort((a, b) => compareStrings(a.property, b.property));

  const cssName = positionTryName(
    compiled.map(({ property, value }) => `${property}:${property};${property}:${value};`).join(""),
    options,
  );
  const body = compiled.map(({ property, value }) => `${property}:${value};`).join("");
  return {
    cssName,
    ltr: `@position-try ${cssName}{${body}}`,
    priority: 0,
    declarations: compiled,
  };
}
