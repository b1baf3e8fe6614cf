import { lastMediaQueryWins } from "./condition/media-query.js";
import { wrapInAtRules } from "./condition/selector.js";
import { DEFAULT_CONDITION } from "./condition/tree.js";
import { CompileError, describeValue } from "./errors.js";
import { varName, type NamingOptions } from "./hash.js";
import { isConditionMap, isScalar, type Scalar, type StyleValue } from "./types.js";
import { compareStrings } from "./utils.js";
import { toCssValue, type ValueOptions } from "./value/normalize.js";

/**
 * CSS custom properties: `defineVars` and the typed-value helpers.
 */

export interface VarConditions {
  readonly [condition: string]: VarValue | undefined;
}

export type VarValue = Scalar | VarConditions;

/** A value with an `@property` registration. Created with the `types` helpers. */
export class TypedValue {
  readonly syntax: string;
  readonly value: VarValue;
  readonly inherits: boolean;

  constructor(syntax: string, value: VarValue, inherits = true) {
    this.syntax = syntax;
    this.value = value;
    this.inherits = inherits;
  }
}

export type VarDefinition = VarValue | TypedValue;

export type ResolvedVarValue = string | { readonly [condition: string]: ResolvedVarValue };

export interface VarType {
  readonly syntax: string;
  readonly inherits: boolean;
}

export interface VarEntry {
  readonly cssName: string;
  readonly value: ResolvedVarValue;
  readonly type: VarType | null;
}

/** `{ color: "var(--x1abc)" }`: what consumers put in style values. */
export type VarsRef<K extends string = string> = { readonly [name in K]: string };

const typed =
  (syntax: string) =>
  (value: VarValue): TypedValue =>
    new TypedValue(syntax, value);

export const types = {
  angle: typed("<angle>"),
  color: typed("<color>"),
  image: typed("<image>"),
  integer: typed("<integer>"),
  length: typed("<length>"),
  lengthPercentage: typed("<length-percentage>"),
  number: typed("<number>"),
  percentage: typed("<percentage>"),
  resolution: typed("<resolution>"),
  time: typed("<time>"),
  transformFunction: typed("<transform-function>"),
  transformList: typed("<transform-list>"),
  url: typed("<url>"),
  /** Any `@property` syntax string, e.g. `"<length> | auto"`. */
  custom: (syntax: string, value: VarValue, inherits = true): TypedValue =>
    new TypedValue(syntax, value, inherits),
};

// ────────────────────────────────────────────────────────────────────────────
// Value resolution
// ────────────────────────────────────────────────────────────────────────────

function isVarConditionKey(key: string): boolean {
  return key === DEFAULT_CONDITION || key.startsWith("@");
}

/**
 * Normalizes a variable value. Condition maps may only use `default` and
 * at-rule keys; sibling `min-width` media queries are range-bounded.
 */
export function resolveVarValue(
  value: StyleValue | undefined,
  cssName: string,
  options: ValueOptions = {},
): ResolvedVarValue {
  if (isScalar(value)) {
    return toCssValue(value, cssName, options);
  }
  if (!isConditionMap(value)) {
    throw new CompileError(
      `Invalid value for variable \`${cssName}\`: expected a string, number or condition map, received ${describeValue(value)}`,
      { property: cssName },
    );
  }
  const resolved: Record<string, ResolvedVarValue> = {};
  for (const [key, inner] of Object.entries(lastMediaQueryWins(value))) {
    if (!isVarConditionKey(key)) {
      throw new CompileError(
        [
          `Invalid condition \`${key}\` for variable \`${cssName}\`.`,
          'Variables accept "default" and at-rule keys ("@media ...", "@supports ...") only.',
        ].join("\n"),
        { property: cssName },
      );
    }
    if (inner !== undefined) {
      resolved[key] = resolveVarValue(inner, cssName, options);
    }
  }
  return resolved;
}

/** Value used for `initial-value`: the default branch, else the first one. */
export function initialValue(value: ResolvedVarValue): string {
  if (typeof value === "string") {
    return value;
  }
  const fallback = value[DEFAULT_CONDITION] ?? Object.values(value)[0];
  return fallback === undefined ? "" : initialValue(fallback);
}

export interface VarDeclaration {
  /** At-rules from the outermost declared condition inwards */
  readonly atRules: readonly string[];
  readonly name: string;
  readonly value: string;
}

/** One declaration per condition path of a variable value. */
export function flattenVarValue(
  name: string,
  value: ResolvedVarValue,
  atRules: readonly string[] = [],
): VarDeclaration[] {
  if (typeof value === "string") {
    return [{ atRules, name, value }];
  }
  return Object.entries(value).flatMap(([key, inner]) =>
    flattenVarValue(name, inner, key === DEFAULT_CONDITION ? atRules : [...atRules, key]),
  );
}

// ────────────────────────────────────────────────────────────────────────────
// defineVars
// ────────────────────────────────────────────────────────────────────────────

export interface CompiledVars {
  readonly entries: ReadonlyArray<readonly [name: string, entry: VarEntry]>;
  readonly ref: VarsRef;
}

export function compileVars(
  moduleId: string,
  namespace: string,
  vars: Readonly<Record<string, VarDefinition>>,
  options: NamingOptions & ValueOptions,
): CompiledVars {
  const entries: Array<readonly [string, VarEntry]> = [];
  const ref: Record<string, string> = {};
  for (const name of Object.keys(vars).sort(compareStrings)) {
    const definition = vars[name];
    const cssName = varName(moduleId, namespace, name, options);
    const isTyped = definition instanceof TypedValue;
    const raw = isTyped ? definition.value : definition;
    entries.push([
      name,
      {
        cssName,
        value: resolveVarValue(raw, cssName, options),
        type: isTyped ? { syntax: definition.syntax, inherits: definition.inherits } : null,
      },
    ]);
    ref[name] = `var(${cssName})`;
  }
  return { entries, ref };
}

// ────────────────────────────────────────────────────────────────────────────
// CSS
// ────────────────────────────────────────────────────────────────────────────

export function propertyRule(entry: VarEntry): string | null {
  if (!entry.type) {
    return null;
  }
  const { syntax, inherits } = entry.type;
  return `@property ${entry.cssName} { syntax: "${syntax}"; inherits: ${inherits}; initial-value: ${initialValue(entry.value)} }`;
}

/**
 * `:root{--a:1;--b:2;}` blocks, one per condition path: unconditional first,
 * then by number of at-rules. Nested at-rules wrap in sorted order.
 */
export function rootVarsCss(entries: readonly VarEntry[]): string[] {
  const groups = new Map<string, VarDeclaration[]>();
  for (const entry of entries) {
    for (const declaration of flattenVarValue(entry.cssName, entry.value)) {
      const key = declaration.atRules.join("\u0000");
      groups.set(key, [...(groups.get(key) ?? []), declaration]);
    }
  }
  return [...groups.entries()]
    .sort(
      ([keyA, a], [keyB, b]) =>
        a[0].atRules.length - b[0].atRules.length || compareStrings(keyA, keyB),
    )
    .map(([, declarations]) => {
      const body = [...declarations]
        .sort((a, b) => compareStrings(a.name, b.name))
        .map(({ name, value }) => `${name}:${value};`)
        .join("");
      return wrapInAtRules(declarations[0].atRules, `:root{${body}}`);
    });
}
