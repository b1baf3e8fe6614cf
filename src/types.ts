/**
 * Shapes of style declarations accepted by the compiler.
 */

export type Scalar = string | number;

/**
 * Ordered candidates where the first one the browser supports wins.
 * Created with {@link firstThatWorks}.
 */
export class FirstThatWorks {
  readonly values: readonly Scalar[];

  constructor(values: readonly Scalar[]) {
    this.values = values;
  }
}

export function firstThatWorks(...values: Scalar[]): FirstThatWorks {
  return new FirstThatWorks(values);
}

/** A value that is not a condition map. `null` removes the property. */
export type LeafValue = Scalar | null | readonly Scalar[] | FirstThatWorks;

export interface ConditionMap {
  readonly [condition: string]: StyleValue | undefined;
}

export type StyleValue = LeafValue | ConditionMap;

export type DeclarationEntry = readonly [property: string, value: StyleValue];

/**
 * Declarations of one rule: an object (insertion order is kept) or an explicit
 * ordered list of `[property, value]` pairs.
 */
export type Declarations =
  | { readonly [property: string]: StyleValue | undefined }
  | readonly DeclarationEntry[];

export function isFallbackList(value: unknown): value is readonly Scalar[] {
  return Array.isArray(value);
}

export function isConditionMap(value: unknown): value is ConditionMap {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof FirstThatWorks)
  );
}

export function isScalar(value: unknown): value is Scalar {
  return typeof value === "string" || typeof value === "number";
}

export function declarationEntries(declarations: Declarations): DeclarationEntry[] {
  if (isDeclarationList(declarations)) {
    return [...declarations];
  }
  const entries: DeclarationEntry[] = [];
  for (const [property, value] of Object.entries(declarations)) {
    if (value !== undefined) {
      entries.push([property, value]);
    }
  }
  return entries;
}

function isDeclarationList(value: Declarations): value is readonly DeclarationEntry[] {
  return Array.isArray(value);
}

/** `backgroundColor` → `background-color`; custom properties are kept as written. */
export function toCssProperty(property: string): string {
  if (property.startsWith("--")) {
    return property;
  }
  if (property.startsWith("var(--") && property.endsWith(")") && !property.includes(",")) {
    return property.slice(4, -1);
  }
  return property.replace(/[A-Z]/g, (ch) => `-${ch.toLowerCase()}`).replace(/_/g, "-");
}
