import type { Declarations, Scalar } from "../types.js";

/**
 * Compiled shapes of a style rule.
 */

export interface AtomicClassMeta {
  readonly class: string;
  readonly ltr: string;
  readonly rtl: string | null;
  readonly priority: number;
  /** Value text the class name was hashed from */
  readonly value: string;
  readonly selectorSuffix: string | null;
  readonly atRule: string | null;
  /** Runtime variable of a dynamic rule's property */
  readonly dynamicVar?: string;
}

/** Classes of one property, keyed by condition path and ordered by priority then class. */
export interface ConditionalMeta {
  readonly classes: ReadonlyArray<readonly [condition: string, meta: AtomicClassMeta]>;
}

/** A property declared as `null`: emits nothing and clears the property when merged. */
export interface UnsetMeta {
  readonly unset: true;
}

export type PropertyMeta = AtomicClassMeta | ConditionalMeta | UnsetMeta;

export type DynamicTemplateFn = (...params: Scalar[]) => Declarations;

export interface ClassRule {
  /** Sorted by property key */
  readonly atomicClasses: ReadonlyArray<readonly [property: string, meta: PropertyMeta]>;
  readonly classString: string;
  readonly dynamic: boolean;
  readonly paramNames: readonly string[];
  /** Builds the runtime declarations of a dynamic rule. Not serialized. */
  readonly template?: DynamicTemplateFn;
  /** Declarations a static rule was compiled from, read by `include`. Not serialized. */
  readonly declarations?: Declarations;
}

export const UNSET: UnsetMeta = Object.freeze({ unset: true });

export function isUnsetMeta(meta: PropertyMeta): meta is UnsetMeta {
  return "unset" in meta;
}

export function isConditionalMeta(meta: PropertyMeta): meta is ConditionalMeta {
  return "classes" in meta;
}

/** Every atomic class of a property, in output order. */
export function metaClasses(meta: PropertyMeta): AtomicClassMeta[] {
  if (isUnsetMeta(meta)) {
    return [];
  }
  if (isConditionalMeta(meta)) {
    return meta.classes.map(([, atom]) => atom);
  }
  return [meta];
}

export function buildClassString(
  atomicClasses: ReadonlyArray<readonly [string, PropertyMeta]>,
): string {
  return atomicClasses
    .flatMap(([, meta]) => metaClasses(meta).map((atom) => atom.class))
    .join(" ");
}
