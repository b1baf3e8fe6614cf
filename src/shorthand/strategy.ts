import { isConditionMap, type ConditionMap, type LeafValue, type StyleValue } from "../types.js";

/**
 * Pluggable handling of shorthand declarations.
 *
 * A strategy turns one declaration into zero or more `(property, value)` pairs.
 * The same strategy is used for every rule of a build.
 */

export interface ShorthandOptions {
  /** Properties the strategy leaves untouched */
  readonly exclude?: readonly string[];
}

export type Expansion = Array<readonly [property: string, value: LeafValue]>;

export interface ShorthandStrategy {
  readonly name: string;
  expand(property: string, value: LeafValue, options: ShorthandOptions): Expansion;
  expandConditions(
    property: string,
    cssProperty: string,
    conditions: ConditionMap,
    options: ShorthandOptions,
  ): Array<readonly [property: string, conditions: ConditionMap]>;
}

type LeafExpander = (property: string, value: LeafValue, options: ShorthandOptions) => Expansion;

/**
 * Expands every leaf of a condition map and regroups the results per produced
 * property, keeping the condition keys of each leaf.
 */
export function expandConditionTree(
  cssProperty: string,
  conditions: ConditionMap,
  options: ShorthandOptions,
  expandLeaf: LeafExpander,
): Array<readonly [string, ConditionMap]> {
  const order: string[] = [];

  const visit = (node: ConditionMap): Map<string, Record<string, StyleValue>> => {
    const perProperty = new Map<string, Record<string, StyleValue>>();
    for (const [key, value] of Object.entries(node)) {
      if (value === undefined) {
        continue;
      }
      const parts: Array<readonly [string, StyleValue]> = isConditionMap(value)
        ? [...visit(value)]
        : expandLeaf(cssProperty, value, options);
      for (const [property, expanded] of parts) {
        if (!order.includes(property)) {
          order.push(property);
        }
        const target = perProperty.get(property) ?? {};
        target[key] = expanded;
        perProperty.set(property, target);
      }
    }
    return perProperty;
  };

  const root = visit(conditions);
  const out: Array<readonly [string, ConditionMap]> = [];
  for (const property of order) {
    const map = root.get(property);
    if (map) {
      out.push([property, map]);
    }
  }
  return out;
}

export function defineStrategy(name: string, expandLeaf: LeafExpander): ShorthandStrategy {
  return {
    name,
    expand: expandLeaf,
    expandConditions(_property, cssProperty, conditions, options) {
      return expandConditionTree(cssProperty, conditions, options, expandLeaf);
    },
  };
}

export function isExcluded(property: string, options: ShorthandOptions): boolean {
  return options.exclude?.includes(property) ?? false;
}
