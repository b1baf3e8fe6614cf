import { CompileError } from "../errors.js";
import { isConditionMap, type ConditionMap, type LeafValue, type StyleValue } from "../types.js";

/**
 * Flattening of nested condition maps into `(path, value)` pairs.
 *
 * Paths concatenate condition keys from the outside in, so
 * `{ "@media (min-width: 800px)": { ":hover": v } }` becomes
 * `"@media (min-width: 800px):hover"`. The `default` key keeps its parent path.
 * Alongside the path, pseudo and at-rule keys are collected separately: pseudos
 * end up on the selector and at-rules around the rule, whatever their nesting.
 */

export const DEFAULT_CONDITION = "default";

export interface FlatCondition {
  /** Concatenated condition path, `null` for the unconditional value */
  path: string | null;
  /** Pseudo segments in declaration order, joined onto the selector */
  pseudos: string[];
  /** At-rule segments in declaration order, wrapped around the rule */
  atRules: string[];
  value: LeafValue;
}

function isSelectorKey(key: string): boolean {
  return key.startsWith(":") || key.startsWith("@");
}

/** A map is a condition map when it has a default or only selector/at-rule keys. */
export function isConditional(value: StyleValue | undefined): value is ConditionMap {
  if (!isConditionMap(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.includes(DEFAULT_CONDITION) || (keys.length > 0 && keys.every(isSelectorKey));
}

export function combineConditions(parent: string | null, key: string): string | null {
  if (key === DEFAULT_CONDITION) {
    return parent;
  }
  return parent === null ? key : parent + key;
}

/** Returns `value` when it is a valid condition map, throws otherwise. */
export function requireConditional(value: ConditionMap, property: string): ConditionMap {
  if (!isConditional(value)) {
    throw new CompileError(
      [
        `Invalid condition map for \`${property}\`: keys must be "default", pseudo selectors (":hover") or at-rules ("@media ...").`,
        `Received keys: ${Object.keys(value).join(", ") || "(none)"}`,
      ].join("\n"),
      { property },
    );
  }
  return value;
}

export function flattenConditions(
  value: StyleValue,
  property: string,
  parent: Omit<FlatCondition, "value"> = { path: null, pseudos: [], atRules: [] },
): FlatCondition[] {
  if (!isConditionMap(value)) {
    return [{ ...parent, value }];
  }
  const flat: FlatCondition[] = [];
  for (const [key, inner] of Object.entries(requireConditional(value, property))) {
    if (inner === undefined) {
      continue;
    }
    const scope =
      key === DEFAULT_CONDITION
        ? parent
        : {
            path: combineConditions(parent.path, key),
            pseudos: key.startsWith("@") ? parent.pseudos : [...parent.pseudos, key],
            atRules: key.startsWith("@") ? [...parent.atRules, key] : parent.atRules,
          };
    flat.push(...flattenConditions(inner, property, scope));
  }
  return flat;
}
