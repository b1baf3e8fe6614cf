import { prefixSelector } from "../prefixer.js";
import { sortCombinedPseudos } from "../pseudo.js";
import { compareStrings } from "../utils.js";

/**
 * Selector text and at-rule wrapping for atomic rules.
 */

/** Suffixes that reach outside the element itself and need a specificity bump. */
export function isContextualSuffix(suffix: string | null): boolean {
  if (!suffix) {
    return false;
  }
  return (
    suffix.startsWith(":where(") ||
    suffix.startsWith(":is(") ||
    suffix.startsWith(":has(") ||
    (suffix.startsWith(":not(") && suffix.includes(" "))
  );
}

/**
 * `.x1` for plain rules, `.x1.x1` when the rule sits inside an at-rule or uses a
 * contextual selector, followed by the canonical pseudo suffix. Pseudos with
 * vendor variants expand into a selector list.
 */
export function buildAtomicSelector(
  className: string,
  suffix: string | null,
  inAtRule: boolean,
): string {
  const bump = inAtRule || isContextualSuffix(suffix);
  const base = bump ? `.${className}.${className}` : `.${className}`;
  return suffix ? prefixSelector(base + sortCombinedPseudos(suffix)) : base;
}

/**
 * Wraps `css` in its at-rules. At-rules are sorted and each one wraps the
 * previous, so the alphabetically last at-rule ends up outermost.
 */
export function wrapInAtRules(atRules: readonly string[], css: string): string {
  return [...atRules].sort(compareStrings).reduce((inner, rule) => `${rule}{${inner}}`, css);
}
