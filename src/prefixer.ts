import { loadStringListMap } from "./data.js";
import type { Declaration } from "./rtl.js";

/**
 * Fixed vendor-prefix tables. Prefixed declarations are emitted before the
 * standard one inside the same rule; prefixed pseudo selectors become a
 * selector list.
 */

let prefixTable: ReadonlyMap<string, readonly string[]> | null = null;
let selectorTable: ReadonlyMap<string, readonly string[]> | null = null;

export function vendorPrefixes(property: string): readonly string[] {
  prefixTable ??= loadStringListMap("vendor-prefixes.json");
  return prefixTable.get(property) ?? [];
}

export function withVendorPrefixes(declaration: Declaration, enabled: boolean): Declaration[] {
  if (!enabled) {
    return [declaration];
  }
  const prefixed = vendorPrefixes(declaration.property).map((prefix) => ({
    property: `${prefix}${declaration.property}`,
    value: declaration.value,
  }));
  return [...prefixed, declaration];
}

export function formatDeclarations(declarations: readonly Declaration[]): string {
  return declarations.map(({ property, value }) => `${property}:${value}`).join(";");
}

/** The next character does not continue the pseudo's name. */
function endsPseudoName(selector: string, end: number): boolean {
  return end === selector.length || !/[\w-]/.test(selector[end]);
}

/**
 * Expands the first pseudo of `selector` that has vendor variants into a
 * selector list, one entry per variant. Applied regardless of `autoprefixer`.
 *
 * `.x1::placeholder` → `.x1::-webkit-input-placeholder,.x1::-moz-placeholder,.x1:-ms-input-placeholder,.x1::placeholder`
 */
export function prefixSelector(selector: string): string {
  selectorTable ??= loadStringListMap("selector-prefixes.json");
  let match: { start: number; pseudo: string; variants: readonly string[] } | null = null;
  for (const [pseudo, variants] of selectorTable) {
    let start = selector.indexOf(pseudo);
    while (start !== -1 && !endsPseudoName(selector, start + pseudo.length)) {
      start = selector.indexOf(pseudo, start + 1);
    }
    if (start !== -1 && (match === null || start < match.start)) {
      match = { start, pseudo, variants };
    }
  }
  if (match === null) {
    return selector;
  }
  const before = selector.slice(0, match.start);
  const after = selector.slice(match.start + match.pseudo.length);
  return match.variants.map((variant) => `${before}${variant}${after}`).join(",");
}
