import { loadNumberMap } from "./data.js";

/**
 * Pseudo-class / pseudo-element helpers: canonical ordering and cascade offsets.
 */

export const PSEUDO_ELEMENT_PRIORITY = 5000;
const UNKNOWN_PSEUDO_CLASS_PRIORITY = 40;

const PSEUDO_ELEMENT_SPLIT = /^(::[\w-]+)(.*)$/;
const PSEUDO_CLASS_SCAN = /:[a-z-]+(?:\([^)]*\))?/gi;
const PSEUDO_BASE = /^(:[a-z-]+)/i;
const COMPLEX_SELECTOR_PSEUDO = /:(hover|focus|active|checked|focus-within|focus-visible)/;

let pseudoClassPriorities: ReadonlyMap<string, number> | null = null;

function priorities(): ReadonlyMap<string, number> {
  pseudoClassPriorities ??= loadNumberMap("pseudo-priorities.json");
  return pseudoClassPriorities;
}

export function isPseudoElement(selector: string): boolean {
  return selector.startsWith("::");
}

export function pseudoClassPriority(pseudo: string): number {
  return priorities().get(pseudo) ?? UNKNOWN_PSEUDO_CLASS_PRIORITY;
}

/**
 * Cascade offset of a selector suffix.
 *
 * - `::before:hover` → 5000 + 130
 * - `:hover:active` → 130 + 170 (every pseudo-class counts)
 * - `:nth-child(2n)` → 60 (functional pseudo-classes use their base name)
 * - anything else is scanned for a well-known interaction state
 */
export function pseudoPriority(suffix: string | null): number {
  if (!suffix) {
    return 0;
  }
  if (isPseudoElement(suffix)) {
    const match = PSEUDO_ELEMENT_SPLIT.exec(suffix);
    const rest = match ? match[2] : "";
    return PSEUDO_ELEMENT_PRIORITY + (rest ? combinedPriority(rest) : 0);
  }
  if (suffix.startsWith(":")) {
    return combinedPriority(suffix);
  }
  const match = COMPLEX_SELECTOR_PSEUDO.exec(suffix);
  return match ? pseudoClassPriority(`:${match[1]}`) : 0;
}

function combinedPriority(selector: string): number {
  let total = 0;
  for (const [pseudo] of selector.matchAll(PSEUDO_CLASS_SCAN)) {
    const base = PSEUDO_BASE.exec(pseudo);
    total += pseudoClassPriority(base ? base[1] : pseudo);
  }
  return total;
}

// ────────────────────────────────────────────────────────────────────────────
// Ordering
// ────────────────────────────────────────────────────────────────────────────

function comparePseudoClasses(a: string, b: string): number {
  if (a === "default") {
    return -1;
  }
  if (b === "default") {
    return 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sorts pseudo-classes alphabetically within each run between pseudo-elements.
 * Pseudo-elements keep their positions.
 *
 * `[":hover", ":active"]` → `[":active", ":hover"]`;
 * `[":hover", "::before", ":active"]` is unchanged.
 */
export function sortPseudos(pseudos: readonly string[]): string[] {
  if (pseudos.length < 2) {
    return [...pseudos];
  }
  const sorted: string[] = [];
  let group: string[] = [];
  for (const pseudo of pseudos) {
    if (isPseudoElement(pseudo)) {
      sorted.push(...group.sort(comparePseudoClasses), pseudo);
      group = [];
    } else {
      group.push(pseudo);
    }
  }
  sorted.push(...group.sort(comparePseudoClasses));
  return sorted;
}

/** `":hover:active"` → `[":hover", ":active"]`, `"::before:hover"` → `["::before", ":hover"]`. */
export function splitPseudos(combined: string): string[] {
  return combined
    .replace(/::/g, "\u0000")
    .split(":")
    .filter((part) => part !== "")
    .map((part) => (part.startsWith("\u0000") ? `::${part.slice(1)}` : `:${part}`));
}

/**
 * Canonical form of a combined pseudo suffix as emitted in selectors.
 * Suffixes containing parentheses (`:where(...)`, `:nth-child(2n)`) are kept verbatim.
 */
export function sortCombinedPseudos(combined: string): string {
  if (combined === "") {
    return combined;
  }
  if (isPseudoElement(combined)) {
    const match = PSEUDO_ELEMENT_SPLIT.exec(combined);
    if (!match || match[2] === "") {
      return combined;
    }
    const rest = splitPseudos(match[2]);
    const classes = rest.filter((p) => !isPseudoElement(p)).sort(comparePseudoClasses);
    const elements = rest.filter(isPseudoElement);
    return match[1] + [...classes, ...elements].join("");
  }
  if (combined.includes("(")) {
    return combined;
  }
  return sortPseudos(splitPseudos(combined)).join("");
}
