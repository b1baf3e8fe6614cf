import selectorParser from "postcss-selector-parser";
import { SelectorError } from "./errors.js";
import type { Marker } from "./marker.js";

/**
 * Contextual selectors: style an element from the state of an ancestor,
 * descendant or sibling carrying a marker class. The returned strings are
 * condition keys:
 *
 * ```ts
 * { opacity: { default: 1, [when.ancestor(":hover")]: 0.5 } }
 * ```
 */

function describePseudo(pseudo: string): string {
  return JSON.stringify(pseudo);
}

/**
 * Accepts pseudo-class chains only (`:hover`, `:focus-visible`,
 * `:nth-child(2n):hover`). Classes, combinators and pseudo-elements are rejected.
 */
export function validatePseudo(pseudo: string): void {
  if (pseudo.startsWith("::")) {
    throw new SelectorError("Pseudo-elements (::) are not supported in contextual selectors");
  }
  if (!pseudo.startsWith(":")) {
    throw new SelectorError(`Pseudo selector must start with ':' (got ${describePseudo(pseudo)})`);
  }

  let root: selectorParser.Root;
  try {
    root = selectorParser().astSync(pseudo);
  } catch (error) {
    throw new SelectorError(
      `Invalid pseudo selector ${describePseudo(pseudo)}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const [selector, ...rest] = root.nodes;
  if (!selector || rest.length > 0) {
    throw new SelectorError(
      `Contextual selectors take a single pseudo-class chain, got ${describePseudo(pseudo)}`,
    );
  }
  for (const node of selector.nodes) {
    if (node.type !== "pseudo") {
      throw new SelectorError(
        [
          `Contextual selectors accept pseudo-classes only, got ${describePseudo(pseudo)}.`,
          `Unexpected ${node.type} ${describePseudo(String(node))}.`,
        ].join("\n"),
      );
    }
    if (node.value.startsWith("::")) {
      throw new SelectorError("Pseudo-elements (::) are not supported in contextual selectors");
    }
  }
}

export interface When {
  /** Matches while an ancestor with the marker is in `pseudo` state. */
  ancestor(pseudo: string, marker?: Marker): string;
  /** Matches while a descendant with the marker is in `pseudo` state. */
  descendant(pseudo: string, marker?: Marker): string;
  /** Matches while a preceding sibling with the marker is in `pseudo` state. */
  siblingBefore(pseudo: string, marker?: Marker): string;
  /** Matches while a following sibling with the marker is in `pseudo` state. */
  siblingAfter(pseudo: string, marker?: Marker): string;
  anySibling(pseudo: string, marker?: Marker): string;
}

/** Selector builders bound to the build's default marker. */
export function createWhen(defaultMarker: Marker): When {
  const target = (pseudo: string, marker: Marker | undefined): string => {
    validatePseudo(pseudo);
    return `.${(marker ?? defaultMarker).class}${pseudo}`;
  };
  return {
    ancestor: (pseudo, marker) => `:where(${target(pseudo, marker)} *)`,
    descendant: (pseudo, marker) => `:where(:has(${target(pseudo, marker)}))`,
    siblingBefore: (pseudo, marker) => `:where(${target(pseudo, marker)} ~ *)`,
    siblingAfter: (pseudo, marker) => `:where(:has(~ ${target(pseudo, marker)}))`,
    anySibling: (pseudo, marker) => {
      const observed = target(pseudo, marker);
      return `:where(${observed} ~ *, :has(~ ${observed}))`;
    },
  };
}
