import { CompileError, describeValue } from "./errors.js";
import { viewTransitionName, type NamingOptions } from "./hash.js";
import type { Declaration } from "./rtl.js";
import { isConditionMap, isScalar, toCssProperty, type Scalar } from "./types.js";
import { compareStrings } from "./utils.js";
import { toCssValue, type ValueOptions } from "./value/normalize.js";

/**
 * Styles for the `::view-transition-*` pseudo-elements of a named transition
 * class (`view-transition-class: <name>`).
 */

export const VIEW_TRANSITION_PARTS = ["group", "image-pair", "old", "new"] as const;

export type ViewTransitionPart = (typeof VIEW_TRANSITION_PARTS)[number];

export type ViewTransitionStyles = {
  readonly [part in ViewTransitionPart]?: { readonly [property: string]: Scalar };
};

export interface ViewTransitionEntry {
  readonly cssName: string;
  readonly ltr: string;
  readonly priority: 0;
  readonly styles: ReadonlyArray<readonly [part: ViewTransitionPart, declarations: readonly Declaration[]]>;
}

function isPart(key: string): key is ViewTransitionPart {
  return VIEW_TRANSITION_PARTS.some((part) => part === key);
}

/** Accepts `imagePair` and `image_pair` for `image-pair`. */
function partOf(key: string): ViewTransitionPart | null {
  const normalized = key.replace(/_/g, "-").replace(/[A-Z]/g, (ch) => `-${ch.toLowerCase()}`);
  return isPart(normalized) ? normalized : null;
}

function partDeclarations(part: string, declarations: unknown, options: ValueOptions): Declaration[] {
  if (!isConditionMap(declarations)) {
    throw new CompileError(
      `View transition \`${part}\` must be an object of declarations, received ${describeValue(declarations)}`,
    );
  }
  const out: Declaration[] = [];
  for (const [declared, value] of Object.entries(declarations)) {
    const property = toCssProperty(declared);
    if (!isScalar(value)) {
      throw new CompileError(
        `View transition \`${part}\`: \`${property}\` must be a string or number, received ${describeValue(value)}`,
        { property },
      );
    }
    out.push({ property, value: toCssValue(value, property, options) });
  }
  return out;
}

function formatBody(declarations: readonly Declaration[]): string {
  return declarations.map(({ property, value }) => `${property}:${value};`).join("");
}

export function compileViewTransition(
  styles: ViewTransitionStyles,
  options: NamingOptions & ValueOptions,
): ViewTransitionEntry {
  const parts: Array<readonly [ViewTransitionPart, Declaration[]]> = [];
  for (const [key, declarations] of Object.entries(styles)) {
    const part = partOf(key);
    if (part === null) {
      throw new CompileError(
        `Invalid view transition key: ${JSON.stringify(key)}. Expected one of ${VIEW_TRANSITION_PARTS.join(", ")}`,
      );
    }
    if (declarations !== undefined) {
      parts.push([part, partDeclarations(part, declarations, options)]);
    }
  }

  // Hashed in declaration order, emitted in pseudo-element tree order with sorted declarations.
  const cssName = viewTransitionName(
    parts.map(([part, declarations]) => `::view-transition-${part}:${formatBody(declarations)};`).join(""),
    options,
  );
  const ordered = VIEW_TRANSITION_PARTS.flatMap((part) => {
    const found = parts.find(([candidate]) => candidate === part);
    if (!found) {
      return [];
    }
    const sorted = [...found[1]].sort((a, b) => compareStrings(a.property, b.property));
    return [[part, sorted] as const];
  });
  const ltr = ordered
    .map(([part, declarations]) => `::view-transition-${part}(*.${cssName}){${formatBody(declarations)}}`)
    .join("");
  return { cssName, ltr, priority: 0, styles: ordered };
}
