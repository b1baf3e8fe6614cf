import type { LeafValue } from "../types.js";
import { standardPropertyName } from "./keep.js";
import {
  expandPairValues,
  expandQuadValues,
  splitOnSlash,
  splitValueTokens,
  stripImportant,
  withImportant,
} from "./split.js";
import { defineStrategy, isExcluded, type Expansion } from "./strategy.js";

/**
 * Expands multi-value shorthands into their longhands so every longhand gets
 * its own atomic class and merges independently.
 */

type Quad = readonly [top: string, right: string, bottom: string, left: string];
type Pair = readonly [first: string, second: string];

const sides = (pattern: (side: string) => string): Quad => [
  pattern("top"),
  pattern("right"),
  pattern("bottom"),
  pattern("left"),
];

const QUAD_PATTERNS = new Map<string, Quad>(Object.entries({
  margin: sides((side) => `margin-${side}`),
  padding: sides((side) => `padding-${side}`),
  inset: sides((side) => side),
  "border-width": sides((side) => `border-${side}-width`),
  "border-style": sides((side) => `border-${side}-style`),
  "border-color": sides((side) => `border-${side}-color`),
  "scroll-margin": sides((side) => `scroll-margin-${side}`),
  "scroll-padding": sides((side) => `scroll-padding-${side}`),
}));

const PAIR_PATTERNS = new Map<string, Pair>(Object.entries({
  gap: ["row-gap", "column-gap"],
  overflow: ["overflow-x", "overflow-y"],
  "overscroll-behavior": ["overscroll-behavior-x", "overscroll-behavior-y"],
  "margin-block": ["margin-top", "margin-bottom"],
  "margin-inline": ["margin-inline-start", "margin-inline-end"],
  "padding-block": ["padding-top", "padding-bottom"],
  "padding-inline": ["padding-inline-start", "padding-inline-end"],
  "inset-block": ["top", "bottom"],
  "inset-inline": ["inset-inline-start", "inset-inline-end"],
}));

const RADIUS_CORNERS: Quad = [
  "border-top-left-radius",
  "border-top-right-radius",
  "border-bottom-right-radius",
  "border-bottom-left-radius",
];

const LIST_STYLE_POSITIONS = new Set(["inside", "outside"]);

function spread(properties: readonly string[], value: LeafValue): Expansion {
  return properties.map((property) => [property, value] as const);
}

function zip(properties: readonly string[], values: readonly string[]): Expansion {
  return properties.map((property, i) => [property, values[i]] as const);
}

/** Returns `null` when the token count does not fit the pattern; the shorthand then stays whole. */
function expandQuad(properties: Quad, value: string): Expansion | null {
  const { tokens, important } = splitValueTokens(value);
  const values = expandQuadValues(tokens);
  return values && zip(properties, values.map((token) => withImportant(token, important)));
}

function expandPair(properties: Pair, value: string): Expansion | null {
  const { tokens, important } = splitValueTokens(value);
  const values = expandPairValues(tokens);
  return values && zip(properties, values.map((token) => withImportant(token, important)));
}

function expandBorderRadius(value: string): Expansion | null {
  const { body, important } = stripImportant(value);
  const [horizontalText, verticalText] = splitOnSlash(body);
  const horizontal = expandQuadValues(splitValueTokens(horizontalText).tokens);
  const vertical = verticalText ? expandQuadValues(splitValueTokens(verticalText).tokens) : horizontal;
  if (!horizontal || !vertical) {
    return null;
  }
  return RADIUS_CORNERS.map((corner, i) => {
    const combined = horizontal[i] === vertical[i] ? horizontal[i] : `${horizontal[i]} ${vertical[i]}`;
    return [corner, withImportant(combined, important)] as const;
  });
}

function expandListStyle(value: string): Expansion {
  const { tokens, important } = splitValueTokens(value);
  const out: Expansion = [];
  for (const token of tokens) {
    let longhand: string;
    if (token.startsWith("url(") || token === "none") {
      longhand = "list-style-image";
    } else if (LIST_STYLE_POSITIONS.has(token)) {
      longhand = "list-style-position";
    } else {
      longhand = "list-style-type";
    }
    out.push([longhand, withImportant(token, important)]);
  }
  return out;
}

function longhandsOf(property: string): readonly string[] | null {
  if (property === "border-radius") {
    return RADIUS_CORNERS;
  }
  if (property === "list-style") {
    return ["list-style-type", "list-style-position", "list-style-image"];
  }
  return QUAD_PATTERNS.get(property) ?? PAIR_PATTERNS.get(property) ?? null;
}

export const expandToLonghands = defineStrategy(
  "expand-to-longhands",
  (declared, value, options) => {
    const property = standardPropertyName(declared);
    const longhands = longhandsOf(property);
    if (property.startsWith("--") || isExcluded(property, options) || !longhands) {
      return [[property, value]];
    }
    if (value === null) {
      return spread(longhands, null);
    }
    if (typeof value === "number") {
      return property === "list-style" ? [[property, value]] : spread(longhands, value);
    }
    if (typeof value !== "string") {
      // Fallback lists and firstThatWorks stay whole: their candidates may differ in arity.
      return [[property, value]];
    }
    if (property === "list-style") {
      return expandListStyle(value);
    }
    const quad = QUAD_PATTERNS.get(property);
    const pair = PAIR_PATTERNS.get(property);
    const expanded =
      property === "border-radius"
        ? expandBorderRadius(value)
        : quad
          ? expandQuad(quad, value)
          : pair
            ? expandPair(pair, value)
            : null;
    return expanded ?? [[property, value]];
  },
);
