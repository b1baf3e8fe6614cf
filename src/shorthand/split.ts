import valueParser from "postcss-value-parser";

/**
 * Token splitting for multi-value shorthands. Functions (`var()`, `calc()`,
 * `clamp()`) are single tokens: the parser never looks inside parentheses.
 */

export interface SplitValue {
  tokens: string[];
  important: boolean;
}

const IMPORTANT = "!important";

function topLevelNodes(value: string): valueParser.Node[] {
  return valueParser(value.trim()).nodes;
}

export function stripImportant(value: string): { body: string; important: boolean } {
  const raw = value.trim();
  if (raw.toLowerCase().endsWith(IMPORTANT)) {
    return { body: raw.slice(0, -IMPORTANT.length).trim(), important: true };
  }
  return { body: raw, important: false };
}

export function splitValueTokens(value: string): SplitValue {
  const { body, important } = stripImportant(value);
  const tokens = topLevelNodes(body)
    .filter((node) => node.type !== "space" && node.type !== "div")
    .map((node) => valueParser.stringify(node));
  return { tokens, important };
}

/** Splits on a top-level `/` (`"10px 20px / 5px"` → `["10px 20px", "5px"]`). */
export function splitOnSlash(value: string): string[] {
  const groups: valueParser.Node[][] = [[]];
  for (const node of topLevelNodes(value)) {
    if (node.type === "div" && node.value === "/") {
      groups.push([]);
    } else {
      groups[groups.length - 1].push(node);
    }
  }
  return groups.map((nodes) => valueParser.stringify(nodes).trim());
}

export function withImportant(value: string, important: boolean): string {
  return important ? `${value} ${IMPORTANT}` : value;
}

/** CSS 1–4 value box expansion: `[top, right, bottom, left]`; `null` for any other arity. */
export function expandQuadValues(values: readonly string[]): [string, string, string, string] | null {
  if (values.length === 0 || values.length > 4) {
    return null;
  }
  const [top, right = top, bottom = top, left = right] = values;
  return [top, right, bottom, left];
}

/** CSS 1–2 value pair expansion: `[first, second]`; `null` for any other arity. */
export function expandPairValues(values: readonly string[]): [string, string] | null {
  if (values.length === 0 || values.length > 2) {
    return null;
  }
  const [first, second = first] = values;
  return [first, second];
}
