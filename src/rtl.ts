/**
 * Left-to-right output plus optional right-to-left overrides for values that
 * name a logical direction (`float: inline-start`, `background-position: end`).
 */

export interface Declaration {
  property: string;
  value: string;
}

const LOGICAL_VALUE_PROPERTIES = new Set(["float", "clear"]);

const LTR_VALUES: ReadonlyMap<string, string> = new Map([
  ["inline-start", "left"],
  ["inline-end", "right"],
]);

const RTL_VALUES: ReadonlyMap<string, string> = new Map([
  ["inline-start", "right"],
  ["inline-end", "left"],
]);

const LTR_POSITION: ReadonlyMap<string, string> = new Map([
  ["start", "left"],
  ["inline-start", "left"],
  ["end", "right"],
  ["inline-end", "right"],
]);

const RTL_POSITION: ReadonlyMap<string, string> = new Map([
  ["start", "right"],
  ["inline-start", "right"],
  ["end", "left"],
  ["inline-end", "left"],
]);

function mapWords(value: string, mapping: ReadonlyMap<string, string>): string {
  return value
    .split(" ")
    .map((word) => mapping.get(word) ?? word)
    .join(" ");
}

export function ltrDeclaration(property: string, value: string): Declaration {
  if (LOGICAL_VALUE_PROPERTIES.has(property)) {
    return { property, value: LTR_VALUES.get(value) ?? value };
  }
  if (property === "background-position") {
    return { property, value: mapWords(value, LTR_POSITION) };
  }
  return { property, value };
}

/** The right-to-left declaration, or `null` when LTR output is direction-neutral. */
export function rtlDeclaration(property: string, value: string): Declaration | null {
  if (LOGICAL_VALUE_PROPERTIES.has(property)) {
    const flipped = RTL_VALUES.get(value);
    return flipped ? { property, value: flipped } : null;
  }
  if (property === "background-position") {
    const words = value.split(" ");
    if (!words.some((word) => RTL_POSITION.has(word))) {
      return null;
    }
    return { property, value: mapWords(value, RTL_POSITION) };
  }
  return null;
}

/** Splits a selector list at commas outside parentheses. */
function splitSelectorList(selector: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const ch of selector) {
    if (ch === "(") {
      depth++;
    } else if (ch === ")") {
      depth--;
    } else if (ch === "," && depth === 0) {
      parts.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
}

export function rtlSelector(selector: string): string {
  return splitSelectorList(selector)
    .map((part) => `html[dir="rtl"] ${part.trim()}`)
    .join(",");
}
