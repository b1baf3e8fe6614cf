import { loadStringMap } from "../data.js";
import { defineStrategy, isExcluded } from "./strategy.js";

/**
 * Default strategy: shorthands are emitted as written. Legacy and
 * non-standard aliases are rewritten to the property browsers understand.
 */

let aliases: ReadonlyMap<string, string> | null = null;

export function standardPropertyName(property: string): string {
  aliases ??= loadStringMap("property-aliases.json");
  return aliases.get(property) ?? property;
}

export const keepShorthands = defineStrategy("keep-shorthands", (property, value, options) => {
  if (isExcluded(property, options)) {
    return [[property, value]];
  }
  return [[standardPropertyName(property), value]];
});
