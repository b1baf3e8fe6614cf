import { loadStringListMap } from "../data.js";
import { CompileError } from "../errors.js";
import { standardPropertyName } from "./keep.js";
import { defineStrategy, isExcluded } from "./strategy.js";

/**
 * Strict strategy: shorthands whose longhands cannot be reasoned about
 * independently are refused at compile time.
 */

let rejected: ReadonlyMap<string, readonly string[]> | null = null;

export function rejectedLonghands(property: string): readonly string[] | null {
  rejected ??= loadStringListMap("rejected-shorthands.json");
  return rejected.get(property) ?? null;
}

export const rejectShorthands = defineStrategy("reject-shorthands", (property, value, options) => {
  const longhands = isExcluded(property, options) ? null : rejectedLonghands(property);
  if (longhands) {
    throw new CompileError(
      [
        `The shorthand property \`${property}\` is not allowed with the reject-shorthands strategy.`,
        `Use longhand properties instead: ${longhands.join(", ")}`,
      ].join("\n"),
      { property },
    );
  }
  return [[standardPropertyName(property), value]];
});
