import { CompileError } from "./errors.js";
import { themeName } from "./hash.js";
import type { StyleValue } from "./types.js";
import { compareStrings } from "./utils.js";
import { isCssVar } from "./value/fallback.js";
import type { ValueOptions } from "./value/normalize.js";
import {
  flattenVarValue,
  resolveVarValue,
  type ResolvedVarValue,
  type VarDeclaration,
  type VarsRef,
} from "./vars.js";

/**
 * Theme classes: override a subset of a variable group on any element the
 * class is applied to. Variables the theme does not mention keep their
 * `:root` value.
 */

export interface ThemeEntry {
  readonly cssName: string;
  /** Sorted by variable name */
  readonly overrides: ReadonlyArray<readonly [varCssName: string, value: ResolvedVarValue]>;
}

export type ThemeOverrides<K extends string = string> = {
  readonly [name in K]?: StyleValue;
};

function cssNameOf(reference: string): string | null {
  return isCssVar(reference) ? reference.slice(4, -1) : null;
}

export function compileTheme(
  moduleId: string,
  name: string,
  vars: VarsRef,
  overrides: ThemeOverrides,
  options: ValueOptions = {},
): ThemeEntry {
  const resolved: Array<readonly [string, ResolvedVarValue]> = [];
  for (const [varKey, value] of Object.entries(overrides)) {
    const reference = Object.hasOwn(vars, varKey) ? vars[varKey] : undefined;
    const cssName = reference === undefined ? null : cssNameOf(reference);
    if (cssName === null) {
      throw new CompileError(
        [
          `Theme \`${name}\` overrides unknown variable \`${varKey}\`.`,
          `Known variables: ${Object.keys(vars).sort(compareStrings).join(", ") || "(none)"}`,
        ].join("\n"),
        { property: varKey },
      );
    }
    if (value !== undefined) {
      resolved.push([cssName, resolveVarValue(value, cssName, options)]);
    }
  }
  resolved.sort(([a], [b]) => compareStrings(a, b));
  return { cssName: themeName(moduleId, name), overrides: resolved };
}

function conditionKey(atRules: readonly string[]): string {
  return atRules.join("\u0000");
}

/**
 * `.t1,.t1:root{--a:1;}` per condition path. Conditions wrap in declared order,
 * the outermost declared condition outermost.
 */
export function themeCss(entry: ThemeEntry): string[] {
  const groups = new Map<string, VarDeclaration[]>();
  for (const [cssName, value] of entry.overrides) {
    for (const declaration of flattenVarValue(cssName, value)) {
      const key = conditionKey(declaration.atRules);
      groups.set(key, [...(groups.get(key) ?? []), declaration]);
    }
  }

  const selector = `.${entry.cssName},.${entry.cssName}:root`;
  return [...groups.values()]
    .sort(
      (a, b) =>
        a[0].atRules.length - b[0].atRules.length ||
        compareStrings(conditionKey(a[0].atRules), conditionKey(b[0].atRules)),
    )
    .map((declarations) => {
      const body = [...declarations]
        .sort((a, b) => compareStrings(a.name, b.name))
        .map(({ name, value }) => `${name}:${value};`)
        .join("");
      return [...declarations[0].atRules]
        .reverse()
        .reduce((inner, atRule) => `${atRule}{${inner}}`, `${selector}{${body}}`);
    });
}
