import { CompileError } from "../errors.js";
import { manifestKey } from "../manifest.js";
import { declarationEntries, type DeclarationEntry, type Declarations } from "../types.js";

/**
 * Style composition: a rule that starts from the declarations of other rules
 * and declares its own on top.
 *
 * ```ts
 * compiler.defineRules("app/button", {
 *   base: { display: "flex", padding: "8px" },
 *   primary: include(["base", "app/theme.accent"], { color: "white" }),
 * });
 * ```
 */

export type IncludeRef = string | { readonly module: string; readonly name: string };

export class ComposedRule {
  readonly include: readonly IncludeRef[];
  readonly declarations: Declarations;

  constructor(include: readonly IncludeRef[], declarations: Declarations) {
    this.include = include;
    this.declarations = declarations;
  }
}

function isRefList(refs: IncludeRef | readonly IncludeRef[]): refs is readonly IncludeRef[] {
  return Array.isArray(refs);
}

export function include(refs: IncludeRef | readonly IncludeRef[], declarations: Declarations = {}): ComposedRule {
  return new ComposedRule(isRefList(refs) ? refs : [refs], declarations);
}

export function isComposedRule(value: unknown): value is ComposedRule {
  return value instanceof ComposedRule;
}

/** Returns the resolved declarations of a rule key, `undefined` when unknown. */
export type IncludeLookup = (key: string) => Declarations | undefined;

/** `"base"` names a rule of the same module; dotted strings and objects are full keys. */
export function includeKey(ref: IncludeRef, moduleId: string): string {
  if (typeof ref !== "string") {
    return manifestKey(ref.module, ref.name);
  }
  return ref.includes(".") ? ref : manifestKey(moduleId, ref);
}

/**
 * Flattens a composed rule into one declaration list: included rules in order,
 * then the rule's own declarations. A later declaration of the same key
 * replaces the earlier one whole. Included rules were flattened when they were
 * defined, so nested includes come along.
 */
export function resolveIncludes(rule: ComposedRule, moduleId: string, lookup: IncludeLookup): DeclarationEntry[] {
  const merged = new Map<string, DeclarationEntry[1]>();
  const sources = rule.include.map((ref) => {
    const key = includeKey(ref, moduleId);
    const declarations = lookup(key);
    if (declarations === undefined) {
      throw new CompileError(
        [
          `Cannot include \`${key}\`: rule not found.`,
          "Included rules must be static rules defined before the rule that includes them.",
        ].join("\n"),
      );
    }
    return declarations;
  });
  for (const declarations of [...sources, rule.declarations]) {
    for (const [property, value] of declarationEntries(declarations)) {
      merged.delete(property);
      merged.set(property, value);
    }
  }
  return [...merged];
}
