import { lastMediaQueryWins } from "../condition/media-query.js";
import { buildAtomicSelector, wrapInAtRules } from "../condition/selector.js";
import {
  DEFAULT_CONDITION,
  flattenConditions,
  isConditional,
  requireConditional,
  type FlatCondition,
} from "../condition/tree.js";
import type { ResolvedConfig } from "../config.js";
import { CompileError, describeValue } from "../errors.js";
import { atomicClassName } from "../hash.js";
import { formatDeclarations, withVendorPrefixes } from "../prefixer.js";
import { getPriority } from "../priority.js";
import { validateProperty } from "../property-validation.js";
import { isPseudoElement, sortPseudos, splitPseudos } from "../pseudo.js";
import { ltrDeclaration, rtlDeclaration, rtlSelector, type Declaration } from "../rtl.js";
import {
  declarationEntries,
  isConditionMap,
  toCssProperty,
  type Declarations,
  type LeafValue,
  type StyleValue,
} from "../types.js";
import { compareStrings } from "../utils.js";
import { resolveLeafValue } from "../value/fallback.js";
import { DeclarationMerger } from "./declaration-merger.js";
import {
  UNSET,
  buildClassString,
  type AtomicClassMeta,
  type ClassRule,
  type PropertyMeta,
} from "./meta.js";

// ────────────────────────────────────────────────────────────────────────────
// Single declarations
// ────────────────────────────────────────────────────────────────────────────

/** Pseudos as they enter the class-name hash. Functional suffixes count as one. */
function hashPseudos(suffix: string | null): string[] {
  if (!suffix) {
    return [];
  }
  if (suffix.includes("(")) {
    return [suffix];
  }
  return sortPseudos(splitPseudos(suffix));
}

function ruleText(selector: string, declarations: Declaration[], config: ResolvedConfig): string {
  const expanded = declarations.flatMap((decl) => withVendorPrefixes(decl, config.autoprefixer));
  return `${selector}{${formatDeclarations(expanded)}}`;
}

export type ConditionScope = Pick<FlatCondition, "pseudos" | "atRules">;

/**
 * Builds the atomic class of one `(property, value)` pair. Pseudos of the scope
 * go onto the selector, at-rules wrap the rule.
 */
export function compileAtomicClass(
  property: string,
  value: Exclude<LeafValue, null>,
  scope: ConditionScope,
  config: ResolvedConfig,
): AtomicClassMeta {
  const resolved = resolveLeafValue(value, property, config);
  const suffix = scope.pseudos.length > 0 ? scope.pseudos.join("") : null;
  const atRule = scope.atRules.length > 0 ? scope.atRules.join("") : null;
  const className = atomicClassName(
    property,
    resolved.hashValue,
    hashPseudos(suffix),
    [...scope.atRules].sort(compareStrings),
    config,
  );

  const selector = buildAtomicSelector(className, suffix, atRule !== null);
  const ltr = wrapInAtRules(
    scope.atRules,
    ruleText(
      selector,
      resolved.values.map((text) => ltrDeclaration(property, text)),
      config,
    ),
  );

  const rtlDeclarations = resolved.values.flatMap((text) => rtlDeclaration(property, text) ?? []);
  const rtl =
    rtlDeclarations.length > 0
      ? wrapInAtRules(scope.atRules, ruleText(rtlSelector(selector), rtlDeclarations, config))
      : null;

  return {
    class: className,
    ltr,
    rtl,
    priority: getPriority(property, suffix, atRule),
    value: resolved.hashValue,
    selectorSuffix: suffix,
    atRule,
  };
}

function compareAtomic(a: AtomicClassMeta, b: AtomicClassMeta): number {
  return a.priority - b.priority || compareStrings(a.class, b.class);
}

/**
 * Compiles the final value of one property. Values declared inside a
 * pseudo-element block are compiled as if every condition path started with
 * that pseudo-element.
 */
export function compileProperty(
  property: string,
  pseudoElement: string | null,
  value: StyleValue,
  config: ResolvedConfig,
): PropertyMeta {
  if (value === null) {
    return UNSET;
  }
  const scoped: StyleValue = pseudoElement ? { [pseudoElement]: value } : value;
  const tree = isConditionMap(scoped) ? lastMediaQueryWins(scoped) : scoped;
  const flat = flattenConditions(tree, property);

  if (!isConditional(value)) {
    const [only] = flat;
    if (!only || only.value === null) {
      return UNSET;
    }
    return compileAtomicClass(property, only.value, only, config);
  }

  const classes: Array<readonly [string, AtomicClassMeta]> = [];
  for (const condition of flat) {
    const leaf = condition.value;
    if (leaf === null) {
      continue;
    }
    classes.push([condition.path ?? DEFAULT_CONDITION, compileAtomicClass(property, leaf, condition, config)]);
  }
  if (classes.length === 0) {
    return UNSET;
  }
  classes.sort(([, a], [, b]) => compareAtomic(a, b));
  return { classes };
}

// ────────────────────────────────────────────────────────────────────────────
// Rules
// ────────────────────────────────────────────────────────────────────────────

function addDeclaration(
  merger: DeclarationMerger,
  declared: string,
  value: StyleValue,
  pseudoElement: string | null,
  config: ResolvedConfig,
): void {
  const { shorthandStrategy: strategy, shorthandOptions: options } = config;
  const cssProperty = toCssProperty(declared);
  validateProperty(cssProperty, config);
  if (isConditionMap(value)) {
    const conditions = requireConditional(value, cssProperty);
    for (const [property, expanded] of strategy.expandConditions(
      declared,
      cssProperty,
      conditions,
      options,
    )) {
      merger.add(property, pseudoElement, expanded);
    }
    return;
  }
  for (const [property, expanded] of strategy.expand(cssProperty, value, options)) {
    merger.add(property, pseudoElement, expanded);
  }
}

function addPseudoElementBlock(
  merger: DeclarationMerger,
  pseudoElement: string,
  block: StyleValue,
  config: ResolvedConfig,
): void {
  if (!isConditionMap(block) || isConditional(block)) {
    throw new CompileError(
      [
        `Invalid \`${pseudoElement}\` block: expected an object of declarations, received ${describeValue(block)}.`,
        `Example: { "${pseudoElement}": { content: '""', color: "red" } }`,
      ].join("\n"),
    );
  }
  for (const [declared, value] of declarationEntries(block)) {
    addDeclaration(merger, declared, value, pseudoElement, config);
  }
}

function legacyConditionError(key: string): CompileError {
  return new CompileError(
    [
      `Top-level condition keys like \`${key}\` are not supported.`,
      "Move the condition inside each property value instead:",
      `  { color: { default: "black", "${key}": "red" } }`,
    ].join("\n"),
  );
}

/** Compiles one static rule into its atomic classes. */
export function compileRule(declarations: Declarations, config: ResolvedConfig): ClassRule {
  const merger = new DeclarationMerger();
  for (const [declared, value] of declarationEntries(declarations)) {
    if (isPseudoElement(declared)) {
      addPseudoElementBlock(merger, declared, value, config);
    } else if (declared.startsWith(":") || declared.startsWith("@")) {
      throw legacyConditionError(declared);
    } else {
      addDeclaration(merger, declared, value, null, config);
    }
  }

  const atomicClasses: Array<readonly [string, PropertyMeta]> = merger
    .entries()
    .map(([key, pending]) => [
      key,
      compileProperty(pending.property, pending.pseudoElement, pending.value, config),
    ] as const)
    .sort(([a], [b]) => compareStrings(a, b));

  return {
    atomicClasses,
    classString: buildClassString(atomicClasses),
    dynamic: false,
    paramNames: [],
    declarations,
  };
}
