import type { ResolvedConfig } from "../config.js";
import { CompileError, describeValue } from "../errors.js";
import { atomicClassName, dynamicVarName } from "../hash.js";
import { formatDeclarations, withVendorPrefixes } from "../prefixer.js";
import { getPriority } from "../priority.js";
import { declarationEntries, isScalar, toCssProperty, type Scalar } from "../types.js";
import { compareStrings } from "../utils.js";
import { toCssValue } from "../value/normalize.js";
import { buildClassString, type AtomicClassMeta, type ClassRule, type DynamicTemplateFn } from "./meta.js";

/**
 * Rules whose values are only known at run time. Each declared property gets
 * one class reading a CSS variable (`opacity: var(--x-opacity)`); the caller
 * sets the variable through the inline style returned by `resolve`.
 */

export class DynamicRule {
  readonly paramNames: readonly string[];
  readonly template: DynamicTemplateFn;

  constructor(paramNames: readonly string[], template: DynamicTemplateFn) {
    this.paramNames = paramNames;
    this.template = template;
  }
}

/**
 * Declares a dynamic rule.
 *
 * ```ts
 * dynamic(["opacity"], (opacity) => ({ opacity }))
 * ```
 */
export function dynamic(paramNames: readonly string[], template: DynamicTemplateFn): DynamicRule {
  return new DynamicRule(paramNames, template);
}

export function isDynamicRule(value: unknown): value is DynamicRule {
  return value instanceof DynamicRule;
}

/** CSS properties a template declares, found by calling it with its parameter names. */
export function templateProperties(rule: DynamicRule): string[] {
  return declarationEntries(rule.template(...rule.paramNames)).map(([property]) => {
    if (property.startsWith(":") || property.startsWith("@")) {
      throw new CompileError(
        `Dynamic rules cannot use condition keys (got \`${property}\`); declare a static rule for conditional styles.`,
      );
    }
    return toCssProperty(property);
  });
}

function compileDynamicProperty(property: string, config: ResolvedConfig): AtomicClassMeta {
  const variable = dynamicVarName(property, config);
  const value = `var(${variable})`;
  const className = atomicClassName(property, value, [], [], config);
  const declarations = withVendorPrefixes({ property, value }, config.autoprefixer);
  return {
    class: className,
    ltr: `.${className}{${formatDeclarations(declarations)}}`,
    rtl: null,
    priority: getPriority(property, null, null),
    value,
    selectorSuffix: null,
    atRule: null,
    dynamicVar: variable,
  };
}

export function compileDynamicRule(rule: DynamicRule, config: ResolvedConfig): ClassRule {
  const atomicClasses = [...new Set(templateProperties(rule))]
    .sort(compareStrings)
    .map((property) => [property, compileDynamicProperty(property, config)] as const);
  return {
    atomicClasses,
    classString: buildClassString(atomicClasses),
    dynamic: true,
    paramNames: [...rule.paramNames],
    template: rule.template,
  };
}

/**
 * Inline variable assignments for one call of a dynamic rule, in declaration
 * order. Without a template the parameters map onto the properties in order.
 */
export function dynamicVariables(
  rule: ClassRule,
  params: readonly Scalar[],
  config: ResolvedConfig,
): Array<readonly [variable: string, value: string]> {
  const declared: Array<readonly [string, unknown]> = rule.template
    ? declarationEntries(rule.template(...params)).map(([property, value]) => [toCssProperty(property), value] as const)
    : rule.atomicClasses.map(([property], i) => [property, params[i]] as const);

  const out: Array<readonly [string, string]> = [];
  for (const [property, value] of declared) {
    if (value === undefined || value === null) {
      continue;
    }
    if (!isScalar(value)) {
      throw new CompileError(
        `Dynamic value for \`${property}\` must be a string or number, received ${describeValue(value)}`,
        { property },
      );
    }
    out.push([dynamicVarName(property, config), toCssValue(value, property, config)]);
  }
  return out;
}
