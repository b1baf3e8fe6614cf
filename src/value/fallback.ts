import { CompileError, describeValue } from "../errors.js";
import { FirstThatWorks, isFallbackList, type LeafValue, type Scalar } from "../types.js";
import { toCssValue, type ValueOptions } from "./normalize.js";

/**
 * Resolution of leaf values into declaration text.
 *
 * A resolved value has one text used for hashing and one or more declaration
 * values emitted in order (`color:var(--c);color:red`).
 */

export interface ResolvedValue {
  /** Text fed to the class-name hash */
  hashValue: string;
  /** Declaration values, emitted in this order */
  values: string[];
}

export function isCssVar(value: string): boolean {
  return value.startsWith("var(") && value.endsWith(")");
}

function varName(value: string): string {
  return value.slice(4, -1);
}

/**
 * Folds a list of variable names (innermost first) into one expression:
 * `["red", "--b", "--a"]` → `var(--a,var(--b,red))`.
 */
export function composeVars(parts: readonly string[]): string {
  let soFar = "";
  for (const part of parts) {
    const isVarName = part.startsWith("--");
    if (soFar === "") {
      soFar = isVarName ? `var(${part})` : part;
    } else if (isVarName) {
      soFar = `var(${part},${soFar})`;
    }
  }
  return soFar;
}

function lastIndexWhere<T>(items: readonly T[], predicate: (item: T) => boolean): number {
  for (let i = items.length - 1; i >= 0; i--) {
    if (predicate(items[i])) {
      return i;
    }
  }
  return -1;
}

/**
 * Plain fallback arrays.
 *
 * Values before the first `var()` become the fallback of the variable chain;
 * values after the last `var()` stay as separate declarations, which is what
 * a browser does with repeated declarations anyway.
 */
export function variableFallbacks(values: readonly string[]): string[] {
  const firstVar = values.findIndex(isCssVar);
  if (firstVar === -1) {
    return [...values];
  }
  const lastVar = lastIndexWhere(values, isCssVar);
  const before = values.slice(0, firstVar);
  const names = values
    .slice(firstVar, lastVar + 1)
    .reverse()
    .map((value) => (isCssVar(value) ? varName(value) : value));
  const after = values.slice(lastVar + 1);

  const nested =
    before.length === 0
      ? [composeVars(names)]
      : before.map((value) => composeVars([value, ...names]));
  return [...nested, ...after];
}

function composeVarRun(values: readonly string[]): string {
  const firstNonVar = values.findIndex((value) => !isCssVar(value));
  const run = firstNonVar === -1 ? values : values.slice(0, firstNonVar + 1);
  return composeVars(
    [...run].reverse().map((value) => (isCssVar(value) ? varName(value) : value)),
  );
}

/**
 * `firstThatWorks(a, b, c)`: the first candidate is the most preferred one, so
 * without variables the order is reversed (the last declaration wins in CSS).
 */
export function firstThatWorksValues(values: readonly string[]): string[] {
  const firstVar = values.findIndex(isCssVar);
  if (firstVar === -1) {
    return [...values].reverse();
  }
  if (firstVar === 0) {
    return [composeVarRun(values)];
  }
  const preferred = values.slice(0, firstVar).reverse();
  return [composeVarRun(values.slice(firstVar)), ...preferred];
}

function normalizeList(
  values: readonly Scalar[],
  property: string,
  options: ValueOptions,
): string[] {
  return values.map((value) => {
    if (typeof value !== "string" && typeof value !== "number") {
      throw new CompileError(
        `A fallback array for \`${property}\` can only contain strings or numbers, got: ${describeValue(value)}`,
        { property },
      );
    }
    return toCssValue(value, property, options);
  });
}

/** Resolves a non-null leaf value for `property`. */
export function resolveLeafValue(
  value: Exclude<LeafValue, null>,
  property: string,
  options: ValueOptions = {},
): ResolvedValue {
  if (value instanceof FirstThatWorks) {
    const normalized = normalizeList(value.values, property, options);
    return { hashValue: normalized.join(", "), values: firstThatWorksValues(normalized) };
  }
  if (isFallbackList(value)) {
    const normalized = normalizeList(value, property, options);
    return { hashValue: normalized.join(", "), values: variableFallbacks(normalized) };
  }
  const css = toCssValue(value, property, options);
  return { hashValue: css, values: [css] };
}
