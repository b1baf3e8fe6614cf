import { CompileError, describeValue } from "./errors.js";

/**
 * Compile-time constants. Stored as given and never emitted as CSS.
 */

export type ConstValue =
  | string
  | number
  | boolean
  | null
  | readonly ConstValue[]
  | { readonly [key: string]: ConstValue };

function isJsonCompatible(value: unknown): value is ConstValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonCompatible);
  }
  if (typeof value === "object") {
    return Object.values(value).every(isJsonCompatible);
  }
  return false;
}

/** Validates a constant and stores a frozen copy. */
export function compileConst(key: string, value: unknown): ConstValue {
  if (!isJsonCompatible(value)) {
    throw new CompileError(
      `Constant \`${key}\` must be JSON-compatible (strings, finite numbers, booleans, null, arrays, objects), received ${describeValue(value)}`,
      { rule: key },
    );
  }
  return deepFreeze(structuredClone(value));
}

function deepFreeze<T extends ConstValue>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
    Object.freeze(value);
  }
  return value;
}
