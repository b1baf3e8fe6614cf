/**
 * Error types raised while compiling style definitions.
 *
 * Unknown references at merge time are not errors; everything here aborts the
 * definition that raised it before anything is written to the manifest.
 */

export type ErrorCode = "CONFIG" | "COMPILE" | "SELECTOR";

export class AtomCssError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid configuration, e.g. an unknown shorthand strategy. */
export class ConfigError extends AtomCssError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export interface CompileErrorContext {
  /** Dotted manifest key of the definition being compiled */
  rule?: string;
  /** CSS property (kebab-case) the error relates to */
  property?: string;
}

/** A declaration that cannot be compiled into CSS. */
export class CompileError extends AtomCssError {
  readonly rule: string | undefined;
  readonly property: string | undefined;

  constructor(message: string, context: CompileErrorContext = {}) {
    super("COMPILE", message);
    this.rule = context.rule;
    this.property = context.property;
  }

  /** Returns a copy of this error annotated with the rule being compiled. */
  withRule(rule: string): CompileError {
    if (this.rule) {
      return this;
    }
    const annotated = new CompileError(`${rule}: ${this.message}`, {
      rule,
      property: this.property,
    });
    annotated.stack = this.stack;
    return annotated;
  }
}

/** Invalid pseudo selector passed to a contextual selector builder. */
export class SelectorError extends AtomCssError {
  constructor(message: string) {
    super("SELECTOR", message);
  }
}

export function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return `Array(${value.length})`;
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "object") {
    return "object";
  }
  return String(value);
}
