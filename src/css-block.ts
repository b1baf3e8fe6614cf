/**
 * Reads a CSS declaration block into a declarations object, so rules can be
 * written as CSS text:
 *
 * ```css
 * color: black;
 * &:hover { color: red; }
 * @media (min-width: 800px) { color: blue; }
 * &::before { content: "*"; }
 * ```
 *
 * becomes
 *
 * ```ts
 * {
 *   color: { default: "black", ":hover": "red", "@media (min-width: 800px)": "blue" },
 *   "::before": { content: '"*"' },
 * }
 * ```
 *
 * Parsing goes through stylis.
 */

import { compile } from "stylis";
import type { Element } from "stylis";
import { CompileError } from "./errors.js";
import { DEFAULT_CONDITION } from "./condition/tree.js";

export type BlockValue = string | BlockConditions;

export interface BlockConditions {
  [condition: string]: BlockValue;
}

/** Properties (and `::pseudo` blocks) to values or condition maps. */
export type BlockDeclarations = BlockConditions;

interface Scope {
  /** `::before` when inside a pseudo-element rule */
  pseudoElement: string | null;
  /** At-rules and pseudo-classes from the outermost inwards */
  conditions: string[];
}

function parseStylisDeclaration(raw: string): { property: string; value: string } | null {
  // stylis decl value looks like "color:red;" or "border:2px solid red;"
  const match = raw.trim().match(/^([^:]+):([\s\S]+?);?$/);
  if (!match) {
    return null;
  }
  return { property: match[1].trim(), value: match[2].trim() };
}

/** Splits `:hover:not(:focus)` at top-level colons only. */
function splitSelectorPseudos(suffix: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (let i = 0; i < suffix.length; i++) {
    const ch = suffix[i];
    if (ch === "(") {
      depth++;
    } else if (ch === ")") {
      depth--;
    } else if (ch === ":" && depth === 0 && current !== "" && current !== ":") {
      parts.push(current);
      current = "";
    }
    current += ch;
  }
  if (current !== "") {
    parts.push(current);
  }
  return parts;
}

function nestedScope(scope: Scope, rawSelector: string): Scope {
  // stylis uses `\f` internally to represent nesting boundaries.
  const selector = rawSelector.replaceAll("\f", "").trim();
  // Declarations directly inside a nested at-rule come wrapped in a rule named
  // after the at-rule, carrying the enclosing selector.
  if (selector === "" || selector === "&" || selector.startsWith("@")) {
    return scope;
  }
  if (!selector.startsWith("&:")) {
    throw new CompileError(
      [
        `Unsupported selector \`${selector}\` in CSS block.`,
        "Only `&` followed by pseudo-classes or a pseudo-element is allowed, e.g. `&:hover` or `&::before`.",
      ].join("\n"),
    );
  }

  let pseudoElement = scope.pseudoElement;
  const conditions = [...scope.conditions];
  for (const part of splitSelectorPseudos(selector.slice(1))) {
    if (part.startsWith("::")) {
      if (pseudoElement !== null) {
        throw new CompileError(`Nested pseudo-elements are not supported (\`${pseudoElement}\` and \`${part}\`)`);
      }
      if (conditions.length > 0) {
        throw new CompileError(
          `Pseudo-element \`${part}\` must come before pseudo-classes and at-rules in a CSS block`,
        );
      }
      pseudoElement = part;
    } else {
      conditions.push(part);
    }
  }
  return { pseudoElement, conditions };
}

function setValue(target: BlockConditions, path: readonly string[], value: string): void {
  const [head, ...rest] = path;
  const existing = target[head];
  if (rest.length === 0) {
    if (typeof existing === "object") {
      existing[DEFAULT_CONDITION] = value;
    } else {
      target[head] = value;
    }
    return;
  }
  const conditions: BlockConditions =
    typeof existing === "object" ? existing : existing === undefined ? {} : { [DEFAULT_CONDITION]: existing };
  target[head] = conditions;
  setValue(conditions, rest, value);
}

function blockFor(root: BlockDeclarations, pseudoElement: string | null): BlockConditions {
  if (pseudoElement === null) {
    return root;
  }
  const existing = root[pseudoElement];
  if (typeof existing === "object") {
    return existing;
  }
  const created: BlockConditions = {};
  root[pseudoElement] = created;
  return created;
}

export function parseCssBlock(css: string): BlockDeclarations {
  const root: BlockDeclarations = {};

  const visit = (nodes: readonly Element[], scope: Scope): void => {
    for (const node of nodes) {
      if (node.type === "decl") {
        const parsed = parseStylisDeclaration(String(node.value));
        if (parsed) {
          setValue(blockFor(root, scope.pseudoElement), [parsed.property, ...scope.conditions], parsed.value);
        }
      } else if (node.type === "rule") {
        visit(childElements(node), nestedScope(scope, String(node.value)));
      } else if (node.type.startsWith("@")) {
        const atRule = String(node.value).trim();
        if (node.type !== "@media" && node.type !== "@supports" && node.type !== "@container") {
          throw new CompileError(`Unsupported at-rule \`${atRule}\` in CSS block`);
        }
        visit(childElements(node), { ...scope, conditions: [...scope.conditions, atRule] });
      }
    }
  };

  visit(compile(css), { pseudoElement: null, conditions: [] });
  return root;
}

function childElements(node: Element): Element[] {
  return Array.isArray(node.children) ? node.children : [];
}
