import { DEFAULT_CONDITION, isConditional } from "../condition/tree.js";
import type { ConditionMap, StyleValue } from "../types.js";

/**
 * Collects the declarations of one rule. A property declared twice (directly,
 * or through a shorthand expansion) is combined instead of duplicated:
 *
 * - simple then simple: the later value wins
 * - conditional then conditional: the maps are merged, later keys win
 * - conditional then simple: the simple value becomes the new default
 * - simple then conditional: the simple value is the default unless the map has one
 */

export interface PendingDeclaration {
  readonly property: string;
  /** `::before` etc. when declared inside a pseudo-element block */
  readonly pseudoElement: string | null;
  readonly value: StyleValue;
}

export function mergeConditionMaps(base: ConditionMap, next: ConditionMap): ConditionMap {
  const merged: Record<string, StyleValue | undefined> = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const existing = merged[key];
    merged[key] =
      isConditional(existing) && isConditional(value) ? mergeConditionMaps(existing, value) : value;
  }
  return merged;
}

export function mergeValues(existing: StyleValue, next: StyleValue): StyleValue {
  const existingConditional = isConditional(existing);
  const nextConditional = isConditional(next);
  if (existingConditional && nextConditional) {
    return mergeConditionMaps(existing, next);
  }
  if (existingConditional) {
    return { ...existing, [DEFAULT_CONDITION]: next };
  }
  if (nextConditional) {
    return DEFAULT_CONDITION in next ? next : { [DEFAULT_CONDITION]: existing, ...next };
  }
  return next;
}

export class DeclarationMerger {
  private readonly pending = new Map<string, PendingDeclaration>();

  add(property: string, pseudoElement: string | null, value: StyleValue): void {
    const key = pseudoElement ? property + pseudoElement : property;
    const existing = this.pending.get(key);
    this.pending.set(key, {
      property,
      pseudoElement,
      value: existing ? mergeValues(existing.value, value) : value,
    });
  }

  /** Pending declarations keyed by `property` or `property::pseudo-element`. */
  entries(): Array<[string, PendingDeclaration]> {
    return [...this.pending.entries()];
  }
}
