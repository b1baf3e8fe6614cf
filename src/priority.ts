import { loadStringSet } from "./data.js";
import { pseudoPriority } from "./pseudo.js";

/**
 * Cascade priorities of atomic rules.
 *
 * Rules are emitted in ascending priority so that a longhand always wins over
 * the shorthand that contains it, and conditional rules win over defaults.
 */

export type PropertyCategory =
  | "custom-property"
  | "shorthands-of-shorthands"
  | "shorthands-of-longhands"
  | "longhand-logical"
  | "longhand-physical";

const CATEGORY_PRIORITY: Record<PropertyCategory, number> = {
  "custom-property": 1,
  "shorthands-of-shorthands": 1000,
  "shorthands-of-longhands": 2000,
  "longhand-logical": 3000,
  "longhand-physical": 4000,
};

const PRIORITY_TABLE = "property-priorities.json";

interface CategorySets {
  shorthandsOfShorthands: ReadonlySet<string>;
  shorthandsOfLonghands: ReadonlySet<string>;
  longhandPhysical: ReadonlySet<string>;
}

let categories: CategorySets | null = null;

function categorySets(): CategorySets {
  categories ??= {
    shorthandsOfShorthands: loadStringSet(PRIORITY_TABLE, "shorthandsOfShorthands"),
    shorthandsOfLonghands: loadStringSet(PRIORITY_TABLE, "shorthandsOfLonghands"),
    longhandPhysical: loadStringSet(PRIORITY_TABLE, "longhandPhysical"),
  };
  return categories;
}

export function propertyCategory(property: string): PropertyCategory {
  if (property.startsWith("--")) {
    return "custom-property";
  }
  const sets = categorySets();
  if (sets.shorthandsOfShorthands.has(property)) {
    return "shorthands-of-shorthands";
  }
  if (sets.shorthandsOfLonghands.has(property)) {
    return "shorthands-of-longhands";
  }
  if (sets.longhandPhysical.has(property)) {
    return "longhand-physical";
  }
  return "longhand-logical";
}

export function propertyPriority(property: string): number {
  return CATEGORY_PRIORITY[propertyCategory(property)];
}

export function atRulePriority(atRule: string | null): number {
  if (!atRule) {
    return 0;
  }
  if (atRule.startsWith("@supports")) {
    return 30;
  }
  if (atRule.startsWith("@media")) {
    return 200;
  }
  if (atRule.startsWith("@container")) {
    return 300;
  }
  return 0;
}

export function getPriority(
  property: string,
  selectorSuffix: string | null,
  atRule: string | null,
): number {
  return propertyPriority(property) + pseudoPriority(selectorSuffix) + atRulePriority(atRule);
}
