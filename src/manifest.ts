import type { AtomicClassMeta, ClassRule, PropertyMeta } from "./class/meta.js";
import type { ConstValue } from "./consts.js";
import { Logger } from "./internal/logger.js";
import type { KeyframesEntry } from "./keyframes.js";
import type { PositionTryEntry } from "./position-try.js";
import type { ThemeEntry } from "./theme.js";
import { sortedEntries } from "./utils.js";
import type { VarEntry } from "./vars.js";
import type { ViewTransitionEntry } from "./view-transition.js";

/**
 * The registry of everything compiled during one build, keyed by dotted
 * paths (`module.name`, `module.namespace.name`). Every read is ordered by
 * key, so the order definitions were registered in never shows in output.
 */

export interface ManifestCategories {
  vars: VarEntry;
  consts: ConstValue;
  keyframes: KeyframesEntry;
  classes: ClassRule;
  themes: ThemeEntry;
  positionTry: PositionTryEntry;
  viewTransitions: ViewTransitionEntry;
}

export type ManifestCategory = keyof ManifestCategories;

export const MANIFEST_CATEGORIES: readonly ManifestCategory[] = [
  "vars",
  "consts",
  "keyframes",
  "classes",
  "themes",
  "positionTry",
  "viewTransitions",
];

type Stores = { [C in ManifestCategory]: Map<string, ManifestCategories[C]> };

export type ManifestJSON = {
  version: typeof MANIFEST_VERSION;
} & { [C in ManifestCategory]: Record<string, ManifestCategories[C]> };

export type ManifestStats = Record<ManifestCategory, number>;

const MANIFEST_VERSION = 1;

function createStores(): Stores {
  return {
    vars: new Map(),
    consts: new Map(),
    keyframes: new Map(),
    classes: new Map(),
    themes: new Map(),
    positionTry: new Map(),
    viewTransitions: new Map(),
  };
}

/** Dynamic templates and source declarations stay out of persisted manifests. */
function withoutTemplate(rule: ClassRule): ClassRule {
  const { atomicClasses, classString, dynamic, paramNames } = rule;
  return { atomicClasses, classString, dynamic, paramNames };
}

function sameEntry(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export function manifestKey(...parts: string[]): string {
  return parts.join(".");
}

export class Manifest {
  private stores: Stores = createStores();

  /**
   * Registers an entry. Registering the same content twice is a no-op; a
   * different entry under an existing key replaces it and logs a warning.
   */
  put<C extends ManifestCategory>(category: C, key: string, entry: ManifestCategories[C]): void {
    const store: Map<string, ManifestCategories[C]> = this.stores[category];
    const existing = store.get(key);
    if (existing !== undefined && !sameEntry(existing, entry)) {
      Logger.logWarnings([
        {
          severity: "warning",
          type: "Manifest entry replaced by a different definition",
          source: `${category}:${key}`,
        },
      ]);
    }
    store.set(key, entry);
  }

  get<C extends ManifestCategory>(category: C, key: string): ManifestCategories[C] | undefined {
    const store: Map<string, ManifestCategories[C]> = this.stores[category];
    return store.get(key);
  }

  has(category: ManifestCategory, key: string): boolean {
    return this.stores[category].has(key);
  }

  /** Entries of one category sorted by key. */
  entries<C extends ManifestCategory>(category: C): Array<[string, ManifestCategories[C]]> {
    const store: Map<string, ManifestCategories[C]> = this.stores[category];
    return sortedEntries(store);
  }

  /**
   * Union of two manifests. On a key present in both, the entry of `other`
   * wins. Neither input is modified.
   */
  merge(other: Manifest): Manifest {
    const merged = new Manifest();
    for (const source of [this, other]) {
      for (const category of MANIFEST_CATEGORIES) {
        source.copyInto(merged, category);
      }
    }
    return merged;
  }

  private copyInto<C extends ManifestCategory>(target: Manifest, category: C): void {
    for (const [key, entry] of this.entries(category)) {
      target.put(category, key, entry);
    }
  }

  /** Drops every entry; called between builds. */
  reset(): void {
    this.stores = createStores();
  }

  stats(): ManifestStats {
    return {
      vars: this.stores.vars.size,
      consts: this.stores.consts.size,
      keyframes: this.stores.keyframes.size,
      classes: this.stores.classes.size,
      themes: this.stores.themes.size,
      positionTry: this.stores.positionTry.size,
      viewTransitions: this.stores.viewTransitions.size,
    };
  }

  toJSON(): ManifestJSON {
    return {
      version: MANIFEST_VERSION,
      vars: this.categoryJSON("vars"),
      consts: this.categoryJSON("consts"),
      keyframes: this.categoryJSON("keyframes"),
      classes: this.categoryJSON("classes", withoutTemplate),
      themes: this.categoryJSON("themes"),
      positionTry: this.categoryJSON("positionTry"),
      viewTransitions: this.categoryJSON("viewTransitions"),
    };
  }

  private categoryJSON<C extends ManifestCategory>(
    category: C,
    transform: (entry: ManifestCategories[C]) => ManifestCategories[C] = (entry) => entry,
  ): Record<string, ManifestCategories[C]> {
    const out: Record<string, ManifestCategories[C]> = {};
    for (const [key, entry] of this.entries(category)) {
      out[key] = transform(entry);
    }
    return out;
  }

  /**
   * Restores a manifest written by `toJSON`. Entries that do not have the
   * expected shape are rejected.
   */
  static fromJSON(json: unknown): Manifest {
    if (!isRecord(json) || json.version !== MANIFEST_VERSION) {
      throw new Error(`Unsupported manifest: expected an object with "version": ${MANIFEST_VERSION}`);
    }
    const manifest = new Manifest();
    readCategory(manifest, json, "vars", isVarEntry);
    readCategory(manifest, json, "consts", isConstValue);
    readCategory(manifest, json, "keyframes", isKeyframesEntry);
    readCategory(manifest, json, "classes", isClassRule);
    readCategory(manifest, json, "themes", isThemeEntry);
    readCategory(manifest, json, "positionTry", isPositionTryEntry);
    readCategory(manifest, json, "viewTransitions", isViewTransitionEntry);
    return manifest;
  }
}

// ────────────────────────────────────────────────────────────────────────────
// Shape checks for persisted manifests
// ────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readCategory<C extends ManifestCategory>(
  manifest: Manifest,
  json: Record<string, unknown>,
  category: C,
  guard: (value: unknown) => value is ManifestCategories[C],
): void {
  const section = json[category];
  if (section === undefined) {
    return;
  }
  if (!isRecord(section)) {
    throw new Error(`Invalid manifest: "${category}" must be an object`);
  }
  for (const [key, entry] of Object.entries(section)) {
    if (!guard(entry)) {
      throw new Error(`Invalid manifest entry ${category}:${key}`);
    }
    manifest.put(category, key, entry);
  }
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

function isResolvedVarValue(value: unknown): value is VarEntry["value"] {
  return isString(value) || (isRecord(value) && Object.values(value).every(isResolvedVarValue));
}

function isVarEntry(value: unknown): value is VarEntry {
  if (!isRecord(value) || !isString(value.cssName) || !isResolvedVarValue(value.value)) {
    return false;
  }
  const type = value.type;
  return type === null || (isRecord(type) && isString(type.syntax) && typeof type.inherits === "boolean");
}

function isConstValue(value: unknown): value is ConstValue {
  if (value === null || isString(value) || typeof value === "boolean" || typeof value === "number") {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isConstValue);
  }
  return isRecord(value) && Object.values(value).every(isConstValue);
}

function isDeclarationList(value: unknown): value is Array<{ property: string; value: string }> {
  return (
    Array.isArray(value) &&
    value.every((item) => isRecord(item) && isString(item.property) && isString(item.value))
  );
}

function isFrameList(value: unknown): value is KeyframesEntry["frames"] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) => Array.isArray(item) && item.length === 2 && isString(item[0]) && isDeclarationList(item[1]),
    )
  );
}

function isStructuralEntry(value: unknown): value is { cssName: string; ltr: string; priority: 0 } {
  return isRecord(value) && isString(value.cssName) && isString(value.ltr) && value.priority === 0;
}

function isKeyframesEntry(value: unknown): value is KeyframesEntry {
  return isStructuralEntry(value) && "frames" in value && isFrameList(value.frames);
}

function isPositionTryEntry(value: unknown): value is PositionTryEntry {
  return isStructuralEntry(value) && "declarations" in value && isDeclarationList(value.declarations);
}

const VIEW_TRANSITION_PARTS = new Set(["group", "image-pair", "old", "new"]);

function isViewTransitionEntry(value: unknown): value is ViewTransitionEntry {
  return (
    isStructuralEntry(value) &&
    "styles" in value &&
    Array.isArray(value.styles) &&
    value.styles.every(
      (item) =>
        Array.isArray(item) &&
        item.length === 2 &&
        VIEW_TRANSITION_PARTS.has(item[0]) &&
        isDeclarationList(item[1]),
    )
  );
}

function isThemeEntry(value: unknown): value is ThemeEntry {
  return (
    isRecord(value) &&
    isString(value.cssName) &&
    Array.isArray(value.overrides) &&
    value.overrides.every(
      (item) => Array.isArray(item) && item.length === 2 && isString(item[0]) && isResolvedVarValue(item[1]),
    )
  );
}

function isAtomicClassMeta(value: unknown): value is AtomicClassMeta {
  return (
    isRecord(value) &&
    isString(value.class) &&
    isString(value.ltr) &&
    isNullableString(value.rtl) &&
    typeof value.priority === "number" &&
    isString(value.value) &&
    isNullableString(value.selectorSuffix) &&
    isNullableString(value.atRule) &&
    (value.dynamicVar === undefined || isString(value.dynamicVar))
  );
}

function isPropertyMeta(value: unknown): value is PropertyMeta {
  if (isRecord(value) && value.unset === true) {
    return true;
  }
  if (isRecord(value) && Array.isArray(value.classes)) {
    return value.classes.every(
      (item) => Array.isArray(item) && item.length === 2 && isString(item[0]) && isAtomicClassMeta(item[1]),
    );
  }
  return isAtomicClassMeta(value);
}

function isClassRule(value: unknown): value is ClassRule {
  return (
    isRecord(value) &&
    isString(value.classString) &&
    typeof value.dynamic === "boolean" &&
    Array.isArray(value.paramNames) &&
    value.paramNames.every(isString) &&
    Array.isArray(value.atomicClasses) &&
    value.atomicClasses.every(
      (item) => Array.isArray(item) && item.length === 2 && isString(item[0]) && isPropertyMeta(item[1]),
    )
  );
}
