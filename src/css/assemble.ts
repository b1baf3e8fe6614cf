import { metaClasses, type AtomicClassMeta } from "../class/meta.js";
import { Logger } from "../internal/logger.js";
import { MANIFEST_CATEGORIES, type Manifest } from "../manifest.js";
import { themeCss } from "../theme.js";
import { compareStrings, uniq } from "../utils.js";
import { propertyRule, rootVarsCss } from "../vars.js";

/**
 * Serializes a manifest into one stylesheet. Sections are separated by a
 * blank line and always appear in the same order:
 *
 *   1. `:root` variables
 *   2. `@property` registrations
 *   3. theme classes
 *   4. atomic classes (by priority, then class name), RTL overrides last
 *   5. `@keyframes`
 *   6. `@position-try`
 *   7. view transitions
 */

export interface AssembleOptions {
  /** Prepend a comment with entry counts per manifest category. */
  stats?: boolean;
  /** Wrap atomic rules in `@layer priorityN` blocks. */
  useCssLayers?: boolean;
}

export const RTL_COMMENT = "/* RTL Overrides */";

function statsComment(manifest: Manifest): string {
  const stats = manifest.stats();
  const counts = MANIFEST_CATEGORIES.map((category) => `${category}: ${stats[category]}`);
  return `/* atomcss | ${counts.join(", ")} */`;
}

function propertyRules(manifest: Manifest): string[] {
  const typed = manifest
    .entries("vars")
    .map(([, entry]) => propertyRule(entry))
    .filter((rule): rule is string => rule !== null);
  const dynamic = uniq(
    collectAtoms(manifest).flatMap((atom) => (atom.dynamicVar ? [atom.dynamicVar] : [])),
  )
    .sort(compareStrings)
    .map((variable) => `@property ${variable} { syntax: "*"; inherits: false; }`);
  return [...typed, ...dynamic];
}

function collectAtoms(manifest: Manifest): AtomicClassMeta[] {
  return manifest
    .entries("classes")
    .flatMap(([, rule]) => rule.atomicClasses.flatMap(([, meta]) => metaClasses(meta)));
}

/**
 * One atom per class name, sorted by priority then class. Two atoms sharing
 * a class name but not their CSS means the hash collided.
 */
export function uniqueAtoms(manifest: Manifest): AtomicClassMeta[] {
  const byClass = new Map<string, AtomicClassMeta>();
  for (const atom of collectAtoms(manifest)) {
    const seen = byClass.get(atom.class);
    if (!seen) {
      byClass.set(atom.class, atom);
    } else if (seen.ltr !== atom.ltr) {
      Logger.logWarnings([
        {
          severity: "warning",
          type: "Atomic class emitted with different declarations (hash collision)",
          source: atom.class,
          context: { kept: seen.ltr, dropped: atom.ltr },
        },
      ]);
    }
  }
  return [...byClass.values()].sort(
    (a, b) => a.priority - b.priority || compareStrings(a.class, b.class),
  );
}

function atomicCss(atoms: readonly AtomicClassMeta[]): string {
  const ltr = atoms.map((atom) => atom.ltr).join("\n");
  const rtl = atoms.flatMap((atom) => (atom.rtl ? [atom.rtl] : []));
  return rtl.length > 0 ? `${ltr}\n\n${RTL_COMMENT}\n${rtl.join("\n")}` : ltr;
}

/**
 * Groups atoms by priority band (custom properties, shorthands, longhands,
 * ...). Layers are numbered in band order from 1, so later layers win.
 */
function layeredCss(atoms: readonly AtomicClassMeta[]): string {
  const bands = new Map<number, AtomicClassMeta[]>();
  for (const atom of atoms) {
    const band = Math.floor(atom.priority / 1000);
    bands.set(band, [...(bands.get(band) ?? []), atom]);
  }
  const groups = [...bands.entries()].sort(([a], [b]) => a - b).map(([, group]) => group);
  const names = groups.map((_, i) => `priority${i + 1}`);
  const blocks = groups.map((group, i) => {
    const body = [...group.map((atom) => atom.ltr), ...group.flatMap((atom) => (atom.rtl ? [atom.rtl] : []))];
    return `@layer ${names[i]}{\n${body.join("\n")}\n}`;
  });
  return `@layer ${names.join(", ")};\n${blocks.join("\n")}`;
}

export function assembleCss(manifest: Manifest, options: AssembleOptions = {}): string {
  const atoms = uniqueAtoms(manifest);
  const themes = manifest
    .entries("themes")
    .map(([, entry]) => entry)
    .sort((a, b) => compareStrings(a.cssName, b.cssName));

  const sections = [
    rootVarsCss(manifest.entries("vars").map(([, entry]) => entry)).join("\n"),
    propertyRules(manifest).join("\n"),
    themes.flatMap(themeCss).join("\n"),
    atoms.length === 0 ? "" : options.useCssLayers ? layeredCss(atoms) : atomicCss(atoms),
    uniq(manifest.entries("keyframes").map(([, entry]) => entry.ltr)).join("\n"),
    uniq(manifest.entries("positionTry").map(([, entry]) => entry.ltr)).join("\n"),
    uniq(manifest.entries("viewTransitions").map(([, entry]) => entry.ltr)).join("\n"),
  ].filter((section) => section !== "");

  if (options.stats) {
    sections.unshift(statsComment(manifest));
  }
  return sections.join("\n\n");
}
