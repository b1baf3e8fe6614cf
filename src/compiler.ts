import { compileDynamicRule, isDynamicRule, type DynamicRule } from "./class/dynamic.js";
import { compileRule } from "./class/compile.js";
import { isComposedRule, resolveIncludes, type ComposedRule, type IncludeLookup } from "./class/include.js";
import type { ClassRule } from "./class/meta.js";
import { resolveConfig, type AtomCssConfig, type ResolvedConfig } from "./config.js";
import { compileConst, type ConstValue } from "./consts.js";
import { parseCssBlock } from "./css-block.js";
import { assembleCss } from "./css/assemble.js";
import { CompileError } from "./errors.js";
import { compileKeyframes, type Frames } from "./keyframes.js";
import { Manifest, manifestKey } from "./manifest.js";
import { defaultMarker, defineMarker, type Marker } from "./marker.js";
import { resolve, type DynamicCall, type ResolveOptions, type ResolvedAttrs, type StyleRef } from "./merge.js";
import { compilePositionTry, type PositionTryDeclarations } from "./position-try.js";
import { compileTheme, type ThemeOverrides } from "./theme.js";
import type { Declarations, Scalar } from "./types.js";
import { compileVars, type VarDefinition, type VarsRef } from "./vars.js";
import { compileViewTransition, type ViewTransitionStyles } from "./view-transition.js";
import { createWhen, type When } from "./when.js";

/**
 * One build: a manifest, the config it is compiled under, and every define
 * operation. Independent compilers combine through `manifest.merge()`.
 */

/** A rule body: declarations, a CSS block, a composed rule, or a dynamic rule. */
export type RuleDefinition = Declarations | string | ComposedRule | DynamicRule;

/** What `defineRules` hands back for each rule. */
export type RuleHandle<D> = D extends DynamicRule ? (...params: Scalar[]) => DynamicCall : string;

export type RulesRef<T> = { readonly [K in keyof T]: RuleHandle<T[K]> };

export interface CssOptions {
  /** Prepend a comment with entry counts. */
  stats?: boolean;
}

export interface Compiler {
  readonly config: ResolvedConfig;
  readonly manifest: Manifest;
  readonly when: When;

  defineRules<T extends Record<string, RuleDefinition>>(moduleId: string, rules: T): RulesRef<T>;
  defineVars<K extends string>(
    moduleId: string,
    namespace: string,
    vars: Readonly<Record<K, VarDefinition>>,
  ): VarsRef<K>;
  defineConsts<T extends Record<string, ConstValue>>(moduleId: string, namespace: string, consts: T): Readonly<T>;
  getConst(key: string): ConstValue | undefined;
  createTheme<K extends string>(
    moduleId: string,
    name: string,
    vars: VarsRef<K>,
    overrides: ThemeOverrides<K>,
  ): string;
  keyframes(moduleId: string, name: string, frames: Frames): string;
  positionTry(moduleId: string, name: string, declarations: PositionTryDeclarations): string;
  viewTransition(moduleId: string, name: string, styles: ViewTransitionStyles): string;
  defaultMarker(): Marker;
  defineMarker(name: string): Marker;

  resolve(refs: StyleRef | readonly StyleRef[], options?: ResolveOptions): ResolvedAttrs;
  css(options?: CssOptions): string;
  /** Drops everything compiled so far. */
  reset(): void;
}

type Handle = string | ((...params: Scalar[]) => DynamicCall);

function isResolvedConfig(config: AtomCssConfig | ResolvedConfig): config is ResolvedConfig {
  return "shorthandOptions" in config;
}

function matchesRules<T extends Record<string, RuleDefinition>>(
  handles: Record<string, Handle>,
  rules: T,
): handles is Record<string, Handle> & RulesRef<T> {
  return Object.entries(rules).every(([name, definition]) =>
    isDynamicRule(definition) ? typeof handles[name] === "function" : typeof handles[name] === "string",
  );
}

function hasVarNames<K extends string>(
  ref: VarsRef,
  vars: Readonly<Record<K, VarDefinition>>,
): ref is VarsRef & VarsRef<K> {
  return Object.keys(vars).every((name) => Object.hasOwn(ref, name));
}

/**
 * Runs `compile` and annotates a compile error with the definition's key.
 * Nothing reaches the manifest unless every entry compiled.
 */
function compiling<T>(key: string, compile: () => T): T {
  try {
    return compile();
  } catch (error) {
    if (error instanceof CompileError) {
      throw error.withRule(key);
    }
    throw error;
  }
}

export function createCompiler(config: AtomCssConfig | ResolvedConfig = {}): Compiler {
  const resolved = isResolvedConfig(config) ? config : resolveConfig(config);
  const manifest = new Manifest();
  const marker = defaultMarker(resolved);

  // Writes are queued until every entry of a define call has compiled.
  const commit = (writes: ReadonlyArray<() => void>): void => {
    for (const write of writes) {
      write();
    }
  };

  const compileRuleDefinition = (definition: RuleDefinition, moduleId: string, lookup: IncludeLookup): ClassRule => {
    if (isDynamicRule(definition)) {
      return compileDynamicRule(definition, resolved);
    }
    if (isComposedRule(definition)) {
      return compileRule(resolveIncludes(definition, moduleId, lookup), resolved);
    }
    return compileRule(typeof definition === "string" ? parseCssBlock(definition) : definition, resolved);
  };

  return {
    config: resolved,
    manifest,
    when: createWhen(marker),

    defineRules<T extends Record<string, RuleDefinition>>(moduleId: string, rules: T): RulesRef<T> {
      const pending: Array<() => void> = [];
      const handles: Record<string, Handle> = {};
      // Rules of this call are not in the manifest yet but can already be included.
      const local = new Map<string, Declarations>();
      const lookup: IncludeLookup = (key) => local.get(key) ?? manifest.get("classes", key)?.declarations;
      for (const [name, definition] of Object.entries(rules)) {
        const key = manifestKey(moduleId, name);
        const rule = compiling(key, () => compileRuleDefinition(definition, moduleId, lookup));
        if (rule.declarations) {
          local.set(key, rule.declarations);
        }
        pending.push(() => manifest.put("classes", key, rule));
        handles[name] = rule.dynamic ? (...params: Scalar[]) => ({ rule: key, params }) : key;
      }
      if (!matchesRules(handles, rules)) {
        throw new Error(`Rule handles of ${moduleId} do not match its definitions`);
      }
      commit(pending);
      return handles;
    },

    defineVars<K extends string>(moduleId: string, namespace: string, vars: Readonly<Record<K, VarDefinition>>) {
      const compiled = compiling(manifestKey(moduleId, namespace), () =>
        compileVars(moduleId, namespace, vars, resolved),
      );
      const { ref } = compiled;
      if (!hasVarNames(ref, vars)) {
        throw new Error(`Variables of ${manifestKey(moduleId, namespace)} do not match their definitions`);
      }
      commit(
        compiled.entries.map(
          ([name, entry]) => () => manifest.put("vars", manifestKey(moduleId, namespace, name), entry),
        ),
      );
      return ref;
    },

    defineConsts<T extends Record<string, ConstValue>>(moduleId: string, namespace: string, consts: T) {
      const pending: Array<() => void> = [];
      for (const [name, value] of Object.entries(consts)) {
        const key = manifestKey(moduleId, namespace, name);
        const stored = compileConst(key, value);
        pending.push(() => manifest.put("consts", key, stored));
      }
      commit(pending);
      return Object.freeze({ ...consts });
    },

    getConst(key) {
      return manifest.get("consts", key);
    },

    createTheme<K extends string>(moduleId: string, name: string, vars: VarsRef<K>, overrides: ThemeOverrides<K>) {
      const key = manifestKey(moduleId, name);
      const entry = compiling(key, () => compileTheme(moduleId, name, vars, overrides, resolved));
      manifest.put("themes", key, entry);
      return entry.cssName;
    },

    keyframes(moduleId, name, frames) {
      const key = manifestKey(moduleId, name);
      const entry = compiling(key, () => compileKeyframes(frames, resolved));
      manifest.put("keyframes", key, entry);
      return entry.cssName;
    },

    positionTry(moduleId, name, declarations) {
      const key = manifestKey(moduleId, name);
      const entry = compiling(key, () => compilePositionTry(declarations, resolved));
      manifest.put("positionTry", key, entry);
      return entry.cssName;
    },

    viewTransition(moduleId, name, styles) {
      const key = manifestKey(moduleId, name);
      const entry = compiling(key, () => compileViewTransition(styles, resolved));
      manifest.put("viewTransitions", key, entry);
      return entry.cssName;
    },

    defaultMarker() {
      return marker;
    },

    defineMarker(name) {
      return defineMarker(name, resolved);
    },

    resolve(refs, options) {
      return resolve(manifest, refs, resolved, options);
    },

    css(options = {}) {
      return assembleCss(manifest, { stats: options.stats, useCssLayers: resolved.useCssLayers });
    },

    reset() {
      manifest.reset();
    },
  };
}
