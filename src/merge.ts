import { dynamicVariables } from "./class/dynamic.js";
import { metaClasses, isUnsetMeta, type ClassRule } from "./class/meta.js";
import type { ResolvedConfig } from "./config.js";
import { manifestKey, type Manifest } from "./manifest.js";
import { Marker } from "./marker.js";
import { toCssProperty, type Scalar } from "./types.js";
import { uniq } from "./utils.js";

/**
 * Runtime resolution of an ordered list of rule references into one class
 * string and inline style. Later references win per CSS property, so
 * `resolve([base, primary])` keeps `primary`'s color over `base`'s.
 */

/** `"module.name"` or `{ module, name }`. */
export type RuleRef = string | { readonly module: string; readonly name: string };

/** A call of a dynamic rule with its parameter values. */
export interface DynamicCall {
  readonly rule: RuleRef;
  readonly params: readonly Scalar[];
}

export type StyleRef =
  | RuleRef
  | DynamicCall
  | Marker
  | null
  | undefined
  | false
  | ""
  | readonly StyleRef[];

export interface ResolveOptions {
  /** Extra inline style appended after the dynamic variables */
  style?: string | Readonly<Record<string, Scalar>>;
}

export interface ResolvedAttrs {
  class: string;
  style: string | null;
}

function isDynamicCall(ref: object): ref is DynamicCall {
  return "rule" in ref && "params" in ref;
}

function ruleKey(ref: RuleRef): string {
  return typeof ref === "string" ? ref : manifestKey(ref.module, ref.name);
}

type ResolvableRef = RuleRef | DynamicCall | Marker;

function isRefList(ref: StyleRef): ref is readonly StyleRef[] {
  return Array.isArray(ref);
}

function flatten(refs: readonly StyleRef[]): ResolvableRef[] {
  const out: ResolvableRef[] = [];
  for (const ref of refs) {
    if (ref === null || ref === undefined || ref === false || ref === "") {
      continue;
    }
    if (isRefList(ref)) {
      out.push(...flatten(ref));
    } else {
      out.push(ref);
    }
  }
  return out;
}

function formatExtraStyle(style: ResolveOptions["style"]): string {
  if (style === undefined) {
    return "";
  }
  if (typeof style === "string") {
    return style.trim();
  }
  return Object.entries(style)
    .map(([key, value]) => `${toCssProperty(key)}: ${value}`)
    .join("; ");
}

/**
 * Resolves references against a finished manifest.
 *
 * A string is a rule key when it names a class rule in the manifest; a string
 * without a dot is passed through as a plain class name. Unknown rule keys
 * contribute nothing.
 */
export function resolve(
  manifest: Manifest,
  refs: StyleRef | readonly StyleRef[],
  config: ResolvedConfig,
  options: ResolveOptions = {},
): ResolvedAttrs {
  const properties = new Map<string, string[]>();
  const extraClasses: string[] = [];
  const variables = new Map<string, string>();

  const mergeRule = (rule: ClassRule): void => {
    for (const [property, meta] of rule.atomicClasses) {
      if (isUnsetMeta(meta)) {
        properties.delete(property);
      } else {
        properties.set(property, metaClasses(meta).map((atom) => atom.class));
      }
    }
  };

  for (const ref of flatten(isRefList(refs) ? refs : [refs])) {
    if (ref instanceof Marker) {
      extraClasses.push(ref.class);
      continue;
    }
    if (typeof ref === "string" && !ref.includes(".")) {
      extraClasses.push(...ref.split(/\s+/).filter(Boolean));
      continue;
    }
    let call: DynamicCall | null = null;
    let key: string;
    if (typeof ref === "string") {
      key = ref;
    } else if (isDynamicCall(ref)) {
      call = ref;
      key = ruleKey(ref.rule);
    } else {
      key = ruleKey(ref);
    }
    const rule = manifest.get("classes", key);
    if (!rule) {
      continue;
    }
    mergeRule(rule);
    if (call && rule.dynamic) {
      for (const [variable, value] of dynamicVariables(rule, call.params, config)) {
        variables.set(variable, value);
      }
    }
  }

  const classes = uniq([...[...properties.values()].flat(), ...extraClasses]);
  const style = [
    [...variables].map(([variable, value]) => `${variable}: ${value}`).join("; "),
    formatExtraStyle(options.style),
  ]
    .filter(Boolean)
    .join("; ");

  return { class: classes.join(" "), style: style === "" ? null : style };
}
