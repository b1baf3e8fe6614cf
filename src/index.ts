export { createCompiler } from "./compiler.js";
export { defineConfig, resolveConfig } from "./config.js";
export { dynamic } from "./class/dynamic.js";
export { include } from "./class/include.js";
export { firstThatWorks } from "./types.js";
export { types } from "./vars.js";
export { parseCssBlock } from "./css-block.js";
export { assembleCss } from "./css/assemble.js";
export { injectCss, writeCss } from "./css/writer.js";
export { resolve } from "./merge.js";
export { Manifest } from "./manifest.js";
export { Marker } from "./marker.js";
export { defineStrategy, expandToLonghands, keepShorthands, rejectShorthands } from "./shorthand/index.js";
export { createHash } from "./hash.js";
export { getPriority } from "./priority.js";
export { AtomCssError, CompileError, ConfigError, SelectorError } from "./errors.js";
export { build } from "./build.js";
export type { Compiler, CssOptions, RuleDefinition, RulesRef } from "./compiler.js";
export type { AtomCssConfig, ResolvedConfig } from "./config.js";
export type { PropertyNoticeLevel, UnknownPropertyLevel } from "./property-validation.js";
export type { ClassRule, PropertyMeta, AtomicClassMeta } from "./class/meta.js";
export type { IncludeRef } from "./class/include.js";
export type { Declarations, StyleValue, Scalar } from "./types.js";
export type { VarDefinition, VarsRef } from "./vars.js";
export type { ThemeOverrides } from "./theme.js";
export type { ManifestJSON, ManifestCategory } from "./manifest.js";
export type { DynamicCall, ResolveOptions, ResolvedAttrs, StyleRef } from "./merge.js";
export type { ShorthandStrategy, ShorthandStrategySetting } from "./shorthand/index.js";
export type { When } from "./when.js";
export type { BuildOptions, Definitions } from "./build.js";
