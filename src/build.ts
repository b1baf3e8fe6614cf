import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { createCompiler, type Compiler } from "./compiler.js";
import { resolveConfig, type AtomCssConfig } from "./config.js";
import { injectCss, writeCss, type WriteResult } from "./css/writer.js";
import { ConfigError } from "./errors.js";
import { Logger } from "./internal/logger.js";
import { MANIFEST_CATEGORIES } from "./manifest.js";

/**
 * The `atomcss build` command: run a definitions module against a fresh
 * compiler and write the stylesheet it produces.
 */

export interface BuildOptions {
  /** Module whose default export receives the compiler */
  definitions: string;
  /** Stylesheet to write; printed to stdout when omitted */
  out?: string;
  /** Host stylesheet with an `@import "atomcss";` placeholder */
  input?: string;
  /** Module whose default export is an `AtomCssConfig` */
  config?: string;
  stats: boolean;
}

export type Definitions = (compiler: Compiler) => void | Promise<void>;

export interface BuildResult {
  css: string;
  written: WriteResult | null;
}

export class UsageError extends Error {}

/** Parses the arguments following `build`. */
export function parseBuildArgs(args: readonly string[]): BuildOptions {
  const positional: string[] = [];
  const values: Record<"out" | "input" | "config", string | undefined> = {
    out: undefined,
    input: undefined,
    config: undefined,
  };
  let stats = true;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--no-stats") {
      stats = false;
    } else if (arg === "--out" || arg === "--input" || arg === "--config") {
      const next = args[i + 1];
      if (!next || next.startsWith("--")) {
        throw new UsageError(`${arg} requires a path argument`);
      }
      values[arg === "--out" ? "out" : arg === "--input" ? "input" : "config"] = next;
      i++; // Skip next arg
    } else if (arg.startsWith("--")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError(
      positional.length === 0
        ? "No definitions module specified"
        : `Expected one definitions module, received ${positional.length}`,
    );
  }
  return { definitions: positional[0], ...values, stats };
}

async function importDefault(path: string): Promise<unknown> {
  const absolutePath = resolve(process.cwd(), path);
  if (!existsSync(absolutePath)) {
    throw new UsageError(`File not found: ${absolutePath}`);
  }
  const module: unknown = await import(pathToFileURL(absolutePath).href);
  if (typeof module === "object" && module !== null && "default" in module) {
    return module.default;
  }
  return undefined;
}

function isDefinitions(value: unknown): value is Definitions {
  return typeof value === "function";
}

function isConfigObject(value: unknown): value is AtomCssConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function build(options: BuildOptions): Promise<BuildResult> {
  let config: AtomCssConfig = {};
  if (options.config) {
    const loaded = await importDefault(options.config);
    if (!isConfigObject(loaded)) {
      throw new ConfigError(`Config at ${options.config} must export a config object as default`);
    }
    config = loaded;
  }

  const compiler = createCompiler(resolveConfig(config));
  const definitions = await importDefault(options.definitions);
  if (!isDefinitions(definitions)) {
    throw new UsageError(
      `Definitions module ${options.definitions} must export a function as default: (compiler) => void`,
    );
  }
  await definitions(compiler);

  const stats = compiler.manifest.stats();
  if (MANIFEST_CATEGORIES.every((category) => stats[category] === 0)) {
    Logger.logWarnings([
      { severity: "warning", type: "Definitions module registered no styles", source: options.definitions },
    ]);
  }

  let css = compiler.css({ stats: options.stats });
  if (options.input) {
    css = injectCss(await readFile(options.input, "utf8"), css, options.input);
  }

  const written = options.out ? await writeCss(options.out, css) : null;
  return { css, written };
}
