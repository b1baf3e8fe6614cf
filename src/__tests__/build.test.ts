import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { build, parseBuildArgs, UsageError } from "../build.js";
import { ConfigError } from "../errors.js";
import { Logger } from "../internal/logger.js";

describe("parseBuildArgs", () => {
  it("reads the definitions module and options", () => {
    expect(parseBuildArgs(["--out", "dist/app.css", "defs.js", "--no-stats"])).toEqual({
      definitions: "defs.js",
      out: "dist/app.css",
      input: undefined,
      config: undefined,
      stats: false,
    });
  });

  it("keeps stats on by default", () => {
    expect(parseBuildArgs(["defs.js"]).stats).toBe(true);
  });

  it("requires a value for path options", () => {
    expect(() => parseBuildArgs(["defs.js", "--config"])).toThrow("--config requires a path argument");
    expect(() => parseBuildArgs(["--input", "--no-stats", "defs.js"])).toThrow("--input requires a path argument");
  });

  it("rejects unknown options", () => {
    expect(() => parseBuildArgs(["--watch", "defs.js"])).toThrow(UsageError);
    expect(() => parseBuildArgs(["--watch", "defs.js"])).toThrow("Unknown option: --watch");
  });

  it("requires exactly one definitions module", () => {
    expect(() => parseBuildArgs([])).toThrow("No definitions module specified");
    expect(() => parseBuildArgs(["a.js", "b.js"])).toThrow("Expected one definitions module, received 2");
  });
});

describe("build", () => {
  let dir: string;

  beforeEach(async () => {
    Logger._clearCollected();
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    dir = await mkdtemp(join(tmpdir(), "atomcss-build-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the stylesheet of a definitions module", async () => {
    const definitions = join(dir, "defs.mjs");
    await writeFile(
      definitions,
      'export default (compiler) => { compiler.defineRules("app/card", { root: { color: "blue" } }); };\n',
    );
    const out = join(dir, "out", "app.css");

    const result = await build({ definitions, out, stats: false });
    expect(result).toEqual({ css: ".xju2f9n{color:blue}", written: "written" });
    expect(await readFile(out, "utf8")).toBe(".xju2f9n{color:blue}\n");
  });

  it("applies the config module and the host stylesheet", async () => {
    const definitions = join(dir, "defs.mjs");
    const config = join(dir, "atomcss.config.mjs");
    const input = join(dir, "app.css");
    await writeFile(
      definitions,
      'export default (compiler) => { compiler.defineRules("app/card", { root: { color: "blue" } }); };\n',
    );
    await writeFile(config, 'export default { classNamePrefix: "a" };\n');
    await writeFile(input, 'body{margin:0}\n@import "atomcss";\n');

    const result = await build({ definitions, config, input, stats: false });
    expect(result).toEqual({ css: "body{margin:0}\n.aju2f9n{color:blue}\n", written: null });
  });

  it("warns when nothing was registered", async () => {
    const definitions = join(dir, "empty.mjs");
    await writeFile(definitions, "export default () => {};\n");
    const result = await build({ definitions, stats: false });
    expect(result.css).toBe("");
    expect(Logger.createReport().getWarnings().map((warning) => warning.type)).toEqual([
      "Definitions module registered no styles",
    ]);
  });

  it("rejects missing files", async () => {
    const definitions = join(dir, "missing.mjs");
    await expect(build({ definitions, stats: false })).rejects.toThrow(`File not found: ${definitions}`);
  });

  it("rejects a definitions module without a default function", async () => {
    const definitions = join(dir, "defs.mjs");
    await writeFile(definitions, "export const rules = {};\n");
    await expect(build({ definitions, stats: false })).rejects.toThrow(UsageError);
  });

  it("rejects a config module without a default object", async () => {
    const definitions = join(dir, "defs.mjs");
    const config = join(dir, "atomcss.config.mjs");
    await writeFile(definitions, "export default () => {};\n");
    await writeFile(config, "export default 42;\n");
    await expect(build({ definitions, config, stats: false })).rejects.toThrow(ConfigError);
  });
});
