import { describe, it, expect, beforeEach, vi } from "vitest";
import { compileRule } from "../class/compile.js";
import { dynamic } from "../class/dynamic.js";
import { include } from "../class/include.js";
import { createCompiler } from "../compiler.js";
import { CompileError } from "../errors.js";
import { Logger } from "../internal/logger.js";
import { types } from "../vars.js";

describe("createCompiler", () => {
  beforeEach(() => {
    Logger._clearCollected();
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  describe("defineRules", () => {
    it("accepts CSS blocks", () => {
      const compiler = createCompiler();
      const card = compiler.defineRules("app/card", { root: "background-color: red; color: blue;" });
      expect(compiler.manifest.get("classes", card.root)?.classString).toBe("xrkmrrc xju2f9n");
    });

    it("writes nothing when one rule fails", () => {
      const compiler = createCompiler();
      expect(() =>
        compiler.defineRules("app/card", { ok: { color: "blue" }, broken: { color: { red: "blue" } } }),
      ).toThrow(CompileError);
      expect(compiler.manifest.has("classes", "app/card.ok")).toBe(false);
    });

    it("prefixes compile errors with the rule key", () => {
      const compiler = createCompiler({ shorthandStrategy: "reject-shorthands" });
      try {
        compiler.defineRules("app/card", { root: { border: "1px solid" } });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CompileError);
        expect(error instanceof CompileError ? error.rule : null).toBe("app/card.root");
        expect(error instanceof Error ? error.message.split("\n")[0] : "").toBe(
          "app/card.root: The shorthand property `border` is not allowed with the reject-shorthands strategy.",
        );
      }
    });

    it("warns when a key is redefined with different styles", () => {
      const compiler = createCompiler();
      compiler.defineRules("app/card", { root: { color: "blue" } });
      compiler.defineRules("app/card", { root: { color: "blue" } });
      expect(Logger.createReport().getWarnings()).toEqual([]);

      compiler.defineRules("app/card", { root: { color: "green" } });
      expect(Logger.createReport().getWarnings()).toEqual([
        {
          severity: "warning",
          type: "Manifest entry replaced by a different definition",
          source: "classes:app/card.root",
        },
      ]);
      expect(compiler.resolve("app/card.root").class).toBe("x1prwzq3");
    });

    it("uses the configured prefix", () => {
      const compiler = createCompiler({ classNamePrefix: "a" });
      const card = compiler.defineRules("app/card", { root: { color: "blue" } });
      expect(compiler.resolve(card.root).class).toBe("aju2f9n");
    });
  });

  describe("include", () => {
    it("starts from the included declarations and lets the rule's own win", () => {
      const compiler = createCompiler();
      const button = compiler.defineRules("app/button", {
        base: { display: "flex", color: "red" },
        primary: include(["base"], { color: "blue" }),
      });
      expect(compiler.manifest.get("classes", button.primary)?.classString).toBe(
        compileRule({ display: "flex", color: "blue" }, compiler.config).classString,
      );
    });

    it("lets a later include replace an earlier one", () => {
      const compiler = createCompiler();
      const button = compiler.defineRules("app/button", {
        danger: { color: "red" },
        calm: { color: "blue" },
        both: include(["danger", "calm"]),
      });
      expect(compiler.resolve(button.both).class).toBe("xju2f9n");
    });

    it("brings nested includes along", () => {
      const compiler = createCompiler();
      const rules = compiler.defineRules("app/button", {
        a: { color: "blue" },
        b: include("a"),
        c: include(["b"], { display: "flex" }),
      });
      expect(compiler.manifest.get("classes", rules.c)?.classString).toBe(
        compileRule({ color: "blue", display: "flex" }, compiler.config).classString,
      );
    });

    it("includes rules of other modules by key or by reference", () => {
      const compiler = createCompiler();
      compiler.defineRules("app/theme", { accent: { color: "blue" } });
      const card = compiler.defineRules("app/card", {
        byKey: include(["app/theme.accent"]),
        byRef: include({ module: "app/theme", name: "accent" }),
      });
      expect(compiler.resolve(card.byKey).class).toBe("xju2f9n");
      expect(compiler.resolve(card.byRef).class).toBe("xju2f9n");
    });

    it("fails on a missing rule with the including rule's key", () => {
      const compiler = createCompiler();
      try {
        compiler.defineRules("app/button", { primary: include(["nope"]) });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CompileError);
        expect(error instanceof CompileError ? error.rule : null).toBe("app/button.primary");
        expect(error instanceof Error ? error.message.split("\n")[0] : "").toBe(
          "app/button.primary: Cannot include `app/button.nope`: rule not found.",
        );
      }
      expect(compiler.manifest.has("classes", "app/button.primary")).toBe(false);
    });

    it("does not include dynamic rules", () => {
      const compiler = createCompiler();
      expect(() =>
        compiler.defineRules("app/box", {
          size: dynamic(["w"], (w) => ({ width: w })),
          root: include(["size"]),
        }),
      ).toThrow("app/box.root: Cannot include `app/box.size`: rule not found.");
    });
  });

  describe("defineVars", () => {
    it("returns var() references and stores one entry per variable", () => {
      const compiler = createCompiler();
      const vars = compiler.defineVars("vars.stylex.js", "vars", { color: "red" });
      expect(vars).toEqual({ color: "var(--xwx8imx)" });
      expect(compiler.manifest.get("vars", "vars.stylex.js.vars.color")).toEqual({
        cssName: "--xwx8imx",
        value: "red",
        type: null,
      });
    });

    it("lets rules read variables", () => {
      const compiler = createCompiler();
      const vars = compiler.defineVars("vars.stylex.js", "vars", { color: "red" });
      const card = compiler.defineRules("app/card", { root: { color: vars.color } });
      const rule = compiler.manifest.get("classes", card.root);
      const [[, meta]] = rule?.atomicClasses ?? [];
      expect("ltr" in meta ? meta.ltr : null).toBe(`.${rule?.classString}{color:var(--xwx8imx)}`);
    });
  });

  describe("defineConsts", () => {
    it("stores constants under their dotted key", () => {
      const compiler = createCompiler();
      const breakpoints = compiler.defineConsts("app/tokens", "breakpoints", { sm: "40rem", lg: 1024 });
      expect(breakpoints).toEqual({ sm: "40rem", lg: 1024 });
      expect(compiler.getConst("app/tokens.breakpoints.lg")).toBe(1024);
      expect(compiler.getConst("app/tokens.breakpoints.xl")).toBeUndefined();
      expect(compiler.css()).toBe("");
    });
  });

  describe("createTheme", () => {
    it("overrides a subset of a variable group", () => {
      const compiler = createCompiler();
      const colors = compiler.defineVars("app/tokens", "colors", {
        fg: "black",
        bg: "white",
        accent: "blue",
        muted: "gray",
      });
      const dark = compiler.createTheme("app/themes", "dark", colors, { fg: "white", bg: "black" });
      const entry = compiler.manifest.get("themes", "app/themes.dark");
      expect(entry?.cssName).toBe(dark);
      expect(entry?.overrides.map(([name]) => name).sort()).toEqual(
        [colors.fg, colors.bg].map((ref) => ref.slice(4, -1)).sort(),
      );
    });
  });

  describe("structural rules", () => {
    it("returns the generated names", () => {
      const compiler = createCompiler();
      expect(compiler.keyframes("app/motion", "spin", { from: { color: "red" }, to: { color: "blue" } })).toBe(
        "x2up61p-B",
      );
      expect(compiler.positionTry("app/popover", "below", { top: "anchor(bottom)" })).toMatch(/^--x/);
      expect(compiler.manifest.stats()).toMatchObject({ keyframes: 1, positionTry: 1 });
    });

    it("annotates structural errors with the key", () => {
      const compiler = createCompiler();
      expect(() => compiler.positionTry("app/popover", "bad", { color: "red" })).toThrow(
        "app/popover.bad: Properties not allowed in @position-try: color.",
      );
    });
  });

  describe("css", () => {
    it("emits every section in a fixed order", () => {
      const compiler = createCompiler();
      compiler.keyframes("app/motion", "spin", { from: { color: "red" }, to: { color: "blue" } });
      compiler.defineRules("app/card", { root: { color: "blue" } });
      compiler.defineVars("vars.stylex.js", "vars", { color: "red" });
      expect(compiler.css()).toBe(
        [
          ":root{--xwx8imx:red;}",
          ".xju2f9n{color:blue}",
          "@keyframes x2up61p-B{from{color:red;}to{color:blue;}}",
        ].join("\n\n"),
      );
    });

    it("registers typed and dynamic variables with @property", () => {
      const compiler = createCompiler();
      compiler.defineVars("vars.stylex.js", "vars", { color: types.color("red") });
      compiler.defineRules("app/box", { fade: dynamic(["o"], (o) => ({ opacity: o })) });
      const fade = compiler.manifest.get("classes", "app/box.fade");
      expect(compiler.css().split("\n\n")).toEqual([
        ":root{--xwx8imx:red;}",
        [
          '@property --xwx8imx { syntax: "<color>"; inherits: true; initial-value: red }',
          '@property --x-opacity { syntax: "*"; inherits: false; }',
        ].join("\n"),
        `.${fade?.classString}{opacity:var(--x-opacity)}`,
      ]);
    });

    it("prepends entry counts on request", () => {
      const compiler = createCompiler();
      compiler.defineRules("app/card", { root: { color: "blue" } });
      expect(compiler.css({ stats: true })).toBe(
        [
          "/* atomcss | vars: 0, consts: 0, keyframes: 0, classes: 1, themes: 0, positionTry: 0, viewTransitions: 0 */",
          ".xju2f9n{color:blue}",
        ].join("\n\n"),
      );
    });

    it("groups atomic rules into layers when configured", () => {
      const compiler = createCompiler({ useCssLayers: true });
      compiler.defineRules("app/card", { root: { "--foo": 10, color: "blue" } });
      expect(compiler.css()).toBe(
        [
          "@layer priority1, priority2;",
          "@layer priority1{",
          ".x40g909{--foo:10}",
          "}",
          "@layer priority2{",
          ".xju2f9n{color:blue}",
          "}",
        ].join("\n"),
      );
    });
  });

  it("forgets everything on reset", () => {
    const compiler = createCompiler();
    compiler.defineRules("app/card", { root: { color: "blue" } });
    compiler.reset();
    expect(compiler.css()).toBe("");
    expect(compiler.resolve("app/card.root").class).toBe("");
  });
});
