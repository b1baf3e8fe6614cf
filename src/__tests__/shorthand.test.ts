import { describe, it, expect } from "vitest";
import { CompileError, ConfigError } from "../errors.js";
import {
  defineStrategy,
  expandToLonghands,
  keepShorthands,
  rejectShorthands,
} from "../shorthand/index.js";
import { resolveShorthandStrategy } from "../shorthand/index.js";
import { splitOnSlash, splitValueTokens } from "../shorthand/split.js";

describe("value splitting", () => {
  it("keeps functions as single tokens", () => {
    expect(splitValueTokens("calc(1px + 2px) var(--x)")).toEqual({
      tokens: ["calc(1px + 2px)", "var(--x)"],
      important: false,
    });
  });

  it("separates !important", () => {
    expect(splitValueTokens("4px !important")).toEqual({ tokens: ["4px"], important: true });
  });

  it("splits on a top-level slash", () => {
    expect(splitOnSlash("10px 20px / 5px")).toEqual(["10px 20px", "5px"]);
  });
});

describe("keepShorthands", () => {
  it("emits shorthands as written", () => {
    expect(keepShorthands.expand("margin", "10px 20px", {})).toEqual([["margin", "10px 20px"]]);
  });

  it("rewrites legacy aliases", () => {
    expect(keepShorthands.expand("margin-horizontal", "4px", {})).toEqual([["margin-inline", "4px"]]);
  });

  it("leaves excluded properties alone", () => {
    expect(keepShorthands.expand("margin-horizontal", "4px", { exclude: ["margin-horizontal"] })).toEqual([
      ["margin-horizontal", "4px"],
    ]);
  });
});

describe("expandToLonghands", () => {
  it("expands box shorthands clockwise", () => {
    expect(expandToLonghands.expand("margin", "10px 20px", {})).toEqual([
      ["margin-top", "10px"],
      ["margin-right", "20px"],
      ["margin-bottom", "10px"],
      ["margin-left", "20px"],
    ]);
  });

  it("keeps !important on every longhand", () => {
    expect(expandToLonghands.expand("padding", "4px !important", {})).toEqual([
      ["padding-top", "4px !important"],
      ["padding-right", "4px !important"],
      ["padding-bottom", "4px !important"],
      ["padding-left", "4px !important"],
    ]);
  });

  it("expands logical pairs", () => {
    expect(expandToLonghands.expand("margin-inline", "1px 2px", {})).toEqual([
      ["margin-inline-start", "1px"],
      ["margin-inline-end", "2px"],
    ]);
    expect(expandToLonghands.expand("gap", "8px", {})).toEqual([
      ["row-gap", "8px"],
      ["column-gap", "8px"],
    ]);
  });

  it("keeps values with more tokens than longhands whole", () => {
    expect(expandToLonghands.expand("margin", "1px 2px 3px 4px 5px", {})).toEqual([
      ["margin", "1px 2px 3px 4px 5px"],
    ]);
    expect(expandToLonghands.expand("gap", "1px 2px 3px", {})).toEqual([["gap", "1px 2px 3px"]]);
  });

  it("combines horizontal and vertical border radii", () => {
    expect(expandToLonghands.expand("border-radius", "10px 20px / 5px", {})).toEqual([
      ["border-top-left-radius", "10px 5px"],
      ["border-top-right-radius", "20px 5px"],
      ["border-bottom-right-radius", "10px 5px"],
      ["border-bottom-left-radius", "20px 5px"],
    ]);
  });

  it("assigns list-style parts by kind", () => {
    expect(expandToLonghands.expand("list-style", "square inside url(dot.png)", {})).toEqual([
      ["list-style-type", "square"],
      ["list-style-position", "inside"],
      ["list-style-image", "url(dot.png)"],
    ]);
  });

  it("spreads numbers and null to every longhand", () => {
    expect(expandToLonghands.expand("inset", 0, {})).toEqual([
      ["top", 0],
      ["right", 0],
      ["bottom", 0],
      ["left", 0],
    ]);
    expect(expandToLonghands.expand("overflow", null, {})).toEqual([
      ["overflow-x", null],
      ["overflow-y", null],
    ]);
  });

  it("keeps fallback lists whole", () => {
    expect(expandToLonghands.expand("margin", ["1px", "var(--m)"], {})).toEqual([
      ["margin", ["1px", "var(--m)"]],
    ]);
  });

  it("regroups condition maps per longhand", () => {
    expect(
      expandToLonghands.expandConditions("margin", "margin", { default: "0", ":hover": "4px 8px" }, {}),
    ).toEqual([
      ["margin-top", { default: "0", ":hover": "4px" }],
      ["margin-right", { default: "0", ":hover": "8px" }],
      ["margin-bottom", { default: "0", ":hover": "4px" }],
      ["margin-left", { default: "0", ":hover": "8px" }],
    ]);
  });
});

describe("rejectShorthands", () => {
  it("refuses ambiguous shorthands", () => {
    expect(() => rejectShorthands.expand("border", "1px solid red", {})).toThrow(
      [
        "The shorthand property `border` is not allowed with the reject-shorthands strategy.",
        "Use longhand properties instead: border-width, border-style, border-color",
      ].join("\n"),
    );
  });

  it("throws a CompileError naming the property", () => {
    try {
      rejectShorthands.expand("outline", "none", {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CompileError);
      expect(error instanceof CompileError ? error.property : null).toBe("outline");
    }
  });

  it("allows box shorthands and excluded properties", () => {
    expect(rejectShorthands.expand("margin", "4px", {})).toEqual([["margin", "4px"]]);
    expect(rejectShorthands.expand("border", "none", { exclude: ["border"] })).toEqual([["border", "none"]]);
  });
});

describe("resolveShorthandStrategy", () => {
  it("resolves built-in names", () => {
    expect(resolveShorthandStrategy("expand-to-longhands")).toEqual({ strategy: expandToLonghands, options: {} });
  });

  it("accepts [strategy, options] tuples", () => {
    expect(resolveShorthandStrategy(["keep-shorthands", { exclude: ["margin"] }])).toEqual({
      strategy: keepShorthands,
      options: { exclude: ["margin"] },
    });
  });

  it("accepts custom strategies", () => {
    const upper = defineStrategy("upper", (property, value) => [[property, value]]);
    expect(resolveShorthandStrategy(upper).strategy).toBe(upper);
  });

  it("rejects unknown names", () => {
    expect(() => resolveShorthandStrategy("expand-all")).toThrow(ConfigError);
    expect(() => resolveShorthandStrategy("expand-all")).toThrow(/^Invalid shorthandStrategy: /);
  });

  it("rejects malformed options", () => {
    expect(() => resolveShorthandStrategy(["keep-shorthands", { exclude: "margin" }])).toThrow(
      "Invalid shorthandStrategy options: `exclude` must be a list of property names",
    );
  });
});
